/**
 * User commands
 */

import type { CommandSpec } from "../registry/types.js";
import { data, mutation } from "./shared.js";

const USERNAME_ARG = { name: "username", description: "User name" };

export const userCommands: CommandSpec[] = [
  {
    group: "user",
    action: "list",
    description: "List users",
    args: [],
    options: [],
    examples: [["user", "list"]],
    handler: {
      scope: "backend",
      plan: () => async (backend) => data(await backend.listUsers()),
    },
  },
  {
    group: "user",
    action: "create",
    description: "Create a user",
    args: [USERNAME_ARG],
    options: [{ flags: "--password <password>", type: "string", required: true, description: "Password for the new user" }],
    examples: [["user", "create", "bob", "--password", "test-secret"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const username = input.arg("username");
        const password = input.requireString("password");
        return async (backend) => {
          await backend.createUser(username, password);
          return mutation(`User '${username}' created`);
        };
      },
    },
  },
  {
    group: "user",
    action: "drop",
    description: "Drop a user",
    args: [USERNAME_ARG],
    options: [],
    examples: [["user", "drop", "alice"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const username = input.arg("username");
        return async (backend) => {
          await backend.dropUser(username);
          return mutation(`User '${username}' dropped`);
        };
      },
    },
  },
];
