/**
 * Role commands
 */

import type { CommandSpec } from "../registry/types.js";
import { data, mutation } from "./shared.js";

const ROLE_ARG = { name: "role", description: "Role name" };
const USERNAME_ARG = { name: "username", description: "User name" };

export const roleCommands: CommandSpec[] = [
  {
    group: "role",
    action: "list",
    description: "List roles",
    args: [],
    options: [],
    examples: [["role", "list"]],
    handler: {
      scope: "backend",
      plan: () => async (backend) => data(await backend.listRoles()),
    },
  },
  {
    group: "role",
    action: "create",
    description: "Create a role",
    args: [{ name: "name", description: "Role name" }],
    options: [],
    examples: [["role", "create", "writer"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const name = input.arg("name");
        return async (backend) => {
          await backend.createRole(name);
          return mutation(`Role '${name}' created`);
        };
      },
    },
  },
  {
    group: "role",
    action: "drop",
    description: "Drop a role",
    args: [{ name: "name", description: "Role name" }],
    options: [],
    examples: [["role", "drop", "reader"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const name = input.arg("name");
        return async (backend) => {
          await backend.dropRole(name);
          return mutation(`Role '${name}' dropped`);
        };
      },
    },
  },
  {
    group: "role",
    action: "grant",
    description: "Grant a role to a user",
    args: [ROLE_ARG, USERNAME_ARG],
    options: [],
    examples: [["role", "grant", "reader", "alice"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const role = input.arg("role");
        const username = input.arg("username");
        return async (backend) => {
          await backend.grantRole(role, username);
          return mutation(`Role '${role}' granted to '${username}'`);
        };
      },
    },
  },
  {
    group: "role",
    action: "revoke",
    description: "Revoke a role from a user",
    args: [ROLE_ARG, USERNAME_ARG],
    options: [],
    examples: [["role", "revoke", "reader", "alice"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const role = input.arg("role");
        const username = input.arg("username");
        return async (backend) => {
          await backend.revokeRole(role, username);
          return mutation(`Role '${role}' revoked from '${username}'`);
        };
      },
    },
  },
];
