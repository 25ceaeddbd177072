/**
 * Database commands
 */

import type { CommandSpec } from "../registry/types.js";
import { data, mutation } from "./shared.js";

const NAME_ARG = { name: "name", description: "Database name" };

export const databaseCommands: CommandSpec[] = [
  {
    group: "database",
    action: "list",
    description: "List databases",
    args: [],
    options: [],
    examples: [["database", "list"]],
    handler: {
      scope: "backend",
      plan: () => async (backend) => data(await backend.listDatabases()),
    },
  },
  {
    group: "database",
    action: "create",
    description: "Create a database",
    args: [NAME_ARG],
    options: [],
    examples: [["database", "create", "staging"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const name = input.arg("name");
        return async (backend) => {
          await backend.createDatabase(name);
          return mutation(`Database '${name}' created`);
        };
      },
    },
  },
  {
    group: "database",
    action: "drop",
    description: "Drop an empty database",
    args: [NAME_ARG],
    options: [],
    destructive: (input) => `Drop database '${input.arg("name")}'?`,
    examples: [["database", "drop", "analytics", "--force"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const name = input.arg("name");
        return async (backend) => {
          await backend.dropDatabase(name);
          return mutation(`Database '${name}' dropped`);
        };
      },
    },
  },
];
