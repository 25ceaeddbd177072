/**
 * Load state commands
 */

import type { CommandSpec } from "../registry/types.js";
import { data, mutation } from "./shared.js";

const NAME_ARG = { name: "name", description: "Collection name" };

export const loadCommands: CommandSpec[] = [
  {
    group: "load",
    action: "collection",
    description: "Load a collection into memory so it can be searched",
    args: [NAME_ARG],
    options: [],
    examples: [["load", "collection", "demo"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const name = input.arg("name");
        return async (backend) => {
          await backend.loadCollection(name);
          return mutation(`Collection '${name}' loaded`);
        };
      },
    },
  },
  {
    group: "load",
    action: "release",
    description: "Release a collection from memory",
    args: [NAME_ARG],
    options: [],
    examples: [["load", "release", "demo"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const name = input.arg("name");
        return async (backend) => {
          await backend.releaseCollection(name);
          return mutation(`Collection '${name}' released`);
        };
      },
    },
  },
  {
    group: "load",
    action: "state",
    description: "Show whether a collection is loaded",
    args: [NAME_ARG],
    options: [],
    examples: [["load", "state", "demo"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const name = input.arg("name");
        return async (backend) => data({ collection: name, state: await backend.getLoadState(name) });
      },
    },
  },
];
