/**
 * Alias commands
 */

import type { CommandSpec } from "../registry/types.js";
import { data, mutation } from "./shared.js";

const COLLECTION_ARG = { name: "collection", description: "Collection name" };
const ALIAS_ARG = { name: "alias", description: "Alias name" };

export const aliasCommands: CommandSpec[] = [
  {
    group: "alias",
    action: "list",
    description: "List aliases of a collection",
    args: [COLLECTION_ARG],
    options: [],
    examples: [["alias", "list", "demo"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const collection = input.arg("collection");
        return async (backend) => data(await backend.listAliases(collection));
      },
    },
  },
  {
    group: "alias",
    action: "create",
    description: "Point a new alias at a collection",
    args: [COLLECTION_ARG, ALIAS_ARG],
    options: [],
    examples: [["alias", "create", "demo", "demo_latest"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const collection = input.arg("collection");
        const alias = input.arg("alias");
        return async (backend) => {
          await backend.createAlias(collection, alias);
          return mutation(`Alias '${alias}' created for '${collection}'`);
        };
      },
    },
  },
  {
    group: "alias",
    action: "drop",
    description: "Drop an alias",
    args: [ALIAS_ARG],
    options: [],
    examples: [["alias", "drop", "demo_alias"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const alias = input.arg("alias");
        return async (backend) => {
          await backend.dropAlias(alias);
          return mutation(`Alias '${alias}' dropped`);
        };
      },
    },
  },
];
