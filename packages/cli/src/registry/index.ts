/**
 * The command table
 */

import { aliasCommands } from "../commands/alias.js";
import { collectionCommands } from "../commands/collection.js";
import { compactCommands } from "../commands/compact.js";
import { connectCommand } from "../commands/connect.js";
import { dataCommands } from "../commands/data.js";
import { databaseCommands } from "../commands/database.js";
import { indexCommands } from "../commands/indexes.js";
import { ioCommands } from "../commands/io.js";
import { loadCommands } from "../commands/load.js";
import { partitionCommands } from "../commands/partition.js";
import { profileCommands } from "../commands/profile.js";
import { queryCommands } from "../commands/query.js";
import { roleCommands } from "../commands/role.js";
import { serverCommands } from "../commands/server.js";
import { userCommands } from "../commands/user.js";
import type { CommandSpec, GroupSpec } from "./types.js";

export const GROUPS: readonly GroupSpec[] = [
  { name: "collection", description: "Manage collections", commands: collectionCommands },
  { name: "index", description: "Manage indexes", commands: indexCommands },
  { name: "partition", description: "Manage partitions", commands: partitionCommands },
  { name: "database", description: "Manage databases", commands: databaseCommands },
  { name: "data", description: "Insert, upsert and delete entities", commands: dataCommands },
  { name: "query", description: "Search and query entities", commands: queryCommands },
  { name: "compact", description: "Compact collection segments", commands: compactCommands },
  { name: "io", description: "Export and import collection data", commands: ioCommands },
  { name: "load", description: "Load and release collections", commands: loadCommands },
  { name: "alias", description: "Manage collection aliases", commands: aliasCommands },
  { name: "user", description: "Manage users", commands: userCommands },
  { name: "role", description: "Manage roles", commands: roleCommands },
  { name: "server", description: "Server information", commands: serverCommands },
  { name: "profile", description: "Manage saved connection profiles", commands: profileCommands },
];

/**
 * Commands invoked by name alone, e.g. "yami connect <uri>"
 */
export const TOP_LEVEL_COMMANDS: readonly CommandSpec[] = [connectCommand];

export function allCommands(): CommandSpec[] {
  return [...TOP_LEVEL_COMMANDS, ...GROUPS.flatMap((group) => group.commands)];
}

export function findCommand(group: string, action?: string): CommandSpec | undefined {
  return allCommands().find((spec) => spec.group === group && spec.action === action);
}

export function commandLabel(spec: Pick<CommandSpec, "group" | "action">): string {
  return spec.action === undefined ? spec.group : `${spec.group} ${spec.action}`;
}

/**
 * Words that invoke a command, as typed after the program name
 */
export function commandPath(spec: Pick<CommandSpec, "group" | "action">): string[] {
  return spec.action === undefined ? [spec.group] : [spec.group, spec.action];
}

export type { ArgSpec, CommandSpec, GroupSpec, OptionSpec, OptionType } from "./types.js";
export { CommandInput, coerceInput, exactlyOne } from "./input.js";
