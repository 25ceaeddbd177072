/**
 * Declarative command table types
 */

import type { ConnectionFlags, OperationOutcome, ProfileStore } from "@yami/core";
import type { BackendCall } from "../lib/dispatch.js";
import type { GlobalOptions } from "../lib/globals.js";
import type { CommandInput } from "./input.js";

export type OptionType = "string" | "int" | "float" | "list" | "ids" | "json" | "boolean";

export interface OptionSpec {
  /** Commander flags, e.g. "--dim <n>" or "--auto-id" */
  flags: string;
  type: OptionType;
  description: string;
  /** Raw default, coerced like user input */
  default?: string;
  required?: boolean;
  /** Allowed values, matched case-insensitively */
  choices?: readonly string[];
  /** Lower bound for int and float options */
  min?: number;
}

export interface ArgSpec {
  name: string;
  description: string;
}

/**
 * Runs against the vector database. Planning validates and loads inputs
 * before any connection is opened.
 */
export interface BackendHandler {
  scope: "backend";
  plan(input: CommandInput): BackendCall | Promise<BackendCall>;
  /** Connection fields taken from the command's own arguments, over the global flags */
  connection?(input: CommandInput): ConnectionFlags;
}

export interface LocalServices {
  profiles: ProfileStore;
  globals: GlobalOptions;
}

/**
 * Runs locally, without a backend connection
 */
export interface LocalHandler {
  scope: "local";
  /** Usage checks, run at planning time like a backend plan */
  validate?(input: CommandInput, globals: GlobalOptions): void;
  run(input: CommandInput, services: LocalServices): Promise<OperationOutcome>;
}

export type CommandHandler = BackendHandler | LocalHandler;

export interface CommandSpec {
  group: string;
  /** Subcommand name; absent for a command that sits at the top level */
  action?: string;
  description: string;
  args: ArgSpec[];
  options: OptionSpec[];
  /** Confirmation prompt for destructive commands */
  destructive?: (input: CommandInput) => string;
  /** Example invocations, as argv after the program name */
  examples: string[][];
  handler: CommandHandler;
}

export interface GroupSpec {
  name: string;
  description: string;
  commands: CommandSpec[];
}
