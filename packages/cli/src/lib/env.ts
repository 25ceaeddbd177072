/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { ValidationError, type Environment } from "@yami/core";

export const MODES = ["agent", "human"] as const;
export const OUTPUT_FORMATS = ["json", "yaml", "table"] as const;

export type Mode = (typeof MODES)[number];
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string, home: string = homedir()): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return home;
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(home, rest);
}

/**
 * Resolve the configuration directory
 * Priority: YAMI_CONFIG_DIR env var > default "~/.yami"
 */
export function resolveConfigDir(env: Environment, home: string = homedir()): string {
  const configured = env.YAMI_CONFIG_DIR;
  const dir = configured === undefined || configured === "" ? "~/.yami" : configured;
  return path.resolve(expandTilde(dir, home));
}

function isMode(value: string): value is Mode {
  return MODES.some((mode) => mode === value);
}

/**
 * Resolve the output mode
 * Priority: --mode > YAMI_MODE env var > "human"
 * @throws ValidationError if YAMI_MODE holds an unknown mode
 */
export function resolveMode(flag: Mode | undefined, env: Environment): Mode {
  if (flag !== undefined) {
    return flag;
  }

  const fromEnv = env.YAMI_MODE?.trim().toLowerCase();
  if (fromEnv === undefined || fromEnv === "") {
    return "human";
  }
  if (!isMode(fromEnv)) {
    throw new ValidationError(`YAMI_MODE must be one of: ${MODES.join(", ")} (got "${env.YAMI_MODE}")`);
  }
  return fromEnv;
}

/**
 * Resolve the output format for a mode; tables are for humans only
 * @throws ValidationError for --output table in agent mode
 */
export function resolveOutputFormat(flag: OutputFormat | undefined, mode: Mode): OutputFormat {
  if (flag === undefined) {
    return mode === "agent" ? "json" : "table";
  }
  if (flag === "table" && mode === "agent") {
    throw new ValidationError("Output format 'table' is only available in human mode; use json or yaml");
  }
  return flag;
}

/**
 * Check if timing metrics are enabled
 */
export function isVerbose(env: Environment): boolean {
  return env.YAMI_CLI_DEBUG === "1";
}
