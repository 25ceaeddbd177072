/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import {
  MissingArgumentError,
  ValidationError,
  classifyFault,
  type ErrorDescriptor,
  type YamiError,
} from "@yami/core";

export const EXIT_CODE = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];

/**
 * Pipeline stage an error was raised in. Usage errors exit 2 only when raised
 * before anything was dispatched.
 */
export type Stage = "parse" | "plan" | "resolve" | "gate" | "dispatch";

const USAGE_STAGES: ReadonlySet<Stage> = new Set(["parse", "plan", "resolve"]);

/**
 * Exit code for an error descriptor raised at a given stage
 * - 2: MISSING_ARGUMENT / VALIDATION_ERROR while parsing, planning or resolving
 * - 1: everything else, including an aborted confirmation
 */
export function exitCodeFor(stage: Stage, error: ErrorDescriptor): ExitCode {
  if (USAGE_STAGES.has(stage) && (error.code === "MISSING_ARGUMENT" || error.code === "VALIDATION_ERROR")) {
    return EXIT_CODE.USAGE;
  }
  return EXIT_CODE.FAILURE;
}

/**
 * Commander error codes that mean "an argument or subcommand is missing"
 */
const MISSING_CODES: ReadonlySet<string> = new Set([
  "commander.unknownCommand",
  "commander.missingArgument",
  "commander.optionMissingArgument",
  "commander.missingMandatoryOptionValue",
  "commander.help",
]);

/**
 * Commander outcomes that are not failures
 */
export function isCleanExit(err: CommanderError): boolean {
  return err.code === "commander.helpDisplayed" || err.code === "commander.version";
}

/**
 * Translate a commander parse failure into the error taxonomy
 */
export function fromCommanderError(err: CommanderError): YamiError {
  const message =
    err.code === "commander.help"
      ? "A subcommand is required"
      : err.message.replace(/^error:\s*/i, "");

  if (MISSING_CODES.has(err.code)) {
    return new MissingArgumentError(message, { cause: err });
  }
  return new ValidationError(message, { cause: err });
}

/**
 * Map any thrown value to a descriptor, translating commander errors first
 */
export function describeFailure(err: unknown): ErrorDescriptor {
  return classifyFault(err instanceof CommanderError ? fromCommanderError(err) : err);
}

/**
 * Format an error for human output on stderr
 */
export function formatCliError(error: Pick<ErrorDescriptor, "message" | "hint">): string {
  let message = error.message;

  // Redact large payloads from error messages
  if (message.length > 2000) {
    message = message.substring(0, 2000) + "... (truncated)";
  }

  return error.hint ? `Error: ${message}\nHint: ${error.hint}` : `Error: ${message}`;
}
