/**
 * CLI testing utilities
 */

import { fileURLToPath } from "node:url";
import { execa } from "execa";

/**
 * The CLI entry point, run from its TypeScript source through tsx
 */
export const CLI_ENTRY = fileURLToPath(new URL("../../cli/src/cli.ts", import.meta.url));

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
  /** Terminating signal when the process didn't exit normally */
  signal: string | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Environment variables, layered over a clean yami environment */
  env?: Record<string, string>;
  /** Input to pass to stdin; stdin is always a pipe, never a terminal */
  input?: string;
}

/**
 * Variables that would leak the developer's own setup into a test run
 */
const SCRUBBED_ENV = ["MILVUS_URI", "MILVUS_TOKEN", "YAMI_MODE", "YAMI_CONFIG_DIR", "YAMI_LOG_LEVEL", "YAMI_CLI_DEBUG"];

/**
 * Execute the yami CLI in a child process. The child runs in the current
 * working directory so that the tsx loader resolves from the workspace.
 * @param args - Command arguments
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { env, input = "" } = options;

  const baseEnv: Record<string, string | undefined> = { ...process.env };
  for (const name of SCRUBBED_ENV) {
    delete baseEnv[name];
  }

  const result = await execa(process.execPath, ["--import", "tsx", CLI_ENTRY, ...args], {
    env: { ...baseEnv, ...env },
    extendEnv: false,
    input,
    reject: false,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
    signal: result.signal ?? null,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
