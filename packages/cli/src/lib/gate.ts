/**
 * Confirmation gate for destructive commands
 */

import { OperationAbortedError } from "@yami/core";
import type { Terminal } from "./io.js";

export interface GateOptions {
  force: boolean;
  terminal: Terminal;
}

/**
 * Confirmation request shown before a destructive command runs
 */
export interface ConfirmationRequest {
  /** Command label, e.g. "collection drop" */
  command: string;
  /** Question asked on the terminal */
  prompt: string;
}

/**
 * Let a destructive command proceed or abort it.
 *
 * --force skips the prompt. Without it a terminal must be attached; when none
 * is, the command aborts without prompting.
 * @throws OperationAbortedError when not confirmed
 */
export async function guard(request: ConfirmationRequest, options: GateOptions): Promise<void> {
  if (options.force) {
    return;
  }

  if (!options.terminal.isInteractive()) {
    throw new OperationAbortedError(request.command, "non-interactive");
  }

  const confirmed = await options.terminal.confirm(request.prompt);
  if (!confirmed) {
    throw new OperationAbortedError(request.command, "declined");
  }
}
