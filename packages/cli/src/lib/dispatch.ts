/**
 * Operation dispatch: one client handle, one planned call, no retries
 */

import { performance } from "node:perf_hooks";
import {
  classifyFault,
  type BackendFactory,
  type ConnectionConfig,
  type Logger,
  type OperationOutcome,
  type VectorBackend,
} from "@yami/core";
import { withTiming, type MetricsOptions } from "./telemetry.js";

/**
 * A planned backend call, ready to run against an open handle
 */
export type BackendCall = (backend: VectorBackend) => Promise<OperationOutcome>;

export interface DispatchOptions {
  connect: BackendFactory;
  logger: Logger;
  metrics: MetricsOptions;
}

export interface DispatchResult {
  outcome: OperationOutcome;
  durationMs: number;
}

async function runOnce(
  connection: ConnectionConfig,
  call: BackendCall,
  options: DispatchOptions
): Promise<OperationOutcome> {
  const backend = await options.connect(connection);
  let outcome: OperationOutcome;
  try {
    outcome = await call(backend);
  } finally {
    try {
      await backend.close();
    } catch (err) {
      // The call already settled; a failed close must not replace its outcome
      options.logger.warn("dispatch.close_failed", {
        err_message: err instanceof Error ? err.message : String(err),
      });
    }
  }
  return outcome;
}

/**
 * Open a handle, run the call, always close the handle.
 * Every fault becomes an error outcome; this function does not throw.
 */
export async function dispatch(
  command: string,
  connection: ConnectionConfig,
  call: BackendCall,
  options: DispatchOptions
): Promise<DispatchResult> {
  const { logger } = options;
  const start = performance.now();
  logger.debug("dispatch.start", { command, uri: connection.uri, database: connection.database });

  try {
    const outcome = await withTiming(
      `cli.${command.replace(/\s+/g, ".")}`,
      () => runOnce(connection, call, options),
      options.metrics
    );
    const durationMs = performance.now() - start;
    logger.info("dispatch.success", { command, duration_ms: Math.round(durationMs) });
    return { outcome, durationMs };
  } catch (err) {
    const durationMs = performance.now() - start;
    const error = classifyFault(err);
    logger.info("dispatch.error", {
      command,
      duration_ms: Math.round(durationMs),
      err_code: error.code,
      err_message: error.message,
    });
    return { outcome: { kind: "error", error }, durationMs };
  }
}
