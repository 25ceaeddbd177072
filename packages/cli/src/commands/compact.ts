/**
 * Compaction commands: start a job, inspect it, wait for it
 *
 * Job ids are numeric strings; they stay strings end to end since they
 * routinely exceed 2^53.
 */

import { performance } from "node:perf_hooks";
import { setTimeout as sleep } from "node:timers/promises";
import { ConnectionError, ValidationError, type CompactionKind } from "@yami/core";
import type { CommandInput } from "../registry/input.js";
import type { CommandSpec } from "../registry/types.js";
import { data, mutation } from "./shared.js";

const JOB_ARG = { name: "job_id", description: "Compaction job id, as printed by 'compact run'" };

const COMPLETED = "Completed";

function jobIdOf(input: CommandInput): string {
  const jobId = input.arg("job_id").trim();
  if (!/^\d+$/.test(jobId)) {
    throw new ValidationError(`Invalid job id '${jobId}': expected a number`);
  }
  return jobId;
}

function compactionKind(input: CommandInput): CompactionKind {
  const clustering = input.flag("clustering");
  const l0 = input.flag("l0");
  if (clustering && l0) {
    throw new ValidationError(`Use either ${input.nameOf("clustering")} or ${input.nameOf("l0")}, not both`);
  }
  if (clustering) return "clustering";
  return l0 ? "l0" : "default";
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(1);
}

export const compactCommands: CommandSpec[] = [
  {
    group: "compact",
    action: "run",
    description: "Start compacting a collection's segments",
    args: [{ name: "collection", description: "Collection name" }],
    options: [
      { flags: "-c, --clustering", type: "boolean", description: "Clustering compaction (needs a clustering key)" },
      { flags: "--l0", type: "boolean", description: "Compact level-0 delete segments only" },
    ],
    examples: [
      ["compact", "run", "demo"],
      ["compact", "run", "demo", "--l0"],
    ],
    handler: {
      scope: "backend",
      plan: (input) => {
        const collection = input.arg("collection");
        const kind = compactionKind(input);
        return async (backend) => {
          const jobId = await backend.compact(collection, kind);
          return mutation(`Compaction started on '${collection}' (job ${jobId})`, {
            job_id: jobId,
            collection,
            type: kind,
          });
        };
      },
    },
  },
  {
    group: "compact",
    action: "state",
    description: "Show the state of a compaction job",
    args: [JOB_ARG],
    options: [],
    examples: [["compact", "state", "5000"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const jobId = jobIdOf(input);
        return async (backend) => {
          const progress = await backend.getCompactionState(jobId);
          return data({
            job_id: jobId,
            state: progress.state,
            executing_plans: progress.executingPlans,
            completed_plans: progress.completedPlans,
            failed_plans: progress.failedPlans,
            timeout_plans: progress.timeoutPlans,
          });
        };
      },
    },
  },
  {
    group: "compact",
    action: "plans",
    description: "Show the segment merge plans of a compaction job",
    args: [JOB_ARG],
    options: [],
    examples: [["compact", "plans", "5000"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const jobId = jobIdOf(input);
        return async (backend) => {
          const { state, plans } = await backend.getCompactionPlans(jobId);
          return data({ job_id: jobId, state, plans });
        };
      },
    },
  },
  {
    group: "compact",
    action: "wait",
    description: "Poll a compaction job until it completes",
    args: [JOB_ARG],
    options: [
      { flags: "-i, --interval <seconds>", type: "float", min: 0, default: "2", description: "Seconds between polls" },
      { flags: "--timeout <seconds>", type: "float", min: 0, default: "300", description: "Give up after this many seconds" },
    ],
    examples: [["compact", "wait", "5000", "--interval", "0"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const jobId = jobIdOf(input);
        const intervalMs = input.requireNumber("interval") * 1000;
        const timeoutMs = input.requireNumber("timeout") * 1000;
        return async (backend) => {
          const start = performance.now();
          for (;;) {
            const progress = await backend.getCompactionState(jobId);
            const elapsed = performance.now() - start;
            if (progress.state === COMPLETED) {
              return mutation(`Compaction job ${jobId} completed in ${seconds(elapsed)}s`, {
                job_id: jobId,
                state: progress.state,
                completed_plans: progress.completedPlans,
                failed_plans: progress.failedPlans,
              });
            }
            if (elapsed >= timeoutMs) {
              throw new ConnectionError(
                `Timed out after ${seconds(elapsed)}s waiting for compaction job ${jobId} (state: ${progress.state})`
              );
            }
            await sleep(intervalMs);
          }
        };
      },
    },
  },
];
