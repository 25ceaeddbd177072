#!/usr/bin/env node

/**
 * yami CLI entry point
 */

import { createRequire } from "node:module";
import { z } from "zod";
import type { BackendFactory } from "@yami/core";
import { processTerminal } from "./lib/io.js";
import { runCli } from "./main.js";

const requireFromHere = createRequire(import.meta.url);

// Resolved by package name so that the source tree and dist/ find the same file
const PackageJsonSchema = z.object({ version: z.string() });
const packageJson = PackageJsonSchema.parse(requireFromHere("@yami/cli/package.json"));

// The Milvus client is loaded only when a command actually connects
const connect: BackendFactory = async (connection) => {
  const { connectMilvus } = await import("@yami/core/milvus");
  return connectMilvus(connection);
};

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr,
    terminal: processTerminal(),
    connect,
    version: packageJson.version,
  });
}

main().catch((err: unknown) => {
  // runCli reports its own failures; reaching here is a bug
  process.stderr.write(`Fatal: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
  process.exitCode = 1;
});
