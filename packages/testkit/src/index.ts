/**
 * Test helpers shared by the yami packages
 */

export { FakeBackend, createDemoBackend, fakeConnector } from "./backend.js";
export type { BackendMethod, FakeCall, FakeCollection, FakeCompaction, FakeConnector, FakeField, FakeIndex } from "./backend.js";
export { CLI_ENTRY, runCli, parseJsonOutput } from "./cli.js";
export type { CliExecOptions, CliResult } from "./cli.js";
export { createTempConfigDir, removeDir, withTempDir, writeFixture } from "./fs.js";
export { memorySink, scriptedTerminal } from "./streams.js";
export type { MemorySink, ScriptedTerminal } from "./streams.js";
