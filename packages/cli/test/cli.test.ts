/**
 * End-to-end pipeline tests, run in process against the fake backend
 */

import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import yaml from "js-yaml";
import { Logger, type Environment } from "@yami/core";
import {
  createDemoBackend,
  createTempConfigDir,
  fakeConnector,
  memorySink,
  removeDir,
  scriptedTerminal,
  withTempDir,
  writeFixture,
  type FakeBackend,
} from "@yami/testkit";
import { runCli } from "../src/main.js";

const URI = "http://localhost:19530";

describe("yami pipeline", () => {
  let configDir: string;
  let backend: FakeBackend;

  beforeEach(async () => {
    configDir = await createTempConfigDir();
    backend = createDemoBackend();
  });

  afterEach(async () => {
    await removeDir(configDir);
  });

  async function run(
    argv: string[],
    options: { env?: Environment; interactive?: boolean; answers?: boolean[]; stdoutTTY?: boolean } = {}
  ) {
    const stdout = memorySink(options.stdoutTTY ?? false);
    const stderr = memorySink();
    const terminal = scriptedTerminal({ interactive: options.interactive ?? false, answers: options.answers });
    const connector = fakeConnector(backend);
    const code = await runCli(argv, {
      env: { MILVUS_URI: URI, YAMI_CONFIG_DIR: configDir, ...options.env },
      stdout,
      stderr,
      terminal,
      connect: connector.connect,
      version: "1.2.3",
      logger: new Logger("error", () => undefined),
    });
    return { code, stdout: stdout.text(), stderr: stderr.text(), terminal, connections: connector.connections };
  }

  function json(text: string): unknown {
    return JSON.parse(text);
  }

  describe("agent mode", () => {
    it("should wrap a mutation in a structured envelope", async () => {
      const result = await run(["--mode", "agent", "collection", "create", "demo2", "--dim", "8"]);

      expect(result.code).toBe(0);
      expect(json(result.stdout)).toMatchObject({
        ok: true,
        data: { message: "Collection 'demo2' created" },
        meta: { command: "collection create" },
      });
      expect(result.stderr).toBe("");
      expect(backend.collections.get("demo2")?.fields).toEqual([
        { name: "id", type: "Int64", isPrimary: true, autoId: false },
        { name: "vector", type: "FloatVector", isPrimary: false, autoId: false, dim: 8 },
      ]);
    });

    it("should take the mode from YAMI_MODE", async () => {
      const result = await run(["query", "search", "demo", "--vector", "[0.1,0.2,0.3,0.4]", "--limit", "1"], {
        env: { YAMI_MODE: "Agent" },
      });

      expect(result.code).toBe(0);
      expect(json(result.stdout)).toMatchObject({
        ok: true,
        data: [{ id: 1, title: "first", vector: [0.1, 0.2, 0.3, 0.4], distance: 0 }],
        meta: { command: "query search", count: 1 },
      });
    });

    it("should report backend faults with a hint and exit 1", async () => {
      const result = await run(["--mode", "agent", "collection", "describe", "ghost"]);

      expect(result.code).toBe(1);
      expect(json(result.stdout)).toMatchObject({
        ok: false,
        error: {
          code: "NOT_FOUND",
          message: "collection not found[collection=ghost]",
          hint: "Use the matching list command (e.g. 'yami collection list') to see what exists",
        },
        meta: { command: "collection describe" },
      });
      expect(backend.closeCount).toBe(1);
    });

    it("should print YAML when asked", async () => {
      const result = await run(["--mode", "agent", "-o", "yaml", "server", "version"]);

      expect(result.code).toBe(0);
      expect(result.stdout.split("\n").slice(0, 3)).toEqual(["ok: true", "data:", "  version: v2.5.4"]);
      expect(yaml.load(result.stdout)).toMatchObject({ meta: { command: "server version" } });
    });

    it("should reject table output", async () => {
      const result = await run(["--mode", "agent", "--output", "table", "collection", "list"]);

      expect(result.code).toBe(2);
      expect(json(result.stdout)).toMatchObject({
        ok: false,
        error: {
          code: "VALIDATION_ERROR",
          message: "Output format 'table' is only available in human mode; use json or yaml",
        },
      });
      expect(result.connections).toEqual([]);
    });
  });

  describe("human mode", () => {
    it("should print read results as a table", async () => {
      const result = await run(["collection", "list"]);

      expect(result.code).toBe(0);
      expect(result.stdout).toBe("value\n-----\ndemo\n");
    });

    it("should print confirmations and honor --quiet", async () => {
      const loud = await run(["load", "release", "demo"]);
      expect(loud.stdout).toBe("Collection 'demo' released\n");

      const quiet = await run(["--quiet", "load", "collection", "demo"]);
      expect(quiet.code).toBe(0);
      expect(quiet.stdout).toBe("");
      expect(backend.collections.get("demo")?.loaded).toBe(true);
    });

    it("should print the plain payload as JSON", async () => {
      const result = await run(["-o", "json", "data", "delete", "demo", "--ids", "1", "--force"]);

      expect(result.code).toBe(0);
      expect(json(result.stdout)).toEqual({
        status: "success",
        message: "Deleted 1 entities from 'demo'",
        delete_count: 1,
      });
    });

    it("should print errors to stderr", async () => {
      const result = await run(["partition", "drop", "demo", "_default", "--force"]);

      expect(result.code).toBe(1);
      expect(result.stdout).toBe("");
      expect(result.stderr).toBe("Error: default partition cannot be deleted\n");
    });

    it("should reject an unknown YAMI_MODE", async () => {
      const result = await run(["collection", "list"], { env: { YAMI_MODE: "robot" } });

      expect(result.code).toBe(2);
      expect(result.stderr).toBe('Error: YAMI_MODE must be one of: agent, human (got "robot")\n');
      expect(result.connections).toEqual([]);
    });
  });

  describe("usage errors", () => {
    it.each([
      [["collection", "bogus"], "MISSING_ARGUMENT"],
      [["collection", "describe"], "MISSING_ARGUMENT"],
      [["collection", "list", "--nope"], "VALIDATION_ERROR"],
      [["query", "search", "demo", "--vector", "[1,2]", "--limit", "0"], "VALIDATION_ERROR"],
      [["query", "search", "demo"], "MISSING_ARGUMENT"],
      [["collection", "create", "demo3"], "MISSING_ARGUMENT"],
      [["query", "query", "demo", "--ids", "1", "--filter", "id > 0"], "VALIDATION_ERROR"],
    ])("should exit 2 for %j without connecting", async (argv, code) => {
      const result = await run(["--mode", "agent", ...argv]);

      expect(result.code).toBe(2);
      expect(json(result.stdout)).toMatchObject({ ok: false, error: { code } });
      expect(result.connections).toEqual([]);
    });

    it("should require a subcommand", async () => {
      const result = await run(["--mode", "agent"]);

      expect(result.code).toBe(2);
      expect(json(result.stdout)).toMatchObject({
        ok: false,
        error: { code: "MISSING_ARGUMENT", message: "A subcommand is required" },
        meta: { command: "yami" },
      });
    });

    it("should exit 2 when no URI is configured", async () => {
      const result = await run(["--mode", "agent", "collection", "list"], { env: { MILVUS_URI: undefined } });

      expect(result.code).toBe(2);
      expect(json(result.stdout)).toMatchObject({ ok: false, error: { code: "VALIDATION_ERROR" } });
      expect(result.connections).toEqual([]);
    });

    it("should exit 1 for an unreadable rows file", async () => {
      const result = await run(["--mode", "agent", "data", "insert", "demo", "--file", `${configDir}/missing.json`]);

      expect(result.code).toBe(1);
      expect(json(result.stdout)).toMatchObject({ ok: false, error: { code: "FILE_NOT_FOUND" } });
      expect(result.connections).toEqual([]);
    });

    it("should exit 0 for --version and --help", async () => {
      const version = await run(["--version"]);
      expect(version.code).toBe(0);
      expect(version.stdout).toBe("1.2.3\n");

      const help = await run(["--help"]);
      expect(help.code).toBe(0);
      expect(help.stdout).toContain("Usage: yami [options] [command]");
    });
  });

  describe("confirmation", () => {
    it("should abort a destructive command without a terminal", async () => {
      const result = await run(["--mode", "agent", "collection", "drop", "demo"]);

      expect(result.code).toBe(1);
      expect(json(result.stdout)).toMatchObject({
        ok: false,
        error: {
          code: "MISSING_ARGUMENT",
          message: "Aborted 'collection drop': confirmation required but no terminal is attached",
          hint: "Re-run with --force to skip the confirmation prompt",
        },
      });
      expect(result.connections).toEqual([]);
      expect(backend.collections.has("demo")).toBe(true);
    });

    it("should run a destructive command once confirmed", async () => {
      const result = await run(["collection", "drop", "demo"], { interactive: true, answers: [true] });

      expect(result.code).toBe(0);
      expect(result.terminal.questions).toEqual(["Drop collection 'demo' and all of its data?"]);
      expect(result.stdout).toBe("Collection 'demo' dropped\n");
      expect(backend.collections.has("demo")).toBe(false);
    });

    it("should abort when the prompt is declined", async () => {
      const result = await run(["data", "delete", "demo", "--ids", "1,2"], { interactive: true, answers: [false] });

      expect(result.code).toBe(1);
      expect(result.terminal.questions).toEqual(["Delete entities with ids 1, 2 from 'demo'?"]);
      expect(result.stderr).toBe(
        "Error: Aborted 'data delete': not confirmed\nHint: Re-run with --force to skip the confirmation prompt\n"
      );
      expect(backend.collections.get("demo")?.rows).toHaveLength(2);
    });
  });

  describe("connection", () => {
    it("should pass --db and MILVUS_TOKEN to the backend", async () => {
      const result = await run(["--db", "analytics", "collection", "list"], { env: { MILVUS_TOKEN: "root:test-secret" } });

      expect(result.code).toBe(0);
      expect(result.connections).toEqual([{ uri: URI, token: "root:test-secret", database: "analytics" }]);
    });

    it("should accept short aliases for connection and query options", async () => {
      const result = await run([
        "-u", "http://milvus.internal:19530", "-t", "test-secret", "-d", "analytics", "-o", "json",
        "query", "search", "demo", "-v", "[0.1,0.2,0.3,0.4]", "-l", "1", "-f", "id > 0", "-p", "recent",
      ]);

      expect(result.code).toBe(0);
      expect(result.connections).toEqual([
        { uri: "http://milvus.internal:19530", token: "test-secret", database: "analytics" },
      ]);
      expect(backend.calls.find((call) => call.method === "search")?.args).toEqual([
        { collection: "demo", vector: [0.1, 0.2, 0.3, 0.4], limit: 1, filter: "id > 0", partitions: ["recent"] },
      ]);
    });

    it("should let --uri override the environment", async () => {
      const result = await run(["--uri", "http://milvus.internal:19530", "server", "version"]);
      expect(result.connections).toEqual([{ uri: "http://milvus.internal:19530" }]);
    });
  });

  describe("profiles", () => {
    it("should save a profile and connect through it", async () => {
      const added = await run(["profile", "add", "local", "--uri", "http://127.0.0.1:19530", "--db", "analytics"]);
      expect(added.code).toBe(0);
      expect(added.stdout).toBe("Profile 'local' saved\n");
      expect(added.connections).toEqual([]);

      const listed = await run(["--mode", "agent", "profile", "list"]);
      expect(json(listed.stdout)).toMatchObject({
        ok: true,
        data: [{ name: "local", uri: "http://127.0.0.1:19530", database: "analytics", default: true }],
        meta: { count: 1 },
      });

      const used = await run(["collection", "list"], { env: { MILVUS_URI: undefined } });
      expect(used.connections).toEqual([{ uri: "http://127.0.0.1:19530", database: "analytics" }]);
    });

    it("should mask tokens", async () => {
      await run(["profile", "add", "cloud", "--uri", "https://example.invalid", "--token", "test-secret"]);
      const shown = await run(["--mode", "agent", "profile", "show", "cloud"]);

      expect(json(shown.stdout)).toMatchObject({ ok: true, data: { name: "cloud", token: "****" } });
      expect(shown.stdout).not.toContain("test-secret");
    });

    it("should require --uri to add a profile", async () => {
      const result = await run(["--mode", "agent", "profile", "add", "local"]);

      expect(result.code).toBe(2);
      expect(json(result.stdout)).toMatchObject({
        ok: false,
        error: { code: "MISSING_ARGUMENT", message: "Missing required option --uri" },
      });
    });

    it("should exit 1 for an unknown profile", async () => {
      const result = await run(["--mode", "agent", "profile", "use", "ghost"]);

      expect(result.code).toBe(1);
      expect(json(result.stdout)).toMatchObject({
        ok: false,
        error: { code: "NOT_FOUND", message: "Profile 'ghost' not found" },
      });
    });
  });

  describe("data files", () => {
    it("should insert rows from a JSON Lines file", async () => {
      const file = await writeFixture(
        configDir,
        "rows.jsonl",
        '{"id":10,"vector":[1,0,0,0]}\n\n{"id":11,"vector":[0,1,0,0]}\n'
      );
      const result = await run(["--mode", "agent", "data", "insert", "demo", "--file", file]);

      expect(result.code).toBe(0);
      expect(json(result.stdout)).toMatchObject({
        ok: true,
        data: { message: "Inserted 2 entities into 'demo'", insert_count: 2, ids: [10, 11] },
      });
    });
  });

  describe("inline rows", () => {
    it("should write int64 keys beyond 2^53 unchanged", async () => {
      const result = await run([
        "--mode", "agent", "data", "insert", "demo", "--data", '{"id": 449123456789012345, "vector": [1, 0, 0, 0]}',
      ]);

      expect(result.code).toBe(0);
      expect(backend.collections.get("demo")?.rows.at(-1)).toEqual({ id: "449123456789012345", vector: [1, 0, 0, 0] });
      expect(json(result.stdout)).toMatchObject({ data: { insert_count: 1, ids: ["449123456789012345"] } });
    });
  });

  describe("connect", () => {
    it("should connect to the given URI and report the server version", async () => {
      const result = await run(["--mode", "agent", "connect", "http://milvus.internal:19530"]);

      expect(result.code).toBe(0);
      expect(json(result.stdout)).toMatchObject({
        ok: true,
        data: { connected: true, uri: "http://milvus.internal:19530", version: "v2.5.4" },
        meta: { command: "connect" },
      });
      expect(result.connections).toEqual([{ uri: "http://milvus.internal:19530" }]);
    });

    it("should keep a global token for the given URI", async () => {
      const result = await run(["--mode", "agent", "-t", "test-secret", "connect", "http://milvus.internal:19530"]);

      expect(result.code).toBe(0);
      expect(result.connections).toEqual([{ uri: "http://milvus.internal:19530", token: "test-secret" }]);
    });
  });

  describe("hybrid search", () => {
    const DENSE = '{"field":"vector","vector":[0.1,0.2,0.3,0.4]}';
    const REVERSED = '{"field":"vector","vector":[0.4,0.3,0.2,0.1]}';

    it("should fuse rankings with rrf by default", async () => {
      const result = await run(["--mode", "agent", "query", "hybrid-search", "demo", "-r", `[${DENSE}]`]);

      expect(result.code).toBe(0);
      expect(json(result.stdout)).toMatchObject({
        ok: true,
        data: [
          { id: 1, title: "first", distance: 0.016393 },
          { id: 2, title: "second", distance: 0.016129 },
        ],
        meta: { command: "query hybrid-search" },
      });
      expect(backend.calls.find((call) => call.method === "hybridSearch")?.args).toEqual([
        {
          collection: "demo",
          requests: [{ field: "vector", vector: [0.1, 0.2, 0.3, 0.4], limit: 10 }],
          ranker: { kind: "rrf", k: 60 },
          limit: 10,
        },
      ]);
    });

    it("should weight each request's ranking", async () => {
      const result = await run([
        "--mode", "agent", "query", "hybrid-search", "demo",
        "--requests", `[${DENSE},${REVERSED}]`, "--ranker", "weighted", "-w", "0.3,0.7",
      ]);

      expect(result.code).toBe(0);
      expect(json(result.stdout)).toMatchObject({
        data: [
          { id: 2, distance: 0.85 },
          { id: 1, distance: 0.65 },
        ],
      });
    });

    it("should read requests from a file", async () => {
      const file = await writeFixture(configDir, "requests.json", `[${REVERSED}]`);
      const result = await run(["--mode", "agent", "query", "hybrid-search", "demo", "--file", file, "-l", "1"]);

      expect(result.code).toBe(0);
      expect(json(result.stdout)).toMatchObject({ data: [{ id: 2, distance: 0.016393 }] });
    });

    it.each([
      [["--requests", `[${DENSE},${REVERSED}]`, "--ranker", "weighted", "--weights", "1"], "--weights has 1 values but there are 2 search requests"],
      [["--requests", `[${DENSE}]`, "--weights", "1"], "--weights only applies to --ranker weighted"],
      [["--requests", '[{"vector":[1,0,0,0]}]'], "Invalid search requests in --requests at 0.field: Required"],
      [["--requests", "[]"], "Invalid search requests in --requests: at least one request is required"],
    ])("should exit 2 for %j", async (options, message) => {
      const result = await run(["--mode", "agent", "query", "hybrid-search", "demo", ...options]);

      expect(result.code).toBe(2);
      expect(json(result.stdout)).toMatchObject({ ok: false, error: { code: "VALIDATION_ERROR", message } });
      expect(result.connections).toEqual([]);
    });
  });

  describe("compaction", () => {
    it("should start a job and report its id", async () => {
      const result = await run(["--mode", "agent", "compact", "run", "demo", "--l0"]);

      expect(result.code).toBe(0);
      expect(json(result.stdout)).toMatchObject({
        ok: true,
        data: { message: "Compaction started on 'demo' (job 5000)", job_id: "5000", collection: "demo", type: "l0" },
      });
    });

    it("should show the state and plans of a job", async () => {
      await run(["compact", "run", "demo"]);

      const state = await run(["--mode", "agent", "compact", "state", "5000"]);
      expect(json(state.stdout)).toMatchObject({
        data: {
          job_id: "5000",
          state: "Completed",
          executing_plans: 0,
          completed_plans: 1,
          failed_plans: 0,
          timeout_plans: 0,
        },
      });

      const plans = await run(["--mode", "agent", "compact", "plans", "5000"]);
      expect(json(plans.stdout)).toMatchObject({
        data: { job_id: "5000", state: "Completed", plans: [{ sources: [101, 102], target: 103 }] },
      });
    });

    it("should poll until the job completes", async () => {
      backend.compactionSteps = 2;
      await run(["compact", "run", "demo"]);

      const result = await run(["--mode", "agent", "compact", "wait", "5000", "-i", "0"]);

      expect(result.code).toBe(0);
      expect(json(result.stdout)).toMatchObject({
        data: { job_id: "5000", state: "Completed", completed_plans: 1, failed_plans: 0 },
      });
      expect(backend.calledMethods().filter((method) => method === "getCompactionState")).toHaveLength(3);
    });

    it("should give up after the timeout", async () => {
      backend.compactionSteps = 100;
      await run(["compact", "run", "demo"]);

      const result = await run(["--mode", "agent", "compact", "wait", "5000", "--interval", "0", "--timeout", "0"]);

      expect(result.code).toBe(1);
      expect(json(result.stdout)).toMatchObject({ ok: false, error: { code: "CONNECTION_ERROR" } });
      expect(json(result.stdout)).toHaveProperty(
        "error.message",
        expect.stringMatching(/^Timed out after \d+\.\ds waiting for compaction job 5000 \(state: Executing\)$/)
      );
    });

    it("should reject a job id that is not a number", async () => {
      const result = await run(["--mode", "agent", "compact", "state", "job-1"]);

      expect(result.code).toBe(2);
      expect(json(result.stdout)).toMatchObject({
        ok: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid job id 'job-1': expected a number" },
      });
    });
  });

  describe("export and import", () => {
    it("should export selected fields to JSON Lines", async () => {
      await withTempDir(async (dir) => {
        const file = join(dir, "demo.jsonl");
        const result = await run(["--mode", "agent", "io", "export", "demo", file, "--fields", "title"]);

        expect(result.code).toBe(0);
        expect(json(result.stdout)).toMatchObject({
          data: { message: `Exported 2 rows to ${file}`, export_count: 2, file },
        });
        expect(await readFile(file, "utf8")).toBe('{"id":1,"title":"first"}\n{"id":2,"title":"second"}\n');
        expect(backend.calls.find((call) => call.method === "scan")?.args).toEqual([
          { collection: "demo", batchSize: 1000, outputFields: ["title"] },
        ]);
      });
    });

    it("should import an exported Parquet file in batches", async () => {
      backend.seedCollection("copy");

      await withTempDir(async (dir) => {
        const file = join(dir, "demo.parquet");
        const exported = await run(["--mode", "agent", "io", "export", "demo", file]);
        expect(exported.code).toBe(0);

        const result = await run(["--mode", "agent", "io", "import", "copy", file, "-b", "1"]);

        expect(result.code).toBe(0);
        expect(json(result.stdout)).toMatchObject({
          data: { message: "Imported 2 rows into 'copy'", import_count: 2, batches: 2 },
        });
        expect(backend.collections.get("copy")?.rows).toEqual([
          { id: 1, vector: [0.1, 0.2, 0.3, 0.4], title: "first" },
          { id: 2, vector: [0.4, 0.3, 0.2, 0.1], title: "second" },
        ]);
      });
    });

    it("should not write a file when nothing matches", async () => {
      backend.seedCollection("empty");

      await withTempDir(async (dir) => {
        const result = await run(["--mode", "agent", "io", "export", "empty", join(dir, "empty.parquet")]);

        expect(result.code).toBe(0);
        expect(json(result.stdout)).toMatchObject({ data: { message: "No data to export", export_count: 0 } });
        expect(await readdir(dir)).toEqual([]);
      });
    });

    it("should report a missing collection", async () => {
      await withTempDir(async (dir) => {
        const file = await writeFixture(dir, "rows.json", '[{"id": 1, "vector": [1, 0, 0, 0]}]');
        const result = await run(["--mode", "agent", "io", "import", "ghost", file]);

        expect(result.code).toBe(1);
        expect(json(result.stdout)).toMatchObject({
          ok: false,
          error: { code: "NOT_FOUND", message: "Collection 'ghost' not found" },
        });
        expect(backend.calledMethods()).toEqual(["hasCollection", "close"]);
      });
    });

    it("should reject an unsupported file type before connecting", async () => {
      const result = await run(["--mode", "agent", "io", "export", "demo", "demo.csv"]);

      expect(result.code).toBe(2);
      expect(json(result.stdout)).toMatchObject({
        ok: false,
        error: {
          code: "VALIDATION_ERROR",
          message: "Unsupported file type '.csv': use .json, .jsonl, .ndjson, .parquet",
        },
      });
      expect(result.connections).toEqual([]);
    });
  });

  describe("debug output", () => {
    it("should write timing metrics to stderr", async () => {
      const result = await run(["server", "version"], { env: { YAMI_CLI_DEBUG: "1" } });

      expect(result.code).toBe(0);
      expect(result.stderr).toMatch(/^metric cli\.resolve duration_ms=\d+ success=true$/m);
      expect(result.stderr).toMatch(/^metric cli\.server\.version duration_ms=\d+ success=true$/m);
    });
  });
});
