import { describe, it, expect } from "vitest";
import { buildEnvelope, countOf } from "./envelope.js";
import type { OperationOutcome } from "./types.js";

describe("buildEnvelope", () => {
  describe("structured shape", () => {
    it("should wrap read data with meta and count for sequences", () => {
      const envelope = buildEnvelope(
        { kind: "data", data: ["a", "b", "c"] },
        "collection list",
        12.4,
        "structured"
      );

      expect(envelope).toEqual({
        shape: "structured",
        ok: true,
        payload: {
          ok: true,
          data: ["a", "b", "c"],
          meta: { command: "collection list", duration_ms: 12, count: 3 },
        },
      });
    });

    it("should omit count for non-sequence data", () => {
      const envelope = buildEnvelope({ kind: "data", data: { name: "demo" } }, "collection describe", 3, "structured");

      expect(envelope.shape).toBe("structured");
      if (envelope.shape !== "structured") return;
      expect(envelope.payload.meta).toEqual({ command: "collection describe", duration_ms: 3 });
      expect("count" in envelope.payload.meta).toBe(false);
    });

    it("should fold mutation details into data without count", () => {
      const envelope = buildEnvelope(
        { kind: "mutation", message: "Collection 'demo' created" },
        "collection create",
        5,
        "structured"
      );

      expect(envelope).toEqual({
        shape: "structured",
        ok: true,
        payload: {
          ok: true,
          data: { message: "Collection 'demo' created" },
          meta: { command: "collection create", duration_ms: 5 },
        },
      });
    });

    it("should report rows affected in mutation details, not count", () => {
      const envelope = buildEnvelope(
        { kind: "mutation", message: "Inserted 2 entities into 'demo'", details: { insert_count: 2, ids: [1, 2] } },
        "data insert",
        1,
        "structured"
      );

      if (envelope.shape !== "structured" || !envelope.payload.ok) {
        throw new Error("expected a structured success envelope");
      }
      expect(envelope.payload.data).toEqual({
        message: "Inserted 2 entities into 'demo'",
        insert_count: 2,
        ids: [1, 2],
      });
      expect(envelope.payload.meta.count).toBeUndefined();
    });

    it("should carry errors with ok=false", () => {
      const envelope = buildEnvelope(
        { kind: "error", error: { code: "NOT_FOUND", message: "Collection 'ghost' not found", hint: "list" } },
        "collection describe",
        2,
        "structured"
      );

      expect(envelope).toEqual({
        shape: "structured",
        ok: false,
        payload: {
          ok: false,
          error: { code: "NOT_FOUND", message: "Collection 'ghost' not found", hint: "list" },
          meta: { command: "collection describe", duration_ms: 2 },
        },
      });
    });

    it("should clamp negative durations", () => {
      const envelope = buildEnvelope({ kind: "data", data: null }, "server version", -4, "structured");
      if (envelope.shape !== "structured") return;
      expect(envelope.payload.meta.duration_ms).toBe(0);
    });
  });

  describe("plain shape", () => {
    it("should pass read data through bare", () => {
      expect(buildEnvelope({ kind: "data", data: [1, 2] }, "collection list", 1, "plain")).toEqual({
        shape: "plain",
        ok: true,
        outcome: "data",
        payload: [1, 2],
      });
    });

    it("should report mutations as status and message", () => {
      expect(
        buildEnvelope(
          { kind: "mutation", message: "Deleted 3 entities from 'demo'", details: { delete_count: 3 } },
          "data delete",
          1,
          "plain"
        )
      ).toEqual({
        shape: "plain",
        ok: true,
        outcome: "mutation",
        payload: { status: "success", message: "Deleted 3 entities from 'demo'", delete_count: 3 },
      });
    });

    it("should wrap errors under an error key", () => {
      expect(
        buildEnvelope(
          { kind: "error", error: { code: "CONNECTION_ERROR", message: "refused" } },
          "collection list",
          1,
          "plain"
        )
      ).toEqual({
        shape: "plain",
        ok: false,
        outcome: "error",
        payload: { error: { code: "CONNECTION_ERROR", message: "refused" } },
      });
    });
  });

  it("should carry identical data in both shapes", () => {
    const outcome: OperationOutcome = { kind: "data", data: { row_count: 7 } };
    const structured = buildEnvelope(outcome, "collection stats", 1, "structured");
    const plain = buildEnvelope(outcome, "collection stats", 1, "plain");

    if (structured.shape !== "structured" || !structured.payload.ok || plain.shape !== "plain") {
      throw new Error("unexpected envelope shapes");
    }
    expect(structured.payload.data).toEqual(plain.payload);
  });

  it("should be deterministic", () => {
    const outcome: OperationOutcome = { kind: "data", data: [{ id: 1 }] };
    expect(buildEnvelope(outcome, "query get", 9, "structured")).toEqual(
      buildEnvelope(outcome, "query get", 9, "structured")
    );
  });
});

describe("countOf", () => {
  const cases: Array<[unknown, number | undefined]> = [
    [[], 0],
    [[1], 1],
    [[{ a: 1 }, { b: 2 }, null], 3],
    [Array.from({ length: 250 }, (_, i) => i), 250],
    [{ length: 3 }, undefined],
    ["abc", undefined],
    [null, undefined],
    [undefined, undefined],
    [42, undefined],
    [{ items: [1, 2] }, undefined],
  ];

  it.each(cases)("countOf(%j) should be %j", (data, expected) => {
    expect(countOf(data)).toBe(expected);
  });

  it("should match data length in every structured envelope built from a sequence", () => {
    for (let n = 0; n < 20; n++) {
      const data = Array.from({ length: n }, (_, i) => ({ id: i }));
      const envelope = buildEnvelope({ kind: "data", data }, "query query", 0, "structured");
      if (envelope.shape !== "structured") throw new Error("expected structured");
      expect(envelope.payload.meta.count).toBe(n);
    }
  });
});
