/**
 * Unit tests for option coercion
 */

import { describe, it, expect } from "vitest";
import { MissingArgumentError, ValidationError } from "@yami/core";
import { coerceInput, exactlyOne, findCommand, type CommandSpec } from "../src/registry/index.js";

function spec(group: string, action: string): CommandSpec {
  const found = findCommand(group, action);
  if (!found) throw new Error(`no command ${group} ${action}`);
  return found;
}

describe("coerceInput", () => {
  const search = spec("query", "search");

  it("should apply defaults and coerce values", () => {
    const input = coerceInput(search, ["demo"], {
      vector: "[0.1,0.2]",
      outputFields: "id, title",
      metric: "cosine",
    });

    expect(input.command).toBe("query search");
    expect(input.arg("collection")).toBe("demo");
    expect(input.requireString("vector")).toBe("[0.1,0.2]");
    expect(input.number("limit")).toBe(10);
    expect(input.list("outputFields")).toEqual(["id", "title"]);
    expect(input.string("metric")).toBe("COSINE");
    expect(input.has("filter")).toBe(false);
    expect(input.string("filter")).toBeUndefined();
  });

  it("should reject a missing required option", () => {
    expect(() => coerceInput(search, ["demo"], {})).toThrow(MissingArgumentError);
    expect(() => coerceInput(search, ["demo"], {})).toThrow("Missing required option --vector");
  });

  it("should name the option whose value does not coerce", () => {
    expect(() => coerceInput(search, ["demo"], { vector: "[1]", limit: "0" })).toThrow(
      "--limit must be >= 1 (got 0)"
    );
    expect(() => coerceInput(search, ["demo"], { vector: "[1]", metric: "dot" })).toThrow(
      '--metric must be one of: COSINE, L2, IP, HAMMING, JACCARD (got "dot")'
    );
  });

  it("should reject a value-less option", () => {
    expect(() => coerceInput(search, ["demo"], { vector: true })).toThrow(ValidationError);
    expect(() => coerceInput(search, ["demo"], { vector: true })).toThrow("--vector expects a value");
  });

  it("should always set boolean options", () => {
    const create = spec("collection", "create");
    expect(coerceInput(create, ["demo"], { dim: "4" }).flag("autoId")).toBe(false);
    expect(coerceInput(create, ["demo"], { dim: "4", autoId: true }).flag("autoId")).toBe(true);
  });

  it("should parse ids", () => {
    const input = coerceInput(spec("query", "query"), ["demo"], { ids: "1,2" });
    expect(input.ids("ids")).toEqual([1, 2]);
  });

  it("should report a missing positional on access", () => {
    const input = coerceInput(search, [], { vector: "[1]" });
    expect(() => input.arg("collection")).toThrow("Missing required argument 'collection'");
  });

  it("should reject a lookup of the wrong type", () => {
    const input = coerceInput(search, ["demo"], { vector: "[1]" });
    expect(() => input.list("vector")).toThrow(TypeError);
  });

  it("should use the typed flag in messages", () => {
    const input = coerceInput(search, ["demo"], { vector: "[1]" });
    expect(input.nameOf("outputFields")).toBe("--output-fields");
    expect(() => input.requireString("annsField")).toThrow("Missing required option --anns-field");
  });
});

describe("exactlyOne", () => {
  const query = spec("query", "query");

  it("should return the option that was given", () => {
    expect(exactlyOne(coerceInput(query, ["demo"], { ids: "1" }), "filter", "ids")).toBe("ids");
    expect(exactlyOne(coerceInput(query, ["demo"], { filter: "id > 0" }), "filter", "ids")).toBe("filter");
  });

  it("should reject both options", () => {
    const input = coerceInput(query, ["demo"], { ids: "1", filter: "id > 0" });
    expect(() => exactlyOne(input, "filter", "ids")).toThrow(ValidationError);
    expect(() => exactlyOne(input, "filter", "ids")).toThrow("Use either --filter or --ids, not both");
  });

  it("should require one of the options", () => {
    const input = coerceInput(query, ["demo"], {});
    expect(() => exactlyOne(input, "filter", "ids")).toThrow(MissingArgumentError);
    expect(() => exactlyOne(input, "filter", "ids")).toThrow("One of --filter or --ids is required");
  });
});
