/**
 * Unit tests for argument coercion
 */

import { describe, it, expect } from "vitest";
import { METRIC_TYPES, ValidationError } from "@yami/core";
import {
  parseChoice,
  parseFloatValue,
  parseIds,
  parseInteger,
  parseJson,
  parseList,
  parseVector,
} from "../src/lib/arg.js";

describe("argument coercion", () => {
  describe("parseInteger", () => {
    it("should parse integers, ignoring surrounding whitespace", () => {
      expect(parseInteger("42", "--limit")).toBe(42);
      expect(parseInteger(" 7 ", "--limit")).toBe(7);
      expect(parseInteger("-3", "--offset")).toBe(-3);
    });

    it("should reject non-integers naming the option", () => {
      expect(() => parseInteger("abc", "--limit")).toThrow(ValidationError);
      expect(() => parseInteger("abc", "--limit")).toThrow('--limit must be an integer (got "abc")');
      expect(() => parseInteger("1.5", "--limit")).toThrow('--limit must be an integer (got "1.5")');
    });

    it("should enforce a lower bound", () => {
      expect(() => parseInteger("0", "--limit", 1)).toThrow("--limit must be >= 1 (got 0)");
      expect(parseInteger("1", "--limit", 1)).toBe(1);
    });

    it("should reject integers beyond the safe range", () => {
      expect(() => parseInteger("99999999999999999999", "--dim")).toThrow(
        '--dim is out of range (got "99999999999999999999")'
      );
    });
  });

  describe("parseFloatValue", () => {
    it("should parse finite numbers", () => {
      expect(parseFloatValue("0.5", "--radius")).toBe(0.5);
      expect(parseFloatValue("3", "--radius")).toBe(3);
    });

    it("should reject blanks and non-finite values", () => {
      expect(() => parseFloatValue("", "--radius")).toThrow('--radius must be a number (got "")');
      expect(() => parseFloatValue("Infinity", "--radius")).toThrow('--radius must be a number (got "Infinity")');
    });
  });

  describe("parseList", () => {
    it("should split, trim and drop blanks", () => {
      expect(parseList("a, b,,c", "--output-fields")).toEqual(["a", "b", "c"]);
    });

    it("should reject an empty list", () => {
      expect(() => parseList(" , ", "--output-fields")).toThrow("--output-fields must list at least one value");
    });
  });

  describe("parseIds", () => {
    it("should return numbers when every id is an integer", () => {
      expect(parseIds("1, 2,3", "--ids")).toEqual([1, 2, 3]);
    });

    it("should keep all ids as strings when any id is not an integer", () => {
      expect(parseIds("1,doc-7", "--ids")).toEqual(["1", "doc-7"]);
    });

    it("should keep ids as strings when one exceeds the safe integer range", () => {
      expect(parseIds("9007199254740993,1", "--ids")).toEqual(["9007199254740993", "1"]);
    });
  });

  describe("parseJson", () => {
    it("should parse JSON", () => {
      expect(parseJson('{"M":16}', "--params")).toEqual({ M: 16 });
    });

    it("should name the option on invalid JSON", () => {
      expect(() => parseJson("{bad", "--params")).toThrow(/^Invalid JSON in --params: /);
    });
  });

  describe("parseChoice", () => {
    it("should match case-insensitively and return the canonical spelling", () => {
      expect(parseChoice("cosine", "--metric", METRIC_TYPES)).toBe("COSINE");
    });

    it("should list the choices when nothing matches", () => {
      expect(() => parseChoice("dot", "--metric", METRIC_TYPES)).toThrow(
        '--metric must be one of: COSINE, L2, IP, HAMMING, JACCARD (got "dot")'
      );
    });
  });

  describe("parseVector", () => {
    it("should parse a JSON array of numbers", () => {
      expect(parseVector("[1, 2.5, -0.25]", "--vector")).toEqual([1, 2.5, -0.25]);
    });

    it("should reject empty arrays and non-arrays", () => {
      expect(() => parseVector("[]", "--vector")).toThrow("--vector must be a non-empty JSON array of numbers");
      expect(() => parseVector('{"a":1}', "--vector")).toThrow("--vector must be a non-empty JSON array of numbers");
    });

    it("should point at the first non-numeric element", () => {
      expect(() => parseVector('[1,"x"]', "--vector")).toThrow("--vector element 1 must be a number");
    });
  });
});
