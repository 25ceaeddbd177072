/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import { MissingArgumentError, ValidationError, type ErrorDescriptor } from "@yami/core";
import {
  EXIT_CODE,
  describeFailure,
  exitCodeFor,
  formatCliError,
  fromCommanderError,
  isCleanExit,
} from "../src/lib/errors.js";

const validation: ErrorDescriptor = { code: "VALIDATION_ERROR", message: "bad" };
const missing: ErrorDescriptor = { code: "MISSING_ARGUMENT", message: "missing" };
const notFound: ErrorDescriptor = { code: "NOT_FOUND", message: "gone" };

describe("error handling", () => {
  describe("exitCodeFor", () => {
    it("should exit 2 for usage errors before dispatch", () => {
      expect(exitCodeFor("parse", validation)).toBe(EXIT_CODE.USAGE);
      expect(exitCodeFor("plan", missing)).toBe(EXIT_CODE.USAGE);
      expect(exitCodeFor("resolve", validation)).toBe(EXIT_CODE.USAGE);
    });

    it("should exit 1 for an aborted confirmation", () => {
      expect(exitCodeFor("gate", missing)).toBe(EXIT_CODE.FAILURE);
    });

    it("should exit 1 for operation failures", () => {
      expect(exitCodeFor("dispatch", validation)).toBe(EXIT_CODE.FAILURE);
      expect(exitCodeFor("resolve", notFound)).toBe(EXIT_CODE.FAILURE);
      expect(exitCodeFor("parse", { code: "INVALID_FORMAT", message: "x" })).toBe(EXIT_CODE.FAILURE);
    });
  });

  describe("fromCommanderError", () => {
    it("should map unknown commands and missing arguments to MissingArgumentError", () => {
      const err = fromCommanderError(
        new CommanderError(1, "commander.missingArgument", "error: missing required argument 'name'")
      );
      expect(err).toBeInstanceOf(MissingArgumentError);
      expect(err.message).toBe("missing required argument 'name'");

      expect(fromCommanderError(new CommanderError(1, "commander.unknownCommand", "error: unknown command 'x'"))).toBeInstanceOf(
        MissingArgumentError
      );
    });

    it("should report a group without an action as a missing subcommand", () => {
      const err = fromCommanderError(new CommanderError(1, "commander.help", "(outputHelp)"));
      expect(err).toBeInstanceOf(MissingArgumentError);
      expect(err.message).toBe("A subcommand is required");
    });

    it("should map excess arguments and unknown options to ValidationError", () => {
      expect(
        fromCommanderError(new CommanderError(1, "commander.excessArguments", "error: too many arguments"))
      ).toBeInstanceOf(ValidationError);
      expect(
        fromCommanderError(new CommanderError(1, "commander.unknownOption", "error: unknown option '--nope'"))
      ).toBeInstanceOf(ValidationError);
    });
  });

  describe("isCleanExit", () => {
    it("should treat help and version as success", () => {
      expect(isCleanExit(new CommanderError(0, "commander.helpDisplayed", "(outputHelp)"))).toBe(true);
      expect(isCleanExit(new CommanderError(0, "commander.version", "0.3.0"))).toBe(true);
      expect(isCleanExit(new CommanderError(1, "commander.help", "(outputHelp)"))).toBe(false);
    });
  });

  describe("describeFailure", () => {
    it("should translate commander errors before classifying", () => {
      const error = describeFailure(new CommanderError(1, "commander.unknownOption", "error: unknown option '--nope'"));
      expect(error).toEqual({ code: "VALIDATION_ERROR", message: "unknown option '--nope'" });
    });

    it("should attach the hint of the code", () => {
      const error = describeFailure(new MissingArgumentError("Missing required option --vector"));
      expect(error.code).toBe("MISSING_ARGUMENT");
      expect(error.hint).toBe("Use 'yami <group> <action> --help' to see required arguments");
    });
  });

  describe("formatCliError", () => {
    it("should print the message and the hint on separate lines", () => {
      expect(formatCliError({ message: "Collection 'x' not found", hint: "List them" })).toBe(
        "Error: Collection 'x' not found\nHint: List them"
      );
    });

    it("should omit the hint line when there is no hint", () => {
      expect(formatCliError({ message: "boom" })).toBe("Error: boom");
    });

    it("should truncate very long messages", () => {
      const formatted = formatCliError({ message: "x".repeat(2500) });
      expect(formatted).toBe(`Error: ${"x".repeat(2000)}... (truncated)`);
    });
  });
});
