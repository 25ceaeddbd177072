/**
 * Coerced command input
 *
 * Commander hands over raw strings; coerceInput turns them into typed values
 * according to each OptionSpec, applying defaults and required checks.
 */

import { Option } from "commander";
import {
  MissingArgumentError,
  ValidationError,
  type EntityId,
} from "@yami/core";
import {
  parseChoice,
  parseFloatValue,
  parseIds,
  parseInteger,
  parseJson,
  parseList,
} from "../lib/arg.js";
import type { CommandSpec, OptionSpec } from "./types.js";

export type CoercedValue =
  | { type: "string"; value: string }
  | { type: "number"; value: number }
  | { type: "boolean"; value: boolean }
  | { type: "list"; value: string[] }
  | { type: "ids"; value: EntityId[] }
  | { type: "json"; value: unknown };

/**
 * Key commander stores an option under, e.g. "outputFields" for --output-fields
 */
export function optionKey(spec: OptionSpec): string {
  return new Option(spec.flags).attributeName();
}

/**
 * Long flag for messages, e.g. "--output-fields"
 */
export function optionName(spec: OptionSpec): string {
  const option = new Option(spec.flags);
  return option.long ?? option.short ?? spec.flags;
}

export class CommandInput {
  readonly #args: ReadonlyMap<string, string>;
  readonly #values: ReadonlyMap<string, CoercedValue>;
  readonly #names: ReadonlyMap<string, string>;

  constructor(
    readonly command: string,
    args: ReadonlyMap<string, string>,
    values: ReadonlyMap<string, CoercedValue>,
    names: ReadonlyMap<string, string> = new Map()
  ) {
    this.#args = args;
    this.#values = values;
    this.#names = names;
  }

  /**
   * Positional argument by name
   */
  arg(name: string): string {
    const value = this.#args.get(name);
    if (value === undefined) {
      throw new MissingArgumentError(`Missing required argument '${name}'`);
    }
    return value;
  }

  has(key: string): boolean {
    return this.#values.has(key);
  }

  /**
   * Flag as the user would type it, for messages
   */
  nameOf(key: string): string {
    return this.#names.get(key) ?? `--${key}`;
  }

  string(key: string): string | undefined {
    const entry = this.#values.get(key);
    if (entry === undefined) return undefined;
    if (entry.type !== "string") throw this.#mistyped(key, "string");
    return entry.value;
  }

  number(key: string): number | undefined {
    const entry = this.#values.get(key);
    if (entry === undefined) return undefined;
    if (entry.type !== "number") throw this.#mistyped(key, "number");
    return entry.value;
  }

  flag(key: string): boolean {
    const entry = this.#values.get(key);
    if (entry === undefined) return false;
    if (entry.type !== "boolean") throw this.#mistyped(key, "boolean");
    return entry.value;
  }

  list(key: string): string[] | undefined {
    const entry = this.#values.get(key);
    if (entry === undefined) return undefined;
    if (entry.type !== "list") throw this.#mistyped(key, "list");
    return entry.value;
  }

  ids(key: string): EntityId[] | undefined {
    const entry = this.#values.get(key);
    if (entry === undefined) return undefined;
    if (entry.type !== "ids") throw this.#mistyped(key, "ids");
    return entry.value;
  }

  json(key: string): unknown {
    const entry = this.#values.get(key);
    if (entry === undefined) return undefined;
    if (entry.type !== "json") throw this.#mistyped(key, "json");
    return entry.value;
  }

  /**
   * @throws MissingArgumentError when the option has no value
   */
  requireString(key: string): string {
    const value = this.string(key);
    if (value === undefined) throw this.#missing(key);
    return value;
  }

  /**
   * @throws MissingArgumentError when the option has no value
   */
  requireNumber(key: string): number {
    const value = this.number(key);
    if (value === undefined) throw this.#missing(key);
    return value;
  }

  #missing(key: string): MissingArgumentError {
    return new MissingArgumentError(`Missing required option ${this.nameOf(key)}`);
  }

  #mistyped(key: string, wanted: string): Error {
    return new TypeError(`Option '${key}' of '${this.command}' is not declared as ${wanted}`);
  }
}

function coerceValue(spec: OptionSpec, raw: string): CoercedValue {
  const name = optionName(spec);
  switch (spec.type) {
    case "string":
      return {
        type: "string",
        value: spec.choices ? parseChoice(raw, name, spec.choices) : raw,
      };
    case "int":
      return { type: "number", value: parseInteger(raw, name, spec.min) };
    case "float":
      return { type: "number", value: parseFloatValue(raw, name, spec.min) };
    case "list":
      return { type: "list", value: parseList(raw, name) };
    case "ids":
      return { type: "ids", value: parseIds(raw, name) };
    case "json":
      return { type: "json", value: parseJson(raw, name) };
    case "boolean":
      return { type: "boolean", value: raw === "true" };
  }
}

/**
 * Coerce raw commander values for a command
 * @throws ValidationError naming the option whose value does not coerce
 * @throws MissingArgumentError naming a required option that was not given
 */
export function coerceInput(
  spec: CommandSpec,
  args: readonly string[],
  raw: Readonly<Record<string, unknown>>
): CommandInput {
  const command = spec.action === undefined ? spec.group : `${spec.group} ${spec.action}`;

  const positional = new Map<string, string>();
  spec.args.forEach((arg, i) => {
    const value = args[i];
    if (value !== undefined) {
      positional.set(arg.name, value);
    }
  });

  const values = new Map<string, CoercedValue>();
  const names = new Map<string, string>();

  for (const option of spec.options) {
    const key = optionKey(option);
    const name = optionName(option);
    names.set(key, name);
    const given = raw[key];

    if (option.type === "boolean") {
      values.set(key, { type: "boolean", value: given === true });
      continue;
    }

    if (given === undefined) {
      if (option.default !== undefined) {
        values.set(key, coerceValue(option, option.default));
      } else if (option.required) {
        throw new MissingArgumentError(`Missing required option ${name}`);
      }
      continue;
    }

    if (typeof given !== "string") {
      throw new ValidationError(`${name} expects a value`);
    }
    values.set(key, coerceValue(option, given));
  }

  return new CommandInput(command, positional, values, names);
}

/**
 * Require exactly one of two mutually exclusive options
 * @returns the key that was given
 */
export function exactlyOne(input: CommandInput, first: string, second: string): string {
  const hasFirst = input.has(first);
  const hasSecond = input.has(second);
  if (hasFirst && hasSecond) {
    throw new ValidationError(
      `Use either ${input.nameOf(first)} or ${input.nameOf(second)}, not both`
    );
  }
  if (!hasFirst && !hasSecond) {
    throw new MissingArgumentError(
      `One of ${input.nameOf(first)} or ${input.nameOf(second)} is required`
    );
  }
  return hasFirst ? first : second;
}
