/**
 * Commander program built from the command table
 *
 * Commander only parses: it never validates option values and never runs a
 * command. Each action records what was parsed; the pipeline in main.ts does
 * the rest.
 */

import { Command, Option } from "commander";
import { MODES, OUTPUT_FORMATS } from "./lib/env.js";
import { GROUPS, TOP_LEVEL_COMMANDS } from "./registry/index.js";
import type { CommandSpec, OptionSpec } from "./registry/types.js";

export interface ParsedCommand {
  spec: CommandSpec;
  args: string[];
  options: Record<string, unknown>;
}

/**
 * Filled in by the action of whichever subcommand commander selected
 */
export interface ParseCapture {
  command?: ParsedCommand;
}

export interface ProgramOutput {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

/**
 * Global options that take a value; used to find positionals in raw argv
 */
const GLOBAL_VALUE_FLAGS: ReadonlySet<string> = new Set([
  "-u",
  "--uri",
  "-t",
  "--token",
  "-d",
  "--db",
  "--profile",
  "--mode",
  "-o",
  "--output",
]);

function quoteArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, "'\\''")}'`;
}

export function formatExample(argv: readonly string[]): string {
  return ["yami", ...argv.map(quoteArg)].join(" ");
}

function optionDescription(spec: OptionSpec): string {
  let text = spec.description;
  if (spec.choices) text += ` (choices: ${spec.choices.join(", ")})`;
  if (spec.default !== undefined) text += ` (default: ${spec.default})`;
  if (spec.required) text += " (required)";
  return text;
}

function addCommand(parent: Command, spec: CommandSpec, capture: ParseCapture): void {
  const [summary = spec.description] = spec.description.split("\n");
  const sub = parent.command(spec.action ?? spec.group).summary(summary).description(spec.description);

  for (const arg of spec.args) {
    sub.argument(`<${arg.name}>`, arg.description);
  }
  for (const option of spec.options) {
    sub.addOption(new Option(option.flags, optionDescription(option)));
  }
  if (spec.examples.length > 0) {
    const lines = spec.examples.map((example) => `  ${formatExample(example)}`);
    sub.addHelpText("after", `\nExamples:\n${lines.join("\n")}`);
  }
  if (spec.destructive) {
    sub.addHelpText("after", "\nAsks for confirmation unless --force is given.");
  }

  sub.action(() => {
    capture.command = { spec, args: [...sub.args], options: { ...sub.opts() } };
  });
}

/**
 * Build the program. Output goes through `output`; commander's own error
 * messages are suppressed because failures are reported as envelopes.
 */
export function buildProgram(version: string, output: ProgramOutput, capture: ParseCapture): Command {
  const program = new Command();

  // Settings applied before subcommands are added are inherited by them
  program
    .name("yami")
    .description("Command-line front end for the Milvus vector database")
    .configureOutput({
      writeOut: (str) => output.writeOut(str),
      writeErr: (str) => output.writeErr(str),
      outputError: () => undefined,
    })
    .exitOverride()
    .allowExcessArguments(false)
    .version(version, "-V, --version")
    .option("-u, --uri <uri>", "Milvus server URI (env: MILVUS_URI)")
    .option("-t, --token <token>", "Authentication token, user:password or API key (env: MILVUS_TOKEN)")
    .option("-d, --db <name>", "Database name")
    .option("--profile <name>", "Saved connection profile")
    .addOption(new Option("--mode <mode>", "Output mode (env: YAMI_MODE, default: human)").choices(MODES))
    .addOption(
      new Option("-o, --output <format>", "Output format (default: json for agents, table for humans)").choices(
        OUTPUT_FORMATS
      )
    )
    .option("--force", "Skip confirmation prompts")
    .option("--quiet", "Suppress confirmation messages in human mode");

  for (const spec of TOP_LEVEL_COMMANDS) {
    addCommand(program, spec, capture);
  }
  for (const group of GROUPS) {
    const groupCommand = program.command(group.name).description(group.description);
    for (const spec of group.commands) {
      addCommand(groupCommand, spec, capture);
    }
  }

  return program;
}

/**
 * Best-effort "group action" label from raw argv, for failures raised before
 * commander selected a command
 */
export function guessLabel(argv: readonly string[]): string {
  const positionals: string[] = [];
  for (let i = 0; i < argv.length && positionals.length < 2; i++) {
    const token = argv[i] ?? "";
    if (GLOBAL_VALUE_FLAGS.has(token)) {
      i++;
      continue;
    }
    if (!token.startsWith("-")) {
      positionals.push(token);
    }
  }

  const [groupName, action] = positionals;
  if (groupName === undefined) {
    return "yami";
  }
  const group = GROUPS.find((candidate) => candidate.name === groupName);
  if (group && action !== undefined && group.commands.some((spec) => spec.action === action)) {
    return `${groupName} ${action}`;
  }
  return groupName;
}
