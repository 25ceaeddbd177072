/**
 * yami CLI pipeline
 *
 * parse -> plan -> resolve -> gate -> dispatch -> envelope -> render
 *
 * Every invocation produces exactly one rendered envelope (help and version
 * excepted) and an exit code. Nothing here touches process state; cli.ts
 * wires the real process in.
 */

import { performance } from "node:perf_hooks";
import { CommanderError } from "commander";
import {
  MissingArgumentError,
  ProfileStore,
  buildEnvelope,
  logger as defaultLogger,
  resolveConnection,
  type BackendFactory,
  type ConnectionConfig,
  type Environment,
  type Logger,
  type OperationOutcome,
} from "@yami/core";
import { dispatch, type BackendCall } from "./lib/dispatch.js";
import {
  isVerbose,
  resolveConfigDir,
  resolveMode,
  resolveOutputFormat,
  type Mode,
  type OutputFormat,
} from "./lib/env.js";
import { EXIT_CODE, describeFailure, exitCodeFor, isCleanExit, type Stage } from "./lib/errors.js";
import { guard } from "./lib/gate.js";
import { connectionFlags, lenientGlobalOptions, parseGlobalOptions, type GlobalOptions } from "./lib/globals.js";
import type { OutputSink, Terminal } from "./lib/io.js";
import { render } from "./lib/render.js";
import { withTiming, type MetricsOptions } from "./lib/telemetry.js";
import { buildProgram, guessLabel, type ParseCapture } from "./program.js";
import { coerceInput, commandLabel, type CommandInput } from "./registry/index.js";
import type { LocalHandler, LocalServices } from "./registry/types.js";

export interface CliDeps {
  env: Environment;
  stdout: OutputSink;
  stderr: OutputSink;
  terminal: Terminal;
  /** Opens one backend handle; only called for backend commands */
  connect: BackendFactory;
  version: string;
  logger?: Logger;
  /** Home directory for "~" in YAMI_CONFIG_DIR */
  home?: string;
}

interface Presentation {
  mode: Mode;
  format: OutputFormat;
  quiet: boolean;
}

/**
 * Presentation from validated globals
 * @throws ValidationError for an unknown YAMI_MODE or a table in agent mode
 */
function presentationOf(globals: GlobalOptions, env: Environment): Presentation {
  const mode = resolveMode(globals.mode, env);
  return { mode, format: resolveOutputFormat(globals.output, mode), quiet: globals.quiet };
}

/**
 * Presentation for reporting a failure; falls back to defaults where the
 * requested presentation is itself invalid
 */
function fallbackPresentation(raw: Record<string, unknown>, env: Environment): Presentation {
  const globals = lenientGlobalOptions(raw);
  let mode: Mode;
  try {
    mode = resolveMode(globals.mode, env);
  } catch {
    mode = "human";
  }
  let format: OutputFormat;
  try {
    format = resolveOutputFormat(globals.output, mode);
  } catch {
    format = resolveOutputFormat(undefined, mode);
  }
  return { mode, format, quiet: globals.quiet };
}

/**
 * Run a local command; failures become error outcomes like dispatched ones
 */
async function runLocal(
  label: string,
  handler: LocalHandler,
  input: CommandInput,
  services: LocalServices,
  metrics: MetricsOptions
): Promise<OperationOutcome> {
  try {
    return await withTiming(`cli.${label.replace(/\s+/g, ".")}`, () => handler.run(input, services), metrics);
  } catch (err) {
    return { kind: "error", error: describeFailure(err) };
  }
}

/**
 * Run one invocation and return its exit code
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const started = performance.now();
  const log = deps.logger ?? defaultLogger;
  const metrics: MetricsOptions = {
    enabled: isVerbose(deps.env),
    write: (line) => deps.stderr.write(line),
  };

  const capture: ParseCapture = {};
  const program = buildProgram(
    deps.version,
    { writeOut: (text) => deps.stdout.write(text), writeErr: (text) => deps.stderr.write(text) },
    capture
  );

  const emit = (outcome: OperationOutcome, label: string, durationMs: number, presentation: Presentation): void => {
    const envelope = buildEnvelope(outcome, label, durationMs, presentation.mode === "agent" ? "structured" : "plain");
    const rendered = render(envelope, presentation.format, {
      quiet: presentation.quiet,
      // Table errors go to stderr, everything else to stdout
      color: (outcome.kind === "error" ? deps.stderr : deps.stdout).isTTY === true,
    });
    if (rendered.text !== "") {
      (rendered.stream === "stderr" ? deps.stderr : deps.stdout).write(rendered.text);
    }
  };

  let stage: Stage = "parse";
  let label = guessLabel(argv);

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError && isCleanExit(err)) {
      return EXIT_CODE.SUCCESS;
    }
    const error = describeFailure(err);
    log.debug("cli.parse_failed", { command: label, err_code: error.code, err_message: error.message });
    emit({ kind: "error", error }, label, performance.now() - started, fallbackPresentation(program.opts(), deps.env));
    return exitCodeFor("parse", error);
  }

  let presentation = fallbackPresentation(program.opts(), deps.env);

  try {
    const parsed = capture.command;
    if (parsed === undefined) {
      throw new MissingArgumentError("A command is required");
    }
    const { spec } = parsed;
    label = commandLabel(spec);

    const globals = parseGlobalOptions(program.opts());
    presentation = presentationOf(globals, deps.env);
    const input = coerceInput(spec, parsed.args, parsed.options);

    stage = "plan";
    const profiles = new ProfileStore(resolveConfigDir(deps.env, deps.home));

    if (spec.handler.scope === "local") {
      spec.handler.validate?.(input, globals);
      stage = "dispatch";
      const outcome = await runLocal(label, spec.handler, input, { profiles, globals }, metrics);
      emit(outcome, label, performance.now() - started, presentation);
      return outcome.kind === "error" ? exitCodeFor("dispatch", outcome.error) : EXIT_CODE.SUCCESS;
    }

    const call: BackendCall = await spec.handler.plan(input);

    stage = "resolve";
    const flags = { ...connectionFlags(globals), ...spec.handler.connection?.(input) };
    const connection: ConnectionConfig = await withTiming(
      "cli.resolve",
      async () => resolveConnection(flags, deps.env, await profiles.load()),
      metrics
    );

    if (spec.destructive) {
      stage = "gate";
      await guard(
        { command: label, prompt: spec.destructive(input) },
        { force: globals.force, terminal: deps.terminal }
      );
    }

    stage = "dispatch";
    const result = await dispatch(label, connection, call, { connect: deps.connect, logger: log, metrics });
    emit(result.outcome, label, result.durationMs, presentation);
    return result.outcome.kind === "error" ? exitCodeFor("dispatch", result.outcome.error) : EXIT_CODE.SUCCESS;
  } catch (err) {
    const error = describeFailure(err);
    log.debug("cli.failed", { command: label, stage, err_code: error.code });
    emit({ kind: "error", error }, label, performance.now() - started, presentation);
    return exitCodeFor(stage, error);
  }
}
