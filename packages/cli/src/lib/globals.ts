/**
 * Global options shared by every command
 */

import { z } from "zod";
import { ValidationError, type ConnectionFlags } from "@yami/core";
import { MODES, OUTPUT_FORMATS } from "./env.js";

const nonEmpty = (name: string) => z.string().trim().min(1, `--${name} must not be empty`);

export const GlobalOptionsSchema = z.object({
  uri: nonEmpty("uri").optional(),
  token: z.string().optional(),
  db: nonEmpty("db").optional(),
  profile: nonEmpty("profile").optional(),
  mode: z.enum(MODES).optional(),
  output: z.enum(OUTPUT_FORMATS).optional(),
  force: z.boolean().default(false),
  quiet: z.boolean().default(false),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/**
 * Validate raw commander values for the global options
 * @throws ValidationError naming the first invalid option
 */
export function parseGlobalOptions(raw: Record<string, unknown>): GlobalOptions {
  const result = GlobalOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const name = issue?.path.join(".") ?? "option";
    const message = issue?.message ?? "invalid value";
    throw new ValidationError(message.startsWith("--") ? message : `--${name}: ${message}`);
  }
  return result.data;
}

/**
 * Global options, or defaults where they fail validation. Used to pick a
 * presentation for errors raised before the options were validated.
 */
export function lenientGlobalOptions(raw: Record<string, unknown>): GlobalOptions {
  const result = GlobalOptionsSchema.safeParse(raw);
  return result.success ? result.data : GlobalOptionsSchema.parse({});
}

/**
 * Connection-related flags, as the resolver takes them
 */
export function connectionFlags(globals: GlobalOptions): ConnectionFlags {
  const flags: ConnectionFlags = {};
  if (globals.uri !== undefined) flags.uri = globals.uri;
  if (globals.token !== undefined && globals.token !== "") flags.token = globals.token;
  if (globals.db !== undefined) flags.database = globals.db;
  if (globals.profile !== undefined) flags.profile = globals.profile;
  return flags;
}
