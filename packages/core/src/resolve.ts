/**
 * Effective connection resolution
 *
 * Layers, highest first:
 *   CLI flags > profile named by --profile > environment > default profile
 *
 * The uri comes from the highest layer that has one. Token and database come
 * from that same layer unless a flag or MILVUS_TOKEN supplies them, so a
 * profile's credentials never travel to a server it does not name.
 *
 * When --profile is given the default profile is not consulted.
 * Resolution is a pure merge and never persists anything.
 */

import { NotFoundError, ValidationError } from "./errors.js";
import { defaultProfile, findProfile, type ProfileDocument } from "./profiles.js";
import type { ConnectionConfig, ConnectionFields } from "./types.js";

export interface ConnectionFlags extends ConnectionFields {
  /** Name of the profile selected with --profile */
  profile?: string;
}

/**
 * One configuration source; explicit layers (flags, environment) may supply
 * credentials for a uri taken from another layer
 */
export interface ConnectionLayer extends ConnectionFields {
  explicit?: boolean;
}

export type Environment = Readonly<Record<string, string | undefined>>;

export const ENV_URI = "MILVUS_URI";
export const ENV_TOKEN = "MILVUS_TOKEN";

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Connection fields contributed by the environment
 */
export function connectionFromEnv(env: Environment): ConnectionFields {
  const fields: ConnectionFields = {};
  const uri = nonEmpty(env[ENV_URI]);
  const token = nonEmpty(env[ENV_TOKEN]);
  if (uri !== undefined) fields.uri = uri;
  if (token !== undefined) fields.token = token;
  return fields;
}

/**
 * Merge configuration layers, highest priority first
 */
export function mergeConnectionLayers(layers: ConnectionLayer[]): ConnectionFields {
  const merged: ConnectionFields = {};
  const source = layers.find((layer) => nonEmpty(layer.uri) !== undefined);
  if (source === undefined) {
    return merged;
  }
  merged.uri = source.uri;

  const lenders = layers.filter((layer) => layer === source || layer.explicit === true);
  for (const key of ["token", "database"] as const) {
    for (const layer of lenders) {
      const value = nonEmpty(layer[key]);
      if (value !== undefined) {
        merged[key] = value;
        break;
      }
    }
  }
  return merged;
}

/**
 * Resolve the effective connection for one invocation
 * @throws NotFoundError if --profile names an unknown profile
 * @throws ValidationError if no uri is configured anywhere
 */
export function resolveConnection(
  flags: ConnectionFlags,
  env: Environment,
  profiles: ProfileDocument
): ConnectionConfig {
  const environment: ConnectionLayer = { ...connectionFromEnv(env), explicit: true };
  const layers: ConnectionLayer[] = [
    { uri: flags.uri, token: flags.token, database: flags.database, explicit: true },
  ];

  if (flags.profile !== undefined) {
    const named = findProfile(profiles, flags.profile);
    if (!named) {
      throw new NotFoundError(`Profile '${flags.profile}' not found`);
    }
    layers.push(named, environment);
  } else {
    layers.push(environment);
    const fallback = defaultProfile(profiles);
    if (fallback) {
      layers.push(fallback);
    }
  }

  const merged = mergeConnectionLayers(layers);
  if (merged.uri === undefined) {
    throw new ValidationError(
      `No Milvus URI configured: pass --uri, set ${ENV_URI}, or add a profile with 'yami profile add <name> --uri <uri>'`
    );
  }

  const resolved: ConnectionConfig = { uri: merged.uri };
  if (merged.token !== undefined) resolved.token = merged.token;
  if (merged.database !== undefined) resolved.database = merged.database;
  return resolved;
}
