/**
 * Persisted connection profiles
 *
 * File: <configDir>/profiles.json
 *   { "version": 1, "default": "local", "profiles": { "local": { "uri": "..." } } }
 *
 * Invariants:
 * - At most one profile is the default, and it always names an existing profile
 * - Every write replaces the whole file atomically (see atomicWrite)
 * - The file is re-read on every operation; nothing is cached between calls
 * - Unknown keys written by newer versions survive a rewrite
 */

import { join } from "node:path";
import { z } from "zod";
import {
  AlreadyExistsError,
  InvalidFormatError,
  NotFoundError,
  ValidationError,
} from "./errors.js";
import { safeParseJson, stableStringify } from "./format.js";
import { atomicWrite, readTextFileIfExists } from "./io.js";
import { logger } from "./observability/logs.js";
import type { ConnectionFields, Profile, ProfileEntry } from "./types.js";

export const PROFILE_FILE = "profiles.json";
export const PROFILE_DOCUMENT_VERSION = 1;

const profileNamePattern = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const StoredProfileSchema = z
  .object({
    uri: z.string().min(1, "uri must be non-empty"),
    token: z.string().optional(),
    database: z.string().optional(),
  })
  .passthrough();

export const ProfileDocumentSchema = z
  .object({
    version: z.number().int().positive().default(PROFILE_DOCUMENT_VERSION),
    default: z.string().nullable().default(null),
    profiles: z.record(z.string(), StoredProfileSchema).default({}),
  })
  .passthrough();

export type StoredProfile = z.infer<typeof StoredProfileSchema>;
export type ProfileDocument = z.infer<typeof ProfileDocumentSchema>;

export function emptyProfileDocument(): ProfileDocument {
  return { version: PROFILE_DOCUMENT_VERSION, default: null, profiles: {} };
}

/**
 * Validate a profile name
 * @throws ValidationError if the name is empty or contains unsupported characters
 */
export function validateProfileName(name: string): string {
  if (!profileNamePattern.test(name)) {
    throw new ValidationError(
      `Invalid profile name "${name}": use letters, numbers, dots, underscores and hyphens, starting with a letter or number`
    );
  }
  return name;
}

function toProfile(name: string, stored: StoredProfile): Profile {
  const profile: Profile = { name, uri: stored.uri };
  if (stored.token !== undefined) profile.token = stored.token;
  if (stored.database !== undefined) profile.database = stored.database;
  return profile;
}

/**
 * Look up a profile in an already-loaded document
 */
export function findProfile(doc: ProfileDocument, name: string): Profile | undefined {
  const stored = Object.hasOwn(doc.profiles, name) ? doc.profiles[name] : undefined;
  return stored ? toProfile(name, stored) : undefined;
}

/**
 * The default profile of an already-loaded document, if any
 */
export function defaultProfile(doc: ProfileDocument): Profile | undefined {
  return doc.default === null ? undefined : findProfile(doc, doc.default);
}

export function maskToken(token: string | undefined): string | undefined {
  return token === undefined || token === "" ? undefined : "****";
}

export interface AddProfileOptions {
  /** Replace an existing profile of the same name */
  overwrite?: boolean;
  /** Point the default at this profile */
  makeDefault?: boolean;
}

export class ProfileStore {
  readonly filePath: string;

  constructor(configDir: string) {
    this.filePath = join(configDir, PROFILE_FILE);
  }

  /**
   * Read and validate the profile document; a missing file is an empty document
   * @throws InvalidFormatError if the file is not a valid profile document
   */
  async load(): Promise<ProfileDocument> {
    const raw = await readTextFileIfExists(this.filePath);
    if (raw === null) {
      return emptyProfileDocument();
    }

    const parsed = safeParseJson(raw);
    if (!parsed.success) {
      throw new InvalidFormatError(`Invalid JSON in ${this.filePath}: ${parsed.error}`);
    }

    const result = ProfileDocumentSchema.safeParse(parsed.data);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new InvalidFormatError(
        `Invalid profile file ${this.filePath}${where}: ${issue?.message ?? "unrecognized content"}`
      );
    }

    const doc = result.data;
    // A dangling default pointer reads as no default
    if (doc.default !== null && !Object.hasOwn(doc.profiles, doc.default)) {
      doc.default = null;
    }
    return doc;
  }

  async list(): Promise<ProfileEntry[]> {
    const doc = await this.load();
    return Object.keys(doc.profiles)
      .sort()
      .map((name) => this.#entry(doc, name));
  }

  /**
   * @throws NotFoundError if the profile does not exist
   */
  async get(name: string): Promise<Profile> {
    const doc = await this.load();
    const profile = findProfile(doc, name);
    if (!profile) {
      throw new NotFoundError(`Profile '${name}' not found`);
    }
    return profile;
  }

  /**
   * Report a profile with its token masked
   * @throws NotFoundError if the profile does not exist
   */
  async show(name: string): Promise<ProfileEntry> {
    const doc = await this.load();
    if (!Object.hasOwn(doc.profiles, name)) {
      throw new NotFoundError(`Profile '${name}' not found`);
    }
    return this.#entry(doc, name);
  }

  /**
   * Create or replace a profile. The first profile becomes the default.
   * @throws AlreadyExistsError if the name is taken and overwrite is not set
   */
  async add(
    name: string,
    connection: ConnectionFields,
    options: AddProfileOptions = {}
  ): Promise<ProfileEntry> {
    validateProfileName(name);
    if (!connection.uri) {
      throw new ValidationError(`Profile '${name}' needs a uri`);
    }

    const doc = await this.load();
    const existing = Object.hasOwn(doc.profiles, name) ? doc.profiles[name] : undefined;
    if (existing && !options.overwrite) {
      throw new AlreadyExistsError(
        `Profile '${name}' already exists; pass --overwrite to replace it`
      );
    }

    const stored: StoredProfile = { ...(existing ?? {}), uri: connection.uri };
    delete stored.token;
    delete stored.database;
    if (connection.token) stored.token = connection.token;
    if (connection.database) stored.database = connection.database;

    doc.profiles[name] = stored;
    if (options.makeDefault || doc.default === null) {
      doc.default = name;
    }

    await this.#write(doc);
    return this.#entry(doc, name);
  }

  /**
   * Point the default at an existing profile
   * @throws NotFoundError if the profile does not exist
   */
  async use(name: string): Promise<ProfileEntry> {
    const doc = await this.load();
    if (!Object.hasOwn(doc.profiles, name)) {
      throw new NotFoundError(`Profile '${name}' not found`);
    }
    doc.default = name;
    await this.#write(doc);
    return this.#entry(doc, name);
  }

  /**
   * Delete a profile; removing the default clears the pointer
   * @throws NotFoundError if the profile does not exist
   */
  async remove(name: string): Promise<{ name: string; wasDefault: boolean }> {
    const doc = await this.load();
    if (!Object.hasOwn(doc.profiles, name)) {
      throw new NotFoundError(`Profile '${name}' not found`);
    }
    const wasDefault = doc.default === name;
    const { [name]: _removed, ...rest } = doc.profiles;
    doc.profiles = rest;
    if (wasDefault) {
      doc.default = null;
    }
    await this.#write(doc);
    return { name, wasDefault };
  }

  #entry(doc: ProfileDocument, name: string): ProfileEntry {
    const stored = doc.profiles[name];
    const entry: ProfileEntry = {
      name,
      uri: stored?.uri ?? "",
      default: doc.default === name,
    };
    const token = maskToken(stored?.token);
    if (token !== undefined) entry.token = token;
    if (stored?.database !== undefined) entry.database = stored.database;
    return entry;
  }

  async #write(doc: ProfileDocument): Promise<void> {
    await atomicWrite(this.filePath, stableStringify(doc));
    logger.debug("profiles.write", { path: this.filePath, profiles: Object.keys(doc.profiles).length });
  }
}
