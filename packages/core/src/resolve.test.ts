import { describe, it, expect } from "vitest";
import { resolveConnection, connectionFromEnv, type ConnectionFlags } from "./resolve.js";
import { emptyProfileDocument, type ProfileDocument } from "./profiles.js";
import { NotFoundError, ValidationError } from "./errors.js";

const FLAG_URI = "http://flag:19530";
const PROFILE_URI = "http://named:19530";
const ENV_URI = "http://env:19530";
const DEFAULT_URI = "http://default:19530";

type Source = "flag" | "profile" | "env" | "default";
const PRECEDENCE: readonly Source[] = ["flag", "profile", "env", "default"];
const URIS: Record<Source, string> = {
  flag: FLAG_URI,
  profile: PROFILE_URI,
  env: ENV_URI,
  default: DEFAULT_URI,
};

function setup(sources: ReadonlySet<Source>): {
  flags: ConnectionFlags;
  env: Record<string, string>;
  doc: ProfileDocument;
} {
  const doc = emptyProfileDocument();
  const flags: ConnectionFlags = {};
  const env: Record<string, string> = {};

  if (sources.has("flag")) flags.uri = FLAG_URI;
  if (sources.has("env")) env.MILVUS_URI = ENV_URI;
  if (sources.has("profile")) {
    doc.profiles.named = { uri: PROFILE_URI };
    flags.profile = "named";
  }
  if (sources.has("default")) {
    doc.profiles.fallback = { uri: DEFAULT_URI };
    doc.default = "fallback";
  }
  return { flags, env, doc };
}

function subsets(): Source[][] {
  const all: Source[][] = [];
  for (let mask = 1; mask < 1 << PRECEDENCE.length; mask++) {
    all.push(PRECEDENCE.filter((_, i) => (mask & (1 << i)) !== 0));
  }
  return all;
}

describe("resolveConnection", () => {
  describe("uri precedence", () => {
    it.each(subsets().map((sources): [string, Source[]] => [sources.join(" + "), sources]))(
      "%s",
      (_label, sources) => {
        const { flags, env, doc } = setup(new Set(sources));
        const winner = PRECEDENCE.find((source) => sources.includes(source));
        if (winner === undefined) throw new Error("empty subset");

        expect(resolveConnection(flags, env, doc).uri).toBe(URIS[winner]);
      }
    );

    it("should use the flag when all four sources supply a uri", () => {
      const { flags, env, doc } = setup(new Set(PRECEDENCE));
      expect(resolveConnection(flags, env, doc).uri).toBe(FLAG_URI);
    });
  });

  it("should fail with VALIDATION_ERROR when no source supplies a uri", () => {
    expect(() => resolveConnection({}, {}, emptyProfileDocument())).toThrow(ValidationError);
  });

  it("should fail with NOT_FOUND for an unknown --profile", () => {
    const doc = emptyProfileDocument();
    doc.profiles.local = { uri: DEFAULT_URI };
    doc.default = "local";

    expect(() => resolveConnection({ profile: "ghost" }, {}, doc)).toThrow(NotFoundError);
    expect(() => resolveConnection({ profile: "ghost" }, {}, doc)).toThrow("Profile 'ghost' not found");
  });

  it("should not send a profile's credentials to a uri from another layer", () => {
    const doc = emptyProfileDocument();
    doc.profiles.local = { uri: DEFAULT_URI, token: "default-token", database: "analytics" };
    doc.default = "local";

    expect(resolveConnection({}, { MILVUS_URI: ENV_URI }, doc)).toEqual({ uri: ENV_URI });
    expect(resolveConnection({ uri: FLAG_URI }, {}, doc)).toEqual({ uri: FLAG_URI });
  });

  it("should let --token and MILVUS_TOKEN apply to any uri", () => {
    const doc = emptyProfileDocument();
    doc.profiles.local = { uri: DEFAULT_URI, token: "default-token", database: "analytics" };
    doc.default = "local";

    expect(resolveConnection({ uri: FLAG_URI }, { MILVUS_TOKEN: "env-token" }, doc)).toEqual({
      uri: FLAG_URI,
      token: "env-token",
    });
    expect(resolveConnection({ token: "flag-token" }, { MILVUS_URI: ENV_URI }, doc)).toEqual({
      uri: ENV_URI,
      token: "flag-token",
    });
  });

  it("should take token and database from the profile that supplied the uri", () => {
    const doc = emptyProfileDocument();
    doc.profiles.local = { uri: DEFAULT_URI, token: "default-token", database: "analytics" };
    doc.default = "local";

    expect(resolveConnection({}, {}, doc)).toEqual({ uri: DEFAULT_URI, token: "default-token", database: "analytics" });
    expect(resolveConnection({}, { MILVUS_TOKEN: "env-token" }, doc)).toEqual({
      uri: DEFAULT_URI,
      token: "env-token",
      database: "analytics",
    });
  });

  it("should prefer the named profile's token over MILVUS_TOKEN", () => {
    const doc = emptyProfileDocument();
    doc.profiles.named = { uri: PROFILE_URI, token: "named-token" };

    expect(resolveConnection({ profile: "named" }, { MILVUS_TOKEN: "env-token" }, doc)).toEqual({
      uri: PROFILE_URI,
      token: "named-token",
    });
  });

  it("should not consult the default profile when --profile is given", () => {
    const doc = emptyProfileDocument();
    doc.profiles.named = { uri: PROFILE_URI };
    doc.profiles.fallback = { uri: DEFAULT_URI, database: "fallback-db" };
    doc.default = "fallback";

    expect(resolveConnection({ profile: "named" }, {}, doc)).toEqual({ uri: PROFILE_URI });
  });

  it("should let --db override the profile database", () => {
    const doc = emptyProfileDocument();
    doc.profiles.local = { uri: DEFAULT_URI, database: "analytics" };
    doc.default = "local";

    expect(resolveConnection({ database: "staging" }, {}, doc).database).toBe("staging");
  });

  it("should ignore empty values", () => {
    expect(resolveConnection({ uri: "" }, { MILVUS_URI: ENV_URI, MILVUS_TOKEN: "" }, emptyProfileDocument())).toEqual({
      uri: ENV_URI,
    });
  });
});

describe("connectionFromEnv", () => {
  it("should read MILVUS_URI and MILVUS_TOKEN only", () => {
    expect(
      connectionFromEnv({ MILVUS_URI: ENV_URI, MILVUS_TOKEN: "test-secret", MILVUS_DB: "ignored" })
    ).toEqual({ uri: ENV_URI, token: "test-secret" });
  });
});
