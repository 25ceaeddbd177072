import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, readdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ProfileStore, validateProfileName } from "./profiles.js";
import { AlreadyExistsError, InvalidFormatError, NotFoundError, ValidationError } from "./errors.js";

describe("ProfileStore", () => {
  let configDir: string;
  let store: ProfileStore;

  beforeEach(async () => {
    configDir = await mkdtemp(join(tmpdir(), "yami-profiles-"));
    store = new ProfileStore(configDir);
  });

  afterEach(async () => {
    await rm(configDir, { recursive: true, force: true });
  });

  it("should read a missing file as an empty document", async () => {
    expect(await store.load()).toEqual({ version: 1, default: null, profiles: {} });
    expect(await store.list()).toEqual([]);
  });

  it("should make the first profile the default", async () => {
    const entry = await store.add("local", { uri: "http://localhost:19530" });

    expect(entry).toEqual({ name: "local", uri: "http://localhost:19530", default: true });
  });

  it("should not move the default when adding more profiles", async () => {
    await store.add("local", { uri: "http://localhost:19530" });
    const second = await store.add("cloud", { uri: "https://cloud:443", token: "test-secret" });

    expect(second.default).toBe(false);
    expect((await store.load()).default).toBe("local");
  });

  it("should move the default when asked", async () => {
    await store.add("local", { uri: "http://localhost:19530" });
    await store.add("cloud", { uri: "https://cloud:443" }, { makeDefault: true });

    expect((await store.load()).default).toBe("cloud");
  });

  it("should round-trip add, use and list", async () => {
    await store.add("p0", { uri: "http://first:19530" });
    await store.add("p1", { uri: "http://second:19530" });
    await store.use("p1");

    expect(await store.list()).toEqual([
      { name: "p0", uri: "http://first:19530", default: false },
      { name: "p1", uri: "http://second:19530", default: true },
    ]);
  });

  it("should reject duplicates unless overwrite is set", async () => {
    await store.add("local", { uri: "http://localhost:19530" });

    await expect(store.add("local", { uri: "http://other:19530" })).rejects.toThrow(AlreadyExistsError);

    const replaced = await store.add(
      "local",
      { uri: "http://other:19530", database: "analytics" },
      { overwrite: true }
    );
    expect(replaced).toEqual({
      name: "local",
      uri: "http://other:19530",
      database: "analytics",
      default: true,
    });
  });

  it("should mask tokens in list and show", async () => {
    await store.add("cloud", { uri: "https://cloud:443", token: "test-secret" });

    expect(await store.show("cloud")).toEqual({
      name: "cloud",
      uri: "https://cloud:443",
      token: "****",
      default: true,
    });
    expect((await store.get("cloud")).token).toBe("test-secret");
  });

  it("should persist the document as canonical JSON", async () => {
    await store.add("local", { uri: "http://localhost:19530", token: "test-secret" });

    const raw = await readFile(join(configDir, "profiles.json"), "utf-8");
    expect(raw).toBe(
      [
        "{",
        '  "default": "local",',
        '  "profiles": {',
        '    "local": {',
        '      "token": "test-secret",',
        '      "uri": "http://localhost:19530"',
        "    }",
        "  },",
        '  "version": 1',
        "}",
        "",
      ].join("\n")
    );
    expect(await readdir(configDir)).toEqual(["profiles.json"]);
  });

  it("should fail use and remove for unknown profiles", async () => {
    await expect(store.use("ghost")).rejects.toThrow(NotFoundError);
    await expect(store.remove("ghost")).rejects.toThrow("Profile 'ghost' not found");
    await expect(store.get("ghost")).rejects.toThrow(NotFoundError);
    await expect(store.show("ghost")).rejects.toThrow(NotFoundError);
  });

  it("should clear the default when removing it", async () => {
    await store.add("local", { uri: "http://localhost:19530" });
    await store.add("cloud", { uri: "https://cloud:443" });

    expect(await store.remove("local")).toEqual({ name: "local", wasDefault: true });

    const doc = await store.load();
    expect(doc.default).toBeNull();
    expect(Object.keys(doc.profiles)).toEqual(["cloud"]);
  });

  it("should keep the default when removing another profile", async () => {
    await store.add("local", { uri: "http://localhost:19530" });
    await store.add("cloud", { uri: "https://cloud:443" });

    expect(await store.remove("cloud")).toEqual({ name: "cloud", wasDefault: false });
    expect((await store.load()).default).toBe("local");
  });

  it("should require a uri", async () => {
    await expect(store.add("local", {})).rejects.toThrow(ValidationError);
  });

  it("should reject malformed files with INVALID_FORMAT", async () => {
    await writeFile(join(configDir, "profiles.json"), "{ not json", "utf-8");
    await expect(store.load()).rejects.toThrow(InvalidFormatError);

    await writeFile(join(configDir, "profiles.json"), '{"profiles": {"x": {"uri": 5}}}', "utf-8");
    await expect(store.list()).rejects.toThrow(InvalidFormatError);
  });

  it("should treat a dangling default as no default", async () => {
    await writeFile(
      join(configDir, "profiles.json"),
      JSON.stringify({ version: 1, default: "gone", profiles: { local: { uri: "http://localhost:19530" } } }),
      "utf-8"
    );

    expect((await store.load()).default).toBeNull();
  });

  it("should preserve unknown keys on rewrite", async () => {
    await writeFile(
      join(configDir, "profiles.json"),
      JSON.stringify({
        version: 1,
        default: "local",
        color: "auto",
        profiles: { local: { uri: "http://localhost:19530", timeout: 30 } },
      }),
      "utf-8"
    );

    await store.add("cloud", { uri: "https://cloud:443" });

    const saved: unknown = JSON.parse(await readFile(join(configDir, "profiles.json"), "utf-8"));
    expect(saved).toEqual({
      version: 1,
      default: "local",
      color: "auto",
      profiles: {
        local: { uri: "http://localhost:19530", timeout: 30 },
        cloud: { uri: "https://cloud:443" },
      },
    });
  });

  it("should re-read the file on every call", async () => {
    await store.add("local", { uri: "http://localhost:19530" });
    const other = new ProfileStore(configDir);
    await other.add("cloud", { uri: "https://cloud:443" }, { makeDefault: true });

    expect((await store.load()).default).toBe("cloud");
  });
});

describe("validateProfileName", () => {
  it.each(["local", "prod-eu", "team.dev", "a_1", "9lives"])("should accept %s", (name) => {
    expect(validateProfileName(name)).toBe(name);
  });

  it.each(["", "-lead", ".hidden", "has space", "slash/name", "ünï"])("should reject %j", (name) => {
    expect(() => validateProfileName(name)).toThrow(ValidationError);
  });
});
