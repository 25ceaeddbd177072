/**
 * Profile commands
 *
 * These run against the local profile store and never open a connection.
 * `profile add` takes its connection from the global --uri, --token and --db.
 */

import { MissingArgumentError, validateProfileName } from "@yami/core";
import type { CommandSpec } from "../registry/types.js";
import { data, mutation } from "./shared.js";

const NAME_ARG = { name: "name", description: "Profile name" };

export const profileCommands: CommandSpec[] = [
  {
    group: "profile",
    action: "add",
    description: "Save a named connection (from --uri, --token and --db)",
    args: [NAME_ARG],
    options: [
      { flags: "--overwrite", type: "boolean", description: "Replace an existing profile with the same name" },
      { flags: "--default", type: "boolean", description: "Make this the default profile" },
    ],
    examples: [
      ["profile", "add", "local", "--uri", "http://localhost:19530"],
      ["profile", "add", "cloud", "--uri", "https://example.zillizcloud.com", "--token", "test-secret", "--default"],
    ],
    handler: {
      scope: "local",
      validate: (input, globals) => {
        validateProfileName(input.arg("name"));
        if (globals.uri === undefined) {
          throw new MissingArgumentError("Missing required option --uri");
        }
      },
      run: async (input, { profiles, globals }) => {
        const name = input.arg("name");
        const entry = await profiles.add(
          name,
          { uri: globals.uri, token: globals.token, database: globals.db },
          { overwrite: input.flag("overwrite"), makeDefault: input.flag("default") }
        );
        return mutation(`Profile '${name}' saved`, { profile: entry });
      },
    },
  },
  {
    group: "profile",
    action: "use",
    description: "Make a profile the default",
    args: [NAME_ARG],
    options: [],
    examples: [["profile", "use", "local"]],
    handler: {
      scope: "local",
      run: async (input, { profiles }) => {
        const entry = await profiles.use(input.arg("name"));
        return mutation(`Default profile set to '${entry.name}'`);
      },
    },
  },
  {
    group: "profile",
    action: "list",
    description: "List saved profiles (tokens masked)",
    args: [],
    options: [],
    examples: [["profile", "list"]],
    handler: {
      scope: "local",
      run: async (_input, { profiles }) => data(await profiles.list()),
    },
  },
  {
    group: "profile",
    action: "show",
    description: "Show one profile (token masked)",
    args: [NAME_ARG],
    options: [],
    examples: [["profile", "show", "local"]],
    handler: {
      scope: "local",
      run: async (input, { profiles }) => data(await profiles.show(input.arg("name"))),
    },
  },
  {
    group: "profile",
    action: "remove",
    description: "Delete a profile",
    args: [NAME_ARG],
    options: [],
    examples: [["profile", "remove", "local"]],
    handler: {
      scope: "local",
      run: async (input, { profiles }) => {
        const result = await profiles.remove(input.arg("name"));
        return mutation(`Profile '${result.name}' removed`, { was_default: result.wasDefault });
      },
    },
  },
];
