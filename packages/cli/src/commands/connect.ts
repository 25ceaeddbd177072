/**
 * Connection check against a server given on the command line
 */

import type { CommandSpec } from "../registry/types.js";
import { data } from "./shared.js";

export const connectCommand: CommandSpec = {
  group: "connect",
  description: "Check that a Milvus server is reachable and show its version",
  args: [{ name: "uri", description: "Milvus server URI, e.g. http://localhost:19530" }],
  options: [],
  examples: [["connect", "http://localhost:19530"]],
  handler: {
    scope: "backend",
    connection: (input) => ({ uri: input.arg("uri") }),
    plan: (input) => {
      const uri = input.arg("uri");
      return async (backend) => data({ connected: true, uri, version: await backend.serverVersion() });
    },
  },
};
