/**
 * Server commands
 */

import type { CommandSpec } from "../registry/types.js";
import { data } from "./shared.js";

export const serverCommands: CommandSpec[] = [
  {
    group: "server",
    action: "version",
    description: "Show the server version",
    args: [],
    options: [],
    examples: [["server", "version"]],
    handler: {
      scope: "backend",
      plan: () => async (backend) => data({ version: await backend.serverVersion() }),
    },
  },
];
