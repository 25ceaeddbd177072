/**
 * Partition commands
 */

import type { CommandSpec } from "../registry/types.js";
import { data, mutation } from "./shared.js";

const COLLECTION_ARG = { name: "collection", description: "Collection name" };
const PARTITION_ARG = { name: "partition", description: "Partition name" };

export const partitionCommands: CommandSpec[] = [
  {
    group: "partition",
    action: "list",
    description: "List partitions of a collection",
    args: [COLLECTION_ARG],
    options: [],
    examples: [["partition", "list", "demo"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const collection = input.arg("collection");
        return async (backend) => data(await backend.listPartitions(collection));
      },
    },
  },
  {
    group: "partition",
    action: "create",
    description: "Create a partition",
    args: [COLLECTION_ARG, PARTITION_ARG],
    options: [],
    examples: [["partition", "create", "demo", "archive"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const collection = input.arg("collection");
        const partition = input.arg("partition");
        return async (backend) => {
          await backend.createPartition(collection, partition);
          return mutation(`Partition '${partition}' created in '${collection}'`);
        };
      },
    },
  },
  {
    group: "partition",
    action: "drop",
    description: "Drop a partition and its data",
    args: [COLLECTION_ARG, PARTITION_ARG],
    options: [],
    destructive: (input) =>
      `Drop partition '${input.arg("partition")}' of '${input.arg("collection")}' and its data?`,
    examples: [["partition", "drop", "demo", "recent", "--force"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const collection = input.arg("collection");
        const partition = input.arg("partition");
        return async (backend) => {
          await backend.dropPartition(collection, partition);
          return mutation(`Partition '${partition}' dropped from '${collection}'`);
        };
      },
    },
  },
  {
    group: "partition",
    action: "has",
    description: "Check whether a partition exists",
    args: [COLLECTION_ARG, PARTITION_ARG],
    options: [],
    examples: [["partition", "has", "demo", "recent"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const collection = input.arg("collection");
        const partition = input.arg("partition");
        return async (backend) =>
          data({ collection, partition, exists: await backend.hasPartition(collection, partition) });
      },
    },
  },
];
