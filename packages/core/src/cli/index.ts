import { defineCommand, runMain } from "citty";

import { inspectCommand } from "./commands/inspect";

const main = defineCommand({
  meta: {
    name: "irkit",
    version: "0.1.0",
    description: "Resolve OpenAPI documents into a cycle-safe intermediate representation",
  },
  subCommands: {
    inspect: inspectCommand,
  },
});

export function run(): Promise<void> {
  return runMain(main);
}
