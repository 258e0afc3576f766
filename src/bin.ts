#!/usr/bin/env node
/**
 * stategraph — command entry point
 */

import { Command } from "commander";
import { createStateGraphCli } from "./cli.js";
import { formatError } from "./errors.js";

const program = new Command("stategraph").description("Rewrite resource state graphs and infer dependencies");
createStateGraphCli()(program);

try {
  await program.parseAsync(process.argv);
} catch (err) {
  console.error(formatError(err));
  process.exitCode = 1;
}
