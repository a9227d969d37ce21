#!/usr/bin/env tsx

import { Command } from "commander";
import { createRequire } from "module";
import { loadEnv, isDebug } from "./utils/env.js";
import { highlightCommand } from "./commands/highlight.js";
import { digestCommand } from "./commands/digest.js";
import { detectCommand } from "./commands/detect.js";
import { probeCommand } from "./commands/probe.js";
import { configCommand } from "./commands/config.js";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

loadEnv();

if (isDebug()) {
  console.log("[CLI] Environment loaded, parsing arguments...");
}

const program = new Command();

program
  .name("streamcut")
  .description("streamcut - highlight clips and digests from stream archives")
  .version(pkg.version);

program.addCommand(highlightCommand);
program.addCommand(digestCommand);
program.addCommand(detectCommand);
program.addCommand(probeCommand);
program.addCommand(configCommand);

program.parseAsync().catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
