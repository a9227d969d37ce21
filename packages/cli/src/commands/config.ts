/**
 * Config command - inspect and initialise ~/.streamcut/config.yaml
 */

import { Command } from "commander";
import { existsSync } from "node:fs";
import chalk from "chalk";
import { stringify } from "yaml";
import { CONFIG_PATH, createDefaultConfig, resolveConfig, saveConfig } from "../config/index.js";

export const configCommand = new Command("config")
  .description("Show or initialise the streamcut configuration");

configCommand
  .command("show")
  .description("Print the effective configuration (file, defaults and environment)")
  .action(async () => {
    try {
      const config = await resolveConfig();
      if (!existsSync(CONFIG_PATH)) {
        console.log(chalk.dim(`# No config file at ${CONFIG_PATH}, showing defaults`));
      }
      console.log(stringify(config, { indent: 2, lineWidth: 0 }).trimEnd());
    } catch (error) {
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
  });

configCommand
  .command("init")
  .description("Write a config file with default values")
  .option("-f, --force", "Overwrite an existing config file")
  .action(async (options) => {
    if (existsSync(CONFIG_PATH) && !options.force) {
      console.error(chalk.red(`Config already exists: ${CONFIG_PATH}`));
      console.error(chalk.dim("Use --force to overwrite it"));
      process.exit(1);
    }

    await saveConfig(createDefaultConfig());
    console.log(chalk.green("Configuration written with defaults"));
    console.log(chalk.dim(`Saved to: ${CONFIG_PATH}`));
  });

configCommand
  .command("path")
  .description("Print the config file location")
  .action(() => {
    console.log(CONFIG_PATH);
  });
