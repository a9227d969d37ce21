import chalk from "chalk";
import type { Ora } from "ora";
import type { Logger } from "@streamcut/core";
import { isDebug } from "./env.js";

/**
 * Logger that reports progress through a running spinner. Warnings are
 * printed above the spinner so they stay visible.
 */
export function createSpinnerLogger(spinner: Ora, stage: string): Logger {
  const tag = chalk.dim(`[${stage}]`);
  return {
    info: (message) => {
      spinner.text = `${tag} ${message}`;
    },
    warn: (message) => {
      spinner.clear();
      console.warn(`${tag} ${chalk.yellow(message)}`);
      spinner.render();
    },
    debug: (message) => {
      if (!isDebug()) return;
      spinner.clear();
      console.log(`${tag} ${chalk.gray(message)}`);
      spinner.render();
    },
  };
}
