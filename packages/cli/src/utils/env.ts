import { resolve } from "node:path";
import { config } from "dotenv";

/**
 * Load environment variables from the working directory's .env file.
 * Variables already set in the environment win.
 */
export function loadEnv(cwd: string = process.cwd()): void {
  config({ path: resolve(cwd, ".env"), debug: false });
}

export function isDebug(): boolean {
  return process.env.STREAMCUT_DEBUG === "1";
}
