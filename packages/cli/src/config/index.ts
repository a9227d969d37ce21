/**
 * Configuration loader/saver for the streamcut CLI
 * Config stored at ~/.streamcut/config.yaml
 */

import { resolve } from "node:path";
import { homedir } from "node:os";
import { existsSync } from "node:fs";
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { parse, stringify } from "yaml";
import { type StreamcutConfig, createDefaultConfig, normalizeConfig, ENV_OVERRIDES } from "./schema.js";

/** Config directory path */
export const CONFIG_DIR = resolve(homedir(), ".streamcut");

/** Config file path */
export const CONFIG_PATH = resolve(CONFIG_DIR, "config.yaml");

/**
 * Load configuration from ~/.streamcut/config.yaml
 * Returns null if config doesn't exist; a malformed file throws.
 */
export async function loadConfig(): Promise<StreamcutConfig | null> {
  if (!existsSync(CONFIG_PATH)) return null;

  const content = await readFile(CONFIG_PATH, "utf-8");
  try {
    return normalizeConfig(parse(content));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid config file ${CONFIG_PATH}: ${message}`);
  }
}

/**
 * Effective configuration: file values over defaults, then environment
 * overrides for the binary paths
 */
export async function resolveConfig(): Promise<StreamcutConfig> {
  const config = (await loadConfig()) ?? createDefaultConfig();

  const ffmpegPath = process.env[ENV_OVERRIDES.ffmpegPath];
  const ffprobePath = process.env[ENV_OVERRIDES.ffprobePath];
  if (ffmpegPath) config.ffmpeg.ffmpegPath = ffmpegPath;
  if (ffprobePath) config.ffmpeg.ffprobePath = ffprobePath;

  return config;
}

/**
 * Save configuration to ~/.streamcut/config.yaml
 */
export async function saveConfig(config: StreamcutConfig): Promise<void> {
  await mkdir(CONFIG_DIR, { recursive: true });

  const content = stringify(config, {
    indent: 2,
    lineWidth: 0, // Don't wrap lines
  });

  await writeFile(CONFIG_PATH, content, "utf-8");
}

// Re-export types
export type { StreamcutConfig } from "./schema.js";
export { createDefaultConfig, normalizeConfig, ENV_OVERRIDES } from "./schema.js";
