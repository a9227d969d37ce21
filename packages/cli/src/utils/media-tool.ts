import { execFileSync } from "node:child_process";
import { FFmpegTool, type MediaTool } from "@streamcut/core";
import type { StreamcutConfig } from "../config/index.js";

/** Media tool configured from the effective config */
export function createMediaTool(config: StreamcutConfig): MediaTool {
  return new FFmpegTool({
    ffmpegPath: config.ffmpeg.ffmpegPath,
    ffprobePath: config.ffmpeg.ffprobePath,
    timeoutMs: config.ffmpeg.timeoutSeconds * 1000,
  });
}

/** Shorthand: check if a command exists */
export function commandExists(cmd: string): boolean {
  try {
    execFileSync(process.platform === "win32" ? "where" : "which", [cmd], { stdio: "ignore" });
    return true;
  } catch {
    return false;
  }
}
