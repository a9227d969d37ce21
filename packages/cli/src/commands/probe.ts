import { Command } from "commander";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import chalk from "chalk";
import ora from "ora";
import { errorMessage, type MediaInfo } from "@streamcut/core";
import { resolveConfig } from "../config/index.js";
import { commandExists, createMediaTool } from "../utils/media-tool.js";

/** Display lines for a probed file, label then value */
export function formatMediaInfo(info: MediaInfo): Array<[string, string]> {
  const lines: Array<[string, string]> = [];
  const mins = Math.floor(info.duration / 60);
  const secs = info.duration % 60;

  lines.push(["Duration", `${mins}m ${secs.toFixed(1)}s`]);
  if (info.width !== undefined && info.height !== undefined) {
    lines.push(["Resolution", `${info.width}x${info.height}`]);
  }
  if (info.codec) lines.push(["Video Codec", info.codec]);
  if (info.fps !== undefined) lines.push(["Frame Rate", `${info.fps} fps`]);
  if (info.audioCodec) lines.push(["Audio Codec", info.audioCodec]);
  if (info.sampleRate !== undefined) lines.push(["Sample Rate", `${info.sampleRate} Hz`]);
  lines.push(["Size", `${(info.size / (1024 * 1024)).toFixed(1)} MB`]);
  lines.push(["Bitrate", `${Math.round(info.bitRate / 1000)} kb/s`]);
  return lines;
}

export const probeCommand = new Command("probe")
  .description("Show duration, resolution, codecs and size of a media file")
  .argument("<media>", "Media file path")
  .option("--json", "Print raw media info as JSON")
  .action(async (mediaPath: string, options) => {
    const config = await resolveConfig();
    if (!commandExists(config.ffmpeg.ffprobePath)) {
      console.error(chalk.red("ffprobe not found. Please install FFmpeg."));
      process.exit(1);
    }

    const absPath = resolve(process.cwd(), mediaPath);
    if (!existsSync(absPath)) {
      console.error(chalk.red(`Media file not found: ${absPath}`));
      process.exit(1);
    }

    const spinner = ora("Probing...").start();

    try {
      const info = await createMediaTool(config).probe(absPath);
      spinner.stop();

      if (options.json) {
        console.log(JSON.stringify(info, null, 2));
        return;
      }

      console.log();
      console.log(chalk.bold.cyan(absPath));
      console.log(chalk.dim("─".repeat(60)));
      for (const [label, value] of formatMediaInfo(info)) {
        console.log(`${chalk.dim(`${label}:`.padEnd(14))}${value}`);
      }
      console.log();
    } catch (error) {
      spinner.fail(chalk.red(`Probe failed: ${errorMessage(error)}`));
      process.exit(1);
    }
  });
