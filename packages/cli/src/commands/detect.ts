import { Command } from "commander";
import { writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import chalk from "chalk";
import ora from "ora";
import { AudioSignalDetector, CommentLogDetector, errorMessage, loadKeywords } from "@streamcut/core";
import { resolveConfig } from "../config/index.js";
import { commandExists, createMediaTool } from "../utils/media-tool.js";
import { createSpinnerLogger } from "../utils/logger.js";
import { parseDecibels, parseSeconds } from "../utils/options.js";
import { commentDetectorOptions } from "./highlight.js";
import { printEventTable } from "./output.js";

export const detectCommand = new Command("detect")
  .description("Run a single highlight detector and print its events");

/**
 * Audio peaks and loud segments via two silencedetect passes
 */
detectCommand
  .command("audio")
  .description("Detect volume peaks and loud segments in audio/video")
  .argument("<media>", "Media file path")
  .option("--peak-noise <dB>", "Noise floor of the peak pass (default: -20)", parseDecibels)
  .option("--loud-noise <dB>", "Noise floor of the loud-segment pass (default: -30)", parseDecibels)
  .option("--min-silence <sec>", "Minimum silence of the loud-segment pass (default: 2)", parseSeconds)
  .option("-o, --output <path>", "Output JSON file with events")
  .action(async (mediaPath: string, options) => {
    const config = await resolveConfig();
    if (!commandExists(config.ffmpeg.ffmpegPath)) {
      console.error(chalk.red("FFmpeg not found. Please install FFmpeg."));
      process.exit(1);
    }

    const absPath = resolve(process.cwd(), mediaPath);
    if (!existsSync(absPath)) {
      console.error(chalk.red(`Media file not found: ${absPath}`));
      process.exit(1);
    }

    const spinner = ora("Detecting audio events...").start();

    try {
      const detector = new AudioSignalDetector(
        createMediaTool(config),
        {
          ...config.audio,
          peakNoiseDb: options.peakNoise ?? config.audio.peakNoiseDb,
          loudNoiseDb: options.loudNoise ?? config.audio.loudNoiseDb,
          loudMinSilence: options.minSilence ?? config.audio.loudMinSilence,
        },
        createSpinnerLogger(spinner, "audio")
      );
      const events = await detector.detect(absPath);

      spinner.succeed(chalk.green(`Detected ${events.length} audio events`));
      printEventTable(events, "Audio Events");

      if (options.output) {
        const outputPath = resolve(process.cwd(), options.output);
        await writeFile(outputPath, JSON.stringify({ source: absPath, events }, null, 2), "utf-8");
        console.log(chalk.green(`Saved to: ${outputPath}`));
      }
    } catch (error) {
      spinner.fail(chalk.red(`Audio detection failed: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

/**
 * Comment spikes, user reactions and keyword hits from a chat log
 */
detectCommand
  .command("comments")
  .description("Detect comment spikes, reactions and keywords in a comment log")
  .argument("<log>", "Comment log (JSON/CSV)")
  .option("-w, --window <sec>", "Spike bucket width (default: 30)", parseSeconds)
  .option("-k, --keywords <path>", "Keyword file (.json or one per line)")
  .option("-o, --output <path>", "Output JSON file with events")
  .action(async (logPath: string, options) => {
    const absPath = resolve(process.cwd(), logPath);
    if (!existsSync(absPath)) {
      console.error(chalk.red(`Comment log not found: ${absPath}`));
      process.exit(1);
    }

    const spinner = ora("Detecting comment events...").start();

    try {
      const config = await resolveConfig();
      const detectorOptions = await commentDetectorOptions(config);
      if (options.window !== undefined) detectorOptions.spikeWindow = options.window;
      if (options.keywords) detectorOptions.keywords = await loadKeywords(resolve(process.cwd(), options.keywords));

      const events = await new CommentLogDetector(detectorOptions).detect(absPath);

      spinner.succeed(chalk.green(`Detected ${events.length} comment events`));
      printEventTable(events, "Comment Events");

      if (options.output) {
        const outputPath = resolve(process.cwd(), options.output);
        await writeFile(outputPath, JSON.stringify({ source: absPath, events }, null, 2), "utf-8");
        console.log(chalk.green(`Saved to: ${outputPath}`));
      }
    } catch (error) {
      spinner.fail(chalk.red(`Comment detection failed: ${errorMessage(error)}`));
      process.exit(1);
    }
  });
