/**
 * @module highlight
 *
 * Archive highlight extraction: audio + comment log analysis, event
 * merging, clip rendering and a timestamp index.
 *
 * CLI command: highlight
 *
 * Execute function:
 *   executeHighlight - detect, merge, render; returns a result object
 *
 * @dependencies FFmpeg
 */

import { Command } from "commander";
import { writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import chalk from "chalk";
import ora from "ora";
import {
  AudioSignalDetector,
  ClipRenderer,
  CommentLogDetector,
  DEFAULT_MERGE_WINDOW,
  DEFAULT_PADDING,
  DEFAULT_TIMESTAMP_COUNT,
  InputNotFoundError,
  detectCommentLogFormat,
  errorMessage,
  formatDuration,
  generateTimestampList,
  loadKeywords,
  mergeEvents,
  silentLogger,
  type AudioDetectorOptions,
  type Clip,
  type ClipFailure,
  type CommentDetectorOptions,
  type CommentEvent,
  type Logger,
  type MediaTool,
  type MergedEvent,
} from "@streamcut/core";
import { resolveConfig, type StreamcutConfig } from "../config/index.js";
import { commandExists, createMediaTool } from "../utils/media-tool.js";
import { createSpinnerLogger } from "../utils/logger.js";
import { parsePositiveInt, parseSeconds } from "../utils/options.js";
import { printEventTable } from "./output.js";

/** Options for {@link executeHighlight}. */
export interface HighlightOptions {
  /** Path to the archive video/audio */
  input: string;
  /** Directory for clips and timestamps.txt (default: ./highlights) */
  outputDir?: string;
  /** Optional comment log (.json / .csv) */
  comments?: string;
  /** Number of clips to render (default: 5) */
  numClips?: number;
  /** Seconds per clip before padding (default: 60) */
  clipDuration?: number;
  /** Seconds added before and after each clip (default: 5) */
  padding?: number;
  /** Events closer than this are merged (default: 30) */
  mergeWindow?: number;
  /** Entries in timestamps.txt (default: 20) */
  timestampCount?: number;
  /** Also write the merged events as JSON */
  eventsOutput?: string;
  audio?: Partial<AudioDetectorOptions>;
  commentDetector?: Partial<CommentDetectorOptions>;
  /** Media backend; ffmpeg from config when omitted */
  tool?: MediaTool;
  logger?: Logger;
}

/** Result from {@link executeHighlight}. */
export interface HighlightResult {
  /** True when at least one clip was produced */
  success: boolean;
  clips: Clip[];
  failures: ClipFailure[];
  /** Clips attempted */
  requested: number;
  /** Merged events, best first */
  events: MergedEvent[];
  audioEventCount: number;
  commentEventCount: number;
  timestampsPath?: string;
  eventsPath?: string;
  error?: string;
}

function emptyResult(error: string): HighlightResult {
  return {
    success: false,
    clips: [],
    failures: [],
    requested: 0,
    events: [],
    audioEventCount: 0,
    commentEventCount: 0,
    error,
  };
}

/**
 * Extract highlights from a stream archive.
 *
 * Runs the audio detector and (when the log exists) the comment detector,
 * merges both streams, cuts the top clips and writes timestamps.txt into
 * the output directory.
 */
export async function executeHighlight(options: HighlightOptions): Promise<HighlightResult> {
  const logger = options.logger ?? silentLogger;

  try {
    const absPath = resolve(process.cwd(), options.input);
    if (!existsSync(absPath)) {
      throw new InputNotFoundError("Input file", absPath);
    }

    const tool = options.tool ?? createMediaTool(await resolveConfig());
    const outputDir = resolve(process.cwd(), options.outputDir ?? "./highlights");
    const numClips = options.numClips ?? 5;
    const clipDuration = options.clipDuration ?? 60;

    logger.info(`Analyzing audio: ${absPath}`);
    const audioEvents = await new AudioSignalDetector(tool, options.audio, logger).detect(absPath);
    logger.info(`Found ${audioEvents.length} audio events`);

    let commentEvents: CommentEvent[] = [];
    if (options.comments) {
      const logPath = resolve(process.cwd(), options.comments);
      if (existsSync(logPath)) {
        detectCommentLogFormat(logPath);
        logger.info(`Analyzing comments: ${logPath}`);
        commentEvents = await new CommentLogDetector(options.commentDetector).detect(logPath);
        logger.info(`Found ${commentEvents.length} comment events`);
      } else {
        logger.warn(`Comment log not found, using audio only: ${logPath}`);
      }
    }

    const events = mergeEvents(audioEvents, commentEvents, options.mergeWindow ?? DEFAULT_MERGE_WINDOW);
    logger.info(`Merged into ${events.length} events`);

    logger.info(`Generating ${numClips} clips...`);
    const rendered = await new ClipRenderer(tool, logger).renderDetailed(
      absPath,
      events,
      outputDir,
      numClips,
      clipDuration,
      options.padding ?? DEFAULT_PADDING
    );

    const timestampsPath = await generateTimestampList(
      events,
      join(outputDir, "timestamps.txt"),
      options.timestampCount ?? DEFAULT_TIMESTAMP_COUNT
    );

    let eventsPath: string | undefined;
    if (options.eventsOutput) {
      eventsPath = resolve(process.cwd(), options.eventsOutput);
      await writeFile(eventsPath, JSON.stringify({ source: absPath, events }, null, 2), "utf-8");
    }

    const result: HighlightResult = {
      success: rendered.clips.length > 0,
      clips: rendered.clips,
      failures: rendered.failures,
      requested: rendered.requested,
      events,
      audioEventCount: audioEvents.length,
      commentEventCount: commentEvents.length,
      timestampsPath,
      eventsPath,
    };

    if (!result.success) {
      result.error = events.length === 0 ? "No highlight events detected" : "No clips could be produced";
    }
    return result;
  } catch (error) {
    return emptyResult(errorMessage(error));
  }
}

/** Detector settings from config, keywords resolved */
export async function commentDetectorOptions(config: StreamcutConfig): Promise<Partial<CommentDetectorOptions>> {
  const { keywords, keywordsFile, ...rest } = config.comments;
  if (keywords && keywords.length > 0) return { ...rest, keywords };
  if (keywordsFile) return { ...rest, keywords: await loadKeywords(resolve(process.cwd(), keywordsFile)) };
  return rest;
}

// ============================================================================
// CLI command registration
// ============================================================================

export const highlightCommand = new Command("highlight")
  .description("Extract highlights from a stream archive (audio peaks + comment log)")
  .requiredOption("-i, --input <path>", "Archive video file")
  .option("-o, --output-dir <dir>", "Output directory (default: ./highlights)")
  .option("-c, --comments <path>", "Comment log (JSON/CSV)")
  .option("-n, --num-clips <number>", "Number of clips (default: 5)", parsePositiveInt)
  .option("--duration <seconds>", "Clip length in seconds (default: 60)", parseSeconds)
  .option("--padding <seconds>", "Extra seconds before/after each clip (default: 5)", parseSeconds)
  .option("--merge-window <seconds>", "Merge events closer than this (default: 30)", parseSeconds)
  .option("--events <path>", "Write merged events as JSON")
  .action(async (options) => {
    const config = await resolveConfig();

    if (!commandExists(config.ffmpeg.ffmpegPath)) {
      console.error(chalk.red("FFmpeg not found. Please install FFmpeg."));
      process.exit(1);
    }

    console.log();
    console.log(chalk.bold.cyan("Archive Highlight Extraction"));
    console.log(chalk.dim("─".repeat(60)));
    console.log(`Input:    ${options.input}`);
    if (options.comments) console.log(`Comments: ${options.comments}`);
    console.log();

    const spinner = ora("Analyzing...").start();
    const result = await executeHighlight({
      input: options.input,
      outputDir: options.outputDir ?? config.highlight.outputDir,
      comments: options.comments,
      numClips: options.numClips ?? config.highlight.numClips,
      clipDuration: options.duration ?? config.highlight.clipDuration,
      padding: options.padding ?? config.highlight.padding,
      mergeWindow: options.mergeWindow ?? config.highlight.mergeWindow,
      timestampCount: config.highlight.timestampCount,
      eventsOutput: options.events,
      audio: config.audio,
      commentDetector: await commentDetectorOptions(config),
      tool: createMediaTool(config),
      logger: createSpinnerLogger(spinner, "highlight"),
    });

    if (!result.success) {
      spinner.fail(chalk.red(result.error ?? "Highlight extraction failed"));
      printFailures(result.failures);
      process.exit(1);
    }

    const tally = `${result.clips.length} / ${result.requested} clips succeeded`;
    if (result.failures.length > 0) {
      spinner.warn(chalk.yellow(tally));
    } else {
      spinner.succeed(chalk.green(tally));
    }

    console.log();
    console.log(chalk.dim(`Audio events: ${result.audioEventCount}, comment events: ${result.commentEventCount}`));
    printEventTable(result.events.slice(0, result.requested));
    printFailures(result.failures);

    console.log(chalk.bold("Clips"));
    for (const clip of result.clips) {
      console.log(`  ${chalk.yellow(`[${clip.index}]`)} ${clip.outputPath} ${chalk.dim(`(${formatDuration(clip.duration)})`)}`);
    }
    console.log();
    console.log(chalk.green(`Timestamps: ${result.timestampsPath}`));
    if (result.eventsPath) console.log(chalk.green(`Events: ${result.eventsPath}`));
  });

export function printFailures(failures: ClipFailure[]): void {
  if (failures.length === 0) return;
  console.log();
  console.log(chalk.bold.red("Failed clips"));
  for (const failure of failures) {
    console.log(`  ${chalk.red(`[${failure.index}]`)} ${failure.reason}`);
  }
  console.log();
}
