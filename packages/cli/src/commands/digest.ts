/**
 * @module digest
 *
 * Stream digest: extract highlights (or reuse existing clips) and stitch
 * them into one video, optionally with a title card and cross-fades.
 *
 * CLI command: digest
 *
 * Execute function:
 *   executeDigest - highlight extraction + assembly; returns a result object
 *
 * @dependencies FFmpeg
 */

import { Command } from "commander";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join, resolve } from "node:path";
import chalk from "chalk";
import ora from "ora";
import {
  DigestAssembler,
  InputNotFoundError,
  errorMessage,
  silentLogger,
  type AudioDetectorOptions,
  type ClipFailure,
  type CommentDetectorOptions,
  type DigestOptions,
  type Logger,
  type MediaTool,
} from "@streamcut/core";
import { resolveConfig } from "../config/index.js";
import { commandExists, createMediaTool } from "../utils/media-tool.js";
import { createSpinnerLogger } from "../utils/logger.js";
import { parsePositiveInt, parseSeconds } from "../utils/options.js";
import { commentDetectorOptions, executeHighlight, printFailures } from "./highlight.js";

/** Options for {@link executeDigest}. */
export interface DigestCommandOptions extends Omit<DigestOptions, "withTransition"> {
  /** Archive to extract highlights from; unused when `clips` is given */
  input?: string;
  /** Existing highlight clips, used as-is */
  clips?: string[];
  /** Digest file (default: ./digest.mp4) */
  output?: string;
  comments?: string;
  /** Highlights to extract (default: 10) */
  numClips?: number;
  clipDuration?: number;
  padding?: number;
  mergeWindow?: number;
  withTransition?: boolean;
  audio?: Partial<AudioDetectorOptions>;
  commentDetector?: Partial<CommentDetectorOptions>;
  tool?: MediaTool;
  logger?: Logger;
}

/** Result from {@link executeDigest}. */
export interface DigestResult {
  success: boolean;
  outputPath?: string;
  /** Highlight clips in the digest, title card excluded */
  clipCount: number;
  /** Kept directory with the extracted clips */
  highlightDir?: string;
  failures: ClipFailure[];
  error?: string;
}

/**
 * Build a digest video.
 *
 * Without `clips`, highlights are extracted into a fresh
 * `digest_highlights_*` directory under the system temp dir. That
 * directory is left in place so the clips can be inspected or reused.
 */
export async function executeDigest(options: DigestCommandOptions): Promise<DigestResult> {
  const logger = options.logger ?? silentLogger;
  const outputPath = resolve(process.cwd(), options.output ?? "./digest.mp4");
  let highlightDir: string | undefined;
  let failures: ClipFailure[] = [];

  try {
    const tool = options.tool ?? createMediaTool(await resolveConfig());
    let clipPaths: string[];

    if (options.clips && options.clips.length > 0) {
      clipPaths = options.clips.map((clip) => resolve(process.cwd(), clip));
      const missing = clipPaths.find((clip) => !existsSync(clip));
      if (missing) {
        throw new InputNotFoundError("Clip", missing);
      }
      logger.info(`Using ${clipPaths.length} existing clips`);
    } else {
      if (!options.input) {
        return { success: false, clipCount: 0, failures, error: "Either an input file or clips are required" };
      }
      const inputPath = resolve(process.cwd(), options.input);
      if (!existsSync(inputPath)) {
        throw new InputNotFoundError("Input file", inputPath);
      }

      highlightDir = await mkdtemp(join(tmpdir(), "digest_highlights_"));
      logger.info(`Extracting highlights: ${inputPath}`);

      const highlight = await executeHighlight({
        input: inputPath,
        outputDir: highlightDir,
        comments: options.comments,
        numClips: options.numClips ?? 10,
        clipDuration: options.clipDuration,
        padding: options.padding,
        mergeWindow: options.mergeWindow,
        audio: options.audio,
        commentDetector: options.commentDetector,
        tool,
        logger,
      });

      failures = highlight.failures;
      clipPaths = highlight.clips.map((clip) => clip.outputPath);

      // Aborted before the highlight index was written
      if (highlight.timestampsPath === undefined) {
        return {
          success: false,
          clipCount: 0,
          highlightDir,
          failures,
          error: highlight.error ?? "Highlight extraction failed",
        };
      }
      logger.info(`Extracted ${clipPaths.length} highlights`);
    }

    await mkdir(dirname(outputPath), { recursive: true });

    logger.info(`Concatenating ${clipPaths.length} clips...`);
    await new DigestAssembler(tool, logger).assemble(clipPaths, outputPath, {
      title: options.title,
      withTransition: options.withTransition ?? false,
      transition: options.transition,
      transitionDuration: options.transitionDuration,
      titleDuration: options.titleDuration,
      width: options.width,
      height: options.height,
      fontSize: options.fontSize,
    });

    return { success: true, outputPath, clipCount: clipPaths.length, highlightDir, failures };
  } catch (error) {
    return { success: false, clipCount: 0, highlightDir, failures, error: errorMessage(error) };
  }
}

// ============================================================================
// CLI command registration
// ============================================================================

export const digestCommand = new Command("digest")
  .description("Build a digest video from a stream archive's highlights")
  .option("-i, --input <path>", "Archive video file")
  .option("-o, --output <path>", "Output file (default: ./digest.mp4)")
  .option("-c, --comments <path>", "Comment log (JSON/CSV)")
  .option("-n, --num-clips <number>", "Number of highlights (default: 10)", parsePositiveInt)
  .option("--duration <seconds>", "Clip length in seconds (default: 60)", parseSeconds)
  .option("--title <text>", "Title card text")
  .option("--transition", "Cross-fade between clips (re-encodes)")
  .option("--no-transition", "Join clips with stream copy")
  .option("--transition-type <name>", "xfade transition name (default: fade)")
  .option("--clips <paths...>", "Use existing highlight clips instead of extracting")
  .action(async (options) => {
    if (!options.input && !options.clips) {
      console.error(chalk.red("Either --input or --clips is required"));
      process.exit(1);
    }

    const config = await resolveConfig();

    if (!commandExists(config.ffmpeg.ffmpegPath)) {
      console.error(chalk.red("FFmpeg not found. Please install FFmpeg."));
      process.exit(1);
    }

    console.log();
    console.log(chalk.bold.cyan("Stream Digest"));
    console.log(chalk.dim("─".repeat(60)));
    if (options.input) console.log(`Input:      ${options.input}`);
    if (options.clips) console.log(`Clips:      ${options.clips.length}`);
    if (options.title) console.log(`Title:      ${options.title}`);
    if (options.transition) console.log(`Transition: ${options.transitionType ?? config.digest.transition}`);
    console.log();

    const spinner = ora("Building digest...").start();
    const result = await executeDigest({
      input: options.input,
      clips: options.clips,
      output: options.output ?? config.digest.output,
      comments: options.comments,
      numClips: options.numClips ?? config.digest.numClips,
      clipDuration: options.duration ?? config.highlight.clipDuration,
      padding: config.highlight.padding,
      mergeWindow: config.highlight.mergeWindow,
      title: options.title,
      withTransition: options.transition === true,
      transition: options.transitionType ?? config.digest.transition,
      transitionDuration: config.digest.transitionDuration,
      titleDuration: config.digest.titleDuration,
      width: config.digest.width,
      height: config.digest.height,
      fontSize: config.digest.fontSize,
      audio: config.audio,
      commentDetector: await commentDetectorOptions(config),
      tool: createMediaTool(config),
      logger: createSpinnerLogger(spinner, "digest"),
    });

    if (!result.success) {
      spinner.fail(chalk.red(result.error ?? "Digest failed"));
      printFailures(result.failures);
      process.exit(1);
    }

    spinner.succeed(chalk.green(`Digest built from ${result.clipCount} clips`));
    printFailures(result.failures);

    console.log();
    console.log(`Output: ${chalk.green(result.outputPath)}`);
    if (result.highlightDir) console.log(chalk.dim(`Highlights kept in: ${result.highlightDir}`));
    console.log();
  });
