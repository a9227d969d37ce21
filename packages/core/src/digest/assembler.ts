/**
 * @module digest/assembler
 *
 * Stitches highlight clips (and an optional title card) into one digest.
 *
 * Modes:
 *   concat      stream copy through a concat manifest (fast, default)
 *   transition  pairwise xfade/acrossfade folded left to right (re-encodes)
 *
 * Scratch files created here are always removed. Clip directories passed
 * in belong to the caller and are never touched.
 */

import { copyFile, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { extname, join, resolve } from "node:path";
import { DigestError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { MediaTool } from "../media/types.js";

export interface DigestOptions {
  /** Title card text; no card when omitted */
  title?: string;
  withTransition?: boolean;
  /** xfade transition name */
  transition?: string;
  /** Cross-fade length (s) */
  transitionDuration?: number;
  titleDuration?: number;
  width?: number;
  height?: number;
  fontSize?: number;
}

export const DEFAULT_DIGEST_OPTIONS = {
  transition: "fade",
  transitionDuration: 0.5,
  titleDuration: 3,
  width: 1920,
  height: 1080,
  fontSize: 72,
} as const;

/**
 * Build a concat demuxer manifest. Single quotes are escaped as `'\''`.
 */
export function buildConcatManifest(clipPaths: readonly string[]): string {
  return clipPaths.map((clip) => `file '${clip.replace(/'/g, "'\\''")}'\n`).join("");
}

/** Containers that take the title card's H.264/AAC streams. */
const TITLE_CARD_CONTAINERS = new Set([".mp4", ".m4v", ".mov", ".mkv", ".ts", ".flv"]);

/**
 * Title card extension: the first clip's, so a stream-copy concat sees one
 * container, or `.mp4` when that container cannot hold H.264/AAC.
 */
export function titleCardExtension(firstClip: string): string {
  const ext = extname(firstClip).toLowerCase();
  return TITLE_CARD_CONTAINERS.has(ext) ? ext : ".mp4";
}

export class DigestAssembler {
  constructor(
    private readonly tool: MediaTool,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Assemble `clips` into `outputPath`. Throws {@link DigestError} when there
   * are no clips; a title card alone is not a digest.
   */
  async assemble(clips: readonly string[], outputPath: string, options: DigestOptions = {}): Promise<string> {
    if (clips.length === 0) {
      throw new DigestError("No highlight clips to assemble", { outputPath });
    }

    const opts = resolveDigestOptions(options);
    const scratchDir = await mkdtemp(join(tmpdir(), "digest_"));

    try {
      const items = [...clips];

      if (options.title) {
        const cardPath = join(scratchDir, `title${titleCardExtension(clips[0])}`);
        await this.tool.titleCard(options.title, cardPath, {
          duration: opts.titleDuration,
          width: opts.width,
          height: opts.height,
          fontSize: opts.fontSize,
        });
        this.logger.info(`Title card: ${options.title}`);
        items.unshift(cardPath);
      }

      if (items.length === 1) {
        await copyFile(items[0], outputPath);
      } else if (options.withTransition) {
        await this.concatWithTransitions(items, outputPath, scratchDir, opts.transition, opts.transitionDuration);
      } else {
        const manifestPath = join(scratchDir, "concat.txt");
        await writeFile(manifestPath, buildConcatManifest(items.map((p) => resolve(p))), "utf-8");
        await this.tool.concat(manifestPath, outputPath);
      }

      this.logger.info(`Digest written: ${outputPath}`);
      return outputPath;
    } finally {
      await rm(scratchDir, { recursive: true, force: true });
    }
  }

  private async concatWithTransitions(
    items: readonly string[],
    outputPath: string,
    scratchDir: string,
    transition: string,
    transitionDuration: number
  ): Promise<void> {
    let current = items[0];

    for (let i = 1; i < items.length; i++) {
      const previousDuration = await this.tool.probeDuration(current);
      const next = join(scratchDir, `trans_${i}${extname(items[i]) || ".mp4"}`);

      this.logger.info(`Transition ${i}/${items.length - 1}`);
      await this.tool.crossfade(current, items[i], next, {
        transition,
        duration: transitionDuration,
        offset: Math.max(0, previousDuration - transitionDuration),
      });
      current = next;
    }

    await copyFile(current, outputPath);
  }
}

function resolveDigestOptions(options: DigestOptions) {
  const defaults = DEFAULT_DIGEST_OPTIONS;
  return {
    transition: options.transition ?? defaults.transition,
    transitionDuration: options.transitionDuration ?? defaults.transitionDuration,
    titleDuration: options.titleDuration ?? defaults.titleDuration,
    width: options.width ?? defaults.width,
    height: options.height ?? defaults.height,
    fontSize: options.fontSize ?? defaults.fontSize,
  };
}
