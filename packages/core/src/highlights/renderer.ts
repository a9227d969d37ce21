/**
 * @module highlights/renderer
 *
 * Cuts the top-ranked events out of the source media with stream copy.
 * A failed cut is reported and skipped; the batch carries on and only the
 * clips that were produced are returned.
 */

import { mkdir, rm } from "node:fs/promises";
import { extname, join } from "node:path";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { MediaTool } from "../media/types.js";
import { formatClipMarker } from "../utils/time.js";
import type { Clip, ScoredEvent } from "./types.js";

export const DEFAULT_PADDING = 5;

export interface ClipWindow {
  start: number;
  duration: number;
}

export interface ClipFailure {
  index: number;
  event: ScoredEvent;
  reason: string;
}

export interface RenderResult {
  clips: Clip[];
  failures: ClipFailure[];
  /** Number of clips attempted (min of numClips and events) */
  requested: number;
}

/**
 * Window of `clipDuration + 2 * padding` centred on the timestamp, clamped
 * so that `start >= 0` and `start + duration <= mediaDuration`.
 */
export function computeClipWindow(
  timestamp: number,
  clipDuration: number,
  padding: number,
  mediaDuration: number
): ClipWindow {
  const start = Math.max(0, timestamp - clipDuration / 2 - padding);
  const duration = Math.min(clipDuration + padding * 2, mediaDuration - start);
  return { start, duration };
}

/** `highlight_03_12m05s_score4.5.mp4` */
export function clipFileName(index: number, event: ScoredEvent, extension: string): string {
  const position = index.toString().padStart(2, "0");
  return `highlight_${position}_${formatClipMarker(event.timestamp)}_score${event.score.toFixed(1)}${extension}`;
}

export class ClipRenderer {
  constructor(
    private readonly tool: MediaTool,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Render clips for the first `numClips` events, which must already be
   * sorted by score. Returns only the successful clips.
   */
  async render(
    mediaPath: string,
    events: readonly ScoredEvent[],
    outputDir: string,
    numClips: number,
    clipDuration: number,
    padding: number = DEFAULT_PADDING
  ): Promise<Clip[]> {
    const { clips } = await this.renderDetailed(mediaPath, events, outputDir, numClips, clipDuration, padding);
    return clips;
  }

  /** Like {@link render}, but also reports each failure. */
  async renderDetailed(
    mediaPath: string,
    events: readonly ScoredEvent[],
    outputDir: string,
    numClips: number,
    clipDuration: number,
    padding: number = DEFAULT_PADDING
  ): Promise<RenderResult> {
    await mkdir(outputDir, { recursive: true });

    const mediaDuration = await this.tool.probeDuration(mediaPath);
    const extension = extname(mediaPath) || ".mp4";
    const selected = events.slice(0, Math.max(0, numClips));

    const clips: Clip[] = [];
    const failures: ClipFailure[] = [];

    for (let i = 0; i < selected.length; i++) {
      const event = selected[i];
      const index = i + 1;
      const window = computeClipWindow(event.timestamp, clipDuration, padding, mediaDuration);
      const outputPath = join(outputDir, clipFileName(index, event, extension));

      if (window.duration <= 0) {
        const reason = `event at ${event.timestamp.toFixed(1)}s is past the end of the media (${mediaDuration.toFixed(1)}s)`;
        this.logger.warn(`Clip ${index} skipped: ${reason}`);
        failures.push({ index, event, reason });
        continue;
      }

      try {
        await this.tool.cut(mediaPath, outputPath, window.start, window.duration);
      } catch (error) {
        const reason = errorMessage(error);
        this.logger.warn(`Clip ${index} at ${event.timestamp.toFixed(1)}s failed: ${reason}`);
        failures.push({ index, event, reason });
        await rm(outputPath, { force: true });
        continue;
      }

      this.logger.info(`Clip ${index}: ${outputPath}`);
      clips.push({
        index,
        start: window.start,
        duration: window.duration,
        sourceEvent: event,
        outputPath,
      });
    }

    return { clips, failures, requested: selected.length };
  }
}
