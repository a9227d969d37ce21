/**
 * @module highlights/audio-detector
 *
 * Loudness-based event detection. Runs two silence-detection passes at
 * different sensitivities over an extracted mono PCM track:
 *
 *   tight pass  (-20 dB, 0.5 s)  every silence end   -> volume_peak  (1.0)
 *   loose pass  (-30 dB, 2 s)    gaps between quiet  -> loud_segment (2.0)
 *
 * A failing pass contributes no events; a failing extraction makes the
 * whole detector return nothing.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, extname, join } from "node:path";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { MediaTool, SilenceInterval } from "../media/types.js";
import { sortByTime, type AudioEvent, type LoudSegmentEvent, type VolumePeakEvent } from "./types.js";

export interface AudioDetectorOptions {
  /** Noise floor of the volume-peak pass (dB) */
  peakNoiseDb: number;
  /** Minimum silence of the volume-peak pass (s) */
  peakMinSilence: number;
  /** Noise floor of the loud-segment pass (dB) */
  loudNoiseDb: number;
  /** Minimum silence of the loud-segment pass (s) */
  loudMinSilence: number;
  /** Gaps shorter than this are not loud segments (s) */
  minLoudDuration: number;
}

export const DEFAULT_AUDIO_OPTIONS: AudioDetectorOptions = {
  peakNoiseDb: -20,
  peakMinSilence: 0.5,
  loudNoiseDb: -30,
  loudMinSilence: 2,
  minLoudDuration: 1,
};

export const VOLUME_PEAK_SCORE = 1.0;
export const LOUD_SEGMENT_SCORE = 2.0;

export class AudioSignalDetector {
  private readonly options: AudioDetectorOptions;

  constructor(
    private readonly tool: MediaTool,
    options: Partial<AudioDetectorOptions> = {},
    private readonly logger: Logger = silentLogger
  ) {
    this.options = { ...DEFAULT_AUDIO_OPTIONS, ...options };
  }

  /**
   * Detect audio events in a media file, sorted by timestamp ascending.
   */
  async detect(mediaPath: string): Promise<AudioEvent[]> {
    const workDir = await mkdtemp(join(tmpdir(), "streamcut-audio-"));
    const audioPath = join(workDir, `${basename(mediaPath, extname(mediaPath))}.wav`);

    try {
      try {
        await this.tool.extractAudio(mediaPath, audioPath);
      } catch (error) {
        this.logger.warn(`Audio extraction failed, continuing without audio events: ${errorMessage(error)}`);
        return [];
      }

      const peaks = await this.detectVolumePeaks(audioPath);
      const loud = await this.detectLoudSegments(audioPath);

      return sortByTime<AudioEvent>([...peaks, ...loud]);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  async detectVolumePeaks(audioPath: string): Promise<VolumePeakEvent[]> {
    try {
      const report = await this.tool.detectSilence(audioPath, {
        noiseDb: this.options.peakNoiseDb,
        minDuration: this.options.peakMinSilence,
      });
      return volumePeaksFromSilence(report.intervals);
    } catch (error) {
      this.logger.warn(`Volume peak pass failed: ${errorMessage(error)}`);
      return [];
    }
  }

  async detectLoudSegments(audioPath: string): Promise<LoudSegmentEvent[]> {
    try {
      const loudness = await this.tool.measureLoudness(audioPath);
      if (loudness === null) {
        this.logger.debug?.("No loudness summary, skipping loud segments");
        return [];
      }

      const report = await this.tool.detectSilence(audioPath, {
        noiseDb: this.options.loudNoiseDb,
        minDuration: this.options.loudMinSilence,
      });
      return loudSegmentsFromSilence(report.intervals, this.options.minLoudDuration);
    } catch (error) {
      this.logger.warn(`Loud segment pass failed: ${errorMessage(error)}`);
      return [];
    }
  }
}

/** Each silence end marks sound resuming. */
export function volumePeaksFromSilence(intervals: SilenceInterval[]): VolumePeakEvent[] {
  const peaks: VolumePeakEvent[] = [];
  for (const interval of intervals) {
    if (interval.end === undefined) continue;
    peaks.push({
      kind: "volume_peak",
      timestamp: interval.end,
      score: VOLUME_PEAK_SCORE,
      sources: ["audio"],
    });
  }
  return peaks;
}

/**
 * The stretches between silences are the loud parts. Walks silence starts
 * from t=0; a stretch after the final silence is not reported.
 */
export function loudSegmentsFromSilence(
  intervals: SilenceInterval[],
  minDuration: number
): LoudSegmentEvent[] {
  const segments: LoudSegmentEvent[] = [];
  let prevEnd = 0;

  for (const interval of intervals) {
    const gap = interval.start - prevEnd;
    if (gap > minDuration) {
      segments.push({
        kind: "loud_segment",
        timestamp: prevEnd + gap / 2,
        score: LOUD_SEGMENT_SCORE,
        sources: ["audio"],
        segmentStart: prevEnd,
        segmentEnd: interval.start,
      });
    }
    if (interval.end !== undefined) {
      prevEnd = interval.end;
    }
  }

  return segments;
}
