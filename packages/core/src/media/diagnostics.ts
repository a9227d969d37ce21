/**
 * Parsers for ffmpeg/ffprobe diagnostic output.
 *
 * ffmpeg reports filter results (silencedetect, ebur128) as free text on
 * stderr. These functions turn that text into typed records.
 */

import type { MediaInfo, SilenceInterval } from "./types.js";

const SILENCE_START = /silence_start:\s*(-?\d+(?:\.\d+)?(?:e-?\d+)?)/;
const SILENCE_END = /silence_end:\s*(-?\d+(?:\.\d+)?(?:e-?\d+)?)(?:\s*\|\s*silence_duration:\s*(\d+(?:\.\d+)?))?/;

/**
 * Parse silencedetect output into intervals, in report order.
 *
 * [silencedetect @ 0x...] silence_start: 12.5
 * [silencedetect @ 0x...] silence_end: 14.75 | silence_duration: 2.25
 *
 * Negative starts (ffmpeg reports e.g. -0.0013 at file start) clamp to 0.
 */
export function parseSilenceOutput(output: string): SilenceInterval[] {
  const intervals: SilenceInterval[] = [];

  for (const line of output.split(/\r?\n/)) {
    const startMatch = line.match(SILENCE_START);
    if (startMatch) {
      intervals.push({ start: Math.max(0, parseFloat(startMatch[1])) });
      continue;
    }

    const endMatch = line.match(SILENCE_END);
    if (endMatch) {
      const end = parseFloat(endMatch[1]);
      const duration = endMatch[2] !== undefined ? parseFloat(endMatch[2]) : undefined;
      const open = intervals[intervals.length - 1];

      if (open && open.end === undefined) {
        open.end = end;
        open.duration = duration ?? end - open.start;
      } else {
        // End without a reported start
        intervals.push({ start: Math.max(0, end - (duration ?? 0)), end, duration });
      }
    }
  }

  return intervals;
}

/**
 * Extract the integrated loudness (LUFS) from ebur128 summary output.
 *
 *   Integrated loudness:
 *     I:         -23.5 LUFS
 *
 * Returns null when there is no summary or the value is -inf (no audio).
 */
export function parseIntegratedLoudness(output: string): number | null {
  const match = output.match(/Integrated loudness:\s*(?:I:\s*)?(-?inf|-?\d+(?:\.\d+)?)\s*LUFS/);
  if (!match) return null;

  const value = parseFloat(match[1]);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse `ffprobe -print_format json -show_format -show_streams` output.
 */
export function parseProbeOutput(path: string, output: string): MediaInfo {
  const data: unknown = JSON.parse(output);
  const format = isRecord(data) && isRecord(data.format) ? data.format : {};
  const streams = isRecord(data) && Array.isArray(data.streams) ? data.streams.filter(isRecord) : [];

  const info: MediaInfo = {
    path,
    duration: toNumber(format.duration),
    size: toNumber(format.size),
    bitRate: toNumber(format.bit_rate),
  };

  const video = streams.find((s) => s.codec_type === "video");
  if (video) {
    info.width = toOptionalNumber(video.width);
    info.height = toOptionalNumber(video.height);
    info.codec = typeof video.codec_name === "string" ? video.codec_name : undefined;
    info.fps = parseFrameRate(video.r_frame_rate);
  }

  const audio = streams.find((s) => s.codec_type === "audio");
  if (audio) {
    info.audioCodec = typeof audio.codec_name === "string" ? audio.codec_name : undefined;
    info.sampleRate = toOptionalNumber(audio.sample_rate);
  }

  return info;
}

/** `30000/1001` -> 29.97 */
export function parseFrameRate(value: unknown): number | undefined {
  if (typeof value !== "string") return undefined;
  const parts = value.split("/").map(Number);
  const num = parts[0];
  if (!Number.isFinite(num)) return undefined;
  if (parts.length === 1) return num;
  const den = parts[1];
  if (!Number.isFinite(den) || den === 0) return undefined;
  return num / den;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number {
  return toOptionalNumber(value) ?? 0;
}

function toOptionalNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}
