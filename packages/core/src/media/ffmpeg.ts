import { MediaToolError } from "../errors.js";
import { DEFAULT_EXEC_TIMEOUT_MS, ExecError, execSafe, type ExecResult } from "../utils/exec-safe.js";
import { parseIntegratedLoudness, parseProbeOutput, parseSilenceOutput } from "./diagnostics.js";
import type {
  MediaInfo,
  MediaTool,
  SilenceOptions,
  SilenceReport,
  TitleCardOptions,
  TransitionOptions,
} from "./types.js";

export interface FFmpegToolOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  /** Per-invocation bound in milliseconds */
  timeoutMs?: number;
}

/**
 * {@link MediaTool} backed by the ffmpeg and ffprobe binaries.
 * Every call runs without a shell and with a timeout; any failure surfaces
 * as a {@link MediaToolError}.
 */
export class FFmpegTool implements MediaTool {
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;
  private readonly timeoutMs: number;

  constructor(options: FFmpegToolOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.ffprobePath = options.ffprobePath ?? "ffprobe";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EXEC_TIMEOUT_MS;
  }

  async extractAudio(inputPath: string, outputPath: string): Promise<void> {
    await this.ffmpeg("extract audio", [
      "-y", "-i", inputPath,
      "-vn", "-acodec", "pcm_s16le", "-ar", "16000", "-ac", "1",
      outputPath,
    ]);
  }

  async detectSilence(inputPath: string, options: SilenceOptions): Promise<SilenceReport> {
    const { stderr } = await this.ffmpeg("silence detection", [
      "-hide_banner", "-nostats",
      "-i", inputPath,
      "-af", `silencedetect=noise=${options.noiseDb}dB:d=${options.minDuration}`,
      "-f", "null", "-",
    ]);
    return { intervals: parseSilenceOutput(stderr) };
  }

  async measureLoudness(inputPath: string): Promise<number | null> {
    const { stderr } = await this.ffmpeg("loudness analysis", [
      "-hide_banner", "-nostats",
      "-i", inputPath,
      "-af", "ebur128=peak=true",
      "-f", "null", "-",
    ]);
    return parseIntegratedLoudness(stderr);
  }

  async probe(inputPath: string): Promise<MediaInfo> {
    const { stdout } = await this.run("probe", this.ffprobePath, [
      "-v", "quiet",
      "-print_format", "json",
      "-show_format", "-show_streams",
      inputPath,
    ]);
    try {
      return parseProbeOutput(inputPath, stdout);
    } catch (error) {
      throw new MediaToolError("probe", `unreadable ffprobe output for ${inputPath}`, {
        stderr: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async probeDuration(inputPath: string): Promise<number> {
    const { stdout } = await this.run("duration probe", this.ffprobePath, [
      "-v", "error",
      "-show_entries", "format=duration",
      "-of", "default=noprint_wrappers=1:nokey=1",
      inputPath,
    ]);
    const duration = parseFloat(stdout.trim());
    if (isNaN(duration)) {
      throw new MediaToolError("duration probe", `invalid duration: ${stdout.trim()}`);
    }
    return duration;
  }

  async cut(inputPath: string, outputPath: string, start: number, duration: number): Promise<void> {
    await this.ffmpeg("cut", [
      "-y",
      "-ss", String(start),
      "-i", inputPath,
      "-t", String(duration),
      "-c", "copy",
      outputPath,
    ]);
  }

  async crossfade(
    firstPath: string,
    secondPath: string,
    outputPath: string,
    options: TransitionOptions
  ): Promise<void> {
    const filter =
      `[0:v][1:v]xfade=transition=${options.transition}:duration=${options.duration}:offset=${options.offset}[v];` +
      `[0:a][1:a]acrossfade=d=${options.duration}[a]`;

    await this.ffmpeg("transition", [
      "-y",
      "-i", firstPath,
      "-i", secondPath,
      "-filter_complex", filter,
      "-map", "[v]", "-map", "[a]",
      outputPath,
    ]);
  }

  async titleCard(text: string, outputPath: string, options: TitleCardOptions): Promise<void> {
    const { duration, width, height, fontSize } = options;
    await this.ffmpeg("title card", [
      "-y",
      "-f", "lavfi", "-i", `color=c=black:s=${width}x${height}:d=${duration}`,
      "-f", "lavfi", "-i", `anullsrc=channel_layout=stereo:sample_rate=44100:d=${duration}`,
      "-vf",
      `drawtext=text='${escapeDrawtext(text)}':fontcolor=white:fontsize=${fontSize}:x=(w-text_w)/2:y=(h-text_h)/2`,
      "-c:v", "libx264", "-preset", "fast",
      "-c:a", "aac",
      "-shortest",
      outputPath,
    ]);
  }

  async concat(manifestPath: string, outputPath: string): Promise<void> {
    await this.ffmpeg("concat", [
      "-y",
      "-f", "concat", "-safe", "0",
      "-i", manifestPath,
      "-c", "copy",
      outputPath,
    ]);
  }

  private ffmpeg(operation: string, args: string[]): Promise<ExecResult> {
    return this.run(operation, this.ffmpegPath, args);
  }

  private async run(operation: string, cmd: string, args: string[]): Promise<ExecResult> {
    try {
      return await execSafe(cmd, args, { timeout: this.timeoutMs });
    } catch (error) {
      if (error instanceof ExecError) {
        const reason = error.timedOut
          ? `timed out after ${Math.round(this.timeoutMs / 1000)}s`
          : lastLine(error.stderr) || error.message;
        throw new MediaToolError(operation, reason, {
          exitCode: error.exitCode,
          stderr: error.stderr,
          timedOut: error.timedOut,
        });
      }
      throw error;
    }
  }
}

/** Escape text for ffmpeg's drawtext filter inside single quotes */
export function escapeDrawtext(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/'/g, "\\'").replace(/:/g, "\\:");
}

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  return lines[lines.length - 1]?.trim() ?? "";
}
