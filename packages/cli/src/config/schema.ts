/**
 * Configuration schema for the streamcut CLI
 * Stored at ~/.streamcut/config.yaml
 */

import {
  DEFAULT_AUDIO_OPTIONS,
  DEFAULT_COMMENT_OPTIONS,
  DEFAULT_DIGEST_OPTIONS,
  DEFAULT_EXEC_TIMEOUT_MS,
  DEFAULT_MERGE_WINDOW,
  DEFAULT_PADDING,
  DEFAULT_TIMESTAMP_COUNT,
} from "@streamcut/core";

export interface StreamcutConfig {
  /** Config file version */
  version: string;

  /** Media tool binaries */
  ffmpeg: {
    ffmpegPath: string;
    ffprobePath: string;
    /** Bound for a single ffmpeg/ffprobe run */
    timeoutSeconds: number;
  };

  /** Highlight extraction defaults */
  highlight: {
    outputDir: string;
    numClips: number;
    /** Seconds per clip, before padding */
    clipDuration: number;
    padding: number;
    mergeWindow: number;
    /** Entries in timestamps.txt */
    timestampCount: number;
  };

  /** Audio detector thresholds */
  audio: {
    peakNoiseDb: number;
    peakMinSilence: number;
    loudNoiseDb: number;
    loudMinSilence: number;
    minLoudDuration: number;
  };

  /** Comment detector settings */
  comments: {
    spikeWindow: number;
    thresholdRatio: number;
    reactionWindow: number;
    minUniqueUsers: number;
    /** Keyword file (.json or one per line); bundled list when unset */
    keywordsFile?: string;
    /** Inline keywords, take precedence over keywordsFile */
    keywords?: string[];
  };

  /** Digest defaults */
  digest: {
    output: string;
    numClips: number;
    titleDuration: number;
    width: number;
    height: number;
    fontSize: number;
    transition: string;
    transitionDuration: number;
  };
}

/** Environment variables that override config values */
export const ENV_OVERRIDES = {
  ffmpegPath: "STREAMCUT_FFMPEG_PATH",
  ffprobePath: "STREAMCUT_FFPROBE_PATH",
} as const;

/** Default configuration */
export function createDefaultConfig(): StreamcutConfig {
  return {
    version: "1.0.0",
    ffmpeg: {
      ffmpegPath: "ffmpeg",
      ffprobePath: "ffprobe",
      timeoutSeconds: DEFAULT_EXEC_TIMEOUT_MS / 1000,
    },
    highlight: {
      outputDir: "./highlights",
      numClips: 5,
      clipDuration: 60,
      padding: DEFAULT_PADDING,
      mergeWindow: DEFAULT_MERGE_WINDOW,
      timestampCount: DEFAULT_TIMESTAMP_COUNT,
    },
    audio: { ...DEFAULT_AUDIO_OPTIONS },
    comments: {
      spikeWindow: DEFAULT_COMMENT_OPTIONS.spikeWindow,
      thresholdRatio: DEFAULT_COMMENT_OPTIONS.thresholdRatio,
      reactionWindow: DEFAULT_COMMENT_OPTIONS.reactionWindow,
      minUniqueUsers: DEFAULT_COMMENT_OPTIONS.minUniqueUsers,
    },
    digest: {
      output: "./digest.mp4",
      numClips: 10,
      titleDuration: DEFAULT_DIGEST_OPTIONS.titleDuration,
      width: DEFAULT_DIGEST_OPTIONS.width,
      height: DEFAULT_DIGEST_OPTIONS.height,
      fontSize: DEFAULT_DIGEST_OPTIONS.fontSize,
      transition: DEFAULT_DIGEST_OPTIONS.transition,
      transitionDuration: DEFAULT_DIGEST_OPTIONS.transitionDuration,
    },
  };
}

/**
 * Overlay a parsed YAML document on the defaults, section by section.
 * Values of the wrong type fall back to the default, as do sizes,
 * windows and counts that are not positive.
 */
export function normalizeConfig(raw: unknown): StreamcutConfig {
  const defaults = createDefaultConfig();
  const root = asRecord(raw);

  const ffmpeg = asRecord(root.ffmpeg);
  const highlight = asRecord(root.highlight);
  const audio = asRecord(root.audio);
  const comments = asRecord(root.comments);
  const digest = asRecord(root.digest);

  const config: StreamcutConfig = {
    version: str(root.version, defaults.version),
    ffmpeg: {
      ffmpegPath: str(ffmpeg.ffmpegPath, defaults.ffmpeg.ffmpegPath),
      ffprobePath: str(ffmpeg.ffprobePath, defaults.ffmpeg.ffprobePath),
      timeoutSeconds: positive(ffmpeg.timeoutSeconds, defaults.ffmpeg.timeoutSeconds),
    },
    highlight: {
      outputDir: str(highlight.outputDir, defaults.highlight.outputDir),
      numClips: positive(highlight.numClips, defaults.highlight.numClips),
      clipDuration: positive(highlight.clipDuration, defaults.highlight.clipDuration),
      padding: nonNegative(highlight.padding, defaults.highlight.padding),
      mergeWindow: positive(highlight.mergeWindow, defaults.highlight.mergeWindow),
      timestampCount: positive(highlight.timestampCount, defaults.highlight.timestampCount),
    },
    audio: {
      peakNoiseDb: num(audio.peakNoiseDb, defaults.audio.peakNoiseDb),
      peakMinSilence: positive(audio.peakMinSilence, defaults.audio.peakMinSilence),
      loudNoiseDb: num(audio.loudNoiseDb, defaults.audio.loudNoiseDb),
      loudMinSilence: positive(audio.loudMinSilence, defaults.audio.loudMinSilence),
      minLoudDuration: num(audio.minLoudDuration, defaults.audio.minLoudDuration),
    },
    comments: {
      spikeWindow: positive(comments.spikeWindow, defaults.comments.spikeWindow),
      thresholdRatio: positive(comments.thresholdRatio, defaults.comments.thresholdRatio),
      reactionWindow: positive(comments.reactionWindow, defaults.comments.reactionWindow),
      minUniqueUsers: positive(comments.minUniqueUsers, defaults.comments.minUniqueUsers),
    },
    digest: {
      output: str(digest.output, defaults.digest.output),
      numClips: positive(digest.numClips, defaults.digest.numClips),
      titleDuration: positive(digest.titleDuration, defaults.digest.titleDuration),
      width: positive(digest.width, defaults.digest.width),
      height: positive(digest.height, defaults.digest.height),
      fontSize: positive(digest.fontSize, defaults.digest.fontSize),
      transition: str(digest.transition, defaults.digest.transition),
      transitionDuration: positive(digest.transitionDuration, defaults.digest.transitionDuration),
    },
  };

  if (typeof comments.keywordsFile === "string" && comments.keywordsFile !== "") {
    config.comments.keywordsFile = comments.keywordsFile;
  }
  if (Array.isArray(comments.keywords)) {
    config.comments.keywords = comments.keywords.filter((k): k is string => typeof k === "string" && k.trim() !== "");
  }

  return config;
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function str(value: unknown, fallback: string): string {
  return typeof value === "string" && value !== "" ? value : fallback;
}

function num(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function positive(value: unknown, fallback: number): number {
  const n = num(value, fallback);
  return n > 0 ? n : fallback;
}

function nonNegative(value: unknown, fallback: number): number {
  const n = num(value, fallback);
  return n >= 0 ? n : fallback;
}
