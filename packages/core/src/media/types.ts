/**
 * Contract for the external media-processing service.
 *
 * The engine never shells out directly; everything goes through a
 * {@link MediaTool}. The ffmpeg backend parses diagnostic text into these
 * typed records, so a structured backend can replace it without touching
 * the detectors.
 */

/** A silence interval reported by a silence-detection pass. */
export interface SilenceInterval {
  start: number;
  /** Absent when the media ends while still silent */
  end?: number;
  duration?: number;
}

export interface SilenceReport {
  intervals: SilenceInterval[];
}

export interface SilenceOptions {
  /** Noise floor in dB, e.g. -20 */
  noiseDb: number;
  /** Minimum silence duration in seconds */
  minDuration: number;
}

export interface MediaInfo {
  path: string;
  duration: number;
  size: number;
  bitRate: number;
  width?: number;
  height?: number;
  codec?: string;
  fps?: number;
  audioCodec?: string;
  sampleRate?: number;
}

export interface TransitionOptions {
  /** xfade transition name: fade, wipeleft, circleclose, ... */
  transition: string;
  /** Seconds of overlap */
  duration: number;
  /** Offset into the first clip where the transition starts */
  offset: number;
}

export interface TitleCardOptions {
  duration: number;
  width: number;
  height: number;
  fontSize: number;
}

export interface MediaTool {
  /** Extract mono 16 kHz 16-bit PCM into a WAV file */
  extractAudio(inputPath: string, outputPath: string): Promise<void>;
  /** Run a silence-detection pass */
  detectSilence(inputPath: string, options: SilenceOptions): Promise<SilenceReport>;
  /** Integrated loudness (LUFS), or null when no summary is available */
  measureLoudness(inputPath: string): Promise<number | null>;
  /** Format/stream probe */
  probe(inputPath: string): Promise<MediaInfo>;
  /** Container duration in seconds */
  probeDuration(inputPath: string): Promise<number>;
  /** Stream-copy a time window */
  cut(inputPath: string, outputPath: string, start: number, duration: number): Promise<void>;
  /** Re-encode two clips with a cross-fade between them */
  crossfade(firstPath: string, secondPath: string, outputPath: string, options: TransitionOptions): Promise<void>;
  /** Solid background, centred text, silent audio */
  titleCard(text: string, outputPath: string, options: TitleCardOptions): Promise<void>;
  /** Stream-copy concat of the files listed in a concat manifest */
  concat(manifestPath: string, outputPath: string): Promise<void>;
}
