/**
 * @streamcut/core: highlight detection, scoring, clip rendering and
 * digest assembly for stream archives.
 */

export * from "./highlights/types.js";
export {
  AudioSignalDetector,
  DEFAULT_AUDIO_OPTIONS,
  LOUD_SEGMENT_SCORE,
  VOLUME_PEAK_SCORE,
  loudSegmentsFromSilence,
  volumePeaksFromSilence,
  type AudioDetectorOptions,
} from "./highlights/audio-detector.js";
export {
  CommentLogDetector,
  DEFAULT_COMMENT_OPTIONS,
  KEYWORD_HIT_SCORE,
  detectCommentSpikes,
  detectKeywords,
  detectUserReactions,
  type CommentDetectorOptions,
} from "./highlights/comment-detector.js";
export {
  detectCommentLogFormat,
  loadCommentLog,
  parseCSVCommentLog,
  parseJSONCommentLog,
  type CommentLogFormat,
} from "./highlights/comment-log.js";
export { DEFAULT_KEYWORDS_PATH, loadKeywords } from "./highlights/keywords.js";
export { DEFAULT_MERGE_WINDOW, mergeEvents } from "./highlights/merger.js";
export {
  ClipRenderer,
  DEFAULT_PADDING,
  clipFileName,
  computeClipWindow,
  type ClipFailure,
  type ClipWindow,
  type RenderResult,
} from "./highlights/renderer.js";
export {
  DEFAULT_TIMESTAMP_COUNT,
  TIMESTAMP_LIST_HEADER,
  formatTimestampLine,
  formatTimestampList,
  generateTimestampList,
} from "./highlights/timestamps.js";
export {
  DEFAULT_DIGEST_OPTIONS,
  DigestAssembler,
  buildConcatManifest,
  type DigestOptions,
} from "./digest/assembler.js";
export { FFmpegTool, escapeDrawtext, type FFmpegToolOptions } from "./media/ffmpeg.js";
export { parseIntegratedLoudness, parseProbeOutput, parseSilenceOutput } from "./media/diagnostics.js";
export type * from "./media/types.js";
export {
  DigestError,
  FormatError,
  InputNotFoundError,
  MediaToolError,
  StreamcutError,
  errorMessage,
} from "./errors.js";
export { silentLogger, type Logger } from "./logger.js";
export { formatDuration, formatTimestamp, parseTimestamp } from "./utils/time.js";
export { DEFAULT_EXEC_TIMEOUT_MS } from "./utils/exec-safe.js";
