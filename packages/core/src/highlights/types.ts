/**
 * @module highlights/types
 * @description Event model for highlight detection.
 *
 * Detectors emit {@link HighlightEvent}s, one variant per kind. The merger
 * folds them into {@link MergedEvent}s, which the renderer turns into
 * {@link Clip}s. All time values are seconds from media start.
 */

/** Time value in seconds (floats allowed). */
export type TimeSeconds = number;

/** Channel an event was detected on. */
export type EventSource = "audio" | "comment";

interface EventBase {
  /** Position in the media, seconds from start */
  timestamp: TimeSeconds;
  /** Non-negative; additive when events merge */
  score: number;
  /** Channels that contributed to this event */
  sources: EventSource[];
}

/** Sound resumes after a silence (silence_end of the tight pass). */
export interface VolumePeakEvent extends EventBase {
  kind: "volume_peak";
}

/** Midpoint of a sustained non-quiet stretch between two silences. */
export interface LoudSegmentEvent extends EventBase {
  kind: "loud_segment";
  segmentStart: TimeSeconds;
  segmentEnd: TimeSeconds;
}

/** Comment bucket whose volume exceeds the mean by the threshold ratio. */
export interface CommentSpikeEvent extends EventBase {
  kind: "comment_spike";
  count: number;
  average: number;
}

/** Bucket where many distinct users commented. */
export interface UserReactionEvent extends EventBase {
  kind: "user_reaction";
  uniqueUsers: number;
}

/** Comment containing an excitement keyword. */
export interface KeywordHitEvent extends EventBase {
  kind: "keyword_hit";
  keyword: string;
  text: string;
}

export type AudioEvent = VolumePeakEvent | LoudSegmentEvent;
export type CommentEvent = CommentSpikeEvent | UserReactionEvent | KeywordHitEvent;

/** Any event produced by a detector. */
export type HighlightEvent = AudioEvent | CommentEvent;

export type HighlightEventKind = HighlightEvent["kind"];

/** A cluster of detector events fused by the merger. */
export interface MergedEvent extends EventBase {
  kind: "merged";
  /** Kind of the first event in the cluster */
  primaryKind: HighlightEventKind;
  /** Absorbed detector events, in time order */
  members: HighlightEvent[];
}

/** Anything that can be ranked and rendered. */
export type ScoredEvent = HighlightEvent | MergedEvent;

/** One chat/comment line. */
export interface CommentRecord {
  readonly time: TimeSeconds;
  readonly text: string;
  readonly user: string;
}

/** User id used when a comment has none. */
export const ANONYMOUS_USER = "anonymous";

/** A rendered clip file. */
export interface Clip {
  /** 1-based position in the ranking */
  index: number;
  start: TimeSeconds;
  duration: TimeSeconds;
  /** Event the clip was centred on */
  sourceEvent: ScoredEvent;
  outputPath: string;
}

/** Position of any event, seconds from media start. */
export function eventTimestamp(event: ScoredEvent): TimeSeconds {
  return event.timestamp;
}

export function eventScore(event: ScoredEvent): number {
  return event.score;
}

/** Contributing channels; a copy, so callers may extend it freely. */
export function eventSources(event: ScoredEvent): EventSource[] {
  return [...event.sources];
}

/**
 * Sort by score descending. Array.prototype.sort is stable, so events with
 * equal scores keep their incoming (temporal) order.
 */
export function sortByScore<T extends ScoredEvent>(events: readonly T[]): T[] {
  return [...events].sort((a, b) => eventScore(b) - eventScore(a));
}

/** Sort by timestamp ascending, stable. */
export function sortByTime<T extends ScoredEvent>(events: readonly T[]): T[] {
  return [...events].sort((a, b) => eventTimestamp(a) - eventTimestamp(b));
}
