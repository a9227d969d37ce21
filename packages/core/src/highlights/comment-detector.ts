/**
 * @module highlights/comment-detector
 *
 * Statistical anomaly detection over a chat/comment log. Three independent
 * detectors each produce their own scored events:
 *
 * - spikes:    comment volume per 30 s bucket vs. the mean bucket
 * - reactions: distinct users per 10 s bucket
 * - keywords:  excitement markers in the comment text
 *
 * Each kind is capped (10 / 10 / 20) so one noisy signal cannot flood the
 * merge step with weak hits.
 */

import { loadCommentLog } from "./comment-log.js";
import { loadKeywords } from "./keywords.js";
import {
  sortByScore,
  type CommentEvent,
  type CommentRecord,
  type CommentSpikeEvent,
  type KeywordHitEvent,
  type UserReactionEvent,
} from "./types.js";

export interface CommentDetectorOptions {
  /** Spike bucket width (s) */
  spikeWindow: number;
  /** A bucket is a spike when count > mean * ratio */
  thresholdRatio: number;
  /** Reaction bucket width (s) */
  reactionWindow: number;
  /** Distinct users needed for a reaction */
  minUniqueUsers: number;
  /** Keyword vocabulary; the bundled list when omitted */
  keywords?: string[];
  maxSpikes: number;
  maxReactions: number;
  maxKeywordHits: number;
}

export const DEFAULT_COMMENT_OPTIONS: CommentDetectorOptions = {
  spikeWindow: 30,
  thresholdRatio: 2.0,
  reactionWindow: 10,
  minUniqueUsers: 5,
  maxSpikes: 10,
  maxReactions: 10,
  maxKeywordHits: 20,
};

export const KEYWORD_HIT_SCORE = 0.5;

export class CommentLogDetector {
  private readonly options: CommentDetectorOptions;

  constructor(options: Partial<CommentDetectorOptions> = {}) {
    this.options = { ...DEFAULT_COMMENT_OPTIONS, ...options };
  }

  /** Parse a `.json` or `.csv` comment log. Throws FormatError. */
  load(logPath: string): Promise<CommentRecord[]> {
    return loadCommentLog(logPath);
  }

  /**
   * Load a comment log and detect events, sorted by score descending.
   * Throws FormatError for unsupported or malformed logs.
   */
  async detect(logPath: string): Promise<CommentEvent[]> {
    const comments = await this.load(logPath);
    const keywords = this.options.keywords ?? (await loadKeywords());
    return this.detectInComments(comments, keywords);
  }

  detectInComments(comments: readonly CommentRecord[], keywords: readonly string[]): CommentEvent[] {
    const { options } = this;

    const spikes = detectCommentSpikes(comments, options.spikeWindow, options.thresholdRatio);
    const reactions = detectUserReactions(comments, options.reactionWindow, options.minUniqueUsers);
    const hits = detectKeywords(comments, keywords);

    return sortByScore<CommentEvent>([
      ...spikes.slice(0, options.maxSpikes),
      ...reactions.slice(0, options.maxReactions),
      ...hits.slice(0, options.maxKeywordHits),
    ]);
  }
}

/** Group by `floor(time / window)`, keeping first-seen bucket order. */
function bucketize<T>(
  comments: readonly CommentRecord[],
  window: number,
  init: () => T,
  add: (acc: T, comment: CommentRecord) => void
): Map<number, T> {
  const buckets = new Map<number, T>();
  for (const comment of comments) {
    const key = Math.floor(comment.time / window);
    let acc = buckets.get(key);
    if (acc === undefined) {
      acc = init();
      buckets.set(key, acc);
    }
    add(acc, comment);
  }
  return buckets;
}

/**
 * Buckets whose comment count exceeds `mean * thresholdRatio`. The mean is
 * taken over non-empty buckets. Sorted by score (count / mean) descending.
 */
export function detectCommentSpikes(
  comments: readonly CommentRecord[],
  window = DEFAULT_COMMENT_OPTIONS.spikeWindow,
  thresholdRatio = DEFAULT_COMMENT_OPTIONS.thresholdRatio
): CommentSpikeEvent[] {
  if (comments.length === 0) return [];

  const counts = bucketize(comments, window, () => ({ count: 0 }), (acc) => {
    acc.count++;
  });

  const average = comments.length / counts.size;
  const spikes: CommentSpikeEvent[] = [];

  for (const [bucket, { count }] of counts) {
    if (count > average * thresholdRatio) {
      spikes.push({
        kind: "comment_spike",
        timestamp: bucket * window + window / 2,
        score: count / average,
        sources: ["comment"],
        count,
        average,
      });
    }
  }

  return sortByScore(spikes);
}

/**
 * One hit per comment: the first keyword (list order) contained in the
 * text, case-insensitive. Returned in comment order.
 */
export function detectKeywords(
  comments: readonly CommentRecord[],
  keywords: readonly string[]
): KeywordHitEvent[] {
  const needles = keywords.map((keyword) => ({ keyword, lower: keyword.toLowerCase() }));
  const hits: KeywordHitEvent[] = [];

  for (const comment of comments) {
    const text = comment.text.toLowerCase();
    const match = needles.find((n) => text.includes(n.lower));
    if (match) {
      hits.push({
        kind: "keyword_hit",
        timestamp: comment.time,
        score: KEYWORD_HIT_SCORE,
        sources: ["comment"],
        keyword: match.keyword,
        text: comment.text,
      });
    }
  }

  return hits;
}

/**
 * Buckets where at least `minUniqueUsers` distinct users commented.
 * Many people reacting counts, one person spamming does not.
 */
export function detectUserReactions(
  comments: readonly CommentRecord[],
  window = DEFAULT_COMMENT_OPTIONS.reactionWindow,
  minUniqueUsers = DEFAULT_COMMENT_OPTIONS.minUniqueUsers
): UserReactionEvent[] {
  if (comments.length === 0) return [];

  const users = bucketize(comments, window, () => new Set<string>(), (acc, comment) => {
    acc.add(comment.user);
  });

  const reactions: UserReactionEvent[] = [];
  for (const [bucket, set] of users) {
    if (set.size >= minUniqueUsers) {
      reactions.push({
        kind: "user_reaction",
        timestamp: bucket * window + window / 2,
        score: set.size / minUniqueUsers,
        sources: ["comment"],
        uniqueUsers: set.size,
      });
    }
  }

  return sortByScore(reactions);
}
