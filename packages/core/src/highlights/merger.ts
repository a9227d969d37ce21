/**
 * @module highlights/merger
 *
 * Fuses audio and comment events into clusters. Events closer than the
 * merge window to the running cluster are absorbed: scores add up, sources
 * union, and the cluster timestamp moves to the midpoint of itself and the
 * absorbed event.
 *
 * The midpoint is a running mean, not a centroid: a long chain of absorbed
 * events drifts the marker toward its later members. Clip centring and the
 * timestamp index both depend on this placement.
 */

import {
  eventScore,
  eventSources,
  eventTimestamp,
  sortByScore,
  sortByTime,
  type EventSource,
  type HighlightEvent,
  type MergedEvent,
} from "./types.js";

export const DEFAULT_MERGE_WINDOW = 30;

/**
 * Merge both event streams. Deterministic for identical inputs; output is
 * sorted by score descending with ties in time order.
 */
export function mergeEvents(
  audioEvents: readonly HighlightEvent[],
  commentEvents: readonly HighlightEvent[],
  mergeWindow: number = DEFAULT_MERGE_WINDOW
): MergedEvent[] {
  const tagged = sortByTime([
    ...audioEvents.map((event) => withSource(event, "audio")),
    ...commentEvents.map((event) => withSource(event, "comment")),
  ]);

  const merged: MergedEvent[] = [];
  let current: MergedEvent | undefined;

  for (const event of tagged) {
    const timestamp = eventTimestamp(event);
    if (current && timestamp - current.timestamp < mergeWindow) {
      current.score += eventScore(event);
      for (const source of eventSources(event)) {
        if (!current.sources.includes(source)) current.sources.push(source);
      }
      current.timestamp = (current.timestamp + timestamp) / 2;
      current.members.push(event);
      continue;
    }

    current = {
      kind: "merged",
      primaryKind: event.kind,
      timestamp,
      score: eventScore(event),
      sources: eventSources(event),
      members: [event],
    };
    merged.push(current);
  }

  return sortByScore(merged);
}

function withSource(event: HighlightEvent, source: EventSource): HighlightEvent {
  return { ...event, sources: [source] };
}
