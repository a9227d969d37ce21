import { describe, it, expect } from "vitest";
import { mergeEvents } from "./merger.js";
import { eventScore, eventSources, eventTimestamp } from "./types.js";
import type { AudioEvent, CommentEvent, KeywordHitEvent, MergedEvent, VolumePeakEvent } from "./types.js";

function peak(timestamp: number, score = 1): VolumePeakEvent {
  return { kind: "volume_peak", timestamp, score, sources: ["audio"] };
}

function keyword(timestamp: number): KeywordHitEvent {
  return { kind: "keyword_hit", timestamp, score: 0.5, sources: ["comment"], keyword: "草", text: "草" };
}

describe("mergeEvents", () => {
  it("returns nothing for empty input", () => {
    expect(mergeEvents([], [])).toEqual([]);
  });

  it("leaves well-separated audio events untouched when there are no comments", () => {
    const audio: AudioEvent[] = [peak(10, 1), peak(50, 2), peak(100, 1)];

    const merged = mergeEvents(audio, []);

    expect(merged.map((e) => [e.timestamp, e.score])).toEqual([
      [50, 2],
      [10, 1],
      [100, 1],
    ]);
    expect(merged.every((e) => e.members.length === 1)).toBe(true);
    expect(merged.every((e) => e.sources.join() === "audio")).toBe(true);
  });

  it("merges events just inside the window", () => {
    const merged = mergeEvents([peak(0)], [keyword(29.9)]);

    expect(merged).toHaveLength(1);
    expect(merged[0].timestamp).toBeCloseTo(14.95);
    expect(merged[0].score).toBe(1.5);
    expect(merged[0].sources).toEqual(["audio", "comment"]);
    expect(merged[0].primaryKind).toBe("volume_peak");
  });

  it("separates events just outside the window", () => {
    const merged = mergeEvents([peak(0)], [keyword(30.1)]);

    expect(merged).toHaveLength(2);
    expect(merged.map((e) => e.timestamp)).toEqual([0, 30.1]);
  });

  it("treats a gap equal to the window as separate", () => {
    expect(mergeEvents([peak(0), peak(30)], [])).toHaveLength(2);
  });

  it("moves the cluster marker by running mean", () => {
    // 0 -> 10 (absorbs 20) -> 22.5 (absorbs 35)
    const merged = mergeEvents([peak(0), peak(20), peak(35)], []);

    expect(merged).toHaveLength(1);
    expect(merged[0].timestamp).toBe(22.5);
    expect(merged[0].score).toBe(3);
    expect(merged[0].members.map((m) => m.timestamp)).toEqual([0, 20, 35]);
  });

  it("compares against the drifted marker, not the first event", () => {
    // 0 -> 10 after absorbing 20; 39 is 29 from the marker
    const merged = mergeEvents([peak(0), peak(20), peak(39)], []);
    expect(merged).toHaveLength(1);
  });

  it("does not depend on the input order within a stream", () => {
    const comments: CommentEvent[] = [keyword(200), keyword(5), keyword(90)];
    const forward = mergeEvents([peak(100), peak(0)], comments);
    const reversed = mergeEvents([peak(0), peak(100)], [...comments].reverse());

    expect(reversed).toEqual(forward);
  });

  it("clusters the same events whichever stream they arrive on", () => {
    const audio = [peak(0), peak(20), peak(100), peak(300)];
    const comments = [keyword(10), keyword(115), keyword(400)];
    const clusters = (merged: MergedEvent[]) =>
      merged
        .map((e) => ({ members: e.members.map((m) => m.timestamp), score: e.score }))
        .sort((a, b) => a.members[0] - b.members[0]);

    expect(clusters(mergeEvents(comments, audio))).toEqual(clusters(mergeEvents(audio, comments)));
    expect(clusters(mergeEvents(audio, comments))).toEqual([
      { members: [0, 10, 20], score: 2.5 },
      { members: [100, 115], score: 1.5 },
      { members: [300], score: 1 },
      { members: [400], score: 0.5 },
    ]);
  });

  it("puts audio first when timestamps tie", () => {
    const merged = mergeEvents([peak(60)], [keyword(60)]);

    expect(merged[0].primaryKind).toBe("volume_peak");
    expect(merged[0].sources).toEqual(["audio", "comment"]);
  });

  it("keeps time order among equal scores", () => {
    const merged = mergeEvents([peak(300), peak(100), peak(200)], []);
    expect(merged.map((e) => e.timestamp)).toEqual([100, 200, 300]);
  });

  it("retags sources by stream and leaves the input unchanged", () => {
    const mislabelled: VolumePeakEvent = { kind: "volume_peak", timestamp: 5, score: 1, sources: ["comment"] };

    const merged = mergeEvents([mislabelled], []);

    expect(merged[0].sources).toEqual(["audio"]);
    expect(mislabelled.sources).toEqual(["comment"]);
  });

  it("honours a custom window", () => {
    expect(mergeEvents([peak(0), peak(8)], [], 10)).toHaveLength(1);
    expect(mergeEvents([peak(0), peak(8)], [], 5)).toHaveLength(2);
  });
});

describe("event accessors", () => {
  it("read the shared fields of any variant", () => {
    const [merged] = mergeEvents([peak(40, 2)], [keyword(45)]);

    expect([eventTimestamp(merged), eventScore(merged), eventSources(merged)]).toEqual([42.5, 2.5, ["audio", "comment"]]);
    expect([eventTimestamp(keyword(7)), eventScore(keyword(7)), eventSources(keyword(7))]).toEqual([7, 0.5, ["comment"]]);
  });

  it("hand out a copy of the sources", () => {
    const event = peak(1);
    eventSources(event).push("comment");
    expect(event.sources).toEqual(["audio"]);
  });
});
