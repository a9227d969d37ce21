/**
 * Plain-text highlight index, ready to paste into a video description.
 *
 * # ハイライトタイムスタンプ
 *
 * 12:05 - ハイライト1 (score: 4.5, audio+comment)
 * 1:02:40 - ハイライト2 (score: 3.0, comment)
 */

import { writeFile } from "node:fs/promises";
import { formatTimestamp } from "../utils/time.js";
import type { ScoredEvent } from "./types.js";

export const TIMESTAMP_LIST_HEADER = "# ハイライトタイムスタンプ";
export const DEFAULT_TIMESTAMP_COUNT = 20;

export function formatTimestampLine(event: ScoredEvent, position: number): string {
  const sources = event.sources.length > 0 ? event.sources.join("+") : "unknown";
  return `${formatTimestamp(event.timestamp)} - ハイライト${position} (score: ${event.score.toFixed(1)}, ${sources})`;
}

export function formatTimestampList(
  events: readonly ScoredEvent[],
  numEvents: number = DEFAULT_TIMESTAMP_COUNT
): string {
  const lines = events.slice(0, numEvents).map((event, i) => formatTimestampLine(event, i + 1));
  return [`${TIMESTAMP_LIST_HEADER}\n`, ...lines].join("\n");
}

export async function generateTimestampList(
  events: readonly ScoredEvent[],
  outputPath: string,
  numEvents: number = DEFAULT_TIMESTAMP_COUNT
): Promise<string> {
  await writeFile(outputPath, formatTimestampList(events, numEvents), "utf-8");
  return outputPath;
}
