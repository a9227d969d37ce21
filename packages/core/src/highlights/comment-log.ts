/**
 * Comment log loading.
 *
 * Supported formats:
 * - JSON: [{"time": 123.4, "text": "草", "user": "viewer1"}, ...]
 * - CSV:  header row with time,text[,user]
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { FormatError } from "../errors.js";
import { parseCSVRecords } from "./csv.js";
import { ANONYMOUS_USER, type CommentRecord } from "./types.js";

export type CommentLogFormat = "json" | "csv";

/**
 * Detect the log format from the file extension (case-insensitive).
 * Throws {@link FormatError} for anything but .json and .csv.
 */
export function detectCommentLogFormat(logPath: string): CommentLogFormat {
  const ext = extname(logPath).toLowerCase();
  if (ext === ".json") return "json";
  if (ext === ".csv") return "csv";
  throw new FormatError(logPath, `Unsupported comment log format "${ext || "(none)"}"`);
}

export async function loadCommentLog(logPath: string): Promise<CommentRecord[]> {
  const format = detectCommentLogFormat(logPath);
  const content = await readFile(logPath, "utf-8");
  return format === "json" ? parseJSONCommentLog(content, logPath) : parseCSVCommentLog(content, logPath);
}

export function parseJSONCommentLog(content: string, logPath = "<json>"): CommentRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new FormatError(logPath, `Invalid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  if (!Array.isArray(data)) {
    throw new FormatError(logPath, "Comment log must be a JSON array");
  }

  return data.map((item: unknown, index) => {
    if (typeof item !== "object" || item === null) {
      throw new FormatError(logPath, `Comment #${index + 1} is not an object`);
    }
    const time = toTime(Reflect.get(item, "time"));
    if (time === null) {
      throw new FormatError(logPath, `Comment #${index + 1} has no numeric "time"`);
    }
    return makeRecord(time, Reflect.get(item, "text"), Reflect.get(item, "user"));
  });
}

export function parseCSVCommentLog(content: string, logPath = "<csv>"): CommentRecord[] {
  const { header, records } = parseCSVRecords(content);

  for (const column of ["time", "text"]) {
    if (!header.includes(column)) {
      throw new FormatError(logPath, `CSV header is missing the "${column}" column`);
    }
  }

  return records.map((row, index) => {
    const time = toTime(row.time);
    if (time === null) {
      throw new FormatError(logPath, `Row ${index + 2} has an invalid time "${row.time}"`);
    }
    return makeRecord(time, row.text, row.user);
  });
}

function makeRecord(time: number, text: unknown, user: unknown): CommentRecord {
  return Object.freeze({
    time,
    text: typeof text === "string" ? text : text === undefined || text === null ? "" : String(text),
    user: typeof user === "string" && user !== "" ? user : typeof user === "number" ? String(user) : ANONYMOUS_USER,
  });
}

function toTime(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) && value >= 0 ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
  }
  return null;
}
