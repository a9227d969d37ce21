import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { fileURLToPath } from "node:url";
import { FormatError } from "../errors.js";

/** Bundled vocabulary (Japanese stream chat) */
export const DEFAULT_KEYWORDS_PATH = fileURLToPath(new URL("../../data/keywords.json", import.meta.url));

/**
 * Load a keyword list.
 *
 * - .json: an array of strings, or an object with a "keywords" array
 * - anything else: one keyword per line, `#` starts a comment line
 */
export async function loadKeywords(path: string = DEFAULT_KEYWORDS_PATH): Promise<string[]> {
  const content = await readFile(path, "utf-8");

  if (extname(path).toLowerCase() !== ".json") {
    return content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== "" && !line.startsWith("#"));
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new FormatError(path, `Invalid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  const list = Array.isArray(data)
    ? data
    : typeof data === "object" && data !== null
      ? Reflect.get(data, "keywords")
      : undefined;

  if (!Array.isArray(list) || !list.every((k): k is string => typeof k === "string")) {
    throw new FormatError(path, "Keyword file must hold an array of strings");
  }
  return list.filter((k) => k !== "");
}
