import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  detectCommentLogFormat,
  loadCommentLog,
  parseCSVCommentLog,
  parseJSONCommentLog,
} from "./comment-log.js";
import { parseCSV } from "./csv.js";
import { DEFAULT_KEYWORDS_PATH, loadKeywords } from "./keywords.js";
import { FormatError } from "../errors.js";
import { formatTimestamp, parseTimestamp } from "../utils/time.js";

describe("parseCSV", () => {
  it("splits plain fields", () => {
    expect(parseCSV("a,b\nc,d")).toEqual([
      ["a", "b"],
      ["c", "d"],
    ]);
  });

  it("handles quoted commas, doubled quotes and line breaks", () => {
    expect(parseCSV('"x, y",z\n"say ""hi""","two\nlines"\n')).toEqual([
      ["x, y", "z"],
      ['say "hi"', "two\nlines"],
    ]);
  });

  it("strips a byte order mark and skips blank lines", () => {
    expect(parseCSV("\uFEFFtime,text\r\n\r\n1,a\r\n")).toEqual([
      ["time", "text"],
      ["1", "a"],
    ]);
  });
});

describe("detectCommentLogFormat", () => {
  it("maps extensions case-insensitively", () => {
    expect(detectCommentLogFormat("chat.json")).toBe("json");
    expect(detectCommentLogFormat("CHAT.CSV")).toBe("csv");
  });

  it("rejects anything else", () => {
    expect(() => detectCommentLogFormat("chat.xml")).toThrow(FormatError);
    expect(() => detectCommentLogFormat("chat.xml")).toThrow('Unsupported comment log format ".xml": chat.xml');
  });
});

describe("parseJSONCommentLog", () => {
  it("reads records and defaults the user", () => {
    const records = parseJSONCommentLog(
      JSON.stringify([
        { time: 12.5, text: "草", user: "viewer1" },
        { time: "30", text: "nice" },
        { time: 31, text: "gg", user: "" },
      ])
    );

    expect(records).toEqual([
      { time: 12.5, text: "草", user: "viewer1" },
      { time: 30, text: "nice", user: "anonymous" },
      { time: 31, text: "gg", user: "anonymous" },
    ]);
    expect(Object.isFrozen(records[0])).toBe(true);
  });

  it("requires an array", () => {
    expect(() => parseJSONCommentLog('{"time": 1}', "log.json")).toThrow("Comment log must be a JSON array: log.json");
  });

  it("requires a numeric time", () => {
    expect(() => parseJSONCommentLog('[{"text": "hi"}]', "log.json")).toThrow(
      'Comment #1 has no numeric "time": log.json'
    );
  });

  it("rejects invalid JSON", () => {
    expect(() => parseJSONCommentLog("[{", "log.json")).toThrow(FormatError);
  });
});

describe("parseCSVCommentLog", () => {
  it("reads time,text,user with optional user column", () => {
    const records = parseCSVCommentLog('time,text,user\n1.5,"hello, world",a\n2,www,\n');

    expect(records).toEqual([
      { time: 1.5, text: "hello, world", user: "a" },
      { time: 2, text: "www", user: "anonymous" },
    ]);
  });

  it("accepts a log without a user column", () => {
    expect(parseCSVCommentLog("text,time\nhi,4\n")).toEqual([{ time: 4, text: "hi", user: "anonymous" }]);
  });

  it("requires the time and text columns", () => {
    expect(() => parseCSVCommentLog("time,message\n1,hi\n", "log.csv")).toThrow(
      'CSV header is missing the "text" column: log.csv'
    );
  });

  it("rejects a non-numeric time", () => {
    expect(() => parseCSVCommentLog("time,text\nsoon,hi\n", "log.csv")).toThrow(
      'Row 2 has an invalid time "soon": log.csv'
    );
  });

  it("reads times written by the timestamp formatter", () => {
    const seconds = [0, 59, 61, 3599, 3723];
    const csv = ["time,text", ...seconds.map((s) => `${parseTimestamp(formatTimestamp(s))},t`)].join("\n");

    expect(parseCSVCommentLog(csv).map((r) => r.time)).toEqual(seconds);
  });
});

describe("loadCommentLog", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "streamcut-log-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("dispatches on the file extension", async () => {
    const jsonPath = join(dir, "a.JSON");
    const csvPath = join(dir, "b.csv");
    await writeFile(jsonPath, '[{"time": 3, "text": "a", "user": "x"}]', "utf-8");
    await writeFile(csvPath, "time,text,user\n3,a,x\n", "utf-8");

    expect(await loadCommentLog(jsonPath)).toEqual(await loadCommentLog(csvPath));
  });

  it("loads keyword files in either format", async () => {
    const txtPath = join(dir, "words.txt");
    const jsonPath = join(dir, "words.json");
    await writeFile(txtPath, "# hype words\npog\n\n  clutch \n", "utf-8");
    await writeFile(jsonPath, '{"keywords": ["pog", "clutch"]}', "utf-8");

    expect(await loadKeywords(txtPath)).toEqual(["pog", "clutch"]);
    expect(await loadKeywords(jsonPath)).toEqual(["pog", "clutch"]);
  });

  it("rejects keyword files that are not string lists", async () => {
    const badPath = join(dir, "bad.json");
    await writeFile(badPath, "[1, 2]", "utf-8");

    await expect(loadKeywords(badPath)).rejects.toThrow(FormatError);
  });

  it("rejects keyword files with invalid JSON", async () => {
    const badPath = join(dir, "broken.json");
    await writeFile(badPath, '["pog",', "utf-8");

    await expect(loadKeywords(badPath)).rejects.toBeInstanceOf(FormatError);
  });

  it("ships a default keyword list", async () => {
    const keywords = await loadKeywords(DEFAULT_KEYWORDS_PATH);

    expect(keywords).toContain("草");
    expect(keywords).toContain("888");
    expect(keywords).toHaveLength(31);
  });
});
