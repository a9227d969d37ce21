import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { FakeMediaTool } from "@streamcut/core/testing";
import { executeDigest } from "./digest.js";

describe("executeDigest", () => {
  let dir: string;
  let tool: FakeMediaTool;
  const highlightDirs: string[] = [];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "streamcut-digest-cmd-"));
    tool = new FakeMediaTool();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    for (const highlightDir of highlightDirs.splice(0)) {
      await rm(highlightDir, { recursive: true, force: true });
    }
  });

  it("needs an input or clips", async () => {
    const result = await executeDigest({ output: join(dir, "digest.mp4"), tool });

    expect(result.success).toBe(false);
    expect(result.error).toBe("Either an input file or clips are required");
  });

  it("assembles existing clips", async () => {
    const clips = [join(dir, "a.mp4"), join(dir, "b.mp4")];
    for (const clip of clips) await writeFile(clip, "clip");
    const output = join(dir, "nested", "digest.mp4");

    const result = await executeDigest({ clips, output, title: "Highlights", tool });

    expect(result).toEqual({ success: true, outputPath: output, clipCount: 2, highlightDir: undefined, failures: [] });
    expect(tool.callsTo("titleCard")).toHaveLength(1);
    expect(await readFile(output, "utf-8")).toBe("digest");
  });

  it("reports a missing clip", async () => {
    const missing = join(dir, "gone.mp4");

    const result = await executeDigest({ clips: [missing], output: join(dir, "digest.mp4"), tool });

    expect(result.error).toBe(`Clip not found: ${missing}`);
    expect(tool.calls).toEqual([]);
  });

  it("extracts highlights into a directory that is kept", async () => {
    const input = join(dir, "stream.mp4");
    await writeFile(input, "video");
    tool.silence.set(-20, [
      { start: 50, end: 60 },
      { start: 200, end: 240 },
    ]);
    const output = join(dir, "digest.mp4");

    const result = await executeDigest({ input, output, withTransition: true, tool });
    if (result.highlightDir) highlightDirs.push(result.highlightDir);

    expect(result.success).toBe(true);
    expect(result.clipCount).toBe(2);
    expect(basename(result.highlightDir ?? "")).toMatch(/^digest_highlights_/);
    expect(existsSync(result.highlightDir ?? "")).toBe(true);
    expect((await readdir(result.highlightDir ?? "")).sort()).toEqual([
      "highlight_01_01m00s_score1.0.mp4",
      "highlight_02_04m00s_score1.0.mp4",
      "timestamps.txt",
    ]);
    expect(tool.callsTo("crossfade")).toHaveLength(1);
  });

  it("fails without highlights", async () => {
    const input = join(dir, "stream.mp4");
    await writeFile(input, "video");

    const result = await executeDigest({ input, output: join(dir, "digest.mp4"), tool });
    if (result.highlightDir) highlightDirs.push(result.highlightDir);

    expect(result.success).toBe(false);
    expect(result.error).toBe("No highlight clips to assemble");
    expect(existsSync(join(dir, "digest.mp4"))).toBe(false);
  });

  it("fails on a missing input before extracting", async () => {
    const missing = join(dir, "missing.mp4");

    const result = await executeDigest({ input: missing, output: join(dir, "digest.mp4"), tool });

    expect(result.success).toBe(false);
    expect(result.error).toBe(`Input file not found: ${missing}`);
    expect(result.highlightDir).toBeUndefined();
    expect(tool.calls).toEqual([]);
  });
});
