import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { resolve } from "node:path";
import { rm, mkdir, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { stringify } from "yaml";
import { createDefaultConfig, normalizeConfig, ENV_OVERRIDES } from "./schema.js";

// Mock homedir for tests
const TEST_HOME = resolve(tmpdir(), `streamcut-config-test-${Date.now()}`);

vi.mock("node:os", async () => {
  const actual = await vi.importActual<typeof import("node:os")>("node:os");
  return {
    ...actual,
    homedir: () => TEST_HOME,
  };
});

// Import after mock
const { loadConfig, saveConfig, resolveConfig, CONFIG_DIR, CONFIG_PATH } = await import("./index.js");

describe("Config Schema", () => {
  describe("createDefaultConfig", () => {
    it("creates a valid default configuration", () => {
      const config = createDefaultConfig();

      expect(config.version).toBe("1.0.0");
      expect(config.ffmpeg).toEqual({ ffmpegPath: "ffmpeg", ffprobePath: "ffprobe", timeoutSeconds: 600 });
      expect(config.highlight).toEqual({
        outputDir: "./highlights",
        numClips: 5,
        clipDuration: 60,
        padding: 5,
        mergeWindow: 30,
        timestampCount: 20,
      });
      expect(config.audio.peakNoiseDb).toBe(-20);
      expect(config.audio.loudNoiseDb).toBe(-30);
      expect(config.comments.spikeWindow).toBe(30);
      expect(config.comments.keywords).toBeUndefined();
      expect(config.digest.output).toBe("./digest.mp4");
      expect(config.digest.numClips).toBe(10);
      expect(config.digest.titleDuration).toBe(3);
      expect(config.digest.transition).toBe("fade");
    });

    it("returns a fresh object each call", () => {
      const a = createDefaultConfig();
      a.audio.peakNoiseDb = -10;
      expect(createDefaultConfig().audio.peakNoiseDb).toBe(-20);
    });
  });

  describe("normalizeConfig", () => {
    it("falls back to defaults for non-objects", () => {
      expect(normalizeConfig(null)).toEqual(createDefaultConfig());
      expect(normalizeConfig("text")).toEqual(createDefaultConfig());
    });

    it("ignores values of the wrong type", () => {
      const config = normalizeConfig({ highlight: { numClips: "seven", padding: 2 } });
      expect(config.highlight.numClips).toBe(5);
      expect(config.highlight.padding).toBe(2);
    });

    it("keeps only string keywords", () => {
      const config = normalizeConfig({ comments: { keywords: ["gg", 3, "pog"], keywordsFile: "words.txt" } });
      expect(config.comments.keywords).toEqual(["gg", "pog"]);
      expect(config.comments.keywordsFile).toBe("words.txt");
    });

    it("drops blank keywords", () => {
      const config = normalizeConfig({ comments: { keywords: ["草", "", "  "] } });
      expect(config.comments.keywords).toEqual(["草"]);
    });

    it("falls back to defaults for windows and counts that are not positive", () => {
      const config = normalizeConfig({
        ffmpeg: { timeoutSeconds: 0 },
        highlight: { numClips: -1, padding: 0 },
        comments: { spikeWindow: 0, reactionWindow: -10, minUniqueUsers: 0, thresholdRatio: -2 },
        digest: { numClips: 0 },
      });

      expect(config.ffmpeg.timeoutSeconds).toBe(600);
      expect(config.highlight.numClips).toBe(5);
      expect(config.highlight.padding).toBe(0);
      expect(config.comments).toMatchObject({ spikeWindow: 30, reactionWindow: 10, minUniqueUsers: 5, thresholdRatio: 2 });
      expect(config.digest.numClips).toBe(10);
    });

    it("keeps a negative padding out", () => {
      expect(normalizeConfig({ highlight: { padding: -3 } }).highlight.padding).toBe(5);
    });
  });
});

describe("Config Loader", () => {
  beforeEach(async () => {
    await rm(TEST_HOME, { recursive: true, force: true });
  });

  afterEach(async () => {
    await rm(TEST_HOME, { recursive: true, force: true });
    delete process.env[ENV_OVERRIDES.ffmpegPath];
    delete process.env[ENV_OVERRIDES.ffprobePath];
  });

  describe("loadConfig", () => {
    it("returns null when config does not exist", async () => {
      const config = await loadConfig();
      expect(config).toBeNull();
    });

    it("merges with defaults for missing fields", async () => {
      await mkdir(CONFIG_DIR, { recursive: true });
      await writeFile(CONFIG_PATH, stringify({ highlight: { numClips: 8 }, digest: { transition: "wipeleft" } }), "utf-8");

      const loaded = await loadConfig();
      expect(loaded?.highlight.numClips).toBe(8);
      expect(loaded?.highlight.clipDuration).toBe(60); // Default
      expect(loaded?.digest.transition).toBe("wipeleft");
      expect(loaded?.ffmpeg.ffmpegPath).toBe("ffmpeg"); // Default
    });

    it("rejects malformed YAML", async () => {
      await mkdir(CONFIG_DIR, { recursive: true });
      await writeFile(CONFIG_PATH, "highlight: [unclosed", "utf-8");

      await expect(loadConfig()).rejects.toThrow(/^Invalid config file/);
    });
  });

  describe("saveConfig", () => {
    it("creates config directory and file", async () => {
      const config = createDefaultConfig();
      config.highlight.numClips = 3;

      await saveConfig(config);

      const content = await readFile(CONFIG_PATH, "utf-8");
      expect(content).toContain("numClips: 3");
    });

    it("round-trips through loadConfig", async () => {
      const config = createDefaultConfig();
      config.comments.keywords = ["nice", "clutch"];
      config.audio.loudMinSilence = 1.5;
      await saveConfig(config);

      expect(await loadConfig()).toEqual(config);
    });
  });

  describe("resolveConfig", () => {
    it("applies binary path overrides from the environment", async () => {
      process.env[ENV_OVERRIDES.ffmpegPath] = "/opt/ffmpeg/bin/ffmpeg";

      const config = await resolveConfig();
      expect(config.ffmpeg.ffmpegPath).toBe("/opt/ffmpeg/bin/ffmpeg");
      expect(config.ffmpeg.ffprobePath).toBe("ffprobe");
    });
  });
});
