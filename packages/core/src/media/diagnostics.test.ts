import { describe, it, expect } from "vitest";
import { parseFrameRate, parseIntegratedLoudness, parseProbeOutput, parseSilenceOutput } from "./diagnostics.js";

describe("parseSilenceOutput", () => {
  it("pairs starts with ends", () => {
    const output = [
      "Input #0, wav, from 'audio.wav':",
      "[silencedetect @ 0x55d1c] silence_start: 12.5",
      "[silencedetect @ 0x55d1c] silence_end: 14.75 | silence_duration: 2.25",
      "[silencedetect @ 0x55d1c] silence_start: 30",
      "[silencedetect @ 0x55d1c] silence_end: 31.2 | silence_duration: 1.2",
      "size=N/A time=00:01:00.00 bitrate=N/A speed= 500x",
    ].join("\n");

    expect(parseSilenceOutput(output)).toEqual([
      { start: 12.5, end: 14.75, duration: 2.25 },
      { start: 30, end: 31.2, duration: 1.2 },
    ]);
  });

  it("clamps a negative start to zero", () => {
    const output = "[silencedetect @ 0x1] silence_start: -0.00133333\n[silencedetect @ 0x1] silence_end: 3 | silence_duration: 3.00133";
    expect(parseSilenceOutput(output)).toEqual([{ start: 0, end: 3, duration: 3.00133 }]);
  });

  it("leaves a trailing silence open", () => {
    expect(parseSilenceOutput("[silencedetect @ 0x1] silence_start: 58.1\r\n")).toEqual([{ start: 58.1 }]);
  });

  it("derives the start of an end without one", () => {
    expect(parseSilenceOutput("[silencedetect @ 0x1] silence_end: 10 | silence_duration: 4")).toEqual([
      { start: 6, end: 10, duration: 4 },
    ]);
  });

  it("returns nothing for output without silence", () => {
    expect(parseSilenceOutput("Stream #0:0: Audio: pcm_s16le\n")).toEqual([]);
  });
});

describe("parseIntegratedLoudness", () => {
  it("reads the summary value", () => {
    const output = [
      "[Parsed_ebur128_0 @ 0x1] Summary:",
      "",
      "  Integrated loudness:",
      "    I:         -23.5 LUFS",
      "    Threshold: -33.6 LUFS",
    ].join("\n");

    expect(parseIntegratedLoudness(output)).toBe(-23.5);
  });

  it("returns null for silence or a missing summary", () => {
    expect(parseIntegratedLoudness("  Integrated loudness:\n    I:         -inf LUFS")).toBeNull();
    expect(parseIntegratedLoudness("t: 0.1 M: -120.7 S: -120.7")).toBeNull();
  });
});

describe("parseProbeOutput", () => {
  it("collects format and stream fields", () => {
    const json = JSON.stringify({
      streams: [
        { codec_type: "video", codec_name: "h264", width: 1920, height: 1080, r_frame_rate: "30000/1001" },
        { codec_type: "audio", codec_name: "aac", sample_rate: "48000" },
      ],
      format: { duration: "3600.5", size: "1048576000", bit_rate: "2330000" },
    });

    const info = parseProbeOutput("/media/stream.mp4", json);

    expect(info).toMatchObject({
      path: "/media/stream.mp4",
      duration: 3600.5,
      size: 1048576000,
      bitRate: 2330000,
      width: 1920,
      height: 1080,
      codec: "h264",
      audioCodec: "aac",
      sampleRate: 48000,
    });
    expect(info.fps).toBeCloseTo(29.97, 2);
  });

  it("tolerates audio-only files", () => {
    const info = parseProbeOutput("a.wav", JSON.stringify({ streams: [{ codec_type: "audio" }], format: {} }));
    expect(info).toEqual({ path: "a.wav", duration: 0, size: 0, bitRate: 0, audioCodec: undefined, sampleRate: undefined });
  });
});

describe("parseFrameRate", () => {
  it("handles fractions and plain numbers", () => {
    expect(parseFrameRate("25/1")).toBe(25);
    expect(parseFrameRate("60")).toBe(60);
    expect(parseFrameRate("0/0")).toBeUndefined();
    expect(parseFrameRate(undefined)).toBeUndefined();
  });
});
