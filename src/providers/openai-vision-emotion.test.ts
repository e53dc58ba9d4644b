// Unit tests for OpenAIVisionEmotionProvider

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  OpenAIVisionEmotionProvider,
  parseVisionResponse,
  planSampleFrames,
} from "./openai-vision-emotion.js";
import type { OpenAIClient } from "./openai-client.js";
import type { MediaToolkit } from "../media-toolkit.js";
import { silentLogger } from "../logger.js";

function makeMedia(): MediaToolkit & { extractFrame: ReturnType<typeof vi.fn> } {
  return {
    probe: vi.fn(),
    extractAudio: vi.fn(),
    extractFrame: vi.fn().mockResolvedValue(undefined),
  };
}

describe("planSampleFrames()", () => {
  it("samples at the interval with windows up to the next sample", () => {
    expect(planSampleFrames(5, 2, 60)).toEqual([
      { index: 0, timestamp: 0, window: { start: 0, end: 2 } },
      { index: 1, timestamp: 2, window: { start: 2, end: 4 } },
      { index: 2, timestamp: 4, window: { start: 4, end: 5 } },
    ]);
  });

  it("widens the interval to respect maxFrames", () => {
    const frames = planSampleFrames(100, 2, 10);
    expect(frames).toHaveLength(10);
    expect(frames[1].timestamp).toBe(10);
    expect(frames[9].window).toEqual({ start: 90, end: 100 });
  });

  it("returns nothing for zero duration", () => {
    expect(planSampleFrames(0, 2, 10)).toEqual([]);
  });
});

describe("parseVisionResponse()", () => {
  const frames = planSampleFrames(6, 2, 60);

  it("emits events only for frames with a detected face and known label", () => {
    const raw = JSON.stringify({
      frames: [
        { index: 0, face_detected: true, emotion: "angry", confidence: 0.8 },
        { index: 1, face_detected: false, emotion: "calm", confidence: 0.9 },
        { index: 2, face_detected: true, emotion: "smug", confidence: 0.9 },
        { index: 7, face_detected: true, emotion: "sad", confidence: 0.9 },
      ],
    });
    expect(parseVisionResponse(raw, frames)).toEqual([
      { window: { start: 0, end: 2 }, emotion: "angry", confidence: 0.8 },
    ]);
  });

  it("rejects a response without a frames array", () => {
    expect(() => parseVisionResponse("{}", frames)).toThrow("Vision response missing or invalid 'frames' array");
  });
});

describe("OpenAIVisionEmotionProvider.detect()", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "vision-test-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("extracts each sampled frame and sends it as a data URI", async () => {
    const media = makeMedia();
    const create = vi.fn().mockResolvedValue({
      choices: [
        {
          message: {
            content: JSON.stringify({
              frames: [
                { index: 0, face_detected: true, emotion: "fear", confidence: 0.7 },
                { index: 1, face_detected: true, emotion: "fear", confidence: 0.6 },
              ],
            }),
          },
        },
      ],
    });
    const client: OpenAIClient = { chat: { completions: { create } } };
    const provider = new OpenAIVisionEmotionProvider(client, media, {
      model: "gpt-4o-mini",
      logger: silentLogger,
      readImage: async () => Buffer.from("jpeg"),
    });

    const events = await provider.detect({ sourcePath: "/videos/clip.mp4", durationSeconds: 4, workDir });

    expect(events).toEqual([
      { window: { start: 0, end: 2 }, emotion: "fear", confidence: 0.7 },
      { window: { start: 2, end: 4 }, emotion: "fear", confidence: 0.6 },
    ]);
    expect(media.extractFrame).toHaveBeenCalledTimes(2);
    expect(media.extractFrame).toHaveBeenCalledWith("/videos/clip.mp4", 2, join(workDir, "sample-0001.jpg"));

    const content = create.mock.calls[0][0].messages[1].content;
    expect(content[1]).toEqual({
      type: "image_url",
      image_url: { url: `data:image/jpeg;base64,${Buffer.from("jpeg").toString("base64")}`, detail: "low" },
    });
  });

  it("reports frame extraction failures as transient", async () => {
    const media = makeMedia();
    media.extractFrame.mockRejectedValue(new Error("ffmpeg exited with code 1"));
    const client: OpenAIClient = { chat: { completions: { create: vi.fn() } } };
    const provider = new OpenAIVisionEmotionProvider(client, media, { model: "m", logger: silentLogger });

    await expect(provider.detect({ sourcePath: "x.mp4", durationSeconds: 4, workDir })).rejects.toThrow(
      "Frame extraction at 0s failed",
    );
  });
});
