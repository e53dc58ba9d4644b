import { describe, it, expect, vi } from "vitest";
import { EvidenceSelector, planFrameTimestamps } from "./evidence-selector.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { MemoryRequestStore } from "./request-store.js";
import { FakeMediaToolkit, makeMedia } from "./testing/fakes.js";

describe("planFrameTimestamps()", () => {
  it("places K frames at the centres of equal slices", () => {
    const plan = planFrameTimestamps([{ start: 10, end: 16 }], 60, { framesPerWindow: 3, minSpacingSeconds: 1 });
    expect(plan.map((f) => f.timestamp)).toEqual([11, 13, 15]);
    expect(plan[0].window).toEqual({ start: 10, end: 16 });
  });

  it("drops frames closer than the minimum spacing", () => {
    const plan = planFrameTimestamps([{ start: 10, end: 13 }], 60, { framesPerWindow: 3, minSpacingSeconds: 2 });
    expect(plan.map((f) => f.timestamp)).toEqual([10.5, 12.5]);
  });

  it("deduplicates across overlapping windows, earliest frame first", () => {
    const plan = planFrameTimestamps(
      [
        { start: 20, end: 24 },
        { start: 0, end: 4 },
        { start: 21, end: 25 },
      ],
      60,
      { framesPerWindow: 2, minSpacingSeconds: 2 },
    );
    // candidates: 21, 23, 1, 3, 22, 24 -> sorted 1, 3, 21, 22, 23, 24
    expect(plan.map((f) => f.timestamp)).toEqual([1, 3, 21, 23]);
  });

  it("clamps windows to the media duration", () => {
    const plan = planFrameTimestamps([{ start: 55, end: 70 }], 60, { framesPerWindow: 1, minSpacingSeconds: 0 });
    expect(plan.map((f) => f.timestamp)).toEqual([57.5]);
  });

  it("uses the start of a zero-length window once", () => {
    const plan = planFrameTimestamps([{ start: 5, end: 5 }], 60, { framesPerWindow: 3, minSpacingSeconds: 0 });
    expect(plan.map((f) => f.timestamp)).toEqual([5]);
  });

  it("returns nothing for empty media", () => {
    expect(planFrameTimestamps([{ start: 0, end: 5 }], 0)).toEqual([]);
  });
});

describe("EvidenceSelector.select()", () => {
  it("extracts numbered frames into the request's frames directory", async () => {
    const media = new FakeMediaToolkit({ writeFiles: false });
    const store = new MemoryRequestStore("memory");
    const selector = new EvidenceSelector({
      media,
      store,
      config: { framesPerWindow: 2, minSpacingSeconds: 1 },
      logger: silentLogger,
    });

    const frames = await selector.select("req-1", [{ start: 10, end: 14 }], makeMedia());

    expect(frames).toEqual([
      { timestamp: 11, imageRef: "frames/frame-001.jpg", window: { start: 10, end: 14 } },
      { timestamp: 13, imageRef: "frames/frame-002.jpg", window: { start: 10, end: 14 } },
    ]);
    expect(media.frames.map((f) => f.destination)).toEqual([
      store.artifactPath("req-1", "frames/frame-001.jpg"),
      store.artifactPath("req-1", "frames/frame-002.jpg"),
    ]);
    expect(media.frames[0].source).toBe("memory/requests/req-1/source.mp4");
  });

  it("degrades to an empty list when extraction fails", async () => {
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };
    const selector = new EvidenceSelector({
      media: new FakeMediaToolkit({ frameError: new Error("ffmpeg exited with code 1"), writeFiles: false }),
      store: new MemoryRequestStore(),
      logger,
    });

    const frames = await selector.select("req-1", [{ start: 10, end: 14 }], makeMedia());

    expect(frames).toEqual([]);
    expect(warn).toHaveBeenCalledWith(
      "Evidence extraction failed for req-1; continuing without frames: ffmpeg exited with code 1",
    );
  });
});
