import sharp from "sharp";
import { describe, expect, it } from "vitest";
import {
  clipToCanvas,
  composeAnimation,
  decodeGif,
  planComposite,
  repeatCounts,
  scalePlacement,
  sharedInterval,
} from "@/lib/gif-compositor";
import { makeGif, makePng, pixelAt, WIDE_SLIDE } from "@/test/fixtures";
import type { Rgb } from "@/test/fixtures";

const RED = { r: 255, g: 0, b: 0 };
const BLUE = { r: 0, g: 0, b: 255 };
const GREEN = { r: 0, g: 255, b: 0 };
const WHITE = { r: 255, g: 255, b: 255 };

function expectColorNear(actual: Rgb, expected: Rgb, tolerance = 8) {
  expect(Math.abs(actual.r - expected.r)).toBeLessThanOrEqual(tolerance);
  expect(Math.abs(actual.g - expected.g)).toBeLessThanOrEqual(tolerance);
  expect(Math.abs(actual.b - expected.b)).toBeLessThanOrEqual(tolerance);
}

describe("sharedInterval", () => {
  it("uses the gcd of the source delays", () => {
    expect(sharedInterval([100, 250, 40], 10)).toBe(10);
    expect(sharedInterval([120, 60, 180], 10)).toBe(60);
  });

  it("never goes below the minimum interval", () => {
    expect(sharedInterval([15, 30], 20)).toBe(20);
    expect(sharedInterval([7, 11], 10)).toBe(10);
  });

  it("falls back to the minimum when no delay is positive", () => {
    expect(sharedInterval([0, -20], 10)).toBe(10);
    expect(sharedInterval([], 10)).toBe(10);
  });
});

describe("repeatCounts", () => {
  it("maps each delay onto whole composite frames", () => {
    expect(repeatCounts([100, 250, 40], 10, 10)).toEqual([10, 25, 4]);
  });

  it("rounds fractional counts and keeps at least one frame", () => {
    expect(repeatCounts([15, 30, 5], 20, 20)).toEqual([1, 2, 1]);
  });

  it("treats zero and negative delays as the minimum interval", () => {
    expect(repeatCounts([0, -5, 60], 60, 20)).toEqual([1, 1, 1]);
    expect(repeatCounts([0, 40], 10, 10)).toEqual([1, 4]);
  });
});

describe("planComposite", () => {
  it("totals the repeat counts and keeps the source duration", () => {
    const plan = planComposite([100, 250, 40], 10);

    expect(plan).toEqual({ intervalMs: 10, repeatCounts: [10, 25, 4], frameCount: 39 });
    expect(plan.frameCount * plan.intervalMs).toBe(390);
  });

  it("stays within one interval per source frame of the source timing", () => {
    const delays = [70, 30, 45];
    const plan = planComposite(delays, 10);

    expect(plan.intervalMs).toBe(10);
    plan.repeatCounts.forEach((count, i) => {
      expect(Math.abs(count * plan.intervalMs - delays[i])).toBeLessThanOrEqual(plan.intervalMs);
    });
  });

  it("gives a single-frame source a single composite frame", () => {
    expect(planComposite([0], 10)).toEqual({ intervalMs: 10, repeatCounts: [1], frameCount: 1 });
    expect(planComposite([500], 10)).toEqual({ intervalMs: 500, repeatCounts: [1], frameCount: 1 });
  });
});

describe("scalePlacement", () => {
  it("converts EMU to pixels of the still", () => {
    const rect = scalePlacement({ x: 6_096_000, y: 3_429_000, cx: 3_048_000, cy: 1_714_500 }, WIDE_SLIDE, 1920, 1080);

    expect(rect).toEqual({ left: 960, top: 540, width: 480, height: 270 });
  });

  it("keeps degenerate shapes at least one pixel", () => {
    const rect = scalePlacement({ x: 0, y: 0, cx: 10, cy: 10 }, WIDE_SLIDE, 1920, 1080);

    expect(rect.width).toBe(1);
    expect(rect.height).toBe(1);
  });
});

describe("clipToCanvas", () => {
  it("trims the part outside the canvas", () => {
    expect(clipToCanvas({ left: -10, top: 5, width: 30, height: 10 }, 100, 100)).toEqual({
      left: 0,
      top: 5,
      width: 20,
      height: 10,
    });
  });

  it("returns null when nothing is visible", () => {
    expect(clipToCanvas({ left: 120, top: 0, width: 10, height: 10 }, 100, 100)).toBeNull();
  });
});

describe("decodeGif", () => {
  it("reads every frame with its delay", async () => {
    const gif = await makeGif(4, 3, [
      { color: RED, delay: 100 },
      { color: BLUE, delay: 250 },
      { color: GREEN, delay: 40 },
    ]);

    const decoded = await decodeGif(gif);

    expect(decoded.width).toBe(4);
    expect(decoded.height).toBe(3);
    expect(decoded.frames.map((frame) => frame.delayMs)).toEqual([100, 250, 40]);
    expect(decoded.frames[0].pixels.length).toBe(4 * 3 * 4);
    expectColorNear(
      { r: decoded.frames[1].pixels[0], g: decoded.frames[1].pixels[1], b: decoded.frames[1].pixels[2] },
      BLUE,
    );
  });
});

describe("composeAnimation", () => {
  it("pastes each frame onto the still at one shared interval", async () => {
    const background = await makePng(40, 20, WHITE);
    const gif = await decodeGif(
      await makeGif(4, 4, [
        { color: RED, delay: 100 },
        { color: BLUE, delay: 250 },
        { color: GREEN, delay: 40 },
      ]),
    );

    const composite = await composeAnimation({
      background,
      gif,
      placement: { left: 10, top: 5, width: 8, height: 8 },
      minIntervalMs: 10,
    });

    expect(composite.intervalMs).toBe(10);
    expect(composite.repeatCounts).toEqual([10, 25, 4]);
    expect(composite.frameCount).toBe(39);
    expect(composite.frameDelays).toHaveLength(39);
    expect(new Set(composite.frameDelays)).toEqual(new Set([10]));
    expect(composite.width).toBe(40);
    expect(composite.height).toBe(20);

    const meta = await sharp(composite.bytes, { animated: true }).metadata();
    expect(meta.format).toBe("gif");
    expect(meta.width).toBe(40);
    expect(meta.pages).toBe(39);
    expect(meta.delay).toHaveLength(39);
    expect(meta.delay?.every((delay) => delay === 10)).toBe(true);
    expectColorNear(await pixelAt(composite.bytes, 12, 7), RED);
    expectColorNear(await pixelAt(composite.bytes, 0, 0), WHITE);
  });

  it("turns a single-frame GIF into a one-frame composite", async () => {
    const background = await makePng(30, 30, WHITE);
    const gif = await decodeGif(await makeGif(5, 5, [{ color: GREEN, delay: 100 }]));

    const composite = await composeAnimation({
      background,
      gif,
      placement: { left: 0, top: 0, width: 10, height: 10 },
      minIntervalMs: 10,
    });

    expect(composite.frameCount).toBe(1);
    expect(composite.repeatCounts).toEqual([1]);
    expectColorNear(await pixelAt(composite.bytes, 5, 5), GREEN);
    expectColorNear(await pixelAt(composite.bytes, 20, 20), WHITE);
  });

  it("clips a placement that runs past the edge of the still", async () => {
    const background = await makePng(40, 20, WHITE);
    const gif = await decodeGif(
      await makeGif(4, 4, [
        { color: RED, delay: 50 },
        { color: BLUE, delay: 50 },
      ]),
    );

    const composite = await composeAnimation({
      background,
      gif,
      placement: { left: 36, top: 2, width: 8, height: 8 },
      minIntervalMs: 10,
    });

    expect(composite.intervalMs).toBe(50);
    expect(composite.frameCount).toBe(2);
    expectColorNear(await pixelAt(composite.bytes, 38, 5), RED);
  });
});
