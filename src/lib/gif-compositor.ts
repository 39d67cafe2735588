import sharp from "sharp";
import type { EmuRect, PixelRect, SlideSize } from "@/lib/types";

export type GifFrame = {
  pixels: Buffer;
  delayMs: number;
};

export type DecodedGif = {
  width: number;
  height: number;
  frames: GifFrame[];
};

type RgbImage = {
  data: Buffer;
  width: number;
  height: number;
};

export type CompositePlan = {
  intervalMs: number;
  repeatCounts: number[];
  frameCount: number;
};

export type CompositeGif = CompositePlan & {
  bytes: Buffer;
  width: number;
  height: number;
  frameDelays: number[];
};

function gcd(a: number, b: number): number {
  let x = a;
  let y = b;
  while (y) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * One interval for the whole composite: the gcd of the source delays, so every
 * source frame maps onto a whole number of composite frames. Never below
 * `minIntervalMs`.
 */
export function sharedInterval(delays: number[], minIntervalMs: number): number {
  const positive = delays.filter((delay) => Number.isFinite(delay) && delay > 0).map(Math.round);
  if (positive.length === 0) {
    return minIntervalMs;
  }
  return Math.max(positive.reduce(gcd), minIntervalMs);
}

export function repeatCounts(delays: number[], intervalMs: number, minIntervalMs: number): number[] {
  return delays.map((delay) => {
    const effective = Number.isFinite(delay) && delay > 0 ? delay : minIntervalMs;
    return Math.max(1, Math.round(effective / intervalMs));
  });
}

export function planComposite(delays: number[], minIntervalMs: number): CompositePlan {
  const intervalMs = sharedInterval(delays, minIntervalMs);
  const counts = repeatCounts(delays, intervalMs, minIntervalMs);
  return {
    intervalMs,
    repeatCounts: counts,
    frameCount: counts.reduce((sum, count) => sum + count, 0),
  };
}

export async function decodeGif(bytes: Buffer): Promise<DecodedGif> {
  const meta = await sharp(bytes, { animated: true }).metadata();
  const { data, info } = await sharp(bytes, { animated: true })
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const pages = Math.max(1, meta.pages ?? 1);
  const width = info.width;
  const height = Math.floor(info.height / pages);
  const frameSize = width * height * info.channels;
  const delays = meta.delay ?? [];

  const frames: GifFrame[] = [];
  for (let page = 0; page < pages; page += 1) {
    frames.push({
      pixels: data.subarray(page * frameSize, (page + 1) * frameSize),
      delayMs: delays[page] ?? 0,
    });
  }
  return { width, height, frames };
}

/**
 * Converts a shape frame in EMU to pixels of a still rendered from the slide.
 */
export function scalePlacement(
  frame: EmuRect,
  slideSize: SlideSize,
  stillWidth: number,
  stillHeight: number,
): PixelRect {
  const scaleX = stillWidth / slideSize.cx;
  const scaleY = stillHeight / slideSize.cy;
  return {
    left: Math.round(frame.x * scaleX),
    top: Math.round(frame.y * scaleY),
    width: Math.max(1, Math.round(frame.cx * scaleX)),
    height: Math.max(1, Math.round(frame.cy * scaleY)),
  };
}

/** Part of `rect` that lies on a `width` x `height` canvas, or null if none does. */
export function clipToCanvas(rect: PixelRect, width: number, height: number): PixelRect | null {
  const left = Math.max(0, rect.left);
  const top = Math.max(0, rect.top);
  const right = Math.min(width, rect.left + rect.width);
  const bottom = Math.min(height, rect.top + rect.height);
  if (right <= left || bottom <= top) {
    return null;
  }
  return { left, top, width: right - left, height: bottom - top };
}

async function readRgbImage(input: Buffer): Promise<RgbImage> {
  const { data, info } = await sharp(input).removeAlpha().raw().toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height };
}

async function composeFrame(params: {
  background: RgbImage;
  gif: DecodedGif;
  frame: GifFrame;
  placement: PixelRect;
}): Promise<Buffer> {
  const { background, gif, frame, placement } = params;
  const base = sharp(background.data, {
    raw: { width: background.width, height: background.height, channels: 3 },
  });

  const visible = clipToCanvas(placement, background.width, background.height);
  if (!visible) {
    return base.png().toBuffer();
  }

  // frames paste opaque; alpha is dropped
  const { data, info } = await sharp(frame.pixels, {
    raw: { width: gif.width, height: gif.height, channels: 4 },
  })
    .resize(placement.width, placement.height, { fit: "fill" })
    .removeAlpha()
    .extract({
      left: visible.left - placement.left,
      top: visible.top - placement.top,
      width: visible.width,
      height: visible.height,
    })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return base
    .composite([
      {
        input: data,
        raw: { width: info.width, height: info.height, channels: 3 },
        left: visible.left,
        top: visible.top,
      },
    ])
    .png()
    .toBuffer();
}

/**
 * Pastes every frame of `gif` onto the still at `placement` and re-times the
 * result to one shared frame interval.
 */
export async function composeAnimation(params: {
  background: Buffer;
  gif: DecodedGif;
  placement: PixelRect;
  minIntervalMs: number;
  loop?: number;
}): Promise<CompositeGif> {
  const { gif, placement, minIntervalMs, loop = 0 } = params;
  if (gif.frames.length === 0) {
    throw new Error("GIF has no frames.");
  }

  const background = await readRgbImage(params.background);
  const plan = planComposite(
    gif.frames.map((frame) => frame.delayMs),
    minIntervalMs,
  );

  const frames: Buffer[] = [];
  for (const [i, frame] of gif.frames.entries()) {
    const composed = await composeFrame({ background, gif, frame, placement });
    for (let repeat = 0; repeat < plan.repeatCounts[i]; repeat += 1) {
      frames.push(composed);
    }
  }

  const frameDelays = frames.map(() => plan.intervalMs);
  const bytes = await sharp(frames, { join: { animated: true } })
    .gif({ delay: frameDelays, loop, keepDuplicateFrames: true })
    .toBuffer();

  return {
    ...plan,
    bytes,
    width: background.width,
    height: background.height,
    frameDelays,
  };
}
