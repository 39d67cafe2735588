import path from "node:path";
import { SubmissionError } from "@/lib/errors";
import { ALLOWED_SLIDE_IMAGE_EXTENSIONS } from "@/lib/media-types";
import type { SlideImageInput } from "@/lib/types";

const CHUNK_RE = /(\d+)/;

/**
 * Total order over supplied image identifiers: digit runs compare as numbers
 * (`slide2` < `slide10`), everything else by code unit, and identifiers that
 * tie on that still compare by plain string order.
 */
export function compareImageNames(a: string, b: string): number {
  const left = a.split(CHUNK_RE);
  const right = b.split(CHUNK_RE);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i += 1) {
    if (left[i] === right[i]) {
      continue;
    }
    // split() with a capture group puts digit runs at odd indexes
    if (i % 2 === 1) {
      const diff = Number(left[i]) - Number(right[i]);
      if (diff !== 0) {
        return diff;
      }
      return left[i].length - right[i].length;
    }
    return left[i] < right[i] ? -1 : 1;
  }

  if (left.length !== right.length) {
    return left.length - right.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function orderSlideImages(images: SlideImageInput[]): SlideImageInput[] {
  return [...images].sort((a, b) => compareImageNames(a.name, b.name));
}

export function validateSlideImages(images: SlideImageInput[] | undefined): SlideImageInput[] {
  const usable = (images ?? []).filter((image) => image.bytes.length > 0);
  if (usable.length === 0) {
    throw new SubmissionError("Animation jobs need one still image per slide.", "missing-slide-images");
  }

  for (const image of usable) {
    const ext = path.extname(image.fileName).toLowerCase();
    if (!ALLOWED_SLIDE_IMAGE_EXTENSIONS.has(ext)) {
      throw new SubmissionError(`Unsupported slide image type: ${image.fileName}`, "unsupported-image-type", {
        name: image.name,
        fileName: image.fileName,
      });
    }
  }

  return orderSlideImages(usable);
}
