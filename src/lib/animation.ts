import type { PlacedMedia, SlideRecord } from "@/lib/types";

function isGif(placed: PlacedMedia): boolean {
  return placed.media.kind === "image" && placed.media.ext === "gif";
}

/**
 * Picks each slide's animation source: its one placed GIF. A slide with none,
 * or with several (no way to tell which one animates), gets no source and
 * keeps its still image.
 */
export function findAnimations(records: SlideRecord[]): Map<number, PlacedMedia | undefined> {
  const sources = new Map<number, PlacedMedia | undefined>();

  for (const record of records) {
    const gifs = record.pictures.filter(isGif);
    if (gifs.length > 1) {
      console.warn(`[animation] slide=${record.index} gifs=${gifs.length} ambiguous source, using still`);
    }
    sources.set(record.index, gifs.length === 1 ? gifs[0] : undefined);
  }

  return sources;
}

export function attachAnimations(
  records: SlideRecord[],
  sources: Map<number, PlacedMedia | undefined>,
): SlideRecord[] {
  return records.map((record) => {
    const animationSource = sources.get(record.index);
    return animationSource ? { ...record, animationSource } : record;
  });
}
