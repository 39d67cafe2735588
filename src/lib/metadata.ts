import type {
  PackageModel,
  ResolvedMedia,
  SlideMetadataDocument,
  SlideRecord,
  SlideSize,
} from "@/lib/types";

export const METADATA_FILE_NAME = "slide-metadata.json";

function gcd(a: number, b: number): number {
  let x = Math.abs(Math.round(a));
  let y = Math.abs(Math.round(b));
  while (y) {
    [x, y] = [y, x % y];
  }
  return x;
}

export function aspectRatioOf(size: SlideSize): string {
  const divisor = gcd(size.cx, size.cy) || 1;
  return `${Math.round(size.cx / divisor)}:${Math.round(size.cy / divisor)}`;
}

export function extractSlideRecords(pkg: PackageModel, resolved: ResolvedMedia): SlideRecord[] {
  const aspectRatio = aspectRatioOf(pkg.slideSize);

  return pkg.slides.map((slide) => {
    const links = resolved.slides.get(slide.index);
    const embeddedMedia = links?.embeddedMedia ?? [];

    return {
      index: slide.index,
      notes: slide.notes,
      externalVideoURLs: links?.externalVideoURLs ?? [],
      embeddedMedia,
      embeddedAudio: embeddedMedia.filter((ref) => ref.kind === "audio"),
      embeddedVideo: embeddedMedia.filter((ref) => ref.kind === "video"),
      pictures: links?.pictures ?? [],
      unresolvedTargets: links?.unresolvedTargets ?? [],
      aspectRatio,
    };
  });
}

export function buildMetadataDocument(records: SlideRecord[], aspectRatio: string): SlideMetadataDocument {
  return {
    aspectRatio,
    notes: records.map((record) => record.notes),
    externalVideoURLs: records.map((record) => [...record.externalVideoURLs]),
    embeddedAudio: records.map((record) => record.embeddedAudio.map((ref) => ref.fileName)),
    embeddedVideo: records.map((record) => record.embeddedVideo.map((ref) => ref.fileName)),
  };
}
