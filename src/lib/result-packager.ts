import JSZip from "jszip";
import { aspectRatioOf, buildMetadataDocument, METADATA_FILE_NAME } from "@/lib/metadata";
import type { JobKind, PackageModel, SlideRecord } from "@/lib/types";

export type SlideOutput = {
  page: number;
  fileName: string;
  bytes: Buffer;
};

export function slideOutputFileName(page: number, ext: string): string {
  return `slide${page}.${ext}`;
}

/**
 * Builds the result archive for one job. Every entry lives under a folder
 * named by the job id; both kinds carry the package's media files named
 * `image{N}` / `media{N}`.
 */
export async function packageResult(params: {
  jobId: string;
  kind: JobKind;
  pkg: PackageModel;
  records: SlideRecord[];
  slideOutputs?: SlideOutput[];
}): Promise<Buffer> {
  const { jobId, kind, pkg, records, slideOutputs = [] } = params;
  const zip = new JSZip();
  const folder = zip.folder(jobId);
  if (!folder) {
    throw new Error(`Could not create archive folder ${jobId}.`);
  }

  if (kind === "metadata") {
    const document = buildMetadataDocument(records, aspectRatioOf(pkg.slideSize));
    folder.file(METADATA_FILE_NAME, JSON.stringify(document, null, 2));
  } else {
    if (slideOutputs.length !== records.length) {
      throw new Error(`Expected ${records.length} slide images, got ${slideOutputs.length}.`);
    }
    for (const output of [...slideOutputs].sort((a, b) => a.page - b.page)) {
      folder.file(output.fileName, output.bytes);
    }
  }

  for (const ref of pkg.media) {
    folder.file(ref.fileName, await pkg.readPart(ref.partName));
  }

  return zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}
