import fs from "node:fs";
import sharp from "sharp";
import { attachAnimations, findAnimations } from "@/lib/animation";
import { SubmissionError } from "@/lib/errors";
import { composeAnimation, decodeGif, scalePlacement } from "@/lib/gif-compositor";
import { resolveMedia } from "@/lib/media-resolver";
import { extractSlideRecords } from "@/lib/metadata";
import { openPackage } from "@/lib/pptx";
import { packageResult, slideOutputFileName } from "@/lib/result-packager";
import type { SlideOutput } from "@/lib/result-packager";
import type { JobKind, PackageModel, SlideRecord, StoredSlideImage } from "@/lib/types";

export type JobWork = {
  jobId: string;
  kind: JobKind;
  packagePath: string;
  slideImages: StoredSlideImage[];
  resultPath: string;
};

export type RenderOptions = {
  minFrameIntervalMs: number;
  gifLoop: number;
};

/** Runs one job; `signal` aborts when the job's time limit passes. */
export type JobRunner = (work: JobWork, signal: AbortSignal) => Promise<void>;

async function renderAnimatedSlide(params: {
  jobId: string;
  pkg: PackageModel;
  record: SlideRecord;
  still: Buffer;
  options: RenderOptions;
}): Promise<SlideOutput | null> {
  const { jobId, pkg, record, still, options } = params;
  const source = record.animationSource;
  if (!source) {
    return null;
  }

  try {
    const gif = await decodeGif(await pkg.readPart(source.media.partName));
    const meta = await sharp(still).metadata();
    if (!meta.width || !meta.height) {
      throw new Error("still image has no dimensions");
    }
    const placement = scalePlacement(source.frame, pkg.slideSize, meta.width, meta.height);
    const composite = await composeAnimation({
      background: still,
      gif,
      placement,
      minIntervalMs: options.minFrameIntervalMs,
      loop: options.gifLoop,
    });
    console.info(
      `[animation] job=${jobId} slide=${record.index} source=${source.media.fileName} interval=${composite.intervalMs} frames=${composite.frameCount}`,
    );
    return { page: record.index, fileName: slideOutputFileName(record.index, "gif"), bytes: composite.bytes };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[animation] job=${jobId} slide=${record.index} composite failed, using still: ${message}`);
    return null;
  }
}

export async function renderSlides(params: {
  jobId: string;
  pkg: PackageModel;
  records: SlideRecord[];
  options: RenderOptions;
  signal?: AbortSignal;
}): Promise<SlideOutput[]> {
  const { jobId, pkg, records, options, signal } = params;
  const outputs: SlideOutput[] = [];

  for (const record of records) {
    signal?.throwIfAborted();
    if (!record.stillImage) {
      throw new Error(`Slide ${record.index} has no still image.`);
    }
    const still = await fs.promises.readFile(record.stillImage.path);
    const animated = await renderAnimatedSlide({ jobId, pkg, record, still, options });
    outputs.push(
      animated ?? {
        page: record.index,
        fileName: slideOutputFileName(record.index, record.stillImage.ext),
        bytes: still,
      },
    );
  }

  return outputs;
}

/**
 * Runs one job start to finish and leaves its archive at `work.resultPath`.
 * Throws when the package cannot be read; per-slide problems fall back to
 * empty fields or the still image.
 */
export function createJobRunner(options: RenderOptions): JobRunner {
  return async (work, signal) => {
    const pkg = await openPackage(await fs.promises.readFile(work.packagePath));
    const resolved = resolveMedia(pkg);
    let records = extractSlideRecords(pkg, resolved);

    let slideOutputs: SlideOutput[] | undefined;
    if (work.kind === "animation") {
      if (work.slideImages.length !== records.length) {
        throw SubmissionError.countMismatch(records.length, work.slideImages.length);
      }
      records = attachAnimations(records, findAnimations(records)).map((record, i) => ({
        ...record,
        stillImage: work.slideImages[i],
      }));
      slideOutputs = await renderSlides({ jobId: work.jobId, pkg, records, options, signal });
    }
    signal.throwIfAborted();

    const archive = await packageResult({
      jobId: work.jobId,
      kind: work.kind,
      pkg,
      records,
      slideOutputs,
    });

    const tmpPath = `${work.resultPath}.partial`;
    await fs.promises.writeFile(tmpPath, archive);
    await fs.promises.rename(tmpPath, work.resultPath);
  };
}
