import fs from "node:fs";
import path from "node:path";
import { getConfig } from "@/lib/config";
import type { ServiceConfig } from "@/lib/config";
import { JobTimeoutError, SubmissionError, UnreadablePackageError } from "@/lib/errors";
import { createJobRunner } from "@/lib/job-runner";
import type { JobRunner, JobWork } from "@/lib/job-runner";
import { initJobStorage, JobStore, removeJobStorage } from "@/lib/jobs-store";
import { ALLOWED_PACKAGE_EXTENSIONS, extensionOf } from "@/lib/media-types";
import { createJobId } from "@/lib/paths";
import { countSlides } from "@/lib/pptx";
import { validateSlideImages } from "@/lib/slide-images";
import type {
  JobFailureReason,
  JobInputs,
  JobKind,
  JobStatus,
  StoredSlideImage,
} from "@/lib/types";

export const JOB_KINDS: readonly JobKind[] = ["metadata", "animation"];

export type JobManagerOptions = {
  jobsDir: string;
  concurrency: number;
  jobTimeoutMs: number;
  runner: JobRunner;
};

function isJobKind(value: string): value is JobKind {
  return JOB_KINDS.some((kind) => kind === value);
}

function failureReasonOf(error: unknown): JobFailureReason {
  if (error instanceof UnreadablePackageError) {
    return "unreadable-package";
  }
  if (error instanceof SubmissionError && error.submissionCode === "slide-image-count-mismatch") {
    return "slide-image-count-mismatch";
  }
  if (error instanceof JobTimeoutError) {
    return "timeout";
  }
  return "internal-error";
}

/** Runs `task` with a signal that aborts once the time limit passes. */
function withTimeout<T>(task: (signal: AbortSignal) => Promise<T>, timeoutMs: number, jobId: string): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) {
    return task(controller.signal);
  }
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new JobTimeoutError(jobId, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
    task(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

/**
 * Admits submissions, runs them on a bounded pool of workers in FIFO order
 * and hands each finished archive out once.
 */
export class JobManager {
  private readonly store = new JobStore();
  private readonly queue: JobWork[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private active = 0;

  constructor(private readonly options: JobManagerOptions) {
    if (options.concurrency < 1) {
      throw new Error("Worker pool needs at least one worker.");
    }
  }

  async submit(kind: string, inputs: JobInputs): Promise<string> {
    if (!isJobKind(kind)) {
      throw new SubmissionError(`Unknown job kind: ${kind}`, "invalid-kind", { kind });
    }
    if (!inputs.packageBytes || inputs.packageBytes.length === 0) {
      throw new SubmissionError("A presentation package is required.", "missing-package");
    }
    if (!ALLOWED_PACKAGE_EXTENSIONS.has(`.${extensionOf(inputs.packageName)}`)) {
      throw new SubmissionError(`Unsupported package type: ${inputs.packageName}`, "unsupported-package-type", {
        packageName: inputs.packageName,
      });
    }

    const images = kind === "animation" ? validateSlideImages(inputs.slideImages) : [];
    if (kind === "animation") {
      await this.checkSlideCount(inputs.packageBytes, images.length);
    }

    let jobId = createJobId();
    while (this.store.has(jobId)) {
      jobId = createJobId();
    }

    const storage = initJobStorage(this.options.jobsDir, jobId);
    const packagePath = path.join(storage.inputDir, "package.pptx");
    await fs.promises.writeFile(packagePath, inputs.packageBytes);

    const slideImages: StoredSlideImage[] = [];
    for (const [i, image] of images.entries()) {
      const page = i + 1;
      const ext = extensionOf(image.fileName);
      const imagePath = path.join(storage.inputDir, `slide-${page}.${ext}`);
      await fs.promises.writeFile(imagePath, image.bytes);
      slideImages.push({ page, sourceName: image.name, ext, path: imagePath });
    }

    this.store.create({
      jobId,
      kind,
      status: "queued",
      createdAt: new Date().toISOString(),
    });
    this.queue.push({ jobId, kind, packagePath, slideImages, resultPath: storage.resultPath });
    console.info(`[jobs] job=${jobId} kind=${kind} status=queued slides=${slideImages.length}`);

    this.pump();
    return jobId;
  }

  /**
   * Archive bytes for a finished job, exactly once. Unknown, unfinished,
   * failed and already-retrieved jobs all yield undefined.
   */
  async poll(jobId: string): Promise<Buffer | undefined> {
    const claimed = this.store.claimResult(jobId);
    if (!claimed?.resultPath) {
      return undefined;
    }

    try {
      return await fs.promises.readFile(claimed.resultPath);
    } finally {
      await this.discardStorage(jobId);
    }
  }

  status(jobId: string): JobStatus | undefined {
    return this.store.get(jobId)?.status;
  }

  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private async checkSlideCount(packageBytes: Buffer, imageCount: number): Promise<void> {
    let slideCount: number;
    try {
      slideCount = await countSlides(packageBytes);
    } catch (error) {
      if (error instanceof UnreadablePackageError) {
        // admitted anyway; the worker records it as an unreadable package
        return;
      }
      throw error;
    }
    if (slideCount !== imageCount) {
      throw SubmissionError.countMismatch(slideCount, imageCount);
    }
  }

  private pump(): void {
    while (this.active < this.options.concurrency) {
      const work = this.queue.shift();
      if (!work) {
        break;
      }
      this.active += 1;
      void this.execute(work).finally(() => {
        this.active -= 1;
        this.pump();
        this.notifyIdle();
      });
    }
  }

  private notifyIdle(): void {
    if (this.active > 0 || this.queue.length > 0) {
      return;
    }
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }

  private async execute(work: JobWork): Promise<void> {
    const { jobId } = work;
    this.store.transition(jobId, "queued", { status: "running", startedAt: new Date().toISOString() });
    console.info(`[jobs] job=${jobId} status=running`);

    try {
      await withTimeout((signal) => this.options.runner(work, signal), this.options.jobTimeoutMs, jobId);
      this.store.transition(jobId, "running", {
        status: "done",
        finishedAt: new Date().toISOString(),
        resultPath: work.resultPath,
      });
      console.info(`[jobs] job=${jobId} status=done`);
    } catch (error) {
      const failureReason = failureReasonOf(error);
      this.store.transition(jobId, "running", {
        status: "failed",
        finishedAt: new Date().toISOString(),
        failureReason,
      });
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[jobs] job=${jobId} status=failed reason=${failureReason}: ${message}`);
      await this.discardStorage(jobId);
    }
  }

  private async discardStorage(jobId: string): Promise<void> {
    try {
      await removeJobStorage(this.options.jobsDir, jobId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[jobs] job=${jobId} cleanup failed: ${message}`);
    }
  }
}

export function createJobManager(config: ServiceConfig): JobManager {
  return new JobManager({
    jobsDir: config.jobsDir,
    concurrency: config.workerConcurrency,
    jobTimeoutMs: config.jobTimeoutMs,
    runner: createJobRunner({
      minFrameIntervalMs: config.minFrameIntervalMs,
      gifLoop: config.gifLoop,
    }),
  });
}

declare global {
  // eslint-disable-next-line no-var
  var slideJobManager: JobManager | undefined;
}

/**
 * Process-wide manager. Kept on globalThis so every route module (and dev
 * reloads) share one queue and one job table.
 */
export function getJobManager(): JobManager {
  if (!globalThis.slideJobManager) {
    globalThis.slideJobManager = createJobManager(getConfig());
  }
  return globalThis.slideJobManager;
}
