import fs from "node:fs";
import path from "node:path";
import { ensureDir, getJobDir } from "@/lib/paths";
import type { JobRecord, JobStatus } from "@/lib/types";

export type JobStorage = {
  jobDir: string;
  inputDir: string;
  resultPath: string;
};

export function initJobStorage(jobsDir: string, jobId: string): JobStorage {
  ensureDir(jobsDir);
  const jobDir = getJobDir(jobsDir, jobId);
  const inputDir = path.join(jobDir, "input");

  [jobDir, inputDir].forEach(ensureDir);

  return { jobDir, inputDir, resultPath: path.join(jobDir, "result.zip") };
}

export async function removeJobStorage(jobsDir: string, jobId: string): Promise<void> {
  await fs.promises.rm(getJobDir(jobsDir, jobId), { recursive: true, force: true });
}

/**
 * In-memory job table shared by admission, workers and pollers. Records are
 * frozen snapshots and every change swaps in a whole new record, so a reader
 * sees either the old status or the new status together with its result.
 */
export class JobStore {
  private readonly jobs = new Map<string, Readonly<JobRecord>>();

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  get(jobId: string): Readonly<JobRecord> | undefined {
    return this.jobs.get(jobId);
  }

  create(record: JobRecord): Readonly<JobRecord> {
    if (this.jobs.has(record.jobId)) {
      throw new Error(`Job ${record.jobId} already exists.`);
    }
    const snapshot = Object.freeze({ ...record });
    this.jobs.set(record.jobId, snapshot);
    return snapshot;
  }

  transition(jobId: string, from: JobStatus, patch: Partial<Omit<JobRecord, "jobId" | "kind">>): Readonly<JobRecord> {
    const current = this.jobs.get(jobId);
    if (!current) {
      throw new Error(`Job ${jobId} not found.`);
    }
    if (current.status !== from) {
      throw new Error(`Job ${jobId} is ${current.status}, expected ${from}.`);
    }
    const next = Object.freeze({ ...current, ...patch });
    this.jobs.set(jobId, next);
    return next;
  }

  /**
   * Hands out a finished job's result once. The record is marked retrieved in
   * the same step, so a second caller gets nothing.
   */
  claimResult(jobId: string): Readonly<JobRecord> | undefined {
    const current = this.jobs.get(jobId);
    if (!current || current.status !== "done" || !current.resultPath || current.retrievedAt) {
      return undefined;
    }
    this.jobs.set(jobId, Object.freeze({ ...current, retrievedAt: new Date().toISOString() }));
    return current;
  }
}
