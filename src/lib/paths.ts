import fs from "node:fs";
import path from "node:path";
import { randomBytes } from "node:crypto";

export function ensureDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

/** `job-` plus 32 random hex digits; the id is the only handle on a job. */
export function createJobId(): string {
  return `job-${randomBytes(16).toString("hex")}`;
}

export function getJobDir(jobsDir: string, jobId: string): string {
  return safeJoin(jobsDir, jobId);
}

export function safeJoin(baseDir: string, target: string): string {
  const base = path.resolve(baseDir);
  const resolved = path.resolve(base, target);
  if (resolved !== base && !resolved.startsWith(`${base}${path.sep}`)) {
    throw new Error(`Path escapes ${base}: ${target}`);
  }
  return resolved;
}
