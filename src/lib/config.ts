/**
 * Service configuration, read from the environment once per process.
 */

import path from "node:path";
import { z } from "zod";
import { ConfigError } from "@/lib/errors";

const intFromEnv = (defaultValue: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (!value) {
        return defaultValue;
      }
      const parsed = Number(value);
      if (!Number.isInteger(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be an integer" });
        return z.NEVER;
      }
      return parsed;
    });

const envSchema = z.object({
  API_KEY: z.string().optional(),
  TEMP_DIR: z.string().trim().optional(),
  WORKER_CONCURRENCY: intFromEnv(2).pipe(z.number().min(1).max(32)),
  JOB_TIMEOUT_MS: intFromEnv(600_000).pipe(z.number().min(0)),
  MIN_FRAME_INTERVAL_MS: intFromEnv(10).pipe(z.number().min(1)),
  GIF_LOOP: intFromEnv(0).pipe(z.number().min(0).max(65535)),
});

export type ServiceConfig = {
  apiKey: string | null;
  dataDir: string;
  jobsDir: string;
  workerConcurrency: number;
  jobTimeoutMs: number;
  minFrameIntervalMs: number;
  gifLoop: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? issue.path.join(".") : "environment";
    throw new ConfigError(`${variable}: ${issue?.message ?? "invalid value"}`, { variable });
  }

  const values = parsed.data;
  const dataDir = path.resolve(values.TEMP_DIR || path.join(process.cwd(), "data"));

  return {
    apiKey: values.API_KEY ? values.API_KEY : null,
    dataDir,
    jobsDir: path.join(dataDir, "jobs"),
    workerConcurrency: values.WORKER_CONCURRENCY,
    jobTimeoutMs: values.JOB_TIMEOUT_MS,
    minFrameIntervalMs: values.MIN_FRAME_INTERVAL_MS,
    gifLoop: values.GIF_LOOP,
  };
}

let cachedConfig: ServiceConfig | null = null;

export function getConfig(): ServiceConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
