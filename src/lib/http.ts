import { createHash, timingSafeEqual } from "node:crypto";
import { NextResponse } from "next/server";
import { ServiceError, SubmissionError } from "@/lib/errors";

export function isValidApiKey(candidate: unknown, expected: string | null): boolean {
  if (!expected || typeof candidate !== "string" || candidate.length === 0) {
    return false;
  }
  const a = createHash("sha256").update(candidate).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

export function forbidden(): NextResponse {
  return NextResponse.json({ ok: false, error: "Invalid API key." }, { status: 403 });
}

export function errorResponse(error: unknown, fallbackMessage: string): NextResponse {
  if (error instanceof SubmissionError) {
    const status = error.submissionCode === "unsupported-package-type" ? 422 : 400;
    return NextResponse.json({ ok: false, error: error.message, code: error.code }, { status });
  }

  const message = error instanceof Error ? error.message : fallbackMessage;
  console.error(`[http] ${fallbackMessage}: ${message}`);
  const code = error instanceof ServiceError ? error.code : "internal-error";
  return NextResponse.json({ ok: false, error: fallbackMessage, code }, { status: 500 });
}
