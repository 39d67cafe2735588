import { NextResponse } from "next/server";
import { z } from "zod";
import { getConfig } from "@/lib/config";
import { SubmissionError } from "@/lib/errors";
import { errorResponse, forbidden, isValidApiKey } from "@/lib/http";
import { getJobManager } from "@/lib/job-manager";
import type { SlideImageInput } from "@/lib/types";

export const runtime = "nodejs";

const kindSchema = z.enum(["metadata", "animation"]).optional();

const RESERVED_FIELDS = new Set(["key", "pres", "kind"]);

export async function POST(request: Request) {
  try {
    const formData = await request.formData();
    if (!isValidApiKey(formData.get("key"), getConfig().apiKey)) {
      return forbidden();
    }

    const pres = formData.get("pres");
    if (!(pres instanceof File) || pres.size === 0) {
      throw new SubmissionError("Attach the presentation in the `pres` field.", "missing-package");
    }

    const slideImages: SlideImageInput[] = [];
    for (const [field, value] of formData.entries()) {
      if (RESERVED_FIELDS.has(field) || !(value instanceof File) || value.size === 0) {
        continue;
      }
      slideImages.push({
        name: field,
        fileName: value.name,
        bytes: Buffer.from(await value.arrayBuffer()),
      });
    }

    const rawKind = formData.get("kind");
    const parsedKind = kindSchema.safeParse(typeof rawKind === "string" && rawKind ? rawKind : undefined);
    if (!parsedKind.success) {
      throw new SubmissionError("`kind` must be metadata or animation.", "invalid-kind");
    }
    const kind = parsedKind.data ?? (slideImages.length > 0 ? "animation" : "metadata");

    const jobId = await getJobManager().submit(kind, {
      packageName: pres.name,
      packageBytes: Buffer.from(await pres.arrayBuffer()),
      slideImages,
    });

    return NextResponse.json({ ok: true, jobId, kind });
  } catch (error) {
    return errorResponse(error, "Submission failed.");
  }
}
