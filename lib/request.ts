import { z } from "zod";
import { RequestValidationError } from "@/lib/errors";

const nonEmpty = z.string().trim().min(1);

export const transcriptionRequestSchema = z
  .object({
    url: nonEmpty
      .url()
      .refine((value) => /^https?:\/\//i.test(value), "url must use http or https")
      .optional(),
    google_drive_url: nonEmpty.optional(),
    base64_data: nonEmpty.optional(),
    filename: z.string().trim().min(1).max(255).optional(),
    language: z.string().trim().min(2).max(10).optional(),
    extract_subtitles: z.boolean().default(false),
    max_segment_minutes: z.number().int().min(1).max(60).optional(),
  })
  .superRefine((value, ctx) => {
    const sources = [value.url, value.google_drive_url, value.base64_data].filter(
      (source) => source !== undefined
    );
    if (sources.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Provide exactly one of url, google_drive_url or base64_data",
      });
    }
  });

export type TranscriptionRequest = z.infer<typeof transcriptionRequestSchema>;

/** Validate caller input; nothing is created when this throws. */
export function parseTranscriptionRequest(input: unknown): TranscriptionRequest {
  const parsed = transcriptionRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new RequestValidationError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
}
