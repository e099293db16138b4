import { z } from "zod";
import { RESOLUTION_LABELS } from "../types/models";

export const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "URL must use http or https");

export const resolutionListSchema = z
  .array(z.enum(RESOLUTION_LABELS))
  .min(1, "At least one resolution is required")
  .refine((labels) => new Set(labels).size === labels.length, "Resolutions must not repeat");

export const subtitleSourceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("url"), url: httpUrl }),
  z.object({ kind: z.literal("file"), path: z.string().min(1) }),
]);

export const jobRequestSchema = z.object({
  videoUrl: httpUrl,
  subtitle: subtitleSourceSchema,
  resolutions: resolutionListSchema,
  softSubtitle: z.boolean(),
});

/** JSON body of `POST /api/jobs`. Omitted options fall back to the service defaults. */
export const submitBodySchema = z
  .object({
    videoUrl: z.string(),
    subtitleUrl: z.string(),
    resolutions: z.array(z.string()).optional(),
    softSubtitle: z.boolean().optional(),
  })
  .strict();

const booleanField = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

/** Multipart text fields of `POST /api/jobs/upload`. */
export const uploadFieldsSchema = z.object({
  videoUrl: z.string(),
  resolutions: z.string().optional(),
  softSubtitle: booleanField.optional(),
});

/** Accepts `720p,1080p` or a JSON array string. */
export const parseListField = (raw: string | undefined): string[] | undefined => {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return undefined;
  }
  if (trimmed.startsWith("[")) {
    let decoded: unknown;
    try {
      decoded = JSON.parse(trimmed);
    } catch {
      return [trimmed];
    }
    const parsed = z.array(z.string()).safeParse(decoded);
    return parsed.success ? parsed.data : [trimmed];
  }
  return trimmed
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
};

const assColor = z.string().regex(/^&H[0-9A-Fa-f]{8}$/, "Colour must look like &HAABBGGRR");

export const subtitleStyleSchema = z.object({
  fontSize: z.number().int().min(8).max(200),
  primaryColor: assColor,
  outlineColor: assColor,
  bold: z.boolean(),
  alignment: z.number().int().min(1).max(9),
  marginL: z.number().int().min(0),
  marginR: z.number().int().min(0),
  marginV: z.number().int().min(0),
});
