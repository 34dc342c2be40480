import { z } from "zod";

export const DEFAULT_CLASS_LEVEL = "Basic 7";
export const DEFAULT_LESSON = "1";
export const DEFAULT_DURATION = 70;

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Exemplars arrive either pre-split or as one comma-delimited string; both
 * normalize to the same trimmed, non-empty list.
 */
export function splitExemplars(raw: string | readonly string[] | null | undefined): string[] {
  if (raw == null) return [];
  const parts = typeof raw === "string" ? raw.split(",") : raw;
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

const optionalText = (fallback: string) =>
  z
    .string()
    .nullish()
    .transform((v) => (v == null ? fallback : v.trim()));

const DurationSchema = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v, ctx) => {
    if (v == null) return DEFAULT_DURATION;
    const trimmed = typeof v === "string" ? v.trim() : "";
    const n = typeof v === "number" ? v : INTEGER_TEXT.test(trimmed) ? Number(trimmed) : Number.NaN;
    if (!Number.isInteger(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "duration must be a whole number of minutes" });
      return z.NEVER;
    }
    if (n <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "duration must be greater than zero" });
      return z.NEVER;
    }
    return n;
  });

export const LessonRequestSchema = z.object({
  class_level: optionalText(DEFAULT_CLASS_LEVEL),
  lesson: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (v == null ? DEFAULT_LESSON : String(v).trim())),
  strand: optionalText(""),
  content_standard: optionalText(""),
  performance_indicator: optionalText(""),
  exemplars: z.union([z.string(), z.array(z.string())]).nullish().transform(splitExemplars),
  tlrs: optionalText(""),
  duration: DurationSchema,
});

export type LessonRequest = z.output<typeof LessonRequestSchema>;
export type LessonRequestInput = z.input<typeof LessonRequestSchema>;

export type LessonRequestParse = { ok: true; request: LessonRequest } | { ok: false; details: string };

export function parseLessonRequest(body: unknown): LessonRequestParse {
  const parsed = LessonRequestSchema.safeParse(body);
  if (parsed.success) return { ok: true, request: parsed.data };
  const details = parsed.error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
  return { ok: false, details };
}
