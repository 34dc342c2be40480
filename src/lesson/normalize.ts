/**
 * Response normalizer
 *
 * Turns whatever the model produced into the lesson plan contract, or into a
 * typed failure. Every step is a small pure function so each repair rule can
 * be exercised on its own; `normalize` only sequences them.
 */

import type { FinishReason, RawModelOutput } from "../ai.js";
import type { LessonTemplate } from "./templates.js";

export interface FlatLessonPlan {
  phase1: string;
  phase2: string;
  assessment: string;
  phase3: string;
}

export type MergedLessonPlan = Omit<FlatLessonPlan, "assessment">;

export interface NestedLessonPlan {
  phase1: string;
  phase2: {
    activities: string[];
    content: Record<string, string>;
    assessment: string[];
  };
  phase3: string;
}

export interface TextLessonPlan {
  content: string;
}

export type LessonPlanResult = FlatLessonPlan | MergedLessonPlan | NestedLessonPlan | TextLessonPlan;

export type NormalizationError =
  | { kind: "blocked_or_empty"; finishReason: FinishReason; providerReason: string | null }
  | { kind: "invalid_json"; rawText: string; message: string; truncated: boolean }
  | { kind: "primary_content_empty"; field: string };

export type NormalizeResult = { ok: true; plan: LessonPlanResult } | { ok: false; error: NormalizationError };

type JsonObject = Record<string, unknown>;

export const ASSESSMENT_DELIMITER = "\n\n\n**ASSESSMENT**\n\n";
export const DEFAULT_EXERCISE =
  "\nExercise;\n1. What did you learn today?<br>\n2. How can you apply this?<br>\n3. Any questions?";

const FLAT_KEYS = ["phase1", "phase2", "assessment", "phase3"] as const;
const BLOCKING_REASONS: ReadonlySet<FinishReason> = new Set(["SAFETY", "RECITATION"]);

function isRecord(v: unknown): v is JsonObject {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

// ============================================================
// STEP 1: BLOCKED / EMPTY
// ============================================================

export function checkBlockedOrEmpty(raw: RawModelOutput): NormalizationError | null {
  if (!raw.text.trim() || BLOCKING_REASONS.has(raw.finishReason)) {
    return { kind: "blocked_or_empty", finishReason: raw.finishReason, providerReason: raw.providerFinishReason };
  }
  return null;
}

// ============================================================
// STEPS 2-3: TEXT CLEANUP
// ============================================================

const FENCE = "```";
const FENCE_OPENER = /^```(?:json)?[ \t]*(?:\r?\n|(?=[{[]))/i;

/**
 * Removes a surrounding ```json fence. Only a leading opener plus a trailing
 * closer count; fences elsewhere in the text are content.
 */
export function stripCodeFence(text: string): string {
  const s = text.trim();
  if (s.length < FENCE.length * 2 || !s.endsWith(FENCE)) return s;
  const opener = FENCE_OPENER.exec(s);
  if (!opener) return s;
  return s.slice(opener[0].length, s.length - FENCE.length).trim();
}

/** Drops `**`/`***` emphasis runs; single `*` and underscores are content. */
export function stripEmphasis(text: string): string {
  return text.replace(/\*{2,}/g, "");
}

// ============================================================
// STEP 4: STRICT PARSE
// ============================================================

/** True when an object or array is opened but never closed, e.g. output cut at the token cap. */
export function hasUnbalancedBrackets(text: string): boolean {
  let depth = 0;
  let inString = false;
  let esc = false;
  for (const ch of text) {
    if (esc) {
      esc = false;
      continue;
    }
    if (inString && ch === "\\") {
      esc = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;
    if (ch === "{" || ch === "[") depth++;
    else if (ch === "}" || ch === "]") depth--;
  }
  return depth > 0 || inString;
}

export type ParseResult = { ok: true; value: JsonObject } | { ok: false; error: NormalizationError };

export function parseStrictJson(cleaned: string, raw: RawModelOutput): ParseResult {
  const truncated = raw.finishReason === "LENGTH" || (cleaned.startsWith("{") && hasUnbalancedBrackets(cleaned));
  let value: unknown;
  try {
    value = JSON.parse(cleaned);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: { kind: "invalid_json", rawText: raw.text, message, truncated } };
  }
  if (!isRecord(value)) {
    return {
      ok: false,
      error: { kind: "invalid_json", rawText: raw.text, message: "Expected a JSON object at the top level", truncated },
    };
  }
  return { ok: true, value };
}

// ============================================================
// STEP 5: SHAPE REPAIR
// ============================================================

/** Collapses whatever the model put in a string slot into a string. */
export function coerceText(value: unknown): string {
  if (value == null) return "";
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return value.map(coerceText).join("\n");
  if (isRecord(value)) {
    return Object.entries(value)
      .map(([heading, v]) => `${heading}:\n${coerceText(v)}`)
      .join("\n\n");
  }
  return String(value);
}

function toLines(value: unknown): string[] {
  if (value == null) return [];
  const lines = Array.isArray(value) ? value.map(coerceText) : coerceText(value).split(/\r?\n/);
  return lines.map((l) => l.trim()).filter((l) => l.length > 0);
}

function toContentMap(value: unknown): Record<string, string> {
  // Null prototype: headings such as "__proto__" are kept as plain keys.
  const out: Record<string, string> = Object.create(null);
  const loose: string[] = [];

  if (typeof value === "string") {
    if (value.trim()) loose.push(value.trim());
  } else if (Array.isArray(value)) {
    for (const entry of value) {
      if (isRecord(entry) && typeof entry.heading === "string" && entry.heading.trim()) {
        out[entry.heading.trim()] = coerceText(entry.notes ?? entry.content).trim();
      } else {
        const text = coerceText(entry).trim();
        if (text) loose.push(text);
      }
    }
  } else if (isRecord(value)) {
    for (const [heading, notes] of Object.entries(value)) {
      if (heading.trim()) out[heading.trim()] = coerceText(notes).trim();
    }
  }

  if (loose.length) out.Notes = [out.Notes, ...loose].filter(Boolean).join("\n");
  return out;
}

export function repairFlat(obj: JsonObject, mergeAssessment: boolean): FlatLessonPlan | MergedLessonPlan {
  const flat: FlatLessonPlan = { phase1: "", phase2: "", assessment: "", phase3: "" };
  for (const key of FLAT_KEYS) flat[key] = coerceText(obj[key]);

  if (!mergeAssessment) return flat;

  // A blank main phase stays blank so the primary-content check still sees it.
  const phase2 = flat.phase2.trim() && flat.assessment.trim() ?`${flat.phase2}${ASSESSMENT_DELIMITER}${flat.assessment}` : flat.phase2;
  return { phase1: flat.phase1, phase2, phase3: flat.phase3 };
}

export function repairNested(obj: JsonObject): NestedLessonPlan {
  const rawPhase2 = obj.phase2;
  const phase2: NestedLessonPlan["phase2"] = isRecord(rawPhase2)
    ? {
        activities: toLines(rawPhase2.activities),
        content: toContentMap(rawPhase2.content),
        assessment: toLines(rawPhase2.assessment),
      }
    : { activities: toLines(rawPhase2), content: {}, assessment: [] };

  // Some revisions emit the questions as a sibling of phase2.
  phase2.assessment.push(...toLines(obj.assessment));

  return { phase1: coerceText(obj.phase1), phase2, phase3: coerceText(obj.phase3) };
}

/**
 * Raw-text plans must close with an "Exercise;" block. A renamed
 * "Assessment;" heading is restored; a list of <br>-terminated questions with
 * no heading gets a default block appended.
 */
export function repairExerciseSection(content: string): string {
  if (content.includes("Exercise;") || content.includes("exercise;")) return content;
  if (content.includes("Assessment;")) return content.split("Assessment;").join("Exercise;");

  const brCount = content.split("<br>").length - 1;
  if (brCount >= 2) {
    const tail = content.slice(content.lastIndexOf("<br>") + "<br>".length).trim();
    if (tail === "" || /^\d+$/.test(tail)) return `${content}${DEFAULT_EXERCISE}`;
  }
  return content;
}

// ============================================================
// STEP 6: PRIMARY CONTENT
// ============================================================

export function isPrimaryContentEmpty(plan: LessonPlanResult): boolean {
  if ("content" in plan) return !plan.content.trim();
  if (typeof plan.phase2 === "string") return !plan.phase2.trim();
  return plan.phase2.activities.length === 0 && Object.keys(plan.phase2.content).length === 0;
}

// ============================================================
// PIPELINE
// ============================================================

export function normalize(
  raw: RawModelOutput,
  template: Pick<LessonTemplate, "outputShape" | "mergeAssessment">,
): NormalizeResult {
  const blocked = checkBlockedOrEmpty(raw);
  if (blocked) return { ok: false, error: blocked };

  const cleaned = stripEmphasis(stripCodeFence(raw.text)).trim();

  let plan: LessonPlanResult;
  if (template.outputShape === "text") {
    plan = { content: repairExerciseSection(cleaned) };
  } else {
    const parsed = parseStrictJson(cleaned, raw);
    if (!parsed.ok) return parsed;
    plan =
      template.outputShape === "nested"
        ? repairNested(parsed.value)
        : repairFlat(parsed.value, template.mergeAssessment);
  }

  if (isPrimaryContentEmpty(plan)) {
    return { ok: false, error: { kind: "primary_content_empty", field: "content" in plan ? "content" : "phase2" } };
  }
  return { ok: true, plan };
}
