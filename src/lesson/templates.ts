/**
 * Prompt template table
 *
 * Every prompt revision the relay has shipped lives here as data. A deployment
 * picks one entry through `TEMPLATE_ID`; the entry decides the system prompt,
 * the output shape the normalizer enforces and the JSON hints sent upstream.
 */

import type { PhaseBudget } from "./phases.js";

export type OutputShape = "flat" | "nested" | "text";

/** Subset of the OpenAPI schema dialect providers accept for constrained decoding. */
export interface ResponseSchema {
  type: "OBJECT" | "ARRAY" | "STRING";
  properties?: Record<string, ResponseSchema>;
  items?: ResponseSchema;
  required?: string[];
  description?: string;
}

export interface SystemTemplateInput {
  classLevel: string;
  budget: PhaseBudget;
}

export interface LessonTemplate {
  id: TemplateId;
  outputShape: OutputShape;
  /** Fold a sibling `assessment` into `phase2` (flat shape only). */
  mergeAssessment: boolean;
  jsonMode: boolean;
  responseSchema?: ResponseSchema;
  system: (input: SystemTemplateInput) => string;
}

export const TEMPLATE_IDS = ["flat-merged", "flat", "nested", "classic-text"] as const;
export type TemplateId = (typeof TEMPLATE_IDS)[number];

// ============================================================
// SHARED PROMPT FRAGMENTS
// ============================================================

function persona(classLevel: string): string {
  return [
    `You are an expert Ghanaian lesson planner writing for ${classLevel} learners.`,
    "Use simple, clear language and real-life examples relevant to Ghanaian learners.",
    "Use only the information provided. Do not add extra sections or commentary.",
  ].join("\n");
}

function timingRules(budget: PhaseBudget): string {
  return [
    "Timing:",
    `- Phase 1 (Starter) must take exactly ${budget.phase1} minutes (never more than 10).`,
    `- Phase 2 (Main) must take at least ${budget.phase2} minutes; it carries the lesson.`,
    `- Phase 3 (Reflection) must take exactly ${budget.phase3} minutes (never more than 10).`,
  ].join("\n");
}

const EXEMPLAR_RULES = [
  "Exemplars:",
  "- Write one teacher-learner activity per exemplar, grounded in the exemplar and the T/L Resources.",
  "- Never copy or restate an exemplar verbatim; turn it into an instruction (e.g. \"Guide learners to discuss...\").",
  "- Do NOT begin activities with \"Using T/LR,\".",
].join("\n");

const JSON_ONLY = "Return ONLY a valid JSON object. No markdown, no code fences, no text before or after the JSON.";

// ============================================================
// RESPONSE SCHEMAS
// ============================================================

const STRING: ResponseSchema = { type: "STRING" };
const STRING_LIST: ResponseSchema = { type: "ARRAY", items: STRING };

const FLAT_SCHEMA: ResponseSchema = {
  type: "OBJECT",
  properties: { phase1: STRING, phase2: STRING, assessment: STRING, phase3: STRING },
  required: ["phase1", "phase2", "assessment", "phase3"],
};

const NESTED_SCHEMA: ResponseSchema = {
  type: "OBJECT",
  properties: {
    phase1: STRING,
    phase2: {
      type: "OBJECT",
      properties: {
        activities: STRING_LIST,
        content: {
          type: "ARRAY",
          description: "One entry per key concept",
          items: {
            type: "OBJECT",
            properties: { heading: STRING, notes: STRING },
            required: ["heading", "notes"],
          },
        },
        assessment: STRING_LIST,
      },
      required: ["activities", "content", "assessment"],
    },
    phase3: STRING,
  },
  required: ["phase1", "phase2", "phase3"],
};

// ============================================================
// TEMPLATES
// ============================================================

function flatSystem({ classLevel, budget }: SystemTemplateInput): string {
  return [
    persona(classLevel),
    "",
    "Write a three-phase lesson plan as a JSON object with exactly these string keys:",
    "\"phase1\": the starter. Engage learners and connect to prior knowledge.",
    "\"phase2\": the main phase. Start with \"Teacher-Learner Activities:\" followed by numbered activities (1., 2., ...),",
    "  then one ALL-CAPS heading per key concept, each followed by a short explanation.",
    "\"assessment\": numbered exercise questions (1., 2., ...), one per key concept.",
    "\"phase3\": the reflection. Summarise the lesson and check understanding.",
    "Every value must be a single string; use \\n for line breaks, never arrays.",
    "",
    EXEMPLAR_RULES,
    "",
    timingRules(budget),
    "",
    JSON_ONLY,
  ].join("\n");
}

function nestedSystem({ classLevel, budget }: SystemTemplateInput): string {
  return [
    persona(classLevel),
    "",
    "Write a three-phase lesson plan as a JSON object with these keys:",
    "\"phase1\": string. The starter. Engage learners and connect to prior knowledge.",
    "\"phase2\": object with:",
    "  \"activities\": array of strings, one numbered teacher-learner activity per exemplar;",
    "  \"content\": array of {\"heading\", \"notes\"}, one per key concept, headings in ALL CAPS;",
    "  \"assessment\": array of strings, one exercise question per key concept.",
    "\"phase3\": string. The reflection. Summarise the lesson and check understanding.",
    "",
    EXEMPLAR_RULES,
    "",
    timingRules(budget),
    "",
    JSON_ONLY,
  ].join("\n");
}

function classicTextSystem({ classLevel, budget }: SystemTemplateInput): string {
  return [
    persona(classLevel),
    "You must generate responses in the following strict format:",
    "",
    "Teacher-Learner Activities:",
    "1. [Specific activity related to first exemplar, using the T/L Resources].",
    "2. [Specific activity related to second exemplar, using the T/L Resources].",
    "...",
    "",
    "[KEY CONCEPT 1 IN ALL CAPS]",
    "Explanation of the concept in simple, clear language.",
    "",
    "[KEY CONCEPT 2 IN ALL CAPS]",
    "Explanation of the next concept...",
    "",
    "Exercise;",
    "1. Question based on first concept.<br>",
    "2. Question based on second concept.<br>",
    "...",
    "",
    "Rules:",
    "- Start with \"Teacher-Learner Activities:\" followed by numbered activities (1., 2., etc.).",
    "- Use ALL CAPS for concept headings (e.g., ELECTRONIC SPREADSHEET) and one explanation per concept.",
    "- End with \"Exercise;\" followed by numbered questions with <br> tags.",
    "",
    EXEMPLAR_RULES,
    "",
    timingRules(budget),
  ].join("\n");
}

export const TEMPLATES: Record<TemplateId, LessonTemplate> = {
  "flat-merged": {
    id: "flat-merged",
    outputShape: "flat",
    mergeAssessment: true,
    jsonMode: true,
    responseSchema: FLAT_SCHEMA,
    system: flatSystem,
  },
  flat: {
    id: "flat",
    outputShape: "flat",
    mergeAssessment: false,
    jsonMode: true,
    responseSchema: FLAT_SCHEMA,
    system: flatSystem,
  },
  nested: {
    id: "nested",
    outputShape: "nested",
    mergeAssessment: false,
    jsonMode: true,
    responseSchema: NESTED_SCHEMA,
    system: nestedSystem,
  },
  "classic-text": {
    id: "classic-text",
    outputShape: "text",
    mergeAssessment: false,
    jsonMode: false,
    system: classicTextSystem,
  },
};

export function getTemplate(id: TemplateId): LessonTemplate {
  return TEMPLATES[id];
}
