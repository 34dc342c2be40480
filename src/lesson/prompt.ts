import type { LessonRequest } from "../validators.js";
import { computePhaseBudget, type PhaseBudget } from "./phases.js";
import type { LessonTemplate } from "./templates.js";

export interface BuiltPrompt {
  systemInstruction: string;
  userMessage: string;
  budget: PhaseBudget;
}

const NOT_PROVIDED = "(not provided)";

function line(label: string, value: string): string {
  return `${label}: ${value || NOT_PROVIDED}`;
}

export function buildUserMessage(request: LessonRequest, budget: PhaseBudget): string {
  const exemplarLines = request.exemplars.length
    ? request.exemplars.map((e, i) => line(`Exemplar ${i + 1}`, e))
    : [line("Exemplars", "")];

  return [
    line("Class", request.class_level),
    line("Lesson", request.lesson),
    line("Strand", request.strand),
    line("Content Standard", request.content_standard),
    line("Performance Indicator", request.performance_indicator),
    ...exemplarLines,
    line("T/L Resources", request.tlrs),
    `Duration: ${request.duration} minutes`,
    `Phase 1 (Starter): ${budget.phase1} minutes`,
    `Phase 2 (Main): ${budget.phase2} minutes`,
    `Phase 3 (Reflection): ${budget.phase3} minutes`,
  ].join("\n");
}

export function buildPrompt(request: LessonRequest, template: LessonTemplate): BuiltPrompt {
  const budget = computePhaseBudget(request.duration);
  return {
    systemInstruction: template.system({ classLevel: request.class_level || "the given class", budget }),
    userMessage: buildUserMessage(request, budget),
    budget,
  };
}
