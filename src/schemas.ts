/**
 * zod schemas for values read back from the cache.
 * A cached payload that fails these is treated as a cache miss.
 */

import { z } from "zod";
import type { Article, ProcedureStep, Protocol } from "./types.js";

export const ArticleSchema = z.object({
  pmcId: z.string().min(1),
  pmid: z.string().nullable(),
  title: z.string(),
  authors: z.array(z.string()),
  journal: z.string(),
  year: z.string(),
  doi: z.string().nullable(),
  abstract: z.string().nullable(),
  methodsText: z.string().nullable(),
  fullTextUrl: z.string(),
});

export const ProcedureStepSchema = z.object({
  step: z.number().int().positive(),
  action: z.string(),
  duration: z.string().optional(),
  temperature: z.string().optional(),
  note: z.string().optional(),
});

export const ProtocolSchema = z.object({
  title: z.string(),
  article: ArticleSchema,
  reagents: z.array(z.string()),
  materials: z.array(z.string()),
  preparation: z.array(z.string()),
  procedure: z.array(ProcedureStepSchema),
  conditions: z.record(z.string()),
  criticalNotes: z.array(z.string()),
  safetyWarnings: z.array(z.string()),
  generatedAt: z.string(),
  model: z.string(),
});

export const IdListSchema = z.array(z.string());

/** Build a frozen Article. */
export function freezeArticle(fields: Article): Article {
  return Object.freeze({ ...fields, authors: Object.freeze([...fields.authors]) });
}

function freezeStep(step: ProcedureStep): ProcedureStep {
  const frozen: { -readonly [K in keyof ProcedureStep]: ProcedureStep[K] } = {
    step: step.step,
    action: step.action,
  };
  if (step.duration !== undefined) frozen.duration = step.duration;
  if (step.temperature !== undefined) frozen.temperature = step.temperature;
  if (step.note !== undefined) frozen.note = step.note;
  return Object.freeze(frozen);
}

/** Build a frozen Protocol, freezing its article and nested collections too. */
export function freezeProtocol(fields: Protocol): Protocol {
  return Object.freeze({
    ...fields,
    article: freezeArticle(fields.article),
    reagents: Object.freeze([...fields.reagents]),
    materials: Object.freeze([...fields.materials]),
    preparation: Object.freeze([...fields.preparation]),
    procedure: Object.freeze(fields.procedure.map(freezeStep)),
    conditions: Object.freeze({ ...fields.conditions }),
    criticalNotes: Object.freeze([...fields.criticalNotes]),
    safetyWarnings: Object.freeze([...fields.safetyWarnings]),
  });
}
