/**
 * Reading a protocol out of generator output.
 *
 * The generator answers in a snake_case wire shape (`time`, `temp`,
 * `notes`, `critical_notes`, `safety_warnings`). Scalars are accepted
 * where text is expected and stringified; nulls and blank entries are
 * dropped; steps are renumbered from 1 in array order.
 */

import { z } from "zod";
import type { ProcedureStep, Protocol } from "../types.js";

export const UNTITLED_PROTOCOL = "Untitled protocol";

const LooseText = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value).trim());

const TextList = z
  .array(LooseText.nullable())
  .nullish()
  .transform((items) => (items ?? []).filter((item): item is string => item !== null && item !== ""));

const WireStepSchema = z.union([
  z.object({
    step: z.unknown().optional(),
    action: LooseText,
    time: LooseText.nullish(),
    temp: LooseText.nullish(),
    notes: LooseText.nullish(),
  }),
  LooseText.transform((action) => ({ action, time: undefined, temp: undefined, notes: undefined })),
]);

const WireProtocolSchema = z.object({
  title: LooseText.nullish(),
  reagents: TextList,
  materials: TextList,
  preparation: TextList,
  procedure: z.array(WireStepSchema).nullish(),
  conditions: z.record(LooseText.nullable()).nullish(),
  critical_notes: TextList,
  safety_warnings: TextList,
});

type WireStep = z.infer<typeof WireStepSchema>;

/** The generated part of a Protocol. */
export type ProtocolBody = Pick<
  Protocol,
  "title" | "reagents" | "materials" | "preparation" | "procedure" | "conditions" | "criticalNotes" | "safetyWarnings"
>;

export type ProtocolResponseResult = { success: true; data: ProtocolBody } | { success: false; reason: string };

/** The outermost `{...}` span of `text`, or null. */
export function extractJsonObject(text: string): string | null {
  const match = text.match(/\{[\s\S]*\}/);
  return match ? match[0] : null;
}

function toStep(wire: WireStep, index: number): ProcedureStep {
  const step: { -readonly [K in keyof ProcedureStep]: ProcedureStep[K] } = {
    step: index + 1,
    action: wire.action,
  };
  if (wire.time) step.duration = wire.time;
  if (wire.temp) step.temperature = wire.temp;
  if (wire.notes) step.note = wire.notes;
  return step;
}

function toConditions(wire: Record<string, string | null> | null | undefined): Record<string, string> {
  const conditions: Record<string, string> = {};
  for (const [name, value] of Object.entries(wire ?? {})) {
    if (value) conditions[name] = value;
  }
  return conditions;
}

export function parseProtocolResponse(text: string): ProtocolResponseResult {
  const json = extractJsonObject(text);
  if (json === null) {
    return { success: false, reason: "response contains no JSON object" };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return { success: false, reason: "response JSON does not parse" };
  }

  const parsed = WireProtocolSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    return { success: false, reason: `response does not match the protocol schema${where}` };
  }

  const wire = parsed.data;
  const steps = (wire.procedure ?? []).filter((step) => step.action !== "");
  return {
    success: true,
    data: {
      title: wire.title || UNTITLED_PROTOCOL,
      reagents: wire.reagents,
      materials: wire.materials,
      preparation: wire.preparation,
      procedure: steps.map(toStep),
      conditions: toConditions(wire.conditions),
      criticalNotes: wire.critical_notes,
      safetyWarnings: wire.safety_warnings,
    },
  };
}
