/**
 * Instructions sent to the text generator.
 */

import type { ProtocolStyle } from "../types.js";

export const SYSTEM_INSTRUCTION = `You are an expert in laboratory protocols and scientific methodology.
You turn the methods sections of scientific articles into clear, structured protocols that can be followed at the bench.

Always answer with a single JSON object of this shape:
{
  "title": "Descriptive protocol title",
  "reagents": ["reagent with concentration"],
  "materials": ["equipment or consumable"],
  "preparation": ["preparation step"],
  "procedure": [
    {"step": 1, "action": "what to do", "time": "duration", "temp": "temperature", "notes": "observations"}
  ],
  "conditions": {"total_time": "estimated total", "temperature": "working temperature", "special_conditions": "other conditions"},
  "critical_notes": ["point that decides success"],
  "safety_warnings": ["safety precaution"]
}`;

export const STYLE_INSTRUCTIONS: Record<ProtocolStyle, string> = {
  detailed: "Include every detail, exact volumes and times, and alternatives where the text offers them.",
  concise: "Be concise but complete. Keep only the essential steps.",
  educational: "For each step explain why it is done and the scientific principle behind it.",
};

const REQUIREMENTS = [
  "Extract every reagent with its concentration.",
  "List all required equipment and materials.",
  "Describe the preparation steps.",
  "Write a numbered procedure with times and temperatures.",
  "State critical conditions such as pH, temperature and timing.",
  "Add safety notes.",
  "Flag any critical information missing from the text.",
];

/** User turn for one methods text. */
export function buildUserInstruction(methodsText: string, style: ProtocolStyle): string {
  const requirements = REQUIREMENTS.map((line, i) => `${i + 1}. ${line}`).join("\n");
  return `Turn the following methods section into a structured laboratory protocol.

Style: ${style}. ${STYLE_INSTRUCTIONS[style]}

Methods section:
${methodsText}

Requirements:
${requirements}

Respond ONLY with the JSON object.`;
}
