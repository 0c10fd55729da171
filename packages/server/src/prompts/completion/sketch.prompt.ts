import { OutputMode } from '@coursewright/shared';
import type { LlmRequest } from '../../services/llm.gateway.js';
import { LLM_MODEL, LLM_SKETCH_PROMPT_TEMPERATURE } from '../constants.js';

// Output feeds an image generation step, so it must be a bare description of
// the physical arrangement with no numbers and no framing text.
export const SKETCH_PROMPT_SYSTEM_PROMPT = `You summarize physics problems for visual representation. You will be given the text of a multiple-choice question and its detailed explanation.

Generate a single, concise, one-sentence description of the physical setup. It will be used as a prompt for an image generation model.

RULES:
1. Describe ONLY the initial physical arrangement of objects, before any action happens.
2. Do NOT describe the question being asked or the solution.
3. Do NOT include specific values, numbers, or complex variables. Keep it generic (e.g. "a block", "an angle theta").
4. Output ONLY the descriptive sentence. No introductory phrases.

EXAMPLES:
- A block of mass 5kg sliding down a 30-degree ramp -> A block on an inclined plane.
- A pendulum of length L swinging -> A simple pendulum hanging from a pivot point.
- Two masses connected by a pulley on a table -> Two masses connected by a string over a pulley, with one mass on a table.`;

export const buildSketchPromptRequest = (questionText: string, explanationText: string): LlmRequest => ({
  systemInstruction: SKETCH_PROMPT_SYSTEM_PROMPT,
  userContent: `QUESTION: ${questionText}\n\nEXPLANATION: ${explanationText}`,
  outputMode: OutputMode.FREE_TEXT,
  model: LLM_MODEL,
  temperature: LLM_SKETCH_PROMPT_TEMPERATURE,
});
