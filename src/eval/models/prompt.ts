import { createHash } from "node:crypto";
import type { Answer, PromptTemplateId } from "../types.js";

export interface PromptTemplate {
  readonly id: PromptTemplateId;
  readonly description: string;
  readonly systemPrompt: string;
  buildUserPrompt(answer: Answer): string;
}

const OUTPUT_CONTRACT = `You MUST respond with ONLY a valid JSON object, no markdown:
{ "score": <number 0-100>, "rationale": "<2-4 sentences>" }
The score is an integer or decimal between 0 and 100 inclusive.`;

function answerBlock(answer: Answer): string {
  let block = "";
  if (answer.domain) block += `Domain: ${answer.domain}\n`;
  if (answer.question) block += `Question: ${answer.question}\n`;
  block += `Answer:\n${answer.text}`;
  return block;
}

const answerQuality: PromptTemplate = {
  id: "answer_quality",
  description: "General answer quality against a weighted rubric",
  systemPrompt: `You are a strict, consistent interview evaluator. Grade the candidate's answer on a 0-100 scale.

Weighting:
- Alignment with what the question is really asking (25)
- Fit with the role and domain (18)
- Logical structure: claims supported by reasons (12)
- Credibility: concrete, plausible experience without exaggeration (12)
- Use of relevant terminology and specifics (10)
- Professional, courteous tone (23)

Do not be generous. An answer that ignores the question scores below 30.

${OUTPUT_CONTRACT}`,
  buildUserPrompt: (answer) => `Evaluate this interview answer.\n\n${answerBlock(answer)}\n\nReturn your evaluation as a single JSON object.`,
};

const intentAlignment: PromptTemplate = {
  id: "intent_alignment",
  description: "Infer the question's intent first, then grade against it",
  systemPrompt: `You are an interview evaluator. Work in two steps.
Step 1: from the question alone, decide what the interviewer wants to learn.
Step 2: grade how well the answer serves that intent on a 0-100 scale, weighting intent match most heavily, then specificity, then logic and tone.
Mention the inferred intent in the first sentence of the rationale.

${OUTPUT_CONTRACT}`,
  buildUserPrompt: (answer) =>
    `${answer.question ? "" : "No question text was supplied; infer the intent from the answer's content.\n\n"}${answerBlock(answer)}\n\nReturn your evaluation as a single JSON object.`,
};

const finalReview: PromptTemplate = {
  id: "final_review",
  description: "Conservative holistic review used for final reports",
  systemPrompt: `You are a senior hiring reviewer producing a final, holistic score for one interview answer.
Judge strengths and weaknesses together and point out missing essentials. Grade conservatively on a 0-100 scale; reserve scores above 85 for answers you would quote as exemplary.

${OUTPUT_CONTRACT}`,
  buildUserPrompt: (answer) => `Give your final review of this answer.\n\n${answerBlock(answer)}\n\nReturn your evaluation as a single JSON object.`,
};

export const PROMPT_TEMPLATES: Readonly<Record<PromptTemplateId, PromptTemplate>> = {
  answer_quality: answerQuality,
  intent_alignment: intentAlignment,
  final_review: finalReview,
};

export function getPromptTemplate(id: PromptTemplateId): PromptTemplate {
  return PROMPT_TEMPLATES[id];
}

/**
 * SHA-256 of template system prompt + user prompt, for drift auditing.
 * @returns 16-char hex hash
 */
export function hashPrompt(templateId: PromptTemplateId, userPrompt: string): string {
  const combined = PROMPT_TEMPLATES[templateId].systemPrompt + "\n---\n" + userPrompt;
  return createHash("sha256").update(combined).digest("hex").slice(0, 16);
}
