import {
  isDocumentType,
  type DocumentType,
  type SamplingParams,
} from "../schemas/index.js";
import { PROMPT_TEMPLATES } from "./templates.js";

export { PROMPT_TEMPLATES, type PromptTemplate } from "./templates.js";

// ── Sampling policy ───────────────────────────────────────────────────
// PRDs stay close to the facts; overviews are allowed to wander.
export const SAMPLING_POLICY = {
  prd: { maxLength: 3000, temperature: 0.3 },
  what_is_this: { maxLength: 2500, temperature: 0.7 },
  readme: { maxLength: 2000, temperature: 0.5 },
} satisfies Record<DocumentType, SamplingParams>;

export const DEFAULT_SAMPLING: SamplingParams = { maxLength: 2048, temperature: 0.7 };

export function samplingParamsFor(documentType: string): SamplingParams {
  return isDocumentType(documentType) ? SAMPLING_POLICY[documentType] : DEFAULT_SAMPLING;
}

/**
 * Build the full instruction sent to the model for one document.
 * The project name, when given, only changes the opening sentence.
 */
export function buildPrompt(
  inputText: string,
  documentType: DocumentType,
  projectName?: string,
): string {
  const template = PROMPT_TEMPLATES[documentType];
  const context = projectName ? template.context(projectName) : "";
  const sections = template.sections.map((section, idx) => `${idx + 1}. ${section}`);

  return [
    `${template.role} ${template.task}${context} based on the following description.`,
    "",
    "Project Description:",
    inputText,
    "",
    template.intro,
    ...sections,
    "",
    `${template.style} Format the output as Markdown.`,
    "",
    template.cue,
  ].join("\n");
}
