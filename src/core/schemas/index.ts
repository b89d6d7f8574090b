import { z } from "zod";

export const MAX_INPUT_LENGTH = 10_000;

/** Length in characters (code points), so an emoji counts once. */
export function charLength(text: string): number {
  return [...text].length;
}

// ── Document types ────────────────────────────────────────────────────
export const DocumentTypeSchema = z.enum(["prd", "what_is_this", "readme"]);
export type DocumentType = z.infer<typeof DocumentTypeSchema>;

export const ALL_DOCUMENT_TYPES: readonly DocumentType[] = DocumentTypeSchema.options;

export function isDocumentType(value: string): value is DocumentType {
  return DocumentTypeSchema.safeParse(value).success;
}

// ── Generation request ────────────────────────────────────────────────
export const GenerationRequestSchema = z.object({
  inputText: z
    .string()
    .refine((text) => text.trim().length > 0, "Input text cannot be empty")
    .refine(
      (text) => charLength(text) <= MAX_INPUT_LENGTH,
      "Input text too long (max 10,000 characters)",
    ),
  documentTypes: z.array(DocumentTypeSchema).default([...ALL_DOCUMENT_TYPES]),
  projectName: z.string().min(1).optional(),
  additionalContext: z.record(z.unknown()).default({}),
});
export type GenerationRequest = z.infer<typeof GenerationRequestSchema>;
export type GenerationRequestInput = z.input<typeof GenerationRequestSchema>;

// ── Generated document ────────────────────────────────────────────────
export const GeneratedDocumentSchema = z.object({
  documentType: DocumentTypeSchema,
  content: z.string(),
  metadata: z.record(z.unknown()),
});
export type GeneratedDocument = z.infer<typeof GeneratedDocumentSchema>;

// ── Model info ────────────────────────────────────────────────────────
export const ModelInfoSchema = z.object({
  modelName: z.string().min(1),
  loaded: z.boolean(),
  service: z.string().min(1),
  baseUrl: z.string(),
});
export type ModelInfo = z.infer<typeof ModelInfoSchema>;

export const MemoryUsageSchema = z.object({
  service: z.string(),
  localService: z.boolean(),
  memoryInfo: z.string(),
});
export type MemoryUsage = z.infer<typeof MemoryUsageSchema>;

// ── Generation response ───────────────────────────────────────────────
export const GenerationResponseSchema = z.object({
  documents: z.array(GeneratedDocumentSchema),
  generationTime: z.number().nonnegative(),
  modelInfo: ModelInfoSchema,
});
export type GenerationResponse = z.infer<typeof GenerationResponseSchema>;

// ── Sampling parameters ───────────────────────────────────────────────
export const SamplingParamsSchema = z.object({
  maxLength: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
});
export type SamplingParams = z.infer<typeof SamplingParamsSchema>;
