import { parseArgs } from "node:util";
import { ValidationError } from "../core/errors.js";
import {
  ALL_DOCUMENT_TYPES,
  GenerationRequestSchema,
  isDocumentType,
  type DocumentType,
  type GenerationRequest,
} from "../core/schemas/index.js";

export const USAGE =
  'Usage: docsmith-cli [--project <name>] [--types prd,what_is_this,readme] "project description"';

/**
 * Turn command-line arguments into a generation request.
 * Throws ValidationError on an empty description or an unknown type.
 */
export function parseCliArgs(argv: string[]): GenerationRequest {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      project: { type: "string", short: "p" },
      types: { type: "string", short: "t" },
    },
    allowPositionals: true,
  });

  const documentTypes: DocumentType[] = [];
  const rawTypes = values.types?.split(",").map((t) => t.trim()).filter(Boolean);
  for (const raw of rawTypes ?? ALL_DOCUMENT_TYPES) {
    if (!isDocumentType(raw)) {
      throw new ValidationError(
        `Unknown document type "${raw}" (expected one of ${ALL_DOCUMENT_TYPES.join(", ")})`,
      );
    }
    documentTypes.push(raw);
  }

  const result = GenerationRequestSchema.safeParse({
    inputText: positionals.join(" "),
    documentTypes,
    projectName: values.project || undefined,
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message);
    throw new ValidationError(issues.join("; "), issues);
  }
  return result.data;
}
