import type { DocumentType } from "../schemas/index.js";

export interface PromptTemplate {
  /** Persona the model is asked to adopt. */
  role: string;
  /** Opening instruction, completed by the project context phrase. */
  task: string;
  /** Renders the project name into the opening sentence. */
  context: (projectName: string) => string;
  intro: string;
  sections: readonly string[];
  style: string;
  /** Trailing cue the completion starts from. */
  cue: string;
}

export const PROMPT_TEMPLATES = {
  prd: {
    role: "You are a senior product manager.",
    task: "Create a comprehensive Product Requirements Document (PRD)",
    context: (name) => ` for project '${name}'`,
    intro: "Create a well-structured PRD with the following sections:",
    sections: [
      "Overview",
      "Goals & Objectives",
      "System Context",
      "Functional Requirements",
      "Non-Functional Requirements",
      "Deployment",
      "Extensibility",
      "Risks & Mitigation",
    ],
    style:
      "Use clear, professional language and include specific technical details where appropriate.",
    cue: "PRD:",
  },
  what_is_this: {
    role: "You are a technical writer.",
    task: 'Create an engaging "What is this" overview document',
    context: (name) => ` called '${name}'`,
    intro: "Create a compelling overview with the following sections:",
    sections: [
      "Vision (what this project aims to achieve)",
      "Core Value (why it matters, what problems it solves)",
      "Key Features (main capabilities)",
      "Target Users (who will use this)",
      "Tech Snapshot (high-level technical overview)",
      "Roadmap (future plans)",
      "Success Metrics",
    ],
    style: "Use an engaging, accessible tone while maintaining technical accuracy.",
    cue: "What is this:",
  },
  readme: {
    role: "You are a developer writing documentation.",
    task: "Create a comprehensive README.md",
    context: (name) => ` titled '# ${name}'`,
    intro: "Create a helpful README with the following sections:",
    sections: [
      "Project title and brief description",
      "Features",
      "Installation instructions",
      "Usage examples",
      "API documentation (if applicable)",
      "Configuration",
      "Development setup",
      "Contributing guidelines",
      "License",
    ],
    style: "Use clear, developer-friendly language with practical examples.",
    cue: "README:",
  },
} satisfies Record<DocumentType, PromptTemplate>;
