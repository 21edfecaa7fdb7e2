// tests/helpers.ts - In-process stand-ins for the extractor, the model and the analyzer
import type { AnalysisClient } from "../src/services/GeminiClient";
import type { ItemAnalyzer } from "../src/services/ResumeAnalyzer";
import { fileExtension } from "../src/services/ResumeAnalyzer";
import type { TextExtractor } from "../src/services/TextExtractor";
import type { AnalysisOutcome, InputItem, StampedRecord } from "../src/types";

export function makeItem(name: string, overrides: Partial<InputItem> = {}): InputItem {
  const content = Buffer.from(`resume bytes for ${name}`);
  return {
    name,
    content,
    size: content.length,
    type: fileExtension(name),
    ...overrides,
  };
}

export function makeItems(count: number): InputItem[] {
  return Array.from({ length: count }, (_, i) => makeItem(`resume-${i}.pdf`));
}

export class FakeExtractor implements TextExtractor {
  calls: Array<{ extension: string }> = [];

  constructor(
    private impl: (content: Buffer, extension: string) => Promise<string> = async (content) =>
      `Extracted: ${content.toString("utf8")}`
  ) {}

  async extractText(content: Buffer, extension: string): Promise<string> {
    this.calls.push({ extension });
    return this.impl(content, extension);
  }
}

export class FakeClient implements AnalysisClient {
  prompts: string[] = [];

  constructor(private respond: (prompt: string) => Promise<string> = async () => VALID_RESPONSE) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }
}

export const VALID_RESPONSE = JSON.stringify({
  name: "Jordan Example",
  contact_details: {
    email: "jordan@example.com",
    phone: "+1 555 0100",
    location: "Springfield",
  },
  education: {
    university: "Example State University",
    year_of_study: "2025",
    course: "B.Tech",
    discipline: "Computer Science",
    cgpa_percentage: "8.7",
  },
  skills: {
    technical_skills: ["Machine Learning", "NLP"],
    soft_skills: ["Communication"],
    programming_languages: ["Python", "SQL"],
    tools_technologies: ["PyTorch"],
  },
  experience_scores: {
    ai_ml_experience: 7,
    gen_ai_experience: 5,
    overall_experience: 6,
  },
  supporting_information: {
    certifications: ["Cloud Practitioner"],
    internships: ["Data intern at Example Corp"],
    projects: ["Chatbot"],
    achievements: [],
  },
  analysis_metadata: {
    processing_timestamp: "model-made-up-time",
    file_name: "model-made-up-name.pdf",
    confidence_score: 8,
  },
});

/** Analyzer that succeeds for every item unless told otherwise. */
export class ScriptedAnalyzer implements ItemAnalyzer {
  calls: string[] = [];

  constructor(
    private impl: (item: InputItem) => Promise<AnalysisOutcome> = async (item) => success(item.name)
  ) {}

  async analyze(item: InputItem): Promise<AnalysisOutcome> {
    this.calls.push(item.name);
    return this.impl(item);
  }
}

export function success(fileName: string, scores: StampedRecord["experience_scores"] = {}): AnalysisOutcome {
  return {
    status: "success",
    fileName,
    record: {
      name: fileName.replace(/\.\w+$/, ""),
      experience_scores: scores,
      analysis_metadata: {
        file_name: fileName,
        processing_timestamp: "2024-05-01T10:00:00.000Z",
      },
    },
    fileInfo: { name: fileName, sizeMb: 0, type: ".pdf" },
  };
}

export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
