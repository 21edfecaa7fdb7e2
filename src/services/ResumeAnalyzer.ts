// src/services/ResumeAnalyzer.ts - Single-resume pipeline: validate → extract → prompt → call → parse
import path from "path";
import { config, maxFileSizeBytes } from "../config";
import type {
  AnalysisErrorKind,
  AnalysisFailure,
  AnalysisOutcome,
  FileInfo,
  InputItem,
  StampedRecord,
} from "../types";
import { errorMessage } from "../utils/errors";
import type { AnalysisClient } from "./GeminiClient";
import { buildAnalysisPrompt } from "./prompts";
import { parseAnalysisResponse } from "./ResultParser";
import type { TextExtractor } from "./TextExtractor";

export interface ItemAnalyzer {
  analyze(item: InputItem): Promise<AnalysisOutcome>;
}

export interface AnalyzerOptions {
  supportedExtensions: string[];
  maxFileSizeBytes: number;
  now: () => Date;
}

export function fileExtension(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

export function getFileInfo(item: InputItem): FileInfo {
  return {
    name: item.name,
    sizeMb: Math.round((item.size / (1024 * 1024)) * 100) / 100,
    type: item.type,
  };
}

export function failure(
  fileName: string,
  errorKind: AnalysisErrorKind,
  message: string,
  rawText?: string
): AnalysisFailure {
  const outcome: AnalysisFailure = {
    status: "failure",
    fileName,
    errorKind,
    message,
  };
  if (rawText !== undefined) outcome.rawText = rawText;
  return outcome;
}

export class ResumeAnalyzer implements ItemAnalyzer {
  private options: AnalyzerOptions;

  constructor(
    private extractor: TextExtractor,
    private client: AnalysisClient,
    options: Partial<AnalyzerOptions> = {}
  ) {
    this.options = {
      supportedExtensions:
        options.supportedExtensions ?? config.files.supportedExtensions,
      maxFileSizeBytes: options.maxFileSizeBytes ?? maxFileSizeBytes(),
      now: options.now ?? (() => new Date()),
    };
  }

  /** Returns the rejection reason for an item, or null when it may be processed. */
  validate(item: InputItem): string | null {
    const type = item.type.toLowerCase();

    if (!this.options.supportedExtensions.includes(type)) {
      const formats = this.options.supportedExtensions
        .map((ext) => ext.replace(".", "").toUpperCase())
        .join(" or ");
      return `Unsupported file format: ${item.type || "(none)"}. Please upload ${formats} files.`;
    }

    if (item.size > this.options.maxFileSizeBytes) {
      const limitMb = this.options.maxFileSizeBytes / (1024 * 1024);
      return `File size exceeds maximum limit of ${limitMb}MB`;
    }

    return null;
  }

  async analyze(item: InputItem): Promise<AnalysisOutcome> {
    const rejection = this.validate(item);
    if (rejection) {
      return failure(item.name, "InvalidInput", rejection);
    }

    let text: string;
    try {
      text = await this.extractor.extractText(item.content, item.type);
    } catch (error) {
      return failure(item.name, "ExtractionError", errorMessage(error));
    }

    if (!text.trim()) {
      return failure(item.name, "ExtractionError", "No text could be extracted");
    }

    const prompt = buildAnalysisPrompt(text);

    let rawText: string;
    try {
      rawText = await this.client.generate(prompt);
    } catch (error) {
      return failure(item.name, "ApiError", errorMessage(error));
    }

    const parsed = parseAnalysisResponse(rawText);
    if (!parsed.ok) {
      return failure(item.name, parsed.errorKind, parsed.message, parsed.rawText);
    }

    // The model's own file name and timestamp are never trusted
    const record: StampedRecord = {
      ...parsed.record,
      analysis_metadata: {
        ...parsed.record.analysis_metadata,
        file_name: item.name,
        processing_timestamp: this.options.now().toISOString(),
      },
    };

    return {
      status: "success",
      fileName: item.name,
      record,
      fileInfo: getFileInfo(item),
    };
  }
}
