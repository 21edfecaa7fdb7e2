// src/services/ResultParser.ts
import type { AnalysisMetadata, ExtractedRecord } from "../types";
import { errorMessage } from "../utils/errors";

export type ParseResult =
  | { ok: true; record: ExtractedRecord }
  | { ok: false; errorKind: "ParseError"; message: string; rawText: string };

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function asStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((entry): entry is string => typeof entry === "string");
}

function asScore(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function section(source: JsonObject, key: string): JsonObject | undefined {
  const value = source[key];
  return isObject(value) ? value : undefined;
}

function pick<K extends string, V>(
  source: JsonObject,
  keys: readonly K[],
  read: (value: unknown) => V | undefined
): Partial<Record<K, V>> {
  const out: Partial<Record<K, V>> = {};
  for (const key of keys) {
    const value = read(source[key]);
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function normalizeRecord(source: JsonObject): ExtractedRecord {
  const record: ExtractedRecord = {};

  const name = asString(source.name);
  if (name !== undefined) record.name = name;

  const contact = section(source, "contact_details");
  if (contact) {
    record.contact_details = pick(
      contact,
      ["email", "phone", "location"],
      asString
    );
  }

  const education = section(source, "education");
  if (education) {
    record.education = pick(
      education,
      ["university", "year_of_study", "course", "discipline", "cgpa_percentage"],
      asString
    );
  }

  const skills = section(source, "skills");
  if (skills) {
    record.skills = pick(
      skills,
      [
        "technical_skills",
        "soft_skills",
        "programming_languages",
        "tools_technologies",
      ],
      asStringList
    );
  }

  const scores = section(source, "experience_scores");
  if (scores) {
    record.experience_scores = pick(
      scores,
      ["ai_ml_experience", "gen_ai_experience", "overall_experience"],
      asScore
    );
  }

  const supporting = section(source, "supporting_information");
  if (supporting) {
    record.supporting_information = pick(
      supporting,
      ["certifications", "internships", "projects", "achievements"],
      asStringList
    );
  }

  const metadata = section(source, "analysis_metadata");
  if (metadata) {
    const normalized: AnalysisMetadata = {};
    const timestamp = asString(metadata.processing_timestamp);
    const fileName = asString(metadata.file_name);
    const confidence = asScore(metadata.confidence_score);
    if (timestamp !== undefined) normalized.processing_timestamp = timestamp;
    if (fileName !== undefined) normalized.file_name = fileName;
    if (confidence !== undefined) normalized.confidence_score = confidence;
    record.analysis_metadata = normalized;
  }

  return record;
}

/**
 * Strict JSON decoding of a model response. Only decoding is enforced; known
 * fields with unexpected types are dropped rather than rejected.
 */
export function parseAnalysisResponse(rawText: string): ParseResult {
  let decoded: unknown;

  try {
    decoded = JSON.parse(rawText.trim());
  } catch (error) {
    return {
      ok: false,
      errorKind: "ParseError",
      message: `Failed to parse AI response as JSON: ${errorMessage(error)}`,
      rawText,
    };
  }

  if (!isObject(decoded)) {
    return {
      ok: false,
      errorKind: "ParseError",
      message: "Failed to parse AI response as JSON: Expected a JSON object",
      rawText,
    };
  }

  return { ok: true, record: normalizeRecord(decoded) };
}
