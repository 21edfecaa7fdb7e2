// src/services/ResultAggregator.ts - Summary statistics and export shapes over outcome lists
import type {
  AnalysisFailure,
  AnalysisOutcome,
  AnalysisSuccess,
  ExperienceScoreKey,
  FailureEntry,
  FlatRow,
  ResultsDocument,
  SummaryStats,
} from "../types";

function successes(outcomes: AnalysisOutcome[]): AnalysisSuccess[] {
  return outcomes.filter(
    (outcome): outcome is AnalysisSuccess => outcome.status === "success"
  );
}

function average(values: number[]): number {
  return values.length > 0
    ? values.reduce((sum, value) => sum + value, 0) / values.length
    : 0;
}

function scoresFor(
  results: AnalysisSuccess[],
  key: ExperienceScoreKey
): number[] {
  return results
    .map((result) => result.record.experience_scores?.[key])
    .filter((score): score is number => typeof score === "number");
}

function joinList(values?: string[]): string {
  return values ? values.join(", ") : "";
}

const EMPTY_DOMAIN_FIELDS = {
  name: "",
  email: "",
  phone: "",
  location: "",
  university: "",
  year_of_study: "",
  course: "",
  discipline: "",
  cgpa_percentage: "",
  technical_skills: "",
  soft_skills: "",
  programming_languages: "",
  tools_technologies: "",
  ai_ml_experience: "",
  gen_ai_experience: "",
  overall_experience: "",
  certifications: "",
  internships: "",
  projects: "",
  achievements: "",
  confidence_score: "",
  processing_timestamp: "",
} as const;

export const ROW_COLUMNS: Array<keyof FlatRow> = [
  "file_name",
  "status",
  "error_message",
  "name",
  "email",
  "phone",
  "location",
  "university",
  "year_of_study",
  "course",
  "discipline",
  "cgpa_percentage",
  "technical_skills",
  "soft_skills",
  "programming_languages",
  "tools_technologies",
  "ai_ml_experience",
  "gen_ai_experience",
  "overall_experience",
  "certifications",
  "internships",
  "projects",
  "achievements",
  "confidence_score",
  "processing_timestamp",
];

export function summarize(outcomes: AnalysisOutcome[]): SummaryStats {
  const succeeded = successes(outcomes);
  const totalCount = outcomes.length;
  const successCount = succeeded.length;

  return {
    totalCount,
    successCount,
    failureCount: totalCount - successCount,
    successRate: totalCount > 0 ? (successCount / totalCount) * 100 : 0,
    averageScores: {
      aiMl: average(scoresFor(succeeded, "ai_ml_experience")),
      genAi: average(scoresFor(succeeded, "gen_ai_experience")),
      overall: average(scoresFor(succeeded, "overall_experience")),
    },
  };
}

export function toRow(outcome: AnalysisOutcome): FlatRow {
  if (outcome.status === "failure") {
    return {
      file_name: outcome.fileName,
      status: "Error",
      error_message: `[${outcome.errorKind}] ${outcome.message}`,
      ...EMPTY_DOMAIN_FIELDS,
    };
  }

  const {
    name,
    contact_details: contact = {},
    education = {},
    skills = {},
    experience_scores: scores = {},
    supporting_information: supporting = {},
    analysis_metadata: metadata,
  } = outcome.record;

  return {
    file_name: metadata.file_name,
    status: "Success",
    error_message: "",
    name: name ?? "",
    email: contact.email ?? "",
    phone: contact.phone ?? "",
    location: contact.location ?? "",
    university: education.university ?? "",
    year_of_study: education.year_of_study ?? "",
    course: education.course ?? "",
    discipline: education.discipline ?? "",
    cgpa_percentage: education.cgpa_percentage ?? "",
    technical_skills: joinList(skills.technical_skills),
    soft_skills: joinList(skills.soft_skills),
    programming_languages: joinList(skills.programming_languages),
    tools_technologies: joinList(skills.tools_technologies),
    ai_ml_experience: scores.ai_ml_experience ?? "",
    gen_ai_experience: scores.gen_ai_experience ?? "",
    overall_experience: scores.overall_experience ?? "",
    certifications: joinList(supporting.certifications),
    internships: joinList(supporting.internships),
    projects: joinList(supporting.projects),
    achievements: joinList(supporting.achievements),
    confidence_score: metadata.confidence_score ?? "",
    processing_timestamp: metadata.processing_timestamp,
  };
}

export function toRows(outcomes: AnalysisOutcome[]): FlatRow[] {
  return outcomes.map(toRow);
}

export function toFailureEntry(outcome: AnalysisFailure): FailureEntry {
  const entry: FailureEntry = {
    file_name: outcome.fileName,
    error_kind: outcome.errorKind,
    error: outcome.message,
  };
  if (outcome.rawText !== undefined) entry.raw_response = outcome.rawText;
  return entry;
}

export function toJsonDocument(
  outcomes: AnalysisOutcome[],
  generatedAt: Date = new Date()
): ResultsDocument {
  const stats = summarize(outcomes);

  return {
    metadata: {
      totalCount: stats.totalCount,
      successCount: stats.successCount,
      failureCount: stats.failureCount,
      generatedAt: generatedAt.toISOString(),
    },
    results: outcomes.map((outcome) =>
      outcome.status === "success" ? outcome.record : toFailureEntry(outcome)
    ),
  };
}

/** Successful outcomes ordered by one experience score, highest first. */
export function rankCandidates(
  outcomes: AnalysisOutcome[],
  scoreKey: ExperienceScoreKey = "overall_experience",
  limit = 10
): AnalysisSuccess[] {
  return successes(outcomes)
    .map((outcome, index) => ({
      outcome,
      index,
      score: outcome.record.experience_scores?.[scoreKey] ?? -Infinity,
    }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, Math.max(0, limit))
    .map(({ outcome }) => outcome);
}
