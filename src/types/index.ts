// src/types/index.ts - Domain types shared by the pipeline, jobs and exports

export type AnalysisErrorKind =
  | "InvalidInput"
  | "ExtractionError"
  | "ApiError"
  | "ParseError"
  | "UnexpectedError";

export interface InputItem {
  readonly name: string;
  readonly content: Buffer;
  readonly size: number; // bytes
  readonly type: string; // lower-case extension, e.g. ".pdf"
}

export interface ContactDetails {
  email?: string;
  phone?: string;
  location?: string;
}

export interface Education {
  university?: string;
  year_of_study?: string;
  course?: string;
  discipline?: string;
  cgpa_percentage?: string;
}

export interface Skills {
  technical_skills?: string[];
  soft_skills?: string[];
  programming_languages?: string[];
  tools_technologies?: string[];
}

export interface ExperienceScores {
  ai_ml_experience?: number;
  gen_ai_experience?: number;
  overall_experience?: number;
}

export type ExperienceScoreKey = keyof ExperienceScores;

export interface SupportingInformation {
  certifications?: string[];
  internships?: string[];
  projects?: string[];
  achievements?: string[];
}

export interface AnalysisMetadata {
  processing_timestamp?: string;
  file_name?: string;
  confidence_score?: number;
}

export interface ExtractedRecord {
  name?: string;
  contact_details?: ContactDetails;
  education?: Education;
  skills?: Skills;
  experience_scores?: ExperienceScores;
  supporting_information?: SupportingInformation;
  analysis_metadata?: AnalysisMetadata;
}

/** A record after the pipeline has stamped its file name and timestamp. */
export interface StampedRecord extends ExtractedRecord {
  analysis_metadata: AnalysisMetadata & {
    processing_timestamp: string;
    file_name: string;
  };
}

export interface FileInfo {
  name: string;
  sizeMb: number;
  type: string;
}

export interface AnalysisSuccess {
  status: "success";
  fileName: string;
  record: StampedRecord;
  fileInfo: FileInfo;
}

export interface AnalysisFailure {
  status: "failure";
  fileName: string;
  errorKind: AnalysisErrorKind;
  message: string;
  rawText?: string;
}

export type AnalysisOutcome = AnalysisSuccess | AnalysisFailure;

export interface BatchConfig {
  readonly chunkSize: number;
  readonly maxConcurrent: number;
  readonly interChunkDelayMs: number;
}

export type ProgressCallback = (percent: number) => void;

export interface ChunkReport {
  chunkIndex: number;
  chunkCount: number;
  outcomes: AnalysisOutcome[];
}

export interface BatchLog {
  timestamp: Date;
  message: string;
  type: "info" | "success" | "error" | "warning";
  filename?: string;
}

export type BatchStatus =
  | "pending"
  | "processing"
  | "completed"
  | "failed"
  | "cancelled";

export interface BatchJob {
  id: string;
  status: BatchStatus;
  config: BatchConfig;
  fileNames: string[];
  total: number;
  processed: number;
  success: number;
  errors: number;
  progress: number;
  outcomes: AnalysisOutcome[];
  logs: BatchLog[];
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  error?: string;
}

export interface SummaryStats {
  totalCount: number;
  successCount: number;
  failureCount: number;
  successRate: number;
  averageScores: {
    aiMl: number;
    genAi: number;
    overall: number;
  };
}

export interface FlatRow {
  file_name: string;
  status: "Success" | "Error";
  error_message: string;
  name: string;
  email: string;
  phone: string;
  location: string;
  university: string;
  year_of_study: string;
  course: string;
  discipline: string;
  cgpa_percentage: string;
  technical_skills: string;
  soft_skills: string;
  programming_languages: string;
  tools_technologies: string;
  ai_ml_experience: number | "";
  gen_ai_experience: number | "";
  overall_experience: number | "";
  certifications: string;
  internships: string;
  projects: string;
  achievements: string;
  confidence_score: number | "";
  processing_timestamp: string;
}

export interface FailureEntry {
  file_name: string;
  error_kind: AnalysisErrorKind;
  error: string;
  raw_response?: string;
}

export interface ResultsDocument {
  metadata: {
    totalCount: number;
    successCount: number;
    failureCount: number;
    generatedAt: string;
  };
  results: Array<StampedRecord | FailureEntry>;
}

export interface ChatExchange {
  question: string;
  answer: string;
  askedAt: Date;
}
