// src/config/index.ts - Environment-backed settings and batch config resolution
import dotenv from "dotenv";
import type { BatchConfig } from "../types";
import { BatchConfigError } from "../utils/errors";

dotenv.config();

export interface ProcessingConfig {
  batch: {
    chunkSize: number;
    maxConcurrent: number;
    interChunkDelaySeconds: number;
  };
  bounds: {
    chunkSize: { min: number; max: number };
    maxConcurrent: { min: number; max: number };
    interChunkDelaySeconds: { min: number; max: number };
  };
  files: {
    supportedExtensions: string[];
    maxSizeMb: number;
    uploadLimitMb: number;
    maxBatch: number;
  };
}

export interface APIConfig {
  gemini: {
    apiKey: string;
    model: string;
    timeout: number;
    maxOutputTokens: number;
    temperature: number;
  };
}

export interface ServerConfig {
  port: number;
  uploadDir: string;
  outputDir: string;
  outputMaxAgeHours: number;
  corsOrigins: string[];
  rateLimitWindow: number;
  rateLimitMax: number;
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export const config: ProcessingConfig = {
  batch: {
    chunkSize: readNumber("BATCH_SIZE", 10),
    maxConcurrent: readNumber("MAX_CONCURRENT_REQUESTS", 5),
    interChunkDelaySeconds: readNumber("RATE_LIMIT_DELAY", 1),
  },
  bounds: {
    chunkSize: { min: 1, max: 20 },
    maxConcurrent: { min: 1, max: 10 },
    interChunkDelaySeconds: { min: 0, max: 60 },
  },
  files: {
    supportedExtensions: [".pdf", ".docx"],
    maxSizeMb: readNumber("MAX_FILE_SIZE_MB", 10),
    uploadLimitMb: readNumber("UPLOAD_LIMIT_MB", 50),
    maxBatch: readNumber("MAX_FILES_PER_BATCH", 500),
  },
};

export const apiConfig: APIConfig = {
  gemini: {
    apiKey: process.env.GEMINI_API_KEY || "",
    model: process.env.GEMINI_MODEL || "gemini-1.5-flash",
    timeout: readNumber("GEMINI_TIMEOUT_MS", 60000),
    maxOutputTokens: readNumber("GEMINI_MAX_OUTPUT_TOKENS", 2048),
    temperature: 0.2,
  },
};

export const serverConfig: ServerConfig = {
  port: readNumber("PORT", 3000),
  uploadDir: process.env.UPLOAD_DIR || "uploads",
  outputDir: process.env.OUTPUT_DIR || "output",
  outputMaxAgeHours: readNumber("OUTPUT_MAX_AGE_HOURS", 24),
  corsOrigins: process.env.CORS_ORIGINS?.split(",") || ["*"],
  rateLimitWindow: readNumber("RATE_LIMIT_WINDOW", 15 * 60 * 1000),
  rateLimitMax: readNumber("RATE_LIMIT_MAX", 100),
};

export function maxFileSizeBytes(settings: ProcessingConfig = config): number {
  return settings.files.maxSizeMb * 1024 * 1024;
}

export interface BatchOverrides {
  chunkSize?: number;
  maxConcurrent?: number;
  interChunkDelaySeconds?: number;
}

function clamp(value: number, bounds: { min: number; max: number }): number {
  return Math.min(bounds.max, Math.max(bounds.min, value));
}

/**
 * Builds the immutable config for one batch run from the defaults plus any
 * per-request overrides, clamped to the recommended bounds.
 */
export function resolveBatchConfig(
  overrides: BatchOverrides = {},
  settings: ProcessingConfig = config
): BatchConfig {
  const { batch, bounds } = settings;
  const chunkSize = clamp(
    Math.floor(overrides.chunkSize ?? batch.chunkSize),
    bounds.chunkSize
  );
  const maxConcurrent = clamp(
    Math.floor(overrides.maxConcurrent ?? batch.maxConcurrent),
    bounds.maxConcurrent
  );
  const delaySeconds = clamp(
    overrides.interChunkDelaySeconds ?? batch.interChunkDelaySeconds,
    bounds.interChunkDelaySeconds
  );

  return Object.freeze({
    chunkSize,
    maxConcurrent,
    interChunkDelayMs: Math.round(delaySeconds * 1000),
  });
}

export function assertBatchConfig(batchConfig: BatchConfig): void {
  const problems: string[] = [];

  if (!Number.isInteger(batchConfig.chunkSize) || batchConfig.chunkSize < 1) {
    problems.push("chunkSize must be a positive integer");
  }
  if (
    !Number.isInteger(batchConfig.maxConcurrent) ||
    batchConfig.maxConcurrent < 1
  ) {
    problems.push("maxConcurrent must be a positive integer");
  }
  if (
    !Number.isFinite(batchConfig.interChunkDelayMs) ||
    batchConfig.interChunkDelayMs < 0
  ) {
    problems.push("interChunkDelayMs must be a non-negative number");
  }

  if (problems.length > 0) {
    throw new BatchConfigError(problems);
  }
}

export function validateConfig(): void {
  const errors: string[] = [];

  if (!apiConfig.gemini.apiKey) errors.push("GEMINI_API_KEY is required");

  try {
    assertBatchConfig(resolveBatchConfig());
  } catch (error) {
    errors.push(error instanceof Error ? error.message : String(error));
  }

  if (config.files.maxSizeMb <= 0) {
    errors.push("MAX_FILE_SIZE_MB must be greater than 0");
  }

  if (errors.length > 0) {
    console.error("❌ Configuration validation failed:");
    errors.forEach((error) => console.error(`  - ${error}`));
    process.exit(1);
  }

  const batchConfig = resolveBatchConfig();
  console.log("✅ Configuration validated");
  console.log(`🤖 Model: ${apiConfig.gemini.model}`);
  console.log(`⚡ Processing settings:`);
  console.log(`   • Chunk size: ${batchConfig.chunkSize}`);
  console.log(`   • Max concurrent requests: ${batchConfig.maxConcurrent}`);
  console.log(`   • Inter-chunk delay: ${batchConfig.interChunkDelayMs}ms`);
  console.log(
    `   • Files: ${config.files.supportedExtensions.join(", ")} up to ${config.files.maxSizeMb}MB`
  );
}
