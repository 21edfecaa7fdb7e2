// src/controllers/AnalysisController.ts
import type { Request, Response } from "express";
import fs from "fs";
import path from "path";
import { config, resolveBatchConfig, type BatchOverrides } from "../config";
import { fileExtension } from "../services/ResumeAnalyzer";
import type { BatchJobService } from "../services/BatchJobService";
import type { ExportService } from "../services/ExportService";
import {
  rankCandidates,
  summarize,
  toFailureEntry,
  toRows,
} from "../services/ResultAggregator";
import type {
  AnalysisFailure,
  AnalysisOutcome,
  ExperienceScoreKey,
  InputItem,
} from "../types";
import { errorMessage } from "../utils/errors";
import { cleanupFile } from "../utils/uploads";

/** Reads multer uploads into memory, removing every upload file on the way out. */
export function toInputItems(files: Express.Multer.File[]): InputItem[] {
  const items: InputItem[] = [];
  try {
    for (const file of files) {
      items.push({
        name: file.originalname,
        content: fs.readFileSync(file.path),
        size: file.size,
        type: fileExtension(file.originalname),
      });
    }
  } finally {
    files.forEach((file) => cleanupFile(file.path));
  }
  return items;
}

function readOptionalNumber(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function isScoreKey(value: unknown): value is ExperienceScoreKey {
  return (
    value === "ai_ml_experience" ||
    value === "gen_ai_experience" ||
    value === "overall_experience"
  );
}

export class AnalysisController {
  constructor(
    private jobs: BatchJobService,
    private exporter: ExportService
  ) {}

  analyzeResumes = async (req: Request, res: Response): Promise<void> => {
    try {
      const files = Array.isArray(req.files) ? req.files : [];
      const overrides: BatchOverrides = {
        chunkSize: readOptionalNumber(req.body.batchSize),
        maxConcurrent: readOptionalNumber(req.body.maxConcurrent),
        interChunkDelaySeconds: readOptionalNumber(req.body.rateLimitDelay),
      };

      const batchConfig = resolveBatchConfig(overrides);
      const items = toInputItems(files);
      const job = this.jobs.startJob(items, batchConfig);

      console.log(`📤 Accepted ${items.length} resumes as batch ${job.id}`);

      res.status(202).json({
        success: true,
        data: {
          batchId: job.id,
          totalFiles: items.length,
          config: batchConfig,
          message: `Batch analysis started for ${items.length} files`,
        },
      });
    } catch (error) {
      console.error("Error starting analysis:", error);
      res.status(500).json({
        success: false,
        error: errorMessage(error),
      });
    }
  };

  getBatchProgress = (req: Request, res: Response): void => {
    const progress = this.jobs.getJobProgress(req.params.batchId);

    if (!progress) {
      res.status(404).json({ success: false, error: "Batch job not found" });
      return;
    }

    res.status(200).json({ success: true, data: progress });
  };

  getResults = (req: Request, res: Response): void => {
    const outcomes = this.completedOutcomes(req, res);
    if (!outcomes) return;

    const failures = outcomes.filter(
      (outcome): outcome is AnalysisFailure => outcome.status === "failure"
    );

    res.status(200).json({
      success: true,
      data: {
        summary: summarize(outcomes),
        rows: toRows(outcomes),
        failures: failures.map(toFailureEntry),
      },
    });
  };

  getTopCandidates = (req: Request, res: Response): void => {
    const outcomes = this.completedOutcomes(req, res);
    if (!outcomes) return;

    const scoreKey = isScoreKey(req.query.score)
      ? req.query.score
      : "overall_experience";
    const limit = readOptionalNumber(req.query.limit) ?? 10;

    res.status(200).json({
      success: true,
      data: {
        score: scoreKey,
        candidates: rankCandidates(outcomes, scoreKey, limit).map(
          (outcome) => ({
            fileName: outcome.fileName,
            name: outcome.record.name ?? "",
            university: outcome.record.education?.university ?? "",
            scores: outcome.record.experience_scores ?? {},
          })
        ),
      },
    });
  };

  cancelProcessing = (req: Request, res: Response): void => {
    const cancelled = this.jobs.cancelJob(req.params.batchId);

    if (!cancelled) {
      res
        .status(400)
        .json({ success: false, error: "Could not cancel batch job" });
      return;
    }

    res.status(200).json({
      success: true,
      data: { message: "Cancellation requested; the current chunk will finish first" },
    });
  };

  deleteBatch = (req: Request, res: Response): void => {
    const deleted = this.jobs.deleteJob(req.params.batchId);

    if (!deleted) {
      res.status(400).json({
        success: false,
        error: "Batch job not found or still running",
      });
      return;
    }

    res.status(200).json({ success: true, data: { message: "Batch deleted" } });
  };

  downloadResults = async (req: Request, res: Response): Promise<void> => {
    const outcomes = this.completedOutcomes(req, res);
    if (!outcomes) return;

    const { batchId, type } = req.params;
    const base = `batch_${batchId}_results`;

    try {
      let filepath: string;
      if (type === "excel") {
        filepath = this.exporter.saveToExcel(outcomes, `${base}.xlsx`);
      } else if (type === "json") {
        filepath = this.exporter.saveToJson(outcomes, `${base}.json`);
      } else {
        filepath = await this.exporter.saveBundle(outcomes, base);
      }

      res.download(filepath, path.basename(filepath));
    } catch (error) {
      console.error("Error downloading batch results:", error);
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  };

  getAllBatches = (_req: Request, res: Response): void => {
    const batches = this.jobs.listJobs().map((job) => ({
      batchId: job.id,
      status: job.status,
      total: job.total,
      fileNames: job.fileNames,
      processed: job.processed,
      success: job.success,
      errors: job.errors,
      createdAt: job.createdAt,
      completedAt: job.completedAt,
    }));

    res.status(200).json({ success: true, data: { batches } });
  };

  getConfiguration = (_req: Request, res: Response): void => {
    res.status(200).json({
      success: true,
      data: {
        defaults: resolveBatchConfig(),
        bounds: config.bounds,
        supportedFormats: config.files.supportedExtensions,
        maxFileSizeMb: config.files.maxSizeMb,
        maxFilesPerBatch: config.files.maxBatch,
      },
    });
  };

  private completedOutcomes(
    req: Request,
    res: Response
  ): AnalysisOutcome[] | null {
    const { batchId } = req.params;
    const job = this.jobs.getJob(batchId);

    if (!job) {
      res.status(404).json({ success: false, error: "Batch job not found" });
      return null;
    }

    const outcomes = this.jobs.getOutcomes(batchId);
    if (!outcomes) {
      res.status(409).json({
        success: false,
        error: `Results are not available while the batch is ${job.status}`,
      });
      return null;
    }

    return outcomes;
  }
}
