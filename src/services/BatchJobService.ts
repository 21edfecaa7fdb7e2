// src/services/BatchJobService.ts - Background batch jobs with progress, logs and cancellation
import { v4 as uuidv4 } from "uuid";
import type {
  AnalysisOutcome,
  BatchConfig,
  BatchJob,
  BatchLog,
  ChunkReport,
  InputItem,
} from "../types";
import { formatDuration } from "../utils/async";
import { BatchCancelledError, errorMessage } from "../utils/errors";
import type { BatchOrchestrator } from "./BatchOrchestrator";

const MAX_LOGS = 1000;

export interface JobProgress {
  batchId: string;
  status: BatchJob["status"];
  progress: number;
  total: number;
  processed: number;
  success: number;
  errors: number;
  config: BatchConfig;
  fileNames: string[];
  timing: {
    elapsedMs: number;
    avgTimePerFileMs: number;
    formattedElapsedTime: string;
    formattedETA: string | null;
  };
  recentLogs: BatchLog[];
  error?: string;
}

export class BatchJobService {
  private jobs = new Map<string, BatchJob>();
  private controllers = new Map<string, AbortController>();
  private running = new Map<string, Promise<void>>();

  constructor(private orchestrator: BatchOrchestrator) {}

  startJob(items: InputItem[], batchConfig: BatchConfig): BatchJob {
    const job: BatchJob = {
      id: uuidv4(),
      status: "pending",
      config: batchConfig,
      fileNames: items.map((item) => item.name),
      total: items.length,
      processed: 0,
      success: 0,
      errors: 0,
      progress: 0,
      outcomes: [],
      logs: [],
      createdAt: new Date(),
    };

    this.jobs.set(job.id, job);
    this.addLog(
      job,
      `🚀 Started batch analysis of ${items.length} files (chunk ${batchConfig.chunkSize}, concurrency ${batchConfig.maxConcurrent}, delay ${batchConfig.interChunkDelayMs}ms)`,
      "info"
    );

    const controller = new AbortController();
    this.controllers.set(job.id, controller);

    const run = this.runJob(job, items, controller.signal)
      .catch((error) => {
        job.status = "failed";
        job.error = errorMessage(error);
        job.completedAt = new Date();
        this.addLog(job, `Fatal error in batch processing: ${job.error}`, "error");
      })
      .finally(() => {
        this.controllers.delete(job.id);
        this.running.delete(job.id);
      });
    this.running.set(job.id, run);

    return job;
  }

  private async runJob(
    job: BatchJob,
    items: InputItem[],
    signal: AbortSignal
  ): Promise<void> {
    job.status = "processing";
    job.startedAt = new Date();

    try {
      const outcomes = await this.orchestrator.runBatch(
        items,
        job.config,
        (percent) => {
          job.progress = percent;
        },
        {
          signal,
          onChunkComplete: (report) => this.recordChunk(job, report),
        }
      );

      job.outcomes = outcomes;
      job.status = "completed";
      job.completedAt = new Date();

      const seconds = Math.round(this.elapsed(job) / 1000);
      this.addLog(
        job,
        `🎉 Batch completed in ${seconds}s. Success: ${job.success}, Errors: ${job.errors}`,
        "success"
      );
    } catch (error) {
      if (error instanceof BatchCancelledError) {
        job.outcomes = error.partialOutcomes;
        job.status = "cancelled";
        job.completedAt = new Date();
        this.addLog(
          job,
          `Batch cancelled after ${error.partialOutcomes.length}/${job.total} files`,
          "warning"
        );
        return;
      }
      throw error;
    }
  }

  private recordChunk(job: BatchJob, report: ChunkReport): void {
    for (const outcome of report.outcomes) {
      job.processed++;
      if (outcome.status === "success") {
        job.success++;
      } else {
        job.errors++;
        this.addLog(
          job,
          `❌ ${outcome.fileName}: [${outcome.errorKind}] ${outcome.message}`,
          "error",
          outcome.fileName
        );
      }
    }

    this.addLog(
      job,
      `⏱️ Chunk ${report.chunkIndex + 1}/${report.chunkCount} done (${job.processed}/${job.total})`,
      "info"
    );
  }

  private elapsed(job: BatchJob): number {
    if (!job.startedAt) return 0;
    const end = job.completedAt ?? new Date();
    return end.getTime() - job.startedAt.getTime();
  }

  private addLog(
    job: BatchJob,
    message: string,
    type: BatchLog["type"],
    filename?: string
  ): void {
    job.logs.push({ timestamp: new Date(), message, type, filename });

    if (job.logs.length > MAX_LOGS) {
      job.logs = job.logs.slice(-MAX_LOGS);
    }

    const line = `[${job.id}] ${message}`;
    if (type === "error") {
      console.error(line);
    } else if (type === "warning") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  getJob(batchId: string): BatchJob | null {
    return this.jobs.get(batchId) || null;
  }

  listJobs(): BatchJob[] {
    return Array.from(this.jobs.values()).sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime()
    );
  }

  getOutcomes(batchId: string): AnalysisOutcome[] | null {
    const job = this.jobs.get(batchId);
    if (!job) return null;
    return job.status === "completed" || job.status === "cancelled"
      ? job.outcomes
      : null;
  }

  getJobProgress(batchId: string): JobProgress | null {
    const job = this.jobs.get(batchId);
    if (!job) return null;

    const elapsedMs = this.elapsed(job);
    const avgTimePerFileMs = job.processed > 0 ? elapsedMs / job.processed : 0;
    const remaining = job.total - job.processed;
    const isActive = job.status === "processing" || job.status === "pending";

    const progress: JobProgress = {
      batchId: job.id,
      status: job.status,
      progress: job.progress,
      total: job.total,
      processed: job.processed,
      success: job.success,
      errors: job.errors,
      config: job.config,
      fileNames: [...job.fileNames],
      timing: {
        elapsedMs,
        avgTimePerFileMs,
        formattedElapsedTime: formatDuration(elapsedMs),
        formattedETA:
          isActive && job.processed > 0
            ? formatDuration(remaining * avgTimePerFileMs)
            : null,
      },
      recentLogs: job.logs.slice(-10),
    };
    if (job.error) progress.error = job.error;
    return progress;
  }

  /** Requests cancellation; the chunk in flight still finishes. */
  cancelJob(batchId: string): boolean {
    const job = this.jobs.get(batchId);
    const controller = this.controllers.get(batchId);
    if (!job || !controller) return false;

    if (job.status === "processing" || job.status === "pending") {
      controller.abort();
      this.addLog(job, "Cancellation requested by user", "warning");
      return true;
    }

    return false;
  }

  deleteJob(batchId: string): boolean {
    const job = this.jobs.get(batchId);
    if (!job || this.running.has(batchId)) return false;
    return this.jobs.delete(batchId);
  }

  /**
   * Forgets stopped jobs that finished more than `maxAgeHours` ago and
   * returns their ids. Running jobs are never evicted.
   */
  evictFinished(maxAgeHours: number, now: Date = new Date()): string[] {
    const cutoff = now.getTime() - maxAgeHours * 3600 * 1000;
    const evicted: string[] = [];

    for (const [id, job] of this.jobs) {
      if (this.running.has(id) || !job.completedAt) continue;
      if (job.completedAt.getTime() < cutoff) {
        this.jobs.delete(id);
        evicted.push(id);
      }
    }

    if (evicted.length > 0) {
      console.log(`🧹 Evicted ${evicted.length} finished batch job(s)`);
    }
    return evicted;
  }

  /** Resolves once the job has stopped running (completed, failed or cancelled). */
  async whenSettled(batchId: string): Promise<BatchJob | null> {
    await this.running.get(batchId);
    return this.getJob(batchId);
  }
}
