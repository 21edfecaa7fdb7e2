// src/services/BatchOrchestrator.ts - Chunked, concurrency-bounded batch runs
import PQueue from "p-queue";
import { assertBatchConfig } from "../config";
import type {
  AnalysisOutcome,
  BatchConfig,
  ChunkReport,
  InputItem,
  ProgressCallback,
} from "../types";
import { delay, partition } from "../utils/async";
import { BatchCancelledError, errorMessage } from "../utils/errors";
import { failure, type ItemAnalyzer } from "./ResumeAnalyzer";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RunOptions {
  /** Checked between chunks; the chunk in flight always settles. */
  signal?: AbortSignal;
  onChunkComplete?: (report: ChunkReport) => void;
}

/**
 * Runs items through the analyzer chunk by chunk. Chunks are strictly
 * sequential; inside a chunk every item gets its own task, admitted through
 * one queue per run so that no more than `maxConcurrent` pipelines are in
 * flight at once, whatever the chunk boundaries. Outcomes keep input order.
 */
export class BatchOrchestrator {
  constructor(private analyzer: ItemAnalyzer, private sleep: Sleep = delay) {}

  async runBatch(
    items: readonly InputItem[],
    batchConfig: BatchConfig,
    onProgress?: ProgressCallback,
    options: RunOptions = {}
  ): Promise<AnalysisOutcome[]> {
    assertBatchConfig(batchConfig);

    if (items.length === 0) {
      return [];
    }

    const admission = new PQueue({ concurrency: batchConfig.maxConcurrent });
    const chunks = partition(items, batchConfig.chunkSize);
    const outcomes: AnalysisOutcome[] = [];

    for (const [chunkIndex, chunk] of chunks.entries()) {
      if (options.signal?.aborted) {
        throw new BatchCancelledError([...outcomes]);
      }

      const chunkOutcomes = await Promise.all(
        chunk.map((item) => admission.add(() => this.runTask(item)))
      );
      outcomes.push(...chunkOutcomes);

      options.onChunkComplete?.({
        chunkIndex,
        chunkCount: chunks.length,
        outcomes: chunkOutcomes,
      });
      onProgress?.(Math.min(100, (outcomes.length * 100) / items.length));

      if (chunkIndex < chunks.length - 1) {
        await this.sleep(batchConfig.interChunkDelayMs, options.signal);
      }
    }

    return outcomes;
  }

  private async runTask(item: InputItem): Promise<AnalysisOutcome> {
    try {
      return await this.analyzer.analyze(item);
    } catch (error) {
      return failure(
        item.name,
        "UnexpectedError",
        `Processing error: ${errorMessage(error)}`
      );
    }
  }
}
