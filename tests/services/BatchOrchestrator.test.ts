import { describe, expect, it, vi } from "vitest";
import { BatchOrchestrator } from "../../src/services/BatchOrchestrator";
import { ResumeAnalyzer } from "../../src/services/ResumeAnalyzer";
import type { BatchConfig, ChunkReport } from "../../src/types";
import { BatchCancelledError, BatchConfigError } from "../../src/utils/errors";
import {
  FakeClient,
  FakeExtractor,
  ScriptedAnalyzer,
  makeItem,
  makeItems,
  success,
  wait,
} from "../helpers";

const config = (overrides: Partial<BatchConfig> = {}): BatchConfig => ({
  chunkSize: 10,
  maxConcurrent: 5,
  interChunkDelayMs: 1000,
  ...overrides,
});

function recordingSleep() {
  return vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
}

describe("BatchOrchestrator.runBatch", () => {
  it("returns an empty list without progress or delay for no items", async () => {
    const sleep = recordingSleep();
    const analyzer = new ScriptedAnalyzer();
    const onProgress = vi.fn();

    const outcomes = await new BatchOrchestrator(analyzer, sleep).runBatch(
      [],
      config(),
      onProgress
    );

    expect(outcomes).toEqual([]);
    expect(onProgress).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
    expect(analyzer.calls).toEqual([]);
  });

  it("splits 25 items into chunks of 10, 10 and 5", async () => {
    const sleep = recordingSleep();
    const analyzer = new ScriptedAnalyzer();
    const progress: number[] = [];
    const chunkSizes: number[] = [];
    const items = makeItems(25);

    const outcomes = await new BatchOrchestrator(analyzer, sleep).runBatch(
      items,
      config({ chunkSize: 10 }),
      (percent) => progress.push(percent),
      { onChunkComplete: (report: ChunkReport) => chunkSizes.push(report.outcomes.length) }
    );

    expect(chunkSizes).toEqual([10, 10, 5]);
    expect(progress).toEqual([40, 80, 100]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 1000]);
    expect(outcomes).toHaveLength(25);
    expect(outcomes.map((o) => o.fileName)).toEqual(items.map((i) => i.name));
  });

  it("reports uneven progress with plain division and ends at 100", async () => {
    const progress: number[] = [];

    await new BatchOrchestrator(new ScriptedAnalyzer(), recordingSleep()).runBatch(
      makeItems(3),
      config({ chunkSize: 2 }),
      (percent) => progress.push(percent)
    );

    expect(progress[0]).toBeCloseTo(66.6667, 3);
    expect(progress[1]).toBe(100);
  });

  it("uses a single chunk without any delay when chunkSize exceeds the item count", async () => {
    const sleep = recordingSleep();
    const onProgress = vi.fn();

    const outcomes = await new BatchOrchestrator(new ScriptedAnalyzer(), sleep).runBatch(
      makeItems(4),
      config({ chunkSize: 20 }),
      onProgress
    );

    expect(outcomes).toHaveLength(4);
    expect(onProgress).toHaveBeenCalledTimes(1);
    expect(onProgress).toHaveBeenCalledWith(100);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("keeps input order when later items finish first", async () => {
    const items = makeItems(6);
    const analyzer = new ScriptedAnalyzer(async (item) => {
      const index = items.indexOf(item);
      await wait((items.length - index) * 5);
      return success(item.name);
    });

    const outcomes = await new BatchOrchestrator(analyzer, recordingSleep()).runBatch(
      items,
      config({ chunkSize: 6, maxConcurrent: 6 })
    );

    expect(outcomes.map((o) => o.fileName)).toEqual(items.map((i) => i.name));
  });

  it("never overlaps two pipelines when maxConcurrent is 1", async () => {
    const windows: Array<{ start: number; end: number }> = [];
    let inFlight = 0;
    let maxInFlight = 0;

    const analyzer = new ScriptedAnalyzer(async (item) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      const start = performance.now();
      await wait(5);
      windows.push({ start, end: performance.now() });
      inFlight--;
      return success(item.name);
    });

    await new BatchOrchestrator(analyzer, recordingSleep()).runBatch(
      makeItems(5),
      config({ chunkSize: 5, maxConcurrent: 1 })
    );

    expect(maxInFlight).toBe(1);
    for (let i = 1; i < windows.length; i++) {
      expect(windows[i].start).toBeGreaterThanOrEqual(windows[i - 1].end);
    }
  });

  it("bounds in-flight pipelines by maxConcurrent inside a chunk", async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    const analyzer = new ScriptedAnalyzer(async (item) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await wait(5);
      inFlight--;
      return success(item.name);
    });

    await new BatchOrchestrator(analyzer, recordingSleep()).runBatch(
      makeItems(8),
      config({ chunkSize: 8, maxConcurrent: 3 })
    );

    expect(maxInFlight).toBe(3);
  });

  it("turns an unexpected throw into a failure without touching its siblings", async () => {
    const items = [makeItem("a.pdf"), makeItem("b.pdf"), makeItem("c.pdf")];
    const analyzer = new ScriptedAnalyzer(async (item) => {
      if (item.name === "b.pdf") throw new Error("disk on fire");
      return success(item.name);
    });

    const outcomes = await new BatchOrchestrator(analyzer, recordingSleep()).runBatch(
      items,
      config()
    );

    expect(outcomes.map((o) => o.status)).toEqual(["success", "failure", "success"]);
    expect(outcomes[1]).toEqual({
      status: "failure",
      fileName: "b.pdf",
      errorKind: "UnexpectedError",
      message: "Processing error: disk on fire",
    });
  });

  it("rejects an invalid config before doing any work", async () => {
    const analyzer = new ScriptedAnalyzer();

    await expect(
      new BatchOrchestrator(analyzer, recordingSleep()).runBatch(
        makeItems(2),
        config({ chunkSize: 0 })
      )
    ).rejects.toBeInstanceOf(BatchConfigError);
    expect(analyzer.calls).toEqual([]);
  });

  it("stops before the next chunk once aborted and keeps finished outcomes", async () => {
    const controller = new AbortController();
    const analyzer = new ScriptedAnalyzer();

    const run = new BatchOrchestrator(analyzer, recordingSleep()).runBatch(
      makeItems(6),
      config({ chunkSize: 2 }),
      () => controller.abort(),
      { signal: controller.signal }
    );

    const error = await run.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(BatchCancelledError);
    if (error instanceof BatchCancelledError) {
      expect(error.partialOutcomes.map((o) => o.fileName)).toEqual([
        "resume-0.pdf",
        "resume-1.pdf",
      ]);
    }
    expect(analyzer.calls).toHaveLength(2);
  });

  it("lets a throwing progress callback end the run after the chunk settles", async () => {
    const analyzer = new ScriptedAnalyzer();

    await expect(
      new BatchOrchestrator(analyzer, recordingSleep()).runBatch(
        makeItems(4),
        config({ chunkSize: 2 }),
        () => {
          throw new Error("stop");
        }
      )
    ).rejects.toThrow("stop");
    expect(analyzer.calls).toEqual(["resume-0.pdf", "resume-1.pdf"]);
  });
});

describe("BatchOrchestrator with the resume pipeline", () => {
  const MB = 1024 * 1024;

  function pipeline(client: FakeClient, extractor = new FakeExtractor()) {
    const analyzer = new ResumeAnalyzer(extractor, client, {
      supportedExtensions: [".pdf", ".docx"],
      maxFileSizeBytes: 10 * MB,
      now: () => new Date("2024-05-01T10:00:00.000Z"),
    });
    return new BatchOrchestrator(analyzer, recordingSleep());
  }

  it("produces exactly one outcome per item, in order", async () => {
    const client = new FakeClient(async (prompt) =>
      prompt.includes("broken.pdf") ? "not json" : JSON.stringify({ name: "x" })
    );
    const items = [
      makeItem("one.pdf"),
      makeItem("notes.txt"),
      makeItem("broken.pdf"),
      makeItem("two.docx"),
    ];

    const outcomes = await pipeline(client).runBatch(items, config({ chunkSize: 3 }));

    expect(outcomes.map((o) => [o.fileName, o.status])).toEqual([
      ["one.pdf", "success"],
      ["notes.txt", "failure"],
      ["broken.pdf", "failure"],
      ["two.docx", "success"],
    ]);
  });

  it("rejects an unsupported extension without calling the model", async () => {
    const client = new FakeClient();

    const outcomes = await pipeline(client).runBatch([makeItem("cv.txt")], config());

    expect(outcomes).toHaveLength(1);
    expect(outcomes[0].status).toBe("failure");
    if (outcomes[0].status === "failure") {
      expect(outcomes[0].errorKind).toBe("InvalidInput");
    }
    expect(client.prompts).toHaveLength(0);
  });

  it("rejects a 15MB item against a 10MB limit without calling the model", async () => {
    const client = new FakeClient();

    const outcomes = await pipeline(client).runBatch(
      [makeItem("big.pdf", { size: 15 * MB })],
      config()
    );

    expect(outcomes).toEqual([
      {
        status: "failure",
        fileName: "big.pdf",
        errorKind: "InvalidInput",
        message: "File size exceeds maximum limit of 10MB",
      },
    ]);
    expect(client.prompts).toHaveLength(0);
  });

  it("keeps the raw response verbatim on a parse failure", async () => {
    const raw = "  Sure! Here is the JSON you asked for: {oops  ";
    const client = new FakeClient(async () => raw);

    const [outcome] = await pipeline(client).runBatch([makeItem("a.pdf")], config());

    expect(outcome.status).toBe("failure");
    if (outcome.status === "failure") {
      expect(outcome.errorKind).toBe("ParseError");
      expect(outcome.rawText).toBe(raw);
    }
  });
});
