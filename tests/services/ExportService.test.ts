import fs from "fs";
import os from "os";
import path from "path";
import * as XLSX from "xlsx";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ExportService,
  buildWorkbook,
  columnWidths,
  exportTimestamp,
} from "../../src/services/ExportService";
import { ROW_COLUMNS, toRows } from "../../src/services/ResultAggregator";
import { failure } from "../../src/services/ResumeAnalyzer";
import type { AnalysisOutcome } from "../../src/types";
import { success } from "../helpers";

const outcomes: AnalysisOutcome[] = [
  success("alpha.pdf", { overall_experience: 7 }),
  failure("beta.docx", "ExtractionError", "No text could be extracted"),
];

describe("exportTimestamp", () => {
  it("formats local time as YYYYMMDD_HHMMSS", () => {
    expect(exportTimestamp(new Date(2024, 0, 5, 9, 7, 3))).toBe("20240105_090703");
  });
});

describe("columnWidths", () => {
  it("fits the longest cell plus padding, capped at 50", () => {
    const rows = toRows([
      failure("x.pdf", "ParseError", "e".repeat(80)),
      success("a-rather-long-file-name.pdf"),
    ]);

    const widths = columnWidths(rows);

    expect(widths).toHaveLength(ROW_COLUMNS.length);
    expect(widths[ROW_COLUMNS.indexOf("file_name")]).toEqual({ wch: 29 });
    expect(widths[ROW_COLUMNS.indexOf("status")]).toEqual({ wch: 9 });
    expect(widths[ROW_COLUMNS.indexOf("error_message")]).toEqual({ wch: 50 });
  });
});

describe("buildWorkbook", () => {
  it("writes one sheet with the export columns as the header row", () => {
    const workbook = buildWorkbook(outcomes);

    expect(workbook.SheetNames).toEqual(["Resume Analysis"]);
    const rows = XLSX.utils.sheet_to_json<string[]>(workbook.Sheets["Resume Analysis"], {
      header: 1,
      defval: "",
    });
    expect(rows[0]).toEqual(ROW_COLUMNS);
    expect(rows[1].slice(0, 4)).toEqual(["alpha.pdf", "Success", "", "alpha"]);
    expect(rows[2].slice(0, 3)).toEqual([
      "beta.docx",
      "Error",
      "[ExtractionError] No text could be extracted",
    ]);
  });
});

describe("ExportService", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), "resume-export-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it("creates a missing output directory", () => {
    const nested = path.join(outputDir, "a", "b");

    new ExportService(nested);

    expect(fs.existsSync(nested)).toBe(true);
  });

  it("saves an Excel report that reads back with every outcome", () => {
    const filepath = new ExportService(outputDir).saveToExcel(outcomes, "report.xlsx");

    expect(filepath).toBe(path.join(outputDir, "report.xlsx"));
    const workbook = XLSX.readFile(filepath);
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(
      workbook.Sheets["Resume Analysis"]
    );
    expect(rows.map((row) => row.file_name)).toEqual(["alpha.pdf", "beta.docx"]);
    expect(rows[0].overall_experience).toBe(7);
  });

  it("saves the JSON document with metadata and results", () => {
    const filepath = new ExportService(outputDir).saveToJson(outcomes, "report.json");

    const document = JSON.parse(fs.readFileSync(filepath, "utf8"));
    expect(document.metadata).toMatchObject({ totalCount: 2, successCount: 1, failureCount: 1 });
    expect(document.results[1]).toEqual({
      file_name: "beta.docx",
      error_kind: "ExtractionError",
      error: "No text could be extracted",
    });
  });

  it("names reports with a timestamp by default", () => {
    const filepath = new ExportService(outputDir).saveToJson(outcomes);

    expect(path.basename(filepath)).toMatch(/^resume_analysis_\d{8}_\d{6}\.json$/);
  });

  it("bundles both reports into a ZIP archive", async () => {
    const zipPath = await new ExportService(outputDir).saveBundle(outcomes, "batch_1_results");

    expect(zipPath).toBe(path.join(outputDir, "batch_1_results.zip"));
    expect(fs.readdirSync(outputDir).sort()).toEqual([
      "batch_1_results.json",
      "batch_1_results.xlsx",
      "batch_1_results.zip",
    ]);
    const header = fs.readFileSync(zipPath).subarray(0, 2).toString("latin1");
    expect(header).toBe("PK");
  });

  it("removes only files older than the age limit", () => {
    const exporter = new ExportService(outputDir);
    const stale = path.join(outputDir, "stale.json");
    const fresh = path.join(outputDir, "fresh.json");
    fs.writeFileSync(stale, "{}");
    fs.writeFileSync(fresh, "{}");
    const twoDaysAgo = new Date(Date.now() - 48 * 3600 * 1000);
    fs.utimesSync(stale, twoDaysAgo, twoDaysAgo);

    expect(exporter.cleanupOldFiles(24)).toEqual(["stale.json"]);
    expect(fs.readdirSync(outputDir)).toEqual(["fresh.json"]);
  });
});
