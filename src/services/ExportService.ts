// src/services/ExportService.ts - Excel / JSON / ZIP exports and output housekeeping
import fs from "fs";
import path from "path";
import archiver from "archiver";
import * as XLSX from "xlsx";
import { serverConfig } from "../config";
import type { AnalysisOutcome, FlatRow } from "../types";
import { ROW_COLUMNS, toJsonDocument, toRows } from "./ResultAggregator";

const SHEET_NAME = "Resume Analysis";
const MAX_COLUMN_WIDTH = 50;

export function exportTimestamp(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** Column widths fitted to the longest cell (header included), capped at 50. */
export function columnWidths(rows: FlatRow[]): Array<{ wch: number }> {
  return ROW_COLUMNS.map((column) => {
    const longest = rows.reduce(
      (max, row) => Math.max(max, String(row[column]).length),
      column.length
    );
    return { wch: Math.min(longest + 2, MAX_COLUMN_WIDTH) };
  });
}

export function buildWorkbook(outcomes: AnalysisOutcome[]): XLSX.WorkBook {
  const rows = toRows(outcomes);
  const worksheet = XLSX.utils.json_to_sheet(rows, { header: ROW_COLUMNS });
  worksheet["!cols"] = columnWidths(rows);

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, SHEET_NAME);
  return workbook;
}

export class ExportService {
  constructor(private outputDir: string = serverConfig.outputDir) {
    if (!fs.existsSync(this.outputDir)) {
      fs.mkdirSync(this.outputDir, { recursive: true });
    }
  }

  saveToExcel(outcomes: AnalysisOutcome[], filename?: string): string {
    const filepath = path.join(
      this.outputDir,
      filename || `resume_analysis_${exportTimestamp()}.xlsx`
    );

    XLSX.writeFile(buildWorkbook(outcomes), filepath, { bookType: "xlsx" });
    console.log(`📊 Saved Excel report: ${filepath}`);
    return filepath;
  }

  saveToJson(outcomes: AnalysisOutcome[], filename?: string): string {
    const filepath = path.join(
      this.outputDir,
      filename || `resume_analysis_${exportTimestamp()}.json`
    );

    fs.writeFileSync(
      filepath,
      JSON.stringify(toJsonDocument(outcomes), null, 2),
      "utf8"
    );
    console.log(`💾 Saved JSON report: ${filepath}`);
    return filepath;
  }

  /** Writes both reports and packs them into one ZIP archive. */
  async saveBundle(outcomes: AnalysisOutcome[], baseName?: string): Promise<string> {
    const base = baseName || `resume_analysis_${exportTimestamp()}`;
    const excelPath = this.saveToExcel(outcomes, `${base}.xlsx`);
    const jsonPath = this.saveToJson(outcomes, `${base}.json`);
    const zipPath = path.join(this.outputDir, `${base}.zip`);

    await new Promise<void>((resolve, reject) => {
      const output = fs.createWriteStream(zipPath);
      const archive = archiver("zip", { zlib: { level: 9 } });

      output.on("close", () => resolve());
      output.on("error", reject);
      archive.on("error", reject);

      archive.pipe(output);
      archive.file(excelPath, { name: path.basename(excelPath) });
      archive.file(jsonPath, { name: path.basename(jsonPath) });
      archive.finalize().catch(reject);
    });

    console.log(`📦 Saved results bundle: ${zipPath}`);
    return zipPath;
  }

  /** Deletes output files older than `maxAgeHours`; returns the removed names. */
  cleanupOldFiles(maxAgeHours: number = serverConfig.outputMaxAgeHours): string[] {
    const removed: string[] = [];
    if (!fs.existsSync(this.outputDir)) return removed;

    const cutoff = Date.now() - maxAgeHours * 3600 * 1000;

    for (const file of fs.readdirSync(this.outputDir)) {
      const filepath = path.join(this.outputDir, file);
      try {
        const stats = fs.statSync(filepath);
        if (stats.isFile() && stats.mtimeMs < cutoff) {
          fs.unlinkSync(filepath);
          removed.push(file);
        }
      } catch (error) {
        console.warn(`⚠️ Could not remove old file ${filepath}:`, error);
      }
    }

    if (removed.length > 0) {
      console.log(`🧹 Removed ${removed.length} old output file(s)`);
    }
    return removed;
  }
}
