// src/utils/uploads.ts
import fs from "fs";

export function cleanupFile(filePath: string): void {
  try {
    if (fs.existsSync(filePath)) {
      fs.unlinkSync(filePath);
    }
  } catch (error) {
    console.warn(`⚠️ Could not cleanup ${filePath}:`, error);
  }
}

/** Reads a multer upload into memory and removes it from disk. */
export function readUpload(file: Express.Multer.File): Buffer {
  try {
    return fs.readFileSync(file.path);
  } finally {
    cleanupFile(file.path);
  }
}
