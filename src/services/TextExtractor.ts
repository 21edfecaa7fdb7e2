// src/services/TextExtractor.ts
import mammoth from "mammoth";
// The package entry point runs a self-test when it has no parent module
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { TextExtractionError, errorMessage } from "../utils/errors";

export interface TextExtractor {
  extractText(content: Buffer, extension: string): Promise<string>;
}

/**
 * Plain-text extraction for the two supported resume formats.
 * PDFs go through pdf-parse, DOCX through mammoth's raw text mode.
 */
export class DocumentTextExtractor implements TextExtractor {
  async extractText(content: Buffer, extension: string): Promise<string> {
    const ext = extension.toLowerCase();

    if (ext !== ".pdf" && ext !== ".docx") {
      throw new TextExtractionError(
        `Unsupported file format: ${extension}`,
        "UnsupportedFormat"
      );
    }

    try {
      return ext === ".pdf"
        ? await this.extractPdf(content)
        : await this.extractDocx(content);
    } catch (error) {
      throw new TextExtractionError(
        `Error extracting text from file: ${errorMessage(error)}`
      );
    }
  }

  private async extractPdf(content: Buffer): Promise<string> {
    const parsed = await pdfParse(content);
    return parsed.text;
  }

  private async extractDocx(content: Buffer): Promise<string> {
    const result = await mammoth.extractRawText({ buffer: content });
    return result.value;
  }
}
