import fs from "fs";
import os from "os";
import path from "path";
import { Readable } from "stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { toInputItems } from "../../src/controllers/AnalysisController";

function upload(dir: string, originalname: string, body: string): Express.Multer.File {
  const filename = `${Date.now()}-${originalname}`;
  const filepath = path.join(dir, filename);
  fs.writeFileSync(filepath, body);

  return {
    fieldname: "resumes",
    originalname,
    encoding: "7bit",
    mimetype: "application/octet-stream",
    size: Buffer.byteLength(body),
    destination: dir,
    filename,
    path: filepath,
    buffer: Buffer.alloc(0),
    stream: Readable.from([]),
  };
}

describe("toInputItems", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "resume-uploads-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads each upload into memory and removes the upload files", () => {
    const files = [upload(dir, "Jordan.PDF", "pdf bytes"), upload(dir, "notes.txt", "hello")];

    const items = toInputItems(files);

    expect(items.map(({ name, size, type }) => ({ name, size, type }))).toEqual([
      { name: "Jordan.PDF", size: 9, type: ".pdf" },
      { name: "notes.txt", size: 5, type: ".txt" },
    ]);
    expect(items[0].content.toString("utf8")).toBe("pdf bytes");
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it("still removes the remaining uploads when one cannot be read", () => {
    const readable = upload(dir, "a.pdf", "a");
    const missing = { ...upload(dir, "b.pdf", "b"), path: path.join(dir, "gone.pdf") };

    expect(() => toInputItems([missing, readable])).toThrow();
    expect(fs.readdirSync(dir)).toEqual([missing.filename]);
  });
});
