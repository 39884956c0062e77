import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { readImageFile } from "./attachments.js";

const cleanupDirs: string[] = [];

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of cleanupDirs.splice(0, cleanupDirs.length)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function tempDir(): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "roster-chat-images-"));
  cleanupDirs.push(root);
  return root;
}

describe("readImageFile", () => {
  it("reads a supported image and infers its content type", () => {
    const root = tempDir();
    const filePath = path.join(root, "Roster.JPG");
    fs.writeFileSync(filePath, Buffer.from([0xff, 0xd8, 0xff]));

    const result = readImageFile(`"${filePath}"`);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.image.fileName).toBe("Roster.JPG");
      expect(result.image.contentType).toBe("image/jpeg");
      expect(Array.from(result.image.data)).toEqual([0xff, 0xd8, 0xff]);
    }
  });

  it("rejects missing files and unsupported types", () => {
    const root = tempDir();
    const textPath = path.join(root, "notes.txt");
    fs.writeFileSync(textPath, "hello");

    expect(readImageFile("")).toEqual({ ok: false, error: "no file path provided" });
    expect(readImageFile(path.join(root, "missing.png"))).toEqual({
      ok: false,
      error: `file not found: ${path.join(root, "missing.png")}`,
    });
    expect(readImageFile(textPath)).toEqual({
      ok: false,
      error: "unsupported image type: .txt. supported: .png, .jpg, .jpeg, .webp, .gif",
    });
  });

  it("accepts file urls with escaped characters", () => {
    const root = tempDir();
    const filePath = path.join(root, "Roster Shot.png");
    fs.writeFileSync(filePath, Buffer.from([0x89, 0x50]));

    const result = readImageFile(`file://${filePath.split(" ").join("%20")}`);

    expect(result).toEqual({
      ok: true,
      image: { data: fs.readFileSync(filePath), fileName: "Roster Shot.png", contentType: "image/png" },
    });
  });

  it("reports a file that cannot be read instead of throwing", () => {
    const root = tempDir();
    const filePath = path.join(root, "locked.png");
    fs.writeFileSync(filePath, Buffer.from([0x89, 0x50]));
    vi.spyOn(fs, "readFileSync").mockImplementation(() => {
      throw new Error("EACCES: permission denied");
    });

    expect(readImageFile(filePath)).toEqual({ ok: false, error: `unable to read image file: ${filePath}` });
  });
});
