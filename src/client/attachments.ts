import { randomUUID } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { SupabaseClient } from "@supabase/supabase-js";
import { ChatError } from "../errors.js";

export const MAX_IMAGE_FILE_BYTES = 8 * 1024 * 1024;

const IMAGE_MIME_BY_EXT: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".webp": "image/webp",
  ".gif": "image/gif",
};

export type ImageUpload = {
  data: Uint8Array;
  fileName: string;
  contentType: string;
};

export interface AttachmentUploader {
  /** Stores the image and returns a URL the upstream model can fetch. */
  upload(image: ImageUpload): Promise<string>;
}

export class SupabaseAttachmentUploader implements AttachmentUploader {
  constructor(
    private readonly client: SupabaseClient,
    private readonly bucket: string,
    private readonly pathPrefix = "cli",
  ) {}

  async upload(image: ImageUpload): Promise<string> {
    const objectPath = `${this.pathPrefix}/${randomUUID()}/${image.fileName}`;
    const bucket = this.client.storage.from(this.bucket);
    const { error } = await bucket.upload(objectPath, image.data, {
      cacheControl: "3600",
      contentType: image.contentType,
      upsert: false,
    });
    if (error) {
      throw new ChatError("network_error", `image upload failed: ${error.message}`);
    }
    const { data } = bucket.getPublicUrl(objectPath);
    if (!data.publicUrl) {
      throw new ChatError("invalid_response", "image upload failed: no public url");
    }
    return data.publicUrl;
  }
}

export function readImageFile(rawPath: string): { ok: true; image: ImageUpload } | { ok: false; error: string } {
  const resolvedPath = resolveImagePath(rawPath);
  if (!resolvedPath) {
    return { ok: false, error: "no file path provided" };
  }
  if (!fs.existsSync(resolvedPath)) {
    return { ok: false, error: `file not found: ${resolvedPath}` };
  }

  let stats: fs.Stats;
  try {
    stats = fs.statSync(resolvedPath);
  } catch {
    return { ok: false, error: `unable to stat file: ${resolvedPath}` };
  }
  if (!stats.isFile()) {
    return { ok: false, error: `not a file: ${resolvedPath}` };
  }
  if (stats.size > MAX_IMAGE_FILE_BYTES) {
    return {
      ok: false,
      error: `image too large (${formatByteSize(stats.size)}). max is ${formatByteSize(MAX_IMAGE_FILE_BYTES)}`,
    };
  }

  const extension = path.extname(resolvedPath).toLowerCase();
  const contentType = IMAGE_MIME_BY_EXT[extension];
  if (!contentType) {
    return {
      ok: false,
      error: `unsupported image type: ${extension || "(no extension)"}. supported: ${Object.keys(IMAGE_MIME_BY_EXT).join(", ")}`,
    };
  }

  let data: Buffer;
  try {
    data = fs.readFileSync(resolvedPath);
  } catch {
    return { ok: false, error: `unable to read image file: ${resolvedPath}` };
  }

  return {
    ok: true,
    image: {
      data,
      fileName: path.basename(resolvedPath),
      contentType,
    },
  };
}

function resolveImagePath(rawPath: string): string {
  let normalized = rawPath.trim();
  if (!normalized) {
    return "";
  }
  if (
    (normalized.startsWith('"') && normalized.endsWith('"')) ||
    (normalized.startsWith("'") && normalized.endsWith("'"))
  ) {
    normalized = normalized.slice(1, -1).trim();
  }
  if (normalized.startsWith("file://")) {
    try {
      normalized = decodeURIComponent(normalized.slice("file://".length));
    } catch {
      normalized = normalized.slice("file://".length);
    }
  }
  if (normalized.startsWith("~/")) {
    normalized = path.join(os.homedir(), normalized.slice(2));
  }
  return path.isAbsolute(normalized) ? normalized : path.resolve(process.cwd(), normalized);
}

function formatByteSize(bytes: number): string {
  if (bytes < 1024) {
    return `${Math.floor(bytes)} b`;
  }
  const kb = bytes / 1024;
  if (kb < 1024) {
    return `${kb.toFixed(kb >= 100 ? 0 : kb >= 10 ? 1 : 2)} kb`;
  }
  const mb = kb / 1024;
  return `${mb.toFixed(mb >= 100 ? 0 : mb >= 10 ? 1 : 2)} mb`;
}
