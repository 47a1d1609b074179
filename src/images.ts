import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, extname, isAbsolute, join, normalize, relative } from "node:path";
import { fileTypeFromBuffer } from "file-type";
import { IoFailureError, MissingImageError } from "./errors.js";
import type { ImageType } from "./model/elements.js";

/** Image payloads keyed by logical name, in insertion order. */
export class ImageBundle {
  private readonly entriesByKey = new Map<string, Uint8Array>();

  static from(entries: Iterable<[string, Uint8Array]>): ImageBundle {
    const bundle = new ImageBundle();
    for (const [key, bytes] of entries) bundle.set(key, bytes);
    return bundle;
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  set(key: string, bytes: Uint8Array): this {
    this.entriesByKey.set(key, bytes);
    return this;
  }

  get(key: string): Uint8Array | undefined {
    return this.entriesByKey.get(key);
  }

  has(key: string): boolean {
    return this.entriesByKey.has(key);
  }

  keys(): string[] {
    return [...this.entriesByKey.keys()];
  }

  entries(): [string, Uint8Array][] {
    return [...this.entriesByKey.entries()];
  }
}

export interface ImageLoader {
  /** Resolves a reference found in the source, or rejects with `MissingImageError`. */
  load(reference: string): Promise<Uint8Array>;
}

export interface ImageSink {
  store(key: string, bytes: Uint8Array): Promise<void>;
}

/**
 * Resolves a reference inside `root`. References that climb out of it are
 * treated as missing.
 */
function resolveInside(root: string, reference: string): string | undefined {
  let cleaned = reference.split(/[?#]/)[0] ?? "";
  try {
    cleaned = decodeURIComponent(cleaned);
  } catch {
    return undefined;
  }
  const target = normalize(join(root, cleaned));
  const rel = relative(root, target);
  if (rel.startsWith("..") || isAbsolute(rel)) return undefined;
  return target;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export class DirectoryImageLoader implements ImageLoader {
  constructor(private readonly directory: string) {}

  async load(reference: string): Promise<Uint8Array> {
    const path = resolveInside(this.directory, reference);
    if (!path) throw new MissingImageError(reference);
    try {
      return await readFile(path);
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOENT" || code === "EISDIR") {
        throw new MissingImageError(reference);
      }
      throw new IoFailureError(`Failed to read image ${reference}`, { cause: err });
    }
  }
}

export class NullImageLoader implements ImageLoader {
  async load(reference: string): Promise<Uint8Array> {
    throw new MissingImageError(reference);
  }
}

export class BundleImageLoader implements ImageLoader {
  constructor(private readonly bundle: ImageBundle) {}

  async load(reference: string): Promise<Uint8Array> {
    const bytes = this.bundle.get(reference) ?? this.bundle.get(reference.replace(/^\.\//, ""));
    if (!bytes) throw new MissingImageError(reference);
    return bytes;
  }
}

export class DirectoryImageSink implements ImageSink {
  constructor(private readonly directory: string) {}

  async store(key: string, bytes: Uint8Array): Promise<void> {
    const path = resolveInside(this.directory, key);
    if (!path) throw new IoFailureError(`Image key escapes the output directory: ${key}`);
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, bytes);
    } catch (err) {
      throw new IoFailureError(`Failed to write image ${key}`, { cause: err });
    }
  }
}

export class BundleImageSink implements ImageSink {
  readonly bundle = new ImageBundle();

  async store(key: string, bytes: Uint8Array): Promise<void> {
    this.bundle.set(key, bytes);
  }
}

const IMAGE_TYPES_BY_MIME: Record<string, ImageType> = {
  "image/png": "Png",
  "image/jpeg": "Jpeg",
  "image/gif": "Gif",
};

const IMAGE_TYPES_BY_EXTENSION: Record<string, ImageType> = {
  ".png": "Png",
  ".jpg": "Jpeg",
  ".jpeg": "Jpeg",
  ".gif": "Gif",
};

export async function detectImageType(bytes: Uint8Array): Promise<ImageType | undefined> {
  const detected = await fileTypeFromBuffer(bytes);
  return detected ? IMAGE_TYPES_BY_MIME[detected.mime] : undefined;
}

export function imageTypeFromName(name: string): ImageType | undefined {
  const cleaned = name.split(/[?#]/)[0] ?? "";
  return IMAGE_TYPES_BY_EXTENSION[extname(cleaned).toLowerCase()];
}

export function imageTypeFromMime(mime: string): ImageType | undefined {
  return IMAGE_TYPES_BY_MIME[mime.toLowerCase()];
}

export function imageExtension(type: ImageType): string {
  switch (type) {
    case "Png":
      return "png";
    case "Jpeg":
      return "jpg";
    case "Gif":
      return "gif";
  }
}

export function imageMimeType(type: ImageType): string {
  switch (type) {
    case "Png":
      return "image/png";
    case "Jpeg":
      return "image/jpeg";
    case "Gif":
      return "image/gif";
  }
}

/**
 * Settles an image's type from, in order, its bytes, its reference's
 * extension, then PNG.
 */
export async function resolveImageType(
  bytes: Uint8Array,
  reference = "",
): Promise<ImageType> {
  return (await detectImageType(bytes)) ?? imageTypeFromName(reference) ?? "Png";
}

export interface ImageDimensions {
  width: number;
  height: number;
}

/** Pixel size read from the PNG, GIF or JPEG header, when it can be found. */
export function imageDimensions(bytes: Uint8Array): ImageDimensions | undefined {
  const data = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (data.length >= 24 && data.readUInt32BE(0) === 0x89504e47) {
    return { width: data.readUInt32BE(16), height: data.readUInt32BE(20) };
  }
  if (data.length >= 10 && data.toString("latin1", 0, 3) === "GIF") {
    return { width: data.readUInt16LE(6), height: data.readUInt16LE(8) };
  }
  if (data.length >= 4 && data[0] === 0xff && data[1] === 0xd8) {
    let offset = 2;
    while (offset + 9 <= data.length && data[offset] === 0xff) {
      const marker = data[offset + 1] ?? 0;
      const length = data.readUInt16BE(offset + 2);
      // SOF0..SOF15, except DHT, JPG and DAC
      if (marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc) {
        return { width: data.readUInt16BE(offset + 7), height: data.readUInt16BE(offset + 5) };
      }
      offset += 2 + length;
    }
  }
  return undefined;
}
