import iconv from "iconv-lite";
import jschardet from "jschardet";
import { IoFailureError, MissingImageError, isPolydocError } from "../errors.js";
import {
  ImageBundle,
  imageTypeFromMime,
  resolveImageType,
  type ImageLoader,
} from "../images.js";
import {
  inlineImage,
  isContentElement,
  keyedImage,
  plainTextOf,
  text,
  type ContentElement,
  type Element,
  type ImageElement,
  type TableElement,
} from "../model/elements.js";
import type { Document } from "../model/document.js";
import type { WarningSink } from "../warnings.js";

/**
 * Decodes text input. Without a charset hint the encoding is sniffed, and
 * anything below 50% confidence is read as UTF-8.
 */
export function decodeText(input: Buffer, charset?: string, detect = false): string {
  let encoding = charset;
  if (!encoding && detect) {
    const detected = jschardet.detect(input);
    if (detected?.encoding && detected.confidence > 0.5) {
      encoding = detected.encoding;
    }
  }
  encoding ??= "utf-8";

  let text: string;
  if (iconv.encodingExists(encoding)) {
    text = iconv.decode(input, encoding);
  } else {
    text = input.toString("utf-8");
  }

  // Remove BOM if present
  if (text.charCodeAt(0) === 0xfeff) {
    text = text.slice(1);
  }
  return text;
}

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

/** Bytes of an image, read from the bundle when the image is keyed. */
export function resolveImageBytes(image: ImageElement, images: ImageBundle): Uint8Array {
  if (image.source.kind === "Inline") return image.source.bytes;
  const bytes = images.get(image.source.key);
  if (!bytes) throw new MissingImageError(image.source.key);
  return bytes;
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

const DATA_URI = /^data:([^;,]*)(;base64)?,(.*)$/s;

/**
 * Turns image references met while parsing into Image elements. Data URIs
 * stay inline; anything else is fetched through the loader once and kept
 * under its reference in `images`.
 */
/** Loads through a caller's loader; failures that are not ours become IOFailure. */
export async function loadImage(loader: ImageLoader, reference: string): Promise<Uint8Array> {
  try {
    return await loader.load(reference);
  } catch (err) {
    if (isPolydocError(err)) throw err;
    throw new IoFailureError(`Failed to load image ${reference}`, { cause: err });
  }
}

export class ImageCollector {
  readonly images = new ImageBundle();

  constructor(private readonly loader: ImageLoader) {}

  async resolve(reference: string, title = "", alt = ""): Promise<ImageElement> {
    const data = DATA_URI.exec(reference);
    if (data) {
      const [, mime = "", base64, payload = ""] = data;
      const bytes = base64
        ? Buffer.from(payload, "base64")
        : Buffer.from(decodeURIComponent(payload), "utf-8");
      const type = imageTypeFromMime(mime) ?? (await resolveImageType(bytes));
      return inlineImage(bytes, type, title, alt);
    }

    const bytes = this.images.get(reference) ?? (await loadImage(this.loader, reference));
    this.images.set(reference, bytes);
    return keyedImage(reference, await resolveImageType(bytes, reference), title, alt);
  }
}

/** Joins neighbouring Text runs of the same size. */
export function mergeTextRuns(elements: Element[]): Element[] {
  const merged: Element[] = [];
  for (const element of elements) {
    const previous = merged[merged.length - 1];
    if (element.kind === "Text" && previous?.kind === "Text" && previous.size === element.size) {
      merged[merged.length - 1] = text(previous.text + element.text, element.size);
    } else {
      merged.push(element);
    }
  }
  return merged;
}

/** Cell and list item content: a paragraph holding a lone run of text is unwrapped. */
export function asContent(block: Element): ContentElement {
  if (block.kind === "Paragraph" && block.elements.length === 1) {
    const [only] = block.elements;
    if (only?.kind === "Text") return only;
  }
  return isContentElement(block) ? block : text(plainTextOf(block));
}

/** Point sizes for header levels 1 to 6 in formats that render headers as sized text. */
export const HEADING_SIZES = [20, 16, 14, 12, 11, 10] as const;

export function headingSize(level: number): number {
  return HEADING_SIZES[Math.min(Math.max(level, 1), HEADING_SIZES.length) - 1] ?? HEADING_SIZES[0];
}

/**
 * Text for content a target can only hold as text. Text and plain paragraphs
 * pass through; anything else is reported once and reduced to its text.
 */
export function flattenText(element: Element, warnings: WarningSink, reason: string): string {
  switch (element.kind) {
    case "Text":
      return element.text;
    case "Paragraph":
      return element.elements.map((e) => flattenText(e, warnings, reason)).join("");
    default:
      warnings.warn(element.kind, reason);
      return plainTextOf(element);
  }
}

export function spreadsheetCell(element: Element, warnings: WarningSink): string {
  return flattenText(element, warnings, "spreadsheet cells hold text only");
}

/** Reports page header and footer content a format has no place for. */
export function dropPageChrome(document: Document, warnings: WarningSink, reason: string): void {
  for (const element of [...document.pageHeader, ...document.pageFooter]) {
    warnings.warn(element.kind, reason);
  }
}

/** Collects the top-level tables of a spreadsheet-bound document; anything else is reported and dropped. */
export function topLevelTables(document: Document, warnings: WarningSink): TableElement[] {
  const tables: TableElement[] = [];
  for (const element of document.elements) {
    if (element.kind === "Table") tables.push(element);
    else warnings.warn(element.kind, "spreadsheets hold tables only");
  }
  dropPageChrome(document, warnings, "spreadsheets have no page header or footer");
  return tables;
}
