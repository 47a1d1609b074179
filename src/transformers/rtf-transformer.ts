import {
  DocumentTransformer,
  type GenerateResult,
  type ParseResult,
  type TransformOptions,
} from "../base-transformer.js";
import { UnsupportedFeatureError } from "../errors.js";
import { ImageBundle } from "../images.js";
import type { Document } from "../model/document.js";
import {
  plainTextOf,
  type ContentElement,
  type Element,
  type ImageElement,
  type ListElement,
  type TableElement,
} from "../model/elements.js";
import { IGNORE_WARNINGS, type WarningSink } from "../warnings.js";
import { mmToTwips } from "../units.js";
import { headingSize, resolveImageBytes } from "./shared.js";

const LIST_INDENT = 360;

/** Escapes RTF control characters; anything beyond ASCII becomes `\uN?`. */
export function escapeRtf(value: string): string {
  let out = "";
  for (let i = 0; i < value.length; i++) {
    const c = value[i] ?? "";
    const code = value.charCodeAt(i);
    if (c === "\\" || c === "{" || c === "}") out += `\\${c}`;
    else if (c === "\n") out += "\\line ";
    else if (c === "\t") out += "\\tab ";
    else if (code > 127) out += `\\u${code > 32767 ? code - 65536 : code}?`;
    else out += c;
  }
  return out;
}

class RtfWriter {
  constructor(
    private readonly images: ImageBundle,
    private readonly warnings: WarningSink,
  ) {}

  block(element: Element): string {
    switch (element.kind) {
      case "Header":
        return `\\pard\\plain\\sb120\\sa60\\keepn\\b\\fs${headingSize(element.level) * 2} ${escapeRtf(element.text)}\\b0\\par\n`;
      case "Paragraph":
        return `\\pard\\plain ${element.elements.map((e) => this.inline(e)).join("")}\\par\n`;
      case "Text":
      case "Hyperlink":
      case "Image":
        return `\\pard\\plain ${this.inline(element)}\\par\n`;
      case "List":
        return this.list(element, 0);
      case "Table":
        return this.table(element);
      case "PageBreak":
        return "\\page\n";
      case "ListItem":
      case "TableHeader":
      case "TableCell":
        return this.block(element.element);
      case "TableRow":
        return `\\pard\\plain ${escapeRtf(plainTextOf(element))}\\par\n`;
    }
  }

  private inline(element: Element): string {
    switch (element.kind) {
      case "Text":
        return `{\\fs${element.size * 2} ${escapeRtf(element.text)}}`;
      case "Hyperlink": {
        const url = element.url.replace(/["\\{}]/g, "");
        return `{\\field{\\*\\fldinst{HYPERLINK "${url}"}}{\\fldrslt{\\ul\\cf1\\fs${element.size * 2} ${escapeRtf(element.title || element.url)}}}}`;
      }
      case "Image":
        return this.image(element);
      default:
        this.warnings.warn(element.kind, "RTF runs hold text, links and pictures only");
        return escapeRtf(plainTextOf(element));
    }
  }

  private image(image: ImageElement): string {
    if (image.imageType === "Gif") {
      this.warnings.warn("Image", "RTF pictures are PNG or JPEG only");
      return "";
    }
    const bytes = resolveImageBytes(image, this.images);
    const blip = image.imageType === "Png" ? "\\pngblip" : "\\jpegblip";
    const hex = Buffer.from(bytes).toString("hex").replace(/(.{128})/g, "$1\n");
    return `{\\pict${blip}\\picscalex100\\picscaley100\n${hex}}`;
  }

  private content(element: ContentElement): string {
    switch (element.kind) {
      case "Paragraph":
        return element.elements.map((e) => this.inline(e)).join("");
      case "Text":
      case "Hyperlink":
      case "Image":
        return this.inline(element);
      case "Header":
        return `\\b ${escapeRtf(element.text)}\\b0 `;
      default:
        this.warnings.warn(element.kind, "RTF cells and list items hold a single paragraph");
        return escapeRtf(plainTextOf(element));
    }
  }

  private list(element: ListElement, depth: number): string {
    let out = "";
    let counter = 0;
    const indent = LIST_INDENT * (depth + 1);
    for (const item of element.items) {
      if (item.element.kind === "List") {
        out += this.list(item.element, depth + 1);
        continue;
      }
      counter++;
      const marker = element.numbered ? `${counter}.` : "\\bullet";
      out += `\\pard\\plain\\li${indent}\\fi-${LIST_INDENT} ${marker}\\tab ${this.content(item.element)}\\par\n`;
    }
    return out;
  }

  private table(element: TableElement): string {
    let edge = 0;
    const cellx = element.headers
      .map((h) => {
        edge += mmToTwips(h.width);
        return `\\cellx${edge}`;
      })
      .join("");
    const row = (cells: ContentElement[], header: boolean) =>
      `\\trowd\\trgaph108${header ? "\\trhdr" : ""}${cellx}\n` +
      cells
        .map((cell) => `\\pard\\intbl ${header ? "\\b " : ""}${this.content(cell)}${header ? "\\b0" : ""}\\cell\n`)
        .join("") +
      "\\row\n";
    return (
      row(element.headers.map((h) => h.element), true) +
      element.rows.map((r) => row(r.cells.map((c) => c.element), false)).join("") +
      "\\pard\\plain\n"
    );
  }
}

/** Writes RTF 1.x. Reading RTF is not supported. */
export class RtfTransformer extends DocumentTransformer {
  readonly format = "Rtf";

  async parse(
    _input: Buffer,
    _images: ImageBundle,
    _options?: TransformOptions,
  ): Promise<ParseResult> {
    throw new UnsupportedFeatureError("RTF parsing", "RTF can be generated but not parsed");
  }

  async generate(
    document: Document,
    images: ImageBundle,
    options?: TransformOptions,
  ): Promise<GenerateResult> {
    const writer = new RtfWriter(images, options?.warnings ?? IGNORE_WARNINGS);
    const chrome = (group: string, elements: Element[]) =>
      elements.length > 0 ? `{\\${group}\n${elements.map((e) => writer.block(e)).join("")}}\n` : "";

    const rtf =
      "{\\rtf1\\ansi\\ansicpg1252\\deff0\n" +
      "{\\fonttbl{\\f0\\fswiss Helvetica;}}\n" +
      "{\\colortbl;\\red0\\green0\\blue255;}\n" +
      `\\paperw${mmToTwips(document.pageWidth)}\\paperh${mmToTwips(document.pageHeight)}` +
      `\\margl${mmToTwips(document.leftPageIndent)}\\margr${mmToTwips(document.rightPageIndent)}` +
      `\\margt${mmToTwips(document.topPageIndent)}\\margb${mmToTwips(document.bottomPageIndent)}\n` +
      chrome("header", document.pageHeader) +
      chrome("footer", document.pageFooter) +
      document.elements.map((e) => writer.block(e)).join("") +
      "}\n";
    return { bytes: Buffer.from(rtf, "latin1"), images: new ImageBundle() };
  }
}
