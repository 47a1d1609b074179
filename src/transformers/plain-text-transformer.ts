import {
  DocumentTransformer,
  type GenerateResult,
  type ParseResult,
  type TransformOptions,
} from "../base-transformer.js";
import { ImageBundle } from "../images.js";
import { createDocument, type Document } from "../model/document.js";
import {
  paragraph,
  plainTextOf,
  text,
  type Element,
  type ListElement,
  type TableElement,
} from "../model/elements.js";
import { IGNORE_WARNINGS, type WarningSink } from "../warnings.js";
import { decodeText, dropPageChrome, normalizeNewlines } from "./shared.js";

/**
 * Plain text. Each newline-terminated line is a Paragraph; a trailing line
 * without a newline stays a bare Text so that generation reproduces the
 * input exactly.
 */
export class PlainTextTransformer extends DocumentTransformer {
  readonly format = "PlainText";

  async parse(
    input: Buffer,
    _images: ImageBundle,
    options?: TransformOptions,
  ): Promise<ParseResult> {
    const source = normalizeNewlines(decodeText(input, options?.charset));
    const elements: Element[] = [];
    if (source.length > 0) {
      const lines = source.split("\n");
      const last = lines.pop() ?? "";
      for (const line of lines) {
        elements.push(paragraph(line ? [text(line)] : []));
      }
      if (last) elements.push(text(last));
    }
    return { document: createDocument(elements), images: new ImageBundle() };
  }

  async generate(
    document: Document,
    _images: ImageBundle,
    options?: TransformOptions,
  ): Promise<GenerateResult> {
    const warnings = options?.warnings ?? IGNORE_WARNINGS;
    dropPageChrome(document, warnings, "plain text has no page header or footer");
    const writer = new TextWriter(warnings);
    for (const element of document.elements) {
      writer.block(element);
    }
    return { bytes: Buffer.from(writer.output, "utf-8"), images: new ImageBundle() };
  }
}

class TextWriter {
  output = "";

  constructor(private readonly warnings: WarningSink) {}

  block(element: Element): void {
    switch (element.kind) {
      case "Header":
        this.output += `${element.text}\n`;
        break;
      case "Paragraph":
        this.output += `${this.inline(element.elements)}\n`;
        break;
      case "Text":
      case "Hyperlink":
        this.output += this.inline([element]);
        break;
      case "List":
        this.list(element, 0);
        break;
      case "Table":
        this.table(element);
        break;
      case "PageBreak":
        this.output += "\f\n";
        break;
      case "Image":
        this.warnings.warn("Image", "plain text cannot hold images");
        break;
      case "ListItem":
      case "TableHeader":
      case "TableCell":
        this.block(element.element);
        break;
      case "TableRow":
        this.output += `${plainTextOf(element)}\n`;
        break;
    }
  }

  private inline(elements: Element[]): string {
    let line = "";
    for (const element of elements) {
      switch (element.kind) {
        case "Text":
          line += element.text;
          break;
        case "Hyperlink":
          line +=
            element.title && element.title !== element.url
              ? `${element.title} (${element.url})`
              : element.url;
          break;
        case "Image":
          this.warnings.warn("Image", "plain text cannot hold images");
          break;
        default:
          this.warnings.warn(element.kind, "flattened into a line of text");
          line += plainTextOf(element);
      }
    }
    return line;
  }

  private cell(content: Element): string {
    const line = content.kind === "Paragraph" ? this.inline(content.elements) : this.inline([content]);
    return line.replace(/\n/g, " ");
  }

  private list(list: ListElement, depth: number): void {
    let counter = 0;
    for (const item of list.items) {
      const content = item.element;
      if (content.kind === "List") {
        this.list(content, depth + 1);
        continue;
      }
      counter++;
      const marker = list.numbered ? `${counter}. ` : "- ";
      const body = content.kind === "Paragraph" ? this.inline(content.elements) : this.inline([content]);
      this.output += `${"  ".repeat(depth)}${marker}${body}\n`;
    }
  }

  private table(table: TableElement): void {
    const grid = [
      table.headers.map((h) => this.cell(h.element)),
      ...table.rows.map((row) => row.cells.map((cell) => this.cell(cell.element))),
    ];
    const widths = grid[0].map((_, col) =>
      Math.max(...grid.map((row) => (row[col] ?? "").length)),
    );
    for (const row of grid) {
      const cells = widths.map((width, col) => (row[col] ?? "").padEnd(width));
      this.output += `| ${cells.join(" | ")} |\n`;
    }
  }
}
