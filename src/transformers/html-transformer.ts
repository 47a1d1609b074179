import * as cheerio from "cheerio";
import { isTag, isText, type AnyNode, type Element as DomElement } from "domhandler";
import {
  ImageAwareDocumentTransformer,
  type GenerateResult,
  type ParseResult,
  type TransformOptions,
} from "../base-transformer.js";
import { MissingImageError } from "../errors.js";
import { ImageBundle, imageMimeType, type ImageLoader } from "../images.js";
import { createDocument, type Document } from "../model/document.js";
import {
  DEFAULT_COLUMN_WIDTH,
  DEFAULT_FONT_SIZE,
  header,
  hyperlink,
  list,
  listItem,
  normalizeTable,
  pageBreak,
  paragraph,
  plainTextOf,
  tableCell,
  tableHeader,
  tableRow,
  text,
  type ContentElement,
  type Element,
  type ImageElement,
  type ListElement,
  type ListItemElement,
  type TableElement,
} from "../model/elements.js";
import { IGNORE_WARNINGS, type WarningSink } from "../warnings.js";
import {
  ImageCollector,
  asContent,
  decodeText,
  dropPageChrome,
  escapeHtml,
  mergeTextRuns,
} from "./shared.js";

const HEADINGS: Record<string, number> = { h1: 1, h2: 2, h3: 3, h4: 4, h5: 5, h6: 6 };

const INLINE_TAGS = new Set([
  "a",
  "abbr",
  "b",
  "big",
  "br",
  "cite",
  "code",
  "del",
  "em",
  "font",
  "i",
  "img",
  "ins",
  "kbd",
  "label",
  "mark",
  "q",
  "s",
  "samp",
  "small",
  "span",
  "strike",
  "strong",
  "sub",
  "sup",
  "time",
  "u",
  "var",
]);

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ");
}

function textContent(node: AnyNode): string {
  if (isText(node)) return node.data;
  if (isTag(node)) return node.children.map(textContent).join("");
  return "";
}

function fontSizeOf(node: DomElement): number | undefined {
  const match = /font-size:\s*(\d+(?:\.\d+)?)pt/i.exec(node.attribs.style ?? "");
  return match ? Math.round(Number(match[1])) : undefined;
}

function columnWidthOf(node: DomElement): number {
  const match = /(?:^|;)\s*width:\s*(\d+(?:\.\d+)?)mm/i.exec(node.attribs.style ?? "");
  return match ? Number(match[1]) : DEFAULT_COLUMN_WIDTH;
}

function pageBreakOf(node: DomElement): "before" | "after" | undefined {
  const style = node.attribs.style ?? "";
  if (/page-break-after:\s*always|break-after:\s*page/i.test(style)) return "after";
  if (/page-break-before:\s*always|break-before:\s*page/i.test(style)) return "before";
  return undefined;
}

/** Trims the whitespace that HTML layout would not render at the edges of a block. */
function tidyInline(elements: Element[]): Element[] {
  const merged = mergeTextRuns(elements);
  const tidied = merged.map((element, index) => {
    if (element.kind !== "Text") return element;
    let value = element.text.replace(/ {2,}/g, " ").replace(/ ?\n ?/g, "\n");
    if (index === 0) value = value.trimStart();
    if (index === merged.length - 1) value = value.trimEnd();
    return text(value, element.size);
  });
  return tidied.filter((element) => element.kind !== "Text" || element.text !== "");
}

/** Builds model elements from an HTML string; also used for DOCX and raw Markdown HTML. */
export class HtmlReader {
  constructor(private readonly collector: ImageCollector) {}

  async read(html: string): Promise<Element[]> {
    const $ = cheerio.load(html);
    $("script, style, noscript").remove();
    const body = $("body").get(0);
    const roots = body ? body.children : $.root().get(0)?.children ?? [];
    return this.blocks(roots, DEFAULT_FONT_SIZE);
  }

  private async blocks(nodes: AnyNode[], size: number): Promise<Element[]> {
    const out: Element[] = [];
    let pending: Element[] = [];
    const flush = () => {
      const inline = tidyInline(pending);
      if (inline.length > 0) out.push(paragraph(inline));
      pending = [];
    };

    for (const node of nodes) {
      if (isText(node)) {
        pending.push(text(collapseWhitespace(node.data), size));
        continue;
      }
      if (!isTag(node)) continue;

      const nodeSize = fontSizeOf(node) ?? size;
      const level = HEADINGS[node.name];
      if (level !== undefined) {
        flush();
        out.push(header(level, collapseWhitespace(textContent(node)).trim()));
      } else if (node.name === "p") {
        flush();
        out.push(paragraph(tidyInline(await this.inline(node.children, nodeSize))));
      } else if (node.name === "ul" || node.name === "ol") {
        flush();
        out.push(await this.list(node, nodeSize));
      } else if (node.name === "table") {
        flush();
        const table = await this.table(node, nodeSize);
        if (table) out.push(table);
      } else if (INLINE_TAGS.has(node.name)) {
        pending.push(...(await this.inline([node], size)));
      } else {
        flush();
        const breaks = pageBreakOf(node);
        if (breaks === "before") out.push(pageBreak());
        out.push(...(await this.blocks(node.children, nodeSize)));
        if (breaks === "after") out.push(pageBreak());
      }
    }
    flush();
    return out;
  }

  private async inline(nodes: AnyNode[], size: number): Promise<Element[]> {
    const out: Element[] = [];
    for (const node of nodes) {
      if (isText(node)) {
        out.push(text(collapseWhitespace(node.data), size));
        continue;
      }
      if (!isTag(node)) continue;

      const nodeSize = fontSizeOf(node) ?? size;
      switch (node.name) {
        case "br":
          out.push(text("\n", nodeSize));
          break;
        case "a":
          out.push(
            hyperlink(
              collapseWhitespace(textContent(node)).trim(),
              node.attribs.href ?? "",
              node.attribs.title ?? "",
              nodeSize,
            ),
          );
          break;
        case "img":
          if (node.attribs.src) {
            out.push(
              await this.collector.resolve(
                node.attribs.src,
                node.attribs.title ?? "",
                node.attribs.alt ?? "",
              ),
            );
          }
          break;
        default:
          out.push(...(await this.inline(node.children, nodeSize)));
      }
    }
    return out;
  }

  private async list(node: DomElement, size: number): Promise<ListElement> {
    const items: ListItemElement[] = [];
    for (const child of node.children) {
      if (!isTag(child)) continue;
      if (child.name === "li") {
        const blocks = await this.blocks(child.children, fontSizeOf(child) ?? size);
        if (blocks.length === 0) items.push(listItem(text("", size)));
        for (const block of blocks) items.push(listItem(asContent(block)));
      } else if (child.name === "ul" || child.name === "ol") {
        items.push(listItem(await this.list(child, size)));
      }
    }
    return list(items, node.name === "ol");
  }

  private async table(node: DomElement, size: number): Promise<TableElement | undefined> {
    const rows: DomElement[] = [];
    for (const child of node.children.filter(isTag)) {
      if (child.name === "tr") {
        rows.push(child);
      } else if (["thead", "tbody", "tfoot"].includes(child.name)) {
        rows.push(...child.children.filter(isTag).filter((row) => row.name === "tr"));
      }
    }
    const [first, ...rest] = rows;
    if (!first) return undefined;

    const cellsOf = (row: DomElement) =>
      row.children.filter(isTag).filter((cell) => cell.name === "td" || cell.name === "th");

    const headers = await Promise.all(
      cellsOf(first).map(async (cell) =>
        tableHeader(await this.cell(cell, size), columnWidthOf(cell)),
      ),
    );
    const body = await Promise.all(
      rest.map(async (row) =>
        tableRow(
          await Promise.all(
            cellsOf(row).map(async (cell) => tableCell(await this.cell(cell, size))),
          ),
        ),
      ),
    );
    return normalizeTable(headers, body);
  }

  private async cell(node: DomElement, size: number): Promise<ContentElement> {
    const blocks = await this.blocks(node.children, fontSizeOf(node) ?? size);
    const [only] = blocks;
    if (!only) return text("", size);
    if (blocks.length === 1) return asContent(only);
    return text(blocks.map(plainTextOf).join("\n"), size);
  }
}

function sizeStyle(size: number): string {
  return size === DEFAULT_FONT_SIZE ? "" : ` style="font-size: ${size}pt"`;
}

class HtmlWriter {
  readonly images = new ImageBundle();

  constructor(
    private readonly source: ImageBundle,
    private readonly warnings: WarningSink,
  ) {}

  block(element: Element): string {
    switch (element.kind) {
      case "Header":
        return `<h${element.level}>${escapeHtml(element.text)}</h${element.level}>`;
      case "Paragraph":
        return `<p>${element.elements.map((e) => this.inline(e)).join("")}</p>`;
      case "Text":
      case "Hyperlink":
      case "Image":
        return `<p>${this.inline(element)}</p>`;
      case "List":
        return this.list(element);
      case "Table":
        return this.table(element);
      case "PageBreak":
        return `<div style="page-break-after: always"></div>`;
      case "ListItem":
      case "TableHeader":
      case "TableCell":
        return this.block(element.element);
      case "TableRow":
        return `<p>${escapeHtml(plainTextOf(element))}</p>`;
    }
  }

  private inline(element: Element): string {
    switch (element.kind) {
      case "Text": {
        const value = escapeHtml(element.text).replace(/\n/g, "<br>");
        return element.size === DEFAULT_FONT_SIZE
          ? value
          : `<span${sizeStyle(element.size)}>${value}</span>`;
      }
      case "Hyperlink": {
        const title = element.alt ? ` title="${escapeHtml(element.alt)}"` : "";
        return `<a href="${escapeHtml(element.url)}"${title}${sizeStyle(element.size)}>${escapeHtml(element.title)}</a>`;
      }
      case "Image":
        return this.image(element);
      default:
        this.warnings.warn(element.kind, "HTML runs hold text, links and images only");
        return escapeHtml(plainTextOf(element));
    }
  }

  /** List item and cell content, without the paragraph wrapper. */
  private content(element: ContentElement): string {
    switch (element.kind) {
      case "Text":
      case "Hyperlink":
      case "Image":
        return this.inline(element);
      case "Paragraph":
        return element.elements.map((e) => this.inline(e)).join("");
      default:
        return this.block(element);
    }
  }

  private image(image: ImageElement): string {
    let src: string;
    if (image.source.kind === "Inline") {
      const data = Buffer.from(image.source.bytes).toString("base64");
      src = `data:${imageMimeType(image.imageType)};base64,${data}`;
    } else {
      const { key } = image.source;
      const bytes = this.source.get(key);
      if (!bytes) throw new MissingImageError(key);
      this.images.set(key, bytes);
      src = key;
    }
    const title = image.title ? ` title="${escapeHtml(image.title)}"` : "";
    return `<img src="${escapeHtml(src)}" alt="${escapeHtml(image.alt)}"${title}>`;
  }

  private list(element: ListElement): string {
    const tag = element.numbered ? "ol" : "ul";
    const items = element.items.map((item) => `<li>${this.content(item.element)}</li>\n`);
    return `<${tag}>\n${items.join("")}</${tag}>`;
  }

  private table(element: TableElement): string {
    const headers = element.headers
      .map((h) => `<th style="width: ${h.width}mm">${this.content(h.element)}</th>`)
      .join("");
    const rows = element.rows
      .map((row) => `<tr>${row.cells.map((c) => `<td>${this.content(c.element)}</td>`).join("")}</tr>\n`)
      .join("");
    return `<table>\n<thead>\n<tr>${headers}</tr>\n</thead>\n<tbody>\n${rows}</tbody>\n</table>`;
  }
}

export class HtmlTransformer extends ImageAwareDocumentTransformer {
  readonly format = "Html";

  async parseWithLoader(
    input: Buffer,
    loader: ImageLoader,
    options?: TransformOptions,
  ): Promise<ParseResult> {
    const collector = new ImageCollector(loader);
    const elements = await new HtmlReader(collector).read(decodeText(input, options?.charset));
    return { document: createDocument(elements), images: collector.images };
  }

  async generate(
    document: Document,
    images: ImageBundle,
    options?: TransformOptions,
  ): Promise<GenerateResult> {
    const warnings = options?.warnings ?? IGNORE_WARNINGS;
    dropPageChrome(document, warnings, "HTML has no page header or footer");
    const writer = new HtmlWriter(images, warnings);
    const body = document.elements.map((element) => `${writer.block(element)}\n`).join("");
    const html =
      "<!DOCTYPE html>\n<html>\n<head>\n<meta charset=\"utf-8\">\n</head>\n" +
      `<body>\n${body}</body>\n</html>\n`;
    return { bytes: Buffer.from(html, "utf-8"), images: writer.images };
  }
}
