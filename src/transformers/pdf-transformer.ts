import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import {
  PDFDocument,
  PDFString,
  StandardFonts,
  rgb,
  type PDFFont,
  type PDFPage,
} from "pdf-lib";
import { z } from "zod";
import {
  DocumentTransformer,
  type GenerateResult,
  type ParseResult,
  type TransformOptions,
} from "../base-transformer.js";
import { MalformedInputError } from "../errors.js";
import { ImageBundle } from "../images.js";
import { createDocument, type Document, type PageGeometry } from "../model/document.js";
import {
  DEFAULT_FONT_SIZE,
  header,
  hyperlink,
  list,
  listItem,
  pageBreak,
  paragraph,
  plainTextOf,
  tableFromStrings,
  text,
  type ContentElement,
  type Element,
  type ElementKind,
  type ImageElement,
  type ListElement,
  type TableElement,
} from "../model/elements.js";
import { mmToPoints, pointsToMm } from "../units.js";
import { IGNORE_WARNINGS, type WarningSink } from "../warnings.js";
import { detectTables, type PositionedWord } from "./pdf-tables.js";
import {
  HEADING_SIZES,
  asContent,
  flattenText,
  headingSize,
  mergeTextRuns,
  resolveImageBytes,
} from "./shared.js";

// Reading

interface TextRun {
  str: string;
  transform: number[];
  width: number;
  fontName: string;
}

interface LinkArea {
  url: string;
  /** [x0, y0, x1, y1] in bottom-origin page coordinates. */
  rect: [number, number, number, number];
}

interface PlacedText {
  str: string;
  x0: number;
  x1: number;
  top: number;
  size: number;
  bold: boolean;
  url: string | undefined;
}

interface Line {
  items: PlacedText[];
  text: string;
  size: number;
  top: number;
}

const linkAnnotationSchema = z.object({
  subtype: z.literal("Link"),
  url: z.string().min(1),
  rect: z.tuple([z.number(), z.number(), z.number(), z.number()]),
});

const BULLET = /^[•●○▪■\-*→]\s+/;
const ORDERED = /^(\d+[.)]|[a-z][.)]|\([a-z0-9]+\))\s+/i;

function linkAreas(annotations: unknown): LinkArea[] {
  if (!Array.isArray(annotations)) return [];
  const links: LinkArea[] = [];
  for (const annotation of annotations) {
    const parsed = linkAnnotationSchema.safeParse(annotation);
    if (parsed.success) links.push({ url: parsed.data.url, rect: parsed.data.rect });
  }
  return links;
}

function placeRuns(
  runs: TextRun[],
  styles: Record<string, { fontFamily: string }>,
  links: LinkArea[],
  pageHeight: number,
): PlacedText[] {
  const placed: PlacedText[] = [];
  for (const run of runs) {
    if (!run.str.trim()) continue;
    const [a = 0, , , d = 0, x0 = 0, y = 0] = run.transform;
    const size = Math.abs(a) || Math.abs(d) || 12;
    const fontFamily = styles[run.fontName]?.fontFamily ?? run.fontName;

    // Links are matched on the run's centre.
    const cx = x0 + run.width / 2;
    const link = links.find(
      ({ rect: [ax0, ay0, ax1, ay1] }) => cx >= ax0 && cx <= ax1 && y >= ay0 && y <= ay1,
    );
    placed.push({
      str: run.str,
      x0,
      x1: x0 + run.width,
      top: pageHeight - y,
      size,
      bold: /Bold|Black|Heavy/i.test(fontFamily),
      url: link?.url,
    });
  }
  return placed;
}

function buildLine(items: PlacedText[]): Line {
  items.sort((a, b) => a.x0 - b.x0);
  let value = "";
  let chars = 0;
  let weighted = 0;
  for (const item of items) {
    if (value && !value.endsWith(" ") && !item.str.startsWith(" ")) value += " ";
    value += item.str;
    const len = item.str.trim().length;
    chars += len;
    weighted += item.size * len;
  }
  const size = chars > 0 ? weighted / chars : DEFAULT_FONT_SIZE;
  return {
    items,
    text: value.trim(),
    size: Math.round(size * 2) / 2,
    top: items[0]?.top ?? 0,
  };
}

/** Runs on the same baseline, within 5 pt, form one line. Lines run top to bottom. */
function groupLines(placed: PlacedText[]): Line[] {
  const lines: Line[] = [];
  let current: PlacedText[] = [];
  for (const item of [...placed].sort((a, b) => a.top - b.top)) {
    const previous = current[current.length - 1];
    if (previous && Math.abs(item.top - previous.top) > 5) {
      lines.push(buildLine(current));
      current = [];
    }
    current.push(item);
  }
  if (current.length > 0) lines.push(buildLine(current));
  return lines;
}

/** The most common size, weighted by character count. */
function bodySize(lines: Line[]): number {
  const counts = new Map<number, number>();
  for (const line of lines) counts.set(line.size, (counts.get(line.size) ?? 0) + line.text.length);
  let body = DEFAULT_FONT_SIZE;
  let max = 0;
  for (const [size, count] of counts) {
    if (count > max) {
      max = count;
      body = size;
    }
  }
  return body;
}

/** Heading level from the size relative to the body, on the same scale the generator writes. */
function headingLevel(size: number, body: number): number {
  const scaled = (size * DEFAULT_FONT_SIZE) / body;
  const index = HEADING_SIZES.findIndex((s) => scaled >= s - 0.5);
  return index === -1 ? HEADING_SIZES.length : index + 1;
}

/** Text and hyperlink runs of a line, split where the link target changes. */
function lineRuns(line: Line, strip?: RegExp): Element[] {
  const segments: { text: string; url: string | undefined }[] = [];
  for (const item of line.items) {
    const last = segments[segments.length - 1];
    const joiner = last && !last.text.endsWith(" ") && !item.str.startsWith(" ") ? " " : "";
    if (last && last.url === item.url) {
      last.text += joiner + item.str;
    } else if (last) {
      if (last.url) segments.push({ text: joiner + item.str, url: item.url });
      else {
        last.text += joiner;
        segments.push({ text: item.str, url: item.url });
      }
    } else {
      segments.push({ text: item.str.trimStart(), url: item.url });
    }
  }
  const first = segments[0];
  if (first && strip) first.text = first.text.replace(strip, "");
  const last = segments[segments.length - 1];
  if (last) last.text = last.text.trimEnd();

  return segments
    .filter((s) => s.text !== "")
    .map((s) => (s.url ? hyperlink(s.text.trim(), s.url, "", line.size) : text(s.text, line.size)));
}

function itemContent(runs: Element[]): ContentElement {
  return asContent(paragraph(runs));
}

/** Lines become headings, lists and paragraphs; wrapped paragraph lines are joined. */
function classifyLines(lines: Line[]): Element[] {
  const body = bodySize(lines);
  const elements: Element[] = [];
  let previous: { line: Line; kind: "paragraph" | "bullet" | "ordered" | "heading" } | undefined;

  for (const line of lines) {
    const ratio = line.size / body;
    const last = elements[elements.length - 1];

    if (ratio >= 1.15 && line.text.length <= 120) {
      elements.push(header(headingLevel(line.size, body), line.text));
      previous = { line, kind: "heading" };
      continue;
    }

    const kind = BULLET.test(line.text) ? "bullet" : ORDERED.test(line.text) ? "ordered" : "paragraph";
    if (kind !== "paragraph") {
      const item = listItem(itemContent(lineRuns(line, kind === "bullet" ? BULLET : ORDERED)));
      if (last?.kind === "List" && previous?.kind === kind) last.items.push(item);
      else elements.push(list([item], kind === "ordered"));
    } else {
      const runs = lineRuns(line);
      const wrapped =
        last?.kind === "Paragraph" &&
        previous?.kind === "paragraph" &&
        previous.line.size === line.size &&
        line.top - previous.line.top <= line.size * 1.6;
      if (wrapped) {
        last.elements = mergeTextRuns([...last.elements, text(" ", line.size), ...runs]);
      } else {
        elements.push(paragraph(runs));
      }
    }
    previous = { line, kind };
  }
  return elements;
}

function pageElements(placed: PlacedText[], pageWidth: number): Element[] {
  const words: PositionedWord[] = placed.map((p) => ({
    text: p.str.trim(),
    x0: p.x0,
    x1: p.x1,
    top: p.top,
  }));
  const regions = detectTables(words, { pageWidth });
  if (regions) {
    return regions.map((region) =>
      region.kind === "table" ? tableFromStrings(region.rows) : paragraph([text(region.text)]),
    );
  }
  return classifyLines(groupLines(placed));
}

// Writing

const LEADING = 1.2;
const LIST_INDENT = 14;
const CELL_PADDING = 3;
const PX_TO_PT = 0.75;
const LINK_COLOR = rgb(0, 0, 0.8);
const TEXT_COLOR = rgb(0, 0, 0);

interface Span {
  text: string;
  size: number;
  bold: boolean;
  url?: string;
}

interface Token extends Span {
  width: number;
  space: boolean;
}

type Piece = Token | "newline";

/**
 * Flow layout over pdf-lib pages. The cursor `y` is the top of the next line
 * in page coordinates, which grow upwards.
 */
class PdfLayout {
  private page: PDFPage;
  private y = 0;
  private readonly width: number;
  private readonly height: number;
  private readonly left: number;
  private readonly top: number;
  private readonly bottom: number;
  private readonly contentWidth: number;
  private readonly charset: Set<number>;

  private constructor(
    private readonly pdf: PDFDocument,
    private readonly regular: PDFFont,
    private readonly bold: PDFFont,
    private readonly document: Document,
    private readonly images: ImageBundle,
    private readonly warnings: WarningSink,
  ) {
    this.width = mmToPoints(document.pageWidth);
    this.height = mmToPoints(document.pageHeight);
    this.left = mmToPoints(document.leftPageIndent);
    this.top = mmToPoints(document.topPageIndent);
    this.bottom = mmToPoints(document.bottomPageIndent);
    this.contentWidth = Math.max(this.width - this.left - mmToPoints(document.rightPageIndent), 1);
    this.charset = new Set(regular.getCharacterSet());
    this.page = this.addPage();
  }

  static async create(
    document: Document,
    images: ImageBundle,
    warnings: WarningSink,
  ): Promise<PdfLayout> {
    const pdf = await PDFDocument.create();
    const regular = await pdf.embedFont(StandardFonts.Helvetica);
    const bold = await pdf.embedFont(StandardFonts.HelveticaBold);
    return new PdfLayout(pdf, regular, bold, document, images, warnings);
  }

  async render(): Promise<Buffer> {
    for (const element of this.document.elements) {
      await this.block(element, this.left, this.contentWidth);
    }
    this.drawChrome();
    return Buffer.from(await this.pdf.save());
  }

  private addPage(): PDFPage {
    this.page = this.pdf.addPage([this.width, this.height]);
    this.y = this.height - this.top;
    return this.page;
  }

  private atPageTop(): boolean {
    return this.y >= this.height - this.top;
  }

  /** Starts a new page unless `height` still fits, or the page is empty anyway. */
  private ensure(height: number): void {
    if (this.y - height < this.bottom && !this.atPageTop()) this.addPage();
  }

  private gap(points: number): void {
    if (!this.atPageTop()) this.y -= points;
  }

  /** Replaces what Helvetica's WinAnsi encoding cannot show with `?`. */
  private winAnsi(value: string, variant: ElementKind): string {
    let replaced = false;
    let out = "";
    for (const char of value) {
      const code = char.codePointAt(0) ?? 0;
      if (char === "\n" || this.charset.has(code)) out += char;
      else {
        out += "?";
        replaced = true;
      }
    }
    if (replaced) this.warnings.warn(variant, "characters outside WinAnsi were replaced with ?");
    return out;
  }

  private font(bold: boolean): PDFFont {
    return bold ? this.bold : this.regular;
  }

  private spans(elements: Element[]): Span[] {
    return elements.map((element) => {
      switch (element.kind) {
        case "Text":
          return { text: this.winAnsi(element.text, "Text"), size: element.size, bold: false };
        case "Hyperlink":
          return {
            text: this.winAnsi(element.title || element.url, "Hyperlink"),
            size: element.size,
            bold: false,
            url: element.url,
          };
        default:
          this.warnings.warn(element.kind, "PDF runs hold text, links and pictures only");
          return { text: this.winAnsi(plainTextOf(element), element.kind), size: DEFAULT_FONT_SIZE, bold: false };
      }
    });
  }

  private tokenize(spans: Span[]): Piece[] {
    const pieces: Piece[] = [];
    for (const span of spans) {
      span.text.split("\n").forEach((part, i) => {
        if (i > 0) pieces.push("newline");
        for (const word of part.split(/( +)/)) {
          if (!word) continue;
          pieces.push({
            ...span,
            text: word,
            width: this.font(span.bold).widthOfTextAtSize(word, span.size),
            space: word.trim() === "",
          });
        }
      });
    }
    return pieces;
  }

  private wrap(spans: Span[], width: number): Token[][] {
    const lines: Token[][] = [];
    let line: Token[] = [];
    let used = 0;
    for (const piece of this.tokenize(spans)) {
      if (piece === "newline") {
        lines.push(line);
        line = [];
        used = 0;
        continue;
      }
      if (!piece.space && line.length > 0 && used + piece.width > width) {
        while (line[line.length - 1]?.space) line.pop();
        lines.push(line);
        line = [];
        used = 0;
      }
      if (piece.space && line.length === 0 && lines.length > 0) continue;
      line.push(piece);
      used += piece.width;
    }
    lines.push(line);
    return lines;
  }

  /** Consecutive tokens of one style are drawn as a single string. */
  private drawLine(tokens: Token[], x: number, baseline: number): void {
    const runs: Token[] = [];
    for (const token of tokens) {
      const last = runs[runs.length - 1];
      if (last && last.size === token.size && last.bold === token.bold && last.url === token.url) {
        last.text += token.text;
        last.width += token.width;
      } else {
        runs.push({ ...token });
      }
    }
    let cursor = x;
    for (const run of runs) {
      if (run.text.trim()) {
        this.page.drawText(run.text, {
          x: cursor,
          y: baseline,
          size: run.size,
          font: this.font(run.bold),
          color: run.url ? LINK_COLOR : TEXT_COLOR,
        });
        if (run.url) {
          this.link(run.url, [cursor, baseline - run.size * 0.2, cursor + run.width, baseline + run.size * 0.8]);
        }
      }
      cursor += run.width;
    }
  }

  private link(url: string, rect: [number, number, number, number]): void {
    const annotation = this.pdf.context.register(
      this.pdf.context.obj({
        Type: "Annot",
        Subtype: "Link",
        Rect: rect,
        Border: [0, 0, 0],
        A: { Type: "Action", S: "URI", URI: PDFString.of(url) },
      }),
    );
    this.page.node.addAnnot(annotation);
  }

  /** Lays out wrapped spans; `marker` is drawn on the first line, left of `x`. */
  private flow(spans: Span[], x: number, width: number, marker?: { text: string; x: number }): void {
    this.wrap(spans, width).forEach((tokens, i) => {
      const size = tokens.reduce((max, t) => Math.max(max, t.size), 0) || (spans[0]?.size ?? DEFAULT_FONT_SIZE);
      const lineHeight = size * LEADING;
      this.ensure(lineHeight);
      const baseline = this.y - size;
      if (i === 0 && marker) {
        this.page.drawText(marker.text, { x: marker.x, y: baseline, size, font: this.regular, color: TEXT_COLOR });
      }
      this.drawLine(tokens, x, baseline);
      this.y -= lineHeight;
    });
  }

  /** Inline content, with images placed between the text around them. */
  private async inlines(elements: Element[], x: number, width: number, marker?: { text: string; x: number }): Promise<number> {
    let pending: Element[] = [];
    let size = 0;
    let first = marker;
    const flush = () => {
      if (pending.length === 0) return;
      const spans = this.spans(pending);
      size = Math.max(size, ...spans.map((s) => s.size));
      this.flow(spans, x, width, first);
      first = undefined;
      pending = [];
    };
    for (const element of elements) {
      if (element.kind === "Image") {
        flush();
        await this.image(element, x, width);
      } else {
        pending.push(element);
      }
    }
    flush();
    return size || DEFAULT_FONT_SIZE;
  }

  private async block(element: Element, x: number, width: number): Promise<void> {
    switch (element.kind) {
      case "Header": {
        const size = headingSize(element.level);
        this.gap(size * 0.5);
        this.flow([{ text: this.winAnsi(element.text, "Header"), size, bold: true }], x, width);
        this.gap(size * 0.3);
        return;
      }
      case "Paragraph": {
        const size = await this.inlines(element.elements, x, width);
        this.gap(size * 0.8);
        return;
      }
      case "Text":
      case "Hyperlink":
      case "Image":
        return this.block(paragraph([element]), x, width);
      case "List":
        await this.list(element, x, width, 0);
        this.gap(DEFAULT_FONT_SIZE * 0.8);
        return;
      case "Table":
        this.table(element, x, width);
        this.gap(DEFAULT_FONT_SIZE * 0.8);
        return;
      case "PageBreak":
        this.addPage();
        return;
      case "ListItem":
      case "TableHeader":
      case "TableCell":
        return this.block(element.element, x, width);
      case "TableRow":
        return this.block(text(plainTextOf(element)), x, width);
    }
  }

  private async list(element: ListElement, x: number, width: number, depth: number): Promise<void> {
    let counter = 0;
    const indent = LIST_INDENT * (depth + 1);
    for (const item of element.items) {
      const content = item.element;
      if (content.kind === "List") {
        await this.list(content, x, width, depth + 1);
        continue;
      }
      counter++;
      const marker = { text: element.numbered ? `${counter}.` : "•", x: x + indent - LIST_INDENT };
      switch (content.kind) {
        case "Paragraph":
          await this.inlines(content.elements, x + indent, width - indent, marker);
          break;
        case "Text":
        case "Hyperlink":
        case "Image":
          await this.inlines([content], x + indent, width - indent, marker);
          break;
        default:
          await this.block(content, x + indent, width - indent);
      }
      this.gap(2);
    }
  }

  private cellLines(content: ContentElement, bold: boolean, width: number): string[] {
    const flat = flattenText(content, this.warnings, "PDF table cells hold text only");
    const value = this.winAnsi(flat, "TableCell");
    return this.wrap([{ text: value, size: DEFAULT_FONT_SIZE, bold }], width).map((tokens) =>
      tokens.map((t) => t.text).join(""),
    );
  }

  private table(element: TableElement, x: number, width: number): void {
    const natural = element.headers.map((h) => mmToPoints(h.width));
    const total = natural.reduce((sum, w) => sum + w, 0);
    const scale = total > width ? width / total : 1;
    const widths = natural.map((w) => w * scale);
    const lineHeight = DEFAULT_FONT_SIZE * LEADING;

    const row = (cells: ContentElement[], bold: boolean) => {
      const lines = cells.map((cell, i) => this.cellLines(cell, bold, (widths[i] ?? 0) - 2 * CELL_PADDING));
      const height = Math.max(1, ...lines.map((l) => l.length)) * lineHeight + 2 * CELL_PADDING;
      this.ensure(height);
      let left = x;
      lines.forEach((cellLines, i) => {
        const cellWidth = widths[i] ?? 0;
        this.page.drawRectangle({
          x: left,
          y: this.y - height,
          width: cellWidth,
          height,
          borderColor: TEXT_COLOR,
          borderWidth: 0.5,
        });
        cellLines.forEach((line, n) => {
          if (!line.trim()) return;
          this.page.drawText(line, {
            x: left + CELL_PADDING,
            y: this.y - CELL_PADDING - DEFAULT_FONT_SIZE - n * lineHeight,
            size: DEFAULT_FONT_SIZE,
            font: this.font(bold),
            color: TEXT_COLOR,
          });
        });
        left += cellWidth;
      });
      this.y -= height;
    };

    row(element.headers.map((h) => h.element), true);
    for (const r of element.rows) row(r.cells.map((c) => c.element), false);
  }

  private async image(element: ImageElement, x: number, width: number): Promise<void> {
    if (element.imageType === "Gif") {
      this.warnings.warn("Image", "PDF pictures are PNG or JPEG only");
      return;
    }
    const bytes = resolveImageBytes(element, this.images);
    const embedded =
      element.imageType === "Png" ? await this.pdf.embedPng(bytes) : await this.pdf.embedJpg(bytes);

    const available = this.height - this.top - this.bottom;
    let w = embedded.width * PX_TO_PT;
    let h = embedded.height * PX_TO_PT;
    const fit = Math.min(1, width / w, available / h);
    w *= fit;
    h *= fit;

    this.ensure(h);
    this.page.drawImage(embedded, { x, y: this.y - h, width: w, height: h });
    this.y -= h + 2;
  }

  /** Page header and footer text go into the top and bottom margins of every page. */
  private drawChrome(): void {
    const lines = (elements: Element[], variant: ElementKind) =>
      elements.map((e) => this.winAnsi(plainTextOf(e), variant)).filter((l) => l.trim() !== "");
    const headerLines = lines(this.document.pageHeader, "Paragraph");
    const footerLines = lines(this.document.pageFooter, "Paragraph");
    const lineHeight = DEFAULT_FONT_SIZE * LEADING;

    for (const page of this.pdf.getPages()) {
      headerLines.forEach((line, i) => {
        page.drawText(line, {
          x: this.left,
          y: this.height - this.top / 2 - i * lineHeight,
          size: DEFAULT_FONT_SIZE,
          font: this.regular,
          color: TEXT_COLOR,
        });
      });
      footerLines.forEach((line, i) => {
        page.drawText(line, {
          x: this.left,
          y: this.bottom / 2 - i * lineHeight,
          size: DEFAULT_FONT_SIZE,
          font: this.regular,
          color: TEXT_COLOR,
        });
      });
    }
  }
}

function roundMm(points: number): number {
  return Math.round(pointsToMm(points) * 10) / 10;
}

/**
 * PDF. Reading recovers structure from positioned text; writing is a flow
 * layout in Helvetica.
 */
export class PdfTransformer extends DocumentTransformer {
  readonly format = "Pdf";

  async parse(
    input: Buffer,
    _images: ImageBundle,
    _options?: TransformOptions,
  ): Promise<ParseResult> {
    const loading = getDocument({ data: new Uint8Array(input), useSystemFonts: true });
    let pdf: Awaited<typeof loading.promise>;
    try {
      pdf = await loading.promise;
    } catch (err) {
      throw new MalformedInputError("Input is not a readable PDF document", { cause: err });
    }

    try {
      const elements: Element[] = [];
      const geometry: Partial<PageGeometry> = {};
      for (let n = 1; n <= pdf.numPages; n++) {
        const page = await pdf.getPage(n);
        const viewport = page.getViewport({ scale: 1 });
        if (n === 1) {
          geometry.pageWidth = roundMm(viewport.width);
          geometry.pageHeight = roundMm(viewport.height);
        } else {
          elements.push(pageBreak());
        }

        const content = await page.getTextContent();
        const runs: TextRun[] = [];
        for (const item of content.items) {
          if ("str" in item) {
            runs.push({ str: item.str, transform: item.transform, width: item.width, fontName: item.fontName });
          }
        }
        const links = linkAreas(await page.getAnnotations());
        const placed = placeRuns(runs, content.styles, links, viewport.height);
        elements.push(...pageElements(placed, viewport.width));
      }
      return { document: createDocument(elements, geometry), images: new ImageBundle() };
    } catch (err) {
      throw new MalformedInputError("PDF pages could not be read", { cause: err });
    } finally {
      await pdf.destroy();
    }
  }

  async generate(
    document: Document,
    images: ImageBundle,
    options?: TransformOptions,
  ): Promise<GenerateResult> {
    const layout = await PdfLayout.create(document, images, options?.warnings ?? IGNORE_WARNINGS);
    return { bytes: await layout.render(), images: new ImageBundle() };
  }
}
