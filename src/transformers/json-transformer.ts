import { z } from "zod";
import {
  DocumentTransformer,
  type GenerateResult,
  type ParseResult,
  type TransformOptions,
} from "../base-transformer.js";
import { MalformedInputError, MissingImageError } from "../errors.js";
import { ImageBundle } from "../images.js";
import { createDocument, type Document } from "../model/document.js";
import {
  DEFAULT_COLUMN_WIDTH,
  DEFAULT_FONT_SIZE,
  clampHeaderLevel,
  isContentElement,
  type ContentElement,
  type Element,
  type ImageType,
  type ListItemElement,
  type TableCellElement,
  type TableHeaderElement,
  type TableRowElement,
} from "../model/elements.js";
import { decodeText } from "./shared.js";

type WireElement =
  | { Header: { level: number; text: string } }
  | { Paragraph: { elements: WireElement[] } }
  | { Text: { text: string; size?: number } }
  | { Hyperlink: { title: string; url: string; alt?: string; size?: number } }
  | {
      Image: {
        bytes?: string;
        key?: string;
        title?: string;
        alt?: string;
        image_type: ImageType;
      };
    }
  | { List: { elements: WireElement[]; numbered: boolean } }
  | { ListItem: { element: WireElement } }
  | { Table: { headers: WireElement[]; rows: WireElement[] } }
  | { TableHeader: { element: WireElement; width?: number } }
  | { TableRow: { cells: WireElement[] } }
  | { TableCell: { element: WireElement } }
  | { PageBreak: Record<string, never> };

const size = z.number().nonnegative().optional();

const wireElement: z.ZodType<WireElement> = z.lazy(() =>
  z.union([
    z.object({ Header: z.object({ level: z.number(), text: z.string() }) }).strict(),
    z.object({ Paragraph: z.object({ elements: z.array(wireElement) }) }).strict(),
    z.object({ Text: z.object({ text: z.string(), size }) }).strict(),
    z
      .object({
        Hyperlink: z.object({
          title: z.string(),
          url: z.string(),
          alt: z.string().optional(),
          size,
        }),
      })
      .strict(),
    z
      .object({
        Image: z
          .object({
            bytes: z.string().optional(),
            key: z.string().optional(),
            title: z.string().optional(),
            alt: z.string().optional(),
            image_type: z.enum(["Png", "Jpeg", "Gif"]),
          })
          .refine((image) => (image.bytes === undefined) !== (image.key === undefined), {
            message: "An image carries either bytes or a key",
          }),
      })
      .strict(),
    z
      .object({
        List: z.object({ elements: z.array(wireElement), numbered: z.boolean() }),
      })
      .strict(),
    z.object({ ListItem: z.object({ element: wireElement }) }).strict(),
    z
      .object({
        Table: z.object({ headers: z.array(wireElement), rows: z.array(wireElement) }),
      })
      .strict(),
    z
      .object({
        TableHeader: z.object({ element: wireElement, width: z.number().optional() }),
      })
      .strict(),
    z.object({ TableRow: z.object({ cells: z.array(wireElement) }) }).strict(),
    z.object({ TableCell: z.object({ element: wireElement }) }).strict(),
    z.object({ PageBreak: z.record(z.never()) }).strict(),
  ]),
);

const wireDocument = z.object({
  elements: z.array(wireElement),
  page_width: z.number().optional(),
  page_height: z.number().optional(),
  left_page_indent: z.number().optional(),
  right_page_indent: z.number().optional(),
  top_page_indent: z.number().optional(),
  bottom_page_indent: z.number().optional(),
  page_header: z.array(wireElement).optional(),
  page_footer: z.array(wireElement).optional(),
});

type WireDocument = z.infer<typeof wireDocument>;

class WireReader {
  readonly images = new ImageBundle();

  constructor(private readonly source: ImageBundle) {}

  element(wire: WireElement): Element {
    if ("Header" in wire) {
      return { kind: "Header", level: clampHeaderLevel(wire.Header.level), text: wire.Header.text };
    }
    if ("Paragraph" in wire) {
      return { kind: "Paragraph", elements: wire.Paragraph.elements.map((e) => this.element(e)) };
    }
    if ("Text" in wire) {
      return { kind: "Text", text: wire.Text.text, size: wire.Text.size ?? DEFAULT_FONT_SIZE };
    }
    if ("Hyperlink" in wire) {
      const { title, url, alt, size } = wire.Hyperlink;
      return { kind: "Hyperlink", title, url, alt: alt ?? "", size: size ?? DEFAULT_FONT_SIZE };
    }
    if ("Image" in wire) {
      const { bytes, key, title, alt, image_type } = wire.Image;
      const common = { kind: "Image", title: title ?? "", alt: alt ?? "", imageType: image_type } as const;
      if (key !== undefined) {
        const payload = this.source.get(key);
        if (!payload) throw new MissingImageError(key);
        this.images.set(key, payload);
        return { ...common, source: { kind: "Keyed", key } };
      }
      return { ...common, source: { kind: "Inline", bytes: Buffer.from(bytes ?? "", "base64") } };
    }
    if ("List" in wire) {
      return {
        kind: "List",
        numbered: wire.List.numbered,
        items: wire.List.elements.map((e) => this.listItem(e)),
      };
    }
    if ("ListItem" in wire) return this.listItem(wire);
    if ("Table" in wire) {
      return {
        kind: "Table",
        headers: wire.Table.headers.map((e) => this.tableHeader(e)),
        rows: wire.Table.rows.map((e) => this.tableRow(e)),
      };
    }
    if ("TableHeader" in wire) return this.tableHeader(wire);
    if ("TableRow" in wire) return this.tableRow(wire);
    if ("TableCell" in wire) return this.tableCell(wire);
    return { kind: "PageBreak" };
  }

  private content(wire: WireElement, parent: string): ContentElement {
    const element = this.element(wire);
    if (!isContentElement(element)) {
      throw new MalformedInputError(`${element.kind} cannot be the content of ${parent}`);
    }
    return element;
  }

  private listItem(wire: WireElement): ListItemElement {
    if (!("ListItem" in wire)) throw new MalformedInputError("List elements must be ListItem");
    return { kind: "ListItem", element: this.content(wire.ListItem.element, "ListItem") };
  }

  private tableHeader(wire: WireElement): TableHeaderElement {
    if (!("TableHeader" in wire)) throw new MalformedInputError("Table headers must be TableHeader");
    return {
      kind: "TableHeader",
      element: this.content(wire.TableHeader.element, "TableHeader"),
      width: wire.TableHeader.width ?? DEFAULT_COLUMN_WIDTH,
    };
  }

  private tableRow(wire: WireElement): TableRowElement {
    if (!("TableRow" in wire)) throw new MalformedInputError("Table rows must be TableRow");
    return { kind: "TableRow", cells: wire.TableRow.cells.map((e) => this.tableCell(e)) };
  }

  private tableCell(wire: WireElement): TableCellElement {
    if (!("TableCell" in wire)) throw new MalformedInputError("Row cells must be TableCell");
    return { kind: "TableCell", element: this.content(wire.TableCell.element, "TableCell") };
  }
}

class WireWriter {
  readonly images = new ImageBundle();

  constructor(private readonly source: ImageBundle) {}

  element(element: Element): WireElement {
    switch (element.kind) {
      case "Header":
        return { Header: { level: element.level, text: element.text } };
      case "Paragraph":
        return { Paragraph: { elements: element.elements.map((e) => this.element(e)) } };
      case "Text":
        return { Text: { text: element.text, size: element.size } };
      case "Hyperlink":
        return {
          Hyperlink: {
            title: element.title,
            url: element.url,
            alt: element.alt,
            size: element.size,
          },
        };
      case "Image": {
        const common = {
          title: element.title,
          alt: element.alt,
          image_type: element.imageType,
        };
        if (element.source.kind === "Inline") {
          return {
            Image: { bytes: Buffer.from(element.source.bytes).toString("base64"), ...common },
          };
        }
        const { key } = element.source;
        const payload = this.source.get(key);
        if (!payload) throw new MissingImageError(key);
        this.images.set(key, payload);
        return { Image: { key, ...common } };
      }
      case "List":
        return {
          List: { elements: element.items.map((e) => this.element(e)), numbered: element.numbered },
        };
      case "ListItem":
        return { ListItem: { element: this.element(element.element) } };
      case "Table":
        return {
          Table: {
            headers: element.headers.map((e) => this.element(e)),
            rows: element.rows.map((e) => this.element(e)),
          },
        };
      case "TableHeader":
        return { TableHeader: { element: this.element(element.element), width: element.width } };
      case "TableRow":
        return { TableRow: { cells: element.cells.map((e) => this.element(e)) } };
      case "TableCell":
        return { TableCell: { element: this.element(element.element) } };
      case "PageBreak":
        return { PageBreak: {} };
    }
  }
}

/**
 * The canonical, lossless serialization of the document model. Every element
 * is a single-key object named after its variant.
 */
export class JsonTransformer extends DocumentTransformer {
  readonly format = "Json";

  async parse(
    input: Buffer,
    images: ImageBundle,
    options?: TransformOptions,
  ): Promise<ParseResult> {
    const source = decodeText(input, options?.charset);
    if (!source.trim()) {
      return { document: createDocument(), images: new ImageBundle() };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(source);
    } catch (err) {
      throw new MalformedInputError("Input is not valid JSON", { cause: err });
    }

    const parsed = wireDocument.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? issue.path.join(".") || "document" : "document";
      throw new MalformedInputError(
        `Input does not match the document schema at ${where}: ${issue?.message ?? "invalid"}`,
        { cause: parsed.error },
      );
    }

    const wire = parsed.data;
    const reader = new WireReader(images);
    const document = createDocument(
      wire.elements.map((e) => reader.element(e)),
      {
        ...(wire.page_width !== undefined && { pageWidth: wire.page_width }),
        ...(wire.page_height !== undefined && { pageHeight: wire.page_height }),
        ...(wire.left_page_indent !== undefined && { leftPageIndent: wire.left_page_indent }),
        ...(wire.right_page_indent !== undefined && { rightPageIndent: wire.right_page_indent }),
        ...(wire.top_page_indent !== undefined && { topPageIndent: wire.top_page_indent }),
        ...(wire.bottom_page_indent !== undefined && {
          bottomPageIndent: wire.bottom_page_indent,
        }),
        pageHeader: (wire.page_header ?? []).map((e) => reader.element(e)),
        pageFooter: (wire.page_footer ?? []).map((e) => reader.element(e)),
      },
    );
    return { document, images: reader.images };
  }

  async generate(
    document: Document,
    images: ImageBundle,
    _options?: TransformOptions,
  ): Promise<GenerateResult> {
    const writer = new WireWriter(images);
    const wire: WireDocument = {
      elements: document.elements.map((e) => writer.element(e)),
      page_width: document.pageWidth,
      page_height: document.pageHeight,
      left_page_indent: document.leftPageIndent,
      right_page_indent: document.rightPageIndent,
      top_page_indent: document.topPageIndent,
      bottom_page_indent: document.bottomPageIndent,
      page_header: document.pageHeader.map((e) => writer.element(e)),
      page_footer: document.pageFooter.map((e) => writer.element(e)),
    };
    return { bytes: Buffer.from(JSON.stringify(wire), "utf-8"), images: writer.images };
  }
}
