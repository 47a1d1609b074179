import {
  DocumentTransformer,
  type GenerateResult,
  type ParseResult,
  type TransformOptions,
} from "../base-transformer.js";
import { MalformedInputError, MissingImageError } from "../errors.js";
import { ImageBundle } from "../images.js";
import { createDocument, type Document, type PageGeometry } from "../model/document.js";
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
import {
  buildXml,
  elementChildren,
  ordered,
  ownText,
  parseXml,
  textNodes,
  type OrderedNode,
  type XmlElement,
} from "./xml-nodes.js";

function numberAttribute(node: XmlElement, name: string, fallback: number): number {
  const value = node.attributes[name];
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new MalformedInputError(`<${node.tag}> has a non-numeric ${name}: ${value}`);
  }
  return parsed;
}

function imageTypeAttribute(node: XmlElement): ImageType {
  const value = node.attributes.image_type;
  if (value === "Png" || value === "Jpeg" || value === "Gif") return value;
  throw new MalformedInputError(`<image> has an unknown image_type: ${value ?? "(none)"}`);
}

class XmlReader {
  readonly images = new ImageBundle();

  constructor(private readonly source: ImageBundle) {}

  elements(node: XmlElement | undefined): Element[] {
    return node ? elementChildren(node).map((child) => this.element(child)) : [];
  }

  element(node: XmlElement): Element {
    switch (node.tag) {
      case "header":
        return {
          kind: "Header",
          level: clampHeaderLevel(numberAttribute(node, "level", 1)),
          text: ownText(node),
        };
      case "paragraph":
        return { kind: "Paragraph", elements: this.elements(node) };
      case "text":
        return { kind: "Text", text: ownText(node), size: numberAttribute(node, "size", DEFAULT_FONT_SIZE) };
      case "hyperlink":
        return {
          kind: "Hyperlink",
          title: ownText(node),
          url: node.attributes.url ?? "",
          alt: node.attributes.alt ?? "",
          size: numberAttribute(node, "size", DEFAULT_FONT_SIZE),
        };
      case "image":
        return this.image(node);
      case "list":
        return {
          kind: "List",
          numbered: node.attributes.numbered === "true",
          items: elementChildren(node).map((child) => this.listItem(child)),
        };
      case "list_item":
        return this.listItem(node);
      case "table": {
        const children = elementChildren(node);
        return {
          kind: "Table",
          headers: children
            .filter((child) => child.tag === "table_header")
            .map((child) => this.tableHeader(child)),
          rows: children
            .filter((child) => child.tag === "table_row")
            .map((child) => this.tableRow(child)),
        };
      }
      case "table_header":
        return this.tableHeader(node);
      case "table_row":
        return this.tableRow(node);
      case "table_cell":
        return this.tableCell(node);
      case "page_break":
        return { kind: "PageBreak" };
      default:
        throw new MalformedInputError(`Unknown element <${node.tag}>`);
    }
  }

  private image(node: XmlElement): Element {
    const common = {
      kind: "Image",
      title: node.attributes.title ?? "",
      alt: node.attributes.alt ?? "",
      imageType: imageTypeAttribute(node),
    } as const;
    const { data, key } = node.attributes;
    if (key !== undefined) {
      const bytes = this.source.get(key);
      if (!bytes) throw new MissingImageError(key);
      this.images.set(key, bytes);
      return { ...common, source: { kind: "Keyed", key } };
    }
    if (data === undefined) throw new MalformedInputError("<image> carries neither data nor key");
    return { ...common, source: { kind: "Inline", bytes: Buffer.from(data, "base64") } };
  }

  private content(node: XmlElement): ContentElement {
    const [child, ...extra] = elementChildren(node);
    if (!child || extra.length > 0) {
      throw new MalformedInputError(`<${node.tag}> must hold exactly one element`);
    }
    const element = this.element(child);
    if (!isContentElement(element)) {
      throw new MalformedInputError(`<${child.tag}> cannot be the content of <${node.tag}>`);
    }
    return element;
  }

  private expect(node: XmlElement, tag: string): void {
    if (node.tag !== tag) throw new MalformedInputError(`Expected <${tag}>, found <${node.tag}>`);
  }

  private listItem(node: XmlElement): ListItemElement {
    this.expect(node, "list_item");
    return { kind: "ListItem", element: this.content(node) };
  }

  private tableHeader(node: XmlElement): TableHeaderElement {
    return {
      kind: "TableHeader",
      element: this.content(node),
      width: numberAttribute(node, "width", DEFAULT_COLUMN_WIDTH),
    };
  }

  private tableRow(node: XmlElement): TableRowElement {
    return {
      kind: "TableRow",
      cells: elementChildren(node).map((child) => this.tableCell(child)),
    };
  }

  private tableCell(node: XmlElement): TableCellElement {
    this.expect(node, "table_cell");
    return { kind: "TableCell", element: this.content(node) };
  }
}

class XmlWriter {
  readonly images = new ImageBundle();

  constructor(private readonly source: ImageBundle) {}

  element(element: Element): OrderedNode {
    switch (element.kind) {
      case "Header":
        return ordered("header", textNodes(element.text), { level: element.level });
      case "Paragraph":
        return ordered("paragraph", element.elements.map((e) => this.element(e)));
      case "Text":
        return ordered("text", textNodes(element.text), { size: element.size });
      case "Hyperlink":
        return ordered("hyperlink", textNodes(element.title), {
          url: element.url,
          alt: element.alt,
          size: element.size,
        });
      case "Image": {
        const attributes = {
          title: element.title,
          alt: element.alt,
          image_type: element.imageType,
        };
        if (element.source.kind === "Inline") {
          const data = Buffer.from(element.source.bytes).toString("base64");
          return ordered("image", [], { ...attributes, data });
        }
        const { key } = element.source;
        const bytes = this.source.get(key);
        if (!bytes) throw new MissingImageError(key);
        this.images.set(key, bytes);
        return ordered("image", [], { ...attributes, key });
      }
      case "List":
        return ordered(
          "list",
          element.items.map((e) => this.element(e)),
          { numbered: element.numbered },
        );
      case "ListItem":
        return ordered("list_item", [this.element(element.element)]);
      case "Table":
        return ordered("table", [
          ...element.headers.map((e) => this.element(e)),
          ...element.rows.map((e) => this.element(e)),
        ]);
      case "TableHeader":
        return ordered("table_header", [this.element(element.element)], { width: element.width });
      case "TableRow":
        return ordered("table_row", element.cells.map((e) => this.element(e)));
      case "TableCell":
        return ordered("table_cell", [this.element(element.element)]);
      case "PageBreak":
        return ordered("page_break");
    }
  }
}

const GEOMETRY_ATTRIBUTES: [keyof PageGeometry, string][] = [
  ["pageWidth", "page_width"],
  ["pageHeight", "page_height"],
  ["leftPageIndent", "left_page_indent"],
  ["rightPageIndent", "right_page_indent"],
  ["topPageIndent", "top_page_indent"],
  ["bottomPageIndent", "bottom_page_indent"],
];

/**
 * Lossless XML rendition of the model: `<document>` carries the page
 * geometry, with `<page_header>`, `<elements>` and `<page_footer>` inside.
 */
export class XmlTransformer extends DocumentTransformer {
  readonly format = "Xml";

  async parse(
    input: Buffer,
    images: ImageBundle,
    options?: TransformOptions,
  ): Promise<ParseResult> {
    const source = decodeText(input, options?.charset);
    if (!source.trim()) {
      return { document: createDocument(), images: new ImageBundle() };
    }

    const root = parseXml(source).find(
      (node): node is XmlElement => node.kind === "element" && node.tag === "document",
    );
    if (!root) throw new MalformedInputError("Missing <document> root element");

    const section = (tag: string) => elementChildren(root).find((child) => child.tag === tag);
    const reader = new XmlReader(images);
    const geometry: Partial<PageGeometry> = {};
    for (const [field, attribute] of GEOMETRY_ATTRIBUTES) {
      if (root.attributes[attribute] !== undefined) {
        geometry[field] = numberAttribute(root, attribute, 0);
      }
    }

    const document = createDocument(reader.elements(section("elements")), {
      ...geometry,
      pageHeader: reader.elements(section("page_header")),
      pageFooter: reader.elements(section("page_footer")),
    });
    return { document, images: reader.images };
  }

  async generate(
    document: Document,
    images: ImageBundle,
    _options?: TransformOptions,
  ): Promise<GenerateResult> {
    const writer = new XmlWriter(images);
    const geometry = Object.fromEntries(
      GEOMETRY_ATTRIBUTES.map(([field, attribute]) => [attribute, document[field]]),
    );
    const tree = [
      ordered(
        "document",
        [
          ordered("page_header", document.pageHeader.map((e) => writer.element(e))),
          ordered("elements", document.elements.map((e) => writer.element(e))),
          ordered("page_footer", document.pageFooter.map((e) => writer.element(e))),
        ],
        geometry,
      ),
    ];
    return { bytes: Buffer.from(buildXml(tree), "utf-8"), images: writer.images };
  }
}
