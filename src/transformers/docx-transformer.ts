import JSZip from "jszip";
import mammoth from "mammoth";
import {
  ImageAwareDocumentTransformer,
  type GenerateResult,
  type ParseResult,
  type TransformOptions,
} from "../base-transformer.js";
import { MalformedInputError } from "../errors.js";
import {
  ImageBundle,
  imageDimensions,
  imageExtension,
  imageTypeFromMime,
  resolveImageType,
  type ImageLoader,
} from "../images.js";
import { createDocument, type Document, type PageGeometry } from "../model/document.js";
import {
  DEFAULT_FONT_SIZE,
  paragraph,
  plainTextOf,
  text,
  type ContentElement,
  type Element,
  type ImageElement,
  type ListElement,
  type TableElement,
} from "../model/elements.js";
import { mmToEmu, mmToTwips, pxToEmu, twipsToMm } from "../units.js";
import { IGNORE_WARNINGS, type WarningSink } from "../warnings.js";
import { HtmlReader } from "./html-transformer.js";
import { HEADING_SIZES, ImageCollector, resolveImageBytes } from "./shared.js";
import {
  buildXml,
  elementChildren,
  findAll,
  ordered,
  ownText,
  parseXml,
  textNodes,
  type OrderedNode,
  type XmlElement,
  type XmlNode,
} from "./xml-nodes.js";

const MIME_TYPE = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";
const RELATIONSHIP = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
const WORD_MAIN = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";
const PICTURE = "http://schemas.openxmlformats.org/drawingml/2006/picture";
const WORD_NAMESPACES = {
  "xmlns:w": WORD_MAIN,
  "xmlns:r": RELATIONSHIP,
  "xmlns:wp": "http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing",
  "xmlns:a": "http://schemas.openxmlformats.org/drawingml/2006/main",
  "xmlns:pic": PICTURE,
};

const MAX_LIST_LEVEL = 8;
const LIST_INDENT = 720;
const FALLBACK_IMAGE_PX = 96;

interface Relationship {
  id: string;
  type: string;
  target: string;
  external: boolean;
}

/** An empty element carrying a single `w:val`. */
function val(tag: string, value: string | number): OrderedNode {
  return ordered(tag, [], { "w:val": value });
}

function sizeProperties(points: number): OrderedNode[] {
  return [val("w:sz", points * 2), val("w:szCs", points * 2)];
}

function relationshipsXml(relationships: Relationship[]): string {
  return buildXml([
    ordered(
      "Relationships",
      relationships.map((rel) =>
        ordered("Relationship", [], {
          Id: rel.id,
          Type: `${RELATIONSHIP}/${rel.type}`,
          Target: rel.target,
          ...(rel.external ? { TargetMode: "External" } : {}),
        }),
      ),
      { xmlns: "http://schemas.openxmlformats.org/package/2006/relationships" },
    ),
  ]);
}

/** State shared by every part of one package: media, numbering and drawing ids. */
class DocxPackage {
  readonly media: [string, Uint8Array][] = [];
  readonly lists: boolean[] = [];
  private drawings = 0;

  constructor(
    readonly images: ImageBundle,
    readonly contentWidth: number,
    readonly warnings: WarningSink,
  ) {}

  /** A fresh numbering instance, so that every list restarts at 1. */
  numbering(numbered: boolean): number {
    this.lists.push(numbered);
    return this.lists.length;
  }

  addMedia(bytes: Uint8Array, extension: string): string {
    const name = `media/image${this.media.length + 1}.${extension}`;
    this.media.push([name, bytes]);
    return name;
  }

  nextDrawingId(): number {
    return ++this.drawings;
  }
}

/** Renders elements into the WordprocessingML of one part, collecting its relationships. */
class PartWriter {
  readonly relationships: Relationship[] = [];

  constructor(private readonly pkg: DocxPackage) {}

  relate(type: string, target: string, external = false): string {
    const id = `rId${this.relationships.length + 1}`;
    this.relationships.push({ id, type, target, external });
    return id;
  }

  blocks(elements: Element[]): OrderedNode[] {
    return elements.flatMap((element) => this.block(element));
  }

  private block(element: Element): OrderedNode[] {
    switch (element.kind) {
      case "Header":
        return [this.paragraph([this.run(element.text)], [val("w:pStyle", `Heading${element.level}`)])];
      case "Paragraph":
        return [this.paragraph(this.inlines(element.elements))];
      case "Text":
      case "Hyperlink":
      case "Image":
        return [this.paragraph(this.inline(element))];
      case "List":
        return this.list(element, 0);
      case "Table":
        return [this.table(element)];
      case "PageBreak":
        return [this.paragraph([this.pageBreak()])];
      case "ListItem":
      case "TableHeader":
      case "TableCell":
        return this.block(element.element);
      case "TableRow":
        return [this.paragraph([this.run(plainTextOf(element))])];
    }
  }

  private paragraph(runs: OrderedNode[], properties: OrderedNode[] = []): OrderedNode {
    return ordered("w:p", properties.length > 0 ? [ordered("w:pPr", properties), ...runs] : runs);
  }

  private pageBreak(): OrderedNode {
    return ordered("w:r", [ordered("w:br", [], { "w:type": "page" })]);
  }

  private inlines(elements: Element[]): OrderedNode[] {
    return elements.flatMap((element) => this.inline(element));
  }

  private inline(element: Element): OrderedNode[] {
    switch (element.kind) {
      case "Text":
        return [this.run(element.text, element.size)];
      case "Hyperlink": {
        const id = this.relate("hyperlink", element.url, true);
        const attributes: Record<string, string> = element.alt ? { "r:id": id, "w:tooltip": element.alt } : { "r:id": id };
        return [
          ordered("w:hyperlink", [this.run(element.title || element.url, element.size, "Hyperlink")], attributes),
        ];
      }
      case "Image":
        return [this.image(element)];
      case "PageBreak":
        return [this.pageBreak()];
      default:
        this.pkg.warnings.warn(element.kind, "Word runs hold text, links and pictures only");
        return [this.run(plainTextOf(element))];
    }
  }

  private run(value: string, size = DEFAULT_FONT_SIZE, style?: string): OrderedNode {
    const properties: OrderedNode[] = [];
    if (style) properties.push(val("w:rStyle", style));
    if (size !== DEFAULT_FONT_SIZE) properties.push(...sizeProperties(size));
    const content = value
      .split("\n")
      .flatMap((line, i) => [
        ...(i > 0 ? [ordered("w:br")] : []),
        ordered("w:t", textNodes(line), { "xml:space": "preserve" }),
      ]);
    return ordered("w:r", properties.length > 0 ? [ordered("w:rPr", properties), ...content] : content);
  }

  private image(image: ImageElement): OrderedNode {
    const bytes = resolveImageBytes(image, this.pkg.images);
    const target = this.pkg.addMedia(bytes, imageExtension(image.imageType));
    const id = this.relate("image", target);
    const drawing = this.pkg.nextDrawingId();

    const size = imageDimensions(bytes) ?? { width: FALLBACK_IMAGE_PX, height: FALLBACK_IMAGE_PX };
    let cx = pxToEmu(size.width);
    let cy = pxToEmu(size.height);
    const max = mmToEmu(this.pkg.contentWidth);
    if (cx > max) {
      cy = Math.round((cy * max) / cx);
      cx = max;
    }

    const name = `Picture ${drawing}`;
    const picture = ordered("pic:pic", [
      ordered("pic:nvPicPr", [ordered("pic:cNvPr", [], { id: drawing, name }), ordered("pic:cNvPicPr")]),
      ordered("pic:blipFill", [
        ordered("a:blip", [], { "r:embed": id }),
        ordered("a:stretch", [ordered("a:fillRect")]),
      ]),
      ordered("pic:spPr", [
        ordered("a:xfrm", [ordered("a:off", [], { x: 0, y: 0 }), ordered("a:ext", [], { cx, cy })]),
        ordered("a:prstGeom", [ordered("a:avLst")], { prst: "rect" }),
      ]),
    ]);
    const inline = ordered(
      "wp:inline",
      [
        ordered("wp:extent", [], { cx, cy }),
        ordered("wp:docPr", [], { id: drawing, name, descr: image.alt, title: image.title }),
        ordered("a:graphic", [ordered("a:graphicData", [picture], { uri: PICTURE })]),
      ],
      { distT: 0, distB: 0, distL: 0, distR: 0 },
    );
    return ordered("w:r", [ordered("w:drawing", [inline])]);
  }

  private list(element: ListElement, depth: number): OrderedNode[] {
    const numId = this.pkg.numbering(element.numbered);
    const numbering = [
      val("w:pStyle", "ListParagraph"),
      ordered("w:numPr", [val("w:ilvl", Math.min(depth, MAX_LIST_LEVEL)), val("w:numId", numId)]),
    ];

    return element.items.flatMap((item) => {
      const content = item.element;
      switch (content.kind) {
        case "List":
          return this.list(content, depth + 1);
        case "Paragraph":
          return [this.paragraph(this.inlines(content.elements), numbering)];
        case "Text":
        case "Hyperlink":
        case "Image":
          return [this.paragraph(this.inline(content), numbering)];
        default:
          return this.block(content);
      }
    });
  }

  private table(element: TableElement): OrderedNode {
    const widths = element.headers.map((h) => mmToTwips(h.width));
    const total = widths.reduce((sum, w) => sum + w, 0);
    const row = (cells: ContentElement[], header: boolean) =>
      ordered("w:tr", [
        ...(header ? [ordered("w:trPr", [ordered("w:tblHeader")])] : []),
        ...cells.map((cell, i) =>
          ordered("w:tc", [
            ordered("w:tcPr", [ordered("w:tcW", [], { "w:w": widths[i] ?? 0, "w:type": "dxa" })]),
            ...this.cell(cell),
          ]),
        ),
      ]);

    return ordered("w:tbl", [
      ordered("w:tblPr", [
        val("w:tblStyle", "TableGrid"),
        ordered("w:tblW", [], { "w:w": total, "w:type": "dxa" }),
      ]),
      ordered("w:tblGrid", widths.map((w) => ordered("w:gridCol", [], { "w:w": w }))),
      row(element.headers.map((h) => h.element), true),
      ...element.rows.map((r) => row(r.cells.map((c) => c.element), false)),
    ]);
  }

  /** A table cell must end with a paragraph. */
  private cell(content: ContentElement): OrderedNode[] {
    switch (content.kind) {
      case "Paragraph":
        return [this.paragraph(this.inlines(content.elements))];
      case "Text":
      case "Hyperlink":
      case "Image":
        return [this.paragraph(this.inline(content))];
      case "PageBreak":
        this.pkg.warnings.warn("PageBreak", "Word table cells cannot break pages");
        return [this.paragraph([])];
      case "Table":
        return [...this.block(content), this.paragraph([])];
      default: {
        const blocks = this.block(content);
        return blocks.length > 0 ? blocks : [this.paragraph([])];
      }
    }
  }
}

function stylesXml(): string {
  const style = (type: string, id: string, name: string, children: OrderedNode[]) =>
    ordered("w:style", [val("w:name", name), ...children], { "w:type": type, "w:styleId": id });
  const headings = HEADING_SIZES.map((points, i) =>
    style("paragraph", `Heading${i + 1}`, `heading ${i + 1}`, [
      val("w:basedOn", "Normal"),
      val("w:next", "Normal"),
      ordered("w:qFormat"),
      ordered("w:pPr", [
        ordered("w:keepNext"),
        ordered("w:spacing", [], { "w:before": 240, "w:after": 60 }),
        val("w:outlineLvl", i),
      ]),
      ordered("w:rPr", [ordered("w:b"), ...sizeProperties(points)]),
    ]),
  );
  const borders = ["top", "left", "bottom", "right", "insideH", "insideV"].map((side) =>
    ordered(`w:${side}`, [], { "w:val": "single", "w:sz": 4, "w:space": 0, "w:color": "auto" }),
  );

  return buildXml([
    ordered(
      "w:styles",
      [
        ordered("w:docDefaults", [
          ordered("w:rPrDefault", [
            ordered("w:rPr", [
              ordered("w:rFonts", [], { "w:ascii": "Helvetica", "w:hAnsi": "Helvetica", "w:cs": "Helvetica" }),
              ...sizeProperties(DEFAULT_FONT_SIZE),
            ]),
          ]),
          ordered("w:pPrDefault", [ordered("w:pPr", [ordered("w:spacing", [], { "w:after": 120 })])]),
        ]),
        ordered("w:style", [val("w:name", "Normal"), ordered("w:qFormat")], {
          "w:type": "paragraph",
          "w:default": 1,
          "w:styleId": "Normal",
        }),
        ...headings,
        style("paragraph", "ListParagraph", "List Paragraph", [val("w:basedOn", "Normal")]),
        style("character", "Hyperlink", "Hyperlink", [
          ordered("w:rPr", [val("w:color", "0563C1"), val("w:u", "single")]),
        ]),
        style("table", "TableGrid", "Table Grid", [ordered("w:tblPr", [ordered("w:tblBorders", borders)])]),
      ],
      { "xmlns:w": WORD_MAIN },
    ),
  ]);
}

function numberingXml(lists: boolean[]): string {
  const levels = (numbered: boolean) =>
    Array.from({ length: MAX_LIST_LEVEL + 1 }, (_, i) =>
      ordered(
        "w:lvl",
        [
          val("w:start", 1),
          val("w:numFmt", numbered ? "decimal" : "bullet"),
          val("w:lvlText", numbered ? `%${i + 1}.` : "•"),
          val("w:lvlJc", "left"),
          ordered("w:pPr", [ordered("w:ind", [], { "w:left": LIST_INDENT * (i + 1), "w:hanging": 360 })]),
        ],
        { "w:ilvl": i },
      ),
    );
  const abstract = (id: number, numbered: boolean) =>
    ordered("w:abstractNum", [val("w:multiLevelType", "hybridMultilevel"), ...levels(numbered)], {
      "w:abstractNumId": id,
    });
  const instances = lists.map((numbered, i) =>
    ordered(
      "w:num",
      [
        val("w:abstractNumId", numbered ? 1 : 0),
        ordered("w:lvlOverride", [val("w:startOverride", 1)], { "w:ilvl": 0 }),
      ],
      { "w:numId": i + 1 },
    ),
  );
  return buildXml([
    ordered("w:numbering", [abstract(0, false), abstract(1, true), ...instances], { "xmlns:w": WORD_MAIN }),
  ]);
}

function contentTypesXml(parts: { header: boolean; footer: boolean }): string {
  const byExtension = (extension: string, type: string) =>
    ordered("Default", [], { Extension: extension, ContentType: type });
  const override = (part: string, type: string) =>
    ordered("Override", [], {
      PartName: `/word/${part}.xml`,
      ContentType: `application/vnd.openxmlformats-officedocument.wordprocessingml.${type}+xml`,
    });
  return buildXml([
    ordered(
      "Types",
      [
        byExtension("rels", "application/vnd.openxmlformats-package.relationships+xml"),
        byExtension("xml", "application/xml"),
        byExtension("png", "image/png"),
        byExtension("jpg", "image/jpeg"),
        byExtension("gif", "image/gif"),
        override("document", "document.main"),
        override("styles", "styles"),
        override("numbering", "numbering"),
        ...(parts.header ? [override("header1", "header")] : []),
        ...(parts.footer ? [override("footer1", "footer")] : []),
      ],
      { xmlns: "http://schemas.openxmlformats.org/package/2006/content-types" },
    ),
  ]);
}

function partName(path: string): string {
  return path.replace(/^word\//, "");
}

/** Paragraph texts of a header or footer part. */
function chromeElements(root: XmlNode[]): Element[] {
  return findAll(root, "w:p")
    .map((p) => findAll(p.children, "w:t").map(ownText).join(""))
    .filter((line) => line !== "")
    .map((line) => paragraph([text(line)]));
}

interface PackageExtras extends Partial<PageGeometry> {
  pageHeader: Element[];
  pageFooter: Element[];
}

/** Page geometry and header/footer text, which mammoth does not surface. */
async function readPackageExtras(input: Buffer): Promise<PackageExtras> {
  const extras: PackageExtras = { pageHeader: [], pageFooter: [] };
  const zip = await JSZip.loadAsync(input);
  const documentXml = await zip.file("word/document.xml")?.async("string");
  if (!documentXml) return extras;

  const sections = findAll(parseXml(documentXml), "w:sectPr");
  const section = sections[sections.length - 1];
  if (!section) return extras;

  const child = (tag: string) => elementChildren(section).find((c) => c.tag === tag);
  const twips = (node: XmlElement | undefined, attribute: string) => {
    const value = Number(node?.attributes[attribute]);
    return Number.isFinite(value) && value > 0 ? twipsToMm(value) : undefined;
  };
  const size = child("w:pgSz");
  const margins = child("w:pgMar");
  const geometry: [keyof PageGeometry, number | undefined][] = [
    ["pageWidth", twips(size, "w:w")],
    ["pageHeight", twips(size, "w:h")],
    ["leftPageIndent", twips(margins, "w:left")],
    ["rightPageIndent", twips(margins, "w:right")],
    ["topPageIndent", twips(margins, "w:top")],
    ["bottomPageIndent", twips(margins, "w:bottom")],
  ];
  for (const [field, value] of geometry) {
    if (value !== undefined) extras[field] = value;
  }

  const relsXml = await zip.file("word/_rels/document.xml.rels")?.async("string");
  if (!relsXml) return extras;
  const targets = new Map(
    findAll(parseXml(relsXml), "Relationship").map((rel) => [
      rel.attributes.Id ?? "",
      rel.attributes.Target ?? "",
    ]),
  );
  const chrome = async (tag: string): Promise<Element[]> => {
    const reference = elementChildren(section).find(
      (c) => c.tag === tag && (c.attributes["w:type"] ?? "default") === "default",
    );
    const target = targets.get(reference?.attributes["r:id"] ?? "");
    const part = target ? await zip.file(`word/${partName(target)}`)?.async("string") : undefined;
    return part ? chromeElements(parseXml(part)) : [];
  };
  extras.pageHeader = await chrome("w:headerReference");
  extras.pageFooter = await chrome("w:footerReference");
  return extras;
}

/**
 * Word documents. Reading goes through mammoth's HTML rendition; writing
 * assembles the WordprocessingML package directly.
 */
export class DocxTransformer extends ImageAwareDocumentTransformer {
  readonly format = "Docx";

  async parseWithLoader(
    input: Buffer,
    loader: ImageLoader,
    _options?: TransformOptions,
  ): Promise<ParseResult> {
    const embedded = new ImageBundle();
    let html: string;
    let extras: PackageExtras;
    try {
      const result = await mammoth.convertToHtml(
        { buffer: input },
        {
          convertImage: mammoth.images.imgElement(async (image) => {
            const bytes = await image.readAsBuffer();
            const type = imageTypeFromMime(image.contentType) ?? (await resolveImageType(bytes));
            const key = `image${embedded.size + 1}.${imageExtension(type)}`;
            embedded.set(key, bytes);
            return { src: key };
          }),
        },
      );
      html = result.value;
      extras = await readPackageExtras(input);
    } catch (err) {
      throw new MalformedInputError("Input is not a readable DOCX document", { cause: err });
    }

    const collector = new ImageCollector({
      load: async (reference) => embedded.get(reference) ?? loader.load(reference),
    });
    const elements = await new HtmlReader(collector).read(html);
    return { document: createDocument(elements, extras), images: collector.images };
  }

  async generate(
    document: Document,
    images: ImageBundle,
    options?: TransformOptions,
  ): Promise<GenerateResult> {
    const contentWidth = document.pageWidth - document.leftPageIndent - document.rightPageIndent;
    const pkg = new DocxPackage(images, contentWidth, options?.warnings ?? IGNORE_WARNINGS);
    const zip = new JSZip();

    const main = new PartWriter(pkg);
    main.relate("styles", "styles.xml");
    main.relate("numbering", "numbering.xml");

    const sectionReferences: OrderedNode[] = [];
    const chrome = (kind: "header" | "footer", elements: Element[]) => {
      if (elements.length === 0) return false;
      const writer = new PartWriter(pkg);
      const tag = kind === "header" ? "w:hdr" : "w:ftr";
      zip.file(`word/${kind}1.xml`, buildXml([ordered(tag, writer.blocks(elements), WORD_NAMESPACES)]));
      if (writer.relationships.length > 0) {
        zip.file(`word/_rels/${kind}1.xml.rels`, relationshipsXml(writer.relationships));
      }
      const id = main.relate(kind, `${kind}1.xml`);
      sectionReferences.push(ordered(`w:${kind}Reference`, [], { "w:type": "default", "r:id": id }));
      return true;
    };
    const header = chrome("header", document.pageHeader);
    const footer = chrome("footer", document.pageFooter);

    const body = main.blocks(document.elements);
    const section = ordered("w:sectPr", [
      ...sectionReferences,
      ordered("w:pgSz", [], { "w:w": mmToTwips(document.pageWidth), "w:h": mmToTwips(document.pageHeight) }),
      ordered("w:pgMar", [], {
        "w:top": mmToTwips(document.topPageIndent),
        "w:right": mmToTwips(document.rightPageIndent),
        "w:bottom": mmToTwips(document.bottomPageIndent),
        "w:left": mmToTwips(document.leftPageIndent),
        "w:header": 360,
        "w:footer": 360,
        "w:gutter": 0,
      }),
    ]);

    zip.file("[Content_Types].xml", contentTypesXml({ header, footer }));
    zip.file(
      "_rels/.rels",
      relationshipsXml([
        { id: "rId1", type: "officeDocument", target: "word/document.xml", external: false },
      ]),
    );
    zip.file(
      "word/document.xml",
      buildXml([ordered("w:document", [ordered("w:body", [...body, section])], WORD_NAMESPACES)]),
    );
    zip.file("word/_rels/document.xml.rels", relationshipsXml(main.relationships));
    zip.file("word/styles.xml", stylesXml());
    zip.file("word/numbering.xml", numberingXml(pkg.lists));
    for (const [name, bytes] of pkg.media) {
      zip.file(`word/${name}`, bytes);
    }

    const bytes = await zip.generateAsync({
      type: "nodebuffer",
      compression: "DEFLATE",
      mimeType: MIME_TYPE,
    });
    return { bytes, images: new ImageBundle() };
  }
}
