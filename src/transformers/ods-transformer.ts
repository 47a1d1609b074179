import JSZip from "jszip";
import {
  DocumentTransformer,
  type GenerateResult,
  type ParseResult,
  type TransformOptions,
} from "../base-transformer.js";
import { MalformedInputError } from "../errors.js";
import { ImageBundle } from "../images.js";
import { createDocument, type Document } from "../model/document.js";
import {
  tableFromStrings,
  tableHeader,
  type TableElement,
} from "../model/elements.js";
import { IGNORE_WARNINGS, type WarningSink } from "../warnings.js";
import { MM_PER_INCH, POINTS_PER_INCH } from "../units.js";
import { spreadsheetCell, topLevelTables } from "./shared.js";
import {
  buildXml,
  elementChildren,
  findAll,
  ordered,
  parseXml,
  textNodes,
  type OrderedNode,
  type XmlElement,
  type XmlNode,
} from "./xml-nodes.js";

const MIME_TYPE = "application/vnd.oasis.opendocument.spreadsheet";

const NAMESPACES = {
  "xmlns:office": "urn:oasis:names:tc:opendocument:xmlns:office:1.0",
  "xmlns:style": "urn:oasis:names:tc:opendocument:xmlns:style:1.0",
  "xmlns:text": "urn:oasis:names:tc:opendocument:xmlns:text:1.0",
  "xmlns:table": "urn:oasis:names:tc:opendocument:xmlns:table:1.0",
  "xmlns:fo": "urn:oasis:names:tc:opendocument:xmlns:xsl-fo-compatible:1.0",
  "office:version": "1.2",
};

const MM_PER_UNIT: Record<string, number> = {
  mm: 1,
  cm: 10,
  in: MM_PER_INCH,
  pt: MM_PER_INCH / POINTS_PER_INCH,
};

function lengthToMm(length: string): number | undefined {
  const match = /^(\d+(?:\.\d+)?)(mm|cm|in|pt)$/.exec(length.trim());
  if (!match) return undefined;
  const [, value = "0", unit = "mm"] = match;
  const factor = MM_PER_UNIT[unit] ?? 1;
  return Math.round(Number(value) * factor * 100) / 100;
}

function repeatCount(node: XmlElement, attribute: string): number {
  const count = Number(node.attributes[attribute] ?? "1");
  return Number.isInteger(count) && count > 0 ? count : 1;
}

/** Text of a paragraph, expanding ODF's space, tab and line-break elements. */
function paragraphText(nodes: XmlNode[]): string {
  return nodes
    .map((node) => {
      if (node.kind === "text") return node.value;
      switch (node.tag) {
        case "text:s":
          return " ".repeat(repeatCount(node, "text:c"));
        case "text:tab":
          return "\t";
        case "text:line-break":
          return "\n";
        default:
          return paragraphText(node.children);
      }
    })
    .join("");
}

function cellText(cell: XmlElement): string {
  return elementChildren(cell)
    .filter((child) => child.tag === "text:p")
    .map((p) => paragraphText(p.children))
    .join("\n");
}

interface Run<T> {
  value: T;
  repeat: number;
}

/** Expands repeated runs, after dropping the empty ones that trail. */
function expand<T>(runs: Run<T>[], isEmpty: (value: T) => boolean): T[] {
  let end = runs.length;
  while (end > 0) {
    const last = runs[end - 1];
    if (!last || !isEmpty(last.value)) break;
    end--;
  }
  return runs.slice(0, end).flatMap((run) => Array<T>(run.repeat).fill(run.value));
}

function tableRows(table: XmlElement): string[][] {
  const rows: Run<string[]>[] = [];
  for (const row of findAll(table.children, "table:table-row")) {
    const cells: Run<string>[] = elementChildren(row)
      .filter((c) => c.tag === "table:table-cell" || c.tag === "table:covered-table-cell")
      .map((c) => ({ value: cellText(c), repeat: repeatCount(c, "table:number-columns-repeated") }));
    rows.push({
      value: expand(cells, (value) => value === ""),
      repeat: repeatCount(row, "table:number-rows-repeated"),
    });
  }
  return expand(rows, (cells) => cells.length === 0);
}

function columnWidths(table: XmlElement, styles: Map<string, number>): (number | undefined)[] {
  const widths: (number | undefined)[] = [];
  for (const column of findAll(table.children, "table:table-column")) {
    const width = styles.get(column.attributes["table:style-name"] ?? "");
    const repeat = Math.min(repeatCount(column, "table:number-columns-repeated"), 1024);
    for (let i = 0; i < repeat; i++) widths.push(width);
  }
  return widths;
}

function columnStyles(root: XmlNode[]): Map<string, number> {
  const styles = new Map<string, number>();
  for (const style of findAll(root, "style:style")) {
    if (style.attributes["style:family"] !== "table-column") continue;
    const properties = elementChildren(style).find(
      (child) => child.tag === "style:table-column-properties",
    );
    const width = lengthToMm(properties?.attributes["style:column-width"] ?? "");
    const name = style.attributes["style:name"];
    if (name && width !== undefined) styles.set(name, width);
  }
  return styles;
}

function sheet(table: TableElement, index: number, warnings: WarningSink): OrderedNode {
  const columns = table.headers.map((_, i) =>
    ordered("table:table-column", [], { "table:style-name": `co${index}-${i}` }),
  );
  const row = (values: string[]) =>
    ordered(
      "table:table-row",
      values.map((value) =>
        ordered(
          "table:table-cell",
          value.split("\n").map((line) => ordered("text:p", textNodes(line))),
          { "office:value-type": "string" },
        ),
      ),
    );
  return ordered("table:table", [
    ...columns,
    row(table.headers.map((h) => spreadsheetCell(h.element, warnings))),
    ...table.rows.map((r) => row(r.cells.map((cell) => spreadsheetCell(cell.element, warnings)))),
  ], { "table:name": `Sheet${index + 1}` });
}

function columnStyleNodes(tables: TableElement[]): OrderedNode[] {
  return tables.flatMap((table, index) =>
    table.headers.map((h, i) =>
      ordered(
        "style:style",
        [ordered("style:table-column-properties", [], { "style:column-width": `${h.width}mm` })],
        { "style:name": `co${index}-${i}`, "style:family": "table-column" },
      ),
    ),
  );
}

function manifest(): string {
  return buildXml([
    ordered(
      "manifest:manifest",
      [
        ordered("manifest:file-entry", [], {
          "manifest:full-path": "/",
          "manifest:version": "1.2",
          "manifest:media-type": MIME_TYPE,
        }),
        ordered("manifest:file-entry", [], {
          "manifest:full-path": "content.xml",
          "manifest:media-type": "text/xml",
        }),
      ],
      {
        "xmlns:manifest": "urn:oasis:names:tc:opendocument:xmlns:manifest:1.0",
        "manifest:version": "1.2",
      },
    ),
  ]);
}

/** OpenDocument spreadsheets: each sheet is one table. */
export class OdsTransformer extends DocumentTransformer {
  readonly format = "Ods";

  async parse(
    input: Buffer,
    _images: ImageBundle,
    _options?: TransformOptions,
  ): Promise<ParseResult> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(input);
    } catch (err) {
      throw new MalformedInputError("Input is not an ODS package", { cause: err });
    }
    const content = zip.file("content.xml");
    if (!content) throw new MalformedInputError("ODS package has no content.xml");

    const root = parseXml(await content.async("string"));
    const styles = columnStyles(root);
    const tables: TableElement[] = [];
    for (const node of findAll(root, "table:table")) {
      const rows = tableRows(node);
      if (rows.length === 0) continue;
      const table = tableFromStrings(rows);
      const widths = columnWidths(node, styles);
      table.headers = table.headers.map((h, i) => {
        const width = widths[i];
        return width === undefined ? h : tableHeader(h.element, width);
      });
      tables.push(table);
    }
    return { document: createDocument(tables), images: new ImageBundle() };
  }

  async generate(
    document: Document,
    _images: ImageBundle,
    options?: TransformOptions,
  ): Promise<GenerateResult> {
    const warnings = options?.warnings ?? IGNORE_WARNINGS;
    const tables = topLevelTables(document, warnings);
    const sheets =
      tables.length > 0
        ? tables.map((table, index) => sheet(table, index, warnings))
        : [ordered("table:table", [], { "table:name": "Sheet1" })];
    const content = buildXml([
      ordered(
        "office:document-content",
        [
          ordered("office:automatic-styles", columnStyleNodes(tables)),
          ordered("office:body", [ordered("office:spreadsheet", sheets)]),
        ],
        NAMESPACES,
      ),
    ]);

    const zip = new JSZip();
    zip.file("mimetype", MIME_TYPE, { compression: "STORE" });
    zip.file("content.xml", content);
    zip.file("META-INF/manifest.xml", manifest());
    const bytes = await zip.generateAsync({
      type: "nodebuffer",
      compression: "DEFLATE",
      mimeType: MIME_TYPE,
    });
    return { bytes, images: new ImageBundle() };
  }
}
