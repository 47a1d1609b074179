/** Font size, in points, used when the source gives none. */
export const DEFAULT_FONT_SIZE = 8;
/** Table column width, in millimetres, used when the source gives none. */
export const DEFAULT_COLUMN_WIDTH = 10;

export const MIN_HEADER_LEVEL = 1;
export const MAX_HEADER_LEVEL = 6;

export type ImageType = "Png" | "Jpeg" | "Gif";

export type ImageSource =
  | { kind: "Inline"; bytes: Uint8Array }
  | { kind: "Keyed"; key: string };

export interface HeaderElement {
  kind: "Header";
  level: number;
  text: string;
}

export interface ParagraphElement {
  kind: "Paragraph";
  elements: Element[];
}

export interface TextElement {
  kind: "Text";
  text: string;
  size: number;
}

export interface HyperlinkElement {
  kind: "Hyperlink";
  title: string;
  url: string;
  alt: string;
  size: number;
}

export interface ImageElement {
  kind: "Image";
  source: ImageSource;
  title: string;
  alt: string;
  imageType: ImageType;
}

export interface ListElement {
  kind: "List";
  items: ListItemElement[];
  numbered: boolean;
}

export interface ListItemElement {
  kind: "ListItem";
  element: ContentElement;
}

export interface TableElement {
  kind: "Table";
  headers: TableHeaderElement[];
  rows: TableRowElement[];
}

export interface TableHeaderElement {
  kind: "TableHeader";
  element: ContentElement;
  width: number;
}

export interface TableRowElement {
  kind: "TableRow";
  cells: TableCellElement[];
}

export interface TableCellElement {
  kind: "TableCell";
  element: ContentElement;
}

export interface PageBreakElement {
  kind: "PageBreak";
}

export type Element =
  | HeaderElement
  | ParagraphElement
  | TextElement
  | HyperlinkElement
  | ImageElement
  | ListElement
  | ListItemElement
  | TableElement
  | TableHeaderElement
  | TableRowElement
  | TableCellElement
  | PageBreakElement;

export type ElementKind = Element["kind"];

/**
 * Anything that may stand as the content of a list item or table cell.
 * Structural children (items, rows, cells) only live inside their parents.
 */
export type ContentElement = Exclude<
  Element,
  ListItemElement | TableHeaderElement | TableRowElement | TableCellElement
>;

export function clampHeaderLevel(level: number, ceiling = MAX_HEADER_LEVEL): number {
  if (!Number.isFinite(level)) return MIN_HEADER_LEVEL;
  return Math.min(Math.max(Math.trunc(level), MIN_HEADER_LEVEL), ceiling);
}

export function header(level: number, text: string): HeaderElement {
  return { kind: "Header", level: clampHeaderLevel(level), text };
}

export function paragraph(elements: Element[] = []): ParagraphElement {
  return { kind: "Paragraph", elements };
}

export function text(value: string, size = DEFAULT_FONT_SIZE): TextElement {
  return { kind: "Text", text: value, size };
}

export function hyperlink(
  title: string,
  url: string,
  alt = "",
  size = DEFAULT_FONT_SIZE,
): HyperlinkElement {
  return { kind: "Hyperlink", title, url, alt, size };
}

export function inlineImage(
  bytes: Uint8Array,
  imageType: ImageType,
  title = "",
  alt = "",
): ImageElement {
  return { kind: "Image", source: { kind: "Inline", bytes }, title, alt, imageType };
}

export function keyedImage(
  key: string,
  imageType: ImageType,
  title = "",
  alt = "",
): ImageElement {
  return { kind: "Image", source: { kind: "Keyed", key }, title, alt, imageType };
}

export function list(items: ListItemElement[], numbered = false): ListElement {
  return { kind: "List", items, numbered };
}

export function listItem(element: ContentElement): ListItemElement {
  return { kind: "ListItem", element };
}

export function table(
  headers: TableHeaderElement[],
  rows: TableRowElement[] = [],
): TableElement {
  return { kind: "Table", headers, rows };
}

export function tableHeader(
  element: ContentElement,
  width = DEFAULT_COLUMN_WIDTH,
): TableHeaderElement {
  return { kind: "TableHeader", element, width };
}

export function tableRow(cells: TableCellElement[]): TableRowElement {
  return { kind: "TableRow", cells };
}

export function tableCell(element: ContentElement): TableCellElement {
  return { kind: "TableCell", element };
}

export function pageBreak(): PageBreakElement {
  return { kind: "PageBreak" };
}

/**
 * Builds a rectangular table from rows of cell strings. The first row becomes
 * the header row; short rows are padded and long rows widen the header.
 */
export function tableFromStrings(records: string[][]): TableElement {
  const [first = [], ...rest] = records;
  const headers = first.map((value) => tableHeader(text(value)));
  const rows = rest.map((record) => tableRow(record.map((value) => tableCell(text(value)))));
  return normalizeTable(headers, rows);
}

/** Pads headers and rows with empty Text cells until every row matches the header count. */
export function normalizeTable(
  headers: TableHeaderElement[],
  rows: TableRowElement[],
): TableElement {
  const width = Math.max(headers.length, ...rows.map((row) => row.cells.length));
  const paddedHeaders = [...headers];
  while (paddedHeaders.length < width) paddedHeaders.push(tableHeader(text("")));
  const paddedRows = rows.map((row) => {
    if (row.cells.length === width) return row;
    const cells = [...row.cells];
    while (cells.length < width) cells.push(tableCell(text("")));
    return tableRow(cells);
  });
  return table(paddedHeaders, paddedRows);
}

/** Text content of an element, flattened. Images contribute their alt text. */
export function plainTextOf(element: Element): string {
  switch (element.kind) {
    case "Header":
    case "Text":
      return element.text;
    case "Hyperlink":
      return element.title || element.url;
    case "Image":
      return element.alt;
    case "Paragraph":
      return element.elements.map(plainTextOf).join("");
    case "List":
      return element.items.map(plainTextOf).join("\n");
    case "ListItem":
    case "TableHeader":
    case "TableCell":
      return plainTextOf(element.element);
    case "TableRow":
      return element.cells.map(plainTextOf).join("\t");
    case "Table":
      return [
        element.headers.map(plainTextOf).join("\t"),
        ...element.rows.map(plainTextOf),
      ].join("\n");
    case "PageBreak":
      return "";
  }
}

export function isContentElement(element: Element): element is ContentElement {
  return (
    element.kind !== "ListItem" &&
    element.kind !== "TableHeader" &&
    element.kind !== "TableRow" &&
    element.kind !== "TableCell"
  );
}
