import { MissingImageError } from "../errors.js";
import { ImageBundle, imageExtension } from "../images.js";
import type {
  ContentElement,
  Element,
  ImageElement,
  ListItemElement,
  TableCellElement,
  TableHeaderElement,
  TableRowElement,
} from "./elements.js";

export interface PageGeometry {
  pageWidth: number;
  pageHeight: number;
  leftPageIndent: number;
  rightPageIndent: number;
  topPageIndent: number;
  bottomPageIndent: number;
}

export interface Document extends PageGeometry {
  elements: Element[];
  pageHeader: Element[];
  pageFooter: Element[];
}

/** A4 portrait with 10 mm indents on every side. */
export const DEFAULT_PAGE_GEOMETRY: Readonly<PageGeometry> = {
  pageWidth: 210,
  pageHeight: 297,
  leftPageIndent: 10,
  rightPageIndent: 10,
  topPageIndent: 10,
  bottomPageIndent: 10,
};

export function createDocument(
  elements: Element[] = [],
  overrides: Partial<PageGeometry> & {
    pageHeader?: Element[];
    pageFooter?: Element[];
  } = {},
): Document {
  return {
    ...DEFAULT_PAGE_GEOMETRY,
    pageHeader: [],
    pageFooter: [],
    ...overrides,
    elements,
  };
}

export function* topLevel(document: Document): Generator<Element> {
  yield* document.elements;
}

/** Every element under `elements`, in document order, parents before children. */
export function* walk(elements: readonly Element[]): Generator<Element> {
  for (const element of elements) {
    yield element;
    yield* walk(childrenOf(element));
  }
}

/** Deep traversal of the page header, the body, then the page footer. */
export function* walkDocument(document: Document): Generator<Element> {
  yield* walk(document.pageHeader);
  yield* walk(document.elements);
  yield* walk(document.pageFooter);
}

export function childrenOf(element: Element): Element[] {
  switch (element.kind) {
    case "Paragraph":
      return element.elements;
    case "List":
      return element.items;
    case "ListItem":
    case "TableHeader":
    case "TableCell":
      return [element.element];
    case "Table":
      return [...element.headers, ...element.rows];
    case "TableRow":
      return element.cells;
    case "Header":
    case "Text":
    case "Hyperlink":
    case "Image":
    case "PageBreak":
      return [];
  }
}

export function documentsEqual(a: Document, b: Document): boolean {
  return (
    a.pageWidth === b.pageWidth &&
    a.pageHeight === b.pageHeight &&
    a.leftPageIndent === b.leftPageIndent &&
    a.rightPageIndent === b.rightPageIndent &&
    a.topPageIndent === b.topPageIndent &&
    a.bottomPageIndent === b.bottomPageIndent &&
    listsEqual(a.elements, b.elements) &&
    listsEqual(a.pageHeader, b.pageHeader) &&
    listsEqual(a.pageFooter, b.pageFooter)
  );
}

function listsEqual(a: readonly Element[], b: readonly Element[]): boolean {
  return a.length === b.length && a.every((element, i) => elementsEqual(element, b[i]));
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function imagesEqual(a: ImageElement, b: ImageElement): boolean {
  if (a.title !== b.title || a.alt !== b.alt || a.imageType !== b.imageType) {
    return false;
  }
  if (a.source.kind === "Inline" && b.source.kind === "Inline") {
    return bytesEqual(a.source.bytes, b.source.bytes);
  }
  if (a.source.kind === "Keyed" && b.source.kind === "Keyed") {
    return a.source.key === b.source.key;
  }
  return false;
}

/**
 * Structural equality: same variants, same attribute values, same order.
 * An inline image never equals a keyed one, even over identical bytes.
 */
export function elementsEqual(a: Element, b: Element): boolean {
  switch (a.kind) {
    case "Header":
      return b.kind === "Header" && a.level === b.level && a.text === b.text;
    case "Paragraph":
      return b.kind === "Paragraph" && listsEqual(a.elements, b.elements);
    case "Text":
      return b.kind === "Text" && a.text === b.text && a.size === b.size;
    case "Hyperlink":
      return (
        b.kind === "Hyperlink" &&
        a.title === b.title &&
        a.url === b.url &&
        a.alt === b.alt &&
        a.size === b.size
      );
    case "Image":
      return b.kind === "Image" && imagesEqual(a, b);
    case "List":
      return b.kind === "List" && a.numbered === b.numbered && listsEqual(a.items, b.items);
    case "ListItem":
      return b.kind === "ListItem" && elementsEqual(a.element, b.element);
    case "Table":
      return (
        b.kind === "Table" &&
        listsEqual(a.headers, b.headers) &&
        listsEqual(a.rows, b.rows)
      );
    case "TableHeader":
      return (
        b.kind === "TableHeader" && a.width === b.width && elementsEqual(a.element, b.element)
      );
    case "TableRow":
      return b.kind === "TableRow" && listsEqual(a.cells, b.cells);
    case "TableCell":
      return b.kind === "TableCell" && elementsEqual(a.element, b.element);
    case "PageBreak":
      return b.kind === "PageBreak";
  }
}

/**
 * Rebuilds an element tree, replacing every image with what `fn` returns.
 * Shared by the image normalization helpers below.
 */
export function mapImages(
  elements: readonly Element[],
  fn: (image: ImageElement) => ImageElement,
): Element[] {
  return elements.map((element) => mapElementImages(element, fn));
}

function mapContent(
  element: ContentElement,
  fn: (image: ImageElement) => ImageElement,
): ContentElement {
  switch (element.kind) {
    case "Image":
      return fn(element);
    case "Paragraph":
      return { ...element, elements: mapImages(element.elements, fn) };
    case "List":
      return { ...element, items: element.items.map((item) => mapItem(item, fn)) };
    case "Table":
      return {
        ...element,
        headers: element.headers.map((h) => mapHeader(h, fn)),
        rows: element.rows.map((row) => mapRow(row, fn)),
      };
    case "Header":
    case "Text":
    case "Hyperlink":
    case "PageBreak":
      return element;
  }
}

function mapItem(item: ListItemElement, fn: (image: ImageElement) => ImageElement): ListItemElement {
  return { ...item, element: mapContent(item.element, fn) };
}

function mapHeader(
  h: TableHeaderElement,
  fn: (image: ImageElement) => ImageElement,
): TableHeaderElement {
  return { ...h, element: mapContent(h.element, fn) };
}

function mapCell(
  cell: TableCellElement,
  fn: (image: ImageElement) => ImageElement,
): TableCellElement {
  return { ...cell, element: mapContent(cell.element, fn) };
}

function mapRow(row: TableRowElement, fn: (image: ImageElement) => ImageElement): TableRowElement {
  return { ...row, cells: row.cells.map((cell) => mapCell(cell, fn)) };
}

function mapElementImages(element: Element, fn: (image: ImageElement) => ImageElement): Element {
  switch (element.kind) {
    case "ListItem":
      return mapItem(element, fn);
    case "TableHeader":
      return mapHeader(element, fn);
    case "TableRow":
      return mapRow(element, fn);
    case "TableCell":
      return mapCell(element, fn);
    default:
      return mapContent(element, fn);
  }
}

function mapDocumentImages(
  document: Document,
  fn: (image: ImageElement) => ImageElement,
): Document {
  return {
    ...document,
    elements: mapImages(document.elements, fn),
    pageHeader: mapImages(document.pageHeader, fn),
    pageFooter: mapImages(document.pageFooter, fn),
  };
}

/** Copy of `document` whose keyed images carry their bytes inline. */
export function materializeImages(document: Document, bundle: ImageBundle): Document {
  return mapDocumentImages(document, (image) => {
    if (image.source.kind === "Inline") return image;
    const bytes = bundle.get(image.source.key);
    if (!bytes) throw new MissingImageError(image.source.key);
    return { ...image, source: { kind: "Inline", bytes } };
  });
}

/**
 * Copy of `document` whose inline images are keyed `image{n}.{ext}`, with the
 * bundle that holds their bytes.
 */
export function externalizeImages(document: Document): {
  document: Document;
  images: ImageBundle;
} {
  const images = new ImageBundle();
  const externalized = mapDocumentImages(document, (image) => {
    if (image.source.kind === "Keyed") return image;
    const key = `image${images.size}.${imageExtension(image.imageType)}`;
    images.set(key, image.source.bytes);
    return { ...image, source: { kind: "Keyed", key } };
  });
  return { document: externalized, images };
}
