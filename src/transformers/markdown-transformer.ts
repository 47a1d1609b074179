import type {
  ListItem as MdListItem,
  Nodes,
  PhrasingContent,
  RootContent,
  Table as MdTable,
} from "mdast";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import { unified } from "unified";
import {
  ImageAwareDocumentTransformer,
  type GenerateResult,
  type ParseResult,
  type TransformOptions,
} from "../base-transformer.js";
import { MissingImageError } from "../errors.js";
import { ImageBundle, type ImageLoader } from "../images.js";
import { createDocument, externalizeImages, type Document } from "../model/document.js";
import {
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
import { HtmlReader } from "./html-transformer.js";
import {
  ImageCollector,
  asContent,
  decodeText,
  dropPageChrome,
  mergeTextRuns,
  normalizeNewlines,
} from "./shared.js";

interface Definition {
  url: string;
  title: string;
}

function collectDefinitions(node: Nodes, into: Map<string, Definition>): void {
  if (node.type === "definition") {
    into.set(node.identifier, { url: node.url, title: node.title ?? "" });
    return;
  }
  if ("children" in node) {
    for (const child of node.children) collectDefinitions(child, into);
  }
}

function phrasingText(nodes: PhrasingContent[]): string {
  return nodes
    .map((node) => {
      switch (node.type) {
        case "text":
        case "inlineCode":
          return node.value;
        case "break":
          return "\n";
        case "image":
        case "imageReference":
          return node.alt ?? "";
        default:
          return "children" in node ? phrasingText(node.children) : "";
      }
    })
    .join("");
}

class MarkdownReader {
  private readonly definitions = new Map<string, Definition>();
  private readonly html: HtmlReader;

  constructor(private readonly collector: ImageCollector) {
    this.html = new HtmlReader(collector);
  }

  async read(source: string): Promise<Element[]> {
    const tree = unified().use(remarkParse).use(remarkGfm).parse(source);
    collectDefinitions(tree, this.definitions);
    return this.blocks(tree.children);
  }

  private async blocks(nodes: RootContent[]): Promise<Element[]> {
    const out: Element[] = [];
    for (const node of nodes) {
      switch (node.type) {
        case "heading":
          out.push(header(node.depth, phrasingText(node.children)));
          break;
        case "paragraph":
          out.push(paragraph(await this.inline(node.children)));
          break;
        case "list":
          out.push(await this.list(node.children, node.ordered ?? false));
          break;
        case "table":
          out.push(await this.table(node));
          break;
        case "thematicBreak":
          out.push(pageBreak());
          break;
        case "code":
          out.push(paragraph([text(node.value)]));
          break;
        case "blockquote":
          out.push(...(await this.blocks(node.children)));
          break;
        case "html":
          out.push(...(await this.html.read(node.value)));
          break;
        default:
          // definitions, footnotes and front matter carry no content of their own
          break;
      }
    }
    return out;
  }

  private async inline(nodes: PhrasingContent[]): Promise<Element[]> {
    const out: Element[] = [];
    for (const node of nodes) {
      switch (node.type) {
        case "text":
        case "inlineCode":
          out.push(text(node.value));
          break;
        case "break":
          out.push(text("\n"));
          break;
        case "link":
          out.push(hyperlink(phrasingText(node.children), node.url, node.title ?? ""));
          break;
        case "linkReference": {
          const definition = this.definitions.get(node.identifier);
          out.push(
            definition
              ? hyperlink(phrasingText(node.children), definition.url, definition.title)
              : text(phrasingText(node.children)),
          );
          break;
        }
        case "image":
          out.push(await this.collector.resolve(node.url, node.title ?? "", node.alt ?? ""));
          break;
        case "imageReference": {
          const definition = this.definitions.get(node.identifier);
          if (definition) {
            out.push(
              await this.collector.resolve(definition.url, definition.title, node.alt ?? ""),
            );
          }
          break;
        }
        case "html":
          if (/^<br\s*\/?>$/i.test(node.value)) out.push(text("\n"));
          break;
        case "emphasis":
        case "strong":
        case "delete":
          out.push(...(await this.inline(node.children)));
          break;
        default:
          break;
      }
    }
    return mergeTextRuns(out);
  }

  private async list(nodes: MdListItem[], numbered: boolean): Promise<ListElement> {
    const items: ListItemElement[] = [];
    for (const node of nodes) {
      const blocks = await this.blocks(node.children);
      if (blocks.length === 0) items.push(listItem(text("")));
      for (const block of blocks) items.push(listItem(asContent(block)));
    }
    return list(items, numbered);
  }

  private async table(node: MdTable): Promise<TableElement> {
    const grid = await Promise.all(
      node.children.map((row) =>
        Promise.all(row.children.map(async (cell) => cellContent(await this.inline(cell.children)))),
      ),
    );
    const [first = [], ...rest] = grid;
    return normalizeTable(
      first.map((content) => tableHeader(content)),
      rest.map((cells) => tableRow(cells.map((content) => tableCell(content)))),
    );
  }
}

function cellContent(inline: Element[]): ContentElement {
  const [only] = inline;
  if (!only) return text("");
  if (inline.length === 1 && only.kind === "Text") return only;
  return paragraph(inline);
}

const ESCAPED = /[\\`*_[\]<>#|~]|&(?=#?\w+;)/g;

function escapeMarkdown(value: string): string {
  return value.replace(ESCAPED, (c) => `\\${c}`);
}

const HARD_BREAK = "\\\n";

/**
 * Stops every line of a rendered paragraph from opening a list or a setext
 * heading underline.
 */
function escapeBlockStarts(value: string): string {
  return value
    .replace(/^([-+])(?=\s|$)/gm, "\\$1")
    .replace(/^(\d+)([.)])(?=\s|$)/gm, "$1\\$2")
    .replace(/^(=+|-+)(?=[ \t]*$)/gm, "\\$1");
}

/** A hard break cannot end a paragraph. */
function trimTrailingBreaks(value: string): string {
  return value.replace(/(\\\n)+$/, "");
}

function destination(url: string): string {
  return /[\s()]/.test(url) ? `<${url}>` : url;
}

function titleAttribute(title: string): string {
  return title ? ` "${title.replace(/["\\]/g, (c) => `\\${c}`)}"` : "";
}

function indentLines(value: string, indent: string): string {
  return value
    .split("\n")
    .map((line, index) => (index === 0 || line === "" ? line : indent + line))
    .join("\n");
}

class MarkdownWriter {
  readonly images = new ImageBundle();

  constructor(
    private readonly source: ImageBundle,
    private readonly warnings: WarningSink,
  ) {}

  block(element: Element): string {
    switch (element.kind) {
      case "Header":
        return `${"#".repeat(element.level)} ${escapeMarkdown(element.text.replace(/\n/g, " "))}`;
      case "Paragraph":
        return this.paragraph(element.elements);
      case "Text":
      case "Hyperlink":
      case "Image":
        return this.paragraph([element]);
      case "List":
        return this.list(element);
      case "Table":
        return this.table(element);
      case "PageBreak":
        return "---";
      case "ListItem":
      case "TableHeader":
      case "TableCell":
        return this.block(element.element);
      case "TableRow":
        return escapeMarkdown(plainTextOf(element));
    }
  }

  private inline(element: Element): string {
    switch (element.kind) {
      case "Text":
        return escapeMarkdown(element.text).replace(/\n/g, HARD_BREAK);
      case "Hyperlink":
        if (element.title === element.url && !element.alt && /^[a-z][a-z0-9+.-]*:\S+$/i.test(element.url)) {
          return `<${element.url}>`;
        }
        return `[${escapeMarkdown(element.title)}](${destination(element.url)}${titleAttribute(element.alt)})`;
      case "Image":
        return this.image(element);
      default:
        this.warnings.warn(element.kind, "Markdown runs hold text, links and images only");
        return escapeMarkdown(plainTextOf(element));
    }
  }

  private paragraph(elements: Element[]): string {
    return escapeBlockStarts(trimTrailingBreaks(elements.map((e) => this.inline(e)).join("")));
  }

  private image(image: ImageElement): string {
    if (image.source.kind === "Inline") {
      // generate() externalizes every inline image first
      return escapeMarkdown(image.alt);
    }
    const { key } = image.source;
    const bytes = this.source.get(key);
    if (!bytes) throw new MissingImageError(key);
    this.images.set(key, bytes);
    return `![${escapeMarkdown(image.alt)}](${destination(key)}${titleAttribute(image.title)})`;
  }

  private list(element: ListElement): string {
    const lines: string[] = [];
    let counter = 0;
    let indent = 2;
    for (const item of element.items) {
      const content = item.element;
      if (content.kind === "List") {
        const nested = this.list(content);
        lines.push(
          lines.length === 0
            ? `- ${indentLines(nested, "  ")}`
            : `${" ".repeat(indent)}${indentLines(nested, " ".repeat(indent))}`,
        );
        continue;
      }
      counter++;
      const marker = element.numbered ? `${counter}. ` : "- ";
      indent = marker.length;
      lines.push(marker + indentLines(this.block(content), " ".repeat(indent)));
    }
    return lines.join("\n");
  }

  private table(element: TableElement): string {
    if (element.headers.length === 0) return "";
    const row = (cells: ContentElement[]) =>
      `| ${cells.map((cell) => this.cell(cell)).join(" | ")} |`;
    return [
      row(element.headers.map((h) => h.element)),
      `| ${element.headers.map(() => "---").join(" | ")} |`,
      ...element.rows.map((r) => row(r.cells.map((c) => c.element))),
    ].join("\n");
  }

  private cell(content: ContentElement): string {
    const rendered =
      content.kind === "Paragraph"
        ? content.elements.map((e) => this.inline(e)).join("")
        : this.inline(content);
    return rendered.replace(/\\?\n/g, " ");
  }
}

/** CommonMark with GitHub tables, through remark. */
export class MarkdownTransformer extends ImageAwareDocumentTransformer {
  readonly format = "Markdown";

  async parseWithLoader(
    input: Buffer,
    loader: ImageLoader,
    options?: TransformOptions,
  ): Promise<ParseResult> {
    const collector = new ImageCollector(loader);
    const source = normalizeNewlines(decodeText(input, options?.charset));
    const elements = await new MarkdownReader(collector).read(source);
    return { document: createDocument(elements), images: collector.images };
  }

  async generate(
    document: Document,
    images: ImageBundle,
    options?: TransformOptions,
  ): Promise<GenerateResult> {
    const warnings = options?.warnings ?? IGNORE_WARNINGS;
    dropPageChrome(document, warnings, "Markdown has no page header or footer");
    const externalized = externalizeImages(document);
    const writer = new MarkdownWriter(
      ImageBundle.from([...images.entries(), ...externalized.images.entries()]),
      warnings,
    );
    const blocks = externalized.document.elements
      .map((element) => writer.block(element))
      .filter((block) => block !== "");
    const markdown = blocks.length > 0 ? `${blocks.join("\n\n")}\n` : "";
    return { bytes: Buffer.from(markdown, "utf-8"), images: writer.images };
  }
}
