import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import {
  DocumentTransformer,
  type GenerateResult,
  type ParseResult,
  type TransformOptions,
} from "../base-transformer.js";
import { MalformedInputError, UnsupportedFeatureError } from "../errors.js";
import { ImageBundle } from "../images.js";
import { createDocument, type Document } from "../model/document.js";
import { tableFromStrings, type Element, type TableElement } from "../model/elements.js";
import { IGNORE_WARNINGS } from "../warnings.js";
import { decodeText, dropPageChrome, flattenText } from "./shared.js";

/** One table per file; the first record is the header row. */
export class CsvTransformer extends DocumentTransformer {
  readonly format = "Csv";

  async parse(
    input: Buffer,
    _images: ImageBundle,
    options?: TransformOptions,
  ): Promise<ParseResult> {
    const source = decodeText(input, options?.charset, true);

    let records: string[][];
    try {
      records = parse(source, {
        relax_column_count: true,
        skip_empty_lines: true,
      });
    } catch (err) {
      throw new MalformedInputError(
        `Invalid CSV: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    const elements = records.length > 0 ? [tableFromStrings(records)] : [];
    return { document: createDocument(elements), images: new ImageBundle() };
  }

  async generate(
    document: Document,
    _images: ImageBundle,
    options?: TransformOptions,
  ): Promise<GenerateResult> {
    const warnings = options?.warnings ?? IGNORE_WARNINGS;
    const tables: TableElement[] = [];
    for (const element of document.elements) {
      if (element.kind === "Table") {
        tables.push(element);
      } else {
        warnings.warn(element.kind, "CSV holds a single table");
      }
    }
    dropPageChrome(document, warnings, "CSV has no page header or footer");
    if (tables.length > 1) {
      throw new UnsupportedFeatureError(
        "multiple tables",
        `CSV holds a single table, the document has ${tables.length}`,
      );
    }

    const [table] = tables;
    if (!table || table.headers.length === 0) {
      return { bytes: Buffer.alloc(0), images: new ImageBundle() };
    }

    const cell = (element: Element) => flattenText(element, warnings, "CSV cells hold text only");
    const records = [
      table.headers.map((h) => cell(h.element)),
      ...table.rows.map((row) => row.cells.map((c) => cell(c.element))),
    ];
    return { bytes: Buffer.from(stringify(records), "utf-8"), images: new ImageBundle() };
  }
}
