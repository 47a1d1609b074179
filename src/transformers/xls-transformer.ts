import * as XLSX from "xlsx";
import {
  DocumentTransformer,
  type GenerateResult,
  type ParseResult,
  type TransformOptions,
} from "../base-transformer.js";
import { MalformedInputError, UnsupportedFeatureError } from "../errors.js";
import { ImageBundle } from "../images.js";
import { createDocument, type Document } from "../model/document.js";
import { tableFromStrings, type TableElement } from "../model/elements.js";

/** Compound File Binary header, the container of every BIFF8 workbook. */
const CFB_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

function isCompoundFile(input: Buffer): boolean {
  return CFB_SIGNATURE.every((byte, i) => input[i] === byte);
}

function sheetRows(sheet: XLSX.WorkSheet): string[][] {
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    defval: "",
    blankrows: false,
  });
  return rows.map((row) => row.map((value) => (value === undefined || value === null ? "" : String(value))));
}

/**
 * Legacy Excel workbooks. Every non-empty sheet becomes one table whose first
 * row is the header row. Writing XLS is not supported.
 */
export class XlsTransformer extends DocumentTransformer {
  readonly format = "Xls";

  async parse(
    input: Buffer,
    _images: ImageBundle,
    _options?: TransformOptions,
  ): Promise<ParseResult> {
    if (!isCompoundFile(input)) {
      throw new MalformedInputError("Input is not a readable XLS workbook");
    }
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(input, { type: "buffer" });
    } catch (err) {
      throw new MalformedInputError("Input is not a readable XLS workbook", { cause: err });
    }

    const tables: TableElement[] = [];
    for (const name of workbook.SheetNames) {
      const sheet = workbook.Sheets[name];
      if (!sheet) continue;
      const rows = sheetRows(sheet);
      if (rows.length > 0) tables.push(tableFromStrings(rows));
    }
    return { document: createDocument(tables), images: new ImageBundle() };
  }

  async generate(
    _document: Document,
    _images: ImageBundle,
    _options?: TransformOptions,
  ): Promise<GenerateResult> {
    throw new UnsupportedFeatureError("XLS generation", "XLS can be parsed but not generated");
  }
}
