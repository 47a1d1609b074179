import ExcelJS from "exceljs";
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
import { spreadsheetCell, topLevelTables } from "./shared.js";

/** Millimetres per unit of Excel column width (one character of the default font). */
const MM_PER_CHARACTER = 1.9;

function cellToString(cell: ExcelJS.Cell): string {
  return valueToString(cell.value);
}

function valueToString(value: ExcelJS.CellValue): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  if (typeof value !== "object") return String(value);
  if ("richText" in value) return value.richText.map((rt) => rt.text).join("");
  if ("text" in value) return String(value.text);
  if ("result" in value) return value.result === undefined ? "" : valueToString(value.result);
  if ("error" in value) return String(value.error);
  return "";
}

/** Writes each table to its own sheet, `Sheet1`, `Sheet2` and so on. */
function tablesToSheets(
  workbook: ExcelJS.Workbook,
  tables: TableElement[],
  warnings: WarningSink,
): void {
  tables.forEach((table, index) => {
    const sheet = workbook.addWorksheet(`Sheet${index + 1}`);
    sheet.columns = table.headers.map((h) => ({
      width: Math.round((h.width / MM_PER_CHARACTER) * 100) / 100,
    }));
    sheet.addRow(table.headers.map((h) => spreadsheetCell(h.element, warnings)));
    for (const row of table.rows) {
      sheet.addRow(row.cells.map((cell) => spreadsheetCell(cell.element, warnings)));
    }
  });
  if (tables.length === 0) workbook.addWorksheet("Sheet1");
}

export class XlsxTransformer extends DocumentTransformer {
  readonly format = "Xlsx";

  async parse(
    input: Buffer,
    _images: ImageBundle,
    _options?: TransformOptions,
  ): Promise<ParseResult> {
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.load(input as unknown as ExcelJS.Buffer);
    } catch (err) {
      throw new MalformedInputError("Input is not a readable XLSX workbook", { cause: err });
    }

    const tables: TableElement[] = [];
    workbook.eachSheet((sheet) => {
      const rows: string[][] = [];
      sheet.eachRow((row) => {
        const cells: string[] = [];
        row.eachCell({ includeEmpty: true }, (cell) => {
          cells.push(cellToString(cell));
        });
        rows.push(cells);
      });
      if (rows.length === 0) return;

      const table = tableFromStrings(rows);
      table.headers = table.headers.map((h, i) => {
        const width = sheet.getColumn(i + 1).width;
        return width === undefined
          ? h
          : tableHeader(h.element, Math.round(width * MM_PER_CHARACTER * 10) / 10);
      });
      tables.push(table);
    });

    return { document: createDocument(tables), images: new ImageBundle() };
  }

  async generate(
    document: Document,
    _images: ImageBundle,
    options?: TransformOptions,
  ): Promise<GenerateResult> {
    const workbook = new ExcelJS.Workbook();
    const warnings = options?.warnings ?? IGNORE_WARNINGS;
    tablesToSheets(workbook, topLevelTables(document, warnings), warnings);
    const bytes = await workbook.xlsx.writeBuffer();
    return { bytes: Buffer.from(bytes), images: new ImageBundle() };
  }
}
