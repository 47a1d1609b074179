import type { DocumentTransformer } from "../base-transformer.js";
import { CsvTransformer } from "./csv-transformer.js";
import { DocxTransformer } from "./docx-transformer.js";
import { HtmlTransformer } from "./html-transformer.js";
import { JsonTransformer } from "./json-transformer.js";
import { MarkdownTransformer } from "./markdown-transformer.js";
import { OdsTransformer } from "./ods-transformer.js";
import { PdfTransformer } from "./pdf-transformer.js";
import { PlainTextTransformer } from "./plain-text-transformer.js";
import { RtfTransformer } from "./rtf-transformer.js";
import { XlsTransformer } from "./xls-transformer.js";
import { XlsxTransformer } from "./xlsx-transformer.js";
import { XmlTransformer } from "./xml-transformer.js";

export { CsvTransformer } from "./csv-transformer.js";
export { DocxTransformer } from "./docx-transformer.js";
export { HtmlReader, HtmlTransformer } from "./html-transformer.js";
export { JsonTransformer } from "./json-transformer.js";
export { MarkdownTransformer } from "./markdown-transformer.js";
export { OdsTransformer } from "./ods-transformer.js";
export { PdfTransformer } from "./pdf-transformer.js";
export { detectTables } from "./pdf-tables.js";
export type { PageRegion, PositionedWord, TableDetectorOptions } from "./pdf-tables.js";
export { PlainTextTransformer } from "./plain-text-transformer.js";
export { RtfTransformer, escapeRtf } from "./rtf-transformer.js";
export { XlsTransformer } from "./xls-transformer.js";
export { XlsxTransformer } from "./xlsx-transformer.js";
export { XmlTransformer } from "./xml-transformer.js";

/** One instance of every built-in transformer. */
export function builtinTransformers(): DocumentTransformer[] {
  return [
    new PlainTextTransformer(),
    new MarkdownTransformer(),
    new HtmlTransformer(),
    new PdfTransformer(),
    new DocxTransformer(),
    new RtfTransformer(),
    new JsonTransformer(),
    new XmlTransformer(),
    new CsvTransformer(),
    new OdsTransformer(),
    new XlsxTransformer(),
    new XlsTransformer(),
  ];
}
