import { extname } from "node:path";
import { fileTypeFromBuffer } from "file-type";

export const FORMATS = [
  "PlainText",
  "Markdown",
  "Html",
  "Pdf",
  "Docx",
  "Rtf",
  "Json",
  "Xml",
  "Csv",
  "Ods",
  "Xlsx",
  "Xls",
] as const;

export type Format = (typeof FORMATS)[number];

export const FORMAT_EXTENSIONS: Record<Format, string> = {
  PlainText: "txt",
  Markdown: "md",
  Html: "html",
  Pdf: "pdf",
  Docx: "docx",
  Rtf: "rtf",
  Json: "json",
  Xml: "xml",
  Csv: "csv",
  Ods: "ods",
  Xlsx: "xlsx",
  Xls: "xls",
};

export const FORMAT_MIME_TYPES: Record<Format, string> = {
  PlainText: "text/plain; charset=utf-8",
  Markdown: "text/markdown; charset=utf-8",
  Html: "text/html; charset=utf-8",
  Pdf: "application/pdf",
  Docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  Rtf: "application/rtf",
  Json: "application/json",
  Xml: "application/xml",
  Csv: "text/csv; charset=utf-8",
  Ods: "application/vnd.oasis.opendocument.spreadsheet",
  Xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  Xls: "application/vnd.ms-excel",
};

const ALIASES: Record<string, Format> = {
  plaintext: "PlainText",
  text: "PlainText",
  txt: "PlainText",
  markdown: "Markdown",
  md: "Markdown",
  html: "Html",
  htm: "Html",
  pdf: "Pdf",
  docx: "Docx",
  rtf: "Rtf",
  json: "Json",
  xml: "Xml",
  csv: "Csv",
  ods: "Ods",
  xlsx: "Xlsx",
  xls: "Xls",
};

const FORMATS_BY_MIME: Record<string, Format> = {
  "application/pdf": "Pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document": "Docx",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet": "Xlsx",
  "application/vnd.oasis.opendocument.spreadsheet": "Ods",
  "application/x-cfb": "Xls",
  "application/rtf": "Rtf",
  "application/xml": "Xml",
};

export function isFormat(value: unknown): value is Format {
  return typeof value === "string" && (FORMATS as readonly string[]).includes(value);
}

/** Accepts a tag (`Markdown`) or an extension (`md`, `.md`), case-insensitively. */
export function parseFormat(name: string): Format | undefined {
  return ALIASES[name.trim().replace(/^\./, "").toLowerCase()];
}

export function formatFromFileName(fileName: string): Format | undefined {
  const ext = extname(fileName);
  return ext ? parseFormat(ext) : undefined;
}

/** Picks a format from the file name, falling back to sniffing the bytes. */
export async function detectFormat(
  input: Uint8Array,
  fileName?: string,
): Promise<Format | undefined> {
  const byName = fileName ? formatFromFileName(fileName) : undefined;
  if (byName) return byName;
  const detected = await fileTypeFromBuffer(input);
  return detected ? FORMATS_BY_MIME[detected.mime] : undefined;
}
