import { describe, it, expect } from "vitest";
import {
  FORMATS,
  FORMAT_EXTENSIONS,
  detectFormat,
  formatFromFileName,
  isFormat,
  parseFormat,
} from "../src/formats.js";
import { PNG_BYTES, utf8 } from "./helpers.js";

describe("formats", () => {
  it("enumerates twelve formats", () => {
    expect(FORMATS).toHaveLength(12);
    expect(FORMAT_EXTENSIONS.Markdown).toBe("md");
  });

  describe("parseFormat", () => {
    it("accepts tags and extensions case-insensitively", () => {
      expect(parseFormat("Markdown")).toBe("Markdown");
      expect(parseFormat("MD")).toBe("Markdown");
      expect(parseFormat(".htm")).toBe("Html");
      expect(parseFormat("plaintext")).toBe("PlainText");
      expect(parseFormat("txt")).toBe("PlainText");
    });

    it("rejects unknown names", () => {
      expect(parseFormat("typst")).toBeUndefined();
      expect(isFormat("typst")).toBe(false);
      expect(isFormat("Xls")).toBe(true);
    });
  });

  describe("formatFromFileName", () => {
    it("uses the extension", () => {
      expect(formatFromFileName("notes/report.DOCX")).toBe("Docx");
      expect(formatFromFileName("README")).toBeUndefined();
    });
  });

  describe("detectFormat", () => {
    it("prefers the file name", async () => {
      expect(await detectFormat(utf8("a,b"), "data.csv")).toBe("Csv");
    });

    it("sniffs PDF bytes without a name", async () => {
      expect(await detectFormat(utf8("%PDF-1.7\n%\xe2\xe3\xcf\xd3\n"))).toBe("Pdf");
    });

    it("gives up on formats it does not know", async () => {
      expect(await detectFormat(PNG_BYTES)).toBeUndefined();
    });
  });
});
