import { describe, it, expect } from "vitest";
import { MalformedInputError } from "../../src/errors.js";
import { ImageBundle } from "../../src/images.js";
import { createDocument, type Document } from "../../src/model/document.js";
import {
  header,
  hyperlink,
  inlineImage,
  list,
  listItem,
  pageBreak,
  paragraph,
  table,
  tableCell,
  tableHeader,
  tableRow,
  text,
} from "../../src/model/elements.js";
import { PdfTransformer } from "../../src/transformers/pdf-transformer.js";
import { CollectingWarningSink } from "../../src/warnings.js";
import { GIF_BYTES, PNG_BYTES, utf8 } from "../helpers.js";

describe("PdfTransformer", () => {
  const transformer = new PdfTransformer();

  async function roundTrip(doc: Document): Promise<Document> {
    const generated = await transformer.generate(doc, new ImageBundle());
    const { document } = await transformer.parse(generated.bytes, new ImageBundle());
    return document;
  }

  it("writes a PDF file", async () => {
    const result = await transformer.generate(
      createDocument([paragraph([text("hello")])]),
      new ImageBundle(),
    );
    expect(result.bytes.toString("latin1", 0, 5)).toBe("%PDF-");
  });

  it("recovers headings from their font size", async () => {
    const document = await roundTrip(
      createDocument([header(1, "Report"), paragraph([text("Body text here.")])]),
    );
    expect(document.elements).toEqual([header(1, "Report"), paragraph([text("Body text here.")])]);
  });

  it("reads the page size of the first page", async () => {
    const document = await roundTrip(createDocument([paragraph([text("x")])]));
    expect(document.pageWidth).toBe(210);
    expect(document.pageHeight).toBe(297);
  });

  it("recovers bulleted lists", async () => {
    const document = await roundTrip(
      createDocument([list([listItem(text("first")), listItem(text("second"))])]),
    );
    expect(document.elements).toEqual([
      list([listItem(text("first")), listItem(text("second"))]),
    ]);
  });

  it("separates pages with page breaks", async () => {
    const document = await roundTrip(
      createDocument([paragraph([text("one")]), pageBreak(), paragraph([text("two")])]),
    );
    expect(document.elements).toEqual([
      paragraph([text("one")]),
      pageBreak(),
      paragraph([text("two")]),
    ]);
  });

  it("recovers hyperlinks from link annotations", async () => {
    const document = await roundTrip(
      createDocument([paragraph([hyperlink("site", "https://example.test/docs")])]),
    );
    expect(document.elements).toEqual([
      paragraph([hyperlink("site", "https://example.test/docs")]),
    ]);
  });

  it("draws page chrome above the body", async () => {
    const document = await roundTrip(
      createDocument([paragraph([text("body")])], { pageHeader: [paragraph([text("top")])] }),
    );
    expect(document.elements).toEqual([paragraph([text("top")]), paragraph([text("body")])]);
  });

  it("embeds PNG images without warnings", async () => {
    const warnings = new CollectingWarningSink();
    await transformer.generate(createDocument([inlineImage(PNG_BYTES, "Png")]), new ImageBundle(), {
      warnings,
    });
    expect(warnings.warnings).toEqual([]);
  });

  it("warns about what it cannot draw", async () => {
    const warnings = new CollectingWarningSink();
    await transformer.generate(
      createDocument([inlineImage(GIF_BYTES, "Gif"), paragraph([text("日本")])]),
      new ImageBundle(),
      { warnings },
    );
    expect(warnings.warnings).toEqual([
      { variant: "Image", reason: "PDF pictures are PNG or JPEG only" },
      { variant: "Text", reason: "characters outside WinAnsi were replaced with ?" },
    ]);
  });

  it("warns once for each element it flattens into text", async () => {
    const warnings = new CollectingWarningSink();
    await transformer.generate(
      createDocument([
        paragraph([list([listItem(text("x"))])]),
        table([tableHeader(text("h"))], [tableRow([tableCell(hyperlink("site", "https://example.test"))])]),
      ]),
      new ImageBundle(),
      { warnings },
    );
    expect(warnings.warnings).toEqual([
      { variant: "List", reason: "PDF runs hold text, links and pictures only" },
      { variant: "Hyperlink", reason: "PDF table cells hold text only" },
    ]);
  });

  it("rejects input that is not a PDF", async () => {
    await expect(transformer.parse(utf8("not a pdf"), new ImageBundle())).rejects.toBeInstanceOf(
      MalformedInputError,
    );
  });
});
