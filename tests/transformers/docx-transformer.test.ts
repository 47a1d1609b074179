import JSZip from "jszip";
import { describe, it, expect } from "vitest";
import { MalformedInputError } from "../../src/errors.js";
import { ImageBundle } from "../../src/images.js";
import { createDocument, type Document } from "../../src/model/document.js";
import {
  header,
  hyperlink,
  inlineImage,
  keyedImage,
  list,
  listItem,
  pageBreak,
  paragraph,
  table,
  tableCell,
  tableFromStrings,
  tableHeader,
  tableRow,
  text,
} from "../../src/model/elements.js";
import { DocxTransformer } from "../../src/transformers/docx-transformer.js";
import { CollectingWarningSink } from "../../src/warnings.js";
import { PNG_BYTES, utf8 } from "../helpers.js";

describe("DocxTransformer", () => {
  const transformer = new DocxTransformer();

  async function part(doc: Document, name: string): Promise<string | undefined> {
    const result = await transformer.generate(doc, new ImageBundle());
    const zip = await JSZip.loadAsync(result.bytes);
    return zip.file(name)?.async("string");
  }

  async function roundTrip(doc: Document) {
    const generated = await transformer.generate(doc, new ImageBundle());
    return transformer.parse(generated.bytes, new ImageBundle());
  }

  describe("generate", () => {
    it("writes headings with their paragraph style", async () => {
      const xml = await part(createDocument([header(2, "Intro")]), "word/document.xml");
      expect(xml).toContain(
        '<w:p><w:pPr><w:pStyle w:val="Heading2"/></w:pPr><w:r><w:t xml:space="preserve">Intro</w:t></w:r></w:p>',
      );
    });

    it("sizes runs only when they leave the default", async () => {
      const xml = await part(
        createDocument([paragraph([text("big", 12), text("a<b")])]),
        "word/document.xml",
      );
      expect(xml).toContain(
        '<w:p><w:r><w:rPr><w:sz w:val="24"/><w:szCs w:val="24"/></w:rPr><w:t xml:space="preserve">big</w:t></w:r>' +
          '<w:r><w:t xml:space="preserve">a&lt;b</w:t></w:r></w:p>',
      );
    });

    it("writes page geometry into the section", async () => {
      const xml = await part(createDocument(), "word/document.xml");
      expect(xml).toContain('<w:pgSz w:w="11906" w:h="16838"/>');
      expect(xml).toContain('<w:pgMar w:top="567" w:right="567" w:bottom="567" w:left="567"');
    });

    it("relates hyperlinks as external targets", async () => {
      const rels = await part(
        createDocument([paragraph([hyperlink("site", "https://example.test")])]),
        "word/_rels/document.xml.rels",
      );
      expect(rels).toContain(
        '<Relationship Id="rId3" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/hyperlink" Target="https://example.test" TargetMode="External"/>',
      );
    });

    it("stores images as media sized from their pixels", async () => {
      const doc = createDocument([inlineImage(PNG_BYTES, "Png", "", "dot")]);
      const result = await transformer.generate(doc, new ImageBundle());
      const zip = await JSZip.loadAsync(result.bytes);
      const media = await zip.file("word/media/image1.png")?.async("nodebuffer");
      expect(media?.equals(PNG_BYTES)).toBe(true);
      expect(await zip.file("word/document.xml")?.async("string")).toContain(
        '<wp:extent cx="28575" cy="19050"/>',
      );
      expect(result.images.size).toBe(0);
    });

    it("adds header and footer parts only when the document has chrome", async () => {
      const plain = await transformer.generate(createDocument(), new ImageBundle());
      expect((await JSZip.loadAsync(plain.bytes)).file("word/header1.xml")).toBeNull();

      const xml = await part(
        createDocument([], { pageHeader: [paragraph([text("top")])] }),
        "word/header1.xml",
      );
      expect(xml).toContain('<w:r><w:t xml:space="preserve">top</w:t></w:r>');
    });
    it("warns when a table cell holds a page break", async () => {
      const warnings = new CollectingWarningSink();
      const doc = createDocument([table([tableHeader(text("h"))], [tableRow([tableCell(pageBreak())])])]);
      const result = await transformer.generate(doc, new ImageBundle(), { warnings });
      const xml = await (await JSZip.loadAsync(result.bytes)).file("word/document.xml")?.async("string");
      expect(xml).toContain('<w:tc><w:tcPr><w:tcW w:w="567" w:type="dxa"/></w:tcPr><w:p/></w:tc>');
      expect(warnings.warnings).toEqual([
        { variant: "PageBreak", reason: "Word table cells cannot break pages" },
      ]);
    });

    it("flattens a list nested in a paragraph into a warned run", async () => {
      const warnings = new CollectingWarningSink();
      const doc = createDocument([paragraph([list([listItem(text("x"))])])]);
      const result = await transformer.generate(doc, new ImageBundle(), { warnings });
      const xml = await (await JSZip.loadAsync(result.bytes)).file("word/document.xml")?.async("string");
      expect(xml).toContain('<w:body><w:p><w:r><w:t xml:space="preserve">x</w:t></w:r></w:p>');
      expect(warnings.warnings).toEqual([
        { variant: "List", reason: "Word runs hold text, links and pictures only" },
      ]);
    });
  });

  describe("parse", () => {
    it("reads back headings, paragraphs and links", async () => {
      const { document } = await roundTrip(
        createDocument([
          header(1, "Title"),
          paragraph([text("See "), hyperlink("site", "https://example.test/")]),
        ]),
      );
      expect(document.elements).toEqual([
        header(1, "Title"),
        paragraph([text("See "), hyperlink("site", "https://example.test/")]),
      ]);
    });

    it("reads back nested lists", async () => {
      const nested = createDocument([
        list([
          listItem(text("a")),
          listItem(text("b")),
          listItem(list([listItem(text("b1"))])),
          listItem(text("c")),
        ]),
      ]);
      const { document } = await roundTrip(nested);
      expect(document.elements).toEqual(nested.elements);
    });

    it("reads back numbered lists", async () => {
      const numbered = createDocument([list([listItem(text("x")), listItem(text("y"))], true)]);
      const { document } = await roundTrip(numbered);
      expect(document.elements).toEqual(numbered.elements);
    });

    it("reads back tables", async () => {
      const doc = createDocument([tableFromStrings([["h", "i"], ["1", "2"]])]);
      const { document } = await roundTrip(doc);
      expect(document.elements).toEqual(doc.elements);
    });

    it("reads page geometry and chrome from the package", async () => {
      const { document } = await roundTrip(
        createDocument([paragraph([text("body")])], {
          pageWidth: 148,
          leftPageIndent: 20,
          pageHeader: [paragraph([text("top")])],
          pageFooter: [paragraph([text("bottom")])],
        }),
      );
      expect(document.pageWidth).toBe(148);
      expect(document.pageHeight).toBe(297);
      expect(document.leftPageIndent).toBe(20);
      expect(document.pageHeader).toEqual([paragraph([text("top")])]);
      expect(document.pageFooter).toEqual([paragraph([text("bottom")])]);
    });

    it("keys embedded images and returns their bytes", async () => {
      const { document, images } = await roundTrip(
        createDocument([paragraph([inlineImage(PNG_BYTES, "Png", "", "dot")])]),
      );
      expect(document.elements).toEqual([
        paragraph([keyedImage("image1.png", "Png", "", "dot")]),
      ]);
      expect(images.keys()).toEqual(["image1.png"]);
    });

    it("rejects input that is not a DOCX package", async () => {
      await expect(transformer.parse(utf8("not a docx"), new ImageBundle())).rejects.toBeInstanceOf(
        MalformedInputError,
      );
    });
  });
});
