import { describe, it, expect } from "vitest";
import { MalformedInputError, MissingImageError } from "../../src/errors.js";
import { ImageBundle } from "../../src/images.js";
import { DEFAULT_PAGE_GEOMETRY, createDocument } from "../../src/model/document.js";
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
  tableFromStrings,
  tableHeader,
  text,
} from "../../src/model/elements.js";
import { JsonTransformer } from "../../src/transformers/json-transformer.js";
import { PNG_BYTES, utf8 } from "../helpers.js";

describe("JsonTransformer", () => {
  const transformer = new JsonTransformer();

  describe("parse", () => {
    it("fills in defaults for omitted fields", async () => {
      const input = utf8(JSON.stringify({ elements: [{ Text: { text: "hello" } }] }));
      const { document } = await transformer.parse(input, new ImageBundle());
      expect(document).toEqual(createDocument([text("hello")]));
    });

    it("reads page geometry and page chrome", async () => {
      const input = utf8(
        JSON.stringify({
          elements: [],
          page_width: 100,
          left_page_indent: 5,
          page_header: [{ Paragraph: { elements: [{ Text: { text: "top", size: 6 } }] } }],
        }),
      );
      const { document } = await transformer.parse(input, new ImageBundle());
      expect(document.pageWidth).toBe(100);
      expect(document.leftPageIndent).toBe(5);
      expect(document.pageHeight).toBe(DEFAULT_PAGE_GEOMETRY.pageHeight);
      expect(document.pageHeader).toEqual([paragraph([text("top", 6)])]);
      expect(document.pageFooter).toEqual([]);
    });

    it("clamps header levels", async () => {
      const input = utf8(JSON.stringify({ elements: [{ Header: { level: 9, text: "deep" } }] }));
      const { document } = await transformer.parse(input, new ImageBundle());
      expect(document.elements).toEqual([header(6, "deep")]);
    });

    it("decodes inline image bytes", async () => {
      const input = utf8(
        JSON.stringify({
          elements: [{ Image: { bytes: PNG_BYTES.toString("base64"), image_type: "Png" } }],
        }),
      );
      const { document } = await transformer.parse(input, new ImageBundle());
      expect(document.elements).toEqual([inlineImage(PNG_BYTES, "Png")]);
    });

    it("resolves keyed images from the bundle", async () => {
      const input = utf8(
        JSON.stringify({ elements: [{ Image: { key: "pic.png", image_type: "Png" } }] }),
      );
      const { document, images } = await transformer.parse(
        input,
        ImageBundle.from([["pic.png", PNG_BYTES]]),
      );
      expect(document.elements).toEqual([keyedImage("pic.png", "Png")]);
      expect(images.keys()).toEqual(["pic.png"]);
    });

    it("reports a keyed image missing from the bundle", async () => {
      const input = utf8(
        JSON.stringify({ elements: [{ Image: { key: "pic.png", image_type: "Png" } }] }),
      );
      const error = await transformer.parse(input, new ImageBundle()).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(MissingImageError);
      expect(error).toMatchObject({ key: "pic.png" });
    });

    it("reads empty input as an empty document", async () => {
      const { document } = await transformer.parse(utf8("  \n"), new ImageBundle());
      expect(document).toEqual(createDocument());
    });

    it("rejects invalid JSON", async () => {
      await expect(transformer.parse(utf8("{"), new ImageBundle())).rejects.toThrow(
        "Input is not valid JSON",
      );
    });

    it("rejects unknown variants", async () => {
      const input = utf8(JSON.stringify({ elements: [{ Bogus: {} }] }));
      await expect(transformer.parse(input, new ImageBundle())).rejects.toThrow(
        /^Input does not match the document schema at elements\.0/,
      );
    });

    it("rejects an image with both bytes and a key", async () => {
      const input = utf8(
        JSON.stringify({
          elements: [{ Image: { bytes: "AA==", key: "a.png", image_type: "Png" } }],
        }),
      );
      await expect(transformer.parse(input, new ImageBundle())).rejects.toBeInstanceOf(
        MalformedInputError,
      );
    });

    it("rejects list children that are not list items", async () => {
      const input = utf8(
        JSON.stringify({
          elements: [{ List: { elements: [{ Text: { text: "loose" } }], numbered: false } }],
        }),
      );
      await expect(transformer.parse(input, new ImageBundle())).rejects.toThrow(
        "List elements must be ListItem",
      );
    });
  });

  describe("generate", () => {
    it("writes every variant as a single-key object", async () => {
      const doc = createDocument([
        header(1, "T"),
        paragraph([text("a"), hyperlink("site", "https://example.test")]),
        list([listItem(text("i"))], true),
        tableFromStrings([["h"], ["c"]]),
        pageBreak(),
      ]);
      const result = await transformer.generate(doc, new ImageBundle());
      expect(JSON.parse(result.bytes.toString("utf-8"))).toEqual({
        elements: [
          { Header: { level: 1, text: "T" } },
          {
            Paragraph: {
              elements: [
                { Text: { text: "a", size: 8 } },
                {
                  Hyperlink: { title: "site", url: "https://example.test", alt: "", size: 8 },
                },
              ],
            },
          },
          {
            List: {
              elements: [{ ListItem: { element: { Text: { text: "i", size: 8 } } } }],
              numbered: true,
            },
          },
          {
            Table: {
              headers: [{ TableHeader: { element: { Text: { text: "h", size: 8 } }, width: 10 } }],
              rows: [
                { TableRow: { cells: [{ TableCell: { element: { Text: { text: "c", size: 8 } } } }] } },
              ],
            },
          },
          { PageBreak: {} },
        ],
        page_width: 210,
        page_height: 297,
        left_page_indent: 10,
        right_page_indent: 10,
        top_page_indent: 10,
        bottom_page_indent: 10,
        page_header: [],
        page_footer: [],
      });
    });

    it("round-trips a document exactly", async () => {
      const doc = createDocument(
        [
          header(2, "Section"),
          paragraph([text("body", 11), hyperlink("x", "https://example.test", "alt")]),
          list([listItem(text("one")), listItem(list([listItem(text("nested"))]))]),
          inlineImage(PNG_BYTES, "Png", "title", "alt"),
        ],
        { pageWidth: 150, pageFooter: [paragraph([text("foot")])] },
      );
      const generated = await transformer.generate(doc, new ImageBundle());
      const { document } = await transformer.parse(generated.bytes, new ImageBundle());
      expect(document).toEqual(doc);
    });

    it("writes an empty document as bare geometry", async () => {
      const result = await transformer.generate(createDocument(), new ImageBundle());
      expect(result.bytes.toString("utf-8")).toBe(
        '{"elements":[],"page_width":210,"page_height":297,"left_page_indent":10,"right_page_indent":10,' +
          '"top_page_indent":10,"bottom_page_indent":10,"page_header":[],"page_footer":[]}',
      );
      const { document } = await transformer.parse(result.bytes, new ImageBundle());
      expect(document).toEqual(createDocument());
    });

    it("keeps a table without rows", async () => {
      const doc = createDocument([table([tableHeader(text("a")), tableHeader(text("b"), 25)])]);
      const generated = await transformer.generate(doc, new ImageBundle());
      expect(JSON.parse(generated.bytes.toString("utf-8")).elements[0].Table.rows).toEqual([]);
      const { document } = await transformer.parse(generated.bytes, new ImageBundle());
      expect(document).toEqual(doc);
    });

    it("carries keyed images out alongside the output", async () => {
      const doc = createDocument([keyedImage("pic.png", "Png")]);
      const result = await transformer.generate(doc, ImageBundle.from([["pic.png", PNG_BYTES]]));
      expect(JSON.parse(result.bytes.toString("utf-8")).elements).toEqual([
        { Image: { key: "pic.png", title: "", alt: "", image_type: "Png" } },
      ]);
      expect(result.images.get("pic.png")).toBe(PNG_BYTES);
    });

    it("fails on a keyed image missing from the bundle", async () => {
      const doc = createDocument([keyedImage("gone.png", "Png")]);
      await expect(transformer.generate(doc, new ImageBundle())).rejects.toBeInstanceOf(
        MissingImageError,
      );
    });
  });
});
