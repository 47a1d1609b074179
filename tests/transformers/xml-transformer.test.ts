import { describe, it, expect } from "vitest";
import { MalformedInputError, MissingImageError } from "../../src/errors.js";
import { ImageBundle } from "../../src/images.js";
import { createDocument } from "../../src/model/document.js";
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
  tableHeader,
  tableRow,
  text,
} from "../../src/model/elements.js";
import { XmlTransformer } from "../../src/transformers/xml-transformer.js";
import { GIF_BYTES, PNG_BYTES, utf8 } from "../helpers.js";

describe("XmlTransformer", () => {
  const transformer = new XmlTransformer();

  describe("parse", () => {
    it("reads geometry, chrome and elements", async () => {
      const input = utf8(`<?xml version="1.0" encoding="UTF-8"?>
<document page_width="148" page_height="210">
  <page_header><text size="6">top</text></page_header>
  <elements>
    <header level="2">Intro</header>
    <paragraph>
      <text>plain</text>
      <hyperlink url="https://example.test" alt="hint">link</hyperlink>
    </paragraph>
    <list numbered="true">
      <list_item><text>one</text></list_item>
    </list>
    <page_break/>
  </elements>
</document>`);
      const { document } = await transformer.parse(input, new ImageBundle());
      expect(document).toEqual(
        createDocument(
          [
            header(2, "Intro"),
            paragraph([text("plain"), hyperlink("link", "https://example.test", "hint")]),
            list([listItem(text("one"))], true),
            pageBreak(),
          ],
          { pageWidth: 148, pageHeight: 210, pageHeader: [text("top", 6)] },
        ),
      );
    });

    it("reads tables with header widths", async () => {
      const input = utf8(
        "<document><elements><table>" +
          '<table_header width="25"><text>h</text></table_header>' +
          "<table_row><table_cell><text>c</text></table_cell></table_row>" +
          "</table></elements></document>",
      );
      const { document } = await transformer.parse(input, new ImageBundle());
      expect(document.elements).toEqual([
        table([tableHeader(text("h"), 25)], [tableRow([tableCell(text("c"))])]),
      ]);
    });

    it("resolves keyed images from the bundle", async () => {
      const input = utf8(
        '<document><elements><image key="a.gif" image_type="Gif"/></elements></document>',
      );
      const { document, images } = await transformer.parse(
        input,
        ImageBundle.from([["a.gif", GIF_BYTES]]),
      );
      expect(document.elements).toEqual([keyedImage("a.gif", "Gif")]);
      expect(images.get("a.gif")).toBe(GIF_BYTES);
    });

    it("reports a keyed image missing from the bundle", async () => {
      const input = utf8(
        '<document><elements><image key="a.gif" image_type="Gif"/></elements></document>',
      );
      await expect(transformer.parse(input, new ImageBundle())).rejects.toBeInstanceOf(
        MissingImageError,
      );
    });

    it("rejects unknown elements", async () => {
      const input = utf8("<document><elements><marquee/></elements></document>");
      await expect(transformer.parse(input, new ImageBundle())).rejects.toThrow(
        "Unknown element <marquee>",
      );
    });

    it("rejects a document without a root", async () => {
      await expect(transformer.parse(utf8("<other/>"), new ImageBundle())).rejects.toThrow(
        "Missing <document> root element",
      );
    });

    it("rejects malformed XML", async () => {
      await expect(
        transformer.parse(utf8("<document><elements></document>"), new ImageBundle()),
      ).rejects.toBeInstanceOf(MalformedInputError);
    });

    it("rejects non-numeric sizes", async () => {
      const input = utf8('<document><elements><text size="big">x</text></elements></document>');
      await expect(transformer.parse(input, new ImageBundle())).rejects.toThrow(
        "<text> has a non-numeric size: big",
      );
    });

    it("rejects list items holding two elements", async () => {
      const input = utf8(
        "<document><elements><list><list_item><text>a</text><text>b</text></list_item></list></elements></document>",
      );
      await expect(transformer.parse(input, new ImageBundle())).rejects.toThrow(
        "<list_item> must hold exactly one element",
      );
    });
  });

  describe("generate", () => {
    it("starts with an XML declaration", async () => {
      const result = await transformer.generate(createDocument(), new ImageBundle());
      expect(result.bytes.toString("utf-8").startsWith('<?xml version="1.0" encoding="UTF-8"?>\n')).toBe(
        true,
      );
    });

    it("writes text with its size attribute", async () => {
      const result = await transformer.generate(
        createDocument([text("hi", 12)]),
        new ImageBundle(),
      );
      expect(result.bytes.toString("utf-8")).toContain('<text size="12">hi</text>');
    });

    it("round-trips a document exactly", async () => {
      const doc = createDocument(
        [
          header(1, "a < b & c"),
          paragraph([text("x"), hyperlink("y", "https://example.test/?q=1&r=2")]),
          list([listItem(text("one")), listItem(list([listItem(text("two"))], true))]),
          table([tableHeader(text("h"), 30)], [tableRow([tableCell(paragraph([text("c")]))])]),
          inlineImage(PNG_BYTES, "Png", "t", "a"),
          pageBreak(),
        ],
        { leftPageIndent: 20, pageFooter: [paragraph([text("page")])] },
      );
      const generated = await transformer.generate(doc, new ImageBundle());
      const { document } = await transformer.parse(generated.bytes, new ImageBundle());
      expect(document).toEqual(doc);
    });

    it("carries keyed images out alongside the output", async () => {
      const doc = createDocument([keyedImage("pic.png", "Png")]);
      const result = await transformer.generate(doc, ImageBundle.from([["pic.png", PNG_BYTES]]));
      expect(result.images.keys()).toEqual(["pic.png"]);
    });
  });
});
