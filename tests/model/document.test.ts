import { describe, it, expect } from "vitest";
import { ImageBundle } from "../../src/images.js";
import { MissingImageError } from "../../src/errors.js";
import {
  DEFAULT_PAGE_GEOMETRY,
  createDocument,
  documentsEqual,
  elementsEqual,
  externalizeImages,
  materializeImages,
  topLevel,
  walk,
  walkDocument,
} from "../../src/model/document.js";
import {
  header,
  inlineImage,
  keyedImage,
  list,
  listItem,
  paragraph,
  tableFromStrings,
  text,
} from "../../src/model/elements.js";

describe("document", () => {
  describe("createDocument", () => {
    it("defaults to A4 with 10 mm indents and no page chrome", () => {
      const doc = createDocument();
      expect(doc).toEqual({ ...DEFAULT_PAGE_GEOMETRY, elements: [], pageHeader: [], pageFooter: [] });
      expect(doc.pageWidth).toBe(210);
      expect(doc.pageHeight).toBe(297);
    });

    it("takes geometry overrides", () => {
      const doc = createDocument([text("x")], { pageWidth: 100, pageHeader: [text("h")] });
      expect(doc.pageWidth).toBe(100);
      expect(doc.pageHeight).toBe(297);
      expect(doc.pageHeader).toEqual([text("h")]);
    });
  });

  describe("walk", () => {
    it("topLevel yields only the body's blocks", () => {
      const doc = createDocument([list([listItem(text("a"))]), text("b")], { pageHeader: [text("h")] });
      expect([...topLevel(doc)].map((e) => e.kind)).toEqual(["List", "Text"]);
    });

    it("visits parents before children", () => {
      const kinds = [...walk([list([listItem(paragraph([text("a")]))])])].map((e) => e.kind);
      expect(kinds).toEqual(["List", "ListItem", "Paragraph", "Text"]);
    });

    it("covers header, body and footer in that order", () => {
      const doc = createDocument([text("body")], {
        pageHeader: [text("top")],
        pageFooter: [text("bottom")],
      });
      const texts = [...walkDocument(doc)].map((e) => (e.kind === "Text" ? e.text : ""));
      expect(texts).toEqual(["top", "body", "bottom"]);
    });
  });

  describe("equality", () => {
    it("compares structure and attributes", () => {
      expect(elementsEqual(text("a"), text("a"))).toBe(true);
      expect(elementsEqual(text("a"), text("a", 9))).toBe(false);
      expect(elementsEqual(header(1, "a"), text("a"))).toBe(false);
      expect(
        documentsEqual(
          createDocument([tableFromStrings([["a"], ["1"]])]),
          createDocument([tableFromStrings([["a"], ["1"]])]),
        ),
      ).toBe(true);
    });

    it("never equates inline and keyed images", () => {
      const bytes = new Uint8Array([1, 2, 3]);
      expect(elementsEqual(inlineImage(bytes, "Png"), inlineImage(new Uint8Array([1, 2, 3]), "Png"))).toBe(true);
      expect(elementsEqual(inlineImage(bytes, "Png"), keyedImage("a.png", "Png"))).toBe(false);
    });
  });

  describe("image normalization", () => {
    it("externalizes inline images under numbered keys", () => {
      const bytes = new Uint8Array([9]);
      const { document, images } = externalizeImages(
        createDocument([paragraph([inlineImage(bytes, "Jpeg", "t", "a")])]),
      );
      expect(document.elements).toEqual([paragraph([keyedImage("image0.jpg", "Jpeg", "t", "a")])]);
      expect(images.get("image0.jpg")).toBe(bytes);
    });

    it("materializes keyed images from the bundle", () => {
      const bytes = new Uint8Array([7]);
      const doc = createDocument([keyedImage("pic.png", "Png")]);
      const materialized = materializeImages(doc, ImageBundle.from([["pic.png", bytes]]));
      expect(materialized.elements).toEqual([inlineImage(bytes, "Png")]);
    });

    it("fails on keys the bundle lacks", () => {
      const doc = createDocument([keyedImage("pic.png", "Png")]);
      expect(() => materializeImages(doc, new ImageBundle())).toThrow(MissingImageError);
    });
  });
});
