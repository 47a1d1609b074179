import type { FastifyInstance } from "fastify";
import JSZip from "jszip";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { buildServer } from "../../src/server/app.js";
import { PNG_BYTES } from "../helpers.js";

const BOUNDARY = "----polydoc-test-boundary";

function multipartBody(fileName: string, content: Buffer | string): Buffer {
  return Buffer.concat([
    Buffer.from(
      `--${BOUNDARY}\r\n` +
        `Content-Disposition: form-data; name="file"; filename="${fileName}"\r\n` +
        "Content-Type: application/octet-stream\r\n\r\n",
    ),
    Buffer.isBuffer(content) ? content : Buffer.from(content, "utf-8"),
    Buffer.from(`\r\n--${BOUNDARY}--\r\n`),
  ]);
}

function upload(app: FastifyInstance, format: string, fileName: string, content: Buffer | string) {
  return app.inject({
    method: "POST",
    url: `/upload/${format}`,
    headers: { "content-type": `multipart/form-data; boundary=${BOUNDARY}` },
    payload: multipartBody(fileName, content),
  });
}

describe("server", () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await buildServer({ logger: false });
  });

  afterEach(async () => {
    await app.close();
  });

  it("answers health checks", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok" });
  });

  it("converts an uploaded file", async () => {
    const response = await upload(app, "txt", "notes.md", "# Title\n\nBody paragraph.\n");
    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toBe("text/plain; charset=utf-8");
    expect(response.headers["content-disposition"]).toBe('attachment; filename="notes.txt"');
    expect(response.body).toBe("Title\nBody paragraph.\n");
  });

  it("names the output after the requested format", async () => {
    const response = await upload(app, "MD", "page.html", "<h1>Hi</h1>");
    expect(response.statusCode).toBe(200);
    expect(response.headers["content-disposition"]).toBe('attachment; filename="page.md"');
    expect(response.body).toBe("# Hi\n");
  });

  it("resolves images from a zip upload relative to the document", async () => {
    const zip = new JSZip();
    zip.file("docs/readme.md", "![p](img/p.png)\n");
    zip.file("docs/img/p.png", PNG_BYTES);
    const bytes = await zip.generateAsync({ type: "nodebuffer" });

    const response = await upload(app, "json", "bundle.zip", bytes);
    expect(response.statusCode).toBe(200);
    expect(response.headers["content-disposition"]).toBe('attachment; filename="bundle.json"');
    expect(response.json().elements).toEqual([
      { Paragraph: { elements: [{ Image: { key: "img/p.png", title: "", alt: "p", image_type: "Png" } }] } },
    ]);
  });

  it("rejects a zip without a document", async () => {
    const zip = new JSZip();
    zip.file("p.png", PNG_BYTES);
    const bytes = await zip.generateAsync({ type: "nodebuffer" });

    const response = await upload(app, "json", "bundle.zip", bytes);
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: "MalformedInput",
      message: "The zip archive holds no document to convert",
    });
  });

  it("rejects an unknown output format", async () => {
    const response = await upload(app, "docz", "notes.md", "x");
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: "UnknownFormat", message: "Unknown format: docz" });
  });

  it("rejects uploads it cannot read", async () => {
    const response = await upload(app, "txt", "tool.exe", "MZ");
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: "UnknownFormat", message: "Unsupported upload: tool.exe" });
  });

  it("rejects a request without a file part", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/upload/txt",
      headers: { "content-type": "application/json" },
      payload: { text: "hi" },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe("MalformedInput");
  });

  it("reports missing images as server errors", async () => {
    const response = await upload(app, "html", "doc.md", "![x](gone.png)\n");
    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: "MissingImage", message: "Missing image: gone.png" });
  });
});
