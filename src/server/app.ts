import { extname, posix } from "node:path";
import multipart from "@fastify/multipart";
import Fastify, { type FastifyInstance } from "fastify";
import JSZip from "jszip";
import {
  MalformedInputError,
  UnknownFormatError,
  isPolydocError,
  toPolydocError,
  type ErrorKind,
} from "../errors.js";
import { FORMAT_MIME_TYPES, parseFormat, type Format } from "../formats.js";
import { ImageBundle } from "../images.js";
import { Polydoc } from "../polydoc.js";

/** Upload extensions the endpoint reads, inside a zip archive or on their own. */
const UPLOAD_EXTENSIONS = new Set(["md", "html", "htm", "txt", "pdf", "json"]);

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  UnknownFormat: 400,
  MalformedInput: 400,
  UnsupportedFeature: 500,
  MissingImage: 500,
  IOFailure: 500,
  Internal: 500,
};

export interface ServerOptions {
  logLevel?: string;
  bodyLimit?: number;
  /** Set false to silence request logging. */
  logger?: boolean;
}

interface Upload {
  input: Buffer;
  from: Format;
  stem: string;
  images: ImageBundle;
}

function splitName(fileName: string): { stem: string; extension: string } {
  const ext = extname(fileName);
  return {
    stem: ext ? fileName.slice(0, -ext.length) : fileName,
    extension: ext.slice(1).toLowerCase(),
  };
}

function uploadFormat(fileName: string, extension: string): Format {
  const format = UPLOAD_EXTENSIONS.has(extension) ? parseFormat(extension) : undefined;
  if (!format) {
    throw new UnknownFormatError(extension || fileName, `Unsupported upload: ${fileName}`);
  }
  return format;
}

/**
 * A zip holds one document plus the images it references, keyed by their
 * path relative to the document's directory.
 */
async function unpackZip(bytes: Buffer): Promise<Upload> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (err) {
    throw new MalformedInputError("Upload is not a readable zip archive", { cause: err });
  }
  const files = Object.values(zip.files).filter((entry) => !entry.dir);
  const documents = files.filter((entry) => UPLOAD_EXTENSIONS.has(splitName(entry.name).extension));
  const [document, ...others] = documents;
  if (!document) throw new MalformedInputError("The zip archive holds no document to convert");
  if (others.length > 0) throw new MalformedInputError("The zip archive holds more than one document");

  const base = posix.dirname(document.name);
  const images = new ImageBundle();
  for (const entry of files) {
    if (entry === document) continue;
    const key = base !== "." && entry.name.startsWith(`${base}/`) ? entry.name.slice(base.length + 1) : entry.name;
    images.set(key, await entry.async("nodebuffer"));
  }
  const { stem, extension } = splitName(document.name.split("/").pop() ?? document.name);
  return {
    input: await document.async("nodebuffer"),
    from: uploadFormat(document.name, extension),
    stem,
    images,
  };
}

async function unpackUpload(fileName: string, bytes: Buffer): Promise<Upload> {
  const { stem, extension } = splitName(fileName);
  if (extension === "zip") {
    const upload = await unpackZip(bytes);
    return { ...upload, stem };
  }
  return { input: bytes, from: uploadFormat(fileName, extension), stem, images: new ImageBundle() };
}

export async function buildServer(options: ServerOptions = {}): Promise<FastifyInstance> {
  const bodyLimit = options.bodyLimit ?? 50 * 1024 * 1024;
  const app = Fastify({
    logger: options.logger === false ? false : { level: options.logLevel ?? "info" },
    bodyLimit,
  });
  await app.register(multipart, { limits: { fileSize: bodyLimit, files: 1 } });

  const polydoc = new Polydoc();

  app.setErrorHandler((err, request, reply) => {
    const error = isPolydocError(err)
      ? err
      : err.statusCode !== undefined && err.statusCode < 500
        ? new MalformedInputError(err.message, { cause: err })
        : toPolydocError(err);
    const status = STATUS_BY_KIND[error.kind];
    if (status >= 500) request.log.error({ err }, "conversion failed");
    else request.log.warn({ kind: error.kind }, error.message);
    reply.status(status).send({ error: error.kind, message: error.message });
  });

  app.get("/health", async () => ({ status: "ok" }));

  app.post<{ Params: { format: string } }>("/upload/:format", async (request, reply) => {
    const outputName = request.params.format.toLowerCase();
    const to = parseFormat(outputName);
    if (!to) throw new UnknownFormatError(request.params.format);

    const file = await request.file();
    if (!file) throw new MalformedInputError("Expected a multipart file part");
    const upload = await unpackUpload(file.filename, await file.toBuffer());

    const result = await polydoc.convert(upload.input, upload.from, to, { images: upload.images });
    request.log.info({ from: upload.from, to, size: result.bytes.length }, "converted upload");
    return reply
      .header("content-type", FORMAT_MIME_TYPES[to])
      .header("content-disposition", `attachment; filename="${upload.stem.replace(/["\\\r\n]/g, "_")}.${outputName}"`)
      .send(result.bytes);
  });

  return app;
}
