import { IoFailureError, isPolydocError } from "./errors.js";
import type { Format } from "./formats.js";
import { BundleImageLoader, type ImageBundle, type ImageLoader, type ImageSink } from "./images.js";
import type { Document } from "./model/document.js";
import type { WarningSink } from "./warnings.js";

export interface TransformOptions {
  /** Collects the elements a generator had to drop. */
  warnings?: WarningSink;
  /** Character set of text input; detected or UTF-8 when absent. */
  charset?: string;
}

export interface ParseResult {
  document: Document;
  /** Images the document references by key. */
  images: ImageBundle;
}

export interface GenerateResult {
  bytes: Buffer;
  /** Images the generator externalized alongside `bytes`. */
  images: ImageBundle;
}

export abstract class DocumentTransformer {
  abstract readonly format: Format;

  abstract parse(
    input: Buffer,
    images: ImageBundle,
    options?: TransformOptions,
  ): Promise<ParseResult>;

  abstract generate(
    document: Document,
    images: ImageBundle,
    options?: TransformOptions,
  ): Promise<GenerateResult>;
}

/** Transformers that fetch or emit images lazily through a loader or sink. */
export interface ImageAwareTransformer {
  parseWithLoader(
    input: Buffer,
    loader: ImageLoader,
    options?: TransformOptions,
  ): Promise<ParseResult>;

  generateWithSink(
    document: Document,
    images: ImageBundle,
    sink: ImageSink,
    options?: TransformOptions,
  ): Promise<GenerateResult>;
}

export function isImageAware(
  transformer: DocumentTransformer,
): transformer is DocumentTransformer & ImageAwareTransformer {
  return "parseWithLoader" in transformer && "generateWithSink" in transformer;
}

/**
 * Base for formats that reference images by location. `parse` resolves
 * references against the caller's bundle; `generateWithSink` hands every
 * externalized image to the sink.
 */
export abstract class ImageAwareDocumentTransformer
  extends DocumentTransformer
  implements ImageAwareTransformer
{
  abstract parseWithLoader(
    input: Buffer,
    loader: ImageLoader,
    options?: TransformOptions,
  ): Promise<ParseResult>;

  parse(
    input: Buffer,
    images: ImageBundle,
    options?: TransformOptions,
  ): Promise<ParseResult> {
    return this.parseWithLoader(input, new BundleImageLoader(images), options);
  }

  async generateWithSink(
    document: Document,
    images: ImageBundle,
    sink: ImageSink,
    options?: TransformOptions,
  ): Promise<GenerateResult> {
    const result = await this.generate(document, images, options);
    await storeImages(sink, result.images);
    return result;
  }
}

/** Hands every image to `sink`; a failing sink surfaces as an IOFailure. */
export async function storeImages(sink: ImageSink, images: ImageBundle): Promise<void> {
  for (const [key, bytes] of images.entries()) {
    try {
      await sink.store(key, bytes);
    } catch (err) {
      if (isPolydocError(err)) throw err;
      throw new IoFailureError(`Failed to store image ${key}`, { cause: err });
    }
  }
}
