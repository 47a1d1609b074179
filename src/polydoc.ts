import {
  isImageAware,
  storeImages,
  type DocumentTransformer,
  type GenerateResult,
  type ParseResult,
  type TransformOptions,
} from "./base-transformer.js";
import { InternalError, UnknownFormatError, isPolydocError } from "./errors.js";
import { FORMATS, isFormat, type Format } from "./formats.js";
import { ImageBundle, type ImageLoader, type ImageSink } from "./images.js";
import type { Document } from "./model/document.js";
import { builtinTransformers } from "./transformers/index.js";

export interface ConvertOptions extends TransformOptions {
  /** Resolves image references while parsing; wins over `images` for image-aware formats. */
  loader?: ImageLoader;
  /** Receives the images the output format externalizes or keeps by key. */
  sink?: ImageSink;
  /** Images the input refers to by key. */
  images?: ImageBundle;
}

export interface PolydocOptions {
  /** If false, no built-in transformers are registered. Default: true */
  enableBuiltins?: boolean;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class Polydoc {
  private readonly transformers = new Map<Format, DocumentTransformer>();

  constructor(options?: PolydocOptions) {
    const enableBuiltins = options?.enableBuiltins ?? true;
    if (enableBuiltins) {
      for (const transformer of builtinTransformers()) this.register(transformer);
    }
  }

  /** Registers `transformer` for its format, replacing any earlier one. */
  register(transformer: DocumentTransformer): void {
    this.transformers.set(transformer.format, transformer);
  }

  has(format: string): boolean {
    return isFormat(format) && this.transformers.has(format);
  }

  get(format: string): DocumentTransformer {
    const transformer = isFormat(format) ? this.transformers.get(format) : undefined;
    if (!transformer) {
      throw new UnknownFormatError(
        format,
        isFormat(format) ? `No transformer is registered for ${format}` : undefined,
      );
    }
    return transformer;
  }

  /** Registered formats, in enumeration order. */
  formats(): Format[] {
    return FORMATS.filter((format) => this.transformers.has(format));
  }

  async parse(input: Buffer, format: string, options: ConvertOptions = {}): Promise<ParseResult> {
    const transformer = this.get(format);
    try {
      if (options.loader && isImageAware(transformer)) {
        return await transformer.parseWithLoader(input, options.loader, options);
      }
      return await transformer.parse(input, options.images ?? new ImageBundle(), options);
    } catch (err) {
      // Transformers report undecodable input themselves; anything else is a fault.
      if (isPolydocError(err)) throw err;
      throw new InternalError(`Failed to parse ${format} input: ${describe(err)}`, {
        cause: err,
      });
    }
  }

  async generate(
    document: Document,
    format: string,
    options: ConvertOptions = {},
  ): Promise<GenerateResult> {
    const transformer = this.get(format);
    const images = options.images ?? new ImageBundle();
    try {
      if (options.sink && isImageAware(transformer)) {
        return await transformer.generateWithSink(document, images, options.sink, options);
      }
      const result = await transformer.generate(document, images, options);
      if (options.sink) await storeImages(options.sink, result.images);
      return result;
    } catch (err) {
      if (isPolydocError(err)) throw err;
      throw new InternalError(`Failed to generate ${format} output: ${describe(err)}`, {
        cause: err,
      });
    }
  }

  /**
   * Parses `input` as `from` and writes it as `to`. The images the parse
   * collected travel with the document into the generator.
   */
  async convert(
    input: Buffer,
    from: string,
    to: string,
    options: ConvertOptions = {},
  ): Promise<GenerateResult> {
    const parsed = await this.parse(input, from, options);
    return this.generate(parsed.document, to, { ...options, images: parsed.images });
  }
}

/** Converts with a fresh registry holding every built-in transformer. */
export function convert(
  input: Buffer,
  from: string,
  to: string,
  options?: ConvertOptions,
): Promise<GenerateResult> {
  return new Polydoc().convert(input, from, to, options);
}
