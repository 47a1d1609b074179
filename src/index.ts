export { Polydoc, convert } from "./polydoc.js";
export type { ConvertOptions, PolydocOptions } from "./polydoc.js";
export {
  DocumentTransformer,
  ImageAwareDocumentTransformer,
  isImageAware,
  storeImages,
  type GenerateResult,
  type ImageAwareTransformer,
  type ParseResult,
  type TransformOptions,
} from "./base-transformer.js";
export {
  FORMATS,
  FORMAT_EXTENSIONS,
  FORMAT_MIME_TYPES,
  detectFormat,
  formatFromFileName,
  isFormat,
  parseFormat,
  type Format,
} from "./formats.js";
export {
  BundleImageLoader,
  BundleImageSink,
  DirectoryImageLoader,
  DirectoryImageSink,
  ImageBundle,
  NullImageLoader,
  detectImageType,
  imageExtension,
  imageMimeType,
  imageTypeFromName,
  resolveImageType,
  type ImageLoader,
  type ImageSink,
} from "./images.js";
export {
  PolydocError,
  UnknownFormatError,
  MalformedInputError,
  UnsupportedFeatureError,
  MissingImageError,
  IoFailureError,
  InternalError,
  isPolydocError,
  toPolydocError,
  type ErrorKind,
} from "./errors.js";
export { CollectingWarningSink, type FidelityWarning, type WarningSink } from "./warnings.js";
export * from "./model/index.js";
export * from "./transformers/index.js";
