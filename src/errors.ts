export type ErrorKind =
  | "UnknownFormat"
  | "MalformedInput"
  | "UnsupportedFeature"
  | "MissingImage"
  | "IOFailure"
  | "Internal";

export abstract class PolydocError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PolydocError";
  }
}

export class UnknownFormatError extends PolydocError {
  readonly kind = "UnknownFormat";
  format: string;

  constructor(format: string, message?: string) {
    super(message ?? `Unknown format: ${format}`);
    this.name = "UnknownFormatError";
    this.format = format;
  }
}

export class MalformedInputError extends PolydocError {
  readonly kind = "MalformedInput";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedInputError";
  }
}

export class UnsupportedFeatureError extends PolydocError {
  readonly kind = "UnsupportedFeature";
  feature: string;

  constructor(feature: string, message?: string) {
    super(message ?? `Unsupported feature: ${feature}`);
    this.name = "UnsupportedFeatureError";
    this.feature = feature;
  }
}

export class MissingImageError extends PolydocError {
  readonly kind = "MissingImage";
  key: string;

  constructor(key: string, message?: string) {
    super(message ?? `Missing image: ${key}`);
    this.name = "MissingImageError";
    this.key = key;
  }
}

export class IoFailureError extends PolydocError {
  readonly kind = "IOFailure";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IoFailureError";
  }
}

export class InternalError extends PolydocError {
  readonly kind = "Internal";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InternalError";
  }
}

export function isPolydocError(err: unknown): err is PolydocError {
  return err instanceof PolydocError;
}

/** Wraps anything thrown by a library or caller callback as an `InternalError`. */
export function toPolydocError(err: unknown): PolydocError {
  if (err instanceof PolydocError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new InternalError(message, { cause: err });
}
