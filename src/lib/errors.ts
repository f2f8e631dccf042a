export type ConversionErrorKind =
  | "prerequisite"
  | "codec-unavailable"
  | "decode"
  | "resize"
  | "encode"
  | "enumeration"
  | "persistence";

export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;

  constructor(kind: ConversionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConversionError";
    this.kind = kind;
  }
}

/** Missing input or output path, or an input the converter does not accept. */
export class PrerequisiteError extends ConversionError {
  constructor(message: string, kind: "prerequisite" | "codec-unavailable" = "prerequisite", cause?: unknown) {
    super(kind, message, { cause });
    this.name = "PrerequisiteError";
  }
}

export class CodecUnavailableError extends PrerequisiteError {
  constructor(message: string, cause?: unknown) {
    super(message, "codec-unavailable", cause);
    this.name = "CodecUnavailableError";
  }
}

export class DecodeError extends ConversionError {
  readonly sourcePath: string;

  constructor(message: string, sourcePath: string, cause?: unknown) {
    super("decode", message, { cause });
    this.name = "DecodeError";
    this.sourcePath = sourcePath;
  }
}

export class ResizeError extends ConversionError {
  constructor(message: string, cause?: unknown) {
    super("resize", message, { cause });
    this.name = "ResizeError";
  }
}

export class EncodeError extends ConversionError {
  readonly destinationPath: string;

  constructor(message: string, destinationPath: string, cause?: unknown) {
    super("encode", message, { cause });
    this.name = "EncodeError";
    this.destinationPath = destinationPath;
  }
}

export class EnumerationError extends ConversionError {
  readonly folder: string;

  constructor(message: string, folder: string, cause?: unknown) {
    super("enumeration", message, { cause });
    this.name = "EnumerationError";
    this.folder = folder;
  }
}

export class PersistenceError extends ConversionError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super("persistence", message, { cause });
    this.name = "PersistenceError";
    this.filePath = filePath;
  }
}
