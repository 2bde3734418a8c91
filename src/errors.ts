export interface EtlErrorOptions {
  cause?: unknown;
}

export class EtlError extends Error {
  constructor(message: string, options: EtlErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
  }
}

export class EncodingError extends EtlError {
  readonly encoding: string;
  readonly file?: string;
  readonly offset?: number;

  constructor(
    message: string,
    details: { encoding: string; file?: string; offset?: number },
    options: EtlErrorOptions = {}
  ) {
    super(message, options);
    this.encoding = details.encoding;
    this.file = details.file;
    this.offset = details.offset;
  }
}

export class LayoutError extends EtlError {}

export class ManifestError extends EtlError {}

export class SchemaValidationError extends EtlError {
  readonly label: string;

  constructor(message: string, label: string) {
    super(message);
    this.label = label;
  }
}

export class LoadError extends EtlError {
  readonly source: string;
  readonly record?: number;
  readonly column?: string;

  constructor(
    message: string,
    details: { source: string; record?: number; column?: string },
    options: EtlErrorOptions = {}
  ) {
    super(message, options);
    this.source = details.source;
    this.record = details.record;
    this.column = details.column;
  }
}

export class JoinError extends EtlError {}
