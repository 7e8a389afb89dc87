export type EngineErrorCode =
  | "DATE_FORMAT"
  | "CACHE_UNAVAILABLE"
  | "INVALID_PARAMETER"
  | "DATASET_READ";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A single local date cell that is not a strict, real `YYYY/MM/DD` Jalali date. */
export class DateFormatError extends EngineError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super("DATE_FORMAT", `Invalid local date "${input}": ${reason}`);
    this.input = input;
  }
}

export class CacheUnavailableError extends EngineError {
  readonly backend: string;

  constructor(backend: string, cause?: unknown) {
    super("CACHE_UNAVAILABLE", `Cache backend "${backend}" is unavailable.`, { cause });
    this.backend = backend;
  }
}

/** Contract violation at the call site: unknown kind, non-numeric parameter, bad date. */
export class InvalidParameterError extends EngineError {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super("INVALID_PARAMETER", message);
    this.parameter = parameter;
  }
}

export class DatasetReadError extends EngineError {
  readonly filePath: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super("DATASET_READ", message, { cause });
    this.filePath = filePath;
  }
}
