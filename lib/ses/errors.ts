// Failures surfaced by convertMailchimpToSes(), each with a stable `code`.

export type ConversionErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'OUTPUT_WRITE_FAILED'
  | 'MALFORMED_ROW'
  | 'DECODE_ERROR'
  | 'INVALID_OPTIONS';

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConversionError';
    this.code = code;
  }
}

const reasonOf = (cause: unknown): string => {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return 'unknown error';
};

export class InputNotFoundError extends ConversionError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('INPUT_NOT_FOUND', `Cannot read input file ${path}: ${reasonOf(cause)}`, cause);
    this.name = 'InputNotFoundError';
    this.path = path;
  }
}

export class OutputWriteFailedError extends ConversionError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('OUTPUT_WRITE_FAILED', `Cannot write output file ${path}: ${reasonOf(cause)}`, cause);
    this.name = 'OutputWriteFailedError';
    this.path = path;
  }
}

export class MalformedRowError extends ConversionError {
  /** 1-based data record number; 0 for the header row. */
  readonly row: number;
  /** 1-based physical line the record starts on. */
  readonly line: number;
  readonly reason: string;

  constructor(row: number, line: number, reason: string) {
    const what = row === 0 ? 'header' : `row ${row}`;
    super('MALFORMED_ROW', `Malformed CSV ${what} (line ${line}): ${reason}`);
    this.name = 'MalformedRowError';
    this.row = row;
    this.line = line;
    this.reason = reason;
  }
}

export class DecodeError extends ConversionError {
  /** File offset of the first byte of the invalid sequence. */
  readonly byteOffset: number;

  constructor(byteOffset: number, cause?: unknown) {
    super('DECODE_ERROR', `Input is not valid UTF-8 at byte ${byteOffset}`, cause);
    this.name = 'DecodeError';
    this.byteOffset = byteOffset;
  }
}

export class InvalidOptionsError extends ConversionError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_OPTIONS', `Invalid conversion options: ${issues.join('; ')}`);
    this.name = 'InvalidOptionsError';
    this.issues = issues;
  }
}

/** Keep ConversionErrors as they are; wrap anything else with `fallback`. */
export function toConversionError(err: unknown, fallback: (cause: unknown) => ConversionError): ConversionError {
  return err instanceof ConversionError ? err : fallback(err);
}
