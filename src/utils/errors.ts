/**
 * Error classes for trn-reader. Every error thrown on purpose by this package
 * extends `TrnReaderError` and carries a stable `code`.
 */

export class TrnReaderError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'TrnReaderError';
  }
}

/**
 * A single trn line could not be turned into a record. `lineNumber` is 1-based
 * and only known when the line came through the batch driver.
 */
export class TrnParseError extends TrnReaderError {
  constructor(
    public readonly reason: string,
    public readonly line: string,
    public readonly lineNumber: number | undefined,
    code: string,
  ) {
    super(describeLine(reason, line, lineNumber), code);
    this.name = 'TrnParseError';
  }
}

function describeLine(reason: string, line: string, lineNumber?: number): string {
  const where = lineNumber === undefined ? '' : ` (line ${lineNumber})`;
  return `${reason}${where}: ${JSON.stringify(line)}`;
}

export class TrnFormatError extends TrnParseError {
  constructor(line: string, lineNumber?: number) {
    super('Line does not terminate with an utterance identifier', line, lineNumber, 'FORMAT_ERROR');
    this.name = 'TrnFormatError';
  }
}

export class EmptyAlternateError extends TrnParseError {
  constructor(line: string, lineNumber?: number) {
    super('Empty alternate found ("{ }")', line, lineNumber, 'EMPTY_ALTERNATE');
    this.name = 'EmptyAlternateError';
  }
}

export type AltTreeErrorCode = 'NO_OPEN_SCOPE' | 'EMPTY_ALTERNATE';

/**
 * Misuse of the alternate tree builder. The line parser never lets
 * `NO_OPEN_SCOPE` escape; `EMPTY_ALTERNATE` becomes an `EmptyAlternateError`.
 */
export class AltTreeError extends TrnReaderError {
  declare readonly code: AltTreeErrorCode;

  constructor(message: string, code: AltTreeErrorCode) {
    super(message, code);
    this.name = 'AltTreeError';
  }
}

export class AlternateCompatibilityError extends TrnReaderError {
  constructor(uttId?: string) {
    const subject = uttId === undefined ? 'Transcript' : `Transcript for utt="${uttId}"`;
    super(`${subject} contains alternates; resolve them before flattening to tokens`, 'ALTERNATE_INCOMPATIBLE');
    this.name = 'AlternateCompatibilityError';
  }
}

export class EmptyReferenceError extends TrnReaderError {
  constructor(public readonly uttIds: string[]) {
    super(`One or more reference transcriptions are empty: ${uttIds.join(', ')}`, 'EMPTY_REFERENCE');
    this.name = 'EmptyReferenceError';
  }
}

export class UtteranceMismatchError extends TrnReaderError {
  constructor(
    public readonly missingFromHyp: string[],
    public readonly missingFromRef: string[],
  ) {
    const parts = ['ref and hyp have different utterances'];
    if (missingFromHyp.length) parts.push(`missing from hyp: ${missingFromHyp.join(' ')}`);
    if (missingFromRef.length) parts.push(`missing from ref: ${missingFromRef.join(' ')}`);
    super(parts.join('; '), 'UTTERANCE_MISMATCH');
    this.name = 'UtteranceMismatchError';
  }
}

export class ValidationError extends TrnReaderError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class FileNotFoundError extends TrnReaderError {
  constructor(filePath: string) {
    super(`File not found: ${filePath}`, 'FILE_NOT_FOUND');
    this.name = 'FileNotFoundError';
  }
}

export class WorkerPoolError extends TrnReaderError {
  constructor(message: string) {
    super(message, 'WORKER_POOL_ERROR');
    this.name = 'WorkerPoolError';
  }
}

/**
 * Plain-data form of a parse error, used to move it across a worker thread.
 */
export type SerializedParseError = {
  code: 'FORMAT_ERROR' | 'EMPTY_ALTERNATE';
  line: string;
  lineNumber?: number;
};

export function serializeParseError(error: TrnFormatError | EmptyAlternateError): SerializedParseError {
  return {
    code: error instanceof TrnFormatError ? 'FORMAT_ERROR' : 'EMPTY_ALTERNATE',
    line: error.line,
    lineNumber: error.lineNumber,
  };
}

export function deserializeParseError(data: SerializedParseError): TrnFormatError | EmptyAlternateError {
  return data.code === 'FORMAT_ERROR'
    ? new TrnFormatError(data.line, data.lineNumber)
    : new EmptyAlternateError(data.line, data.lineNumber);
}

/**
 * Check if an error is a known trn-reader error type
 */
export function isTrnReaderError(error: unknown): error is TrnReaderError {
  return error instanceof TrnReaderError;
}
