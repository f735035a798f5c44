/**
 * Reader for NIST sclite "trn" transcript files.
 *
 * ```ts
 * import { readTrnMap, transcriptToString } from "trn-reader";
 *
 * const refs = await readTrnMap("ref.trn", { warn: false });
 * ```
 */
export { parseTrnLine, logWarning } from "./core/trnLine";
export type { ParseLineOptions, TrnWarning, WarningHandler } from "./core/trnLine";
export { AltTreeBuilder } from "./core/altTree";
export { readTrnIter, readTrnSync, readTrnStream, readTrn, readTrnMap } from "./core/reader";
export type { IReadOptions, LineSource, StreamSource } from "./core/reader";
export {
  isAlternate,
  hasAlternates,
  transcriptToTokens,
  transcriptToString,
  resolveAlternates,
  formatTranscript,
  formatTrnLine,
  pairTranscripts,
} from "./utils/transcription";
export type {
  Token,
  Alternate,
  Branch,
  TranscriptEntry,
  Transcript,
  TrnRecord,
  BranchChooser,
  TranscriptSource,
  PairedTranscripts,
} from "./utils/transcription";
export {
  TrnReaderError,
  TrnParseError,
  TrnFormatError,
  EmptyAlternateError,
  AltTreeError,
  AlternateCompatibilityError,
  EmptyReferenceError,
  UtteranceMismatchError,
  ValidationError,
  FileNotFoundError,
  WorkerPoolError,
  isTrnReaderError,
} from "./utils/errors";
export { loadConfig } from "./config/config";
export type { ITrnReaderConfig } from "./config/config";
export { createLogger, Logger, LogLevel } from "./utils/logger";

export { readTrnStream as default } from "./core/reader";
