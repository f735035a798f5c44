import { EmptyAlternateError, TrnFormatError } from "../utils/errors";
import type { TrnRecord } from "../utils/transcription";
import { parseTrnLine, type TrnWarning } from "./trnLine";

/**
 * A run of consecutive lines. `startLine` is the 1-based number of `lines[0]`.
 */
export type LineChunk = {
  startLine: number;
  lines: string[];
};

/**
 * What parsing a chunk produced. On a parse error, `records` and `warnings`
 * hold what the lines before the failing one produced and parsing stops.
 */
export type ChunkOutcome = {
  records: TrnRecord[];
  warnings: TrnWarning[];
  error?: TrnFormatError | EmptyAlternateError;
};

export function parseChunk(chunk: LineChunk, warn: boolean): ChunkOutcome {
  const records: TrnRecord[] = [];
  const warnings: TrnWarning[] = [];
  const onWarning = (w: TrnWarning) => warnings.push(w);

  for (let i = 0; i < chunk.lines.length; i++) {
    try {
      const record = parseTrnLine(chunk.lines[i], {
        warn,
        lineNumber: chunk.startLine + i,
        onWarning,
      });
      if (record) records.push(record);
    } catch (err) {
      if (err instanceof TrnFormatError || err instanceof EmptyAlternateError) {
        return { records, warnings, error: err };
      }
      throw err;
    }
  }
  return { records, warnings };
}
