import { TRN_SYNTAX } from "../config/constants";
import { AltTreeError, EmptyAlternateError, TrnFormatError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import type { TrnRecord } from "../utils/transcription";
import { AltTreeBuilder } from "./altTree";

const logger = createLogger('trn');

const WHITESPACE = /\s/;

/**
 * Raised (not thrown) when a parsed line holds alternates.
 */
export type TrnWarning = {
  uttId: string;
  lineNumber?: number;
  message: string;
};

export type WarningHandler = (warning: TrnWarning) => void;

export type ParseLineOptions = {
  /** Report lines holding alternates. Defaults to true. */
  warn?: boolean;
  /** 1-based position of the line, used in errors and warnings. */
  lineNumber?: number;
  /** Receives alternate warnings. Defaults to logging them. */
  onWarning?: WarningHandler;
};

export const logWarning: WarningHandler = ({ message, uttId, lineNumber }) => {
  logger.warn(message, { uttId, lineNumber });
};

function alternateWarning(uttId: string, lineNumber?: number): TrnWarning {
  return {
    uttId,
    lineNumber,
    message:
      `Found an alternate in transcript for utt="${uttId}". ` +
      "The transcript holds alternates at that point and cannot be flattened to tokens " +
      "until they are resolved. Pass warn: false to silence this warning.",
  };
}

/**
 * Split a trn line into utterance id and transcript body.
 *
 * The id sits between the last `(` and the last `)`; text after that `)` is
 * dropped and earlier parentheses stay part of the body.
 */
function splitUtteranceId(stripped: string, line: string, lineNumber?: number): [string, string] {
  const lastOpen = stripped.lastIndexOf(TRN_SYNTAX.ID_OPEN);
  const lastClose = stripped.lastIndexOf(TRN_SYNTAX.ID_CLOSE);
  if (lastOpen === -1 || lastClose === -1 || lastOpen > lastClose) {
    throw new TrnFormatError(line, lineNumber);
  }
  return [stripped.slice(lastOpen + 1, lastClose), stripped.slice(0, lastOpen).trim()];
}

/**
 * Parse one line of a NIST sclite trn file.
 *
 * Mirrors sclite's reading rather than a strict grammar:
 * - `/` and `}` with no open alternate are ordinary token characters
 * - an alternate still open at the end of the line is dropped
 * - parentheses before the utterance id are ordinary token characters
 *
 * @returns the record, or `null` for a blank line
 * @throws TrnFormatError when the line has no trailing `(id)`
 * @throws EmptyAlternateError when an alternate closes on an empty branch
 */
export function parseTrnLine(line: string, options: ParseLineOptions = {}): TrnRecord | null {
  const { warn = true, lineNumber, onWarning = logWarning } = options;

  const stripped = line.trim();
  if (!stripped) return null;

  const [uttId, body] = splitUtteranceId(stripped, line, lineNumber);

  const tree = new AltTreeBuilder();
  let token = "";
  const flush = () => {
    if (token) {
      tree.push(token);
      token = "";
    }
  };

  try {
    for (const c of body) {
      if (c === TRN_SYNTAX.ALT_OPEN) {
        flush();
        tree.openScope();
      } else if (c === TRN_SYNTAX.ALT_SEPARATOR && tree.isOpen) {
        flush();
        tree.startNewBranch();
      } else if (c === TRN_SYNTAX.ALT_CLOSE && tree.isOpen) {
        flush();
        tree.closeScope();
      } else if (WHITESPACE.test(c)) {
        flush();
      } else {
        token += c;
      }
    }
  } catch (err) {
    if (err instanceof AltTreeError && err.code === "EMPTY_ALTERNATE") {
      throw new EmptyAlternateError(line, lineNumber);
    }
    throw err;
  }

  if (!tree.isOpen) flush();
  const transcript = tree.finish();

  if (warn && tree.closedCount > 0) onWarning(alternateWarning(uttId, lineNumber));

  return { uttId, transcript };
}
