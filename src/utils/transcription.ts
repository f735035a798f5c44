import {
  AlternateCompatibilityError,
  EmptyReferenceError,
  UtteranceMismatchError,
  ValidationError,
} from "./errors";

/**
 * A plain word-like unit. Compared verbatim; never normalized.
 */
export type Token = string;

/**
 * Competing token sequences at one transcript position, written `{ a / b c }`.
 * A branch may hold further alternates.
 */
export type Alternate = {
  kind: "alternate";
  branches: Branch[];
};

export type Branch = TranscriptEntry[];

export type TranscriptEntry = Token | Alternate;

export type Transcript = TranscriptEntry[];

/**
 * One parsed trn line.
 */
export type TrnRecord = {
  uttId: string;
  transcript: Transcript;
};

export function isAlternate(entry: TranscriptEntry): entry is Alternate {
  return typeof entry !== "string";
}

export function hasAlternates(transcript: Transcript): boolean {
  return transcript.some(isAlternate);
}

/**
 * Plain tokens of a transcript. Fails if an alternate is still unresolved,
 * since flat-token consumers cannot represent one.
 */
export function transcriptToTokens(transcript: Transcript, uttId?: string): Token[] {
  const tokens: Token[] = [];
  for (const entry of transcript) {
    if (isAlternate(entry)) throw new AlternateCompatibilityError(uttId);
    tokens.push(entry);
  }
  return tokens;
}

export function transcriptToString(transcript: Transcript, uttId?: string): string {
  return transcriptToTokens(transcript, uttId).join(" ");
}

export type BranchChooser = (alternate: Alternate) => number;

/**
 * Replace every alternate with the entries of one of its branches. Nested
 * alternates inside the chosen branch are resolved with the same chooser.
 */
export function resolveAlternates(
  transcript: Transcript,
  choose: BranchChooser = () => 0,
): Token[] {
  const out: Token[] = [];
  for (const entry of transcript) {
    if (!isAlternate(entry)) {
      out.push(entry);
      continue;
    }
    const idx = choose(entry);
    const branch = entry.branches[idx];
    if (!Number.isInteger(idx) || branch === undefined) {
      throw new ValidationError(
        `Branch index ${idx} out of range for alternate with ${entry.branches.length} branches`,
      );
    }
    out.push(...resolveAlternates(branch, choose));
  }
  return out;
}

/**
 * Render a transcript back to trn body text.
 */
export function formatTranscript(transcript: Transcript): string {
  return transcript
    .map((entry) =>
      isAlternate(entry)
        ? `{ ${entry.branches.map(formatTranscript).join(" / ")} }`
        : entry,
    )
    .join(" ");
}

export function formatTrnLine(record: TrnRecord): string {
  const body = formatTranscript(record.transcript);
  return body ? `${body} (${record.uttId})` : `(${record.uttId})`;
}

export type TranscriptSource = Map<string, Transcript> | Iterable<TrnRecord>;

export type PairedTranscripts = {
  uttIds: string[];
  refs: string[];
  hyps: string[];
};

function toMap(source: TranscriptSource): Map<string, Transcript> {
  if (source instanceof Map) return source;
  const map = new Map<string, Transcript>();
  for (const { uttId, transcript } of source) map.set(uttId, transcript);
  return map;
}

/**
 * Line up reference and hypothesis transcripts for an error-rate routine:
 * utterance IDs sorted, each side joined into one string per utterance.
 */
export function pairTranscripts(refs: TranscriptSource, hyps: TranscriptSource): PairedTranscripts {
  const refMap = toMap(refs);
  const hypMap = toMap(hyps);

  const emptyRefs = [...refMap].filter(([, t]) => t.length === 0).map(([id]) => id);
  if (emptyRefs.length) throw new EmptyReferenceError(emptyRefs);

  const uttIds = [...refMap.keys()].sort();
  const missingFromHyp = uttIds.filter((id) => !hypMap.has(id));
  const missingFromRef = [...hypMap.keys()].filter((id) => !refMap.has(id)).sort();
  if (missingFromHyp.length || missingFromRef.length) {
    throw new UtteranceMismatchError(missingFromHyp, missingFromRef);
  }

  return {
    uttIds,
    refs: uttIds.map((id) => transcriptToString(refMap.get(id) ?? [], id)),
    hyps: uttIds.map((id) => transcriptToString(hypMap.get(id) ?? [], id)),
  };
}
