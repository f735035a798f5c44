import fs from "fs";
import readline from "readline";
import type { Readable } from "stream";
import loadConfig, { readerSettingsSchema } from "../config/config";
import { IN_FLIGHT_PER_WORKER, READER_DEFAULTS } from "../config/constants";
import { createParsePool, type ParsePool } from "../infra/pool";
import { FileNotFoundError, isTrnReaderError, ValidationError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import type { Transcript, TrnRecord } from "../utils/transcription";
import type { ChunkOutcome, LineChunk } from "./chunk";
import { logWarning, parseTrnLine, type WarningHandler } from "./trnLine";

const logger = createLogger('reader');

/**
 * Options for reading a whole trn file.
 */
export interface IReadOptions {
  warn?: boolean; // report transcripts holding alternates
  processes?: number; // worker threads; 0 parses on the calling thread
  chunkSize?: number; // lines per worker task
  ordered?: boolean; // keep input order across workers
  onWarning?: WarningHandler;
  workerScript?: string; // override the compiled worker entry
}

type EffectiveOptions = {
  warn: boolean;
  processes: number;
  chunkSize: number;
  ordered: boolean;
  onWarning: WarningHandler;
  workerScript?: string;
};

export type LineSource = string | Iterable<string>;
export type StreamSource = string | Readable | Iterable<string> | AsyncIterable<string>;

/**
 * Call options win over the config file, which wins over the defaults.
 */
function resolveOptions(options: IReadOptions = {}): EffectiveOptions {
  const { onWarning, workerScript, ...settings } = options;
  const checked = readerSettingsSchema.safeParse(settings);
  if (!checked.success) {
    const issues = checked.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ValidationError(`Invalid read options: ${issues.join('; ')}`);
  }
  const cfg = loadConfig();
  return {
    warn: checked.data.warn ?? cfg.warn ?? READER_DEFAULTS.warn,
    processes: checked.data.processes ?? cfg.processes ?? READER_DEFAULTS.processes,
    chunkSize: checked.data.chunkSize ?? cfg.chunkSize ?? READER_DEFAULTS.chunkSize,
    ordered: checked.data.ordered ?? cfg.ordered ?? READER_DEFAULTS.ordered,
    onWarning: onWarning ?? logWarning,
    workerScript,
  };
}

function readLinesSync(filePath: string): string[] {
  if (!fs.existsSync(filePath)) throw new FileNotFoundError(filePath);
  logger.debug('Reading trn file', { filePath });
  return fs.readFileSync(filePath, "utf8").split(/\r?\n/);
}

/**
 * Read a trn file one record at a time, on the calling thread.
 *
 * @param source Path of a trn file, or the lines themselves
 * @throws TrnFormatError / EmptyAlternateError on the first bad line
 */
export function* readTrnIter(source: LineSource, options?: IReadOptions): Generator<TrnRecord> {
  const opts = resolveOptions(options);
  const lines = typeof source === "string" ? readLinesSync(source) : source;
  let lineNumber = 0;
  for (const line of lines) {
    lineNumber++;
    const record = parseTrnLine(line, { warn: opts.warn, lineNumber, onWarning: opts.onWarning });
    if (record) yield record;
  }
}

export function readTrnSync(source: LineSource, options?: IReadOptions): TrnRecord[] {
  return [...readTrnIter(source, options)];
}

async function* linesOf(source: StreamSource): AsyncGenerator<string> {
  if (typeof source === "string") {
    await fs.promises.access(source, fs.constants.R_OK).catch(() => {
      throw new FileNotFoundError(source);
    });
    logger.debug('Streaming trn file', { filePath: source });
    const stream = fs.createReadStream(source, { encoding: "utf8" });
    try {
      yield* linesOf(stream);
    } finally {
      stream.destroy();
    }
    return;
  }
  if (isReadable(source)) {
    const rl = readline.createInterface({ input: source, crlfDelay: Infinity });
    try {
      yield* rl;
    } finally {
      rl.close();
    }
    return;
  }
  yield* source;
}

function isReadable(source: StreamSource): source is Readable {
  return typeof source === "object" && "pipe" in source && typeof source.pipe === "function";
}

type Settled = { outcome: ChunkOutcome } | { failure: unknown };

function settle(pool: ParsePool, chunk: LineChunk): Promise<Settled> {
  return pool.run(chunk).then(
    (outcome) => ({ outcome }),
    (failure: unknown) => ({ failure }),
  );
}

function* drain(settled: Settled, onWarning: WarningHandler): Generator<TrnRecord> {
  if ("failure" in settled) throw settled.failure;
  const { records, warnings, error } = settled.outcome;
  warnings.forEach(onWarning);
  yield* records;
  if (error) throw error;
}

/**
 * Chunk the lines and fan them out over a parse pool, keeping at most
 * `IN_FLIGHT_PER_WORKER` chunks per worker outstanding.
 */
async function* readParallel(lines: AsyncIterable<string>, opts: EffectiveOptions): AsyncGenerator<TrnRecord> {
  const pool = createParsePool({ size: opts.processes, warn: opts.warn, workerScript: opts.workerScript });
  logger.info('Parsing trn lines in parallel', { pool: pool.kind, processes: opts.processes, chunkSize: opts.chunkSize, ordered: opts.ordered });

  const maxInFlight = opts.processes * IN_FLIGHT_PER_WORKER;
  const ordered: Promise<Settled>[] = [];
  const unordered = new Map<number, Promise<[number, Settled]>>();
  let nextChunk = 0;

  const submit = (chunk: LineChunk) => {
    const pending = settle(pool, chunk);
    if (opts.ordered) {
      ordered.push(pending);
    } else {
      const id = nextChunk++;
      unordered.set(id, pending.then((s): [number, Settled] => [id, s]));
    }
  };

  const inFlight = () => (opts.ordered ? ordered.length : unordered.size);

  async function next(): Promise<Settled | undefined> {
    if (opts.ordered) return ordered.shift();
    if (unordered.size === 0) return undefined;
    const [id, settled] = await Promise.race(unordered.values());
    unordered.delete(id);
    return settled;
  }

  try {
    let chunk: LineChunk = { startLine: 1, lines: [] };
    let lineNumber = 0;
    for await (const line of lines) {
      lineNumber++;
      chunk.lines.push(line);
      if (chunk.lines.length < opts.chunkSize) continue;
      submit(chunk);
      chunk = { startLine: lineNumber + 1, lines: [] };
      while (inFlight() >= maxInFlight) {
        const settled = await next();
        if (settled) yield* drain(settled, opts.onWarning);
      }
    }
    if (chunk.lines.length) submit(chunk);

    for (let settled = await next(); settled; settled = await next()) {
      yield* drain(settled, opts.onWarning);
    }
  } finally {
    await pool.destroy();
  }
}

/**
 * Read a trn file as an async stream of records, optionally parsing chunks of
 * lines on worker threads (`processes > 0`).
 *
 * Stops at the first bad line. With `ordered: false` results arrive as chunks
 * complete and outstanding chunks are abandoned on the first error.
 */
export async function* readTrnStream(source: StreamSource, options?: IReadOptions): AsyncGenerator<TrnRecord> {
  const opts = resolveOptions(options);
  try {
    if (opts.processes > 0) {
      yield* readParallel(linesOf(source), opts);
      return;
    }
    let lineNumber = 0;
    for await (const line of linesOf(source)) {
      lineNumber++;
      const record = parseTrnLine(line, { warn: opts.warn, lineNumber, onWarning: opts.onWarning });
      if (record) yield record;
    }
  } catch (error) {
    if (isTrnReaderError(error)) {
      logger.error('Reading trn input failed', { error: error.message, code: error.code });
    } else {
      logger.error('Reading trn input failed with unknown error', { error: String(error) });
    }
    throw error;
  }
}

export async function readTrn(source: StreamSource, options?: IReadOptions): Promise<TrnRecord[]> {
  const records: TrnRecord[] = [];
  for await (const record of readTrnStream(source, options)) records.push(record);
  return records;
}

/**
 * Utterance id to transcript. A repeated id keeps its last transcript.
 */
export async function readTrnMap(source: StreamSource, options?: IReadOptions): Promise<Map<string, Transcript>> {
  const map = new Map<string, Transcript>();
  for await (const { uttId, transcript } of readTrnStream(source, options)) map.set(uttId, transcript);
  return map;
}
