import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { readTrn, readTrnIter, readTrnMap, readTrnStream, readTrnSync } from '../src/core/reader';
import type { TrnRecord } from '../src/utils/transcription';
import { EmptyAlternateError, FileNotFoundError, TrnFormatError, ValidationError } from '../src/utils/errors';

const LINES = [
  'the cat sat (utt01)',
  '',
  'a {b / c} d (utt02)',
  'word} here (utt03)',
  'x {y (utt04)',
  '   ',
  'one (utt05)',
  'two words (utt06)',
  'a(b) c (utt07)',
  '{ p q / r } s (utt08)',
  'last (utt09)',
  'final line (utt10)',
];

const byId = (a: TrnRecord, b: TrnRecord) => a.uttId.localeCompare(b.uttId);

let tmpDir: string;

beforeAll(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'trn-reader-'));
});

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

beforeEach(() => {
  vi.stubEnv('TRN_READER_CONFIG', '');
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('readTrnIter() / readTrnSync()', () => {
  it('parses lines in order and skips blank ones', () => {
    const records = readTrnSync(LINES, { warn: false });
    expect(records.map((r) => r.uttId)).toEqual([
      'utt01', 'utt02', 'utt03', 'utt04', 'utt05', 'utt06', 'utt07', 'utt08', 'utt09', 'utt10',
    ]);
    expect(records[0].transcript).toEqual(['the', 'cat', 'sat']);
    expect(records[3].transcript).toEqual(['x']);
  });

  it('reads a file by path', () => {
    const file = path.join(tmpDir, 'sync.trn');
    fs.writeFileSync(file, 'a b (u1)\r\n\nc {d / e} (u2)\n');
    expect(readTrnSync(file, { warn: false })).toEqual([
      { uttId: 'u1', transcript: ['a', 'b'] },
      { uttId: 'u2', transcript: ['c', { kind: 'alternate', branches: [['d'], ['e']] }] },
    ]);
  });

  it('yields the records before a bad line, then throws with its line number', () => {
    const seen: string[] = [];
    let failure: unknown;
    try {
      for (const record of readTrnIter(['ok (u1)', '', 'broken', 'never (u2)'])) seen.push(record.uttId);
    } catch (err) {
      failure = err;
    }
    expect(seen).toEqual(['u1']);
    expect(failure).toBeInstanceOf(TrnFormatError);
    expect(failure).toMatchObject({ lineNumber: 3, line: 'broken' });
  });

  it('fails on an empty alternate', () => {
    expect(() => readTrnSync(['a (u1)', 'b {} (u2)'])).toThrow(EmptyAlternateError);
  });

  it('reports a missing file', () => {
    expect(() => readTrnSync(path.join(tmpDir, 'missing.trn'))).toThrow(FileNotFoundError);
  });

  it('validates options', () => {
    expect(() => readTrnSync([], { processes: -1 })).toThrow(ValidationError);
    expect(() => readTrnSync([], { chunkSize: 0 })).toThrow('Invalid read options: chunkSize');
  });

  it('sends warnings for alternate lines to the handler', () => {
    const onWarning = vi.fn();
    readTrnSync(LINES, { onWarning });
    expect(onWarning.mock.calls.map(([w]) => [w.uttId, w.lineNumber])).toEqual([
      ['utt02', 3],
      ['utt08', 10],
    ]);
  });
});

describe('readTrnStream() / readTrn()', () => {
  it('reads from a readable stream', async () => {
    const stream = Readable.from(['a b (u1)\nc ', '(u2)\n']);
    expect(await readTrn(stream, { warn: false })).toEqual([
      { uttId: 'u1', transcript: ['a', 'b'] },
      { uttId: 'u2', transcript: ['c'] },
    ]);
  });

  it('reads from a file path', async () => {
    const file = path.join(tmpDir, 'stream.trn');
    fs.writeFileSync(file, LINES.join('\n'));
    expect(await readTrn(file, { warn: false })).toEqual(readTrnSync(LINES, { warn: false }));
  });

  it('reads from an async iterable of lines', async () => {
    async function* lines() {
      yield 'x (u1)';
      yield 'y z (u2)';
    }
    const records = await readTrn(lines(), { warn: false });
    expect(records.map((r) => r.uttId)).toEqual(['u1', 'u2']);
  });

  it('rejects a missing file', async () => {
    await expect(readTrn(path.join(tmpDir, 'missing.trn'))).rejects.toBeInstanceOf(FileNotFoundError);
  });

  it('rejects invalid options', async () => {
    await expect(readTrn([], { chunkSize: 1.5 })).rejects.toBeInstanceOf(ValidationError);
  });

  it('keeps the last transcript of a repeated utterance id in the map', async () => {
    const map = await readTrnMap(['a (u1)', 'b (u2)', 'c (u1)']);
    expect(map.size).toBe(2);
    expect(map.get('u1')).toEqual(['c']);
    expect(map.get('u2')).toEqual(['b']);
  });
});

describe('parallel reading', () => {
  const sequential = readTrnSync(LINES, { warn: false });

  it('matches sequential parsing in order', async () => {
    for (const processes of [1, 2, 4]) {
      const records = await readTrn(LINES, { warn: false, processes, chunkSize: 3 });
      expect(records).toEqual(sequential);
    }
  });

  it('returns the same records when order is not kept', async () => {
    const records = await readTrn(LINES, { warn: false, processes: 3, chunkSize: 2, ordered: false });
    expect([...records].sort(byId)).toEqual([...sequential].sort(byId));
  });

  it('forwards warnings from pooled chunks', async () => {
    const onWarning = vi.fn();
    await readTrn(LINES, { processes: 2, chunkSize: 4, onWarning });
    expect(onWarning.mock.calls.map(([w]) => w.uttId)).toEqual(['utt02', 'utt08']);
  });

  it('yields records up to the bad line, then fails', async () => {
    const lines = ['l1 (u1)', 'l2 (u2)', 'l3 (u3)', 'l4 (u4)', 'broken', 'l6 (u6)', 'l7 (u7)'];
    const seen: string[] = [];
    let failure: unknown;
    try {
      for await (const record of readTrnStream(lines, { processes: 2, chunkSize: 2 })) seen.push(record.uttId);
    } catch (err) {
      failure = err;
    }
    expect(seen).toEqual(['u1', 'u2', 'u3', 'u4']);
    expect(failure).toBeInstanceOf(TrnFormatError);
    expect(failure).toMatchObject({ lineNumber: 5 });
  });

  it('fails fast when order is not kept', async () => {
    const lines = ['a (u1)', 'b {} (u2)', 'c (u3)', 'd (u4)'];
    await expect(readTrn(lines, { processes: 2, chunkSize: 1, ordered: false })).rejects.toBeInstanceOf(
      EmptyAlternateError,
    );
  });

  it('stops cleanly when the consumer breaks early', async () => {
    const seen: string[] = [];
    for await (const record of readTrnStream(LINES, { warn: false, processes: 2, chunkSize: 1 })) {
      seen.push(record.uttId);
      break;
    }
    expect(seen).toEqual(['utt01']);
  });
});

describe('config file defaults', () => {
  it('takes warn from the config file unless given explicitly', () => {
    const file = path.join(tmpDir, 'reader.config.json');
    fs.writeFileSync(file, JSON.stringify({ warn: false }));
    vi.stubEnv('TRN_READER_CONFIG', file);

    const silent = vi.fn();
    readTrnSync(['{a / b} (u1)'], { onWarning: silent });
    expect(silent).not.toHaveBeenCalled();

    const loud = vi.fn();
    readTrnSync(['{a / b} (u1)'], { warn: true, onWarning: loud });
    expect(loud).toHaveBeenCalledTimes(1);
  });
});
