import { describe, it, expect } from 'vitest';
import { handleRequest } from '../src/infra/workerHandler';
import { workerResponseSchema, type WorkerRequest } from '../src/infra/protocol';
import { deserializeParseError, EmptyAlternateError, TrnFormatError } from '../src/utils/errors';

// Messages cross the thread boundary by structured clone, as postMessage does.
function roundTrip(request: unknown, warn: boolean) {
  const reply = handleRequest(structuredClone(request), warn);
  return workerResponseSchema.parse(structuredClone(reply));
}

describe('handleRequest()', () => {
  it('returns nested alternates and warnings from a chunk', () => {
    const request: WorkerRequest = {
      id: 7,
      chunk: { startLine: 10, lines: ['a {b / {c / d}} e (u1)', '', 'plain words (u2)'] },
    };
    const response = roundTrip(request, true);
    if ('fatal' in response) return expect.unreachable();

    expect(response.id).toBe(7);
    expect(response.records).toEqual([
      {
        uttId: 'u1',
        transcript: [
          'a',
          {
            kind: 'alternate',
            branches: [['b'], [{ kind: 'alternate', branches: [['c'], ['d']] }]],
          },
          'e',
        ],
      },
      { uttId: 'u2', transcript: ['plain', 'words'] },
    ]);
    expect(response.warnings).toEqual([
      { uttId: 'u1', lineNumber: 10, message: expect.stringContaining('utt="u1"') },
    ]);
    expect(response.error).toBeUndefined();
  });

  it('leaves out warnings when warn is off', () => {
    const response = roundTrip({ id: 1, chunk: { startLine: 1, lines: ['{x / y} (u)'] } }, false);
    if ('fatal' in response) return expect.unreachable();
    expect(response.records).toEqual([{ uttId: 'u', transcript: [{ kind: 'alternate', branches: [['x'], ['y']] }] }]);
    expect(response.warnings).toEqual([]);
  });

  it('sends an empty alternate back as a rebuildable error', () => {
    const response = roundTrip({ id: 2, chunk: { startLine: 10, lines: ['ok (u1)', '', 'x { } (u2)', 'never (u3)'] } }, true);
    if ('fatal' in response) return expect.unreachable();

    expect(response.records).toEqual([{ uttId: 'u1', transcript: ['ok'] }]);
    expect(response.error).toEqual({ code: 'EMPTY_ALTERNATE', line: 'x { } (u2)', lineNumber: 12 });
    if (!response.error) return expect.unreachable();

    const error = deserializeParseError(response.error);
    expect(error).toBeInstanceOf(EmptyAlternateError);
    expect(error.lineNumber).toBe(12);
    expect(error.message).toBe('Empty alternate found ("{ }") (line 12): "x { } (u2)"');
  });

  it('sends a line without an utterance id back as a format error', () => {
    const response = roundTrip({ id: 3, chunk: { startLine: 3, lines: ['no id here'] } }, true);
    if ('fatal' in response || !response.error) return expect.unreachable();

    expect(response.records).toEqual([]);
    const error = deserializeParseError(response.error);
    expect(error).toBeInstanceOf(TrnFormatError);
    expect(error.lineNumber).toBe(3);
    expect(error.line).toBe('no id here');
  });

  it('answers a malformed request with a fatal reply', () => {
    expect(roundTrip({ id: 'x', chunk: { startLine: 1, lines: [] } }, true)).toEqual({
      id: -1,
      fatal: 'Malformed request posted to parse worker',
    });
    expect(roundTrip({ id: 4, chunk: { startLine: 0, lines: ['a (u)'] } }, true)).toEqual({
      id: -1,
      fatal: 'Malformed request posted to parse worker',
    });
    expect(roundTrip(null, true)).toEqual({ id: -1, fatal: 'Malformed request posted to parse worker' });
  });
});
