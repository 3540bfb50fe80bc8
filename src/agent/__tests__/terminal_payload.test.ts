import { describe, expect, it } from 'vitest';
import { MalformedTerminalPayloadError } from '../../core/errors.js';
import { parseTerminalPayload } from '../terminal_payload.js';

const LOCATION = '{"doc_id": 9, "chapter_id": 5, "paragraph_id": 434408}';

function malformedReason(text: string): string {
  const result = parseTerminalPayload(text);
  if (result.ok) {
    throw new Error(`expected a malformed payload, got ${JSON.stringify(result.value)}`);
  }
  expect(result.error).toBeInstanceOf(MalformedTerminalPayloadError);
  expect(result.error.rawPayload).toBe(text);
  return result.error.reason;
}

describe('parseTerminalPayload', () => {
  it('parses a bare location', () => {
    expect(parseTerminalPayload(LOCATION)).toEqual({
      ok: true,
      value: { kind: 'location', location: { doc_id: 9, chapter_id: 5, paragraph_id: 434408 } },
    });
  });

  it('parses fenced and bare payloads identically', () => {
    const fenced = parseTerminalPayload('```json\n' + LOCATION + '\n```');
    const prose = parseTerminalPayload(`The paragraph is ${LOCATION}.`);

    expect(fenced).toEqual(parseTerminalPayload(LOCATION));
    expect(prose).toEqual(parseTerminalPayload(LOCATION));
  });

  it('parses an error object', () => {
    expect(parseTerminalPayload('{"error": "Justification paragraph not found."}')).toEqual({
      ok: true,
      value: { kind: 'error', reason: 'Justification paragraph not found.' },
    });
  });

  it('accepts ids written as digit strings', () => {
    const result = parseTerminalPayload('{"doc_id": "9", "chapter_id": 5, "paragraph_id": "12"}');
    expect(result).toEqual({
      ok: true,
      value: { kind: 'location', location: { doc_id: 9, chapter_id: 5, paragraph_id: 12 } },
    });
  });

  it('reads the location after an unclosed brace in the prose', () => {
    expect(parseTerminalPayload(`:-{ here ${LOCATION}`)).toEqual(parseTerminalPayload(LOCATION));
  });

  it('rejects text without an object', () => {
    expect(malformedReason('I could not find it.')).toBe('no structured object found');
  });

  it('rejects two objects in one payload', () => {
    expect(malformedReason(`${LOCATION}\n{"doc_id": 1, "chapter_id": 1, "paragraph_id": 1}`)).toBe(
      'expected one structured object, found 2'
    );
  });

  it('rejects invalid JSON', () => {
    expect(malformedReason("{'doc_id': 9}")).toBe('object is not valid JSON');
  });

  it('rejects an object mixing error and location', () => {
    expect(malformedReason('{"error": "none", "doc_id": 1}')).toBe('object mixes an error with a location');
  });

  it('rejects non-integer ids', () => {
    expect(malformedReason('{"doc_id": 1.5, "chapter_id": 2, "paragraph_id": 3}')).toMatch(
      /^invalid location object: doc_id/
    );
  });

  it('rejects a location with a missing id', () => {
    expect(malformedReason('{"doc_id": 1, "chapter_id": 2}')).toMatch(/^invalid location object: paragraph_id/);
  });

  it('rejects a non-string error', () => {
    expect(malformedReason('{"error": 42}')).toMatch(/^invalid error object: error/);
  });

  it('rejects an object matching neither shape', () => {
    expect(malformedReason('{"answer": "paragraph 4"}')).toMatch(/^invalid location object/);
  });
});
