/**
 * @fileoverview Parses the structured object inside a final answer
 *
 * The object may sit in a code fence or among prose. Exactly one balanced
 * top-level object must be present; two objects are ambiguous and count as
 * malformed rather than picking one.
 */

import { z } from 'zod';
import { MalformedTerminalPayloadError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import type { ParagraphLocation } from '../core/types.js';
import { findTopLevelObjects, tryParseJson } from '../utils/json_objects.js';
import { validateJSON } from '../utils/output_validator.js';

export type TerminalPayload =
  | { kind: 'location'; location: ParagraphLocation }
  | { kind: 'error'; reason: string };

// Integer ids; digit strings are accepted as well since models quote numbers.
const idSchema = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .regex(/^\d+$/)
    .transform((value) => Number(value)),
]);

const locationSchema = z.object({
  doc_id: idSchema,
  chapter_id: idSchema,
  paragraph_id: idSchema,
});

const errorSchema = z.object({
  error: z.string(),
});

const LOCATION_KEYS = ['doc_id', 'chapter_id', 'paragraph_id'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseTerminalPayload(text: string): Result<TerminalPayload, MalformedTerminalPayloadError> {
  const spans = findTopLevelObjects(text);
  if (spans.length === 0) {
    return Err(new MalformedTerminalPayloadError('no structured object found', text));
  }
  if (spans.length > 1) {
    return Err(new MalformedTerminalPayloadError(`expected one structured object, found ${spans.length}`, text));
  }

  const raw = spans[0]?.text ?? '';
  const value = tryParseJson(raw);
  if (!isRecord(value)) {
    return Err(new MalformedTerminalPayloadError('object is not valid JSON', text));
  }

  const hasError = 'error' in value;
  const hasLocation = LOCATION_KEYS.some((key) => key in value);
  if (hasError && hasLocation) {
    return Err(new MalformedTerminalPayloadError('object mixes an error with a location', text));
  }

  if (hasError) {
    const parsed = validateJSON(value, errorSchema);
    if (!parsed.success) {
      return Err(new MalformedTerminalPayloadError(`invalid error object: ${parsed.details.join('; ')}`, text));
    }
    return Ok<TerminalPayload>({ kind: 'error', reason: parsed.data.error });
  }

  const parsed = validateJSON(value, locationSchema);
  if (!parsed.success) {
    return Err(new MalformedTerminalPayloadError(`invalid location object: ${parsed.details.join('; ')}`, text));
  }
  return Ok<TerminalPayload>({ kind: 'location', location: parsed.data });
}
