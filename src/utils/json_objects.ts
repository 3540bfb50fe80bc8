/**
 * @fileoverview Balanced JSON object extraction
 *
 * Finds every top-level `{...}` span in free text (model output wrapped in
 * code fences, prose, or both). Braces inside string literals are ignored and
 * backslash escapes are honored. A `{` that never closes is skipped and the
 * scan resumes at the next `{`.
 *
 * @packageDocumentation
 */

export interface ObjectSpan {
  start: number;
  /** Exclusive. */
  end: number;
  text: string;
}

export function findTopLevelObjects(text: string): ObjectSpan[] {
  const spans: ObjectSpan[] = [];
  let from = text.indexOf('{');

  while (from !== -1) {
    const end = matchObjectEnd(text, from);
    if (end === -1) {
      // A brace that never closes is prose; retry from the next one.
      from = text.indexOf('{', from + 1);
      continue;
    }
    spans.push({ start: from, end, text: text.slice(from, end) });
    from = text.indexOf('{', end);
  }

  return spans;
}

/** Exclusive end of the object opening at `start`, or -1 if it never closes. */
function matchObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
  }

  return -1;
}

/**
 * Parse JSON without throwing. `undefined` means the text is not JSON.
 */
export function tryParseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}
