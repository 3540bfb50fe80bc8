/**
 * @fileoverview Classifies one reasoning-engine turn
 *
 * Every turn maps to exactly one variant. The engine writes ReAct-style text:
 *
 *   Thought: ...
 *   Action: hybrid_search
 *   Action Input: licensing of group III substances
 *
 * or `Final Answer: {...}`. Anything else is `unparseable`, which the loop
 * answers with a corrective observation.
 */

import { findTopLevelObjects } from '../utils/json_objects.js';

export const SEARCH_TOOL_NAME = 'hybrid_search';

export type Turn =
  | { kind: 'tool_call'; tool: typeof SEARCH_TOOL_NAME; query: string }
  | { kind: 'final_answer'; payload: string }
  | { kind: 'unparseable'; reason: string };

const ACTION_PATTERN = /^[ \t]*Action[ \t]*:[ \t]*(.*)$/im;
const ACTION_INPUT_PATTERN = /^[ \t]*Action[ \t]+Input[ \t]*:([\s\S]*)$/im;
const FINAL_ANSWER_PATTERN = /Final[ \t]+Answer[ \t]*:([\s\S]*)$/i;
// The engine sometimes hallucinates its own observation; nothing after it is input.
const OBSERVATION_PATTERN = /^[ \t]*Observation[ \t]*:/im;

function stripWrapping(value: string): string {
  let result = value.trim();
  let previous = '';
  while (result !== previous) {
    previous = result;
    result = result.replace(/^(["'`])([\s\S]*)\1$/, '$2').trim();
  }
  return result;
}

function extractActionInput(text: string): string | null {
  const match = ACTION_INPUT_PATTERN.exec(text);
  if (!match) return null;
  let input = match[1] ?? '';
  const observation = OBSERVATION_PATTERN.exec(input);
  if (observation) {
    input = input.slice(0, observation.index);
  }
  return stripWrapping(input);
}

export function parseTurn(text: string): Turn {
  const action = ACTION_PATTERN.exec(text);
  const finalAnswer = FINAL_ANSWER_PATTERN.exec(text);

  if (action && finalAnswer) {
    return { kind: 'unparseable', reason: 'turn contains both an action and a final answer' };
  }

  if (finalAnswer) {
    return { kind: 'final_answer', payload: (finalAnswer[1] ?? '').trim() };
  }

  if (action) {
    const tool = stripWrapping(action[1] ?? '');
    if (tool !== SEARCH_TOOL_NAME) {
      return { kind: 'unparseable', reason: `unknown tool "${tool}"; the only tool is ${SEARCH_TOOL_NAME}` };
    }
    const query = extractActionInput(text);
    if (query === null) {
      return { kind: 'unparseable', reason: 'action is missing "Action Input:"' };
    }
    if (query.length === 0) {
      return { kind: 'unparseable', reason: 'search query is empty' };
    }
    return { kind: 'tool_call', tool: SEARCH_TOOL_NAME, query };
  }

  if (findTopLevelObjects(text).length > 0) {
    return { kind: 'final_answer', payload: text.trim() };
  }

  return { kind: 'unparseable', reason: 'turn has neither an action nor a final answer' };
}
