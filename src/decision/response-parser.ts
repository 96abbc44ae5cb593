/**
 * Response Parser
 *
 * Turns raw decision-service output into a list of unvalidated action
 * entries. Pure module.
 *
 * Accepted shapes:
 * - an object with an `actions` or `selected_actions` array
 * - a bare array of entries
 * - a single entry object (has `kind` or `action_type`)
 * - any of the above as JSON text, optionally inside a code fence or after
 *   leading prose
 *
 * Empty output is not an error: it means "nothing to do".
 */

export type EnvelopeParseResult =
  | { ok: true; entries: unknown[]; reasoning?: string | undefined; observations?: string | undefined }
  | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Index where the balanced JSON value that ends `text` begins, or -1.
 * Handles models that think out loud and put the JSON last.
 */
function findTrailingJsonStart(text: string): number {
  const last = text[text.length - 1];
  if (last !== '}' && last !== ']') return -1;
  const open = last === '}' ? '{' : '[';

  for (let start = text.indexOf(open); start !== -1; start = text.indexOf(open, start + 1)) {
    let depth = 0;
    let inString = false;
    let escapeNext = false;
    let balancedAtEnd = true;

    for (let i = start; i < text.length; i++) {
      const char = text[i];
      if (escapeNext) {
        escapeNext = false;
        continue;
      }
      if (char === '\\') {
        escapeNext = true;
        continue;
      }
      if (char === '"') {
        inString = !inString;
        continue;
      }
      if (inString) continue;
      if (char === '{' || char === '[') depth++;
      if (char === '}' || char === ']') {
        depth--;
        if (depth === 0 && i !== text.length - 1) {
          balancedAtEnd = false;
          break;
        }
      }
    }

    if (balancedAtEnd && depth === 0) return start;
  }
  return -1;
}

const NOT_JSON = Symbol('not-json');

function tryParse(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return NOT_JSON;
  }
}

/**
 * Extract a JSON value from model text.
 * @returns the parsed value, or undefined when no JSON could be recovered
 */
export function extractJson(content: string): unknown {
  let text = content.trim();

  if (text.startsWith('```')) {
    const match = /^```(?:json)?\s*([\s\S]*?)```\s*$/.exec(text);
    if (!match) return undefined; // truncated fence
    text = match[1]?.trim() ?? '';
  }

  const direct = tryParse(text);
  if (direct !== NOT_JSON) return direct;

  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  if (fenced?.[1]) {
    const inner = tryParse(fenced[1].trim());
    if (inner !== NOT_JSON) return inner;
  }

  const start = findTrailingJsonStart(text);
  if (start < 0) return undefined;
  const trailing = tryParse(text.slice(start));
  return trailing === NOT_JSON ? undefined : trailing;
}

/**
 * Locate the action entries in raw decision output.
 */
export function parseDecisionEnvelope(raw: unknown): EnvelopeParseResult {
  if (raw === null || raw === undefined) {
    return { ok: true, entries: [] };
  }

  let value: unknown = raw;
  if (typeof raw === 'string') {
    if (raw.trim() === '') return { ok: true, entries: [] };
    value = extractJson(raw);
    if (value === undefined) {
      return { ok: false, reason: 'response is not valid JSON' };
    }
  }

  if (Array.isArray(value)) {
    return { ok: true, entries: value };
  }
  if (!isRecord(value)) {
    return { ok: false, reason: `unexpected response type: ${typeof value}` };
  }

  const reasoning = typeof value['reasoning'] === 'string' ? value['reasoning'] : undefined;
  const observations = typeof value['observations'] === 'string' ? value['observations'] : undefined;

  const list = 'actions' in value ? value['actions'] : value['selected_actions'];
  if (Array.isArray(list)) {
    return { ok: true, entries: list, reasoning, observations };
  }
  if (list !== undefined && list !== null) {
    return { ok: false, reason: 'actions field is not an array' };
  }
  if ('kind' in value || 'action_type' in value) {
    return { ok: true, entries: [value], reasoning, observations };
  }
  if (list === null) {
    return { ok: true, entries: [], reasoning, observations };
  }
  return { ok: false, reason: 'response has no actions field' };
}
