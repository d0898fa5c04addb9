import { z } from 'zod';

/**
 * Outcome of decoding a model reply.
 * `degraded` carries the documented fallback value and why it was used.
 */
export type Decoded<T> =
  | { status: 'ok'; value: T }
  | { status: 'degraded'; value: T; reason: string };

/**
 * Find the end of the JSON value starting at `start` (an opening brace or bracket).
 * Brackets inside string literals are ignored. Returns -1 if the value is truncated.
 */
function findClosingIndex(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{' || ch === '[') depth++;
    else if (ch === '}' || ch === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function tryParse(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    // Common LLM artifact: trailing commas before a closer
    const cleaned = candidate.replace(/,\s*([}\]])/g, '$1');
    try {
      return JSON.parse(cleaned);
    } catch {
      return undefined;
    }
  }
}

/**
 * Pull the first complete JSON object or array out of a model reply.
 * Handles markdown code fences and prose around the payload.
 */
export function extractJSON(response: string): unknown {
  const text = response
    .replace(/^```(?:json)?\s*/gm, '')
    .replace(/```\s*$/gm, '')
    .trim();

  const direct = tryParse(text);
  if (direct !== undefined && typeof direct === 'object' && direct !== null) {
    return direct;
  }

  for (let start = 0; start < text.length; start++) {
    const ch = text[start];
    if (ch !== '{' && ch !== '[') continue;

    const end = findClosingIndex(text, start);
    if (end === -1) continue;

    const parsed = tryParse(text.slice(start, end + 1));
    if (parsed !== undefined) return parsed;
  }

  return undefined;
}

/**
 * Decode a reply into a typed value, substituting the fallback on any failure.
 */
export function decodeReply<S extends z.ZodTypeAny>(
  response: string,
  schema: S,
  fallback: () => z.infer<S>
): Decoded<z.infer<S>> {
  const json = extractJSON(response);
  if (json === undefined) {
    return { status: 'degraded', value: fallback(), reason: 'reply contained no parseable JSON' };
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return {
      status: 'degraded',
      value: fallback(),
      reason: `reply did not match the expected shape${where}: ${issue?.message ?? 'unknown issue'}`,
    };
  }

  return { status: 'ok', value: result.data };
}

// Lenient field helpers shared by the role schemas
export const text = (fallback = '') => z.string().catch(fallback);
export const textList = () =>
  z.array(z.unknown()).catch([]).transform(items =>
    items.filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
  );
export const confidence = () =>
  z.preprocess(
    value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['high', 'medium', 'low'])
  ).catch('medium');
export const score = (fallback: number) =>
  z.coerce.number().catch(fallback).transform(n => (Number.isFinite(n) ? Math.round(Math.min(100, Math.max(0, n))) : fallback));
