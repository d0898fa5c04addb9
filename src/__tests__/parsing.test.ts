import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { extractJSON, decodeReply, confidence, score, textList } from '../parsing.js';

describe('extractJSON', () => {
  it('strips markdown code fences', () => {
    expect(extractJSON('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it('finds the payload inside surrounding prose', () => {
    expect(extractJSON('Here you go: {"a": [1, 2]} hope that helps')).toEqual({ a: [1, 2] });
  });

  it('finds a top-level array', () => {
    expect(extractJSON('Tasks:\n[{"id": "task_1"}]')).toEqual([{ id: 'task_1' }]);
  });

  it('tolerates trailing commas', () => {
    expect(extractJSON('{"a": 1, "b": [1, 2,],}')).toEqual({ a: 1, b: [1, 2] });
  });

  it('ignores brackets inside string literals', () => {
    expect(extractJSON('note {"a": "} ]"} end')).toEqual({ a: '} ]' });
  });

  it('skips a truncated candidate and takes the next complete one', () => {
    expect(extractJSON('{"broken": {"x": 1} {"ok": true}')).toEqual({ x: 1 });
  });

  it('returns undefined when there is no JSON at all', () => {
    expect(extractJSON('I could not do that.')).toBeUndefined();
  });

  it('does not treat a bare number as a payload', () => {
    expect(extractJSON('42')).toBeUndefined();
  });
});

describe('decodeReply', () => {
  const schema = z.object({ summary: z.string() });

  it('returns ok with the parsed value', () => {
    expect(decodeReply('{"summary": "done"}', schema, () => ({ summary: 'fallback' }))).toEqual({
      status: 'ok',
      value: { summary: 'done' },
    });
  });

  it('degrades when the reply has no JSON', () => {
    expect(decodeReply('sorry', schema, () => ({ summary: 'fallback' }))).toEqual({
      status: 'degraded',
      value: { summary: 'fallback' },
      reason: 'reply contained no parseable JSON',
    });
  });

  it('degrades with the failing path when the shape is wrong', () => {
    expect(decodeReply('{"other": 1}', schema, () => ({ summary: 'fallback' }))).toEqual({
      status: 'degraded',
      value: { summary: 'fallback' },
      reason: 'reply did not match the expected shape at summary: Required',
    });
  });
});

describe('lenient field helpers', () => {
  it('normalizes confidence labels', () => {
    expect(confidence().parse(' HIGH ')).toBe('high');
    expect(confidence().parse('certain')).toBe('medium');
    expect(confidence().parse(undefined)).toBe('medium');
  });

  it('clamps and rounds scores', () => {
    expect(score(70).parse('85.6')).toBe(86);
    expect(score(70).parse(150)).toBe(100);
    expect(score(70).parse(-5)).toBe(0);
    expect(score(70).parse('n/a')).toBe(70);
  });

  it('keeps only non-empty strings in lists', () => {
    expect(textList().parse(['a', '', 3, '  ', 'b'])).toEqual(['a', 'b']);
    expect(textList().parse('not a list')).toEqual([]);
  });
});
