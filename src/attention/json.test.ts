import { describe, expect, test } from 'vitest';

import { DecisionParseError } from './errors.js';
import { extractJsonObject } from './json.js';

describe('extractJsonObject', () => {
  test('parses a bare object', () => {
    expect(extractJsonObject('{"should_reply": false}')).toEqual({ should_reply: false });
  });

  test('prefers a fenced json block over surrounding braces', () => {
    const text = [
      'Thinking about {the vibe} here.',
      '```json',
      '{"should_reply": true, "reply_content": "count me in"}',
      '```',
      'done {ok}',
    ].join('\n');
    expect(extractJsonObject(text)).toEqual({ should_reply: true, reply_content: 'count me in' });
  });

  test('accepts a fence without a language tag', () => {
    expect(extractJsonObject('```\n{"should_reply": false}\n```')).toEqual({
      should_reply: false,
    });
  });

  test('falls back to the widest brace span in prose', () => {
    const text = 'Sure! {"should_reply": true, "reply_content": "{nested} braces"} hope that helps';
    expect(extractJsonObject(text)).toEqual({
      should_reply: true,
      reply_content: '{nested} braces',
    });
  });

  test('falls back to braces when the fence holds something else', () => {
    const text = '```\nnot json\n```\n{"should_reply": false}';
    expect(extractJsonObject(text)).toEqual({ should_reply: false });
  });

  test('throws DecisionParseError when nothing parses', () => {
    expect(() => extractJsonObject('I would rather not say.')).toThrow(DecisionParseError);
    expect(() => extractJsonObject('{broken')).toThrow('No JSON object found in model output.');
  });

  test('keeps the raw text on the error', () => {
    try {
      extractJsonObject('{ nope }');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DecisionParseError);
      if (err instanceof DecisionParseError) expect(err.rawText).toBe('{ nope }');
    }
  });
});
