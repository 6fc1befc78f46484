import { ModelOutputError, outermostJsonSpan, parseModelJson, repairJson } from '../../src/llm/json';

describe('parseModelJson', () => {
  test('parses plain JSON', () => {
    expect(parseModelJson('{"findings": []}')).toEqual({ findings: [] });
  });

  test('unwraps a fenced block', () => {
    expect(parseModelJson('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
    expect(parseModelJson('Sure:\n```\n[1, 2]\n```\nAnything else?')).toEqual([1, 2]);
  });

  test('extracts JSON surrounded by prose', () => {
    expect(parseModelJson('Here you go: {"findings": []} Let me know.')).toEqual({ findings: [] });
  });

  test('ignores brackets inside strings when finding the span', () => {
    expect(parseModelJson('Result: [{"a": "]"}] done')).toEqual([{ a: ']' }]);
  });

  test('repairs trailing commas', () => {
    expect(parseModelJson('{"a": [1, 2,],}')).toEqual({ a: [1, 2] });
  });

  test('repairs raw newlines inside strings', () => {
    expect(parseModelJson('{"d": "line1\nline2"}')).toEqual({ d: 'line1\nline2' });
  });

  test('fails when there is no JSON at all', () => {
    expect(() => parseModelJson('no json here')).toThrow(ModelOutputError);
    expect(() => parseModelJson('no json here')).toThrow('No JSON object or array found in model output');
  });

  test('fails when the JSON cannot be repaired', () => {
    expect(() => parseModelJson('{"a": }')).toThrow(/^Model output is not valid JSON: /);
  });

  test('keeps an excerpt of the raw output', () => {
    try {
      parseModelJson('x'.repeat(300));
      throw new Error('expected parseModelJson to throw');
    } catch (err) {
      expect(err instanceof ModelOutputError && err.excerpt).toBe('x'.repeat(200));
    }
  });
});

describe('outermostJsonSpan', () => {
  test('takes whichever bracket opens first', () => {
    expect(outermostJsonSpan('a {"b": [1]} c')).toBe('{"b": [1]}');
    expect(outermostJsonSpan('[{"b": 1}]')).toBe('[{"b": 1}]');
  });

  test('returns undefined for unbalanced input', () => {
    expect(outermostJsonSpan('{"a": 1')).toBeUndefined();
  });
});

describe('repairJson', () => {
  test('leaves escaped quotes alone', () => {
    expect(repairJson('{"a": "say \\"hi\\"",}')).toBe('{"a": "say \\"hi\\""}');
  });

  test('escapes tabs inside strings only', () => {
    expect(repairJson('{\t"a": "x\ty"}')).toBe('{\t"a": "x\\ty"}');
  });
});
