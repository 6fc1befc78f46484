/**
 * Tolerant JSON extraction from model completions.
 *
 * Models wrap JSON in code fences, prepend prose, leave trailing commas or
 * raw newlines inside strings. parseModelJson() peels those layers off in
 * order: fence, direct parse, outermost bracket span, light repair.
 */

export class ModelOutputError extends Error {
  constructor(
    message: string,
    /** The completion as received, truncated. */
    public readonly excerpt: string,
  ) {
    super(message);
    this.name = 'ModelOutputError';
  }
}

const FENCE = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/;

export function parseModelJson(raw: string): unknown {
  const fenced = raw.trim().match(FENCE);
  const text = fenced ? fenced[1].trim() : raw.trim();

  const direct = tryParse(text);
  if (direct.ok) return direct.value;

  const span = outermostJsonSpan(text);
  if (span === undefined) {
    throw new ModelOutputError('No JSON object or array found in model output', raw.slice(0, 200));
  }

  const extracted = tryParse(span);
  if (extracted.ok) return extracted.value;

  const repaired = tryParse(repairJson(span));
  if (repaired.ok) return repaired.value;
  throw new ModelOutputError(`Model output is not valid JSON: ${repaired.error}`, raw.slice(0, 200));
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/** Drop trailing commas and escape control characters inside string literals. */
export function repairJson(text: string): string {
  const withoutTrailingCommas = text.replace(/,\s*([}\]])/g, '$1');
  let out = '';
  let inString = false;
  let escaped = false;

  for (const ch of withoutTrailingCommas) {
    if (escaped) {
      out += ch;
      escaped = false;
    } else if (inString && ch === '\\') {
      out += ch;
      escaped = true;
    } else if (ch === '"') {
      out += ch;
      inString = !inString;
    } else if (inString && ch.charCodeAt(0) < 0x20) {
      out += escapeControl(ch);
    } else {
      out += ch;
    }
  }
  return out;
}

function escapeControl(ch: string): string {
  switch (ch) {
    case '\n':
      return '\\n';
    case '\r':
      return '\\r';
    case '\t':
      return '\\t';
    default:
      return `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`;
  }
}

/**
 * The first balanced {...} or [...] span, whichever bracket opens first.
 * Brackets inside string literals are ignored.
 */
export function outermostJsonSpan(text: string): string | undefined {
  const objectStart = text.indexOf('{');
  const arrayStart = text.indexOf('[');
  const starts = [objectStart, arrayStart].filter((index) => index !== -1).sort((a, b) => a - b);

  for (const start of starts) {
    const open = text[start];
    const close = open === '{' ? '}' : ']';
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (escaped) {
        escaped = false;
      } else if (inString && ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = !inString;
      } else if (!inString && ch === open) {
        depth++;
      } else if (!inString && ch === close) {
        depth--;
        if (depth === 0) return text.slice(start, i + 1);
      }
    }
  }
  return undefined;
}
