/**
 * Best-effort parsers for free-form LLM responses.
 *
 * None of these throw: a response that does not contain the expected shape
 * yields `null` and the caller picks its own fallback.
 */

const QUOTES = new Set(["'", '"']);

/**
 * Locate the first `[ ... ]` in `text`, ignoring brackets inside quoted strings.
 * Returns the text between the brackets.
 */
function findFirstList(text: string): string | null {
  const start = text.indexOf('[');
  if (start === -1) return null;

  let quote: string | null = null;
  for (let i = start + 1; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
    } else if (QUOTES.has(ch)) {
      quote = ch;
    } else if (ch === ']') {
      return text.slice(start + 1, i);
    }
  }
  return null;
}

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r' };

/**
 * Parse the body of a list literal made only of quoted strings:
 * `'a', "b",` → ['a', 'b']. Anything else is a parse failure.
 */
function parseStringItems(body: string): string[] | null {
  const items: string[] = [];
  let i = 0;

  const skipWhitespace = () => {
    while (i < body.length && /\s/.test(body[i])) i++;
  };

  skipWhitespace();
  while (i < body.length) {
    const quote = body[i];
    if (!QUOTES.has(quote)) return null;
    i++;

    let value = '';
    let closed = false;
    while (i < body.length) {
      const ch = body[i];
      if (ch === '\\' && i + 1 < body.length) {
        const next = body[i + 1];
        value += ESCAPES[next] ?? next;
        i += 2;
        continue;
      }
      if (ch === quote) {
        closed = true;
        i++;
        break;
      }
      value += ch;
      i++;
    }
    if (!closed) return null;
    items.push(value);

    skipWhitespace();
    if (i >= body.length) break;
    if (body[i] !== ',') return null;
    i++;
    skipWhitespace();
  }

  return items;
}

/**
 * Extract the first bracketed list of string literals, e.g. from
 * "You need ['requests', 'numpy'] for this." → ['requests', 'numpy'].
 */
export function extractListLiteral(text: string): string[] | null {
  const body = findFirstList(text);
  if (body === null) return null;
  return parseStringItems(body);
}

/**
 * Extract the first fenced code block (```lang ... ```). Everything outside
 * the fence is discarded; an unterminated fence runs to the end of the text.
 */
export function extractCodeBlock(text: string): string | null {
  const lines = text.split(/\r?\n/);
  const open = lines.findIndex((line) => line.trim().startsWith('```'));
  if (open === -1) return null;

  const body: string[] = [];
  for (const line of lines.slice(open + 1)) {
    if (line.trim() === '```') break;
    body.push(line);
  }
  return body.join('\n');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull a JSON object out of a response: raw JSON, a fenced block, or the
 * outermost `{ ... }` span, in that order.
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const candidates: string[] = [text.trim()];

  const fenced = extractCodeBlock(text);
  if (fenced !== null) candidates.push(fenced.trim());

  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first !== -1 && last > first) candidates.push(text.slice(first, last + 1));

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (isRecord(parsed)) return parsed;
    } catch {
      // try the next candidate
    }
  }
  return null;
}
