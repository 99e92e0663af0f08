/**
 * Text repairs for near-JSON payloads.
 *
 * The listing endpoint has been seen to emit dashboard-only JavaScript
 * (`viewDashboard: true`, `true && false`), HTML entities, raw control
 * characters inside strings, stray backslashes, trailing commas and
 * truncated bodies. Each repair is exported separately for testing.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  apos: "'",
  nbsp: ' ',
  quot: '\\"',
};

const SIMPLE_ESCAPES = new Set(['"', '\\', '/', 'b', 'f', 'n', 'r', 't']);

const CONTROL_ESCAPES: Record<string, string> = {
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f',
};

/**
 * Marks every index that falls inside a string literal, quotes included.
 * Unterminated strings run to the end of the text.
 */
function stringLiteralMask(text: string): Uint8Array {
  const mask = new Uint8Array(text.length);
  let inString = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      mask[i] = 1;
      if (ch === '\\' && i + 1 < text.length) {
        mask[++i] = 1;
      } else if (ch === '"') {
        inString = false;
      }
    } else if (ch === '"') {
      inString = true;
      mask[i] = 1;
    }
  }
  return mask;
}

/**
 * Replace matches of a global `pattern` that start outside string
 * literals. Matches starting inside a string are left as they are.
 */
function replaceOutsideStrings(
  text: string,
  pattern: RegExp,
  replacement: string,
): string {
  const mask = stringLiteralMask(text);
  const regex = new RegExp(pattern.source, pattern.flags);
  const parts: string[] = [];
  let last = 0;
  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    const start = match.index;
    if (mask[start] === 1) {
      regex.lastIndex = start + 1;
      continue;
    }
    parts.push(text.slice(last, start), replacement);
    last = start + match[0].length;
  }
  parts.push(text.slice(last));
  return parts.join('');
}

/**
 * Remove unquoted `viewXxx: <value>` members.
 */
export function stripDashboardFields(text: string): string {
  return replaceOutsideStrings(
    text,
    /(?<![\w"'])\s*view[A-Za-z]+\s*:\s*[^,\n]+,?/g,
    '',
  );
}

/**
 * Replace `: true && ...,` expressions with `: false,`.
 */
export function replaceBooleanExpressions(text: string): string {
  return replaceOutsideStrings(text, /\s*:\s*true\s*&&.*?,/g, ': false,');
}

/**
 * Decode HTML entities in a single pass. Quotes decode to an escaped
 * quote so they cannot terminate a JSON string.
 */
export function decodeHtmlEntities(text: string): string {
  return text.replace(
    /&(#\d+|#x[0-9a-f]+|[a-z]+);/gi,
    (entity: string, body: string) => {
      if (body.startsWith('#')) {
        const codePoint =
          body[1] === 'x' || body[1] === 'X'
            ? Number.parseInt(body.slice(2), 16)
            : Number.parseInt(body.slice(1), 10);
        if (codePoint === 34) return '\\"';
        if (codePoint === 92) return '\\\\';
        return codePoint > 0 && codePoint <= 0x10ffff
          ? String.fromCodePoint(codePoint)
          : entity;
      }
      return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
    },
  );
}

function escapeControlCharacter(ch: string): string {
  return (
    CONTROL_ESCAPES[ch] ??
    `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

function dropTrailingComma(out: string[]): void {
  let i = out.length - 1;
  while (i >= 0 && /\s/.test(out[i])) i--;
  if (i >= 0 && out[i] === ',') {
    out.splice(i, 1);
  }
}

/**
 * String-aware structural repair:
 * - escape raw control characters inside strings
 * - double backslashes that do not start a valid escape
 * - drop trailing commas before a closing bracket
 * - drop closing brackets that match nothing
 * - close an unterminated string and any unclosed brackets
 */
export function repairJsonStructure(text: string): string {
  const out: string[] = [];
  const closers: string[] = [];
  let inString = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (ch === '\\') {
        const next = text[i + 1];
        if (next === 'u' && /^[0-9a-fA-F]{4}$/.test(text.slice(i + 2, i + 6))) {
          out.push(text.slice(i, i + 6));
          i += 5;
        } else if (next !== undefined && SIMPLE_ESCAPES.has(next)) {
          out.push(ch, next);
          i++;
        } else {
          out.push('\\\\');
        }
      } else if (ch === '"') {
        inString = false;
        out.push(ch);
      } else if (ch.charCodeAt(0) < 0x20) {
        out.push(escapeControlCharacter(ch));
      } else {
        out.push(ch);
      }
      continue;
    }

    switch (ch) {
      case '"':
        inString = true;
        out.push(ch);
        break;
      case '{':
        closers.push('}');
        out.push(ch);
        break;
      case '[':
        closers.push(']');
        out.push(ch);
        break;
      case '}':
      case ']':
        if (closers[closers.length - 1] === ch) {
          closers.pop();
          dropTrailingComma(out);
          out.push(ch);
        }
        break;
      default:
        out.push(ch);
    }
  }

  if (inString) {
    out.push('"');
  }
  while (closers.length > 0) {
    dropTrailingComma(out);
    out.push(closers.pop() ?? '');
  }

  return out.join('');
}

/**
 * Full cleanup pipeline applied by the cleanup strategy.
 */
export function cleanJsonText(text: string): string {
  let cleaned = stripDashboardFields(text);
  cleaned = replaceBooleanExpressions(cleaned);
  cleaned = decodeHtmlEntities(cleaned);
  return repairJsonStructure(cleaned.trim());
}
