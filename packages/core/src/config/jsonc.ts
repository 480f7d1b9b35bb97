/**
 * JSONC (JSON with comments and trailing commas), the format editors use for
 * `http-client.env.json` and `reqchain.jsonc`.
 */

type ScanState = 'code' | 'string' | 'line-comment' | 'block-comment';

/**
 * Remove `//` and `/* *\/` comments outside of string literals.
 * Newlines inside comments are kept so error positions still line up.
 */
export function stripJsonComments(content: string): string {
  let out = '';
  let state: ScanState = 'code';

  for (let i = 0; i < content.length; i++) {
    const char = content.charAt(i);
    const next = content.charAt(i + 1);

    if (state === 'string') {
      out += char;
      if (char === '\\') {
        out += next;
        i++;
      } else if (char === '"') {
        state = 'code';
      }
      continue;
    }

    if (state === 'line-comment') {
      if (char === '\n' || char === '\r') {
        out += char;
        state = 'code';
      }
      continue;
    }

    if (state === 'block-comment') {
      if (char === '*' && next === '/') {
        state = 'code';
        i++;
      } else if (char === '\n' || char === '\r') {
        out += char;
      }
      continue;
    }

    if (char === '"') {
      state = 'string';
      out += char;
    } else if (char === '/' && next === '/') {
      state = 'line-comment';
      i++;
    } else if (char === '/' && next === '*') {
      state = 'block-comment';
      i++;
    } else {
      out += char;
    }
  }

  return out;
}

/**
 * Drop commas that directly precede `}` or `]` (ignoring whitespace).
 * Expects input that no longer contains comments.
 */
export function stripTrailingCommas(content: string): string {
  let out = '';
  let inString = false;

  for (let i = 0; i < content.length; i++) {
    const char = content.charAt(i);

    if (inString) {
      out += char;
      if (char === '\\') {
        out += content.charAt(i + 1);
        i++;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === ',') {
      const rest = content.slice(i + 1).trimStart();
      if (rest.startsWith('}') || rest.startsWith(']')) continue;
    }
    out += char;
  }

  return out;
}

/**
 * Parse JSONC content.
 *
 * @throws {SyntaxError} when the content is not valid once comments and
 * trailing commas are removed
 */
export function parseJsonc(content: string): unknown {
  const cleaned = stripTrailingCommas(stripJsonComments(content));
  try {
    const parsed: unknown = JSON.parse(cleaned);
    return parsed;
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new SyntaxError(`Invalid JSONC: ${err.message}`);
    }
    throw err;
  }
}
