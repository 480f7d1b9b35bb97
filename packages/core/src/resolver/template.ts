export type TemplatePart =
  | { type: 'text'; value: string }
  | { type: 'expr'; expression: string; raw: string };

/**
 * Split a template into literal text and `{{expression}}` parts.
 *
 * An expression runs from `{{` to the first `}`, which must start a `}}`;
 * anything else (empty `{{}}`, a lone `}`, a missing `}}`) stays literal text.
 */
export function splitTemplate(input: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let textStart = 0;
  let i = 0;

  while (i < input.length - 1) {
    if (input[i] !== '{' || input[i + 1] !== '{') {
      i++;
      continue;
    }

    const close = input.indexOf('}', i + 2);
    if (close === -1) break;
    if (close === i + 2 || input[close + 1] !== '}') {
      i++;
      continue;
    }

    if (i > textStart) {
      parts.push({ type: 'text', value: input.slice(textStart, i) });
    }
    parts.push({
      type: 'expr',
      expression: input.slice(i + 2, close),
      raw: input.slice(i, close + 2)
    });
    i = close + 2;
    textStart = i;
  }

  if (textStart < input.length) {
    parts.push({ type: 'text', value: input.slice(textStart) });
  }

  return parts;
}

/**
 * Replace every placeholder with `lookup(expression)`, or keep its raw text
 * when the lookup yields `undefined`. Output is never scanned again.
 */
export function replacePlaceholders(
  input: string,
  lookup: (expression: string) => string | undefined
): string {
  let out = '';
  for (const part of splitTemplate(input)) {
    if (part.type === 'text') {
      out += part.value;
      continue;
    }
    out += lookup(part.expression.trim()) ?? part.raw;
  }
  return out;
}

/**
 * Names of all placeholders in `input`, trimmed, in order of appearance.
 */
export function listPlaceholders(input: string): string[] {
  return splitTemplate(input).flatMap((part) =>
    part.type === 'expr' ? [part.expression.trim()] : []
  );
}
