import { randomUUID } from 'node:crypto';

export const BUILTIN_SIGIL = '$';

const INT32_MAX = 2_147_483_647;

export type BuiltinContext = {
  now: () => Date;
  random: () => number;
  processEnv: Record<string, string | undefined>;
};

type Builtin = (arg: string, ctx: BuiltinContext) => string;

// ============================================================================
// $datetime
// ============================================================================

const FORMAT_TOKEN = /YYYY|yyyy|YY|yy|MM|DD|dd|HH|mm|ss|SSS|fff/g;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a date in UTC.
 *
 * Accepts `iso8601`, `rfc1123` or a pattern built from `YYYY`, `YY`, `MM`,
 * `DD`, `HH`, `mm`, `ss`, `SSS` (`yyyy`, `yy`, `dd` and `fff` are aliases).
 */
export function formatDateTime(date: Date, format: string): string {
  const pattern = format.trim().replace(/^(['"])(.*)\1$/, '$2');

  if (pattern === '' || pattern.toLowerCase() === 'iso8601') {
    return date.toISOString();
  }
  if (pattern.toLowerCase() === 'rfc1123') {
    return date.toUTCString();
  }

  return pattern.replace(FORMAT_TOKEN, (token) => {
    switch (token) {
      case 'YYYY':
      case 'yyyy':
        return String(date.getUTCFullYear());
      case 'YY':
      case 'yy':
        return pad(date.getUTCFullYear() % 100);
      case 'MM':
        return pad(date.getUTCMonth() + 1);
      case 'DD':
      case 'dd':
        return pad(date.getUTCDate());
      case 'HH':
        return pad(date.getUTCHours());
      case 'mm':
        return pad(date.getUTCMinutes());
      case 'ss':
        return pad(date.getUTCSeconds());
      default:
        return pad(date.getUTCMilliseconds(), 3);
    }
  });
}

// ============================================================================
// $randomInt
// ============================================================================

function parseIntArg(value: string | undefined): number | undefined {
  if (value === undefined || !/^[+-]?\d+$/.test(value)) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Integer drawn from `[min, max)`. Bounds may be separated by a comma or
 * whitespace; missing or malformed bounds fall back to `0` and 2^31 - 1.
 */
export function randomInt(arg: string, random: () => number): number {
  const [minText, maxText] = arg.split(/[\s,]+/).filter(Boolean);
  const min = parseIntArg(minText) ?? 0;
  const max = parseIntArg(maxText) ?? INT32_MAX;
  if (max <= min) return min;
  return min + Math.floor(random() * (max - min));
}

// ============================================================================
// Registry
// ============================================================================

const BUILTINS: Record<string, Builtin> = {
  datetime: (arg, ctx) => formatDateTime(ctx.now(), arg),
  guid: () => randomUUID(),
  randomInt: (arg, ctx) => String(randomInt(arg, ctx.random)),
  timestamp: (_arg, ctx) => String(Math.floor(ctx.now().getTime() / 1000)),
  processEnv: (arg, ctx) => ctx.processEnv[arg.trim()] ?? '',
  // Reserved for project `.env` lookup; not implemented.
  dotenv: () => ''
};

/**
 * Evaluate a `$name [argument]` expression.
 * Returns `undefined` for unknown generators so the placeholder is kept.
 */
export function resolveBuiltin(expression: string, ctx: BuiltinContext): string | undefined {
  if (!expression.startsWith(BUILTIN_SIGIL)) return undefined;

  const match = expression.slice(1).match(/^(\w+)(?:\s+([\s\S]*))?$/);
  const name = match?.[1];
  if (!name || !Object.prototype.hasOwnProperty.call(BUILTINS, name)) return undefined;

  const builtin = BUILTINS[name];
  return builtin?.(match?.[2]?.trim() ?? '', ctx);
}
