// Field parsers for IndyStats values. Each one returns null when the value
// cannot be read, and returns already-parsed values unchanged.

const INVISIBLE_CHARS = /[\u200B-\u200D\u2060\uFEFF]/g;
const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  quot: '"',
  apos: "'",
  lt: '<',
  gt: '>',
  nbsp: ' ',
};
const ENTITY = /&(#\d+|#x[0-9a-fA-F]+|[a-zA-Z]+);/g;

const MAX_CODE_POINT = 0x10ffff;

function fromCodePoint(match: string, codePoint: number): string {
  return Number.isInteger(codePoint) && codePoint <= MAX_CODE_POINT
    ? String.fromCodePoint(codePoint)
    : match;
}

function decodeEntity(match: string, body: string): string {
  if (body.startsWith('#x') || body.startsWith('#X')) {
    return fromCodePoint(match, Number.parseInt(body.slice(2), 16));
  }
  if (body.startsWith('#')) {
    return fromCodePoint(match, Number.parseInt(body.slice(1), 10));
  }
  return NAMED_ENTITIES[body.toLowerCase()] ?? match;
}

export type CleanTextOptions = {
  // Off for text that was already cleaned once, so `&amp;amp;` stays `&amp;`.
  decodeEntities?: boolean;
};

export function cleanText(value: unknown, options: CleanTextOptions = {}): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  if (typeof value === 'number' && !Number.isFinite(value)) return null;
  const raw = String(value);
  const text = (options.decodeEntities === false ? raw : raw.replace(ENTITY, decodeEntity))
    .replace(INVISIBLE_CHARS, '')
    .replace(/\u00A0/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return text.length > 0 ? text : null;
}

export function parseInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  const text = cleanText(value);
  if (!text || !/^[+-]?\d+(?:\.0+)?$/.test(text)) return null;
  return Number.parseInt(text, 10);
}

export function parseDecimal(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const text = cleanText(value);
  if (!text || !/^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/.test(text)) return null;
  return Number(text);
}

/**
 * Reads "SS.ffff", "M:SS.ffff" or "H:MM:SS.ffff" as seconds. The result is
 * rounded to the precision of the input so "1:23.4567" gives exactly 83.4567.
 */
export function parseDurationSeconds(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  const text = cleanText(value);
  if (!text) return null;
  const parts = text.split(':');
  if (parts.length > 3) return null;
  const last = parts[parts.length - 1];
  if (!/^\d+(?:\.\d+)?$/.test(last)) return null;
  const leading = parts.slice(0, -1);
  if (leading.some((part) => !/^\d+$/.test(part))) return null;

  let total = Number(last);
  let unit = 60;
  for (let i = leading.length - 1; i >= 0; i -= 1) {
    total += Number(leading[i]) * unit;
    unit *= 60;
  }
  const decimals = last.includes('.') ? last.length - last.indexOf('.') - 1 : 0;
  return Number(total.toFixed(decimals));
}

export function parseEventDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : toUtcDay(value);
  }
  const text = cleanText(value);
  if (!text) return null;

  const wcf = /^\/Date\((-?\d+)(?:[+-]\d{4})?\)\/$/.exec(text);
  if (wcf) return toUtcDay(new Date(Number(wcf[1])));

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s.*)?$/.exec(text);
  if (us) return utcDate(Number(us[3]), Number(us[1]), Number(us[2]));

  const iso = /^(\d{4})-(\d{2})-(\d{2})(?:T.*)?$/.exec(text);
  if (iso) return utcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  return null;
}

export function parseBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (value === 1 || value === 0) return value === 1;
  const text = cleanText(value)?.toLowerCase();
  if (text === 'true' || text === '1' || text === 'yes') return true;
  if (text === 'false' || text === '0' || text === 'no') return false;
  return null;
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function utcDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

function toUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}
