// A space or apostrophe only groups thousands when exactly three digits follow.
const NUMBER_RUN_RE = /[-+]?\d+(?:(?:[.,]|[ \u00a0\u202f'](?=\d{3}(?!\d)))\d+)*/;
const UNIT_SUFFIX_RE = /^\s*([A-Za-zÄÖÜäöüß%°/]+)\.?/;
const TIMES_UNITS = new Set(['x', '×']);

export interface ParsedNumber {
  value: number;
  index: number;
  length: number;
}

export interface ParsedQuantity {
  value: number;
  unit?: string;
}

function interpretNumber(raw: string): number | null {
  let s = raw.replace(/[ \u00a0\u202f']/g, '');
  const lastDot = s.lastIndexOf('.');
  const lastComma = s.lastIndexOf(',');

  if (lastDot >= 0 && lastComma >= 0) {
    const decimal = lastDot > lastComma ? '.' : ',';
    const thousands = decimal === '.' ? ',' : '.';
    s = s.split(thousands).join('').replace(decimal, '.');
  } else if (lastDot >= 0 || lastComma >= 0) {
    const sep = lastDot >= 0 ? '.' : ',';
    const parts = s.split(sep);
    const head = parts[0].replace(/^[-+]/, '');
    const tail = parts.slice(1);
    const allGroupsOfThree = tail.every((p) => p.length === 3);

    if (parts.length > 2) {
      if (!allGroupsOfThree) return null;
      s = parts.join('');
    } else if (allGroupsOfThree && head.length >= 1 && head.length <= 3 && !/^0+$/.test(head)) {
      // "1,000" and "1.000" read as thousands; "2,5" and "0,500" as decimals
      s = parts.join('');
    } else {
      s = parts.join('.');
    }
  }

  const value = Number(s);
  return Number.isFinite(value) ? value : null;
}

export function parseLocaleNumber(text: string): ParsedNumber | null {
  const m = NUMBER_RUN_RE.exec(text);
  if (!m) return null;
  const value = interpretNumber(m[0]);
  if (value === null) return null;
  return { value, index: m.index, length: m[0].length };
}

export function parseQuantity(text: string): ParsedQuantity | null {
  const parsed = parseLocaleNumber(text);
  if (!parsed || parsed.value < 0) return null;

  const rest = text.slice(parsed.index + parsed.length);
  const unitMatch = UNIT_SUFFIX_RE.exec(rest);
  let unit = unitMatch ? unitMatch[1] : undefined;
  if (unit && TIMES_UNITS.has(unit.toLowerCase())) unit = 'Stk';

  return unit ? { value: parsed.value, unit } : { value: parsed.value };
}

/** Integer ordinal of a position label, or null when it is not a plain number. */
export function positionOrdinal(position: string | undefined): number | null {
  if (!position) return null;
  const trimmed = position.trim().replace(/\.$/, '');
  if (!/^\d[\d.,' ]*$/.test(trimmed)) return null;
  const parsed = parseLocaleNumber(trimmed);
  if (!parsed || parsed.length !== trimmed.length) return null;
  return Number.isInteger(parsed.value) ? parsed.value : null;
}
