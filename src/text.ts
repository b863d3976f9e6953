/**
 * @tagimage/core — value text
 *
 * Test cases arrive as text cells and results are compared as text. These
 * helpers convert between a kind's text form and FieldValue. Range checks are
 * the encoder's job; parsing only rejects text that is not a number (or a
 * boolean) at all.
 */

import { ValueParseError, err, ok } from './errors';
import type { FieldValue, PackedKind, Result } from './types';

const INTEGER_TEXT = /^[+-]?\d+$/;
const BOOL_TEXT    = /^(?:1|0|true|false)$/i;

/**
 * Parse `text` as a value of `kind`.
 *
 *   bool     1, 0, true, false (any case)
 *   integers optional sign and decimal digits; lint64 parses to bigint
 *   real32   any decimal or exponent form Number() accepts, plus NaN/Infinity
 */
export function parseFieldValue(kind: PackedKind, text: string): Result<FieldValue, ValueParseError> {
  const t = text.trim();

  switch (kind) {
    case 'bool':
      if (!BOOL_TEXT.test(t)) return err(new ValueParseError(kind, text));
      return ok(t === '1' || t.toLowerCase() === 'true');

    case 'lint64':
      if (!INTEGER_TEXT.test(t)) return err(new ValueParseError(kind, text));
      return ok(BigInt(t.startsWith('+') ? t.slice(1) : t));

    case 'sint8':
    case 'int16':
    case 'dint32':
      if (!INTEGER_TEXT.test(t)) return err(new ValueParseError(kind, text));
      return ok(Number(t));

    case 'real32': {
      const n = Number(t);
      // Number('') is 0 and Number('abc') is NaN; only the literal NaN may yield NaN.
      if (t === '' || (Number.isNaN(n) && t !== 'NaN')) return err(new ValueParseError(kind, text));
      return ok(n);
    }
  }
}

/**
 * Format a decoded value the way the controller displays it.
 *
 *   bool     "1" / "0"
 *   integers decimal
 *   real32   the shortest decimal that reads back as the same single
 *            precision value ("3.14", not "3.140000104904175")
 */
export function formatFieldValue(kind: PackedKind, value: FieldValue): string {
  if (kind === 'bool') {
    return value === true || value === 1 || value === 1n ? '1' : '0';
  }
  if (kind === 'real32' && typeof value === 'number') return formatReal32(value);
  return String(value);
}

function formatReal32(v: number): string {
  if (!Number.isFinite(v)) return String(v);
  const single = Math.fround(v);
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(single.toPrecision(precision));
    if (Math.fround(candidate) === single) return String(candidate);
  }
  return String(single);
}
