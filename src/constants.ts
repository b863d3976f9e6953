/**
 * @tagimage/core — layout and literal constants
 *
 * These values mirror how a controller packs tag memory and how it prints a
 * tag's initial value. Changing any of them changes every layout fingerprint.
 */

// ─── Boolean Packing ──────────────────────────────────────────────────────────

/** Booleans are packed into 32-bit host words, bit 0 = first bool of the group. */
export const BOOL_WORD_BITS  = 32;
export const BOOL_WORD_BYTES = 4;

// ─── Nesting ──────────────────────────────────────────────────────────────────

/**
 * Maximum number of nested composite levels. A composite entered at depth
 * MAX_NESTING_DEPTH (0-based) fails with MaxNestingDepthExceededError.
 * Also bounds self-referencing type definitions.
 */
export const MAX_NESTING_DEPTH = 8;

// ─── Numeric Ranges ───────────────────────────────────────────────────────────

export const SINT8_MIN  = -0x80;
export const SINT8_MAX  =  0x7f;
export const INT16_MIN  = -0x8000;
export const INT16_MAX  =  0x7fff;
export const DINT32_MIN = -0x80000000;
export const DINT32_MAX =  0x7fffffff;
export const LINT64_MIN = -(1n << 63n);
export const LINT64_MAX =  (1n << 63n) - 1n;

// ─── Literal Text ─────────────────────────────────────────────────────────────

/** Character capacity of a controller STRING's DATA member. */
export const STRING_DATA_LENGTH = 82;

export const LITERAL_INTEGER_ZERO        = '0';
export const LITERAL_REAL_ZERO_DECIMAL   = '0.0';
export const LITERAL_REAL_ZERO_EXPONENT  = '0.00000000e+000';
export const LITERAL_BOOL_ZERO           = '0';
/** An element of a BOOL array prints as a binary-radix word. */
export const LITERAL_BOOL_ARRAY_ZERO     = '2#0';
/** [LEN, 'DATA'] with every DATA character escaped as $00. */
export const LITERAL_STRING_ZERO         =
  `[0,'${'$00'.repeat(STRING_DATA_LENGTH)}']`;
