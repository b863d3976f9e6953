/**
 * @tagimage/core — bool host word primitives
 *
 * Booleans live as single bits of a little-endian 32-bit host word. Bit j of
 * the word is the (j + 1)-th boolean of its 32-bit group.
 *
 * Bit layout:
 *   mask = (1 << bit) >>> 0
 *   test:  word & mask
 *   set:   word | mask
 *   clear: word & ~mask
 *
 * `>>> 0` keeps bit 31 an unsigned u32 instead of a negative int32.
 */

/** Read bit `bit` of the u32 host word at `byteOffset`. */
export function readBoolBit(dv: DataView, byteOffset: number, bit: number): boolean {
  const word = dv.getUint32(byteOffset, /* littleEndian */ true);
  return ((word >>> bit) & 1) === 1;
}

/**
 * Set or clear bit `bit` of the u32 host word at `byteOffset`.
 * The other 31 bits of the word are written back unchanged.
 */
export function writeBoolBit(dv: DataView, byteOffset: number, bit: number, value: boolean): void {
  const word = dv.getUint32(byteOffset, true);
  const mask = (1 << bit) >>> 0;
  const next = value ? (word | mask) >>> 0 : (word & ~mask) >>> 0;
  dv.setUint32(byteOffset, next, true);
}
