/**
 * @tagimage/core — decoding (image → values)
 *
 * decode() turns a memory image into named values using a Layout. TagReader
 * offers typed accessors for hot paths that read a few fields per image.
 *
 * All multi-byte reads are little-endian, the controller's native order.
 * Integers are two's complement; sint8 sign-extends (0xFF → -1); real32 is
 * IEEE-754 single precision; lint64 decodes to bigint; a bool is one bit of
 * its host word.
 *
 * Neither decode() nor TagReader keeps a reference to an image after the call
 * that was given it returns.
 */

import { readBoolBit } from './bitset';
import { FieldNotFoundError, ImageTooSmallError, err, ok } from './errors';
import type {
  FieldValue,
  FieldValues,
  Layout,
  PackedKind,
  PlacedField,
  Result,
} from './types';

// ─── Field Index ──────────────────────────────────────────────────────────────

// Layouts are immutable, so one path index per Layout object is enough.
const fieldIndexCache = new WeakMap<Layout, ReadonlyMap<string, PlacedField>>();

/** Map from PlacedField.path to PlacedField, built once per Layout. */
export function fieldIndexOf(layout: Layout): ReadonlyMap<string, PlacedField> {
  let index = fieldIndexCache.get(layout);
  if (index === undefined) {
    index = new Map(layout.fields.map(f => [f.path, f] as const));
    fieldIndexCache.set(layout, index);
  }
  return index;
}

/** DataView over exactly the bytes of `image`, whatever its backing buffer. */
export function imageView(image: Uint8Array): DataView {
  return new DataView(image.buffer, image.byteOffset, image.byteLength);
}

// ─── Primitive read ───────────────────────────────────────────────────────────

export function readField(dv: DataView, f: PlacedField): FieldValue {
  const off = f.byteOffset;
  switch (f.kind) {
    case 'bool':   return readBoolBit(dv, off, f.bitOffset ?? 0);
    case 'sint8':  return dv.getInt8(off);
    case 'int16':  return dv.getInt16(off,    /* le */ true);
    case 'dint32': return dv.getInt32(off,    true);
    case 'lint64': return dv.getBigInt64(off, true);
    case 'real32': return dv.getFloat32(off,  true);
  }
}

// ─── decode ───────────────────────────────────────────────────────────────────

export interface DecodeOptions {
  /** Decode only these paths. Unknown paths fail with FieldNotFoundError. */
  readonly fields?: readonly string[];
}

export type DecodeError = ImageTooSmallError | FieldNotFoundError;

/**
 * Decode every placed field (or the requested subset) of `image`.
 * Keys of the returned record are PlacedField paths.
 */
export function decode(
  layout:  Layout,
  image:   Uint8Array,
  options: DecodeOptions = {},
): Result<Record<string, FieldValue>, DecodeError> {
  if (image.byteLength < layout.totalByteSize) {
    return err(new ImageTooSmallError(image.byteLength, layout.totalByteSize));
  }

  const dv  = imageView(image);
  const out: Record<string, FieldValue> = {};

  if (options.fields === undefined) {
    for (const f of layout.fields) out[f.path] = readField(dv, f);
    return ok(out);
  }

  const index = fieldIndexOf(layout);
  for (const path of options.fields) {
    const f = index.get(path);
    if (f === undefined) return err(new FieldNotFoundError(path));
    out[path] = readField(dv, f);
  }
  return ok(out);
}

// ─── Verification ─────────────────────────────────────────────────────────────

export interface FieldMismatch {
  readonly path:     string;
  readonly expected: FieldValue;
  readonly actual:   FieldValue;
}

/**
 * Decode the paths named in `expected` and list every one whose stored value
 * differs. A real32 matches when the stored value equals the expected value
 * rounded to single precision.
 */
export function verifyUpdates(
  layout:   Layout,
  image:    Uint8Array,
  expected: FieldValues,
): Result<FieldMismatch[], DecodeError> {
  const paths   = Object.keys(expected);
  const decoded = decode(layout, image, { fields: paths });
  if (!decoded.ok) return decoded;

  const index      = fieldIndexOf(layout);
  const mismatches: FieldMismatch[] = [];

  for (const path of paths) {
    const f      = index.get(path);
    const want   = expected[path];
    const actual = decoded.value[path];
    if (f === undefined || want === undefined || actual === undefined) continue;
    if (!sameValue(f.kind, want, actual)) mismatches.push({ path, expected: want, actual });
  }

  return ok(mismatches);
}

function sameValue(kind: PackedKind, expected: FieldValue, actual: FieldValue): boolean {
  switch (kind) {
    case 'bool':
      return (expected === true || expected === 1 || expected === 1n) === actual;
    case 'real32':
      if (typeof expected !== 'number' || typeof actual !== 'number') return false;
      return Number.isNaN(expected) ? Number.isNaN(actual) : Math.fround(expected) === actual;
    case 'lint64':
      if (typeof expected === 'bigint') return expected === actual;
      return typeof expected === 'number' && Number.isSafeInteger(expected) && BigInt(expected) === actual;
    default:
      return (typeof expected === 'bigint' ? Number(expected) : expected) === actual;
  }
}

// ─── TagReader ────────────────────────────────────────────────────────────────

/**
 * Typed accessors over one Layout.
 *
 * Each accessor returns null if the path is not in the layout, names a field
 * of a different kind, or the image is shorter than the layout. Construct once
 * per Layout and pass each image to the accessor that reads it.
 */
export class TagReader {
  private readonly _index: ReadonlyMap<string, PlacedField>;

  constructor(readonly layout: Layout) {
    this._index = fieldIndexOf(layout);
  }

  /** Paths in placement order. */
  get paths(): readonly string[] {
    return this.layout.fields.map(f => f.path);
  }

  has(path: string): boolean {
    return this._index.has(path);
  }

  field(path: string): PlacedField | null {
    return this._index.get(path) ?? null;
  }

  get(image: Uint8Array, path: string): FieldValue | null {
    const f = this._index.get(path);
    if (f === undefined || image.byteLength < this.layout.totalByteSize) return null;
    return readField(imageView(image), f);
  }

  getBool(image: Uint8Array, path: string): boolean | null {
    const v = this._read(image, path, 'bool');
    return typeof v === 'boolean' ? v : null;
  }

  getSint(image: Uint8Array, path: string): number | null {
    return this._number(image, path, 'sint8');
  }

  getInt(image: Uint8Array, path: string): number | null {
    return this._number(image, path, 'int16');
  }

  getDint(image: Uint8Array, path: string): number | null {
    return this._number(image, path, 'dint32');
  }

  getReal(image: Uint8Array, path: string): number | null {
    return this._number(image, path, 'real32');
  }

  getLint(image: Uint8Array, path: string): bigint | null {
    const v = this._read(image, path, 'lint64');
    return typeof v === 'bigint' ? v : null;
  }

  private _number(image: Uint8Array, path: string, kind: PackedKind): number | null {
    const v = this._read(image, path, kind);
    return typeof v === 'number' ? v : null;
  }

  private _read(image: Uint8Array, path: string, kind: PackedKind): FieldValue | null {
    const f = this._index.get(path);
    if (f === undefined || f.kind !== kind) return null;
    if (image.byteLength < this.layout.totalByteSize) return null;
    return readField(imageView(image), f);
  }
}
