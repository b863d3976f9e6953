/**
 * @tagimage/core — encoding (values → image)
 *
 * encode() writes named values into a memory image using a Layout.
 *
 * ── Non-interference ────────────────────────────────────────────────────────
 *
 * Only the bytes of updated fields change. A bool update rewrites its host
 * word with the other 31 bits read back from the same image, so neighbouring
 * booleans keep their values. Every other byte of the result is bit-for-bit
 * the input's.
 *
 * ── Per-field failures ──────────────────────────────────────────────────────
 *
 * Each update is validated before anything is written for it. A path missing
 * from the layout is a FieldNotFoundError; a value the field's kind cannot
 * hold is a ValueRangeError. The failing field writes nothing, the remaining
 * updates still apply, and every failure is returned in `errors`.
 *
 * ── Ownership ───────────────────────────────────────────────────────────────
 *
 * By default the input image is copied and the copy is returned. With
 * `inPlace: true` the caller's image is mutated and returned; the caller must
 * not encode into the same image concurrently.
 */

import { writeBoolBit } from './bitset';
import {
  DINT32_MAX,
  DINT32_MIN,
  INT16_MAX,
  INT16_MIN,
  LINT64_MAX,
  LINT64_MIN,
  SINT8_MAX,
  SINT8_MIN,
} from './constants';
import {
  FieldNotFoundError,
  ImageTooSmallError,
  ValueParseError,
  ValueRangeError,
  err,
  ok,
} from './errors';
import { parseFieldValue } from './text';
import type { FieldValue, FieldValues, Layout, PlacedField, Result } from './types';
import { fieldIndexOf, imageView } from './view';

// ─── Public types ─────────────────────────────────────────────────────────────

export interface EncodeOptions {
  /** Mutate and return the caller's image instead of a copy. Default false. */
  readonly inPlace?: boolean;
}

export type FieldUpdateError = FieldNotFoundError | ValueRangeError | ValueParseError;

export interface EncodeOutcome {
  /** The written image: a copy of the input, or the input itself when inPlace. */
  readonly image:  Uint8Array;
  /** One entry per update that wrote nothing, in update order. */
  readonly errors: readonly FieldUpdateError[];
}

// ─── encode ───────────────────────────────────────────────────────────────────

/**
 * Write `updates` (keyed by PlacedField.path) into an image.
 *
 * Fails as a whole only when the image is shorter than the layout; field
 * failures are reported in the outcome.
 *
 * Integer kinds take a number or a bigint, LINT included, and a bool takes
 * true/false or 0/1. decode() always returns a LINT as bigint and a bool as
 * boolean, so `Total: 12` reads back as `12n` and `Run: 1` as `true`.
 * verifyUpdates() treats those forms as equal.
 */
export function encode(
  layout:  Layout,
  image:   Uint8Array,
  updates: FieldValues,
  options: EncodeOptions = {},
): Result<EncodeOutcome, ImageTooSmallError> {
  const pending = Object.entries(updates).map(([path, value]): PendingUpdate => ({ path, value }));
  return writeUpdates(layout, image, pending, options);
}

/**
 * Parse text values (as a test-case sheet supplies them) with
 * parseFieldValue() and encode them. Unparseable text is a ValueParseError
 * for that field; other fields still apply.
 */
export function encodeText(
  layout:      Layout,
  image:       Uint8Array,
  textUpdates: Readonly<Record<string, string>>,
  options:     EncodeOptions = {},
): Result<EncodeOutcome, ImageTooSmallError> {
  const index = fieldIndexOf(layout);

  const pending = Object.entries(textUpdates).map(([path, text]): PendingUpdate => {
    const f = index.get(path);
    if (f === undefined) return { path, error: new FieldNotFoundError(path) };

    const parsed = parseFieldValue(f.kind, text);
    return parsed.ok
      ? { path, value: parsed.value }
      : { path, error: new ValueParseError(f.kind, text, path) };
  });

  return writeUpdates(layout, image, pending, options);
}

// ─── Write loop ───────────────────────────────────────────────────────────────

/** One update to apply, or the failure already found for it. */
type PendingUpdate =
  | { readonly path: string; readonly value: FieldValue }
  | { readonly path: string; readonly error: FieldUpdateError };

function writeUpdates(
  layout:  Layout,
  image:   Uint8Array,
  pending: readonly PendingUpdate[],
  options: EncodeOptions,
): Result<EncodeOutcome, ImageTooSmallError> {
  if (image.byteLength < layout.totalByteSize) {
    return err(new ImageTooSmallError(image.byteLength, layout.totalByteSize));
  }

  const target = options.inPlace ? image : image.slice();
  const dv     = imageView(target);
  const index  = fieldIndexOf(layout);
  const errors: FieldUpdateError[] = [];

  for (const update of pending) {
    if ('error' in update) {
      errors.push(update.error);
      continue;
    }
    const f = index.get(update.path);
    if (f === undefined) {
      errors.push(new FieldNotFoundError(update.path));
      continue;
    }
    const failure = writeField(dv, f, update.value);
    if (failure !== undefined) errors.push(failure);
  }

  return ok({ image: target, errors });
}

// ─── Primitive write ──────────────────────────────────────────────────────────

/** Validate and write one value. Returns the failure, or undefined on success. */
function writeField(dv: DataView, f: PlacedField, value: FieldValue): ValueRangeError | undefined {
  const off = f.byteOffset;

  switch (f.kind) {
    case 'bool': {
      const v = toBool(value);
      if (v === undefined) return rangeError(f, value);
      writeBoolBit(dv, off, f.bitOffset ?? 0, v);
      return undefined;
    }
    case 'sint8': {
      const v = toInteger(value, SINT8_MIN, SINT8_MAX);
      if (v === undefined) return rangeError(f, value);
      dv.setInt8(off, v);
      return undefined;
    }
    case 'int16': {
      const v = toInteger(value, INT16_MIN, INT16_MAX);
      if (v === undefined) return rangeError(f, value);
      dv.setInt16(off, v, /* le */ true);
      return undefined;
    }
    case 'dint32': {
      const v = toInteger(value, DINT32_MIN, DINT32_MAX);
      if (v === undefined) return rangeError(f, value);
      dv.setInt32(off, v, true);
      return undefined;
    }
    case 'lint64': {
      const v = toInt64(value);
      if (v === undefined) return rangeError(f, value);
      dv.setBigInt64(off, v, true);
      return undefined;
    }
    case 'real32': {
      const v = toFloat32(value);
      if (v === undefined) return rangeError(f, value);
      dv.setFloat32(off, v, true);
      return undefined;
    }
  }
}

function rangeError(f: PlacedField, value: FieldValue): ValueRangeError {
  return new ValueRangeError(f.path, f.kind, f.byteOffset, value);
}

// ─── Value coercion helpers ───────────────────────────────────────────────────
//
// Each returns undefined when the value is not representable in the kind.
// number and bigint inputs are interchangeable for integer kinds; a number
// must be an integer. Booleans only go into bool fields.

function toInteger(v: FieldValue, min: number, max: number): number | undefined {
  if (typeof v === 'number') {
    return Number.isInteger(v) && v >= min && v <= max ? v : undefined;
  }
  if (typeof v === 'bigint') {
    return v >= BigInt(min) && v <= BigInt(max) ? Number(v) : undefined;
  }
  return undefined;
}

function toInt64(v: FieldValue): bigint | undefined {
  if (typeof v === 'bigint') return v >= LINT64_MIN && v <= LINT64_MAX ? v : undefined;
  if (typeof v === 'number') return Number.isSafeInteger(v) ? BigInt(v) : undefined;
  return undefined;
}

function toFloat32(v: FieldValue): number | undefined {
  if (typeof v !== 'number') return undefined;
  // NaN and ±Infinity have single precision encodings; finite overflow does not.
  if (Number.isFinite(v) && !Number.isFinite(Math.fround(v))) return undefined;
  return v;
}

function toBool(v: FieldValue): boolean | undefined {
  if (typeof v === 'boolean') return v;
  if (v === 0 || v === 0n) return false;
  if (v === 1 || v === 1n) return true;
  return undefined;
}
