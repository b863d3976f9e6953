/**
 * @tagimage/core — error taxonomy and Result helpers
 *
 * Every failure is local to one type resolution or one field. Errors carry the
 * names and offsets involved as readonly properties so a driver can log them
 * and move on to the next field.
 */

import type { AtomicKind, FieldValue, Result } from './types';

// ─── Base ─────────────────────────────────────────────────────────────────────

export class TagCodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TagCodecError';
  }
}

// ─── Type resolution ──────────────────────────────────────────────────────────

export class TypeNotFoundError extends TagCodecError {
  constructor(readonly typeName: string) {
    super(`Type '${typeName}' is not defined in the type catalog.`);
    this.name = 'TypeNotFoundError';
  }
}

/**
 * The type resolved, but to something that cannot be placed or expanded here:
 * a STRING inside a packed layout, an atomic asked for members, or a
 * composite with no visible members.
 */
export class UnsupportedTypeError extends TagCodecError {
  constructor(readonly typeName: string, reason: string) {
    super(`Type '${typeName}' is not supported: ${reason}.`);
    this.name = 'UnsupportedTypeError';
  }
}

export class MalformedDimensionError extends TagCodecError {
  constructor(readonly fieldName: string, readonly dimension: string) {
    super(
      `Field '${fieldName}' declares dimension '${dimension}'; ` +
      `expected a non-negative integer.`,
    );
    this.name = 'MalformedDimensionError';
  }
}

export class DuplicateNameError extends TagCodecError {
  constructor(readonly duplicateName: string, readonly scope: string) {
    super(`Name '${duplicateName}' is declared more than once in ${scope}.`);
    this.name = 'DuplicateNameError';
  }
}

export class MaxNestingDepthExceededError extends TagCodecError {
  constructor(readonly typeName: string, readonly depth: number, readonly maxDepth: number) {
    super(
      `Type '${typeName}' would be expanded at nesting depth ${depth}; ` +
      `at most ${maxDepth} nested composite levels are allowed.`,
    );
    this.name = 'MaxNestingDepthExceededError';
  }
}

// ─── Codec ────────────────────────────────────────────────────────────────────

export class FieldNotFoundError extends TagCodecError {
  constructor(readonly fieldPath: string) {
    super(`Field '${fieldPath}' is not part of the layout.`);
    this.name = 'FieldNotFoundError';
  }
}

export class ValueRangeError extends TagCodecError {
  constructor(
    readonly fieldPath:  string,
    readonly kind:       AtomicKind,
    readonly byteOffset: number,
    readonly value:      FieldValue,
  ) {
    super(
      `Value ${formatRejected(value)} cannot be stored in field '${fieldPath}' ` +
      `(${kind} at byte ${byteOffset}).`,
    );
    this.name = 'ValueRangeError';
  }
}

export class ValueParseError extends TagCodecError {
  constructor(
    readonly kind:       AtomicKind,
    readonly text:       string,
    readonly fieldPath?: string,
  ) {
    super(
      `Text '${text}' is not a valid ${kind} value` +
      (fieldPath !== undefined ? ` for field '${fieldPath}'.` : '.'),
    );
    this.name = 'ValueParseError';
  }
}

export class ImageTooSmallError extends TagCodecError {
  constructor(readonly byteLength: number, readonly requiredBytes: number) {
    super(
      `Memory image is ${byteLength} bytes; ` +
      `the layout needs at least ${requiredBytes}.`,
    );
    this.name = 'ImageTooSmallError';
  }
}

function formatRejected(value: FieldValue): string {
  return typeof value === 'bigint' ? `${value}n` : String(value);
}

// ─── Result helpers ───────────────────────────────────────────────────────────

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

/**
 * Return the value of a successful result or throw its error.
 * For callers that prefer exceptions over inspecting `ok`.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
