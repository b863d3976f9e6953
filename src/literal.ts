/**
 * @tagimage/core — default-value literals
 *
 * A new structured tag is created with an initial value written as bracket
 * nested text: `[0,[0.0,0.0],[2#0,2#0]]`. This module produces that text for
 * any type the catalog knows, all members at zero.
 *
 *   atomic      the kind's zero literal
 *   composite   visible members in order, comma joined, wrapped in [...]
 *   array       element literal repeated arrayLength times, wrapped in [...]
 *   bool        one literal per 32-bit group: only the first bool of each
 *               group prints; the rest share its packed host word
 *
 * Expansion fails with MaxNestingDepthExceededError instead of returning
 * partial text when composites nest deeper than the limit.
 */

import { atomicKindOf, type TypeCatalog } from './catalog';
import {
  BOOL_WORD_BITS,
  LITERAL_BOOL_ARRAY_ZERO,
  LITERAL_BOOL_ZERO,
  LITERAL_INTEGER_ZERO,
  LITERAL_REAL_ZERO_DECIMAL,
  LITERAL_REAL_ZERO_EXPONENT,
  LITERAL_STRING_ZERO,
  MAX_NESTING_DEPTH,
} from './constants';
import {
  MalformedDimensionError,
  MaxNestingDepthExceededError,
  TypeNotFoundError,
  UnsupportedTypeError,
  err,
  ok,
} from './errors';
import { instanceMembers } from './scope';
import type { AtomicKind, FieldDescriptor, Result } from './types';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface SynthesisOptions {
  /**
   * How a REAL zero prints. 'decimal' gives `0.0`; 'exponential' gives the
   * fixed-width `0.00000000e+000` a project export uses. Default 'decimal'.
   */
  readonly realFormat?: 'decimal' | 'exponential';
  /** Composite nesting limit. Default MAX_NESTING_DEPTH. */
  readonly maxDepth?: number;
}

export type SynthesisError =
  | TypeNotFoundError
  | UnsupportedTypeError
  | MalformedDimensionError
  | MaxNestingDepthExceededError;

interface ResolvedOptions {
  readonly realFormat: 'decimal' | 'exponential';
  readonly maxDepth:   number;
}

function resolveOptions(options: SynthesisOptions): ResolvedOptions {
  return {
    realFormat: options.realFormat ?? 'decimal',
    maxDepth:   options.maxDepth ?? MAX_NESTING_DEPTH,
  };
}

// ─── Zero literals ────────────────────────────────────────────────────────────

/** The zero literal of one atomic value. `inArray` selects a BOOL array element's form. */
export function zeroLiteral(
  kind:    AtomicKind,
  options: SynthesisOptions = {},
  inArray  = false,
): string {
  switch (kind) {
    case 'bool':
      return inArray ? LITERAL_BOOL_ARRAY_ZERO : LITERAL_BOOL_ZERO;
    case 'real32':
      return (options.realFormat ?? 'decimal') === 'exponential'
        ? LITERAL_REAL_ZERO_EXPONENT
        : LITERAL_REAL_ZERO_DECIMAL;
    case 'str':
      return LITERAL_STRING_ZERO;
    case 'sint8':
    case 'int16':
    case 'dint32':
    case 'lint64':
      return LITERAL_INTEGER_ZERO;
  }
}

function arrayLiteral(element: string, length: number): string {
  return `[${Array.from({ length }, () => element).join(',')}]`;
}

// ─── Synthesis ────────────────────────────────────────────────────────────────

/**
 * Default literal of `typeName`.
 *
 * `depth` is the number of composites already enclosing this type. A
 * composite entered at depth >= maxDepth fails; atomic types never do.
 *
 * Usage:
 *   synthesizeDefault(catalog, 'TIMER')   // ok('[0,0,0]')
 */
export function synthesizeDefault(
  catalog:  TypeCatalog,
  typeName: string,
  depth     = 0,
  options:  SynthesisOptions = {},
): Result<string, SynthesisError> {
  return expandType(catalog, typeName, depth, resolveOptions(options));
}

/** Default literal of one member, honouring its arrayLength. */
export function synthesizeFieldDefault(
  catalog: TypeCatalog,
  field:   FieldDescriptor,
  options: SynthesisOptions = {},
): Result<string, SynthesisError> {
  const opts = resolveOptions(options);
  if (!isValidLength(field.arrayLength)) {
    return err(new MalformedDimensionError(field.name, String(field.arrayLength)));
  }

  const kind = atomicKindOf(field.typeName);
  if (kind !== undefined) {
    const element = zeroLiteral(kind, opts, field.arrayLength > 0);
    return ok(field.arrayLength > 0 ? arrayLiteral(element, field.arrayLength) : element);
  }

  const element = expandType(catalog, field.typeName, 0, opts);
  if (!element.ok) return element;
  return ok(field.arrayLength > 0 ? arrayLiteral(element.value, field.arrayLength) : element.value);
}

/**
 * Initial value of an instruction instance: its non-InOut parameters then its
 * local tags, as one bracketed scope sharing one bool counter.
 */
export function synthesizeScopeDefault(
  catalog:    TypeCatalog,
  parameters: readonly FieldDescriptor[],
  localTags:  readonly FieldDescriptor[] = [],
  options:    SynthesisOptions = {},
): Result<string, SynthesisError> {
  return expandMembers(catalog, instanceMembers(parameters, localTags), 0, resolveOptions(options));
}

// ─── Recursion ────────────────────────────────────────────────────────────────

function isValidLength(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}

function expandType(
  catalog:  TypeCatalog,
  typeName: string,
  depth:    number,
  opts:     ResolvedOptions,
): Result<string, SynthesisError> {
  const resolved = catalog.resolve(typeName);
  if (!resolved.ok) return resolved;

  const { kind } = resolved.value;
  if (kind.form === 'atomic') return ok(zeroLiteral(kind.atomic, opts));

  if (depth >= opts.maxDepth) {
    return err(new MaxNestingDepthExceededError(typeName, depth, opts.maxDepth));
  }

  const members = kind.members.filter(m => !m.hidden);
  if (members.length === 0) {
    return err(new UnsupportedTypeError(typeName, 'it has no visible members'));
  }
  return expandMembers(catalog, members, depth + 1, opts);
}

/** One bracketed scope. `depth` counts the composites enclosing `members`. */
function expandMembers(
  catalog: TypeCatalog,
  members: readonly FieldDescriptor[],
  depth:   number,
  opts:    ResolvedOptions,
): Result<string, SynthesisError> {
  const parts: string[] = [];
  let boolCount = 0;

  for (const m of members) {
    if (m.hidden) continue;
    if (!isValidLength(m.arrayLength)) {
      return err(new MalformedDimensionError(m.name, String(m.arrayLength)));
    }

    const kind = atomicKindOf(m.typeName);

    if (kind === 'bool' && m.arrayLength === 0) {
      // Only the first bool of each 32-bit group prints.
      if (boolCount % BOOL_WORD_BITS === 0) parts.push(zeroLiteral(kind, opts));
      boolCount++;
      continue;
    }

    let element: string;
    if (kind !== undefined) {
      element = zeroLiteral(kind, opts, m.arrayLength > 0);
    } else {
      const expanded = expandType(catalog, m.typeName, depth, opts);
      if (!expanded.ok) return expanded;
      element = expanded.value;
    }

    parts.push(m.arrayLength > 0 ? arrayLiteral(element, m.arrayLength) : element);
  }

  return ok(`[${parts.join(',')}]`);
}
