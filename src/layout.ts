/**
 * @tagimage/core — layout assignment, encoding, fingerprinting
 *
 * A Layout places every leaf of a field list inside a memory image. It is
 * computed once per type or instruction scope and then reused by every decode
 * and encode against that scope's images.
 *
 * Placement is a single left-to-right sweep with a byte cursor and a
 * scope-wide boolean counter:
 *
 *   bool     counter += 1; the first bool of each 32-bit group takes a new
 *            4-byte host word at the cursor (unaligned), the rest reuse it.
 *            bit = (counter - 1) % 32.
 *   sint8    unaligned, 1 byte
 *   int16    2-byte aligned, 2 bytes
 *   dint32   4-byte aligned, 4 bytes     (real32 the same)
 *   lint64   8-byte aligned, 8 bytes
 *   struct   sub-layout swept from cursor 0 with its own bool counter, padded
 *            to the alignment of its first field, spliced in once per element
 *
 * Binary encoding of a Layout (all values little-endian), used only as the
 * canonical input to layoutFingerprint():
 *
 *   [field_count: u32][total_byte_size: u32]
 *   For each field (6 bytes):
 *     [kind_tag:    u8]
 *     [bit_offset:  u8]   ← 0xFF when the field is not a bool
 *     [byte_offset: u32]
 *
 * Paths are not part of the encoding. Two layouts with the same fingerprint
 * put the same kinds at the same places.
 */

import { atomicKindOf, type TypeCatalog } from './catalog';
import { BOOL_WORD_BITS, BOOL_WORD_BYTES, MAX_NESTING_DEPTH } from './constants';
import {
  DuplicateNameError,
  MalformedDimensionError,
  MaxNestingDepthExceededError,
  TypeNotFoundError,
  UnsupportedTypeError,
  err,
  ok,
} from './errors';
import { instanceMembers } from './scope';
import {
  ATOMIC_BYTE_WIDTHS,
  type FieldDescriptor,
  type Layout,
  type PackedKind,
  type PlacedField,
  type Result,
} from './types';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface LayoutOptions {
  /**
   * Round every (sub-)layout's totalByteSize up to a multiple of 4, for
   * targets that only allocate whole 32-bit words per tag. Default false.
   */
  readonly wordAlignedSize?: boolean;
  /** Composite nesting limit. Default MAX_NESTING_DEPTH. */
  readonly maxDepth?: number;
}

export type LayoutError =
  | TypeNotFoundError
  | UnsupportedTypeError
  | MalformedDimensionError
  | MaxNestingDepthExceededError
  | DuplicateNameError;

interface ResolvedOptions {
  readonly wordAlignedSize: boolean;
  readonly maxDepth:        number;
}

function resolveOptions(options: LayoutOptions): ResolvedOptions {
  return {
    wordAlignedSize: options.wordAlignedSize ?? false,
    maxDepth:        options.maxDepth ?? MAX_NESTING_DEPTH,
  };
}

// ─── Kind Tags ────────────────────────────────────────────────────────────────

const KIND_TO_TAG: Readonly<Record<PackedKind, number>> = {
  bool: 0, sint8: 1, int16: 2, dint32: 3, lint64: 4, real32: 5,
};

const NO_BIT_OFFSET = 0xff;

// ─── FNV-1a 32-bit ────────────────────────────────────────────────────────────

/**
 * FNV-1a 32-bit hash.
 * Math.imul() is a native 32-bit integer multiply — avoids float precision loss
 * that would occur with the plain * operator on large numbers.
 */
function fnv1a32(bytes: Uint8Array): number {
  let hash = 0x811c9dc5; // FNV offset basis
  for (const byte of bytes) {
    hash ^= byte;
    hash  = Math.imul(hash, 0x01000193); // FNV prime
  }
  return hash >>> 0; // coerce to u32
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/** Encode a Layout's structure to compact bytes: 8 + 6 × fieldCount bytes. */
export function encodeLayout(layout: Layout): Uint8Array {
  const fieldCount = layout.fields.length;
  const out = new Uint8Array(8 + fieldCount * 6);
  const dv  = new DataView(out.buffer);

  dv.setUint32(0, fieldCount,           /* littleEndian */ true);
  dv.setUint32(4, layout.totalByteSize, /* littleEndian */ true);

  layout.fields.forEach((f, i) => {
    const off = 8 + i * 6;
    out[off]     = KIND_TO_TAG[f.kind];
    out[off + 1] = f.bitOffset ?? NO_BIT_OFFSET;
    dv.setUint32(off + 2, f.byteOffset, true);
  });

  return out;
}

/**
 * FNV-1a 32-bit fingerprint of a Layout's binary encoding.
 * Covers kinds, offsets, bit indices and total size — not paths.
 */
export function layoutFingerprint(layout: Layout): number {
  return fnv1a32(encodeLayout(layout));
}

// ─── Assignment ───────────────────────────────────────────────────────────────

/**
 * Place an ordered field list. The list is one packing scope: booleans are
 * counted across all of it. Composite members are resolved through `catalog`.
 *
 * Usage:
 *   const layout = assign(catalog, [
 *     { name: 'EnableIn', typeName: 'BOOL', arrayLength: 0, ... },
 *     { name: 'Setpoint', typeName: 'DINT', arrayLength: 0, ... },
 *     { name: 'Gain',     typeName: 'REAL', arrayLength: 0, ... },
 *   ]);
 *   // EnableIn → 0 (bit 0), Setpoint → 4, Gain → 8, totalByteSize 12
 */
export function assign(
  catalog: TypeCatalog,
  fields:  readonly FieldDescriptor[],
  options: LayoutOptions = {},
): Result<Layout, LayoutError> {
  return sweepFields(catalog, fields, 0, resolveOptions(options), 'the field list');
}

/** Place the visible members of a composite type. */
export function assignType(
  catalog:  TypeCatalog,
  typeName: string,
  options:  LayoutOptions = {},
): Result<Layout, LayoutError> {
  return enterComposite(catalog, typeName, 0, resolveOptions(options));
}

/**
 * Place an instruction instance: non-InOut parameters then local tags,
 * sharing one boolean counter.
 */
export function assignScope(
  catalog:    TypeCatalog,
  parameters: readonly FieldDescriptor[],
  localTags:  readonly FieldDescriptor[] = [],
  options:    LayoutOptions = {},
): Result<Layout, LayoutError> {
  return assign(catalog, instanceMembers(parameters, localTags), options);
}

// ─── Sweep ────────────────────────────────────────────────────────────────────

interface Sweep {
  cursor:    number;
  boolCount: number;
  /** Offset of the most recently allocated bool host word. */
  boolWord:  number;
  alignment: number | undefined;
  readonly placed: PlacedField[];
}

function alignUp(cursor: number, alignment: number): number {
  const rem = cursor % alignment;
  return rem === 0 ? cursor : cursor + alignment - rem;
}

function enterComposite(
  catalog:  TypeCatalog,
  typeName: string,
  depth:    number,
  opts:     ResolvedOptions,
): Result<Layout, LayoutError> {
  const members = catalog.membersOf(typeName);
  if (!members.ok) return members;

  if (depth >= opts.maxDepth) {
    return err(new MaxNestingDepthExceededError(typeName, depth, opts.maxDepth));
  }
  if (members.value.length === 0) {
    return err(new UnsupportedTypeError(typeName, 'it has no visible members'));
  }

  return sweepFields(catalog, members.value, depth + 1, opts, `type '${typeName}'`);
}

/**
 * `depth` is the number of composites enclosing `fields`; a composite member
 * found here is entered at that depth.
 */
function sweepFields(
  catalog: TypeCatalog,
  fields:  readonly FieldDescriptor[],
  depth:   number,
  opts:    ResolvedOptions,
  scope:   string,
): Result<Layout, LayoutError> {
  const sweep: Sweep = { cursor: 0, boolCount: 0, boolWord: 0, alignment: undefined, placed: [] };
  const seen = new Set<string>();

  for (const field of fields) {
    if (field.hidden) continue;

    const key = field.name.toUpperCase();
    if (seen.has(key)) return err(new DuplicateNameError(field.name, scope));
    seen.add(key);

    if (!Number.isSafeInteger(field.arrayLength) || field.arrayLength < 0) {
      return err(new MalformedDimensionError(field.name, String(field.arrayLength)));
    }

    const kind = atomicKindOf(field.typeName);
    if (kind === 'str') {
      return err(new UnsupportedTypeError(
        field.typeName,
        `member '${field.name}' is a STRING, which is not packed into memory images`,
      ));
    }

    if (kind !== undefined) {
      placeAtomic(sweep, field, kind);
      continue;
    }

    const sub = enterComposite(catalog, field.typeName, depth, opts);
    if (!sub.ok) return sub;
    spliceComposite(sweep, field, sub.value);
  }

  return ok({
    fields:        sweep.placed,
    totalByteSize: opts.wordAlignedSize ? alignUp(sweep.cursor, 4) : sweep.cursor,
    alignment:     sweep.alignment ?? 1,
  });
}

function noteAlignment(sweep: Sweep, alignment: number): void {
  if (sweep.alignment === undefined) sweep.alignment = alignment;
}

function elementPath(field: FieldDescriptor, index: number): string {
  return field.arrayLength === 0 ? field.name : `${field.name}[${index}]`;
}

function placeAtomic(sweep: Sweep, field: FieldDescriptor, kind: PackedKind): void {
  const count = Math.max(field.arrayLength, 1);

  for (let i = 0; i < count; i++) {
    const path = elementPath(field, i);

    if (kind === 'bool') {
      // Arrays of BOOL count as arrayLength consecutive scalars.
      const bit = sweep.boolCount % BOOL_WORD_BITS;
      sweep.boolCount++;
      if (bit === 0) {
        // Host words start at the cursor with no padding.
        noteAlignment(sweep, 1);
        sweep.boolWord  = sweep.cursor;
        sweep.cursor   += BOOL_WORD_BYTES;
      }
      sweep.placed.push({
        descriptor: field,
        path,
        kind,
        byteOffset: sweep.boolWord,
        bitOffset:  bit,
        byteSize:   BOOL_WORD_BYTES,
      });
      continue;
    }

    const width = ATOMIC_BYTE_WIDTHS[kind];
    sweep.cursor    = alignUp(sweep.cursor, width);
    noteAlignment(sweep, width);
    sweep.placed.push({ descriptor: field, path, kind, byteOffset: sweep.cursor, byteSize: width });
    sweep.cursor   += width;
  }
}

function spliceComposite(sweep: Sweep, field: FieldDescriptor, sub: Layout): void {
  sweep.cursor    = alignUp(sweep.cursor, sub.alignment);
  noteAlignment(sweep, sub.alignment);

  const count = Math.max(field.arrayLength, 1);
  for (let i = 0; i < count; i++) {
    const prefix = elementPath(field, i);
    const base   = sweep.cursor;
    for (const f of sub.fields) {
      sweep.placed.push({ ...f, path: `${prefix}.${f.path}`, byteOffset: base + f.byteOffset });
    }
    sweep.cursor += sub.totalByteSize;
  }
}
