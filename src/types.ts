/**
 * @tagimage/core — type definitions
 *
 * These types describe a controller tag's memory image and the type metadata
 * that shapes it. The image IS the truth; a Layout is a lens into it.
 */

// ─── Atomic Kinds ─────────────────────────────────────────────────────────────

/**
 * Primitive kinds a controller tag member can hold.
 *
 * bool:    One bit inside a shared 32-bit host word. Up to 32 consecutive
 *          booleans in one scope share the same word.
 * sint8:   Signed 8-bit integer (SINT).
 * int16:   Signed 16-bit integer (INT).
 * dint32:  Signed 32-bit integer (DINT).
 * lint64:  Signed 64-bit integer (LINT). Decoded as bigint.
 * real32:  IEEE-754 single precision float (REAL).
 * str:     Fixed-length controller STRING. Valid in the catalog and in
 *          default literals; never placed inside a packed layout.
 */
export type AtomicKind =
  | 'bool'
  | 'sint8'
  | 'int16'
  | 'dint32'
  | 'lint64'
  | 'real32'
  | 'str';

/** Kinds that can be placed in a Layout and moved through the codec. */
export type PackedKind = Exclude<AtomicKind, 'str'>;

/**
 * Byte width of each PackedKind inside a memory image.
 * bool reports its 4-byte host word; the field itself occupies one bit.
 */
export const ATOMIC_BYTE_WIDTHS: Readonly<Record<PackedKind, number>> = {
  bool:   4,
  sint8:  1,
  int16:  2,
  dint32: 4,
  lint64: 8,
  real32: 4,
};

// ─── Fields ───────────────────────────────────────────────────────────────────

/**
 * How an instruction parameter is wired. `InOut` parameters are references to
 * caller-owned tags and never occupy bytes in the instance image.
 * `Local` marks an instruction's local tags.
 */
export type ParameterUsage = 'Input' | 'Output' | 'InOut' | 'Local';

/**
 * One named member of a composite type or instruction scope.
 *
 * arrayLength is 0 for scalars. Names are unique within their owning scope.
 */
export interface FieldDescriptor {
  readonly name:        string;
  readonly typeName:    string;
  readonly arrayLength: number;
  readonly hidden:      boolean;
  readonly required:    boolean;
  readonly visible:     boolean;
  readonly usage?:      ParameterUsage;
}

/**
 * Raw member metadata as a project reader reports it. `dimension` is the
 * unparsed array length attribute; absent means scalar.
 */
export interface FieldDefinition {
  readonly name:       string;
  readonly typeName:   string;
  readonly dimension?: string | number;
  readonly hidden?:    boolean;
  readonly required?:  boolean;
  readonly visible?:   boolean;
  readonly usage?:     ParameterUsage;
}

/** A user-defined structure as reported by the project reader. */
export interface CompositeDefinition {
  readonly name:    string;
  readonly members: readonly FieldDefinition[];
}

// ─── Type Definitions ─────────────────────────────────────────────────────────

export type TypeShape =
  | { readonly form: 'atomic';    readonly atomic:  AtomicKind }
  | { readonly form: 'composite'; readonly members: readonly FieldDescriptor[] };

export interface TypeDefinition {
  readonly name: string;
  readonly kind: TypeShape;
}

// ─── Layout ───────────────────────────────────────────────────────────────────

/**
 * One leaf value placed inside a memory image.
 *
 * path is the name the codec addresses the value by: `Gain`, `Pid.Kp`,
 * `Pairs[1].Ki`, `Flags[3]`. descriptor is the declaring member, so every
 * element of an array shares its array's descriptor.
 */
export interface PlacedField {
  readonly descriptor: FieldDescriptor;
  readonly path:       string;
  readonly kind:       PackedKind;
  readonly byteOffset: number;
  /** Bit index inside the 32-bit host word, LSB first. Only present for bool. */
  readonly bitOffset?: number;
  readonly byteSize:   number;
}

/**
 * Fully-resolved placement of a field list.
 *
 * alignment is the alignment of the first placed field; a composite is padded
 * to it before being spliced into an enclosing layout.
 */
export interface Layout {
  readonly fields:        readonly PlacedField[];
  readonly totalByteSize: number;
  readonly alignment:     number;
}

// ─── Values ───────────────────────────────────────────────────────────────────

/** A decoded or to-be-encoded field value. lint64 decodes to bigint. */
export type FieldValue = boolean | number | bigint;

/** Named values keyed by PlacedField.path. */
export type FieldValues = Readonly<Record<string, FieldValue>>;

// ─── Result ───────────────────────────────────────────────────────────────────

/**
 * Outcome of an operation that can fail on one field or type. Failures are
 * returned, not thrown, so a caller can attribute them and keep going.
 */
export type Result<T, E extends Error> =
  | { readonly ok: true;  readonly value: T }
  | { readonly ok: false; readonly error: E };
