// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  AtomicKind,
  PackedKind,
  ParameterUsage,
  FieldDescriptor,
  FieldDefinition,
  CompositeDefinition,
  TypeShape,
  TypeDefinition,
  PlacedField,
  Layout,
  FieldValue,
  FieldValues,
  Result,
} from './types';

export { ATOMIC_BYTE_WIDTHS } from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  BOOL_WORD_BITS,
  BOOL_WORD_BYTES,
  MAX_NESTING_DEPTH,
  STRING_DATA_LENGTH,
  LITERAL_REAL_ZERO_DECIMAL,
  LITERAL_REAL_ZERO_EXPONENT,
  LITERAL_STRING_ZERO,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  TagCodecError,
  TypeNotFoundError,
  UnsupportedTypeError,
  MalformedDimensionError,
  DuplicateNameError,
  MaxNestingDepthExceededError,
  FieldNotFoundError,
  ValueRangeError,
  ValueParseError,
  ImageTooSmallError,
  ok,
  err,
  unwrap,
} from './errors';

// ─── Catalog ──────────────────────────────────────────────────────────────────
export {
  TypeCatalog,
  BUILTIN_TYPES,
  atomicKindOf,
  parseDimension,
  describeField,
} from './catalog';
export type { CatalogOptions, CatalogBuildError } from './catalog';

// ─── Scopes ───────────────────────────────────────────────────────────────────
export { instanceMembers, inputParameters, outputParameters } from './scope';

// ─── Layout ───────────────────────────────────────────────────────────────────
export {
  assign,
  assignType,
  assignScope,
  encodeLayout,
  layoutFingerprint,
} from './layout';
export type { LayoutOptions, LayoutError } from './layout';

// ─── Codec ────────────────────────────────────────────────────────────────────
export { decode, verifyUpdates, TagReader } from './view';
export type { DecodeOptions, DecodeError, FieldMismatch } from './view';

export { encode, encodeText } from './writer';
export type { EncodeOptions, EncodeOutcome, FieldUpdateError } from './writer';

// ─── Value text ───────────────────────────────────────────────────────────────
export { parseFieldValue, formatFieldValue } from './text';

// ─── Literals ─────────────────────────────────────────────────────────────────
export {
  synthesizeDefault,
  synthesizeFieldDefault,
  synthesizeScopeDefault,
  zeroLiteral,
} from './literal';
export type { SynthesisOptions, SynthesisError } from './literal';
