/**
 * @tagimage/core — type catalog
 *
 * Maps controller type names to atomic kinds or ordered member lists. Built
 * once from project metadata and read-only afterwards, so one catalog can be
 * shared by any number of layout and literal computations.
 *
 * Resolution is lazy: a composite's members are stored by type name only and
 * are resolved when a walker descends into them.
 */

import {
  DuplicateNameError,
  MalformedDimensionError,
  TypeNotFoundError,
  UnsupportedTypeError,
  err,
  ok,
} from './errors';
import type {
  AtomicKind,
  CompositeDefinition,
  FieldDefinition,
  FieldDescriptor,
  Result,
  TypeDefinition,
} from './types';

// ─── Atomic Names ─────────────────────────────────────────────────────────────

// Keys are upper case; controller type names are case-insensitive.
const ATOMIC_NAMES: ReadonlyMap<string, AtomicKind> = new Map<string, AtomicKind>([
  ['BOOL',   'bool'],
  ['BIT',    'bool'],
  ['SINT',   'sint8'],
  ['INT',    'int16'],
  ['DINT',   'dint32'],
  ['LINT',   'lint64'],
  ['REAL',   'real32'],
  ['STRING', 'str'],
]);

/** Map a controller type name to its atomic kind, or undefined for composites. */
export function atomicKindOf(typeName: string): AtomicKind | undefined {
  return ATOMIC_NAMES.get(typeName.toUpperCase());
}

// ─── Built-in Structures ──────────────────────────────────────────────────────

/**
 * Structures every controller defines. TIMER's three status bits share one
 * host word ahead of the preset and accumulator, which is why its initial
 * value prints as [0,0,0].
 */
export const BUILTIN_TYPES: readonly CompositeDefinition[] = [
  {
    name: 'TIMER',
    members: [
      { name: 'EN',  typeName: 'BOOL' },
      { name: 'TT',  typeName: 'BOOL' },
      { name: 'DN',  typeName: 'BOOL' },
      { name: 'PRE', typeName: 'DINT' },
      { name: 'ACC', typeName: 'DINT' },
    ],
  },
];

// ─── Member Parsing ───────────────────────────────────────────────────────────

/**
 * Parse an array dimension attribute. Absent means scalar (0).
 * Anything other than a non-negative integer is a MalformedDimensionError.
 */
export function parseDimension(
  fieldName: string,
  raw: string | number | undefined,
): Result<number, MalformedDimensionError> {
  if (raw === undefined) return ok(0);

  if (typeof raw === 'number') {
    return Number.isSafeInteger(raw) && raw >= 0
      ? ok(raw)
      : err(new MalformedDimensionError(fieldName, String(raw)));
  }

  const text = raw.trim();
  if (!/^\d+$/.test(text)) return err(new MalformedDimensionError(fieldName, raw));

  const n = Number(text);
  if (!Number.isSafeInteger(n)) return err(new MalformedDimensionError(fieldName, raw));
  return ok(n);
}

/** Turn reader metadata into an immutable FieldDescriptor. */
export function describeField(
  def: FieldDefinition,
): Result<FieldDescriptor, MalformedDimensionError> {
  const arrayLength = parseDimension(def.name, def.dimension);
  if (!arrayLength.ok) return arrayLength;

  const base = {
    name:        def.name,
    typeName:    def.typeName,
    arrayLength: arrayLength.value,
    hidden:      def.hidden   ?? false,
    required:    def.required ?? false,
    visible:     def.visible  ?? true,
  };
  return ok(def.usage !== undefined ? { ...base, usage: def.usage } : base);
}

// ─── TypeCatalog ──────────────────────────────────────────────────────────────

export interface CatalogOptions {
  /** Include BUILTIN_TYPES. Default true. Project definitions override them. */
  readonly builtins?: boolean;
}

export type CatalogBuildError = MalformedDimensionError | DuplicateNameError;

export class TypeCatalog {
  private constructor(
    private readonly _composites: ReadonlyMap<string, TypeDefinition>,
  ) {}

  /**
   * Build a catalog from project structure definitions.
   *
   * Fails on the first malformed member dimension, on a structure declared
   * twice, on a structure that reuses an atomic name, or on a member name
   * declared twice within one structure.
   */
  static fromDefinitions(
    definitions: readonly CompositeDefinition[],
    options: CatalogOptions = {},
  ): Result<TypeCatalog, CatalogBuildError> {
    const composites = new Map<string, TypeDefinition>();

    if (options.builtins ?? true) {
      for (const def of BUILTIN_TYPES) {
        const resolved = resolveComposite(def);
        if (!resolved.ok) return resolved;
        composites.set(def.name.toUpperCase(), resolved.value);
      }
    }

    const declared = new Set<string>();
    for (const def of definitions) {
      const key = def.name.toUpperCase();
      if (declared.has(key) || atomicKindOf(def.name) !== undefined) {
        return err(new DuplicateNameError(def.name, 'the type catalog'));
      }
      declared.add(key);

      const resolved = resolveComposite(def);
      if (!resolved.ok) return resolved;
      composites.set(key, resolved.value);
    }

    return ok(new TypeCatalog(composites));
  }

  /** A catalog that knows only atomic types (and built-ins unless disabled). */
  static empty(options: CatalogOptions = {}): TypeCatalog {
    const built = TypeCatalog.fromDefinitions([], options);
    return built.ok ? built.value : new TypeCatalog(new Map());
  }

  /** Names of every composite type, in definition order. */
  get typeNames(): readonly string[] {
    return Array.from(this._composites.values(), t => t.name);
  }

  has(typeName: string): boolean {
    return atomicKindOf(typeName) !== undefined || this._composites.has(typeName.toUpperCase());
  }

  resolve(typeName: string): Result<TypeDefinition, TypeNotFoundError> {
    const atomic = atomicKindOf(typeName);
    if (atomic !== undefined) return ok(atomicDefinition(typeName, atomic));

    const composite = this._composites.get(typeName.toUpperCase());
    return composite !== undefined ? ok(composite) : err(new TypeNotFoundError(typeName));
  }

  /**
   * Non-hidden members of a composite type in declaration order.
   * An atomic type has no members and yields UnsupportedTypeError.
   */
  membersOf(
    typeName: string,
  ): Result<readonly FieldDescriptor[], TypeNotFoundError | UnsupportedTypeError> {
    const resolved = this.resolve(typeName);
    if (!resolved.ok) return resolved;

    const { kind } = resolved.value;
    if (kind.form === 'atomic') {
      return err(new UnsupportedTypeError(typeName, `${kind.atomic} is atomic and has no members`));
    }
    return ok(kind.members.filter(m => !m.hidden));
  }
}

// ─── Internal helpers ─────────────────────────────────────────────────────────

const atomicCache = new Map<string, TypeDefinition>();

function atomicDefinition(typeName: string, atomic: AtomicKind): TypeDefinition {
  const key = typeName.toUpperCase();
  let def = atomicCache.get(key);
  if (def === undefined) {
    def = { name: key, kind: { form: 'atomic', atomic } };
    atomicCache.set(key, def);
  }
  return def;
}

function resolveComposite(
  def: CompositeDefinition,
): Result<TypeDefinition, CatalogBuildError> {
  const members: FieldDescriptor[] = [];
  const seen = new Set<string>();

  for (const m of def.members) {
    const key = m.name.toUpperCase();
    if (seen.has(key)) return err(new DuplicateNameError(m.name, `type '${def.name}'`));
    seen.add(key);

    const described = describeField(m);
    if (!described.ok) return described;
    members.push(described.value);
  }

  return ok({ name: def.name, kind: { form: 'composite', members } });
}
