/**
 * Shared fixtures for the @tagimage/core test suite.
 */

import {
  TypeCatalog,
  unwrap,
  type CompositeDefinition,
  type FieldDescriptor,
  type ParameterUsage,
  type Result,
} from '../src/index';

/** A visible, non-hidden member. */
export function field(
  name:        string,
  typeName:    string,
  arrayLength = 0,
  usage?:      ParameterUsage,
): FieldDescriptor {
  const base = { name, typeName, arrayLength, hidden: false, required: false, visible: true };
  return usage === undefined ? base : { ...base, usage };
}

export function catalogOf(definitions: readonly CompositeDefinition[]): TypeCatalog {
  return unwrap(TypeCatalog.fromDefinitions(definitions));
}

/** The error of a failed result; throws if the result succeeded. */
export function failure<T, E extends Error>(result: Result<T, E>): E {
  if (result.ok) throw new Error('expected a failed result');
  return result.error;
}

/**
 * `levels` structures where Level{i} holds one `Inner` of type Level{i+1}
 * and the last level holds `Value: DINT`.
 */
export function chain(levels: number): CompositeDefinition[] {
  return Array.from({ length: levels }, (_, i) => ({
    name:    `Level${i + 1}`,
    members: i + 1 < levels
      ? [{ name: 'Inner', typeName: `Level${i + 2}` }]
      : [{ name: 'Value', typeName: 'DINT' }],
  }));
}

export const PAIR: CompositeDefinition = {
  name:    'Pair',
  members: [
    { name: 'Kp', typeName: 'REAL' },
    { name: 'Ki', typeName: 'REAL' },
  ],
};
