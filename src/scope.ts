/**
 * @tagimage/core — instruction scopes
 *
 * An instruction instance's memory image holds its Input and Output
 * parameters followed by its local tags, all in one packing scope. InOut
 * parameters are references to caller tags and take no space.
 */

import type { FieldDescriptor } from './types';

/**
 * Members that occupy an instruction instance's image, in image order.
 * Drops InOut parameters and hidden members.
 */
export function instanceMembers(
  parameters: readonly FieldDescriptor[],
  localTags:  readonly FieldDescriptor[] = [],
): FieldDescriptor[] {
  return [
    ...parameters.filter(p => p.usage !== 'InOut' && !p.hidden),
    ...localTags.filter(t => !t.hidden),
  ];
}

/** Parameters a caller may write before a scan: the Input parameters. */
export function inputParameters(parameters: readonly FieldDescriptor[]): FieldDescriptor[] {
  return parameters.filter(p => p.usage === 'Input' && !p.hidden);
}

/** Parameters a scan produces: the Output parameters. */
export function outputParameters(parameters: readonly FieldDescriptor[]): FieldDescriptor[] {
  return parameters.filter(p => p.usage === 'Output' && !p.hidden);
}
