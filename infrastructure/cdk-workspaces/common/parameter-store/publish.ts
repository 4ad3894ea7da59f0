import { InvalidParameterValueError, PathCollisionError } from '../errors';
import { OutputSet, OutputValue } from '../types/outputs';
import { buildParameterPath } from './parameter-path';

/**
 * SSM parameter types used for published outputs
 */
export enum ParameterType {
  STRING = 'String',
  STRING_LIST = 'StringList',
}

interface PublishedParameterBase {
  readonly path: string;
  readonly stack: string;
  readonly key: string;
}

export interface PublishedStringParameter extends PublishedParameterBase {
  readonly type: ParameterType.STRING;
  readonly value: string;
}

export interface PublishedStringListParameter extends PublishedParameterBase {
  readonly type: ParameterType.STRING_LIST;
  readonly value: readonly string[];
}

export type PublishedParameter = PublishedStringParameter | PublishedStringListParameter;

/**
 * Maps the outputs of one stack to the parameters that publish them.
 *
 * Scalars become `String` parameters and lists become `StringList` parameters.
 * Pure: the same arguments always give the same records, in output order.
 *
 * @throws InvalidParameterPathError when a segment is not lowercase-hyphenated
 * @throws InvalidParameterValueError when a value cannot be stored as its parameter type
 * @throws PathCollisionError when two outputs map to the same path
 */
export function publish(root: string, environment: string, stack: string, outputs: OutputSet): PublishedParameter[] {
  const published = Object.entries(outputs).map(([key, value]): PublishedParameter => {
    const path = buildParameterPath(root, environment, stack, key);
    validateValue(path, value);
    return typeof value === 'string'
      ? { path, stack, key, type: ParameterType.STRING, value }
      : { path, stack, key, type: ParameterType.STRING_LIST, value: [...value] };
  });

  const seen = new Set<string>();
  for (const parameter of published) {
    if (seen.has(parameter.path)) {
      throw new PathCollisionError(parameter.path, stack, stack);
    }
    seen.add(parameter.path);
  }
  return published;
}

function validateValue(path: string, value: OutputValue): void {
  if (typeof value === 'string') {
    if (value.length === 0) {
      throw new InvalidParameterValueError(path, 'must not be empty');
    }
    return;
  }
  if (value.length === 0) {
    throw new InvalidParameterValueError(path, 'list must have at least one item');
  }
  // StringList values are stored comma-joined
  for (const item of value) {
    if (item.length === 0 || item.includes(',')) {
      throw new InvalidParameterValueError(path, `list item "${item}" must be non-empty and contain no comma`);
    }
  }
}
