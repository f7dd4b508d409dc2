import { BindParam, ParamKind, ScalarValue } from './database.interface';
import { BindError } from '../utils/errors';

/** A bind value as callers pass it: raw, or already tagged with its kind. */
export type ParamInput = ScalarValue | BindParam;

export const PARAM_TYPE_TAGS: Readonly<Record<ParamKind, string>> = {
  integer: 'i',
  float: 'd',
  text: 's',
  blob: 'b'
};

export function inferParamKind(value: ScalarValue): ParamKind {
  if (typeof value === 'bigint') return 'integer';
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? 'integer' : 'float';
  }
  if (typeof value === 'string') return 'text';
  return 'blob';
}

function isScalarValue(value: unknown): value is ScalarValue {
  return (
    value === null ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    value instanceof Date ||
    Buffer.isBuffer(value)
  );
}

function matchesKind(kind: unknown, value: unknown): boolean {
  switch (kind) {
    case 'integer':
      return typeof value === 'bigint' || (typeof value === 'number' && Number.isInteger(value));
    case 'float':
      return typeof value === 'number';
    case 'text':
      return typeof value === 'string';
    case 'blob':
      return value === null || typeof value === 'boolean' || value instanceof Date || Buffer.isBuffer(value);
    default:
      return false;
  }
}

export function isBindParam(value: unknown): value is BindParam {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || !('value' in value)) return false;
  return matchesKind(value.kind, value.value);
}

/**
 * Tags a raw value with its kind. Tagged values pass through unchanged.
 * @param position zero-based parameter index, used in error messages
 */
export function toBindParam(value: unknown, position = 0): BindParam {
  if (isBindParam(value)) return value;

  if (typeof value === 'object' && value !== null && 'kind' in value) {
    throw new BindError(`Parameter ${position + 1} has kind "${String(value.kind)}" but an incompatible value`, {
      position
    });
  }

  if (!isScalarValue(value)) {
    throw new BindError(`Parameter ${position + 1} cannot be bound: unsupported ${describeKind(value)} value`, {
      position
    });
  }

  if (typeof value === 'bigint') return { kind: 'integer', value };
  if (typeof value === 'number') {
    return inferParamKind(value) === 'integer' ? { kind: 'integer', value } : { kind: 'float', value };
  }
  if (typeof value === 'string') return { kind: 'text', value };
  return { kind: 'blob', value };
}

export function toBindParams(values: ReadonlyArray<unknown>): BindParam[] {
  return values.map((value, index) => toBindParam(value, index));
}

/**
 * The type string for a parameter list, one tag per parameter in order:
 * `[1, 'active', 3.5]` gives `"isd"`.
 */
export function paramTypes(params: ReadonlyArray<unknown>): string {
  return toBindParams(params)
    .map(param => PARAM_TYPE_TAGS[param.kind])
    .join('');
}

/**
 * The value handed to the driver. Integer-tagged numbers become bigints so
 * they are sent as integers rather than doubles.
 */
export function toDriverValue(param: BindParam): ScalarValue {
  if (param.kind === 'integer' && typeof param.value === 'number') {
    return BigInt(param.value);
  }
  return param.value;
}

function describeKind(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
