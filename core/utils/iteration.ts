import { loopLogger } from '@core/utils/logger';

function isIterator(value: object): value is Iterator<unknown> {
  return 'next' in value && typeof value.next === 'function';
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && typeof value[Symbol.iterator] === 'function';
}

function hasIteratorMethod(value: object): value is { iterator(): unknown } {
  return 'iterator' in value && typeof value.iterator === 'function';
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function single(value: unknown): Iterator<unknown> {
  return [value][Symbol.iterator]();
}

function resolveIterator(value: unknown): Iterator<unknown> | null {
  switch (typeof value) {
    case 'undefined':
    case 'function':
    case 'symbol':
      return null;
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return single(value);
  }

  if (typeof value !== 'object' || value === null) {
    return null;
  }

  if (value instanceof Map) {
    return value.values();
  }
  if (isIterable(value)) {
    return value[Symbol.iterator]();
  }
  if (isIterator(value)) {
    return value;
  }
  if (hasIteratorMethod(value)) {
    const iterator = value.iterator();
    if (iterator !== null && typeof iterator === 'object' && isIterator(iterator)) {
      return iterator;
    }
    return null;
  }
  if (isPlainObject(value)) {
    return Object.values(value)[Symbol.iterator]();
  }

  return single(value);
}

/**
 * Turns any loopable input into an iterator.
 *
 * Maps and plain objects yield their values; strings and other scalars
 * are a single element. Returns null for null, undefined, functions and
 * symbols, and for anything whose iteration fails to start.
 */
export function toIterator(value: unknown): Iterator<unknown> | null {
  try {
    return resolveIterator(value);
  } catch (error) {
    loopLogger.warn('Unable to iterate over value', {
      valueType: typeof value,
      error: error instanceof Error ? error.message : String(error)
    });
    return null;
  }
}
