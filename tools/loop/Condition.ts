import isEqual from 'lodash/isEqual.js';
import { ToolArgumentError } from '@core/errors/ToolArgumentError';

/**
 * A predicate over a single candidate loop element.
 */
export interface Condition {
  test(value: unknown): boolean;
}

/**
 * Base for conditions that compare candidates against a fixed target.
 */
export abstract class Comparison implements Condition {
  protected readonly compare: unknown;

  constructor(compare: unknown) {
    if (compare === null || compare === undefined) {
      throw new ToolArgumentError('Condition must have something to compare to', { tool: 'loop' });
    }
    this.compare = compare;
  }

  abstract test(value: unknown): boolean;
}

function sameType(a: unknown, b: unknown): boolean {
  if (typeof a !== typeof b) {
    return false;
  }
  if (typeof a === 'object' && a !== null && typeof b === 'object' && b !== null) {
    return Object.getPrototypeOf(a) === Object.getPrototypeOf(b);
  }
  return true;
}

/**
 * Text form used for loose matching. Objects qualify only when they define
 * their own `toString`; the generic `[object Object]` form never matches.
 */
function textForm(value: unknown): string | null {
  if (typeof value !== 'object' || value === null) {
    return String(value);
  }
  const toString: unknown = Reflect.get(value, 'toString');
  if (typeof toString !== 'function' || toString === Object.prototype.toString) {
    return null;
  }
  return String(Reflect.apply(toString, value, []));
}

/**
 * Matches values equal to the target. Values of different types are
 * compared by their text forms, so `3` matches `'3'`.
 */
export class Equals extends Comparison {
  test(value: unknown): boolean {
    if (value === null || value === undefined) {
      return false;
    }
    if (isEqual(this.compare, value)) {
      return true;
    }
    if (sameType(value, this.compare)) {
      return false;
    }
    const text = textForm(value);
    return text !== null && text === textForm(this.compare);
  }
}
