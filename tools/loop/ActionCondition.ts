import { ToolArgumentError } from '@core/errors/ToolArgumentError';
import type { Condition } from './Condition';

export enum Action {
  /** Skip matching elements */
  Exclude = 'EXCLUDE',
  /** End the loop before the first matching element */
  Stop = 'STOP'
}

/**
 * Pairs a condition with the action a ManagedIterator takes when an
 * element matches it.
 */
export class ActionCondition {
  readonly action: Action;
  readonly condition: Condition;

  constructor(action: Action | null | undefined, condition: Condition | null | undefined) {
    if (!action || !condition) {
      throw new ToolArgumentError('Condition and Action must both not be null', { tool: 'loop' });
    }
    this.action = action;
    this.condition = condition;
  }

  matches(value: unknown): boolean {
    return this.condition.test(value);
  }
}
