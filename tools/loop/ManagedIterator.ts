import { ToolArgumentError } from '@core/errors/ToolArgumentError';
import { IteratorExhaustedError } from '@core/errors/IteratorExhaustedError';
import { UnsupportedOperationError } from '@core/errors/UnsupportedOperationError';
import { Action, ActionCondition } from './ActionCondition';
import { Equals } from './Condition';

export interface ManagedIteratorOptions {
  /** Called once when the iterator runs dry or is drained after a stop */
  onRelease?: (iterator: ManagedIterator) => void;
}

/**
 * Iterator wrapper that can be stopped, skipped and filtered while a
 * template loop is running over it.
 *
 * One element is read ahead so that `isLast()` can be answered without
 * consuming anything. Elements held in the lookahead slot have already
 * passed every registered condition.
 */
export class ManagedIterator<T = unknown> implements Iterable<T> {
  readonly name: string;
  private readonly source: Iterator<T>;
  private readonly onRelease?: (iterator: ManagedIterator) => void;
  private readonly conditions: ActionCondition[] = [];
  private stopped = false;
  private released = false;
  // null until the first element is returned
  private firstState: boolean | null = null;
  private yielded = 0;
  private cached: { value: T } | null = null;

  constructor(name: string, source: Iterator<T>, options: ManagedIteratorOptions = {}) {
    if (name === null || name === undefined) {
      throw new ToolArgumentError('name cannot be null', { tool: 'loop' });
    }
    this.name = name;
    this.source = source;
    this.onRelease = options.onRelease;
  }

  hasNext(): boolean {
    return this.lookahead(true);
  }

  /**
   * @throws IteratorExhaustedError when no valid element remains
   */
  next(): T {
    if (!this.lookahead(true) || !this.cached) {
      throw new IteratorExhaustedError(this.name);
    }

    if (this.firstState === null) {
      this.firstState = true;
    } else if (this.firstState) {
      this.firstState = false;
    }

    this.yielded++;
    const { value } = this.cached;
    this.cached = null;
    return value;
  }

  /**
   * True until a second element has been returned.
   */
  isFirst(): boolean {
    return this.firstState === null || this.firstState;
  }

  /**
   * Looks ahead without letting exhaustion release this iterator.
   */
  isLast(): boolean {
    return !this.lookahead(false);
  }

  getCount(): number {
    return this.yielded;
  }

  get first(): boolean {
    return this.isFirst();
  }

  get last(): boolean {
    return this.isLast();
  }

  get count(): number {
    return this.yielded;
  }

  isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Stops the loop now, or, given a value, registers a condition that
   * stops it before the first element equal to that value.
   */
  stop(): void;
  stop(compare: unknown): this;
  stop(...args: [] | [unknown]): this | void {
    if (args.length > 0) {
      return this.condition(new ActionCondition(Action.Stop, new Equals(args[0])));
    }
    this.stopped = true;
    this.cached = null;
  }

  exclude(compare: unknown): this {
    return this.condition(new ActionCondition(Action.Exclude, new Equals(compare)));
  }

  condition(condition: ActionCondition): this;
  condition(condition: ActionCondition | null | undefined): this | null;
  condition(condition: ActionCondition | null | undefined): this | null {
    if (!condition) {
      return null;
    }
    this.conditions.push(condition);
    return this;
  }

  remove(): never {
    throw new UnsupportedOperationError('remove', 'loop');
  }

  *[Symbol.iterator](): Iterator<T> {
    while (this.hasNext()) {
      yield this.next();
    }
  }

  toString(): string {
    return `ManagedIterator:${this.name}`;
  }

  private lookahead(releaseWhenDone: boolean): boolean {
    if (this.stopped) {
      if (releaseWhenDone) {
        this.release();
      }
      return false;
    }
    if (this.cached) {
      return true;
    }
    return this.cacheNext(releaseWhenDone);
  }

  /**
   * Pulls source elements until one passes the conditions, the source runs
   * dry, or a stop condition matches.
   */
  private cacheNext(releaseWhenDone: boolean): boolean {
    for (;;) {
      const step = this.source.next();
      if (step.done) {
        if (releaseWhenDone) {
          this.stop();
          this.release();
        }
        return false;
      }

      const matched = this.conditions.find(condition => condition.matches(step.value));
      if (!matched) {
        this.cached = { value: step.value };
        return true;
      }

      switch (matched.action) {
        case Action.Exclude:
          continue;
        case Action.Stop:
          this.stop();
          if (releaseWhenDone) {
            this.release();
          }
          return false;
      }
    }
  }

  private release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.onRelease?.(this);
  }
}
