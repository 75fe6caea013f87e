import { toIterator } from '@core/utils/iteration';
import { loopLogger } from '@core/utils/logger';
import { ManagedIterator } from './ManagedIterator';

/**
 * Loop helper for templates.
 *
 * Wraps each watched loop source in a {@link ManagedIterator} and keeps
 * them on a stack mirroring the nesting of the template's loops, so the
 * loop body can stop, skip or inspect the current loop or any enclosing
 * loop by name.
 *
 * @example
 * ```ts
 * const loop = new LoopController();
 * for (const item of loop.watch([1, 2, 3, 4, 5, 6]) ?? []) {
 *   out.push(item);      // 1, 3, 5
 *   loop.skip(1);
 *   if (item >= 5) loop.stop();
 * }
 * ```
 *
 * One controller serves one rendering pass. A controller that is reused
 * must have an empty stack first.
 */
export class LoopController {
  private readonly iterators: ManagedIterator[] = [];

  /**
   * Starts tracking a loop over `source`. Unnamed loops are called
   * `loop<depth>`.
   *
   * @returns null if the name is given but absent, or if `source` cannot
   * be iterated
   */
  watch<V>(source: Map<unknown, V>, name?: string | null): ManagedIterator<V> | null;
  watch<T>(source: Iterable<T>, name?: string | null): ManagedIterator<T> | null;
  watch(source: unknown, name?: string | null): ManagedIterator | null;
  watch(source: unknown, ...rest: [] | [string | null | undefined]): ManagedIterator | null {
    let name: string;
    if (rest.length > 0) {
      const [explicit] = rest;
      // an absent name is a template authoring slip, not an error
      if (explicit === null || explicit === undefined) {
        return null;
      }
      name = explicit;
    } else {
      name = `loop${this.iterators.length}`;
    }

    const iterator = toIterator(source);
    if (!iterator) {
      loopLogger.debug('Cannot watch value', { name, valueType: typeof source });
      return null;
    }

    const managed = new ManagedIterator(name, iterator, {
      onRelease: released => this.pop(released)
    });
    this.iterators.push(managed);
    loopLogger.debug('Watching loop', { name, depth: this.iterators.length });
    return managed;
  }

  /**
   * Stops the current loop, or the first loop called `name`.
   */
  stop(name?: string): void {
    const iterator = name === undefined ? this.top() : this.findIterator(name);
    iterator?.stop();
  }

  /**
   * Stops the innermost loop called `name` and every loop nested inside
   * it. Enclosing loops keep running.
   */
  stopTo(name: string): void {
    for (let i = this.iterators.length - 1; i >= 0; i--) {
      if (this.iterators[i].name === name) {
        for (const iterator of this.iterators.slice(i)) {
          iterator.stop();
        }
        return;
      }
    }
  }

  stopAll(): void {
    for (const iterator of this.iterators) {
      iterator.stop();
    }
  }

  /**
   * Advances the current loop, or the loop called `name`, by up to
   * `count` elements. Skipped elements are counted.
   */
  skip(count: number, name?: string): void {
    const iterator = name === undefined ? this.top() : this.findIterator(name);
    if (!iterator) {
      return;
    }
    for (let i = 0; i < count; i++) {
      if (!iterator.hasNext()) {
        break;
      }
      iterator.next();
    }
  }

  isFirst(name?: string): boolean | null {
    const iterator = name === undefined ? this.top() : this.findIterator(name);
    return iterator ? iterator.isFirst() : null;
  }

  isLast(name?: string): boolean | null {
    const iterator = name === undefined ? this.top() : this.findIterator(name);
    return iterator ? iterator.isLast() : null;
  }

  getCount(name?: string): number | null {
    const iterator = name === undefined ? this.top() : this.findIterator(name);
    return iterator ? iterator.getCount() : null;
  }

  getDepth(): number {
    return this.iterators.length;
  }

  get first(): boolean | null {
    return this.isFirst();
  }

  get last(): boolean | null {
    return this.isLast();
  }

  get count(): number | null {
    return this.getCount();
  }

  get depth(): number {
    return this.getDepth();
  }

  protected findIterator(name: string): ManagedIterator | undefined {
    return this.iterators.find(iterator => iterator.name === name);
  }

  private top(): ManagedIterator | undefined {
    return this.iterators[this.iterators.length - 1];
  }

  private pop(iterator: ManagedIterator): void {
    const index = this.iterators.lastIndexOf(iterator);
    if (index < 0) {
      return;
    }
    this.iterators.splice(index, 1);
    loopLogger.debug('Loop finished', { name: iterator.name, count: iterator.getCount() });
  }
}
