import { describe, it, expect, beforeEach } from 'vitest';
import { LoopController } from './LoopController';
import type { ManagedIterator } from './ManagedIterator';

function watchOrFail<T>(loop: LoopController, source: T[], name?: string): ManagedIterator<T> {
  const iterator = name === undefined ? loop.watch(source) : loop.watch(source, name);
  if (!iterator) {
    throw new Error('Expected source to be watchable');
  }
  return iterator;
}

describe('LoopController', () => {
  let loop: LoopController;

  beforeEach(() => {
    loop = new LoopController();
  });

  describe('watch', () => {
    it('skips and stops from inside the loop body', () => {
      const out: number[] = [];
      const iterator = watchOrFail(loop, [1, 2, 3, 4, 5, 6]);

      for (const item of iterator) {
        out.push(item);
        loop.skip(1);
        if (item >= 5) {
          loop.stop();
        }
      }

      expect(out).toEqual([1, 3, 5]);
      expect(iterator.getCount()).toBe(6);
      expect(loop.getDepth()).toBe(0);
    });

    it('names unnamed loops after their depth', () => {
      expect(watchOrFail(loop, [1]).name).toBe('loop0');
      expect(watchOrFail(loop, [2]).name).toBe('loop1');
      expect(watchOrFail(loop, [3], 'rows').name).toBe('rows');
      expect(loop.getDepth()).toBe(3);
    });

    it('returns null for values that cannot be iterated', () => {
      expect(loop.watch(null)).toBeNull();
      expect(loop.watch(undefined)).toBeNull();
      expect(loop.watch(() => [1])).toBeNull();
      expect(loop.getDepth()).toBe(0);
    });

    it('returns null for an absent name without resolving the source', () => {
      let resolved = false;
      const source = {
        get [Symbol.iterator]() {
          resolved = true;
          return function* () {
            yield 1;
          };
        }
      };

      expect(loop.watch(source, null)).toBeNull();
      expect(loop.watch([1, 2], null)).toBeNull();
      expect(resolved).toBe(false);
      expect(loop.getDepth()).toBe(0);

      expect(loop.watch(source)).not.toBeNull();
      expect(resolved).toBe(true);
    });

    it('watches maps by value', () => {
      const iterator = loop.watch(new Map([['a', 1], ['b', 2]]));
      expect(iterator ? [...iterator] : []).toEqual([1, 2]);
    });

    it('returns a handle that can be filtered', () => {
      const out: number[] = [];
      for (const item of watchOrFail(loop, [1, 2, 3, 4, 5]).exclude(2).stop(5)) {
        out.push(item);
      }
      expect(out).toEqual([1, 3, 4]);
      expect(loop.getDepth()).toBe(0);
    });
  });

  describe('nested loops', () => {
    it('stops an enclosing loop after the inner loop finishes', () => {
      const out: string[] = [];

      for (const outer of watchOrFail(loop, [1, 2, 3], 'outer')) {
        for (const inner of watchOrFail(loop, ['a', 'b'], 'inner')) {
          out.push(`${outer}${inner}`);
          loop.stop('outer');
        }
      }

      expect(out).toEqual(['1a', '1b']);
      expect(loop.getDepth()).toBe(0);
    });

    it('pops inner loops as they finish', () => {
      const depths: number[] = [];

      for (const _row of watchOrFail(loop, [1, 2], 'rows')) {
        for (const _cell of watchOrFail(loop, ['x'], 'cells')) {
          depths.push(loop.getDepth());
        }
        depths.push(loop.getDepth());
      }

      expect(depths).toEqual([2, 1, 2, 1]);
      expect(loop.getDepth()).toBe(0);
    });

    it('stops the named loop and everything inside it with stopTo', () => {
      const a = watchOrFail(loop, [1, 2], 'a');
      const b = watchOrFail(loop, [1, 2], 'b');
      const c = watchOrFail(loop, [1, 2], 'c');

      loop.stopTo('b');

      expect(a.isStopped()).toBe(false);
      expect(b.isStopped()).toBe(true);
      expect(c.isStopped()).toBe(true);
      expect(loop.getDepth()).toBe(3);

      expect(c.hasNext()).toBe(false);
      expect(loop.getDepth()).toBe(2);
      expect(b.hasNext()).toBe(false);
      expect(loop.getDepth()).toBe(1);
      expect(loop.getCount()).toBe(0);
      expect(a.hasNext()).toBe(true);
    });

    it('keeps enclosing loops in order after stopTo', () => {
      watchOrFail(loop, [1, 2], 'a');
      const b = watchOrFail(loop, [1, 2], 'b');
      watchOrFail(loop, [1, 2], 'c');

      loop.stopTo('c');

      expect(b.isStopped()).toBe(false);
      loop.skip(1);
      expect(loop.getDepth()).toBe(2);
      loop.skip(1);
      expect(b.getCount()).toBe(1);
      expect(loop.getCount('a')).toBe(0);
    });

    it('ignores stopTo for an unknown name', () => {
      const a = watchOrFail(loop, [1], 'a');
      const b = watchOrFail(loop, [1], 'b');

      loop.stopTo('missing');

      expect(a.isStopped()).toBe(false);
      expect(b.isStopped()).toBe(false);
    });

    it('stops every loop with stopAll', () => {
      const a = watchOrFail(loop, [1], 'a');
      const b = watchOrFail(loop, [1], 'b');

      loop.stopAll();

      expect(a.hasNext()).toBe(false);
      expect(b.hasNext()).toBe(false);
      expect(loop.getDepth()).toBe(0);
    });

    it('ignores stop for an unknown name', () => {
      const a = watchOrFail(loop, [1], 'a');
      loop.stop('missing');
      expect(a.isStopped()).toBe(false);
    });
  });

  describe('skip', () => {
    it('counts skipped elements', () => {
      const iterator = watchOrFail(loop, [1, 2, 3, 4]);
      iterator.next();
      expect(loop.isFirst()).toBe(true);

      loop.skip(2);

      expect(loop.getCount()).toBe(3);
      expect(loop.isFirst()).toBe(false);
      expect(iterator.next()).toBe(4);
    });

    it('stops quietly when fewer elements remain', () => {
      const iterator = watchOrFail(loop, [1, 2, 3]);
      iterator.next();

      expect(() => loop.skip(5)).not.toThrow();

      expect(iterator.getCount()).toBe(3);
      expect(loop.getDepth()).toBe(0);
    });

    it('targets a named loop', () => {
      const outer = watchOrFail(loop, [1, 2, 3, 4], 'outer');
      const inner = watchOrFail(loop, ['x'], 'inner');

      loop.skip(2, 'outer');
      loop.skip(2, 'missing');

      expect(outer.getCount()).toBe(2);
      expect(inner.getCount()).toBe(0);
    });
  });

  describe('inspection', () => {
    it('returns null with no active loop', () => {
      expect(loop.isFirst()).toBeNull();
      expect(loop.isLast()).toBeNull();
      expect(loop.getCount()).toBeNull();
      expect(loop.getDepth()).toBe(0);
    });

    it('returns null for unknown names', () => {
      watchOrFail(loop, [1], 'a');
      expect(loop.isFirst('b')).toBeNull();
      expect(loop.isLast('b')).toBeNull();
      expect(loop.getCount('b')).toBeNull();
    });

    it('reports the last element without leaving the loop', () => {
      const iterator = watchOrFail(loop, [1, 2]);

      iterator.next();
      expect(loop.isLast()).toBe(false);
      iterator.next();
      expect(loop.isLast()).toBe(true);
      expect(loop.getDepth()).toBe(1);

      expect(iterator.hasNext()).toBe(false);
      expect(loop.getDepth()).toBe(0);
    });

    it('inspects enclosing loops by name', () => {
      const outer = watchOrFail(loop, ['a', 'b'], 'outer');
      outer.next();
      outer.next();
      watchOrFail(loop, [1, 2, 3], 'inner');

      expect(loop.isFirst('outer')).toBe(false);
      expect(loop.isLast('outer')).toBe(true);
      expect(loop.getCount('outer')).toBe(2);
      expect(loop.isLast()).toBe(false);
    });

    it('exposes state through property accessors', () => {
      const iterator = watchOrFail(loop, ['x', 'y']);
      iterator.next();

      expect(loop.depth).toBe(1);
      expect(loop.first).toBe(true);
      expect(loop.last).toBe(false);
      expect(loop.count).toBe(1);
    });
  });
});
