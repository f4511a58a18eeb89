/**
 * Tests for the append-only store and its handles
 */

import { describe, it, expect } from 'vitest';
import { vec3, type Vec3 } from '../num/vec3.js';
import { Store } from './store.js';
import { createHandle } from './handles.js';

describe('Store', () => {
  describe('insert', () => {
    it('should assign sequential indices in insertion order', () => {
      const store = new Store<Vec3>('point');

      const a = store.insert(vec3(0, 0, 0));
      const b = store.insert(vec3(1, 0, 0));

      expect(a.index).toBe(0);
      expect(b.index).toBe(1);
      expect(store.size).toBe(2);
    });

    it('should give equal values distinct handles', () => {
      const store = new Store<Vec3>('point');

      const a = store.insert(vec3(1, 2, 3));
      const b = store.insert(vec3(1, 2, 3));

      expect(a).not.toBe(b);
      expect(a.key).not.toBe(b.key);
      expect(store.contains(a)).toBe(true);
      expect(store.contains(b)).toBe(true);
    });
  });

  describe('contains', () => {
    it('should reject handles from another store with the same index', () => {
      const first = new Store<Vec3>('point');
      const second = new Store<Vec3>('point');

      const a = first.insert(vec3(0, 0, 0));
      const b = second.insert(vec3(0, 0, 0));

      expect(a.index).toBe(b.index);
      expect(first.contains(b)).toBe(false);
      expect(second.contains(a)).toBe(false);
    });

    it('should reject a handle that was not issued by the store', () => {
      const store = new Store<Vec3>('point');
      const issued = store.insert(vec3(0, 0, 0));

      const forged = createHandle<Vec3>(issued.store, issued.index);

      expect(forged.key).toBe(issued.key);
      expect(store.contains(forged)).toBe(false);
    });

    it('should reject a handle past the end of the store', () => {
      const store = new Store<Vec3>('point');
      const other = new Store<Vec3>('point');
      other.insert(vec3(0, 0, 0));
      const h = other.insert(vec3(1, 0, 0));

      expect(store.contains(h)).toBe(false);
    });
  });

  describe('get', () => {
    it('should return the stored value', () => {
      const store = new Store<Vec3>('point');
      const p = vec3(4, 5, 6);

      const h = store.insert(p);

      expect(store.get(h)).toBe(p);
    });

    it('should throw for a foreign handle', () => {
      const store = new Store<Vec3>('point');
      const other = new Store<Vec3>('point');
      const h = other.insert(vec3(0, 0, 0));

      expect(() => store.get(h)).toThrow(
        `Handle ${h.key} does not belong to the point store`
      );
    });
  });

  describe('iteration', () => {
    it('should yield entries in insertion order', () => {
      const store = new Store<string>('label');
      const a = store.insert('a');
      const b = store.insert('b');
      const c = store.insert('c');

      const entries = [...store.iter()];

      expect(entries.map((e) => e.value)).toEqual(['a', 'b', 'c']);
      expect(entries.map((e) => e.handle)).toEqual([a, b, c]);
    });

    it('should be restartable', () => {
      const store = new Store<string>('label');
      store.insert('a');
      store.insert('b');

      expect([...store.values()]).toEqual(['a', 'b']);
      expect([...store.values()]).toEqual(['a', 'b']);
      expect([...store].length).toBe(2);
      expect([...store].length).toBe(2);
    });

    it('should list handles', () => {
      const store = new Store<string>('label');
      const a = store.insert('a');
      const b = store.insert('b');

      expect([...store.handles()]).toEqual([a, b]);
    });

    it('should be empty for an empty store', () => {
      const store = new Store<string>('label');

      expect([...store.iter()]).toEqual([]);
      expect(store.size).toBe(0);
    });
  });
});
