/**
 * Audit Path Fold Tests
 *
 * A symbolic engine renders each pair as `(left right)`, which makes the
 * operand order of every merge visible in the result.
 */

import { describe, it, expect } from 'vitest';
import { foldPath } from '../../../validation/path-fold.js';
import { InvalidProofError } from '../../../core/errors.js';
import type { Sign, SignedHash } from '../../../proof/types.js';
import { auditPath, buildTree } from '../../utils/audit-paths.js';

const symbolic = {
  hashPair: (left: Uint8Array, right: Uint8Array): Buffer =>
    Buffer.from(`(${Buffer.from(left).toString()}${Buffer.from(right).toString()})`),
};

function path(...entries: Array<[Sign, string]>): SignedHash[] {
  return entries.map(([sign, label]) => [sign, Buffer.from(label)]);
}

function fold(entries: readonly SignedHash[], start: number): string {
  return foldPath(symbolic, entries, start).toString();
}

describe('foldPath', () => {
  describe('Fold order', () => {
    it('joins a -1 entry with its left neighbour', () => {
      expect(fold(path([1, 'a'], [-1, 'b']), 1)).toBe('(ab)');
    });

    it('joins a +1 entry with its right neighbour', () => {
      expect(fold(path([1, 'a'], [1, 'b']), 0)).toBe('(ab)');
    });

    it('carries the left neighbour sign into the parent', () => {
      expect(fold(path([1, 'a'], [-1, 'b'], [1, 'c']), 1)).toBe('((ab)c)');
    });

    it('carries the right neighbour sign into the parent', () => {
      expect(fold(path([1, 'a'], [1, 'b'], [-1, 'c'], [1, 'd']), 1)).toBe('((a(bc))d)');
    });

    it('folds a path of right siblings from the first entry', () => {
      expect(fold(path([1, 'a'], [1, 'b'], [1, 'c']), 0)).toBe('((ab)c)');
    });

    it('folds a path of left siblings from the last entry', () => {
      expect(fold(path([1, 'a'], [-1, 'b'], [-1, 'c']), 2)).toBe('(a(bc))');
    });

    it('returns the only entry of a single-entry path', () => {
      expect(fold(path([1, 'root']), 0)).toBe('root');
    });

    it('does not modify the path it folds', () => {
      const entries = path([1, 'a'], [-1, 'b'], [1, 'c']);
      const before = entries.map(([sign, digest]) => [sign, digest.toString()]);

      fold(entries, 1);

      expect(entries).toHaveLength(3);
      expect(entries.map(([sign, digest]) => [sign, digest.toString()])).toEqual(before);
    });
  });

  describe('Malformed paths', () => {
    it('rejects an empty path', () => {
      expect(() => fold([], 0)).toThrow(InvalidProofError);
      expect(() => fold([], 0)).toThrow('Invalid Merkle proof: empty audit path');
    });

    it('rejects a start index outside the path', () => {
      const entries = path([1, 'a'], [-1, 'b']);

      expect(() => fold(entries, -1)).toThrow('start index -1 outside path of length 2');
      expect(() => fold(entries, 2)).toThrow('start index 2 outside path of length 2');
      expect(() => fold(entries, 0.5)).toThrow(InvalidProofError);
    });

    it('rejects a sign pointing past the left end', () => {
      expect(() => fold(path([-1, 'a'], [1, 'b']), 0)).toThrow('entry 0 has no left neighbour');
    });

    it('rejects a sign pointing past the right end', () => {
      expect(() => fold(path([1, 'a'], [1, 'b']), 1)).toThrow('entry 1 has no right neighbour');
    });

    it('rejects a right neighbour of the first entry that points left', () => {
      expect(() => fold(path([1, 'a'], [-1, 'b']), 0)).toThrow('entry 1 points left of the first entry');
      expect(() => fold(path([1, 'a'], [-1, 'b'], [-1, 'c']), 1)).toThrow(InvalidProofError);
    });

    it('rejects a root that does not carry +1', () => {
      expect(() => fold(path([-1, 'root']), 0)).toThrow('root entry does not carry sign +1');
      expect(() => fold(path([-1, 'a'], [-1, 'b']), 1)).toThrow('root entry does not carry sign +1');
    });
  });

  describe('Generated audit paths', () => {
    for (const size of [1, 2, 4, 8, 16]) {
      it(`folds every leaf of a ${size}-leaf tree to its root`, () => {
        const records = Array.from({ length: size }, (_, i) => `record-${i}`);
        const tree = buildTree(records);

        for (let leaf = 0; leaf < size; leaf++) {
          const { path: entries, start } = auditPath(tree, leaf);
          expect(foldPath(tree.engine, entries, start)).toEqual(tree.root);
        }
      });
    }

    it('lays a path out as left siblings, leaf, right siblings', () => {
      const tree = buildTree(['r0', 'r1', 'r2', 'r3', 'r4', 'r5', 'r6', 'r7']);
      const { path: entries, start } = auditPath(tree, 2);

      expect(start).toBe(1);
      expect(entries.map(([sign]) => sign)).toEqual([1, 1, -1, 1]);
      expect(entries.map(([, digest]) => digest)).toEqual([
        tree.levels[1][0],
        tree.levels[0][2],
        tree.levels[0][3],
        tree.levels[2][1],
      ]);
    });
  });
});
