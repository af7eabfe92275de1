/**
 * Audit path folding
 *
 * Reduces a signed audit path to a single candidate root.
 *
 * Starting from the entry at `start`, the current entry repeatedly absorbs
 * the neighbour its sign points at:
 * - sign +1: parent = hashPair(current, right); the parent inherits the
 *   right neighbour's sign, which must be +1 when current is the first entry
 * - sign -1: parent = hashPair(left, current); the parent inherits the left
 *   neighbour's sign and the cursor moves one step left
 *
 * A generator must therefore lay the path out as
 * `[left siblings, highest first] [leaf] [right siblings, lowest first]`,
 * with each sibling carrying the side its parent joins on next. The entry
 * left standing at the end is the root and must carry +1, so every sign in a
 * path is checked.
 */

import { InvalidProofError } from '../core/errors.js';
import type { HashEngine } from '../hashing/hash-engine.js';
import type { Sign, SignedHash } from '../proof/types.js';

/**
 * Fold `path` into one digest
 *
 * @param engine - Engine configured with the proof's hashing regime
 * @param path - Signed audit path (not mutated)
 * @param start - Index of the entry the fold starts from
 * @throws InvalidProofError for an empty path, an out-of-range start, a
 *   sign pointing past either end of the path, or a root not signed +1
 */
export function foldPath(
  engine: Pick<HashEngine, 'hashPair'>,
  path: readonly SignedHash[],
  start: number
): Buffer {
  if (path.length === 0) {
    throw new InvalidProofError('empty audit path');
  }
  if (!Number.isInteger(start) || start < 0 || start >= path.length) {
    throw new InvalidProofError(`start index ${start} outside path of length ${path.length}`);
  }

  const entries: Array<[Sign, Buffer]> = path.map(([sign, digest]) => [sign, digest]);
  let cursor = start;

  while (entries.length > 1) {
    const [sign, digest] = entries[cursor];

    if (sign === 1) {
      const right = entries[cursor + 1];
      if (right === undefined) {
        throw new InvalidProofError(`entry ${cursor} has no right neighbour`);
      }
      // Nothing is left of the first entry, so its parent can only join rightwards
      if (cursor === 0 && right[0] !== 1) {
        throw new InvalidProofError(`entry ${cursor + 1} points left of the first entry`);
      }
      entries.splice(cursor, 2, [right[0], engine.hashPair(digest, right[1])]);
    } else {
      const left = entries[cursor - 1];
      if (left === undefined) {
        throw new InvalidProofError(`entry ${cursor} has no left neighbour`);
      }
      entries.splice(cursor - 1, 2, [left[0], engine.hashPair(left[1], digest)]);
      cursor -= 1;
    }
  }

  const [rootSign, root] = entries[0];
  if (rootSign !== 1) {
    throw new InvalidProofError('root entry does not carry sign +1');
  }

  return root;
}
