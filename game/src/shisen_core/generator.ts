import { ERR, invariant } from '@shisen-sho/shared';
import type { Board, Rng } from './types';
import { TILE_KIND_COUNT, cloneBoard, emptyBoard, enumerateTiles, isEmpty, setCell, squaresInner, tile } from './board';
import { doMove, randomMove, shuffleTiles } from './solver';
import { defaultRng, shuffle } from './random';

/**
 * Kinds to place on `cellCount` cells: every kind the same even number of
 * times, the remainder as pairs of randomly chosen kinds.
 */
export function tileKinds(cellCount: number, rng: Rng = defaultRng): number[] {
  invariant(
    Number.isSafeInteger(cellCount) && cellCount >= 0 && cellCount % 2 === 0,
    ERR.INVALID_PARAM,
    `cellCount must be a non-negative even integer, got ${cellCount}`
  );
  const q = Math.floor(cellCount / (2 * TILE_KIND_COUNT));
  const rem = cellCount % (2 * TILE_KIND_COUNT);

  const kinds: number[] = [];
  for (let k = 0; k < TILE_KIND_COUNT; k++) kinds.push(k);

  const out: number[] = [];
  for (let i = 0; i < 2 * q; i++) out.push(...kinds);
  const extra = shuffle(kinds, rng).slice(0, rem / 2);
  out.push(...extra, ...extra);
  return out;
}

/**
 * Rearranges the tiles of `b` in place, keeping occupancy and per-kind counts,
 * so that the board can be cleared.
 *
 * Works layer by layer on a copy: shuffle what is left, commit that
 * arrangement to `b`, then play random moves until none remain. Each layer is
 * removable by replaying the moves that removed it, so the committed board is
 * solvable end to end. A layer that comes up stuck removes nothing and is
 * simply shuffled again.
 */
export function shuffleSolvable(b: Board, rng: Rng = defaultRng): void {
  const work = cloneBoard(b);

  while (!isEmpty(work)) {
    shuffleTiles(work, rng);

    for (const [p, t] of enumerateTiles(work)) setCell(b, p, t);

    for (let mv = randomMove(work, rng); mv; mv = randomMove(work, rng)) {
      doMove(work, mv);
    }
  }
}

/** A random board that is guaranteed to be clearable. */
export function randomBoard(innerCols: number, innerRows: number, rng: Rng = defaultRng): Board {
  const b = emptyBoard(innerCols, innerRows);
  const kinds = tileKinds(innerCols * innerRows, rng);

  let i = 0;
  for (const p of squaresInner(b)) setCell(b, p, tile(kinds[i++]));

  shuffleSolvable(b, rng);
  return b;
}
