import type { Board, Cell, Move, Pos, Rng } from './types';
import { findMoveBetween } from './link';
import { EMPTY, enumerateTiles, isEmpty, setCell } from './board';
import { defaultRng, shuffle } from './random';

type TilePair = [Pos, Pos];

// Same-kind tile pairs in enumeration order; other pairs can never match.
function candidatePairs(b: Board): TilePair[] {
  const tiles = [...enumerateTiles(b)];
  const pairs: TilePair[] = [];
  for (let i = 0; i < tiles.length; i++) {
    for (let j = i + 1; j < tiles.length; j++) {
      const [pa, ta] = tiles[i];
      const [pb, tb] = tiles[j];
      if (ta.type === 'tile' && tb.type === 'tile' && ta.kind === tb.kind) pairs.push([pa, pb]);
    }
  }
  return pairs;
}

function firstMove(b: Board, pairs: TilePair[]): Move | null {
  for (const [a, c] of pairs) {
    const mv = findMoveBetween(b, a, c);
    if (mv) return mv;
  }
  return null;
}

export function findMove(b: Board): Move | null {
  return firstMove(b, candidatePairs(b));
}

export function randomMove(b: Board, rng: Rng = defaultRng): Move | null {
  return firstMove(b, shuffle(candidatePairs(b), rng));
}

/** Removes both ends of `mv`. The move must come from the board's current state. */
export function doMove(b: Board, mv: Move): void {
  setCell(b, mv.src, EMPTY);
  setCell(b, mv.dst, EMPTY);
}

export function hasMove(b: Board): boolean {
  return findMove(b) !== null;
}

export function isStuck(b: Board): boolean {
  return !isEmpty(b) && !hasMove(b);
}

/** Permutes kinds among occupied cells. The result may well be stuck. */
export function shuffleTiles(b: Board, rng: Rng = defaultRng): void {
  const ps: Pos[] = [];
  const ts: Cell[] = [];
  for (const [p, t] of enumerateTiles(b)) {
    ps.push(p);
    ts.push(t);
  }
  shuffle(ts, rng);
  for (let i = 0; i < ps.length; i++) {
    setCell(b, ps[i], ts[i]);
  }
}
