import type { Board, Move } from '../shisen_core/types';
import { doMove, findMove } from '../shisen_core/solver';

/** Plays the first legal move until none is left; returns the moves played. */
export function autoplay(b: Board): Move[] {
  const played: Move[] = [];
  for (let mv = findMove(b); mv; mv = findMove(b)) {
    doMove(b, mv);
    played.push(mv);
  }
  return played;
}
