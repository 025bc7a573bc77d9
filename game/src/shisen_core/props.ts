import type { Board, Move, Rng } from './types';
import { findMove } from './solver';
import { shuffleSolvable } from './generator';

export function useHint(b: Board): Move | null {
  return findMove(b);
}

// Occupied cells stay occupied; only kinds move.
export function useShuffle(b: Board, rng?: Rng): void {
  shuffleSolvable(b, rng);
}
