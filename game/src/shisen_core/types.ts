export type Pos = { r: number; c: number };

// cells are shared between boards (clones, generator layers), so never mutated
export type Cell =
  | { readonly type: 'empty' }
  | { readonly type: 'tile'; readonly kind: number };

export type Board = {
  // playable area, excluding the border
  innerRows: number;
  innerCols: number;
  // full grid, border included
  rows: number;
  cols: number;
  grid: Cell[][];
};

// src and dst are always path[0] and path[path.length - 1]
export type Move = { readonly src: Pos; readonly dst: Pos; readonly path: readonly Pos[] };

// Math.random-shaped: a float in [0, 1)
export type Rng = () => number;
