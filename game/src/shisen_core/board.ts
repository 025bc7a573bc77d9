import { ERR, invariant } from '@shisen-sho/shared';
import type { Board, Cell, Pos } from './types';

export const TILE_KIND_COUNT = 34;

// largest length a JS array can take
const MAX_CELLS = 2 ** 32 - 1;

export const EMPTY: Cell = Object.freeze({ type: 'empty' as const });

export function tile(kind: number): Cell {
  return Object.freeze({ type: 'tile' as const, kind });
}

export function pos(c: number, r: number): Pos {
  return { r, c };
}

export function samePos(a: Pos, b: Pos): boolean {
  return a.r === b.r && a.c === b.c;
}

export function isSameTile(a: Cell, b: Cell): boolean {
  return a.type === 'tile' && b.type === 'tile' && a.kind === b.kind;
}

/**
 * Empty board of `innerCols` x `innerRows` playable cells, surrounded by a
 * one-cell border that never holds a tile. At least one inner dimension must
 * be even so the tiles pair up.
 */
export function emptyBoard(innerCols: number, innerRows: number): Board {
  invariant(
    Number.isSafeInteger(innerCols) && innerCols >= 0,
    ERR.INVALID_PARAM,
    `innerCols must be a non-negative integer, got ${innerCols}`
  );
  invariant(
    Number.isSafeInteger(innerRows) && innerRows >= 0,
    ERR.INVALID_PARAM,
    `innerRows must be a non-negative integer, got ${innerRows}`
  );
  invariant(
    innerCols % 2 === 0 || innerRows % 2 === 0,
    ERR.INVALID_PARAM,
    `one of innerCols/innerRows must be even, got ${innerCols}x${innerRows}`
  );

  const cols = innerCols + 2;
  const rows = innerRows + 2;
  invariant(cols * rows <= MAX_CELLS, ERR.INVALID_PARAM, `board too large: ${cols}x${rows}`);

  const grid: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) row.push(EMPTY);
    grid.push(row);
  }
  return { innerRows, innerCols, rows, cols, grid };
}

export function inBounds(b: Board, p: Pos): boolean {
  return (
    Number.isInteger(p.r) && Number.isInteger(p.c) && p.r >= 0 && p.r < b.rows && p.c >= 0 && p.c < b.cols
  );
}

export function isInner(b: Board, p: Pos): boolean {
  return p.r >= 1 && p.r < b.rows - 1 && p.c >= 1 && p.c < b.cols - 1;
}

export function getCell(b: Board, p: Pos): Cell {
  invariant(inBounds(b, p), ERR.OUT_OF_BOUNDS, `square (${p.c}, ${p.r}) outside ${b.cols}x${b.rows} grid`);
  return b.grid[p.r][p.c];
}

export function setCell(b: Board, p: Pos, cell: Cell): void {
  invariant(inBounds(b, p), ERR.OUT_OF_BOUNDS, `square (${p.c}, ${p.r}) outside ${b.cols}x${b.rows} grid`);
  invariant(
    cell.type === 'empty' || isInner(b, p),
    ERR.OUT_OF_BOUNDS,
    `square (${p.c}, ${p.r}) is on the border and cannot hold a tile`
  );
  b.grid[p.r][p.c] = cell;
}

export function isTileAt(b: Board, p: Pos): boolean {
  return getCell(b, p).type === 'tile';
}

export function isEmptyAt(b: Board, p: Pos): boolean {
  return getCell(b, p).type === 'empty';
}

// Row-major, border included.
export function* squares(b: Board): Generator<Pos> {
  for (let r = 0; r < b.rows; r++) {
    for (let c = 0; c < b.cols; c++) yield { r, c };
  }
}

export function* squaresInner(b: Board): Generator<Pos> {
  for (const p of squares(b)) {
    if (isInner(b, p)) yield p;
  }
}

export function* enumerateTiles(b: Board): Generator<[Pos, Cell]> {
  for (const p of squaresInner(b)) {
    const cell = b.grid[p.r][p.c];
    if (cell.type === 'tile') yield [p, cell];
  }
}

export function* iterTiles(b: Board): Generator<Cell> {
  for (const [, cell] of enumerateTiles(b)) yield cell;
}

export function tileCount(b: Board): number {
  let n = 0;
  for (const _ of iterTiles(b)) n++;
  return n;
}

export function isEmpty(b: Board): boolean {
  return iterTiles(b).next().done === true;
}

export function cloneBoard(b: Board): Board {
  return {
    innerRows: b.innerRows,
    innerCols: b.innerCols,
    rows: b.rows,
    cols: b.cols,
    // cells are never mutated in place, so copying the rows is enough
    grid: b.grid.map((row) => row.slice())
  };
}
