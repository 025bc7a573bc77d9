import { describe, it, expect } from 'vitest';
import { AppError, ERR } from '@shisen-sho/shared';
import {
  EMPTY,
  cloneBoard,
  emptyBoard,
  enumerateTiles,
  getCell,
  isEmpty,
  isEmptyAt,
  isTileAt,
  iterTiles,
  setCell,
  squares,
  squaresInner,
  tile,
  tileCount
} from './board';

function codeOf(fn: () => unknown): number | null {
  try {
    fn();
  } catch (e) {
    if (e instanceof AppError) return e.code;
    throw e;
  }
  return null;
}

describe('emptyBoard', () => {
  it('adds a one-cell border on every side', () => {
    const b = emptyBoard(4, 3);
    expect(b.cols).toBe(6);
    expect(b.rows).toBe(5);
    expect(b.innerCols).toBe(4);
    expect(b.innerRows).toBe(3);
    expect(b.grid).toHaveLength(5);
    expect(b.grid.every((row) => row.length === 6)).toBe(true);
    expect([...squares(b)].every((p) => isEmptyAt(b, p))).toBe(true);
  });

  it('rejects two odd dimensions', () => {
    expect(codeOf(() => emptyBoard(3, 5))).toBe(ERR.INVALID_PARAM);
  });

  it('accepts one odd dimension', () => {
    expect(codeOf(() => emptyBoard(3, 2))).toBeNull();
    expect(codeOf(() => emptyBoard(8, 7))).toBeNull();
  });

  it('rejects negative and fractional sizes', () => {
    expect(codeOf(() => emptyBoard(-2, 2))).toBe(ERR.INVALID_PARAM);
    expect(codeOf(() => emptyBoard(2, 1.5))).toBe(ERR.INVALID_PARAM);
  });

  it('rejects sizes whose cell count overflows', () => {
    expect(codeOf(() => emptyBoard(2 ** 20, 2 ** 20))).toBe(ERR.INVALID_PARAM);
  });

  it('treats a zero-area interior as empty', () => {
    const b = emptyBoard(0, 0);
    expect(b.cols).toBe(2);
    expect(b.rows).toBe(2);
    expect([...squaresInner(b)]).toEqual([]);
    expect(isEmpty(b)).toBe(true);
  });
});

describe('enumeration', () => {
  it('walks the full grid row-major', () => {
    const b = emptyBoard(2, 0);
    expect([...squares(b)]).toEqual([
      { r: 0, c: 0 },
      { r: 0, c: 1 },
      { r: 0, c: 2 },
      { r: 0, c: 3 },
      { r: 1, c: 0 },
      { r: 1, c: 1 },
      { r: 1, c: 2 },
      { r: 1, c: 3 }
    ]);
  });

  it('restarts from the beginning on each call', () => {
    const b = emptyBoard(2, 2);
    expect([...squaresInner(b)]).toEqual([...squaresInner(b)]);
  });

  it('restricts the interior to non-border squares', () => {
    const b = emptyBoard(2, 2);
    expect([...squaresInner(b)]).toEqual([
      { r: 1, c: 1 },
      { r: 1, c: 2 },
      { r: 2, c: 1 },
      { r: 2, c: 2 }
    ]);
  });

  it('lists tiles with their squares', () => {
    const b = emptyBoard(2, 2);
    setCell(b, { r: 1, c: 2 }, tile(5));
    setCell(b, { r: 2, c: 1 }, tile(0));
    expect([...enumerateTiles(b)]).toEqual([
      [{ r: 1, c: 2 }, { type: 'tile', kind: 5 }],
      [{ r: 2, c: 1 }, { type: 'tile', kind: 0 }]
    ]);
    expect([...iterTiles(b)]).toEqual([tile(5), tile(0)]);
    expect(tileCount(b)).toBe(2);
    expect(isEmpty(b)).toBe(false);
  });
});

describe('cell access', () => {
  it('reads back what was written', () => {
    const b = emptyBoard(2, 2);
    setCell(b, { r: 2, c: 2 }, tile(7));
    expect(getCell(b, { r: 2, c: 2 })).toEqual(tile(7));
    expect(isTileAt(b, { r: 2, c: 2 })).toBe(true);
    setCell(b, { r: 2, c: 2 }, EMPTY);
    expect(isEmptyAt(b, { r: 2, c: 2 })).toBe(true);
  });

  it('faults outside the grid', () => {
    const b = emptyBoard(2, 2);
    expect(codeOf(() => getCell(b, { r: 4, c: 0 }))).toBe(ERR.OUT_OF_BOUNDS);
    expect(codeOf(() => setCell(b, { r: 0, c: -1 }, EMPTY))).toBe(ERR.OUT_OF_BOUNDS);
  });

  it('never puts a tile on the border', () => {
    const b = emptyBoard(2, 2);
    expect(codeOf(() => setCell(b, { r: 0, c: 1 }, tile(1)))).toBe(ERR.OUT_OF_BOUNDS);
    expect(codeOf(() => setCell(b, { r: 0, c: 1 }, EMPTY))).toBeNull();
  });
});

describe('cloneBoard', () => {
  it('copies cells without sharing storage', () => {
    const b = emptyBoard(2, 2);
    setCell(b, { r: 1, c: 1 }, tile(3));
    const copy = cloneBoard(b);
    setCell(copy, { r: 1, c: 1 }, EMPTY);
    expect(getCell(b, { r: 1, c: 1 })).toEqual(tile(3));
    expect(tileCount(copy)).toBe(0);
  });

  it('shares only frozen cells between copies', () => {
    const b = emptyBoard(2, 2);
    setCell(b, { r: 2, c: 2 }, tile(4));
    const copy = cloneBoard(b);
    expect(getCell(copy, { r: 2, c: 2 })).toBe(getCell(b, { r: 2, c: 2 }));
    expect(Object.isFrozen(getCell(b, { r: 2, c: 2 }))).toBe(true);
    expect(Object.isFrozen(EMPTY)).toBe(true);
  });
});
