import { AppError, ERR } from '@shisen-sho/shared';
import type { Board } from '../shisen_core/types';
import { EMPTY, emptyBoard, setCell, tile } from '../shisen_core/board';

// '.' = empty, tile kind in base 36; border included.
export function renderBoard(b: Board): string {
  return b.grid
    .map((row) => row.map((cell) => (cell.type === 'tile' ? cell.kind.toString(36) : '.')).join(''))
    .join('\n');
}

/**
 * Board from its interior, one string per row, same alphabet as renderBoard.
 * The border is added.
 */
export function parseBoard(rows: string[]): Board {
  const innerCols = rows.length ? rows[0].length : 0;
  const b = emptyBoard(innerCols, rows.length);
  rows.forEach((line, r) => {
    if (line.length !== innerCols) {
      throw new AppError(ERR.INVALID_PARAM, `row ${r} has ${line.length} cells, expected ${innerCols}`);
    }
    [...line].forEach((ch, c) => {
      const kind = parseInt(ch, 36);
      if (ch !== '.' && Number.isNaN(kind)) {
        throw new AppError(ERR.INVALID_PARAM, `bad cell '${ch}' at row ${r}, column ${c}`);
      }
      setCell(b, { r: r + 1, c: c + 1 }, ch === '.' ? EMPTY : tile(kind));
    });
  });
  return b;
}
