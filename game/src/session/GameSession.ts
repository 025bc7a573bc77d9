/**
 * Headless play session.
 * - Generates a board from a preset
 * - Handles selection + elimination
 * - Tracks win/stuck, elapsed time and the last path for display
 *
 * Drawing and input translation stay with the caller.
 */

import { randomBoard } from '../shisen_core/generator';
import { isEmpty, isTileAt, samePos } from '../shisen_core/board';
import { doMove, isStuck } from '../shisen_core/solver';
import { shortestMoveBetween } from '../shisen_core/link';
import { useHint, useShuffle } from '../shisen_core/props';
import { DEFAULT_PRESETS, getPreset } from '../shisen_core/presets';
import { defaultRng } from '../shisen_core/random';
import type { BoardPreset } from '../shisen_core/presets';
import type { Board, Move, Pos, Rng } from '../shisen_core/types';

export type SessionState = 'playing' | 'won' | 'stuck';

export type Logger = Pick<Console, 'log' | 'warn'>;

export type SessionOptions = {
  preset?: BoardPreset;
  // start from this board instead of generating one; restart() still generates
  board?: Board;
  rng?: Rng;
  now?: () => number;
  logger?: Logger;
};

// how long the last path stays on screen
export const PATH_DISPLAY_TICKS = 30;

export function formatDuration(ms: number): string {
  const total = Math.floor(Math.max(0, ms) / 1000);
  const min = Math.floor(total / 60);
  const sec = total % 60;
  return `${String(min).padStart(2, '0')}:${String(sec).padStart(2, '0')}`;
}

/** Grid square under a pixel, or null outside the grid. */
export function squareAt(x: number, y: number, tileWidth: number, tileHeight: number, b: Board): Pos | null {
  if (x < 0 || y < 0) return null;
  const c = Math.floor(x / tileWidth);
  const r = Math.floor(y / tileHeight);
  if (c >= b.cols || r >= b.rows) return null;
  return { r, c };
}

export class GameSession {
  private _board: Board;
  private _state: SessionState = 'playing';
  private _selected: Pos | null = null;
  private _lastMove: Move | null = null;
  private pathTimer = 0;
  private startedAt: number;
  private endedAt: number | null = null;

  readonly preset: BoardPreset;
  private readonly rng: Rng;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(opts: SessionOptions = {}) {
    this.preset = opts.preset ?? getPreset(DEFAULT_PRESETS);
    this.rng = opts.rng ?? defaultRng;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? console;

    this._board = opts.board ?? this.generate();
    this.startedAt = this.now();
    if (isEmpty(this._board)) this._state = 'won';
    else if (isStuck(this._board)) this._state = 'stuck';
    if (this._state !== 'playing') this.endedAt = this.startedAt;
  }

  get board(): Board {
    return this._board;
  }

  get state(): SessionState {
    return this._state;
  }

  get selected(): Pos | null {
    return this._selected;
  }

  /** Move to draw, until its countdown runs out. */
  get lastMove(): Move | null {
    return this._lastMove;
  }

  restart(): void {
    this._board = this.generate();
    this._state = 'playing';
    this._selected = null;
    this._lastMove = null;
    this.pathTimer = 0;
    this.startedAt = this.now();
    this.endedAt = null;
  }

  /**
   * Call this when a square is clicked. Returns the move played, if any.
   */
  click(p: Pos): Move | null {
    if (this._state !== 'playing') {
      this.logger.warn(`click ignored: session is ${this._state}`);
      return null;
    }

    const first = this._selected;
    if (!first) {
      if (isTileAt(this._board, p)) this._selected = p;
      return null;
    }

    this._selected = null;
    if (samePos(first, p)) return null;

    const mv = shortestMoveBetween(this._board, first, p);
    if (!mv) return null;

    doMove(this._board, mv);
    this._lastMove = mv;
    this.pathTimer = PATH_DISPLAY_TICKS;

    if (isEmpty(this._board)) {
      this.finish('won');
    } else if (isStuck(this._board)) {
      this.finish('stuck');
    }
    return mv;
  }

  tick(): void {
    if (this.pathTimer === 0) return;
    this.pathTimer--;
    if (this.pathTimer === 0) this._lastMove = null;
  }

  hint(): Move | null {
    return this._state === 'playing' ? useHint(this._board) : null;
  }

  /** Reshuffles the remaining tiles; rescues a stuck session. */
  shuffle(): void {
    if (this._state === 'won') {
      this.logger.warn('shuffle ignored: board already cleared');
      return;
    }
    useShuffle(this._board, this.rng);
    this._selected = null;
    if (this._state === 'stuck') {
      this._state = 'playing';
      this.endedAt = null;
      this.logger.log('board reshuffled, back to playing');
    }
  }

  elapsedMs(): number {
    return (this.endedAt ?? this.now()) - this.startedAt;
  }

  elapsedText(): string {
    return formatDuration(this.elapsedMs());
  }

  private generate(): Board {
    const { id, innerCols, innerRows } = this.preset;
    const b = randomBoard(innerCols, innerRows, this.rng);
    this.logger.log(`board generated: ${id} ${innerCols}x${innerRows}`);
    return b;
  }

  private finish(state: Exclude<SessionState, 'playing'>): void {
    this._state = state;
    this.endedAt = this.now();
    this.logger.log(`${state} after ${this.elapsedText()}`);
  }
}
