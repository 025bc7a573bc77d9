import { ERR, invariant } from '@shisen-sho/shared';
import type { Board, Move, Pos } from './types';
import { getCell, isSameTile, isTileAt, pos, samePos } from './board';

type Range = { min: number; max: number };

function intersect(a: Range, b: Range): Range {
  return { min: Math.max(a.min, b.min), max: Math.min(a.max, b.max) };
}

function makeMove(path: Pos[]): Move {
  return { src: path[0], dst: path[path.length - 1], path };
}

/**
 * Vertical-horizontal-vertical path bending on row `r`.
 * Segments of zero length are dropped, so a straight line has two points.
 */
export function vhvMove(src: Pos, dst: Pos, r: number): Move {
  invariant(src.c !== dst.c, ERR.INVALID_PATH, `vhv path needs distinct columns, got column ${src.c} twice`);
  const path: Pos[] = [src];
  if (src.r !== r) path.push(pos(src.c, r));
  if (dst.r !== r) path.push(pos(dst.c, r));
  path.push(dst);
  return makeMove(path);
}

/** Horizontal-vertical-horizontal path bending on column `c`. */
export function hvhMove(src: Pos, dst: Pos, c: number): Move {
  invariant(src.r !== dst.r, ERR.INVALID_PATH, `hvh path needs distinct rows, got row ${src.r} twice`);
  const path: Pos[] = [src];
  if (src.c !== c) path.push(pos(c, src.r));
  if (dst.c !== c) path.push(pos(c, dst.r));
  path.push(dst);
  return makeMove(path);
}

// Sum of per-segment Chebyshev distances.
export function pathDistance(mv: Move): number {
  let d = 0;
  for (let i = 1; i < mv.path.length; i++) {
    const a = mv.path[i - 1];
    const b = mv.path[i];
    d += Math.max(Math.abs(a.c - b.c), Math.abs(a.r - b.r));
  }
  return d;
}

// Rows reachable from p along its own column without crossing a tile.
function columnReach(b: Board, p: Pos): Range {
  let min = p.r;
  while (min > 0 && !isTileAt(b, pos(p.c, min - 1))) min--;
  let max = p.r;
  while (max < b.rows - 1 && !isTileAt(b, pos(p.c, max + 1))) max++;
  return { min, max };
}

// Columns reachable from p along its own row without crossing a tile.
function rowReach(b: Board, p: Pos): Range {
  let min = p.c;
  while (min > 0 && !isTileAt(b, pos(min - 1, p.r))) min--;
  let max = p.c;
  while (max < b.cols - 1 && !isTileAt(b, pos(max + 1, p.r))) max++;
  return { min, max };
}

function movesVhv(b: Board, src: Pos, dst: Pos): Move[] {
  if (src.c === dst.c) return [];

  const rows = intersect(columnReach(b, src), columnReach(b, dst));
  const c0 = Math.min(src.c, dst.c) + 1;
  const c1 = Math.max(src.c, dst.c) - 1;

  const out: Move[] = [];
  for (let r = rows.min; r <= rows.max; r++) {
    let clear = true;
    for (let c = c0; c <= c1 && clear; c++) clear = !isTileAt(b, pos(c, r));
    if (clear) out.push(vhvMove(src, dst, r));
  }
  return out;
}

function movesHvh(b: Board, src: Pos, dst: Pos): Move[] {
  if (src.r === dst.r) return [];

  const cols = intersect(rowReach(b, src), rowReach(b, dst));
  const r0 = Math.min(src.r, dst.r) + 1;
  const r1 = Math.max(src.r, dst.r) - 1;

  const out: Move[] = [];
  for (let c = cols.min; c <= cols.max; c++) {
    let clear = true;
    for (let r = r0; r <= r1 && clear; r++) clear = !isTileAt(b, pos(c, r));
    if (clear) out.push(hvhMove(src, dst, c));
  }
  return out;
}

/**
 * Every legal move between two squares: all VHV candidates by bend row, then
 * all HVH candidates by bend column. Empty when the squares coincide or do not
 * hold matching tiles.
 */
export function movesBetween(b: Board, src: Pos, dst: Pos): Move[] {
  if (samePos(src, dst) || !isSameTile(getCell(b, src), getCell(b, dst))) return [];
  return [...movesVhv(b, src, dst), ...movesHvh(b, src, dst)];
}

export function findMoveBetween(b: Board, src: Pos, dst: Pos): Move | null {
  return movesBetween(b, src, dst)[0] ?? null;
}

// Ties go to the earliest candidate.
export function shortestMoveBetween(b: Board, src: Pos, dst: Pos): Move | null {
  let best: Move | null = null;
  let bestDist = Infinity;
  for (const mv of movesBetween(b, src, dst)) {
    const d = pathDistance(mv);
    if (d < bestDist) {
      best = mv;
      bestDist = d;
    }
  }
  return best;
}
