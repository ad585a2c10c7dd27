import { COLS, ROWS } from './constants';
import { KICK_TESTS } from './kicks';
import { colorOf, rotateCW, shapeOf } from './tetromino';
import type { ActivePiece, Board, Rotation, Vec2 } from './types';

export function cellsOf(
  piece: ActivePiece,
  r: Rotation = piece.r,
  dx = 0,
  dy = 0,
): Vec2[] {
  const shape = shapeOf(piece.k, r);
  return shape.map(([x, y]): Vec2 => [piece.x + x + dx, piece.y + y + dy]);
}

/**
 * True when the piece, turned to `r` and shifted by (dx, dy), leaves the
 * side walls, reaches the floor or overlaps a settled cell. Cells above the
 * top row only have to stay between the walls.
 */
export function collides(
  board: Board,
  piece: ActivePiece,
  r: Rotation = piece.r,
  dx = 0,
  dy = 0,
): boolean {
  for (const [cx, cy] of cellsOf(piece, r, dx, dy)) {
    if (cx < 0 || cx >= COLS || cy >= ROWS) return true;
    if (cy >= 0 && board[cy][cx] != null) return true;
  }
  return false;
}

export function lockPiece(board: Board, piece: ActivePiece): void {
  const color = colorOf(piece.k);
  for (const [cx, cy] of cellsOf(piece)) {
    if (cy >= 0 && cy < ROWS && cx >= 0 && cx < COLS) board[cy][cx] = color;
  }
}

export function isGrounded(board: Board, piece: ActivePiece): boolean {
  return collides(board, piece, piece.r, 0, 1);
}

export function dropDistance(board: Board, piece: ActivePiece): number {
  let d = 0;
  while (!collides(board, piece, piece.r, 0, d + 1)) d++;
  return d;
}

/** Rotates clockwise in place using the first kick offset that fits. */
export function tryRotateCW(board: Board, piece: ActivePiece): boolean {
  const to = rotateCW(piece.r);

  for (const [dx, dy] of KICK_TESTS) {
    if (!collides(board, piece, to, dx, dy)) {
      piece.r = to;
      piece.x += dx;
      piece.y += dy;
      return true;
    }
  }
  return false;
}
