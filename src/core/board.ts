import {
  COLS,
  ROWS,
  SPAWN_ZONE_SIZE,
  SPAWN_ZONE_X,
  SPAWN_ZONE_Y,
} from './constants';
import type { Board, Cell } from './types';

export function makeBoard(): Board {
  return Array.from({ length: ROWS }, () => emptyRow());
}

function emptyRow(): Cell[] {
  return Array<Cell>(COLS).fill(null);
}

export function clearLines(board: Board): number {
  let cleared = 0;
  for (let y = ROWS - 1; y >= 0; y--) {
    if (board[y].every((c) => c != null)) {
      board.splice(y, 1);
      board.unshift(emptyRow());
      cleared++;
      y++; // the row that just moved into y needs a look too
    }
  }
  return cleared;
}

export function cellAt(board: Board, x: number, y: number): Cell {
  if (x < 0 || x >= COLS || y < 0 || y >= ROWS) return null;
  return board[y][x];
}

export function isSpawnBlocked(board: Board): boolean {
  for (let y = SPAWN_ZONE_Y; y < SPAWN_ZONE_Y + SPAWN_ZONE_SIZE; y++) {
    for (let x = SPAWN_ZONE_X; x < SPAWN_ZONE_X + SPAWN_ZONE_SIZE; x++) {
      if (cellAt(board, x, y) != null) return true;
    }
  }
  return false;
}
