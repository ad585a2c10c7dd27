export const PIECES = ['I', 'O', 'T', 'S', 'Z', 'J', 'L'] as const;
export type PieceKind = (typeof PIECES)[number];

export type Rotation = 0 | 1 | 2 | 3;
export type Vec2 = readonly [number, number];
export type Shape = readonly [Vec2, Vec2, Vec2, Vec2];

export type ColorId = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export type Cell = ColorId | null;
export type Board = Cell[][];

export interface ActivePiece {
  k: PieceKind;
  r: Rotation;
  x: number;
  y: number; // can be negative while spawning
}

export type GamePhase = 'start' | 'playing' | 'paused' | 'gameOver';

export interface GameTimers {
  /** Seconds accumulated towards the next gravity row. */
  gravity: number;
  /** Seconds the piece has spent grounded. */
  lockDelay: number;
  grounded: boolean;
}

export interface GameState {
  phase: GamePhase;
  board: Board;
  active: ActivePiece;
  ghostY: number;
  next: PieceKind;
  score: number;
  level: number;
  lines: number;
  highScore: number;
  /** Level highlighted on the start screen. */
  selectedLevel: number;
  timers: GameTimers;
}

export const ACTIONS = [
  'none',
  'moveLeft',
  'moveRight',
  'softDrop',
  'rotate',
  'hardDrop',
  'togglePause',
  'quit',
  'start',
] as const;
export type Action = (typeof ACTIONS)[number];
