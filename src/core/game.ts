import {
  BASE_GRAVITY_S,
  GRAVITY_STEP_S,
  HARD_DROP_POINTS,
  LINES_PER_LEVEL,
  LINE_CLEAR_POINTS,
  LOCK_DELAY_S,
  MAX_START_LEVEL,
  MIN_GRAVITY_S,
  MIN_LEVEL,
  SOFT_DROP_POINTS,
  SPAWN_X,
  SPAWN_Y,
} from './constants';
import { clearLines, makeBoard } from './board';
import type { PieceGenerator } from './generator';
import { RandomGenerator } from './randomGenerator';
import {
  collides,
  dropDistance,
  isGrounded,
  lockPiece,
  tryRotateCW,
} from './piece';

import type { ActivePiece, GameState, PieceKind } from './types';

export interface GameConfig {
  seed: number;
  /** Level highlighted when the start screen first shows. */
  startLevel?: number;
  generatorFactory?: (seed: number) => PieceGenerator;
}

function spawnPiece(k: PieceKind): ActivePiece {
  return { k, r: 0, x: SPAWN_X, y: SPAWN_Y };
}

export function clampStartLevel(level: number): number {
  if (!Number.isFinite(level)) return MIN_LEVEL;
  return Math.max(MIN_LEVEL, Math.min(MAX_START_LEVEL, Math.trunc(level)));
}

export function gravityInterval(level: number): number {
  return Math.max(MIN_GRAVITY_S, BASE_GRAVITY_S - (level - 1) * GRAVITY_STEP_S);
}

/**
 * Single-player session: owns the board, the falling piece, the preview and
 * the counters. Player actions are methods; time only moves through
 * {@link Game.update}.
 *
 * Phases run start -> playing <-> paused, and playing -> gameOver when a new
 * piece has nowhere to spawn. {@link Game.reset} takes a finished game back
 * to the start screen and keeps the session high score.
 */
export class Game {
  readonly state: GameState;

  private generator: PieceGenerator;
  private pendingCleared = 0;

  constructor(cfg: GameConfig) {
    const makeGenerator =
      cfg.generatorFactory ?? ((seed) => new RandomGenerator(seed));
    this.generator = makeGenerator(cfg.seed);

    const first = this.generator.next();
    const next = this.generator.next();

    this.state = {
      phase: 'start',
      board: makeBoard(),
      active: spawnPiece(first),
      ghostY: SPAWN_Y,
      next,
      score: 0,
      level: MIN_LEVEL,
      lines: 0,
      highScore: 0,
      selectedLevel: clampStartLevel(cfg.startLevel ?? MIN_LEVEL),
      timers: { gravity: 0, lockDelay: 0, grounded: false },
    };

    this.recomputeGhost();
  }

  reset(): void {
    const s = this.state;
    s.phase = 'start';
    s.board = makeBoard();
    s.active = spawnPiece(this.generator.next());
    s.next = this.generator.next();
    s.score = 0;
    s.level = MIN_LEVEL;
    s.lines = 0;
    this.resetTimers();
    this.pendingCleared = 0;
    this.recomputeGhost();
  }

  selectLevel(delta: number): boolean {
    if (this.state.phase !== 'start') return false;
    const selected = clampStartLevel(this.state.selectedLevel + delta);
    if (selected === this.state.selectedLevel) return false;
    this.state.selectedLevel = selected;
    return true;
  }

  setStartingLevel(level: number): boolean {
    if (this.state.phase !== 'start') return false;

    const start = clampStartLevel(level);
    this.state.level = start;
    this.state.selectedLevel = start;
    this.state.phase = 'playing';
    this.resetTimers();

    if (collides(this.state.board, this.state.active)) {
      this.state.phase = 'gameOver';
      return false;
    }
    return true;
  }

  spawnNext(): boolean {
    const k = this.state.next;
    this.state.next = this.generator.next();
    this.state.active = spawnPiece(k);
    this.state.timers.grounded = false;
    this.state.timers.lockDelay = 0;
    this.recomputeGhost();

    if (collides(this.state.board, this.state.active)) {
      this.state.phase = 'gameOver';
      return false;
    }
    return true;
  }

  moveLeft(): boolean {
    return this.shift(-1, 0);
  }

  moveRight(): boolean {
    return this.shift(1, 0);
  }

  moveDown(): boolean {
    if (!this.shift(0, 1)) return false;
    this.addScore(SOFT_DROP_POINTS);
    return true;
  }

  rotate(): boolean {
    if (this.state.phase !== 'playing') return false;
    if (!tryRotateCW(this.state.board, this.state.active)) return false;
    this.afterMove();
    return true;
  }

  /** Returns the number of rows the piece fell before locking. */
  hardDrop(): number {
    if (this.state.phase !== 'playing') return 0;

    const d = dropDistance(this.state.board, this.state.active);
    this.state.active.y += d;
    this.addScore(d * HARD_DROP_POINTS);
    this.lockAndClear();
    return d;
  }

  togglePause(): void {
    if (this.state.phase === 'playing') {
      this.state.phase = 'paused';
    } else if (this.state.phase === 'paused') {
      this.state.phase = 'playing';
    }
  }

  /**
   * Advances gravity and lock delay by `dt` seconds. Gravity moves the piece
   * at most one row per call however large `dt` is.
   */
  update(dt: number): void {
    if (this.state.phase !== 'playing') return;

    const timers = this.state.timers;
    timers.gravity += dt;

    if (timers.gravity >= this.gravityInterval()) {
      timers.gravity = 0;

      const { board, active } = this.state;
      if (!collides(board, active, active.r, 0, 1)) {
        active.y += 1;
        timers.grounded = false;
        timers.lockDelay = 0;
        this.recomputeGhost();
      } else {
        timers.grounded = true;
      }
    }

    if (timers.grounded || isGrounded(this.state.board, this.state.active)) {
      timers.grounded = true;
      timers.lockDelay += dt;
      if (timers.lockDelay >= LOCK_DELAY_S) {
        this.lockAndClear();
      }
    } else {
      timers.lockDelay = 0;
    }
  }

  gravityInterval(): number {
    return gravityInterval(this.state.level);
  }

  ghostY(): number {
    const { board, active } = this.state;
    return active.y + dropDistance(board, active);
  }

  /** Lines cleared since the previous call. */
  consumeClearedLines(): number {
    const n = this.pendingCleared;
    this.pendingCleared = 0;
    return n;
  }

  private shift(dx: number, dy: number): boolean {
    if (this.state.phase !== 'playing') return false;

    const { board, active } = this.state;
    if (collides(board, active, active.r, dx, dy)) return false;

    active.x += dx;
    active.y += dy;
    this.afterMove();
    return true;
  }

  private afterMove(): void {
    if (!isGrounded(this.state.board, this.state.active)) {
      this.state.timers.grounded = false;
      this.state.timers.lockDelay = 0;
    }
    this.recomputeGhost();
  }

  private lockAndClear(): void {
    lockPiece(this.state.board, this.state.active);

    const cleared = clearLines(this.state.board);
    if (cleared > 0) {
      const s = this.state;
      s.lines += cleared;
      this.addScore((LINE_CLEAR_POINTS[cleared] ?? 0) * s.level);
      // never below the chosen starting level
      s.level = Math.max(
        s.level,
        MIN_LEVEL + Math.floor(s.lines / LINES_PER_LEVEL),
      );
      this.pendingCleared += cleared;
    }

    this.spawnNext();
  }

  private addScore(points: number): void {
    this.state.score += points;
    if (this.state.score > this.state.highScore) {
      this.state.highScore = this.state.score;
    }
  }

  private resetTimers(): void {
    this.state.timers.gravity = 0;
    this.state.timers.lockDelay = 0;
    this.state.timers.grounded = false;
  }

  private recomputeGhost(): void {
    this.state.ghostY = this.ghostY();
  }
}
