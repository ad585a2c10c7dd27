import { describe, expect, it } from 'vitest';
import { COLS } from '../core/constants';
import { Game, clampStartLevel, gravityInterval } from '../core/game';
import { PIECES } from '../core/types';
import { fillRow, fixedGame, repeat, sequenceGame } from './helpers';

function blockSpawn(game: Game): void {
  fillRow(game.state.board, 0, 4, 5, 1);
  fillRow(game.state.board, 1, 4, 5, 1);
}

describe('new game', () => {
  it('waits on the start screen with a piece and a preview drawn', () => {
    const game = sequenceGame(['T', 'O', 'S']);
    const s = game.state;

    expect(s.phase).toBe('start');
    expect(s.active).toEqual({ k: 'T', r: 0, x: 3, y: 0 });
    expect(s.next).toBe('O');
    expect(s.score).toBe(0);
    expect(s.level).toBe(1);
    expect(s.lines).toBe(0);
    expect(s.selectedLevel).toBe(1);
    expect(s.board.flat().every((c) => c == null)).toBe(true);
  });

  it('ignores play actions before the game starts', () => {
    const game = fixedGame('O');

    expect(game.moveLeft()).toBe(false);
    expect(game.moveDown()).toBe(false);
    expect(game.rotate()).toBe(false);
    expect(game.hardDrop()).toBe(0);
    game.update(5);
    game.togglePause();

    expect(game.state.phase).toBe('start');
    expect(game.state.active.y).toBe(0);
    expect(game.state.score).toBe(0);
  });

  it('draws from the seeded random generator by default', () => {
    const a = new Game({ seed: 77 });
    const b = new Game({ seed: 77 });
    expect(a.state.active.k).toBe(b.state.active.k);
    expect(a.state.next).toBe(b.state.next);
    expect(PIECES).toContain(a.state.active.k);
  });
});

describe('starting level', () => {
  it('clamps the requested level into 1..10', () => {
    expect(clampStartLevel(0)).toBe(1);
    expect(clampStartLevel(15)).toBe(10);
    expect(clampStartLevel(4.7)).toBe(4);
    expect(clampStartLevel(Number.NaN)).toBe(1);
  });

  it('starts play at the clamped level', () => {
    const low = fixedGame('T');
    expect(low.setStartingLevel(0)).toBe(true);
    expect(low.state.level).toBe(1);
    expect(low.state.phase).toBe('playing');

    const high = fixedGame('T');
    high.setStartingLevel(15);
    expect(high.state.level).toBe(10);
  });

  it('only applies on the start screen', () => {
    const game = fixedGame('T', 3);
    expect(game.setStartingLevel(7)).toBe(false);
    expect(game.state.level).toBe(3);
  });

  it('ends the game at once when the spawn position is occupied', () => {
    const game = fixedGame('O');
    game.state.board[0][4] = 1;

    expect(game.setStartingLevel(1)).toBe(false);
    expect(game.state.phase).toBe('gameOver');
  });

  it('moves the highlighted level within bounds', () => {
    const game = new Game({
      seed: 1,
      startLevel: 9,
    });
    expect(game.state.selectedLevel).toBe(9);

    expect(game.selectLevel(1)).toBe(true);
    expect(game.selectLevel(1)).toBe(false);
    expect(game.state.selectedLevel).toBe(10);

    expect(game.selectLevel(-1)).toBe(true);
    expect(game.state.selectedLevel).toBe(9);
  });
});

describe('movement', () => {
  it('moves sideways until a wall stops it', () => {
    const game = fixedGame('O', 1);

    const moved: boolean[] = [];
    repeat(5, () => moved.push(game.moveLeft()));

    expect(moved).toEqual([true, true, true, true, false]);
    expect(game.state.active.x).toBe(-1);
  });

  it('awards one point per soft-dropped row', () => {
    const game = fixedGame('O', 1);
    expect(game.moveDown()).toBe(true);
    expect(game.state.score).toBe(1);
    expect(game.state.active.y).toBe(1);
    expect(game.state.highScore).toBe(1);
  });

  it('does not soft drop through the floor', () => {
    const game = fixedGame('O', 1);
    repeat(18, () => game.moveDown());

    expect(game.moveDown()).toBe(false);
    expect(game.state.active.y).toBe(18);
    expect(game.state.score).toBe(18);
  });

  it('rotates the active piece clockwise', () => {
    const game = fixedGame('I', 1);
    expect(game.rotate()).toBe(true);
    expect(game.state.active.r).toBe(1);
  });

  it('tracks the landing row of the active piece', () => {
    const game = fixedGame('O', 1);
    expect(game.state.ghostY).toBe(18);

    game.state.board[12][5] = 3;
    game.moveLeft();
    game.moveRight();
    expect(game.state.ghostY).toBe(10);
  });
});

describe('hard drop', () => {
  it('locks at once and awards two points per row', () => {
    const game = fixedGame('O', 1);

    expect(game.hardDrop()).toBe(18);
    expect(game.state.score).toBe(36);
    expect(game.state.board[18].slice(4, 6)).toEqual([2, 2]);
    expect(game.state.board[19].slice(4, 6)).toEqual([2, 2]);
    expect(game.state.active).toEqual({ k: 'O', r: 0, x: 3, y: 0 });
  });

  it('scores exactly ten points for a five-row drop', () => {
    const game = fixedGame('O', 1);
    repeat(13, () => game.moveDown());
    const before = game.state.score;

    expect(game.hardDrop()).toBe(5);
    expect(game.state.score - before).toBe(10);
  });
});

describe('line clears', () => {
  it('scores a four-line clear at level 3 as 2400', () => {
    const game = fixedGame('I', 3);
    for (let y = 16; y <= 19; y++) fillRow(game.state.board, y, 1, COLS - 1);

    game.rotate();
    repeat(5, () => game.moveLeft());
    expect(game.state.active.x).toBe(-2);

    expect(game.hardDrop()).toBe(16);
    expect(game.state.score).toBe(32 + 2400);
    expect(game.state.lines).toBe(4);
    expect(game.state.level).toBe(3);
    expect(game.consumeClearedLines()).toBe(4);
    expect(game.consumeClearedLines()).toBe(0);
    expect(game.state.board.flat().every((c) => c == null)).toBe(true);
  });

  it('levels up on the tenth line and not before', () => {
    const game = fixedGame('I', 1);
    const clearOne = () => {
      fillRow(game.state.board, 19, 4, COLS - 1);
      repeat(3, () => game.moveLeft());
      game.hardDrop();
    };

    repeat(9, clearOne);
    expect(game.state.lines).toBe(9);
    expect(game.state.level).toBe(1);

    clearOne();
    expect(game.state.lines).toBe(10);
    expect(game.state.level).toBe(2);
    expect(game.state.score).toBe(10 * (36 + 100));
  });

  it('never drops below the chosen starting level', () => {
    const game = fixedGame('I', 5);
    fillRow(game.state.board, 19, 4, COLS - 1);
    repeat(3, () => game.moveLeft());
    game.hardDrop();

    expect(game.state.lines).toBe(1);
    expect(game.state.level).toBe(5);
    expect(game.state.score).toBe(36 + 500);
  });

  it('clears a single line left by two I pieces and an O', () => {
    const game = sequenceGame(['I', 'I', 'O', 'T']);
    game.setStartingLevel(1);

    repeat(3, () => game.moveLeft());
    game.hardDrop();
    game.moveRight();
    game.hardDrop();
    repeat(4, () => game.moveRight());
    game.hardDrop();

    expect(game.state.lines).toBe(1);
    expect(game.state.score).toBe(3 * 36 + 100);
    expect(game.state.board[19]).toEqual([
      null,
      null,
      null,
      null,
      null,
      null,
      null,
      null,
      2,
      2,
    ]);
    expect(game.state.board[18].every((c) => c == null)).toBe(true);
    expect(game.state.active.k).toBe('T');
  });

  it('fills the bottom two rows with five O pieces', () => {
    const game = fixedGame('O', 1);

    repeat(4, () => game.moveLeft());
    game.hardDrop();
    repeat(2, () => game.moveLeft());
    game.hardDrop();
    game.hardDrop();
    repeat(2, () => game.moveRight());
    game.hardDrop();

    expect(game.state.score).toBe(4 * 36);
    expect(game.state.lines).toBe(0);
    expect(game.state.board[19].slice(0, 8).every((c) => c === 2)).toBe(true);

    repeat(4, () => game.moveRight());
    game.hardDrop();

    expect(game.state.lines).toBe(2);
    expect(game.state.score).toBe(5 * 36 + 300);
    expect(game.state.board.flat().every((c) => c == null)).toBe(true);
  });
});

describe('gravity and lock delay', () => {
  it('follows the level speed curve with a floor', () => {
    expect(gravityInterval(1)).toBe(0.8);
    expect(gravityInterval(10)).toBeCloseTo(0.737, 10);
    expect(gravityInterval(200)).toBe(0.05);
  });

  it('drops one row once the interval has elapsed', () => {
    const game = fixedGame('O', 1);

    game.update(0.5);
    expect(game.state.active.y).toBe(0);
    expect(game.state.timers.gravity).toBe(0.5);

    game.update(0.375);
    expect(game.state.active.y).toBe(1);
    expect(game.state.timers.gravity).toBe(0);
  });

  it('moves at most one row per update', () => {
    const game = fixedGame('O', 1);
    game.update(10);
    expect(game.state.active.y).toBe(1);
    expect(game.state.timers.lockDelay).toBe(0);
  });

  it('locks a grounded piece after half a second', () => {
    const game = fixedGame('O', 1);
    repeat(18, () => game.moveDown());

    game.update(0.25);
    expect(game.state.timers.grounded).toBe(true);
    expect(game.state.timers.lockDelay).toBe(0.25);
    expect(game.state.board[19][4]).toBeNull();

    game.update(0.25);
    expect(game.state.board[19][4]).toBe(2);
    expect(game.state.board[18][5]).toBe(2);
    expect(game.state.active.y).toBe(0);
    expect(game.state.timers.lockDelay).toBe(0);
  });

  it('keeps the lock timer while sliding along the stack', () => {
    const game = fixedGame('O', 1);
    fillRow(game.state.board, 19, 0, 5);
    repeat(17, () => game.moveDown());

    game.update(0.25);
    expect(game.state.timers.lockDelay).toBe(0.25);

    game.moveRight();
    expect(game.state.timers.grounded).toBe(true);
    expect(game.state.timers.lockDelay).toBe(0.25);

    game.moveRight();
    expect(game.state.timers.grounded).toBe(false);
    expect(game.state.timers.lockDelay).toBe(0);
  });
});

describe('rotation near the stack', () => {
  it('keeps the lock timer when a floor kick leaves the piece grounded', () => {
    const game = fixedGame('T', 1);
    repeat(18, () => game.moveDown());
    game.update(0.25);
    expect(game.state.timers.lockDelay).toBe(0.25);

    expect(game.rotate()).toBe(true);

    expect(game.state.active).toEqual({ k: 'T', r: 1, x: 3, y: 17 });
    expect(game.state.timers.grounded).toBe(true);
    expect(game.state.timers.lockDelay).toBe(0.25);
    expect(game.state.ghostY).toBe(17);
  });

  it('clears the lock timer when turning lifts the piece off the stack', () => {
    const game = fixedGame('I', 1);
    game.state.board[19][5] = 1;
    game.rotate();
    repeat(15, () => game.moveDown());
    game.update(0.25);
    expect(game.state.timers.grounded).toBe(true);
    expect(game.state.timers.lockDelay).toBe(0.25);

    expect(game.rotate()).toBe(true);

    expect(game.state.active).toEqual({ k: 'I', r: 2, x: 3, y: 15 });
    expect(game.state.timers.grounded).toBe(false);
    expect(game.state.timers.lockDelay).toBe(0);
    expect(game.state.ghostY).toBe(16);
  });
});

describe('pause', () => {
  it('freezes the game until resumed', () => {
    const game = fixedGame('O', 1);
    game.update(0.25);

    game.togglePause();
    expect(game.state.phase).toBe('paused');

    repeat(5, () => game.update(1));
    expect(game.moveLeft()).toBe(false);
    expect(game.hardDrop()).toBe(0);
    expect(game.state.active).toEqual({ k: 'O', r: 0, x: 3, y: 0 });
    expect(game.state.score).toBe(0);
    expect(game.state.timers.gravity).toBe(0.25);

    game.togglePause();
    expect(game.state.phase).toBe('playing');
    expect(game.state.timers.gravity).toBe(0.25);
  });

  it('holds a grounded piece and its lock timer while paused', () => {
    const game = fixedGame('O', 1);
    repeat(18, () => game.moveDown());
    game.update(0.25);
    const before = structuredClone(game.state);
    expect(before.timers).toEqual({
      gravity: 0.25,
      lockDelay: 0.25,
      grounded: true,
    });

    game.togglePause();
    repeat(10, () => game.update(1));
    expect(game.state).toEqual({ ...before, phase: 'paused' });

    game.togglePause();
    expect(game.state).toEqual(before);
  });
});

describe('game over', () => {
  it('ends when a new piece has nowhere to spawn', () => {
    const game = fixedGame('O', 1);
    blockSpawn(game);

    expect(game.spawnNext()).toBe(false);
    expect(game.state.phase).toBe('gameOver');
  });

  it('promotes the preview piece on a successful spawn', () => {
    const game = sequenceGame(['T', 'O', 'S', 'Z']);
    game.setStartingLevel(1);

    expect(game.spawnNext()).toBe(true);
    expect(game.state.active.k).toBe('O');
    expect(game.state.next).toBe('S');
  });

  it('tops out after ten O pieces stacked in the middle', () => {
    const game = fixedGame('O', 1);

    repeat(9, () => game.hardDrop());
    expect(game.state.phase).toBe('playing');

    expect(game.hardDrop()).toBe(0);
    expect(game.state.phase).toBe('gameOver');
    expect(game.state.score).toBe(180);
    expect(game.state.highScore).toBe(180);
  });

  it('returns to the start screen and keeps the session high score', () => {
    const game = fixedGame('O', 1);
    repeat(10, () => game.hardDrop());
    expect(game.state.phase).toBe('gameOver');

    game.reset();

    expect(game.state.phase).toBe('start');
    expect(game.state.score).toBe(0);
    expect(game.state.lines).toBe(0);
    expect(game.state.level).toBe(1);
    expect(game.state.highScore).toBe(180);
    expect(game.state.board.flat().every((c) => c == null)).toBe(true);
  });
});
