import type { Game } from './game';
import type { Action, GameState } from './types';

export interface InputSource {
  /** One decoded action per frame; 'none' when nothing was pressed. */
  sample(state: GameState): Action;
  reset?(): void;
}

export interface GameRunnerOptions {
  /**
   * Optional clamp on a single frame's delta, in seconds. Keeps a long stall
   * from piling a huge amount of time into the gravity and lock timers.
   */
  maxDeltaS?: number;
}

export interface FrameResult {
  action: Action;
  /** Lines cleared during this frame, by the action or by the update. */
  linesCleared: number;
  quit: boolean;
}

export class GameRunner {
  constructor(
    private game: Game,
    private options: GameRunnerOptions = {},
  ) {}

  get state(): GameState {
    return this.game.state;
  }

  frame(dt: number, input: InputSource = NullInputSource): FrameResult {
    const action = input.sample(this.game.state);
    if (action === 'quit') {
      return {
        action,
        linesCleared: this.game.consumeClearedLines(),
        quit: true,
      };
    }

    this.apply(action);
    this.game.update(this.clampDelta(dt));

    return {
      action,
      linesCleared: this.game.consumeClearedLines(),
      quit: false,
    };
  }

  apply(action: Action): void {
    const game = this.game;
    const phase = game.state.phase;

    switch (action) {
      case 'moveLeft':
        if (phase === 'start') game.selectLevel(-1);
        else game.moveLeft();
        break;
      case 'moveRight':
        if (phase === 'start') game.selectLevel(1);
        else game.moveRight();
        break;
      case 'softDrop':
        game.moveDown();
        break;
      case 'rotate':
        game.rotate();
        break;
      case 'hardDrop':
        game.hardDrop();
        break;
      case 'togglePause':
        game.togglePause();
        break;
      case 'start':
        if (phase === 'start') {
          game.setStartingLevel(game.state.selectedLevel);
        } else if (phase === 'gameOver') {
          game.reset();
        }
        break;
      case 'quit':
      case 'none':
        break;
    }
  }

  runFrames(
    frames: number,
    dt: number,
    input: InputSource = NullInputSource,
  ): number {
    const count = Math.max(0, Math.trunc(frames));
    let cleared = 0;
    for (let i = 0; i < count; i++) {
      cleared += this.frame(dt, input).linesCleared;
    }
    return cleared;
  }

  runUntil(
    predicate: (state: GameState) => boolean,
    maxFrames: number | undefined,
    dt: number,
    input: InputSource = NullInputSource,
  ): number {
    const limit = maxFrames == null ? Infinity : Math.max(0, maxFrames);
    let frames = 0;
    while (!predicate(this.game.state) && frames < limit) {
      this.frame(dt, input);
      frames++;
    }
    return frames;
  }

  private clampDelta(dt: number): number {
    const positive = Math.max(0, dt);
    return this.options.maxDeltaS == null
      ? positive
      : Math.min(positive, this.options.maxDeltaS);
  }
}

export const NullInputSource: InputSource = {
  sample: () => 'none',
};

/** Replays a fixed list of actions, then reports 'none'. */
export class ScriptedInputSource implements InputSource {
  private index = 0;

  constructor(private actions: readonly Action[]) {}

  sample(): Action {
    if (this.index >= this.actions.length) return 'none';
    return this.actions[this.index++];
  }

  reset(): void {
    this.index = 0;
  }
}
