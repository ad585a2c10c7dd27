import type { GameRunner, InputSource } from '../core/runner';
import type { GamePhase, GameState } from '../core/types';
import { FrameClock, type Now } from './frameClock';
import type { SoundService } from './soundService';

export type SessionSummary = {
  phase: GamePhase;
  score: number;
  highScore: number;
  level: number;
  lines: number;
  frames: number;
};

export type GameRuntime = {
  /** Resolves when the player quits or {@link GameRuntime.stop} is called. */
  start: () => Promise<SessionSummary>;
  stop: () => void;
  isRunning: () => boolean;
};

type GameRuntimeOptions = {
  runner: GameRunner;
  renderer: { render: (state: GameState) => void };
  inputSource: InputSource;
  sound: SoundService;
  fps: number;
  now?: Now;
  onEnter?: () => void;
  onLeave?: () => void;
};

export function createGameRuntime(options: GameRuntimeOptions): GameRuntime {
  const { runner, renderer, inputSource, sound } = options;
  const clock = new FrameClock(options.now);
  const frameMs = 1000 / options.fps;

  let timer: ReturnType<typeof setInterval> | null = null;
  let frames = 0;
  let settle: {
    resolve: (summary: SessionSummary) => void;
    reject: (err: unknown) => void;
  } | null = null;

  const summary = (): SessionSummary => {
    const s = runner.state;
    return {
      phase: s.phase,
      score: s.score,
      highScore: s.highScore,
      level: s.level,
      lines: s.lines,
      frames,
    };
  };

  const halt = (): typeof settle => {
    if (timer != null) {
      clearInterval(timer);
      timer = null;
    }
    const pending = settle;
    settle = null;
    options.onLeave?.();
    return pending;
  };

  const stop = () => {
    if (timer == null) return;
    halt()?.resolve(summary());
  };

  const fail = (err: unknown) => {
    halt()?.reject(err);
  };

  const tick = () => {
    try {
      const result = runner.frame(clock.delta(), inputSource);
      frames++;
      if (result.linesCleared > 0) sound.playLineClear(result.linesCleared);
      if (result.quit) {
        stop();
        return;
      }
      renderer.render(runner.state);
    } catch (err) {
      fail(err);
    }
  };

  const start = () => {
    if (timer != null) {
      return Promise.reject(new Error('Runtime already started'));
    }
    return new Promise<SessionSummary>((resolve, reject) => {
      settle = { resolve, reject };
      try {
        options.onEnter?.();
        inputSource.reset?.();
        clock.restart();
        frames = 0;
        renderer.render(runner.state);
        timer = setInterval(tick, frameMs);
      } catch (err) {
        fail(err);
      }
    });
  };

  return {
    start,
    stop,
    isRunning: () => timer != null,
  };
}
