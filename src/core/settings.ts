import {
  DEFAULT_BELL,
  DEFAULT_FPS,
  DEFAULT_GHOST,
  MAX_DELTA_S,
  MIN_LEVEL,
} from './constants';
import { clampStartLevel } from './game';

export interface GameSettings {
  startLevel: number;
  /** Fixed piece seed; null picks one from the clock. */
  seed: number | null;
}

export interface RuntimeSettings {
  fps: number;
  maxDeltaS: number;
}

export interface RenderSettings {
  ghost: boolean;
  basicColors: boolean;
}

export interface AudioSettings {
  bell: boolean;
}

export interface Settings {
  game: GameSettings;
  runtime: RuntimeSettings;
  render: RenderSettings;
  audio: AudioSettings;
}

export type SettingsPatch = {
  [K in keyof Settings]?: Partial<Settings[K]>;
};

export const DEFAULT_SETTINGS: Settings = {
  game: {
    startLevel: MIN_LEVEL,
    seed: null,
  },
  runtime: {
    fps: DEFAULT_FPS,
    maxDeltaS: MAX_DELTA_S,
  },
  render: {
    ghost: DEFAULT_GHOST,
    basicColors: false,
  },
  audio: {
    bell: DEFAULT_BELL,
  },
};

function num(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

function positive(v: unknown): number | undefined {
  const n = num(v);
  return n != null && n > 0 ? n : undefined;
}

function bool(v: unknown): boolean | undefined {
  return typeof v === 'boolean' ? v : undefined;
}

function mergeGame(
  base: GameSettings,
  patch?: Partial<GameSettings>,
): GameSettings {
  const level = num(patch?.startLevel);
  const seed = num(patch?.seed);
  return {
    startLevel: level == null ? base.startLevel : clampStartLevel(level),
    seed: seed == null ? base.seed : seed >>> 0,
  };
}

function mergeRuntime(
  base: RuntimeSettings,
  patch?: Partial<RuntimeSettings>,
): RuntimeSettings {
  return {
    fps: positive(patch?.fps) ?? base.fps,
    maxDeltaS: positive(patch?.maxDeltaS) ?? base.maxDeltaS,
  };
}

function mergeRender(
  base: RenderSettings,
  patch?: Partial<RenderSettings>,
): RenderSettings {
  return {
    ghost: bool(patch?.ghost) ?? base.ghost,
    basicColors: bool(patch?.basicColors) ?? base.basicColors,
  };
}

function mergeAudio(
  base: AudioSettings,
  patch?: Partial<AudioSettings>,
): AudioSettings {
  return {
    bell: bool(patch?.bell) ?? base.bell,
  };
}

export function mergeSettings(base: Settings, patch: SettingsPatch): Settings {
  return {
    game: mergeGame(base.game, patch.game),
    runtime: mergeRuntime(base.runtime, patch.runtime),
    render: mergeRender(base.render, patch.render),
    audio: mergeAudio(base.audio, patch.audio),
  };
}
