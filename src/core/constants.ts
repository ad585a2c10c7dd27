export const COLS = 10;
export const ROWS = 20;

export const SPAWN_X = 3;
export const SPAWN_Y = 0;

// 2x2 footprint checked by isSpawnBlocked
export const SPAWN_ZONE_X = COLS / 2 - 1;
export const SPAWN_ZONE_Y = 0;
export const SPAWN_ZONE_SIZE = 2;

export const MIN_LEVEL = 1;
export const MAX_START_LEVEL = 10;
export const LINES_PER_LEVEL = 10;

// Seconds
export const BASE_GRAVITY_S = 0.8;
export const GRAVITY_STEP_S = 0.007;
export const MIN_GRAVITY_S = 0.05;
export const LOCK_DELAY_S = 0.5;

export const SOFT_DROP_POINTS = 1;
export const HARD_DROP_POINTS = 2;
export const LINE_CLEAR_POINTS: Readonly<Record<number, number>> = {
  1: 100,
  2: 300,
  3: 500,
  4: 800,
};

// Runtime
export const DEFAULT_FPS = 60;
export const MAX_DELTA_S = 0.1;
export const DEFAULT_BELL = true;
export const DEFAULT_GHOST = true;

export const SEED_ENV_VAR = 'TERMTRIS_SEED';
export const APP_NAME = 'termtris';
export const APP_VERSION = '1.0.0';
