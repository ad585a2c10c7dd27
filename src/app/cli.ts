import { parseArgs } from 'node:util';
import { APP_NAME, APP_VERSION, SEED_ENV_VAR } from '../core/constants';
import {
  DEFAULT_SETTINGS,
  mergeSettings,
  type Settings,
  type SettingsPatch,
} from '../core/settings';

export interface CliOptions {
  settings: Settings;
  showVersion: boolean;
  showHelp: boolean;
  /** Flag values that could not be used and fell back to defaults. */
  warnings: string[];
}

export const USAGE = `Usage: ${APP_NAME} [options]

Options:
  -l, --level <n>    starting level, 1-10 (default 1)
      --fps <n>      frames per second (default 60)
      --seed <n>     fixed piece sequence (or set ${SEED_ENV_VAR})
      --no-bell      do not ring the terminal bell on line clears
      --no-ghost     hide the landing preview
      --basic-colors use the 8-colour palette
  -v, --version      print the version and exit
  -h, --help         print this help and exit

Keys: arrows move and rotate, space hard drops, p pauses, q quits,
enter starts.`;

export function versionText(): string {
  return `${APP_NAME} version ${APP_VERSION}`;
}

function parseNumber(
  flag: string,
  raw: string | undefined,
  warnings: string[],
): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(n)) {
    warnings.push(`Ignoring ${flag}=${raw}: not a number.`);
    return undefined;
  }
  return n;
}

/**
 * Builds settings from command-line flags and the environment. Unknown flags
 * throw; unusable values are reported in `warnings` and left at defaults.
 */
export function parseCli(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {},
): CliOptions {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      level: { type: 'string', short: 'l' },
      fps: { type: 'string' },
      seed: { type: 'string' },
      'no-bell': { type: 'boolean' },
      'no-ghost': { type: 'boolean' },
      'basic-colors': { type: 'boolean' },
      version: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  });

  const warnings: string[] = [];
  const level = parseNumber('--level', values.level, warnings);
  const fps = parseNumber('--fps', values.fps, warnings);
  const seed =
    parseNumber('--seed', values.seed, warnings) ??
    parseNumber(SEED_ENV_VAR, env[SEED_ENV_VAR], warnings);

  if (fps !== undefined && fps <= 0) {
    warnings.push(`Ignoring --fps=${fps}: must be above zero.`);
  }

  const patch: SettingsPatch = {
    game: { startLevel: level, seed },
    runtime: { fps },
    render: {
      ghost: values['no-ghost'] === true ? false : undefined,
      basicColors: values['basic-colors'],
    },
    audio: { bell: values['no-bell'] === true ? false : undefined },
  };

  return {
    settings: mergeSettings(DEFAULT_SETTINGS, patch),
    showVersion: values.version === true,
    showHelp: values.help === true,
    warnings,
  };
}
