import type { Settings } from '../core/settings';
import type { TextOutput } from '../render/terminalRenderer';

const BELL = '\x07';

export type SoundService = {
  playLineClear: (lines: number) => void;
};

type SoundServiceOptions = {
  settings: Settings;
  out: TextOutput;
};

/** Line clears ring the terminal bell once, whatever the count. */
export function createSoundService(options: SoundServiceOptions): SoundService {
  const enabled = options.settings.audio.bell;

  return {
    playLineClear: (lines) => {
      if (!enabled || !Number.isFinite(lines) || lines <= 0) return;
      options.out.write(BELL);
    },
  };
}
