import { emitKeypressEvents } from 'node:readline';
import type { TextOutput } from '../render/terminalRenderer';

const ALT_SCREEN_ON = '\x1b[?1049h';
const ALT_SCREEN_OFF = '\x1b[?1049l';
const CURSOR_HIDE = '\x1b[?25l';
const CURSOR_SHOW = '\x1b[?25h';
const CLEAR = '\x1b[2J\x1b[H';

export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

export type Terminal = {
  input: TerminalInput;
  output: TextOutput;
  /** Raw keyboard, hidden cursor, alternate screen. */
  enter: () => void;
  /** Undoes {@link Terminal.enter}; safe to call more than once. */
  leave: () => void;
  isActive: () => boolean;
};

export function createTerminal(
  input: TerminalInput,
  output: TextOutput,
): Terminal {
  let active = false;

  const enter = () => {
    if (active) return;
    emitKeypressEvents(input);
    if (input.isTTY) input.setRawMode?.(true);
    input.resume();
    output.write(ALT_SCREEN_ON + CURSOR_HIDE + CLEAR);
    active = true;
  };

  const leave = () => {
    if (!active) return;
    active = false;
    if (input.isTTY) input.setRawMode?.(false);
    input.pause();
    output.write(CURSOR_SHOW + ALT_SCREEN_OFF);
  };

  return {
    input,
    output,
    enter,
    leave,
    isActive: () => active,
  };
}
