import type { Key } from 'node:readline';
import type { Action } from '../core/types';
import { Keyboard } from './keyboard';

// readline key names; fixed, there is no rebinding.
export const KEY_BINDINGS: ReadonlyMap<string, Action> = new Map<
  string,
  Action
>([
  ['left', 'moveLeft'],
  ['right', 'moveRight'],
  ['down', 'softDrop'],
  ['up', 'rotate'],
  ['space', 'hardDrop'],
  ['p', 'togglePause'],
  ['q', 'quit'],
  ['return', 'start'],
  ['enter', 'start'],
]);

export function decodeKey(key: Key): Action {
  if (key.ctrl && key.name === 'c') return 'quit';
  if (key.ctrl || key.meta) return 'none';
  if (key.name === undefined) return 'none';
  return KEY_BINDINGS.get(key.name) ?? 'none';
}

export class InputController {
  constructor(private kb: Keyboard) {}

  /** Decodes at most one keypress per frame. */
  sample(): Action {
    const key = this.kb.consumePressed();
    return key ? decodeKey(key) : 'none';
  }

  reset(): void {
    this.kb.clear();
  }
}
