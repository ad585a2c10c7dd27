import type { Key } from 'node:readline';

export type KeypressListener = (str: string | undefined, key?: Key) => void;

/** Anything that emits readline 'keypress' events, usually process.stdin. */
export interface KeypressSource {
  on(event: 'keypress', listener: KeypressListener): unknown;
  off(event: 'keypress', listener: KeypressListener): unknown;
}

export class Keyboard {
  private pressed: Key[] = []; // “went down since last consume”
  private attached = false;

  constructor(private source: KeypressSource) {}

  private readonly onKeypress: KeypressListener = (str, key) => {
    if (key) {
      this.pressed.push(key);
    } else if (str) {
      this.pressed.push({ sequence: str, name: str.toLowerCase() });
    }
  };

  attach(): void {
    if (this.attached) return;
    this.source.on('keypress', this.onKeypress);
    this.attached = true;
  }

  detach(): void {
    if (!this.attached) return;
    this.source.off('keypress', this.onKeypress);
    this.attached = false;
    this.clear();
  }

  consumePressed(): Key | undefined {
    return this.pressed.shift();
  }

  clear(): void {
    this.pressed = [];
  }
}
