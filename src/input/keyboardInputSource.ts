import type { InputSource } from '../core/runner';
import type { Action } from '../core/types';
import { InputController } from './controller';

export class KeyboardInputSource implements InputSource {
  constructor(private controller: InputController) {}

  sample(): Action {
    return this.controller.sample();
  }

  reset(): void {
    this.controller.reset();
  }
}
