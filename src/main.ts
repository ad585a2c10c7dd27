#!/usr/bin/env node
import { parseCli, USAGE, versionText } from './app/cli';
import { createGameRuntime } from './app/runtime';
import { createSoundService } from './app/soundService';
import { createTerminal } from './app/terminal';
import { Game } from './core/game';
import { getPiecePalette } from './core/palette';
import { timeSeed } from './core/rng';
import { GameRunner } from './core/runner';
import { InputController } from './input/controller';
import { Keyboard } from './input/keyboard';
import { KeyboardInputSource } from './input/keyboardInputSource';
import { TerminalRenderer } from './render/terminalRenderer';

async function boot(): Promise<void> {
  const cli = parseCli(process.argv.slice(2), process.env);

  if (cli.showVersion) {
    console.info(versionText());
    return;
  }
  if (cli.showHelp) {
    console.info(USAGE);
    return;
  }
  for (const warning of cli.warnings) {
    console.warn(`[Settings] ${warning}`);
  }

  const { settings } = cli;
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new Error('An interactive terminal is required.');
  }

  const game = new Game({
    seed: settings.game.seed ?? timeSeed(),
    startLevel: settings.game.startLevel,
  });
  const runner = new GameRunner(game, {
    maxDeltaS: settings.runtime.maxDeltaS,
  });

  const terminal = createTerminal(process.stdin, process.stdout);
  const kb = new Keyboard(process.stdin);
  const inputSource = new KeyboardInputSource(new InputController(kb));
  const renderer = new TerminalRenderer(process.stdout, {
    ghost: settings.render.ghost,
    palette: getPiecePalette(settings.render),
  });
  const sound = createSoundService({ settings, out: process.stdout });

  const runtime = createGameRuntime({
    runner,
    renderer,
    inputSource,
    sound,
    fps: settings.runtime.fps,
    onEnter: () => {
      terminal.enter();
      kb.attach();
    },
    onLeave: () => {
      kb.detach();
      terminal.leave();
    },
  });

  const stop = () => runtime.stop();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    const summary = await runtime.start();
    console.info(
      `[Session] score=${summary.score} high=${summary.highScore} ` +
        `level=${summary.level} lines=${summary.lines}`,
    );
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    terminal.leave();
  }
}

boot().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});
