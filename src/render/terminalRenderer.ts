import { COLS, MAX_START_LEVEL, MIN_LEVEL, ROWS } from '../core/constants';
import { cellAt } from '../core/board';
import { cellsOf } from '../core/piece';
import { colorOf, shapeOf } from '../core/tetromino';
import type { ColorId, GameState } from '../core/types';
import type { PiecePalette } from '../core/palette';

const BOARD_INNER = COLS * 2;
const PANEL_GAP = '  ';
const PREVIEW_ROWS = 2;

const BLOCK = '██';
const GHOST = '[]';
const EMPTY = '··';

const SGR_DIM = '2';
const SGR_BOLD = '1';
const SGR_REVERSE = '7';

export interface FrameOptions {
  ghost: boolean;
  /** null renders plain text without escape codes. */
  palette: PiecePalette | null;
}

export interface TextOutput {
  write(chunk: string): unknown;
}

type Layer = { text: string; sgr: string | null };

function paint(text: string, sgr: string | null, color: boolean): string {
  if (!color || sgr == null) return text;
  return `\x1b[${sgr}m${text}\x1b[0m`;
}

function center(text: string, width = BOARD_INNER): string {
  const left = Math.max(0, Math.floor((width - text.length) / 2));
  return (' '.repeat(left) + text).padEnd(width);
}

function levelPicker(from: number, to: number, selected: number): Layer[] {
  const out: Layer[] = [];
  for (let level = from; level <= to; level++) {
    const label = String(level).padStart(2);
    out.push(
      level === selected
        ? { text: `[${label}]`, sgr: SGR_REVERSE }
        : { text: ` ${label} `, sgr: null },
    );
  }
  return out;
}

/** Overlay text for the board area, keyed by board row. */
function overlayRows(state: GameState): Map<number, Layer[]> {
  const rows = new Map<number, Layer[]>();
  const line = (y: number, text: string, sgr: string | null = null) =>
    rows.set(y, [{ text: center(text), sgr }]);

  switch (state.phase) {
    case 'start': {
      line(3, 'T E R M T R I S', SGR_BOLD);
      line(5, 'falling blocks');
      line(8, 'CONTROLS', SGR_BOLD);
      line(9, 'left/right  move');
      line(10, 'up  rotate');
      line(11, 'down  soft drop');
      line(12, 'space  hard drop');
      line(13, 'p pause  q quit');
      line(15, `SELECT LEVEL ${MIN_LEVEL}-${MAX_START_LEVEL}`, SGR_BOLD);
      const half = MIN_LEVEL + Math.floor((MAX_START_LEVEL - MIN_LEVEL) / 2);
      rows.set(16, levelPicker(MIN_LEVEL, half, state.selectedLevel));
      rows.set(
        17,
        levelPicker(half + 1, MAX_START_LEVEL, state.selectedLevel),
      );
      line(19, 'ENTER to start');
      break;
    }
    case 'paused':
      line(9, 'PAUSED', SGR_BOLD);
      line(11, 'P to resume');
      break;
    case 'gameOver': {
      line(5, 'GAME OVER', SGR_BOLD);
      line(7, 'Final score');
      line(8, String(state.score));
      if (state.score > 0 && state.score === state.highScore) {
        line(10, 'NEW SESSION HIGH!', SGR_BOLD);
      } else {
        line(10, 'High score');
        line(11, String(state.highScore));
      }
      line(13, 'ENTER new game');
      line(14, 'Q to quit');
      break;
    }
    case 'playing':
      break;
  }
  return rows;
}

function boardCells(state: GameState, options: FrameOptions): Layer[][] {
  const palette = options.palette;
  const sgrOf = (id: ColorId, extra?: string): string | null => {
    if (!palette) return null;
    return extra ? `${extra};${palette[id]}` : palette[id];
  };

  const grid: Layer[][] = [];
  for (let y = 0; y < ROWS; y++) {
    const row: Layer[] = [];
    for (let x = 0; x < COLS; x++) {
      const c = cellAt(state.board, x, y);
      row.push(
        c == null
          ? { text: EMPTY, sgr: SGR_DIM }
          : { text: BLOCK, sgr: sgrOf(c) },
      );
    }
    grid.push(row);
  }

  if (state.phase !== 'playing' && state.phase !== 'paused') return grid;

  const color = colorOf(state.active.k);
  if (options.ghost && state.ghostY !== state.active.y) {
    const ghostPiece = { ...state.active, y: state.ghostY };
    for (const [x, y] of cellsOf(ghostPiece)) {
      if (y < 0 || y >= ROWS) continue;
      grid[y][x] = { text: GHOST, sgr: sgrOf(color, SGR_DIM) };
    }
  }

  for (const [x, y] of cellsOf(state.active)) {
    if (y < 0 || y >= ROWS) continue;
    grid[y][x] = { text: BLOCK, sgr: sgrOf(color) };
  }

  return grid;
}

function previewRows(state: GameState, options: FrameOptions): Layer[][] {
  const shape = shapeOf(state.next, 0);
  const sgr = options.palette ? options.palette[colorOf(state.next)] : null;
  // I sits on the second row of its box
  const top = Math.min(...shape.map(([, sy]) => sy));

  const rows: Layer[][] = [];
  for (let y = top; y < top + PREVIEW_ROWS; y++) {
    const row: Layer[] = [];
    for (let x = 0; x < 4; x++) {
      const filled = shape.some(([sx, sy]) => sx === x && sy === y);
      row.push(filled ? { text: BLOCK, sgr } : { text: '  ', sgr: null });
    }
    rows.push(row);
  }
  return rows;
}

function panelRows(state: GameState, options: FrameOptions): Layer[][] {
  const panel: Layer[][] = [];
  const text = (y: number, value: string, sgr: string | null = null) => {
    panel[y] = [{ text: value, sgr }];
  };

  text(1, 'NEXT', SGR_BOLD);
  if (state.phase !== 'gameOver') {
    const preview = previewRows(state, options);
    preview.forEach((row, i) => {
      panel[2 + i] = row;
    });
  }

  text(5, 'SCORE', SGR_BOLD);
  text(6, String(state.score));
  text(8, 'HIGH SCORE', SGR_BOLD);
  text(9, String(state.highScore));
  text(11, 'LEVEL', SGR_BOLD);
  text(12, String(state.level));
  text(14, 'LINES', SGR_BOLD);
  text(15, String(state.lines));
  return panel;
}

function join(layers: readonly Layer[], color: boolean): string {
  return layers.map((l) => paint(l.text, l.sgr, color)).join('');
}

/**
 * Lays out one frame as terminal lines: the boxed 10x20 board (two columns
 * per cell) with the overlay for the current phase, and the side panel.
 */
export function composeFrame(
  state: GameState,
  options: FrameOptions,
): string[] {
  const color = options.palette != null;
  const grid = boardCells(state, options);
  const overlay = overlayRows(state);
  const panel = panelRows(state, options);

  const board: string[] = [];
  board.push(`┌${'─'.repeat(BOARD_INNER)}┐`);
  for (let y = 0; y < ROWS; y++) {
    const over = overlay.get(y);
    const inner =
      over != null
        ? join(over, color)
        : state.phase === 'start'
          ? ' '.repeat(BOARD_INNER)
          : join(grid[y], color);
    board.push(`│${inner}│`);
  }
  board.push(`└${'─'.repeat(BOARD_INNER)}┘`);

  return board.map((line, i) => {
    const side = panel[i];
    return side ? line + PANEL_GAP + join(side, color) : line;
  });
}

export class TerminalRenderer {
  constructor(
    private out: TextOutput,
    private options: FrameOptions,
  ) {}

  render(state: GameState): void {
    const lines = composeFrame(state, this.options);
    // home, then overwrite each line and clear whatever was left beyond it
    this.out.write(`\x1b[H${lines.map((l) => `${l}\x1b[K`).join('\r\n')}`);
  }
}
