/**
 * CLI entry point for minefield
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout onto the
 * GameTerminal surface, so the game runs directly in any terminal emulator.
 */

import * as p from '@clack/prompts';
import { GAME_EVENTS, isGameQuitDetail, playExitTransition } from './games/gameTransitions';
import { runMinesweeperGame } from './games/minesweeper';
import { DIFFICULTIES, createSession, type BoardConfig } from './games/minesweeper/layout';
import { randomSeed } from './games/minesweeper/prng';
import { formatMoveResult, runScript } from './games/minesweeper/script';
import type { Disposable, GameTerminal, TerminalKeyEvent } from './games/utils';
import { setTheme } from './games/utils';
import { getThemeModes, themes } from './themes';
import { OptionsError, parseCliArgs, type CliOptions } from './options';

// ---------------------------------------------------------------------------
// Window stand-in: games announce quitting with window.dispatchEvent
// ---------------------------------------------------------------------------

const windowTarget = new EventTarget();
if (typeof globalThis.window === 'undefined') {
  Object.assign(globalThis, { window: windowTarget });
}

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

interface NodeTerminal extends GameTerminal {
  cleanup: () => void;
}

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

function createNodeTerminal(): NodeTerminal {
  const keyListeners: ((event: TerminalKeyEvent) => void)[] = [];

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  const onData = (data: string) => {
    if (data === '\x03') {
      cleanup();
      process.exit(0);
    }

    const key = parseKey(data);
    const event: TerminalKeyEvent = {
      key,
      domEvent: { key, preventDefault: () => {}, stopPropagation: () => {} },
    };
    for (const listener of [...keyListeners]) {
      listener(event);
    }
  };
  process.stdin.on('data', onData);

  let cleaned = false;
  function cleanup() {
    if (cleaned) return;
    cleaned = true;
    process.stdin.off('data', onData);
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
    process.stdout.write('\x1b[?1049l');
    process.stdout.write('\x1b[?25h');
    process.stdout.write('\x1b[0m');
  }

  // Synchronized output: wrap writes with DEC sync sequences so the
  // terminal batches clear + redraw into a single atomic paint.
  const SYNC_START = '\x1b[?2026h';
  const SYNC_END = '\x1b[?2026l';

  const terminal: NodeTerminal = {
    write: (data: string) => {
      process.stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onKey: (listener: (event: TerminalKeyEvent) => void): Disposable => {
      keyListeners.push(listener);
      return {
        dispose: () => {
          const idx = keyListeners.indexOf(listener);
          if (idx !== -1) keyListeners.splice(idx, 1);
        },
      };
    },
    cleanup,
  };

  process.on('exit', cleanup);
  process.on('SIGINT', () => { cleanup(); process.exit(0); });
  process.on('SIGTERM', () => { cleanup(); process.exit(0); });

  return terminal;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  minefield — Minesweeper in your terminal

  Usage:
    minefield                          Pick a difficulty and play
    minefield --difficulty <id>        Play a preset directly
    minefield custom                   Set up a custom field interactively
    minefield script <moves...>        Replay moves and print the board
    minefield --list                   List difficulty presets
    minefield --themes                 List color themes
    minefield --help                   Show this help

  Field options:
    --difficulty <id>     ${DIFFICULTIES.map(d => d.id).join(', ')}
    --width <n>           Board width (with --height)
    --height <n>          Board height (with --width)
    --mines <n>           Exact number of mines
    --density <f>         Share of cells mined, 0..1
    --seed <s>            Replay a field layout
    --theme <theme>       Color theme (default: cyan)

  Moves (script):
    u X Y                 Uncover cell X,Y (left click)
    f X Y                 Toggle flag on X,Y (right click)

  Controls:
    Arrow keys / WASD    Move cursor
    Space / Enter        Uncover
    F                    Flag
    ESC                  Pause menu
    Q                    Quit (from menus)

  Examples:
    minefield --difficulty hard --theme amber
    minefield --width 20 --height 10 --mines 30 --seed demo
    minefield script --seed demo u 4 4 f 0 0
`);
}

function printDifficulties() {
  for (const d of DIFFICULTIES) {
    const mines = 'mines' in d.mines ? `${d.mines.mines} mines` : `${Math.round(d.mines.density * 100)}% mined`;
    console.log(`  ${d.id.padEnd(10)} ${`${d.width}x${d.height}`.padEnd(8)} ${mines}`);
  }
}

function printThemes() {
  for (const mode of getThemeModes()) {
    console.log(`  ${mode.padEnd(14)} ${themes[mode].name}`);
  }
}

function runScriptCommand(options: CliOptions) {
  if (!options.config) return;
  const { board, controller, config } = createSession(options.config);

  for (const result of runScript(controller, options.moves)) {
    console.log(formatMoveResult(result));
  }

  const stats = controller.snapshot();
  console.log(board.toString());
  console.log(
    `state: ${stats.playState.kind}  turns: ${stats.turns}  flags: ${stats.totalFlags}  mines: ${stats.totalMines}  seed: ${config.seed}`
  );
}

function validateInteger(min: number, max: number) {
  return (value: string): string | undefined => {
    const n = Number(value);
    if (value.trim() === '' || !Number.isInteger(n)) return 'Enter a whole number';
    if (n < min || n > max) return `Must be between ${min} and ${max}`;
    return undefined;
  };
}

/**
 * Interactive field setup. Returns null if the user cancels.
 */
async function promptCustomField(): Promise<BoardConfig | null> {
  p.intro('minefield — custom field');

  const width = await p.text({ message: 'Width', initialValue: '16', validate: validateInteger(1, 99) });
  if (p.isCancel(width)) return null;

  const height = await p.text({ message: 'Height', initialValue: '16', validate: validateInteger(1, 99) });
  if (p.isCancel(height)) return null;

  const cells = Number(width) * Number(height);
  const mines = await p.text({
    message: `Mines (0-${cells})`,
    initialValue: String(Math.round(cells * 0.15)),
    validate: validateInteger(0, cells),
  });
  if (p.isCancel(mines)) return null;

  const seed = await p.text({ message: 'Seed', initialValue: randomSeed() });
  if (p.isCancel(seed)) return null;

  p.outro(`Sweeping ${width}x${height} with ${mines} mines`);
  return {
    width: Number(width),
    height: Number(height),
    mines: Number(mines),
    seed: seed.trim() || randomSeed(),
  };
}

function play(config: BoardConfig | null, label: string) {
  const terminal = createNodeTerminal();

  windowTarget.addEventListener(GAME_EVENTS.QUIT, (event: Event) => {
    const detail = event instanceof CustomEvent && isGameQuitDetail(event.detail) ? event.detail : null;
    playExitTransition(terminal)
      .then(() => {
        terminal.cleanup();
        if (detail?.seed) {
          console.log(`  ${detail.result.toUpperCase()} — replay this field with --seed ${detail.seed}`);
        }
        process.exit(0);
      })
      .catch((err: unknown) => {
        terminal.cleanup();
        console.error('[Minefield] Exit transition failed:', err);
        process.exit(1);
      });
  });

  runMinesweeperGame(terminal, config ? { config, label } : {});
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main() {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof OptionsError) {
      console.error(`Error: ${err.message}`);
      console.error('Run `minefield --help` for usage.');
      process.exit(1);
    }
    throw err;
  }

  setTheme(options.theme);

  switch (options.command) {
    case 'help':
      printHelp();
      return;
    case 'list':
      printDifficulties();
      return;
    case 'themes':
      printThemes();
      return;
    case 'script':
      runScriptCommand(options);
      return;
    case 'custom': {
      const config = await promptCustomField();
      if (!config) {
        p.cancel('Cancelled.');
        return;
      }
      play(config, 'CUSTOM');
      return;
    }
    case 'play':
      play(options.config, options.label);
      return;
  }
}

main().catch((err: unknown) => {
  console.error('[Minefield] Fatal error:', err);
  process.exit(1);
});
