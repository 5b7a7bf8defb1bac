/**
 * Game Transitions
 *
 * The game dispatches events; whoever hosts it (the CLI, or an
 * xterm.js page) decides what quitting looks like.
 */

import type { GameTerminal } from './utils';
import { getCurrentThemeColor } from './utils';

const EXIT_DURATION = 400; // ms for exit sequence

const EXIT_MESSAGES = [
  'FIELD ABANDONED',
  'SWEEP COMPLETE',
  'SESSION CLOSED',
];

/**
 * Sleep helper
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Exit transition - plays when the game quits back to the shell
 */
export async function playExitTransition(terminal: GameTerminal): Promise<void> {
  const themeColor = getCurrentThemeColor();
  const cols = terminal.cols;
  const rows = terminal.rows;

  const exitMsg = EXIT_MESSAGES[Math.floor(Math.random() * EXIT_MESSAGES.length)];
  const msgX = Math.max(1, Math.floor(cols / 2) - Math.floor(exitMsg.length / 2));
  const centerY = Math.floor(rows / 2);

  // Flash the message
  for (let i = 0; i < 3; i++) {
    terminal.write(`\x1b[${centerY};${msgX}H\x1b[1;91m${exitMsg}\x1b[0m`);
    await sleep(60);
    terminal.write(`\x1b[${centerY};${msgX}H${' '.repeat(exitMsg.length)}`);
    await sleep(40);
  }
  terminal.write(`\x1b[${centerY};${msgX}H\x1b[2m${themeColor}${exitMsg}\x1b[0m`);
  await sleep(150);

  // Screen wipe down effect
  for (let y = 1; y <= rows; y += 2) {
    terminal.write(`\x1b[${y};1H${' '.repeat(cols)}`);
    if (y + 1 <= rows) {
      terminal.write(`\x1b[${y + 1};1H${' '.repeat(cols)}`);
    }
    await sleep(EXIT_DURATION / (rows / 2));
  }
}

// Export event types for games to dispatch
export const GAME_EVENTS = {
  // Game wants to quit back to shell
  QUIT: 'minefield:game-quit',
} as const;

export interface GameQuitDetail {
  terminal: GameTerminal;
  /** Seed of the last field played, so it can be replayed */
  seed: string | null;
  result: 'won' | 'lost' | 'abandoned';
}

/**
 * Helper for games to dispatch quit event
 * This triggers the exit transition before returning to shell
 */
export function dispatchGameQuit(detail: GameQuitDetail): void {
  window.dispatchEvent(new CustomEvent<GameQuitDetail>(GAME_EVENTS.QUIT, { detail }));
}

export function isGameQuitDetail(value: unknown): value is GameQuitDetail {
  if (typeof value !== 'object' || value === null) return false;
  if (!('terminal' in value) || !('seed' in value) || !('result' in value)) return false;
  return (typeof value.seed === 'string' || value.seed === null) &&
    (value.result === 'won' || value.result === 'lost' || value.result === 'abandoned');
}
