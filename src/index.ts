/**
 * minefield
 *
 * Minesweeper for xterm.js and the command line.
 *
 * Library usage (xterm.js):
 *   import { runMinesweeperGame, fromXterm, setTheme } from 'minefield-cli';
 *   setTheme('amber');
 *   const controller = runMinesweeperGame(fromXterm(terminal));
 *
 * Core usage (no terminal):
 *   const { board, controller } = createSession({ width: 9, height: 9, mines: 10, seed: 'demo' });
 *   controller.leftClick(4, 4);
 *   console.log(board.toString());
 *
 * CLI usage:
 *   npx minefield-cli
 */

export * from './games';

export {
  themes,
  getAnsiColor,
  getSubtleColor,
  getThemeModes,
  isValidThemeMode,
  ANSI_RESET,
} from './themes';
export type { TerminalTheme } from './themes';

export { parseCliArgs, OptionsError } from './options';
export type { CliOptions, CliCommand } from './options';
