/**
 * minefield games module
 *
 * Usage:
 * 1. Set the theme: setTheme('cyan')
 * 2. Run the game: runMinesweeperGame(terminal)
 * 3. Handle quitting: listen for GAME_EVENTS.QUIT on window
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  isLightTheme,
  getSubtleBackgroundColor,
  centerColumn,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  fromXterm,
} from './utils';

export type { PhosphorMode, GameTerminal, TerminalKeyEvent, Disposable } from './utils';

// Re-export transitions
export {
  GAME_EVENTS,
  playExitTransition,
  dispatchGameQuit,
  isGameQuitDetail,
} from './gameTransitions';
export type { GameQuitDetail } from './gameTransitions';

// Re-export menu utilities
export {
  navigateMenu,
  checkShortcut,
  renderSimpleMenu,
  PAUSE_MENU_ITEMS,
  GAME_OVER_MENU_ITEMS,
} from './shared/menu';
export type { SimpleMenuItem, MenuAction, MenuNavigation } from './shared/menu';

// Minefield core
export { Board, InvalidBoardError, NEIGHBOR_OFFSETS } from './minesweeper/board';
export type { Cell, CellState, BoardOutcome, FlagDelta, Coord } from './minesweeper/board';

export { GameController } from './minesweeper/controller';
export type { PlayState, ClickResult, GameStats, GameControllerOptions } from './minesweeper/controller';

export {
  DIFFICULTIES,
  getDifficulty,
  resolveMineCount,
  pickMineCoordinates,
  populateBoard,
  configFromDifficulty,
  createSession,
} from './minesweeper/layout';
export type { MineSpec, BoardConfig, Difficulty, Session } from './minesweeper/layout';

export { SeededRng, randomSeed } from './minesweeper/prng';
export type { RandomSource } from './minesweeper/prng';

export {
  spriteIndex,
  cellGlyph,
  formatTime,
  SPRITE_MINE,
  SPRITE_FLAG,
  SPRITE_COVERED,
  SPRITE_EMPTY,
} from './minesweeper/glyphs';
export type { Glyph } from './minesweeper/glyphs';

export { parseMove, applyMove, runScript, formatMoveResult } from './minesweeper/script';
export type { Move, MoveResult } from './minesweeper/script';

// Terminal runner
export { runMinesweeperGame } from './minesweeper';
export type { MinesweeperController, MinesweeperOptions } from './minesweeper';
