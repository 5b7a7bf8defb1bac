/**
 * Mine layout generation
 *
 * The board never rolls dice itself: this module picks a set of distinct
 * cells from a seeded source and arms them one by one.
 */

import { Board, type Coord } from './board';
import { GameController, type GameControllerOptions } from './controller';
import { SeededRng, type RandomSource } from './prng';

// ============================================================================
// Types
// ============================================================================

export type MineSpec = { mines: number } | { density: number };

export interface BoardConfig {
  width: number;
  height: number;
  mines: number;
  seed: string;
}

export interface Difficulty {
  id: string;
  name: string;
  width: number;
  height: number;
  mines: MineSpec;
}

export interface Session {
  config: BoardConfig;
  board: Board;
  controller: GameController;
}

// ============================================================================
// Presets
// ============================================================================

export const DIFFICULTIES: Difficulty[] = [
  { id: 'easy', name: 'EASY', width: 9, height: 9, mines: { mines: 10 } },
  { id: 'medium', name: 'MEDIUM', width: 16, height: 16, mines: { mines: 40 } },
  { id: 'hard', name: 'HARD', width: 30, height: 16, mines: { mines: 99 } },
  // Dense open field: roughly one cell in seven is mined
  { id: 'classic', name: 'CLASSIC', width: 32, height: 32, mines: { density: 0.15 } },
];

export function getDifficulty(id: string): Difficulty | undefined {
  return DIFFICULTIES.find(d => d.id === id.toLowerCase());
}

// ============================================================================
// Mine selection
// ============================================================================

/**
 * Turn a count or density into a concrete mine count,
 * clamped to the number of cells on the board.
 */
export function resolveMineCount(width: number, height: number, spec: MineSpec): number {
  const cells = width * height;
  const raw = 'mines' in spec ? spec.mines : cells * spec.density;
  if (!Number.isFinite(raw)) return 0;
  return Math.min(cells, Math.max(0, Math.round(raw)));
}

/**
 * Sample `count` distinct coordinates without replacement
 * (partial Fisher-Yates over the cell indices).
 */
export function pickMineCoordinates(
  width: number,
  height: number,
  count: number,
  rng: RandomSource
): Coord[] {
  const indices = Array.from({ length: width * height }, (_, i) => i);
  // Negative or NaN counts pick nothing
  const picks = Math.max(0, Math.min(Math.floor(count), indices.length)) || 0;

  for (let i = 0; i < picks; i++) {
    const j = i + rng.nextInt(indices.length - i);
    [indices[i], indices[j]] = [indices[j], indices[i]];
  }

  return indices.slice(0, picks).map(index => ({
    x: index % width,
    y: Math.floor(index / width),
  }));
}

/**
 * Arm every coordinate on the board. Returns how many mines were
 * actually placed (repeats and off-board coordinates are skipped).
 */
export function populateBoard(board: Board, coords: Iterable<Coord>): number {
  let placed = 0;
  for (const { x, y } of coords) {
    if (board.placeMine(x, y)) placed++;
  }
  return placed;
}

export function configFromDifficulty(difficulty: Difficulty, seed: string): BoardConfig {
  return {
    width: difficulty.width,
    height: difficulty.height,
    mines: resolveMineCount(difficulty.width, difficulty.height, difficulty.mines),
    seed,
  };
}

/**
 * Build a fresh board and its controller. Same config, same layout.
 */
export function createSession(
  config: BoardConfig,
  options: GameControllerOptions = {}
): Session {
  const board = new Board(config.width, config.height);
  const rng = new SeededRng(config.seed);
  populateBoard(board, pickMineCoordinates(config.width, config.height, config.mines, rng));
  return { config, board, controller: new GameController(board, options) };
}
