import { describe, it, expect } from 'vitest';
import { Board } from './board';
import {
  DIFFICULTIES,
  getDifficulty,
  resolveMineCount,
  pickMineCoordinates,
  populateBoard,
  configFromDifficulty,
  createSession,
} from './layout';
import { SeededRng, type RandomSource } from './prng';

const firstPick: RandomSource = { nextInt: () => 0 };

describe('difficulties', () => {
  it('ships the four presets', () => {
    expect(DIFFICULTIES.map(d => d.id)).toEqual(['easy', 'medium', 'hard', 'classic']);
  });

  it('looks presets up case-insensitively', () => {
    expect(getDifficulty('HARD')?.width).toBe(30);
    expect(getDifficulty('nightmare')).toBeUndefined();
  });

  it('resolves the classic density to a fixed count', () => {
    const classic = getDifficulty('classic');
    expect(classic).toBeDefined();
    if (!classic) return;
    expect(configFromDifficulty(classic, 'abc')).toEqual({ width: 32, height: 32, mines: 154, seed: 'abc' });
  });
});

describe('resolveMineCount', () => {
  it('passes explicit counts through', () => {
    expect(resolveMineCount(9, 9, { mines: 10 })).toBe(10);
  });

  it('rounds a density', () => {
    expect(resolveMineCount(10, 10, { density: 0.125 })).toBe(13);
  });

  it('clamps to the board', () => {
    expect(resolveMineCount(3, 3, { mines: 20 })).toBe(9);
    expect(resolveMineCount(3, 3, { mines: -4 })).toBe(0);
    expect(resolveMineCount(3, 3, { density: 2 })).toBe(9);
  });

  it('treats a non-finite value as no mines', () => {
    expect(resolveMineCount(3, 3, { density: Number.NaN })).toBe(0);
  });
});

describe('pickMineCoordinates', () => {
  it('maps indices to row-major coordinates', () => {
    expect(pickMineCoordinates(3, 2, 4, firstPick)).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 0, y: 1 },
    ]);
  });

  it('never repeats a cell', () => {
    const coords = pickMineCoordinates(16, 16, 40, new SeededRng('distinct'));
    const keys = new Set(coords.map(c => `${c.x},${c.y}`));
    expect(coords).toHaveLength(40);
    expect(keys.size).toBe(40);
    for (const { x, y } of coords) {
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(16);
      expect(y).toBeGreaterThanOrEqual(0);
      expect(y).toBeLessThan(16);
    }
  });

  it('caps the count at the number of cells', () => {
    expect(pickMineCoordinates(2, 2, 10, new SeededRng('cap'))).toHaveLength(4);
  });

  it('picks nothing for a negative or NaN count', () => {
    expect(pickMineCoordinates(3, 3, -1, new SeededRng('x'))).toEqual([]);
    expect(pickMineCoordinates(3, 3, Number.NaN, new SeededRng('x'))).toEqual([]);
  });

  it('rounds a fractional count down', () => {
    expect(pickMineCoordinates(3, 2, 2.7, firstPick)).toEqual([{ x: 0, y: 0 }, { x: 1, y: 0 }]);
  });

  it('is reproducible for a seed', () => {
    const a = pickMineCoordinates(9, 9, 10, new SeededRng('replay'));
    const b = pickMineCoordinates(9, 9, 10, new SeededRng('replay'));
    expect(b).toEqual(a);
  });
});

describe('populateBoard', () => {
  it('skips repeats and off-board coordinates', () => {
    const board = new Board(3, 3);
    const placed = populateBoard(board, [
      { x: 0, y: 0 },
      { x: 0, y: 0 },
      { x: 5, y: 1 },
      { x: 2, y: 2 },
    ]);
    expect(placed).toBe(2);
    expect(board.mineCount).toBe(2);
  });
});

describe('createSession', () => {
  it('builds a board with exactly the configured mines', () => {
    const { board, controller } = createSession({ width: 9, height: 9, mines: 10, seed: 'session' });
    expect(board.mineCount).toBe(10);
    expect(controller.totalMines).toBe(10);
    expect(controller.board).toBe(board);
  });

  it('arms no mines for a negative count', () => {
    const { board } = createSession({ width: 3, height: 3, mines: -2, seed: 'x' });
    expect(board.mineCount).toBe(0);
  });

  it('lays out the same field for the same seed', () => {
    const config = { width: 16, height: 16, mines: 40, seed: 'same-field' };
    const first = createSession(config);
    const second = createSession(config);
    first.board.revealAllMines();
    second.board.revealAllMines();
    expect(second.board.toString()).toBe(first.board.toString());
  });

  it('passes the clock through to the controller', () => {
    const { controller } = createSession(
      { width: 3, height: 3, mines: 0, seed: 'clock' },
      { now: () => 42 }
    );
    expect(controller.leftClick(0, 0)?.playState).toEqual({ kind: 'won', startedAt: 42, elapsedMs: 0 });
  });
});
