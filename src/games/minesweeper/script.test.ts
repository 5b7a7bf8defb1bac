import { describe, it, expect } from 'vitest';
import { Board } from './board';
import { GameController } from './controller';
import { parseMove, applyMove, runScript, formatMoveResult, type Move } from './script';

function controllerWithMineAtOrigin(): GameController {
  const board = new Board(2, 2);
  board.placeMine(0, 0);
  return new GameController(board, { now: () => 0 });
}

describe('parseMove', () => {
  it('reads uncover and flag moves', () => {
    expect(parseMove('u 1 2')).toEqual({ kind: 'uncover', x: 1, y: 2 });
    expect(parseMove('  F 3   4 ')).toEqual({ kind: 'flag', x: 3, y: 4 });
  });

  it('keeps negative coordinates for the board to reject', () => {
    expect(parseMove('u -1 0')).toEqual({ kind: 'uncover', x: -1, y: 0 });
  });

  it.each(['', 'x 1 2', 'u 1', 'u a b', 'u 1 2 3', 'u 1.5 2'])('rejects %j', raw => {
    expect(parseMove(raw)).toBeNull();
  });
});

describe('applyMove', () => {
  it('reports flag deltas', () => {
    const controller = controllerWithMineAtOrigin();
    const move: Move = { kind: 'flag', x: 0, y: 0 };
    expect(applyMove(controller, move)).toEqual({ move, ignored: false, delta: 1 });
    expect(applyMove(controller, move)).toEqual({ move, ignored: false, delta: -1 });
  });

  it('marks off-board uncovers as ignored', () => {
    const controller = controllerWithMineAtOrigin();
    const move: Move = { kind: 'uncover', x: 5, y: 5 };
    expect(applyMove(controller, move)).toEqual({ move, ignored: true });
  });
});

describe('runScript', () => {
  it('plays a game to a win and ignores the rest', () => {
    const controller = controllerWithMineAtOrigin();
    const moves = ['f 0 0', 'u 1 0', 'u 0 1', 'u 1 1', 'u 0 0', 'f 1 1'].map(raw => {
      const move = parseMove(raw);
      if (!move) throw new Error(`bad move ${raw}`);
      return move;
    });

    const lines = runScript(controller, moves).map(formatMoveResult);
    expect(lines).toEqual([
      'f 0 0: flag +1',
      'u 1 0: in-progress (playing)',
      'u 0 1: in-progress (playing)',
      'u 1 1: cleared (won)',
      'u 0 0: ignored',
      'f 1 1: ignored',
    ]);
    expect(controller.board.toString()).toBe('F 1\n1 1');
  });

  it('reports a detonation', () => {
    const controller = controllerWithMineAtOrigin();
    const [result] = runScript(controller, [{ kind: 'uncover', x: 0, y: 0 }]);
    expect(formatMoveResult(result)).toBe('u 0 0: detonated (lost)');
  });
});

describe('formatMoveResult', () => {
  it('prints a zero delta for a flag on an exposed cell', () => {
    const move: Move = { kind: 'flag', x: 2, y: 1 };
    expect(formatMoveResult({ move, ignored: false, delta: 0 })).toBe('f 2 1: flag 0');
  });
});
