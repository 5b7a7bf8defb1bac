import { describe, it, expect, beforeEach } from 'vitest';
import { Board } from './board';
import { GameController } from './controller';

// ============================================================================
// Helpers
// ============================================================================

let clock = 0;
const now = () => clock;

function controllerFor(width: number, height: number, mines: [number, number][]): GameController {
  const board = new Board(width, height);
  for (const [x, y] of mines) board.placeMine(x, y);
  return new GameController(board, { now });
}

beforeEach(() => {
  clock = 1_000;
});

// ============================================================================
// Play state
// ============================================================================

describe('play state', () => {
  it('starts unstarted with a stopped clock', () => {
    const controller = controllerFor(3, 3, [[0, 0]]);
    clock = 9_000;
    expect(controller.playState).toEqual({ kind: 'unstarted' });
    expect(controller.elapsedMs()).toBe(0);
    expect(controller.isOver()).toBe(false);
  });

  it('starts the clock on the first uncover', () => {
    const controller = controllerFor(3, 3, [[0, 0]]);
    const result = controller.leftClick(1, 1);
    expect(result).toEqual({ outcome: 'in-progress', playState: { kind: 'playing', startedAt: 1_000 } });

    clock = 4_500;
    expect(controller.elapsedMs()).toBe(3_500);
    expect(controller.elapsedSeconds()).toBe(3);
  });

  it('does not start the clock on a flag', () => {
    const controller = controllerFor(3, 3, [[0, 0]]);
    expect(controller.rightClick(1, 1)).toBe(1);
    expect(controller.playState.kind).toBe('unstarted');
  });

  it('wins when the last safe cell is uncovered', () => {
    const controller = controllerFor(2, 2, [[0, 0]]);
    controller.leftClick(1, 0);
    controller.leftClick(0, 1);
    clock = 6_000;
    const result = controller.leftClick(1, 1);

    expect(result?.outcome).toBe('cleared');
    expect(controller.playState).toEqual({ kind: 'won', startedAt: 1_000, elapsedMs: 5_000 });
    expect(controller.isOver()).toBe(true);
  });

  it('wins on the first click when the flood clears everything', () => {
    const controller = controllerFor(3, 3, []);
    expect(controller.leftClick(1, 1)).toEqual({
      outcome: 'cleared',
      playState: { kind: 'won', startedAt: 1_000, elapsedMs: 0 },
    });
  });

  it('loses on a mine', () => {
    const controller = controllerFor(2, 2, [[0, 0]]);
    controller.leftClick(1, 1);
    clock = 3_000;
    const result = controller.leftClick(0, 0);

    expect(result?.outcome).toBe('detonated');
    expect(controller.playState).toEqual({ kind: 'lost', startedAt: 1_000, elapsedMs: 2_000 });
  });

  it('counts a click on a flagged cell as a turn and keeps the flag', () => {
    const controller = controllerFor(3, 3, [[0, 0]]);
    controller.rightClick(2, 2);
    clock = 2_000;

    expect(controller.leftClick(2, 2)).toEqual({
      outcome: 'in-progress',
      playState: { kind: 'playing', startedAt: 2_000 },
    });
    expect(controller.board.get(2, 2)?.state).toBe('flagged');
    expect(controller.board.exposedCount).toBe(0);
    expect(controller.snapshot().turns).toBe(1);
  });

  it('freezes the clock once the game is over', () => {
    const controller = controllerFor(1, 1, [[0, 0]]);
    clock = 2_000;
    controller.leftClick(0, 0);
    clock = 60_000;
    expect(controller.elapsedMs()).toBe(0);
  });
});

// ============================================================================
// Ignored input
// ============================================================================

describe('ignored input', () => {
  it('ignores off-board uncovers without starting the clock', () => {
    const controller = controllerFor(3, 3, [[0, 0]]);
    expect(controller.leftClick(3, 0)).toBeNull();
    expect(controller.leftClick(-1, 2)).toBeNull();
    expect(controller.playState.kind).toBe('unstarted');
    expect(controller.snapshot().turns).toBe(0);
  });

  it('ignores every click after a loss', () => {
    const controller = controllerFor(2, 2, [[0, 0]]);
    controller.leftClick(0, 0);
    const board = controller.board.toString();

    expect(controller.leftClick(1, 1)).toBeNull();
    expect(controller.rightClick(1, 1)).toBe(0);
    expect(controller.board.toString()).toBe(board);
    expect(controller.snapshot().turns).toBe(1);
  });

  it('ignores every click after a win', () => {
    const controller = controllerFor(2, 1, [[0, 0]]);
    controller.leftClick(1, 0);
    expect(controller.playState.kind).toBe('won');
    expect(controller.leftClick(0, 0)).toBeNull();
    expect(controller.playState.kind).toBe('won');
  });
});

// ============================================================================
// Counters
// ============================================================================

describe('snapshot', () => {
  it('counts each accepted uncover as a turn', () => {
    const controller = controllerFor(3, 3, [[0, 0]]);
    controller.leftClick(1, 1);
    controller.leftClick(1, 1);
    controller.rightClick(1, 0);
    expect(controller.snapshot().turns).toBe(2);
  });

  it('tracks flags against the mine total', () => {
    const controller = controllerFor(3, 3, [[0, 0], [2, 0]]);
    controller.rightClick(0, 0);
    controller.rightClick(1, 2);
    controller.rightClick(2, 2);
    controller.rightClick(2, 2);

    clock = 1_500;
    expect(controller.snapshot()).toEqual({
      totalMines: 2,
      totalFlags: 2,
      minesRemaining: 0,
      turns: 0,
      playState: { kind: 'unstarted' },
      elapsedMs: 0,
    });
  });

  it('hands out copies of the play state', () => {
    const controller = controllerFor(3, 3, [[0, 0]]);
    controller.leftClick(1, 1);
    clock = 4_000;

    const stats = controller.snapshot();
    if (stats.playState.kind === 'playing') stats.playState.startedAt = 0;
    const state = controller.playState;
    if (state.kind === 'playing') state.startedAt = 0;

    expect(controller.playState).toEqual({ kind: 'playing', startedAt: 1_000 });
    expect(controller.elapsedMs()).toBe(3_000);
  });

  it('lets the remaining count go negative', () => {
    const controller = controllerFor(2, 2, [[0, 0]]);
    controller.rightClick(0, 1);
    controller.rightClick(1, 1);
    expect(controller.snapshot().minesRemaining).toBe(-1);
  });

  it('does not count flags on exposed cells', () => {
    const controller = controllerFor(2, 2, [[0, 0]]);
    controller.leftClick(1, 1);
    expect(controller.rightClick(1, 1)).toBe(0);
    expect(controller.snapshot().totalFlags).toBe(0);
  });
});
