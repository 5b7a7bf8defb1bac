/**
 * Play-state machine for a single minefield session.
 *
 * Unstarted -> Playing -> Won | Lost. Won and Lost are absorbing:
 * once reached, clicks are ignored and the clock stays frozen.
 */

import type { Board, BoardOutcome, FlagDelta } from './board';

export type PlayState =
  | { kind: 'unstarted' }
  | { kind: 'playing'; startedAt: number }
  | { kind: 'won'; startedAt: number; elapsedMs: number }
  | { kind: 'lost'; startedAt: number; elapsedMs: number };

export interface ClickResult {
  outcome: BoardOutcome;
  playState: PlayState;
}

export interface GameStats {
  totalMines: number;
  totalFlags: number;
  minesRemaining: number;
  turns: number;
  playState: PlayState;
  elapsedMs: number;
}

export interface GameControllerOptions {
  /** Millisecond clock, Date.now unless a test supplies its own */
  now?: () => number;
}

export class GameController {
  readonly board: Board;
  readonly totalMines: number;
  private totalFlags = 0;
  private turns = 0;
  private state: PlayState = { kind: 'unstarted' };
  private readonly now: () => number;

  constructor(board: Board, options: GameControllerOptions = {}) {
    this.board = board;
    this.totalMines = board.mineCount;
    this.now = options.now ?? Date.now;
  }

  /** Copy of the current state; mutating it does not affect the game */
  get playState(): PlayState {
    return { ...this.state };
  }

  isOver(): boolean {
    return this.state.kind === 'won' || this.state.kind === 'lost';
  }

  /**
   * Uncover a cell. Returns null when the click is ignored: the game
   * is over, or (x, y) is outside the board.
   */
  leftClick(x: number, y: number): ClickResult | null {
    if (this.isOver() || !this.board.inBounds(x, y)) return null;

    if (this.state.kind === 'unstarted') {
      this.state = { kind: 'playing', startedAt: this.now() };
    }

    const outcome = this.board.uncover(x, y);
    this.turns++;

    if (this.state.kind === 'playing' && outcome !== 'in-progress') {
      const { startedAt } = this.state;
      const elapsedMs = Math.max(0, this.now() - startedAt);
      this.state = outcome === 'cleared'
        ? { kind: 'won', startedAt, elapsedMs }
        : { kind: 'lost', startedAt, elapsedMs };
    }

    return { outcome, playState: { ...this.state } };
  }

  /** Toggle a flag; never moves the play-state */
  rightClick(x: number, y: number): FlagDelta {
    if (this.isOver()) return 0;

    const delta = this.board.toggleFlag(x, y);
    this.totalFlags += delta;
    return delta;
  }

  elapsedMs(): number {
    switch (this.state.kind) {
      case 'unstarted':
        return 0;
      case 'playing':
        return Math.max(0, this.now() - this.state.startedAt);
      case 'won':
      case 'lost':
        return this.state.elapsedMs;
    }
  }

  elapsedSeconds(): number {
    return Math.floor(this.elapsedMs() / 1000);
  }

  snapshot(): GameStats {
    return {
      totalMines: this.totalMines,
      totalFlags: this.totalFlags,
      minesRemaining: this.totalMines - this.totalFlags,
      turns: this.turns,
      playState: { ...this.state },
      elapsedMs: this.elapsedMs(),
    };
  }
}
