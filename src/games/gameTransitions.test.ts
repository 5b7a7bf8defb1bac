import { describe, it, expect, vi, afterEach } from 'vitest';
import { GAME_EVENTS, dispatchGameQuit, isGameQuitDetail, type GameQuitDetail } from './gameTransitions';
import type { GameTerminal } from './utils';

const terminal: GameTerminal = {
  cols: 80,
  rows: 24,
  write: () => {},
  onKey: () => ({ dispose: () => {} }),
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('isGameQuitDetail', () => {
  it('accepts a well-formed detail', () => {
    expect(isGameQuitDetail({ terminal, seed: 'abc', result: 'won' })).toBe(true);
    expect(isGameQuitDetail({ terminal, seed: null, result: 'abandoned' })).toBe(true);
  });

  it.each([
    null,
    'quit',
    { seed: 'abc', result: 'won' },
    { terminal, seed: 7, result: 'won' },
    { terminal, seed: 'abc', result: 'draw' },
  ])('rejects %j', value => {
    expect(isGameQuitDetail(value)).toBe(false);
  });
});

describe('dispatchGameQuit', () => {
  it('fires the quit event on window', () => {
    const target = new EventTarget();
    vi.stubGlobal('window', target);

    const received: GameQuitDetail[] = [];
    target.addEventListener(GAME_EVENTS.QUIT, event => {
      if (event instanceof CustomEvent && isGameQuitDetail(event.detail)) {
        received.push(event.detail);
      }
    });

    dispatchGameQuit({ terminal, seed: 'abc', result: 'lost' });
    expect(received).toEqual([{ terminal, seed: 'abc', result: 'lost' }]);
  });
});
