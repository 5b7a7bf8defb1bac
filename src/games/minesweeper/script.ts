/**
 * Scripted play: replay textual moves against a controller.
 *
 *   u X Y   uncover (left click)
 *   f X Y   toggle flag (right click)
 */

import type { BoardOutcome, FlagDelta } from './board';
import type { GameController, PlayState } from './controller';

export type Move =
  | { kind: 'uncover'; x: number; y: number }
  | { kind: 'flag'; x: number; y: number };

export type MoveResult =
  | { move: Move; ignored: true }
  | { move: Move; ignored: false; outcome: BoardOutcome; playState: PlayState['kind'] }
  | { move: Move; ignored: false; delta: FlagDelta };

const MOVE_PATTERN = /^([uf])\s+(-?\d+)\s+(-?\d+)$/;

/**
 * Parse one move. Returns null for anything that isn't `u X Y` or `f X Y`.
 */
export function parseMove(raw: string): Move | null {
  const match = raw.trim().toLowerCase().match(MOVE_PATTERN);
  if (!match) return null;

  const x = parseInt(match[2], 10);
  const y = parseInt(match[3], 10);
  return match[1] === 'u' ? { kind: 'uncover', x, y } : { kind: 'flag', x, y };
}

export function applyMove(controller: GameController, move: Move): MoveResult {
  if (move.kind === 'flag') {
    if (controller.isOver()) return { move, ignored: true };
    return { move, ignored: false, delta: controller.rightClick(move.x, move.y) };
  }

  const result = controller.leftClick(move.x, move.y);
  if (!result) return { move, ignored: true };
  return { move, ignored: false, outcome: result.outcome, playState: result.playState.kind };
}

export function runScript(controller: GameController, moves: Move[]): MoveResult[] {
  return moves.map(move => applyMove(controller, move));
}

export function formatMoveResult(result: MoveResult): string {
  const { move } = result;
  const label = `${move.kind === 'uncover' ? 'u' : 'f'} ${move.x} ${move.y}`;
  if (result.ignored) return `${label}: ignored`;
  if ('delta' in result) {
    return `${label}: flag ${result.delta > 0 ? '+1' : result.delta < 0 ? '-1' : '0'}`;
  }
  return `${label}: ${result.outcome} (${result.playState})`;
}
