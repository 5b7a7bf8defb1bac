/**
 * Cell appearance
 *
 * Sprite indices follow the 4-column sheet layout: 1-8 are the digits,
 * then mine, flag, covered tile and the empty exposed tile. The terminal
 * glyphs are picked from the same index so both renderers agree.
 */

import type { Cell } from './board';

export const SPRITE_MINE = 10;
export const SPRITE_FLAG = 11;
export const SPRITE_COVERED = 13;
export const SPRITE_EMPTY = 14;

// Cell display characters (two columns per cell)
const CELL_HIDDEN = '[]';
const CELL_FLAG = '<>';
const CELL_MINE = '@@';
const CELL_EMPTY = '  ';

// Number colors (1-8)
const NUMBER_COLORS = [
  '',           // 0 - not used
  '\x1b[96m',   // 1 - cyan
  '\x1b[92m',   // 2 - green
  '\x1b[91m',   // 3 - red
  '\x1b[94m',   // 4 - blue
  '\x1b[95m',   // 5 - magenta
  '\x1b[36m',   // 6 - dark cyan
  '\x1b[97m',   // 7 - white
  '\x1b[90m',   // 8 - gray
];

export interface Glyph {
  text: string;
  /** ANSI style; empty means "use the theme color" */
  color: string;
  dim: boolean;
}

export function spriteIndex(cell: Readonly<Cell>): number {
  switch (cell.state) {
    case 'covered':
      return SPRITE_COVERED;
    case 'flagged':
      return SPRITE_FLAG;
    case 'exposed':
      if (cell.hasMine) return SPRITE_MINE;
      return cell.neighboringMines === 0 ? SPRITE_EMPTY : cell.neighboringMines;
  }
}

export function cellGlyph(cell: Readonly<Cell>): Glyph {
  const sprite = spriteIndex(cell);
  switch (sprite) {
    case SPRITE_COVERED:
      return { text: CELL_HIDDEN, color: '', dim: true };
    case SPRITE_FLAG:
      return { text: CELL_FLAG, color: '\x1b[1;93m', dim: false };
    case SPRITE_MINE:
      return { text: CELL_MINE, color: '\x1b[1;91m', dim: false };
    case SPRITE_EMPTY:
      return { text: CELL_EMPTY, color: '', dim: true };
    default:
      return { text: ` ${sprite}`, color: NUMBER_COLORS[sprite] ?? '', dim: false };
  }
}

export function formatTime(seconds: number): string {
  const mins = Math.floor(seconds / 60);
  const secs = seconds % 60;
  return `${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
}
