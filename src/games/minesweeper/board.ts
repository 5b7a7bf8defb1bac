/**
 * Minefield Board: Pure Grid Logic
 *
 * Cell states, mine placement with incremental neighbor counts,
 * worklist flood-fill uncover, flagging, and the text dump.
 */

// ============================================================================
// Types
// ============================================================================

export type CellState = 'covered' | 'exposed' | 'flagged';

export type BoardOutcome = 'in-progress' | 'cleared' | 'detonated';

export type FlagDelta = -1 | 0 | 1;

export interface Cell {
  state: CellState;
  hasMine: boolean;
  neighboringMines: number;
}

export interface Coord {
  x: number;
  y: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Moore neighborhood, clockwise from the top-left */
export const NEIGHBOR_OFFSETS: readonly (readonly [number, number])[] = [
  [-1, -1],
  [0, -1],
  [1, -1],
  [1, 0],
  [1, 1],
  [0, 1],
  [-1, 1],
  [-1, 0],
];

export class InvalidBoardError extends Error {
  constructor(message: string, public width: number, public height: number) {
    super(message);
    this.name = 'InvalidBoardError';
  }
}

// ============================================================================
// Board
// ============================================================================

export class Board {
  readonly width: number;
  readonly height: number;
  private readonly cells: Cell[];
  private mines = 0;
  private exposed = 0;
  private flags = 0;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new InvalidBoardError(
        `Board dimensions must be positive integers (got ${width}x${height})`,
        width,
        height,
      );
    }

    this.width = width;
    this.height = height;
    this.cells = [];
    for (let i = 0; i < width * height; i++) {
      this.cells.push({ state: 'covered', hasMine: false, neighboringMines: 0 });
    }
  }

  get mineCount(): number {
    return this.mines;
  }

  get exposedCount(): number {
    return this.exposed;
  }

  get flagCount(): number {
    return this.flags;
  }

  /** Number of cells that must be exposed to clear the board */
  get safeCellCount(): number {
    return this.cells.length - this.mines;
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) &&
      x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  /**
   * Read-only snapshot of a cell, or undefined when (x, y) is off the board
   */
  get(x: number, y: number): Readonly<Cell> | undefined {
    const index = this.indexOf(x, y);
    if (index === undefined) return undefined;
    return { ...this.cells[index] };
  }

  neighborsOf(x: number, y: number): Coord[] {
    if (!this.inBounds(x, y)) return [];

    const neighbors: Coord[] = [];
    for (const [dx, dy] of NEIGHBOR_OFFSETS) {
      if (this.inBounds(x + dx, y + dy)) {
        neighbors.push({ x: x + dx, y: y + dy });
      }
    }
    return neighbors;
  }

  /**
   * Arm a cell. Returns false (and changes nothing) when the cell is
   * off the board or already holds a mine.
   */
  placeMine(x: number, y: number): boolean {
    const index = this.indexOf(x, y);
    if (index === undefined) return false;

    const cell = this.cells[index];
    if (cell.hasMine) return false;

    cell.hasMine = true;
    this.mines++;

    const neighbors = this.neighborsOf(x, y);
    cell.neighboringMines = neighbors.filter(n => this.cellAt(n).hasMine).length;
    for (const n of neighbors) {
      this.cellAt(n).neighboringMines++;
    }
    return true;
  }

  uncover(x: number, y: number): BoardOutcome {
    const index = this.indexOf(x, y);
    if (index === undefined) return 'in-progress';

    const target = this.cells[index];
    if (target.state !== 'covered') return 'in-progress';

    if (target.hasMine) {
      this.expose(target);
      this.revealAllMines();
      return 'detonated';
    }

    // Cells go exposed before they are queued, so nothing is visited twice
    this.expose(target);
    const pending: Coord[] = target.neighboringMines === 0 ? [{ x, y }] : [];
    while (pending.length > 0) {
      const next = pending.pop();
      if (!next) break;
      for (const n of this.neighborsOf(next.x, next.y)) {
        const cell = this.cellAt(n);
        if (cell.state !== 'covered' || cell.hasMine) continue;
        this.expose(cell);
        if (cell.neighboringMines === 0) pending.push(n);
      }
    }

    return this.isCleared() ? 'cleared' : 'in-progress';
  }

  toggleFlag(x: number, y: number): FlagDelta {
    const index = this.indexOf(x, y);
    if (index === undefined) return 0;

    const cell = this.cells[index];
    switch (cell.state) {
      case 'covered':
        cell.state = 'flagged';
        this.flags++;
        return 1;
      case 'flagged':
        cell.state = 'covered';
        this.flags--;
        return -1;
      default:
        return 0;
    }
  }

  revealAllMines(): void {
    for (const cell of this.cells) {
      if (cell.hasMine) this.expose(cell);
    }
  }

  /** True once every mine-free cell is exposed */
  isCleared(): boolean {
    return this.exposed === this.safeCellCount;
  }

  /**
   * Text dump: one line per row, cells separated by a space.
   * `-` covered, `F` flagged, `%` exposed mine, digit otherwise.
   */
  toString(): string {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      const row: string[] = [];
      for (let x = 0; x < this.width; x++) {
        row.push(cellChar(this.cells[x + y * this.width]));
      }
      rows.push(row.join(' '));
    }
    return rows.join('\n');
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private indexOf(x: number, y: number): number | undefined {
    return this.inBounds(x, y) ? x + y * this.width : undefined;
  }

  private cellAt(coord: Coord): Cell {
    return this.cells[coord.x + coord.y * this.width];
  }

  private expose(cell: Cell): void {
    if (cell.state === 'exposed') return;
    if (cell.state === 'flagged') this.flags--;
    cell.state = 'exposed';
    if (!cell.hasMine) this.exposed++;
  }
}

function cellChar(cell: Cell): string {
  switch (cell.state) {
    case 'covered': return '-';
    case 'flagged': return 'F';
    case 'exposed': return cell.hasMine ? '%' : String(cell.neighboringMines);
  }
}
