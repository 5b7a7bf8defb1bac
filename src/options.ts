/**
 * Command-line option parsing for the minefield CLI
 *
 * Flags are read by hand from argv; every value is checked here so the
 * game itself only ever sees a valid BoardConfig.
 */

import { type PhosphorMode, getThemeModes, isValidThemeMode } from './themes';
import {
  DIFFICULTIES,
  getDifficulty,
  resolveMineCount,
  type BoardConfig,
  type MineSpec,
} from './games/minesweeper/layout';
import { randomSeed } from './games/minesweeper/prng';
import { parseMove, type Move } from './games/minesweeper/script';

export type CliCommand = 'play' | 'custom' | 'script' | 'help' | 'list' | 'themes';

export interface CliOptions {
  command: CliCommand;
  theme: PhosphorMode;
  /** null means "let the player pick a difficulty" */
  config: BoardConfig | null;
  label: string;
  moves: Move[];
}

export class OptionsError extends Error {
  constructor(message: string, public option?: string) {
    super(message);
    this.name = 'OptionsError';
  }
}

const VALUE_FLAGS = new Set(['--theme', '--difficulty', '--width', '--height', '--mines', '--density', '--seed']);

function parseInteger(flag: string, value: string, min: number): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isInteger(n) || n < min) {
    throw new OptionsError(`${flag} must be an integer >= ${min} (got "${value}")`, flag);
  }
  return n;
}

function parseDensity(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0 || n > 1) {
    throw new OptionsError(`--density must be a number between 0 and 1 (got "${value}")`, '--density');
  }
  return n;
}

/**
 * Group move tokens in threes: `u 3 4 f 0 0` and `"u 3 4" "f 0 0"` are the same script
 */
function parseMoves(args: string[]): Move[] {
  const tokens = args.join(' ').split(/\s+/).filter(Boolean);
  const moves: Move[] = [];
  for (let i = 0; i < tokens.length; i += 3) {
    const raw = tokens.slice(i, i + 3).join(' ');
    const move = parseMove(raw);
    if (!move) {
      throw new OptionsError(`Invalid move "${raw}" (expected "u X Y" or "f X Y")`);
    }
    moves.push(move);
  }
  return moves;
}

export function parseCliArgs(argv: string[], makeSeed: () => string = randomSeed): CliOptions {
  const values = new Map<string, string>();
  const positional: string[] = [];
  let command: CliCommand = 'play';

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      command = 'help';
    } else if (arg === '--list' || arg === '-l') {
      command = 'list';
    } else if (arg === '--themes') {
      command = 'themes';
    } else if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined) throw new OptionsError(`${arg} needs a value`, arg);
      values.set(arg, value);
      i++;
    } else if (arg.startsWith('-') && !/^-\d/.test(arg)) {
      throw new OptionsError(`Unknown option: ${arg}`, arg);
    } else {
      positional.push(arg);
    }
  }

  if (command === 'play' && positional.length > 0) {
    const [first, ...rest] = positional;
    if (first === 'custom' && rest.length === 0) {
      command = 'custom';
    } else if (first === 'script') {
      command = 'script';
    } else {
      throw new OptionsError(`Unknown command: ${positional.join(' ')}`);
    }
  }

  let theme: PhosphorMode = 'cyan';
  const themeValue = values.get('--theme');
  if (themeValue !== undefined) {
    if (!isValidThemeMode(themeValue)) {
      throw new OptionsError(`Unknown theme "${themeValue}". Available: ${getThemeModes().join(', ')}`, '--theme');
    }
    theme = themeValue;
  }

  const moves = command === 'script' ? parseMoves(positional.slice(1)) : [];
  const boardFlags = ['--difficulty', '--width', '--height', '--mines', '--density', '--seed'];
  const wantsBoard = command === 'script' || boardFlags.some(flag => values.has(flag));

  let config: BoardConfig | null = null;
  let label = 'CUSTOM';
  if (wantsBoard) {
    ({ config, label } = resolveBoard(values, makeSeed));
  }

  return { command, theme, config, label, moves };
}

function resolveBoard(
  values: Map<string, string>,
  makeSeed: () => string
): { config: BoardConfig; label: string } {
  const difficultyId = values.get('--difficulty') ?? 'easy';
  const difficulty = getDifficulty(difficultyId);
  if (!difficulty) {
    throw new OptionsError(
      `Unknown difficulty "${difficultyId}". Available: ${DIFFICULTIES.map(d => d.id).join(', ')}`,
      '--difficulty'
    );
  }

  const widthValue = values.get('--width');
  const heightValue = values.get('--height');
  if ((widthValue === undefined) !== (heightValue === undefined)) {
    throw new OptionsError('--width and --height must be given together');
  }

  const width = widthValue === undefined ? difficulty.width : parseInteger('--width', widthValue, 1);
  const height = heightValue === undefined ? difficulty.height : parseInteger('--height', heightValue, 1);
  const resized = widthValue !== undefined;

  const minesValue = values.get('--mines');
  const densityValue = values.get('--density');
  if (minesValue !== undefined && densityValue !== undefined) {
    throw new OptionsError('Use either --mines or --density, not both');
  }

  let spec: MineSpec;
  if (minesValue !== undefined) {
    const mines = parseInteger('--mines', minesValue, 0);
    if (mines > width * height) {
      throw new OptionsError(`--mines cannot exceed ${width * height} on a ${width}x${height} board`, '--mines');
    }
    spec = { mines };
  } else if (densityValue !== undefined) {
    spec = { density: parseDensity(densityValue) };
  } else if (resized) {
    // Resized boards keep the preset's share of mined cells
    spec = { density: resolveMineCount(difficulty.width, difficulty.height, difficulty.mines) / (difficulty.width * difficulty.height) };
  } else {
    spec = difficulty.mines;
  }

  const custom = resized || minesValue !== undefined || densityValue !== undefined;
  return {
    config: {
      width,
      height,
      mines: resolveMineCount(width, height, spec),
      seed: values.get('--seed') ?? makeSeed(),
    },
    label: custom ? 'CUSTOM' : difficulty.name,
  };
}
