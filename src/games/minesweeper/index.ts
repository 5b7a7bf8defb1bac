/**
 * Minefield terminal runner
 *
 * Draws the board and HUD, maps the cursor to left/right clicks, and
 * owns the render loop. All game rules live in board.ts and controller.ts.
 */

import type { GameTerminal } from '../utils';
import {
  centerColumn,
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCurrentThemeColor,
  getSubtleBackgroundColor,
} from '../utils';
import { dispatchGameQuit } from '../gameTransitions';
import {
  GAME_OVER_MENU_ITEMS,
  PAUSE_MENU_ITEMS,
  checkShortcut,
  navigateMenu,
  renderSimpleMenu,
  type MenuAction,
} from '../shared/menu';
import { cellGlyph, formatTime } from './glyphs';
import {
  DIFFICULTIES,
  configFromDifficulty,
  createSession,
  type BoardConfig,
  type Session,
} from './layout';
import { randomSeed } from './prng';

/**
 * Minesweeper Game Controller
 */
export interface MinesweeperController {
  stop: () => void;
  isRunning: boolean;
}

export interface MinesweeperOptions {
  /** Play this field directly instead of showing difficulty selection */
  config?: BoardConfig;
  /** HUD label for the field, e.g. the preset name */
  label?: string;
}

interface Particle {
  x: number;
  y: number;
  char: string;
  color: string;
  vx: number;
  vy: number;
  life: number;
}

const TICK_MS = 25;
const TITLE = 'M I N E F I E L D';

// ============================================================================
// MAIN GAME FUNCTION
// ============================================================================

export function runMinesweeperGame(
  terminal: GameTerminal,
  options: MinesweeperOptions = {}
): MinesweeperController {
  const themeColor = getCurrentThemeColor();

  // -------------------------------------------------------------------------
  // STATE
  // -------------------------------------------------------------------------
  let running = true;
  let paused = false;
  let pauseSelection = 0;
  let overSelection = 0;
  let selectingDifficulty = !options.config;
  let difficultySelection = 0;

  let session: Session | null = null;
  let label = options.label ?? 'CUSTOM';
  let cursorX = 0;
  let cursorY = 0;

  let particles: Particle[] = [];
  let shakeFrames = 0;

  let loop: ReturnType<typeof setInterval> | null = null;
  let keyListener: { dispose(): void } | null = null;

  const controller: MinesweeperController = {
    stop: () => {
      if (!running) return;
      running = false;
      if (loop) clearInterval(loop);
      keyListener?.dispose();
    },
    get isRunning() { return running; },
  };

  // -------------------------------------------------------------------------
  // EFFECTS
  // -------------------------------------------------------------------------

  function spawnParticles(x: number, y: number, count: number, colors: string[], chars: string[]) {
    for (let i = 0; i < count; i++) {
      const angle = (Math.PI * 2 * i) / count + Math.random() * 0.4;
      const speed = 0.3 + Math.random() * 0.5;
      particles.push({
        x,
        y,
        char: chars[Math.floor(Math.random() * chars.length)],
        color: colors[Math.floor(Math.random() * colors.length)],
        vx: Math.cos(angle) * speed,
        vy: Math.sin(angle) * speed * 0.5 - 0.2,
        life: 12 + Math.floor(Math.random() * 10),
      });
    }
  }

  function updateEffects() {
    for (let i = particles.length - 1; i >= 0; i--) {
      const p = particles[i];
      p.x += p.vx;
      p.y += p.vy;
      p.vy += 0.03;
      p.life--;
      if (p.life <= 0) particles.splice(i, 1);
    }
    if (shakeFrames > 0) shakeFrames--;
  }

  // -------------------------------------------------------------------------
  // SESSION
  // -------------------------------------------------------------------------

  function startSession(config: BoardConfig) {
    session = createSession(config);
    cursorX = Math.floor(config.width / 2);
    cursorY = Math.floor(config.height / 2);
    paused = false;
    overSelection = 0;
    particles = [];
    shakeFrames = 0;
  }

  function newField() {
    if (!session) return;
    startSession({ ...session.config, seed: randomSeed() });
  }

  function quit() {
    const state = session?.controller.playState.kind;
    controller.stop();
    exitAlternateBuffer(terminal, 'minesweeper quit');
    dispatchGameQuit({
      terminal,
      seed: session ? session.config.seed : null,
      result: state === 'won' || state === 'lost' ? state : 'abandoned',
    });
  }

  function uncoverAtCursor() {
    if (!session) return;
    const result = session.controller.leftClick(cursorX, cursorY);
    if (!result) return;

    if (result.outcome === 'detonated') {
      shakeFrames = 25;
      spawnParticles(cursorX * 2 + 1, cursorY, 20, ['\x1b[1;91m', '\x1b[1;93m', '\x1b[1;97m'], ['*', '#', '@', '%', 'X']);
    } else if (result.outcome === 'cleared') {
      shakeFrames = 8;
      spawnParticles(cursorX * 2 + 1, cursorY, 16, ['\x1b[1;92m'], ['*', '+', '#']);
    } else {
      spawnParticles(cursorX * 2 + 1, cursorY, 4, [themeColor], ['.', '*', '+']);
    }
  }

  // -------------------------------------------------------------------------
  // RENDERING
  // -------------------------------------------------------------------------

  function render() {
    let output = '\x1b[2J\x1b[H';
    const cols = terminal.cols;
    const rows = terminal.rows;

    output += `\x1b[1;${centerColumn(cols, TITLE.length)}H${themeColor}\x1b[1m${TITLE}\x1b[0m`;

    if (selectingDifficulty || !session) {
      terminal.write(output + renderDifficultySelect(cols, rows));
      return;
    }

    const { board, controller: game, config } = session;
    const minCols = board.width * 2 + 4;
    const minRows = board.height + 8;
    if (cols < minCols || rows < minRows) {
      const msg1 = 'Terminal too small!';
      const msg2 = `Need: ${minCols}x${minRows}  Have: ${cols}x${rows}`;
      const centerY = Math.floor(rows / 2);
      output += `\x1b[${centerY};${centerColumn(cols, msg1.length)}H${themeColor}${msg1}\x1b[0m`;
      output += `\x1b[${centerY + 1};${centerColumn(cols, msg2.length)}H\x1b[2m${msg2}\x1b[0m`;
      terminal.write(output);
      return;
    }

    const gridWidth = board.width * 2 + 2;
    const gridHeight = board.height + 2;
    let left = Math.max(2, Math.floor((cols - gridWidth) / 2));
    let top = Math.max(4, Math.floor((rows - gridHeight - 4) / 2) + 3);
    if (shakeFrames > 0) {
      left += Math.floor((Math.random() - 0.5) * 4);
      top += Math.floor((Math.random() - 0.5) * 2);
    }

    // HUD
    const stats = game.snapshot();
    const hud = `TIME ${formatTime(game.elapsedSeconds())}  FLAGS ${stats.totalFlags}  MINES ${stats.totalMines}  TURNS ${stats.turns}  [${label}]`;
    output += `\x1b[${top - 1};${centerColumn(cols, hud.length)}H${themeColor}${hud}\x1b[0m`;

    // Border
    const over = game.isOver();
    const borderColor = stats.playState.kind === 'lost' ? '\x1b[1;91m'
      : stats.playState.kind === 'won' ? '\x1b[1;92m'
      : stats.playState.kind === 'unstarted' ? getSubtleBackgroundColor() : themeColor;
    const edge = `+${'-'.repeat(board.width * 2)}+`;
    output += `\x1b[${top};${left}H${borderColor}${edge}\x1b[0m`;
    for (let y = 0; y < board.height; y++) {
      output += `\x1b[${top + 1 + y};${left}H${borderColor}|\x1b[0m`;
      output += `\x1b[${top + 1 + y};${left + board.width * 2 + 1}H${borderColor}|\x1b[0m`;
    }
    output += `\x1b[${top + board.height + 1};${left}H${borderColor}${edge}\x1b[0m`;

    // Cells
    for (let y = 0; y < board.height; y++) {
      for (let x = 0; x < board.width; x++) {
        const cell = board.get(x, y);
        if (!cell) continue;
        const glyph = cellGlyph(cell);
        const style = `${glyph.dim ? '\x1b[2m' : ''}${glyph.color || themeColor}`;
        const invert = !over && !paused && x === cursorX && y === cursorY ? '\x1b[7m' : '';
        output += `\x1b[${top + 1 + y};${left + 1 + x * 2}H${invert}${style}${glyph.text}\x1b[0m`;
      }
    }

    // Particles
    for (const p of particles) {
      const screenX = Math.round(left + 1 + p.x);
      const screenY = Math.round(top + 1 + p.y);
      if (screenX > left && screenX <= left + board.width * 2 &&
          screenY > top && screenY <= top + board.height) {
        output += `\x1b[${screenY};${screenX}H${p.life > 5 ? '' : '\x1b[2m'}${p.color}${p.char}\x1b[0m`;
      }
    }

    const centerX = Math.floor(cols / 2);
    const menuY = Math.floor(rows / 2) - 2;

    if (paused) {
      const pauseMsg = '== PAUSED ==';
      output += `\x1b[${menuY};${centerColumn(cols, pauseMsg.length)}H\x1b[5m${themeColor}${pauseMsg}\x1b[0m`;
      output += renderSimpleMenu(PAUSE_MENU_ITEMS, pauseSelection, { centerX, startY: menuY + 2 });
    } else if (over) {
      const won = stats.playState.kind === 'won';
      const overMsg = won ? '== FIELD CLEARED ==' : '== DETONATED ==';
      output += `\x1b[${menuY};${centerColumn(cols, overMsg.length)}H${won ? '\x1b[1;92m' : '\x1b[1;91m'}${overMsg}\x1b[0m`;
      const timeMsg = `Time: ${formatTime(game.elapsedSeconds())}  Turns: ${stats.turns}  Seed: ${config.seed}`;
      output += `\x1b[${menuY + 1};${centerColumn(cols, timeMsg.length)}H${themeColor}${timeMsg}\x1b[0m`;
      output += renderSimpleMenu(GAME_OVER_MENU_ITEMS, overSelection, { centerX, startY: menuY + 3 });
    }

    const hint = stats.playState.kind === 'unstarted'
      ? 'ARROWS move  SPACE uncover  F flag  ESC menu'
      : `Cleared: ${board.exposedCount}/${board.safeCellCount}  [ ESC ] MENU`;
    output += `\x1b[${top + board.height + 3};${centerColumn(cols, hint.length)}H\x1b[2m${themeColor}${hint}\x1b[0m`;

    terminal.write(output);
  }

  function renderDifficultySelect(cols: number, rows: number): string {
    let output = '';
    const selectY = Math.floor(rows / 2) - 3;
    const selectMsg = '[ SELECT DIFFICULTY ]';
    output += `\x1b[${selectY};${centerColumn(cols, selectMsg.length)}H${themeColor}\x1b[1m${selectMsg}\x1b[0m`;

    DIFFICULTIES.forEach((d, i) => {
      const isSelected = i === difficultySelection;
      const mines = 'mines' in d.mines ? `${d.mines.mines} mines` : `${Math.round(d.mines.density * 100)}% mined`;
      const text = `${isSelected ? ' >' : '  '}${d.name} (${d.width}x${d.height}, ${mines})${isSelected ? '< ' : '  '}`;
      const style = isSelected ? '\x1b[1;93m' : `\x1b[2m${themeColor}`;
      output += `\x1b[${selectY + 2 + i};${centerColumn(cols, text.length)}H${style}${text}\x1b[0m`;
    });

    const hint = 'Arrow keys to select, ENTER to confirm, Q to quit';
    output += `\x1b[${selectY + 3 + DIFFICULTIES.length};${centerColumn(cols, hint.length)}H\x1b[2m${themeColor}${hint}\x1b[0m`;
    return output;
  }

  // -------------------------------------------------------------------------
  // INPUT
  // -------------------------------------------------------------------------

  /** Shared by the pause and game-over menus */
  function runMenuAction(action: MenuAction) {
    switch (action) {
      case 'resume':
        paused = false;
        break;
      case 'restart':
        if (session) startSession(session.config);
        break;
      case 'new-field':
        newField();
        break;
      case 'difficulty':
        paused = false;
        selectingDifficulty = true;
        break;
      case 'quit':
        quit();
        break;
    }
  }

  function handleKey(key: string, domEvent: { key: string }) {
    if (selectingDifficulty) {
      if (domEvent.key === 'ArrowUp' || key === 'w') {
        difficultySelection = (difficultySelection - 1 + DIFFICULTIES.length) % DIFFICULTIES.length;
      } else if (domEvent.key === 'ArrowDown' || key === 's') {
        difficultySelection = (difficultySelection + 1) % DIFFICULTIES.length;
      } else if (domEvent.key === 'Enter' || domEvent.key === ' ') {
        const difficulty = DIFFICULTIES[difficultySelection];
        label = difficulty.name;
        selectingDifficulty = false;
        startSession(configFromDifficulty(difficulty, randomSeed()));
      } else if (key === 'q') {
        quit();
      }
      return;
    }

    if (!session) return;

    if (key === 'escape' && !session.controller.isOver()) {
      paused = !paused;
      pauseSelection = 0;
      return;
    }

    if (paused || session.controller.isOver()) {
      const items = paused ? PAUSE_MENU_ITEMS : GAME_OVER_MENU_ITEMS;
      const selection = paused ? pauseSelection : overSelection;
      const shortcut = checkShortcut(items, key);
      if (shortcut) {
        runMenuAction(shortcut);
        return;
      }
      const { newSelection, confirmed } = navigateMenu(selection, items.length, key, domEvent);
      if (paused) pauseSelection = newSelection;
      else overSelection = newSelection;
      if (confirmed) runMenuAction(items[newSelection].action);
      return;
    }

    switch (domEvent.key) {
      case 'ArrowLeft':
      case 'a':
        cursorX = Math.max(0, cursorX - 1);
        break;
      case 'ArrowRight':
      case 'd':
        cursorX = Math.min(session.board.width - 1, cursorX + 1);
        break;
      case 'ArrowUp':
      case 'w':
        cursorY = Math.max(0, cursorY - 1);
        break;
      case 'ArrowDown':
      case 's':
        cursorY = Math.min(session.board.height - 1, cursorY + 1);
        break;
      case ' ':
      case 'Enter':
        uncoverAtCursor();
        break;
      case 'f':
      case 'F':
        session.controller.rightClick(cursorX, cursorY);
        break;
    }
  }

  // -------------------------------------------------------------------------
  // GAME LOOP
  // -------------------------------------------------------------------------

  enterAlternateBuffer(terminal, 'minesweeper');
  if (options.config) startSession(options.config);

  loop = setInterval(() => {
    if (!running) return;
    updateEffects();
    render();
  }, TICK_MS);

  keyListener = terminal.onKey(({ domEvent }) => {
    if (!running) return;
    domEvent.preventDefault();
    domEvent.stopPropagation();
    handleKey(domEvent.key.toLowerCase(), domEvent);
  });

  return controller;
}
