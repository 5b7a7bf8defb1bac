/**
 * Shared terminal utilities
 *
 * Theme state, the terminal surface games draw on, and alternate
 * screen buffer tracking. The theme is configured by the consuming
 * application via setTheme().
 */

import type { Terminal } from '@xterm/xterm';
import {
  type PhosphorMode,
  getAnsiColor,
  isLightTheme as checkLightTheme,
  getSubtleColor,
} from '../themes';

// ============================================================================
// Terminal Surface
// ============================================================================

export interface TerminalKeyEvent {
  key: string;
  domEvent: Pick<KeyboardEvent, 'key' | 'preventDefault' | 'stopPropagation'>;
}

export interface Disposable {
  dispose(): void;
}

/**
 * The part of a terminal a game needs: size, output and key input.
 * An xterm.js Terminal satisfies it, and so does the Node adapter in cli.ts.
 */
export interface GameTerminal {
  readonly cols: number;
  readonly rows: number;
  write(data: string): void;
  onKey(listener: (event: TerminalKeyEvent) => void): Disposable;
}

/**
 * Use an xterm.js Terminal as a game surface
 */
export function fromXterm(terminal: Terminal): GameTerminal {
  return terminal;
}

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme mode - configured by the consuming application
 */
let currentTheme: PhosphorMode = 'cyan';

/**
 * Set the current theme mode
 */
export function setTheme(mode: PhosphorMode): void {
  currentTheme = mode;
}

export function getTheme(): PhosphorMode {
  return currentTheme;
}

/**
 * Get current theme color code
 */
export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

/**
 * Check if current theme is a light theme (needs dark text)
 */
export function isLightTheme(): boolean {
  return checkLightTheme(currentTheme);
}

/**
 * Muted color for covered tiles
 */
export function getSubtleBackgroundColor(): string {
  return getSubtleColor(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * This prevents double-entry/exit issues and provides debugging info.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Enter alternate screen buffer with state tracking.
 * Safe to call multiple times - will log warning but not double-enter.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if buffer was entered, false if already in buffer
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 *
 * @returns true if buffer was exited, false if not in buffer
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Layout Utilities
// ============================================================================

/**
 * Column at which text of the given width is centered
 */
export function centerColumn(terminalCols: number, textWidth: number): number {
  return Math.max(1, Math.floor((terminalCols - textWidth) / 2));
}

// Re-export PhosphorMode type for convenience
export type { PhosphorMode } from '../themes';
