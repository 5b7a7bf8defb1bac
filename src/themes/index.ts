/**
 * Terminal color themes
 *
 * ANSI escape codes for the board, HUD and menus.
 */

/**
 * Available theme identifiers
 */
export type PhosphorMode =
  | 'cyan'
  | 'amber'
  | 'green'
  | 'white'
  | 'hotpink'
  | 'blood'
  | 'bladerunner'
  | 'solarized'
  | 'daylight'
  | 'cream';

export interface TerminalTheme {
  /** Display name */
  name: string;
  /** Primary text/accent color */
  ansi: string;
  /** Muted color for covered tiles and borders */
  subtle: string;
  /** Light themes need dark text */
  light: boolean;
}

export const themes: Record<PhosphorMode, TerminalTheme> = {
  cyan: { name: 'Cyberpunk', ansi: '\x1b[96m', subtle: '\x1b[38;5;236m', light: false },
  amber: { name: 'Fallout', ansi: '\x1b[93m', subtle: '\x1b[38;5;236m', light: false },
  green: { name: 'Matrix', ansi: '\x1b[92m', subtle: '\x1b[38;5;236m', light: false },
  white: { name: 'Ghost', ansi: '\x1b[97m', subtle: '\x1b[38;5;236m', light: false },
  hotpink: { name: 'Synthwave', ansi: '\x1b[95m', subtle: '\x1b[38;5;236m', light: false },
  blood: { name: 'Blood', ansi: '\x1b[91m', subtle: '\x1b[38;5;236m', light: false },
  bladerunner: { name: 'Blade Runner', ansi: '\x1b[38;5;208m', subtle: '\x1b[38;5;236m', light: false },
  solarized: { name: 'Solarized', ansi: '\x1b[36m', subtle: '\x1b[38;5;236m', light: false },
  daylight: { name: 'Daylight', ansi: '\x1b[34m', subtle: '\x1b[38;5;252m', light: true },
  cream: { name: 'Cream', ansi: '\x1b[38;5;130m', subtle: '\x1b[38;5;223m', light: true },
};

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: PhosphorMode): string {
  return themes[mode].ansi;
}

/**
 * Check if a theme is light (needs dark text)
 */
export function isLightTheme(mode: PhosphorMode): boolean {
  return themes[mode].light;
}

/**
 * Get subtle color for covered tiles
 */
export function getSubtleColor(mode: PhosphorMode): string {
  return themes[mode].subtle;
}

const THEME_MODES: PhosphorMode[] = [
  'cyan', 'amber', 'green', 'white', 'hotpink',
  'blood', 'bladerunner', 'solarized', 'daylight', 'cream',
];

/**
 * Get all available theme modes
 */
export function getThemeModes(): PhosphorMode[] {
  return [...THEME_MODES];
}

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is PhosphorMode {
  return THEME_MODES.some(mode => mode === value);
}

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';
