/**
 * Shared menu helpers
 *
 * Index-based menu navigation (arrow keys + Enter/Space) with
 * single-key shortcuts for quick access.
 */

import { getCurrentThemeColor } from '../utils';

export type MenuAction = 'resume' | 'restart' | 'new-field' | 'difficulty' | 'quit';

export interface SimpleMenuItem {
  label: string;
  shortcut?: string;
  action: MenuAction;
}

export interface MenuNavigation {
  newSelection: number;
  confirmed: boolean;
}

/**
 * Move the selection with arrows or W/S; Enter or Space confirms.
 * Selection wraps at both ends.
 */
export function navigateMenu(
  currentSelection: number,
  itemCount: number,
  key: string,
  domEvent: Pick<KeyboardEvent, 'key'>
): MenuNavigation {
  let newSelection = currentSelection;
  let confirmed = false;

  if (domEvent.key === 'ArrowUp' || key === 'w') {
    newSelection = (currentSelection - 1 + itemCount) % itemCount;
  } else if (domEvent.key === 'ArrowDown' || key === 's') {
    newSelection = (currentSelection + 1) % itemCount;
  } else if (domEvent.key === 'Enter' || domEvent.key === ' ') {
    confirmed = true;
  }

  return { newSelection, confirmed };
}

/**
 * Action bound to a shortcut key (already lowercased), if any
 */
export function checkShortcut(
  items: readonly SimpleMenuItem[],
  key: string
): MenuAction | null {
  const item = items.find(i => i.shortcut !== undefined && i.shortcut.toLowerCase() === key);
  return item ? item.action : null;
}

/**
 * Menu lines centred on centerX, selected item highlighted.
 * Returns ANSI escape sequence string
 */
export function renderSimpleMenu(
  items: readonly SimpleMenuItem[],
  selection: number,
  options: {
    centerX: number;
    startY: number;
    showShortcuts?: boolean;
  }
): string {
  const themeColor = getCurrentThemeColor();
  const { centerX, startY, showShortcuts = true } = options;

  return items.map((item, i) => {
    const label = showShortcuts && item.shortcut ? `${item.label} [${item.shortcut}]` : item.label;
    const selected = i === selection;
    const text = selected ? `► ${label} ◄` : `  ${label}  `;
    const style = selected ? '\x1b[1;93m' : `\x1b[2m${themeColor}`;
    return `\x1b[${startY + i};${centerX - Math.floor(text.length / 2)}H${style}${text}\x1b[0m`;
  }).join('');
}

/**
 * Pause menu. RESTART replays the same field, NEW FIELD rolls a new seed.
 */
export const PAUSE_MENU_ITEMS: readonly SimpleMenuItem[] = [
  { label: 'RESUME', shortcut: 'ESC', action: 'resume' },
  { label: 'RESTART', shortcut: 'R', action: 'restart' },
  { label: 'NEW FIELD', shortcut: 'N', action: 'new-field' },
  { label: 'DIFFICULTY', shortcut: 'D', action: 'difficulty' },
  { label: 'QUIT', shortcut: 'Q', action: 'quit' },
];

/**
 * Shown once the field is won or lost
 */
export const GAME_OVER_MENU_ITEMS: readonly SimpleMenuItem[] = PAUSE_MENU_ITEMS.filter(
  item => item.action !== 'resume'
);
