/**
 * Index-based menus
 *
 * Arrow keys / W S move the selection, Enter or Space confirm, and each
 * item may carry a one-key shortcut.
 */

import { getCurrentThemeColor } from '../utils';

export interface SimpleMenuItem {
  label: string;
  shortcut?: string; // e.g., 'ESC', 'R', 'Q'
}

/** The part of a key event menus read */
export interface KeyLike {
  key: string;
}

/**
 * Handle menu navigation. Returns the new selection and whether it was confirmed.
 */
export function navigateMenu(
  currentSelection: number,
  itemCount: number,
  key: string,
  domEvent: KeyLike
): { newSelection: number; confirmed: boolean } {
  let newSelection = currentSelection;
  let confirmed = false;

  if (itemCount <= 0) return { newSelection, confirmed };

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
 * Index of the item whose shortcut matches `key`, or -1
 */
export function checkShortcut(
  items: readonly SimpleMenuItem[],
  key: string
): number {
  const pressed = key.toLowerCase();
  for (let i = 0; i < items.length; i++) {
    const shortcut = items[i].shortcut;
    if (shortcut && pressed === shortcut.toLowerCase()) {
      return i;
    }
  }
  return -1;
}

/**
 * Render a menu centred on `centerX`, one item per row from `startY`.
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

  let output = '';

  items.forEach((item, i) => {
    const isSelected = i === selection;

    let displayText = item.label;
    if (showShortcuts && item.shortcut) {
      displayText += ` [${item.shortcut}]`;
    }

    const text = isSelected ? `► ${displayText} ◄` : `  ${displayText}  `;
    const style = isSelected ? '\x1b[1;93m' : `\x1b[2m${themeColor}`;

    const itemX = Math.max(1, centerX - Math.floor(text.length / 2));
    output += `\x1b[${startY + i};${itemX}H${style}${text}\x1b[0m`;
  });

  return output;
}

export const PAUSE_MENU_ITEMS: readonly SimpleMenuItem[] = [
  { label: 'RESUME', shortcut: 'ESC' },
  { label: 'RESTART', shortcut: 'R' },
  { label: 'QUIT', shortcut: 'Q' },
];

export type PauseChoice = 'resume' | 'restart' | 'quit';

const PAUSE_CHOICES: readonly PauseChoice[] = ['resume', 'restart', 'quit'];

export function pauseChoiceAt(index: number): PauseChoice | null {
  return PAUSE_CHOICES[index] ?? null;
}
