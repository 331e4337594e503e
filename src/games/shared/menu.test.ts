import { describe, it, expect } from 'vitest';
import {
  navigateMenu,
  checkShortcut,
  renderSimpleMenu,
  pauseChoiceAt,
  PAUSE_MENU_ITEMS,
  type KeyLike,
  type SimpleMenuItem,
} from './menu';
import { setTheme } from '../utils';

function keyEvent(key: string): KeyLike {
  return { key };
}

describe('navigateMenu', () => {
  describe('arrow navigation', () => {
    it('moves up with ArrowUp', () => {
      const result = navigateMenu(2, 3, '', keyEvent('ArrowUp'));
      expect(result).toEqual({ newSelection: 1, confirmed: false });
    });

    it('moves down with ArrowDown', () => {
      const result = navigateMenu(0, 3, '', keyEvent('ArrowDown'));
      expect(result).toEqual({ newSelection: 1, confirmed: false });
    });

    it('moves with w and s', () => {
      expect(navigateMenu(1, 3, 'w', keyEvent('w')).newSelection).toBe(0);
      expect(navigateMenu(1, 3, 's', keyEvent('s')).newSelection).toBe(2);
    });
  });

  describe('wrapping behavior', () => {
    it('wraps up from first item to last', () => {
      expect(navigateMenu(0, 3, '', keyEvent('ArrowUp')).newSelection).toBe(2);
    });

    it('wraps down from last item to first', () => {
      expect(navigateMenu(2, 3, '', keyEvent('ArrowDown')).newSelection).toBe(0);
    });
  });

  describe('confirmation', () => {
    it('confirms with Enter without moving', () => {
      expect(navigateMenu(1, 3, '', keyEvent('Enter'))).toEqual({ newSelection: 1, confirmed: true });
    });

    it('confirms with Space', () => {
      expect(navigateMenu(1, 3, ' ', keyEvent(' ')).confirmed).toBe(true);
    });
  });

  it('ignores other keys', () => {
    expect(navigateMenu(1, 3, 'x', keyEvent('x'))).toEqual({ newSelection: 1, confirmed: false });
  });

  it('leaves an empty menu alone', () => {
    expect(navigateMenu(0, 0, '', keyEvent('ArrowDown'))).toEqual({ newSelection: 0, confirmed: false });
  });
});

describe('checkShortcut', () => {
  const items: SimpleMenuItem[] = [
    { label: 'Resume', shortcut: 'ESC' },
    { label: 'Restart', shortcut: 'R' },
    { label: 'Quit', shortcut: 'Q' },
    { label: 'No Shortcut' },
  ];

  it('matches regardless of case', () => {
    expect(checkShortcut(items, 'r')).toBe(1);
    expect(checkShortcut(items, 'Q')).toBe(2);
    expect(checkShortcut(items, 'esc')).toBe(0);
  });

  it('returns -1 for no match', () => {
    expect(checkShortcut(items, 'x')).toBe(-1);
  });

  it('returns the first match on duplicates', () => {
    const dupes: SimpleMenuItem[] = [
      { label: 'First', shortcut: 'A' },
      { label: 'Second', shortcut: 'A' },
    ];
    expect(checkShortcut(dupes, 'a')).toBe(0);
  });
});

describe('renderSimpleMenu', () => {
  it('marks the selected item and centres each line', () => {
    setTheme('green');
    const output = renderSimpleMenu([{ label: 'GO' }, { label: 'STOP', shortcut: 'S' }], 0, {
      centerX: 20,
      startY: 5,
    });

    // "► GO ◄" is 6 wide; "  STOP [S]  " is 12 wide
    expect(output).toBe(
      '\x1b[5;17H\x1b[1;93m► GO ◄\x1b[0m' +
      '\x1b[6;14H\x1b[2m\x1b[92m  STOP [S]  \x1b[0m',
    );
    setTheme('cabinet');
  });
});

describe('pause menu', () => {
  it('offers resume, restart and quit', () => {
    expect(PAUSE_MENU_ITEMS.map(item => item.label)).toEqual(['RESUME', 'RESTART', 'QUIT']);
    expect(PAUSE_MENU_ITEMS.map(item => item.shortcut)).toEqual(['ESC', 'R', 'Q']);
  });

  it('maps indices to choices', () => {
    expect(pauseChoiceAt(0)).toBe('resume');
    expect(pauseChoiceAt(1)).toBe('restart');
    expect(pauseChoiceAt(2)).toBe('quit');
    expect(pauseChoiceAt(3)).toBeNull();
  });
});
