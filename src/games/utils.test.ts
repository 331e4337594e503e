import { describe, it, expect, expectTypeOf, vi } from 'vitest';
import type { Terminal } from '@xterm/xterm';
import {
  type GameTerminal,
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCurrentThemeColor,
  getTheme,
  getVerticalAnchor,
  isInAlternateBuffer,
  isLightTheme,
  setTheme,
} from './utils';

function recordingTerminal(): { terminal: GameTerminal; writes: string[] } {
  const writes: string[] = [];
  return {
    writes,
    terminal: {
      cols: 80,
      rows: 24,
      write: data => {
        writes.push(data);
      },
      onKey: () => ({ dispose: () => {} }),
    },
  };
}

describe('GameTerminal', () => {
  it('accepts an xterm.js terminal', () => {
    expectTypeOf<Terminal>().toMatchTypeOf<GameTerminal>();
  });
});

describe('theme state', () => {
  it('defaults to the cabinet theme and follows setTheme', () => {
    expect(getTheme()).toBe('cabinet');
    expect(getCurrentThemeColor()).toBe('\x1b[94m');

    setTheme('paper');
    expect(getCurrentThemeColor()).toBe('\x1b[34m');
    expect(isLightTheme()).toBe(true);

    setTheme('cabinet');
    expect(isLightTheme()).toBe(false);
  });
});

describe('alternate buffer', () => {
  it('enters and exits once', () => {
    const { terminal, writes } = recordingTerminal();

    expect(enterAlternateBuffer(terminal, 'test')).toBe(true);
    expect(writes).toEqual(['\x1b[?1049h', '\x1b[?25l', '\x1b[2J\x1b[H']);
    expect(isInAlternateBuffer(terminal)).toBe(true);

    expect(exitAlternateBuffer(terminal, 'test')).toBe(true);
    expect(writes.slice(3)).toEqual(['\x1b[?1049l', '\x1b[?25h']);
    expect(isInAlternateBuffer(terminal)).toBe(false);
  });

  it('warns instead of entering twice', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { terminal, writes } = recordingTerminal();

    enterAlternateBuffer(terminal, 'first');
    expect(enterAlternateBuffer(terminal, 'second')).toBe(false);

    expect(writes).toHaveLength(3);
    expect(warn).toHaveBeenCalledWith('[AlternateBuffer] Already in buffer (entered by: first), requested by: second');
    warn.mockRestore();
  });

  it('warns when exiting a buffer it never entered', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { terminal } = recordingTerminal();

    expect(exitAlternateBuffer(terminal, 'stray')).toBe(false);
    expect(warn).toHaveBeenCalledWith('[AlternateBuffer] Not in alternate buffer, exit requested by: stray');
    warn.mockRestore();
  });
});

describe('getVerticalAnchor', () => {
  it('centres content between header and footer', () => {
    expect(getVerticalAnchor(24, 17, { headerRows: 2, footerRows: 1 })).toBe(5);
  });

  it('never goes above minTop', () => {
    expect(getVerticalAnchor(10, 17, { headerRows: 2, minTop: 3 })).toBe(3);
  });
});
