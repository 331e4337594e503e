/**
 * Node Terminal Adapter
 *
 * Maps raw-mode stdin and stdout onto the small terminal surface the game
 * runner draws into, so the game plays in any terminal emulator.
 */

import type { Disposable, GameTerminal, KeyPress } from './games/utils';

export interface NodeTerminal extends GameTerminal {
  /** Restore cooked mode, leave the alternate buffer and show the cursor */
  cleanup: () => void;
}

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
export function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches clear + redraw into a single paint.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

export function createNodeTerminal(): NodeTerminal {
  const keyListeners: ((event: KeyPress) => void)[] = [];
  let cleanedUp = false;

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  function cleanup(): void {
    if (cleanedUp) return;
    cleanedUp = true;
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
    process.stdout.write('\x1b[?1049l');
    process.stdout.write('\x1b[?25h');
    process.stdout.write('\x1b[0m');
  }

  process.stdin.on('data', (data: string) => {
    // Ctrl-C: raw mode swallows SIGINT
    if (data === '\x03') {
      cleanup();
      process.exit(0);
    }

    const key = parseKey(data);
    for (const listener of [...keyListeners]) {
      listener({ key, domEvent: { key } });
    }
  });

  const terminal: NodeTerminal = {
    write: (data: string) => {
      process.stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onKey: (callback: (event: KeyPress) => void): Disposable => {
      keyListeners.push(callback);
      return {
        dispose: () => {
          const idx = keyListeners.indexOf(callback);
          if (idx !== -1) keyListeners.splice(idx, 1);
        },
      };
    },
    cleanup,
  };

  process.on('exit', cleanup);
  process.on('SIGINT', () => { cleanup(); process.exit(0); });
  process.on('SIGTERM', () => { cleanup(); process.exit(0); });

  return terminal;
}
