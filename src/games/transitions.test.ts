import { describe, it, expect } from 'vitest';
import { LOADING_FRAMES, playBootTransition, playExitTransition } from './transitions';
import type { GameTerminal } from './utils';

function recordingTerminal(): { terminal: GameTerminal; writes: string[] } {
  const writes: string[] = [];
  return {
    writes,
    terminal: {
      cols: 40,
      rows: 10,
      write: data => {
        writes.push(data);
      },
      onKey: () => ({ dispose: () => {} }),
    },
  };
}

const instant = () => Promise.resolve();

describe('playBootTransition', () => {
  it('runs the loading bar to DONE and clears the screen', async () => {
    const { terminal, writes } = recordingTerminal();
    await playBootTransition(terminal, { sleep: instant, random: () => 0 });

    const bars = writes.filter(data => data.includes('LOADING: ['));
    expect(bars).toHaveLength(LOADING_FRAMES.length + 1);
    expect(bars[bars.length - 1]).toContain('LOADING: [DONE]');
    expect(writes[writes.length - 1]).toBe('\x1b[2J\x1b[H');
  });

  it('shows a boot message on row eight', async () => {
    const { terminal, writes } = recordingTerminal();
    await playBootTransition(terminal, { sleep: instant, random: () => 0 });

    // 'DESCENDING INTO THE DUNGEON...' is 30 wide: centre 20 - 15 = column 5
    expect(writes).toContain('\x1b[8;5H\x1b[94mDESCENDING INTO THE DUNGEON...\x1b[0m');
  });
});

describe('playExitTransition', () => {
  it('wipes every row', async () => {
    const { terminal, writes } = recordingTerminal();
    await playExitTransition(terminal, { sleep: instant, random: () => 0 });

    const blank = ' '.repeat(40);
    for (let row = 1; row <= 10; row++) {
      expect(writes).toContain(`\x1b[${row};1H${blank}`);
    }
  });
});
