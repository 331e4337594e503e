/**
 * Screen transitions
 *
 * Short boot and exit animations played around a game session. Both draw
 * into whatever buffer the terminal is in; the caller owns the alternate
 * buffer.
 */

import { type GameTerminal, getCurrentThemeColor } from './utils';

// Transition timing constants
const BOOT_DURATION = 800;  // ms for boot sequence
const EXIT_DURATION = 400;  // ms for exit sequence

const BOOT_MESSAGES = [
  'DESCENDING INTO THE DUNGEON...',
  'WARMING UP THE RADAR...',
  'LOADING WORRIOR CANNONS...',
  'SUMMONING THE WORLINGS...',
  'LIGHTING THE MAZE...',
];

const EXIT_MESSAGES = [
  'THE DUNGEON FALLS SILENT',
  'WORRIOR RETIRED',
  'RADAR OFFLINE',
];

export const LOADING_FRAMES = [
  '[    ]',
  '[=   ]',
  '[==  ]',
  '[=== ]',
  '[====]',
  '[ ===]',
  '[  ==]',
  '[   =]',
];

const GLITCH_CHARS = '!@#$%^&*()_+-=[]{}|;:,.<>?/~`░▒▓█▀▄';

export interface TransitionOptions {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

function glitchText(length: number, random: () => number): string {
  let result = '';
  for (let i = 0; i < length; i++) {
    result += GLITCH_CHARS[Math.floor(random() * GLITCH_CHARS.length)];
  }
  return result;
}

function randomMessage(messages: readonly string[], random: () => number): string {
  return messages[Math.floor(random() * messages.length)];
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Boot transition - plays before the start screen
 */
export async function playBootTransition(terminal: GameTerminal, options: TransitionOptions = {}): Promise<void> {
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const themeColor = getCurrentThemeColor();
  const cols = terminal.cols;
  const centerX = Math.floor(cols / 2);

  terminal.write('\x1b[2J\x1b[H');

  // Quick glitch burst
  for (let i = 0; i < 3; i++) {
    const glitchY = Math.floor(random() * 10) + 5;
    terminal.write(`\x1b[${glitchY};1H\x1b[91m${glitchText(cols, random)}\x1b[0m`);
    await wait(30);
    terminal.write(`\x1b[${glitchY};1H${' '.repeat(cols)}`);
  }

  const bootMsg = randomMessage(BOOT_MESSAGES, random);
  const msgX = Math.max(1, centerX - Math.floor(bootMsg.length / 2));
  terminal.write(`\x1b[8;${msgX}H${themeColor}${bootMsg}\x1b[0m`);

  // Loading bar animation
  const barY = 10;
  const loadingLabel = 'LOADING: ';
  const barX = Math.max(1, centerX - Math.floor((loadingLabel.length + 8) / 2));

  for (const frame of LOADING_FRAMES) {
    terminal.write(`\x1b[${barY};${barX}H\x1b[2m${themeColor}${loadingLabel}${frame}\x1b[0m`);
    await wait(BOOT_DURATION / LOADING_FRAMES.length);
  }

  terminal.write(`\x1b[${barY};${barX}H${themeColor}\x1b[1m${loadingLabel}[DONE]\x1b[0m`);
  await wait(100);

  terminal.write('\x1b[2J\x1b[H');
}

/**
 * Exit transition - plays when the game quits back to the shell
 */
export async function playExitTransition(terminal: GameTerminal, options: TransitionOptions = {}): Promise<void> {
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const themeColor = getCurrentThemeColor();
  const { cols, rows } = terminal;
  const centerX = Math.floor(cols / 2);
  const centerY = Math.floor(rows / 2);

  const exitMsg = randomMessage(EXIT_MESSAGES, random);
  const msgX = Math.max(1, centerX - Math.floor(exitMsg.length / 2));

  // Flash the message
  for (let i = 0; i < 3; i++) {
    terminal.write(`\x1b[${centerY};${msgX}H\x1b[1;91m${exitMsg}\x1b[0m`);
    await wait(60);
    terminal.write(`\x1b[${centerY};${msgX}H${' '.repeat(exitMsg.length)}`);
    await wait(40);
  }
  terminal.write(`\x1b[${centerY};${msgX}H\x1b[2m${themeColor}${exitMsg}\x1b[0m`);
  await wait(150);

  // Screen wipe down
  for (let y = 1; y <= rows; y += 2) {
    terminal.write(`\x1b[${y};1H${' '.repeat(cols)}`);
    if (y + 1 <= rows) {
      terminal.write(`\x1b[${y + 1};1H${' '.repeat(cols)}`);
    }
    await wait(EXIT_DURATION / Math.max(1, rows / 2));
  }
}
