/**
 * Command-line arguments for wor-arcade
 */

import type { GameConfigOverrides } from './games/wor/config';
import { DEFAULT_THEME, getThemeModes, isValidThemeMode, type ThemeMode } from './themes';

export type CliCommand = 'play' | 'setup' | 'help' | 'themes';

export interface CliOptions {
  command: CliCommand;
  theme: ThemeMode;
  overrides: GameConfigOverrides;
}

// ---------------------------------------------------------------------------
// Enemy speed presets (tiles per second, every kind)
// ---------------------------------------------------------------------------

export const SPEED_PRESETS = {
  slow: 2.5,
  normal: 3.5,
  fast: 4.5,
} as const;

export type SpeedPreset = keyof typeof SPEED_PRESETS;

export function isSpeedPreset(value: string): value is SpeedPreset {
  return Object.prototype.hasOwnProperty.call(SPEED_PRESETS, value);
}

export function speedOverrides(preset: SpeedPreset): GameConfigOverrides['kinds'] {
  const speed = SPEED_PRESETS[preset];
  return {
    burwor: { speed },
    garwor: { speed },
    thorwor: { speed },
    worluk: { speed },
    wizard: { speed },
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function fail(message: string): never {
  throw new Error(`[CLI] ${message}`);
}

function valueAfter(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) fail(`${flag} needs a value`);
  return value;
}

/**
 * Parse argv (without the node and script entries). Throws `[CLI]` errors
 * for unknown flags and bad values.
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { command: 'play', theme: DEFAULT_THEME, overrides: {} };

  let i = 0;
  if (args[0] === 'setup') {
    options.command = 'setup';
    i = 1;
  }

  for (; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        options.command = 'help';
        break;
      case '--themes':
        options.command = 'themes';
        break;
      case '--theme': {
        const theme = valueAfter(args, i, arg);
        if (!isValidThemeMode(theme)) {
          fail(`Unknown theme "${theme}". Available: ${getThemeModes().join(', ')}`);
        }
        options.theme = theme;
        i++;
        break;
      }
      case '--lives': {
        const raw = valueAfter(args, i, arg);
        const lives = Number(raw);
        if (!Number.isInteger(lives) || lives <= 0) {
          fail(`--lives needs a positive whole number (got ${raw})`);
        }
        options.overrides.startingLives = lives;
        i++;
        break;
      }
      case '--speed': {
        const preset = valueAfter(args, i, arg);
        if (!isSpeedPreset(preset)) {
          fail(`Unknown speed "${preset}". Available: ${Object.keys(SPEED_PRESETS).join(', ')}`);
        }
        options.overrides.kinds = speedOverrides(preset);
        i++;
        break;
      }
      case '--wizard-escape':
        options.overrides.wizardEscapes = true;
        break;
      default:
        fail(`Unknown option: ${arg}`);
    }
  }

  return options;
}
