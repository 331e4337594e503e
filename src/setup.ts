/**
 * `wor-arcade setup` - pick a theme, enemy speed and Wizard rules
 * through clack prompts before the game starts.
 */

import * as p from '@clack/prompts';
import { type SpeedPreset, SPEED_PRESETS, isSpeedPreset, speedOverrides } from './args';
import type { GameConfigOverrides } from './games/wor/config';
import { getThemeInfo, getThemeModes, isValidThemeMode, type ThemeMode } from './themes';

export interface SetupChoices {
  theme: ThemeMode;
  overrides: GameConfigOverrides;
}

const SPEED_HINTS: Record<SpeedPreset, string> = {
  slow: 'room to breathe',
  normal: 'arcade pace',
  fast: 'the Worlings are hungry',
};

/**
 * Run the prompts. Resolves to null when the player cancels.
 */
export async function setupCommand(): Promise<SetupChoices | null> {
  p.intro('wor-arcade setup');

  const theme = await p.select({
    message: 'Cabinet colors',
    options: getThemeModes().map(mode => ({
      value: mode,
      label: mode,
      hint: getThemeInfo(mode).hint,
    })),
  });
  if (p.isCancel(theme) || typeof theme !== 'string' || !isValidThemeMode(theme)) {
    p.cancel('Cancelled.');
    return null;
  }

  const speed = await p.select({
    message: 'Enemy speed',
    initialValue: 'normal',
    options: Object.keys(SPEED_PRESETS).map(preset => ({
      value: preset,
      label: preset,
      hint: isSpeedPreset(preset) ? SPEED_HINTS[preset] : undefined,
    })),
  });
  if (p.isCancel(speed) || typeof speed !== 'string' || !isSpeedPreset(speed)) {
    p.cancel('Cancelled.');
    return null;
  }

  const wizardEscapes = await p.confirm({
    message: 'Let the Wizard escape if you are too slow?',
    initialValue: false,
  });
  if (p.isCancel(wizardEscapes)) {
    p.cancel('Cancelled.');
    return null;
  }

  p.log.info('Arrows / WASD move, Space fires, X stops, Esc pauses.');
  p.outro('Good luck, Worrior!');

  return {
    theme,
    overrides: { kinds: speedOverrides(speed), wizardEscapes },
  };
}
