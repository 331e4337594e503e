/**
 * CLI entry point for wor-arcade
 *
 * Parses flags, wires stdin/stdout into the game runner through the Node
 * terminal adapter, and branches to the interactive `setup` command.
 */

import { type CliOptions, SPEED_PRESETS, parseCliArgs } from './args';
import { createGameConfig, type GameConfigOverrides } from './games/wor/config';
import { runWorGame } from './games/wor';
import { setTheme } from './games/utils';
import { createNodeTerminal } from './nodeTerminal';
import type { SetupChoices } from './setup';
import { getThemeInfo, getThemeModes, type ThemeMode } from './themes';

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  wor-arcade — Dungeons of Wor in your terminal

  Usage:
    wor-arcade                       Play
    wor-arcade setup                 Pick theme, enemy speed and Wizard rules, then play
    wor-arcade --theme <theme>       Set color theme
    wor-arcade --lives <n>           Starting lives (default 3)
    wor-arcade --speed <preset>      Enemy speed: ${Object.keys(SPEED_PRESETS).join(', ')}
    wor-arcade --wizard-escape       The Wizard of Wor leaves if you are too slow
    wor-arcade --themes              List themes
    wor-arcade --help                Show this help

  Controls:
    Arrow keys / WASD    Move (keeps going until a wall or X)
    X                    Stop
    Space                Fire
    ESC                  Pause menu
    R                    Restart
    Q                    Quit (start screen, pause, game over)

  Examples:
    wor-arcade --theme amber
    wor-arcade --lives 5 --wizard-escape
`);
}

function printThemes() {
  for (const mode of getThemeModes()) {
    console.log(`  ${mode.padEnd(12)} ${getThemeInfo(mode).hint}`);
  }
}

// ---------------------------------------------------------------------------
// Game lifecycle
// ---------------------------------------------------------------------------

function play(theme: ThemeMode, overrides: GameConfigOverrides) {
  // Validate before touching the terminal so errors print on a sane screen
  const config = createGameConfig(overrides);
  setTheme(theme);

  const terminal = createNodeTerminal();
  runWorGame(terminal, {
    config,
    onQuit: () => {
      terminal.cleanup();
      process.exit(0);
    },
  });
}

function fail(error: unknown): never {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}

function runSetup() {
  import('./setup')
    .then(m => m.setupCommand())
    .then((choices: SetupChoices | null) => {
      if (!choices) process.exit(0);
      play(choices.theme, choices.overrides);
    })
    .catch(fail);
}

function main() {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    fail(error);
  }

  switch (options.command) {
    case 'help':
      printHelp();
      return;
    case 'themes':
      printThemes();
      return;
    case 'setup':
      runSetup();
      return;
    case 'play':
      try {
        play(options.theme, options.overrides);
      } catch (error) {
        fail(error);
      }
      return;
  }
}

main();
