/**
 * wor-arcade
 *
 * Dungeons of Wor for xterm.js and the CLI: a deterministic maze-shooter
 * simulation core plus an ANSI front-end.
 *
 * Library usage (xterm.js):
 *   import { runWorGame, setTheme } from 'wor-arcade';
 *   setTheme('amber');
 *   const controller = runWorGame(terminal);
 *
 * Headless usage:
 *   import { createWorld, tick } from 'wor-arcade';
 *   const world = createWorld();
 *   const frame = tick(world, { directions: ['left'], fire: true, restart: false, quit: false }, 1 / 60);
 *
 * CLI usage:
 *   npx wor-arcade
 */

// Simulation core
export { createWorld, snapshot, tick, restartGame, type WorldOptions } from './games/wor/engine';
export {
  createGameConfig,
  fireCooldownFor,
  DEFAULT_CONFIG,
  DEFAULT_KINDS,
  ENEMY_KINDS,
  type EnemyKind,
  type GameConfig,
  type GameConfigOverrides,
  type KindProfile,
} from './games/wor/config';
export {
  loadMaze,
  isWall,
  collides,
  wrapIfTunnel,
  type Maze,
  type Tile,
  type TilePos,
  type Vec2,
  type Box,
} from './games/wor/maze';
export { DUNGEON_LAYOUT, type MazeLayout } from './games/wor/mazes';
export { move, type MoveResult } from './games/wor/motion';
export {
  IDLE_INPUT,
  type BulletSnapshot,
  type Direction,
  type EntitySnapshot,
  type FrameSnapshot,
  type GameEvent,
  type GameEventType,
  type HitCause,
  type Phase,
  type Team,
  type TickInput,
  type World,
} from './games/wor/types';

// Terminal front-end
export { runWorGame, type WorGameController, type WorGameOptions } from './games/wor';
export {
  bannerFor,
  computeLayout,
  minimumSize,
  radarBlips,
  renderFrame,
  type RadarBlip,
  type ScreenLayout,
} from './games/wor/render';
export { applyEventEffects } from './games/wor/effects';
export { createEffects, type EffectsState } from './games/shared/effects';

// Theme utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  isLightTheme,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  type GameTerminal,
  type KeyPress,
  type Disposable,
} from './games/utils';
export { getThemeModes, isValidThemeMode, type ThemeMode } from './themes';
