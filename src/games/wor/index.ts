/**
 * Dungeons of Wor
 *
 * Terminal front-end for the Wor simulation core: boot transition, start
 * screen, fixed-rate tick loop, rendering, effects and the pause menu.
 */

import { type GameConfig, createGameConfig } from './config';
import { applyEventEffects } from './effects';
import { createWorld, snapshot, tick } from './engine';
import type { Maze } from './maze';
import {
  bannerFor,
  computeLayout,
  latchPhaseEvents,
  minimumSize,
  renderFrame,
  renderGameOverOverlay,
  renderPauseTitle,
  renderStartOverlay,
  renderTooSmall,
} from './render';
import type { Direction, FrameSnapshot, GameEvent, TickInput } from './types';
import { clearEffects, createEffects, updateEffects } from '../shared/effects';
import { PAUSE_MENU_ITEMS, navigateMenu, pauseChoiceAt, renderSimpleMenu } from '../shared/menu';
import { playBootTransition, playExitTransition } from '../transitions';
import {
  type GameTerminal,
  type KeyPress,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
} from '../utils';

/**
 * Wor Game Controller
 */
export interface WorGameController {
  stop: () => void;
  readonly isRunning: boolean;
  /** Latest frame, for hosts that show score or phase elsewhere */
  readonly snapshot: FrameSnapshot;
}

export interface WorGameOptions {
  config?: Readonly<GameConfig>;
  maze?: Maze;
  random?: () => number;
  /** Play the boot and exit animations (default true) */
  transitions?: boolean;
  /** Called once the game has quit and left the alternate buffer */
  onQuit?: () => void;
}

/** Seconds a banner stays up at the start of a phase that has no end of its own */
const BANNER_SECONDS = 2;

const DIRECTION_KEYS: Readonly<Record<string, Direction>> = {
  arrowup: 'up',
  arrowdown: 'down',
  arrowleft: 'left',
  arrowright: 'right',
  w: 'up',
  s: 'down',
  a: 'left',
  d: 'right',
};

export function runWorGame(terminal: GameTerminal, options: WorGameOptions = {}): WorGameController {
  const config = options.config ?? createGameConfig();
  const world = createWorld({ config, maze: options.maze, random: options.random });
  const fx = createEffects();
  const need = minimumSize(world.maze);
  const dt = 1 / config.tickRate;
  const animate = options.transitions ?? true;

  let running = true;
  let started = false;
  let paused = false;
  let pauseMenuSelection = 0;
  let highScore = 0;

  // Latched input, consumed by the next tick
  let heading: Direction | null = null;
  let fireQueued = false;
  let restartQueued = false;

  let frame: FrameSnapshot = snapshot(world);
  let phaseEvents: readonly GameEvent[] = [];

  let loop: ReturnType<typeof setInterval> | null = null;
  let keyListener: { dispose(): void } | null = null;

  function teardown(): void {
    running = false;
    if (loop !== null) clearInterval(loop);
    loop = null;
    keyListener?.dispose();
    keyListener = null;
  }

  const controller: WorGameController = {
    stop: () => {
      if (!running) return;
      teardown();
      if (isInAlternateBuffer(terminal)) exitAlternateBuffer(terminal, 'wor stop');
    },
    get isRunning() { return running; },
    get snapshot() { return frame; },
  };

  function resetInput(): void {
    heading = null;
    fireQueued = false;
  }

  function step(): void {
    if (!running) return;

    if (started && !paused) {
      const input: TickInput = {
        directions: heading ? [heading] : [],
        fire: fireQueued,
        restart: restartQueued,
        quit: false,
      };
      fireQueued = false;
      if (restartQueued) {
        restartQueued = false;
        clearEffects(fx);
        resetInput();
      }

      frame = tick(world, input, dt);
      phaseEvents = latchPhaseEvents(phaseEvents, frame);
      applyEventEffects(fx, frame, world.maze.width, world.maze.height);
      highScore = Math.max(highScore, frame.score);
    }

    updateEffects(fx);
    render();
  }

  function currentBanner(): string | null {
    const banner = bannerFor(frame.phase, phaseEvents);
    if (frame.phase === 'normal' && frame.phaseTime >= BANNER_SECONDS) return null;
    return banner;
  }

  function render(): void {
    const { cols, rows } = terminal;
    if (cols < need.cols || rows < need.rows) {
      terminal.write(renderTooSmall(cols, rows, need));
      return;
    }

    const layout = computeLayout(world.maze, cols, rows);
    let output = renderFrame(frame, world.maze, layout, fx, { banner: currentBanner() });

    if (paused) {
      const title = renderPauseTitle(layout);
      output += title.output;
      output += renderSimpleMenu(PAUSE_MENU_ITEMS, pauseMenuSelection, {
        centerX: layout.centerX,
        startY: title.menuRow,
        showShortcuts: false,
      });
    } else if (!started) {
      output += renderStartOverlay(layout);
    } else if (frame.phase === 'gameOver') {
      output += renderGameOverOverlay(layout, frame, highScore);
    }

    terminal.write(output);
  }

  function quit(): void {
    teardown();
    const finish = (): void => {
      if (isInAlternateBuffer(terminal)) exitAlternateBuffer(terminal, 'wor quit');
      options.onQuit?.();
    };
    if (!animate) {
      finish();
      return;
    }
    playExitTransition(terminal)
      .catch((error: unknown) => {
        console.error('[WorGame] exit transition failed:', error);
      })
      .then(finish)
      .catch((error: unknown) => {
        console.error('[WorGame] quit handler failed:', error);
      });
  }

  function restart(): void {
    restartQueued = true;
    started = true;
    paused = false;
  }

  function handleKey({ domEvent }: KeyPress): void {
    const key = domEvent.key.toLowerCase();

    if (key === 'escape') {
      paused = !paused;
      if (paused) pauseMenuSelection = 0;
      return;
    }

    if (key === 'q' && (paused || !started || frame.phase === 'gameOver')) {
      quit();
      return;
    }

    if (paused) {
      const { newSelection, confirmed } = navigateMenu(pauseMenuSelection, PAUSE_MENU_ITEMS.length, key, domEvent);
      if (newSelection !== pauseMenuSelection) {
        pauseMenuSelection = newSelection;
        return;
      }
      if (confirmed) {
        switch (pauseChoiceAt(pauseMenuSelection)) {
          case 'resume':
            paused = false;
            break;
          case 'restart':
            restart();
            break;
          case 'quit':
            quit();
            break;
          default:
            break;
        }
        return;
      }
      if (key === 'r') restart();
      return;
    }

    // Start screen: any other key starts
    if (!started) {
      started = true;
      return;
    }

    if (key === 'r') {
      restart();
      return;
    }

    const direction = DIRECTION_KEYS[key];
    if (direction) {
      heading = direction;
    } else if (key === 'x') {
      heading = null;
    } else if (key === ' ') {
      fireQueued = true;
    }
  }

  function startLoop(): void {
    if (!running) return;
    render();
    loop = setInterval(step, Math.round(1000 / config.tickRate));
    keyListener = terminal.onKey(event => {
      if (!running) return;
      try {
        handleKey(event);
      } catch (error) {
        console.error('[WorGame] key handler failed:', error);
      }
    });
  }

  enterAlternateBuffer(terminal, 'wor');
  if (animate) {
    playBootTransition(terminal)
      .catch((error: unknown) => {
        console.error('[WorGame] boot transition failed:', error);
      })
      .then(startLoop)
      .catch((error: unknown) => {
        console.error('[WorGame] failed to start:', error);
        controller.stop();
      });
  } else {
    startLoop();
  }

  return controller;
}

export { createGameConfig, type GameConfig, type GameConfigOverrides } from './config';
export { loadMaze, type Maze } from './maze';
export { DUNGEON_LAYOUT, type MazeLayout } from './mazes';
