/**
 * Wor Renderer
 *
 * Turns a frame snapshot into one ANSI string. Reads nothing from the
 * world itself, so the same code draws live play, the start screen
 * backdrop and the frozen game-over frame.
 */

import { type EnemyKind, ENEMY_KINDS } from './config';
import { type Maze, isWall, manhattan, tileOf } from './maze';
import type { Direction, EntitySnapshot, FrameSnapshot, GameEvent, Phase } from './types';
import { type EffectsState, applyShake, isFlashVisible } from '../shared/effects';
import {
  getCurrentThemeColor,
  getSubtleBackgroundColor,
  getVerticalAnchor,
  isLightTheme,
} from '../utils';

// ============================================================================
// Layout
// ============================================================================

/** Screen columns per maze tile; terminal cells are about twice as tall as wide */
export const CELL_WIDTH = 2;
export const RADAR_WIDTH = 16;
export const RADAR_HEIGHT = 6;
const RADAR_GAP = 2;
const HEADER_ROWS = 2;
const FOOTER_ROWS = 1;

export interface ScreenLayout {
  /** Top-left corner of the maze border */
  boxLeft: number;
  boxTop: number;
  /** First screen cell inside the border */
  left: number;
  top: number;
  /** Maze interior in screen cells */
  width: number;
  height: number;
  radarLeft: number;
  radarTop: number;
  centerX: number;
}

export function minimumSize(maze: Maze): { cols: number; rows: number } {
  return {
    cols: maze.width * CELL_WIDTH + 2 + RADAR_GAP + RADAR_WIDTH + 2,
    rows: maze.height + 2 + HEADER_ROWS + FOOTER_ROWS,
  };
}

export function computeLayout(maze: Maze, cols: number, rows: number): ScreenLayout {
  const width = maze.width * CELL_WIDTH;
  const height = maze.height;
  const total = minimumSize(maze).cols;

  const boxLeft = Math.max(1, Math.floor((cols - total) / 2) + 1);
  const boxTop = getVerticalAnchor(rows, height + 2, {
    headerRows: HEADER_ROWS,
    footerRows: FOOTER_ROWS,
    minTop: HEADER_ROWS + 1,
  });

  return {
    boxLeft,
    boxTop,
    left: boxLeft + 1,
    top: boxTop + 1,
    width,
    height,
    radarLeft: boxLeft + width + 2 + RADAR_GAP,
    radarTop: boxTop,
    centerX: boxLeft + Math.floor(width / 2) + 1,
  };
}

// ============================================================================
// Sprites
// ============================================================================

export interface KindStyle {
  color: string;
  sprite: string;
  label: string;
}

export const KIND_STYLES: Readonly<Record<EnemyKind, KindStyle>> = {
  burwor: { color: '\x1b[96m', sprite: '◖◗', label: 'BURWOR' },
  garwor: { color: '\x1b[93m', sprite: '◢◣', label: 'GARWOR' },
  thorwor: { color: '\x1b[91m', sprite: '◤◥', label: 'THORWOR' },
  worluk: { color: '\x1b[95m', sprite: '◆◆', label: 'WORLUK' },
  wizard: { color: '\x1b[1;95m', sprite: 'ΨΨ', label: 'WIZARD' },
};

const PLAYER_SPRITES: Readonly<Record<Direction, string>> = {
  left: '◄█',
  right: '█►',
  up: '▲▲',
  down: '▼▼',
};

const BULLET_CHARS: Readonly<Record<Direction, string>> = {
  left: '─',
  right: '─',
  up: '│',
  down: '│',
};

/** A cloaked Garwor shows as a shimmer within this many tiles of the player */
export const CLOAK_REVEAL_TILES = 3;

export type Appearance = 'full' | 'faint' | 'hidden';

export function enemyAppearance(enemy: EntitySnapshot, frame: FrameSnapshot): Appearance {
  if (!enemy.alive) return 'hidden';
  if (enemy.kind === 'wizard') return frame.tick % 8 < 2 ? 'hidden' : 'full';
  if (enemy.visible) return 'full';
  if (!frame.player.alive) return 'hidden';
  return manhattan(tileOf(enemy), tileOf(frame.player)) <= CLOAK_REVEAL_TILES ? 'faint' : 'hidden';
}

export function playerAppearance(frame: FrameSnapshot): Appearance {
  const { player } = frame;
  if (!player.alive) return 'hidden';
  if (player.invulnerable && frame.tick % 10 >= 6) return 'hidden';
  return 'full';
}

/** Screen cell where a two-cell sprite centred on (x, y) starts */
export function spriteCell(layout: ScreenLayout, x: number, y: number): { col: number; row: number } {
  const col = layout.left + Math.round(x * CELL_WIDTH) - 1;
  return {
    col: Math.min(Math.max(col, layout.left), layout.left + layout.width - 2),
    row: layout.top + Math.floor(y),
  };
}

// ============================================================================
// HUD, banners, radar
// ============================================================================

export function hudLine(frame: FrameSnapshot): string {
  const lives = '♥'.repeat(Math.max(0, frame.lives));
  return `SCORE ${frame.score.toString().padStart(6, '0')}  DUNGEON ${frame.dungeon}  ${lives}  ENEMIES ${frame.enemiesRemaining}`;
}

function hasEvent(events: readonly GameEvent[], type: GameEvent['type']): boolean {
  return events.some(event => event.type === type);
}

/**
 * Events of the tick that started the current phase: `frame`'s own when
 * it changed phase, else `previous`.
 */
export function latchPhaseEvents(previous: readonly GameEvent[], frame: FrameSnapshot): readonly GameEvent[] {
  return hasEvent(frame.events, 'phase-changed') ? frame.events : previous;
}

/**
 * Banner for the current phase. `events` are those of the tick that
 * started it.
 */
export function bannerFor(phase: Phase, events: readonly GameEvent[]): string | null {
  switch (phase) {
    case 'gameOver':
      return 'GAME OVER';
    case 'victory':
      return 'DUNGEON CLEARED!';
    case 'bonusSpawning':
      return 'THE WORLUK APPEARS!';
    case 'bossSpawning':
      return hasEvent(events, 'worluk-escaped') ? 'THE WORLUK ESCAPED!' : 'I AM THE WIZARD OF WOR!';
    case 'normal':
      return hasEvent(events, 'wizard-escaped') ? 'THE WIZARD ESCAPED!' : null;
    default:
      return null;
  }
}

export interface RadarBlip {
  x: number;
  y: number;
  kind: EnemyKind;
}

/**
 * Enemy positions scaled onto a `width` x `height` minimap. Cloaked
 * Garwors still show.
 */
export function radarBlips(frame: FrameSnapshot, maze: Maze, width: number, height: number): RadarBlip[] {
  const blips: RadarBlip[] = [];
  for (const enemy of frame.enemies) {
    if (!enemy.alive || enemy.kind === 'player') continue;
    blips.push({
      x: Math.min(width - 1, Math.max(0, Math.floor((enemy.x / maze.width) * width))),
      y: Math.min(height - 1, Math.max(0, Math.floor((enemy.y / maze.height) * height))),
      kind: enemy.kind,
    });
  }
  return blips;
}

function renderRadar(frame: FrameSnapshot, maze: Maze, layout: ScreenLayout, frameColor: string): string {
  const { radarLeft: x, radarTop: y } = layout;
  const label = ' RADAR ';
  const side = Math.floor((RADAR_WIDTH - label.length) / 2);
  let output = `\x1b[${y};${x}H${frameColor}┌${'─'.repeat(side)}${label}${'─'.repeat(RADAR_WIDTH - side - label.length)}┐\x1b[0m`;
  for (let row = 0; row < RADAR_HEIGHT; row++) {
    output += `\x1b[${y + 1 + row};${x}H${frameColor}│\x1b[0m`;
    output += `\x1b[${y + 1 + row};${x + RADAR_WIDTH + 1}H${frameColor}│\x1b[0m`;
  }
  output += `\x1b[${y + RADAR_HEIGHT + 1};${x}H${frameColor}└${'─'.repeat(RADAR_WIDTH)}┘\x1b[0m`;

  for (const blip of radarBlips(frame, maze, RADAR_WIDTH, RADAR_HEIGHT)) {
    output += `\x1b[${y + 1 + blip.y};${x + 1 + blip.x}H${KIND_STYLES[blip.kind].color}▪\x1b[0m`;
  }

  // Legend under the radar
  let legendRow = y + RADAR_HEIGHT + 3;
  for (const kind of ENEMY_KINDS) {
    const style = KIND_STYLES[kind];
    output += `\x1b[${legendRow};${x + 1}H${style.color}${style.sprite}\x1b[0m \x1b[2m${style.label}\x1b[0m`;
    legendRow++;
  }
  return output;
}

// ============================================================================
// Frame
// ============================================================================

const TITLE = '▚▚ DUNGEONS OF WOR ▞▞';

export interface RenderOptions {
  banner?: string | null;
}

/**
 * Draw one frame. Consumes a frame of screen shake from `fx`.
 */
export function renderFrame(
  frame: FrameSnapshot,
  maze: Maze,
  layout: ScreenLayout,
  fx: EffectsState,
  options: RenderOptions = {},
): string {
  const themeColor = getCurrentThemeColor();
  const subtle = getSubtleBackgroundColor();
  const playerColor = isLightTheme() ? '\x1b[1;33m' : '\x1b[1;93m';

  let output = '\x1b[2J\x1b[H';

  const { offsetX, offsetY } = applyShake(fx.shake);
  const boxLeft = Math.max(1, layout.boxLeft + offsetX);
  const boxTop = Math.max(HEADER_ROWS + 1, layout.boxTop + offsetY);
  const view: ScreenLayout = { ...layout, boxLeft, boxTop, left: boxLeft + 1, top: boxTop + 1 };

  // Title and HUD
  output += `\x1b[1;${Math.max(1, layout.centerX - Math.floor(TITLE.length / 2))}H${themeColor}\x1b[1m${TITLE}\x1b[0m`;
  const hud = hudLine(frame);
  output += `\x1b[2;${Math.max(1, layout.centerX - Math.floor(hud.length / 2))}H${themeColor}${hud}\x1b[0m`;

  // Border, red while the hit flash strobes
  const borderColor = isFlashVisible(fx.flash) ? '\x1b[1;91m' : themeColor;
  const tunnelScreenRow = view.top + maze.tunnelRow;
  output += `\x1b[${view.boxTop};${view.boxLeft}H${borderColor}╔${'═'.repeat(view.width)}╗\x1b[0m`;
  for (let y = 0; y < view.height; y++) {
    const row = view.top + y;
    const edge = row === tunnelScreenRow ? ' ' : '║';
    output += `\x1b[${row};${view.boxLeft}H${borderColor}${edge}\x1b[0m`;
    output += `\x1b[${row};${view.left + view.width}H${borderColor}${edge}\x1b[0m`;
  }
  output += `\x1b[${view.top + view.height};${view.boxLeft}H${borderColor}╚${'═'.repeat(view.width)}╝\x1b[0m`;

  // Walls
  for (let ty = 0; ty < maze.height; ty++) {
    let line = '';
    for (let tx = 0; tx < maze.width; tx++) {
      line += isWall(maze, tx, ty) ? '██' : '  ';
    }
    output += `\x1b[${view.top + ty};${view.left}H${themeColor}${line}\x1b[0m`;
  }

  // Portal markers
  const [west, east] = maze.portals;
  output += `\x1b[${view.top + west.y};${view.left + west.x * CELL_WIDTH}H${subtle}◁ \x1b[0m`;
  output += `\x1b[${view.top + east.y};${view.left + east.x * CELL_WIDTH}H${subtle} ▷\x1b[0m`;

  // Enemies
  for (const enemy of frame.enemies) {
    if (enemy.kind === 'player') continue;
    const appearance = enemyAppearance(enemy, frame);
    if (appearance === 'hidden') continue;
    const { col, row } = spriteCell(view, enemy.x, enemy.y);
    const style = KIND_STYLES[enemy.kind];
    output += appearance === 'faint'
      ? `\x1b[${row};${col}H\x1b[2m${style.color}░░\x1b[0m`
      : `\x1b[${row};${col}H${style.color}${style.sprite}\x1b[0m`;
  }

  // Bullets
  for (const bullet of frame.bullets) {
    const col = view.left + Math.min(view.width - 1, Math.max(0, Math.floor(bullet.x * CELL_WIDTH)));
    const row = view.top + Math.floor(bullet.y);
    const color = bullet.team === 'player' ? '\x1b[1;97m' : '\x1b[1;91m';
    output += `\x1b[${row};${col}H${color}${BULLET_CHARS[bullet.direction]}\x1b[0m`;
  }

  // Player
  if (playerAppearance(frame) === 'full') {
    const { col, row } = spriteCell(view, frame.player.x, frame.player.y);
    output += `\x1b[${row};${col}H${playerColor}${PLAYER_SPRITES[frame.player.facing]}\x1b[0m`;
  }

  // Particles and popups, clipped to the maze
  for (const p of fx.particles) {
    const col = Math.round(view.left + p.x);
    const row = Math.round(view.top + p.y);
    if (col >= view.left && col < view.left + view.width && row >= view.top && row < view.top + view.height) {
      const alpha = p.life > 5 ? '' : '\x1b[2m';
      output += `\x1b[${row};${col}H${alpha}${p.color}${p.char}\x1b[0m`;
    }
  }
  for (const popup of fx.popups) {
    const col = Math.round(view.left + popup.x);
    const row = Math.round(view.top + popup.y);
    if (row >= view.top && row < view.top + view.height) {
      const alpha = popup.frames > 10 ? '\x1b[1m' : '\x1b[2m';
      output += `\x1b[${row};${Math.max(view.left, col)}H${alpha}${popup.color}${popup.text}\x1b[0m`;
    }
  }

  // Phase banner across the tunnel row
  if (options.banner) {
    const text = ` ${options.banner} `;
    const col = Math.max(1, layout.centerX - Math.floor(text.length / 2));
    const color = frame.phase === 'gameOver' ? '\x1b[1;91m' : '\x1b[1;93m';
    output += `\x1b[${layout.top + maze.tunnelRow};${col}H${color}\x1b[7m${text}\x1b[0m`;
  }

  output += renderRadar(frame, maze, layout, subtle);
  return output;
}

// ============================================================================
// Overlays
// ============================================================================

export function renderTooSmall(cols: number, rows: number, need: { cols: number; rows: number }): string {
  const themeColor = getCurrentThemeColor();
  const msg1 = 'Terminal too small!';
  const needWidth = cols < need.cols;
  const needHeight = rows < need.rows;
  let hint = '';
  if (needWidth && needHeight) {
    hint = 'Make pane larger';
  } else if (needWidth) {
    hint = 'Make pane wider →';
  } else {
    hint = 'Make pane taller ↓';
  }
  const msg2 = `Need: ${need.cols}×${need.rows}  Have: ${cols}×${rows}`;
  const centerX = Math.floor(cols / 2);
  const centerY = Math.floor(rows / 2);

  let output = '\x1b[2J\x1b[H';
  output += `\x1b[${Math.max(1, centerY - 1)};${Math.max(1, centerX - Math.floor(msg1.length / 2))}H${themeColor}${msg1}\x1b[0m`;
  output += `\x1b[${centerY + 1};${Math.max(1, centerX - Math.floor(msg2.length / 2))}H\x1b[2m${msg2}\x1b[0m`;
  output += `\x1b[${centerY + 3};${Math.max(1, centerX - Math.floor(hint.length / 2))}H\x1b[1m${themeColor}${hint}\x1b[0m`;
  return output;
}

export function renderStartOverlay(layout: ScreenLayout): string {
  const themeColor = getCurrentThemeColor();
  const row = layout.top + Math.floor(layout.height / 2) - 2;
  const lines: [string, string][] = [
    ['[ PRESS ANY KEY TO PLAY ]', `\x1b[5m${themeColor}`],
    ['', ''],
    ['←↑↓→/WASD MOVE  X STOP  SPC FIRE', `\x1b[2m${themeColor}`],
    ['ESC MENU  Q QUIT', `\x1b[2m${themeColor}`],
  ];

  let output = '';
  lines.forEach(([text, style], i) => {
    if (!text) return;
    const col = Math.max(1, layout.centerX - Math.floor(text.length / 2));
    output += `\x1b[${row + i};${col}H\x1b[40m${style}${text}\x1b[0m`;
  });
  return output;
}

export function renderGameOverOverlay(layout: ScreenLayout, frame: FrameSnapshot, highScore: number): string {
  const themeColor = getCurrentThemeColor();
  const row = layout.top + Math.floor(layout.height / 2) + 1;
  const scoreLine = `SCORE: ${frame.score}  HIGH: ${highScore}`;
  const hint = '╚ [R] RESTART  [Q] QUIT ╝';

  let output = `\x1b[${row};${Math.max(1, layout.centerX - Math.floor(scoreLine.length / 2))}H\x1b[40m${themeColor}${scoreLine}\x1b[0m`;
  output += `\x1b[${row + 1};${Math.max(1, layout.centerX - Math.floor(hint.length / 2))}H\x1b[40m\x1b[2m${themeColor}${hint}\x1b[0m`;
  return output;
}

export function renderPauseTitle(layout: ScreenLayout): { output: string; menuRow: number } {
  const themeColor = getCurrentThemeColor();
  const pauseMsg = '══ PAUSED ══';
  const pauseY = layout.top + Math.floor(layout.height / 2) - 3;
  const output = `\x1b[${pauseY};${layout.centerX - Math.floor(pauseMsg.length / 2)}H\x1b[5m${themeColor}${pauseMsg}\x1b[0m`;
  return { output, menuRow: pauseY + 2 };
}
