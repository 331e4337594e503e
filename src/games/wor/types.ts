/**
 * Wor - Shared Types
 */

import type { EnemyKind, GameConfig } from './config';
import type { Maze, TilePos, Vec2 } from './maze';

// ============================================================================
// Directions
// ============================================================================

export type Direction = 'up' | 'down' | 'left' | 'right';

/** Preference order for ties: horizontal before vertical */
export const DIRECTION_ORDER: readonly Direction[] = ['left', 'right', 'up', 'down'];

export const DIRECTION_VECTORS: Readonly<Record<Direction, Readonly<Vec2>>> = {
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
};

const OPPOSITES: Readonly<Record<Direction, Direction>> = {
  left: 'right',
  right: 'left',
  up: 'down',
  down: 'up',
};

export function opposite(direction: Direction): Direction {
  return OPPOSITES[direction];
}

export function isHorizontal(direction: Direction): boolean {
  return direction === 'left' || direction === 'right';
}

// ============================================================================
// Entities
// ============================================================================

export type Phase =
  | 'normal'
  | 'bonusSpawning'
  | 'bonusActive'
  | 'bossSpawning'
  | 'bossActive'
  | 'victory'
  | 'gameOver';

export type Team = 'player' | 'enemy';

/** Square bounding box around a center point */
export interface Body {
  x: number;
  y: number;
  size: number;
}

export interface Player extends Body {
  id: number;
  facing: Direction;
  alive: boolean;
  lives: number;
  score: number;
  fireCooldown: number;
  /** Grace time left after a respawn */
  invulnerable: number;
  /** Time left before a downed player reappears */
  respawnTimer: number;
}

export interface Enemy extends Body {
  id: number;
  kind: EnemyKind;
  facing: Direction;
  alive: boolean;
  points: number;
  speed: number;
  fireCooldown: number;
  visible: boolean;
  cloakTimer: number;
  escapeIntent: boolean;
  teleportTimer: number;
  age: number;
  direction: Direction | null;
  lastDecisionTile: TilePos | null;
  stalled: boolean;
}

export interface Bullet extends Body {
  id: number;
  team: Team;
  ownerId: number;
  direction: Direction;
  speed: number;
  travelled: number;
  range: number;
  alive: boolean;
}

/** Anything that can pull a trigger */
export type Firer = Player | Enemy;

// ============================================================================
// Events
// ============================================================================

export type HitCause = 'bullet' | 'contact';

export type GameEvent =
  | { type: 'enemy-killed'; kind: EnemyKind; points: number; x: number; y: number }
  | { type: 'player-hit'; lives: number; cause: HitCause }
  | { type: 'worluk-escaped' }
  | { type: 'wizard-escaped' }
  | { type: 'wizard-defeated' }
  | { type: 'phase-changed'; from: Phase; to: Phase }
  | { type: 'game-over'; score: number }
  | { type: 'enemy-spawned'; kind: EnemyKind; x: number; y: number }
  | { type: 'shot-fired'; team: Team; ownerId: number }
  | { type: 'bullet-blocked'; x: number; y: number }
  | { type: 'wizard-teleported'; x: number; y: number }
  | { type: 'player-respawned' };

export type GameEventType = GameEvent['type'];

// ============================================================================
// World
// ============================================================================

export interface World {
  readonly config: Readonly<GameConfig>;
  readonly maze: Maze;
  readonly random: () => number;
  tick: number;
  phase: Phase;
  phaseTime: number;
  dungeon: number;
  player: Player;
  enemies: Enemy[];
  bullets: Bullet[];
  /** Events emitted during the tick in progress */
  events: GameEvent[];
  nextId: number;
  /** Entities already reported for leaving the grid */
  warnedIds: Set<number>;
}

// ============================================================================
// Boundary
// ============================================================================

export interface TickInput {
  /** Held directions; more than one means diagonal intent */
  directions: readonly Direction[];
  fire: boolean;
  restart: boolean;
  quit: boolean;
}

export const IDLE_INPUT: Readonly<TickInput> = {
  directions: [],
  fire: false,
  restart: false,
  quit: false,
};

export interface EntitySnapshot {
  readonly id: number;
  readonly kind: EnemyKind | 'player';
  readonly x: number;
  readonly y: number;
  readonly size: number;
  readonly facing: Direction;
  readonly visible: boolean;
  readonly alive: boolean;
  readonly invulnerable: boolean;
}

export interface BulletSnapshot {
  readonly id: number;
  readonly team: Team;
  readonly x: number;
  readonly y: number;
  readonly size: number;
  readonly direction: Direction;
}

export interface FrameSnapshot {
  readonly tick: number;
  readonly phase: Phase;
  readonly phaseTime: number;
  readonly dungeon: number;
  readonly score: number;
  readonly lives: number;
  readonly enemiesRemaining: number;
  readonly player: EntitySnapshot;
  readonly enemies: readonly EntitySnapshot[];
  readonly bullets: readonly BulletSnapshot[];
  readonly events: readonly GameEvent[];
  readonly quit: boolean;
}
