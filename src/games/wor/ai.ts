/**
 * Wor AI - per-kind enemy policies
 *
 * Every enemy re-plans only at decision points (tile centres, stalls,
 * no heading yet) and otherwise keeps going. Decisions are read-only:
 * the engine applies them after every enemy has decided.
 */

import { type GameConfig, fireCooldownFor } from './config';
import {
  type Maze,
  type TilePos,
  isPortal,
  isWall,
  manhattan,
  nearestPortal,
  openTiles,
  portalDistance,
  sameTile,
  tileCenter,
  tileOf,
} from './maze';
import {
  type Direction,
  type Enemy,
  type Player,
  DIRECTION_ORDER,
  DIRECTION_VECTORS,
  opposite,
} from './types';

// ============================================================================
// Types
// ============================================================================

export interface AIContext {
  maze: Maze;
  config: Readonly<GameConfig>;
  player: Player;
  /** Everyone on the board, the deciding enemy included */
  enemies: readonly Enemy[];
  dungeon: number;
  dt: number;
  random: () => number;
}

export interface EnemyDecision {
  direction: Direction | null;
  wantsFire: boolean;
  aim: Direction | null;
  teleportTo: TilePos | null;
}

// ============================================================================
// Pathing
// ============================================================================

export function neighborTile(tile: TilePos, direction: Direction): TilePos {
  const step = DIRECTION_VECTORS[direction];
  return { x: tile.x + step.x, y: tile.y + step.y };
}

export function openDirections(maze: Maze, tile: TilePos): Direction[] {
  return DIRECTION_ORDER.filter(direction => {
    const next = neighborTile(tile, direction);
    return !isWall(maze, next.x, next.y);
  });
}

function pickRandom<T>(items: readonly T[], random: () => number): T {
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

/**
 * Greedy one-step chase. Occasionally wanders; otherwise takes the first
 * open direction (left, right, up, down) that gets closer to the target.
 */
export function chooseDirection(
  maze: Maze,
  fromTile: TilePos,
  target: TilePos,
  current: Direction | null,
  random: () => number,
  wanderChance: number,
): Direction | null {
  const candidates = openDirections(maze, fromTile);
  if (candidates.length === 0) return null;

  if (wanderChance > 0 && random() < wanderChance) {
    return pickRandom(candidates, random);
  }

  const distance = manhattan(fromTile, target);
  const closer = candidates.find(d => manhattan(neighborTile(fromTile, d), target) < distance);
  if (closer) return closer;

  if (current && candidates.includes(current)) return current;

  // Dead end: reversing is the last resort
  const forward = candidates.find(d => current === null || d !== opposite(current));
  return forward ?? candidates[0];
}

/**
 * Next step along the shortest open route to a portal: the first open
 * direction (left, right, up, down) with the fewest steps left. With no
 * route on record, line up with the tunnel row, then run for the nearer
 * edge.
 */
export function escapeDirection(maze: Maze, fromTile: TilePos): Direction | null {
  const candidates = openDirections(maze, fromTile);

  let best: Direction | null = null;
  let bestDistance = portalDistance(maze, fromTile);
  for (const direction of candidates) {
    const distance = portalDistance(maze, neighborTile(fromTile, direction));
    if (distance < bestDistance) {
      best = direction;
      bestDistance = distance;
    }
  }
  if (best) return best;

  const portal = nearestPortal(maze, fromTile);
  const fallback: (Direction | null)[] = [
    fromTile.y < maze.tunnelRow ? 'down' : fromTile.y > maze.tunnelRow ? 'up' : null,
    portal.x < fromTile.x ? 'left' : 'right',
  ];
  for (const direction of fallback) {
    if (direction && candidates.includes(direction)) return direction;
  }
  return candidates[0] ?? null;
}

/** Within one step of the centre of a tile not yet decided in, or stuck */
export function isDecisionPoint(enemy: Enemy, dt: number): boolean {
  if (enemy.direction === null || enemy.stalled) return true;

  const tile = tileOf(enemy);
  if (sameTile(tile, enemy.lastDecisionTile)) return false;

  const center = tileCenter(tile);
  const tolerance = Math.max(0.05, enemy.speed * dt);
  return Math.abs(enemy.x - center.x) <= tolerance && Math.abs(enemy.y - center.y) <= tolerance;
}

// ============================================================================
// Firing
// ============================================================================

/**
 * Aim along the shared column (vertical) or row (horizontal) when the
 * player is lined up, else null.
 */
export function aimAt(from: { x: number; y: number }, player: Player, tolerance: number): Direction | null {
  const dx = player.x - from.x;
  const dy = player.y - from.y;
  if (Math.abs(dx) < tolerance) return dy < 0 ? 'up' : 'down';
  if (Math.abs(dy) < tolerance) return dx < 0 ? 'left' : 'right';
  return null;
}

function fireDecision(enemy: Enemy, ctx: AIContext): { wantsFire: boolean; aim: Direction | null } {
  const cooldown = fireCooldownFor(ctx.config, enemy.kind, ctx.dungeon);
  if (cooldown === null || enemy.fireCooldown > 0 || !ctx.player.alive) {
    return { wantsFire: false, aim: null };
  }
  const aim = aimAt(enemy, ctx.player, ctx.config.alignTolerance);
  return { wantsFire: aim !== null, aim };
}

// ============================================================================
// Teleport
// ============================================================================

/**
 * A random open tile away from the player and clear of every other live
 * body, or the maze's fallback spawn when nothing qualifies.
 */
export function pickTeleportTile(enemy: Enemy, ctx: AIContext): TilePos {
  const playerTile = tileOf(ctx.player);
  const taken = ctx.enemies
    .filter(other => other.alive && other.id !== enemy.id)
    .map(other => tileOf(other));

  const candidates = openTiles(ctx.maze).filter(tile =>
    !isPortal(ctx.maze, tile)
    && manhattan(tile, playerTile) >= ctx.config.minSpawnDistance
    && !sameTile(tile, playerTile)
    && !taken.some(other => sameTile(other, tile)),
  );

  if (candidates.length === 0) return ctx.maze.fallbackSpawn;
  return pickRandom(candidates, ctx.random);
}

// ============================================================================
// Policies
// ============================================================================

function steer(enemy: Enemy, ctx: AIContext, target: TilePos, wanderChance: number): Direction | null {
  if (!isDecisionPoint(enemy, ctx.dt)) return enemy.direction;
  return chooseDirection(ctx.maze, tileOf(enemy), target, enemy.direction, ctx.random, wanderChance);
}

function chase(enemy: Enemy, ctx: AIContext): Direction | null {
  return steer(enemy, ctx, tileOf(ctx.player), ctx.config.wanderChance);
}

/** Head for the closest portal, then straight out through it */
function flee(enemy: Enemy, ctx: AIContext): Direction | null {
  const tile = tileOf(enemy);
  if (isPortal(ctx.maze, tile)) {
    return tile.x === 0 ? 'left' : 'right';
  }
  if (!isDecisionPoint(enemy, ctx.dt)) return enemy.direction;
  return escapeDirection(ctx.maze, tile);
}

export function decide(enemy: Enemy, ctx: AIContext): EnemyDecision {
  switch (enemy.kind) {
    case 'burwor':
      return { direction: chase(enemy, ctx), wantsFire: false, aim: null, teleportTo: null };

    case 'garwor':
    case 'thorwor':
      return { direction: chase(enemy, ctx), ...fireDecision(enemy, ctx), teleportTo: null };

    case 'worluk':
      return {
        direction: enemy.escapeIntent ? flee(enemy, ctx) : chase(enemy, ctx),
        wantsFire: false,
        aim: null,
        teleportTo: null,
      };

    case 'wizard': {
      if (enemy.escapeIntent) {
        return { direction: flee(enemy, ctx), wantsFire: false, aim: null, teleportTo: null };
      }
      const teleportTo = enemy.teleportTimer <= 0 ? pickTeleportTile(enemy, ctx) : null;
      return { direction: chase(enemy, ctx), ...fireDecision(enemy, ctx), teleportTo };
    }
  }
}
