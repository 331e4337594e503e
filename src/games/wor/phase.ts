/**
 * Wor Phase Controller
 *
 * normal → bonusSpawning → bonusActive → bossSpawning → bossActive →
 * victory → normal (next dungeon). Any phase drops to gameOver when the
 * last life is gone. At most one transition per tick.
 */

import type { EnemyKind } from './config';
import { createEnemy, placePlayerAtSpawn } from './entities';
import {
  type TilePos,
  boxAt,
  boxesOverlap,
  isPortal,
  isWall,
  manhattan,
  openTiles,
  tileCenter,
  tileOf,
} from './maze';
import type { Enemy, GameEvent, Phase, World } from './types';

// ============================================================================
// Spawning
// ============================================================================

/** Fisher-Yates on a copy, driven by the world's random source */
export function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.min(i, Math.floor(random() * (i + 1)));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export function isValidSpawn(world: World, tile: TilePos): boolean {
  const { maze, config, player } = world;
  if (isWall(maze, tile.x, tile.y) || isPortal(maze, tile)) return false;
  if (manhattan(tile, tileOf(player)) < config.minSpawnDistance) return false;

  const center = tileCenter(tile);
  const box = boxAt(center.x, center.y, config.entitySize);
  if (player.alive && boxesOverlap(box, boxAt(player.x, player.y, player.size))) return false;
  return !world.enemies.some(enemy =>
    enemy.alive && boxesOverlap(box, boxAt(enemy.x, enemy.y, enemy.size)),
  );
}

/**
 * First valid tile of a shuffled candidate list, or the maze's fallback
 * spawn when every candidate is rejected.
 */
export function pickSpawnTile(world: World, maxRow = Number.POSITIVE_INFINITY): TilePos {
  const candidates = shuffle(
    openTiles(world.maze).filter(tile => tile.y <= maxRow),
    world.random,
  );
  return candidates.find(tile => isValidSpawn(world, tile)) ?? world.maze.fallbackSpawn;
}

export function spawnEnemy(world: World, kind: EnemyKind, maxRow?: number): Enemy {
  const tile = pickSpawnTile(world, maxRow);
  const enemy = createEnemy(world, kind, tile);
  world.enemies.push(enemy);
  world.events.push({ type: 'enemy-spawned', kind, x: enemy.x, y: enemy.y });
  return enemy;
}

export function spawnWave(world: World): void {
  for (const kind of world.config.waveKinds) {
    spawnEnemy(world, kind, world.config.enemySpawnMaxRow);
  }
}

// ============================================================================
// Transitions
// ============================================================================

export function aliveCount(world: World, kind?: EnemyKind): number {
  return world.enemies.filter(enemy => enemy.alive && (kind === undefined || enemy.kind === kind)).length;
}

function happened(events: readonly GameEvent[], type: GameEvent['type']): boolean {
  return events.some(event => event.type === type);
}

/** Fresh dungeon: empty board, player home, new wave */
function enterNormal(world: World): void {
  world.bullets = [];
  world.enemies = [];
  placePlayerAtSpawn(world, 0);
  spawnWave(world);
}

export function transition(world: World, to: Phase): void {
  const from = world.phase;
  world.phase = to;
  world.phaseTime = 0;
  world.events.push({ type: 'phase-changed', from, to });

  if (to === 'normal') enterNormal(world);
  if (to === 'gameOver') world.events.push({ type: 'game-over', score: world.player.score });
}

function nextDungeon(world: World): void {
  world.dungeon += 1;
  transition(world, 'normal');
}

/** Runs after combat and cleanup; reads this tick's events */
export function updatePhase(world: World, dt: number): void {
  if (world.phase === 'gameOver') return;
  world.phaseTime += dt;

  if (world.player.lives <= 0) {
    transition(world, 'gameOver');
    return;
  }

  const { config } = world;
  switch (world.phase) {
    case 'normal':
      if (aliveCount(world) === 0) transition(world, 'bonusSpawning');
      break;

    case 'bonusSpawning':
      if (world.phaseTime >= config.bonusSpawnDelay) {
        spawnEnemy(world, 'worluk');
        transition(world, 'bonusActive');
      }
      break;

    case 'bonusActive':
      if (aliveCount(world, 'worluk') === 0) transition(world, 'bossSpawning');
      break;

    case 'bossSpawning':
      if (world.phaseTime >= config.bossSpawnDelay) {
        spawnEnemy(world, 'wizard');
        transition(world, 'bossActive');
      }
      break;

    case 'bossActive':
      if (happened(world.events, 'wizard-defeated')) {
        transition(world, 'victory');
      } else if (happened(world.events, 'wizard-escaped')) {
        nextDungeon(world);
      }
      break;

    case 'victory':
      if (world.phaseTime >= config.victoryDuration) nextDungeon(world);
      break;
  }
}

/** Back to dungeon one with a full set of lives and no score */
export function restartGame(world: World): void {
  world.dungeon = 1;
  world.player.lives = world.config.startingLives;
  world.player.score = 0;
  world.warnedIds.clear();
  transition(world, 'normal');
}
