/**
 * Wor - Entity Factories
 */

import { type EnemyKind, type GameConfig, fireCooldownFor } from './config';
import { type Maze, type TilePos, boxAt, boxesOverlap, tileCenter } from './maze';
import type { Body, Bullet, Direction, Enemy, Player, Team, World } from './types';

export function nextId(world: World): number {
  const id = world.nextId;
  world.nextId += 1;
  return id;
}

export function createPlayer(config: Readonly<GameConfig>, maze: Maze, id: number): Player {
  const spawn = tileCenter(maze.playerSpawn);
  return {
    id,
    x: spawn.x,
    y: spawn.y,
    size: config.entitySize,
    facing: 'right',
    alive: true,
    lives: config.startingLives,
    score: 0,
    fireCooldown: 0,
    invulnerable: 0,
    respawnTimer: 0,
  };
}

/** Put the player back on its spawn tile, up and ready */
export function placePlayerAtSpawn(world: World, invulnerable: number): void {
  const spawn = tileCenter(world.maze.playerSpawn);
  const player = world.player;
  player.x = spawn.x;
  player.y = spawn.y;
  player.facing = 'right';
  player.alive = true;
  player.fireCooldown = 0;
  player.respawnTimer = 0;
  player.invulnerable = invulnerable;
}

export function createEnemy(world: World, kind: EnemyKind, tile: TilePos): Enemy {
  const { config } = world;
  const profile = config.kinds[kind];
  const center = tileCenter(tile);
  return {
    id: nextId(world),
    kind,
    x: center.x,
    y: center.y,
    size: config.entitySize,
    facing: 'left',
    alive: true,
    points: profile.points,
    speed: profile.speed,
    // Nobody shoots the moment they appear
    fireCooldown: fireCooldownFor(config, kind, world.dungeon) ?? 0,
    visible: true,
    cloakTimer: kind === 'garwor' ? config.garworVisibleTime : 0,
    escapeIntent: false,
    teleportTimer: kind === 'wizard' ? config.wizardTeleportInterval : 0,
    age: 0,
    direction: null,
    lastDecisionTile: null,
    stalled: false,
  };
}

export function createBullet(world: World, from: Body, team: Team, ownerId: number, direction: Direction): Bullet {
  const { config } = world;
  return {
    id: nextId(world),
    x: from.x,
    y: from.y,
    size: config.bulletSize,
    team,
    ownerId,
    direction,
    speed: config.bulletSpeed,
    travelled: 0,
    range: config.bulletRange,
    alive: true,
  };
}

export function overlaps(a: Body, b: Body): boolean {
  return boxesOverlap(boxAt(a.x, a.y, a.size), boxAt(b.x, b.y, b.size));
}

export function isEnemy(firer: Player | Enemy): firer is Enemy {
  return 'kind' in firer;
}
