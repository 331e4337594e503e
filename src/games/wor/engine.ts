/**
 * Wor Engine - world creation and the per-tick pipeline
 *
 * Pure game logic, no rendering. One call to `tick` reads one input
 * snapshot, advances the world by a clamped `dt` and returns a frozen
 * frame snapshot carrying the events emitted on the way.
 */

import { type GameConfig, createGameConfig } from './config';
import { type AIContext, type EnemyDecision, decide, isDecisionPoint } from './ai';
import { resolveContacts, resolveHits, tryFire, updateBullets } from './combat';
import { createPlayer, placePlayerAtSpawn } from './entities';
import { type Maze, inBounds, loadMaze, tileCenter, tileOf } from './maze';
import { DUNGEON_LAYOUT } from './mazes';
import { directVelocity, laneVelocity, move } from './motion';
import { aliveCount, restartGame, spawnWave, updatePhase } from './phase';
import {
  type Body,
  type BulletSnapshot,
  type Enemy,
  type EntitySnapshot,
  type FrameSnapshot,
  type TickInput,
  type World,
  isHorizontal,
} from './types';

export { restartGame } from './phase';

// ============================================================================
// World
// ============================================================================

export interface WorldOptions {
  config?: Readonly<GameConfig>;
  maze?: Maze;
  random?: () => number;
}

export function createWorld(options: WorldOptions = {}): World {
  const config = options.config ?? createGameConfig();
  const maze = options.maze ?? loadMaze(DUNGEON_LAYOUT);

  const world: World = {
    config,
    maze,
    random: options.random ?? Math.random,
    tick: 0,
    phase: 'normal',
    phaseTime: 0,
    dungeon: 1,
    player: createPlayer(config, maze, 0),
    enemies: [],
    bullets: [],
    events: [],
    nextId: 1,
    warnedIds: new Set(),
  };

  spawnWave(world);
  return world;
}

// ============================================================================
// Timers
// ============================================================================

function countdown(value: number, dt: number): number {
  return Math.max(0, value - dt);
}

function advanceTimers(world: World, dt: number): void {
  const { config, player } = world;

  player.fireCooldown = countdown(player.fireCooldown, dt);
  player.invulnerable = countdown(player.invulnerable, dt);
  if (!player.alive && player.lives > 0) {
    player.respawnTimer = countdown(player.respawnTimer, dt);
    if (player.respawnTimer <= 0) {
      placePlayerAtSpawn(world, config.invulnerability);
      world.events.push({ type: 'player-respawned' });
    }
  }

  for (const enemy of world.enemies) {
    if (!enemy.alive) continue;
    enemy.age += dt;
    enemy.fireCooldown = countdown(enemy.fireCooldown, dt);

    switch (enemy.kind) {
      case 'garwor':
        enemy.cloakTimer = countdown(enemy.cloakTimer, dt);
        if (enemy.cloakTimer <= 0) {
          enemy.visible = !enemy.visible;
          enemy.cloakTimer = enemy.visible ? config.garworVisibleTime : config.garworCloakedTime;
        }
        break;
      case 'worluk':
        if (enemy.age >= config.worlukEscapeDelay) enemy.escapeIntent = true;
        break;
      case 'wizard':
        enemy.teleportTimer = countdown(enemy.teleportTimer, dt);
        if (config.wizardEscapes && enemy.age >= config.wizardEscapeDelay) enemy.escapeIntent = true;
        break;
      default:
        break;
    }
  }
}

// ============================================================================
// Motion
// ============================================================================

/** Revert a body that ended up off the grid; report each offender once */
function keepInGrid(world: World, id: number, body: Body, previous: { x: number; y: number }): void {
  if (inBounds(world.maze, body)) return;
  if (!world.warnedIds.has(id)) {
    world.warnedIds.add(id);
    console.warn(`[Motion] entity ${id} left the grid at ${body.x.toFixed(2)},${body.y.toFixed(2)}; reverting`);
  }
  body.x = previous.x;
  body.y = previous.y;
}

function movePlayer(world: World, input: TickInput, dt: number): void {
  const { config, player } = world;
  if (!player.alive) return;

  const directions = [...new Set(input.directions)];
  if (directions.length === 0) return;
  player.facing = directions[directions.length - 1];

  const velocity = directions.length === 1 && config.laneAssist
    ? laneVelocity(player, directions[0], config.playerSpeed, dt)
    : directVelocity(directions, config.playerSpeed);

  const previous = { x: player.x, y: player.y };
  const result = move(world.maze, player, velocity, dt);
  player.x = result.x;
  player.y = result.y;
  keepInGrid(world, player.id, player, previous);
}

interface PlannedMove {
  enemy: Enemy;
  decision: EnemyDecision;
  decided: boolean;
}

function applyEnemyMove(world: World, plan: PlannedMove, dt: number): void {
  const { enemy, decision } = plan;

  if (decision.teleportTo) {
    const center = tileCenter(decision.teleportTo);
    enemy.x = center.x;
    enemy.y = center.y;
    enemy.teleportTimer = world.config.wizardTeleportInterval;
    enemy.direction = null;
    enemy.lastDecisionTile = null;
    enemy.stalled = false;
    world.events.push({ type: 'wizard-teleported', x: enemy.x, y: enemy.y });
    return;
  }

  if (plan.decided) enemy.lastDecisionTile = tileOf(enemy);
  enemy.direction = decision.direction;
  if (decision.direction === null) return;
  enemy.facing = decision.direction;

  const previous = { x: enemy.x, y: enemy.y };
  const velocity = laneVelocity(enemy, decision.direction, enemy.speed, dt);
  const result = move(world.maze, enemy, velocity, dt);
  enemy.x = result.x;
  enemy.y = result.y;
  enemy.stalled = isHorizontal(decision.direction) ? result.blockedX : result.blockedY;

  if (result.wrapped && enemy.escapeIntent) {
    enemy.alive = false;
    world.events.push({ type: enemy.kind === 'wizard' ? 'wizard-escaped' : 'worluk-escaped' });
    return;
  }
  keepInGrid(world, enemy.id, enemy, previous);
}

// ============================================================================
// Tick
// ============================================================================

export function tick(world: World, input: TickInput, dt: number): FrameSnapshot {
  world.tick += 1;

  if (input.quit) return finishTick(world, true);
  if (input.restart) {
    restartGame(world);
    return finishTick(world, false);
  }
  if (world.phase === 'gameOver') return finishTick(world, false);

  const step = Math.min(Math.max(dt, 0), world.config.maxFrameDt);

  advanceTimers(world, step);

  // Everyone decides from the same pre-motion state
  const ctx: AIContext = {
    maze: world.maze,
    config: world.config,
    player: world.player,
    enemies: world.enemies,
    dungeon: world.dungeon,
    dt: step,
    random: world.random,
  };
  const plans: PlannedMove[] = world.enemies
    .filter(enemy => enemy.alive)
    .map(enemy => ({ enemy, decided: isDecisionPoint(enemy, step), decision: decide(enemy, ctx) }));

  movePlayer(world, input, step);
  for (const plan of plans) applyEnemyMove(world, plan, step);

  updateBullets(world, step);
  if (input.fire) tryFire(world, world.player);
  for (const { enemy, decision } of plans) {
    if (enemy.alive && decision.wantsFire) tryFire(world, enemy, decision.aim ?? undefined);
  }
  resolveHits(world);
  resolveContacts(world);

  world.enemies = world.enemies.filter(enemy => enemy.alive);
  world.bullets = world.bullets.filter(bullet => bullet.alive);

  updatePhase(world, step);
  return finishTick(world, false);
}

/** Snapshot the world, then start the next tick with an empty event list */
function finishTick(world: World, quit: boolean): FrameSnapshot {
  const frame = snapshot(world, quit);
  world.events = [];
  return frame;
}

// ============================================================================
// Snapshots
// ============================================================================

function freezeEntity(entity: EntitySnapshot): EntitySnapshot {
  return Object.freeze(entity);
}

export function snapshot(world: World, quit = false): FrameSnapshot {
  const { player } = world;

  const enemies = world.enemies.map(enemy => freezeEntity({
    id: enemy.id,
    kind: enemy.kind,
    x: enemy.x,
    y: enemy.y,
    size: enemy.size,
    facing: enemy.facing,
    visible: enemy.visible,
    alive: enemy.alive,
    invulnerable: false,
  }));

  const bullets: BulletSnapshot[] = world.bullets.map(bullet => Object.freeze({
    id: bullet.id,
    team: bullet.team,
    x: bullet.x,
    y: bullet.y,
    size: bullet.size,
    direction: bullet.direction,
  }));

  return Object.freeze({
    tick: world.tick,
    phase: world.phase,
    phaseTime: world.phaseTime,
    dungeon: world.dungeon,
    score: player.score,
    lives: player.lives,
    enemiesRemaining: aliveCount(world),
    player: freezeEntity({
      id: player.id,
      kind: 'player',
      x: player.x,
      y: player.y,
      size: player.size,
      facing: player.facing,
      visible: player.alive,
      alive: player.alive,
      invulnerable: player.invulnerable > 0,
    }),
    enemies: Object.freeze(enemies),
    bullets: Object.freeze(bullets),
    events: Object.freeze(world.events.map(event => Object.freeze({ ...event }))),
    quit,
  });
}
