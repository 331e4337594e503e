/**
 * Wor Combat - fire requests, bullet travel, hits and body contact
 */

import { fireCooldownFor } from './config';
import { createBullet, isEnemy, overlaps } from './entities';
import { move } from './motion';
import {
  type Bullet,
  type Direction,
  type Enemy,
  type Firer,
  type HitCause,
  type Player,
  type World,
  DIRECTION_VECTORS,
} from './types';

// ============================================================================
// Firing
// ============================================================================

export function liveBulletCount(world: World, ownerId: number): number {
  let count = 0;
  for (const bullet of world.bullets) {
    if (bullet.alive && bullet.ownerId === ownerId) count++;
  }
  return count;
}

/** Cooldown the firer waits after a shot; null for kinds that never shoot */
function cooldownAfterShot(world: World, firer: Firer): number | null {
  if (isEnemy(firer)) return fireCooldownFor(world.config, firer.kind, world.dungeon);
  return world.config.playerFireCooldown;
}

/**
 * Attempt a shot. Ignored while the cooldown runs; otherwise the cooldown
 * restarts even if the firer is at its live-bullet cap and nothing spawns.
 */
export function tryFire(world: World, firer: Firer, aim?: Direction): Bullet | null {
  if (!firer.alive || firer.fireCooldown > 0) return null;

  const cooldown = cooldownAfterShot(world, firer);
  if (cooldown === null) return null;

  if (aim) firer.facing = aim;
  firer.fireCooldown = cooldown;

  const team = isEnemy(firer) ? 'enemy' : 'player';
  const cap = team === 'player' ? world.config.playerMaxBullets : world.config.enemyMaxBullets;
  if (liveBulletCount(world, firer.id) >= cap) return null;

  const bullet = createBullet(world, firer, team, firer.id, firer.facing);
  world.bullets.push(bullet);
  world.events.push({ type: 'shot-fired', team, ownerId: firer.id });
  return bullet;
}

// ============================================================================
// Travel
// ============================================================================

export function updateBullets(world: World, dt: number): void {
  for (const bullet of world.bullets) {
    if (!bullet.alive) continue;

    const step = DIRECTION_VECTORS[bullet.direction];
    const velocity = { x: step.x * bullet.speed, y: step.y * bullet.speed };
    const result = move(world.maze, bullet, velocity, dt);

    if (result.blockedX || result.blockedY) {
      bullet.alive = false;
      world.events.push({ type: 'bullet-blocked', x: bullet.x, y: bullet.y });
      continue;
    }

    bullet.x = result.x;
    bullet.y = result.y;
    bullet.travelled += bullet.speed * dt;
    if (bullet.travelled >= bullet.range) bullet.alive = false;
  }
}

// ============================================================================
// Hits
// ============================================================================

export function isHittable(player: Player): boolean {
  return player.alive && player.invulnerable <= 0;
}

export function killEnemy(world: World, enemy: Enemy): void {
  enemy.alive = false;
  world.player.score += enemy.points;
  world.events.push({ type: 'enemy-killed', kind: enemy.kind, points: enemy.points, x: enemy.x, y: enemy.y });
  if (enemy.kind === 'wizard') world.events.push({ type: 'wizard-defeated' });
}

/**
 * Take a life. The player goes down and waits to respawn unless that was
 * the last one; declaring game over is left to the phase controller.
 */
export function damagePlayer(world: World, cause: HitCause): void {
  const player = world.player;
  player.lives = Math.max(0, player.lives - 1);
  player.alive = false;
  player.respawnTimer = player.lives > 0 ? world.config.respawnDelay : 0;
  world.events.push({ type: 'player-hit', lives: player.lives, cause });
}

/** Player shots hit enemies, enemy shots hit only the player */
export function resolveHits(world: World): void {
  const player = world.player;

  for (const bullet of world.bullets) {
    if (!bullet.alive) continue;

    if (bullet.team === 'player') {
      const target = world.enemies.find(enemy => enemy.alive && overlaps(bullet, enemy));
      if (target) {
        bullet.alive = false;
        killEnemy(world, target);
      }
    } else if (isHittable(player) && overlaps(bullet, player)) {
      bullet.alive = false;
      damagePlayer(world, 'bullet');
    }
  }
}

export function resolveContacts(world: World): void {
  const player = world.player;
  if (!isHittable(player)) return;

  if (world.enemies.some(enemy => enemy.alive && overlaps(enemy, player))) {
    damagePlayer(world, 'contact');
  }
}
