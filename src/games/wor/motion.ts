/**
 * Wor - Entity Motion
 *
 * Axis-separated movement shared by the player, enemies and bullets.
 * X is tried alone, then Y from wherever X left the body, so pushing into
 * a wall diagonally slides along it. A move blocked on both axes halts.
 */

import { boxAt, collides, wrapIfTunnel } from './maze';
import type { Maze, Vec2 } from './maze';
import { DIRECTION_VECTORS } from './types';
import type { Body, Direction } from './types';

export interface MoveResult {
  x: number;
  y: number;
  blockedX: boolean;
  blockedY: boolean;
  /** Crossed the tunnel edge during the X step */
  wrapped: boolean;
}

export function move(maze: Maze, body: Body, velocity: Vec2, dt: number): MoveResult {
  let x = body.x;
  let y = body.y;
  let blockedX = false;
  let blockedY = false;
  let wrapped = false;

  const dx = velocity.x * dt;
  if (dx !== 0) {
    const nextX = x + dx;
    if (collides(maze, boxAt(nextX, y, body.size))) {
      blockedX = true;
    } else {
      const landed = wrapIfTunnel(maze, { x: nextX, y });
      wrapped = landed.x !== nextX;
      x = landed.x;
    }
  }

  const dy = velocity.y * dt;
  if (dy !== 0) {
    const nextY = y + dy;
    if (collides(maze, boxAt(x, nextY, body.size))) {
      blockedY = true;
    } else {
      y = nextY;
    }
  }

  return { x, y, blockedX, blockedY, wrapped };
}

/** Velocity that closes `offset` this tick without exceeding `speed` */
function centering(offset: number, speed: number, dt: number): number {
  if (offset === 0 || dt <= 0) return 0;
  return Math.sign(offset) * Math.min(Math.abs(offset) / dt, speed);
}

/**
 * Full speed along `direction` plus a perpendicular pull toward the centre
 * line of the current lane, so a body a little off-centre still turns into
 * a corridor one tile wide.
 */
export function laneVelocity(body: Vec2, direction: Direction, speed: number, dt: number): Vec2 {
  const unit = DIRECTION_VECTORS[direction];
  if (unit.x !== 0) {
    const offset = Math.floor(body.y) + 0.5 - body.y;
    return { x: unit.x * speed, y: centering(offset, speed, dt) };
  }
  const offset = Math.floor(body.x) + 0.5 - body.x;
  return { x: centering(offset, speed, dt), y: unit.y * speed };
}

/** Straight velocity for one or two held directions, no lane pull */
export function directVelocity(directions: readonly Direction[], speed: number): Vec2 {
  let x = 0;
  let y = 0;
  for (const direction of directions) {
    x += DIRECTION_VECTORS[direction].x;
    y += DIRECTION_VECTORS[direction].y;
  }
  return {
    x: Math.sign(x) * speed,
    y: Math.sign(y) * speed,
  };
}
