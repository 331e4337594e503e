/**
 * Wor - Event Effects
 *
 * Maps the core's per-tick events onto particles, popups, shake and
 * flash. Positions are screen cells relative to the maze interior.
 */

import { CELL_WIDTH, KIND_STYLES } from './render';
import type { GameEvent, FrameSnapshot } from './types';
import {
  type EffectsState,
  PARTICLE_CHARS,
  addScorePopup,
  spawnFirework,
  spawnParticles,
  triggerFlash,
  triggerShake,
} from '../shared/effects';

function toCell(x: number, y: number): { x: number; y: number } {
  return { x: x * CELL_WIDTH, y };
}

/**
 * Feed one frame's events into the effects state. `frame` supplies the
 * player position for hit bursts and the maze centre for fireworks.
 */
export function applyEventEffects(
  fx: EffectsState,
  frame: FrameSnapshot,
  mazeWidth: number,
  mazeHeight: number,
  random: () => number = Math.random,
): void {
  for (const event of frame.events) {
    applyEvent(fx, event, frame, mazeWidth, mazeHeight, random);
  }
}

function applyEvent(
  fx: EffectsState,
  event: GameEvent,
  frame: FrameSnapshot,
  mazeWidth: number,
  mazeHeight: number,
  random: () => number,
): void {
  switch (event.type) {
    case 'enemy-killed': {
      const at = toCell(event.x, event.y);
      const big = event.kind === 'wizard' || event.kind === 'worluk';
      spawnParticles(fx.particles, at.x, at.y, big ? 16 : 8, KIND_STYLES[event.kind].color, PARTICLE_CHARS.explosion, random);
      addScorePopup(fx.popups, at.x - 1, at.y - 1, `+${event.points}`);
      triggerShake(fx.shake, big ? 10 : 3, big ? 3 : 1);
      break;
    }
    case 'player-hit': {
      const at = toCell(frame.player.x, frame.player.y);
      spawnParticles(fx.particles, at.x, at.y, 12, '\x1b[1;91m', PARTICLE_CHARS.death, random);
      triggerShake(fx.shake, 8, 2);
      triggerFlash(fx.flash, 12);
      break;
    }
    case 'bullet-blocked': {
      const at = toCell(event.x, event.y);
      spawnParticles(fx.particles, at.x, at.y, 2, '\x1b[2;97m', PARTICLE_CHARS.spark, random);
      break;
    }
    case 'wizard-teleported': {
      const at = toCell(event.x, event.y);
      spawnParticles(fx.particles, at.x, at.y, 6, KIND_STYLES.wizard.color, PARTICLE_CHARS.sparkle, random);
      break;
    }
    case 'wizard-defeated':
      spawnFirework(fx.particles, (mazeWidth * CELL_WIDTH) / 2, mazeHeight / 2, 2, random);
      triggerFlash(fx.flash, 20);
      break;
    case 'worluk-escaped':
    case 'wizard-escaped':
      triggerFlash(fx.flash, 8);
      break;
    case 'game-over':
      triggerShake(fx.shake, 12, 3);
      break;
    default:
      break;
  }
}
