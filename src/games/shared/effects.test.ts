import { describe, it, expect } from 'vitest';
import {
  MAX_PARTICLES,
  POPUP_FRAMES,
  addScorePopup,
  applyShake,
  clearEffects,
  createEffects,
  isFlashVisible,
  spawnParticles,
  triggerFlash,
  triggerShake,
  updateEffects,
  updateParticles,
  updatePopups,
} from './effects';

describe('particles', () => {
  it('bursts outward from the spawn point', () => {
    const fx = createEffects();
    spawnParticles(fx.particles, 5, 3, 4, '\x1b[91m', ['*'], () => 0);

    expect(fx.particles).toHaveLength(4);
    expect(fx.particles[0]).toEqual({ x: 5, y: 3, char: '*', color: '\x1b[91m', vx: 0.4, vy: 0, life: 10 });
  });

  it('never exceeds the particle cap', () => {
    const fx = createEffects();
    spawnParticles(fx.particles, 0, 0, 98, '', ['*'], () => 0);
    spawnParticles(fx.particles, 0, 0, 10, '', ['*'], () => 0);
    expect(fx.particles).toHaveLength(MAX_PARTICLES);
  });

  it('moves, falls and expires', () => {
    const fx = createEffects();
    fx.particles.push({ x: 1, y: 1, char: '*', color: '', vx: 1, vy: 0, life: 2 });

    updateParticles(fx.particles);
    expect(fx.particles[0].x).toBe(2);
    expect(fx.particles[0].vy).toBeCloseTo(0.02);

    updateParticles(fx.particles);
    expect(fx.particles).toHaveLength(0);
  });
});

describe('score popups', () => {
  it('rise and disappear after their lifetime', () => {
    const fx = createEffects();
    addScorePopup(fx.popups, 4, 8, '+100');

    updatePopups(fx.popups);
    expect(fx.popups[0]).toMatchObject({ y: 7.75, frames: POPUP_FRAMES - 1, text: '+100' });

    for (let i = 1; i < POPUP_FRAMES; i++) updatePopups(fx.popups);
    expect(fx.popups).toHaveLength(0);
  });
});

describe('screen shake', () => {
  it('offsets the frame and counts down', () => {
    const fx = createEffects();
    triggerShake(fx.shake, 2, 2);

    expect(applyShake(fx.shake, () => 0)).toEqual({ offsetX: -2, offsetY: -1 });
    expect(fx.shake.frames).toBe(1);
    applyShake(fx.shake, () => 0);
    expect(applyShake(fx.shake, () => 0)).toEqual({ offsetX: 0, offsetY: 0 });
  });

  it('keeps a stronger shake that is still running', () => {
    const fx = createEffects();
    triggerShake(fx.shake, 10, 3);
    triggerShake(fx.shake, 3, 1);
    expect(fx.shake).toEqual({ frames: 10, intensity: 3 });
  });
});

describe('flash', () => {
  it('strobes two frames on, two off', () => {
    const fx = createEffects();
    triggerFlash(fx.flash, 12);

    const seen: boolean[] = [];
    for (let i = 0; i < 4; i++) {
      seen.push(isFlashVisible(fx.flash));
      updateEffects(fx);
    }
    // frames 12, 11, 10, 9
    expect(seen).toEqual([true, false, false, true]);
  });
});

describe('clearEffects', () => {
  it('drops everything in flight', () => {
    const fx = createEffects();
    spawnParticles(fx.particles, 0, 0, 3, '');
    addScorePopup(fx.popups, 0, 0, '+1');
    triggerShake(fx.shake, 5, 1);
    triggerFlash(fx.flash, 5);

    clearEffects(fx);

    expect(fx.particles).toHaveLength(0);
    expect(fx.popups).toHaveLength(0);
    expect(fx.shake.frames).toBe(0);
    expect(fx.flash.frames).toBe(0);
  });
});
