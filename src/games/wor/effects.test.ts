import { describe, it, expect } from 'vitest';
import { applyEventEffects } from './effects';
import { createWorld, snapshot } from './engine';
import type { FrameSnapshot, GameEvent } from './types';
import { createEffects } from '../shared/effects';

function frameWith(events: GameEvent[]): FrameSnapshot {
  const world = createWorld({ random: () => 0.5 });
  return { ...snapshot(world), events };
}

describe('applyEventEffects', () => {
  it('bursts and scores a kill where the enemy stood', () => {
    const fx = createEffects();
    const frame = frameWith([{ type: 'enemy-killed', kind: 'burwor', points: 100, x: 5.5, y: 3.5 }]);

    applyEventEffects(fx, frame, 21, 15, () => 0);

    expect(fx.particles).toHaveLength(8);
    expect(fx.particles[0]).toMatchObject({ x: 11, y: 3.5 });
    expect(fx.popups).toEqual([{ x: 10, y: 2.5, text: '+100', frames: 18, color: '\x1b[1;33m' }]);
    expect(fx.shake).toEqual({ frames: 3, intensity: 1 });
  });

  it('shakes and flashes when the player is hit', () => {
    const fx = createEffects();
    applyEventEffects(fx, frameWith([{ type: 'player-hit', lives: 2, cause: 'bullet' }]), 21, 15, () => 0);

    expect(fx.particles).toHaveLength(12);
    expect(fx.particles[0]).toMatchObject({ x: 3, y: 13.5 });
    expect(fx.shake).toEqual({ frames: 8, intensity: 2 });
    expect(fx.flash.frames).toBe(12);
  });

  it('sets off fireworks over the maze centre for the Wizard', () => {
    const fx = createEffects();
    applyEventEffects(fx, frameWith([{ type: 'wizard-defeated' }]), 21, 15, () => 0);

    // 24 burst particles, then a 16-particle ring
    expect(fx.particles).toHaveLength(40);
    expect(fx.particles[0]).toMatchObject({ x: 21, y: 7.5 });
    expect(fx.flash.frames).toBe(20);
  });

  it('ignores bookkeeping events', () => {
    const fx = createEffects();
    applyEventEffects(fx, frameWith([
      { type: 'shot-fired', team: 'player', ownerId: 0 },
      { type: 'phase-changed', from: 'normal', to: 'bonusSpawning' },
    ]), 21, 15, () => 0);

    expect(fx.particles).toHaveLength(0);
    expect(fx.popups).toHaveLength(0);
    expect(fx.flash.frames).toBe(0);
  });
});
