import { describe, it, expect, vi } from 'vitest';
import { createGameConfig } from './config';
import { damagePlayer } from './combat';
import { createWorld, snapshot, tick } from './engine';
import { createEnemy } from './entities';
import { boxAt, collides } from './maze';
import { type Direction, type TickInput, type World, DIRECTION_ORDER, IDLE_INPUT } from './types';

function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 16807) % 2147483647;
    return state / 2147483647;
  };
}

function press(...directions: Direction[]): TickInput {
  return { ...IDLE_INPUT, directions };
}

function isContained(world: World): boolean {
  const bodies = [world.player, ...world.enemies].filter(body => body.alive);
  return bodies.every(body => !collides(world.maze, boxAt(body.x, body.y, body.size)));
}

describe('createWorld', () => {
  it('starts in dungeon one with a full wave', () => {
    const world = createWorld({ random: () => 0.5 });
    const frame = snapshot(world);
    expect(frame.phase).toBe('normal');
    expect(frame.dungeon).toBe(1);
    expect(frame.lives).toBe(3);
    expect(frame.score).toBe(0);
    expect(frame.enemiesRemaining).toBe(6);
    expect(frame.player).toMatchObject({ kind: 'player', x: 1.5, y: 13.5, alive: true });
  });
});

describe('tick', () => {
  it('returns a frozen snapshot', () => {
    const world = createWorld({ random: () => 0.5 });
    const frame = tick(world, IDLE_INPUT, 1 / 60);
    expect(Object.isFrozen(frame)).toBe(true);
    expect(Object.isFrozen(frame.player)).toBe(true);
    expect(Object.isFrozen(frame.enemies)).toBe(true);
    expect(Object.isFrozen(frame.events)).toBe(true);
  });

  it('clamps long frames', () => {
    const world = createWorld({ random: () => 0.5 });
    const frame = tick(world, press('right'), 10);
    expect(frame.player.x).toBeCloseTo(1.675);
    expect(frame.player.y).toBe(13.5);
  });

  it('turns the player toward the last pressed direction', () => {
    const world = createWorld({ random: () => 0.5 });
    const frame = tick(world, press('up'), 1 / 60);
    expect(frame.player.facing).toBe('up');
  });

  it('fires from the player on request', () => {
    const world = createWorld({ random: () => 0.5 });
    const frame = tick(world, { ...IDLE_INPUT, fire: true }, 1 / 60);
    expect(frame.bullets).toHaveLength(1);
    expect(frame.bullets[0]).toMatchObject({ team: 'player', x: 1.5, y: 13.5, direction: 'right' });
    expect(frame.events).toContainEqual({ type: 'shot-fired', team: 'player', ownerId: world.player.id });
  });

  it('stops at quit without advancing the world', () => {
    const world = createWorld({ random: () => 0.5 });
    const before = world.enemies.map(enemy => [enemy.x, enemy.y]);

    const frame = tick(world, { ...press('right'), quit: true }, 1 / 60);

    expect(frame.quit).toBe(true);
    expect(frame.player.x).toBe(1.5);
    expect(world.enemies.map(enemy => [enemy.x, enemy.y])).toEqual(before);
  });

  it('reports events only on the tick they happen', () => {
    const world = createWorld({ random: () => 0.5 });
    const first = tick(world, IDLE_INPUT, 1 / 60);
    expect(first.events.filter(event => event.type === 'enemy-spawned')).toHaveLength(6);

    const second = tick(world, IDLE_INPUT, 1 / 60);
    expect(second.events).toEqual([]);
  });
});

describe('timed behaviour', () => {
  const config = createGameConfig({
    maxFrameDt: 0.25,
    garworVisibleTime: 0.5,
    garworCloakedTime: 0.75,
    wizardTeleportInterval: 0.25,
  });

  it('cycles the Garwor cloak', () => {
    const world = createWorld({ random: () => 0.5, config });
    world.enemies = [createEnemy(world, 'garwor', { x: 19, y: 1 })];

    const seen: boolean[] = [];
    for (let i = 0; i < 5; i++) {
      seen.push(tick(world, IDLE_INPUT, 0.25).enemies[0].visible);
    }

    expect(seen).toEqual([true, false, false, false, true]);
  });

  it('teleports the Wizard when its timer runs out', () => {
    const world = createWorld({ random: () => 0, config });
    world.enemies = [createEnemy(world, 'wizard', { x: 10, y: 5 })];

    const frame = tick(world, IDLE_INPUT, 0.25);

    expect(frame.events).toContainEqual({ type: 'wizard-teleported', x: 1.5, y: 1.5 });
    expect(frame.enemies[0]).toMatchObject({ kind: 'wizard', x: 1.5, y: 1.5 });
    expect(world.enemies[0].teleportTimer).toBe(0.25);
  });

  it('brings a downed player back at the spawn with grace time', () => {
    const world = createWorld({ random: () => 0.5 });
    world.player.x = 5.5;
    world.player.y = 11.5;
    damagePlayer(world, 'bullet');

    let frame = tick(world, IDLE_INPUT, 0.05);
    for (let i = 0; i < 40 && !frame.events.some(event => event.type === 'player-respawned'); i++) {
      expect(frame.player.alive).toBe(false);
      frame = tick(world, IDLE_INPUT, 0.05);
    }

    expect(frame.events).toContainEqual({ type: 'player-respawned' });
    expect(frame.player).toMatchObject({ alive: true, invulnerable: true, x: 1.5, y: 13.5 });
    expect(frame.lives).toBe(2);
  });
});

describe('wall containment', () => {
  it('never leaves a live body overlapping a wall', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const random = lcg(11);
    const world = createWorld({ random });
    let input: TickInput = IDLE_INPUT;

    for (let i = 0; i < 1200; i++) {
      if (i % 20 === 0) {
        const first = DIRECTION_ORDER[Math.floor(random() * 4)];
        const second = DIRECTION_ORDER[Math.floor(random() * 4)];
        input = {
          ...IDLE_INPUT,
          directions: random() < 0.3 ? [first, second] : [first],
          fire: random() < 0.5,
        };
      }
      tick(world, world.phase === 'gameOver' ? { ...IDLE_INPUT, restart: true } : input, 1 / 60);
      expect(isContained(world)).toBe(true);
    }

    expect(warn).not.toHaveBeenCalled();
    warn.mockRestore();
  });
});
