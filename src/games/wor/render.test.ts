import { describe, it, expect } from 'vitest';
import { createWorld, snapshot } from './engine';
import { createEnemy } from './entities';
import {
  bannerFor,
  computeLayout,
  enemyAppearance,
  hudLine,
  latchPhaseEvents,
  minimumSize,
  playerAppearance,
  radarBlips,
  renderFrame,
  spriteCell,
} from './render';
import type { FrameSnapshot, GameEvent, World } from './types';
import { createEffects } from '../shared/effects';

function quietWorld(): World {
  const world = createWorld({ random: () => 0.5 });
  world.enemies = [];
  world.events = [];
  return world;
}

function withTick(frame: FrameSnapshot, tick: number): FrameSnapshot {
  return { ...frame, tick };
}

describe('layout', () => {
  it('needs room for the maze, its border and the radar', () => {
    const world = quietWorld();
    expect(minimumSize(world.maze)).toEqual({ cols: 64, rows: 20 });
  });

  it('centres the playfield', () => {
    const world = quietWorld();
    const layout = computeLayout(world.maze, 80, 24);
    expect(layout).toEqual({
      boxLeft: 9,
      boxTop: 5,
      left: 10,
      top: 6,
      width: 42,
      height: 15,
      radarLeft: 55,
      radarTop: 5,
      centerX: 31,
    });
  });

  it('places two-cell sprites over their tile', () => {
    const world = quietWorld();
    const layout = computeLayout(world.maze, 80, 24);
    expect(spriteCell(layout, 1.5, 13.5)).toEqual({ col: 12, row: 19 });
    // Half out of the tunnel: clamped inside the border
    expect(spriteCell(layout, 20.9, 7.5)).toEqual({ col: 50, row: 13 });
  });
});

describe('hudLine', () => {
  it('shows score, dungeon, lives and enemies left', () => {
    const world = quietWorld();
    world.player.score = 1200;
    world.dungeon = 2;
    world.enemies = [createEnemy(world, 'burwor', { x: 5, y: 3 })];
    expect(hudLine(snapshot(world))).toBe('SCORE 001200  DUNGEON 2  ♥♥♥  ENEMIES 1');
  });
});

describe('bannerFor', () => {
  it('announces the Worluk', () => {
    expect(bannerFor('bonusSpawning', [])).toBe('THE WORLUK APPEARS!');
  });

  it('summons the Wizard after a Worluk kill', () => {
    expect(bannerFor('bossSpawning', [{ type: 'phase-changed', from: 'bonusActive', to: 'bossSpawning' }]))
      .toBe('I AM THE WIZARD OF WOR!');
  });

  it('reports a Worluk that got away', () => {
    expect(bannerFor('bossSpawning', [
      { type: 'worluk-escaped' },
      { type: 'phase-changed', from: 'bonusActive', to: 'bossSpawning' },
    ])).toBe('THE WORLUK ESCAPED!');
  });

  it('celebrates a cleared dungeon and ends the game', () => {
    expect(bannerFor('victory', [{ type: 'wizard-defeated' }])).toBe('DUNGEON CLEARED!');
    expect(bannerFor('gameOver', [])).toBe('GAME OVER');
  });

  it('stays quiet during regular play', () => {
    expect(bannerFor('normal', [])).toBeNull();
    expect(bannerFor('bonusActive', [])).toBeNull();
    expect(bannerFor('bossActive', [])).toBeNull();
  });

  it('notes a Wizard escape at the start of the next dungeon', () => {
    expect(bannerFor('normal', [{ type: 'wizard-escaped' }])).toBe('THE WIZARD ESCAPED!');
  });
});

describe('latchPhaseEvents', () => {
  it('keeps the events of the tick that changed phase', () => {
    const world = quietWorld();
    const opening: GameEvent[] = [
      { type: 'worluk-escaped' },
      { type: 'phase-changed', from: 'bonusActive', to: 'bossSpawning' },
    ];
    const changed = { ...snapshot(world), events: opening };
    expect(latchPhaseEvents([], changed)).toBe(opening);

    const bulletBlocked: GameEvent = { type: 'bullet-blocked', x: 3, y: 4 };
    const later = { ...snapshot(world), events: [bulletBlocked] };
    expect(latchPhaseEvents(opening, later)).toBe(opening);
    expect(latchPhaseEvents(opening, snapshot(world))).toBe(opening);
  });
});

describe('radarBlips', () => {
  it('scales enemy positions onto the minimap', () => {
    const world = quietWorld();
    world.enemies = [
      createEnemy(world, 'burwor', { x: 10, y: 7 }),
      createEnemy(world, 'thorwor', { x: 19, y: 13 }),
    ];
    expect(radarBlips(snapshot(world), world.maze, 16, 6)).toEqual([
      // 10.5 / 21 * 16 = 8; 7.5 / 15 * 6 = 3
      { x: 8, y: 3, kind: 'burwor' },
      // 19.5 / 21 * 16 = 14.9; 13.5 / 15 * 6 = 5.4
      { x: 14, y: 5, kind: 'thorwor' },
    ]);
  });

  it('shows cloaked Garwors', () => {
    const world = quietWorld();
    const garwor = createEnemy(world, 'garwor', { x: 1, y: 1 });
    garwor.visible = false;
    world.enemies = [garwor];
    expect(radarBlips(snapshot(world), world.maze, 16, 6)).toEqual([{ x: 1, y: 0, kind: 'garwor' }]);
  });
});

describe('appearance', () => {
  it('hides a cloaked Garwor unless it is close to the player', () => {
    const world = quietWorld();
    const far = createEnemy(world, 'garwor', { x: 10, y: 5 });
    const near = createEnemy(world, 'garwor', { x: 3, y: 13 });
    far.visible = false;
    near.visible = false;
    world.enemies = [far, near];

    const frame = snapshot(world);
    expect(enemyAppearance(frame.enemies[0], frame)).toBe('hidden');
    expect(enemyAppearance(frame.enemies[1], frame)).toBe('faint');
  });

  it('flickers the Wizard', () => {
    const world = quietWorld();
    world.enemies = [createEnemy(world, 'wizard', { x: 10, y: 5 })];
    const frame = snapshot(world);
    expect(enemyAppearance(frame.enemies[0], withTick(frame, 8))).toBe('hidden');
    expect(enemyAppearance(frame.enemies[0], withTick(frame, 10))).toBe('full');
  });

  it('blinks the player during grace time', () => {
    const world = quietWorld();
    world.player.invulnerable = 1;
    const frame = snapshot(world);
    expect(playerAppearance(withTick(frame, 3))).toBe('full');
    expect(playerAppearance(withTick(frame, 7))).toBe('hidden');
  });
});

describe('renderFrame', () => {
  it('draws the HUD, the player and the banner', () => {
    const world = quietWorld();
    const layout = computeLayout(world.maze, 80, 24);
    const output = renderFrame(snapshot(world), world.maze, layout, createEffects(), { banner: 'GAME OVER' });

    expect(output.startsWith('\x1b[2J\x1b[H')).toBe(true);
    expect(output).toContain('\x1b[2;12H\x1b[94mSCORE 000000  DUNGEON 1  ♥♥♥  ENEMIES 0\x1b[0m');
    expect(output).toContain('\x1b[19;12H\x1b[1;93m█►\x1b[0m');
    expect(output).toContain('\x1b[13;26H\x1b[1;93m\x1b[7m GAME OVER \x1b[0m');
  });
});
