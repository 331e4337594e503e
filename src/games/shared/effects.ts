/**
 * Visual Effects
 *
 * Particles, score popups, screen shake and flash for the terminal
 * front-end. Coordinates are screen cells; everything advances one step
 * per rendered frame. Each spawner takes an optional random source so
 * tests can pin the output.
 */

// ============================================================================
// TYPES
// ============================================================================

export interface Particle {
  x: number;
  y: number;
  char: string;
  color: string;
  vx: number;
  vy: number;
  life: number;
}

export interface ScorePopup {
  x: number;
  y: number;
  text: string;
  frames: number;
  color: string;
}

export interface ScreenShakeState {
  frames: number;
  intensity: number;
}

export interface FlashState {
  frames: number;
}

/** Everything a running game keeps for its effects */
export interface EffectsState {
  particles: Particle[];
  popups: ScorePopup[];
  shake: ScreenShakeState;
  flash: FlashState;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const MAX_PARTICLES = 100;

export const POPUP_FRAMES = 18;

export const PARTICLE_CHARS = {
  explosion: ['✗', '×', '·', '○', '▒', '░'],
  death: ['✗', '☠', '×', '▓', '░'],
  spark: ['·', '•', '∙'],
  sparkle: ['✦', '✧', '★'],
  firework: ['★', '✦', '◆', '●', '✶', '✴', '◇', '♦', '•', '○'],
} as const;

export const FIREWORK_COLORS = [
  '\x1b[1;93m', '\x1b[1;92m', '\x1b[1;96m',
  '\x1b[1;95m', '\x1b[1;91m', '\x1b[1;97m',
];

export function createEffects(): EffectsState {
  return {
    particles: [],
    popups: [],
    shake: { frames: 0, intensity: 0 },
    flash: { frames: 0 },
  };
}

export function clearEffects(fx: EffectsState): void {
  fx.particles.length = 0;
  fx.popups.length = 0;
  fx.shake.frames = 0;
  fx.flash.frames = 0;
}

function pick<T>(items: readonly T[], random: () => number): T {
  return items[Math.floor(random() * items.length)];
}

// ============================================================================
// PARTICLES
// ============================================================================

/**
 * Radial burst. Stops adding once MAX_PARTICLES are alive.
 */
export function spawnParticles(
  particles: Particle[],
  x: number,
  y: number,
  count: number,
  color: string,
  chars: readonly string[] = PARTICLE_CHARS.explosion,
  random: () => number = Math.random,
): void {
  if (particles.length >= MAX_PARTICLES) return;

  const actualCount = Math.min(count, MAX_PARTICLES - particles.length);
  for (let i = 0; i < actualCount; i++) {
    const angle = (Math.PI * 2 * i) / count + random() * 0.5;
    const speed = 0.2 + random() * 0.3;
    particles.push({
      x,
      y,
      char: pick(chars, random),
      color,
      // Cells are twice as tall as wide
      vx: Math.cos(angle) * speed * 2,
      vy: Math.sin(angle) * speed * 0.5,
      life: 10 + Math.floor(random() * 8),
    });
  }
}

/**
 * Central burst plus a sparkle ring, for a cleared dungeon.
 */
export function spawnFirework(
  particles: Particle[],
  x: number,
  y: number,
  intensity = 1,
  random: () => number = Math.random,
): void {
  const burst = 12 * intensity;
  for (let i = 0; i < burst && particles.length < MAX_PARTICLES; i++) {
    const angle = (Math.PI * 2 * i) / burst;
    const speed = 0.4 + random() * 0.4;
    particles.push({
      x,
      y,
      char: pick(PARTICLE_CHARS.firework, random),
      color: pick(FIREWORK_COLORS, random),
      vx: Math.cos(angle) * speed * 2,
      vy: Math.sin(angle) * speed - 0.2,
      life: 20 + Math.floor(random() * 15),
    });
  }

  const ring = 8 * intensity;
  for (let i = 0; i < ring && particles.length < MAX_PARTICLES; i++) {
    const angle = (Math.PI * 2 * i) / ring + random() * 0.3;
    const dist = 1.5 + random();
    particles.push({
      x: x + Math.cos(angle) * dist * 2,
      y: y + Math.sin(angle) * dist,
      char: '✧',
      color: '\x1b[1;97m',
      vx: Math.cos(angle) * 0.3,
      vy: Math.sin(angle) * 0.15 - 0.1,
      life: 15 + Math.floor(random() * 10),
    });
  }
}

/**
 * Apply velocity and a little gravity; drop dead particles.
 */
export function updateParticles(particles: Particle[], gravityMult = 1): void {
  for (let i = particles.length - 1; i >= 0; i--) {
    const p = particles[i];
    p.x += p.vx;
    p.y += p.vy;
    p.vy += 0.02 * gravityMult;
    p.life--;
    if (p.life <= 0) particles.splice(i, 1);
  }
}

// ============================================================================
// SCORE POPUPS
// ============================================================================

export function addScorePopup(
  popups: ScorePopup[],
  x: number,
  y: number,
  text: string,
  color = '\x1b[1;33m',
): void {
  popups.push({ x, y, text, frames: POPUP_FRAMES, color });
}

/**
 * Float popups upward and drop expired ones.
 */
export function updatePopups(popups: ScorePopup[]): void {
  for (let i = popups.length - 1; i >= 0; i--) {
    const popup = popups[i];
    popup.y -= 0.25;
    popup.frames--;
    if (popup.frames <= 0) popups.splice(i, 1);
  }
}

// ============================================================================
// SCREEN SHAKE
// ============================================================================

/**
 * Intensity guide: 1 light hit, 2 medium impact, 3-4 big explosion.
 * A weaker shake never cuts a stronger one short.
 */
export function triggerShake(state: ScreenShakeState, frames: number, intensity: number): void {
  if (state.frames > 0 && state.intensity > intensity) return;
  state.frames = frames;
  state.intensity = intensity;
}

/**
 * Offset to add to the render origin this frame. Consumes one shake frame.
 */
export function applyShake(
  state: ScreenShakeState,
  random: () => number = Math.random,
): { offsetX: number; offsetY: number } {
  if (state.frames > 0) {
    state.frames--;
    return {
      offsetX: Math.floor((random() - 0.5) * state.intensity * 2),
      offsetY: Math.floor((random() - 0.5) * state.intensity),
    };
  }
  return { offsetX: 0, offsetY: 0 };
}

// ============================================================================
// FLASH EFFECTS
// ============================================================================

export function triggerFlash(state: FlashState, frames: number): void {
  state.frames = Math.max(state.frames, frames);
}

/**
 * Count the flash down one frame. Returns true while it is active.
 */
export function updateFlash(state: FlashState): boolean {
  if (state.frames > 0) {
    state.frames--;
    return true;
  }
  return false;
}

/**
 * Strobe: on for two frames, off for two.
 */
export function isFlashVisible(state: FlashState): boolean {
  return state.frames > 0 && state.frames % 4 < 2;
}

// ============================================================================
// FRAME STEP
// ============================================================================

/**
 * Advance particles, popups and flash by one rendered frame.
 * Shake is consumed by applyShake when the frame is drawn.
 */
export function updateEffects(fx: EffectsState): void {
  updateParticles(fx.particles);
  updatePopups(fx.popups);
  updateFlash(fx.flash);
}
