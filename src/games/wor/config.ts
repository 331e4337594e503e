/**
 * Wor Configuration
 *
 * One immutable settings struct, built once at startup and handed to the
 * world. Speeds are tiles per second, timers are seconds.
 */

// ============================================================================
// Types
// ============================================================================

export type EnemyKind = 'burwor' | 'garwor' | 'thorwor' | 'worluk' | 'wizard';

export const ENEMY_KINDS: readonly EnemyKind[] = ['burwor', 'garwor', 'thorwor', 'worluk', 'wizard'];

export interface KindProfile {
  points: number;
  speed: number;
  /** Seconds between fire attempts; null = never fires */
  fireCooldown: number | null;
}

export interface GameConfig {
  tickRate: number;
  maxFrameDt: number;

  startingLives: number;
  playerSpeed: number;
  playerFireCooldown: number;
  playerMaxBullets: number;
  enemyMaxBullets: number;

  /** Edge of an entity's square bounding box, in tiles */
  entitySize: number;
  bulletSize: number;
  bulletSpeed: number;
  /** Tiles a bullet may travel before it fizzles */
  bulletRange: number;

  invulnerability: number;
  respawnDelay: number;

  kinds: Readonly<Record<EnemyKind, Readonly<KindProfile>>>;
  waveKinds: readonly EnemyKind[];
  enemySpawnMaxRow: number;
  minSpawnDistance: number;

  garworVisibleTime: number;
  garworCloakedTime: number;
  wizardTeleportInterval: number;
  worlukEscapeDelay: number;
  wizardEscapes: boolean;
  wizardEscapeDelay: number;

  bonusSpawnDelay: number;
  bossSpawnDelay: number;
  victoryDuration: number;

  alignTolerance: number;
  wanderChance: number;
  fireCooldownStepPerDungeon: number;
  minFireCooldownScale: number;
  laneAssist: boolean;
}

// ============================================================================
// Defaults
// ============================================================================

const BASE_SPEED = 3.5;

export const DEFAULT_KINDS: Readonly<Record<EnemyKind, Readonly<KindProfile>>> = {
  burwor: { points: 100, speed: BASE_SPEED, fireCooldown: null },
  garwor: { points: 200, speed: BASE_SPEED, fireCooldown: 3.0 },
  thorwor: { points: 500, speed: BASE_SPEED, fireCooldown: 2.0 },
  worluk: { points: 1000, speed: BASE_SPEED, fireCooldown: null },
  wizard: { points: 2500, speed: BASE_SPEED, fireCooldown: 0.8 },
};

export const DEFAULT_CONFIG: Readonly<GameConfig> = {
  tickRate: 60,
  maxFrameDt: 0.05,

  startingLives: 3,
  playerSpeed: BASE_SPEED,
  playerFireCooldown: 0.2,
  playerMaxBullets: 2,
  enemyMaxBullets: 1,

  entitySize: 0.8,
  bulletSize: 0.2,
  bulletSpeed: 12,
  bulletRange: 30,

  invulnerability: 2.0,
  respawnDelay: 1.5,

  kinds: DEFAULT_KINDS,
  waveKinds: ['burwor', 'burwor', 'burwor', 'garwor', 'garwor', 'thorwor'],
  enemySpawnMaxRow: 6,
  minSpawnDistance: 4,

  garworVisibleTime: 2.0,
  garworCloakedTime: 1.5,
  wizardTeleportInterval: 2.5,
  worlukEscapeDelay: 3.0,
  wizardEscapes: false,
  wizardEscapeDelay: 6.0,

  bonusSpawnDelay: 1.0,
  bossSpawnDelay: 1.5,
  victoryDuration: 3.0,

  alignTolerance: 0.5,
  wanderChance: 0.1,
  fireCooldownStepPerDungeon: 0.05,
  minFireCooldownScale: 0.6,
  laneAssist: true,
};

export const WAVE_SIZE = 6;

// ============================================================================
// Construction
// ============================================================================

export type GameConfigOverrides = Partial<Omit<GameConfig, 'kinds'>> & {
  kinds?: Partial<Record<EnemyKind, Partial<KindProfile>>>;
};

/**
 * Build a validated, frozen config. Throws on values the simulation
 * cannot run with.
 */
export function createGameConfig(overrides: GameConfigOverrides = {}): Readonly<GameConfig> {
  const { kinds: kindOverrides, ...rest } = overrides;

  const mergeKind = (kind: EnemyKind): Readonly<KindProfile> =>
    Object.freeze({ ...DEFAULT_KINDS[kind], ...kindOverrides?.[kind] });

  const kinds: Record<EnemyKind, Readonly<KindProfile>> = {
    burwor: mergeKind('burwor'),
    garwor: mergeKind('garwor'),
    thorwor: mergeKind('thorwor'),
    worluk: mergeKind('worluk'),
    wizard: mergeKind('wizard'),
  };

  const config: GameConfig = {
    ...DEFAULT_CONFIG,
    ...rest,
    kinds: Object.freeze(kinds),
    waveKinds: Object.freeze([...(rest.waveKinds ?? DEFAULT_CONFIG.waveKinds)]),
  };

  validateConfig(config);
  return Object.freeze(config);
}

function fail(message: string): never {
  throw new Error(`[Config] ${message}`);
}

function validateConfig(config: GameConfig): void {
  const positive: (keyof GameConfig)[] = [
    'tickRate', 'maxFrameDt', 'startingLives', 'playerSpeed', 'playerMaxBullets',
    'enemyMaxBullets', 'bulletSpeed', 'bulletRange', 'wizardTeleportInterval',
    'garworVisibleTime', 'garworCloakedTime',
  ];
  for (const key of positive) {
    const value = config[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      fail(`${key} must be a positive number (got ${String(value)})`);
    }
  }

  const nonNegative: (keyof GameConfig)[] = [
    'playerFireCooldown', 'invulnerability', 'respawnDelay', 'minSpawnDistance',
    'worlukEscapeDelay', 'wizardEscapeDelay', 'bonusSpawnDelay', 'bossSpawnDelay',
    'victoryDuration', 'alignTolerance', 'fireCooldownStepPerDungeon', 'enemySpawnMaxRow',
  ];
  for (const key of nonNegative) {
    const value = config[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      fail(`${key} must be zero or more (got ${String(value)})`);
    }
  }

  // Boxes must stay smaller than a tile or corner sliding has no slack
  if (config.entitySize <= 0 || config.entitySize >= 1) {
    fail(`entitySize must be between 0 and 1 tile (got ${config.entitySize})`);
  }
  if (config.bulletSize <= 0 || config.bulletSize >= 1) {
    fail(`bulletSize must be between 0 and 1 tile (got ${config.bulletSize})`);
  }
  if (config.wanderChance < 0 || config.wanderChance > 1) {
    fail(`wanderChance must be a probability (got ${config.wanderChance})`);
  }
  if (config.minFireCooldownScale <= 0 || config.minFireCooldownScale > 1) {
    fail(`minFireCooldownScale must be in (0, 1] (got ${config.minFireCooldownScale})`);
  }

  if (config.waveKinds.length !== WAVE_SIZE) {
    fail(`waveKinds must list exactly ${WAVE_SIZE} enemies (got ${config.waveKinds.length})`);
  }
  for (const kind of config.waveKinds) {
    if (!ENEMY_KINDS.includes(kind)) fail(`unknown enemy kind in waveKinds: ${String(kind)}`);
  }

  for (const kind of ENEMY_KINDS) {
    const profile = config.kinds[kind];
    if (!(profile.speed > 0)) fail(`${kind}.speed must be positive`);
    if (!(profile.points >= 0)) fail(`${kind}.points must be zero or more`);
    if (profile.fireCooldown !== null && !(profile.fireCooldown > 0)) {
      fail(`${kind}.fireCooldown must be positive or null`);
    }
  }
}

/**
 * Fire cooldown for a kind in a given dungeon. Later dungeons shoot faster,
 * down to a floor.
 */
export function fireCooldownFor(config: Readonly<GameConfig>, kind: EnemyKind, dungeon: number): number | null {
  const base = config.kinds[kind].fireCooldown;
  if (base === null) return null;
  const scale = Math.max(
    config.minFireCooldownScale,
    1 - Math.max(0, dungeon - 1) * config.fireCooldownStepPerDungeon,
  );
  return base * scale;
}
