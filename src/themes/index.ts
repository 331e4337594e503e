/**
 * Cabinet color themes
 *
 * ANSI tints for the maze, HUD and menus. Sprites keep their own colors;
 * the theme covers everything drawn in the "cabinet" color.
 */

/**
 * Available theme identifiers
 */
export const THEME_MODES = ['cabinet', 'amber', 'green', 'phosphor', 'neon', 'blood', 'paper'] as const;

export type ThemeMode = (typeof THEME_MODES)[number];

export interface ThemeInfo {
  /** Display name */
  name: string;
  /** One-line description for `--themes` and the setup prompt */
  hint: string;
  /** Primary ANSI color */
  ansi: string;
  /** Dim color for walls and background detail */
  subtle: string;
  /** Needs dark text on a light background */
  light: boolean;
}

export const themes: Record<ThemeMode, ThemeInfo> = {
  cabinet: {
    name: 'Cabinet',
    hint: 'blue maze walls, the arcade default',
    ansi: '\x1b[94m',
    subtle: '\x1b[38;5;17m',
    light: false,
  },
  amber: {
    name: 'Amber',
    hint: 'amber monochrome monitor',
    ansi: '\x1b[93m',
    subtle: '\x1b[38;5;94m',
    light: false,
  },
  green: {
    name: 'Green Phosphor',
    hint: 'green monochrome monitor',
    ansi: '\x1b[92m',
    subtle: '\x1b[38;5;22m',
    light: false,
  },
  phosphor: {
    name: 'White Phosphor',
    hint: 'paper-white monitor',
    ansi: '\x1b[97m',
    subtle: '\x1b[38;5;238m',
    light: false,
  },
  neon: {
    name: 'Neon',
    hint: 'hot pink and cyan',
    ansi: '\x1b[95m',
    subtle: '\x1b[38;5;53m',
    light: false,
  },
  blood: {
    name: 'Blood',
    hint: 'red dungeon',
    ansi: '\x1b[91m',
    subtle: '\x1b[38;5;52m',
    light: false,
  },
  paper: {
    name: 'Paper',
    hint: 'dark ink for light terminals',
    ansi: '\x1b[34m',
    subtle: '\x1b[38;5;252m',
    light: true,
  },
};

export const DEFAULT_THEME: ThemeMode = 'cabinet';

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get theme info by mode
 */
export function getThemeInfo(mode: ThemeMode): ThemeInfo {
  return themes[mode];
}

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: ThemeMode): string {
  return themes[mode].ansi;
}

/**
 * Check if a theme is light (needs dark text)
 */
export function isLightTheme(mode: ThemeMode): boolean {
  return themes[mode].light;
}

/**
 * Get subtle background color for game elements
 */
export function getSubtleColor(mode: ThemeMode): string {
  return themes[mode].subtle;
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): ThemeMode[] {
  return [...THEME_MODES];
}

const VALID_THEME_MODES = new Set<string>(THEME_MODES);

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is ThemeMode {
  return VALID_THEME_MODES.has(value);
}

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';
