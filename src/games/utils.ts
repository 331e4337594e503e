/**
 * Shared utilities for the terminal front-end
 *
 * Theme state, alternate-buffer bookkeeping and layout helpers. The theme
 * is set once by the host (CLI or embedding app) via setTheme().
 */

import {
  type ThemeMode,
  DEFAULT_THEME,
  getAnsiColor,
  isLightTheme as checkLightTheme,
  getSubtleColor,
} from '../themes';

// ============================================================================
// Terminal
// ============================================================================

export interface KeyPress {
  key: string;
  domEvent: { key: string };
}

export interface Disposable {
  dispose(): void;
}

/**
 * The slice of a terminal the game needs. An xterm.js `Terminal` fits, and
 * so does the Node adapter in cli.ts.
 */
export interface GameTerminal {
  readonly cols: number;
  readonly rows: number;
  write(data: string): void;
  onKey(listener: (event: KeyPress) => void): Disposable;
}

// ============================================================================
// Theme Configuration
// ============================================================================

let currentTheme: ThemeMode = DEFAULT_THEME;

/**
 * Set the current theme mode
 */
export function setTheme(mode: ThemeMode): void {
  currentTheme = mode;
}

export function getTheme(): ThemeMode {
  return currentTheme;
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Terminals currently in the alternate buffer, with who put them there.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Enter alternate screen buffer with state tracking.
 * Safe to call twice: the second call logs a warning and does nothing.
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Theme Color Utilities
// ============================================================================

export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

/**
 * Check if current theme is a light theme (needs dark text)
 */
export function isLightTheme(): boolean {
  return checkLightTheme(currentTheme);
}

/**
 * Muted color that blends with the background: walls, grid dots, radar frame
 */
export function getSubtleBackgroundColor(): string {
  return getSubtleColor(currentTheme);
}

// ============================================================================
// Layout Utilities
// ============================================================================

interface VerticalAnchorOptions {
  headerRows?: number;
  footerRows?: number;
  minTop?: number;
}

/**
 * Compute a vertically-centered top row for content while reserving header/footer space.
 */
export function getVerticalAnchor(
  terminalRows: number,
  contentRows: number,
  options: VerticalAnchorOptions = {}
): number {
  const headerRows = options.headerRows ?? 0;
  const footerRows = options.footerRows ?? 0;
  const minTop = Math.max(1, options.minTop ?? 1);

  const availableRows = terminalRows - headerRows - footerRows;
  const centeredTop = headerRows + Math.floor((availableRows - contentRows) / 2) + 1;

  return Math.max(minTop, centeredTop);
}

export type { ThemeMode } from '../themes';
