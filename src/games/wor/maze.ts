/**
 * Wor Maze - Static Grid & Collision Queries
 *
 * Loading/validation, tile lookups that fail closed outside the grid,
 * box-vs-wall tests and tunnel wraparound.
 */

import type { MazeLayout } from './mazes';

// ============================================================================
// Types
// ============================================================================

export type Tile = 'wall' | 'path';

export interface TilePos {
  x: number;
  y: number;
}

export interface Vec2 {
  x: number;
  y: number;
}

/** Axis-aligned box in tile units; right/bottom edges are exclusive */
export interface Box {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface Maze {
  readonly name: string;
  readonly width: number;
  readonly height: number;
  readonly grid: readonly (readonly Tile[])[];
  readonly tunnelRow: number;
  /** Left then right portal */
  readonly portals: readonly [TilePos, TilePos];
  readonly playerSpawn: TilePos;
  readonly fallbackSpawn: TilePos;
}

// ============================================================================
// Loading
// ============================================================================

function fail(name: string, message: string): never {
  throw new Error(`[Maze] ${name}: ${message}`);
}

/**
 * Parse and validate a layout. A maze that loads is guaranteed to have
 * exactly one tunnel row, closed edges elsewhere and one connected network.
 */
export function loadMaze(layout: MazeLayout): Maze {
  const { name, rows } = layout;
  if (rows.length === 0 || rows[0].length === 0) fail(name, 'layout is empty');

  const width = rows[0].length;
  const height = rows.length;
  const grid: Tile[][] = [];
  let playerSpawn: TilePos | null = null;
  let fallbackSpawn: TilePos | null = null;

  for (let y = 0; y < height; y++) {
    const line = rows[y];
    if (line.length !== width) {
      fail(name, `row ${y} is ${line.length} wide, expected ${width}`);
    }
    const row: Tile[] = [];
    for (let x = 0; x < width; x++) {
      const ch = line[x];
      switch (ch) {
        case '#':
          row.push('wall');
          break;
        case '.':
          row.push('path');
          break;
        case 'P':
          if (playerSpawn) fail(name, 'more than one player spawn (P)');
          playerSpawn = { x, y };
          row.push('path');
          break;
        case 'S':
          if (fallbackSpawn) fail(name, 'more than one fallback spawn (S)');
          fallbackSpawn = { x, y };
          row.push('path');
          break;
        default:
          fail(name, `unknown cell '${ch}' at ${x},${y}`);
      }
    }
    grid.push(row);
  }

  if (!playerSpawn) fail(name, 'no player spawn (P)');
  if (!fallbackSpawn) fail(name, 'no fallback spawn (S)');

  for (let x = 0; x < width; x++) {
    if (grid[0][x] === 'path' || grid[height - 1][x] === 'path') {
      fail(name, `open cell on the outer edge at column ${x}`);
    }
  }

  const tunnelRows: number[] = [];
  for (let y = 0; y < height; y++) {
    const leftOpen = grid[y][0] === 'path';
    const rightOpen = grid[y][width - 1] === 'path';
    if (leftOpen && rightOpen) tunnelRows.push(y);
    else if (leftOpen || rightOpen) fail(name, `row ${y} is open on only one edge`);
  }
  if (tunnelRows.length !== 1) {
    fail(name, `expected exactly one tunnel row, found ${tunnelRows.length}`);
  }
  const tunnelRow = tunnelRows[0];

  const maze: Maze = {
    name,
    width,
    height,
    grid,
    tunnelRow,
    portals: [{ x: 0, y: tunnelRow }, { x: width - 1, y: tunnelRow }],
    playerSpawn,
    fallbackSpawn,
  };

  const reachable = countReachable(maze, playerSpawn);
  const total = openTiles(maze).length;
  if (reachable !== total) {
    fail(name, `${total - reachable} path tiles are unreachable from the player spawn`);
  }

  return maze;
}

function countReachable(maze: Maze, start: TilePos): number {
  const seen = new Set<string>([`${start.x},${start.y}`]);
  const stack: TilePos[] = [start];

  while (stack.length > 0) {
    const tile = stack.pop();
    if (!tile) break;
    for (const [dx, dy] of [[1, 0], [-1, 0], [0, 1], [0, -1]]) {
      // Horizontal steps wrap through the tunnel
      const nx = (tile.x + dx + maze.width) % maze.width;
      const ny = tile.y + dy;
      if (dx !== 0 && tile.y !== maze.tunnelRow && nx !== tile.x + dx) continue;
      const key = `${nx},${ny}`;
      if (seen.has(key) || isWall(maze, nx, ny)) continue;
      seen.add(key);
      stack.push({ x: nx, y: ny });
    }
  }

  return seen.size;
}

// ============================================================================
// Tile Queries
// ============================================================================

/**
 * Out-of-bounds rows are wall. Out-of-bounds columns are wall except on
 * the tunnel row, where they lead through the portal.
 */
export function isWall(maze: Maze, tileX: number, tileY: number): boolean {
  if (tileY < 0 || tileY >= maze.height) return true;
  if (tileX < 0 || tileX >= maze.width) return tileY !== maze.tunnelRow;
  return maze.grid[tileY][tileX] === 'wall';
}

export function tileOf(position: Vec2): TilePos {
  return { x: Math.floor(position.x), y: Math.floor(position.y) };
}

export function tileCenter(tile: TilePos): Vec2 {
  return { x: tile.x + 0.5, y: tile.y + 0.5 };
}

export function inBounds(maze: Maze, position: Vec2): boolean {
  return position.x >= 0 && position.x < maze.width && position.y >= 0 && position.y < maze.height;
}

export function sameTile(a: TilePos | null, b: TilePos | null): boolean {
  return a !== null && b !== null && a.x === b.x && a.y === b.y;
}

export function manhattan(a: TilePos, b: TilePos): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function isPortal(maze: Maze, tile: TilePos): boolean {
  return maze.portals.some(p => p.x === tile.x && p.y === tile.y);
}

/** Closest portal by Manhattan distance; the left one wins a tie */
export function nearestPortal(maze: Maze, tile: TilePos): TilePos {
  const [left, right] = maze.portals;
  return manhattan(tile, right) < manhattan(tile, left) ? right : left;
}

// Per-maze step counts to the closest portal, filled on first use
const portalDistances = new WeakMap<Maze, readonly (readonly number[])[]>();

function measurePortalDistances(maze: Maze): number[][] {
  const distances = maze.grid.map(row => row.map(() => Number.POSITIVE_INFINITY));
  const queue: TilePos[] = [];
  for (const portal of maze.portals) {
    distances[portal.y][portal.x] = 0;
    queue.push(portal);
  }

  for (let head = 0; head < queue.length; head++) {
    const tile = queue[head];
    const next = distances[tile.y][tile.x] + 1;
    for (const [dx, dy] of [[1, 0], [-1, 0], [0, 1], [0, -1]]) {
      const nx = tile.x + dx;
      const ny = tile.y + dy;
      if (nx < 0 || nx >= maze.width || isWall(maze, nx, ny)) continue;
      if (distances[ny][nx] <= next) continue;
      distances[ny][nx] = next;
      queue.push({ x: nx, y: ny });
    }
  }

  return distances;
}

/**
 * Steps along open tiles from `tile` to the closest portal. Walls and
 * tiles outside the grid are infinitely far.
 */
export function portalDistance(maze: Maze, tile: TilePos): number {
  if (tile.x < 0 || tile.x >= maze.width || tile.y < 0 || tile.y >= maze.height) {
    return Number.POSITIVE_INFINITY;
  }
  let distances = portalDistances.get(maze);
  if (!distances) {
    distances = measurePortalDistances(maze);
    portalDistances.set(maze, distances);
  }
  return distances[tile.y][tile.x];
}

export function openTiles(maze: Maze): TilePos[] {
  const tiles: TilePos[] = [];
  for (let y = 0; y < maze.height; y++) {
    for (let x = 0; x < maze.width; x++) {
      if (maze.grid[y][x] === 'path') tiles.push({ x, y });
    }
  }
  return tiles;
}

// ============================================================================
// Collision
// ============================================================================

export function boxAt(x: number, y: number, size: number): Box {
  const half = size / 2;
  return { left: x - half, top: y - half, right: x + half, bottom: y + half };
}

export function boxesOverlap(a: Box, b: Box): boolean {
  return a.left < b.right && b.left < a.right && a.top < b.bottom && b.top < a.bottom;
}

/** Tile index under an exclusive far edge */
function farTile(edge: number): number {
  return Math.ceil(edge) - 1;
}

/**
 * True if the box overlaps any wall tile. Boxes are smaller than a tile,
 * so the four corners cover every tile the box can touch.
 */
export function collides(maze: Maze, box: Box): boolean {
  const left = Math.floor(box.left);
  const right = farTile(box.right);
  const top = Math.floor(box.top);
  const bottom = farTile(box.bottom);

  return isWall(maze, left, top)
    || isWall(maze, right, top)
    || isWall(maze, left, bottom)
    || isWall(maze, right, bottom);
}

/**
 * Teleport a position that crossed the grid edge on the tunnel row to the
 * opposite edge, same y. Any other position comes back unchanged.
 */
export function wrapIfTunnel(maze: Maze, position: Vec2): Vec2 {
  if (Math.floor(position.y) !== maze.tunnelRow) return position;
  if (position.x < 0) return { x: position.x + maze.width, y: position.y };
  if (position.x >= maze.width) return { x: position.x - maze.width, y: position.y };
  return position;
}
