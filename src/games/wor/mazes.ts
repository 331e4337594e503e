/**
 * Wor - Maze Layouts
 *
 * '#' wall, '.' path, 'P' player spawn, 'S' fallback enemy spawn.
 * The one row open on both edges is the tunnel; its edge cells are the portals.
 */

export interface MazeLayout {
  name: string;
  rows: readonly string[];
}

export const DUNGEON_LAYOUT: MazeLayout = {
  name: 'THE DUNGEON',
  rows: [
    '#####################',
    '#.........#........S#',
    '#.##.###..#..###.##.#',
    '#...................#',
    '###.#.###.#.###.#.###',
    '#...................#',
    '#.##.#.#######.#.##.#',
    '.....#.........#.....',
    '#.##.#.#######.#.##.#',
    '#...................#',
    '###.#.###.#.###.#.###',
    '#...................#',
    '#.##.###..#..###.##.#',
    '#P........#.........#',
    '#####################',
  ],
};
