/**
 * ASCII maze rendering, for terminals and for writing test fixtures by hand.
 *
 * @example
 * ```typescript
 * const maze = generateMaze({ width: 11, height: 11, seed: 7 });
 * const { path, visited } = solve(maze, maze.start, maze.goal, "BFS");
 * console.log(renderAscii(maze, { path, visited }));
 * ```
 */

import { OPEN, WALL, type Maze } from "../../interfaces/interfaces";
import type { Cell, CellId } from "../../types/types";
import { ConfigurationError } from "../errors/ConfigurationError";
import { idOf } from "../utils";

export interface AsciiCharset {
  readonly wall: string;
  readonly open: string;
  readonly visited: string;
  readonly path: string;
  readonly start: string;
  readonly goal: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  wall: "█",
  open: " ",
  visited: "·",
  path: "●",
  start: "S",
  goal: "G",
};

// For terminals without unicode, and for fixtures
export const SIMPLE_CHARSET: AsciiCharset = {
  wall: "#",
  open: ".",
  visited: "o",
  path: "*",
  start: "S",
  goal: "G",
};

export interface AsciiOverlay {
  visited?: Iterable<CellId>;
  path?: readonly CellId[];
}

export function renderAscii(
  maze: Maze,
  overlay: AsciiOverlay = {},
  charset: AsciiCharset = DEFAULT_CHARSET
): string {
  const { width, height, blocks } = maze;
  const chars: string[] = Array.from(blocks, (b) =>
    b === WALL ? charset.wall : charset.open
  );
  for (const id of overlay.visited ?? []) chars[id] = charset.visited;
  for (const id of overlay.path ?? []) chars[id] = charset.path;
  chars[idOf(width, maze.start.x, maze.start.y)] = charset.start;
  chars[idOf(width, maze.goal.x, maze.goal.y)] = charset.goal;

  const rows: string[] = [];
  for (let y = 0; y < height; y++) {
    rows.push(chars.slice(y * width, (y + 1) * width).join(""));
  }
  return rows.join("\n");
}

/**
 * Builds a maze from rows drawn with SIMPLE_CHARSET: `#` wall, anything else
 * open, `S` and `G` mark start and goal.
 */
export function parseAscii(rows: readonly string[], seed = 0): Maze {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  const issues: string[] = [];
  if (!height || !width) issues.push("rows: empty");
  if (rows.some((r) => r.length !== width)) issues.push("rows: not rectangular");

  const blocks = new Uint8Array(width * height);
  let start: Cell | null = null;
  let goal: Cell | null = null;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const ch = rows[y].charAt(x);
      blocks[idOf(width, x, y)] = ch === SIMPLE_CHARSET.wall ? WALL : OPEN;
      if (ch === SIMPLE_CHARSET.start) start = { x, y };
      if (ch === SIMPLE_CHARSET.goal) goal = { x, y };
    }
  }
  if (!start) issues.push("rows: no start (S)");
  if (!goal) issues.push("rows: no goal (G)");
  if (issues.length || !start || !goal) throw new ConfigurationError(issues);

  return { width, height, blocks, start, goal, seed };
}
