import { OPEN, type Maze } from "../interfaces/interfaces";
import type { Cell, CellId } from "../types/types";

export const idOf = (width: number, x: number, y: number): CellId =>
  y * width + x;
export const cellOf = (width: number, id: CellId): Cell => ({
  x: id % width,
  y: Math.floor(id / width),
});

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

// down, up, right, left; every algorithm enumerates in this order
export const DIRECTIONS: readonly (readonly [number, number])[] = [
  [0, 1],
  [0, -1],
  [1, 0],
  [-1, 0],
];

export const inBounds = (maze: Maze, x: number, y: number) =>
  x >= 0 && x < maze.width && y >= 0 && y < maze.height;

export const isOpen = (maze: Maze, id: CellId) => maze.blocks[id] === OPEN;

// Open orthogonal neighbours of a cell
export function openNeighbors(maze: Maze, id: CellId): CellId[] {
  const { x, y } = cellOf(maze.width, id);
  const out: CellId[] = [];
  for (const [dx, dy] of DIRECTIONS) {
    const nx = x + dx,
      ny = y + dy;
    if (!inBounds(maze, nx, ny)) continue;
    const nid = idOf(maze.width, nx, ny);
    if (isOpen(maze, nid)) out.push(nid);
  }
  return out;
}

export function openCells(maze: Maze): CellId[] {
  const out: CellId[] = [];
  for (let i = 0; i < maze.blocks.length; i++) {
    if (maze.blocks[i] === OPEN) out.push(i);
  }
  return out;
}

// Reconstruct path from parents
export function reconstructPath(
  parents: Map<CellId, CellId | null>,
  goal: CellId
): CellId[] {
  const path: CellId[] = [];
  let cur: CellId | null | undefined = goal;
  while (cur != null) {
    path.push(cur);
    cur = parents.get(cur);
  }
  return path.reverse();
}

// Hop distance from `from` to every reachable open cell
export function bfsLevels(maze: Maze, from: CellId): Int32Array {
  const dist = new Int32Array(maze.width * maze.height).fill(-1);
  if (!isOpen(maze, from)) return dist;
  const q: CellId[] = [from];
  dist[from] = 0;
  let head = 0;
  while (head < q.length) {
    const v = q[head++];
    for (const nb of openNeighbors(maze, v)) {
      if (dist[nb] !== -1) continue;
      dist[nb] = dist[v] + 1;
      q.push(nb);
    }
  }
  return dist;
}
