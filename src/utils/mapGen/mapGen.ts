import { OPEN, WALL, type Maze, type MazeOptions } from "../../interfaces/interfaces";
import type { Cell, CellId } from "../../types/types";
import { parseMazeConfig } from "../config/mazeConfig";
import {
  cellOf,
  idOf,
  isOpen,
  openNeighbors,
  reconstructPath,
  rngLCG,
} from "../utils";

// ---------- Maze Generation ----------

type Rand = () => number;

// same order as DIRECTIONS, two cells at a time
const LATTICE_DIRS: readonly (readonly [number, number])[] = [
  [0, 2],
  [0, -2],
  [2, 0],
  [-2, 0],
];

export const randomSeed = () => Math.floor(Math.random() * 0x100000000);

/**
 * Maze via randomized DFS backtracker on the odd-coordinate lattice.
 *
 * Without `multiplePaths` the open cells form a spanning tree: exactly one
 * simple path joins any two of them. With it, extra lattice walls are carved
 * afterwards so that start and goal are joined by more than one path.
 *
 * Start and goal default to opposite corners. `randomizeStart` and
 * `randomizeGoal` draw them from {@link strategicPositions} instead, with the
 * same seeded generator; the two never coincide.
 */
export function generateMaze(options: MazeOptions): Maze {
  const config = parseMazeConfig(options);
  const { width, height } = config;
  const seed = config.seed ?? randomSeed();
  const R = rngLCG(seed);
  const rand: Rand = () => R.next().value;

  const blocks = new Uint8Array(width * height).fill(WALL);
  carveSpanningTree(width, height, blocks, { x: 1, y: 1 }, rand);

  const start: Cell = config.randomizeStart
    ? pickEndpoint(width, height, blocks, rand, null)
    : { x: 1, y: 1 };
  let goal: Cell = { x: width - 2, y: height - 2 };
  if (config.randomizeGoal || sameCell(goal, start)) {
    goal = pickEndpoint(width, height, blocks, rand, start);
  }
  blocks[idOf(width, start.x, start.y)] = OPEN;
  blocks[idOf(width, goal.x, goal.y)] = OPEN;

  const maze: Maze = { width, height, blocks, start, goal, seed };
  if (config.multiplePaths) {
    carveExtraPassages(maze, config.extraPassages, rand);
  }
  return maze;
}

const sameCell = (a: Cell, b: Cell) => a.x === b.x && a.y === b.y;

/**
 * Corners, centre and edge midpoints, each moved onto the odd lattice.
 * Duplicates (small mazes) are dropped; order is fixed.
 */
export function strategicPositions(width: number, height: number): Cell[] {
  const midX = Math.floor(width / 2);
  const midY = Math.floor(height / 2);
  const raw: Cell[] = [
    { x: 1, y: 1 },
    { x: width - 2, y: 1 },
    { x: 1, y: height - 2 },
    { x: width - 2, y: height - 2 },
    { x: midX, y: midY },
    { x: midX, y: 1 },
    { x: midX, y: height - 2 },
    { x: 1, y: midY },
    { x: width - 2, y: midY },
  ];
  const toOdd = (v: number, max: number) => (v % 2 ? v : Math.min(v + 1, max));

  const out: Cell[] = [];
  for (const c of raw) {
    const cell = { x: toOdd(c.x, width - 2), y: toOdd(c.y, height - 2) };
    if (!out.some((o) => sameCell(o, cell))) out.push(cell);
  }
  return out;
}

// Open strategic cell other than `exclude`, falling back to any open lattice cell
function pickEndpoint(
  width: number,
  height: number,
  blocks: Uint8Array,
  rand: Rand,
  exclude: Cell | null
): Cell {
  const usable = (c: Cell) =>
    blocks[idOf(width, c.x, c.y)] === OPEN && !(exclude && sameCell(c, exclude));

  let pool = strategicPositions(width, height).filter(usable);
  if (!pool.length) {
    pool = [];
    for (let y = 1; y < height - 1; y += 2) {
      for (let x = 1; x < width - 1; x += 2) {
        if (usable({ x, y })) pool.push({ x, y });
      }
    }
  }
  return pool[Math.floor(rand() * pool.length)];
}

const isLattice = (width: number, height: number, x: number, y: number) =>
  x > 0 &&
  x < width - 1 &&
  y > 0 &&
  y < height - 1 &&
  x % 2 === 1 &&
  y % 2 === 1;

function carveSpanningTree(
  width: number,
  height: number,
  blocks: Uint8Array,
  from: Cell,
  rand: Rand
) {
  const visited = new Uint8Array(width * height);
  const stack: Cell[] = [from];
  visited[idOf(width, from.x, from.y)] = 1;
  blocks[idOf(width, from.x, from.y)] = OPEN;

  while (stack.length) {
    const cur = stack[stack.length - 1];

    const candidates: Cell[] = [];
    for (const [dx, dy] of LATTICE_DIRS) {
      const nx = cur.x + dx;
      const ny = cur.y + dy;
      if (!isLattice(width, height, nx, ny)) continue;
      if (visited[idOf(width, nx, ny)]) continue;
      candidates.push({ x: nx, y: ny });
    }

    if (!candidates.length) {
      stack.pop();
      continue;
    }

    const next = candidates[Math.floor(rand() * candidates.length)];
    const nid = idOf(width, next.x, next.y);
    visited[nid] = 1;
    blocks[nid] = OPEN;
    // carve the wall between current cell and next cell
    blocks[idOf(width, (cur.x + next.x) / 2, (cur.y + next.y) / 2)] = OPEN;
    stack.push(next);
  }
}

// The two lattice cells a carve-able wall separates, or null for any other cell
function latticeSides(maze: Maze, id: CellId): [CellId, CellId] | null {
  const { width, height } = maze;
  const { x, y } = cellOf(width, id);
  if (x <= 0 || x >= width - 1 || y <= 0 || y >= height - 1) return null;
  if (x % 2 === 1 && y % 2 === 0) {
    return [idOf(width, x, y - 1), idOf(width, x, y + 1)];
  }
  if (x % 2 === 0 && y % 2 === 1) {
    return [idOf(width, x - 1, y), idOf(width, x + 1, y)];
  }
  return null;
}

function treePath(maze: Maze, from: CellId, to: CellId): CellId[] {
  const parents = new Map<CellId, CellId | null>([[from, null]]);
  const q: CellId[] = [from];
  let head = 0;
  while (head < q.length) {
    const v = q[head++];
    if (v === to) return reconstructPath(parents, to);
    for (const nb of openNeighbors(maze, v)) {
      if (parents.has(nb)) continue;
      parents.set(nb, v);
      q.push(nb);
    }
  }
  return [];
}

function componentWithout(maze: Maze, from: CellId, blocked: CellId) {
  const seen = new Uint8Array(maze.width * maze.height);
  const q: CellId[] = [from];
  seen[from] = 1;
  let head = 0;
  while (head < q.length) {
    const v = q[head++];
    for (const nb of openNeighbors(maze, v)) {
      if (nb === blocked || seen[nb]) continue;
      seen[nb] = 1;
      q.push(nb);
    }
  }
  return seen;
}

/**
 * Opens up to `count` lattice walls between cells that are already open.
 * The first one crosses the start/goal cut of the tree, which gives the goal
 * a second route; the rest are drawn from the remaining walls at random.
 * Returns the ids carved.
 */
export function carveExtraPassages(
  maze: Maze,
  count: number,
  rand: Rand
): CellId[] {
  const { width, blocks } = maze;
  const startId = idOf(width, maze.start.x, maze.start.y);
  const goalId = idOf(width, maze.goal.x, maze.goal.y);

  const walls: CellId[] = [];
  for (let id = 0; id < blocks.length; id++) {
    const sides = latticeSides(maze, id);
    if (!sides || isOpen(maze, id)) continue;
    if (isOpen(maze, sides[0]) && isOpen(maze, sides[1])) walls.push(id);
  }

  const carved: CellId[] = [];
  const carve = (id: CellId) => {
    blocks[id] = OPEN;
    carved.push(id);
    walls.splice(walls.indexOf(id), 1);
  };

  const pathWalls = treePath(maze, startId, goalId).filter(
    (id) => latticeSides(maze, id) !== null
  );
  if (count > 0 && pathWalls.length && walls.length) {
    const cut = pathWalls[Math.floor(rand() * pathWalls.length)];
    const side = componentWithout(maze, startId, cut);
    const crossing = walls.filter((id) => {
      const sides = latticeSides(maze, id);
      return sides !== null && side[sides[0]] !== side[sides[1]];
    });
    if (crossing.length) {
      carve(crossing[Math.floor(rand() * crossing.length)]);
    }
  }

  // shuffle what is left, then take from the front
  for (let i = walls.length - 1; i > 0; i--) {
    const j = Math.floor(rand() * (i + 1));
    [walls[i], walls[j]] = [walls[j], walls[i]];
  }
  while (carved.length < count && walls.length) {
    carve(walls[0]);
  }
  return carved;
}
