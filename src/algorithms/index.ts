import type {
  Maze,
  Search,
  SearchOptions,
  SolveResult,
} from "../interfaces/interfaces";
import type { AlgoKey, Cell, CellId } from "../types/types";
import { ConfigurationError } from "../utils/errors/ConfigurationError";
import { idOf, inBounds, isOpen } from "../utils/utils";
import { algoBFS } from "./BFS";
import { algoDFS } from "./DFS";
import { algoDijkstra } from "./Dijkstra";

export const ALGORITHMS: Record<
  AlgoKey,
  (maze: Maze, start: CellId, goal: CellId, options?: SearchOptions) => Search
> = {
  DFS: algoDFS,
  BFS: algoBFS,
  UniformCost: algoDijkstra,
};

export const ALGO_KEYS: AlgoKey[] = ["DFS", "BFS", "UniformCost"];

function checkEndpoint(maze: Maze, name: string, cell: Cell, issues: string[]) {
  if (!inBounds(maze, cell.x, cell.y)) {
    issues.push(`${name}: (${cell.x},${cell.y}) is outside the grid`);
  } else if (!isOpen(maze, idOf(maze.width, cell.x, cell.y))) {
    issues.push(`${name}: (${cell.x},${cell.y}) is a wall`);
  }
}

/**
 * Starts a step-by-step search. Endpoints are checked here, before the first
 * pull; the returned generator yields one Step per transition and returns the
 * final result. Steps are snapshots unless `options.snapshots` is false.
 */
export function solveStepwise(
  maze: Maze,
  start: Cell,
  goal: Cell,
  key: AlgoKey,
  options?: SearchOptions
): Search {
  const issues: string[] = [];
  checkEndpoint(maze, "start", start, issues);
  checkEndpoint(maze, "goal", goal, issues);
  if (issues.length) throw new ConfigurationError(issues);

  return ALGORITHMS[key](
    maze,
    idOf(maze.width, start.x, start.y),
    idOf(maze.width, goal.x, goal.y),
    options
  );
}

// Runs the search to completion without copying state into each step.
export function solve(
  maze: Maze,
  start: Cell,
  goal: Cell,
  key: AlgoKey
): SolveResult {
  const search = solveStepwise(maze, start, goal, key, { snapshots: false });
  let res = search.next();
  while (!res.done) res = search.next();
  return res.value;
}
