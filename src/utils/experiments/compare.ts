import { performance } from "perf_hooks";
import { ALGO_KEYS } from "../../algorithms";
import type { Maze } from "../../interfaces/interfaces";
import type { AlgoKey } from "../../types/types";
import { SolveSession } from "../stepper/SolveSession";
import { bfsLevels, idOf } from "../utils";

export interface AlgoResult {
  algo: AlgoKey;
  steps: number;
  visited: number;
  peakFrontier: number;
  pathLength: number | null; // edges; null if no path
  found: boolean;
  optimal: boolean | null; // null if goal unreachable
  runtimeMs: number;
}

export const CSV_HEADER = [
  "size",
  "mode",
  "seed",
  "algo",
  "steps",
  "visited",
  "peakFrontier",
  "pathLength",
  "found",
  "optimal",
  "runtimeMs",
].join(",");

// Runs every algorithm on the maze and checks its path against BFS hop distance.
export function compareAlgorithms(maze: Maze): AlgoResult[] {
  const goalId = idOf(maze.width, maze.goal.x, maze.goal.y);
  const startId = idOf(maze.width, maze.start.x, maze.start.y);
  const shortest = bfsLevels(maze, startId)[goalId];

  return ALGO_KEYS.map((algo) => {
    const begin = performance.now();
    const session = new SolveSession(algo, maze);
    while (!session.finished) session.advance();
    const runtimeMs = performance.now() - begin;

    const path = session.result?.path ?? [];
    const found = path.length > 0;
    const pathLength = found ? path.length - 1 : null;
    return {
      algo,
      steps: session.steps,
      visited: session.result?.visited.size ?? 0,
      peakFrontier: session.peakFrontier,
      pathLength,
      found,
      optimal: shortest === -1 ? null : pathLength === shortest,
      runtimeMs,
    };
  });
}

export function toCsvRow(
  maze: Maze,
  mode: string,
  r: AlgoResult
): string {
  return [
    maze.width,
    mode,
    maze.seed,
    r.algo,
    r.steps,
    r.visited,
    r.peakFrontier,
    r.pathLength ?? "",
    r.found,
    r.optimal ?? "",
    r.runtimeMs.toFixed(3),
  ].join(",");
}
