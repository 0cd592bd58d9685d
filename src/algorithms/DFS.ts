import type { Maze, Search, SearchOptions } from "../interfaces/interfaces";
import type { CellId } from "../types/types";
import { openNeighbors } from "../utils/utils";

// Tracks a single live path; follows the first unvisited neighbour and pops on dead ends.
export function* algoDFS(
  maze: Maze,
  start: CellId,
  goal: CellId,
  { snapshots = true }: SearchOptions = {}
): Search {
  const visited = new Set<CellId>([start]);
  const path: CellId[] = [start];
  const seen = () => (snapshots ? new Set(visited) : visited);
  const trail = () => (snapshots ? [...path] : []);

  yield {
    key: "DFS",
    action: "visited",
    current: start,
    visited: seen(),
    frontier: trail(),
  };
  if (start === goal) {
    yield {
      key: "DFS",
      action: "found",
      current: start,
      visited: seen(),
      frontier: trail(),
      path: [...path],
    };
    return { path: [...path], visited };
  }

  while (path.length) {
    const top = path[path.length - 1];
    const next = openNeighbors(maze, top).find((m) => !visited.has(m));

    if (next === undefined) {
      path.pop();
      yield {
        key: "DFS",
        action: "backtrack",
        current: top,
        visited: seen(),
        frontier: trail(),
      };
      continue;
    }

    visited.add(next);
    path.push(next);
    if (next === goal) {
      yield {
        key: "DFS",
        action: "found",
        current: next,
        visited: seen(),
        frontier: trail(),
        path: [...path],
      };
      return { path: [...path], visited };
    }
    yield {
      key: "DFS",
      action: "exploring",
      current: next,
      visited: seen(),
      frontier: trail(),
    };
  }

  yield {
    key: "DFS",
    action: "exhausted",
    current: null,
    visited: seen(),
    frontier: [],
  };
  return { path: [], visited };
}
