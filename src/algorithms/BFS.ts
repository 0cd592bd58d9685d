import type { Maze, Search, SearchOptions } from "../interfaces/interfaces";
import type { CellId } from "../types/types";
import { openNeighbors, reconstructPath } from "../utils/utils";

export function* algoBFS(
  maze: Maze,
  start: CellId,
  goal: CellId,
  { snapshots = true }: SearchOptions = {}
): Search {
  const openQ: CellId[] = [start];
  let head = 0;
  // marked on enqueue so a cell is queued at most once
  const visited = new Set<CellId>([start]);
  const parents = new Map<CellId, CellId | null>();
  parents.set(start, null);
  const seen = () => (snapshots ? new Set(visited) : visited);
  const pending = () => (snapshots ? openQ.slice(head) : []);

  while (head < openQ.length) {
    const n = openQ[head++];
    yield {
      key: "BFS",
      action: "exploring",
      current: n,
      visited: seen(),
      frontier: pending(),
    };

    if (n === goal) {
      const path = reconstructPath(parents, goal);
      yield {
        key: "BFS",
        action: "found",
        current: n,
        visited: seen(),
        frontier: pending(),
        path: [...path],
      };
      return { path, visited };
    }

    for (const m of openNeighbors(maze, n)) {
      if (visited.has(m)) continue;
      visited.add(m);
      parents.set(m, n);
      openQ.push(m);
      yield {
        key: "BFS",
        action: "neighbor_discovered",
        current: n,
        neighbor: m,
        visited: seen(),
        frontier: pending(),
      };
    }
  }

  yield {
    key: "BFS",
    action: "exhausted",
    current: null,
    visited: seen(),
    frontier: [],
  };
  return { path: [], visited };
}
