import type { Maze, Search, SearchOptions } from "../interfaces/interfaces";
import type { CellId } from "../types/types";
import { MinHeap } from "../utils/MinHeap/MinHeap";
import { openNeighbors, reconstructPath } from "../utils/utils";

// Every move costs 1.
const STEP_COST = 1;

/**
 * Uniform-cost search. The heap may hold stale entries for a cell whose
 * distance was lowered later; only the first pop of a cell finalizes it.
 */
export function* algoDijkstra(
  maze: Maze,
  start: CellId,
  goal: CellId,
  { snapshots = true }: SearchOptions = {}
): Search {
  const heap = new MinHeap<CellId>();
  const dist = new Map<CellId, number>([[start, 0]]);
  const parents = new Map<CellId, CellId | null>();
  parents.set(start, null);
  const closed = new Set<CellId>();
  const seen = () => (snapshots ? new Set(closed) : closed);
  const pending = () => (snapshots ? heap.values() : []);

  heap.push(0, start);
  while (heap.size()) {
    const g = heap.peekKey();
    const n = heap.pop();
    if (n === undefined || g === undefined) break;
    if (closed.has(n)) continue;
    closed.add(n);

    yield {
      key: "UniformCost",
      action: "visited",
      current: n,
      distance: g,
      visited: seen(),
      frontier: pending(),
    };

    if (n === goal) {
      const path = reconstructPath(parents, goal);
      yield {
        key: "UniformCost",
        action: "found",
        current: n,
        visited: seen(),
        frontier: pending(),
        path: [...path],
      };
      return { path, visited: closed };
    }

    for (const m of openNeighbors(maze, n)) {
      if (closed.has(m)) continue;
      const ng = g + STEP_COST;
      const known = dist.get(m);
      if (known !== undefined && ng >= known) continue;
      dist.set(m, ng);
      parents.set(m, n);
      heap.push(ng, m);
      yield {
        key: "UniformCost",
        action: "distance_updated",
        current: n,
        neighbor: m,
        distance: ng,
        visited: seen(),
        frontier: pending(),
      };
    }
  }

  yield {
    key: "UniformCost",
    action: "exhausted",
    current: null,
    visited: seen(),
    frontier: [],
  };
  return { path: [], visited: closed };
}
