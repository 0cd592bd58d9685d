import type { AlgoKey, Cell, CellId } from "../types/types";

export const OPEN = 0;
export const WALL = 1;

export interface Maze {
  width: number;
  height: number;
  blocks: Uint8Array; // OPEN / WALL, row-major
  start: Cell;
  goal: Cell;
  seed: number;
}

export interface MazeOptions {
  width: number;
  height: number;
  seed?: number;
  multiplePaths?: boolean;
  extraPassages?: number;
  randomizeStart?: boolean; // strategic position instead of (1,1)
  randomizeGoal?: boolean;
}

export interface SolveResult {
  path: CellId[]; // start..goal inclusive, [] when unreachable
  visited: Set<CellId>;
}

interface StepBase {
  key: AlgoKey;
  current: CellId;
  visited: ReadonlySet<CellId>; // cumulative snapshot
  frontier: CellId[]; // pending ids (for visualization only)
}

export type Step =
  | (StepBase & { action: "exploring" | "backtrack" })
  | (StepBase & { action: "visited"; distance?: number })
  | (StepBase & { action: "neighbor_discovered"; neighbor: CellId })
  | (StepBase & {
      action: "distance_updated";
      neighbor: CellId;
      distance: number;
    })
  | (StepBase & { action: "found"; path: CellId[] })
  | (Omit<StepBase, "current"> & { action: "exhausted"; current: null });

export type Search = Generator<Step, SolveResult, void>;

export interface SearchOptions {
  // false: steps share the live visited set and carry an empty frontier
  snapshots?: boolean;
}
