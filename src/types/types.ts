export type Cell = { x: number; y: number };

// row-major index: y * width + x
export type CellId = number;

export type AlgoKey = "DFS" | "BFS" | "UniformCost";

export type StepAction =
  | "exploring"
  | "visited"
  | "backtrack"
  | "neighbor_discovered"
  | "distance_updated"
  | "found"
  | "exhausted";

export type ColorRole =
  | "wall"
  | "empty"
  | "visited"
  | "frontier"
  | "current"
  | "path"
  | "start"
  | "goal";
