import type { ColorRole } from "../types/types";

export const map_color_constants: Record<ColorRole, string> = {
  empty: "#f8fafc",
  wall: "#0f172a",
  visited: "#fde68a", // amber-200
  frontier: "#bfdbfe", // blue-200
  current: "#ef4444",
  path: "#86efac", // green-300
  start: "#22c55e",
  goal: "#8b5cf6",
};

export const gridLineColor = "#e2e8f0";
