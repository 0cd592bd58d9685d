import type { Maze, Step } from "../../interfaces/interfaces";
import type { ColorRole } from "../../types/types";
import { gridLineColor, map_color_constants } from "../constants";
import { cellOf, idOf } from "../utils";

// Colour role of every cell for one step; later layers win.
export function panelColors(maze: Maze, step: Step | null): ColorRole[] {
  const roles: ColorRole[] = Array.from(maze.blocks, (b) =>
    b ? "wall" : "empty"
  );
  if (step) {
    step.visited.forEach((id) => (roles[id] = "visited"));
    step.frontier.forEach((id) => (roles[id] = "frontier"));
    if (step.current != null) roles[step.current] = "current";
    if (step.action === "found") {
      for (const id of step.path) roles[id] = "path";
    }
  }
  roles[idOf(maze.width, maze.start.x, maze.start.y)] = "start";
  roles[idOf(maze.width, maze.goal.x, maze.goal.y)] = "goal";
  return roles;
}

// ---------- Canvas Drawing ----------

export const drawPanel = (
  ctx: CanvasRenderingContext2D,
  maze: Maze,
  sizePx: number,
  step: Step | null
) => {
  const { width, height } = maze;
  const cell = sizePx / Math.max(width, height);
  ctx.clearRect(0, 0, sizePx, sizePx);

  panelColors(maze, step).forEach((role, id) => {
    const { x, y } = cellOf(width, id);
    ctx.fillStyle = map_color_constants[role];
    ctx.fillRect(x * cell, y * cell, cell, cell);
  });

  // grid lines (light)
  ctx.strokeStyle = gridLineColor;
  ctx.lineWidth = 0.5;
  for (let i = 0; i <= height; i++) {
    ctx.beginPath();
    ctx.moveTo(0, i * cell);
    ctx.lineTo(width * cell, i * cell);
    ctx.stroke();
  }
  for (let j = 0; j <= width; j++) {
    ctx.beginPath();
    ctx.moveTo(j * cell, 0);
    ctx.lineTo(j * cell, height * cell);
    ctx.stroke();
  }
};
