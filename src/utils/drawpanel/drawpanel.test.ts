import { describe, expect, it } from "vitest";
import { solveStepwise } from "../../algorithms";
import type { Step } from "../../interfaces/interfaces";
import { parseAscii } from "../ascii/ascii";
import { panelColors } from "./drawpanel";

const maze = parseAscii(["#####", "#S..#", "#.#.#", "#..G#", "#####"]);

describe("panelColors", () => {
  it("shows walls, empty cells and endpoints before any step", () => {
    const roles = panelColors(maze, null);
    expect(roles[0]).toBe("wall");
    expect(roles[7]).toBe("empty");
    expect(roles[6]).toBe("start");
    expect(roles[18]).toBe("goal");
  });

  it("layers visited, frontier and current cells", () => {
    const search = solveStepwise(maze, maze.start, maze.goal, "BFS");
    const steps: Step[] = [];
    for (let i = 0; i < 4; i++) {
      const res = search.next();
      if (!res.done) steps.push(res.value);
    }
    // exploring 6, discovered 11 and 7, exploring 11
    const roles = panelColors(maze, steps[3]);
    expect(roles[11]).toBe("current");
    expect(roles[7]).toBe("frontier");
    expect(roles[6]).toBe("start");
    expect(roles[8]).toBe("empty");
  });

  it("paints the found path", () => {
    const search = solveStepwise(maze, maze.start, maze.goal, "DFS");
    let last: Step | null = null;
    for (let res = search.next(); !res.done; res = search.next()) last = res.value;
    const roles = panelColors(maze, last);
    expect(last?.action).toBe("found");
    expect([11, 16, 17].map((id) => roles[id])).toEqual(["path", "path", "path"]);
    expect(roles[18]).toBe("goal");
  });
});
