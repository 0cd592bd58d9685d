import { describe, expect, it } from "vitest";
import { OPEN, WALL, type Maze } from "../../interfaces/interfaces";
import type { CellId } from "../../types/types";
import { SIMPLE_CHARSET, renderAscii } from "../ascii/ascii";
import { ConfigurationError } from "../errors/ConfigurationError";
import { bfsLevels, idOf, openCells, openNeighbors } from "../utils";
import { ALGO_KEYS, solve } from "../../algorithms";
import { carveExtraPassages, generateMaze, strategicPositions } from "./mapGen";

const layout = (maze: Maze) =>
  renderAscii(maze, {}, SIMPLE_CHARSET).split("\n");

// Undirected edges between open cells
function openEdges(maze: Maze): number {
  let edges = 0;
  for (const id of openCells(maze)) {
    edges += openNeighbors(maze, id).filter((nb) => nb > id).length;
  }
  return edges;
}

function isConnected(maze: Maze): boolean {
  const levels = bfsLevels(maze, idOf(maze.width, maze.start.x, maze.start.y));
  return openCells(maze).every((id) => levels[id] !== -1);
}

// Stops counting once `limit` distinct simple paths are found
function countSimplePaths(maze: Maze, limit: number): number {
  const from = idOf(maze.width, maze.start.x, maze.start.y);
  const to = idOf(maze.width, maze.goal.x, maze.goal.y);
  const onPath = new Set<CellId>();
  let count = 0;
  const walk = (id: CellId) => {
    if (count >= limit) return;
    if (id === to) {
      count++;
      return;
    }
    onPath.add(id);
    for (const nb of openNeighbors(maze, id)) {
      if (!onPath.has(nb)) walk(nb);
    }
    onPath.delete(id);
  };
  walk(from);
  return count;
}

describe("generateMaze", () => {
  it("reproduces the 5×5 layout for seed 42", () => {
    const maze = generateMaze({ width: 5, height: 5, seed: 42 });
    expect(layout(maze)).toEqual([
      "#####",
      "#S#.#",
      "#.#.#",
      "#..G#",
      "#####",
    ]);
  });

  it("reproduces a non-square layout", () => {
    const maze = generateMaze({ width: 11, height: 7, seed: 3 });
    expect(layout(maze)).toEqual([
      "###########",
      "#S#.......#",
      "#.#####.#.#",
      "#.......#.#",
      "#########.#",
      "#........G#",
      "###########",
    ]);
  });

  it("places start and goal in opposite corners", () => {
    const maze = generateMaze({ width: 9, height: 7, seed: 5 });
    expect(maze.start).toEqual({ x: 1, y: 1 });
    expect(maze.goal).toEqual({ x: 7, y: 5 });
    expect(maze.blocks[idOf(9, 1, 1)]).toBe(OPEN);
    expect(maze.blocks[idOf(9, 7, 5)]).toBe(OPEN);
  });

  it("walls in the border", () => {
    const maze = generateMaze({ width: 15, height: 11, seed: 8 });
    for (let x = 0; x < 15; x++) {
      expect(maze.blocks[idOf(15, x, 0)]).toBe(WALL);
      expect(maze.blocks[idOf(15, x, 10)]).toBe(WALL);
    }
    for (let y = 0; y < 11; y++) {
      expect(maze.blocks[idOf(15, 0, y)]).toBe(WALL);
      expect(maze.blocks[idOf(15, 14, y)]).toBe(WALL);
    }
  });

  it("produces a spanning tree over the open cells", () => {
    for (const n of [5, 7, 9, 15, 21, 31]) {
      for (const seed of [1, 2, 3, 42, 1234, 99999]) {
        const maze = generateMaze({ width: n, height: n, seed });
        expect(isConnected(maze)).toBe(true);
        expect(openEdges(maze)).toBe(openCells(maze).length - 1);
      }
    }
  });

  it("opens every odd-coordinate cell", () => {
    const maze = generateMaze({ width: 13, height: 9, seed: 17 });
    for (let y = 1; y < 9; y += 2) {
      for (let x = 1; x < 13; x += 2) {
        expect(maze.blocks[idOf(13, x, y)]).toBe(OPEN);
      }
    }
  });

  it("is deterministic for a fixed seed", () => {
    const a = generateMaze({ width: 21, height: 15, seed: 77 });
    const b = generateMaze({ width: 21, height: 15, seed: 77 });
    expect(Array.from(b.blocks)).toEqual(Array.from(a.blocks));
    const c = generateMaze({ width: 21, height: 15, seed: 78 });
    expect(Array.from(c.blocks)).not.toEqual(Array.from(a.blocks));
  });

  it("draws and records a seed when none is given", () => {
    const maze = generateMaze({ width: 7, height: 7 });
    expect(Number.isInteger(maze.seed)).toBe(true);
    const again = generateMaze({ width: 7, height: 7, seed: maze.seed });
    expect(Array.from(again.blocks)).toEqual(Array.from(maze.blocks));
  });

  it("rejects invalid dimensions before generating", () => {
    expect(() => generateMaze({ width: 6, height: 7 })).toThrow(ConfigurationError);
    expect(() => generateMaze({ width: 3, height: 3 })).toThrow(ConfigurationError);
    expect(() => generateMaze({ width: -5, height: 7 })).toThrow(ConfigurationError);
  });
});

describe("multiple paths", () => {
  it("opens the last lattice wall of the 5×5 maze", () => {
    const maze = generateMaze({
      width: 5,
      height: 5,
      seed: 42,
      multiplePaths: true,
    });
    expect(layout(maze)).toEqual([
      "#####",
      "#S..#",
      "#.#.#",
      "#..G#",
      "#####",
    ]);
    expect(countSimplePaths(maze, 5)).toBe(2);
  });

  it("adds loops without disconnecting anything", () => {
    for (const n of [9, 15, 21]) {
      for (const seed of [1, 2, 3, 4]) {
        const tree = generateMaze({ width: n, height: n, seed });
        const maze = generateMaze({ width: n, height: n, seed, multiplePaths: true });
        expect(isConnected(maze)).toBe(true);
        expect(openCells(maze).length).toBe(openCells(tree).length + 3);
        expect(openEdges(maze)).toBe(openCells(maze).length - 1 + 3);
      }
    }
  });

  it("always gives the goal a second route", () => {
    for (const seed of [1, 2, 3, 4, 5, 6, 7, 8]) {
      const maze = generateMaze({
        width: 11,
        height: 11,
        seed,
        multiplePaths: true,
        extraPassages: 1,
      });
      expect(countSimplePaths(maze, 2)).toBe(2);
    }
  });

  it("carves no more walls than asked for", () => {
    const maze = generateMaze({ width: 9, height: 9, seed: 4 });
    const carved = carveExtraPassages(maze, 2, () => 0.5);
    expect(carved).toHaveLength(2);
    for (const id of carved) expect(maze.blocks[id]).toBe(OPEN);
  });

  it("carves nothing when asked for zero passages", () => {
    const maze = generateMaze({ width: 9, height: 9, seed: 4 });
    const before = Array.from(maze.blocks);
    expect(carveExtraPassages(maze, 0, () => 0.5)).toEqual([]);
    expect(Array.from(maze.blocks)).toEqual(before);
  });
});

describe("strategicPositions", () => {
  it("lists corners, centre and edge midpoints on odd coordinates", () => {
    expect(strategicPositions(9, 7)).toEqual([
      { x: 1, y: 1 },
      { x: 7, y: 1 },
      { x: 1, y: 5 },
      { x: 7, y: 5 },
      { x: 5, y: 3 },
      { x: 5, y: 1 },
      { x: 5, y: 5 },
      { x: 1, y: 3 },
      { x: 7, y: 3 },
    ]);
  });

  it("collapses to the four corners on the smallest maze", () => {
    expect(strategicPositions(5, 5)).toEqual([
      { x: 1, y: 1 },
      { x: 3, y: 1 },
      { x: 1, y: 3 },
      { x: 3, y: 3 },
    ]);
  });
});

describe("randomized endpoints", () => {
  it("draws both endpoints from the seed", () => {
    const maze = generateMaze({
      width: 9,
      height: 7,
      seed: 42,
      randomizeStart: true,
      randomizeGoal: true,
    });
    expect(maze.start).toEqual({ x: 5, y: 3 });
    expect(maze.goal).toEqual({ x: 5, y: 5 });
  });

  it("moves the goal off a start that landed on its corner", () => {
    const maze = generateMaze({ width: 9, height: 7, seed: 1, randomizeStart: true });
    expect(maze.start).toEqual({ x: 7, y: 5 });
    expect(maze.goal).toEqual({ x: 5, y: 1 });
  });

  it("keeps the corner goal when only the start is randomized", () => {
    const maze = generateMaze({ width: 9, height: 7, seed: 2, randomizeStart: true });
    expect(maze.start).toEqual({ x: 1, y: 1 });
    expect(maze.goal).toEqual({ x: 7, y: 5 });
  });

  it("leaves the layout untouched", () => {
    const plain = generateMaze({ width: 15, height: 15, seed: 31 });
    const moved = generateMaze({
      width: 15,
      height: 15,
      seed: 31,
      randomizeStart: true,
      randomizeGoal: true,
    });
    expect(Array.from(moved.blocks)).toEqual(Array.from(plain.blocks));
  });

  it("is deterministic and yields distinct open strategic endpoints", () => {
    const starts = new Set<string>();
    for (let seed = 1; seed <= 10; seed++) {
      const options = { width: 21, height: 21, seed, randomizeStart: true, randomizeGoal: true };
      const maze = generateMaze(options);
      const again = generateMaze(options);
      expect(again.start).toEqual(maze.start);
      expect(again.goal).toEqual(maze.goal);

      expect(maze.goal).not.toEqual(maze.start);
      expect(maze.blocks[idOf(21, maze.start.x, maze.start.y)]).toBe(OPEN);
      expect(maze.blocks[idOf(21, maze.goal.x, maze.goal.y)]).toBe(OPEN);
      const spots = strategicPositions(21, 21);
      expect(spots).toContainEqual(maze.start);
      expect(spots).toContainEqual(maze.goal);
      starts.add(`${maze.start.x},${maze.start.y}`);
    }
    expect(starts.size).toBeGreaterThan(1);
  });

  it.each(ALGO_KEYS)("%s still reaches a randomized goal", (key) => {
    for (const multiplePaths of [false, true]) {
      const maze = generateMaze({
        width: 15,
        height: 11,
        seed: 6,
        multiplePaths,
        randomizeStart: true,
        randomizeGoal: true,
      });
      const { path } = solve(maze, maze.start, maze.goal, key);
      expect(path[0]).toBe(idOf(15, maze.start.x, maze.start.y));
      expect(path[path.length - 1]).toBe(idOf(15, maze.goal.x, maze.goal.y));
    }
  });
});
