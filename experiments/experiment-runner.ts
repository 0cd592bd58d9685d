// experiments/experiment-runner.ts
//
// Offline experiments for the Maze Search Lab.
// Runs DFS, BFS and uniform-cost on many generated mazes (tree and
// multiple-paths) and writes a CSV file with steps, visited cells,
// frontier size, path length and optimality.
//
// Run with:
//   npm run experiment
//
// CSV output: experiments/results.csv

import { writeFileSync } from "fs";
import { ALGO_KEYS } from "../src/algorithms";
import type { AlgoKey } from "../src/types/types";
import {
  CSV_HEADER,
  compareAlgorithms,
  toCsvRow,
  type AlgoResult,
} from "../src/utils/experiments/compare";
import { generateMaze } from "../src/utils/mapGen/mapGen";

// ---------- Experiment parameters (EDIT THESE AS YOU LIKE) ----------
const OUTPUT_CSV = "experiments/results.csv";

// how many seeds per configuration
const NUM_TRIALS = 50;

// maze sizes to test (odd)
const NS = [21, 41, 81];

const MODES = ["tree", "multiple"] as const;

const BASE_SEED = 1000;

function main() {
  const rows: string[] = [CSV_HEADER];
  const totals: Record<AlgoKey, AlgoResult[]> = {
    DFS: [],
    BFS: [],
    UniformCost: [],
  };

  for (const N of NS) {
    for (const mode of MODES) {
      for (let trial = 0; trial < NUM_TRIALS; trial++) {
        const maze = generateMaze({
          width: N,
          height: N,
          seed: BASE_SEED + trial,
          multiplePaths: mode === "multiple",
        });
        for (const r of compareAlgorithms(maze)) {
          rows.push(toCsvRow(maze, mode, r));
          totals[r.algo].push(r);
        }
      }
      console.log(`size=${N} mode=${mode}: ${NUM_TRIALS} mazes done`);
    }
  }

  writeFileSync(OUTPUT_CSV, rows.join("\n"), "utf8");
  console.log(`\nWrote ${rows.length - 1} rows to ${OUTPUT_CSV}\n`);

  const avg = (xs: number[]) =>
    xs.length ? xs.reduce((a, b) => a + b, 0) / xs.length : 0;
  for (const key of ALGO_KEYS) {
    const rs = totals[key];
    const optimal = rs.filter((r) => r.optimal === true).length;
    console.log(
      `${key.padEnd(12)} visited≈${avg(rs.map((r) => r.visited)).toFixed(1)}` +
        ` path≈${avg(rs.map((r) => r.pathLength ?? 0)).toFixed(1)}` +
        ` optimal=${((optimal / Math.max(1, rs.length)) * 100).toFixed(1)}%`
    );
  }
}

main();
