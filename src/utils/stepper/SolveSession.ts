import { solveStepwise } from "../../algorithms";
import type { Maze, Search, SolveResult, Step } from "../../interfaces/interfaces";
import type { AlgoKey, Cell } from "../../types/types";

export const isTerminal = (step: Step) =>
  step.action === "found" || step.action === "exhausted";

/**
 * Resumable wrapper around one step stream. Each `advance()` runs the search
 * forward one transition; the session finishes on the terminal step.
 */
export class SolveSession {
  private search: Search | null;
  private _last: Step | null = null;
  private _result: SolveResult | null = null;
  private _steps = 0;
  private _peakFrontier = 0;

  constructor(
    readonly key: AlgoKey,
    maze: Maze,
    start: Cell = maze.start,
    goal: Cell = maze.goal
  ) {
    this.search = solveStepwise(maze, start, goal, key);
  }

  advance(): Step | null {
    if (!this.search) return null;
    const res = this.search.next();
    if (res.done) {
      this.finish(res.value);
      return null;
    }
    const step = res.value;
    this._last = step;
    this._steps++;
    this._peakFrontier = Math.max(this._peakFrontier, step.frontier.length);
    if (isTerminal(step)) {
      let end = this.search.next();
      while (!end.done) end = this.search.next();
      this.finish(end.value);
    }
    return step;
  }

  private finish(result: SolveResult) {
    this._result = result;
    this.search = null;
  }

  get finished() {
    return this.search === null;
  }
  get last() {
    return this._last;
  }
  get result() {
    return this._result;
  }
  get steps() {
    return this._steps;
  }
  get peakFrontier() {
    return this._peakFrontier;
  }
}

// One lockstep tick: every unfinished session moves one step. True once all are done.
export function advanceAll(sessions: readonly SolveSession[]): boolean {
  for (const s of sessions) {
    if (!s.finished) s.advance();
  }
  return sessions.every((s) => s.finished);
}
