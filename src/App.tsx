import React, { useEffect, useMemo, useRef, useState } from "react";
import { ALGO_KEYS } from "./algorithms";
import type { Maze, Step } from "./interfaces/interfaces";
import type { AlgoKey } from "./types/types";
import { MIN_SIZE } from "./utils/config/mazeConfig";
import { drawPanel } from "./utils/drawpanel/drawpanel";
import { generateMaze, randomSeed } from "./utils/mapGen/mapGen";
import { SolveSession, advanceAll } from "./utils/stepper/SolveSession";

// =====================
// Maze Search Lab
// - DFS, BFS and uniform-cost side by side on the same generated maze
// - Lockstep animation: every algorithm advances one step per tick
// - "Multiple paths" carves extra passages so the algorithms have a choice
// =====================

const MAX_UI_SIZE = 101;
const sizePx = 360; // per panel

const toOddSize = (v: number) => {
  const n = Math.max(MIN_SIZE, Math.min(MAX_UI_SIZE, Math.floor(v) || 21));
  return n % 2 ? n : n + 1;
};

interface PanelState {
  step: Step | null;
  steps: number;
  peakFrontier: number;
  finished: boolean;
  pathLength: number | null;
}

const idlePanel: PanelState = {
  step: null,
  steps: 0,
  peakFrontier: 0,
  finished: false,
  pathLength: null,
};

const snapshot = (s: SolveSession): PanelState => ({
  step: s.last,
  steps: s.steps,
  peakFrontier: s.peakFrontier,
  finished: s.finished,
  pathLength: s.result?.path.length ? s.result.path.length - 1 : null,
});

const createSessions = (maze: Maze) =>
  ALGO_KEYS.map((key) => new SolveSession(key, maze));

const idlePanels = (): Record<AlgoKey, PanelState> => ({
  DFS: idlePanel,
  BFS: idlePanel,
  UniformCost: idlePanel,
});

export default function MazeSearchLab() {
  const [size, setSize] = useState(21);
  const [seed, setSeed] = useState(42);
  const [multiplePaths, setMultiplePaths] = useState(false);
  const [randomEnds, setRandomEnds] = useState(false);
  const [speed, setSpeed] = useState(10); // steps per second
  const [running, setRunning] = useState(false);

  const maze = useMemo(
    () =>
      generateMaze({
        width: size,
        height: size,
        seed,
        multiplePaths,
        randomizeStart: randomEnds,
        randomizeGoal: randomEnds,
      }),
    [size, seed, multiplePaths, randomEnds]
  );

  const sessionsRef = useRef<SolveSession[]>([]);
  const [panels, setPanels] = useState<Record<AlgoKey, PanelState>>(idlePanels);
  const [finishOrder, setFinishOrder] = useState<AlgoKey[]>([]);

  const resetRun = () => {
    sessionsRef.current = createSessions(maze);
    setPanels(idlePanels());
    setFinishOrder([]);
    setRunning(false);
  };

  // New sessions whenever the maze changes
  useEffect(resetRun, [maze]);

  // Animation loop (lockstep)
  useEffect(() => {
    if (!running) return;
    let handle: number;
    let acc = 0;
    const stepInterval = 1000 / speed;
    let last = performance.now();

    const tick = () => {
      const now = performance.now();
      acc += now - last;
      last = now;

      while (acc >= stepInterval) {
        acc -= stepInterval;
        const sessions = sessionsRef.current;
        const before = sessions.filter((s) => s.finished).map((s) => s.key);
        const allDone = advanceAll(sessions);

        const updates = idlePanels();
        for (const s of sessions) updates[s.key] = snapshot(s);
        setPanels(updates);

        const newlyDone = sessions
          .filter((s) => s.finished && !before.includes(s.key))
          .map((s) => s.key);
        if (newlyDone.length) setFinishOrder((o) => [...o, ...newlyDone]);

        if (allDone) {
          setRunning(false);
          return;
        }
      }
      handle = requestAnimationFrame(tick);
    };

    handle = requestAnimationFrame(tick);
    return () => cancelAnimationFrame(handle);
  }, [running, speed]);

  // Canvas refs and drawing
  const canvasRefs: Record<AlgoKey, React.RefObject<HTMLCanvasElement>> = {
    DFS: useRef<HTMLCanvasElement>(null),
    BFS: useRef<HTMLCanvasElement>(null),
    UniformCost: useRef<HTMLCanvasElement>(null),
  };
  useEffect(() => {
    for (const key of ALGO_KEYS) {
      const ctx = canvasRefs[key].current?.getContext("2d");
      if (!ctx) continue;
      drawPanel(ctx, maze, sizePx, panels[key].step);
    }
  }, [panels, maze]);

  return (
    <div className="min-h-screen">
      <div className="wrapper">
        <header className="mb-6">
          <h1 className="text-3xl font-bold tracking-tight">Maze Search Lab</h1>
          <p className="text-slate-600">Side‑by‑side DFS · BFS · Uniform-cost on generated mazes</p>
        </header>

        {/* Controls */}
        <div className="controls">
          <div className="control-card">
            <label className="block text-sm mb-1">Maze Size (odd, N×N)</label>
            <input type="number" value={size} min={MIN_SIZE} max={MAX_UI_SIZE} step={2} onChange={e => setSize(toOddSize(Number(e.target.value)))} className="w-full border rounded px-3 py-2" />
            <div className="mt-3 flex items-center gap-2">
              <input id="multiplePaths" type="checkbox" checked={multiplePaths} onChange={e => setMultiplePaths(e.target.checked)} />
              <label htmlFor="multiplePaths" className="text-sm">Multiple paths (adds loops)</label>
            </div>
            <div className="mt-2 flex items-center gap-2">
              <input id="randomEnds" type="checkbox" checked={randomEnds} onChange={e => setRandomEnds(e.target.checked)} />
              <label htmlFor="randomEnds" className="text-sm">Random start &amp; goal</label>
            </div>
          </div>
          <div className="control-card">
            <label className="block text-sm mb-1">Seed</label>
            <input type="number" value={seed} min={0} onChange={e => setSeed(Math.max(0, Math.floor(Number(e.target.value)) || 0))} className="w-full border rounded px-3 py-2" />
            <button onClick={() => setSeed(randomSeed())} className="mt-2 px-3 py-1 rounded bg-slate-200">New maze</button>
            <label className="block text-sm mt-4">Speed: {speed} steps/s</label>
            <input type="range" min={1} max={60} value={speed} onChange={e => setSpeed(Number(e.target.value))} className="w-full" />
          </div>
          <div className="control-card flex flex-col gap-2">
            <button onClick={() => setRunning(true)} disabled={running} className="px-4 py-2 rounded-xl bg-emerald-600 text-white disabled:opacity-50">Start</button>
            <button onClick={() => setRunning(false)} className="px-4 py-2 rounded-xl bg-amber-500 text-white">Pause</button>
            <button onClick={resetRun} className="px-4 py-2 rounded-xl bg-slate-800 text-white">Reset</button>
            <div className="text-xs text-slate-500">Start: ({maze.start.x},{maze.start.y}) · Goal: ({maze.goal.x},{maze.goal.y})</div>
          </div>
        </div>

        {/* Panels */}
        <div className="panels">
          {ALGO_KEYS.map(key => {
            const s = panels[key];
            return (
              <div key={key} className="panel">
                <div className="flex items-center justify-between mb-2">
                  <h2 className="font-semibold">{key}</h2>
                  <div className="text-xs text-slate-500">{s.step?.action === "found" ? "Found" : s.finished ? "No path" : running ? "Running" : "Idle"}</div>
                </div>
                <canvas ref={canvasRefs[key]} width={sizePx} height={sizePx} />
                <div className="stats">
                  <div className="text-slate-500">Steps</div><div className="font-mono">{s.steps}</div>
                  <div className="text-slate-500">Visited</div><div className="font-mono">{s.step?.visited.size ?? 0}</div>
                  <div className="text-slate-500">Peak frontier</div><div className="font-mono">{s.peakFrontier}</div>
                  <div className="text-slate-500">Path length</div><div className="font-mono">{s.pathLength ?? "—"}</div>
                </div>
              </div>
            );
          })}
        </div>

        {/* Finish order */}
        <div className="finish-order">
          <h3 className="font-semibold mb-2">Finish Order</h3>
          {finishOrder.length === 0 ? (
            <div className="text-sm text-slate-500">No algorithm has finished yet.</div>
          ) : (
            <ol className="list-decimal list-inside space-y-1">
              {finishOrder.map(key => (
                <li key={key} className="text-sm">
                  {key} — <span className="font-mono">{panels[key].steps} steps</span>
                  {panels[key].pathLength === null && <span className="text-sm"> (no path)</span>}
                </li>
              ))}
            </ol>
          )}
        </div>

        <footer className="mt-8 text-xs text-slate-500">
          Colors — walls: slate‑900, visited: amber‑200, frontier: blue‑200, path: green‑300, current: red; start: green; goal: violet.
        </footer>
      </div>
    </div>
  );
}
