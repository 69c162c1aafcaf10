"use client";

import { useState, useEffect, useRef, useCallback } from "react";
import { z } from "zod";
import type { SolveWorkerReply } from "@/workers/solve.worker";
import TopBar from "@/components/TopBar";
import TargetDisplay from "@/components/TargetDisplay";
import NumberGrid from "@/components/NumberGrid";
import OperatorLegend from "@/components/OperatorLegend";
import MatchList from "@/components/MatchList";
import CoverageView from "@/components/CoverageView";
import CountTable from "@/components/CountTable";
import { DEFAULT_MAX_NUMBERS } from "@/lib/config";

// Server routes read SOLVER_MAX_NUMBERS; an override above this default only matters to API callers.
const MAX_NUMBERS = DEFAULT_MAX_NUMBERS;

const PuzzleResponse = z.object({
  target: z.number(),
  numbers: z.array(z.number()),
  solutions: z.number(),
});

function parsePositiveInt(raw: string): number | null {
  const n = Number(raw.trim());
  return Number.isInteger(n) && n > 0 ? n : null;
}

export default function Home() {
  const [numbers, setNumbers] = useState<number[]>([]);
  const [numberInput, setNumberInput] = useState("");
  const [targetInput, setTargetInput] = useState("");
  const [lines, setLines] = useState<string[]>([]);
  const [matchCount, setMatchCount] = useState<number | null>(null);
  const [running, setRunning] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [fetchingPuzzle, setFetchingPuzzle] = useState(false);
  const workerRef = useRef<Worker | null>(null);
  const requestIdRef = useRef(0);

  const target = targetInput.trim() === "" ? null : Number(targetInput);
  const targetValid = target !== null && Number.isInteger(target);

  useEffect(() => {
    const worker = new Worker(new URL("../workers/solve.worker.ts", import.meta.url));
    worker.onmessage = (e: MessageEvent<SolveWorkerReply>) => {
      const reply = e.data;
      // A newer request supersedes this one.
      if (reply.id !== requestIdRef.current) return;
      setRunning(false);
      if (reply.kind === "error") {
        setError(reply.error);
        return;
      }
      setLines(reply.lines);
      setMatchCount(reply.count);
    };
    worker.onerror = (e) => {
      setRunning(false);
      setError(e.message || "Solver crashed");
    };
    workerRef.current = worker;
    return () => {
      worker.terminate();
      workerRef.current = null;
    };
  }, []);

  const resetResults = useCallback(() => {
    requestIdRef.current++;
    setLines([]);
    setMatchCount(null);
    setRunning(false);
    setError(null);
  }, []);

  const addNumber = () => {
    const n = parsePositiveInt(numberInput);
    if (n === null || numbers.length >= MAX_NUMBERS) return;
    setNumbers((prev) => [...prev, n]);
    setNumberInput("");
    resetResults();
  };

  const removeNumber = (index: number) => {
    setNumbers((prev) => prev.filter((_, i) => i !== index));
    resetResults();
  };

  const runSolve = () => {
    const worker = workerRef.current;
    if (!worker || !targetValid || target === null || numbers.length === 0) return;
    const id = ++requestIdRef.current;
    setError(null);
    setRunning(true);
    worker.postMessage({ type: "solve", id, numbers, target });
  };

  const randomPuzzle = async () => {
    setFetchingPuzzle(true);
    try {
      const res = await fetch("/api/puzzle", { cache: "no-store" });
      const parsed = PuzzleResponse.safeParse(await res.json().catch(() => null));
      if (!res.ok || !parsed.success) throw new Error("Failed to fetch a puzzle");
      resetResults();
      setNumbers(parsed.data.numbers);
      setTargetInput(String(parsed.data.target));
    } catch (e) {
      setError(e instanceof Error ? e.message : "Failed to fetch a puzzle");
    } finally {
      setFetchingPuzzle(false);
    }
  };

  return (
    <main className="min-h-screen flex flex-col pb-8">
      <TopBar
        matchCount={matchCount}
        busy={fetchingPuzzle || running}
        onRandomPuzzle={() => {
          void randomPuzzle();
        }}
      />
      <TargetDisplay target={targetValid ? target : null} />

      <NumberGrid numbers={numbers} disabled={running} onRemove={removeNumber} />

      <div className="flex gap-2 px-4 py-3 max-w-md mx-auto w-full">
        <input
          value={numberInput}
          onChange={(e) => setNumberInput(e.target.value)}
          onKeyDown={(e) => {
            if (e.key === "Enter") addNumber();
          }}
          inputMode="numeric"
          placeholder="Number"
          className="flex-1 min-w-0 h-12 px-3 rounded-xl border border-neutral-200 text-neutral-800 bg-white"
        />
        <button
          onClick={addNumber}
          disabled={running || numbers.length >= MAX_NUMBERS}
          className="h-12 px-4 rounded-xl border-2 border-neutral-300 text-neutral-600 font-medium active:bg-neutral-100 disabled:opacity-40 transition-colors"
        >
          Add
        </button>
        <input
          value={targetInput}
          onChange={(e) => {
            setTargetInput(e.target.value);
            resetResults();
          }}
          onKeyDown={(e) => {
            if (e.key === "Enter") runSolve();
          }}
          inputMode="numeric"
          placeholder="Target"
          className="w-24 h-12 px-3 rounded-xl border border-neutral-200 text-neutral-800 bg-white"
        />
      </div>

      <OperatorLegend />

      <div className="w-full max-w-md mx-auto px-4 mb-4">
        <button
          onClick={runSolve}
          disabled={running || !targetValid || numbers.length === 0}
          className="w-full h-14 bg-neutral-900 text-white rounded-xl font-medium text-lg active:bg-neutral-700 disabled:opacity-40 disabled:cursor-not-allowed transition-colors"
        >
          Solve
        </button>
      </div>

      <MatchList lines={lines} ready={matchCount !== null} running={running} error={error} />
      <CountTable numbers={numbers} />
      <CoverageView numbers={numbers} />
    </main>
  );
}
