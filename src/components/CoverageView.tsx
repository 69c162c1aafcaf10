"use client";

import { useEffect, useRef, useState } from "react";
import { z } from "zod";
import type { Coverage } from "@/lib/types";

const CoverageResponse = z.object({
  upTo: z.number(),
  ranges: z.array(z.object({ from: z.number(), to: z.number() })),
  firstGap: z.number().nullable(),
});

const ErrorResponse = z.object({ error: z.string() });

type CoverageViewProps = {
  numbers: number[];
};

function formatRange(from: number, to: number): string {
  return from === to ? `${from}` : `${from}–${to}`;
}

type Scan = {
  coverage: Coverage;
  stopAtFirstGap: boolean;
};

function summarize({ coverage, stopAtFirstGap }: Scan): { summary: string; empty: string } {
  if (stopAtFirstGap && coverage.firstGap !== null) {
    return {
      summary: `Stopped at the first gap, ${coverage.firstGap}`,
      empty: `Target ${coverage.firstGap} is unreachable; larger targets were not scanned`,
    };
  }
  const gap = coverage.firstGap !== null ? ` · first gap at ${coverage.firstGap}` : " · no gaps";
  return { summary: `Scanned 1–${coverage.upTo}${gap}`, empty: "No reachable targets" };
}

export default function CoverageView({ numbers }: CoverageViewProps) {
  const [result, setResult] = useState<Scan | null>(null);
  const [stopAtFirstGap, setStopAtFirstGap] = useState(false);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const requestRef = useRef(0);
  const hand = numbers.join(",");

  useEffect(() => {
    requestRef.current++;
    setResult(null);
    setError(null);
    setLoading(false);
  }, [hand]);

  const scan = async () => {
    const id = ++requestRef.current;
    const stopping = stopAtFirstGap;
    setError(null);
    setLoading(true);
    try {
      const res = await fetch("/api/coverage", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ numbers, stopAtFirstGap: stopping }),
      });
      const data: unknown = await res.json().catch(() => null);
      if (id !== requestRef.current) return;
      if (!res.ok) {
        const failure = ErrorResponse.safeParse(data);
        throw new Error(failure.success ? failure.data.error : "Coverage scan failed");
      }
      const parsed = CoverageResponse.safeParse(data);
      if (!parsed.success) throw new Error("Unexpected coverage response");
      setResult({ coverage: parsed.data, stopAtFirstGap: stopping });
    } catch (e) {
      if (id === requestRef.current) setError(e instanceof Error ? e.message : "Coverage scan failed");
    } finally {
      if (id === requestRef.current) setLoading(false);
    }
  };

  return (
    <div className="w-full max-w-md mx-auto px-5 mb-6">
      <div className="text-xs uppercase tracking-widest text-neutral-400 mb-2">Reachable targets</div>
      <div className="flex gap-2 items-center mb-2">
        <button
          disabled={loading || numbers.length === 0}
          onClick={() => {
            void scan();
          }}
          className="h-10 px-4 rounded-xl bg-neutral-900 text-white text-sm font-medium active:bg-neutral-700 disabled:opacity-40 disabled:cursor-not-allowed transition-colors"
        >
          {loading ? "Scanning…" : "Scan"}
        </button>
        <label className="flex items-center gap-1.5 text-sm text-neutral-600">
          <input
            type="checkbox"
            checked={stopAtFirstGap}
            onChange={(e) => setStopAtFirstGap(e.target.checked)}
          />
          Stop at first gap
        </label>
      </div>
      {error ? (
        <div className="text-sm text-red-500">{error}</div>
      ) : result ? (
        <div className="text-sm text-neutral-700 space-y-1">
          <div className="text-neutral-500">{summarize(result).summary}</div>
          {result.coverage.ranges.length === 0 ? (
            <div className="text-neutral-400 italic">{summarize(result).empty}</div>
          ) : (
            <div className="font-mono text-xs bg-neutral-50 rounded-lg px-3 py-2 break-all">
              {result.coverage.ranges.map((r) => formatRange(r.from, r.to)).join(", ")}
            </div>
          )}
        </div>
      ) : null}
    </div>
  );
}
