"use client";

import { useEffect, useRef, useState } from "react";
import { z } from "zod";
import type { TargetCount } from "@/lib/types";

const CountResponse = z.object({
  rows: z.array(z.object({ target: z.number(), count: z.number() })),
});

const ErrorResponse = z.object({ error: z.string() });

/** Group targets by how many answers they have. Tiers sorted by count desc. */
function groupByCount(rows: TargetCount[]): { count: number; targets: number[] }[] {
  const sorted = [...rows].sort((a, b) => b.count - a.count || a.target - b.target);
  const tiers: { count: number; targets: number[] }[] = [];
  for (const r of sorted) {
    const last = tiers[tiers.length - 1];
    if (last && last.count === r.count) {
      last.targets.push(r.target);
    } else {
      tiers.push({ count: r.count, targets: [r.target] });
    }
  }
  return tiers;
}

type CountTableProps = {
  numbers: number[];
};

export default function CountTable({ numbers }: CountTableProps) {
  const [from, setFrom] = useState("1");
  const [to, setTo] = useState("100");
  const [rows, setRows] = useState<TargetCount[] | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [expanded, setExpanded] = useState<number | null>(null);
  const requestRef = useRef(0);
  const hand = numbers.join(",");

  // A new hand drops the old rows and any count still in flight.
  useEffect(() => {
    requestRef.current++;
    setRows(null);
    setError(null);
    setExpanded(null);
    setLoading(false);
  }, [hand]);

  const load = async () => {
    const id = ++requestRef.current;
    setError(null);
    setLoading(true);
    try {
      const res = await fetch("/api/count", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ numbers, from: Number(from), to: Number(to) }),
      });
      const data: unknown = await res.json().catch(() => null);
      if (id !== requestRef.current) return;
      if (!res.ok) {
        const failure = ErrorResponse.safeParse(data);
        throw new Error(failure.success ? failure.data.error : "Failed to count answers");
      }
      const parsed = CountResponse.safeParse(data);
      if (!parsed.success) throw new Error("Unexpected count response");
      setRows(parsed.data.rows);
      setExpanded(null);
    } catch (e) {
      if (id === requestRef.current) setError(e instanceof Error ? e.message : "Failed to count answers");
    } finally {
      if (id === requestRef.current) setLoading(false);
    }
  };

  const tiers = rows ? groupByCount(rows) : [];

  return (
    <div className="w-full max-w-md mx-auto px-5 mb-6">
      <div className="text-xs uppercase tracking-widest text-neutral-400 mb-2">Answers per target</div>
      <div className="flex gap-2 mb-2">
        <input
          value={from}
          onChange={(e) => setFrom(e.target.value)}
          inputMode="numeric"
          className="w-20 h-10 px-3 rounded-xl border border-neutral-200 text-neutral-800 bg-white"
        />
        <input
          value={to}
          onChange={(e) => setTo(e.target.value)}
          inputMode="numeric"
          className="w-20 h-10 px-3 rounded-xl border border-neutral-200 text-neutral-800 bg-white"
        />
        <button
          disabled={loading || numbers.length === 0}
          onClick={() => {
            void load();
          }}
          className="h-10 px-4 rounded-xl bg-neutral-900 text-white text-sm font-medium active:bg-neutral-700 disabled:opacity-40 disabled:cursor-not-allowed transition-colors"
        >
          {loading ? "Counting…" : "Count"}
        </button>
      </div>

      {error ? (
        <div className="text-sm text-red-500">{error}</div>
      ) : rows === null ? null : tiers.length === 0 ? (
        <div className="text-sm text-neutral-400 italic">No target in range has an answer.</div>
      ) : (
        <div className="space-y-1 max-h-60 overflow-y-auto">
          {tiers.map((tier) => {
            const isExpanded = expanded === tier.count;
            return (
              <div key={tier.count} className="rounded-lg bg-neutral-50 overflow-hidden">
                <button
                  type="button"
                  onClick={() => setExpanded(isExpanded ? null : tier.count)}
                  className="w-full flex items-center justify-between px-3 py-1.5 text-left active:bg-neutral-100"
                >
                  <span className="text-xs text-neutral-700 font-medium">
                    {tier.count} {tier.count === 1 ? "answer" : "answers"} ({tier.targets.length}{" "}
                    {tier.targets.length === 1 ? "target" : "targets"})
                  </span>
                  <span className="text-xs text-neutral-400">{isExpanded ? "▲" : "▼"}</span>
                </button>
                {isExpanded && (
                  <div className="px-3 pb-2 text-xs text-neutral-600 font-mono break-all">
                    {tier.targets.join(", ")}
                  </div>
                )}
              </div>
            );
          })}
        </div>
      )}
    </div>
  );
}
