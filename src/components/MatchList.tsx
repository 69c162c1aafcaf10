"use client";

type MatchListProps = {
  lines: string[];
  ready: boolean;
  running: boolean;
  error: string | null;
};

export default function MatchList({ lines, ready, running, error }: MatchListProps) {
  return (
    <div className="w-full max-w-md mx-auto px-5 mb-2 flex-1 min-h-0 flex flex-col">
      <div className="text-xs uppercase tracking-widest text-neutral-400 mb-2">Answers</div>
      <div className="flex-1 min-h-0 overflow-y-auto space-y-1 pr-1">
        {error ? (
          <div className="text-sm text-red-500">{error}</div>
        ) : running ? (
          <div className="text-sm text-neutral-400 italic">Searching every expression…</div>
        ) : !ready ? (
          <div className="text-sm text-neutral-400 italic">Pick numbers and a target, then solve.</div>
        ) : (
          lines.map((line, i) => (
            <div key={i} className="text-xs font-mono bg-neutral-50 rounded-lg px-3 py-1.5 break-all">
              {line}
            </div>
          ))
        )}
      </div>
    </div>
  );
}
