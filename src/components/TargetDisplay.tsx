"use client";

type TargetDisplayProps = {
  target: number | null;
};

export default function TargetDisplay({ target }: TargetDisplayProps) {
  return (
    <div className="flex flex-col items-center py-4 sm:py-6">
      <span className="text-[11px] sm:text-xs uppercase tracking-widest text-neutral-400 mb-1">
        Target
      </span>
      <span className="text-6xl sm:text-7xl font-bold tabular-nums">{target ?? "–"}</span>
    </div>
  );
}
