"use client";

type TopBarProps = {
  matchCount: number | null;
  busy: boolean;
  onRandomPuzzle: () => void;
};

export default function TopBar({ matchCount, busy, onRandomPuzzle }: TopBarProps) {
  return (
    <div
      className="w-full max-w-md mx-auto flex items-center justify-between px-4 pb-3 border-b border-neutral-200"
      style={{ paddingTop: "max(0.75rem, env(safe-area-inset-top, 0.75rem))" }}
    >
      <span className="text-base font-medium text-neutral-600 min-w-[6rem]">
        {matchCount === null ? "Numbers" : `Answers: ${matchCount}`}
      </span>
      <button
        onClick={onRandomPuzzle}
        disabled={busy}
        className="min-h-[2.75rem] px-3 flex items-center justify-center text-sm font-medium text-neutral-500 hover:text-neutral-900 active:text-neutral-900 disabled:opacity-40 transition-colors"
      >
        Random puzzle
      </button>
    </div>
  );
}
