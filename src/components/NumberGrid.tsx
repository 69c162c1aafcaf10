"use client";

type NumberGridProps = {
  numbers: number[];
  disabled: boolean;
  onRemove: (index: number) => void;
};

export default function NumberGrid({ numbers, disabled, onRemove }: NumberGridProps) {
  if (numbers.length === 0) {
    return (
      <div className="px-4 max-w-md mx-auto w-full text-sm text-neutral-400 italic text-center">
        Add numbers to search with.
      </div>
    );
  }
  return (
    <div className="grid grid-cols-3 gap-2.5 px-4 max-w-md mx-auto w-full">
      {numbers.map((n, i) => (
        <button
          key={`${i}-${n}`}
          disabled={disabled}
          onClick={() => onRemove(i)}
          title="Remove"
          className={`
            relative flex items-center justify-center
            aspect-[4/3] rounded-xl text-2xl sm:text-3xl font-semibold tabular-nums
            transition-all duration-100 select-none
            ${disabled
              ? "bg-neutral-50 text-neutral-300 cursor-not-allowed"
              : "bg-neutral-100 text-neutral-900 active:bg-neutral-300"
            }
          `}
        >
          {n}
        </button>
      ))}
    </div>
  );
}
