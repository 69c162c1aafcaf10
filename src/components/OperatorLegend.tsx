"use client";

import { OPERATOR_LIST } from "@/lib/operators";
import type { Op } from "@/lib/types";

const RULES: Record<Op, string> = {
  "+": "any order",
  "-": "never below zero",
  "*": "any order",
  "/": "exact only",
};

export default function OperatorLegend() {
  return (
    <div className="flex gap-2.5 px-4 py-3 max-w-md mx-auto w-full">
      {OPERATOR_LIST.map((op) => (
        <div
          key={op.key}
          className={`
            flex-1 min-w-0 h-16 rounded-xl select-none
            flex flex-col items-center justify-center leading-tight
            ${op.groupable ? "bg-neutral-100 text-neutral-700" : "bg-neutral-50 text-neutral-500"}
          `}
        >
          <span className="text-2xl sm:text-3xl font-semibold">{op.symbol}</span>
          <span className="text-[11px] text-neutral-400">{RULES[op.key]}</span>
        </div>
      ))}
    </div>
  );
}
