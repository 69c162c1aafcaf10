import { SolverError } from "./errors";
import { countSolutions, resolveWindow } from "./queries";
import type { Puzzle } from "./types";

function shuffle<T>(arr: readonly T[], random: () => number): T[] {
  const a = [...arr];
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const ai = a[i];
    const aj = a[j];
    if (ai === undefined || aj === undefined) continue;
    a[i] = aj;
    a[j] = ai;
  }
  return a;
}

const DECK: number[] = [];
for (let rank = 1; rank <= 13; rank++) {
  for (let suit = 0; suit < 4; suit++) {
    DECK.push(rank);
  }
}

const FALLBACK = { target: 24, numbers: [1, 2, 3, 4] };

export type PuzzleOptions = {
  handSize?: number;
  minTarget?: number;
  maxTarget?: number;
  /** Accepted solution counts, inclusive. */
  min?: number;
  max?: number;
  attemptsPerTarget?: number;
  targetAttempts?: number;
  random?: () => number;
};

/**
 * Pick a random target, then keep dealing hands until one has a solution
 * count inside [min, max]. After too many misses for a target, pick a new
 * target; after too many targets, return 24 from 1, 2, 3, 4. An empty or
 * negative window is rejected before any deal.
 */
export function generatePuzzle(options: PuzzleOptions = {}): Puzzle {
  const {
    handSize = 4,
    minTarget = 1,
    maxTarget = 100,
    attemptsPerTarget = 200,
    targetAttempts = 10,
    random = Math.random,
  } = options;

  if (!Number.isInteger(handSize) || handSize < 1 || handSize > DECK.length) {
    throw new SolverError(`hand size must be between 1 and ${DECK.length}, got ${handSize}`);
  }
  if (!Number.isInteger(minTarget) || !Number.isInteger(maxTarget) || maxTarget < minTarget) {
    throw new SolverError(`invalid target range ${minTarget}..${maxTarget}`);
  }
  const { min, max } = resolveWindow(options);

  const span = maxTarget - minTarget + 1;
  for (let targetAttempt = 0; targetAttempt < targetAttempts; targetAttempt++) {
    const target = minTarget + Math.floor(random() * span);

    for (let deal = 0; deal < attemptsPerTarget; deal++) {
      const numbers = shuffle(DECK, random).slice(0, handSize);
      const solutions = countSolutions(numbers, target);
      if (solutions >= min && solutions <= max) {
        return { target, numbers, solutions };
      }
    }
  }

  return { ...FALLBACK, solutions: countSolutions(FALLBACK.numbers, FALLBACK.target) };
}
