export type SolverErrorCode = "INVALID_ARGUMENT";

export class SolverError extends Error {
  readonly code: SolverErrorCode;

  constructor(message: string, code: SolverErrorCode = "INVALID_ARGUMENT") {
    super(message);
    this.name = "SolverError";
    this.code = code;
  }
}

export function isSolverError(err: unknown): err is SolverError {
  return err instanceof SolverError;
}

export function assertNumbers(numbers: readonly number[]): void {
  if (!Array.isArray(numbers) || numbers.length === 0) {
    throw new SolverError("at least one number is required");
  }
  for (const n of numbers) {
    if (!Number.isSafeInteger(n) || n < 1) {
      throw new SolverError(`numbers must be positive integers, got ${n}`);
    }
  }
}

export function assertInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new SolverError(`${name} must be an integer, got ${value}`);
  }
}
