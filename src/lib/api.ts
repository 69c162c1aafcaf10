import { NextResponse } from "next/server";
import { z } from "zod";
import { getConfig } from "./config";
import { isSolverError } from "./errors";

export const NumbersSchema = z.array(z.number().int().positive()).min(1);

export const TargetSchema = z.number().int();

/** Parse a JSON request body against `schema`; null when the body is missing or malformed. */
export async function readBody<T>(req: Request, schema: z.ZodType<T>): Promise<T | null> {
  const body: unknown = await req.json().catch(() => null);
  const parsed = schema.safeParse(body);
  return parsed.success ? parsed.data : null;
}

export function badRequest(error: string) {
  return NextResponse.json({ error }, { status: 400 });
}

export function tooLarge(error: string) {
  return NextResponse.json({ error }, { status: 413 });
}

/** 413 when a hand is bigger than the configured limit, else null. */
export function checkHandSize(numbers: readonly number[]) {
  const { maxNumbers } = getConfig();
  if (numbers.length > maxNumbers) {
    return tooLarge(`at most ${maxNumbers} numbers are accepted`);
  }
  return null;
}

/** Solver precondition failures become 400s; anything else is rethrown. */
export function solverErrorResponse(err: unknown) {
  if (isSolverError(err)) return badRequest(err.message);
  throw err;
}
