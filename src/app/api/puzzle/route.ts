import { NextResponse } from "next/server";
import { badRequest, solverErrorResponse } from "@/lib/api";
import { generatePuzzle } from "@/lib/generator";

export const runtime = "nodejs";

function intParam(url: URL, name: string): number | undefined | null {
  const raw = url.searchParams.get(name);
  if (raw === null || raw === "") return undefined;
  const n = Number(raw);
  return Number.isInteger(n) ? n : null;
}

/**
 * GET /api/puzzle?min=&max=&maxTarget= : a random hand whose solution count
 * lies in [min, max], or 24 from 1, 2, 3, 4 when no deal fits.
 */
export async function GET(req: Request) {
  const url = new URL(req.url);
  const min = intParam(url, "min");
  const max = intParam(url, "max");
  const maxTarget = intParam(url, "maxTarget");
  if (min === null || max === null || maxTarget === null) {
    return badRequest("min, max and maxTarget must be integers");
  }

  try {
    return NextResponse.json(generatePuzzle({ min, max, maxTarget }));
  } catch (err) {
    return solverErrorResponse(err);
  }
}
