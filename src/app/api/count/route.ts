import { NextResponse } from "next/server";
import { z } from "zod";
import { NumbersSchema, badRequest, checkHandSize, readBody, solverErrorResponse, tooLarge } from "@/lib/api";
import { getConfig } from "@/lib/config";
import { cacheKey, getCachedResult, putCachedResult } from "@/lib/db";
import { countByTarget } from "@/lib/queries";

export const runtime = "nodejs";

const Body = z.object({
  numbers: NumbersSchema,
  from: z.number().int(),
  to: z.number().int(),
  min: z.number().int().nonnegative().optional(),
  max: z.number().int().nonnegative().optional(),
});

const Rows = z.array(z.object({ target: z.number(), count: z.number() }));

export async function POST(req: Request) {
  const body = await readBody(req, Body);
  if (!body) return badRequest("numbers, from and to are required");

  const oversize = checkHandSize(body.numbers);
  if (oversize) return oversize;
  const { maxTargetSpan } = getConfig();
  if (body.to - body.from + 1 > maxTargetSpan) {
    return tooLarge(`target range may span at most ${maxTargetSpan} values`);
  }

  const key = cacheKey(body.numbers, {
    from: body.from,
    to: body.to,
    min: body.min ?? null,
    max: body.max ?? null,
  });
  const cached = await getCachedResult("count", key, Rows);
  if (cached) return NextResponse.json({ rows: cached, cached: true });

  try {
    const rows = countByTarget(body.numbers, body);
    await putCachedResult("count", key, rows);
    return NextResponse.json({ rows, cached: false });
  } catch (err) {
    return solverErrorResponse(err);
  }
}
