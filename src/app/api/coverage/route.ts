import { NextResponse } from "next/server";
import { z } from "zod";
import { NumbersSchema, badRequest, checkHandSize, readBody, solverErrorResponse, tooLarge } from "@/lib/api";
import { getConfig } from "@/lib/config";
import { cacheKey, getCachedResult, putCachedResult } from "@/lib/db";
import { coverage, largestTotal } from "@/lib/queries";

export const runtime = "nodejs";

const Body = z.object({
  numbers: NumbersSchema,
  upTo: z.number().int().optional(),
  stopAtFirstGap: z.boolean().optional(),
});

const CoverageSchema = z.object({
  upTo: z.number(),
  ranges: z.array(z.object({ from: z.number(), to: z.number() })),
  firstGap: z.number().nullable(),
});

export async function POST(req: Request) {
  const body = await readBody(req, Body);
  if (!body) return badRequest("numbers are required");

  const oversize = checkHandSize(body.numbers);
  if (oversize) return oversize;

  const upTo = body.upTo ?? largestTotal(body.numbers);
  const { maxTargetSpan } = getConfig();
  if (upTo > maxTargetSpan) {
    return tooLarge(`coverage is limited to targets up to ${maxTargetSpan}; pass a smaller upTo`);
  }

  const stopAtFirstGap = body.stopAtFirstGap ?? false;
  const key = cacheKey(body.numbers, { upTo, stopAtFirstGap });
  const cached = await getCachedResult("coverage", key, CoverageSchema);
  if (cached) return NextResponse.json({ ...cached, cached: true });

  try {
    const result = coverage(body.numbers, { upTo, stopAtFirstGap });
    await putCachedResult("coverage", key, result);
    return NextResponse.json({ ...result, cached: false });
  } catch (err) {
    return solverErrorResponse(err);
  }
}
