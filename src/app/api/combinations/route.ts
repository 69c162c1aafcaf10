import { NextResponse } from "next/server";
import { z } from "zod";
import { TargetSchema, badRequest, readBody, solverErrorResponse, tooLarge } from "@/lib/api";
import { combinationCount } from "@/lib/combinations";
import { getConfig } from "@/lib/config";
import { searchCombinations } from "@/lib/queries";
import { treeCount } from "@/lib/trees";

export const runtime = "nodejs";

const Body = z.object({
  size: z.number().int().positive(),
  lowest: z.number().int().positive(),
  highest: z.number().int().positive(),
  target: TargetSchema,
  min: z.number().int().nonnegative().optional(),
  max: z.number().int().nonnegative().optional(),
});

export async function POST(req: Request) {
  const body = await readBody(req, Body);
  if (!body) return badRequest("size, lowest, highest and target are required");

  const { maxNumbers, maxCombinations, maxTrees } = getConfig();
  if (body.size > maxNumbers) {
    return tooLarge(`at most ${maxNumbers} numbers are accepted`);
  }
  const total = combinationCount(body.size, body.lowest, body.highest);
  if (total > maxCombinations) {
    return tooLarge(`${total} combinations requested; the limit is ${maxCombinations}`);
  }
  const trees = total * treeCount(body.size);
  if (trees > maxTrees) {
    return tooLarge(`${trees} trees requested; the limit is ${maxTrees}`);
  }

  try {
    return NextResponse.json({ rows: searchCombinations(body) });
  } catch (err) {
    return solverErrorResponse(err);
  }
}
