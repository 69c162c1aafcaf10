import { NextResponse } from "next/server";
import { z } from "zod";
import { NumbersSchema, TargetSchema, badRequest, checkHandSize, readBody, solverErrorResponse } from "@/lib/api";
import { solveReport } from "@/lib/queries";

export const runtime = "nodejs";

const Body = z.object({ numbers: NumbersSchema, target: TargetSchema });

export async function POST(req: Request) {
  const body = await readBody(req, Body);
  if (!body) return badRequest("numbers and target are required");

  const oversize = checkHandSize(body.numbers);
  if (oversize) return oversize;

  try {
    return NextResponse.json(solveReport(body.numbers, body.target));
  } catch (err) {
    return solverErrorResponse(err);
  }
}
