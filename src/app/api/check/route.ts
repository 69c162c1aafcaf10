import { NextResponse } from "next/server";
import { z } from "zod";
import { NumbersSchema, TargetSchema, badRequest, readBody } from "@/lib/api";
import { checkExpression } from "@/lib/checker";

export const runtime = "nodejs";

const Body = z.object({
  expression: z.string().trim().min(1),
  numbers: NumbersSchema,
  target: TargetSchema,
});

export async function POST(req: Request) {
  const body = await readBody(req, Body);
  if (!body) return badRequest("expression, numbers and target are required");

  return NextResponse.json({ ok: checkExpression(body.expression, body.numbers, body.target) });
}
