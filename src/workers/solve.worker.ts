import { isSolverError } from "../lib/errors";
import { solveReport } from "../lib/queries";

type SolveMessage = {
  type: "solve";
  id: number;
  numbers: number[];
  target: number;
};

export type SolveWorkerReply =
  | { kind: "report"; id: number; lines: string[]; count: number }
  | { kind: "error"; id: number; error: string };

self.onmessage = (e: MessageEvent<SolveMessage>) => {
  const data = e.data;
  if (data.type !== "solve") return;

  let reply: SolveWorkerReply;
  try {
    const { lines, count } = solveReport(data.numbers, data.target);
    reply = { kind: "report", id: data.id, lines, count };
  } catch (err) {
    // Precondition failures go back to the page; anything else surfaces as a worker error.
    if (!isSolverError(err)) throw err;
    reply = { kind: "error", id: data.id, error: err.message };
  }
  self.postMessage(reply);
};
