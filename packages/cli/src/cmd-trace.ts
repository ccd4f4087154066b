/**
 * sublisp trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";

const traceEventSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  data: z.record(z.union([z.string(), z.number()])).optional(),
});

type TraceLine = z.infer<typeof traceEventSchema>;

interface TraceSummary {
  runId: string;
  totalEvents: number;
  malformedLines: number;
  steps?: number;
  substitutions: number;
  computations: number;
  computationsByOp: Record<string, number>;
  failures: number;
  budgetExceeded: number;
  result?: string;
  error?: string;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function parseLine(line: string): TraceLine | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = traceEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function summarize(events: TraceLine[], malformedLines = 0): TraceSummary {
  const summary: TraceSummary = {
    runId: events[0]?.runId ?? "",
    totalEvents: events.length,
    malformedLines,
    substitutions: 0,
    computations: 0,
    computationsByOp: {},
    failures: 0,
    budgetExceeded: 0,
  };

  for (const ev of events) {
    switch (ev.event) {
      case "run_start":
        summary.startTime = ev.ts;
        break;
      case "run_end": {
        summary.endTime = ev.ts;
        const steps = ev.data?.["steps"];
        if (typeof steps === "number") summary.steps = steps;
        const result = ev.data?.["result"];
        if (result !== undefined) summary.result = String(result);
        const error = ev.data?.["error"];
        if (error !== undefined) {
          summary.error = String(error);
          summary.failures++;
        }
        break;
      }
      case "substitute":
        summary.substitutions++;
        break;
      case "compute": {
        summary.computations++;
        const op = String(ev.data?.["op"] ?? "unknown");
        summary.computationsByOp[op] = (summary.computationsByOp[op] ?? 0) + 1;
        break;
      }
      case "budget_exceeded":
        summary.budgetExceeded++;
        break;
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs =
      new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }

  return summary;
}

export async function runTrace(file: string, opts: { json?: boolean }): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  let malformed = 0;

  for (const line of lines) {
    const ev = parseLine(line);
    if (ev) {
      events.push(ev);
    } else {
      malformed++;
    }
  }

  if (events.length === 0) {
    console.error("No valid trace events found.");
    return 4;
  }

  const summary = summarize(events, malformed);

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    console.log(`Trace Summary`);
    console.log(`  Run ID:           ${summary.runId}`);
    console.log(`  Total events:     ${summary.totalEvents}`);
    if (summary.malformedLines > 0) {
      console.log(`  Malformed lines:  ${summary.malformedLines}`);
    }
    if (summary.steps !== undefined) {
      console.log(`  Steps:            ${summary.steps}`);
    }
    console.log(`  Substitutions:    ${summary.substitutions}`);
    console.log(`  Computations:     ${summary.computations}`);
    for (const [op, count] of Object.entries(summary.computationsByOp)) {
      console.log(`    ${op}: ${count}`);
    }
    console.log(`  Failures:         ${summary.failures}`);
    console.log(`  Budget exceeded:  ${summary.budgetExceeded}`);
    if (summary.result !== undefined) {
      console.log(`  Result:           ${summary.result}`);
    }
    if (summary.error !== undefined) {
      console.log(`  Error:            ${summary.error}`);
    }
    if (summary.durationMs !== undefined) {
      console.log(`  Duration:         ${summary.durationMs}ms`);
    }
  }

  return 0;
}
