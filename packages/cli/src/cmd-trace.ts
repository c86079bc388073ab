/**
 * tally trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";

const traceEventSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  data: z.record(z.unknown()).optional(),
});

type TraceLine = z.infer<typeof traceEventSchema>;

interface TraceSummary {
  runId: string;
  totalEvents: number;
  skippedLines: number;
  steps: number;
  instructionsByOpcode: Record<string, number>;
  status?: string;
  fault?: { code: string; message: string; at: number | null };
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function parseLine(line: string): TraceLine | null {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = traceEventSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

export function summarizeTrace(content: string): TraceSummary | null {
  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  let skippedLines = 0;

  for (const line of lines) {
    const ev = parseLine(line);
    if (ev) {
      events.push(ev);
    } else {
      skippedLines++;
    }
  }

  if (events.length === 0) return null;

  const summary: TraceSummary = {
    runId: events[0].runId,
    totalEvents: events.length,
    skippedLines,
    steps: 0,
    instructionsByOpcode: {},
  };

  for (const ev of events) {
    if (ev.event === "run_start") {
      summary.startTime = ev.ts;
    }
    if (ev.event === "step") {
      summary.steps++;
      const instr = ev.data?.["instr"];
      const opcode = typeof instr === "string" ? instr.split(" ")[0] : "unknown";
      summary.instructionsByOpcode[opcode] = (summary.instructionsByOpcode[opcode] ?? 0) + 1;
    }
    if (ev.event === "run_end") {
      summary.endTime = ev.ts;
      const status = ev.data?.["status"];
      if (typeof status === "string") summary.status = status;
      const code = ev.data?.["error"];
      if (typeof code === "string") {
        const message = ev.data?.["message"];
        const at = ev.data?.["at"];
        summary.fault = {
          code,
          message: typeof message === "string" ? message : "",
          at: typeof at === "number" ? at : null,
        };
      }
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

  const summary = summarizeTrace(content);
  if (!summary) {
    console.error("No valid trace events found.");
    return 4;
  }

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Run ID:        ${summary.runId}`);
  console.log(`  Total events:  ${summary.totalEvents}`);
  if (summary.skippedLines > 0) {
    console.log(`  Skipped lines: ${summary.skippedLines}`);
  }
  console.log(`  Steps:         ${summary.steps}`);
  const opcodes = Object.entries(summary.instructionsByOpcode).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  if (opcodes.length > 0) {
    console.log(`  Instructions:`);
    for (const [name, count] of opcodes) {
      console.log(`    ${name}: ${count}`);
    }
  }
  console.log(`  Outcome:       ${summary.status ?? "incomplete"}`);
  if (summary.fault) {
    const where = summary.fault.at !== null ? ` at instruction ${summary.fault.at}` : "";
    console.log(`  Fault:         ${summary.fault.code}${where}: ${summary.fault.message}`);
  }
  if (summary.durationMs !== undefined) {
    console.log(`  Duration:      ${summary.durationMs}ms`);
  }
  return 0;
}
