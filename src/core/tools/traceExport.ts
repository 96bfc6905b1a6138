import type { TraceRow } from "../pipeline/PipelineTelemetry";
import { STAGES } from "../pipeline/PipelineTypes";

export const TRACE_CSV_HEADER = ["cycle", ...STAGES] as const;

function escapeField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

/** Renders the trace as RFC 4180 CSV with CRLF line endings and a trailing newline. */
export function formatTraceCsv(trace: readonly TraceRow[]): string {
  const lines = [TRACE_CSV_HEADER.join(",")];
  for (const row of trace) {
    lines.push([String(row.cycle), ...STAGES.map((stage) => escapeField(row[stage]))].join(","));
  }
  return `${lines.join("\r\n")}\r\n`;
}
