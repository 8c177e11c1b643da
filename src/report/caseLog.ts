import { CaseSpec } from "../types/suite";
import { CaseResult } from "../types/runRecord";
import { writeText } from "../utils/fs";

export interface CaseLogEntry {
  caseSpec: CaseSpec;
  destination: string | null;
  timeoutSecs: number;
  backend: string;
  result: CaseResult;
  output: string;
  diagnostics?: string;
}

/**
 * Raw per-case log: a header, everything the case printed (kept even when it
 * timed out), runtime diagnostics when the backend has any, and the verdict.
 */
export function formatCaseLog(entry: CaseLogEntry): string {
  const { caseSpec, result } = entry;
  const lines: string[] = [];
  lines.push(`[case] ${caseSpec.name}`);
  if (caseSpec.description) lines.push(`[case] ${caseSpec.description}`);
  lines.push(`[case] artifact: ${caseSpec.artifact_path}`);
  if (entry.destination) {
    lines.push(`[case] command: ${[entry.destination, ...caseSpec.args].join(" ")}`);
  }
  lines.push(`[case] backend: ${entry.backend}`);
  lines.push(`[case] verdict protocol: ${caseSpec.verdict.kind}`);
  lines.push(`[case] timeout budget: ${entry.timeoutSecs}s`);
  lines.push("--- output ---");
  lines.push(entry.output.replace(/\n$/, ""));
  if (entry.diagnostics) {
    lines.push("--- runtime ---");
    lines.push(entry.diagnostics.replace(/\n$/, ""));
  }
  lines.push("--- result ---");
  const soft = result.soft_fail ? " (soft)" : "";
  const exit = result.exit_code === null ? "none" : String(result.exit_code);
  lines.push(`[case] status: ${result.status}${soft} | exit: ${exit} | duration: ${result.duration_ms} ms`);
  if (result.detail) lines.push(`[case] detail: ${result.detail}`);
  return lines.join("\n") + "\n";
}

export async function writeCaseLog(logPath: string, entry: CaseLogEntry): Promise<void> {
  await writeText(logPath, formatCaseLog(entry));
}
