import path from "path";
import { RunContext } from "../scheduler/runContext";
import { relativeToWorkspace } from "../io/paths";
import { blockingFailures } from "./runRecord";
import { writeSummary } from "./summary";
import { RunRecord } from "../types/runRecord";
import { removePath, writeText } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";

export interface FinalizeOptions {
  notRun?: string[];
  abortReason?: string | null;
}

export interface FinalizedRun {
  record: RunRecord;
  summaryPath: string;
  runSummaryPath: string;
}

function errorLogText(ctx: RunContext, failedNames: string[], abortReason: string | null): string {
  const lines: string[] = [];
  if (abortReason) lines.push(`Run aborted: ${abortReason}`);
  if (failedNames.length) lines.push(`${failedNames.length} case(s) failed: ${failedNames.join(", ")}`);
  lines.push(`See ${relativeToWorkspace(ctx.config.workspace, ctx.paths.suiteLog)} for details.`);
  return lines.join("\n") + "\n";
}

/**
 * Closes the run: error.log when anything blocking went wrong, the summary
 * inside the run directory, and `last_run.json` for the suite.
 */
export async function finalizeRun(ctx: RunContext, options: FinalizeOptions = {}): Promise<FinalizedRun> {
  const abortReason = options.abortReason ?? null;
  const failedNames = blockingFailures(ctx.record.snapshot()).map((result) => result.name);

  let errorLog: string | null = null;
  if (failedNames.length || abortReason) {
    await writeText(ctx.paths.errorLog, errorLogText(ctx, failedNames, abortReason));
    errorLog = relativeToWorkspace(ctx.config.workspace, ctx.paths.errorLog);
  } else {
    await removePath(ctx.paths.errorLog);
  }

  const record = await ctx.record.finalize({
    finishedAt: nowUtcIsoSeconds(),
    notRun: options.notRun,
    abortReason,
    errorLog
  });

  const runSummaryPath = path.join(ctx.paths.runDir, "summary.json");
  await writeSummary(runSummaryPath, record);
  await writeSummary(ctx.paths.lastRun, record);
  ctx.logger.detail(`[suite] finished with overall status ${record.overall}`);
  await ctx.logger.flush();

  return { record, summaryPath: ctx.paths.lastRun, runSummaryPath };
}
