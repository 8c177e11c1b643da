import { HarnessConfig } from "../config/harnessConfig";
import { loadSuite } from "../config/suites";
import { RunLogger } from "../io/runLogger";
import { relativeToWorkspace } from "../io/paths";
import { finalizeRun } from "../report/aggregator";
import { openRunContext } from "../scheduler/runContext";
import { runSuite } from "../scheduler/scheduler";
import { SessionBackend } from "../session/backend";
import { SessionProvisioner } from "../session/provisioner";
import { RunRecord } from "../types/runRecord";

export interface RunOptions {
  config: HarnessConfig;
  suite: string;
  cases?: string[];
  backend: SessionBackend;
  logger?: RunLogger;
  runId?: string;
}

export interface RunCommandResult {
  record: RunRecord;
  exitCode: number;
}

export function formatRunFooter(record: RunRecord, logPath: string): string {
  const { counts } = record;
  const lines = [
    `${record.suite_name} completed: ${counts.passed}/${counts.total} passed (${counts.soft_failed} soft failures). Log: ${logPath}`,
    `pass=${counts.passed} fail=${counts.failed} error=${counts.errors} timeout=${counts.timeouts} overall=${record.overall}`
  ];
  if (record.abort_reason) {
    lines.push(`aborted: ${record.abort_reason}; not run: ${record.not_run.join(", ") || "none"}`);
  }
  return lines.join("\n");
}

export async function runRun(options: RunOptions): Promise<RunCommandResult> {
  const logger = options.logger ?? new RunLogger();
  // Manifest problems surface before any run directory exists.
  const suite = await loadSuite(options.config.workspace, options.suite);
  const ctx = await openRunContext(options.config, suite, logger, options.runId);
  logger.info(`${suite.name}: logs in ${relativeToWorkspace(options.config.workspace, ctx.paths.runDir)}`);

  const provisioner = new SessionProvisioner(options.backend, logger);
  const outcome = await runSuite(ctx, provisioner, {
    filter: options.cases,
    concurrency: options.config.concurrency
  });
  const finalized = await finalizeRun(ctx, { notRun: outcome.notRun, abortReason: outcome.abortReason });

  console.log(formatRunFooter(finalized.record, finalized.record.log_file));
  return { record: finalized.record, exitCode: finalized.record.overall === "pass" ? 0 : 1 };
}
