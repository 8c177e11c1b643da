import { HarnessConfig } from "../config/harnessConfig";
import { RunPaths, buildRunPaths, relativeToWorkspace } from "../io/paths";
import { RunLogger } from "../io/runLogger";
import { RunRecordBuilder } from "../report/runRecord";
import { Suite } from "../types/suite";
import { createDirExclusive, ensureDir } from "../utils/fs";
import { nowUtcIsoFileSafe, nowUtcIsoSeconds } from "../utils/time";

/**
 * Everything one suite run needs, passed explicitly through the scheduler
 * and the aggregator.
 */
export interface RunContext {
  readonly config: HarnessConfig;
  readonly suite: Suite;
  readonly runId: string;
  readonly paths: RunPaths;
  readonly logger: RunLogger;
  readonly record: RunRecordBuilder;
}

const MAX_RUN_SUFFIX = 1000;

/**
 * Creates a run directory no earlier run owns. A taken id gets `.1`, `.2`, ...
 */
async function claimRunDir(
  logsDir: string,
  suiteId: string,
  requestedRunId: string
): Promise<{ runId: string; paths: RunPaths }> {
  for (let attempt = 0; attempt < MAX_RUN_SUFFIX; attempt += 1) {
    const runId = attempt === 0 ? requestedRunId : `${requestedRunId}.${attempt}`;
    const paths = buildRunPaths(logsDir, suiteId, runId);
    if (await createDirExclusive(paths.runDir)) return { runId, paths };
  }
  throw new Error(`No free run directory for ${suiteId}/${requestedRunId}`);
}

export async function openRunContext(
  config: HarnessConfig,
  suite: Suite,
  logger: RunLogger,
  requestedRunId: string = nowUtcIsoFileSafe()
): Promise<RunContext> {
  const { runId, paths } = await claimRunDir(config.logsDir, suite.id, requestedRunId);
  await ensureDir(paths.casesDir);
  await ensureDir(paths.artifactsDir);
  logger.attach(paths.suiteLog);

  const record = new RunRecordBuilder({
    suite: suite.id,
    suiteName: suite.name,
    runId,
    startedAt: nowUtcIsoSeconds(),
    logFile: relativeToWorkspace(config.workspace, paths.suiteLog)
  });

  logger.detail(
    `[suite] ${suite.name} (${suite.arch ?? config.arch}) - ${suite.description ?? "no description provided"}`
  );
  return { config, suite, runId, paths, logger, record };
}
