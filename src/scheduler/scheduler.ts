import path from "path";
import { RunContext } from "./runContext";
import { runOrdered } from "./pool";
import { selectCases } from "../config/suites";
import { ProvisioningError, errorMessage } from "../errors";
import { caseArtifactDir, caseLogPath, relativeToWorkspace } from "../io/paths";
import { writeCaseLog } from "../report/caseLog";
import { SessionProvisioner, resolveDestination } from "../session/provisioner";
import { CaseResult, CaseStatus } from "../types/runRecord";
import { CaseSpec, Suite, effectiveTimeoutSecs } from "../types/suite";
import { copyFile, writeJson } from "../utils/fs";
import { slugify } from "../utils/text";
import { formatDuration } from "../utils/time";
import { StructuredPayload, extractVerdict } from "../verdict/extractor";

export interface RunSuiteOptions {
  /** Case names to run; manifest order still applies. */
  filter?: readonly string[];
  /** Upper bound requested by the caller; never exceeds the suite's max_parallel. */
  concurrency?: number | null;
}

export interface SuiteRunOutcome {
  results: CaseResult[];
  notRun: string[];
  abortReason: string | null;
}

interface CaseOutcome {
  status: CaseStatus;
  exitCode: number | null;
  detail: string | null;
  output: string;
  diagnostics?: string;
  payload: StructuredPayload | null;
  teardownError: ProvisioningError | null;
}

/** A recorded case, plus the teardown failure that must end the run after it. */
export interface CaseRun {
  result: CaseResult;
  teardownError: ProvisioningError | null;
}

export function effectiveConcurrency(suite: Suite, requested: number | null | undefined): number {
  const ceiling = Math.max(1, suite.max_parallel);
  if (!requested) return ceiling;
  return Math.max(1, Math.min(ceiling, requested));
}

/** One slug per case for log and artifact names; colliding slugs get a numeric suffix. */
export function assignSlugs(cases: readonly CaseSpec[]): Map<string, string> {
  const used = new Set<string>();
  const slugs = new Map<string, string>();
  for (const caseSpec of cases) {
    const base = slugify(caseSpec.name);
    let slug = base;
    for (let n = 2; used.has(slug); n += 1) slug = `${base}-${n}`;
    used.add(slug);
    slugs.set(caseSpec.name, slug);
  }
  return slugs;
}

async function invokeCase(
  ctx: RunContext,
  provisioner: SessionProvisioner,
  caseSpec: CaseSpec,
  destination: string,
  timeoutSecs: number
): Promise<CaseOutcome> {
  try {
    const capture = await provisioner.execute({
      caseName: caseSpec.name,
      artifactPath: caseSpec.artifact_path,
      destination,
      args: caseSpec.args,
      timeoutMs: timeoutSecs * 1000
    });

    if (capture.timedOut) {
      return {
        status: "timeout",
        exitCode: capture.exitCode,
        detail: `exceeded the ${timeoutSecs}s deadline`,
        output: capture.output,
        diagnostics: capture.diagnostics,
        payload: null,
        teardownError: capture.teardownError
      };
    }

    const verdict = extractVerdict(caseSpec.verdict, capture);
    return {
      status: verdict.status,
      exitCode: capture.exitCode,
      detail: verdict.detail,
      output: capture.output,
      diagnostics: capture.diagnostics,
      payload: verdict.payload,
      teardownError: capture.teardownError
    };
  } catch (error) {
    if (error instanceof ProvisioningError) throw error;
    ctx.logger.warn(`[case] ${caseSpec.name} could not run: ${errorMessage(error)}`);
    return {
      status: "error",
      exitCode: null,
      detail: errorMessage(error),
      output: "",
      payload: null,
      teardownError: null
    };
  }
}

/**
 * Runs one case in its own session and records the raw log. A ProvisioningError
 * before the command ran escapes; a teardown failure after it is returned with
 * the result. Every other failure becomes the case's status.
 */
export async function executeCase(
  ctx: RunContext,
  provisioner: SessionProvisioner,
  caseSpec: CaseSpec,
  slug: string
): Promise<CaseRun> {
  const timeoutSecs = effectiveTimeoutSecs(ctx.suite, caseSpec);
  const destination = resolveDestination(ctx.config.testRoot, caseSpec.name, caseSpec.dest_path);
  const logPath = caseLogPath(ctx.paths, slug);
  const artifactDir = caseArtifactDir(ctx.paths, slug);
  const relativeLog = relativeToWorkspace(ctx.config.workspace, logPath);

  ctx.logger.info(`[case] starting ${caseSpec.name} -> ${relativeLog}`);
  if (caseSpec.description) ctx.logger.detail(`        ${caseSpec.description}`);
  try {
    await copyFile(caseSpec.artifact_path, path.join(artifactDir, path.basename(caseSpec.artifact_path)));
  } catch (error) {
    ctx.logger.warn(`[case] ${caseSpec.name}: artifact not archived: ${errorMessage(error)}`);
  }

  const startedAt = Date.now();
  let outcome: CaseOutcome;
  try {
    outcome = await invokeCase(ctx, provisioner, caseSpec, destination, timeoutSecs);
  } catch (error) {
    await writeCaseLog(logPath, {
      caseSpec,
      destination,
      timeoutSecs,
      backend: provisioner.backendName,
      result: {
        name: caseSpec.name,
        status: "error",
        soft_fail: caseSpec.allow_failure,
        duration_ms: Date.now() - startedAt,
        exit_code: null,
        log_path: relativeLog,
        detail: `run aborted: ${errorMessage(error)}`
      },
      output: ""
    });
    throw error;
  }

  const result: CaseResult = {
    name: caseSpec.name,
    status: outcome.status,
    soft_fail: caseSpec.allow_failure,
    duration_ms: Date.now() - startedAt,
    exit_code: outcome.exitCode,
    log_path: relativeLog,
    detail: outcome.detail
  };

  await writeCaseLog(logPath, {
    caseSpec,
    destination,
    timeoutSecs,
    backend: provisioner.backendName,
    result,
    output: outcome.output,
    diagnostics: outcome.diagnostics
  });
  if (outcome.payload) {
    await writeJson(path.join(artifactDir, "result.json"), outcome.payload);
  }

  const soft = result.soft_fail && result.status !== "pass" ? " (soft)" : "";
  ctx.logger.info(
    `[case] ${caseSpec.name} finished: ${result.status}${soft} in ${formatDuration(result.duration_ms)} (exit ${result.exit_code ?? "none"})`
  );
  return { result, teardownError: outcome.teardownError };
}

/**
 * Runs the selected cases in manifest order (bounded overlap when the suite
 * allows it) and appends each result to the run record in manifest order.
 * A ProvisioningError stops new cases from starting; everything else is per case.
 */
export async function runSuite(
  ctx: RunContext,
  provisioner: SessionProvisioner,
  options: RunSuiteOptions = {}
): Promise<SuiteRunOutcome> {
  const cases = selectCases(ctx.suite, options.filter);
  const limit = effectiveConcurrency(ctx.suite, options.concurrency);
  const slugs = assignSlugs(ctx.suite.cases);

  ctx.logger.info(
    `running ${cases.length} case(s) of ${ctx.suite.name} on the ${provisioner.backendName} backend (concurrency ${limit})`
  );

  const report = await runOrdered(
    cases,
    limit,
    (caseSpec) => executeCase(ctx, provisioner, caseSpec, slugs.get(caseSpec.name) ?? slugify(caseSpec.name)),
    (run) => ctx.record.append(run.result),
    (run) => run.teardownError
  );

  let abortReason: string | null = null;
  if (report.failed) {
    abortReason = errorMessage(report.failure);
    ctx.logger.error(`[suite] infrastructure error, remaining cases skipped: ${abortReason}`);
  }

  const results = [...ctx.record.snapshot()];
  const finished = new Set(results.map((result) => result.name));
  const notRun = cases.filter((caseSpec) => !finished.has(caseSpec.name)).map((caseSpec) => caseSpec.name);
  return { results, notRun, abortReason };
}
