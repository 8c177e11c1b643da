import { CaseResult, OverallStatus, RunCounts, RunRecord } from "../types/runRecord";

export function countResults(cases: readonly CaseResult[]): RunCounts {
  const counts: RunCounts = { total: cases.length, passed: 0, failed: 0, errors: 0, timeouts: 0, soft_failed: 0 };
  for (const result of cases) {
    if (result.status === "pass") counts.passed += 1;
    else if (result.status === "fail") counts.failed += 1;
    else if (result.status === "error") counts.errors += 1;
    else counts.timeouts += 1;
    if (result.soft_fail && result.status !== "pass") counts.soft_failed += 1;
  }
  return counts;
}

export function blockingFailures(cases: readonly CaseResult[]): CaseResult[] {
  return cases.filter((result) => !result.soft_fail && result.status !== "pass");
}

export function computeOverall(cases: readonly CaseResult[], aborted: boolean): OverallStatus {
  if (aborted) return "infrastructure_error";
  return blockingFailures(cases).length ? "fail" : "pass";
}

export interface RunRecordInit {
  suite: string;
  suiteName: string;
  runId: string;
  startedAt: string;
  logFile: string;
}

/**
 * The only state shared across case boundaries. Appends are serialized and
 * must arrive in manifest order; the scheduler buffers out-of-order
 * completions before calling `append`.
 */
export class RunRecordBuilder {
  private readonly cases: CaseResult[] = [];
  private chain: Promise<void> = Promise.resolve();
  private finalized: RunRecord | null = null;

  constructor(private readonly init: RunRecordInit) {}

  append(result: CaseResult): Promise<void> {
    this.chain = this.chain.then(() => {
      if (this.finalized) throw new Error(`Run ${this.init.runId} is already finalized`);
      this.cases.push(result);
    });
    return this.chain;
  }

  snapshot(): readonly CaseResult[] {
    return [...this.cases];
  }

  async finalize(params: {
    finishedAt: string;
    notRun?: string[];
    abortReason?: string | null;
    errorLog?: string | null;
  }): Promise<RunRecord> {
    await this.chain;
    if (this.finalized) return this.finalized;
    const abortReason = params.abortReason ?? null;
    const cases = [...this.cases];
    this.finalized = {
      suite: this.init.suite,
      suite_name: this.init.suiteName,
      run_id: this.init.runId,
      started_at: this.init.startedAt,
      finished_at: params.finishedAt,
      overall: computeOverall(cases, abortReason !== null),
      counts: countResults(cases),
      cases,
      not_run: params.notRun ?? [],
      abort_reason: abortReason,
      log_file: this.init.logFile,
      error_log: params.errorLog ?? null,
      published: false
    };
    return this.finalized;
  }
}
