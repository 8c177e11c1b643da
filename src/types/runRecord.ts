export type CaseStatus = "pass" | "fail" | "error" | "timeout";

export type OverallStatus = "pass" | "fail" | "infrastructure_error";

export interface CaseResult {
  name: string;
  status: CaseStatus;
  /** Copied from the case's allow_failure; a soft result never affects the overall status. */
  soft_fail: boolean;
  duration_ms: number;
  exit_code: number | null;
  log_path: string;
  detail: string | null;
}

export interface RunCounts {
  total: number;
  passed: number;
  failed: number;
  errors: number;
  timeouts: number;
  soft_failed: number;
}

export interface RunRecord {
  suite: string;
  suite_name: string;
  run_id: string;
  started_at: string;
  finished_at: string | null;
  overall: OverallStatus;
  counts: RunCounts;
  cases: CaseResult[];
  /** Selected cases that never started because the run was aborted. */
  not_run: string[];
  abort_reason: string | null;
  log_file: string;
  error_log: string | null;
  published: boolean;
}

export interface RunSummary extends RunRecord {
  schema_version: "1.0";
}
