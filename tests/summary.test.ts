import { describe, expect, it } from "vitest";
import { parseSummary, serializeSummary, toSummary, validateSummary } from "../src/report/summary";
import { RunRecord } from "../src/types/runRecord";

function sampleRecord(): RunRecord {
  return {
    suite: "ci",
    suite_name: "CI Test",
    run_id: "2026-03-01T10-00-00Z",
    started_at: "2026-03-01T10:00:00Z",
    finished_at: "2026-03-01T10:02:30Z",
    overall: "fail",
    counts: { total: 3, passed: 1, failed: 1, errors: 1, timeouts: 0, soft_failed: 1 },
    cases: [
      { name: "a", status: "pass", soft_fail: false, duration_ms: 1200, exit_code: 0, log_path: "cases/a.log", detail: null },
      { name: "b", status: "fail", soft_fail: true, duration_ms: 900, exit_code: 1, log_path: "cases/b.log", detail: "exit code 1" },
      {
        name: "c",
        status: "error",
        soft_fail: false,
        duration_ms: 400,
        exit_code: 0,
        log_path: "cases/c.log",
        detail: "no structured payload found in output"
      }
    ],
    not_run: [],
    abort_reason: null,
    log_file: "logs/ci/2026-03-01T10-00-00Z/suite.log",
    error_log: "logs/ci/2026-03-01T10-00-00Z/error.log",
    published: false
  };
}

describe("run summary", () => {
  it("round-trips statuses and the overall status", () => {
    const record = sampleRecord();
    const text = serializeSummary(record);

    expect(JSON.parse(text).schema_version).toBe("1.0");
    expect(text.endsWith("}\n")).toBe(true);
    expect(parseSummary(text)).toEqual(record);
  });

  it("passes schema validation for a summary built from a record", () => {
    expect(validateSummary(toSummary(sampleRecord())).overall).toBe("fail");
  });

  it("rejects an unknown case status", () => {
    const summary = toSummary(sampleRecord());
    const tampered = { ...summary, cases: [{ ...summary.cases[0], status: "skipped" }] };
    expect(() => validateSummary(tampered, "last_run.json")).toThrow(
      "last_run.json failed schema validation: /cases/0/status must be equal to one of the allowed values"
    );
  });

  it("rejects fields outside the summary contract", () => {
    const summary = { ...toSummary(sampleRecord()), extra: true };
    expect(() => validateSummary(summary)).toThrow("run summary failed schema validation");
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseSummary("{", "summary.json")).toThrow(/^summary\.json is not valid JSON: /);
  });
});
