import { RunRecord, RunSummary } from "../types/runRecord";
import { RUN_SUMMARY_SCHEMA, assertValidSchema, getSchemaValidator } from "../validation/jsonSchema";
import { readJson, writeText } from "../utils/fs";

export const SUMMARY_SCHEMA_VERSION = "1.0";

export function toSummary(record: RunRecord): RunSummary {
  return {
    schema_version: SUMMARY_SCHEMA_VERSION,
    suite: record.suite,
    suite_name: record.suite_name,
    run_id: record.run_id,
    started_at: record.started_at,
    finished_at: record.finished_at,
    overall: record.overall,
    counts: { ...record.counts },
    cases: record.cases.map((result) => ({
      name: result.name,
      status: result.status,
      soft_fail: result.soft_fail,
      duration_ms: result.duration_ms,
      exit_code: result.exit_code,
      log_path: result.log_path,
      detail: result.detail
    })),
    not_run: [...record.not_run],
    abort_reason: record.abort_reason,
    log_file: record.log_file,
    error_log: record.error_log,
    published: record.published
  };
}

export function validateSummary(data: unknown, label = "run summary"): RunSummary {
  assertValidSchema(getSchemaValidator<RunSummary>(RUN_SUMMARY_SCHEMA), data, label);
  return data;
}

export function serializeSummary(record: RunRecord, label = "run summary"): string {
  const summary = validateSummary(toSummary(record), label);
  return JSON.stringify(summary, null, 2) + "\n";
}

export function parseSummary(text: string, label = "run summary"): RunRecord {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new Error(`${label} is not valid JSON: ${error instanceof Error ? error.message : "unknown error"}`);
  }
  const { schema_version: _version, ...record } = validateSummary(data, label);
  return record;
}

export async function writeSummary(filePath: string, record: RunRecord): Promise<void> {
  await writeText(filePath, serializeSummary(record, filePath));
}

export async function readSummary(filePath: string): Promise<RunRecord> {
  const data = await readJson(filePath);
  const { schema_version: _version, ...record } = validateSummary(data, filePath);
  return record;
}
