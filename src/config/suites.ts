import path from "path";
import { promises as fs } from "fs";
import { MAX_TIMEOUT_SECS, SuiteManifest, SuiteManifestSchema } from "./suiteManifest";
import { CaseSpec, Suite, toVerdictProtocol } from "../types/suite";
import { ValidationError } from "../errors";
import { suiteManifestPath, suitesRoot } from "../io/paths";
import { isFile, pathExists } from "../utils/fs";

const SUITE_ALIASES: Record<string, string> = {
  "ci-test": "ci",
  "stress-test": "stress",
  "daily-test": "daily"
};

const DISPLAY_NAMES: Record<string, string> = {
  ci: "CI Test",
  stress: "Stress Test",
  daily: "Daily Test"
};

export function resolveSuiteId(input: string): string {
  return SUITE_ALIASES[input] ?? input;
}

export function suiteDisplayName(suiteId: string): string {
  return DISPLAY_NAMES[suiteId] ?? suiteId;
}

function rawCaseName(data: unknown, index: number): string | null {
  if (typeof data !== "object" || data === null || !("cases" in data)) return null;
  const cases = data.cases;
  if (!Array.isArray(cases)) return null;
  const entry: unknown = cases[index];
  if (typeof entry !== "object" || entry === null || !("name" in entry)) return null;
  return typeof entry.name === "string" && entry.name.trim() ? entry.name : null;
}

async function readManifest(manifestPath: string): Promise<SuiteManifest> {
  let content: string;
  try {
    content = await fs.readFile(manifestPath, "utf8");
  } catch {
    throw new ValidationError(`Suite manifest not found: ${manifestPath}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : "unknown error";
    throw new ValidationError(`Suite manifest is not valid JSON: ${manifestPath} (${reason})`);
  }

  const parsed = SuiteManifestSchema.safeParse(data);
  if (!parsed.success) {
    throw ValidationError.fromZod(`suite manifest ${manifestPath}`, parsed.error, (index) => rawCaseName(data, index));
  }
  return parsed.data;
}

async function validateCases(manifest: SuiteManifest, workspace: string): Promise<CaseSpec[]> {
  const seen = new Set<string>();
  const cases: CaseSpec[] = [];

  for (const [index, entry] of manifest.cases.entries()) {
    const name = entry.name.trim();
    if (!name) {
      throw new ValidationError(`Case #${index} has an empty name`, `#${index}`);
    }
    if (seen.has(name)) {
      throw new ValidationError(`Duplicate case name "${name}"`, name);
    }
    seen.add(name);

    if (entry.timeout_secs !== undefined && !(Number.isInteger(entry.timeout_secs) && entry.timeout_secs > 0)) {
      throw new ValidationError(
        `Case "${name}" has an invalid timeout_secs ${entry.timeout_secs} (expected a positive integer)`,
        name
      );
    }
    if (entry.timeout_secs !== undefined && entry.timeout_secs > MAX_TIMEOUT_SECS) {
      throw new ValidationError(
        `Case "${name}" has an invalid timeout_secs ${entry.timeout_secs} (at most ${MAX_TIMEOUT_SECS})`,
        name
      );
    }

    const artifactPath = path.resolve(workspace, entry.path);
    if (!(await isFile(artifactPath))) {
      throw new ValidationError(`Case "${name}" executable not found: ${artifactPath}`, name);
    }

    cases.push(
      Object.freeze({
        name,
        description: entry.description ?? null,
        artifact_path: artifactPath,
        args: Object.freeze([...entry.args]),
        timeout_secs: entry.timeout_secs ?? null,
        allow_failure: entry.allow_failure,
        dest_path: entry.dest_path ?? null,
        verdict: Object.freeze(toVerdictProtocol(entry.verdict))
      })
    );
  }

  return cases;
}

/**
 * Loads `tests/<suite>/suite.json` from the workspace. Every case is validated
 * before the suite is returned; declaration order is the execution order.
 */
export async function loadSuite(workspace: string, suiteInput: string): Promise<Suite> {
  const suiteId = resolveSuiteId(suiteInput);
  const manifestPath = suiteManifestPath(workspace, suiteId);
  const manifest = await readManifest(manifestPath);
  const cases = await validateCases(manifest, workspace);

  return Object.freeze({
    id: suiteId,
    name: manifest.name ?? suiteDisplayName(suiteId),
    description: manifest.description ?? null,
    arch: manifest.arch ?? null,
    manifest_path: manifestPath,
    default_timeout_secs: manifest.default_timeout_secs,
    max_parallel: manifest.max_parallel,
    cases: Object.freeze(cases)
  });
}

export async function listSuites(workspace: string): Promise<string[]> {
  const root = suitesRoot(workspace);
  if (!(await pathExists(root))) return [];
  const entries = await fs.readdir(root, { withFileTypes: true });
  const suites: string[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    if (await isFile(suiteManifestPath(workspace, entry.name))) {
      suites.push(entry.name);
    }
  }
  return suites.sort();
}

/**
 * Restricts the suite to the named cases. Manifest order is kept whatever the filter order.
 */
export function selectCases(suite: Suite, filter: readonly string[] = []): CaseSpec[] {
  if (!filter.length) return [...suite.cases];
  const known = new Set(suite.cases.map((caseSpec) => caseSpec.name));
  const unknown = filter.filter((name) => !known.has(name));
  if (unknown.length) {
    throw new ValidationError(`Unknown case(s) in suite ${suite.id}: ${unknown.join(", ")}`, unknown[0]);
  }
  const wanted = new Set(filter);
  return suite.cases.filter((caseSpec) => wanted.has(caseSpec.name));
}
