import path from "path";

export const MANIFEST_FILE = "suite.json";

export interface RunPaths {
  suiteDir: string;
  runDir: string;
  suiteLog: string;
  errorLog: string;
  casesDir: string;
  artifactsDir: string;
  lastRun: string;
}

export function suitesRoot(workspace: string): string {
  return path.join(workspace, "tests");
}

export function suiteManifestPath(workspace: string, suiteId: string): string {
  return path.join(suitesRoot(workspace), suiteId, MANIFEST_FILE);
}

export function suiteLogsDir(logsDir: string, suiteId: string): string {
  return path.join(logsDir, suiteId);
}

export function lastRunPath(logsDir: string, suiteId: string): string {
  return path.join(suiteLogsDir(logsDir, suiteId), "last_run.json");
}

export function archiveDir(logsDir: string, suiteId: string): string {
  return path.join(suiteLogsDir(logsDir, suiteId), "archive");
}

export function buildRunPaths(logsDir: string, suiteId: string, runId: string): RunPaths {
  const suiteDir = suiteLogsDir(logsDir, suiteId);
  const runDir = path.join(suiteDir, runId);
  return {
    suiteDir,
    runDir,
    suiteLog: path.join(runDir, "suite.log"),
    errorLog: path.join(runDir, "error.log"),
    casesDir: path.join(runDir, "cases"),
    artifactsDir: path.join(runDir, "artifacts"),
    lastRun: lastRunPath(logsDir, suiteId)
  };
}

export function caseLogPath(paths: RunPaths, caseSlug: string): string {
  return path.join(paths.casesDir, `${caseSlug}.log`);
}

export function caseArtifactDir(paths: RunPaths, caseSlug: string): string {
  return path.join(paths.artifactsDir, caseSlug);
}

export function relativeToWorkspace(workspace: string, targetPath: string): string {
  const relative = path.relative(workspace, targetPath);
  return relative.startsWith("..") || path.isAbsolute(relative) ? targetPath : relative;
}
