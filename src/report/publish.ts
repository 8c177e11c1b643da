import path from "path";
import { promises as fs } from "fs";
import { archiveDir, lastRunPath } from "../io/paths";
import { readSummary, toSummary, validateSummary, writeSummary } from "./summary";
import { RunRecord } from "../types/runRecord";
import { pathExists, writeJsonExclusive } from "../utils/fs";
import { nowUtcIsoSeconds, toFileSafe } from "../utils/time";

export interface PublishOptions {
  logsDir: string;
  suiteId: string;
  now?: () => string;
}

export interface PublishResult {
  archivePath: string;
  record: RunRecord;
}

const MAX_ARCHIVE_SUFFIX = 1000;

/**
 * Copies the latest finalized summary into `archive/<timestamp>.json`.
 * Existing archive entries are never overwritten; a collision gets a numeric suffix.
 */
export async function publishLatest(options: PublishOptions): Promise<PublishResult> {
  const latestPath = lastRunPath(options.logsDir, options.suiteId);
  if (!(await pathExists(latestPath))) {
    throw new Error(`No finalized run to publish for suite ${options.suiteId} (missing ${latestPath})`);
  }

  const latest = await readSummary(latestPath);
  if (!latest.finished_at) {
    throw new Error(`Run ${latest.run_id} of suite ${options.suiteId} is not finalized`);
  }

  const record: RunRecord = { ...latest, published: true };
  const summary = validateSummary(toSummary(record));
  const stamp = toFileSafe((options.now ?? nowUtcIsoSeconds)());
  const targetDir = archiveDir(options.logsDir, options.suiteId);

  for (let attempt = 0; attempt < MAX_ARCHIVE_SUFFIX; attempt += 1) {
    const fileName = attempt === 0 ? `${stamp}.json` : `${stamp}.${attempt}.json`;
    const archivePath = path.join(targetDir, fileName);
    if (await writeJsonExclusive(archivePath, summary)) {
      await writeSummary(latestPath, record);
      return { archivePath, record };
    }
  }
  throw new Error(`Archive ${targetDir} has no free entry for ${stamp}`);
}

const ARCHIVE_ENTRY = /^(.*?)(?:\.(\d+))?\.json$/;

function archiveKey(fileName: string): { stamp: string; suffix: number } {
  const match = ARCHIVE_ENTRY.exec(fileName);
  return { stamp: match?.[1] ?? fileName, suffix: match?.[2] ? Number(match[2]) : 0 };
}

/** Archive entries in publish order: by timestamp, then by collision suffix. */
export async function listArchive(logsDir: string, suiteId: string): Promise<string[]> {
  const dir = archiveDir(logsDir, suiteId);
  if (!(await pathExists(dir))) return [];
  const entries = await fs.readdir(dir);
  return entries
    .filter((name) => name.endsWith(".json"))
    .map((name) => ({ name, ...archiveKey(name) }))
    .sort((a, b) => (a.stamp === b.stamp ? a.suffix - b.suffix : a.stamp < b.stamp ? -1 : 1))
    .map((entry) => entry.name);
}
