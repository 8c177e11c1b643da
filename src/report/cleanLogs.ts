import path from "path";
import { promises as fs } from "fs";
import { pathExists, removePath } from "../utils/fs";

const KEEP = new Set([".gitkeep"]);

/** Removes every entry below `logsDir` except `.gitkeep`. Returns how many top-level entries went. */
export async function cleanLogs(logsDir: string): Promise<number> {
  if (!(await pathExists(logsDir))) return 0;
  const entries = await fs.readdir(logsDir);
  let removed = 0;
  for (const entry of entries) {
    if (KEEP.has(entry)) continue;
    await removePath(path.join(logsDir, entry));
    removed += 1;
  }
  return removed;
}
