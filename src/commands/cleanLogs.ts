import { HarnessConfig } from "../config/harnessConfig";
import { relativeToWorkspace } from "../io/paths";
import { cleanLogs } from "../report/cleanLogs";

export async function runCleanLogs(options: { config: HarnessConfig }): Promise<number> {
  const removed = await cleanLogs(options.config.logsDir);
  console.log(`Removed ${removed} entr${removed === 1 ? "y" : "ies"} from ${relativeToWorkspace(options.config.workspace, options.config.logsDir)}`);
  return removed;
}
