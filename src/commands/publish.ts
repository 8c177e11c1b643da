import { HarnessConfig } from "../config/harnessConfig";
import { resolveSuiteId } from "../config/suites";
import { relativeToWorkspace } from "../io/paths";
import { PublishResult, publishLatest } from "../report/publish";

export interface PublishCommandOptions {
  config: HarnessConfig;
  suite: string;
}

export async function runPublish(options: PublishCommandOptions): Promise<PublishResult> {
  const suiteId = resolveSuiteId(options.suite);
  const published = await publishLatest({ logsDir: options.config.logsDir, suiteId });
  console.log(
    `Published ${suiteId} run ${published.record.run_id} (${published.record.overall}) to ${relativeToWorkspace(options.config.workspace, published.archivePath)}`
  );
  return published;
}
