import { HarnessConfig } from "../config/harnessConfig";
import { loadSuite } from "../config/suites";
import { relativeToWorkspace } from "../io/paths";
import { effectiveTimeoutSecs } from "../types/suite";

export interface ValidateOptions {
  config: HarnessConfig;
  suite: string;
}

/** Loads the manifest exactly as `run` would and prints the case plan. */
export async function runValidate(options: ValidateOptions): Promise<void> {
  const suite = await loadSuite(options.config.workspace, options.suite);
  console.log(
    `${suite.name} (${relativeToWorkspace(options.config.workspace, suite.manifest_path)}): ${suite.cases.length} case(s), max_parallel ${suite.max_parallel}`
  );
  for (const caseSpec of suite.cases) {
    const flags = [`${effectiveTimeoutSecs(suite, caseSpec)}s`, caseSpec.verdict.kind];
    if (caseSpec.allow_failure) flags.push("allow_failure");
    console.log(`  ${caseSpec.name} [${flags.join(", ")}] ${relativeToWorkspace(options.config.workspace, caseSpec.artifact_path)}`);
  }
}
