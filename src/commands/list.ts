import { HarnessConfig } from "../config/harnessConfig";
import { listSuites, suiteDisplayName } from "../config/suites";

export async function runList(options: { config: HarnessConfig }): Promise<string[]> {
  const suites = await listSuites(options.config.workspace);
  if (!suites.length) {
    console.log("No suites found.");
  }
  for (const suiteId of suites) {
    console.log(`${suiteId}\t${suiteDisplayName(suiteId)}`);
  }
  return suites;
}
