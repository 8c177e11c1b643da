import { HarnessConfig } from "../config/harnessConfig";
import { SessionBackend } from "./backend";
import { HostBackend } from "./hostBackend";
import { QemuBackend } from "./qemuBackend";

export function createBackend(config: HarnessConfig, env: NodeJS.ProcessEnv): SessionBackend {
  if (config.backend === "host") {
    return new HostBackend({ templateDir: config.templatePath, workRoot: config.workRoot, env });
  }
  return new QemuBackend({
    osRoot: config.osRoot,
    arch: config.arch,
    templatePath: config.templatePath,
    workRoot: config.workRoot,
    basePort: config.serialPort,
    bootTimeoutMs: config.bootTimeoutSecs * 1000,
    connectRetries: config.connectRetries,
    readyMarker: config.readyMarker,
    promptMarker: config.promptMarker,
    env
  });
}
