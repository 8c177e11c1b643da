import os from "os";
import path from "path";
import { z } from "zod";
import { ValidationError } from "../errors";
import { MAX_TIMEOUT_SECS } from "./suiteManifest";

export const BackendKindSchema = z.enum(["host", "qemu"]);
export type BackendKind = z.infer<typeof BackendKindSchema>;

const positiveInt = z.coerce.number().int().positive();

const HarnessConfigSchema = z.object({
  workspace: z.string().min(1),
  logsDir: z.string().min(1),
  backend: BackendKindSchema,
  arch: z.string().min(1),
  osRoot: z.string().min(1),
  templatePath: z.string().min(1),
  testRoot: z.string().startsWith("/"),
  workRoot: z.string().min(1),
  serialPort: positiveInt.max(65535),
  bootTimeoutSecs: positiveInt.max(MAX_TIMEOUT_SECS),
  connectRetries: positiveInt,
  readyMarker: z.string().min(1),
  promptMarker: z.string().min(1),
  concurrency: positiveInt.nullable()
});

export type HarnessConfig = Readonly<z.infer<typeof HarnessConfigSchema>>;

/** Values supplied on the command line. Each one wins over its `HARNESS_*` variable. */
export interface HarnessConfigOverrides {
  workspace?: string;
  logsDir?: string;
  backend?: string;
  arch?: string;
  osRoot?: string;
  templatePath?: string;
  testRoot?: string;
  workRoot?: string;
  serialPort?: string | number;
  bootTimeoutSecs?: string | number;
  concurrency?: string | number;
}

export type Environment = Readonly<Record<string, string | undefined>>;

function pick<T>(override: T | undefined, envValue: string | undefined): T | string | undefined {
  if (override !== undefined) return override;
  return envValue && envValue.trim() ? envValue.trim() : undefined;
}

/**
 * Builds the single configuration value for a harness invocation. The
 * environment is read here and nowhere else.
 */
export function buildHarnessConfig(overrides: HarnessConfigOverrides, env: Environment): HarnessConfig {
  const workspace = path.resolve(pick(overrides.workspace, env.HARNESS_WORKSPACE) ?? ".");
  const fromWorkspace = (value: string | undefined, fallback: string): string =>
    path.resolve(workspace, value ?? fallback);

  const backend = pick(overrides.backend, env.HARNESS_BACKEND) ?? "qemu";
  const arch = pick(overrides.arch, env.HARNESS_ARCH) ?? "aarch64";
  const osRoot = fromWorkspace(pick(overrides.osRoot, env.HARNESS_OS_ROOT), path.join(".cache", "guest-os"));
  const defaultTemplate =
    backend === "host" ? path.join(".cache", "host-template") : path.join(osRoot, `rootfs-${arch}.img`);

  const candidate = {
    workspace,
    logsDir: fromWorkspace(pick(overrides.logsDir, env.HARNESS_LOGS_DIR), "logs"),
    backend,
    arch,
    osRoot,
    templatePath: fromWorkspace(pick(overrides.templatePath, env.HARNESS_TEMPLATE), defaultTemplate),
    testRoot: (pick(overrides.testRoot, env.HARNESS_TEST_ROOT) ?? "/usr/tests").replace(/(.)\/+$/, "$1"),
    workRoot: path.resolve(pick(overrides.workRoot, env.HARNESS_WORK_ROOT) ?? os.tmpdir()),
    serialPort: pick(overrides.serialPort, env.HARNESS_SERIAL_PORT) ?? 4444,
    bootTimeoutSecs: pick(overrides.bootTimeoutSecs, env.HARNESS_BOOT_TIMEOUT_SECS) ?? 60,
    connectRetries: pick(undefined, env.HARNESS_CONNECT_RETRIES) ?? 5,
    readyMarker: pick(undefined, env.HARNESS_READY_MARKER) ?? "QEMU waiting for connection",
    promptMarker: pick(undefined, env.HARNESS_PROMPT) ?? ":~#",
    concurrency: pick(overrides.concurrency, env.HARNESS_CONCURRENCY) ?? null
  };

  const parsed = HarnessConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw ValidationError.fromZod("harness configuration", parsed.error);
  }
  return Object.freeze(parsed.data);
}
