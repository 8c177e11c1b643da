#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runRun } from "../commands/run";
import { runValidate } from "../commands/validate";
import { runList } from "../commands/list";
import { runPublish } from "../commands/publish";
import { runCleanLogs } from "../commands/cleanLogs";
import { HarnessConfig, HarnessConfigOverrides, buildHarnessConfig } from "../config/harnessConfig";
import { createBackend } from "../session";

type GlobalOptions = {
  workspace?: string;
  logsDir?: string;
  backend?: string;
  arch?: string;
  osRoot?: string;
  template?: string;
  testRoot?: string;
  workRoot?: string;
  serialPort?: string;
  bootTimeout?: string;
  concurrency?: string;
};

interface RunCommandOptions {
  case: string[];
  runId?: string;
}

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.HARNESS_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

function configFrom(command: Command): HarnessConfig {
  const opts = command.optsWithGlobals<GlobalOptions>();
  const overrides: HarnessConfigOverrides = {
    workspace: opts.workspace,
    logsDir: opts.logsDir,
    backend: opts.backend,
    arch: opts.arch,
    osRoot: opts.osRoot,
    templatePath: opts.template,
    testRoot: opts.testRoot,
    workRoot: opts.workRoot,
    serialPort: opts.serialPort,
    bootTimeoutSecs: opts.bootTimeout,
    concurrency: opts.concurrency
  };
  return buildHarnessConfig(overrides, process.env);
}

const program = new Command();

program
  .name("guest-suite-harness")
  .description("Run layered guest OS test suites in disposable VM sessions")
  .version(pkg.version);

program
  .option("--env-file <path>", "Path to .env file (overrides HARNESS_ENV_FILE/DOTENV_CONFIG_PATH)", envPath)
  .option("--workspace <dir>", "Workspace holding tests/<suite>/suite.json (HARNESS_WORKSPACE)")
  .option("--logs-dir <dir>", "Logs root (HARNESS_LOGS_DIR, default logs)")
  .option("--backend <kind>", "Session backend: qemu or host (HARNESS_BACKEND)")
  .option("--arch <arch>", "Guest architecture (HARNESS_ARCH, default aarch64)")
  .option("--os-root <dir>", "Guest OS source tree (HARNESS_OS_ROOT)")
  .option("--template <path>", "Disk image or template directory (HARNESS_TEMPLATE)")
  .option("--test-root <dir>", "Guest directory for case artifacts (HARNESS_TEST_ROOT, default /usr/tests)")
  .option("--work-root <dir>", "Where session copies are created (HARNESS_WORK_ROOT)")
  .option("--serial-port <port>", "First TCP port for guest serial consoles (HARNESS_SERIAL_PORT)")
  .option("--boot-timeout <secs>", "Seconds to wait for the guest to come up (HARNESS_BOOT_TIMEOUT_SECS)");

program
  .command("run")
  .description("Run a suite and record the results")
  .argument("<suite>", "Suite id or alias (ci, ci-test, stress, daily, ...)")
  .option("--case <name...>", "Only run these cases (manifest order is kept)", [])
  .option("--concurrency <n>", "Cases in flight at once, capped by the suite's max_parallel (HARNESS_CONCURRENCY)")
  .option("--run-id <id>", "Run directory name (default: current UTC time)")
  .action(async (suite: string, opts: RunCommandOptions, command: Command) => {
    const config = configFrom(command);
    const result = await runRun({
      config,
      suite,
      cases: opts.case,
      backend: createBackend(config, process.env),
      runId: opts.runId
    });
    process.exitCode = result.exitCode;
  });

program
  .command("validate")
  .description("Load a suite manifest and print its case plan without running anything")
  .argument("<suite>", "Suite id or alias")
  .action(async (suite: string, _opts: unknown, command: Command) => {
    await runValidate({ config: configFrom(command), suite });
  });

program
  .command("list")
  .description("List the suites found in the workspace")
  .action(async (_opts: unknown, command: Command) => {
    await runList({ config: configFrom(command) });
  });

program
  .command("publish")
  .description("Archive the suite's latest finalized run")
  .argument("<suite>", "Suite id or alias")
  .action(async (suite: string, _opts: unknown, command: Command) => {
    await runPublish({ config: configFrom(command), suite });
  });

program
  .command("clean-logs")
  .description("Remove everything under the logs directory except .gitkeep")
  .action(async (_opts: unknown, command: Command) => {
    await runCleanLogs({ config: configFrom(command) });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
