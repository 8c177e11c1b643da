import { promises as fs } from "fs";
import path from "path";
import { spawn, ChildProcess } from "child_process";
import { GuestCommand, RunCapture, SessionBackend, SessionHandle, TemplateHandle } from "./backend";
import { SerialConsole, SerialTimeoutError } from "./serialConsole";
import { writeIntoImage } from "./debugfs";
import { ProvisioningError } from "../errors";
import { ensureDir, isDirectory, isFile, removePath } from "../utils/fs";
import { terminateProcessTree } from "../utils/process";
import { formatGuestCommand, parseExitMarker, sanitizeSerialOutput, withExitMarker } from "../verdict/serialOutput";

export interface QemuBackendOptions {
  osRoot: string;
  arch: string;
  templatePath: string;
  workRoot: string;
  basePort: number;
  bootTimeoutMs: number;
  connectRetries: number;
  readyMarker: string;
  promptMarker: string;
  /** Environment handed to the emulator; the image path is added per session. */
  env: NodeJS.ProcessEnv;
  make?: string;
  debugfs?: string;
  killGraceMs?: number;
}

interface RuntimeCommand {
  command: string;
  args: string[];
}

const SESSION_PREFIX = "harness-disk-";
const SHUTDOWN_WAIT_MS = 5000;

export function buildRuntimeCommand(options: QemuBackendOptions, serialPort: number): RuntimeCommand {
  return {
    command: options.make ?? "make",
    args: [
      `ARCH=${options.arch}`,
      `PLAT_CONFIG=${path.join(options.osRoot, ".axconfig.toml")}`,
      "NET=n",
      "VSOCK=n",
      "ACCEL=n",
      "justrun",
      `QEMU_ARGS=-monitor none -serial tcp::${serialPort},server=on`
    ]
  };
}

function diskImageOf(session: SessionHandle): string {
  return path.join(session.workDir, "disk.img");
}

function waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
  if (child.exitCode !== null || child.signalCode !== null) return Promise.resolve(true);
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      child.off("exit", onExit);
      resolve(false);
    }, timeoutMs);
    const onExit = () => {
      clearTimeout(timer);
      resolve(true);
    };
    child.once("exit", onExit);
  });
}

/**
 * Boots the guest OS under QEMU against a private copy of the root
 * filesystem image and drives the case over the serial console.
 */
export class QemuBackend implements SessionBackend {
  readonly name = "qemu";
  private readonly runtimes = new Map<string, ChildProcess>();
  private readonly portsInUse = new Set<number>();

  constructor(private readonly options: QemuBackendOptions) {}

  async buildTemplate(): Promise<TemplateHandle> {
    if (!(await isDirectory(this.options.osRoot))) {
      throw new ProvisioningError(`Guest OS root not found: ${this.options.osRoot}`);
    }
    const platConfig = path.join(this.options.osRoot, ".axconfig.toml");
    if (!(await isFile(platConfig))) {
      throw new ProvisioningError(`Missing ${platConfig}; build the guest for ${this.options.arch} first`);
    }
    if (!(await isFile(this.options.templatePath))) {
      throw new ProvisioningError(`Root filesystem template not found: ${this.options.templatePath}`);
    }
    return { kind: "disk_image", path: this.options.templatePath };
  }

  async provision(template: TemplateHandle, caseName: string): Promise<SessionHandle> {
    await ensureDir(this.options.workRoot);
    const workDir = await fs.mkdtemp(path.join(this.options.workRoot, SESSION_PREFIX));
    const session: SessionHandle = { id: path.basename(workDir), caseName, workDir };
    try {
      await fs.copyFile(template.path, diskImageOf(session));
      await fs.chmod(diskImageOf(session), 0o666);
    } catch (error) {
      await removePath(workDir);
      throw error;
    }
    return session;
  }

  async inject(session: SessionHandle, artifactPath: string, destination: string): Promise<void> {
    await writeIntoImage(diskImageOf(session), artifactPath, destination, this.options.debugfs);
  }

  async run(session: SessionHandle, command: GuestCommand, timeoutMs: number): Promise<RunCapture> {
    const port = this.acquirePort();
    const runtimeCommand = buildRuntimeCommand(this.options, port);
    const child = spawn(runtimeCommand.command, runtimeCommand.args, {
      cwd: this.options.osRoot,
      env: { ...this.options.env, DISK_IMG: diskImageOf(session), PWD: this.options.osRoot },
      detached: true,
      stdio: ["ignore", "pipe", "pipe"]
    });
    this.runtimes.set(session.id, child);

    let runtimeLog = "";
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      runtimeLog += chunk;
    });
    child.stderr?.on("data", (chunk: string) => {
      runtimeLog += chunk;
    });

    let serial: SerialConsole | null = null;
    try {
      await this.waitForReady(child, () => runtimeLog);
      serial = await SerialConsole.connect(port, this.options.connectRetries);
      await serial.waitUntil(
        (text) => text.includes(this.options.promptMarker),
        this.options.bootTimeoutMs,
        "the shell prompt"
      );

      const commandLine = formatGuestCommand(command);
      const mark = serial.transcript.length;
      const startedAt = Date.now();
      serial.send(withExitMarker(commandLine));

      let timedOut = false;
      try {
        await serial.waitUntil(
          (text) => parseExitMarker(text.slice(mark)) !== null,
          timeoutMs,
          "the command to finish"
        );
      } catch (error) {
        if (!(error instanceof SerialTimeoutError)) throw error;
        timedOut = true;
      }
      const durationMs = Date.now() - startedAt;
      const commandText = serial.transcript.slice(mark);

      if (timedOut) {
        await terminateProcessTree(child, this.options.killGraceMs);
      } else {
        serial.send("exit");
        if (!(await waitForExit(child, SHUTDOWN_WAIT_MS))) {
          await terminateProcessTree(child, this.options.killGraceMs);
        }
      }

      return {
        output: sanitizeSerialOutput(commandText, commandLine, this.options.promptMarker),
        exitCode: timedOut ? null : parseExitMarker(commandText),
        signal: null,
        timedOut,
        durationMs,
        diagnostics: `${runtimeLog}\n--- serial console ---\n${serial.transcript.replace(/\r/g, "")}`
      };
    } finally {
      serial?.close();
      this.portsInUse.delete(port);
    }
  }

  async destroy(session: SessionHandle): Promise<void> {
    const child = this.runtimes.get(session.id);
    this.runtimes.delete(session.id);
    if (child) {
      await terminateProcessTree(child, this.options.killGraceMs);
    }
    await removePath(session.workDir);
  }

  private acquirePort(): number {
    let port = this.options.basePort;
    while (this.portsInUse.has(port)) port += 1;
    this.portsInUse.add(port);
    return port;
  }

  private waitForReady(child: ChildProcess, log: () => string): Promise<void> {
    const marker = this.options.readyMarker;
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        child.stderr?.off("data", onData);
        child.off("exit", onExit);
        child.off("error", onError);
      };
      const onData = () => {
        if (log().includes(marker)) {
          cleanup();
          resolve();
        }
      };
      const onExit = (code: number | null) => {
        cleanup();
        reject(new Error(`runtime exited prematurely (exit ${code ?? "signal"})`));
      };
      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new Error(`runtime did not signal readiness within ${this.options.bootTimeoutMs} ms`));
      }, this.options.bootTimeoutMs);

      child.stderr?.on("data", onData);
      child.once("exit", onExit);
      child.once("error", onError);
      onData();
    });
  }
}
