import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { GuestCommand, RunCapture, SessionBackend, SessionHandle, TemplateHandle } from "../../src/session/backend";

export interface ScriptedCase {
  output?: string;
  exitCode?: number | null;
  signal?: string | null;
  timedOut?: boolean;
  delayMs?: number;
  provisionError?: Error;
  injectError?: Error;
  destroyError?: Error;
}

/**
 * In-process backend: each session is a scratch directory, each run returns
 * whatever the test scripted for the case.
 */
export class FakeBackend implements SessionBackend {
  readonly name = "fake";
  readonly live = new Set<string>();
  readonly injected: { caseName: string; destination: string }[] = [];
  readonly commands: GuestCommand[] = [];
  templateError: Error | null = null;
  templateBuilds = 0;
  running = 0;
  maxRunning = 0;

  constructor(
    readonly workRoot: string,
    private readonly script: Record<string, ScriptedCase> = {}
  ) {}

  async buildTemplate(): Promise<TemplateHandle> {
    this.templateBuilds += 1;
    if (this.templateError) throw this.templateError;
    return { kind: "directory", path: this.workRoot };
  }

  async provision(_template: TemplateHandle, caseName: string): Promise<SessionHandle> {
    const scripted = this.script[caseName] ?? {};
    if (scripted.provisionError) throw scripted.provisionError;
    await fs.mkdir(this.workRoot, { recursive: true });
    const workDir = await fs.mkdtemp(path.join(this.workRoot, "fake-"));
    const session = { id: path.basename(workDir), caseName, workDir };
    this.live.add(session.id);
    return session;
  }

  async inject(session: SessionHandle, _artifactPath: string, destination: string): Promise<void> {
    const scripted = this.script[session.caseName] ?? {};
    if (scripted.injectError) throw scripted.injectError;
    this.injected.push({ caseName: session.caseName, destination });
  }

  async run(session: SessionHandle, command: GuestCommand, _timeoutMs: number): Promise<RunCapture> {
    const scripted = this.script[session.caseName] ?? {};
    this.commands.push(command);
    this.running += 1;
    this.maxRunning = Math.max(this.maxRunning, this.running);
    try {
      if (scripted.delayMs) await new Promise((resolve) => setTimeout(resolve, scripted.delayMs));
    } finally {
      this.running -= 1;
    }
    return {
      output: scripted.output ?? "",
      exitCode: scripted.exitCode === undefined ? 0 : scripted.exitCode,
      signal: scripted.signal ?? null,
      timedOut: scripted.timedOut ?? false,
      durationMs: scripted.delayMs ?? 1
    };
  }

  async destroy(session: SessionHandle): Promise<void> {
    this.live.delete(session.id);
    await fs.rm(session.workDir, { recursive: true, force: true });
    const scripted = this.script[session.caseName] ?? {};
    if (scripted.destroyError) throw scripted.destroyError;
  }
}

export async function makeTempDir(prefix = "harness-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
