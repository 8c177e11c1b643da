import { promises as fs } from "fs";
import path from "path";
import { ChildProcess } from "child_process";
import { GuestCommand, RunCapture, SessionBackend, SessionHandle, TemplateHandle } from "./backend";
import { ProvisioningError } from "../errors";
import { copyFile, ensureDir, isDirectory, removePath } from "../utils/fs";
import { runProcess, terminateProcessTree } from "../utils/process";

export interface HostBackendOptions {
  templateDir: string;
  workRoot: string;
  env?: NodeJS.ProcessEnv;
  killGraceMs?: number;
}

const SESSION_PREFIX = "harness-session-";

/**
 * Runs cases as host processes inside a private copy of a template directory.
 * The directory stands in for the guest root filesystem.
 */
export class HostBackend implements SessionBackend {
  readonly name = "host";
  private readonly running = new Map<string, Set<ChildProcess>>();

  constructor(private readonly options: HostBackendOptions) {}

  async buildTemplate(): Promise<TemplateHandle> {
    if (!(await isDirectory(this.options.templateDir))) {
      throw new ProvisioningError(`Template directory not found: ${this.options.templateDir}`);
    }
    return { kind: "directory", path: this.options.templateDir };
  }

  async provision(template: TemplateHandle, caseName: string): Promise<SessionHandle> {
    await ensureDir(this.options.workRoot);
    const workDir = await fs.mkdtemp(path.join(this.options.workRoot, SESSION_PREFIX));
    const session: SessionHandle = { id: path.basename(workDir), caseName, workDir };
    try {
      await fs.cp(template.path, rootDirOf(session), { recursive: true });
    } catch (error) {
      await removePath(workDir);
      throw error;
    }
    return session;
  }

  async inject(session: SessionHandle, artifactPath: string, destination: string): Promise<void> {
    const target = hostPathFor(session, destination);
    await copyFile(artifactPath, target);
    await fs.chmod(target, 0o755);
  }

  async run(session: SessionHandle, command: GuestCommand, timeoutMs: number): Promise<RunCapture> {
    const children = this.running.get(session.id) ?? new Set<ChildProcess>();
    this.running.set(session.id, children);
    const rootDir = rootDirOf(session);

    const capture = await runProcess({
      command: hostPathFor(session, command.path),
      args: command.args,
      cwd: rootDir,
      env: this.options.env ? { ...this.options.env, HARNESS_SESSION_ROOT: rootDir } : undefined,
      timeoutMs,
      killGraceMs: this.options.killGraceMs,
      onSpawn: (child) => children.add(child)
    });

    return {
      output: capture.output,
      exitCode: capture.exitCode,
      signal: capture.signal,
      timedOut: capture.timedOut,
      durationMs: capture.durationMs
    };
  }

  async destroy(session: SessionHandle): Promise<void> {
    const children = this.running.get(session.id);
    this.running.delete(session.id);
    for (const child of children ?? []) {
      await terminateProcessTree(child, this.options.killGraceMs);
    }
    await removePath(session.workDir);
  }
}

function rootDirOf(session: SessionHandle): string {
  return path.join(session.workDir, "root");
}

/** Maps an absolute guest path onto the session copy. */
export function hostPathFor(session: SessionHandle, guestPath: string): string {
  const rootDir = rootDirOf(session);
  const relative = path.posix.normalize(guestPath).replace(/^\/+/, "");
  const resolved = path.join(rootDir, ...relative.split("/"));
  if (resolved !== rootDir && !resolved.startsWith(rootDir + path.sep)) {
    throw new Error(`Guest path escapes the session root: ${guestPath}`);
  }
  return resolved;
}
