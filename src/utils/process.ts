import { spawn, ChildProcess } from "child_process";
import { isErrnoException } from "./fs";

export const DEFAULT_KILL_GRACE_MS = 2000;

export interface ProcessCapture {
  /** stdout and stderr interleaved in arrival order. */
  output: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  durationMs: number;
}

export interface RunProcessOptions {
  command: string;
  args?: readonly string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  input?: string;
  timeoutMs?: number;
  killGraceMs?: number;
  onSpawn?: (child: ChildProcess) => void;
}

/**
 * Signals the process group led by `pid` (children are spawned detached, so
 * the group holds the whole tree). Returns false when nothing was left to signal.
 */
export function signalProcessTree(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(-pid, signal);
    return true;
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ESRCH") throw error;
  }
  try {
    process.kill(pid, signal);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ESRCH") return false;
    throw error;
  }
}

function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

/**
 * SIGTERM to the tree, then SIGKILL once `graceMs` has passed without the leader exiting.
 */
export async function terminateProcessTree(child: ChildProcess, graceMs = DEFAULT_KILL_GRACE_MS): Promise<void> {
  const pid = child.pid;
  if (pid === undefined) return;
  if (hasExited(child)) {
    signalProcessTree(pid, "SIGKILL");
    return;
  }

  const exited = new Promise<void>((resolve) => child.once("exit", () => resolve()));
  signalProcessTree(pid, "SIGTERM");
  let timer: NodeJS.Timeout | undefined;
  const graceElapsed = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), graceMs);
  });
  const outcome = await Promise.race([exited, graceElapsed]);
  clearTimeout(timer);
  // stragglers that ignored SIGTERM, or grandchildren that outlived the leader
  signalProcessTree(pid, "SIGKILL");
  if (outcome === "timeout") await exited;
}

/**
 * Runs a command to completion or until `timeoutMs` elapses, whichever comes
 * first. On deadline the whole process tree is terminated and the output
 * captured so far is kept.
 */
export function runProcess(options: RunProcessOptions): Promise<ProcessCapture> {
  return new Promise((resolve, reject) => {
    const startedAt = Date.now();
    const child = spawn(options.command, [...(options.args ?? [])], {
      cwd: options.cwd,
      env: options.env,
      detached: true,
      stdio: [options.input === undefined ? "ignore" : "pipe", "pipe", "pipe"]
    });
    options.onSpawn?.(child);

    let output = "";
    let timedOut = false;
    let settled = false;

    const collect = (chunk: string) => {
      output += chunk;
    };
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", collect);
    child.stderr?.on("data", collect);

    const deadline =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            terminateProcessTree(child, options.killGraceMs).catch((error: unknown) => {
              if (!settled) {
                settled = true;
                reject(error);
              }
            });
          }, options.timeoutMs)
        : undefined;

    child.once("error", (error) => {
      clearTimeout(deadline);
      if (settled) return;
      settled = true;
      reject(error);
    });

    child.once("close", (exitCode, signal) => {
      clearTimeout(deadline);
      if (settled) return;
      settled = true;
      resolve({
        output,
        exitCode,
        signal,
        timedOut,
        durationMs: Date.now() - startedAt
      });
    });

    if (options.input !== undefined) {
      child.stdin?.end(options.input);
    }
  });
}
