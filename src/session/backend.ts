/**
 * Contract between the suite engine and whatever hosts the guest runtime.
 * Implementations own every resource they create for a session and release
 * all of it in `destroy`.
 */

export interface TemplateHandle {
  readonly kind: "directory" | "disk_image";
  /** Read-only golden copy; never written by a session. */
  readonly path: string;
}

export interface SessionHandle {
  readonly id: string;
  readonly caseName: string;
  /** Session-private scratch directory, removed on destroy. */
  readonly workDir: string;
}

export interface GuestCommand {
  /** Absolute path inside the guest. */
  readonly path: string;
  readonly args: readonly string[];
}

export interface RunCapture {
  output: string;
  exitCode: number | null;
  signal: string | null;
  timedOut: boolean;
  durationMs: number;
  /** Runtime-side log (boot console, emulator stderr) kept for the case log only. */
  diagnostics?: string;
}

export interface SessionBackend {
  readonly name: string;
  buildTemplate(): Promise<TemplateHandle>;
  provision(template: TemplateHandle, caseName: string): Promise<SessionHandle>;
  inject(session: SessionHandle, artifactPath: string, destination: string): Promise<void>;
  run(session: SessionHandle, command: GuestCommand, timeoutMs: number): Promise<RunCapture>;
  destroy(session: SessionHandle): Promise<void>;
}
