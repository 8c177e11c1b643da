import path from "path";
import { RunCapture, SessionBackend, SessionHandle, TemplateHandle } from "./backend";
import { CaseSetupError, ProvisioningError, errorMessage } from "../errors";
import { RunLogger } from "../io/runLogger";
import { slugify } from "../utils/text";

export interface CaseInvocation {
  caseName: string;
  artifactPath: string;
  destination: string;
  args: readonly string[];
  timeoutMs: number;
}

export interface ExecutedCase extends RunCapture {
  /** The session could not be destroyed; the capture is still valid but the run must stop. */
  teardownError: ProvisioningError | null;
}

const SAFE_FILE_NAME = /^[A-Za-z0-9._-]+$/;

/**
 * Where a case artifact lands inside the guest: an absolute `dest_path` as
 * given, a relative one under `testRoot`, otherwise `<testRoot>/<case name>`.
 */
export function resolveDestination(testRoot: string, caseName: string, destPath: string | null): string {
  if (destPath && destPath.startsWith("/")) return path.posix.normalize(destPath);
  if (destPath) return path.posix.join(testRoot, destPath);
  const fileName = SAFE_FILE_NAME.test(caseName) && caseName !== "." && caseName !== ".." ? caseName : slugify(caseName);
  return path.posix.join(testRoot, fileName);
}

function asCaseSetupError(caseName: string, stage: string, error: unknown): Error {
  if (error instanceof CaseSetupError || error instanceof ProvisioningError) return error;
  return new CaseSetupError(caseName, `${stage}: ${errorMessage(error)}`, { cause: error });
}

/**
 * Hands out exactly one session per case invocation and guarantees its
 * teardown. The template is resolved once and shared read-only.
 */
export class SessionProvisioner {
  private template: Promise<TemplateHandle> | null = null;

  constructor(
    private readonly backend: SessionBackend,
    private readonly logger: RunLogger
  ) {}

  get backendName(): string {
    return this.backend.name;
  }

  prepareTemplate(): Promise<TemplateHandle> {
    if (!this.template) {
      this.template = this.backend.buildTemplate().catch((error: unknown) => {
        throw error instanceof ProvisioningError
          ? error
          : new ProvisioningError(`Template unavailable: ${errorMessage(error)}`, { cause: error });
      });
    }
    return this.template;
  }

  /**
   * Provision, inject, run, destroy. Throws ProvisioningError when the
   * infrastructure fails (fatal for the run) and CaseSetupError when only this
   * case could not be brought up. A destroy failure after the command ran is
   * returned in `teardownError` next to the capture.
   */
  async execute(invocation: CaseInvocation): Promise<ExecutedCase> {
    const template = await this.prepareTemplate();

    let session: SessionHandle;
    try {
      session = await this.backend.provision(template, invocation.caseName);
    } catch (error) {
      throw error instanceof ProvisioningError
        ? error
        : new ProvisioningError(
            `Could not provision a session for ${invocation.caseName}: ${errorMessage(error)}`,
            { cause: error }
          );
    }
    this.logger.detail(`[session] ${session.id} opened for ${invocation.caseName}`);

    let capture: RunCapture;
    try {
      try {
        await this.backend.inject(session, invocation.artifactPath, invocation.destination);
      } catch (error) {
        throw asCaseSetupError(invocation.caseName, `artifact injection to ${invocation.destination} failed`, error);
      }

      try {
        capture = await this.backend.run(
          session,
          { path: invocation.destination, args: invocation.args },
          invocation.timeoutMs
        );
      } catch (error) {
        throw asCaseSetupError(invocation.caseName, "runtime failed", error);
      }
    } catch (error) {
      const teardownError = await this.teardown(session);
      throw teardownError ?? error;
    }

    return { ...capture, teardownError: await this.teardown(session) };
  }

  private async teardown(session: SessionHandle): Promise<ProvisioningError | null> {
    try {
      await this.backend.destroy(session);
      this.logger.detail(`[session] ${session.id} destroyed`);
      return null;
    } catch (error) {
      this.logger.error(`[session] ${session.id} teardown failed: ${errorMessage(error)}`);
      return new ProvisioningError(`Could not destroy session ${session.id}: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }
}
