import { VerdictKind } from "../config/suiteManifest";

export type VerdictProtocol = { kind: "exit_code" } | { kind: "structured" };

export interface CaseSpec {
  readonly name: string;
  readonly description: string | null;
  /** Artifact path on the host, resolved against the workspace. */
  readonly artifact_path: string;
  readonly args: readonly string[];
  readonly timeout_secs: number | null;
  readonly allow_failure: boolean;
  readonly dest_path: string | null;
  readonly verdict: VerdictProtocol;
}

export interface Suite {
  readonly id: string;
  readonly name: string;
  readonly description: string | null;
  readonly arch: string | null;
  readonly manifest_path: string;
  readonly default_timeout_secs: number;
  readonly max_parallel: number;
  readonly cases: readonly CaseSpec[];
}

export function toVerdictProtocol(kind: VerdictKind): VerdictProtocol {
  return kind === "structured" ? { kind: "structured" } : { kind: "exit_code" };
}

export function effectiveTimeoutSecs(suite: Suite, caseSpec: CaseSpec): number {
  return caseSpec.timeout_secs ?? suite.default_timeout_secs;
}
