import { z } from "zod";
import { VerdictProtocol } from "../types/suite";

export const StructuredPayloadSchema = z
  .object({
    status: z.enum(["pass", "fail"])
  })
  .passthrough();

export type StructuredPayload = z.infer<typeof StructuredPayloadSchema>;

export interface CompletedRun {
  output: string;
  exitCode: number | null;
  signal: string | null;
}

export interface Verdict {
  status: "pass" | "fail" | "error";
  detail: string | null;
  payload: StructuredPayload | null;
}

/** Index of the brace closing the object opened at `start`, or -1. String contents are skipped. */
function matchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth += 1;
    else if (ch === "}") {
      depth -= 1;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseObject(candidate: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(candidate);
    return isPlainObject(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Every syntactically valid JSON object embedded in `text`, outermost first,
 * in the order they appear. Text around and between them is ignored.
 */
export function findJsonObjects(text: string): Record<string, unknown>[] {
  const found: Record<string, unknown>[] = [];
  let i = text.indexOf("{");
  while (i !== -1) {
    const end = matchingBrace(text, i);
    const value = end === -1 ? null : parseObject(text.slice(i, end + 1));
    if (value) {
      found.push(value);
      i = text.indexOf("{", end + 1);
      continue;
    }
    // not JSON; an object may still start inside this region
    i = text.indexOf("{", i + 1);
  }
  return found;
}

/**
 * Structured-payload protocol: the last embedded object carrying a `status`
 * key is the verdict. No such object, or a status outside pass/fail, is `error`.
 */
export function extractStructuredVerdict(output: string): Verdict {
  const candidates = findJsonObjects(output).filter((candidate) => "status" in candidate);
  const last = candidates.at(-1);
  if (!last) {
    return { status: "error", detail: "no structured payload found in output", payload: null };
  }

  const parsed = StructuredPayloadSchema.safeParse(last);
  if (!parsed.success) {
    return {
      status: "error",
      detail: `unrecognized payload status ${JSON.stringify(last.status)} (expected "pass" or "fail")`,
      payload: null
    };
  }

  return {
    status: parsed.data.status,
    detail: parsed.data.status === "fail" ? "case reported fail" : null,
    payload: parsed.data
  };
}

export function extractExitCodeVerdict(run: CompletedRun): Verdict {
  if (run.exitCode === 0) return { status: "pass", detail: null, payload: null };
  if (run.exitCode !== null) return { status: "fail", detail: `exit code ${run.exitCode}`, payload: null };
  return { status: "error", detail: crashDetail(run), payload: null };
}

function crashDetail(run: CompletedRun): string {
  return run.signal ? `terminated by signal ${run.signal}` : "no exit status reported";
}

/**
 * Normalizes a completed (not timed out) run into pass/fail/error under the
 * case's declared protocol. Under the structured protocol a nonzero exit
 * fails the case whatever the payload says.
 */
export function extractVerdict(protocol: VerdictProtocol, run: CompletedRun): Verdict {
  switch (protocol.kind) {
    case "exit_code":
      return extractExitCodeVerdict(run);
    case "structured": {
      if (run.exitCode === null && run.signal) {
        return { status: "error", detail: crashDetail(run), payload: null };
      }
      const verdict = extractStructuredVerdict(run.output);
      if (run.exitCode !== null && run.exitCode !== 0 && verdict.payload) {
        return { status: "fail", detail: `exit code ${run.exitCode}`, payload: verdict.payload };
      }
      return verdict;
    }
  }
}
