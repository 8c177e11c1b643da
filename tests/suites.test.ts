import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { listSuites, loadSuite, resolveSuiteId, selectCases } from "../src/config/suites";
import { ValidationError } from "../src/errors";
import { effectiveTimeoutSecs } from "../src/types/suite";
import { makeTempDir } from "./helpers/fakeBackend";
import { writeRawManifest, writeSuite } from "./helpers/workspace";

let workspace: string;

beforeEach(async () => {
  workspace = await makeTempDir();
});

afterEach(async () => {
  await fs.rm(workspace, { recursive: true, force: true });
});

async function loadError(suiteId: string): Promise<ValidationError> {
  const error = await loadSuite(workspace, suiteId).catch((caught: unknown) => caught);
  if (!(error instanceof ValidationError)) throw new Error(`expected a ValidationError, got ${String(error)}`);
  return error;
}

describe("suite manifest loading", () => {
  it("keeps declaration order and applies defaults", async () => {
    await writeSuite(workspace, "ci", {
      default_timeout_secs: 120,
      cases: [
        { name: "zeta", timeout_secs: 5 },
        { name: "alpha", allow_failure: true, verdict: "structured", args: ["--quick"] },
        { name: "mid" }
      ]
    });

    const suite = await loadSuite(workspace, "ci");

    expect(suite.id).toBe("ci");
    expect(suite.name).toBe("CI Test");
    expect(suite.max_parallel).toBe(1);
    expect(suite.cases.map((c) => c.name)).toEqual(["zeta", "alpha", "mid"]);
    expect(suite.cases[0].artifact_path).toBe(path.join(workspace, "bin", "zeta"));
    expect(suite.cases[1]).toMatchObject({
      allow_failure: true,
      verdict: { kind: "structured" },
      args: ["--quick"],
      timeout_secs: null,
      dest_path: null
    });
    expect(suite.cases[2].verdict).toEqual({ kind: "exit_code" });
    expect(effectiveTimeoutSecs(suite, suite.cases[0])).toBe(5);
    expect(effectiveTimeoutSecs(suite, suite.cases[2])).toBe(120);
  });

  it("uses 600 seconds when the suite declares no default timeout", async () => {
    await writeSuite(workspace, "daily", { cases: [{ name: "only" }] });
    const suite = await loadSuite(workspace, "daily-test");
    expect(suite.id).toBe("daily");
    expect(effectiveTimeoutSecs(suite, suite.cases[0])).toBe(600);
  });

  it("returns frozen suites and cases", async () => {
    await writeSuite(workspace, "ci", { cases: [{ name: "a" }] });
    const suite = await loadSuite(workspace, "ci");
    expect(Object.isFrozen(suite)).toBe(true);
    expect(Object.isFrozen(suite.cases)).toBe(true);
    expect(Object.isFrozen(suite.cases[0])).toBe(true);
  });

  it("accepts an empty case list", async () => {
    await writeSuite(workspace, "stress", { name: "Nightly stress", cases: [] });
    const suite = await loadSuite(workspace, "stress");
    expect(suite.name).toBe("Nightly stress");
    expect(suite.cases).toEqual([]);
  });

  it("rejects a duplicate case name and names it", async () => {
    await writeSuite(workspace, "ci", { cases: [{ name: "x" }, { name: "y" }, { name: "x" }] });
    const error = await loadError("ci");
    expect(error.caseName).toBe("x");
    expect(error.message).toBe('Duplicate case name "x"');
  });

  it("rejects a case with a blank name", async () => {
    await writeSuite(workspace, "ci", { cases: [{ name: "ok" }, { name: "  ", path: "bin/blank" }] });
    const error = await loadError("ci");
    expect(error.caseName).toBe("#1");
    expect(error.message).toBe("Case #1 has an empty name");
  });

  it.each([0, -3, 1.5])("rejects timeout_secs %s", async (timeout) => {
    await writeSuite(workspace, "ci", { cases: [{ name: "a", timeout_secs: timeout }] });
    const error = await loadError("ci");
    expect(error.caseName).toBe("a");
    expect(error.message).toBe(`Case "a" has an invalid timeout_secs ${timeout} (expected a positive integer)`);
  });

  it("rejects deadlines longer than a timer can hold", async () => {
    await writeSuite(workspace, "ci", { cases: [{ name: "a", timeout_secs: 2147484 }] });
    const caseError = await loadError("ci");
    expect(caseError.caseName).toBe("a");
    expect(caseError.message).toBe('Case "a" has an invalid timeout_secs 2147484 (at most 2147483)');

    await writeSuite(workspace, "long", { default_timeout_secs: 2147484, cases: [] });
    const suiteError = await loadError("long");
    expect(suiteError.issues).toEqual(["default_timeout_secs: Number must be less than or equal to 2147483"]);

    await writeSuite(workspace, "edge", { default_timeout_secs: 2147483, cases: [{ name: "a", timeout_secs: 2147483 }] });
    const suite = await loadSuite(workspace, "edge");
    expect(effectiveTimeoutSecs(suite, suite.cases[0])).toBe(2147483);
  });

  it("rejects a case whose executable does not exist", async () => {
    await writeRawManifest(workspace, "ci", JSON.stringify({ cases: [{ name: "a", path: "bin/missing" }] }));
    const error = await loadError("ci");
    expect(error.caseName).toBe("a");
    expect(error.message).toBe(`Case "a" executable not found: ${path.join(workspace, "bin", "missing")}`);
  });

  it("maps structural problems back to the case name", async () => {
    const manifestPath = await writeRawManifest(
      workspace,
      "ci",
      JSON.stringify({ cases: [{ name: "a", path: "bin/a" }, { name: "b" }] })
    );
    const error = await loadError("ci");
    expect(error.caseName).toBe("b");
    expect(error.message.split("\n")[0]).toBe(`Invalid suite manifest ${manifestPath} (case "b")`);
    expect(error.issues).toEqual(["cases.1.path: Required"]);
  });

  it("reports a missing manifest and invalid JSON", async () => {
    const missing = await loadError("nope");
    expect(missing.message).toBe(`Suite manifest not found: ${path.join(workspace, "tests", "nope", "suite.json")}`);

    await writeRawManifest(workspace, "broken", "{ not json");
    const broken = await loadError("broken");
    expect(broken.message.startsWith("Suite manifest is not valid JSON:")).toBe(true);
  });
});

describe("suite discovery and selection", () => {
  it("resolves the legacy aliases", () => {
    expect(resolveSuiteId("ci-test")).toBe("ci");
    expect(resolveSuiteId("stress-test")).toBe("stress");
    expect(resolveSuiteId("custom")).toBe("custom");
  });

  it("lists suite directories holding a manifest", async () => {
    await writeSuite(workspace, "stress", { cases: [] });
    await writeSuite(workspace, "ci", { cases: [] });
    await fs.mkdir(path.join(workspace, "tests", "empty-dir"), { recursive: true });
    expect(await listSuites(workspace)).toEqual(["ci", "stress"]);
  });

  it("filters without reordering and rejects unknown names", async () => {
    await writeSuite(workspace, "ci", { cases: [{ name: "a" }, { name: "b" }, { name: "c" }] });
    const suite = await loadSuite(workspace, "ci");

    expect(selectCases(suite, ["c", "a"]).map((c) => c.name)).toEqual(["a", "c"]);
    expect(selectCases(suite).map((c) => c.name)).toEqual(["a", "b", "c"]);
    expect(() => selectCases(suite, ["a", "ghost"])).toThrow("Unknown case(s) in suite ci: ghost");
  });
});
