import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import { CaseSetupError, ProvisioningError } from "../src/errors";
import { silentLogger } from "../src/io/runLogger";
import { CaseInvocation, SessionProvisioner, resolveDestination } from "../src/session/provisioner";
import { FakeBackend, makeTempDir } from "./helpers/fakeBackend";

let workRoot: string;

beforeEach(async () => {
  workRoot = await makeTempDir("harness-work-");
});

afterEach(async () => {
  await fs.rm(workRoot, { recursive: true, force: true });
});

function invocation(caseName: string): CaseInvocation {
  return {
    caseName,
    artifactPath: `/host/bin/${caseName}`,
    destination: `/usr/tests/${caseName}`,
    args: ["-v"],
    timeoutMs: 1000
  };
}

describe("resolveDestination", () => {
  it("uses the case name under the test root by default", () => {
    expect(resolveDestination("/usr/tests", "hello", null)).toBe("/usr/tests/hello");
  });

  it("falls back to a slug for names that are not file names", () => {
    expect(resolveDestination("/usr/tests", "My Case/1", null)).toBe("/usr/tests/my-case-1");
  });

  it("roots a relative dest_path at the test root and keeps an absolute one", () => {
    expect(resolveDestination("/usr/tests", "a", "bin/a")).toBe("/usr/tests/bin/a");
    expect(resolveDestination("/usr/tests", "a", "/opt//x/../y")).toBe("/opt/y");
  });
});

describe("SessionProvisioner", () => {
  it("runs the command at the destination and tears the session down", async () => {
    const backend = new FakeBackend(workRoot, { a: { output: "ok\n", exitCode: 0 } });
    const provisioner = new SessionProvisioner(backend, silentLogger());

    const capture = await provisioner.execute(invocation("a"));

    expect(capture.output).toBe("ok\n");
    expect(backend.injected).toEqual([{ caseName: "a", destination: "/usr/tests/a" }]);
    expect(backend.commands).toEqual([{ path: "/usr/tests/a", args: ["-v"] }]);
    expect(backend.live.size).toBe(0);
    expect(await fs.readdir(workRoot)).toEqual([]);
  });

  it("builds the template once for many sessions", async () => {
    const backend = new FakeBackend(workRoot);
    const provisioner = new SessionProvisioner(backend, silentLogger());
    await provisioner.execute(invocation("a"));
    await provisioner.execute(invocation("b"));
    expect(backend.templateBuilds).toBe(1);
  });

  it("turns an injection failure into a case setup error and still tears down", async () => {
    const backend = new FakeBackend(workRoot, { a: { injectError: new Error("debugfs: no space left") } });
    const provisioner = new SessionProvisioner(backend, silentLogger());

    const error = await provisioner.execute(invocation("a")).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CaseSetupError);
    expect(error).toHaveProperty(
      "message",
      "[a] artifact injection to /usr/tests/a failed: debugfs: no space left"
    );
    expect(backend.live.size).toBe(0);
    expect(await fs.readdir(workRoot)).toEqual([]);
  });

  it("treats a missing template as a provisioning error", async () => {
    const backend = new FakeBackend(workRoot);
    backend.templateError = new Error("image not found");
    const provisioner = new SessionProvisioner(backend, silentLogger());

    await expect(provisioner.execute(invocation("a"))).rejects.toThrow(ProvisioningError);
    await expect(provisioner.execute(invocation("a"))).rejects.toThrow("Template unavailable: image not found");
  });

  it("treats a provision failure as a provisioning error", async () => {
    const backend = new FakeBackend(workRoot, { a: { provisionError: new Error("out of disk") } });
    const provisioner = new SessionProvisioner(backend, silentLogger());

    await expect(provisioner.execute(invocation("a"))).rejects.toThrow(
      "Could not provision a session for a: out of disk"
    );
  });

  it("returns a failed teardown next to the capture of a command that ran", async () => {
    const backend = new FakeBackend(workRoot, { a: { output: "ok\n", destroyError: new Error("busy") } });
    const provisioner = new SessionProvisioner(backend, silentLogger());

    const executed = await provisioner.execute(invocation("a"));

    expect(executed.output).toBe("ok\n");
    expect(executed.exitCode).toBe(0);
    expect(executed.teardownError).toBeInstanceOf(ProvisioningError);
    expect(executed.teardownError?.message).toMatch(/^Could not destroy session fake-.+: busy$/);
  });

  it("reports a clean teardown as no error", async () => {
    const backend = new FakeBackend(workRoot);
    const provisioner = new SessionProvisioner(backend, silentLogger());
    expect((await provisioner.execute(invocation("a"))).teardownError).toBeNull();
  });

  it("lets a teardown failure win over a setup failure", async () => {
    const backend = new FakeBackend(workRoot, {
      a: { injectError: new Error("image is read-only"), destroyError: new Error("busy") }
    });
    const provisioner = new SessionProvisioner(backend, silentLogger());

    const error = await provisioner.execute(invocation("a")).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProvisioningError);
    expect(error).toHaveProperty("message", expect.stringMatching(/^Could not destroy session fake-.+: busy$/));
  });
});
