import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { writeIntoImage } from "../src/session/debugfs";
import { makeTempDir } from "./helpers/fakeBackend";

let root: string;

/** Stand-in for debugfs that records its arguments and any request script. */
async function writeStub(exitCode: number): Promise<string> {
  const callsLog = path.join(root, "calls.log");
  const stub = path.join(root, "debugfs-stub");
  const body = [
    "#!/bin/sh",
    `echo "args: $*" >> '${callsLog}'`,
    `if [ "$#" -eq 2 ]; then cat >> '${callsLog}'; fi`,
    exitCode === 0 ? "exit 0" : `echo "image is busy"; exit ${exitCode}`,
    ""
  ].join("\n");
  await fs.writeFile(stub, body, { encoding: "utf8", mode: 0o755 });
  return stub;
}

beforeEach(async () => {
  root = await makeTempDir("harness-debugfs-");
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("writeIntoImage", () => {
  it("creates each parent directory, then replaces the file", async () => {
    const stub = await writeStub(0);

    await writeIntoImage("/images/disk.img", "/host/bin/a", "/usr/tests/a", stub);

    expect(await fs.readFile(path.join(root, "calls.log"), "utf8")).toBe(
      [
        "args: -w /images/disk.img -R mkdir /usr",
        "args: -w /images/disk.img -R mkdir /usr/tests",
        "args: -w /images/disk.img",
        "cd /usr/tests",
        "rm a",
        "write /host/bin/a a",
        "quit",
        ""
      ].join("\n")
    );
  });

  it("fails when debugfs cannot write the file", async () => {
    const stub = await writeStub(1);
    await expect(writeIntoImage("/images/disk.img", "/host/bin/a", "/usr/tests/a", stub)).rejects.toThrow(
      "debugfs failed to write /usr/tests/a (exit 1): image is busy"
    );
  });
});
