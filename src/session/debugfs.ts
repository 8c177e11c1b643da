import path from "path";
import { runProcess } from "../utils/process";

const DEBUGFS_TIMEOUT_MS = 60_000;

/**
 * Writes a host file into an ext2/3/4 image with e2fsprogs' debugfs, creating
 * the parent directories first. An existing file at the destination is replaced.
 */
export async function writeIntoImage(
  imagePath: string,
  hostPath: string,
  guestPath: string,
  debugfs = "debugfs"
): Promise<void> {
  const guestDir = path.posix.dirname(guestPath);
  const fileName = path.posix.basename(guestPath);

  let current = "";
  for (const segment of guestDir.split("/").filter(Boolean)) {
    current += `/${segment}`;
    // fails harmlessly when the directory already exists
    await runProcess({
      command: debugfs,
      args: ["-w", imagePath, "-R", `mkdir ${current}`],
      timeoutMs: DEBUGFS_TIMEOUT_MS
    });
  }

  const script = [`cd ${guestDir}`, `rm ${fileName}`, `write ${hostPath} ${fileName}`, "quit", ""].join("\n");
  const result = await runProcess({
    command: debugfs,
    args: ["-w", imagePath],
    input: script,
    timeoutMs: DEBUGFS_TIMEOUT_MS
  });
  if (result.timedOut || result.exitCode !== 0) {
    const status = result.timedOut ? "timed out" : `exit ${result.exitCode ?? result.signal ?? "unknown"}`;
    throw new Error(`debugfs failed to write ${guestPath} (${status}): ${result.output.trim()}`);
  }
}
