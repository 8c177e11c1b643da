import { promises as fs } from "fs";
import path from "path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

export async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf8");
  return JSON.parse(content);
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await writeText(filePath, JSON.stringify(data, null, 2) + "\n");
}

/**
 * Creates `filePath` only if it does not exist yet. Resolves false when it already does.
 */
export async function writeJsonExclusive(filePath: string, data: unknown): Promise<boolean> {
  await ensureDir(path.dirname(filePath));
  try {
    await fs.writeFile(filePath, JSON.stringify(data, null, 2) + "\n", { encoding: "utf8", flag: "wx" });
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") return false;
    throw error;
  }
}

/**
 * Creates `dirPath` itself (parents as needed) only if it does not exist yet.
 * Resolves false when it already does.
 */
export async function createDirExclusive(dirPath: string): Promise<boolean> {
  await ensureDir(path.dirname(dirPath));
  try {
    await fs.mkdir(dirPath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") return false;
    throw error;
  }
}

export async function writeText(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content, "utf8");
}

export async function appendText(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.appendFile(filePath, content, "utf8");
}

export async function copyFile(srcPath: string, destPath: string): Promise<void> {
  await ensureDir(path.dirname(destPath));
  await fs.copyFile(srcPath, destPath);
}

export async function removePath(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
