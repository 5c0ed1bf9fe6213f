import path from "node:path";

import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

export async function pathExists(p: string): Promise<boolean> {
  return fse.pathExists(p);
}

export async function ensureDir(dir: string): Promise<void> {
  await fse.ensureDir(dir);
}

export async function readTextFile(filePath: string): Promise<string> {
  return fse.readFile(filePath, "utf8");
}

// Writes beside the target and renames so readers never observe a half-written file.
export async function writeTextFileAtomic(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp-${process.pid}`;
  await fse.writeFile(tmpPath, content, "utf8");
  await fse.rename(tmpPath, filePath);
}

export async function appendTextFile(filePath: string, content: string): Promise<void> {
  if (content.length === 0) return;
  await ensureDir(path.dirname(filePath));
  await fse.appendFile(filePath, content, "utf8");
}

/**
 * Splits file content into lines: a trailing newline does not
 * produce an extra empty entry, but interior blank lines are kept.
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/** True for an existing regular file; missing paths read as false, other stat errors propagate. */
export async function isFile(p: string): Promise<boolean> {
  try {
    return (await fse.stat(p)).isFile();
  } catch (err) {
    if (isMissingPathError(err)) return false;
    throw err;
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fse.stat(p)).isDirectory();
  } catch (err) {
    if (isMissingPathError(err)) return false;
    throw err;
  }
}

function isMissingPathError(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}
