import fs from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import { ForgeError } from "./errors.js";

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code == "string") {
    return err.code;
  }
  return undefined;
}

function getPathStats(path: string): fs.Stats | null {
  try {
    return fs.statSync(path);
  } catch (err) {
    const code = errorCode(err);
    if (code == "ENOENT" || code == "ENOTDIR") {
      return null;
    }
    if (code == "EACCES") {
      throw new ForgeError(
        "Permission denied while accessing path",
        `Path: ${path}`,
      );
    }

    throw new ForgeError(
      "Filesystem error",
      err instanceof Error ? err.message : String(err),
    );
  }
}

export function fileExists(path: string): boolean {
  const stats = getPathStats(path);
  return stats ? stats.isFile() : false;
}

export function dirExists(path: string): boolean {
  const stats = getPathStats(path);
  return stats ? stats.isDirectory() : false;
}

export function sha256(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex");
}

/** Writes through a sibling temp file so readers never see a half-written file. */
export function writeFileAtomic(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  const tmpPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`,
  );
  fs.writeFileSync(tmpPath, content, "utf-8");
  try {
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}
