/**
 * Add-Import Package - File System
 *
 * Eligibility checks for target files and atomic replacement of their content.
 */

import fs from "node:fs";
import path from "node:path";
import type { SkipReason } from "./types.js";

export const SOURCE_EXTENSION = ".java";

/**
 * Why `filePath` cannot be processed, or `null` when it can.
 *
 * Checked in order: exists and is a regular file, then has the `.java`
 * extension (any case).
 */
export function checkSourceFile(filePath: string): SkipReason | null {
  const stat = fs.statSync(filePath, { throwIfNoEntry: false });
  if (!stat?.isFile()) {
    return "not-a-file";
  }
  if (path.extname(filePath).toLowerCase() !== SOURCE_EXTENSION) {
    return "wrong-extension";
  }
  return null;
}

export function readSourceFile(filePath: string): string {
  return fs.readFileSync(filePath, "utf8");
}

/**
 * Replace `filePath` with `content` through a temp file in the same directory
 * and a rename. The file mode of an existing target is kept. The temp file
 * never outlives the call.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(
    dir,
    `${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  );
  const existing = fs.statSync(filePath, { throwIfNoEntry: false });

  try {
    fs.writeFileSync(tmpPath, content, "utf8");
    if (existing) {
      fs.chmodSync(tmpPath, existing.mode & 0o7777);
    }
    fs.renameSync(tmpPath, filePath);
  } finally {
    fs.rmSync(tmpPath, { force: true });
  }
}
