/**
 * Add-Import Package - Per-File Driver
 *
 * Read, insert, write back. Each file is handled on its own; a failure on one
 * file leaves the files before it updated.
 */

import { pathToFileURL } from "node:url";
import path from "node:path";
import { AddImportError, AddImportErrorCode } from "./errors.js";
import { checkSourceFile, readSourceFile, writeFileAtomic } from "./fs.js";
import { insertImport } from "./insert.js";
import type { FileOutcome, ImportSpec } from "./types.js";

/**
 * Add the import to one file.
 *
 * Ineligible paths come back as `skipped` without being read. The file is
 * written only when the import was missing.
 *
 * @throws AddImportError with `WRITE_FAILED` when the atomic replace fails
 */
export function addImportToFile(filePath: string, spec: ImportSpec): FileOutcome {
  const reason = checkSourceFile(filePath);
  if (reason) {
    return { status: "skipped", path: filePath, reason };
  }

  const content = readSourceFile(filePath);
  const uri = pathToFileURL(path.resolve(filePath)).toString();
  const result = insertImport(content, spec, uri);

  if (result.status === "present") {
    return { status: "present", path: filePath, importLine: result.importLine };
  }

  try {
    writeFileAtomic(filePath, result.text);
  } catch (error) {
    throw new AddImportError(
      `Failed to update file: ${filePath}`,
      AddImportErrorCode.WRITE_FAILED,
      filePath,
      { cause: error }
    );
  }

  return { status: "added", path: filePath, importLine: result.importLine };
}
