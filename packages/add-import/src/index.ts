/**
 * @java-import-tools/add-import
 *
 * Add a class or static import to Java source files, once.
 *
 * @example
 * ```typescript
 * import { addImportToFile, staticImport } from "@java-import-tools/add-import";
 *
 * const outcome = addImportToFile(
 *   "src/test/java/com/example/MyTest.java",
 *   staticImport("org.assertj.core.api.Assertions.assertThat"),
 * );
 * // outcome.status is "added", "present" or "skipped"
 * ```
 */

// Import specification
export { classImport, staticImport, formatImportLine } from "./import-spec.js";

// Insertion
export {
  insertImport,
  hasImport,
  findAnchors,
  planInsertion,
  detectLineEnding,
} from "./insert.js";

// Files
export { addImportToFile } from "./add-import.js";
export {
  checkSourceFile,
  readSourceFile,
  writeFileAtomic,
  SOURCE_EXTENSION,
} from "./fs.js";

// Command line
export { run, runStatic, parseArgs, parseStaticArgs, formatOutcome } from "./cli.js";
export type { AddImportOptions, ParsedArgs } from "./cli.js";

// Logging and errors
export { consoleLogger, nullLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { AddImportError, AddImportErrorCode } from "./errors.js";
export type { AddImportErrorCodeType } from "./errors.js";

export type {
  ImportKind,
  ImportSpec,
  InsertionAnchor,
  InsertionPlan,
  InsertResult,
  SourceAnchors,
  SkipReason,
  FileOutcome,
} from "./types.js";
