/**
 * Add-Import Package - Import Insertion
 *
 * Decides where a new import line goes and produces the edit that puts it
 * there. Lines are matched by prefix only; the source is never parsed, so an
 * import-looking line inside a comment or string counts as an import.
 */

import { TextDocument, type Position, type TextEdit } from "vscode-languageserver-textdocument";
import { formatImportLine } from "./import-spec.js";
import type {
  ImportSpec,
  InsertResult,
  InsertionPlan,
  SourceAnchors,
} from "./types.js";

const LINE_BREAK = /\r\n|\r|\n/;
const IMPORT_PREFIX = "import ";
const PACKAGE_PREFIX = "package ";

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Insert the import described by `spec` into `content`.
 *
 * Returns `present` without touching anything when a line, trimmed, already
 * equals the import line.
 *
 * @example
 * ```typescript
 * const result = insertImport("package com.example;\n\npublic class Foo {}\n", classImport("java.util.List"));
 * // result.text === "package com.example;\nimport java.util.List;\n\npublic class Foo {}\n"
 * ```
 */
export function insertImport(
  content: string,
  spec: ImportSpec,
  uri = "untitled:Source.java"
): InsertResult {
  const importLine = formatImportLine(spec);
  const lines = content.split(LINE_BREAK);

  if (hasImport(lines, importLine)) {
    return { status: "present", importLine };
  }

  const plan = planInsertion(lines, importLine, detectLineEnding(content));
  const document = TextDocument.create(uri, "java", 0, content);

  return {
    status: "inserted",
    importLine,
    anchor: plan.anchor,
    edit: plan.edit,
    text: TextDocument.applyEdits(document, [plan.edit]),
  };
}

/**
 * Whether any line, ignoring surrounding whitespace, is exactly `importLine`.
 */
export function hasImport(lines: readonly string[], importLine: string): boolean {
  const target = importLine.trim();
  return lines.some((line) => line.trim() === target);
}

/**
 * Find the last import line and the first package line.
 */
export function findAnchors(lines: readonly string[]): SourceAnchors {
  let lastImportLine = -1;
  let packageLine = -1;

  lines.forEach((line, index) => {
    const text = line.trimStart();
    if (text.startsWith(IMPORT_PREFIX)) {
      lastImportLine = index;
    }
    if (packageLine === -1 && text.startsWith(PACKAGE_PREFIX)) {
      packageLine = index;
    }
  });

  return { lastImportLine, packageLine };
}

/**
 * Compute the edit that inserts `importLine`.
 *
 * Priority: after the last import, else after the package declaration (with
 * a blank line unless one already follows), else at the top of the file
 * followed by a blank line.
 */
export function planInsertion(
  lines: readonly string[],
  importLine: string,
  eol = "\n"
): InsertionPlan {
  const { lastImportLine, packageLine } = findAnchors(lines);

  if (lastImportLine !== -1) {
    return {
      anchor: "after-import",
      edit: insertAfterLine(lines, lastImportLine, [importLine], eol),
    };
  }

  if (packageLine !== -1) {
    const next = packageLine + 1;
    const blankFollows = isRealLine(lines, next) && lines[next]?.trim() === "";
    return {
      anchor: "after-package",
      edit: insertAfterLine(
        lines,
        packageLine,
        blankFollows ? [importLine] : [importLine, ""],
        eol
      ),
    };
  }

  return {
    anchor: "top-of-file",
    edit: {
      range: { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } },
      newText: importLine + eol + eol,
    },
  };
}

/**
 * `\r\n` when the file uses it anywhere, `\r` for a file with bare `\r`
 * breaks and no `\n`, `\n` otherwise.
 */
export function detectLineEnding(content: string): string {
  if (content.includes("\r\n")) return "\r\n";
  if (content.includes("\r") && !content.includes("\n")) return "\r";
  return "\n";
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

/**
 * Splitting leaves an empty element after a final line break; that element is
 * not a line of the file.
 */
function isRealLine(lines: readonly string[], index: number): boolean {
  if (index >= lines.length) return false;
  return index < lines.length - 1 || lines[index] !== "";
}

function insertAfterLine(
  lines: readonly string[],
  line: number,
  newLines: readonly string[],
  eol: string
): TextEdit {
  const body = newLines.join(eol);

  // Anchor is the final line and has no terminator: terminate it first.
  if (line + 1 >= lines.length) {
    const end: Position = { line, character: lines[line]?.length ?? 0 };
    return { range: { start: end, end }, newText: eol + body };
  }

  const start: Position = { line: line + 1, character: 0 };
  return { range: { start, end: start }, newText: body + eol };
}
