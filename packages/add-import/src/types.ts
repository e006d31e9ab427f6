/**
 * Add-Import Package - Types
 *
 * Shared types for import insertion and the per-file driver.
 */

import type { TextEdit } from "vscode-languageserver-textdocument";

/* =============================================================================
 * IMPORT SPECIFICATION
 * ============================================================================= */

/** Form of the import statement. */
export type ImportKind = "class" | "static";

/**
 * What to import. Build it with `classImport` or `staticImport`.
 */
export interface ImportSpec {
  kind: ImportKind;

  /** Dotted name of the type or member, used verbatim */
  fqn: string;
}

/* =============================================================================
 * INSERTION
 * ============================================================================= */

/**
 * Rule that placed the new import line.
 *
 * - `after-import`: directly below the last existing import
 * - `after-package`: below the package declaration, followed by a blank line
 * - `top-of-file`: first line of the file, followed by a blank line
 */
export type InsertionAnchor = "after-import" | "after-package" | "top-of-file";

/**
 * Line numbers found by scanning a source file (0-based, -1 when absent).
 */
export interface SourceAnchors {
  /** Last line beginning with `import ` */
  lastImportLine: number;

  /** First line beginning with `package ` */
  packageLine: number;
}

export interface InsertionPlan {
  anchor: InsertionAnchor;
  edit: TextEdit;
}

export type InsertResult =
  | { status: "present"; importLine: string }
  | {
      status: "inserted";
      importLine: string;
      anchor: InsertionAnchor;
      edit: TextEdit;
      /** Full content with the import applied */
      text: string;
    };

/* =============================================================================
 * FILE OUTCOMES
 * ============================================================================= */

export type SkipReason = "not-a-file" | "wrong-extension";

export type FileOutcome =
  | { status: "added"; path: string; importLine: string }
  | { status: "present"; path: string; importLine: string }
  | { status: "skipped"; path: string; reason: SkipReason };
