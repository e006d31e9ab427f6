/**
 * Add-Import Package - Import Specification
 */

import type { ImportSpec } from "./types.js";

/**
 * Import of a type, e.g. `import java.util.List;`.
 */
export function classImport(fqn: string): ImportSpec {
  return { kind: "class", fqn };
}

/**
 * Import of a static member, e.g. `import static java.util.Collections.emptyList;`.
 */
export function staticImport(fqn: string): ImportSpec {
  return { kind: "static", fqn };
}

/**
 * The exact line searched for and inserted.
 */
export function formatImportLine(spec: ImportSpec): string {
  switch (spec.kind) {
    case "class":
      return `import ${spec.fqn};`;
    case "static":
      return `import static ${spec.fqn};`;
  }
}
