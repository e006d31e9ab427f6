/**
 * Add-Import Package - Command Line
 *
 * Argument parsing and console reporting for the `add-import` and
 * `add-static-import` executables. Both return an exit code instead of
 * exiting, so they can be driven in-process.
 */

import { addImportToFile } from "./add-import.js";
import { AddImportError, AddImportErrorCode } from "./errors.js";
import { classImport, staticImport } from "./import-spec.js";
import { consoleLogger, type Logger } from "./logger.js";
import type { FileOutcome, ImportSpec } from "./types.js";

export type AddImportOptions = {
  spec: ImportSpec;
  files: string[];
};

export type ParsedArgs = { help: true } | ({ help: false } & AddImportOptions);

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * `add-import [--static] <fqn> <file...>`
 */
export function run(argv: readonly string[], logger: Logger = consoleLogger): number {
  return execute(argv, logger, parseArgs, ADD_IMPORT_USAGE);
}

/**
 * `add-static-import -m <fqn> <file...>`
 */
export function runStatic(argv: readonly string[], logger: Logger = consoleLogger): number {
  return execute(argv, logger, parseStaticArgs, ADD_STATIC_IMPORT_USAGE);
}

/**
 * Parse `add-import` arguments.
 *
 * Options are read until the first positional after the name; from there on
 * every argument is a file path, even one that looks like an option.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  let isStatic = false;
  let fqn: string | null = null;
  let i = 0;

  for (; i < args.length; i += 1) {
    const arg = args[i] ?? "";
    if (arg === "--static") {
      isStatic = true;
    } else if (arg === "-h" || arg === "--help") {
      return { help: true };
    } else if (arg === "--") {
      i += 1;
      break;
    } else if (arg.startsWith("-")) {
      throw unknownOption(arg);
    } else if (fqn === null) {
      fqn = arg;
    } else {
      break;
    }
  }

  if (fqn === null) {
    const next = args[i];
    if (next === undefined) {
      throw new AddImportError(
        "Missing required fully-qualified name argument",
        AddImportErrorCode.USAGE_NO_FQN
      );
    }
    fqn = next;
    i += 1;
  }

  return {
    help: false,
    spec: isStatic ? staticImport(fqn) : classImport(fqn),
    files: requireFiles(args.slice(i)),
  };
}

/**
 * Parse `add-static-import` arguments. The first positional starts the file
 * list.
 */
export function parseStaticArgs(args: readonly string[]): ParsedArgs {
  let fqn: string | null = null;
  let i = 0;

  for (; i < args.length; i += 1) {
    const arg = args[i] ?? "";
    if (arg === "-m" || arg === "--method") {
      const value = args[i + 1];
      if (value === undefined) {
        throw new AddImportError(
          "Missing value after -m/--method",
          AddImportErrorCode.USAGE_MISSING_VALUE
        );
      }
      fqn = value;
      i += 1;
    } else if (arg === "-h" || arg === "--help") {
      return { help: true };
    } else if (arg === "--") {
      i += 1;
      break;
    } else if (arg.startsWith("-")) {
      throw unknownOption(arg);
    } else {
      break;
    }
  }

  if (fqn === null) {
    throw new AddImportError(
      "You must provide -m/--method with a fully-qualified method or member",
      AddImportErrorCode.USAGE_NO_FQN
    );
  }

  return { help: false, spec: staticImport(fqn), files: requireFiles(args.slice(i)) };
}

/**
 * Console line for a file outcome.
 */
export function formatOutcome(outcome: FileOutcome): string {
  switch (outcome.status) {
    case "added":
      return `[OK] Added: ${outcome.importLine} -> ${outcome.path}`;
    case "present":
      return `[INFO] Import already present in ${outcome.path} — skipping`;
    case "skipped":
      return outcome.reason === "not-a-file"
        ? `[WARN] Skipping: not a file: ${outcome.path}`
        : `[WARN] Skipping non-Java file: ${outcome.path}`;
  }
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function execute(
  argv: readonly string[],
  logger: Logger,
  parse: (args: readonly string[]) => ParsedArgs,
  usage: string
): number {
  if (argv.length === 0) {
    logger.error(usage);
    return 1;
  }

  try {
    const parsed = parse(argv);
    if (parsed.help) {
      logger.log(usage);
      return 0;
    }

    for (const file of parsed.files) {
      const outcome = addImportToFile(file, parsed.spec);
      const line = formatOutcome(outcome);
      if (outcome.status === "skipped") {
        logger.warn(line);
      } else {
        logger.info(line);
      }
    }
    return 0;
  } catch (error) {
    if (error instanceof AddImportError) {
      logger.error(`[ERROR] ${error.message}`);
      return 1;
    }
    throw error;
  }
}

function requireFiles(files: string[]): string[] {
  if (files.length === 0) {
    throw new AddImportError(
      "Provide at least one Java file path",
      AddImportErrorCode.USAGE_NO_FILES
    );
  }
  return files;
}

function unknownOption(arg: string): AddImportError {
  return new AddImportError(
    `Unknown option: ${arg}`,
    AddImportErrorCode.USAGE_UNKNOWN_OPTION
  );
}

const ADD_IMPORT_USAGE = [
  "Usage:",
  "  add-import [--static] <fully.qualified.ClassOrMember> <java_file1> [java_file2 ...]",
  "",
  "Options:",
  "  --static        Treat the given FQN as a static member to import (import static ...)",
  "  -h, --help      Show this help and exit",
].join("\n");

const ADD_STATIC_IMPORT_USAGE = [
  "Usage:",
  "  add-static-import -m <fully.qualified.Owner.member> <java_file1> [java_file2 ...]",
  "",
  "Options:",
  "  -m, --method    Fully-qualified static member to import",
  "  -h, --help      Show this help and exit",
].join("\n");
