/**
 * Add-Import Package - Command Line Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import {
  run,
  runStatic,
  parseArgs,
  parseStaticArgs,
  formatOutcome,
  nullLogger,
  AddImportError,
  AddImportErrorCode,
} from "@java-import-tools/add-import";
import { createJavaFile, createRecordingLogger, withTempDir } from "./helpers/test-factories.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function parseError(fn: () => unknown): AddImportError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AddImportError) return error;
    throw error;
  }
  throw new Error("expected an AddImportError");
}

describe("parseArgs", () => {
  it("takes the name and then the files", () => {
    expect(parseArgs(["java.util.List", "A.java", "B.java"])).toEqual({
      help: false,
      spec: { kind: "class", fqn: "java.util.List" },
      files: ["A.java", "B.java"],
    });
  });

  it("accepts --static before or after the name", () => {
    expect(parseArgs(["--static", "a.B.c", "A.java"])).toMatchObject({
      spec: { kind: "static", fqn: "a.B.c" },
      files: ["A.java"],
    });
    expect(parseArgs(["a.B.c", "--static", "A.java"])).toMatchObject({
      spec: { kind: "static", fqn: "a.B.c" },
      files: ["A.java"],
    });
  });

  it("treats everything after the first file as a file", () => {
    expect(parseArgs(["a.B", "A.java", "--static"])).toMatchObject({
      spec: { kind: "class", fqn: "a.B" },
      files: ["A.java", "--static"],
    });
  });

  it("stops option parsing at --", () => {
    expect(parseArgs(["--", "-odd", "A.java"])).toMatchObject({
      spec: { kind: "class", fqn: "-odd" },
      files: ["A.java"],
    });
  });

  it("returns help for -h and --help", () => {
    expect(parseArgs(["-h"])).toEqual({ help: true });
    expect(parseArgs(["a.B", "--help"])).toEqual({ help: true });
  });

  it("rejects a missing file list", () => {
    const error = parseError(() => parseArgs(["a.B"]));
    expect(error.code).toBe(AddImportErrorCode.USAGE_NO_FILES);
    expect(error.message).toBe("Provide at least one Java file path");
  });

  it("rejects a missing name", () => {
    const error = parseError(() => parseArgs(["--static"]));
    expect(error.code).toBe(AddImportErrorCode.USAGE_NO_FQN);
    expect(error.message).toBe("Missing required fully-qualified name argument");
  });

  it("rejects unknown options", () => {
    const error = parseError(() => parseArgs(["--verbose", "a.B", "A.java"]));
    expect(error.code).toBe(AddImportErrorCode.USAGE_UNKNOWN_OPTION);
    expect(error.message).toBe("Unknown option: --verbose");
  });
});

describe("parseStaticArgs", () => {
  it("reads the member from -m and --method", () => {
    expect(parseStaticArgs(["-m", "a.B.c", "A.java"])).toEqual({
      help: false,
      spec: { kind: "static", fqn: "a.B.c" },
      files: ["A.java"],
    });
    expect(parseStaticArgs(["--method", "a.B.c", "--", "-A.java"])).toMatchObject({
      files: ["-A.java"],
    });
  });

  it("rejects -m without a value", () => {
    const error = parseError(() => parseStaticArgs(["-m"]));
    expect(error.code).toBe(AddImportErrorCode.USAGE_MISSING_VALUE);
    expect(error.message).toBe("Missing value after -m/--method");
  });

  it("requires -m", () => {
    const error = parseError(() => parseStaticArgs(["A.java"]));
    expect(error.code).toBe(AddImportErrorCode.USAGE_NO_FQN);
    expect(error.message).toBe("You must provide -m/--method with a fully-qualified method or member");
  });
});

describe("formatOutcome", () => {
  it("uses an em dash in the already-present message", () => {
    expect(
      formatOutcome({ status: "present", path: "A.java", importLine: "import a.B;" })
    ).toBe("[INFO] Import already present in A.java — skipping");
  });
});

describe("run", () => {
  it("adds the import and reports it", () => {
    withTempDir((dir) => {
      const file = path.join(dir, "Foo.java");
      fs.writeFileSync(file, "package com.example;\n\npublic class Foo {}\n", "utf8");
      const logger = createRecordingLogger();

      expect(run(["java.util.List", file], logger)).toBe(0);

      expect(logger.records).toEqual([
        { level: "info", message: `[OK] Added: import java.util.List; -> ${file}` },
      ]);
      expect(fs.readFileSync(file, "utf8")).toBe(
        "package com.example;\nimport java.util.List;\n\npublic class Foo {}\n"
      );
    });
  });

  it("reports an already-present import on the second run", () => {
    withTempDir((dir) => {
      const file = createJavaFile(dir, "com.example", "Again");
      run(["java.util.List", file], nullLogger);
      const afterFirst = fs.readFileSync(file, "utf8");
      const logger = createRecordingLogger();

      expect(run(["java.util.List", file], logger)).toBe(0);

      expect(logger.records).toEqual([
        { level: "info", message: `[INFO] Import already present in ${file} — skipping` },
      ]);
      expect(fs.readFileSync(file, "utf8")).toBe(afterFirst);
    });
  });

  it("warns about bad inputs and keeps going", () => {
    withTempDir((dir) => {
      const missing = path.join(dir, "Missing.java");
      const txt = path.join(dir, "notes.txt");
      fs.writeFileSync(txt, "notes\n");
      const good = createJavaFile(dir, "com.example", "Good");
      const logger = createRecordingLogger();

      expect(run(["--static", "a.B.c", missing, txt, good], logger)).toBe(0);

      expect(logger.records).toEqual([
        { level: "warn", message: `[WARN] Skipping: not a file: ${missing}` },
        { level: "warn", message: `[WARN] Skipping non-Java file: ${txt}` },
        { level: "info", message: `[OK] Added: import static a.B.c; -> ${good}` },
      ]);
    });
  });

  it("fails when no files are given", () => {
    const logger = createRecordingLogger();
    expect(run(["java.util.List"], logger)).toBe(1);
    expect(logger.records).toEqual([
      { level: "error", message: "[ERROR] Provide at least one Java file path" },
    ]);
  });

  it("fails on an unknown option", () => {
    const logger = createRecordingLogger();
    expect(run(["--dry-run", "a.B", "A.java"], logger)).toBe(1);
    expect(logger.records).toEqual([
      { level: "error", message: "[ERROR] Unknown option: --dry-run" },
    ]);
  });

  it("prints usage to the error stream without arguments", () => {
    const logger = createRecordingLogger();
    expect(run([], logger)).toBe(1);
    expect(logger.records).toHaveLength(1);
    expect(logger.records[0]?.level).toBe("error");
    expect(logger.records[0]?.message.split("\n")[0]).toBe("Usage:");
  });

  it("prints usage for --help", () => {
    const logger = createRecordingLogger();
    expect(run(["--help"], logger)).toBe(0);
    expect(logger.records[0]?.level).toBe("log");
    expect(logger.records[0]?.message.split("\n")[1]).toBe(
      "  add-import [--static] <fully.qualified.ClassOrMember> <java_file1> [java_file2 ...]"
    );
  });

  it("stops with exit code 1 when a file cannot be written", () => {
    withTempDir((dir) => {
      const first = createJavaFile(dir, "com.example", "First");
      const second = createJavaFile(dir, "com.example", "Second");
      const untouched = fs.readFileSync(second, "utf8");
      vi.spyOn(fs, "renameSync").mockImplementation(() => {
        throw new Error("disk full");
      });
      const logger = createRecordingLogger();

      expect(run(["java.util.List", first, second], logger)).toBe(1);

      expect(logger.records).toEqual([
        { level: "error", message: `[ERROR] Failed to update file: ${first}` },
      ]);
      expect(fs.readFileSync(second, "utf8")).toBe(untouched);
    });
  });
});

describe("runStatic", () => {
  it("adds a static import given with -m", () => {
    withTempDir((dir) => {
      const file = createJavaFile(dir, "com.example", "MyTest");
      const logger = createRecordingLogger();

      expect(runStatic(["-m", "org.assertj.core.api.Assertions.assertThat", file], logger)).toBe(0);

      expect(logger.records).toEqual([
        {
          level: "info",
          message: `[OK] Added: import static org.assertj.core.api.Assertions.assertThat; -> ${file}`,
        },
      ]);
      expect(fs.readFileSync(file, "utf8")).toContain(
        "package com.example;\nimport static org.assertj.core.api.Assertions.assertThat;\n\npublic class MyTest {"
      );
    });
  });

  it("fails without -m", () => {
    const logger = createRecordingLogger();
    expect(runStatic(["A.java"], logger)).toBe(1);
    expect(logger.records).toEqual([
      {
        level: "error",
        message: "[ERROR] You must provide -m/--method with a fully-qualified method or member",
      },
    ]);
  });
});
