#!/usr/bin/env node
/**
 * add-static-import CLI
 *
 * Older entry point kept for scripts that pass the member with -m/--method.
 * Same as `add-import --static`.
 *
 * Usage:
 *   add-static-import -m org.assertj.core.api.Assertions.assertThat src/test/java/com/example/MyTest.java
 */
import { runStatic } from "../cli.js";

try {
  process.exitCode = runStatic(process.argv.slice(2));
} catch (error) {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}
