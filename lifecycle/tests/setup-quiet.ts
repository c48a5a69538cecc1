// tests/setup-quiet.ts - Redirect console output to a log file during tests.
//
// Appends console.log/info/debug/warn to <tmpdir>/gpuform-test-detail.log so
// `vitest run` output stays clean. console.error passes through to stderr.
// Set GPUFORM_TEST_VERBOSE=1 to disable and see everything.

import { appendFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

const logPath = join(tmpdir(), "gpuform-test-detail.log");

if (!process.env.GPUFORM_TEST_VERBOSE) {
  const ts = () => new Date().toISOString().slice(11, 23); // HH:mm:ss.SSS

  const write = (level: string, args: unknown[]) => {
    const msg = args
      .map((a) => (typeof a === "string" ? a : JSON.stringify(a, null, 2)))
      .join(" ");
    appendFileSync(logPath, `${ts()} [${level}] ${msg}\n`);
  };

  console.log = (...args: unknown[]) => write("log", args);
  console.info = (...args: unknown[]) => write("info", args);
  console.debug = (...args: unknown[]) => write("debug", args);
  console.warn = (...args: unknown[]) => write("warn", args);
}
