import test from "node:test";
import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { join } from "node:path";

import { configureLogger, logger } from "../src/logger";
import { tempDir } from "./helpers";

test("quiet mode keeps the console silent but still writes the log file", (t) => {
  const logFile = join(tempDir(), "run.log");
  const log = t.mock.method(console, "log", () => undefined);
  const warn = t.mock.method(console, "warn", () => undefined);
  configureLogger({ quiet: true, logFile });

  logger.info("📌 fetching");
  logger.warn("⚠️ slow", { attempt: 2 });
  configureLogger({ logFile: null });

  assert.equal(log.mock.callCount(), 0);
  assert.equal(warn.mock.callCount(), 0);
  const lines = readFileSync(logFile, "utf8").trimEnd().split("\n");
  assert.equal(lines.length, 2);
  assert.ok(lines[0].endsWith(" INFO 📌 fetching"));
  assert.ok(lines[1].endsWith(' WARN ⚠️ slow {"attempt":2}'));
});

test("debug lines need verbose mode", (t) => {
  const log = t.mock.method(console, "log", () => undefined);
  configureLogger({ quiet: false, verbose: false });

  logger.debug("hidden");
  configureLogger({ verbose: true });
  logger.debug("shown");
  configureLogger({ verbose: false, quiet: true });

  assert.deepEqual(
    log.mock.calls.map((call) => call.arguments[0]),
    ["shown"]
  );
});
