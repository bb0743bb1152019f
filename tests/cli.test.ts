import test from "node:test";
import assert from "node:assert/strict";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import {
  EXIT_ABORTED,
  EXIT_OK,
  EXIT_SETUP_FAILURE,
  main,
  parseArgs,
  type CliDependencies,
} from "../src/cli";
import { NetworkError, RateLimitedError, UsageError } from "../src/errors";
import { configureLogger } from "../src/logger";
import {
  FakeRedditSource,
  TEST_ENV,
  comment,
  post,
  recordingSleep,
  tempDir,
} from "./helpers";

configureLogger({ quiet: true });

const NOW = new Date("2024-01-01T12:00:00Z");

function setup() {
  const source = new FakeRedditSource({
    alice: {
      posts: [post("p1", "Weekend project", "Wrote a Python script")],
      comments: [comment("c1", "Lived in NYC for years")],
    },
    bob: { posts: [], comments: [comment("c2", "I love the gym")] },
    carol: { posts: [post("p2", "Trip report", "Back from a trip to Seattle")], comments: [] },
  });
  const { sleeps, sleep } = recordingSleep();
  const deps: CliDependencies = {
    env: TEST_ENV,
    createSource: async () => source,
    sleep,
    now: () => NOW,
    persona: { tone: () => 0, places: () => [] },
  };
  return { source, sleeps, deps, outputDir: tempDir() };
}

test("parseArgs applies defaults", () => {
  assert.deepEqual(parseArgs(["spez"]), {
    target: "spez",
    batch: false,
    maxPosts: 100,
    maxComments: 200,
    outputDir: "./personas",
    json: false,
    logFile: null,
    verbose: false,
  });
});

test("parseArgs reads flags in both spellings", () => {
  const options = parseArgs([
    "--batch",
    "users.txt",
    "--max-posts",
    "5",
    "--max-comments=0",
    "--output-dir=out",
    "--json",
    "--verbose",
  ]);
  assert.equal(options.target, "users.txt");
  assert.equal(options.batch, true);
  assert.equal(options.maxPosts, 5);
  assert.equal(options.maxComments, 0);
  assert.equal(options.outputDir, "out");
  assert.equal(options.json, true);
  assert.equal(options.verbose, true);
});

test("parseArgs rejects bad input", () => {
  assert.throws(() => parseArgs([]), UsageError);
  assert.throws(() => parseArgs(["a_user", "b_user"]), /Expected one target, got 2/);
  assert.throws(() => parseArgs(["spez", "--max-posts", "-1"]), UsageError);
  assert.throws(() => parseArgs(["spez", "--max-posts", "1001"]), UsageError);
  assert.throws(() => parseArgs(["spez", "--max-posts"]), UsageError);
  assert.throws(() => parseArgs(["spez", "--shout"]), /Unknown option: --shout/);
});

test("single user run writes the text report and optional JSON", async () => {
  const { deps, outputDir } = setup();

  const code = await main(["u/alice", "--output-dir", outputDir, "--json"], deps);

  assert.equal(code, EXIT_OK);
  const report = readFileSync(join(outputDir, "alice_persona.txt"), "utf8");
  assert.equal(report.split("\n")[1], "USER PERSONA: alice");
  assert.ok(report.includes("Location: NYC (based on a single mention)\n"));

  const json = readFileSync(join(outputDir, "alice_persona.json"), "utf8");
  assert.ok(json.startsWith('{\n  "username": "alice",\n'));
  assert.ok(json.includes('"value": "Software Developer"'));
});

test("listing limits from the command line reach the source", async () => {
  const { source, deps, outputDir } = setup();

  await main(["alice", "--max-posts", "5", "--max-comments", "0", "--output-dir", outputDir], deps);

  assert.deepEqual(source.calls, [
    { step: "profile", username: "alice", limit: undefined },
    { step: "posts", username: "alice", limit: 5 },
  ]);
});

test("batch run continues past a failing user", async () => {
  const { source, sleeps, deps, outputDir } = setup();
  source.failNext("bob", "profile", new NetworkError("connection reset", "bob"));
  const batchFile = join(outputDir, "users.txt");
  writeFileSync(batchFile, "alice\n# skipped\n\nbob\ncarol\n");

  const code = await main(["--batch", batchFile, "--output-dir", outputDir], deps);

  assert.equal(code, EXIT_OK);
  assert.equal(existsSync(join(outputDir, "alice_persona.txt")), true);
  assert.equal(existsSync(join(outputDir, "bob_persona.txt")), false);
  assert.equal(existsSync(join(outputDir, "carol_persona.txt")), true);
  assert.deepEqual(
    source.calls.map((c) => `${c.username}/${c.step}`),
    [
      "alice/profile",
      "alice/posts",
      "alice/comments",
      "bob/profile",
      "carol/profile",
      "carol/posts",
      "carol/comments",
    ]
  );
  // Two calls' pauses per user plus one pause before each later user
  assert.deepEqual(sleeps, [100, 100, 100, 100, 100, 100]);
});

test("batch run reports users that do not exist and still succeeds", async () => {
  const { deps, outputDir } = setup();
  const batchFile = join(outputDir, "users.txt");
  writeFileSync(batchFile, "ghost_user\nalice\n");

  const code = await main(["--batch", batchFile, "--output-dir", outputDir], deps);

  assert.equal(code, EXIT_OK);
  assert.equal(existsSync(join(outputDir, "ghost_user_persona.txt")), false);
  assert.equal(existsSync(join(outputDir, "alice_persona.txt")), true);
});

test("single user failures set the exit code", async () => {
  const { source, deps, outputDir } = setup();

  assert.equal(await main(["ghost_user", "--output-dir", outputDir], deps), EXIT_OK);
  assert.equal(existsSync(join(outputDir, "ghost_user_persona.txt")), false);

  source.failNext("alice", "profile", new NetworkError("offline", "alice"));
  assert.equal(await main(["alice", "--output-dir", outputDir], deps), EXIT_ABORTED);

  source.failNext(
    "alice",
    "comments",
    new RateLimitedError("throttled", "alice"),
    new RateLimitedError("throttled", "alice"),
    new RateLimitedError("throttled", "alice")
  );
  assert.equal(await main(["alice", "--output-dir", outputDir], deps), EXIT_ABORTED);

  assert.equal(await main(["not a user", "--output-dir", outputDir], deps), EXIT_SETUP_FAILURE);
});

test("setup problems exit before any user is processed", async () => {
  const { source, deps, outputDir } = setup();

  assert.equal(await main([], deps), EXIT_SETUP_FAILURE);
  assert.equal(await main(["alice"], { ...deps, env: {} }), EXIT_SETUP_FAILURE);
  assert.equal(
    await main(["alice"], {
      ...deps,
      createSource: async () => {
        throw new Error("no network");
      },
    }),
    EXIT_SETUP_FAILURE
  );
  assert.equal(
    await main(["--batch", join(outputDir, "missing.txt"), "--output-dir", outputDir], deps),
    EXIT_SETUP_FAILURE
  );
  assert.deepEqual(source.calls, []);
});

test("log output is copied to the log file", async () => {
  const { deps, outputDir } = setup();
  const logFile = join(outputDir, "logs", "run.log");

  await main(["alice", "--output-dir", outputDir, "--log-file", logFile], deps);
  await main(["alice", "--output-dir", outputDir], deps);

  const lines = readFileSync(logFile, "utf8").trim().split("\n");
  assert.ok(lines.some((line) => line.includes(" INFO ✅ Persona saved to: ")));
  assert.equal(lines.filter((line) => line.includes("Persona saved")).length, 1);
});
