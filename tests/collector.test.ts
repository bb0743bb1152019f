import test from "node:test";
import assert from "node:assert/strict";

import { Collector, type CollectorOptions } from "../src/collector";
import {
  InvalidTargetError,
  NetworkError,
  RateLimitedError,
  UserNotFoundError,
} from "../src/errors";
import { configureLogger } from "../src/logger";
import { FakeRedditSource, comment, post, recordingSleep } from "./helpers";

configureLogger({ quiet: true });

function setup(overrides: Partial<CollectorOptions> = {}) {
  const source = new FakeRedditSource({
    alice: {
      posts: [post("p1", "First"), post("p2", "Second")],
      comments: [comment("c1", "Reply")],
    },
  });
  const { sleeps, sleep } = recordingSleep();
  const collector = new Collector(source, {
    maxPosts: 10,
    maxComments: 20,
    requestDelayMs: 100,
    maxRateLimitRetries: 3,
    retryBaseDelayMs: 2000,
    sleep,
    ...overrides,
  });
  return { source, sleeps, collector };
}

const limited = (retryAfterMs?: number) =>
  new RateLimitedError("throttled", "alice", retryAfterMs);

test("collects profile, posts and comments in order with a pause between calls", async () => {
  const { source, sleeps, collector } = setup();

  const collected = await collector.collect("https://www.reddit.com/user/alice/");

  assert.equal(collected.metadata.username, "alice");
  assert.deepEqual(
    collected.posts.map((p) => p.id),
    ["p1", "p2"]
  );
  assert.deepEqual(
    collected.comments.map((c) => c.id),
    ["c1"]
  );
  assert.deepEqual(source.calls, [
    { step: "profile", username: "alice", limit: undefined },
    { step: "posts", username: "alice", limit: 10 },
    { step: "comments", username: "alice", limit: 20 },
  ]);
  assert.deepEqual(sleeps, [100, 100]);
});

test("a zero limit skips that listing", async () => {
  const { source, sleeps, collector } = setup({ maxPosts: 0 });

  const collected = await collector.collect("alice");

  assert.deepEqual(collected.posts, []);
  assert.deepEqual(
    source.calls.map((c) => c.step),
    ["profile", "comments"]
  );
  assert.deepEqual(sleeps, [100]);
});

test("rate limited calls are retried with a doubling delay", async () => {
  const { source, sleeps, collector } = setup();
  source.failNext("alice", "posts", limited(), limited());

  const collected = await collector.collect("alice");

  assert.equal(collected.posts.length, 2);
  assert.equal(source.calls.filter((c) => c.step === "posts").length, 3);
  assert.deepEqual(sleeps, [100, 2000, 4000, 100]);
});

test("gives up once every attempt was rate limited", async () => {
  const { source, sleeps, collector } = setup();
  source.failNext("alice", "posts", limited(), limited(), limited());

  await assert.rejects(collector.collect("alice"), RateLimitedError);
  assert.deepEqual(sleeps, [100, 2000, 4000]);
  assert.equal(source.calls.some((c) => c.step === "comments"), false);
});

test("waits at least as long as the server asks", async () => {
  const { source, sleeps, collector } = setup();
  source.failNext("alice", "comments", limited(9000));

  await collector.collect("alice");

  assert.deepEqual(sleeps, [100, 100, 9000]);
});

test("errors other than rate limits are not retried", async () => {
  const { source, collector } = setup();
  source.failNext("alice", "posts", new NetworkError("connection reset", "alice"));

  await assert.rejects(collector.collect("alice"), NetworkError);
  assert.equal(source.calls.filter((c) => c.step === "posts").length, 1);
});

test("unknown users fail on the profile lookup", async () => {
  const { source, collector } = setup();

  await assert.rejects(collector.collect("ghost_user"), UserNotFoundError);
  assert.deepEqual(
    source.calls.map((c) => c.step),
    ["profile"]
  );
});

test("invalid targets are rejected before any request", async () => {
  const { source, collector } = setup();

  await assert.rejects(collector.collect("not a user"), InvalidTargetError);
  assert.deepEqual(source.calls, []);
});
