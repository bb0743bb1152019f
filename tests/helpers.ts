import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { UserNotFoundError } from "../src/errors";
import type {
  CollectedUser,
  RedditSource,
  TextItem,
  UserMetadata,
} from "../src/types/reddit";

export const CREATED_2020 = 1577836800; // 2020-01-01T00:00:00Z

export const TEST_ENV = {
  REDDIT_CLIENT_ID: "test-id",
  REDDIT_CLIENT_SECRET: "test-secret",
  REDDIT_USER_AGENT: "test-agent",
};

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), "reddit-persona-"));
}

export function metadata(username = "test_user"): UserMetadata {
  return { username, createdUtc: CREATED_2020, linkKarma: 10, commentKarma: 20 };
}

export function post(id: string, title: string, body = "", subreddit = "misc"): TextItem {
  return {
    kind: "post",
    id,
    url: `https://www.reddit.com/r/${subreddit}/comments/${id}/`,
    title,
    body,
    subreddit,
    timestamp: "2024-01-01T00:00:00.000Z",
    score: 1,
  };
}

export function comment(id: string, body: string, subreddit = "misc"): TextItem {
  return {
    kind: "comment",
    id,
    url: `https://www.reddit.com/r/${subreddit}/comments/abc/_/${id}/`,
    body,
    subreddit,
    timestamp: "2024-01-01T00:00:00.000Z",
    score: 1,
  };
}

export function user(
  posts: TextItem[],
  comments: TextItem[],
  username = "test_user"
): CollectedUser {
  return { metadata: metadata(username), posts, comments };
}

type Step = "profile" | "posts" | "comments";

export interface FakeProfile {
  metadata?: UserMetadata;
  posts: TextItem[];
  comments: TextItem[];
}

/** In-memory Reddit that can be told to fail specific calls. */
export class FakeRedditSource implements RedditSource {
  public calls: Array<{ step: Step; username: string; limit?: number }> = [];
  private failures = new Map<string, Error[]>();

  constructor(private readonly profiles: Record<string, FakeProfile>) {}

  failNext(username: string, step: Step, ...errors: Error[]): void {
    this.failures.set(`${username}/${step}`, errors);
  }

  private enter(step: Step, username: string, limit?: number): FakeProfile {
    this.calls.push({ step, username, limit });
    const queued = this.failures.get(`${username}/${step}`);
    const failure = queued?.shift();
    if (failure) throw failure;

    const profile = this.profiles[username];
    if (!profile) throw new UserNotFoundError(username);
    return profile;
  }

  async getUser(username: string): Promise<UserMetadata> {
    const profile = this.enter("profile", username);
    return profile.metadata ?? metadata(username);
  }

  async getSubmissions(username: string, limit: number): Promise<TextItem[]> {
    return this.enter("posts", username, limit).posts.slice(0, limit);
  }

  async getComments(username: string, limit: number): Promise<TextItem[]> {
    return this.enter("comments", username, limit).comments.slice(0, limit);
  }
}

export function recordingSleep(): { sleeps: number[]; sleep: (ms: number) => Promise<void> } {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
  };
}
