import { RateLimitedError } from "./errors";
import { logger } from "./logger";
import { parseTarget } from "./preprocessing";
import type { CollectedUser, RedditSource } from "./types/reddit";

export interface CollectorOptions {
  maxPosts: number;
  maxComments: number;
  requestDelayMs: number;
  maxRateLimitRetries: number; // Total attempts per call
  retryBaseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fetches a user's profile, posts and comments one call at a time, pausing
 * between calls. Throttled calls are retried with a doubling delay.
 */
export class Collector {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly source: RedditSource,
    private readonly options: CollectorOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  private async withRateLimitRetry<T>(fn: () => Promise<T>, name: string): Promise<T> {
    const { maxRateLimitRetries, retryBaseDelayMs } = this.options;
    let delay = retryBaseDelayMs;

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!(error instanceof RateLimitedError) || attempt >= maxRateLimitRetries) {
          throw error;
        }

        const waitMs = Math.max(error.retryAfterMs ?? 0, delay);
        logger.warn(
          `⏳ [${name}] Rate limited (attempt ${attempt}/${maxRateLimitRetries}), retrying in ${waitMs}ms...`
        );
        await this.sleep(waitMs);
        delay *= 2;
      }
    }
  }

  async collect(target: string): Promise<CollectedUser> {
    const username = parseTarget(target);
    const { maxPosts, maxComments, requestDelayMs } = this.options;

    logger.info(`🔍 Fetching profile for u/${username}`);
    const metadata = await this.withRateLimitRetry(
      () => this.source.getUser(username),
      `${username}/profile`
    );

    let posts: CollectedUser["posts"] = [];
    if (maxPosts > 0) {
      await this.sleep(requestDelayMs);
      logger.info(`📌 Fetching up to ${maxPosts} posts for u/${username}`);
      posts = await this.withRateLimitRetry(
        () => this.source.getSubmissions(username, maxPosts),
        `${username}/posts`
      );
    }

    let comments: CollectedUser["comments"] = [];
    if (maxComments > 0) {
      await this.sleep(requestDelayMs);
      logger.info(`💬 Fetching up to ${maxComments} comments for u/${username}`);
      comments = await this.withRateLimitRetry(
        () => this.source.getComments(username, maxComments),
        `${username}/comments`
      );
    }

    logger.info(
      `📊 Collected ${posts.length} posts and ${comments.length} comments for u/${username}`
    );
    return { metadata, posts, comments };
  }
}
