import snoowrap from "snoowrap";
import axios, { type AxiosInstance } from "axios";
import type { RedditCredentials } from "./config";
import {
  ConfigError,
  NetworkError,
  PersonaError,
  RateLimitedError,
  UserNotFoundError,
  describeError,
} from "./errors";
import { logger } from "./logger";
import type {
  RedditSource,
  TextItem,
  UserMetadata,
} from "./types/reddit";

const TOKEN_URL = "https://www.reddit.com/api/v1/access_token";
const OAUTH_BASE_URL = "https://oauth.reddit.com";
const SITE_URL = "https://www.reddit.com";
const TOKEN_REFRESH_MARGIN_MS = 60_000;

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "ESOCKETTIMEDOUT",
  "EPIPE",
  "ERR_NETWORK",
]);

export interface AccessToken {
  value: string;
  expiresAt: number; // ms since epoch
}

// Fields read from snoowrap's Submission and Comment objects.
export interface SubmissionLike {
  id: string;
  title: string;
  selftext: string;
  permalink: string;
  created_utc: number;
  score: number;
  subreddit: { display_name: string };
}

export interface CommentLike {
  id: string;
  body: string;
  permalink: string;
  created_utc: number;
  score: number;
  subreddit: { display_name: string };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export async function getAccessToken(
  credentials: RedditCredentials,
  http: AxiosInstance = axios,
  now: () => number = Date.now
): Promise<AccessToken> {
  const grant: Record<string, string> =
    credentials.username && credentials.password
      ? {
          grant_type: "password",
          username: credentials.username,
          password: credentials.password,
        }
      : { grant_type: "client_credentials" };

  try {
    const response = await http.post<unknown>(TOKEN_URL, new URLSearchParams(grant), {
      auth: {
        username: credentials.clientId,
        password: credentials.clientSecret,
      },
      headers: {
        "User-Agent": credentials.userAgent,
      },
    });

    const data = response.data;
    const token = isRecord(data) ? data.access_token : undefined;
    if (typeof token !== "string" || token === "") {
      const reason = isRecord(data) && typeof data.error === "string" ? data.error : "no token";
      throw new ConfigError(`Reddit did not issue an access token (${reason})`);
    }

    const expiresIn =
      isRecord(data) && typeof data.expires_in === "number" ? data.expires_in : 3600;
    logger.debug(`🔑 Access token obtained (${grant.grant_type}, ${expiresIn}s)`);
    return { value: token, expiresAt: now() + expiresIn * 1000 };
  } catch (error) {
    if (error instanceof PersonaError) throw error;

    const status = axios.isAxiosError(error) ? error.response?.status : undefined;
    if (status === 400 || status === 401 || status === 403) {
      throw new ConfigError(`Reddit rejected the app credentials (HTTP ${status})`);
    }
    throw new NetworkError(
      `Failed to get access token: ${describeError(error)}`,
      undefined,
      error
    );
  }
}

function statusOf(error: unknown): number | undefined {
  if (axios.isAxiosError(error)) return error.response?.status;
  if (!isRecord(error)) return undefined;

  const status = error.statusCode ?? error.status;
  return typeof status === "number" ? status : undefined;
}

function codeOf(error: unknown): string | undefined {
  if (!isRecord(error)) return undefined;
  if (typeof error.code === "string") return error.code;
  // request-promise wraps the socket error in `cause`
  return codeOf(error.cause);
}

// snoowrap's error classes leave `name` as "Error"; the class name tells them apart.
function errorName(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  return error.name !== "Error" ? error.name : error.constructor.name;
}

function retryAfterMs(error: unknown): number | undefined {
  if (!axios.isAxiosError(error)) return undefined;
  const header: unknown = error.response?.headers?.["retry-after"];
  const seconds = Number(header);
  return header !== undefined && Number.isFinite(seconds) && seconds >= 0
    ? seconds * 1000
    : undefined;
}

/**
 * Maps snoowrap and axios failures onto the error taxonomy. Errors that
 * already belong to it pass through unchanged.
 */
export function toRedditError(
  error: unknown,
  username: string,
  context = "request"
): PersonaError {
  if (error instanceof PersonaError) return error;

  const status = statusOf(error);
  const name = errorName(error);

  if (status === 404) return new UserNotFoundError(username, "missing");
  if (status === 403) return new UserNotFoundError(username, "private");

  if (status === 429 || name === "RateLimitError") {
    return new RateLimitedError(
      `Reddit rate limit hit while fetching ${context} for u/${username}`,
      username,
      retryAfterMs(error)
    );
  }

  if (status !== undefined && status >= 500) {
    return new NetworkError(
      `Reddit returned HTTP ${status} while fetching ${context} for u/${username}`,
      username,
      error
    );
  }

  const code = codeOf(error);
  if ((code && NETWORK_ERROR_CODES.has(code)) || name === "RequestError") {
    return new NetworkError(
      `Network failure while fetching ${context} for u/${username}: ${describeError(error)}`,
      username,
      error
    );
  }

  return new PersonaError(
    `Reddit request for ${context} of u/${username} failed: ${describeError(error)}`,
    username
  );
}

/** Reads `/user/<name>/about`. Suspended accounts count as not found. */
export function parseAboutResponse(data: unknown, username: string): UserMetadata {
  const user = isRecord(data) && isRecord(data.data) ? data.data : undefined;
  if (!user) {
    throw new PersonaError(`Unexpected profile response for u/${username}`, username);
  }
  if (user.is_suspended === true) {
    throw new UserNotFoundError(username, "suspended");
  }
  if (typeof user.created_utc !== "number") {
    throw new PersonaError(`Profile of u/${username} has no creation date`, username);
  }

  return {
    username: typeof user.name === "string" ? user.name : username,
    createdUtc: user.created_utc,
    linkKarma: typeof user.link_karma === "number" ? user.link_karma : 0,
    commentKarma: typeof user.comment_karma === "number" ? user.comment_karma : 0,
  };
}

export function submissionToItem(submission: SubmissionLike): TextItem {
  return {
    kind: "post",
    id: submission.id,
    url: `${SITE_URL}${submission.permalink}`,
    title: submission.title,
    body: submission.selftext ?? "",
    subreddit: submission.subreddit.display_name,
    timestamp: new Date(submission.created_utc * 1000).toISOString(),
    score: submission.score,
  };
}

export function commentToItem(comment: CommentLike): TextItem {
  return {
    kind: "comment",
    id: comment.id,
    url: `${SITE_URL}${comment.permalink}`,
    body: comment.body ?? "",
    subreddit: comment.subreddit.display_name,
    timestamp: new Date(comment.created_utc * 1000).toISOString(),
    score: comment.score,
  };
}

export interface PagedListing<T> extends Array<T> {
  isFinished: boolean;
  fetchMore(options: { amount: number; append?: boolean }): PromiseLike<T[]> | T[];
}

/** The part of a snoowrap client the source reads listings through. */
export interface ListingClient {
  getUser(name: string): {
    getSubmissions(options: { limit: number }): PromiseLike<PagedListing<SubmissionLike>>;
    getComments(options: { limit: number }): PromiseLike<PagedListing<CommentLike>>;
  };
}

export type ListingClientFactory = (
  credentials: RedditCredentials,
  accessToken: string
) => ListingClient;

export const createSnoowrapClient: ListingClientFactory = (credentials, accessToken) => {
  const reddit = new snoowrap({
    userAgent: credentials.userAgent,
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
    accessToken,
  });
  reddit.config({ continueAfterRatelimitError: false, warnings: false });
  return reddit;
};

/** Pages through a snoowrap listing until it holds `limit` entries or ends. */
export async function fillListing<T>(
  listing: PagedListing<T>,
  limit: number
): Promise<T[]> {
  let entries: T[] = listing;
  if (listing.length < limit && !listing.isFinished) {
    entries = await listing.fetchMore({ amount: limit - listing.length, append: true });
  }
  return entries.slice(0, limit);
}

/**
 * Reddit access through snoowrap for listings and axios for the OAuth token
 * and profile lookups. The token is renewed shortly before it expires.
 */
export class SnoowrapSource implements RedditSource {
  private token: AccessToken | null = null;
  private reddit: ListingClient | null = null;

  constructor(
    private readonly credentials: RedditCredentials,
    private readonly http: AxiosInstance = axios,
    private readonly createClient: ListingClientFactory = createSnoowrapClient
  ) {}

  private async client(): Promise<{ reddit: ListingClient; token: string }> {
    if (
      !this.token ||
      !this.reddit ||
      Date.now() > this.token.expiresAt - TOKEN_REFRESH_MARGIN_MS
    ) {
      this.token = await getAccessToken(this.credentials, this.http);
      this.reddit = this.createClient(this.credentials, this.token.value);
    }
    return { reddit: this.reddit, token: this.token.value };
  }

  async connect(): Promise<void> {
    await this.client();
    logger.info("✅ Connected to Reddit API");
  }

  async getUser(username: string): Promise<UserMetadata> {
    try {
      const { token } = await this.client();
      const response = await this.http.get<unknown>(
        `${OAUTH_BASE_URL}/user/${encodeURIComponent(username)}/about`,
        {
          headers: {
            Authorization: `Bearer ${token}`,
            "User-Agent": this.credentials.userAgent,
          },
        }
      );
      return parseAboutResponse(response.data, username);
    } catch (error) {
      throw toRedditError(error, username, "profile");
    }
  }

  async getSubmissions(username: string, limit: number): Promise<TextItem[]> {
    try {
      const { reddit } = await this.client();
      const listing = await reddit
        .getUser(username)
        .getSubmissions({ limit: Math.min(limit, 100) });
      const submissions = await fillListing(listing, limit);
      return submissions.map(submissionToItem);
    } catch (error) {
      throw toRedditError(error, username, "posts");
    }
  }

  async getComments(username: string, limit: number): Promise<TextItem[]> {
    try {
      const { reddit } = await this.client();
      const listing = await reddit
        .getUser(username)
        .getComments({ limit: Math.min(limit, 100) });
      const comments = await fillListing(listing, limit);
      return comments.map(commentToItem);
    } catch (error) {
      throw toRedditError(error, username, "comments");
    }
  }
}
