/**
 * Error taxonomy shared by the collector, the engine and the CLI. Client
 * failures from snoowrap and axios are mapped onto these classes in
 * `reddit.ts` so nothing downstream depends on client error shapes.
 */
export class PersonaError extends Error {
  readonly username?: string;

  constructor(message: string, username?: string) {
    super(message);
    this.name = new.target.name;
    this.username = username;
  }
}

export class UserNotFoundError extends PersonaError {
  readonly reason: "missing" | "suspended" | "private";

  constructor(username: string, reason: "missing" | "suspended" | "private" = "missing") {
    super(
      reason === "missing"
        ? `User u/${username} does not exist`
        : `User u/${username} is ${reason}`,
      username
    );
    this.reason = reason;
  }
}

export class RateLimitedError extends PersonaError {
  readonly retryAfterMs?: number;

  constructor(message: string, username?: string, retryAfterMs?: number) {
    super(message, username);
    this.retryAfterMs = retryAfterMs;
  }
}

export class NetworkError extends PersonaError {
  constructor(message: string, username?: string, cause?: unknown) {
    super(message, username);
    this.cause = cause;
  }
}

export class InvalidTargetError extends PersonaError {}

export class ConfigError extends PersonaError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.missing = missing;
  }
}

export class RuleTableError extends PersonaError {}

export class UsageError extends PersonaError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
