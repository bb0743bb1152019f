import { Collector } from "./collector";
import {
  DEFAULT_MAX_COMMENTS,
  DEFAULT_MAX_POSTS,
  DEFAULT_OUTPUT_DIR,
  loadConfig,
  redactConfig,
  type AppConfig,
} from "./config";
import {
  ConfigError,
  InvalidTargetError,
  UsageError,
  UserNotFoundError,
  describeError,
} from "./errors";
import { configureLogger, logger } from "./logger";
import { buildPersona, type PersonaOptions } from "./persona";
import { parseBatchList } from "./preprocessing";
import { SnoowrapSource } from "./reddit";
import { formatReport } from "./report";
import { readBatchFile, savePersona } from "./storage";
import type { RedditSource } from "./types/reddit";

export const EXIT_OK = 0;
export const EXIT_SETUP_FAILURE = 1;
export const EXIT_ABORTED = 2;

const MAX_LISTING_SIZE = 1000;

export interface CliOptions {
  target: string;
  batch: boolean;
  maxPosts: number;
  maxComments: number;
  outputDir: string;
  json: boolean;
  logFile: string | null;
  verbose: boolean;
}

export interface CliDependencies {
  env?: Record<string, string | undefined>;
  createSource?: (config: AppConfig) => Promise<RedditSource>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  persona?: Omit<PersonaOptions, "now">;
}

export interface BatchSummary {
  succeeded: string[];
  failed: Array<{ target: string; error: string }>;
}

interface RunContext {
  collector: Collector;
  options: CliOptions;
  deps: CliDependencies;
}

const USAGE = `Usage: reddit-persona <username|profile_url|batch_file> [options]

Options:
  --batch              Treat the argument as a file with one username or URL per line
  --max-posts N        Maximum number of posts to analyze (default: ${DEFAULT_MAX_POSTS})
  --max-comments N     Maximum number of comments to analyze (default: ${DEFAULT_MAX_COMMENTS})
  --output-dir DIR     Directory for persona files (default: ${DEFAULT_OUTPUT_DIR})
  --json               Also write the persona as JSON
  --log-file PATH      Copy log output to a file
  --verbose            Enable debug logging

Environment: REDDIT_CLIENT_ID, REDDIT_CLIENT_SECRET, REDDIT_USER_AGENT
(optional: REDDIT_USERNAME, REDDIT_PASSWORD)`;

function parseCount(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || !Number.isInteger(value) || value < 0 || value > MAX_LISTING_SIZE) {
    throw new UsageError(`${flag} expects an integer between 0 and ${MAX_LISTING_SIZE}`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    target: "",
    batch: false,
    maxPosts: DEFAULT_MAX_POSTS,
    maxComments: DEFAULT_MAX_COMMENTS,
    outputDir: DEFAULT_OUTPUT_DIR,
    json: false,
    logFile: null,
    verbose: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const takeValue = (): string | undefined =>
      eq === -1 ? argv[++i] : arg.slice(eq + 1);

    switch (flag) {
      case "--batch":
        options.batch = true;
        break;
      case "--json":
        options.json = true;
        break;
      case "--verbose":
        options.verbose = true;
        break;
      case "--max-posts":
        options.maxPosts = parseCount(flag, takeValue());
        break;
      case "--max-comments":
        options.maxComments = parseCount(flag, takeValue());
        break;
      case "--output-dir": {
        const dir = takeValue();
        if (!dir) throw new UsageError("--output-dir expects a directory");
        options.outputDir = dir;
        break;
      }
      case "--log-file": {
        const file = takeValue();
        if (!file) throw new UsageError("--log-file expects a file path");
        options.logFile = file;
        break;
      }
      default:
        if (arg.startsWith("--")) throw new UsageError(`Unknown option: ${arg}`);
        positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new UsageError(
      positional.length === 0
        ? "Missing username, profile URL or batch file"
        : `Expected one target, got ${positional.length}`
    );
  }
  options.target = positional[0];
  return options;
}

async function defaultCreateSource(config: AppConfig): Promise<RedditSource> {
  const source = new SnoowrapSource(config.reddit);
  await source.connect();
  return source;
}

async function processUser(target: string, ctx: RunContext): Promise<string[]> {
  const now = ctx.deps.now?.() ?? new Date();
  const collected = await ctx.collector.collect(target);

  logger.info(`🧠 Generating persona for u/${collected.metadata.username}`);
  const persona = buildPersona(collected, { ...ctx.deps.persona, now });
  const report = formatReport(persona, {
    generatedAt: now,
    categories: ctx.deps.persona?.rules?.categories,
  });

  return savePersona(ctx.options.outputDir, persona, report, {
    json: ctx.options.json,
  });
}

/** Processes targets in order; one failure never stops the rest. */
export async function processBatch(
  targets: readonly string[],
  ctx: RunContext,
  pause: (ms: number) => Promise<void>,
  delayMs: number
): Promise<BatchSummary> {
  const summary: BatchSummary = { succeeded: [], failed: [] };
  logger.info(`🚀 Processing ${targets.length} users from batch file`);

  for (const [index, target] of targets.entries()) {
    if (index > 0) await pause(delayMs);
    logger.info(`\n👤 Processing user ${index + 1}/${targets.length}: ${target}`);

    try {
      await processUser(target, ctx);
      summary.succeeded.push(target);
    } catch (error) {
      logger.error(`❌ Error processing ${target}: ${describeError(error)}`);
      logger.info("⚠️ Continuing with next user...");
      summary.failed.push({ target, error: describeError(error) });
    }
  }

  logger.info(
    `\n✅ Done! ${summary.succeeded.length}/${targets.length} personas generated`
  );
  for (const failure of summary.failed) {
    logger.warn(`   ⚠️ ${failure.target}: ${failure.error}`);
  }
  return summary;
}

export async function main(
  argv: readonly string[],
  deps: CliDependencies = {}
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    logger.error(`❌ ${error.message}\n`);
    logger.error(USAGE);
    return EXIT_SETUP_FAILURE;
  }

  configureLogger({ verbose: options.verbose, logFile: options.logFile });

  let config: AppConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    logger.error(`❌ ${error.message}`);
    return EXIT_SETUP_FAILURE;
  }
  logger.debug("⚙️ Config:", redactConfig(config));

  let source: RedditSource;
  try {
    source = await (deps.createSource ?? defaultCreateSource)(config);
  } catch (error) {
    logger.error(`❌ Failed to initialize Reddit client: ${describeError(error)}`);
    return EXIT_SETUP_FAILURE;
  }

  const pause =
    deps.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  const ctx: RunContext = {
    options,
    deps,
    collector: new Collector(source, {
      maxPosts: options.maxPosts,
      maxComments: options.maxComments,
      requestDelayMs: config.requestDelayMs,
      maxRateLimitRetries: config.maxRateLimitRetries,
      retryBaseDelayMs: config.retryBaseDelayMs,
      sleep: pause,
    }),
  };

  logger.info(
    `📊 Settings: max posts ${options.maxPosts}, max comments ${options.maxComments}, output ${options.outputDir}`
  );

  if (options.batch) {
    let contents: string;
    try {
      contents = await readBatchFile(options.target);
    } catch (error) {
      logger.error(`❌ Could not read batch file ${options.target}: ${describeError(error)}`);
      return EXIT_SETUP_FAILURE;
    }
    await processBatch(parseBatchList(contents), ctx, pause, config.requestDelayMs);
    return EXIT_OK;
  }

  try {
    await processUser(options.target, ctx);
    return EXIT_OK;
  } catch (error) {
    logger.error(`❌ Error processing ${options.target}: ${describeError(error)}`);
    if (error instanceof UserNotFoundError) return EXIT_OK;
    if (error instanceof InvalidTargetError) return EXIT_SETUP_FAILURE;
    return EXIT_ABORTED;
  }
}
