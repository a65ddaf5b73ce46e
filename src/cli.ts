#!/usr/bin/env node
import { Command } from 'commander';
import { FileCache } from './cache/fileCache.js';
import { loadEnvironment, parseNonNegativeInteger, parsePositiveInteger, readEnvironment } from './config.js';
import { getComments, getPostsWithSubredditInfo, getPushshiftPosts } from './helpers.js';
import { JsonlStreamWriter } from './output/jsonl.js';
import { epochToIso, toUnixSeconds } from './utils/time.js';
import type { TransportOptions } from './clients/http.js';
import type { Logger } from './types/index.js';

loadEnvironment();

const program = new Command();
program
  .name('rgfetch')
  .description('Fetch Reddit posts and comments through the web gateway, and archived posts through PushShift.');

configureCommonOptions(program.command('posts <subreddit>').description('Walk the listing pages of a subreddit.'))
  .option('--sort <value>', 'hot, new, top or rising.', 'hot')
  .option('--time <value>', 'Time filter for --sort top: hour, day, week, month, year or all.', 'day')
  .option('--page-limit <number>', 'Pages to fetch, 0 for no limit.', '4')
  .option('--delay <ms>', 'Delay between page requests in ms.', '500')
  .option('--with-subreddit', 'Write one line per page with the subreddit info instead of one line per post.')
  .action(async (subreddit: string, rawOptions: PostsCommandOptions) => {
    await handlePosts(subreddit, rawOptions);
  });

configureCommonOptions(
  program.command('comments <submissionId>').description('Fetch the comments of a submission (id starts with t3_).'),
)
  .option('--sort <value>', 'top, new, controversial, old or qa. Default is best.')
  .option('--all', 'Expand every "more comments" stub.')
  .option('--max-at-once <number>', 'Concurrent requests while expanding.', '8')
  .option('--max-per-second <number>', 'Request starts per second while expanding.', '4')
  .action(async (submissionId: string, rawOptions: CommentsCommandOptions) => {
    await handleComments(submissionId, rawOptions);
  });

configureCommonOptions(
  program.command('pushshift <subreddit>').description('Walk archived submissions backwards in time.'),
)
  .option('--start <time>', 'Newest bound (ISO date or epoch seconds). Default is the latest post.')
  .option('--end <time>', 'Oldest bound (ISO date or epoch seconds). Default is the whole archive.')
  .option('--delay <ms>', 'Delay between page requests in ms.', '500')
  .option('--no-cache', 'Do not read or write the response cache.')
  .action(async (subreddit: string, rawOptions: PushshiftCommandOptions) => {
    await handlePushshift(subreddit, rawOptions);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});

interface RawCommonOptions {
  proxy?: string;
  timeout?: string;
  output?: string;
  quiet?: boolean;
}

interface PostsCommandOptions extends RawCommonOptions {
  sort: string;
  time: string;
  pageLimit: string;
  delay: string;
  withSubreddit?: boolean;
}

interface CommentsCommandOptions extends RawCommonOptions {
  sort?: string;
  all?: boolean;
  maxAtOnce: string;
  maxPerSecond: string;
}

interface PushshiftCommandOptions extends RawCommonOptions {
  start?: string;
  end?: string;
  delay: string;
  cache: boolean;
}

function configureCommonOptions(command: Command): Command {
  return command
    .option('--proxy <url>', 'HTTP(S) proxy URL (default $RGFETCH_PROXY or $HTTPS_PROXY).')
    .option('--timeout <ms>', 'Per-request timeout in ms (default $RGFETCH_TIMEOUT_MS or 30000).')
    .option('-o, --output <path>', 'Write JSON lines to this file instead of stdout.')
    .option('-q, --quiet', 'Do not log requests to stderr.');
}

async function handlePosts(subreddit: string, rawOptions: PostsCommandOptions) {
  const pageLimit = parseNonNegativeInteger(rawOptions.pageLimit, 4, 'page-limit');
  const reqDelayMs = parseNonNegativeInteger(rawOptions.delay, 500, 'delay');
  const clientOptions = buildTransportOptions(rawOptions, createLogger(rawOptions, 'gateway', subreddit));

  await withWriter(rawOptions, async (writer) => {
    for await (const page of getPostsWithSubredditInfo(subreddit, {
      sort: rawOptions.sort,
      t: rawOptions.time,
      pageLimit: pageLimit === 0 ? null : pageLimit,
      reqDelayMs,
      clientOptions,
    })) {
      if (rawOptions.withSubreddit) {
        await writer.write(page);
      } else {
        await writer.writeAll(page.posts);
      }
    }
  });
}

async function handleComments(submissionId: string, rawOptions: CommentsCommandOptions) {
  const maxAtOnce = parsePositiveInteger(rawOptions.maxAtOnce, 8, 'max-at-once');
  const maxPerSecond = parsePositiveInteger(rawOptions.maxPerSecond, 4, 'max-per-second');
  const clientOptions = buildTransportOptions(rawOptions, createLogger(rawOptions, 'gateway', submissionId));

  await withWriter(rawOptions, async (writer) => {
    let levels = 0;
    for await (const batch of getComments(submissionId, {
      sort: rawOptions.sort,
      maxAtOnce,
      maxPerSecond,
      clientOptions,
    })) {
      await writer.writeAll(batch);
      levels += 1;
      if (!rawOptions.all) {
        break;
      }
    }
    clientOptions.logger?.(`Read ${levels} comment level(s).`);
  });
}

async function handlePushshift(subreddit: string, rawOptions: PushshiftCommandOptions) {
  const reqDelayMs = parseNonNegativeInteger(rawOptions.delay, 500, 'delay');
  const startDesc = rawOptions.start ? new Date(toUnixSeconds(rawOptions.start) * 1000) : undefined;
  const endTill = rawOptions.end ? new Date(toUnixSeconds(rawOptions.end) * 1000) : undefined;
  if (startDesc && endTill && endTill >= startDesc) {
    throw new Error('--end must be older than --start.');
  }

  const logger = createLogger(rawOptions, 'pushshift', subreddit);
  logger?.(
    `Fetching archived posts from ${startDesc ? epochToIso(startDesc.getTime() / 1000) : 'now'} back to ${endTill ? epochToIso(endTill.getTime() / 1000) : 'the beginning'}...`,
  );
  const cache = rawOptions.cache ? new FileCache({ baseDir: readEnvironment().cacheDir }) : undefined;

  await withWriter(rawOptions, async (writer) => {
    for await (const page of getPushshiftPosts(subreddit, {
      startDesc,
      endTill,
      reqDelayMs,
      clientOptions: { ...buildTransportOptions(rawOptions, logger), cache },
    })) {
      await writer.writeAll(page);
    }
  });
}

function buildTransportOptions(raw: RawCommonOptions, logger: Logger | undefined): TransportOptions {
  const env = readEnvironment();
  return {
    proxy: raw.proxy?.trim() || env.proxy,
    timeoutMs: raw.timeout === undefined ? env.timeoutMs : parsePositiveInteger(raw.timeout, 30000, 'timeout'),
    maxRetries: env.maxRetries,
    logger,
  };
}

async function withWriter(raw: RawCommonOptions, run: (writer: JsonlStreamWriter) => Promise<void>) {
  const writer = raw.output ? await JsonlStreamWriter.create(raw.output) : JsonlStreamWriter.fromStream(process.stdout);
  try {
    await run(writer);
  } finally {
    await writer.close();
  }
  if (writer.path && !raw.quiet) {
    console.error(`Wrote ${writer.count} records to ${writer.path}`);
  }
}

function createLogger(raw: RawCommonOptions, scope: string, target?: string): Logger | undefined {
  if (raw.quiet) {
    return undefined;
  }
  return (message: string) => console.error(`[${scope}${target ? `:${target}` : ''}] ${message}`);
}
