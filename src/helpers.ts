/**
 * One-call helpers. Each opens its own client, walks the pages it needs and
 * closes the client again, also when the caller stops iterating early.
 */
import { GatewayClient, parseComments, type GatewayClientOptions } from './clients/gateway.js';
import { PushShiftClient, PUSHSHIFT_PAGE_SIZE, type PushShiftClientOptions } from './clients/pushshift.js';
import { getTimestamp } from './utils/time.js';
import { sleep } from './utils/sleep.js';
import type {
  ArchivedSubmission,
  CommentSort,
  JsonObject,
  PostSort,
  PostWithComments,
  SubredditPage,
  TopTimeFilter,
} from './types/index.js';

const DEFAULT_PAGE_LIMIT = 4;
const DEFAULT_REQ_DELAY_MS = 500;
const MIN_CURSOR_DECREMENT = 1;

export interface PostCommentsHelperOptions {
  allComments?: boolean;
  sort?: CommentSort | string | null | undefined;
  clientOptions?: GatewayClientOptions;
}

export interface SubredditWalkOptions {
  sort?: PostSort | string | undefined;
  t?: TopTimeFilter | string | undefined;
  /** Pages to fetch at most; `null` walks until the listing runs out. */
  pageLimit?: number | null;
  reqDelayMs?: number;
  clientOptions?: GatewayClientOptions;
}

export interface CommentsWalkOptions {
  sort?: CommentSort | string | null | undefined;
  maxAtOnce?: number;
  maxPerSecond?: number;
  clientOptions?: GatewayClientOptions;
}

export interface PushshiftWalkOptions {
  /** Newest bound; pages go backwards in time from here. Omit to start at the latest post. */
  startDesc?: Date | undefined;
  /** Oldest bound. Omit to walk the whole archive. */
  endTill?: Date | undefined;
  reqDelayMs?: number;
  clientOptions?: PushShiftClientOptions;
}

export async function getPostComments(
  submissionId: string,
  options: PostCommentsHelperOptions = {},
): Promise<PostWithComments> {
  const client = new GatewayClient(options.clientOptions);
  try {
    return await client.getPostComments(submissionId, {
      sort: options.sort,
      allComments: options.allComments ?? false,
    });
  } finally {
    await client.close();
  }
}

export async function* getPostsWithSubredditInfo(
  subredditName: string,
  options: SubredditWalkOptions = {},
): AsyncGenerator<SubredditPage> {
  const client = new GatewayClient(options.clientOptions);
  let pageLimit = options.pageLimit === undefined ? DEFAULT_PAGE_LIMIT : options.pageLimit;
  const reqDelayMs = options.reqDelayMs ?? DEFAULT_REQ_DELAY_MS;
  let after: string | null = null;
  let dist: number | null = null;

  try {
    while (true) {
      const page = await client.getPosts(subredditName, { sort: options.sort, t: options.t, after, dist });
      yield page;

      if (!page.token || !page.dist) {
        break;
      }
      after = page.token;
      dist = page.dist;

      if (pageLimit !== null) {
        pageLimit -= 1;
        if (pageLimit < 1) {
          break;
        }
      }

      await sleep(reqDelayMs);
    }
  } finally {
    await client.close();
  }
}

export async function* getPosts(
  subredditName: string,
  options: SubredditWalkOptions = {},
): AsyncGenerator<JsonObject[]> {
  for await (const page of getPostsWithSubredditInfo(subredditName, options)) {
    yield page.posts;
  }
}

export async function* getComments(
  submissionId: string,
  options: CommentsWalkOptions = {},
): AsyncGenerator<JsonObject[]> {
  const client = new GatewayClient(options.clientOptions);
  try {
    const first = parseComments(await client.rawGetPostComments(submissionId, options.sort), 'postcomments');
    yield Object.values(first.comments);

    yield* client.expandMoreComments(submissionId, Object.values(first.moreComments), {
      maxAtOnce: options.maxAtOnce ?? 8,
      maxPerSecond: options.maxPerSecond ?? 4,
    });
  } finally {
    await client.close();
  }
}

export async function* getPushshiftPosts(
  subredditName: string,
  options: PushshiftWalkOptions = {},
): AsyncGenerator<ArchivedSubmission[]> {
  const client = new PushShiftClient(options.clientOptions);
  const reqDelayMs = options.reqDelayMs ?? DEFAULT_REQ_DELAY_MS;
  let before = options.startDesc ? getTimestamp(options.startDesc) : undefined;
  const after = options.endTill ? getTimestamp(options.endTill) : undefined;

  try {
    while (true) {
      const data = await client.getPosts(subredditName, { before, after });
      yield data;

      const last = data[data.length - 1];
      if (data.length < PUSHSHIFT_PAGE_SIZE || !last) {
        break;
      }

      if (before !== undefined && last.created_utc >= before) {
        before -= MIN_CURSOR_DECREMENT;
      } else {
        before = last.created_utc;
      }

      await sleep(reqDelayMs);
    }
  } finally {
    await client.close();
  }
}
