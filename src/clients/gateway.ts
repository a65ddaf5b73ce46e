import { HttpSession, type QueryParams, type TransportOptions } from './http.js';
import { runAll } from '../utils/concurrency.js';
import {
  expectRecord,
  expectRecordMap,
  expectStringArray,
  optionalNumber,
  optionalString,
} from '../utils/guards.js';
import { ResponseShapeError } from '../errors.js';
import type {
  CommentSort,
  GatewayCommentsResponse,
  GatewayListingResponse,
  JsonObject,
  MoreCommentsStub,
  PostSort,
  PostWithComments,
  SubredditPage,
  TopTimeFilter,
} from '../types/index.js';

export const GATEWAY_BASE_URL = 'https://gateway.reddit.com/desktopapi/v1';

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: '*/*',
  'Accept-Encoding': 'gzip',
  'Accept-Language': 'en-US,en;q=0.5',
  DNT: '1',
  Origin: 'https://www.reddit.com',
  Referer: 'https://www.reddit.com/',
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; rv:78.0) Gecko/20100101 Firefox/78.0',
};

// rtj (rich text json) is not requested.
const DEFAULT_PARAMS: QueryParams = {
  redditWebClient: 'web2x',
  app: 'web2x-client-production',
  allow_over18: 1,
};

const POST_SORTS = new Set<string>(['hot', 'new', 'top', 'rising'] satisfies PostSort[]);
const TOP_TIME_FILTERS = new Set<string>(['hour', 'day', 'week', 'month', 'year', 'all'] satisfies TopTimeFilter[]);
const COMMENT_SORTS = new Set<string>(['top', 'new', 'controversial', 'old', 'qa'] satisfies CommentSort[]);

const DEFAULT_POST_SORT: PostSort = 'hot';
const DEFAULT_TOP_TIME: TopTimeFilter = 'day';
const AD_POST_PREFIX = 't3_z=';
const UNSET_SESSION = '0';
const DEFAULT_GATEWAY_RATE_LIMIT_BACKOFF_MS = 30_000;

export interface ListingOptions {
  /** Unknown values fall back to Reddit's own default ordering. */
  sort?: PostSort | string | undefined;
  /** Only read with `sort: 'top'`. */
  t?: TopTimeFilter | string | undefined;
  after?: string | null | undefined;
  dist?: number | null | undefined;
}

export interface PostCommentsOptions {
  sort?: CommentSort | string | null | undefined;
  allComments?: boolean;
  maxAtOnce?: number;
  maxPerSecond?: number;
}

export type GatewayClientOptions = TransportOptions;

/**
 * Client for Reddit's web gateway (the JSON API behind the desktop site).
 * Needs no credentials; the gateway hands out an anonymous loid/session pair
 * on the first successful response and expects it back on later calls.
 */
export class GatewayClient {
  private readonly http: HttpSession;
  private loid = UNSET_SESSION;
  private session = UNSET_SESSION;

  constructor(options: GatewayClientOptions = {}) {
    const rateLimitBackoffMs = options.rateLimitBackoffMs ?? DEFAULT_GATEWAY_RATE_LIMIT_BACKOFF_MS;
    this.http = new HttpSession({
      ...options,
      baseUrl: GATEWAY_BASE_URL,
      headers: DEFAULT_HEADERS,
      params: DEFAULT_PARAMS,
      rateLimitDelayMs: (headers, attempt) => {
        const retryAfter = Number.parseFloat(headers.get('x-retry-after') ?? '');
        return Number.isFinite(retryAfter) ? retryAfter * 1000 : rateLimitBackoffMs * attempt;
      },
    });
  }

  get sessionHeaders(): { loid: string; session: string } {
    return { loid: this.loid, session: this.session };
  }

  async close(): Promise<void> {
    await this.http.close();
  }

  async rawGetMoreComments(submissionId: string, token: string): Promise<unknown> {
    return this.send('POST', `/morecomments/${encodeURIComponent(submissionId)}`, {
      params: { emotes_as_images: 'true' },
      json: { token },
    });
  }

  async rawGetPostComments(submissionId: string, sort?: CommentSort | string | null): Promise<unknown> {
    const params: QueryParams = {
      emotes_as_images: 'true',
      hasSortParam: 'false',
      include_categories: 'true',
      onOtherDiscussions: 'false',
    };
    if (sort && COMMENT_SORTS.has(sort)) {
      params.hasSortParam = 'true';
      params.sort = sort;
    }

    return this.send('GET', `/postcomments/${encodeURIComponent(submissionId)}`, { params });
  }

  async rawGetPosts(subredditName: string, options: ListingOptions = {}): Promise<unknown> {
    const sort = options.sort ?? DEFAULT_POST_SORT;
    const params: QueryParams = { layout: 'classic' };
    if (POST_SORTS.has(sort)) {
      params.sort = sort;
      if (sort === 'top') {
        const t = options.t ?? DEFAULT_TOP_TIME;
        params.t = TOP_TIME_FILTERS.has(t) ? t : DEFAULT_TOP_TIME;
      }
    }
    if (options.after && options.dist) {
      params.after = options.after;
      params.dist = options.dist;
    }

    return this.send('GET', `/subreddits/${encodeURIComponent(subredditName)}`, { params });
  }

  /** One listing page, ads removed, with the cursor for the next page. */
  async getPosts(subredditName: string, options: ListingOptions = {}): Promise<SubredditPage> {
    const listing = parseListing(await this.rawGetPosts(subredditName, options));

    const subreddit: JsonObject = {
      ...Object.values(listing.subreddits)[0],
      ...Object.values(listing.subredditAboutInfo)[0],
    };
    const posts: JsonObject[] = [];
    for (const id of listing.postIds) {
      if (id.startsWith(AD_POST_PREFIX)) {
        continue;
      }
      const post = listing.posts[id];
      if (post) {
        posts.push(post);
      }
    }

    return {
      subreddit,
      posts,
      sort: listing.listingSort,
      token: listing.token,
      dist: listing.dist,
    };
  }

  async getPostComments(submissionId: string, options: PostCommentsOptions = {}): Promise<PostWithComments> {
    const first = parseComments(await this.rawGetPostComments(submissionId, options.sort), 'postcomments');
    const comments = Object.values(first.comments);

    if (options.allComments) {
      for await (const batch of this.expandMoreComments(submissionId, Object.values(first.moreComments), options)) {
        comments.push(...batch);
      }
    }

    return { post: first.posts[submissionId] ?? null, comments };
  }

  /**
   * Resolves more-comments stubs level by level. Each yielded batch holds the
   * comments of one level; stubs found in it make up the next level.
   */
  async *expandMoreComments(
    submissionId: string,
    stubs: MoreCommentsStub[],
    options: Pick<PostCommentsOptions, 'maxAtOnce' | 'maxPerSecond'> = {},
  ): AsyncGenerator<JsonObject[]> {
    let pending = stubs;
    while (pending.length > 0) {
      const responses = await runAll(
        pending.map((stub) => () => this.rawGetMoreComments(submissionId, stub.token)),
        { maxAtOnce: options.maxAtOnce ?? 8, maxPerSecond: options.maxPerSecond ?? 4 },
      );
      const parsed = responses.map((response) => parseComments(response, 'morecomments'));

      yield parsed.flatMap((response) => Object.values(response.comments));
      pending = parsed.flatMap((response) => Object.values(response.moreComments));
    }
  }

  private async send(method: string, path: string, options: { params: QueryParams; json?: unknown }) {
    const result = await this.http.request(method, path, {
      ...options,
      headers: {
        'x-reddit-loid': this.loid,
        'x-reddit-session': this.session,
      },
    });

    if (this.loid === UNSET_SESSION) {
      this.loid = result.headers.get('x-reddit-loid') ?? '';
      this.session = result.headers.get('x-reddit-session') ?? '';
    }

    return result.body;
  }
}

export function parseListing(raw: unknown): GatewayListingResponse {
  const body = expectRecord(raw, 'listing');
  return {
    posts: expectRecordMap(body.posts, 'listing.posts'),
    postIds: body.postIds === undefined ? [] : expectStringArray(body.postIds, 'listing.postIds'),
    subreddits: expectRecordMap(body.subreddits, 'listing.subreddits'),
    subredditAboutInfo: expectRecordMap(body.subredditAboutInfo, 'listing.subredditAboutInfo'),
    listingSort: optionalString(body.listingSort),
    token: optionalString(body.token),
    dist: optionalNumber(body.dist),
  };
}

export function parseComments(raw: unknown, label: string): GatewayCommentsResponse {
  const body = expectRecord(raw, label);
  const moreComments: Record<string, MoreCommentsStub> = {};
  for (const [id, stub] of Object.entries(expectRecordMap(body.moreComments, `${label}.moreComments`))) {
    const token = stub.token;
    if (typeof token !== 'string') {
      throw new ResponseShapeError(`${label}.moreComments.${id}.token must be a string`);
    }
    moreComments[id] = { ...stub, token };
  }

  return {
    posts: expectRecordMap(body.posts, `${label}.posts`),
    comments: expectRecordMap(body.comments, `${label}.comments`),
    moreComments,
  };
}
