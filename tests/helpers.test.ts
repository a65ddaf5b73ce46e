import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MockAgent } from 'undici';
import { HttpSession } from '../src/clients/http.js';
import { HttpStatusError } from '../src/errors.js';
import {
  getComments,
  getPostComments,
  getPosts,
  getPostsWithSubredditInfo,
  getPushshiftPosts,
} from '../src/helpers.js';

const GATEWAY = 'https://gateway.reddit.com';
const PUSHSHIFT = 'https://api.pushshift.io';

function matcher(origin: string, pathname: string, check: (query: URLSearchParams) => boolean = () => true) {
  return (path: string) => {
    const url = new URL(path, origin);
    return url.pathname === pathname && check(url.searchParams);
  };
}

function listingPage(ids: string[], token: string | null, dist: number | null) {
  return {
    posts: Object.fromEntries(ids.map((id) => [id, { id }])),
    postIds: ids,
    subreddits: { t5_1: { name: 'typescript' } },
    subredditAboutInfo: { t5_1: { subscribers: 10 } },
    listingSort: 'HOT',
    token,
    dist,
  };
}

function submissions(count: number, newest: number) {
  return Array.from({ length: count }, (_, index) => ({ id: `p${index}`, created_utc: newest - index }));
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('helpers', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    agent.assertNoPendingInterceptors();
    await agent.close();
  });

  describe('getPostsWithSubredditInfo', () => {
    const listingPath = '/desktopapi/v1/subreddits/typescript';

    it('follows the cursor until the page limit is used up', async () => {
      const pool = agent.get(GATEWAY);
      pool
        .intercept({ path: matcher(GATEWAY, listingPath, (q) => !q.has('after')), method: 'GET' })
        .reply(200, listingPage(['t3_a', 't3_b'], 'tok-1', 25));
      pool
        .intercept({
          path: matcher(GATEWAY, listingPath, (q) => q.get('after') === 'tok-1' && q.get('dist') === '25'),
          method: 'GET',
        })
        .reply(200, listingPage(['t3_c'], 'tok-2', 50));

      const pages = await collect(
        getPostsWithSubredditInfo('typescript', { pageLimit: 2, reqDelayMs: 0, clientOptions: { dispatcher: agent } }),
      );

      expect(pages.map((page) => page.token)).toEqual(['tok-1', 'tok-2']);
      expect(pages[1]?.subreddit).toEqual({ name: 'typescript', subscribers: 10 });
    });

    it('stops when the listing returns no token', async () => {
      const pool = agent.get(GATEWAY);
      pool
        .intercept({ path: matcher(GATEWAY, listingPath, (q) => !q.has('after')), method: 'GET' })
        .reply(200, listingPage(['t3_a'], 'tok-1', 25));
      pool
        .intercept({ path: matcher(GATEWAY, listingPath, (q) => q.get('after') === 'tok-1'), method: 'GET' })
        .reply(200, listingPage(['t3_b'], null, null));

      const pages = await collect(
        getPostsWithSubredditInfo('typescript', { pageLimit: null, reqDelayMs: 0, clientOptions: { dispatcher: agent } }),
      );

      expect(pages).toHaveLength(2);
    });

    it('stops on a page that has a token but no dist', async () => {
      agent
        .get(GATEWAY)
        .intercept({ path: matcher(GATEWAY, listingPath), method: 'GET' })
        .reply(200, listingPage(['t3_a'], 'tok-1', null));

      const pages = await collect(
        getPostsWithSubredditInfo('typescript', { pageLimit: null, reqDelayMs: 0, clientOptions: { dispatcher: agent } }),
      );

      expect(pages.map((page) => page.token)).toEqual(['tok-1']);
    });

    it('closes the client when the caller breaks out early', async () => {
      const close = vi.spyOn(HttpSession.prototype, 'close');
      agent
        .get(GATEWAY)
        .intercept({ path: matcher(GATEWAY, listingPath), method: 'GET' })
        .reply(200, listingPage(['t3_a'], 'tok-1', 25));

      for await (const page of getPostsWithSubredditInfo('typescript', {
        pageLimit: null,
        reqDelayMs: 0,
        clientOptions: { dispatcher: agent },
      })) {
        expect(page.token).toBe('tok-1');
        break;
      }

      expect(close).toHaveBeenCalledTimes(1);
    });

    it('fetches a single page with a page limit of one', async () => {
      agent
        .get(GATEWAY)
        .intercept({ path: matcher(GATEWAY, listingPath), method: 'GET' })
        .reply(200, listingPage(['t3_a'], 'tok-1', 25));

      const pages = await collect(
        getPostsWithSubredditInfo('typescript', { pageLimit: 1, reqDelayMs: 0, clientOptions: { dispatcher: agent } }),
      );

      expect(pages).toHaveLength(1);
    });
  });

  describe('getPosts', () => {
    it('yields the posts of each page', async () => {
      agent
        .get(GATEWAY)
        .intercept({ path: matcher(GATEWAY, '/desktopapi/v1/subreddits/typescript', (q) => q.get('sort') === 'new'), method: 'GET' })
        .reply(200, listingPage(['t3_a', 't3_z=ad', 't3_b'], null, null));

      const batches = await collect(getPosts('typescript', { sort: 'new', clientOptions: { dispatcher: agent } }));

      expect(batches).toEqual([[{ id: 't3_a' }, { id: 't3_b' }]]);
    });
  });

  describe('comments', () => {
    const postPath = '/desktopapi/v1/postcomments/t3_abc';
    const morePath = '/desktopapi/v1/morecomments/t3_abc';

    function interceptThread() {
      const pool = agent.get(GATEWAY);
      pool.intercept({ path: matcher(GATEWAY, postPath), method: 'GET' }).reply(200, {
        posts: { t3_abc: { id: 't3_abc' } },
        comments: { t1_c1: { id: 't1_c1' } },
        moreComments: { t1_m1: { token: 'tok-a' } },
      });
      return pool;
    }

    it('getComments yields the top level, then one batch per expansion level', async () => {
      const pool = interceptThread();
      pool
        .intercept({ path: matcher(GATEWAY, morePath), method: 'POST', body: JSON.stringify({ token: 'tok-a' }) })
        .reply(200, { comments: { t1_c2: { id: 't1_c2' } }, moreComments: { t1_m2: { token: 'tok-b' } } });
      pool
        .intercept({ path: matcher(GATEWAY, morePath), method: 'POST', body: JSON.stringify({ token: 'tok-b' }) })
        .reply(200, { comments: { t1_c3: { id: 't1_c3' } }, moreComments: {} });

      const batches = await collect(
        getComments('t3_abc', { maxPerSecond: Infinity, clientOptions: { dispatcher: agent } }),
      );

      expect(batches).toEqual([[{ id: 't1_c1' }], [{ id: 't1_c2' }], [{ id: 't1_c3' }]]);
    });

    it('getComments closes the client when a request fails', async () => {
      const close = vi.spyOn(HttpSession.prototype, 'close');
      agent.get(GATEWAY).intercept({ path: matcher(GATEWAY, postPath), method: 'GET' }).reply(404, 'not found');

      await expect(collect(getComments('t3_abc', { clientOptions: { dispatcher: agent } }))).rejects.toBeInstanceOf(
        HttpStatusError,
      );

      expect(close).toHaveBeenCalledTimes(1);
    });

    it('getPostComments closes the client when a request fails', async () => {
      const close = vi.spyOn(HttpSession.prototype, 'close');
      agent.get(GATEWAY).intercept({ path: matcher(GATEWAY, postPath), method: 'GET' }).reply(403, 'forbidden');

      await expect(getPostComments('t3_abc', { clientOptions: { dispatcher: agent } })).rejects.toMatchObject({
        status: 403,
      });

      expect(close).toHaveBeenCalledTimes(1);
    });

    it('getPostComments leaves stubs alone unless asked for all comments', async () => {
      interceptThread();

      const result = await getPostComments('t3_abc', { clientOptions: { dispatcher: agent } });

      expect(result).toEqual({ post: { id: 't3_abc' }, comments: [{ id: 't1_c1' }] });
    });
  });

  describe('getPushshiftPosts', () => {
    const searchPath = '/reddit/search/submission';
    const startDesc = new Date('2022-03-01T00:00:00Z');
    const endTill = new Date('2022-02-26T00:00:00Z');

    it('moves the upper bound to the oldest post until a short page', async () => {
      const pool = agent.get(PUSHSHIFT);
      pool
        .intercept({
          path: matcher(PUSHSHIFT, searchPath, (q) => q.get('before') === '1646092800' && q.get('after') === '1645833600'),
          method: 'GET',
        })
        .reply(200, { data: submissions(100, 1646092799) });
      pool
        .intercept({
          path: matcher(PUSHSHIFT, searchPath, (q) => q.get('before') === '1646092700' && q.get('after') === '1645833600'),
          method: 'GET',
        })
        .reply(200, { data: submissions(3, 1646092650) });

      const pages = await collect(
        getPushshiftPosts('ethereum', { startDesc, endTill, reqDelayMs: 0, clientOptions: { dispatcher: agent } }),
      );

      expect(pages.map((page) => page.length)).toEqual([100, 3]);
    });

    it('steps the bound back a second when a full page does not move it', async () => {
      const pool = agent.get(PUSHSHIFT);
      pool
        .intercept({ path: matcher(PUSHSHIFT, searchPath, (q) => q.get('before') === '1000'), method: 'GET' })
        .reply(200, { data: Array.from({ length: 100 }, (_, index) => ({ id: `s${index}`, created_utc: 1000 })) });
      pool
        .intercept({ path: matcher(PUSHSHIFT, searchPath, (q) => q.get('before') === '999' && !q.has('after')), method: 'GET' })
        .reply(200, { data: [] });

      const pages = await collect(
        getPushshiftPosts('ethereum', {
          startDesc: new Date(1_000_000),
          reqDelayMs: 0,
          clientOptions: { dispatcher: agent },
        }),
      );

      expect(pages.map((page) => page.length)).toEqual([100, 0]);
    });
  });
});
