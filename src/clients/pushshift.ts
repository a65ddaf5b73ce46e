import { checksumFrom } from '../utils/hash.js';
import { expectArray, expectRecord } from '../utils/guards.js';
import { ResponseShapeError } from '../errors.js';
import { HttpSession, type TransportOptions } from './http.js';
import type { CacheClient } from '../cache/cache.js';
import type { ArchiveSort, ArchivedSubmission, Logger } from '../types/index.js';

export const PUSHSHIFT_BASE_URL = 'https://api.pushshift.io';
export const PUSHSHIFT_PAGE_SIZE = 100;

const SUBMISSION_SEARCH_PATH = '/reddit/search/submission';
const DEFAULT_SORT: ArchiveSort = 'desc';
const DEFAULT_NAMESPACE = 'pushshift-submissions';

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: 'application/json',
  'Accept-Encoding': 'gzip',
  'Accept-Language': 'en-US,en;q=0.5',
  Connection: 'keep-alive',
  DNT: '1',
  Origin: 'https://redditsearch.io/',
  Referer: 'https://redditsearch.io/',
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; rv:78.0) Gecko/20100101 Firefox/78.0',
};

export interface PushShiftClientOptions extends TransportOptions {
  baseUrl?: string;
  cache?: CacheClient | undefined;
  namespace?: string;
}

export interface ArchiveQuery {
  /** Epoch seconds, exclusive upper bound. */
  before?: number | null | undefined;
  /** Epoch seconds, exclusive lower bound. */
  after?: number | null | undefined;
  sort?: ArchiveSort;
  size?: number;
}

/**
 * Reads archived submissions by time window, which the gateway cannot do.
 * For the comments of those submissions, pass their ids to the gateway client.
 */
export class PushShiftClient {
  private readonly http: HttpSession;
  private readonly cache: CacheClient | undefined;
  private readonly namespace: string;
  private readonly logger: Logger | undefined;

  constructor(options: PushShiftClientOptions = {}) {
    this.http = new HttpSession({
      ...options,
      baseUrl: options.baseUrl ?? PUSHSHIFT_BASE_URL,
      headers: DEFAULT_HEADERS,
    });
    this.cache = options.cache;
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE;
    this.logger = options.logger;
  }

  async close(): Promise<void> {
    await this.http.close();
  }

  async getPosts(subredditName: string, query: ArchiveQuery = {}): Promise<ArchivedSubmission[]> {
    const params = {
      after: query.after ?? undefined,
      before: query.before ?? undefined,
      subreddit: subredditName,
      sort: query.sort ?? DEFAULT_SORT,
      size: query.size ?? PUSHSHIFT_PAGE_SIZE,
    };

    // Only a window with an upper bound is stable enough to replay from disk.
    const cacheable = this.cache !== undefined && params.before !== undefined;
    const url = this.http.buildUrl(SUBMISSION_SEARCH_PATH, params);
    const checksum = checksumFrom({ url, method: 'GET' });

    if (cacheable && this.cache) {
      const cached = await this.cache.read(this.namespace, checksum);
      if (cached) {
        this.logger?.(`GET ${url} served from cache`);
        return parseSubmissions(parseCachedBody(cached.body));
      }
    }

    const result = await this.http.request('GET', SUBMISSION_SEARCH_PATH, { params });
    const submissions = parseSubmissions(result.body);

    if (cacheable && this.cache) {
      await this.cache.write(this.namespace, {
        checksum,
        body: JSON.stringify(result.body),
        metadata: {
          url,
          status: result.status,
        },
      });
    }

    return submissions;
  }
}

export function parseSubmissions(raw: unknown): ArchivedSubmission[] {
  const body = expectRecord(raw, 'pushshift');
  return expectArray(body.data, 'pushshift.data').map((item, index) => {
    const submission = expectRecord(item, `pushshift.data[${index}]`);
    const { id, created_utc: createdUtc } = submission;
    if (typeof id !== 'string') {
      throw new ResponseShapeError(`pushshift.data[${index}].id must be a string`);
    }
    if (typeof createdUtc !== 'number') {
      throw new ResponseShapeError(`pushshift.data[${index}].created_utc must be a number`);
    }
    return { ...submission, id, created_utc: createdUtc };
  });
}

function parseCachedBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new ResponseShapeError(`Cached pushshift page is not JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}
