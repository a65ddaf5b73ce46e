export { GatewayClient, GATEWAY_BASE_URL } from './clients/gateway.js';
export type { GatewayClientOptions, ListingOptions, PostCommentsOptions } from './clients/gateway.js';
export { PushShiftClient, PUSHSHIFT_BASE_URL, PUSHSHIFT_PAGE_SIZE } from './clients/pushshift.js';
export type { ArchiveQuery, PushShiftClientOptions } from './clients/pushshift.js';
export type { TransportOptions } from './clients/http.js';
export { getPostComments, getPostsWithSubredditInfo, getPosts, getComments, getPushshiftPosts } from './helpers.js';
export type {
  CommentsWalkOptions,
  PostCommentsHelperOptions,
  PushshiftWalkOptions,
  SubredditWalkOptions,
} from './helpers.js';
export { RequestError, HttpStatusError, ResponseShapeError } from './errors.js';
export { FileCache } from './cache/fileCache.js';
export type { FileCacheOptions } from './cache/fileCache.js';
export type { CacheClient, CacheEntry, CacheWriteInput } from './cache/cache.js';
export { JsonlStreamWriter } from './output/jsonl.js';
export { runAll, RequestThrottle } from './utils/concurrency.js';
export type { RunAllOptions } from './utils/concurrency.js';
export { getTimestamp } from './utils/time.js';
export type * from './types/index.js';
