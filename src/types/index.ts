export type JsonObject = Record<string, unknown>;

export type Logger = (message: string) => void;

export type PostSort = 'hot' | 'new' | 'top' | 'rising';

export type TopTimeFilter = 'hour' | 'day' | 'week' | 'month' | 'year' | 'all';

export type CommentSort = 'top' | 'new' | 'controversial' | 'old' | 'qa';

export type ArchiveSort = 'asc' | 'desc';

/**
 * Placeholder Reddit leaves in a comment tree where replies were cut off.
 * The token is only valid for the submission it came from.
 */
export interface MoreCommentsStub extends JsonObject {
  token: string;
}

export interface GatewayListingResponse {
  posts: Record<string, JsonObject>;
  postIds: string[];
  subreddits: Record<string, JsonObject>;
  subredditAboutInfo: Record<string, JsonObject>;
  listingSort: string | null;
  token: string | null;
  dist: number | null;
}

export interface GatewayCommentsResponse {
  posts: Record<string, JsonObject>;
  comments: Record<string, JsonObject>;
  moreComments: Record<string, MoreCommentsStub>;
}

export interface SubredditPage {
  subreddit: JsonObject;
  posts: JsonObject[];
  sort: string | null;
  token: string | null;
  dist: number | null;
}

export interface PostWithComments {
  post: JsonObject | null;
  comments: JsonObject[];
}

export interface ArchivedSubmission extends JsonObject {
  id: string;
  created_utc: number;
}
