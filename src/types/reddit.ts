export type TextItemKind = "post" | "comment";

export interface TextItem {
  kind: TextItemKind;
  id: string;
  url: string;
  title?: string; // Posts only
  body: string;
  subreddit: string;
  timestamp: string; // ISO 8601
  score: number;
}

export interface UserMetadata {
  username: string;
  createdUtc: number; // Seconds since epoch
  linkKarma: number;
  commentKarma: number;
}

export interface CollectedUser {
  metadata: UserMetadata;
  posts: TextItem[];
  comments: TextItem[];
}

/**
 * The capability the collector needs from Reddit. Implementations translate
 * client failures into the error taxonomy in `errors.ts`.
 */
export interface RedditSource {
  getUser(username: string): Promise<UserMetadata>;
  getSubmissions(username: string, limit: number): Promise<TextItem[]>;
  getComments(username: string, limit: number): Promise<TextItem[]>;
}
