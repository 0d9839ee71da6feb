export type FeedItemKind = "submission" | "comment";

export type FeedItem = {
  kind: FeedItemKind;
  /** Native identifier assigned by the source. */
  id: string;
  /** Creation time in seconds since the epoch. */
  createdUtc: number;
  author: string;
  /** Present on submissions only. */
  title?: string;
  body: string;
  url: string;
};

/** Newest-first lazy sequences for one channel. */
export type FeedClient = {
  submissions: (channel: string) => AsyncIterable<FeedItem>;
  comments: (channel: string) => AsyncIterable<FeedItem>;
};
