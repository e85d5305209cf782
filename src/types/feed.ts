// FeedEntry: one item read from a syndication feed, before it is stored as an Article
export interface FeedEntry {
  title: string;             // Item headline, empty string when the feed omits it
  link: string;              // Canonical article URL, the dedup key
  content: string;           // Item body (description/summary), converted to Markdown when it is HTML
  pub_date: string;          // ISO 8601 timestamp; ingestion time when the feed has no parseable date
}
