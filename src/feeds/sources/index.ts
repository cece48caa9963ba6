/**
 * Shortwire — Story Sources
 */

export { HackerNewsSource, HN_API_BASE, HN_ITEM_URL, type HNComment } from './hacker-news';
export { RedditSource, redditFeedUrl } from './reddit';
export { TechCrunchSource, TECHCRUNCH_FEED_URL } from './techcrunch';
export {
  FourChanSource,
  FOURCHAN_CATALOG_URL,
  fourchanThreadApiUrl,
  fourchanThreadUrl,
  threadTitle,
} from './fourchan';
export { XSearchSource, nitterSearchUrl } from './x-search';
