/**
 * @module index
 * Persistent tweet sets with keyword filtering and retweet ranking.
 */

export { Tweet, compareText } from './tweet';
export { TweetSet } from './tweet-set';
export { TweetList } from './tweet-list';
export { EmptyCollectionError, TweetFormatError, UsageError } from './errors';
export { parseTweets, readTweetFile, readTweetSets, toTweetSet } from './reader';
export type { TweetData } from './reader';
export {
    APPLE_KEYWORDS,
    DEFAULT_GROUPS,
    GOOGLE_KEYWORDS,
    Trending,
    mentionsAny,
    tweetsMatching,
} from './trending';
export type { KeywordGroup } from './trending';
export { USAGE, parseCliArgs } from './config';
export type { CliConfig } from './config';
export { main } from './cli';
