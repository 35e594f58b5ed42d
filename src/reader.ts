/**
 * @module reader
 * Loads tweets from JSON files: one array of `{ user, text, retweets }`
 * objects per news source.
 */

import { readFile } from 'node:fs/promises';
import Ajv from 'ajv';
import type { JSONSchemaType } from 'ajv';
import { TweetFormatError } from './errors';
import { Tweet } from './tweet';
import { TweetSet } from './tweet-set';

export interface TweetData {
    user: string;
    text: string;
    retweets: number;
}

const tweetDataSchema: JSONSchemaType<TweetData[]> = {
    type: 'array',
    items: {
        type: 'object',
        properties: {
            user: { type: 'string' },
            text: { type: 'string' },
            retweets: { type: 'integer', minimum: 0 },
        },
        required: ['user', 'text', 'retweets'],
    },
};

const ajv = new Ajv({ allErrors: true });
const validateTweetData = ajv.compile(tweetDataSchema);

/**
 * Parses and validates a JSON tweet array.
 * @param source - Name used in error messages (usually the file path).
 * @throws TweetFormatError on malformed JSON or a schema mismatch.
 */
export function parseTweets(json: string, source: string = '<input>'): Tweet[] {
    let data: unknown;
    try {
        data = JSON.parse(json);
    } catch (err) {
        throw new TweetFormatError(source, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
    }
    if (!validateTweetData(data)) {
        throw new TweetFormatError(source, ajv.errorsText(validateTweetData.errors));
    }
    return data.map((d) => new Tweet(d.user, d.text, d.retweets));
}

export async function readTweetFile(path: string): Promise<Tweet[]> {
    const json = await readFile(path, 'utf8');
    return parseTweets(json, path);
}

/** Inserts in input order: for repeated texts the first tweet is kept. */
export function toTweetSet(tweets: Iterable<Tweet>): TweetSet {
    return TweetSet.fromIterable(tweets);
}

/** One set per file, in the order of `paths`. */
export async function readTweetSets(paths: readonly string[]): Promise<TweetSet[]> {
    const lists = await Promise.all(paths.map((p) => readTweetFile(p)));
    return lists.map(toTweetSet);
}
