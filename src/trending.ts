/**
 * @module trending
 * Keyword classification of tweets and the trending query built on it.
 */

import type { TweetList } from './tweet-list';
import { TweetSet } from './tweet-set';

export const GOOGLE_KEYWORDS: readonly string[] = ['android', 'Android', 'galaxy', 'Galaxy', 'nexus', 'Nexus'];
export const APPLE_KEYWORDS: readonly string[] = ['ios', 'iOS', 'iphone', 'iPhone', 'ipad', 'iPad'];

export interface KeywordGroup {
    readonly name: string;
    readonly keywords: readonly string[];
}

export const DEFAULT_GROUPS: readonly KeywordGroup[] = [
    { name: 'google', keywords: GOOGLE_KEYWORDS },
    { name: 'apple', keywords: APPLE_KEYWORDS },
];

/** Case-sensitive substring match against any keyword. */
export function mentionsAny(text: string, keywords: readonly string[]): boolean {
    return keywords.some((k) => text.includes(k));
}

/**
 * Union of the matching tweets of every set.
 * Folded from the right, so on a text collision the later set's tweet wins.
 */
export function tweetsMatching(sets: readonly TweetSet[], keywords: readonly string[]): TweetSet {
    return sets.reduceRight<TweetSet>(
        (acc, set) => set.filter((t) => mentionsAny(t.text, keywords)).union(acc),
        TweetSet.empty(),
    );
}

/**
 * Trending tweets across several sources.
 * Group matches and the ranked list are computed on first access and cached.
 */
export class Trending {
    readonly #sets: readonly TweetSet[];
    readonly #groups: ReadonlyMap<string, readonly string[]>;
    readonly #matches = new Map<string, TweetSet>();
    #trending: TweetList | null = null;

    constructor(sets: readonly TweetSet[], groups: readonly KeywordGroup[] = DEFAULT_GROUPS) {
        const byName = new Map<string, readonly string[]>();
        for (const group of groups) {
            if (byName.has(group.name)) throw new RangeError(`Duplicate keyword group: ${group.name}`);
            byName.set(group.name, group.keywords);
        }
        this.#sets = sets;
        this.#groups = byName;
    }

    get groupNames(): string[] { return [...this.#groups.keys()]; }

    /** Tweets mentioning any keyword of the named group. */
    matching(name: string): TweetSet {
        const cached = this.#matches.get(name);
        if (cached) return cached;
        const keywords = this.#groups.get(name);
        if (keywords === undefined) throw new RangeError(`Unknown keyword group: ${name}`);
        const matches = tweetsMatching(this.#sets, keywords);
        this.#matches.set(name, matches);
        return matches;
    }

    /** Tweets of all groups, highest retweet count first. */
    get trending(): TweetList {
        if (this.#trending === null) {
            const all = this.groupNames.reduce<TweetSet>((acc, name) => acc.union(this.matching(name)), TweetSet.empty());
            this.#trending = all.descendingByRetweet();
        }
        return this.#trending;
    }
}
