/**
 * @module tweet
 * The element type of the collections: an immutable tweet keyed by its text.
 */

export class Tweet {
    readonly user: string;
    /** Ordering and equality key. */
    readonly text: string;
    readonly retweets: number;

    constructor(user: string, text: string, retweets: number) {
        if (!Number.isInteger(retweets) || retweets < 0) {
            throw new RangeError(`Retweet count must be a non-negative integer, got ${retweets}`);
        }
        this.user = user;
        this.text = text;
        this.retweets = retweets;
        Object.freeze(this);
    }

    toString(): string {
        return `User: ${this.user}\nText: ${this.text} [${this.retweets}]`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

/**
 * Text order used by the set (UTF-16 code units, like `<` on strings).
 * @returns Negative if a < b, Positive if a > b, 0 if the texts are equal.
 */
export function compareText(a: Tweet, b: Tweet): number {
    if (a.text === b.text) return 0;
    return a.text < b.text ? -1 : 1;
}
