/**
 * Raised when an operation has no answer on an empty collection
 * (`mostRetweeted` on an empty set, `head`/`tail` on the empty list).
 */
export class EmptyCollectionError extends Error {
    constructor(message: string = 'Empty collection') {
        super(message);
        this.name = 'EmptyCollectionError';
    }
}

/** Tweet input that is not valid JSON or does not match the tweet schema. */
export class TweetFormatError extends Error {
    readonly source: string;

    constructor(source: string, detail: string) {
        super(`${source}: ${detail}`);
        this.name = 'TweetFormatError';
        this.source = source;
    }
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}
