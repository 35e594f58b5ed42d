/**
 * @module tweet-list
 * Persistent singly-linked list of tweets. Produced by
 * `TweetSet.descendingByRetweet()`; cells are shared, never copied.
 */

import { EmptyCollectionError } from './errors';
import { assertNever } from './exhaustive';
import type { Tweet } from './tweet';

type Cell =
    | { readonly kind: 'nil' }
    | { readonly kind: 'cons'; readonly head: Tweet; readonly tail: TweetList };

export class TweetList implements Iterable<Tweet> {
    readonly #cell: Cell;

    static readonly #NIL: TweetList = new TweetList({ kind: 'nil' });

    private constructor(cell: Cell) {
        this.#cell = cell;
    }

    static nil(): TweetList { return TweetList.#NIL; }

    static cons(head: Tweet, tail: TweetList): TweetList {
        return new TweetList(Object.freeze({ kind: 'cons', head, tail }));
    }

    /** Builds a list with the same order as `items`. O(N). */
    static fromArray(items: readonly Tweet[]): TweetList {
        let list = TweetList.nil();
        for (let i = items.length - 1; i >= 0; i--) {
            list = TweetList.cons(items[i], list);
        }
        return list;
    }

    isEmpty(): boolean { return this.#cell.kind === 'nil'; }

    head(): Tweet {
        const cell = this.#cell;
        switch (cell.kind) {
            case 'nil': throw new EmptyCollectionError('head of EmptyList');
            case 'cons': return cell.head;
            default: return assertNever(cell);
        }
    }

    tail(): TweetList {
        const cell = this.#cell;
        switch (cell.kind) {
            case 'nil': throw new EmptyCollectionError('tail of EmptyList');
            case 'cons': return cell.tail;
            default: return assertNever(cell);
        }
    }

    /** Number of items. O(N). */
    get length(): number {
        let n = 0;
        for (const _ of this) n++;
        return n;
    }

    /** Visits every item front to back. */
    foreach(f: (tweet: Tweet) => void): void {
        for (const tweet of this) f(tweet);
    }

    /**
     * The first `n` items; the list itself if it has no more than `n`.
     * @throws RangeError unless `n` is a non-negative integer.
     */
    take(n: number): TweetList {
        if (!Number.isInteger(n) || n < 0) {
            throw new RangeError(`take expects a non-negative integer, got ${n}`);
        }
        const prefix: Tweet[] = [];
        let cell = this.#cell;
        while (cell.kind === 'cons') {
            if (prefix.length === n) return TweetList.fromArray(prefix);
            prefix.push(cell.head);
            cell = cell.tail.#cell;
        }
        return this;
    }

    toArray(): Tweet[] { return [...this]; }

    *[Symbol.iterator](): Iterator<Tweet> {
        let cell = this.#cell;
        while (cell.kind === 'cons') {
            yield cell.head;
            cell = cell.tail.#cell;
        }
    }

    toString(): string { return `[${this.toArray().map((t) => `${t.user}: ${t.text} [${t.retweets}]`).join(', ')}]`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
