/**
 * @module tweet-set
 * @description
 * Persistent set of tweets stored as an unbalanced binary search tree
 * ordered by tweet text.
 *
 * * Contracts:
 * - Tweets with equal text are the same element. The first one inserted stays.
 * - Nodes are frozen. Every write returns a new tree that shares all
 *   untouched subtrees with the old one, so older sets stay valid.
 * - No balancing: a tree built from sorted input degenerates into a list.
 *   Nothing recurses on tree height; every walk loops with an explicit
 *   stack or path, so a chain of any length stays within the call stack.
 */

import { EmptyCollectionError } from './errors';
import { assertNever } from './exhaustive';
import { Tweet, compareText } from './tweet';
import { TweetList } from './tweet-list';

// ============================================================================
// 1. TREE REPRESENTATION
// ============================================================================

type Tree =
    | { readonly kind: 'empty' }
    | { readonly kind: 'node'; readonly elem: Tweet; readonly left: Tree; readonly right: Tree };

type NodeTree = Extract<Tree, { kind: 'node' }>;

const EMPTY: Tree = Object.freeze({ kind: 'empty' });

function node(elem: Tweet, left: Tree, right: Tree): Tree {
    return Object.freeze({ kind: 'node', elem, left, right });
}

// ============================================================================
// 2. TRANSIENT BUILDER
// ============================================================================

/** Mutable copy of a node, owned by one builder until `build()` freezes it. */
interface Draft {
    readonly kind: 'draft';
    readonly elem: Tweet;
    left: Slot;
    right: Slot;
}

type Slot = Tree | Draft;

function toDraft(n: NodeTree | Draft): Draft {
    switch (n.kind) {
        case 'draft':
            return n;
        case 'node':
            return { kind: 'draft', elem: n.elem, left: n.left, right: n.right };
        default:
            return assertNever(n);
    }
}

/**
 * Applies a batch of insertions to a tree. Each insertion lands exactly
 * where a persistent `insert` would put it, but a node on the way is copied
 * at most once per batch, and untouched subtrees stay shared with the seed.
 *
 * A tweet beyond the current minimum or maximum is attached to that extreme
 * node directly, so sorted input costs O(1) per tweet instead of a walk
 * down the whole chain.
 */
class TreeBuilder {
    #root: Slot;
    /** Leftmost / rightmost node, once known as a draft. */
    #min: Draft | null = null;
    #max: Draft | null = null;

    constructor(seed: Tree = EMPTY) {
        this.#root = seed;
    }

    add(tweet: Tweet): this {
        const max = this.#max;
        if (max !== null && compareText(tweet, max.elem) > 0) {
            max.right = this.#max = leaf(tweet);
            return this;
        }
        const min = this.#min;
        if (min !== null && compareText(tweet, min.elem) < 0) {
            min.left = this.#min = leaf(tweet);
            return this;
        }

        const path: (NodeTree | Draft)[] = [];
        const wentLeft: boolean[] = [];
        let curr = this.#root;
        while (curr.kind !== 'empty') {
            const cmp = compareText(tweet, curr.elem);
            if (cmp === 0) return this;
            path.push(curr);
            wentLeft.push(cmp < 0);
            curr = cmp < 0 ? curr.left : curr.right;
        }

        const added = leaf(tweet);
        if (path.length === 0) {
            this.#root = this.#min = this.#max = added;
            return this;
        }
        let parent = toDraft(path[0]);
        this.#root = parent;
        for (let i = 1; i <= path.length; i++) {
            const child = i < path.length ? toDraft(path[i]) : added;
            if (wentLeft[i - 1]) parent.left = child;
            else parent.right = child;
            if (i < path.length) parent = toDraft(child);
        }
        if (wentLeft.every((l) => l)) this.#min = added;
        if (wentLeft.every((l) => !l)) this.#max = added;
        return this;
    }

    addAll(tweets: Iterable<Tweet>): this {
        for (const tweet of tweets) this.add(tweet);
        return this;
    }

    /** Freezes the drafts bottom-up. Returns the seed itself if nothing was added. */
    build(): Tree {
        const root = this.#root;
        this.#min = this.#max = null;
        if (root.kind !== 'draft') return root;

        const stack: Draft[] = [root];
        for (;;) {
            const top = stack[stack.length - 1];
            const { left, right } = top;
            if (left.kind === 'draft') { stack.push(left); continue; }
            if (right.kind === 'draft') { stack.push(right); continue; }
            const frozen = node(top.elem, left, right);
            stack.pop();
            const parent = stack.at(-1);
            if (parent === undefined) {
                this.#root = frozen;
                return frozen;
            }
            if (parent.left === top) parent.left = frozen;
            else parent.right = frozen;
        }
    }
}

function leaf(tweet: Tweet): Draft {
    return { kind: 'draft', elem: tweet, left: EMPTY, right: EMPTY };
}

// ============================================================================
// 3. TREE ALGORITHMS (pure)
// ============================================================================

/**
 * Returns `tree` itself when a tweet with the same text is already present,
 * so the original record wins.
 */
function insert(tree: Tree, tweet: Tweet): Tree {
    return new TreeBuilder(tree).add(tweet).build();
}

/**
 * A matching node is replaced by the union of its children; the path above
 * it is copied bottom-up. Returns `tree` itself when the text is absent.
 */
function remove(tree: Tree, tweet: Tweet): Tree {
    const path: NodeTree[] = [];
    const wentLeft: boolean[] = [];
    let curr = tree;
    while (curr.kind === 'node') {
        const cmp = compareText(tweet, curr.elem);
        if (cmp === 0) break;
        path.push(curr);
        wentLeft.push(cmp < 0);
        curr = cmp < 0 ? curr.left : curr.right;
    }
    if (curr.kind === 'empty') return tree;

    let rebuilt = union(curr.left, curr.right);
    for (let i = path.length - 1; i >= 0; i--) {
        const above = path[i];
        rebuilt = wentLeft[i] ? node(above.elem, rebuilt, above.right) : node(above.elem, above.left, rebuilt);
    }
    return rebuilt;
}

/**
 * `Node(e, l, r) ∪ other = r ∪ (l ∪ (other + e))`, i.e. the tweets of `tree`
 * go into `other` in pre-order: node, left subtree, right subtree.
 * Because `e` goes into `other` first, a record already in `other`
 * survives a text collision.
 */
function union(tree: Tree, other: Tree): Tree {
    const builder = new TreeBuilder(other);
    const stack: Tree[] = [tree];
    for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
        if (top.kind === 'empty') continue;
        builder.add(top.elem);
        stack.push(top.right, top.left);
    }
    return builder.build();
}

/** Folds matches into `acc`: left subtree, then the node, then right subtree. */
function filterAcc(tree: Tree, p: (tweet: Tweet) => boolean, acc: Tree): Tree {
    const builder = new TreeBuilder(acc);
    for (const tweet of inOrder(tree)) {
        if (p(tweet)) builder.add(tweet);
    }
    return builder.build();
}

function contains(tree: Tree, tweet: Tweet): boolean {
    let curr = tree;
    while (curr.kind === 'node') {
        const cmp = compareText(tweet, curr.elem);
        if (cmp === 0) return true;
        curr = cmp < 0 ? curr.left : curr.right;
    }
    return false;
}

/** In-order traversal with an explicit stack. */
function* inOrder(tree: Tree): Generator<Tweet, void, undefined> {
    const stack: NodeTree[] = [];
    let curr = tree;
    for (;;) {
        while (curr.kind === 'node') {
            stack.push(curr);
            curr = curr.left;
        }
        const top = stack.pop();
        if (top === undefined) return;
        yield top.elem;
        curr = top.right;
    }
}

/** Maximum by retweets; on a tie the earlier tweet in text order is kept. */
function mostRetweeted(tree: Tree): Tweet {
    let best: Tweet | undefined;
    for (const tweet of inOrder(tree)) {
        if (best === undefined || tweet.retweets > best.retweets) best = tweet;
    }
    if (best === undefined) throw new EmptyCollectionError('mostRetweeted of EmptySet');
    return best;
}

// ============================================================================
// 4. PUBLIC FACADE
// ============================================================================

/**
 * Immutable set of tweets keyed by text.
 * Every "modifying" method returns a new set and leaves the receiver intact.
 */
export class TweetSet implements Iterable<Tweet> {
    readonly #root: Tree;

    static readonly #EMPTY: TweetSet = new TweetSet(EMPTY);

    private constructor(root: Tree) {
        this.#root = root;
    }

    static empty(): TweetSet { return TweetSet.#EMPTY; }

    static of(...tweets: Tweet[]): TweetSet { return TweetSet.fromIterable(tweets); }

    /** Inserts in iteration order, so the first tweet for a given text wins. */
    static fromIterable(tweets: Iterable<Tweet>): TweetSet {
        return TweetSet.#wrap(new TreeBuilder().addAll(tweets).build());
    }

    static #wrap(root: Tree): TweetSet {
        return root.kind === 'empty' ? TweetSet.#EMPTY : new TweetSet(root);
    }

    #derive(root: Tree): TweetSet {
        return root === this.#root ? this : TweetSet.#wrap(root);
    }

    isEmpty(): boolean { return this.#root.kind === 'empty'; }

    /** Number of tweets. Complexity: O(N). */
    get size(): number {
        let n = 0;
        for (const _ of inOrder(this.#root)) n++;
        return n;
    }

    /** Membership by text. Complexity: O(height). */
    contains(tweet: Tweet): boolean { return contains(this.#root, tweet); }

    /** Returns the receiver itself when a tweet with the same text is present. */
    insert(tweet: Tweet): TweetSet { return this.#derive(insert(this.#root, tweet)); }

    /** Alias of `insert`. */
    incl(tweet: Tweet): TweetSet { return this.insert(tweet); }

    /**
     * Removes the tweet with the same text, if any.
     * The removed node's subtrees are merged with `union`, which can reshape
     * the tree more than a successor-promoting delete would.
     */
    remove(tweet: Tweet): TweetSet { return this.#derive(remove(this.#root, tweet)); }

    filter(p: (tweet: Tweet) => boolean): TweetSet { return this.filterAcc(p, TweetSet.empty()); }

    /** Inserts every tweet of this set satisfying `p` into `acc`. */
    filterAcc(p: (tweet: Tweet) => boolean, acc: TweetSet): TweetSet {
        return acc.#derive(filterAcc(this.#root, p, acc.#root));
    }

    /**
     * Union (A ∪ B) by repeated insertion. Complexity: O(N * M) worst case.
     * On a text collision the tweet from `other` is kept.
     */
    union(other: TweetSet): TweetSet {
        return other.#derive(union(this.#root, other.#root));
    }

    /** @throws EmptyCollectionError on an empty set. */
    mostRetweeted(): Tweet { return mostRetweeted(this.#root); }

    /**
     * All tweets, highest retweet count first, built by repeatedly extracting
     * and removing `mostRetweeted()`. Equal counts come out in text order.
     * Complexity: O(N²).
     */
    descendingByRetweet(): TweetList {
        const ranked: Tweet[] = [];
        let rest = this.#root;
        while (rest.kind === 'node') {
            const max = mostRetweeted(rest);
            ranked.push(max);
            rest = remove(rest, max);
        }
        return TweetList.fromArray(ranked);
    }

    /** Visits every tweet once in text order. */
    foreach(f: (tweet: Tweet) => void): void {
        for (const tweet of inOrder(this.#root)) f(tweet);
    }

    /** Returns tweets sorted by text. */
    toArray(): Tweet[] { return [...inOrder(this.#root)]; }

    *[Symbol.iterator](): Iterator<Tweet> { yield* inOrder(this.#root); }

    toString(): string {
        if (this.isEmpty()) return '∅';
        return `{${this.toArray().map((t) => JSON.stringify(t.text)).join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
