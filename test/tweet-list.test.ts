import { describe, expect, it } from 'vitest';
import { EmptyCollectionError, Tweet, TweetList } from '../src/index';

const a = new Tweet('ann', 'first', 3);
const b = new Tweet('ben', 'second', 2);
const c = new Tweet('cat', 'third', 1);

describe('TweetList', () => {
    it('nil is empty and has no head or tail', () => {
        const nil = TweetList.nil();
        expect(nil.isEmpty()).toBe(true);
        expect(nil.length).toBe(0);
        expect(() => nil.head()).toThrow(EmptyCollectionError);
        expect(() => nil.head()).toThrow('head of EmptyList');
        expect(() => nil.tail()).toThrow('tail of EmptyList');
    });

    it('cons exposes head and tail', () => {
        const list = TweetList.cons(a, TweetList.cons(b, TweetList.nil()));
        expect(list.isEmpty()).toBe(false);
        expect(list.head()).toBe(a);
        expect(list.tail().head()).toBe(b);
        expect(list.tail().tail().isEmpty()).toBe(true);
    });

    it('fromArray keeps the order', () => {
        const list = TweetList.fromArray([a, b, c]);
        expect(list.toArray()).toEqual([a, b, c]);
        expect(list.length).toBe(3);
    });

    it('foreach walks front to back, and again', () => {
        const list = TweetList.fromArray([a, b, c]);
        const users: string[] = [];
        list.foreach((t) => users.push(t.user));
        list.foreach((t) => users.push(t.user));
        expect(users).toEqual(['ann', 'ben', 'cat', 'ann', 'ben', 'cat']);
    });

    it('take returns a prefix', () => {
        const list = TweetList.fromArray([a, b, c]);
        expect(list.take(2).toArray()).toEqual([a, b]);
        expect(list.take(10)).toBe(list);
        expect(list.take(0).isEmpty()).toBe(true);
        expect(list.take(3)).toBe(list);
        expect(TweetList.nil().take(2).isEmpty()).toBe(true);
    });

    it('take rejects counts that are not non-negative integers', () => {
        const list = TweetList.fromArray([a, b, c]);
        expect(() => list.take(Number.NaN)).toThrow(RangeError);
        expect(() => list.take(Number.NaN)).toThrow('take expects a non-negative integer, got NaN');
        expect(() => list.take(-1)).toThrow('take expects a non-negative integer, got -1');
        expect(() => list.take(1.5)).toThrow('take expects a non-negative integer, got 1.5');
    });

    it('shares the tail with the list it was consed onto', () => {
        const tail = TweetList.fromArray([b, c]);
        expect(TweetList.cons(a, tail).tail()).toBe(tail);
    });

    it('renders its items', () => {
        expect(TweetList.fromArray([a, b]).toString()).toBe('[ann: first [3], ben: second [2]]');
    });
});
