import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { USAGE, main } from '../src/index';

const tech = join(__dirname, 'fixtures', 'tech.json');
const gadgets = join(__dirname, 'fixtures', 'gadgets.json');

describe('main', () => {
    let log: MockInstance<typeof console.log>;
    let error: MockInstance<typeof console.error>;

    beforeEach(() => {
        log = vi.spyOn(console, 'log').mockImplementation(() => {});
        error = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('prints the top trending tweets', async () => {
        expect(await main([tech, gadgets, '--top', '2'])).toBe(0);
        expect(log.mock.calls).toEqual([
            ['User: gadgetblog\nText: iOS update fixes battery drain [300]'],
            ['User: techdesk\nText: iPhone sales climb again [300]'],
        ]);
        expect(error).not.toHaveBeenCalled();
    });

    it('prints every match without --top', async () => {
        expect(await main([tech, gadgets])).toBe(0);
        expect(log).toHaveBeenCalledTimes(5);
        expect(log.mock.calls[4]).toEqual(['User: gadgetblog\nText: iPad keyboard hands-on [45]']);
    });

    it('uses custom keyword groups', async () => {
        expect(await main([tech, '--keywords', 'show=podcast'])).toBe(0);
        expect(log.mock.calls).toEqual([['User: techdesk\nText: Weekly podcast is up [15]']]);
    });

    it('logs progress when verbose', async () => {
        expect(await main([tech, '-v', '--top', '1'])).toBe(0);
        expect(error.mock.calls[0]).toEqual([`[INFO] ${tech}: 4 tweets`]);
        expect(error.mock.calls[1]).toEqual(['[INFO] group google: 2 matching tweets']);
        expect(error.mock.calls[2]).toEqual(['[INFO] group apple: 1 matching tweets']);
        expect(String(error.mock.calls[3][0])).toMatch(/^\[INFO\] ranked 1 tweets in \d+\.\d{2}ms$/);
    });

    it('prints usage for --help', async () => {
        expect(await main(['--help'])).toBe(0);
        expect(log.mock.calls).toEqual([[USAGE]]);
    });

    it('exits with 2 on usage errors', async () => {
        expect(await main([])).toBe(2);
        expect(error.mock.calls).toEqual([['error: at least one tweet file is required'], [USAGE]]);
    });

    it('exits with 1 on unreadable input', async () => {
        const broken = join(__dirname, 'fixtures', 'missing-retweets.json');
        expect(await main([broken])).toBe(1);
        expect(error.mock.calls).toEqual([[`error: ${broken}: data/0 must have required property 'retweets'`]]);
        expect(log).not.toHaveBeenCalled();
    });
});
