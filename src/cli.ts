/**
 * @module cli
 * Prints the trending tweets of the given sources.
 */

import { UsageError } from './errors';
import { USAGE, parseCliArgs } from './config';
import type { CliConfig } from './config';
import { readTweetSets } from './reader';
import { Trending } from './trending';

/** @returns The process exit code. */
export async function main(argv: readonly string[]): Promise<number> {
    let config: CliConfig;
    try {
        config = parseCliArgs(argv);
    } catch (err) {
        if (!(err instanceof UsageError)) throw err;
        console.error(`error: ${err.message}`);
        console.error(USAGE);
        return 2;
    }

    if (config.help) {
        console.log(USAGE);
        return 0;
    }

    const info = (message: string) => {
        if (config.verbose) console.error(`[INFO] ${message}`);
    };

    try {
        const start = performance.now();
        const sets = await readTweetSets(config.files);
        sets.forEach((set, i) => info(`${config.files[i]}: ${set.size} tweets`));

        const trending = new Trending(sets, config.groups);
        for (const name of trending.groupNames) {
            info(`group ${name}: ${trending.matching(name).size} matching tweets`);
        }

        const ranked = config.top === undefined ? trending.trending : trending.trending.take(config.top);
        ranked.foreach((tweet) => console.log(tweet.toString()));
        info(`ranked ${ranked.length} tweets in ${(performance.now() - start).toFixed(2)}ms`);
        return 0;
    } catch (err) {
        console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
        return 1;
    }
}
