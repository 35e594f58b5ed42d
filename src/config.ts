/**
 * @module config
 * Command-line configuration for the trending report.
 */

import { UsageError } from './errors';
import { DEFAULT_GROUPS } from './trending';
import type { KeywordGroup } from './trending';

export interface CliConfig {
    help: boolean;
    verbose: boolean;
    /** Tweet JSON files, one per source. */
    files: string[];
    /** Print only the first `top` tweets. */
    top?: number;
    groups: readonly KeywordGroup[];
}

export const USAGE = [
    'Usage: tweet-trends <file.json>... [options]',
    '',
    'Options:',
    '  --top <n>                    print only the first n tweets',
    '  --keywords <name>=<a,b,...>  keyword group (repeatable, replaces the google/apple defaults)',
    '  -v, --verbose                progress output on stderr',
    '  -h, --help                   show this help',
].join('\n');

/** @throws UsageError on unknown options or malformed values. */
export function parseCliArgs(argv: readonly string[]): CliConfig {
    const files: string[] = [];
    const groups: KeywordGroup[] = [];
    let help = false;
    let verbose = false;
    let top: number | undefined;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case '-h':
            case '--help':
                help = true;
                break;
            case '-v':
            case '--verbose':
                verbose = true;
                break;
            case '--top':
                top = parseTop(requireValue(argv, ++i, arg));
                break;
            case '--keywords': {
                const group = parseGroup(requireValue(argv, ++i, arg));
                if (groups.some((g) => g.name === group.name)) {
                    throw new UsageError(`duplicate keyword group: ${group.name}`);
                }
                groups.push(group);
                break;
            }
            default:
                if (arg.startsWith('-')) throw new UsageError(`unknown option: ${arg}`);
                files.push(arg);
        }
    }

    if (!help && files.length === 0) throw new UsageError('at least one tweet file is required');
    return { help, verbose, files, top, groups: groups.length > 0 ? groups : DEFAULT_GROUPS };
}

function requireValue(argv: readonly string[], index: number, option: string): string {
    const value = argv[index];
    if (value === undefined) throw new UsageError(`${option} requires a value`);
    return value;
}

function parseTop(value: string): number {
    const n = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(n) || n < 1) {
        throw new UsageError(`--top expects a positive integer, got "${value}"`);
    }
    return n;
}

function parseGroup(value: string): KeywordGroup {
    const eq = value.indexOf('=');
    const name = eq < 0 ? '' : value.slice(0, eq).trim();
    const keywords = eq < 0 ? [] : value.slice(eq + 1).split(',').map((k) => k.trim()).filter((k) => k.length > 0);
    if (name.length === 0 || keywords.length === 0) {
        throw new UsageError(`--keywords expects <name>=<keyword,...>, got "${value}"`);
    }
    return { name, keywords };
}
