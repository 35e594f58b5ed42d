import { describe, expect, it } from 'vitest';
import { DEFAULT_GROUPS, UsageError, parseCliArgs } from '../src/index';

describe('parseCliArgs', () => {
    it('collects files and defaults', () => {
        const config = parseCliArgs(['a.json', 'b.json']);
        expect(config).toEqual({
            help: false,
            verbose: false,
            files: ['a.json', 'b.json'],
            top: undefined,
            groups: DEFAULT_GROUPS,
        });
    });

    it('reads options', () => {
        const config = parseCliArgs(['-v', 'a.json', '--top', '3', '--keywords', 'fruit = apple, pear ,']);
        expect(config.verbose).toBe(true);
        expect(config.top).toBe(3);
        expect(config.groups).toEqual([{ name: 'fruit', keywords: ['apple', 'pear'] }]);
    });

    it('allows --help without files', () => {
        expect(parseCliArgs(['--help']).help).toBe(true);
    });

    it('rejects bad input', () => {
        expect(() => parseCliArgs([])).toThrow(UsageError);
        expect(() => parseCliArgs([])).toThrow('at least one tweet file is required');
        expect(() => parseCliArgs(['a.json', '--top'])).toThrow('--top requires a value');
        expect(() => parseCliArgs(['a.json', '--top', '0'])).toThrow('--top expects a positive integer, got "0"');
        expect(() => parseCliArgs(['a.json', '--top', '2x'])).toThrow('--top expects a positive integer, got "2x"');
        expect(() => parseCliArgs(['a.json', '--keywords', 'nokeywords'])).toThrow(
            '--keywords expects <name>=<keyword,...>, got "nokeywords"',
        );
        expect(() => parseCliArgs(['a.json', '--keywords', 'x=a', '--keywords', 'x=b'])).toThrow('duplicate keyword group: x');
        expect(() => parseCliArgs(['a.json', '--fast'])).toThrow('unknown option: --fast');
    });
});
