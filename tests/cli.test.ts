/**
 * Command-line front end
 */

import { run, VERSION } from '../src/cli.js';
import { PROGRAMS, stripAnsi } from './fixtures.js';

describe('CLI', () => {
    let logSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    const logged = () => logSpy.mock.calls.map(call => stripAnsi(String(call[0])));
    const errors = () => errorSpy.mock.calls.map(call => stripAnsi(String(call[0])));

    beforeEach(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('--version prints the version', () => {
        expect(run(['--version'])).toBe(0);
        expect(logged()).toEqual([VERSION]);
    });

    test('no command prints help and fails', () => {
        expect(run([])).toBe(1);
        expect(logged()[0]).toContain('Usage:');
    });

    test('validate reports the knowledge base size', () => {
        expect(run(['validate', PROGRAMS.weather])).toBe(0);
        expect(logged()).toEqual(['✓ 1 clauses, 4 rules, 6 literals']);
    });

    test('cases lists classifications', () => {
        expect(run(['cases', 'a. b :- c.'])).toBe(0);
        expect(logged()).toEqual([
            'a  contained',
            'b  entailed (no arguments)',
            'c  unsupported (no arguments)',
        ]);
    });

    test('cases --json', () => {
        expect(run(['cases', '--json', 'a.'])).toBe(0);
        expect(JSON.parse(logged()[0])).toEqual([{ literal: 'a', classification: 'contained', supported: true }]);
    });

    test('arguments lists each argument', () => {
        expect(run(['arguments', 'work_well', PROGRAMS.weather])).toBe(0);
        expect(logged()).toEqual([
            'Arguments for work_well: 1',
            '  ({happy :- stay_home. stay_home, sunny. work_well :- happy.}, work_well)',
        ]);
    });

    test('arguments respects --limit', () => {
        expect(run(['arguments', 'x', '--limit=2', PROGRAMS.duplicates])).toBe(0);
        const lines = logged();
        expect(lines[0]).toBe('Arguments for x: 2+');
        expect(lines).toHaveLength(4);
        expect(lines[3]).toBe('  ... stopped after 2 (use --limit=<n> for more)');
    });

    test('deduplication can come from the environment', () => {
        expect(run(['arguments', 'x', '--json', PROGRAMS.duplicates], { ARGUMENT_ENGINE_DEDUPLICATE: '1' })).toBe(0);
        const output = JSON.parse(logged()[0]);
        expect(output.claim).toBe('x');
        expect(output.truncated).toBe(false);
        expect(output.arguments).toHaveLength(3);
    });

    test('--verbose reports cycle cuts', () => {
        expect(run(['arguments', 'p', '--verbose', PROGRAMS.groundedCycle])).toBe(0);
        expect(errors()).toEqual(['cycle cut: p -> q -> p']);
        expect(logged()).toEqual(['Arguments for p: 1', '  ({p.}, p)']);
    });

    test('print renders the consolidated program', () => {
        expect(run(['print', 'b :- a. a. a.'])).toBe(0);
        expect(logged()).toEqual(['a.\nb :- a.']);
    });

    test('print --json', () => {
        expect(run(['print', '--json', 'a.'])).toBe(0);
        expect(JSON.parse(logged()[0])).toEqual({ clauses: [[{ atom: 'a', positive: true }]], rules: [] });
    });

    test('an unknown literal fails with NOT_FOUND', () => {
        expect(run(['arguments', 'nope', PROGRAMS.weather])).toBe(1);
        expect(errors()).toEqual(["Error [NOT_FOUND]: Literal 'nope' is not in the knowledge base"]);
    });

    test('an unreadable source reports position and suggestion', () => {
        expect(run(['cases', 'p :- .'])).toBe(1);
        expect(errors()).toEqual([
            "Error [NOT_FOUND]: 'p :- .' is neither an existing file nor a valid program",
            '  at line 1, column 6',
            "  Suggestion: Rule has no body - list at least one literal after ':-'",
        ]);
    });

    test('missing operands fail', () => {
        expect(run(['arguments'])).toBe(1);
        expect(run(['validate'])).toBe(1);
        expect(errors()).toEqual([
            'Error: literal argument required',
            'Error: source argument required (file path or program text)',
        ]);
    });

    test('invalid limits and commands fail', () => {
        expect(run(['arguments', 'a', '--limit=0', 'a.'])).toBe(1);
        expect(run(['explain', 'a.'])).toBe(1);
        expect(errors()).toEqual([
            "Error: Invalid limit '0'. Use a positive integer.",
            'Unknown command: explain',
        ]);
    });
});
