/**
 * Shared test fixtures for consistent, DRY testing.
 */
import type { EvidenceSet } from '../src/evidence.js';
import { LogicException } from '../src/types/errors.js';

// === Common Programs ===
export const PROGRAMS = {
    // Mixed conclusions from one shared clause
    weather: 'sunny, stay_home. ~happy :- sunny, stay_home. ~work_well :- stay_home. happy :- stay_home. work_well :- happy.',
    // Rules that only support each other
    cycle: 'p :- q. q :- p.',
    // Cycle with a grounded entry point
    groundedCycle: 'p. p :- q. q :- p.',
    // Three-step cycle closed by a clause
    longCycle: 'a :- b. b :- c. c :- a. c.',
    // x has 1 clause and rules contributing 1*2 and 1 sets
    counting: 'a. b. b, c. x. x :- a, b. x :- c.',
    // Two product paths produce the same evidence set for x
    duplicates: 'p, q. p, q, r. x :- p, q.',
    // Rule over a literal nothing supports
    dangling: 'a :- b.',
} as const;

/**
 * Evidence sets as sorted statement texts, outer list sorted too, so
 * assertions do not depend on enumeration order.
 */
export function evidenceTexts(sets: Iterable<EvidenceSet>): string[][] {
    return normalize([...sets].map(set => [...set].map(s => s.key)));
}

export function normalize(texts: string[][]): string[][] {
    return texts
        .map(set => [...set].sort())
        .sort((a, b) => a.join('|').localeCompare(b.join('|')));
}

/**
 * Run `fn`, expecting it to throw a LogicException, and return it.
 */
export function captureError(fn: () => unknown): LogicException {
    try {
        fn();
    } catch (e) {
        if (e instanceof LogicException) return e;
        throw e;
    }
    throw new Error('Expected a LogicException to be thrown');
}

const ANSI = /\u001b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
    return text.replace(ANSI, '');
}
