/**
 * Case classification and support
 */

import { KnowledgeBase } from '../src/knowledgeBase.js';
import { computeSupport } from '../src/case.js';
import { PROGRAMS } from './fixtures.js';

describe('Case classification', () => {
    const kb = KnowledgeBase.fromText(PROGRAMS.weather);

    test('classifies every literal', () => {
        expect(kb.allCases().map(c => [c.claim.key, c.classification])).toEqual([
            ['happy', 'entailed'],
            ['stay_home', 'contained'],
            ['sunny', 'contained'],
            ['work_well', 'entailed'],
            ['~happy', 'entailed'],
            ['~work_well', 'entailed'],
        ]);
    });

    test('indexes asserting clauses and rules', () => {
        const happy = kb.caseOf('happy');
        expect(happy.assertingClauses).toEqual([]);
        expect(happy.assertingRules.map(r => r.key)).toEqual(['happy :- stay_home.']);
        expect(kb.caseOf('sunny').assertingClauses.map(c => c.key)).toEqual(['stay_home, sunny.']);
    });

    test('renders as (statements, claim)', () => {
        expect(kb.caseOf('happy').toString()).toBe('({happy :- stay_home.}, happy)');
    });

    test('a literal with a clause is contained even if rules conclude it', () => {
        const c = KnowledgeBase.fromText('a. a :- b. b.').caseOf('a');
        expect(c.classification).toBe('contained');
        expect(c.isContained).toBe(true);
        expect(c.isEntailed).toBe(false);
        expect(c.assertingRules).toHaveLength(1);
    });

    test('a literal with neither is unsupported', () => {
        const c = KnowledgeBase.fromText(PROGRAMS.dangling).caseOf('b');
        expect(c.classification).toBe('unsupported');
        expect(c.isSupported).toBe(false);
    });
});

describe('Support', () => {
    test('supporting rules are the asserting rules with supported bodies', () => {
        const c = KnowledgeBase.fromText('a :- b. a :- c. c.').caseOf('a');
        expect(c.assertingRules.map(r => r.key)).toEqual(['a :- b.', 'a :- c.']);
        expect(c.supportingRules.map(r => r.key)).toEqual(['a :- c.']);
        expect(c.isSupported).toBe(true);
    });

    test('entailed over an unsupported literal is not supported', () => {
        const c = KnowledgeBase.fromText(PROGRAMS.dangling).caseOf('a');
        expect(c.classification).toBe('entailed');
        expect(c.isSupported).toBe(false);
    });

    test('rules that only support each other are unsupported', () => {
        const kb = KnowledgeBase.fromText(PROGRAMS.cycle);
        expect(kb.caseOf('p').isSupported).toBe(false);
        expect(kb.caseOf('q').isSupported).toBe(false);
    });

    test('a cycle with a grounded entry point is supported', () => {
        const kb = KnowledgeBase.fromText(PROGRAMS.longCycle);
        expect(kb.allCases().every(c => c.isSupported)).toBe(true);
    });

    test('a self-supporting rule needs support from elsewhere', () => {
        const kb = KnowledgeBase.fromText('a :- a, b. b.');
        expect(kb.caseOf('a').isSupported).toBe(false);
        expect(KnowledgeBase.fromText('a :- a, b. b. a.').caseOf('a').supportingRules).toHaveLength(1);
    });

    test('computeSupport returns the supported rules', () => {
        const kb = KnowledgeBase.fromText('x. y :- x. z :- y, w. v :- y.');
        const supported = computeSupport(kb.clauses, kb.rules);
        expect([...supported].map(r => r.key).sort()).toEqual(['v :- y.', 'y :- x.']);
    });

    test('supported literals are exactly those with evidence', () => {
        const kb = KnowledgeBase.fromText(`${PROGRAMS.weather} ${PROGRAMS.cycle} ${PROGRAMS.dangling} r :- p, sunny.`);
        for (const c of kb.allCases()) {
            const hasEvidence = [...kb.evidence(c.claim)].length > 0;
            expect([c.claim.key, hasEvidence]).toEqual([c.claim.key, c.isSupported]);
        }
    });
});
