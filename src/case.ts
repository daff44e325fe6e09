/**
 * Cases
 *
 * A case is a pooled literal's view onto the statements that assert it:
 * the clauses containing it and the rules concluding it. Whether the
 * literal is supported at all is decided once for the whole knowledge base
 * by `computeSupport`.
 */

import { Literal } from './logic/literal.js';
import { Clause, Rule } from './logic/clause.js';
import { sortByKey } from './logic/utils.js';

export type Classification = 'contained' | 'entailed' | 'unsupported';

export class Case {
    constructor(
        readonly claim: Literal,
        readonly assertingClauses: readonly Clause[],
        readonly assertingRules: readonly Rule[],
        /** Asserting rules whose every body literal is supported. */
        readonly supportingRules: readonly Rule[]
    ) { }

    get isContained(): boolean {
        return this.assertingClauses.length > 0;
    }

    /** No asserting clause, but at least one asserting rule. */
    get isEntailed(): boolean {
        return !this.isContained && this.assertingRules.length > 0;
    }

    get classification(): Classification {
        if (this.isContained) return 'contained';
        if (this.isEntailed) return 'entailed';
        return 'unsupported';
    }

    /**
     * True when at least one argument for the claim exists. An entailed
     * literal whose rules all depend on unsupported or cyclic premises is
     * not supported.
     */
    get isSupported(): boolean {
        return this.isContained || this.supportingRules.length > 0;
    }

    toString(): string {
        const statements = [...this.assertingClauses, ...this.assertingRules].map(s => s.key);
        return `({${statements.join(' ')}}, ${this.claim.key})`;
    }
}

/**
 * Least fixpoint of "supported": every literal in a clause is supported,
 * and a rule's head becomes supported once all of its body literals are.
 * Returns the supported rules; a literal is supported iff it is contained
 * or concluded by one of them.
 */
export function computeSupport(clauses: readonly Clause[], rules: readonly Rule[]): Set<Rule> {
    const supported = new Set<Literal>();
    const supportedRules = new Set<Rule>();
    const pending = new Map<Rule, number>();
    const waiting = new Map<Literal, Rule[]>();
    const queue: Literal[] = [];

    const markSupported = (literal: Literal) => {
        if (!supported.has(literal)) {
            supported.add(literal);
            queue.push(literal);
        }
    };

    for (const rule of rules) {
        const body = rule.body;
        pending.set(rule, body.length);
        for (const literal of body) {
            const rulesWaiting = waiting.get(literal);
            if (rulesWaiting) {
                rulesWaiting.push(rule);
            } else {
                waiting.set(literal, [rule]);
            }
        }
    }

    for (const clause of clauses) {
        for (const literal of clause) {
            markSupported(literal);
        }
    }

    for (let i = 0; i < queue.length; i++) {
        for (const rule of waiting.get(queue[i]) ?? []) {
            const remaining = (pending.get(rule) ?? 0) - 1;
            pending.set(rule, remaining);
            if (remaining === 0) {
                supportedRules.add(rule);
                markSupported(rule.head);
            }
        }
    }

    return supportedRules;
}

/**
 * Build one case per pooled literal from the consolidated statements.
 */
export function buildCases(
    pool: Iterable<Literal>,
    clauses: readonly Clause[],
    rules: readonly Rule[]
): Map<Literal, Case> {
    const assertingClauses = new Map<Literal, Clause[]>();
    const assertingRules = new Map<Literal, Rule[]>();

    for (const clause of clauses) {
        for (const literal of clause) {
            push(assertingClauses, literal, clause);
        }
    }
    for (const rule of rules) {
        push(assertingRules, rule.head, rule);
    }

    const supportedRules = computeSupport(clauses, rules);
    const cases = new Map<Literal, Case>();

    for (const literal of pool) {
        const clausesFor = sortByKey(assertingClauses.get(literal) ?? []);
        const rulesFor = sortByKey(assertingRules.get(literal) ?? []);
        cases.set(literal, new Case(
            literal,
            clausesFor,
            rulesFor,
            rulesFor.filter(rule => supportedRules.has(rule))
        ));
    }

    return cases;
}

function push<K, V>(index: Map<K, V[]>, key: K, value: V): void {
    const entries = index.get(key);
    if (entries) {
        entries.push(value);
    } else {
        index.set(key, [value]);
    }
}
