/**
 * Arguments
 *
 * An argument pairs a claim with one evidence set for it. Its support is
 * everything an external argumentation solver needs to build one node of
 * the argument graph.
 */

import type { KnowledgeBase } from './knowledgeBase.js';
import type { Literal } from './logic/literal.js';
import { Clause, Rule, isClause, isRule } from './logic/clause.js';
import { sortByKey } from './logic/utils.js';
import type { EvidenceOptions } from './types/options.js';
import { EvidenceSet, evidenceSets } from './evidence.js';

export interface ArgumentJSON {
    claim: string;
    support: string[];
}

export class Argument {
    constructor(
        readonly claim: Literal,
        readonly support: EvidenceSet
    ) { }

    get clauses(): Clause[] {
        return sortByKey([...this.support].filter(isClause));
    }

    get rules(): Rule[] {
        return sortByKey([...this.support].filter(isRule));
    }

    toString(): string {
        return `({${sortByKey(this.support).map(s => s.key).join(' ')}}, ${this.claim.key})`;
    }

    toJSON(): ArgumentJSON {
        return {
            claim: this.claim.key,
            support: sortByKey(this.support).map(s => s.key),
        };
    }
}

/**
 * Lazily enumerate the arguments for a literal.
 */
export function argumentsFor(
    kb: KnowledgeBase,
    query: Literal | string,
    options: EvidenceOptions = {}
): Iterable<Argument> {
    const claim = kb.lookup(query);
    const sets = evidenceSets(kb, claim, options);

    return {
        *[Symbol.iterator]() {
            for (const support of sets) {
                yield new Argument(claim, support);
            }
        },
    };
}
