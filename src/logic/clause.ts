/**
 * Clauses and Rules
 *
 * The two kinds of statement a knowledge base is made of. A clause asserts
 * a conjunction of literals unconditionally; a rule derives its head from
 * the conjunction of its body.
 */

import { Literal } from './literal.js';
import { sortByKey, uniqueByKey } from './utils.js';
import { createStructuralError } from '../types/errors.js';

export class Clause implements Iterable<Literal> {
    readonly kind = 'clause' as const;
    private readonly members: ReadonlyMap<string, Literal>;

    /**
     * Repeated literals are merged; an empty clause is rejected.
     */
    constructor(literals: Iterable<Literal>) {
        this.members = uniqueByKey(literals);
        if (this.members.size === 0) {
            throw createStructuralError('A clause must assert at least one literal');
        }
    }

    static of(...literals: Literal[]): Clause {
        return new Clause(literals);
    }

    /** Literals in rendering order. */
    get literals(): Literal[] {
        return sortByKey(this.members.values());
    }

    get size(): number {
        return this.members.size;
    }

    has(literal: Literal): boolean {
        return this.members.has(literal.key);
    }

    get key(): string {
        return this.toString();
    }

    equals(other: Clause): boolean {
        return this.key === other.key;
    }

    [Symbol.iterator](): Iterator<Literal> {
        return this.members.values();
    }

    toString(): string {
        return this.literals.map(l => l.key).join(', ') + '.';
    }
}

export class Rule {
    readonly kind = 'rule' as const;
    readonly head: Literal;
    private readonly members: ReadonlyMap<string, Literal>;

    /**
     * A head that also occurs in its own body is accepted here; the
     * evidence search is what keeps such rules from looping.
     */
    constructor(head: Literal, body: Iterable<Literal>) {
        this.head = head;
        this.members = uniqueByKey(body);
        if (this.members.size === 0) {
            throw createStructuralError(`Rule for '${head.key}' must have at least one body literal`, {
                head: head.key,
            });
        }
    }

    static of(head: Literal, ...body: Literal[]): Rule {
        return new Rule(head, body);
    }

    /** Distinct body literals in rendering order. */
    get body(): Literal[] {
        return sortByKey(this.members.values());
    }

    get isSelfSupporting(): boolean {
        return this.members.has(this.head.key);
    }

    get key(): string {
        return this.toString();
    }

    equals(other: Rule): boolean {
        return this.key === other.key;
    }

    toString(): string {
        return `${this.head.key} :- ${this.body.map(l => l.key).join(', ')}.`;
    }
}

export type Statement = Clause | Rule;

export function isClause(statement: Statement): statement is Clause {
    return statement.kind === 'clause';
}

export function isRule(statement: Statement): statement is Rule {
    return statement.kind === 'rule';
}
