/**
 * Knowledge Base
 *
 * A consolidated, read-only collection of clauses and rules over one pool
 * of literals. Every literal reachable from a clause, rule or case of a
 * knowledge base is the pool's instance for its (atom, polarity) pair, so
 * evidence can be compared and merged by identity.
 *
 * Statements handed in by the caller are never kept: consolidation always
 * rebuilds them over the pool.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { Literal } from './logic/literal.js';
import { Clause, Rule, Statement, isClause } from './logic/clause.js';
import { sortByKey } from './logic/utils.js';
import { parse } from './parser/index.js';
import { Case, buildCases } from './case.js';
import { EvidenceSet, evidenceSets } from './evidence.js';
import { Argument, argumentsFor } from './argument.js';
import { KnowledgeBaseJSON, KnowledgeBaseSchema, LiteralJSON } from './schemas.js';
import { DEFAULTS, EvidenceOptions, KnowledgeBaseOptions } from './types/options.js';
import {
    LogicException,
    createInternalError,
    createNotFoundError,
    createStructuralError,
    isLogicException,
    serializeLogicError,
} from './types/errors.js';

/**
 * The three ways a knowledge base can be supplied.
 */
export type KnowledgeBaseInput =
    | { kind: 'path'; path: string }
    | { kind: 'text'; text: string }
    | { kind: 'objects'; statements: Iterable<Statement> };

export interface KnowledgeBaseSize {
    literals: number;
    clauses: number;
    rules: number;
}

export class KnowledgeBase {
    private readonly pool = new Map<string, Literal>();
    private readonly clauseIndex = new Map<string, Clause>();
    private readonly ruleIndex = new Map<string, Rule>();
    private readonly cases: Map<Literal, Case>;

    private constructor(statements: Iterable<Statement>) {
        for (const statement of statements) {
            if (isClause(statement)) {
                const clause = new Clause([...statement].map(l => this.intern(l)));
                if (!this.clauseIndex.has(clause.key)) {
                    this.clauseIndex.set(clause.key, clause);
                }
            } else {
                const rule = new Rule(this.intern(statement.head), statement.body.map(l => this.intern(l)));
                if (!this.ruleIndex.has(rule.key)) {
                    this.ruleIndex.set(rule.key, rule);
                }
            }
        }

        this.cases = buildCases(this.pool.values(), [...this.clauseIndex.values()], [...this.ruleIndex.values()]);
    }

    private intern(literal: Literal): Literal {
        const pooled = this.pool.get(literal.key);
        if (pooled) return pooled;
        const fresh = new Literal(literal.atom, literal.positive);
        this.pool.set(fresh.key, fresh);
        return fresh;
    }

    // === Construction ===

    static from(input: KnowledgeBaseInput, options: KnowledgeBaseOptions = {}): KnowledgeBase {
        switch (input.kind) {
            case 'path': return KnowledgeBase.fromFile(input.path, options);
            case 'text': return KnowledgeBase.fromText(input.text);
            case 'objects': return KnowledgeBase.fromStatements(input.statements);
        }
    }

    static fromStatements(statements: Iterable<Statement>): KnowledgeBase {
        return new KnowledgeBase(statements);
    }

    static fromText(text: string): KnowledgeBase {
        const { clauses, rules } = parse(text);
        return new KnowledgeBase([...clauses, ...rules]);
    }

    static fromFile(path: string, options: KnowledgeBaseOptions = {}): KnowledgeBase {
        if (!isFile(path)) {
            throw createNotFoundError(`File '${path}' not found`, { path });
        }
        return KnowledgeBase.fromText(readProgram(path, options));
    }

    /**
     * Path-then-text strategy for a single string: if a file exists at
     * `source` it is read, otherwise `source` itself is parsed. Program
     * text that happens to name an existing file is read as a path; a file
     * that exists but cannot be read falls back to parsing `source`.
     *
     * When `source` is neither a file nor a valid program the failure is
     * NOT_FOUND; the syntax error's span and suggestion are carried over and
     * the full error is kept in `details.syntaxError`.
     */
    static fromString(source: string, options: KnowledgeBaseOptions = {}): KnowledgeBase {
        if (isFile(source)) {
            const text = readProgramOrUndefined(source, options);
            if (text !== undefined) {
                return KnowledgeBase.fromText(text);
            }
        }
        try {
            return KnowledgeBase.fromText(source);
        } catch (e) {
            if (isLogicException(e, 'SYNTAX_ERROR')) {
                throw new LogicException({
                    code: 'NOT_FOUND',
                    message: `'${abbreviate(source)}' is neither an existing file nor a valid program`,
                    span: e.error.span,
                    suggestion: e.error.suggestion,
                    details: { source, syntaxError: serializeLogicError(e.error) },
                });
            }
            throw e;
        }
    }

    /**
     * Build from plain objects (see schemas.ts). Malformed input fails with
     * STRUCTURAL_ERROR carrying the validation issues.
     */
    static fromJSON(data: unknown): KnowledgeBase {
        const result = KnowledgeBaseSchema.safeParse(data);
        if (!result.success) {
            throw createStructuralError('Invalid knowledge base object', { issues: result.error.issues });
        }

        const toLiteral = ({ atom, positive }: LiteralJSON) => new Literal(atom, positive);
        const statements: Statement[] = [
            ...result.data.clauses.map(literals => new Clause(literals.map(toLiteral))),
            ...result.data.rules.map(rule => new Rule(toLiteral(rule.head), rule.body.map(toLiteral))),
        ];
        return new KnowledgeBase(statements);
    }

    // === Contents ===

    get literals(): Literal[] {
        return sortByKey(this.pool.values());
    }

    get clauses(): Clause[] {
        return sortByKey(this.clauseIndex.values());
    }

    get rules(): Rule[] {
        return sortByKey(this.ruleIndex.values());
    }

    get statements(): Statement[] {
        return [...this.clauses, ...this.rules];
    }

    get size(): KnowledgeBaseSize {
        return {
            literals: this.pool.size,
            clauses: this.clauseIndex.size,
            rules: this.ruleIndex.size,
        };
    }

    has(query: Literal | string): boolean {
        const key = keyOf(query);
        return key !== undefined && this.pool.has(key);
    }

    /**
     * The pooled instance for a literal. Query text that is not a literal
     * at all is NOT_FOUND as well: no such literal can be in the pool.
     */
    lookup(query: Literal | string): Literal {
        const key = keyOf(query);
        const literal = key === undefined ? undefined : this.pool.get(key);
        if (!literal) {
            const text = key ?? (typeof query === 'string' ? query.trim() : query.key);
            throw createNotFoundError(`Literal '${text}' is not in the knowledge base`, { literal: text });
        }
        return literal;
    }

    /**
     * Case of a pooled literal, by identity. Returns undefined for literals
     * from outside this knowledge base.
     */
    findCase(literal: Literal): Case | undefined {
        return this.cases.get(literal);
    }

    caseOf(query: Literal | string): Case {
        const literal = this.lookup(query);
        const literalCase = this.cases.get(literal);
        if (!literalCase) {
            throw createInternalError(`no case for pooled literal '${literal.key}'`);
        }
        return literalCase;
    }

    /** Cases of every pooled literal, in literal order. */
    allCases(): Case[] {
        return this.literals.map(literal => this.caseOf(literal));
    }

    /**
     * The pooled literal with the same atom and opposite polarity, if any.
     */
    complementOf(query: Literal | string): Literal | undefined {
        return this.pool.get(this.lookup(query).complement().key);
    }

    /**
     * Complementary pairs whose members are both supported, positive
     * literal first. These are the conflicts an argumentation solver
     * has to resolve.
     */
    conflicts(): Array<[Literal, Literal]> {
        const pairs: Array<[Literal, Literal]> = [];
        for (const literal of this.literals) {
            if (!literal.positive) continue;
            const negation = this.pool.get(literal.complement().key);
            if (negation && this.caseOf(literal).isSupported && this.caseOf(negation).isSupported) {
                pairs.push([literal, negation]);
            }
        }
        return pairs;
    }

    // === Evidence ===

    evidence(query: Literal | string, options: EvidenceOptions = {}): Iterable<EvidenceSet> {
        return evidenceSets(this, query, options);
    }

    arguments(query: Literal | string, options: EvidenceOptions = {}): Iterable<Argument> {
        return argumentsFor(this, query, options);
    }

    /**
     * Every supported literal mapped (by key) to all of its arguments.
     */
    argumentsByClaim(options: EvidenceOptions = {}): Map<string, Argument[]> {
        const byClaim = new Map<string, Argument[]>();
        for (const literalCase of this.allCases()) {
            if (literalCase.isSupported) {
                byClaim.set(literalCase.claim.key, [...this.arguments(literalCase.claim, options)]);
            }
        }
        return byClaim;
    }

    // === Comparison and rendering ===

    /**
     * Structural equality: same literals, clauses and rules.
     */
    equals(other: KnowledgeBase): boolean {
        return sameKeys(this.pool, other.pool)
            && sameKeys(this.clauseIndex, other.clauseIndex)
            && sameKeys(this.ruleIndex, other.ruleIndex);
    }

    /**
     * The program in the textual syntax: clauses, then rules, one per line.
     */
    toString(): string {
        return this.statements.map(s => s.key).join('\n');
    }

    toJSON(): KnowledgeBaseJSON {
        const toJSON = (literal: Literal): LiteralJSON => ({ atom: literal.atom, positive: literal.positive });
        return {
            clauses: this.clauses.map(clause => clause.literals.map(toJSON)),
            rules: this.rules.map(rule => ({ head: toJSON(rule.head), body: rule.body.map(toJSON) })),
        };
    }
}

/**
 * Pool key of a query; undefined for text that does not parse as a literal.
 */
function keyOf(query: Literal | string): string | undefined {
    if (typeof query !== 'string') return query.key;
    try {
        return Literal.parse(query).key;
    } catch (e) {
        if (isLogicException(e, 'SYNTAX_ERROR')) return undefined;
        throw e;
    }
}

function readProgram(path: string, options: KnowledgeBaseOptions): string {
    try {
        return readFileSync(path, options.encoding ?? DEFAULTS.encoding);
    } catch (e) {
        throw createNotFoundError(`File '${path}' could not be read`, {
            path,
            reason: e instanceof Error ? e.message : String(e),
        });
    }
}

function readProgramOrUndefined(path: string, options: KnowledgeBaseOptions): string | undefined {
    try {
        return readProgram(path, options);
    } catch (e) {
        if (isLogicException(e, 'NOT_FOUND')) return undefined;
        throw e;
    }
}

function isFile(path: string): boolean {
    return existsSync(path) && statSync(path).isFile();
}

function sameKeys(a: Map<string, unknown>, b: Map<string, unknown>): boolean {
    if (a.size !== b.size) return false;
    for (const key of a.keys()) {
        if (!b.has(key)) return false;
    }
    return true;
}

function abbreviate(text: string, max: number = 40): string {
    const line = text.replace(/\s+/g, ' ').trim();
    return line.length > max ? `${line.slice(0, max - 3)}...` : line;
}
