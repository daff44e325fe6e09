/**
 * Evidence Engine
 *
 * Backward chaining from a literal to every combination of clauses and
 * rules that supports it:
 *
 *   evidence(L) = { {c} | c asserts L }
 *               ∪ { e1 ∪ ... ∪ ek ∪ {r} | r concludes L, ei ∈ evidence(bi) }
 *
 * where b1..bk are the distinct body literals of r. Results are produced
 * lazily and each query is a pure function of the knowledge base, so the
 * returned sequence can be iterated any number of times, from any number
 * of call sites.
 *
 * Cycles: the literals currently being expanded form the search path. A
 * rule whose body mentions a literal on that path yields nothing along
 * that path. Rules that only support each other (p :- q. q :- p.)
 * therefore produce no evidence, and no evidence set ever relies on its
 * own conclusion.
 *
 * The search is a depth-first walk over an explicit stack of frames, one
 * per literal on the path, so deep rule chains never grow the call stack.
 */

import type { KnowledgeBase } from './knowledgeBase.js';
import type { Literal } from './logic/literal.js';
import type { Rule, Statement } from './logic/clause.js';
import type { Case } from './case.js';
import { sortByKey } from './logic/utils.js';
import { DEFAULTS, EvidenceOptions } from './types/options.js';
import { createInternalError } from './types/errors.js';
import { distinctBy } from './utils/enumerate.js';

export type EvidenceSet = ReadonlySet<Statement>;

/**
 * Enumerate the evidence sets of a literal.
 *
 * The literal is resolved immediately, so an unknown literal fails with
 * NOT_FOUND at the call rather than on first iteration.
 */
export function evidenceSets(
    kb: KnowledgeBase,
    query: Literal | string,
    options: EvidenceOptions = {}
): Iterable<EvidenceSet> {
    const claim = kb.lookup(query);
    const deduplicate = options.deduplicate ?? DEFAULTS.deduplicate;

    return {
        [Symbol.iterator]: () => {
            const sets = expand(kb, claim, options);
            return deduplicate ? distinctBy(sets, evidenceKey) : sets;
        },
    };
}

/**
 * Canonical text of an evidence set. Within one knowledge base statements
 * are unique per key, so equal keys mean the same members.
 */
export function evidenceKey(evidence: EvidenceSet): string {
    return sortByKey(evidence).map(s => s.key).join('\n');
}

/**
 * What a frame asks of the driver: expand a body literal, hand a set to
 * its parent, or report that it has nothing more.
 */
type Step =
    | { kind: 'pull'; frame: Frame }
    | { kind: 'yield'; evidence: Set<Statement> }
    | { kind: 'done' };

/**
 * The stack of frames under expansion. Its literals are the search path.
 */
class Search {
    private readonly frames: Frame[] = [];
    private readonly open = new Set<Literal>();

    constructor(
        readonly kb: KnowledgeBase,
        readonly options: EvidenceOptions
    ) { }

    push(frame: Frame): void {
        this.frames.push(frame);
        this.open.add(frame.literal);
    }

    /** Pop the top frame and return the one below it. */
    pop(): Frame | undefined {
        const frame = this.frames.pop();
        if (frame) this.open.delete(frame.literal);
        return this.frames[this.frames.length - 1];
    }

    isOpen(literal: Literal): boolean {
        return this.open.has(literal);
    }

    path(): Literal[] {
        return this.frames.map(frame => frame.literal);
    }
}

/**
 * Product of the body expansions of the rule a frame is working through,
 * in odometer order: the last body literal varies fastest, and when an
 * earlier one advances every later one is expanded again from the start.
 */
interface RuleProgress {
    rule: Rule;
    factors: Frame[];
    values: Array<Set<Statement>>;
    cursor: number;
    /** True while (re)starting factors, false while advancing them. */
    filling: boolean;
}

/**
 * Expansion of one literal: its clauses first, then each of its rules.
 */
class Frame {
    private readonly literalCase: Case;
    private clauseIndex = 0;
    private ruleIndex = -1;
    private progress: RuleProgress | undefined;

    constructor(
        readonly literal: Literal,
        private readonly search: Search
    ) {
        const literalCase = search.kb.findCase(literal);
        if (!literalCase) {
            throw createInternalError(`literal '${literal.key}' is not pooled in this knowledge base`);
        }
        this.literalCase = literalCase;
    }

    /** Called when this frame is on top of the stack and asked for a set. */
    next(): Step {
        const clauses = this.literalCase.assertingClauses;
        if (this.clauseIndex < clauses.length) {
            return { kind: 'yield', evidence: new Set<Statement>([clauses[this.clauseIndex++]]) };
        }
        if (this.progress) {
            return { kind: 'pull', frame: this.progress.factors[this.progress.cursor] };
        }
        return this.nextRule();
    }

    /** Called with the result of the factor this frame last pulled. */
    receive(evidence: Set<Statement> | undefined): Step {
        const progress = this.progress;
        if (!progress) {
            throw createInternalError(`frame for '${this.literal.key}' received a set with no rule in progress`);
        }

        if (!evidence) {
            // a factor that comes up empty while filling empties the product
            if (progress.filling || --progress.cursor < 0) {
                return this.nextRule();
            }
            return { kind: 'pull', frame: progress.factors[progress.cursor] };
        }

        progress.values[progress.cursor] = evidence;
        if (++progress.cursor < progress.rule.body.length) {
            return this.fill(progress);
        }
        return this.emit(progress);
    }

    private nextRule(): Step {
        const rules = this.literalCase.assertingRules;
        while (++this.ruleIndex < rules.length) {
            const rule = rules[this.ruleIndex];
            const revisited = rule.body.find(bodyLiteral => this.search.isOpen(bodyLiteral));
            if (revisited) {
                this.search.options.onCycle?.(revisited, this.search.path());
                continue;
            }
            const progress: RuleProgress = { rule, factors: [], values: [], cursor: 0, filling: true };
            this.progress = progress;
            return this.fill(progress);
        }
        this.progress = undefined;
        return { kind: 'done' };
    }

    private fill(progress: RuleProgress): Step {
        const frame = new Frame(progress.rule.body[progress.cursor], this.search);
        progress.factors[progress.cursor] = frame;
        progress.filling = true;
        return { kind: 'pull', frame };
    }

    private emit(progress: RuleProgress): Step {
        // the last factor's set is replaced before it is read again
        const last = progress.values.length - 1;
        const evidence = progress.values[last];
        for (let i = 0; i < last; i++) {
            for (const statement of progress.values[i]) {
                evidence.add(statement);
            }
        }
        evidence.add(progress.rule);

        progress.cursor = last;
        progress.filling = false;
        return { kind: 'yield', evidence };
    }
}

function* expand(kb: KnowledgeBase, claim: Literal, options: EvidenceOptions): Generator<EvidenceSet> {
    const search = new Search(kb, options);
    const root = new Frame(claim, search);

    search.push(root);
    let step = root.next();
    while (true) {
        if (step.kind === 'pull') {
            search.push(step.frame);
            step = step.frame.next();
            continue;
        }

        const evidence = step.kind === 'yield' ? step.evidence : undefined;
        const parent = search.pop();
        if (parent) {
            step = parent.receive(evidence);
            continue;
        }

        if (!evidence) return;
        yield evidence;
        search.push(root);
        step = root.next();
    }
}
