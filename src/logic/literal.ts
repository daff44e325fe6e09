import { createStructuralError, createSyntaxError } from '../types/errors.js';

/** letter (letter | digit | "_")* */
export const ATOM_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

const LITERAL_TEXT = /^\s*(~?)\s*([^\s~]*)\s*$/;

/**
 * An atom together with a polarity.
 *
 * Literals are immutable. Two literals are equal when they share atom and
 * polarity; identity only matters inside a knowledge base, where every
 * occurrence is consolidated onto one pooled instance.
 */
export class Literal {
    readonly atom: string;
    readonly positive: boolean;

    constructor(atom: string, positive: boolean = true) {
        if (!ATOM_PATTERN.test(atom)) {
            throw createStructuralError(`Invalid atom '${atom}'`, { atom });
        }
        this.atom = atom;
        this.positive = positive;
    }

    /**
     * Read a single literal written as `a` or `~a`.
     */
    static parse(text: string): Literal {
        const match = LITERAL_TEXT.exec(text);
        if (!match || !ATOM_PATTERN.test(match[2])) {
            throw createSyntaxError(`Invalid literal '${text.trim()}'`, text, 0);
        }
        return new Literal(match[2], match[1] !== '~');
    }

    /** Canonical text, also used as the pool key. */
    get key(): string {
        return this.positive ? this.atom : `~${this.atom}`;
    }

    equals(other: Literal): boolean {
        return this.atom === other.atom && this.positive === other.positive;
    }

    isNegationOf(other: Literal): boolean {
        return this.atom === other.atom && this.positive !== other.positive;
    }

    complement(): Literal {
        return new Literal(this.atom, !this.positive);
    }

    toString(): string {
        return this.key;
    }
}
