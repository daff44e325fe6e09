import type { Token } from '../types/parser.js';
import { createSyntaxError, LogicException } from '../types/errors.js';
import { Literal } from '../logic/literal.js';
import { Clause, Rule } from '../logic/clause.js';

/**
 * Statements read from one program, in source order. Literals are fresh
 * instances per occurrence; pooling them is the knowledge base's job.
 */
export interface ParsedProgram {
    clauses: Clause[];
    rules: Rule[];
}

/**
 * Parser for logic programs
 *
 * Grammar:
 *   program     = statement*
 *   statement   = rule | clause
 *   clause      = literal (',' literal)* '.'
 *   rule        = literal ':-' literal (',' literal)* '.'
 *   literal     = '~'? ATOM
 */
export class Parser {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;

    constructor(tokens: Token[], originalInput: string) {
        this.tokens = tokens;
        this.originalInput = originalInput;
    }

    parse(): ParsedProgram {
        const program: ParsedProgram = { clauses: [], rules: [] };

        while (this.current().type !== 'EOF') {
            this.parseStatement(program);
        }

        return program;
    }

    private current(): Token {
        return this.tokens[this.pos] || { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    private error(message: string, token: Token = this.current()): LogicException {
        return createSyntaxError(message, this.originalInput, token.position);
    }

    private parseStatement(program: ParsedProgram): void {
        if (this.current().type === 'DOT') {
            throw this.error('Empty statement');
        }

        const literals = this.parseLiteralList();

        if (this.current().type !== 'IMPLIES') {
            this.expectTerminator();
            program.clauses.push(new Clause(literals));
            return;
        }

        const implies = this.advance();
        if (literals.length !== 1) {
            throw this.error(`Rule must have exactly one head literal, found ${literals.length}`, implies);
        }
        const head = literals[0];

        if (this.current().type === 'DOT') {
            throw this.error(`Rule for '${head.key}' has no body literals`);
        }

        const body = this.parseLiteralList();
        this.expectTerminator();
        program.rules.push(new Rule(head, body));
    }

    private parseLiteralList(): Literal[] {
        const literals = [this.parseLiteral()];

        while (this.current().type === 'COMMA') {
            this.advance();
            literals.push(this.parseLiteral());
        }

        return literals;
    }

    private parseLiteral(): Literal {
        let positive = true;
        if (this.current().type === 'NOT') {
            this.advance();
            positive = false;
        }

        const token = this.current();
        if (token.type === 'EOF') {
            throw this.error("Unterminated statement - expected a literal before the end of input");
        }
        if (token.type !== 'ATOM') {
            throw this.error(`Expected literal but got '${token.value}'`);
        }
        this.advance();

        return new Literal(token.value, positive);
    }

    private expectTerminator(): void {
        const token = this.current();
        if (token.type === 'DOT') {
            this.advance();
            return;
        }
        if (token.type === 'EOF') {
            throw this.error("Unterminated statement - missing '.'");
        }
        throw this.error(`Expected ',' or '.' but got '${token.value}'`);
    }
}
