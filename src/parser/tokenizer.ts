import type { Token, TokenType } from '../types/parser.js';
import { createSyntaxError } from '../types/errors.js';

/**
 * Tokenizer for logic programs
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespaceAndComments();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            if (this.match(':-')) {
                this.addToken('IMPLIES', ':-');
                continue;
            }

            switch (char) {
                case '~': this.addToken('NOT', '~'); this.pos++; continue;
                case ',': this.addToken('COMMA', ','); this.pos++; continue;
                case '.': this.addToken('DOT', '.'); this.pos++; continue;
            }

            if (/[a-zA-Z0-9_]/.test(char)) {
                const start = this.pos;
                while (this.pos < this.input.length && /[a-zA-Z0-9_]/.test(this.input[this.pos])) {
                    this.pos++;
                }
                const value = this.input.slice(start, this.pos);

                if (!/^[a-zA-Z]/.test(value)) {
                    throw createSyntaxError(`Invalid atom '${value}'`, this.input, start);
                }
                this.tokens.push({ type: 'ATOM', value, position: start });
                continue;
            }

            throw createSyntaxError(`Unexpected character '${char}'`, this.input, this.pos);
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.input.length });
        return this.tokens;
    }

    // '%' starts a comment that runs to the end of the line
    private skipWhitespaceAndComments(): void {
        while (this.pos < this.input.length) {
            const char = this.input[this.pos];
            if (/\s/.test(char)) {
                this.pos++;
            } else if (char === '%') {
                while (this.pos < this.input.length && this.input[this.pos] !== '\n') {
                    this.pos++;
                }
            } else {
                break;
            }
        }
    }

    private match(str: string): boolean {
        if (this.input.slice(this.pos, this.pos + str.length) === str) {
            this.pos += str.length;
            return true;
        }
        return false;
    }

    private addToken(type: TokenType, value: string): void {
        this.tokens.push({ type, value, position: this.pos - (value.length > 1 ? value.length : 0) });
    }
}
