import { Tokenizer } from './tokenizer.js';
import { Parser, ParsedProgram } from './parser.js';
import { Literal } from '../logic/literal.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';
export type { ParsedProgram } from './parser.js';

/**
 * Parse a logic program into its clauses and rules
 */
export function parse(input: string): ParsedProgram {
    const tokenizer = new Tokenizer(input);
    const tokens = tokenizer.tokenize();
    const parser = new Parser(tokens, input);
    return parser.parse();
}

/**
 * Parse a single literal such as `rain` or `~rain`
 */
export function parseLiteral(text: string): Literal {
    return Literal.parse(text);
}
