import type { Literal } from '../logic/literal.js';

export interface EvidenceOptions {
    /** Drop evidence sets already produced for the same query (member identity). */
    deduplicate?: boolean;
    /**
     * Called whenever the cycle guard refuses to expand a literal again.
     * @param literal The literal that was already being expanded.
     * @param path Literals under expansion, outermost first.
     */
    onCycle?: (literal: Literal, path: readonly Literal[]) => void;
}

export interface KnowledgeBaseOptions {
    /** Encoding used when the input is a file path. */
    encoding?: BufferEncoding;
}

export const DEFAULTS = {
    deduplicate: false,
    encoding: 'utf-8',
    maxListedArguments: 100,
} as const;
