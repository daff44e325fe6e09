/**
 * Shared type definitions
 */

// Re-export error types
export {
    LogicException,
    isLogicException,
    getSuggestion,
    createSyntaxError,
    createNotFoundError,
    createStructuralError,
    createInternalError,
    serializeLogicError,
} from './errors.js';

export type {
    LogicErrorCode,
    ErrorSpan,
    LogicError,
} from './errors.js';

// Re-export parser types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    EvidenceOptions,
    KnowledgeBaseOptions,
} from './options.js';
