/**
 * Argument Engine - Library Entry Point
 *
 * Exports the knowledge base, its model and the evidence search. This file
 * should NOT import the command-line front end.
 */

// Knowledge Base
export { KnowledgeBase } from './knowledgeBase.js';
export type { KnowledgeBaseInput, KnowledgeBaseSize } from './knowledgeBase.js';

// Model
export * from './logic/index.js';

// Cases, Evidence and Arguments
export { Case, computeSupport } from './case.js';
export type { Classification } from './case.js';
export { evidenceSets, evidenceKey } from './evidence.js';
export type { EvidenceSet } from './evidence.js';
export { Argument, argumentsFor } from './argument.js';
export type { ArgumentJSON } from './argument.js';

// Parser
export { parse, parseLiteral } from './parser/index.js';
export type { ParsedProgram } from './parser/index.js';

// Object input
export * from './schemas.js';

// Utilities
export { take, distinctBy } from './utils/enumerate.js';

// Types and Interfaces
export * from './types/index.js';
