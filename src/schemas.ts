/**
 * Object input schemas
 *
 * Plain-object form of a knowledge base, e.g. as read from JSON:
 *
 *   {
 *     "clauses": [[{ "atom": "sunny" }, { "atom": "stay_home" }]],
 *     "rules": [{ "head": { "atom": "happy" }, "body": [{ "atom": "stay_home" }] }]
 *   }
 */

import { z } from 'zod';
import { ATOM_PATTERN } from './logic/literal.js';

export const LiteralSchema = z.object({
    atom: z.string().regex(ATOM_PATTERN, 'Atoms start with a letter followed by letters, digits or underscores'),
    positive: z.boolean().default(true),
});

export const ClauseSchema = z.array(LiteralSchema).min(1, 'A clause must assert at least one literal');

export const RuleSchema = z.object({
    head: LiteralSchema,
    body: z.array(LiteralSchema).min(1, 'A rule must have at least one body literal'),
});

export const KnowledgeBaseSchema = z.object({
    clauses: z.array(ClauseSchema).default([]),
    rules: z.array(RuleSchema).default([]),
});

export type LiteralJSON = z.output<typeof LiteralSchema>;
export type RuleJSON = z.output<typeof RuleSchema>;
/** Shape accepted by `KnowledgeBase.fromJSON` (defaults may be omitted). */
export type KnowledgeBaseInputJSON = z.input<typeof KnowledgeBaseSchema>;
/** Shape produced by `KnowledgeBase.toJSON`. */
export type KnowledgeBaseJSON = z.output<typeof KnowledgeBaseSchema>;
