/**
 * Core Logic Model
 */

export { Literal, ATOM_PATTERN } from './literal.js';
export { Clause, Rule, isClause, isRule } from './clause.js';
export type { Statement } from './clause.js';
export { compareKeys, sortByKey, uniqueByKey } from './utils.js';
export type { Keyed } from './utils.js';
