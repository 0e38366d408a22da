export { COMMERCIAL_CLAUSES, LEGAL_CLAUSES, TAXONOMIES } from './taxonomies.js';
export type { TaxonomyName } from './taxonomies.js';
export { checkClauses, checkAllClauses, findClauseMatches, phrasePattern } from './checker.js';
