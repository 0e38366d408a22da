import type { ClauseMatches, ClauseReport, ClauseReports, Taxonomy } from '../types.js';
import { TAXONOMIES } from './taxonomies.js';

const patternCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the whole-phrase pattern for a synonym.
 *
 * The phrase is matched literally between word boundaries. When its last
 * word is an "-ation" noun the verb forms of that word are accepted too, so
 * "termination" also finds "terminated" and "terminating".
 */
export function phrasePattern(phrase: string): RegExp {
  const lower = phrase.toLowerCase();
  const cached = patternCache.get(lower);
  if (cached) {
    return cached;
  }

  let source = escapeRegExp(lower);
  const nominal = /([a-z]+)ation$/.exec(lower);
  if (nominal) {
    const head = escapeRegExp(lower.slice(0, nominal.index));
    const stem = nominal[1];
    source = `${head}${stem}(?:ation|ate|ated|ates|ating)`;
  }

  const pattern = new RegExp(`\\b${source}\\b`);
  patternCache.set(lower, pattern);
  return pattern;
}

/**
 * Test a single phrase against already lower-cased text.
 */
function containsPhrase(lowerText: string, phrase: string): boolean {
  return phrasePattern(phrase).test(lowerText);
}

/**
 * Report presence of every clause in a taxonomy.
 * A clause is present when any of its phrases appears as a whole word or
 * phrase, ignoring case. Exactly one entry per taxonomy key.
 */
export function checkClauses(text: string, taxonomy: Taxonomy): ClauseReport {
  const lowerText = text.toLowerCase();

  // fromEntries defines own keys, so a clause named "__proto__" is kept
  return Object.fromEntries(
    Object.entries(taxonomy).map(([clause, phrases]) => [
      clause,
      phrases.some((phrase) => containsPhrase(lowerText, phrase)),
    ])
  );
}

/**
 * List, per clause, the phrases that were found.
 * Clauses with no match map to an empty list.
 */
export function findClauseMatches(text: string, taxonomy: Taxonomy): ClauseMatches {
  const lowerText = text.toLowerCase();

  return Object.fromEntries(
    Object.entries(taxonomy).map(([clause, phrases]) => [
      clause,
      phrases.filter((phrase) => containsPhrase(lowerText, phrase)),
    ])
  );
}

/**
 * Check both built-in taxonomies.
 */
export function checkAllClauses(text: string): ClauseReports {
  return {
    commercial: checkClauses(text, TAXONOMIES.commercial),
    legal: checkClauses(text, TAXONOMIES.legal),
  };
}
