/**
 * Plain-text rendering of analysis results for terminal output.
 */

import type { AnalysisOutcome, AnalysisResult, ClauseMatches, ClauseReport, ContractReport } from './types.js';
import { ANALYSIS_KINDS } from './types.js';
import { ANALYSIS_PROMPTS } from './analysis/prompts.js';
import { formatError } from './utils/errors.js';

export function formatOutcome(outcome: AnalysisOutcome): string {
  if (outcome.status === 'fulfilled') {
    return outcome.content;
  }
  return formatError(outcome.error);
}

/**
 * One "Name: Yes/No" line per clause, in taxonomy order.
 * With matches, present clauses list the phrases that were found.
 */
export function formatClauseReport(report: ClauseReport, matches?: ClauseMatches): string {
  return Object.entries(report)
    .map(([clause, present]) => {
      const line = `${clause}: ${present ? 'Yes' : 'No'}`;
      const found = matches?.[clause];
      if (present && found && found.length > 0) {
        return `${line} (${found.map((phrase) => `"${phrase}"`).join(', ')})`;
      }
      return line;
    })
    .join('\n');
}

export function formatNarrative(narrative: AnalysisResult): string {
  return ANALYSIS_KINDS.map((kind) => {
    const title = ANALYSIS_PROMPTS[kind].title;
    return `## ${title}\n\n${formatOutcome(narrative[kind])}`;
  }).join('\n\n');
}

export interface FormatReportOptions {
  matches?: { commercial: ClauseMatches; legal: ClauseMatches };
  /** Leave out the narrative sections (clause check only) */
  clausesOnly?: boolean;
}

/**
 * Full report: preview, narrative sections, then both clause lists.
 */
export function formatReport(
  report: Pick<ContractReport, 'preview' | 'clauses'> & { narrative?: AnalysisResult },
  options: FormatReportOptions = {}
): string {
  const sections = [`## Contract Text Preview\n\n${report.preview}`];

  if (report.narrative && !options.clausesOnly) {
    sections.push(formatNarrative(report.narrative));
  }

  sections.push(
    `## Clause Presence Checker\n\n` +
      `### Commercial Clauses\n\n${formatClauseReport(report.clauses.commercial, options.matches?.commercial)}\n\n` +
      `### Legal Clauses\n\n${formatClauseReport(report.clauses.legal, options.matches?.legal)}`
  );

  return sections.join('\n\n');
}

/**
 * Names of the narrative analyses that failed.
 */
export function failedAnalyses(narrative: AnalysisResult): string[] {
  return ANALYSIS_KINDS.filter((kind) => narrative[kind].status === 'rejected');
}

// =============================================================================
// JSON serialization
// =============================================================================

export interface SerializedError {
  code: string;
  message: string;
  suggestion?: string;
}

export type SerializedOutcome =
  | { status: 'fulfilled'; content: string }
  | { status: 'rejected'; error: SerializedError };

export function serializeOutcome(outcome: AnalysisOutcome): SerializedOutcome {
  if (outcome.status === 'fulfilled') {
    return outcome;
  }
  return {
    status: 'rejected',
    error: {
      code: outcome.error.code,
      message: outcome.error.message,
      suggestion: outcome.error.suggestion,
    },
  };
}

export function serializeNarrative(narrative: AnalysisResult): Record<keyof AnalysisResult, SerializedOutcome> {
  return {
    summary: serializeOutcome(narrative.summary),
    obligations: serializeOutcome(narrative.obligations),
    dates: serializeOutcome(narrative.dates),
    termination: serializeOutcome(narrative.termination),
    confidentiality: serializeOutcome(narrative.confidentiality),
  };
}
