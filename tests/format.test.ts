import { describe, it, expect } from 'vitest';
import {
  failedAnalyses,
  formatClauseReport,
  formatNarrative,
  formatOutcome,
  formatReport,
  serializeNarrative,
  serializeOutcome,
} from '../src/format.js';
import type { AnalysisResult } from '../src/types.js';
import { remoteCallError } from '../src/utils/errors.js';

function narrative(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    summary: { status: 'fulfilled', content: 'S' },
    obligations: { status: 'fulfilled', content: 'O' },
    dates: { status: 'fulfilled', content: 'D' },
    termination: { status: 'fulfilled', content: 'T' },
    confidentiality: { status: 'fulfilled', content: 'C' },
    ...overrides,
  };
}

const CLAUSES = {
  commercial: { 'Payment Terms': true, IP: false },
  legal: { Termination: true },
};

describe('Formatting', () => {
  it('should print one Yes/No line per clause in order', () => {
    expect(formatClauseReport({ 'Payment Terms': true, IP: false, 'Delivery Terms': false })).toBe(
      'Payment Terms: Yes\nIP: No\nDelivery Terms: No'
    );
  });

  it('should list the matched phrases of present clauses', () => {
    const text = formatClauseReport(
      { Termination: true, Confidentiality: false },
      { Termination: ['termination', 'end of agreement'], Confidentiality: [] }
    );

    expect(text).toBe('Termination: Yes ("termination", "end of agreement")\nConfidentiality: No');
  });

  it('should print each narrative section under its title', () => {
    expect(formatNarrative(narrative())).toBe(
      [
        '## Executive Summary\n\nS',
        '## Key Obligations\n\nO',
        '## Important Dates / Deadlines\n\nD',
        '## Termination Clauses\n\nT',
        '## Confidentiality and Non-Compete Clauses\n\nC',
      ].join('\n\n')
    );
  });

  it('should print a failed analysis as its error', () => {
    const outcome = { status: 'rejected' as const, error: remoteCallError('dates', 'bad gateway') };

    expect(formatOutcome(outcome)).toBe(
      'Error [REMOTE_CALL_FAILURE]: Remote call failed for dates: bad gateway\n\n' +
        'Suggestion: Check your API key and network connection. If the issue persists, try again later.'
    );
  });

  it('should lay out the clause-only report', () => {
    expect(formatReport({ preview: 'Preview', clauses: CLAUSES }, { clausesOnly: true })).toBe(
      '## Contract Text Preview\n\nPreview\n\n' +
        '## Clause Presence Checker\n\n' +
        '### Commercial Clauses\n\nPayment Terms: Yes\nIP: No\n\n' +
        '### Legal Clauses\n\nTermination: Yes'
    );
  });

  it('should put the narrative between preview and clauses', () => {
    const report = formatReport({ preview: 'Preview', narrative: narrative(), clauses: CLAUSES });

    expect(report.indexOf('## Executive Summary')).toBeGreaterThan(report.indexOf('## Contract Text Preview'));
    expect(report.indexOf('## Clause Presence Checker')).toBeGreaterThan(
      report.indexOf('## Confidentiality and Non-Compete Clauses')
    );
  });

  it('should name the failed analyses', () => {
    const result = narrative({
      dates: { status: 'rejected', error: remoteCallError('dates', 'x') },
      confidentiality: { status: 'rejected', error: remoteCallError('confidentiality', 'x') },
    });

    expect(failedAnalyses(result)).toEqual(['dates', 'confidentiality']);
    expect(failedAnalyses(narrative())).toEqual([]);
  });

  it('should serialize outcomes to plain objects', () => {
    const error = remoteCallError('summary', '503 Service Unavailable');

    expect(serializeOutcome({ status: 'rejected', error })).toEqual({
      status: 'rejected',
      error: {
        code: 'REMOTE_CALL_FAILURE',
        message: 'Remote call failed for summary: 503 Service Unavailable',
        suggestion: 'The API server is experiencing issues. Please try again in a few moments.',
      },
    });
    expect(serializeNarrative(narrative()).termination).toEqual({ status: 'fulfilled', content: 'T' });
  });
});
