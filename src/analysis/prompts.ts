/**
 * Narrative analysis prompts.
 *
 * Each prompt is sent as its own single-turn request with the full contract
 * text substituted for {{document}}.
 */

import type { AnalysisKind, Message } from '../types.js';

export interface AnalysisPrompt {
  kind: AnalysisKind;
  /** Heading shown above the result */
  title: string;
  /** Optional system-level instruction */
  system?: string;
  /** User instruction with a {{document}} placeholder */
  template: string;
}

export const SUMMARY_PERSONA =
  "You're an exceptional lawyer skilled at distilling long contracts into short paragraphs " +
  'that are easy to understand and digest.';

export const ANALYSIS_PROMPTS: Record<AnalysisKind, AnalysisPrompt> = {
  summary: {
    kind: 'summary',
    title: 'Executive Summary',
    system: SUMMARY_PERSONA,
    template: 'Provide an executive summary for the following contract: {{document}}',
  },
  obligations: {
    kind: 'obligations',
    title: 'Key Obligations',
    template: 'Highlight the key obligations from the following contract: {{document}}',
  },
  dates: {
    kind: 'dates',
    title: 'Important Dates / Deadlines',
    template: 'Find all important dates and deadlines in this contract: {{document}}',
  },
  termination: {
    kind: 'termination',
    title: 'Termination Clauses',
    template: 'Highlight the termination clauses in this contract: {{document}}',
  },
  confidentiality: {
    kind: 'confidentiality',
    title: 'Confidentiality and Non-Compete Clauses',
    template: 'Identify confidentiality and non-compete clauses in this contract: {{document}}',
  },
};

/**
 * Build the request messages for one analysis.
 * The document is inserted verbatim; no trimming or escaping.
 */
export function buildMessages(kind: AnalysisKind, document: string): Message[] {
  const prompt = ANALYSIS_PROMPTS[kind];
  const messages: Message[] = [];

  if (prompt.system) {
    messages.push({ role: 'system', content: prompt.system });
  }

  messages.push({
    role: 'user',
    content: prompt.template.replace('{{document}}', () => document),
  });

  return messages;
}
