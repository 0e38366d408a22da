export { NarrativeAnalyzer } from './analyzer.js';
export type { NarrativeAnalyzerOptions } from './analyzer.js';
export { ANALYSIS_PROMPTS, SUMMARY_PERSONA, buildMessages } from './prompts.js';
export type { AnalysisPrompt } from './prompts.js';
