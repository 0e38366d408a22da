import { z } from 'zod';

// =============================================================================
// LLM Client Types
// =============================================================================

export type ModelProvider = 'openai' | 'anthropic';

export type OpenAIModel =
  | 'gpt-4o'
  | 'gpt-4o-mini'
  | 'gpt-4.1'
  | 'gpt-4.1-mini'
  | 'gpt-4-turbo'
  | 'gpt-3.5-turbo'
  | (string & {});
export type AnthropicModel =
  | 'claude-3-5-sonnet-latest'
  | 'claude-3-5-haiku-latest'
  | 'claude-3-opus-latest'
  | (string & {});
export type SupportedModel = OpenAIModel | AnthropicModel;

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface CompletionResult {
  content: string;
  usage: TokenUsage;
  finishReason?: 'stop' | 'length' | 'tool_calls' | 'content_filter' | 'unknown';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

// =============================================================================
// Document Types
// =============================================================================

export const DOCX_MEDIA_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
export const PDF_MEDIA_TYPE = 'application/pdf';

/** Closed set of document kinds the extractor dispatches on */
export type DocumentKind =
  | { type: 'docx' }
  | { type: 'pdf' }
  | { type: 'text' }
  | { type: 'unrecognized'; mediaType: string };

export type DocumentKindName = DocumentKind['type'];

export interface ContractDocument {
  kind: DocumentKind;
  data: Uint8Array;
  /** Original file name, when known */
  name?: string;
}

export interface ExtractionResult {
  text: string;
  kind: Exclude<DocumentKindName, 'unrecognized'>;
  characterCount: number;
  /** Number of pages in the source, PDF only */
  pageCount?: number;
}

// =============================================================================
// Clause Types
// =============================================================================

/** Clause name to its ordered synonym phrases */
export type Taxonomy = Readonly<Record<string, readonly string[]>>;

/** Clause name to presence, one entry per taxonomy key */
export type ClauseReport = Record<string, boolean>;

/** Clause name to the synonym phrases found in the text */
export type ClauseMatches = Record<string, string[]>;

export interface ClauseReports {
  commercial: ClauseReport;
  legal: ClauseReport;
}

// =============================================================================
// Narrative Analysis Types
// =============================================================================

export type AnalysisKind = 'summary' | 'obligations' | 'dates' | 'termination' | 'confidentiality';

export const ANALYSIS_KINDS: readonly AnalysisKind[] = [
  'summary',
  'obligations',
  'dates',
  'termination',
  'confidentiality',
];

export type AnalysisOutcome =
  | { status: 'fulfilled'; content: string }
  | { status: 'rejected'; error: ContractAnalyzerError };

/** One independent outcome per narrative analysis */
export type AnalysisResult = Record<AnalysisKind, AnalysisOutcome>;

export interface AnalyzeAllOptions {
  /** Issue the five requests concurrently (default: false) */
  parallel?: boolean;
}

export interface ContractReport {
  extraction: ExtractionResult;
  preview: string;
  narrative: AnalysisResult;
  clauses: ClauseReports;
}

// =============================================================================
// Trace/Logging Types
// =============================================================================

export type TraceEntryType = 'extraction' | 'remote_call' | 'clause_check' | 'error';

export interface TraceEntry {
  type: TraceEntryType;
  timestamp: number;
  data: TraceData;
}

export type TraceData = ExtractionTrace | RemoteCallTrace | ClauseCheckTrace | ErrorTrace;

export interface ExtractionTrace {
  type: 'extraction';
  kind: DocumentKindName;
  characterCount: number;
  duration: number;
}

export interface RemoteCallTrace {
  type: 'remote_call';
  analysis: AnalysisKind;
  model: string;
  promptLength: number;
  responseLength: number;
  usage: TokenUsage;
  duration: number;
}

export interface ClauseCheckTrace {
  type: 'clause_check';
  taxonomy: string;
  present: number;
  total: number;
}

export interface ErrorTrace {
  type: 'error';
  code: ContractAnalyzerErrorCode;
  message: string;
  analysis?: AnalysisKind;
}

// =============================================================================
// API Request Types
// =============================================================================

export const ClauseCheckRequestSchema = z.object({
  text: z.string(),
  explain: z.boolean().optional(),
});

export type ClauseCheckRequest = z.infer<typeof ClauseCheckRequestSchema>;

// =============================================================================
// Errors
// =============================================================================

export class ContractAnalyzerError extends Error {
  /** User-friendly suggestion for resolving the error */
  suggestion?: string;
  /** Narrative analysis that failed, for remote call failures */
  analysis?: AnalysisKind;

  constructor(
    message: string,
    public code: ContractAnalyzerErrorCode,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ContractAnalyzerError';
  }
}

export type ContractAnalyzerErrorCode =
  | 'MISSING_CREDENTIAL'
  | 'INVALID_CONFIG'
  | 'UNSUPPORTED_FORMAT'
  | 'EMPTY_EXTRACTION'
  | 'REMOTE_CALL_FAILURE'
  | 'INVALID_REQUEST';
