// Main exports
export { ContractAnalyzer } from './pipeline.js';
export type { ContractAnalysis } from './pipeline.js';
export { NarrativeAnalyzer, ANALYSIS_PROMPTS, SUMMARY_PERSONA, buildMessages } from './analysis/index.js';
export type { NarrativeAnalyzerOptions, AnalysisPrompt } from './analysis/index.js';

// Type exports
export type {
  // Model types
  SupportedModel,
  OpenAIModel,
  AnthropicModel,
  ModelProvider,

  // Message types
  Message,
  CompletionOptions,
  CompletionResult,
  TokenUsage,

  // Document types
  DocumentKind,
  DocumentKindName,
  ContractDocument,
  ExtractionResult,

  // Clause types
  Taxonomy,
  ClauseReport,
  ClauseReports,
  ClauseMatches,

  // Analysis types
  AnalysisKind,
  AnalysisOutcome,
  AnalysisResult,
  AnalyzeAllOptions,
  ContractReport,

  // Trace types
  TraceEntry,
  TraceEntryType,
  TraceData,
  ExtractionTrace,
  RemoteCallTrace,
  ClauseCheckTrace,
  ErrorTrace,

  // Error types
  ContractAnalyzerErrorCode,
  ClauseCheckRequest,
} from './types.js';

export {
  ContractAnalyzerError,
  ANALYSIS_KINDS,
  DOCX_MEDIA_TYPE,
  PDF_MEDIA_TYPE,
  ClauseCheckRequestSchema,
} from './types.js';

// Extraction
export {
  extract,
  extractDocx,
  extractPdf,
  extractPlainText,
  classifyMediaType,
  kindFromFilename,
  kindFromName,
  previewText,
  EXTRACTORS,
  DEFAULT_PREVIEW_LENGTH,
} from './extraction/index.js';
export type { Extractor, SupportedKind, PdfText } from './extraction/index.js';

// Clause checking
export {
  checkClauses,
  checkAllClauses,
  findClauseMatches,
  phrasePattern,
  COMMERCIAL_CLAUSES,
  LEGAL_CLAUSES,
  TAXONOMIES,
} from './clauses/index.js';
export type { TaxonomyName } from './clauses/index.js';

// Clients
export { createClient, OpenAIClient, AnthropicClient, detectProvider } from './clients/index.js';
export type { LLMClient, LLMClientConfig } from './clients/index.js';

// Configuration
export {
  resolveConfig,
  loadEnvConfig,
  getApiKey,
  getConfigSummary,
  DEFAULT_CONFIG,
  ENV_VARS,
} from './config.js';
export type { AnalyzerConfigOptions, ResolvedConfig } from './config.js';

// Logging
export { AnalysisLogger } from './logger/index.js';

// Formatting
export {
  formatReport,
  formatNarrative,
  formatClauseReport,
  formatOutcome,
  failedAnalyses,
  serializeNarrative,
  serializeOutcome,
} from './format.js';
export type { FormatReportOptions, SerializedError, SerializedOutcome } from './format.js';

// HTTP API
export { createApp } from './server/app.js';
export type { AppOptions } from './server/app.js';
export { createAnalysisRouter } from './server/api.js';

// Errors
export {
  missingCredentialError,
  invalidConfigError,
  unsupportedFormatError,
  emptyExtractionError,
  remoteCallError,
  invalidRequestError,
  classifyRemoteError,
  isContractAnalyzerError,
  isErrorCode,
  wrapError,
  formatError,
  formatErrorMessage,
  httpStatusFor,
} from './utils/errors.js';
