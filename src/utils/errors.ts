import { ContractAnalyzerError } from '../types.js';
import type { AnalysisKind, ContractAnalyzerErrorCode } from '../types.js';

export { ContractAnalyzerError } from '../types.js';

/**
 * User-friendly error suggestions for common issues.
 */
const ERROR_SUGGESTIONS: Record<ContractAnalyzerErrorCode, string> = {
  MISSING_CREDENTIAL:
    'Set OPENAI_API_KEY (or ANTHROPIC_API_KEY for Claude models) in your environment or .env file.',
  INVALID_CONFIG: 'Check your configuration options for typos or invalid values.',
  UNSUPPORTED_FORMAT: 'Upload the contract as a PDF, DOCX or plain text file.',
  EMPTY_EXTRACTION:
    'The document contains no extractable text. Scanned or image-only files need OCR before analysis.',
  REMOTE_CALL_FAILURE:
    'Check your API key and network connection. If the issue persists, try again later.',
  INVALID_REQUEST: 'Check the request body against the API documentation.',
};

/**
 * Format an error with user-friendly message and suggestion.
 */
export function formatErrorMessage(code: ContractAnalyzerErrorCode, message: string): string {
  const suggestion = ERROR_SUGGESTIONS[code];
  return suggestion ? `${message}\n\nSuggestion: ${suggestion}` : message;
}

/**
 * Create an error for a missing API credential.
 */
export function missingCredentialError(provider: 'openai' | 'anthropic', envVar: string): ContractAnalyzerError {
  const url =
    provider === 'openai'
      ? 'https://platform.openai.com/api-keys'
      : 'https://console.anthropic.com/';

  const error = new ContractAnalyzerError(`Missing ${provider} API key`, 'MISSING_CREDENTIAL');
  error.suggestion =
    `Set the ${envVar} environment variable (or add it to .env). ` +
    `You can get an API key from ${url}`;
  return error;
}

/**
 * Create an invalid configuration error.
 */
export function invalidConfigError(message: string): ContractAnalyzerError {
  const error = new ContractAnalyzerError(`Invalid configuration: ${message}`, 'INVALID_CONFIG');
  error.suggestion = ERROR_SUGGESTIONS.INVALID_CONFIG;
  return error;
}

/**
 * Create an unsupported format error.
 */
export function unsupportedFormatError(detail: string, cause?: Error): ContractAnalyzerError {
  const error = new ContractAnalyzerError(`Unsupported file type: ${detail}`, 'UNSUPPORTED_FORMAT', cause);
  error.suggestion = ERROR_SUGGESTIONS.UNSUPPORTED_FORMAT;
  return error;
}

/**
 * Create an error for a recognized document that yielded no text.
 */
export function emptyExtractionError(kind: string): ContractAnalyzerError {
  const error = new ContractAnalyzerError(
    `Unable to extract text from ${kind} document`,
    'EMPTY_EXTRACTION'
  );
  error.suggestion = ERROR_SUGGESTIONS.EMPTY_EXTRACTION;
  return error;
}

/**
 * Create a remote completion failure for one narrative analysis.
 */
export function remoteCallError(
  analysis: AnalysisKind,
  message: string,
  cause?: Error
): ContractAnalyzerError {
  const error = new ContractAnalyzerError(
    `Remote call failed for ${analysis}: ${message}`,
    'REMOTE_CALL_FAILURE',
    cause
  );
  error.analysis = analysis;
  error.suggestion = classifyRemoteError(message);
  return error;
}

/**
 * Create an invalid request error.
 */
export function invalidRequestError(message: string): ContractAnalyzerError {
  const error = new ContractAnalyzerError(`Invalid request: ${message}`, 'INVALID_REQUEST');
  error.suggestion = ERROR_SUGGESTIONS.INVALID_REQUEST;
  return error;
}

/**
 * Classify a remote error and provide specific suggestions.
 */
export function classifyRemoteError(message: string): string {
  const lower = message.toLowerCase();

  if (lower.includes('rate limit') || lower.includes('too many requests') || lower.includes('429')) {
    return 'You are being rate limited. Wait a moment, then run the analysis again.';
  }

  if (
    lower.includes('unauthorized') ||
    lower.includes('invalid api key') ||
    lower.includes('incorrect api key') ||
    lower.includes('401')
  ) {
    return 'Your API key is invalid. Check that OPENAI_API_KEY or ANTHROPIC_API_KEY is set correctly.';
  }

  if (lower.includes('insufficient') || lower.includes('quota') || lower.includes('billing')) {
    return "Your API account may have insufficient credits. Check your billing status at the provider's dashboard.";
  }

  if (
    lower.includes('context length') ||
    lower.includes('maximum context') ||
    lower.includes('too long')
  ) {
    return 'The contract is too long for this model. Try a model with a larger context window.';
  }

  if (lower.includes('timeout') || lower.includes('timed out')) {
    return 'The API request timed out. Increase CONTRACT_ANALYZER_TIMEOUT or try again.';
  }

  if (
    lower.includes('500') ||
    lower.includes('502') ||
    lower.includes('503') ||
    lower.includes('server error')
  ) {
    return 'The API server is experiencing issues. Please try again in a few moments.';
  }

  if (lower.includes('network') || lower.includes('connection') || lower.includes('enotfound')) {
    return 'Network error - check your internet connection and firewall settings.';
  }

  return ERROR_SUGGESTIONS.REMOTE_CALL_FAILURE;
}

/**
 * Check if an error is a ContractAnalyzerError.
 */
export function isContractAnalyzerError(error: unknown): error is ContractAnalyzerError {
  return error instanceof ContractAnalyzerError;
}

/**
 * Check if an error is of a specific type.
 */
export function isErrorCode(error: unknown, code: ContractAnalyzerErrorCode): boolean {
  return isContractAnalyzerError(error) && error.code === code;
}

/**
 * Wrap an unknown error as a ContractAnalyzerError.
 */
export function wrapError(
  error: unknown,
  defaultCode: ContractAnalyzerErrorCode = 'REMOTE_CALL_FAILURE'
): ContractAnalyzerError {
  if (isContractAnalyzerError(error)) {
    return error;
  }

  if (error instanceof Error) {
    const wrapped = new ContractAnalyzerError(error.message, defaultCode, error);
    wrapped.suggestion = ERROR_SUGGESTIONS[defaultCode];
    return wrapped;
  }

  const wrapped = new ContractAnalyzerError(String(error), defaultCode);
  wrapped.suggestion = ERROR_SUGGESTIONS[defaultCode];
  return wrapped;
}

/**
 * Format an error for display to the user.
 */
export function formatError(error: unknown): string {
  if (isContractAnalyzerError(error)) {
    const lines = [`Error [${error.code}]: ${error.message}`];

    if (error.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${error.suggestion}`);
    }

    if (error.cause) {
      lines.push('');
      lines.push(`Caused by: ${error.cause.message}`);
    }

    return lines.join('\n');
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * HTTP status for an error surfaced through the API.
 */
export function httpStatusFor(error: ContractAnalyzerError): number {
  switch (error.code) {
    case 'INVALID_REQUEST':
      return 400;
    case 'UNSUPPORTED_FORMAT':
      return 415;
    case 'EMPTY_EXTRACTION':
      return 422;
    case 'REMOTE_CALL_FAILURE':
      return 502;
    default:
      return 500;
  }
}
