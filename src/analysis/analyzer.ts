import type {
  AnalysisKind,
  AnalysisOutcome,
  AnalysisResult,
  AnalyzeAllOptions,
  CompletionOptions,
} from '../types.js';
import type { LLMClient } from '../clients/types.js';
import { createClient } from '../clients/index.js';
import type { ResolvedConfig } from '../config.js';
import { AnalysisLogger } from '../logger/index.js';
import { isContractAnalyzerError, remoteCallError } from '../utils/errors.js';
import { buildMessages } from './prompts.js';

export interface NarrativeAnalyzerOptions {
  /** Client to use instead of one built from the config */
  client?: LLMClient;
  logger?: AnalysisLogger;
  /** Default for analyzeAll when no option is passed */
  parallel?: boolean;
  completionOptions?: CompletionOptions;
}

/**
 * Runs the five narrative analyses against a completion service.
 *
 * @example
 * ```typescript
 * const analyzer = new NarrativeAnalyzer(resolveConfig());
 * const summary = await analyzer.summarize(text);
 * const all = await analyzer.analyzeAll(text, { parallel: true });
 * ```
 */
export class NarrativeAnalyzer {
  private client: LLMClient;
  private logger: AnalysisLogger;
  private parallel: boolean;
  private completionOptions: CompletionOptions;

  /**
   * The config carries an already-resolved API key, so a missing credential
   * fails in resolveConfig (or the client constructor), before any request.
   */
  constructor(config: ResolvedConfig, options: NarrativeAnalyzerOptions = {}) {
    this.client =
      options.client ??
      createClient(config.model, {
        provider: config.provider,
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        timeout: config.timeout,
      });

    this.logger = options.logger ?? new AnalysisLogger(config.verbose);
    this.parallel = options.parallel ?? config.parallel;
    this.completionOptions = options.completionOptions ?? {
      temperature: config.temperature,
      maxTokens: config.maxTokens,
    };
  }

  get model(): string {
    return this.client.model;
  }

  getLogger(): AnalysisLogger {
    return this.logger;
  }

  /**
   * Executive summary, written under a concise legal-summary persona.
   */
  summarize(text: string): Promise<string> {
    return this.run('summary', text);
  }

  /**
   * Key obligations of each party.
   */
  obligations(text: string): Promise<string> {
    return this.run('obligations', text);
  }

  /**
   * Important dates and deadlines.
   */
  importantDates(text: string): Promise<string> {
    return this.run('dates', text);
  }

  terminationClauses(text: string): Promise<string> {
    return this.run('termination', text);
  }

  confidentialityClauses(text: string): Promise<string> {
    return this.run('confidentiality', text);
  }

  /**
   * Run one analysis: one request, content returned unmodified.
   *
   * @throws ContractAnalyzerError REMOTE_CALL_FAILURE on any failure of the call
   */
  async run(kind: AnalysisKind, text: string): Promise<string> {
    const messages = buildMessages(kind, text);
    const promptLength = messages.reduce((acc, m) => acc + m.content.length, 0);
    const startTime = Date.now();

    try {
      const result = await this.client.completion(messages, this.completionOptions);
      this.logger.logRemoteCall(
        kind,
        this.client.model,
        promptLength,
        result.content,
        result.usage,
        Date.now() - startTime
      );
      return result.content;
    } catch (error) {
      const failure =
        isContractAnalyzerError(error) && error.code === 'REMOTE_CALL_FAILURE'
          ? error
          : remoteCallError(
              kind,
              error instanceof Error ? error.message : String(error),
              error instanceof Error ? error : undefined
            );
      this.logger.logError(failure.code, failure.message, kind);
      throw failure;
    }
  }

  /**
   * Run all five analyses. Each outcome is independent: a failed call is
   * reported in its own entry and never cancels the others.
   */
  async analyzeAll(text: string, options: AnalyzeAllOptions = {}): Promise<AnalysisResult> {
    const parallel = options.parallel ?? this.parallel;
    const settle = (kind: AnalysisKind) => this.settle(kind, text);

    if (parallel) {
      const [summary, obligations, dates, termination, confidentiality] = await Promise.all([
        settle('summary'),
        settle('obligations'),
        settle('dates'),
        settle('termination'),
        settle('confidentiality'),
      ]);
      return { summary, obligations, dates, termination, confidentiality };
    }

    return {
      summary: await settle('summary'),
      obligations: await settle('obligations'),
      dates: await settle('dates'),
      termination: await settle('termination'),
      confidentiality: await settle('confidentiality'),
    };
  }

  private async settle(kind: AnalysisKind, text: string): Promise<AnalysisOutcome> {
    try {
      return { status: 'fulfilled', content: await this.run(kind, text) };
    } catch (error) {
      // run() only ever throws REMOTE_CALL_FAILURE
      return {
        status: 'rejected',
        error: isContractAnalyzerError(error) ? error : remoteCallError(kind, String(error)),
      };
    }
  }
}
