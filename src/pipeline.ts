import type {
  AnalysisResult,
  AnalyzeAllOptions,
  ClauseReports,
  ContractDocument,
  ContractReport,
  ExtractionResult,
} from './types.js';
import type { ResolvedConfig } from './config.js';
import { NarrativeAnalyzer } from './analysis/index.js';
import type { NarrativeAnalyzerOptions } from './analysis/index.js';
import { checkClauses, TAXONOMIES } from './clauses/index.js';
import { extract, previewText } from './extraction/index.js';
import { AnalysisLogger } from './logger/index.js';
import { wrapError } from './utils/errors.js';

export interface ContractAnalysis {
  narrative: AnalysisResult;
  clauses: ClauseReports;
}

/**
 * End-to-end contract analysis: extraction, the five narrative analyses and
 * both clause checks.
 *
 * @example
 * ```typescript
 * import { ContractAnalyzer, resolveConfig, classifyMediaType } from 'contract-analyzer';
 *
 * const analyzer = new ContractAnalyzer(resolveConfig());
 * const report = await analyzer.run({
 *   kind: classifyMediaType('application/pdf'),
 *   data: await readFile('msa.pdf'),
 * });
 * console.log(report.narrative.summary);
 * ```
 */
export class ContractAnalyzer {
  private narrative: NarrativeAnalyzer;
  private logger: AnalysisLogger;
  private previewLength: number;

  constructor(config: ResolvedConfig, options: NarrativeAnalyzerOptions = {}) {
    this.logger = options.logger ?? new AnalysisLogger(config.verbose);
    this.narrative = new NarrativeAnalyzer(config, { ...options, logger: this.logger });
    this.previewLength = config.previewLength;
  }

  getLogger(): AnalysisLogger {
    return this.logger;
  }

  /**
   * Extract the full text of a document.
   * Failures (UNSUPPORTED_FORMAT, EMPTY_EXTRACTION) propagate to the caller.
   */
  async extract(document: ContractDocument): Promise<ExtractionResult> {
    const startTime = Date.now();
    try {
      const result = await extract(document);
      this.logger.logExtraction(result.kind, result.characterCount, Date.now() - startTime);
      return result;
    } catch (error) {
      const wrapped = wrapError(error, 'UNSUPPORTED_FORMAT');
      this.logger.logError(wrapped.code, wrapped.message);
      throw wrapped;
    }
  }

  preview(text: string): string {
    return previewText(text, this.previewLength);
  }

  /**
   * Check the text against both built-in taxonomies.
   */
  checkClauses(text: string): ClauseReports {
    const commercial = checkClauses(text, TAXONOMIES.commercial);
    const legal = checkClauses(text, TAXONOMIES.legal);

    this.logger.logClauseCheck('commercial', countPresent(commercial), Object.keys(commercial).length);
    this.logger.logClauseCheck('legal', countPresent(legal), Object.keys(legal).length);

    return { commercial, legal };
  }

  /**
   * Run the narrative analyses and the clause checks on extracted text.
   * All results are collected before returning.
   */
  async analyze(text: string, options: AnalyzeAllOptions = {}): Promise<ContractAnalysis> {
    const narrative = await this.narrative.analyzeAll(text, options);
    const clauses = this.checkClauses(text);
    return { narrative, clauses };
  }

  /**
   * Extract, then analyze. An extraction failure stops the run; narrative
   * failures are reported per entry of the result.
   */
  async run(document: ContractDocument, options: AnalyzeAllOptions = {}): Promise<ContractReport> {
    const extraction = await this.extract(document);
    const { narrative, clauses } = await this.analyze(extraction.text, options);

    return {
      extraction,
      preview: this.preview(extraction.text),
      narrative,
      clauses,
    };
  }
}

function countPresent(report: Record<string, boolean>): number {
  return Object.values(report).filter(Boolean).length;
}
