import type {
  AnalysisKind,
  ContractAnalyzerErrorCode,
  DocumentKindName,
  TokenUsage,
  TraceData,
  TraceEntry,
  TraceEntryType,
} from '../types.js';

/**
 * Logger for analysis runs.
 * Keeps an in-memory trace and echoes each event to the console when verbose.
 */
export class AnalysisLogger {
  private entries: TraceEntry[] = [];
  private verbose: boolean;

  constructor(verbose: boolean = false) {
    this.verbose = verbose;
  }

  /**
   * Log a finished text extraction.
   */
  logExtraction(kind: DocumentKindName, characterCount: number, duration: number): void {
    this.addEntry('extraction', {
      type: 'extraction',
      kind,
      characterCount,
      duration,
    });

    if (this.verbose) {
      console.log(`[analyzer] Extraction (${kind}):`, { characterCount, duration });
    }
  }

  /**
   * Log a completed remote completion call.
   */
  logRemoteCall(
    analysis: AnalysisKind,
    model: string,
    promptLength: number,
    response: string,
    usage: TokenUsage,
    duration: number
  ): void {
    this.addEntry('remote_call', {
      type: 'remote_call',
      analysis,
      model,
      promptLength,
      responseLength: response.length,
      usage,
      duration,
    });

    if (this.verbose) {
      console.log(`[analyzer] Remote call (${analysis}):`, {
        model,
        promptLength,
        responseLength: response.length,
        tokens: usage.totalTokens,
        duration,
      });
    }
  }

  /**
   * Log a clause presence check.
   */
  logClauseCheck(taxonomy: string, present: number, total: number): void {
    this.addEntry('clause_check', {
      type: 'clause_check',
      taxonomy,
      present,
      total,
    });

    if (this.verbose) {
      console.log(`[analyzer] Clause check (${taxonomy}): ${present}/${total} present`);
    }
  }

  /**
   * Log an error.
   */
  logError(code: ContractAnalyzerErrorCode, message: string, analysis?: AnalysisKind): void {
    this.addEntry('error', {
      type: 'error',
      code,
      message,
      analysis,
    });

    if (this.verbose) {
      console.error(`[analyzer] Error [${code}]${analysis ? ` (${analysis})` : ''}:`, message);
    }
  }

  private addEntry(type: TraceEntryType, data: TraceData): void {
    this.entries.push({
      type,
      timestamp: Date.now(),
      data,
    });
  }

  /**
   * Get all trace entries.
   */
  getEntries(): TraceEntry[] {
    return [...this.entries];
  }

  /**
   * Get total token usage across all remote calls.
   */
  getTotalUsage(): TokenUsage {
    let promptTokens = 0;
    let completionTokens = 0;

    for (const entry of this.entries) {
      if (entry.data.type === 'remote_call') {
        promptTokens += entry.data.usage.promptTokens;
        completionTokens += entry.data.usage.completionTokens;
      }
    }

    return {
      promptTokens,
      completionTokens,
      totalTokens: promptTokens + completionTokens,
    };
  }

  /**
   * Get the number of successful remote calls.
   */
  getCallCount(): number {
    return this.entries.filter((e) => e.data.type === 'remote_call').length;
  }

  /**
   * Clear all entries.
   */
  clear(): void {
    this.entries = [];
  }

  /**
   * Export entries as JSONL string.
   */
  toJSONL(): string {
    return this.entries.map((e) => JSON.stringify(e)).join('\n');
  }

  /**
   * Export entries as JSON.
   */
  toJSON(): string {
    return JSON.stringify(this.entries, null, 2);
  }
}
