import { describe, it, expect } from 'vitest';
import { NarrativeAnalyzer, ANALYSIS_PROMPTS, SUMMARY_PERSONA, buildMessages } from '../src/analysis/index.js';
import type { LLMClient } from '../src/clients/types.js';
import type { CompletionResult, Message } from '../src/types.js';
import { ANALYSIS_KINDS } from '../src/types.js';
import { AnalysisLogger } from '../src/logger/index.js';
import { MockLLMClient, createErrorMock, createSelectiveFailureMock, testConfig } from './helpers/mock-client.js';

const CONTRACT = 'This Agreement is entered into by Acme Corp and Globex LLC.';

/**
 * Client that records how many completions were in flight at once.
 */
class ConcurrencyProbe implements LLMClient {
  readonly provider = 'probe';
  readonly model = 'probe-model';
  inFlight = 0;
  maxInFlight = 0;

  async completion(messages: Message[]): Promise<CompletionResult> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((r) => setTimeout(r, 10));
    this.inFlight--;
    return {
      content: messages[messages.length - 1].content.length.toString(),
      usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
    };
  }
}

describe('Narrative analysis prompts', () => {
  it('should send the summary with the lawyer persona as system message', () => {
    expect(buildMessages('summary', CONTRACT)).toEqual([
      { role: 'system', content: SUMMARY_PERSONA },
      { role: 'user', content: `Provide an executive summary for the following contract: ${CONTRACT}` },
    ]);
  });

  it('should send every other analysis as a single user message', () => {
    expect(buildMessages('obligations', 'X')).toEqual([
      { role: 'user', content: 'Highlight the key obligations from the following contract: X' },
    ]);
    expect(buildMessages('dates', 'X')).toEqual([
      { role: 'user', content: 'Find all important dates and deadlines in this contract: X' },
    ]);
    expect(buildMessages('termination', 'X')).toEqual([
      { role: 'user', content: 'Highlight the termination clauses in this contract: X' },
    ]);
    expect(buildMessages('confidentiality', 'X')).toEqual([
      { role: 'user', content: 'Identify confidentiality and non-compete clauses in this contract: X' },
    ]);
  });

  it('should insert the document verbatim', () => {
    const document = '  Fee: $& and $1 {{document}}\n\n';
    const [message] = buildMessages('termination', document);

    expect(message.content).toBe(`Highlight the termination clauses in this contract: ${document}`);
  });

  it('should define one titled prompt per analysis', () => {
    expect(ANALYSIS_KINDS.map((kind) => ANALYSIS_PROMPTS[kind].title)).toEqual([
      'Executive Summary',
      'Key Obligations',
      'Important Dates / Deadlines',
      'Termination Clauses',
      'Confidentiality and Non-Compete Clauses',
    ]);
  });
});

describe('NarrativeAnalyzer', () => {
  it('should return the completion content unmodified', async () => {
    const client = new MockLLMClient([{ content: '  **Summary**\n\nBoth parties agree.\n' }]);
    const analyzer = new NarrativeAnalyzer(testConfig(), { client });

    const summary = await analyzer.summarize(CONTRACT);

    expect(summary).toBe('  **Summary**\n\nBoth parties agree.\n');
    expect(client.getCallCount()).toBe(1);
  });

  it('should issue one request per operation with the matching prompt', async () => {
    const client = new MockLLMClient();
    const analyzer = new NarrativeAnalyzer(testConfig(), { client });

    await analyzer.obligations(CONTRACT);
    await analyzer.importantDates(CONTRACT);
    await analyzer.terminationClauses(CONTRACT);
    await analyzer.confidentialityClauses(CONTRACT);

    const prompts = client.getCallHistory().map((call) => call.messages[0].content);
    expect(prompts).toEqual([
      buildMessages('obligations', CONTRACT)[0].content,
      buildMessages('dates', CONTRACT)[0].content,
      buildMessages('termination', CONTRACT)[0].content,
      buildMessages('confidentiality', CONTRACT)[0].content,
    ]);
  });

  it('should pass the configured completion options', async () => {
    const client = new MockLLMClient();
    const analyzer = new NarrativeAnalyzer(testConfig({ temperature: 0.2, maxTokens: 800 }), { client });

    await analyzer.summarize(CONTRACT);

    expect(client.getCallHistory()[0].options).toEqual({ temperature: 0.2, maxTokens: 800 });
  });

  it('should report a failed call as REMOTE_CALL_FAILURE naming the analysis', async () => {
    const cause = new Error('503 Service Unavailable');
    const analyzer = new NarrativeAnalyzer(testConfig(), { client: createErrorMock(cause) });

    const error = await analyzer.importantDates(CONTRACT).catch((e: unknown) => e);

    expect(error).toMatchObject({
      code: 'REMOTE_CALL_FAILURE',
      analysis: 'dates',
      message: 'Remote call failed for dates: 503 Service Unavailable',
      suggestion: 'The API server is experiencing issues. Please try again in a few moments.',
    });
    expect(error).toHaveProperty('cause', cause);
  });

  describe('analyzeAll', () => {
    it('should run the five analyses in order when sequential', async () => {
      const client = new MockLLMClient([
        { content: 'summary' },
        { content: 'obligations' },
        { content: 'dates' },
        { content: 'termination' },
        { content: 'confidentiality' },
      ]);
      const analyzer = new NarrativeAnalyzer(testConfig(), { client });

      const result = await analyzer.analyzeAll(CONTRACT);

      expect(result).toEqual({
        summary: { status: 'fulfilled', content: 'summary' },
        obligations: { status: 'fulfilled', content: 'obligations' },
        dates: { status: 'fulfilled', content: 'dates' },
        termination: { status: 'fulfilled', content: 'termination' },
        confidentiality: { status: 'fulfilled', content: 'confidentiality' },
      });
      expect(client.getCallHistory()[0].messages[0]).toEqual({ role: 'system', content: SUMMARY_PERSONA });
    });

    it('should keep the other results when one analysis fails', async () => {
      const client = createSelectiveFailureMock(['important dates and deadlines']);
      const analyzer = new NarrativeAnalyzer(testConfig(), { client });

      const result = await analyzer.analyzeAll(CONTRACT);

      expect(client.getCallCount()).toBe(5);
      expect(result.dates.status).toBe('rejected');
      if (result.dates.status === 'rejected') {
        expect(result.dates.error.code).toBe('REMOTE_CALL_FAILURE');
        expect(result.dates.error.analysis).toBe('dates');
      }
      for (const kind of ['summary', 'obligations', 'termination', 'confidentiality'] as const) {
        expect(result[kind].status).toBe('fulfilled');
      }
    });

    it('should report every analysis as failed when the service is down', async () => {
      const analyzer = new NarrativeAnalyzer(testConfig(), {
        client: createErrorMock(new Error('connect ECONNREFUSED')),
      });

      const result = await analyzer.analyzeAll(CONTRACT);

      expect(ANALYSIS_KINDS.map((kind) => result[kind].status)).toEqual([
        'rejected',
        'rejected',
        'rejected',
        'rejected',
        'rejected',
      ]);
    });

    it('should never have two requests in flight when sequential', async () => {
      const client = new ConcurrencyProbe();
      const analyzer = new NarrativeAnalyzer(testConfig(), { client });

      await analyzer.analyzeAll(CONTRACT, { parallel: false });

      expect(client.maxInFlight).toBe(1);
    });

    it('should issue all five requests at once when parallel', async () => {
      const client = new ConcurrencyProbe();
      const analyzer = new NarrativeAnalyzer(testConfig(), { client });

      const result = await analyzer.analyzeAll(CONTRACT, { parallel: true });

      expect(client.maxInFlight).toBe(5);
      expect(result.summary).toEqual({
        status: 'fulfilled',
        content: buildMessages('summary', CONTRACT)[1].content.length.toString(),
      });
    });

    it('should fall back to the configured mode', async () => {
      const client = new ConcurrencyProbe();
      const analyzer = new NarrativeAnalyzer(testConfig({ parallel: true }), { client });

      await analyzer.analyzeAll(CONTRACT);

      expect(client.maxInFlight).toBe(5);
    });

    it('should log each call and each failure', async () => {
      const logger = new AnalysisLogger();
      const client = createSelectiveFailureMock(['termination clauses']);
      const analyzer = new NarrativeAnalyzer(testConfig(), { client, logger });

      await analyzer.analyzeAll(CONTRACT);

      expect(logger.getCallCount()).toBe(4);
      expect(logger.getTotalUsage()).toEqual({ promptTokens: 400, completionTokens: 200, totalTokens: 600 });
      const errors = logger.getEntries().filter((entry) => entry.type === 'error');
      expect(errors).toHaveLength(1);
      expect(errors[0].data).toMatchObject({ code: 'REMOTE_CALL_FAILURE', analysis: 'termination' });
    });
  });
});
