import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../src/server/app.js';
import { ContractAnalyzer } from '../src/pipeline.js';
import { MockLLMClient, createSelectiveFailureMock, testConfig } from './helpers/mock-client.js';
import type { LLMClient } from '../src/clients/types.js';

function appWith(client: LLMClient = new MockLLMClient()) {
  return createApp({ analyzer: new ContractAnalyzer(testConfig(), { client }) });
}

describe('HTTP API', () => {
  it('should report health', async () => {
    const res = await request(appWith()).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });

  describe('POST /api/extract', () => {
    it('should return the text and its preview', async () => {
      const res = await request(appWith())
        .post('/api/extract')
        .set('Content-Type', 'text/plain')
        .send('Hello\nWorld');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        text: 'Hello\nWorld',
        kind: 'text',
        characterCount: 11,
        preview: 'Hello\nWorld',
      });
    });

    it('should reject an unsupported media type with 415', async () => {
      const res = await request(appWith())
        .post('/api/extract')
        .set('Content-Type', 'image/png')
        .send(Buffer.from([0x89, 0x50, 0x4e, 0x47]));

      expect(res.status).toBe(415);
      expect(res.body).toEqual({
        error: 'Unsupported file type: image/png',
        code: 'UNSUPPORTED_FORMAT',
        suggestion: 'Upload the contract as a PDF, DOCX or plain text file.',
      });
    });

    it('should reject a document without text with 422', async () => {
      const res = await request(appWith())
        .post('/api/extract')
        .set('Content-Type', 'text/plain')
        .send('  \n ');

      expect(res.status).toBe(422);
      expect(res.body.code).toBe('EMPTY_EXTRACTION');
    });
  });

  describe('POST /api/clauses', () => {
    it('should report both taxonomies', async () => {
      const res = await request(appWith())
        .post('/api/clauses')
        .send({ text: 'Our liability cap is one month of fees.' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        commercial: {
          'Payment Terms': false,
          IP: false,
          'Delivery Terms': false,
          'Warranties and Representations': false,
        },
        legal: {
          Indemnification: false,
          Termination: false,
          Confidentiality: false,
          'Limitation of Liability': true,
        },
      });
    });

    it('should list the matched phrases when asked', async () => {
      const res = await request(appWith())
        .post('/api/clauses')
        .send({ text: 'Each party shall hold harmless the other.', explain: true });

      expect(res.status).toBe(200);
      expect(res.body.legal.Indemnification).toBe(true);
      expect(res.body.matches.legal.Indemnification).toEqual(['hold harmless']);
      expect(res.body.matches.commercial.IP).toEqual([]);
    });

    it('should reject a body without text with 400', async () => {
      const res = await request(appWith()).post('/api/clauses').send({ explain: true });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('INVALID_REQUEST');
    });

    it('should reject malformed JSON with 400', async () => {
      const res = await request(appWith())
        .post('/api/clauses')
        .set('Content-Type', 'application/json')
        .send('{"text":');

      expect(res.status).toBe(400);
    });
  });

  describe('POST /api/analyze', () => {
    it('should return the full report', async () => {
      const client = new MockLLMClient();
      const res = await request(appWith(client))
        .post('/api/analyze')
        .set('Content-Type', 'text/plain')
        .send('The termination of this agreement requires notice.');

      expect(res.status).toBe(200);
      expect(res.body.extraction.kind).toBe('text');
      expect(res.body.narrative.summary).toEqual({ status: 'fulfilled', content: 'Mock response 1' });
      expect(res.body.clauses.legal.Termination).toBe(true);
      expect(client.getCallCount()).toBe(5);
    });

    it('should report a failed analysis inside a successful response', async () => {
      const res = await request(appWith(createSelectiveFailureMock(['important dates and deadlines'])))
        .post('/api/analyze')
        .set('Content-Type', 'text/plain')
        .send('Payment terms: net 30.');

      expect(res.status).toBe(200);
      expect(res.body.narrative.dates).toEqual({
        status: 'rejected',
        error: {
          code: 'REMOTE_CALL_FAILURE',
          message: 'Remote call failed for dates: 503 Service Unavailable',
          suggestion: 'The API server is experiencing issues. Please try again in a few moments.',
        },
      });
      expect(res.body.narrative.termination.status).toBe('fulfilled');
    });

    it('should not contact the service for an unsupported upload', async () => {
      const client = new MockLLMClient();
      const res = await request(appWith(client))
        .post('/api/analyze')
        .set('Content-Type', 'application/msword')
        .send(Buffer.from([0xd0, 0xcf]));

      expect(res.status).toBe(415);
      expect(client.getCallCount()).toBe(0);
    });
  });
});
