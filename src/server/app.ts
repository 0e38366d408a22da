import express from 'express';
import cors from 'cors';
import type { NextFunction, Request, Response } from 'express';
import type { ContractAnalyzer } from '../pipeline.js';
import { createAnalysisRouter } from './api.js';
import { formatError, httpStatusFor, isContractAnalyzerError } from '../utils/errors.js';

export interface AppOptions {
  analyzer: ContractAnalyzer;
  /** Upload size limit, in body-parser notation (default: '10mb') */
  maxUploadSize?: string;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Build the HTTP application around an analyzer.
 */
export function createApp(options: AppOptions): express.Express {
  const app = express();

  app.use(cors());

  app.get('/', (_req, res) => {
    res.json({
      name: 'Contract Analyzer',
      endpoints: [
        'GET /health',
        'POST /api/extract',
        'POST /api/analyze',
        'POST /api/clauses',
      ],
    });
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api', createAnalysisRouter(options.analyzer, options.maxUploadSize ?? '10mb'));

  // Errors reach the client as readable JSON; nothing is dropped
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isContractAnalyzerError(error)) {
      res.status(httpStatusFor(error)).json({
        error: error.message,
        code: error.code,
        suggestion: error.suggestion,
      });
      return;
    }

    const status = statusOf(error) ?? 500;
    if (status >= 500) {
      console.error('[analyzer] Unhandled error:', formatError(error));
    }
    res.status(status).json({ error: formatError(error) });
  });

  return app;
}
