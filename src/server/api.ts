import express, { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { ContractAnalyzer } from '../pipeline.js';
import type { ContractDocument } from '../types.js';
import { ClauseCheckRequestSchema } from '../types.js';
import { classifyMediaType } from '../extraction/index.js';
import { findClauseMatches, TAXONOMIES } from '../clauses/index.js';
import { invalidRequestError } from '../utils/errors.js';
import { serializeNarrative } from '../format.js';

/**
 * Read an uploaded document from a raw request body.
 * The Content-Type header is the declared media type.
 */
function documentFromRequest(req: Request): ContractDocument {
  const body: unknown = req.body;
  const data = Buffer.isBuffer(body) ? body : Buffer.alloc(0);
  const fileName = req.get('x-file-name');

  return {
    kind: classifyMediaType(req.get('content-type') ?? ''),
    data: new Uint8Array(data),
    name: fileName,
  };
}

/**
 * Contract analysis routes.
 */
export function createAnalysisRouter(analyzer: ContractAnalyzer, maxUploadSize: string): Router {
  const router = Router();
  const rawBody = express.raw({ type: () => true, limit: maxUploadSize });

  router.post('/extract', rawBody, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const extraction = await analyzer.extract(documentFromRequest(req));
      res.json({ ...extraction, preview: analyzer.preview(extraction.text) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/analyze', rawBody, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await analyzer.run(documentFromRequest(req));
      res.json({
        extraction: report.extraction,
        preview: report.preview,
        narrative: serializeNarrative(report.narrative),
        clauses: report.clauses,
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/clauses', express.json({ limit: maxUploadSize }), (req: Request, res: Response, next: NextFunction) => {
    const parsed = ClauseCheckRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      next(invalidRequestError(parsed.error.issues.map((issue) => issue.message).join('; ')));
      return;
    }

    const { text, explain } = parsed.data;
    const clauses = analyzer.checkClauses(text);

    if (explain) {
      res.json({
        ...clauses,
        matches: {
          commercial: findClauseMatches(text, TAXONOMIES.commercial),
          legal: findClauseMatches(text, TAXONOMIES.legal),
        },
      });
      return;
    }

    res.json(clauses);
  });

  return router;
}
