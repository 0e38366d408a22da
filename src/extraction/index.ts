/**
 * Document Extraction Module
 *
 * Turns an uploaded contract (DOCX, PDF or plain text) into one string.
 * Dispatch is on the closed DocumentKind union; anything unrecognized is
 * rejected with UNSUPPORTED_FORMAT, and a recognized document without text
 * with EMPTY_EXTRACTION.
 */

import { extname } from 'node:path';
import { DOCX_MEDIA_TYPE, PDF_MEDIA_TYPE } from '../types.js';
import type { ContractDocument, DocumentKind, DocumentKindName, ExtractionResult } from '../types.js';
import { emptyExtractionError, unsupportedFormatError } from '../utils/errors.js';
import { extractDocx } from './docx.js';
import { extractPdf } from './pdf.js';
import { extractPlainText } from './text.js';

export { extractDocx } from './docx.js';
export { extractPdf } from './pdf.js';
export type { PdfText } from './pdf.js';
export { extractPlainText } from './text.js';

export type SupportedKind = Exclude<DocumentKindName, 'unrecognized'>;

/**
 * Common shape of the per-kind extractors.
 */
export interface Extractor {
  extract(data: Uint8Array): Promise<{ text: string; pageCount?: number }>;
}

export const EXTRACTORS: Record<SupportedKind, Extractor> = {
  docx: {
    extract: async (data) => ({ text: await extractDocx(data) }),
  },
  pdf: {
    extract: (data) => extractPdf(data),
  },
  text: {
    extract: async (data) => ({ text: extractPlainText(data) }),
  },
};

const FILE_EXTENSIONS: Record<string, SupportedKind> = {
  '.docx': 'docx',
  '.pdf': 'pdf',
  '.txt': 'text',
  '.text': 'text',
  '.md': 'text',
};

export const DEFAULT_PREVIEW_LENGTH = 2000;

/**
 * Classify a declared media type.
 * Parameters (e.g. "; charset=utf-8") and case are ignored.
 */
export function classifyMediaType(mediaType: string): DocumentKind {
  const essence = mediaType.split(';')[0].trim().toLowerCase();

  if (essence === DOCX_MEDIA_TYPE) {
    return { type: 'docx' };
  }
  if (essence === PDF_MEDIA_TYPE) {
    return { type: 'pdf' };
  }
  if (essence.startsWith('text/')) {
    return { type: 'text' };
  }
  return { type: 'unrecognized', mediaType };
}

/**
 * Classify a file by its extension, for callers without a media type.
 */
export function kindFromFilename(filename: string): DocumentKind {
  const extension = extname(filename).toLowerCase();
  const kind = FILE_EXTENSIONS[extension];
  if (kind) {
    return { type: kind };
  }
  return { type: 'unrecognized', mediaType: extension || filename };
}

/**
 * Build a document kind from a CLI/API type name.
 */
export function kindFromName(name: string): DocumentKind {
  const lower = name.toLowerCase();
  if (lower === 'docx' || lower === 'pdf' || lower === 'text') {
    return { type: lower };
  }
  return { type: 'unrecognized', mediaType: name };
}

/**
 * Extract the full text of a document.
 *
 * @throws ContractAnalyzerError UNSUPPORTED_FORMAT for unrecognized or undecodable input
 * @throws ContractAnalyzerError EMPTY_EXTRACTION when no text could be read
 */
export async function extract(document: ContractDocument): Promise<ExtractionResult> {
  const { kind } = document;

  if (kind.type === 'unrecognized') {
    throw unsupportedFormatError(kind.mediaType || 'unknown media type');
  }

  const { text, pageCount } = await EXTRACTORS[kind.type].extract(document.data);

  if (text.trim().length === 0) {
    throw emptyExtractionError(kind.type.toUpperCase());
  }

  const result: ExtractionResult = {
    text,
    kind: kind.type,
    characterCount: text.length,
  };
  if (pageCount !== undefined) {
    result.pageCount = pageCount;
  }
  return result;
}

/**
 * Truncate text for display, marking the cut with an ellipsis.
 */
export function previewText(text: string, limit: number = DEFAULT_PREVIEW_LENGTH): string {
  if (text.length <= limit) {
    return text;
  }
  return text.slice(0, limit) + '...';
}
