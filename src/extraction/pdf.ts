import { extractText } from 'unpdf';
import { unsupportedFormatError } from '../utils/errors.js';

export interface PdfText {
  text: string;
  pageCount: number;
}

/**
 * Extract PDF text page by page, dropping pages with no text.
 */
export async function extractPdf(data: Uint8Array): Promise<PdfText> {
  let pages: string[];
  let totalPages: number;
  try {
    // PDF.js may detach the buffer it is given, so hand it a copy
    const result = await extractText(new Uint8Array(data), { mergePages: false });
    pages = Array.isArray(result.text) ? result.text : [result.text];
    totalPages = result.totalPages;
  } catch (error) {
    throw unsupportedFormatError(
      'could not read the PDF document',
      error instanceof Error ? error : undefined
    );
  }

  return {
    text: pages.filter((page) => page.length > 0).join('\n'),
    pageCount: totalPages,
  };
}
