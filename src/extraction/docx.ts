import mammoth from 'mammoth';
import { unsupportedFormatError } from '../utils/errors.js';

function typeOf(element: unknown): string | undefined {
  if (typeof element === 'object' && element !== null && 'type' in element && typeof element.type === 'string') {
    return element.type;
  }
  return undefined;
}

function childrenOf(element: unknown): unknown[] {
  if (typeof element === 'object' && element !== null && 'children' in element && Array.isArray(element.children)) {
    return element.children;
  }
  return [];
}

function valueOf(element: unknown): string {
  if (typeof element === 'object' && element !== null && 'value' in element && typeof element.value === 'string') {
    return element.value;
  }
  return '';
}

/**
 * Text of one paragraph: runs in order, line/page breaks as "\n", tabs as "\t".
 */
function paragraphText(element: unknown): string {
  switch (typeOf(element)) {
    case 'text':
      return valueOf(element);
    case 'break':
      return '\n';
    case 'tab':
      return '\t';
    default:
      return childrenOf(element).map(paragraphText).join('');
  }
}

/**
 * Paragraphs in document order, table cells included.
 */
function collectParagraphs(element: unknown, paragraphs: string[]): void {
  if (typeOf(element) === 'paragraph') {
    paragraphs.push(paragraphText(element));
    return;
  }
  for (const child of childrenOf(element)) {
    collectParagraphs(child, paragraphs);
  }
}

/**
 * Extract the text of a DOCX document, one line per paragraph.
 *
 * mammoth's raw text drops breaks inside a paragraph, so the text is read
 * from the parsed document tree instead; the HTML output is discarded.
 */
export async function extractDocx(data: Uint8Array): Promise<string> {
  const paragraphs: string[] = [];

  try {
    await mammoth.convertToHtml(
      { buffer: Buffer.from(data) },
      {
        transformDocument: <T>(document: T): T => {
          collectParagraphs(document, paragraphs);
          return document;
        },
      }
    );
  } catch (error) {
    throw unsupportedFormatError(
      'could not read the Word document',
      error instanceof Error ? error : undefined
    );
  }

  return paragraphs.join('\n');
}
