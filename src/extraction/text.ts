import { unsupportedFormatError } from '../utils/errors.js';

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decode a plain-text document as UTF-8, verbatim.
 */
export function extractPlainText(data: Uint8Array): string {
  try {
    return decoder.decode(data);
  } catch (error) {
    throw unsupportedFormatError(
      'text is not valid UTF-8',
      error instanceof Error ? error : undefined
    );
  }
}
