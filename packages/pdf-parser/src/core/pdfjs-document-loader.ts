import type { PdfjsDocument } from '../types/pdfjs-like';

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import { PDFJS_LOAD_OPTIONS } from '../config/constants';
import { PdfLoadError } from '../errors/pdf-load-error';

/**
 * Open a PDF byte buffer with pdf.js.
 *
 * The buffer is copied first: pdf.js may transfer the array it is given to its
 * worker, and callers reuse the same bytes for several extraction passes.
 *
 * @throws {PdfLoadError} When pdf.js cannot parse the buffer
 */
export async function openPdfjsDocument(
  bytes: Uint8Array,
): Promise<PdfjsDocument> {
  const loadingTask = getDocument({
    data: new Uint8Array(bytes),
    ...PDFJS_LOAD_OPTIONS,
  });

  try {
    return await loadingTask.promise;
  } catch (error) {
    await loadingTask.destroy();
    throw PdfLoadError.fromError('pdf.js could not open the document', error);
  }
}

/**
 * Run `task` against a pdf.js document and release it afterwards,
 * whether the task succeeds or not.
 */
export async function withPdfjsDocument<T>(
  bytes: Uint8Array,
  task: (document: PdfjsDocument) => Promise<T>,
): Promise<T> {
  const document = await openPdfjsDocument(bytes);
  try {
    return await task(document);
  } finally {
    await document.destroy();
  }
}
