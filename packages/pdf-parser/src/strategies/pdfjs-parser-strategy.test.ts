import type { PdfjsDocument } from '../types/pdfjs-like';

import { type Mock, describe, expect, test, vi } from 'vitest';

import { withPdfjsDocument } from '../core/pdfjs-document-loader';
import { PdfLoadError } from '../errors/pdf-load-error';
import { createFakeDocument, createFakePage } from '../testing/fake-pdfjs';
import { PdfjsParserStrategy } from './pdfjs-parser-strategy';

vi.mock('../core/pdfjs-document-loader', () => ({
  withPdfjsDocument: vi.fn(),
}));

const mockWithPdfjsDocument = withPdfjsDocument as Mock;

describe('PdfjsParserStrategy', () => {
  const bytes = new Uint8Array([1, 2, 3]);

  test('is named after pdf.js', () => {
    expect(new PdfjsParserStrategy().name).toBe('pdf.js');
  });

  test('reports the page count of the opened document', async () => {
    const document = createFakeDocument([createFakePage(), createFakePage()]);
    mockWithPdfjsDocument.mockImplementation(
      (_bytes: Uint8Array, task: (doc: PdfjsDocument) => Promise<unknown>) =>
        task(document),
    );

    await expect(new PdfjsParserStrategy().countPages(bytes)).resolves.toBe(2);
    expect(mockWithPdfjsDocument).toHaveBeenCalledWith(bytes, expect.any(Function));
  });

  test('propagates load errors', async () => {
    mockWithPdfjsDocument.mockRejectedValue(
      new PdfLoadError('pdf.js could not open the document: Invalid PDF structure.'),
    );

    await expect(new PdfjsParserStrategy().countPages(bytes)).rejects.toBeInstanceOf(
      PdfLoadError,
    );
  });
});
