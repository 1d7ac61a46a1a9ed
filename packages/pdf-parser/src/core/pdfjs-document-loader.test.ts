import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import { PdfLoadError } from '../errors/pdf-load-error';
import { createFakeDocument, createFakePage } from '../testing/fake-pdfjs';
import { openPdfjsDocument, withPdfjsDocument } from './pdfjs-document-loader';

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({
  getDocument: vi.fn(),
}));

const mockGetDocument = getDocument as Mock;

describe('pdfjs-document-loader', () => {
  const bytes = new Uint8Array([0x25, 0x50, 0x44, 0x46]);
  let loadingTaskDestroy: Mock;

  beforeEach(() => {
    loadingTaskDestroy = vi.fn().mockResolvedValue(undefined);
  });

  describe('openPdfjsDocument', () => {
    test('passes a copy of the bytes with the load options', async () => {
      const document = createFakeDocument([createFakePage()]);
      mockGetDocument.mockReturnValue({
        promise: Promise.resolve(document),
        destroy: loadingTaskDestroy,
      });

      const result = await openPdfjsDocument(bytes);

      expect(result).toBe(document);
      const [params] = mockGetDocument.mock.calls[0];
      expect(params.data).toEqual(bytes);
      expect(params.data).not.toBe(bytes);
      expect(params).toMatchObject({
        verbosity: 0,
        isEvalSupported: false,
        disableFontFace: true,
        useSystemFonts: false,
      });
    });

    test('wraps pdf.js failures in PdfLoadError and releases the task', async () => {
      mockGetDocument.mockReturnValue({
        promise: Promise.reject(new Error('Invalid PDF structure.')),
        destroy: loadingTaskDestroy,
      });

      const opening = openPdfjsDocument(bytes);

      await expect(opening).rejects.toBeInstanceOf(PdfLoadError);
      await expect(opening).rejects.toThrow(
        'pdf.js could not open the document: Invalid PDF structure.',
      );
      expect(loadingTaskDestroy).toHaveBeenCalledTimes(1);
    });
  });

  describe('withPdfjsDocument', () => {
    test('returns the task result and destroys the document', async () => {
      const document = createFakeDocument([createFakePage(), createFakePage()]);
      const destroySpy = vi.spyOn(document, 'destroy');
      mockGetDocument.mockReturnValue({
        promise: Promise.resolve(document),
        destroy: loadingTaskDestroy,
      });

      const pageCount = await withPdfjsDocument(bytes, async (doc) => doc.numPages);

      expect(pageCount).toBe(2);
      expect(destroySpy).toHaveBeenCalledTimes(1);
    });

    test('destroys the document when the task throws', async () => {
      const document = createFakeDocument([createFakePage()]);
      const destroySpy = vi.spyOn(document, 'destroy');
      mockGetDocument.mockReturnValue({
        promise: Promise.resolve(document),
        destroy: loadingTaskDestroy,
      });

      await expect(
        withPdfjsDocument(bytes, async () => {
          throw new Error('task failed');
        }),
      ).rejects.toThrow('task failed');
      expect(destroySpy).toHaveBeenCalledTimes(1);
    });
  });
});
