import type { LoggerMethods } from '@pdf-compliance/logger';

import type { PdfjsDocument } from '../types/pdfjs-like';

import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import { withPdfjsDocument } from '../core/pdfjs-document-loader';
import { PdfLoadError } from '../errors/pdf-load-error';
import {
  createFakeDocument,
  createFakePage,
  createTextItem,
  createTextStyle,
} from '../testing/fake-pdfjs';
import { TypographyExtractor } from './typography-extractor';

vi.mock('../core/pdfjs-document-loader', () => ({
  withPdfjsDocument: vi.fn(),
}));

const mockWithPdfjsDocument = withPdfjsDocument as Mock;

const serveDocument = (document: PdfjsDocument): void => {
  mockWithPdfjsDocument.mockImplementation(
    (_bytes: Uint8Array, task: (doc: PdfjsDocument) => Promise<unknown>) =>
      task(document),
  );
};

describe('TypographyExtractor', () => {
  const bytes = new Uint8Array([1, 2, 3]);
  let mockLogger: LoggerMethods;
  let extractor: TypographyExtractor;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    extractor = new TypographyExtractor(mockLogger);
  });

  test('rounds half-point sizes to the even neighbour', async () => {
    serveDocument(
      createFakeDocument([
        createFakePage({
          items: [
            createTextItem({ str: 'Body text', size: 10.5 }),
            createTextItem({ str: 'Heading', size: 13.5 }),
          ],
          styles: { g_d0_f1: createTextStyle('serif') },
          fonts: { g_d0_f1: { name: 'TimesNewRomanPSMT' } },
        }),
      ]),
    );

    const { value } = await extractor.extract(bytes);

    expect([...value.fontSizes].sort((a, b) => a - b)).toEqual([10, 14]);
  });

  test('collects rounded sizes and loaded font names across all pages', async () => {
    serveDocument(
      createFakeDocument([
        createFakePage({
          items: [
            createTextItem({ str: 'Technical Requirements', size: 14.4, fontName: 'g_d0_f1' }),
            createTextItem({ str: 'The system shall', size: 12, fontName: 'g_d0_f2', hasEOL: true }),
          ],
          styles: {
            g_d0_f1: createTextStyle('serif'),
            g_d0_f2: createTextStyle('serif'),
          },
          fonts: {
            g_d0_f1: { name: 'TimesNewRomanPS-BoldMT' },
            g_d0_f2: { name: 'TimesNewRomanPSMT' },
          },
        }),
        createFakePage({
          items: [createTextItem({ str: 'Budget', size: 11.6, fontName: 'g_d0_f3' })],
          styles: { g_d0_f3: createTextStyle('sans-serif') },
          fonts: { g_d0_f3: { name: 'ABCDEF+Arial-BoldMT' } },
        }),
      ]),
    );

    const { value, diagnostics } = await extractor.extract(bytes);

    expect([...value.fontSizes].sort((a, b) => a - b)).toEqual([12, 14]);
    expect(value.fontFamilies).toEqual(
      new Set(['TimesNewRomanPS-BoldMT', 'TimesNewRomanPSMT', 'ABCDEF+Arial-BoldMT']),
    );
    expect(diagnostics).toEqual([]);
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[TypographyExtractor] Found 2 font size(s) and 3 font name(s)',
    );
  });

  test('ignores whitespace-only runs and marked content', async () => {
    serveDocument(
      createFakeDocument([
        createFakePage({
          items: [
            { type: 'beginMarkedContent', tag: 'P' },
            createTextItem({ str: '   ', size: 30, fontName: 'g_d0_f1' }),
            createTextItem({ str: 'Body', size: 12, fontName: 'g_d0_f1' }),
            { type: 'endMarkedContent' },
          ],
          fonts: { g_d0_f1: { name: 'Times-Roman' } },
        }),
      ]),
    );

    const { value } = await extractor.extract(bytes);

    expect(value.fontSizes).toEqual(new Set([12]));
    expect(value.fontFamilies).toEqual(new Set(['Times-Roman']));
  });

  test('falls back to style families when the operator list fails', async () => {
    serveDocument(
      createFakeDocument([
        createFakePage({
          items: [createTextItem({ str: 'Body', fontName: 'g_d0_f1' })],
          styles: { g_d0_f1: createTextStyle('serif') },
          fonts: { g_d0_f1: { name: 'Times-Roman' } },
          operatorListError: new Error('Unknown operator'),
        }),
      ]),
    );

    const { value, diagnostics } = await extractor.extract(bytes);

    expect(value.fontFamilies).toEqual(new Set(['serif']));
    expect(diagnostics).toEqual([]);
    expect(mockLogger.debug).toHaveBeenCalledWith(
      '[TypographyExtractor] Operator list unavailable, using style families: Unknown operator',
    );
  });

  test('falls back to the style family, then to the font id', async () => {
    serveDocument(
      createFakeDocument([
        createFakePage({
          items: [
            createTextItem({ str: 'One', fontName: 'g_d0_f1' }),
            createTextItem({ str: 'Two', fontName: 'g_d0_f2' }),
            createTextItem({ str: 'Three', fontName: 'g_d0_f9' }),
          ],
          styles: {
            g_d0_f1: createTextStyle('serif'),
            g_d0_f2: createTextStyle(''),
          },
          fonts: { g_d0_f1: { name: '' } },
        }),
      ]),
    );

    const { value } = await extractor.extract(bytes);

    expect(value.fontFamilies).toEqual(new Set(['serif', 'g_d0_f2', 'g_d0_f9']));
  });

  test('skips pages that fail and keeps the others', async () => {
    serveDocument(
      createFakeDocument([
        createFakePage({
          items: [createTextItem({ str: 'Body', size: 12 })],
          fonts: { g_d0_f1: { name: 'Times-Roman' } },
        }),
        new Error('Bad XRef entry'),
        createFakePage({ textContentError: new Error('Unexpected end of stream') }),
      ]),
    );

    const { value, diagnostics } = await extractor.extract(bytes);

    expect(value.fontSizes).toEqual(new Set([12]));
    expect(value.fontFamilies).toEqual(new Set(['Times-Roman']));
    expect(diagnostics).toEqual([
      { stage: 'typography', message: 'Bad XRef entry', pageNumber: 2 },
      { stage: 'typography', message: 'Unexpected end of stream', pageNumber: 3 },
    ]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[TypographyExtractor] Skipping page 2: Bad XRef entry',
    );
  });

  test('returns empty sets when the document cannot be opened', async () => {
    mockWithPdfjsDocument.mockRejectedValue(
      new PdfLoadError('pdf.js could not open the document: Invalid PDF structure.'),
    );

    const { value, diagnostics } = await extractor.extract(bytes);

    expect(value.fontSizes.size).toBe(0);
    expect(value.fontFamilies.size).toBe(0);
    expect(diagnostics).toEqual([
      {
        stage: 'typography',
        message: 'pdf.js could not open the document: Invalid PDF structure.',
      },
    ]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[TypographyExtractor] Extraction failed: pdf.js could not open the document: Invalid PDF structure.',
    );
  });
});
