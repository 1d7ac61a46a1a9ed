/**
 * A structural PDF parser that can open a byte buffer and count its pages.
 *
 * Strategies are tried in order by the DocumentValidityChecker; a strategy
 * signals failure by throwing or by reporting zero pages.
 */
export interface PdfParserStrategy {
  /** Name used in logs and validity reports */
  readonly name: string;

  /**
   * @returns Number of pages in the document
   * @throws When the buffer cannot be parsed
   */
  countPages(bytes: Uint8Array): Promise<number>;
}
