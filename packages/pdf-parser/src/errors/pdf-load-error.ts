/**
 * PdfLoadError
 *
 * Thrown when a parser cannot open or read a PDF byte buffer.
 */
export class PdfLoadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PdfLoadError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create PdfLoadError from unknown error with context
   */
  static fromError(context: string, error: unknown): PdfLoadError {
    return new PdfLoadError(
      `${context}: ${PdfLoadError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
