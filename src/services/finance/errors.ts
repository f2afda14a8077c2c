/**
 * Raised by the analysis functions when the input is well-formed
 * but cannot be analyzed (e.g. a portfolio whose holdings sum to zero).
 */
export class AnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AnalysisError';
  }
}
