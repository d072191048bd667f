/**
 * Raised when a financing request is out of range. Callers at the tool
 * boundary turn it into a `success: false` result; it never reaches the agent
 * as an exception.
 */
export class FinancingValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FinancingValidationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
