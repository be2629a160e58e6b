/** Raised for caller mistakes: malformed uploads, missing manifest columns, bad species payloads. */
export class InputError extends Error {
  constructor(message: string, readonly details?: string[]) {
    super(message);
    this.name = 'InputError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
