// =============================================================================
// Kinstep API — HTTP errors raised by routes and services
// The global error handler turns these into the standard error envelope.
// =============================================================================

export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export function notFound(resource: string): HttpError {
  return new HttpError(404, 'NOT_FOUND', `${resource} not found`);
}
