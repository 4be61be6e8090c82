export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function upstreamError(statusCode: number, statusText: string, url: string): HttpError {
  return new HttpError(statusCode, statusText || 'upstream request failed', { url });
}
