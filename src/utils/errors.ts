// This module provides typed application errors that can be mapped into JSON-RPC and HTTP responses.

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// This error carries the structured failure reported by the Google Ads REST API.
export class AdsApiError extends AppError {
  public readonly upstreamStatus: string | null;
  public readonly errorCodes: string[];

  public constructor(statusCode: number, message: string, upstreamStatus: string | null, errorCodes: string[]) {
    super(statusCode, 'ads_api_error', message, { upstreamStatus, errorCodes });
    this.name = 'AdsApiError';
    this.upstreamStatus = upstreamStatus;
    this.errorCodes = errorCodes;
  }
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}
