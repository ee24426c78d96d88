/**
 * Nuclos Error Normalizer
 *
 * Maps non-2xx HTTP answers onto the client's error classes. Used at the
 * HTTP client boundary so nothing above it ever looks at a status code.
 */

import {
  AuthenticationError,
  HttpError,
  NotFoundError,
  SessionExpiredError,
  type NuclosError,
} from './errors.js';

/**
 * Error body shapes the server has been seen to send
 */
export interface NuclosErrorBody {
  message?: string;
  Message?: string;
  error?: string | { message?: string };
}

function isErrorBody(value: unknown): value is NuclosErrorBody {
  return typeof value === 'object' && value !== null;
}

/**
 * Extracts a human-readable reason from the response body, falling back to
 * the status text.
 */
export function extractReason(bodyText: string | undefined, statusText: string): string {
  const text = bodyText?.trim();
  if (!text) {
    return statusText;
  }

  try {
    const body: unknown = JSON.parse(text);
    if (isErrorBody(body)) {
      if (typeof body.message === 'string' && body.message) return body.message;
      if (typeof body.Message === 'string' && body.Message) return body.Message;
      if (typeof body.error === 'string' && body.error) return body.error;
      if (typeof body.error === 'object' && body.error !== null && body.error.message) {
        return body.error.message;
      }
    }
  } catch {
    // Not JSON: plain text bodies are the reason themselves
    return text.length > 200 ? statusText : text;
  }

  return statusText;
}

/**
 * Normalizes an HTTP failure into a NuclosError.
 *
 * @param status - HTTP status code
 * @param reason - Reason text (status text or server message)
 * @param context - Request details for debugging (method, path)
 */
export function normalizeHttpError(
  status: number,
  reason: string,
  context: Record<string, unknown> = {}
): NuclosError {
  const errorContext = { ...context, httpStatus: status, reason };

  switch (status) {
    case 401:
      return new SessionExpiredError(reason || 'Unauthorized', errorContext);
    case 403:
      return new AuthenticationError(reason || 'Insufficient permission', errorContext);
    case 404:
      return new NotFoundError(
        'resource',
        typeof context.path === 'string' ? context.path : 'unknown',
        reason || 'Resource not found',
        errorContext
      );
    default:
      return new HttpError(status, reason || `Unexpected HTTP status ${status}`, context);
  }
}
