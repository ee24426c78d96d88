/**
 * Error Hierarchy for the Nuclos REST client
 *
 * Every failure the client can report is one of these classes. Callers
 * distinguish them by class (or by the stable `code`), never by message text.
 */

// ============================================================================
// Base Error Class
// ============================================================================

export abstract class NuclosError extends Error {
  public readonly name: string;
  public readonly code: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  protected constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  public toString(): string {
    const contextStr = this.context
      ? ` | Context: ${JSON.stringify(this.context)}`
      : '';
    return `[${this.code}] ${this.name}: ${this.message}${contextStr}`;
  }
}

// ============================================================================
// Session Errors
// ============================================================================

/**
 * Login rejected, or the server refused the request for lack of permission.
 */
export class AuthenticationError extends NuclosError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NUCLOS_AUTH_ERROR', { ...context, subtype: 'authentication' });
  }
}

/**
 * The server answered 401 for a request that carried a session id.
 * The session layer consumes this error and logs in again once.
 */
export class SessionExpiredError extends NuclosError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NUCLOS_SESSION_EXPIRED', { ...context, subtype: 'session_expired' });
  }
}

export class VersionError extends NuclosError {
  public readonly requiredVersion: string;
  public readonly serverVersion?: string;

  public constructor(
    requiredVersion: string,
    serverVersion?: string,
    message?: string,
    context?: Record<string, unknown>
  ) {
    super(
      message ?? `Server version ${serverVersion ?? 'unknown'} is older than the required ${requiredVersion}`,
      'NUCLOS_VERSION_ERROR',
      { ...context, requiredVersion, serverVersion }
    );
    this.requiredVersion = requiredVersion;
    this.serverVersion = serverVersion;
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

/**
 * Any non-2xx answer that no more specific class covers.
 */
export class HttpError extends NuclosError {
  public readonly status: number;
  public readonly reason: string;

  public constructor(
    status: number,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(`HTTP ${status}: ${reason}`, 'NUCLOS_HTTP_ERROR', { ...context, status, reason });
    this.status = status;
    this.reason = reason;
  }
}

export class TransportError extends NuclosError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NUCLOS_TRANSPORT_ERROR', { ...context, subtype: 'network' });
  }
}

export class TimeoutError extends NuclosError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NUCLOS_TIMEOUT', { ...context, subtype: 'timeout' });
  }
}

export class InvalidResponseError extends NuclosError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NUCLOS_INVALID_RESPONSE', { ...context, subtype: 'invalid_response' });
  }
}

// ============================================================================
// Lookup and State Errors
// ============================================================================

export type NotFoundSubject =
  | 'business_object'
  | 'attribute'
  | 'dependency'
  | 'field'
  | 'record'
  | 'state'
  | 'process'
  | 'resource';

export class NotFoundError extends NuclosError {
  public readonly subject: NotFoundSubject;
  public readonly key: string;

  public constructor(
    subject: NotFoundSubject,
    key: string,
    message?: string,
    context?: Record<string, unknown>
  ) {
    super(
      message ?? `Unknown ${subject.replace('_', ' ')} '${key}'`,
      'NUCLOS_NOT_FOUND',
      { ...context, subject, key }
    );
    this.subject = subject;
    this.key = key;
  }
}

export class IllegalStateError extends NuclosError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NUCLOS_ILLEGAL_STATE', context);
  }
}

export class PermissionDeniedError extends NuclosError {
  public readonly resource: string;
  public readonly action: 'insert' | 'update' | 'delete';

  public constructor(
    resource: string,
    action: 'insert' | 'update' | 'delete',
    message?: string,
    context?: Record<string, unknown>
  ) {
    super(
      message ?? `${action[0]?.toUpperCase()}${action.slice(1)} of business object ${resource} not allowed`,
      'NUCLOS_PERMISSION_DENIED',
      { ...context, resource, action }
    );
    this.resource = resource;
    this.action = action;
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

/**
 * Invalid assignment: unwritable attribute, wrong value type, or null
 * for a non-nullable attribute.
 */
export class ValidationError extends NuclosError {
  public readonly field?: string;
  public readonly validationErrors?: readonly string[];

  public constructor(
    message: string,
    field?: string,
    validationErrors?: readonly string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'NUCLOS_VALIDATION_ERROR', {
      ...context,
      field,
      validationErrors,
    });
    this.field = field;
    this.validationErrors = validationErrors;
  }
}

export class ConfigValidationError extends NuclosError {
  public readonly field?: string;

  public constructor(
    message: string,
    field?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'NUCLOS_CONFIG_ERROR', { ...context, field, subtype: 'config' });
    this.field = field;
  }
}

// ============================================================================
// Error Type Guards
// ============================================================================

export function isNuclosError(error: unknown): error is NuclosError {
  return error instanceof NuclosError;
}

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isIllegalStateError(error: unknown): error is IllegalStateError {
  return error instanceof IllegalStateError;
}

/**
 * Wraps anything thrown into a NuclosError so it can travel in a Result.
 */
export function toNuclosError(error: unknown, context?: Record<string, unknown>): NuclosError {
  if (error instanceof NuclosError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(message, { ...context, cause: error instanceof Error ? error.name : typeof error });
}
