/**
 * Core Abstractions
 *
 * The services depend on these interfaces, not on the HTTP classes, so tests
 * can run them against an in-process fake server.
 */

import type { Result } from './result.js';
import type { NuclosError } from './errors.js';
import type { BusinessObject } from '../services/business-object.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParameters = Readonly<Record<string, string | number | undefined>>;

export interface RequestOptions {
  /** Defaults to POST when `data` is given, GET otherwise. */
  method?: HttpMethod;
  parameters?: QueryParameters;
  data?: unknown;
}

// ============================================================================
// Transport Layer
// ============================================================================

export interface HttpRequestOptions extends RequestOptions {
  sessionId?: string;
  /** Value of the Accept header; JSON unless the route answers with text. */
  accept: 'json' | 'text';
}

/**
 * Raw HTTP access to the REST root of one server. No session handling.
 */
export interface IHttpClient {
  /**
   * Sends a request and resolves to the response body text for 2xx answers.
   */
  send(path: string, options: HttpRequestOptions): Promise<Result<string, NuclosError>>;

  buildUrl(path: string, parameters?: QueryParameters): string;
}

/**
 * Authenticated access to the REST API. Logs in on first use and once more
 * when the session expires.
 */
export interface INuclosTransport {
  /**
   * Sends a request and parses the JSON answer. An empty body yields `null`.
   */
  request(path: string, options?: RequestOptions): Promise<Result<unknown, NuclosError>>;

  /**
   * Sends a request whose answer is plain text (or empty).
   */
  requestText(path: string, options?: RequestOptions): Promise<Result<string, NuclosError>>;
}

// ============================================================================
// Registry Layer
// ============================================================================

/**
 * Lookup of business object types by meta id. Records use it to follow
 * reference attributes and sub-forms into other types.
 */
export interface IBusinessObjectRegistry {
  getBusinessObject(boMetaId: string): Promise<Result<BusinessObject, NuclosError>>;
}
