/**
 * Nuclos HTTP Client
 *
 * Thin node-fetch wrapper around the REST root of one server instance:
 * `{protocol}://{host}:{port}/{instance}/rest/{path}`.
 *
 * Usage:
 * ```ts
 * const http = new NuclosHttpClient(settings);
 * const version = await http.send('version', { accept: 'text' });
 * ```
 *
 * Session handling lives in NuclosSession; this class only attaches the
 * `sessionid` header it is given.
 */

import fetch from 'node-fetch';
import { createChildLogger } from '../core/logger.js';
import { ok, err, type Result } from '../core/result.js';
import { TimeoutError, TransportError, type NuclosError } from '../core/errors.js';
import { extractReason, normalizeHttpError } from '../core/error-normalizer.js';
import type { HttpMethod, HttpRequestOptions, IHttpClient, QueryParameters } from '../core/interfaces.js';
import type { NuclosSettings } from '../validation/schemas.js';

const log = createChildLogger({ component: 'NuclosHttpClient' });

export class NuclosHttpClient implements IHttpClient {
  private readonly restRoot: string;
  private readonly timeoutMs: number;

  constructor(settings: Pick<NuclosSettings, 'protocol' | 'host' | 'port' | 'instance' | 'timeoutMs'>) {
    this.restRoot = `${settings.protocol}://${settings.host}:${settings.port}/${settings.instance}/rest/`;
    this.timeoutMs = settings.timeoutMs;
  }

  /**
   * Builds the full URL for a REST path. Undefined parameters are skipped.
   */
  public buildUrl(path: string, parameters?: QueryParameters): string {
    const url = this.restRoot + path.replace(/^\/+/, '');
    if (!parameters) {
      return url;
    }

    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(parameters)) {
      if (value !== undefined) {
        query.append(key, String(value));
      }
    }
    const queryString = query.toString();
    return queryString ? `${url}?${queryString}` : url;
  }

  public async send(path: string, options: HttpRequestOptions): Promise<Result<string, NuclosError>> {
    const method: HttpMethod = options.method ?? (options.data !== undefined ? 'POST' : 'GET');
    const url = this.buildUrl(path, options.parameters);

    if (options.data !== undefined && method !== 'POST' && method !== 'PUT') {
      log.warn({ method, path }, 'Request body is ignored for this method');
    }

    const headers: Record<string, string> = {
      Accept: options.accept === 'json' ? 'application/json' : 'text/plain',
    };
    let body: string | undefined;
    if (options.data !== undefined && (method === 'POST' || method === 'PUT')) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.data);
    }
    if (options.sessionId) {
      headers.sessionid = options.sessionId;
    }

    log.debug({ method, url, data: options.data }, 'Sending request');

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method,
        headers,
        body,
        signal: controller.signal,
      });
      const text = await response.text();

      log.debug({ method, path, status: response.status }, 'Received response');

      if (!response.ok) {
        log.error({ method, path, status: response.status }, 'Request failed');
        return err(
          normalizeHttpError(response.status, extractReason(text, response.statusText), {
            method,
            path,
          })
        );
      }

      return ok(text);
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return err(
          new TimeoutError(`Request timed out after ${this.timeoutMs}ms`, {
            method,
            path,
            timeoutMs: this.timeoutMs,
          })
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      log.error({ method, path, error: message }, 'Request failed');
      return err(new TransportError(`Request to ${path || '/'} failed: ${message}`, { method, path }));
    } finally {
      clearTimeout(timer);
    }
  }
}
