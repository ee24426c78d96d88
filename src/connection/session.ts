/**
 * Nuclos Session
 *
 * Owns the session id. Logs in on the first request that needs one, and
 * when the server answers 401 it logs in again once and repeats the request.
 * Concurrent requests share a single pending login.
 *
 * The version routes need no session, so the version cache lives here too:
 * login refuses servers older than 4.3.
 */

import { createChildLogger } from '../core/logger.js';
import { ok, err, type Result } from '../core/result.js';
import {
  AuthenticationError,
  InvalidResponseError,
  SessionExpiredError,
  VersionError,
  type NuclosError,
} from '../core/errors.js';
import type { IHttpClient, INuclosTransport, RequestOptions } from '../core/interfaces.js';
import { Routes } from './routes.js';
import { LoginAnswerSchema, parseWire, type NuclosSettings } from '../validation/schemas.js';

const log = createChildLogger({ component: 'NuclosSession' });

/**
 * Oldest server release whose REST API this client speaks.
 */
export const MIN_SERVER_VERSION: readonly number[] = [4, 3];

/**
 * Parses the leading dotted number of a version string.
 *
 * "4.3.2 (2015-04-12)" → [4, 3, 2]
 */
export function parseVersion(version: string): number[] {
  const head = version.trim().split(/\s+/)[0] ?? '';
  return head
    .split('.')
    .filter((part) => part.length > 0)
    .map((part) => {
      const value = Number.parseInt(part, 10);
      return Number.isNaN(value) ? 0 : value;
    });
}

/**
 * True if `actual` is the same as or newer than `required`. Missing parts of
 * `actual` count as 0.
 */
export function isVersionAtLeast(actual: readonly number[], required: readonly number[]): boolean {
  for (let i = 0; i < required.length; i++) {
    const have = actual[i] ?? 0;
    const want = required[i] ?? 0;
    if (have > want) return true;
    if (have < want) return false;
  }
  return true;
}

export class NuclosSession implements INuclosTransport {
  private currentSessionId: string | null = null;
  private pendingLogin: Promise<Result<void, NuclosError>> | null = null;
  private cachedVersion: string | null = null;
  private cachedDbVersion: string | null = null;

  constructor(
    private readonly http: IHttpClient,
    private readonly settings: Pick<NuclosSettings, 'username' | 'password' | 'locale'>
  ) {}

  public get sessionId(): string | null {
    return this.currentSessionId;
  }

  public get isLoggedIn(): boolean {
    return this.currentSessionId !== null;
  }

  // ============================================================================
  // Server Version
  // ============================================================================

  /**
   * Server version string, fetched once.
   */
  public async version(): Promise<Result<string, NuclosError>> {
    if (this.cachedVersion !== null) {
      return ok(this.cachedVersion);
    }
    const result = await this.http.send(Routes.version, { accept: 'text' });
    if (!result.ok) {
      return result;
    }
    this.cachedVersion = result.value.trim();
    return ok(this.cachedVersion);
  }

  /**
   * Database schema version string, fetched once.
   */
  public async dbVersion(): Promise<Result<string, NuclosError>> {
    if (this.cachedDbVersion !== null) {
      return ok(this.cachedDbVersion);
    }
    const result = await this.http.send(Routes.dbVersion, { accept: 'text' });
    if (!result.ok) {
      return result;
    }
    this.cachedDbVersion = result.value.trim();
    return ok(this.cachedDbVersion);
  }

  /**
   * Resolves to whether the server is at least the given version.
   *
   * @example
   * ```ts
   * await session.requireVersion(4, 3);
   * ```
   */
  public async requireVersion(...required: number[]): Promise<Result<boolean, NuclosError>> {
    const version = await this.version();
    if (!version.ok) {
      return version;
    }
    return ok(isVersionAtLeast(parseVersion(version.value), required));
  }

  public clearVersionCache(): void {
    this.cachedVersion = null;
    this.cachedDbVersion = null;
  }

  // ============================================================================
  // Login / Logout
  // ============================================================================

  /**
   * Logs in and stores the session id. Concurrent callers share one request.
   */
  public login(): Promise<Result<void, NuclosError>> {
    if (!this.pendingLogin) {
      this.pendingLogin = this.performLogin().finally(() => {
        this.pendingLogin = null;
      });
    }
    return this.pendingLogin;
  }

  private async performLogin(): Promise<Result<void, NuclosError>> {
    const version = await this.version();
    if (!version.ok) {
      return version;
    }
    if (!isVersionAtLeast(parseVersion(version.value), MIN_SERVER_VERSION)) {
      return err(new VersionError(MIN_SERVER_VERSION.join('.'), version.value));
    }

    log.info({ username: this.settings.username }, 'Logging in');

    const answer = await this.http.send(Routes.session, {
      method: 'POST',
      accept: 'json',
      data: {
        username: this.settings.username,
        password: this.settings.password,
        locale: this.settings.locale,
      },
    });

    if (!answer.ok) {
      if (answer.error instanceof SessionExpiredError || answer.error instanceof AuthenticationError) {
        return err(
          new AuthenticationError(`Login failed for user ${this.settings.username}`, {
            reason: answer.error.message,
          })
        );
      }
      return answer;
    }

    const body = parseJsonBody(answer.value, 'login');
    if (!body.ok) {
      return body;
    }
    const parsed = parseWire(LoginAnswerSchema, body.value, 'login');
    if (!parsed.ok) {
      return err(new AuthenticationError(`Login failed for user ${this.settings.username}`));
    }

    this.currentSessionId = parsed.value.session_id;
    log.info('Logged in');
    return ok(undefined);
  }

  /**
   * Ends the session. Without a session this is a no-op.
   */
  public async logout(): Promise<Result<void, NuclosError>> {
    if (this.pendingLogin) {
      await this.pendingLogin;
    }
    const sessionId = this.currentSessionId;
    if (sessionId === null) {
      return ok(undefined);
    }

    const result = await this.http.send(Routes.session, { method: 'DELETE', accept: 'text', sessionId });
    this.currentSessionId = null;
    if (!result.ok) {
      if (result.error instanceof SessionExpiredError) {
        // The server already dropped the session
        return ok(undefined);
      }
      return result;
    }

    log.info('Logged out');
    return ok(undefined);
  }

  // ============================================================================
  // Authenticated Requests
  // ============================================================================

  public async request(path: string, options: RequestOptions = {}): Promise<Result<unknown, NuclosError>> {
    const result = await this.send(path, options, 'json', true);
    if (!result.ok) {
      return result;
    }
    return parseJsonBody(result.value, path);
  }

  public requestText(path: string, options: RequestOptions = {}): Promise<Result<string, NuclosError>> {
    return this.send(path, options, 'text', true);
  }

  private async send(
    path: string,
    options: RequestOptions,
    accept: 'json' | 'text',
    mayRelogin: boolean
  ): Promise<Result<string, NuclosError>> {
    if (this.currentSessionId === null) {
      const login = await this.login();
      if (!login.ok) {
        return login;
      }
    }

    const result = await this.http.send(path, {
      ...options,
      accept,
      sessionId: this.currentSessionId ?? undefined,
    });

    if (result.ok || !(result.error instanceof SessionExpiredError)) {
      return result;
    }

    if (!mayRelogin) {
      return err(
        new AuthenticationError('Request unauthorized after a fresh login', { path })
      );
    }

    log.info({ path }, 'Session expired, logging in again');
    this.currentSessionId = null;
    return this.send(path, options, accept, false);
  }
}

function parseJsonBody(text: string, what: string): Result<unknown, NuclosError> {
  if (text.trim() === '') {
    return ok(null);
  }
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (error) {
    return err(
      new InvalidResponseError(`Response to ${what || 'login'} is not valid JSON`, {
        path: what,
        cause: error instanceof Error ? error.message : String(error),
      })
    );
  }
}
