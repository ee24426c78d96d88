/**
 * Nuclos Client
 *
 * Entry point of the library. Owns the session and the metadata cache, and
 * hands out BusinessObject instances by id or by name.
 *
 * Usage:
 * ```typescript
 * const client = NuclosClient.fromSettingsFile('nuclos.env');
 * if (!client.ok) throw client.error;
 *
 * const customer = await client.value.bo('Customer');
 * if (customer.ok) {
 *   const record = await customer.value.getOne({ where: "name = 'Test'" });
 * }
 * await client.value.logout();
 * ```
 */

import { createChildLogger } from '../core/logger.js';
import type { Result } from '../core/result.js';
import { ok, err } from '../core/result.js';
import { NotFoundError, type ConfigValidationError, type NuclosError } from '../core/errors.js';
import type { IBusinessObjectRegistry, IHttpClient } from '../core/interfaces.js';
import {
  loadSettingsFile,
  loadSettingsFromEnv,
  resolveSettings,
  type RawSettings,
} from '../core/config.js';
import { NuclosHttpClient } from '../connection/http-client.js';
import { NuclosSession } from '../connection/session.js';
import type { NuclosSettings, NuclosSettingsInput } from '../validation/schemas.js';
import type { AttributeMeta, BusinessObjectSummary } from '../types/metadata.js';
import { BusinessObject } from './business-object.js';
import { MetadataCache } from './metadata-cache.js';
import { resolveBusinessObject } from './name-resolver.js';

const log = createChildLogger({ component: 'NuclosClient' });

export interface NuclosClientOptions {
  settings: NuclosSettings;

  /** HTTP layer to use instead of node-fetch; tests pass an in-process server. */
  http?: IHttpClient;
}

export class NuclosClient implements IBusinessObjectRegistry {
  public readonly settings: NuclosSettings;
  private readonly session: NuclosSession;
  private readonly cache: MetadataCache;

  constructor(options: NuclosClientOptions) {
    this.settings = options.settings;
    this.session = new NuclosSession(options.http ?? new NuclosHttpClient(options.settings), options.settings);
    this.cache = new MetadataCache(this.session);
  }

  /**
   * Builds a client from explicit settings; missing ones take their defaults.
   */
  public static fromSettings(
    input: NuclosSettingsInput | RawSettings = {}
  ): Result<NuclosClient, ConfigValidationError> {
    const settings = resolveSettings(input);
    return settings.ok ? ok(new NuclosClient({ settings: settings.value })) : settings;
  }

  /**
   * Builds a client from a dotenv-format settings file (see default.env).
   */
  public static fromSettingsFile(filename: string): Result<NuclosClient, ConfigValidationError> {
    const settings = loadSettingsFile(filename);
    return settings.ok ? ok(new NuclosClient({ settings: settings.value })) : settings;
  }

  /**
   * Builds a client from the NUCLOS_* environment variables.
   */
  public static fromEnv(
    env: Record<string, string | undefined> = process.env
  ): Result<NuclosClient, ConfigValidationError> {
    const settings = loadSettingsFromEnv(env);
    return settings.ok ? ok(new NuclosClient({ settings: settings.value })) : settings;
  }

  // ============================================================================
  // Server
  // ============================================================================

  public version(): Promise<Result<string, NuclosError>> {
    return this.session.version();
  }

  public dbVersion(): Promise<Result<string, NuclosError>> {
    return this.session.dbVersion();
  }

  /**
   * Resolves to whether the server is at least this version.
   */
  public requireVersion(...version: number[]): Promise<Result<boolean, NuclosError>> {
    return this.session.requireVersion(...version);
  }

  // ============================================================================
  // Session
  // ============================================================================

  public get isLoggedIn(): boolean {
    return this.session.isLoggedIn;
  }

  /**
   * Logs in explicitly. Requests log in on their own when needed.
   */
  public login(): Promise<Result<void, NuclosError>> {
    return this.session.login();
  }

  public logout(): Promise<Result<void, NuclosError>> {
    return this.session.logout();
  }

  /**
   * Logs out, forgets all cached metadata and versions, and logs in again.
   */
  public async reconnect(): Promise<Result<void, NuclosError>> {
    const logout = await this.session.logout();
    this.clearCache();
    if (!logout.ok) {
      return logout;
    }
    log.info('Reconnecting');
    return this.session.login();
  }

  public clearCache(): void {
    this.cache.clear();
    this.session.clearVersionCache();
  }

  // ============================================================================
  // Business Object Registry
  // ============================================================================

  public businessObjects(): Promise<Result<readonly BusinessObjectSummary[], NuclosError>> {
    return this.cache.businessObjects();
  }

  /**
   * The business object type with exactly this meta id.
   */
  public async getBusinessObject(boMetaId: string): Promise<Result<BusinessObject, NuclosError>> {
    const meta = await this.cache.getMeta(boMetaId);
    return meta.ok ? ok(new BusinessObject(this.session, this, meta.value)) : meta;
  }

  /**
   * The business object type with this name, matched like attribute names.
   */
  public async getBusinessObjectByName(name: string): Promise<Result<BusinessObject, NuclosError>> {
    const summaries = await this.cache.businessObjects();
    if (!summaries.ok) {
      return summaries;
    }
    const summary = resolveBusinessObject(summaries.value, name);
    return summary.ok ? this.getBusinessObject(summary.value.boMetaId) : summary;
  }

  /**
   * Looks a type up by name, then by exact meta id.
   */
  public async bo(nameOrId: string): Promise<Result<BusinessObject, NuclosError>> {
    const summaries = await this.cache.businessObjects();
    if (!summaries.ok) {
      return summaries;
    }
    const byName = resolveBusinessObject(summaries.value, nameOrId);
    if (byName.ok) {
      return this.getBusinessObject(byName.value.boMetaId);
    }
    const byId = summaries.value.find((summary) => summary.boMetaId === nameOrId);
    return byId ? this.getBusinessObject(byId.boMetaId) : byName;
  }

  /**
   * The type a reference attribute points to.
   */
  public getReferencedBusinessObject(attribute: AttributeMeta): Promise<Result<BusinessObject, NuclosError>> {
    if (!attribute.isReference || !attribute.referencedBoMetaId) {
      return Promise.resolve(
        err(
          new NotFoundError('business_object', attribute.name, `Attribute ${attribute.name} is not a reference`, {
            boAttrId: attribute.boAttrId,
          })
        )
      );
    }
    return this.getBusinessObject(attribute.referencedBoMetaId);
  }
}
