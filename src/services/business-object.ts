/**
 * Business Object
 *
 * One business object type: creates records, loads them by id, and runs the
 * list and search queries. Rows of a list answer become records directly,
 * without a second request per row.
 *
 * Usage:
 * ```typescript
 * const orders = await client.bo('Order');
 * if (orders.ok) {
 *   const open = await orders.value.listAll({ where: "status = 'open'", limit: 50 });
 *   const first = await orders.value.searchOne('1001');
 * }
 * ```
 */

import { createChildLogger } from '../core/logger.js';
import type { Result } from '../core/result.js';
import { ok, err } from '../core/result.js';
import { NotFoundError, isNotFoundError, type NuclosError } from '../core/errors.js';
import type { IBusinessObjectRegistry, INuclosTransport } from '../core/interfaces.js';
import { Routes } from '../connection/routes.js';
import {
  BoInstanceWireSchema,
  BoListWireSchema,
  parseWire,
  type BoInstanceWire,
} from '../validation/schemas.js';
import type { AttributeMeta, BusinessObjectMeta } from '../types/metadata.js';
import { BusinessObjectRecord, type RecordContext } from './business-object-record.js';
import { resolveAttribute } from './name-resolver.js';
import {
  DEFAULT_PAGE_SIZE,
  buildListParameters,
  collectPages,
  type ListAllOptions,
  type ListOptions,
} from './query-builder.js';

const log = createChildLogger({ component: 'BusinessObject' });

export class BusinessObject {
  constructor(
    private readonly transport: INuclosTransport,
    private readonly registry: IBusinessObjectRegistry,
    public readonly meta: BusinessObjectMeta
  ) {}

  public get boMetaId(): string {
    return this.meta.boMetaId;
  }

  public get name(): string {
    return this.meta.name;
  }

  /**
   * Attribute metadata by name, with the same matching rules as records.
   */
  public attribute(name: string): Result<AttributeMeta, NuclosError> {
    return resolveAttribute(this.meta, name);
  }

  // ============================================================================
  // Records
  // ============================================================================

  /**
   * A NEW record of this type. Nothing is sent before its `save()`.
   */
  public create(): BusinessObjectRecord {
    return new BusinessObjectRecord(this.recordContext());
  }

  /**
   * Wraps a row the server already sent.
   */
  public fromInstance(instance: BoInstanceWire): BusinessObjectRecord {
    return new BusinessObjectRecord(this.recordContext(), instance);
  }

  /**
   * Wraps a list row. The record loads its full instance when first read.
   */
  public fromListRow(row: BoInstanceWire): BusinessObjectRecord {
    return new BusinessObjectRecord(this.recordContext(), row, { partial: true });
  }

  /**
   * Loads the record with this id.
   */
  public async get(boId: string): Promise<Result<BusinessObjectRecord, NuclosError>> {
    const answer = await this.transport.request(Routes.record(this.meta.boMetaId, boId));
    if (!answer.ok) {
      return isNotFoundError(answer.error)
        ? err(new NotFoundError('record', boId, undefined, { boMetaId: this.meta.boMetaId }))
        : answer;
    }
    const instance = parseWire(BoInstanceWireSchema, answer.value, 'record');
    return instance.ok ? ok(this.fromInstance(instance.value)) : instance;
  }

  // ============================================================================
  // Queries
  // ============================================================================

  /**
   * One page of records.
   */
  public list(options: ListOptions = {}): Promise<Result<BusinessObjectRecord[], NuclosError>> {
    return this.fetchPage(options);
  }

  /**
   * One page of records matching a full-text search.
   */
  public search(text: string, options: ListOptions = {}): Promise<Result<BusinessObjectRecord[], NuclosError>> {
    return this.fetchPage(options, text);
  }

  /**
   * Every record, fetched `limit` rows at a time.
   */
  public listAll(options: ListAllOptions = {}): Promise<Result<BusinessObjectRecord[], NuclosError>> {
    return collectPages(
      (offset, limit) => this.fetchPage({ ...options, offset, limit }),
      options.limit ?? DEFAULT_PAGE_SIZE,
      options.offset ?? 0
    );
  }

  /**
   * Every record matching a full-text search, fetched `limit` rows at a time.
   */
  public searchAll(
    text: string,
    options: ListAllOptions = {}
  ): Promise<Result<BusinessObjectRecord[], NuclosError>> {
    return collectPages(
      (offset, limit) => this.fetchPage({ ...options, offset, limit }, text),
      options.limit ?? DEFAULT_PAGE_SIZE,
      options.offset ?? 0
    );
  }

  /**
   * The first matching record. An empty result is a NotFoundError.
   */
  public async getOne(
    options: Omit<ListOptions, 'limit'> = {}
  ): Promise<Result<BusinessObjectRecord, NuclosError>> {
    const page = await this.fetchPage({ ...options, limit: 1 });
    return this.firstOf(page, options.where ?? '*');
  }

  /**
   * The first record matching a full-text search. An empty result is a
   * NotFoundError.
   */
  public async searchOne(
    text: string,
    options: Omit<ListOptions, 'limit'> = {}
  ): Promise<Result<BusinessObjectRecord, NuclosError>> {
    const page = await this.fetchPage({ ...options, limit: 1 }, text);
    return this.firstOf(page, text);
  }

  private firstOf(
    page: Result<BusinessObjectRecord[], NuclosError>,
    query: string
  ): Result<BusinessObjectRecord, NuclosError> {
    if (!page.ok) {
      return page;
    }
    const [first] = page.value;
    if (!first) {
      return err(
        new NotFoundError('record', query, `No ${this.meta.name} record matches '${query}'`, {
          boMetaId: this.meta.boMetaId,
        })
      );
    }
    return ok(first);
  }

  private async fetchPage(
    options: ListOptions,
    search?: string
  ): Promise<Result<BusinessObjectRecord[], NuclosError>> {
    const parameters = buildListParameters(this.meta, options, search);
    if (!parameters.ok) {
      return parameters;
    }

    log.debug({ boMetaId: this.meta.boMetaId, parameters: parameters.value }, 'Listing records');

    const answer = await this.transport.request(Routes.records(this.meta.boMetaId), {
      parameters: parameters.value,
    });
    if (!answer.ok) {
      return answer;
    }
    const page = parseWire(BoListWireSchema, answer.value, 'record list');
    if (!page.ok) {
      return page;
    }
    return ok(page.value.bos.map((row) => this.fromListRow(row)));
  }

  private recordContext(): RecordContext {
    return { transport: this.transport, registry: this.registry, meta: this.meta };
  }
}
