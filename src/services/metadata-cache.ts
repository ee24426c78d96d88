/**
 * Metadata Cache
 *
 * Holds the business object list and the metadata of every type fetched so
 * far. Entries never expire; `clear()` (called on reconnect) drops them all,
 * and fetches still in flight at that point no longer fill the cache.
 *
 * Concurrent lookups of the same type share one request:
 * ```typescript
 * const [a, b] = await Promise.all([cache.getMeta('example_Order'), cache.getMeta('example_Order')]);
 * // one GET bo_metas/example_Order
 * ```
 */

import { createChildLogger } from '../core/logger.js';
import type { Result } from '../core/result.js';
import { ok, err } from '../core/result.js';
import { NotFoundError, isNotFoundError, type NuclosError } from '../core/errors.js';
import type { INuclosTransport } from '../core/interfaces.js';
import { Routes } from '../connection/routes.js';
import { parseBusinessObjectList, parseBusinessObjectMeta } from '../parsers/meta-parser.js';
import type { BusinessObjectMeta, BusinessObjectSummary } from '../types/metadata.js';

const log = createChildLogger({ component: 'MetadataCache' });

export interface MetadataCacheStats {
  /** Lookups answered from the cache */
  hits: number;

  /** Lookups that went to the server */
  misses: number;

  /** Business object types with cached metadata */
  size: number;
}

export class MetadataCache {
  private registry: readonly BusinessObjectSummary[] | null = null;
  private pendingRegistry: Promise<Result<readonly BusinessObjectSummary[], NuclosError>> | null = null;
  private readonly metas = new Map<string, BusinessObjectMeta>();
  private readonly pendingMetas = new Map<string, Promise<Result<BusinessObjectMeta, NuclosError>>>();
  private hits = 0;
  private misses = 0;
  /** Bumped by `clear()`; a fetch started under an older value is stale. */
  private generation = 0;

  constructor(private readonly transport: INuclosTransport) {}

  /**
   * All business object types the logged-in user can see.
   */
  public businessObjects(): Promise<Result<readonly BusinessObjectSummary[], NuclosError>> {
    if (this.registry) {
      this.hits++;
      return Promise.resolve(ok(this.registry));
    }
    if (!this.pendingRegistry) {
      this.misses++;
      const request = this.fetchRegistry(this.generation).finally(() => {
        if (this.pendingRegistry === request) {
          this.pendingRegistry = null;
        }
      });
      this.pendingRegistry = request;
    }
    return this.pendingRegistry;
  }

  /**
   * Metadata of one type. A type the server does not know is a NotFoundError.
   */
  public getMeta(boMetaId: string): Promise<Result<BusinessObjectMeta, NuclosError>> {
    const cached = this.metas.get(boMetaId);
    if (cached) {
      this.hits++;
      return Promise.resolve(ok(cached));
    }

    const pending = this.pendingMetas.get(boMetaId);
    if (pending) {
      return pending;
    }

    this.misses++;
    const request = this.fetchMeta(boMetaId, this.generation).finally(() => {
      if (this.pendingMetas.get(boMetaId) === request) {
        this.pendingMetas.delete(boMetaId);
      }
    });
    this.pendingMetas.set(boMetaId, request);
    return request;
  }

  public clear(): void {
    this.generation++;
    this.registry = null;
    this.pendingRegistry = null;
    this.metas.clear();
    this.pendingMetas.clear();
    this.hits = 0;
    this.misses = 0;
    log.debug('Metadata cache cleared');
  }

  public getStats(): MetadataCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.metas.size };
  }

  private async fetchRegistry(generation: number): Promise<Result<readonly BusinessObjectSummary[], NuclosError>> {
    const answer = await this.transport.request(Routes.businessObjects);
    if (!answer.ok) {
      return answer;
    }
    const parsed = parseBusinessObjectList(answer.value);
    if (!parsed.ok) {
      return parsed;
    }
    const registry = Object.freeze(parsed.value);
    if (generation === this.generation) {
      this.registry = registry;
    }
    log.debug({ count: registry.length }, 'Loaded business object list');
    return ok(registry);
  }

  private async fetchMeta(boMetaId: string, generation: number): Promise<Result<BusinessObjectMeta, NuclosError>> {
    const answer = await this.transport.request(Routes.businessObjectMeta(boMetaId));
    if (!answer.ok) {
      return isNotFoundError(answer.error)
        ? err(new NotFoundError('business_object', boMetaId))
        : answer;
    }
    const parsed = parseBusinessObjectMeta(answer.value);
    if (!parsed.ok) {
      return parsed;
    }
    if (generation === this.generation) {
      this.metas.set(boMetaId, parsed.value);
    }
    log.debug({ boMetaId, attributes: parsed.value.attributes.length }, 'Loaded business object metadata');
    return ok(parsed.value);
  }
}
