/**
 * Unit tests for MetadataCache
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MetadataCache } from '../../../src/services/metadata-cache.js';
import { NuclosSession } from '../../../src/connection/session.js';
import { HttpError, NotFoundError } from '../../../src/core/errors.js';
import { unwrap } from '../../../src/core/result.js';
import type { FakeNuclosServer } from '../../fixtures/fake-nuclos-server.js';
import { CUSTOMER, ORDER, createSampleServer } from '../../fixtures/sample-metadata.js';

describe('MetadataCache', () => {
  let server: FakeNuclosServer;
  let cache: MetadataCache;

  beforeEach(async () => {
    server = createSampleServer();
    const session = new NuclosSession(server, { username: 'nuclos', password: 'test-secret', locale: 'en' });
    await session.login();
    server.resetRequests();
    cache = new MetadataCache(session);
  });

  describe('businessObjects', () => {
    it('should load the list once', async () => {
      const first = await cache.businessObjects();
      const second = await cache.businessObjects();

      expect(first.ok && first.value.map((summary) => summary.name)).toEqual(['Customer', 'Order', 'Archive Entry']);
      expect(second).toEqual(first);
      expect(server.requestsMatching('GET', 'bo_metas')).toHaveLength(1);
    });

    it('should share a pending request', async () => {
      await Promise.all([cache.businessObjects(), cache.businessObjects()]);

      expect(server.requestsMatching('GET', 'bo_metas')).toHaveLength(1);
    });

    it('should not cache a failure', async () => {
      server.failNext(503, 'Service Unavailable');

      const failed = await cache.businessObjects();
      const retried = await cache.businessObjects();

      expect(failed.ok).toBe(false);
      if (!failed.ok) {
        expect(failed.error).toBeInstanceOf(HttpError);
      }
      expect(retried.ok).toBe(true);
    });
  });

  describe('getMeta', () => {
    it('should load each type once', async () => {
      await cache.getMeta(CUSTOMER);
      await cache.getMeta(CUSTOMER);
      await cache.getMeta(ORDER);

      expect(server.requestsMatching('GET', `bo_metas/${CUSTOMER}`)).toHaveLength(1);
      expect(server.requestsMatching('GET', `bo_metas/${ORDER}`)).toHaveLength(1);
      expect(cache.getStats()).toEqual({ hits: 1, misses: 2, size: 2 });
    });

    it('should hand out the same metadata object', async () => {
      const first = await cache.getMeta(CUSTOMER);
      const second = await cache.getMeta(CUSTOMER);

      expect(first.ok && second.ok && first.value === second.value).toBe(true);
    });

    it('should share a pending request for the same type', async () => {
      const [a, b] = await Promise.all([cache.getMeta(ORDER), cache.getMeta(ORDER)]);

      expect(a).toEqual(b);
      expect(server.requestsMatching('GET', `bo_metas/${ORDER}`)).toHaveLength(1);
    });

    it('should report unknown types as NotFoundError', async () => {
      const result = await cache.getMeta('example_Unknown');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(NotFoundError);
        expect(result.error).toMatchObject({ subject: 'business_object', key: 'example_Unknown' });
      }
    });
  });

  describe('clear', () => {
    it('should drop everything', async () => {
      await cache.businessObjects();
      await cache.getMeta(CUSTOMER);

      cache.clear();
      await cache.businessObjects();
      await cache.getMeta(CUSTOMER);

      expect(server.requestsMatching('GET', 'bo_metas')).toHaveLength(2);
      expect(server.requestsMatching('GET', `bo_metas/${CUSTOMER}`)).toHaveLength(2);
      expect(cache.getStats()).toEqual({ hits: 0, misses: 2, size: 1 });
    });

    it('should not keep metadata that arrives after clearing', async () => {
      const inFlight = cache.getMeta(CUSTOMER);

      cache.clear();
      const meta = unwrap(await inFlight);

      expect(meta.boMetaId).toBe(CUSTOMER);
      expect(cache.getStats()).toEqual({ hits: 0, misses: 0, size: 0 });

      unwrap(await cache.getMeta(CUSTOMER));

      expect(server.requestsMatching('GET', `bo_metas/${CUSTOMER}`)).toHaveLength(2);
      expect(cache.getStats()).toEqual({ hits: 0, misses: 1, size: 1 });
    });

    it('should not keep a type list that arrives after clearing', async () => {
      const inFlight = cache.businessObjects();

      cache.clear();
      unwrap(await inFlight);
      const again = cache.businessObjects();

      expect(again).not.toBe(inFlight);
      unwrap(await again);
      expect(server.requestsMatching('GET', 'bo_metas')).toHaveLength(2);
    });
  });
});
