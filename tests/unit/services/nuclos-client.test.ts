/**
 * Unit tests for NuclosClient
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { NuclosClient } from '../../../src/services/nuclos-client.js';
import {
  AuthenticationError,
  ConfigValidationError,
  NotFoundError,
  VersionError,
} from '../../../src/core/errors.js';
import { unwrap } from '../../../src/core/result.js';
import type { FakeNuclosServer } from '../../fixtures/fake-nuclos-server.js';
import {
  ARCHIVE,
  CUSTOMER,
  ORDER,
  createSampleServer,
  createTestClient,
} from '../../fixtures/sample-metadata.js';

const defaultEnvFile = fileURLToPath(new URL('../../../default.env', import.meta.url));

describe('NuclosClient', () => {
  describe('factories', () => {
    it('should fill in defaults', () => {
      const client = unwrap(NuclosClient.fromSettings({ host: 'nuclos.example.com', locale: 'de' }));

      expect(client.settings).toEqual({
        host: 'nuclos.example.com',
        port: 80,
        instance: 'nuclos',
        protocol: 'http',
        username: 'nuclos',
        password: '',
        locale: 'de',
        timeoutMs: 30000,
      });
      expect(client.isLoggedIn).toBe(false);
    });

    it('should reject an invalid port', () => {
      const result = NuclosClient.fromSettings({ port: 'eighty' });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ConfigValidationError);
        expect(result.error.field).toBe('port');
      }
    });

    it('should read NUCLOS_* variables', () => {
      const client = unwrap(
        NuclosClient.fromEnv({
          NUCLOS_HOST: 'erp.internal',
          NUCLOS_PORT: '8443',
          NUCLOS_PROTOCOL: 'https',
          NUCLOS_PASSWORD: 'test-secret',
          NUCLOS_LOCALE: 'en',
          UNRELATED: 'ignored',
        })
      );

      expect(client.settings).toMatchObject({
        host: 'erp.internal',
        port: 8443,
        protocol: 'https',
        password: 'test-secret',
        instance: 'nuclos',
      });
    });

    it('should read the shipped settings template', () => {
      const client = unwrap(NuclosClient.fromSettingsFile(defaultEnvFile));

      expect(client.settings).toMatchObject({
        protocol: 'http',
        host: 'localhost',
        port: 80,
        instance: 'nuclos',
        username: 'nuclos',
        password: '',
        timeoutMs: 30000,
      });
      expect(client.settings.locale.length).toBeGreaterThan(0);
    });

    it('should report a missing settings file', () => {
      const result = NuclosClient.fromSettingsFile('/nonexistent/nuclos.env');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Cannot read settings file /nonexistent/nuclos.env');
      }
    });
  });

  describe('with a server', () => {
    let server: FakeNuclosServer;
    let client: NuclosClient;

    beforeEach(() => {
      server = createSampleServer();
      client = createTestClient(server);
    });

    describe('versions', () => {
      it('should report the server versions', async () => {
        expect(await client.version()).toEqual({ ok: true, value: '4.11.2 (2017-05-01)' });
        expect(await client.dbVersion()).toEqual({ ok: true, value: '4.11.0' });
      });

      it('should compare against the server version', async () => {
        expect(unwrap(await client.requireVersion(4, 11))).toBe(true);
        expect(unwrap(await client.requireVersion(4, 11, 3))).toBe(false);
        expect(unwrap(await client.requireVersion(5))).toBe(false);
        expect(server.requestsMatching('GET', 'version')).toHaveLength(1);
      });

      it('should refuse to log in to servers older than 4.3', async () => {
        server.version = '4.2.9';

        const result = await client.login();

        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error).toBeInstanceOf(VersionError);
          expect(result.error.message).toBe('Server version 4.2.9 is older than the required 4.3');
        }
        expect(client.isLoggedIn).toBe(false);
      });
    });

    describe('session', () => {
      it('should log in on the first request', async () => {
        unwrap(await client.businessObjects());

        expect(client.isLoggedIn).toBe(true);
        expect(server.requests.map((request) => `${request.method} ${request.path}`)).toEqual([
          'GET version',
          'POST ',
          'GET bo_metas',
        ]);
      });

      it('should report wrong credentials', async () => {
        server.credentials.password = 'another-secret';

        const result = await client.bo('Customer');

        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error).toBeInstanceOf(AuthenticationError);
          expect(result.error.message).toBe('Login failed for user nuclos');
        }
      });

      it('should log out', async () => {
        unwrap(await client.login());

        unwrap(await client.logout());

        expect(client.isLoggedIn).toBe(false);
        expect(server.requestsMatching('DELETE', '')).toEqual([
          { method: 'DELETE', path: '', sessionId: 'session-1' },
        ]);
      });

      it('should log in again after a reconnect and reload metadata', async () => {
        unwrap(await client.getBusinessObject(CUSTOMER));

        unwrap(await client.reconnect());
        unwrap(await client.getBusinessObject(CUSTOMER));

        expect(client.isLoggedIn).toBe(true);
        expect(server.requestsMatching('POST', '')).toHaveLength(2);
        expect(server.requestsMatching('GET', 'version')).toHaveLength(2);
        expect(server.requestsMatching('GET', `bo_metas/${CUSTOMER}`).map((request) => request.sessionId)).toEqual([
          'session-1',
          'session-2',
        ]);
      });
    });

    describe('business objects', () => {
      it('should list the types', async () => {
        const summaries = unwrap(await client.businessObjects());

        expect(summaries).toEqual([
          { boMetaId: CUSTOMER, name: 'Customer' },
          { boMetaId: ORDER, name: 'Order' },
          { boMetaId: ARCHIVE, name: 'Archive Entry' },
        ]);
      });

      it('should find a type by name', async () => {
        const archive = unwrap(await client.getBusinessObjectByName('archive_entry'));

        expect(archive.boMetaId).toBe(ARCHIVE);
        expect(archive.meta.canInsert).toBe(false);
      });

      it('should find a type by name or by id through bo()', async () => {
        const byName = unwrap(await client.bo('ORDER'));
        const byId = unwrap(await client.bo(CUSTOMER));

        expect(byName.boMetaId).toBe(ORDER);
        expect(byId.name).toBe('Customer');
      });

      it('should report unknown types', async () => {
        const result = await client.bo('Invoice');

        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error).toBeInstanceOf(NotFoundError);
          expect(result.error).toMatchObject({ subject: 'business_object', key: 'Invoice' });
        }
      });

      it('should load metadata once per type', async () => {
        await client.getBusinessObject(ORDER);
        await client.bo('Order');

        expect(server.requestsMatching('GET', `bo_metas/${ORDER}`)).toHaveLength(1);
      });

      it('should follow reference attributes to their type', async () => {
        const orders = unwrap(await client.getBusinessObject(ORDER));
        const customerAttribute = unwrap(orders.attribute('Customer'));
        const noteAttribute = unwrap(orders.attribute('Note'));

        const customers = unwrap(await client.getReferencedBusinessObject(customerAttribute));
        const notReference = await client.getReferencedBusinessObject(noteAttribute);

        expect(customers.boMetaId).toBe(CUSTOMER);
        expect(notReference.ok).toBe(false);
        if (!notReference.ok) {
          expect(notReference.error.message).toBe('Attribute Note is not a reference');
        }
      });
    });
  });
});
