/**
 * Error Hierarchy Tests
 *
 * Tests for the client's error classes, base functionality, and type guards.
 */

import { describe, it, expect } from 'vitest';
import {
  NuclosError,
  AuthenticationError,
  SessionExpiredError,
  VersionError,
  HttpError,
  TransportError,
  TimeoutError,
  InvalidResponseError,
  NotFoundError,
  IllegalStateError,
  PermissionDeniedError,
  ValidationError,
  ConfigValidationError,
  isNuclosError,
  isAuthenticationError,
  isHttpError,
  isNotFoundError,
  isValidationError,
  isIllegalStateError,
  toNuclosError,
} from './errors.js';

describe('errors', () => {
  describe('NuclosError base class', () => {
    it('sets name, code, message, and timestamp', () => {
      // Arrange & Act
      const error = new TransportError('Connection refused');

      // Assert
      expect(error.name).toBe('TransportError');
      expect(error.code).toBe('NUCLOS_TRANSPORT_ERROR');
      expect(error.message).toBe('Connection refused');
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('merges context with the subtype', () => {
      // Arrange & Act
      const error = new TimeoutError('Too slow', { path: 'bo_metas' });

      // Assert
      expect(error.context).toEqual({ path: 'bo_metas', subtype: 'timeout' });
    });

    it('is an Error and a NuclosError', () => {
      // Arrange & Act
      const error = new IllegalStateError('Nope');

      // Assert
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(NuclosError);
      expect(error).toBeInstanceOf(IllegalStateError);
      expect(error.stack).toBeDefined();
    });

    it('serializes to JSON', () => {
      // Arrange
      const error = new IllegalStateError('Record is deleted', { boId: '42' });

      // Act
      const json = error.toJSON();

      // Assert
      expect(json).toMatchObject({
        name: 'IllegalStateError',
        code: 'NUCLOS_ILLEGAL_STATE',
        message: 'Record is deleted',
        context: { boId: '42' },
      });
      expect(json.timestamp).toBe(error.timestamp.toISOString());
    });

    it('formats toString with code and context', () => {
      // Arrange
      const error = new IllegalStateError('Record is deleted', { boId: '42' });

      // Act & Assert
      expect(error.toString()).toBe('[NUCLOS_ILLEGAL_STATE] IllegalStateError: Record is deleted | Context: {"boId":"42"}');
    });

    it('formats toString without context', () => {
      expect(new IllegalStateError('Record is deleted').toString()).toBe(
        '[NUCLOS_ILLEGAL_STATE] IllegalStateError: Record is deleted'
      );
    });
  });

  describe('Session errors', () => {
    it('AuthenticationError has its code', () => {
      const error = new AuthenticationError('Login failed for user nuclos');

      expect(error.code).toBe('NUCLOS_AUTH_ERROR');
      expect(error.context).toEqual({ subtype: 'authentication' });
    });

    it('SessionExpiredError has its code', () => {
      expect(new SessionExpiredError('Unauthorized').code).toBe('NUCLOS_SESSION_EXPIRED');
    });

    it('VersionError describes both versions', () => {
      // Arrange & Act
      const error = new VersionError('4.3', '4.2.1');

      // Assert
      expect(error.message).toBe('Server version 4.2.1 is older than the required 4.3');
      expect(error.requiredVersion).toBe('4.3');
      expect(error.serverVersion).toBe('4.2.1');
    });

    it('VersionError copes with an unknown server version', () => {
      expect(new VersionError('4.3').message).toBe('Server version unknown is older than the required 4.3');
    });
  });

  describe('Transport errors', () => {
    it('HttpError carries status and reason', () => {
      // Arrange & Act
      const error = new HttpError(409, 'Conflict', { path: 'bo_metas/example_Order/bos' });

      // Assert
      expect(error.message).toBe('HTTP 409: Conflict');
      expect(error.status).toBe(409);
      expect(error.reason).toBe('Conflict');
      expect(error.context).toEqual({ path: 'bo_metas/example_Order/bos', status: 409, reason: 'Conflict' });
    });

    it('InvalidResponseError has its code', () => {
      expect(new InvalidResponseError('Unexpected record payload').code).toBe('NUCLOS_INVALID_RESPONSE');
    });
  });

  describe('Lookup and state errors', () => {
    it('NotFoundError builds a default message', () => {
      // Arrange & Act
      const error = new NotFoundError('business_object', 'Invoice');

      // Assert
      expect(error.message).toBe("Unknown business object 'Invoice'");
      expect(error.subject).toBe('business_object');
      expect(error.key).toBe('Invoice');
    });

    it('NotFoundError keeps a custom message', () => {
      const error = new NotFoundError('record', '42', 'No Customer record matches \'42\'');

      expect(error.message).toBe("No Customer record matches '42'");
      expect(error.context).toEqual({ subject: 'record', key: '42' });
    });

    it('PermissionDeniedError names action and type', () => {
      // Arrange & Act
      const error = new PermissionDeniedError('Customer', 'delete');

      // Assert
      expect(error.message).toBe('Delete of business object Customer not allowed');
      expect(error.resource).toBe('Customer');
      expect(error.action).toBe('delete');
    });
  });

  describe('Validation errors', () => {
    it('ValidationError keeps field and issues', () => {
      // Arrange & Act
      const error = new ValidationError('Invalid value for Amount', 'Amount', ['expected a number']);

      // Assert
      expect(error.code).toBe('NUCLOS_VALIDATION_ERROR');
      expect(error.field).toBe('Amount');
      expect(error.validationErrors).toEqual(['expected a number']);
    });

    it('ConfigValidationError keeps the field', () => {
      const error = new ConfigValidationError('Invalid settings', 'port');

      expect(error.field).toBe('port');
      expect(error.context).toEqual({ field: 'port', subtype: 'config' });
    });
  });

  describe('Type guards', () => {
    it('isNuclosError', () => {
      expect(isNuclosError(new HttpError(500, 'Internal Server Error'))).toBe(true);
      expect(isNuclosError(new Error('plain'))).toBe(false);
      expect(isNuclosError('text')).toBe(false);
    });

    it('isAuthenticationError', () => {
      expect(isAuthenticationError(new AuthenticationError('x'))).toBe(true);
      expect(isAuthenticationError(new SessionExpiredError('x'))).toBe(false);
    });

    it('isHttpError', () => {
      expect(isHttpError(new HttpError(500, 'x'))).toBe(true);
      expect(isHttpError(new TransportError('x'))).toBe(false);
    });

    it('isNotFoundError', () => {
      expect(isNotFoundError(new NotFoundError('state', '30'))).toBe(true);
      expect(isNotFoundError(new HttpError(404, 'Not Found'))).toBe(false);
    });

    it('isValidationError', () => {
      expect(isValidationError(new ValidationError('x'))).toBe(true);
      expect(isValidationError(new ConfigValidationError('x'))).toBe(false);
    });

    it('isIllegalStateError', () => {
      expect(isIllegalStateError(new IllegalStateError('x'))).toBe(true);
      expect(isIllegalStateError(new ValidationError('x'))).toBe(false);
    });
  });

  describe('toNuclosError()', () => {
    it('returns NuclosErrors unchanged', () => {
      const error = new TimeoutError('Too slow');

      expect(toNuclosError(error)).toBe(error);
    });

    it('wraps plain errors as TransportError', () => {
      // Arrange & Act
      const wrapped = toNuclosError(new TypeError('socket hang up'), { path: 'version' });

      // Assert
      expect(wrapped).toBeInstanceOf(TransportError);
      expect(wrapped.message).toBe('socket hang up');
      expect(wrapped.context).toEqual({ path: 'version', cause: 'TypeError', subtype: 'network' });
    });

    it('wraps thrown non-errors', () => {
      const wrapped = toNuclosError('boom');

      expect(wrapped.message).toBe('boom');
      expect(wrapped.context).toEqual({ cause: 'string', subtype: 'network' });
    });
  });
});
