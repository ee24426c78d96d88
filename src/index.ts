/**
 * Nuclos REST Client
 *
 * Typed access to a Nuclos server's REST API: business object types,
 * records, reference attributes, sub-forms, states and processes.
 */

export { NuclosClient, type NuclosClientOptions } from './services/nuclos-client.js';
export { BusinessObject } from './services/business-object.js';
export {
  BusinessObjectRecord,
  PROCESS_ATTRIBUTE_ID,
  type FieldValue,
  type RecordOptions,
  type RecordStatus,
} from './services/business-object-record.js';
export { MetadataCache, type MetadataCacheStats } from './services/metadata-cache.js';
export {
  normalizeName,
  compactName,
  resolveAttribute,
  resolveDependency,
  resolveField,
  findAttributeById,
  type ResolvedField,
} from './services/name-resolver.js';
export {
  DEFAULT_PAGE_SIZE,
  type ListOptions,
  type ListAllOptions,
  type SortKey,
  type SortDirection,
} from './services/query-builder.js';
export { NuclosHttpClient } from './connection/http-client.js';
export { NuclosSession, MIN_SERVER_VERSION } from './connection/session.js';

// Export types
export type * from './types/metadata.js';
export type { IHttpClient, INuclosTransport, IBusinessObjectRegistry, RequestOptions } from './core/interfaces.js';
export type { NuclosSettings, NuclosSettingsInput } from './validation/schemas.js';

// Export errors and utilities
export * from './core/errors.js';
export { ok, err, isOk, isErr, unwrap, unwrapOr, type Result } from './core/result.js';
export { loadSettingsFile, loadSettingsFromEnv, resolveSettings } from './core/config.js';
export { logger, createChildLogger, LogLevels } from './core/logger.js';
