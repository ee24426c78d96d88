/**
 * Metadata Parser
 *
 * Turns `bo_metas` and `bo_metas/{id}` answers into the immutable metadata
 * types. Attribute type names vary between server releases ("String",
 * "java.lang.String"), so they are normalized to an AttributeType here.
 */

import type {
  AttributeMeta,
  AttributeType,
  BusinessObjectMeta,
  BusinessObjectSummary,
  DependencyMeta,
  ProcessMeta,
} from '../types/metadata.js';
import type { Result } from '../core/result.js';
import { ok } from '../core/result.js';
import type { InvalidResponseError } from '../core/errors.js';
import {
  BoMetaListSchema,
  BoMetaWireSchema,
  parseWire,
  type AttributeMetaWire,
  type BoMetaWire,
} from '../validation/schemas.js';

/**
 * Server type names (last package segment, lower-cased) per attribute type.
 */
const TYPE_NAMES: Readonly<Record<Exclude<AttributeType, 'reference' | 'other'>, readonly string[]>> = {
  string: ['string', 'char', 'character', 'memo', 'text'],
  integer: ['integer', 'int', 'long', 'short'],
  decimal: ['double', 'float', 'decimal', 'bigdecimal', 'number'],
  boolean: ['boolean', 'bool'],
  date: ['date', 'datetime', 'timestamp', 'internaltimestamp'],
  document: ['document', 'genericobjectdocumentfile', 'documentfile', 'image', 'nuclosimage'],
};

/**
 * Maps the server's type text to an AttributeType.
 *
 * "java.lang.String" → 'string', "Double" → 'decimal'
 */
export function normalizeAttributeType(rawType: string, isReference: boolean): AttributeType {
  if (isReference) {
    return 'reference';
  }
  const simpleName = (rawType.split('.').pop() ?? rawType).trim().toLowerCase();
  for (const [type, names] of Object.entries(TYPE_NAMES)) {
    if (names.includes(simpleName)) {
      return toAttributeType(type);
    }
  }
  return 'other';
}

function toAttributeType(name: string): AttributeType {
  switch (name) {
    case 'string':
    case 'integer':
    case 'decimal':
    case 'boolean':
    case 'date':
    case 'document':
      return name;
    default:
      return 'other';
  }
}

function toAttributeMeta(wire: AttributeMetaWire): AttributeMeta {
  const referencedBoMetaId = wire.referenced_bo_meta_id ?? undefined;
  return {
    boAttrId: wire.bo_attr_id,
    name: wire.name,
    type: normalizeAttributeType(wire.type, wire.reference),
    rawType: wire.type,
    isWriteable: !wire.readonly,
    isNullable: wire.nullable,
    isUnique: wire.unique,
    isReference: wire.reference,
    ...(wire.reference && referencedBoMetaId ? { referencedBoMetaId } : {}),
  };
}

function toBusinessObjectMeta(wire: BoMetaWire): BusinessObjectMeta {
  const dependencies: DependencyMeta[] = wire.dependencies.map((dependency) => ({
    dependencyId: dependency.dependency_id,
    name: dependency.name,
    boMetaId: dependency.bo_meta_id,
    referenceAttributeId: dependency.reference_attr_id,
  }));
  const processes: ProcessMeta[] = wire.processes.map((process) => ({
    processId: process.process_id,
    name: process.name,
  }));

  return Object.freeze({
    boMetaId: wire.bo_meta_id,
    name: wire.name,
    canInsert: wire.insert,
    canUpdate: wire.update,
    canDelete: wire.delete,
    attributes: Object.freeze(Object.values(wire.attributes).map(toAttributeMeta)),
    dependencies: Object.freeze(dependencies),
    processes: Object.freeze(processes),
  });
}

/**
 * Parses the answer of `bo_metas/{id}`.
 */
export function parseBusinessObjectMeta(data: unknown): Result<BusinessObjectMeta, InvalidResponseError> {
  const parsed = parseWire(BoMetaWireSchema, data, 'business object metadata');
  if (!parsed.ok) {
    return parsed;
  }
  return ok(toBusinessObjectMeta(parsed.value));
}

/**
 * Parses the answer of `bo_metas`.
 */
export function parseBusinessObjectList(
  data: unknown
): Result<BusinessObjectSummary[], InvalidResponseError> {
  const parsed = parseWire(BoMetaListSchema, data, 'business object list');
  if (!parsed.ok) {
    return parsed;
  }
  return ok(parsed.value.map((entry) => ({ boMetaId: entry.bo_meta_id, name: entry.name })));
}
