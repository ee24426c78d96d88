/**
 * Business object metadata as the client works with it.
 *
 * Built once per type from the server's `bo_metas/{id}` answer
 * (see parsers/meta-parser.ts) and never mutated afterwards.
 */

/**
 * Attribute kinds the client distinguishes. `rawType` keeps the server text.
 */
export type AttributeType =
  | 'string'
  | 'integer'
  | 'decimal'
  | 'boolean'
  | 'date'
  | 'reference'
  | 'document'
  | 'other';

export interface AttributeMeta {
  readonly boAttrId: string;
  readonly name: string;
  readonly type: AttributeType;
  readonly rawType: string;
  readonly isWriteable: boolean;
  readonly isNullable: boolean;
  readonly isUnique: boolean;
  readonly isReference: boolean;
  /** Type the reference points to; only set for reference attributes. */
  readonly referencedBoMetaId?: string;
}

/**
 * A sub-form: rows of another business object type that point back at
 * the parent through `referenceAttributeId`.
 */
export interface DependencyMeta {
  readonly dependencyId: string;
  readonly name: string;
  readonly boMetaId: string;
  readonly referenceAttributeId: string;
}

export interface ProcessMeta {
  readonly processId: string;
  readonly name: string;
}

export interface BusinessObjectMeta {
  readonly boMetaId: string;
  readonly name: string;
  readonly canInsert: boolean;
  readonly canUpdate: boolean;
  readonly canDelete: boolean;
  readonly attributes: readonly AttributeMeta[];
  readonly dependencies: readonly DependencyMeta[];
  readonly processes: readonly ProcessMeta[];
}

/**
 * Entry of the business object list, before the full metadata is loaded.
 */
export interface BusinessObjectSummary {
  readonly boMetaId: string;
  readonly name: string;
}

export interface StateInfo {
  readonly stateId: string;
  readonly name: string;
  readonly number: number;
}
