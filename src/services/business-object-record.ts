/**
 * Business Object Record
 *
 * One instance of a business object type. Keeps the values the server last
 * sent (clean) apart from local changes (modified); reads prefer modified,
 * `save()` sends only the modified delta, `refresh()` drops it.
 *
 * Records built from list or sub-form rows are partial: the row carries only
 * the list columns. They load the full instance by id on the first `get()`,
 * `getReference()` or `changeToState()`, or on an explicit `load()`.
 *
 * Lifecycle: NEW (no id) → PERSISTED → DELETED. A deleted record rejects
 * every further operation with IllegalStateError; deleting it again is a
 * no-op.
 *
 * Usage:
 * ```typescript
 * const customer = await client.bo('Customer');
 * const record = customer.value.create();
 * record.set('Name', 'Test Customer');
 * await record.save();                      // POST, record.boId is now set
 * record.value('name');                     // ok('Test Customer')
 * const orders = await record.get('Orders'); // { kind: 'dependency', records }
 * ```
 */

import { createRecordLogger, type Logger } from '../core/logger.js';
import type { Result } from '../core/result.js';
import { ok, err } from '../core/result.js';
import {
  IllegalStateError,
  InvalidResponseError,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
  isNotFoundError,
  type NuclosError,
} from '../core/errors.js';
import type { IBusinessObjectRegistry, INuclosTransport } from '../core/interfaces.js';
import { Routes } from '../connection/routes.js';
import {
  AttributeValueSchemas,
  BoInstanceWireSchema,
  BoListWireSchema,
  ReferenceValueSchema,
  WireIdSchema,
  parseInput,
  parseWire,
  type BoInstanceWire,
  type StateWire,
} from '../validation/schemas.js';
import type {
  AttributeMeta,
  BusinessObjectMeta,
  DependencyMeta,
  ProcessMeta,
  StateInfo,
} from '../types/metadata.js';
import {
  findAttributeById,
  resolveAttribute,
  resolveField,
  resolveDependency,
  resolveProcess,
} from './name-resolver.js';

/**
 * Key of the process in `bo_values`.
 */
export const PROCESS_ATTRIBUTE_ID = 'nuclosProcess';

export type RecordStatus = 'NEW' | 'PERSISTED' | 'DELETED';

/**
 * Result of reading a field by name.
 */
export type FieldValue =
  | { readonly kind: 'scalar'; readonly attribute: AttributeMeta; readonly value: unknown }
  | {
      readonly kind: 'reference';
      readonly attribute: AttributeMeta;
      readonly record: BusinessObjectRecord | null;
    }
  | {
      readonly kind: 'dependency';
      readonly dependency: DependencyMeta;
      readonly records: readonly BusinessObjectRecord[];
    };

/**
 * What a record needs from its surroundings.
 */
export interface RecordContext {
  readonly transport: INuclosTransport;
  readonly registry: IBusinessObjectRegistry;
  readonly meta: BusinessObjectMeta;
}

export interface RecordOptions {
  /** The instance is a list row, not the full record. */
  readonly partial?: boolean;
}

/**
 * Value of an unset attribute.
 */
export function defaultValue(attribute: AttributeMeta): unknown {
  switch (attribute.type) {
    case 'boolean':
      return false;
    case 'string':
      return '';
    default:
      return null;
  }
}

function toStateInfo(state: StateWire): StateInfo {
  return { stateId: state.state_id, name: state.name, number: state.number };
}

export class BusinessObjectRecord {
  private readonly transport: INuclosTransport;
  private readonly registry: IBusinessObjectRegistry;
  public readonly meta: BusinessObjectMeta;

  private id: string | undefined;
  private titleText = '';
  private deleted = false;
  private partial = false;
  private clean: Record<string, unknown> = {};
  private readonly modified = new Map<string, unknown>();
  private currentState: StateInfo | null = null;
  private reachableStates: readonly StateInfo[] = [];

  /** Referenced records by attribute id, valid until the next refresh. */
  private readonly references = new Map<string, BusinessObjectRecord>();
  /** Loaded sub-form rows by dependency id, valid until the next refresh. */
  private readonly dependencyRows = new Map<string, readonly BusinessObjectRecord[]>();

  private log: Logger;

  /**
   * Records come from BusinessObject (`create`, `get`, queries); without
   * `instance` the record is NEW.
   */
  constructor(context: RecordContext, instance?: BoInstanceWire, options: RecordOptions = {}) {
    this.transport = context.transport;
    this.registry = context.registry;
    this.meta = context.meta;
    if (instance) {
      this.applyInstance(instance);
      this.partial = options.partial === true;
    }
    this.log = createRecordLogger(this.meta.boMetaId, this.id);
  }

  // ============================================================================
  // Status
  // ============================================================================

  public get boMetaId(): string {
    return this.meta.boMetaId;
  }

  public get boId(): string | undefined {
    return this.id;
  }

  public get title(): string {
    return this.titleText;
  }

  public get status(): RecordStatus {
    if (this.deleted) return 'DELETED';
    return this.id === undefined ? 'NEW' : 'PERSISTED';
  }

  public get isNew(): boolean {
    return this.status === 'NEW';
  }

  public get isDeleted(): boolean {
    return this.deleted;
  }

  /**
   * Built from a list row and not loaded by id yet.
   */
  public get isPartial(): boolean {
    return this.partial;
  }

  public get isModified(): boolean {
    return this.modified.size > 0;
  }

  /**
   * Ids of the attributes changed since the last save or refresh.
   */
  public get modifiedAttributeIds(): readonly string[] {
    return [...this.modified.keys()];
  }

  public get state(): StateInfo | null {
    return this.currentState;
  }

  public get nextStates(): readonly StateInfo[] {
    return this.reachableStates;
  }

  /**
   * Current process, including a staged but unsaved one.
   */
  public get process(): ProcessMeta | null {
    const raw = this.modified.has(PROCESS_ATTRIBUTE_ID)
      ? this.modified.get(PROCESS_ATTRIBUTE_ID)
      : this.clean[PROCESS_ATTRIBUTE_ID];
    const parsed = ReferenceValueSchema.safeParse(raw);
    if (!parsed.success) {
      return null;
    }
    const { id, name } = parsed.data;
    const known = this.meta.processes.find((process) => process.processId === id);
    return { processId: id, name: name ?? known?.name ?? '' };
  }

  // ============================================================================
  // Reading
  // ============================================================================

  /**
   * Reads a field by name. References and dependencies are loaded on demand.
   */
  public async get(name: string): Promise<Result<FieldValue, NuclosError>> {
    const usable = this.ensureNotDeleted('read');
    if (!usable.ok) {
      return usable;
    }

    const field = resolveField(this.meta, name);
    if (!field.ok) {
      return field;
    }

    if (field.value.kind === 'attribute' && !this.isLoaded(field.value.attribute)) {
      const loaded = await this.load();
      if (!loaded.ok) {
        return loaded;
      }
    }

    let value: FieldValue;
    if (field.value.kind === 'dependency') {
      const dependency = field.value.dependency;
      const records = await this.loadDependency(dependency);
      if (!records.ok) {
        return records;
      }
      value = { kind: 'dependency', dependency, records: records.value };
    } else if (field.value.attribute.isReference) {
      const attribute = field.value.attribute;
      const record = await this.loadReference(attribute);
      if (!record.ok) {
        return record;
      }
      value = { kind: 'reference', attribute, record: record.value };
    } else {
      const attribute = field.value.attribute;
      value = { kind: 'scalar', attribute, value: this.readValue(attribute) };
    }
    return ok(value);
  }

  /**
   * Scalar value of the attribute with this name. A reference attribute yields
   * its raw `{ id, name }` link.
   */
  public value(name: string): Result<unknown, NuclosError> {
    const usable = this.ensureNotDeleted('read');
    if (!usable.ok) {
      return usable;
    }
    const attribute = resolveAttribute(this.meta, name);
    return attribute.ok ? this.readLoadedValue(attribute.value) : attribute;
  }

  /**
   * Scalar value of the attribute with exactly this id.
   */
  public getAttribute(boAttrId: string): Result<unknown, NuclosError> {
    const usable = this.ensureNotDeleted('read');
    if (!usable.ok) {
      return usable;
    }
    const attribute = findAttributeById(this.meta, boAttrId);
    return attribute.ok ? this.readLoadedValue(attribute.value) : attribute;
  }

  /**
   * The record a reference attribute points to, or null for an empty link.
   */
  public async getReference(name: string): Promise<Result<BusinessObjectRecord | null, NuclosError>> {
    const usable = this.ensureNotDeleted('read');
    if (!usable.ok) {
      return usable;
    }
    const attribute = resolveAttribute(this.meta, name);
    if (!attribute.ok) {
      return attribute;
    }
    if (!attribute.value.isReference) {
      return err(
        new ValidationError(`Attribute ${attribute.value.name} is not a reference`, attribute.value.name)
      );
    }
    if (!this.isLoaded(attribute.value)) {
      const loaded = await this.load();
      if (!loaded.ok) {
        return loaded;
      }
    }
    return this.loadReference(attribute.value);
  }

  /**
   * Sub-form rows of a dependency. Loaded once, then kept until refresh.
   */
  public async getDependency(name: string): Promise<Result<readonly BusinessObjectRecord[], NuclosError>> {
    const usable = this.ensureNotDeleted('read');
    if (!usable.ok) {
      return usable;
    }
    const dependency = resolveDependency(this.meta, name);
    return dependency.ok ? this.loadDependency(dependency.value) : dependency;
  }

  private isLoaded(attribute: AttributeMeta): boolean {
    return !this.partial || this.modified.has(attribute.boAttrId) || attribute.boAttrId in this.clean;
  }

  private readLoadedValue(attribute: AttributeMeta): Result<unknown, NuclosError> {
    if (!this.isLoaded(attribute)) {
      return err(
        new IllegalStateError(`Attribute ${attribute.name} is not part of the list row; call load() first`, {
          boMetaId: this.meta.boMetaId,
          boId: this.id,
        })
      );
    }
    return ok(this.readValue(attribute));
  }

  /**
   * Objects and arrays are handed out as shallow copies.
   */
  private readValue(attribute: AttributeMeta): unknown {
    const value = this.modified.has(attribute.boAttrId)
      ? this.modified.get(attribute.boAttrId)
      : this.clean[attribute.boAttrId] ?? defaultValue(attribute);
    if (Array.isArray(value)) {
      return [...value];
    }
    if (typeof value === 'object' && value !== null) {
      return { ...value };
    }
    return value;
  }

  private async loadReference(
    attribute: AttributeMeta
  ): Promise<Result<BusinessObjectRecord | null, NuclosError>> {
    const raw = this.readValue(attribute);
    if (raw === null || raw === undefined) {
      return ok(null);
    }
    const link = parseWire(ReferenceValueSchema, raw, `reference ${attribute.name}`);
    if (!link.ok) {
      return link;
    }

    const cached = this.references.get(attribute.boAttrId);
    if (cached && cached.boId === link.value.id) {
      return ok(cached);
    }

    const target = attribute.referencedBoMetaId;
    if (!target) {
      return err(
        new InvalidResponseError(`Reference attribute ${attribute.name} does not name its target type`, {
          boAttrId: attribute.boAttrId,
        })
      );
    }

    const businessObject = await this.registry.getBusinessObject(target);
    if (!businessObject.ok) {
      return businessObject;
    }
    const record = await businessObject.value.get(link.value.id);
    if (!record.ok) {
      return record;
    }
    this.references.set(attribute.boAttrId, record.value);
    return ok(record.value);
  }

  private async loadDependency(
    dependency: DependencyMeta
  ): Promise<Result<readonly BusinessObjectRecord[], NuclosError>> {
    if (this.id === undefined) {
      return ok([]);
    }
    const cached = this.dependencyRows.get(dependency.dependencyId);
    if (cached) {
      return ok(cached);
    }

    const businessObject = await this.registry.getBusinessObject(dependency.boMetaId);
    if (!businessObject.ok) {
      return businessObject;
    }

    const answer = await this.transport.request(
      Routes.dependencyRecords(this.meta.boMetaId, this.id, dependency.dependencyId)
    );
    if (!answer.ok) {
      return answer;
    }
    const page = parseWire(BoListWireSchema, answer.value, `dependency ${dependency.name}`);
    if (!page.ok) {
      return page;
    }

    const records = Object.freeze(page.value.bos.map((row) => businessObject.value.fromListRow(row)));
    this.dependencyRows.set(dependency.dependencyId, records);
    this.log.debug({ dependency: dependency.name, count: records.length }, 'Loaded dependency');
    return ok(records);
  }

  // ============================================================================
  // Writing
  // ============================================================================

  /**
   * Stages a new value for the attribute with this name. Nothing is sent
   * before `save()`.
   */
  public set(name: string, value: unknown): Result<void, NuclosError> {
    const usable = this.ensureNotDeleted('modify');
    if (!usable.ok) {
      return usable;
    }
    const field = resolveField(this.meta, name);
    if (!field.ok) {
      return field;
    }
    if (field.value.kind === 'dependency') {
      return err(
        new ValidationError(
          `Dependency ${field.value.dependency.name} cannot be assigned; use createDependency()`,
          field.value.dependency.name
        )
      );
    }
    return this.writeAttribute(field.value.attribute, value);
  }

  /**
   * Stages a new value for the attribute with exactly this id.
   */
  public setAttribute(boAttrId: string, value: unknown): Result<void, NuclosError> {
    const usable = this.ensureNotDeleted('modify');
    if (!usable.ok) {
      return usable;
    }
    const attribute = findAttributeById(this.meta, boAttrId);
    return attribute.ok ? this.writeAttribute(attribute.value, value) : attribute;
  }

  /**
   * Stages a process change. Committed by `save()`.
   */
  public setProcess(name: string): Result<void, NuclosError> {
    const usable = this.ensureNotDeleted('modify');
    if (!usable.ok) {
      return usable;
    }
    const process = resolveProcess(this.meta, name);
    if (!process.ok) {
      return process;
    }
    this.modified.set(PROCESS_ATTRIBUTE_ID, { id: process.value.processId, name: process.value.name });
    return ok(undefined);
  }

  /**
   * Creates an unsaved row of a dependency, already linked to this record.
   * The parent must be saved first.
   */
  public async createDependency(name: string): Promise<Result<BusinessObjectRecord, NuclosError>> {
    const usable = this.ensureNotDeleted('modify');
    if (!usable.ok) {
      return usable;
    }
    const dependency = resolveDependency(this.meta, name);
    if (!dependency.ok) {
      return dependency;
    }
    if (this.id === undefined) {
      return err(
        new IllegalStateError(`Save the record before adding rows to ${dependency.value.name}`, {
          boMetaId: this.meta.boMetaId,
        })
      );
    }

    const businessObject = await this.registry.getBusinessObject(dependency.value.boMetaId);
    if (!businessObject.ok) {
      return businessObject;
    }
    const child = businessObject.value.create();
    const link = child.linkTo(dependency.value.referenceAttributeId, this);
    return link.ok ? ok(child) : link;
  }

  /**
   * Sets the back-reference of a sub-form row. Bypasses the writability check
   * since the server marks many back-references read-only.
   */
  private linkTo(boAttrId: string, parent: BusinessObjectRecord): Result<void, NuclosError> {
    const attribute = findAttributeById(this.meta, boAttrId);
    if (!attribute.ok) {
      return attribute;
    }
    if (parent.boId === undefined) {
      return err(new IllegalStateError('Parent record is not saved'));
    }
    this.modified.set(boAttrId, { id: parent.boId });
    this.references.set(boAttrId, parent);
    return ok(undefined);
  }

  private writeAttribute(attribute: AttributeMeta, value: unknown): Result<void, NuclosError> {
    if (!attribute.isWriteable) {
      return err(new ValidationError(`Attribute ${attribute.name} is not writeable`, attribute.name));
    }

    const type = attribute.type;
    if (type === 'reference') {
      return this.writeReference(attribute, value);
    }

    if (value === null || value === undefined) {
      if (!attribute.isNullable) {
        return err(new ValidationError(`Attribute ${attribute.name} cannot be null`, attribute.name));
      }
      this.modified.set(attribute.boAttrId, null);
      return ok(undefined);
    }

    const parsed = parseInput(AttributeValueSchemas[type], value, attribute.name);
    if (!parsed.ok) {
      return parsed;
    }
    this.modified.set(attribute.boAttrId, parsed.value);
    return ok(undefined);
  }

  /**
   * Accepts a saved record, an id, or an empty value that clears the link.
   */
  private writeReference(attribute: AttributeMeta, value: unknown): Result<void, NuclosError> {
    if (value === null || value === undefined || value === '') {
      this.modified.set(attribute.boAttrId, null);
      this.references.delete(attribute.boAttrId);
      return ok(undefined);
    }

    if (value instanceof BusinessObjectRecord) {
      if (value.boId === undefined) {
        return err(
          new ValidationError(`Referenced record for ${attribute.name} must be saved first`, attribute.name)
        );
      }
      if (attribute.referencedBoMetaId && value.boMetaId !== attribute.referencedBoMetaId) {
        return err(
          new ValidationError(
            `Attribute ${attribute.name} references ${attribute.referencedBoMetaId}, not ${value.boMetaId}`,
            attribute.name
          )
        );
      }
      this.modified.set(attribute.boAttrId, { id: value.boId });
      this.references.set(attribute.boAttrId, value);
      return ok(undefined);
    }

    const id = parseInput(WireIdSchema, value, attribute.name);
    if (!id.ok) {
      return id;
    }
    this.modified.set(attribute.boAttrId, { id: id.value });
    this.references.delete(attribute.boAttrId);
    return ok(undefined);
  }

  // ============================================================================
  // Server Round Trips
  // ============================================================================

  /**
   * Inserts a NEW record or sends the modified values of a PERSISTED one.
   * With nothing modified no request is made.
   */
  public async save(): Promise<Result<void, NuclosError>> {
    const usable = this.ensureNotDeleted('save');
    if (!usable.ok) {
      return usable;
    }
    if (this.modified.size === 0) {
      return ok(undefined);
    }

    const values = Object.fromEntries(this.modified);

    if (this.id === undefined) {
      if (!this.meta.canInsert) {
        return err(new PermissionDeniedError(this.meta.name, 'insert'));
      }
      const answer = await this.transport.request(Routes.records(this.meta.boMetaId), {
        method: 'POST',
        data: { bo_meta_id: this.meta.boMetaId, _flag: 'insert', bo_values: values },
      });
      if (!answer.ok) {
        return answer;
      }
      const instance = parseWire(BoInstanceWireSchema, answer.value, 'inserted record');
      if (!instance.ok) {
        return instance;
      }
      this.resetTo(instance.value);
      this.log = createRecordLogger(this.meta.boMetaId, this.id);
      this.log.info('Record inserted');
      return ok(undefined);
    }

    if (!this.meta.canUpdate) {
      return err(new PermissionDeniedError(this.meta.name, 'update'));
    }
    const answer = await this.transport.request(Routes.record(this.meta.boMetaId, this.id), {
      method: 'PUT',
      data: { bo_meta_id: this.meta.boMetaId, bo_id: this.id, _flag: 'update', bo_values: values },
    });
    if (!answer.ok) {
      return answer;
    }
    if (answer.value === null) {
      // Some servers answer an update without a body
      return this.refresh();
    }
    const instance = parseWire(BoInstanceWireSchema, answer.value, 'updated record');
    if (!instance.ok) {
      return instance;
    }
    this.resetTo(instance.value);
    this.log.info({ attributes: Object.keys(values) }, 'Record updated');
    return ok(undefined);
  }

  /**
   * Reloads the record and discards local modifications. A NEW record only
   * drops its modifications.
   */
  public async refresh(): Promise<Result<void, NuclosError>> {
    const usable = this.ensureNotDeleted('refresh');
    if (!usable.ok) {
      return usable;
    }
    if (this.id === undefined) {
      this.modified.clear();
      this.references.clear();
      return ok(undefined);
    }

    const instance = await this.fetchInstance(this.id);
    if (!instance.ok) {
      return instance;
    }
    this.resetTo(instance.value);
    return ok(undefined);
  }

  /**
   * Loads the full instance of a partial record. Local modifications are
   * kept. A record that is not partial is left alone.
   */
  public async load(): Promise<Result<void, NuclosError>> {
    const usable = this.ensureNotDeleted('load');
    if (!usable.ok) {
      return usable;
    }
    if (!this.partial || this.id === undefined) {
      return ok(undefined);
    }

    const instance = await this.fetchInstance(this.id);
    if (!instance.ok) {
      return instance;
    }
    this.applyInstance(instance.value);
    this.partial = false;
    this.log.debug('Loaded full record');
    return ok(undefined);
  }

  /**
   * Deletes the record on the server.
   */
  public async delete(): Promise<Result<void, NuclosError>> {
    if (this.deleted) {
      return ok(undefined);
    }
    if (this.id === undefined) {
      return err(
        new IllegalStateError('Cannot delete a record that was never saved', { boMetaId: this.meta.boMetaId })
      );
    }
    if (!this.meta.canDelete) {
      return err(new PermissionDeniedError(this.meta.name, 'delete'));
    }

    const answer = await this.transport.requestText(Routes.record(this.meta.boMetaId, this.id), {
      method: 'DELETE',
    });
    if (!answer.ok) {
      return answer;
    }
    this.deleted = true;
    this.modified.clear();
    this.references.clear();
    this.dependencyRows.clear();
    this.log.info('Record deleted');
    return ok(undefined);
  }

  /**
   * Moves the record to one of its next states, chosen by number or by name,
   * then reloads it. Unsaved modifications are lost.
   */
  public async changeToState(target: number | string): Promise<Result<void, NuclosError>> {
    const usable = this.ensureNotDeleted('change the state of');
    if (!usable.ok) {
      return usable;
    }
    if (this.id === undefined) {
      return err(
        new IllegalStateError('Cannot change the state of a record that was never saved', {
          boMetaId: this.meta.boMetaId,
        })
      );
    }

    const loaded = await this.load();
    if (!loaded.ok) {
      return loaded;
    }

    const wanted = typeof target === 'string' ? target.toLowerCase() : target;
    const next = this.reachableStates.find((state) =>
      typeof wanted === 'number' ? state.number === wanted : state.name.toLowerCase() === wanted
    );
    if (!next) {
      return err(
        new NotFoundError('state', String(target), `State '${target}' is not reachable from the current state`, {
          boMetaId: this.meta.boMetaId,
          boId: this.id,
          nextStates: this.reachableStates.map((state) => state.name),
        })
      );
    }

    const answer = await this.transport.requestText(
      Routes.stateChange(this.meta.boMetaId, this.id, next.stateId),
      { method: 'POST' }
    );
    if (!answer.ok) {
      return answer;
    }
    this.log.info({ state: next.name, number: next.number }, 'State changed');
    return this.refresh();
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private ensureNotDeleted(action: string): Result<void, IllegalStateError> {
    if (this.deleted) {
      return err(
        new IllegalStateError(`Cannot ${action} a deleted record`, {
          boMetaId: this.meta.boMetaId,
          boId: this.id,
        })
      );
    }
    return ok(undefined);
  }

  private async fetchInstance(boId: string): Promise<Result<BoInstanceWire, NuclosError>> {
    const answer = await this.transport.request(Routes.record(this.meta.boMetaId, boId));
    if (!answer.ok) {
      return isNotFoundError(answer.error)
        ? err(new NotFoundError('record', boId, undefined, { boMetaId: this.meta.boMetaId }))
        : answer;
    }
    return parseWire(BoInstanceWireSchema, answer.value, 'record');
  }

  private applyInstance(instance: BoInstanceWire): void {
    this.id = instance.bo_id;
    this.titleText = instance._title;
    this.clean = { ...instance.bo_values };
    this.currentState = instance.state ? toStateInfo(instance.state) : null;
    this.reachableStates = Object.freeze(instance.next_states.map(toStateInfo));
  }

  private resetTo(instance: BoInstanceWire): void {
    this.applyInstance(instance);
    this.partial = false;
    this.modified.clear();
    this.references.clear();
    this.dependencyRows.clear();
  }
}
