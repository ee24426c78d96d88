/**
 * Validation Schemas
 *
 * Zod schemas for everything that crosses the library boundary: settings,
 * server payloads, paging options and values assigned to attributes.
 *
 * IMPORTANT: the server is not consistent about id types. Some installations
 * send numeric ids, others strings. Ids are normalized to strings on the way in.
 */

import { z } from 'zod';
import type { ZodError, ZodTypeAny } from 'zod';
import type { Result } from '../core/result.js';
import { ok, err } from '../core/result.js';
import { InvalidResponseError, ValidationError } from '../core/errors.js';

// ============================================================================
// Primitive Type Coercion
// ============================================================================

/**
 * Schema for an id that accepts string or number.
 *
 * Examples:
 * - "40000123" → "40000123"
 * - 40000123 → "40000123"
 */
export const WireIdSchema = z
  .union([z.string(), z.number()])
  .transform((val) => (typeof val === 'string' ? val.trim() : String(val)))
  .refine((val) => val.length > 0, { message: 'id cannot be empty' });

// ============================================================================
// Settings
// ============================================================================

function systemLocale(): string {
  return Intl.DateTimeFormat().resolvedOptions().locale || 'en';
}

export const SettingsSchema = z.object({
  host: z.string().trim().min(1, 'host cannot be empty').default('localhost'),
  port: z.coerce
    .number({ invalid_type_error: 'port must be a number or numeric string' })
    .int('port must be an integer')
    .min(1, 'port must be at least 1')
    .max(65535, 'port cannot exceed 65535')
    .default(80),
  instance: z.string().trim().min(1, 'instance cannot be empty').default('nuclos'),
  protocol: z.enum(['http', 'https']).default('http'),
  username: z.string().min(1, 'username cannot be empty').default('nuclos'),
  password: z.string().default(''),
  locale: z.string().min(1).default(systemLocale),
  timeoutMs: z.coerce
    .number({ invalid_type_error: 'timeout must be a number or numeric string' })
    .int('timeout must be an integer')
    .positive('timeout must be positive')
    .max(600000, 'timeout cannot exceed 10 minutes (600000ms)')
    .default(30000),
});

export type NuclosSettings = z.output<typeof SettingsSchema>;
export type NuclosSettingsInput = z.input<typeof SettingsSchema>;

// ============================================================================
// Server Payloads
// ============================================================================

export const LoginAnswerSchema = z.object({
  session_id: z.string().min(1),
});

export const BoMetaListEntrySchema = z
  .object({
    bo_meta_id: z.string().min(1),
    name: z.string(),
  })
  .passthrough();

export const BoMetaListSchema = z.array(BoMetaListEntrySchema);

export const AttributeMetaWireSchema = z.object({
  bo_attr_id: z.string().min(1),
  name: z.string(),
  type: z.string().default('String'),
  readonly: z.boolean().default(false),
  nullable: z.boolean().default(true),
  unique: z.boolean().default(false),
  reference: z.boolean().default(false),
  referenced_bo_meta_id: z.string().nullish(),
});

export const DependencyMetaWireSchema = z.object({
  dependency_id: z.string().min(1),
  bo_meta_id: z.string().min(1),
  name: z.string(),
  reference_attr_id: z.string().min(1),
});

export const ProcessMetaWireSchema = z.object({
  process_id: WireIdSchema,
  name: z.string(),
});

export const BoMetaWireSchema = z.object({
  bo_meta_id: z.string().min(1),
  name: z.string(),
  insert: z.boolean().default(false),
  update: z.boolean().default(false),
  delete: z.boolean().default(false),
  attributes: z.record(AttributeMetaWireSchema).default({}),
  dependencies: z.array(DependencyMetaWireSchema).default([]),
  processes: z.array(ProcessMetaWireSchema).default([]),
});

export const StateWireSchema = z.object({
  state_id: WireIdSchema,
  name: z.string(),
  number: z.number().int(),
});

export const BoInstanceWireSchema = z.object({
  bo_id: WireIdSchema,
  bo_meta_id: z.string().optional(),
  _title: z.string().default(''),
  bo_values: z.record(z.unknown()).default({}),
  state: StateWireSchema.nullish(),
  next_states: z.array(StateWireSchema).default([]),
});

export const BoListWireSchema = z.object({
  bos: z.array(BoInstanceWireSchema),
  total: z.number().int().optional(),
  all: z.boolean().optional(),
});

/**
 * A reference attribute's value as the server stores it.
 */
export const ReferenceValueSchema = z.object({
  id: WireIdSchema,
  name: z.string().optional(),
});

export type AttributeMetaWire = z.output<typeof AttributeMetaWireSchema>;
export type BoMetaWire = z.output<typeof BoMetaWireSchema>;
export type BoMetaListEntry = z.output<typeof BoMetaListEntrySchema>;
export type StateWire = z.output<typeof StateWireSchema>;
export type BoInstanceWire = z.output<typeof BoInstanceWireSchema>;
export type BoListWire = z.output<typeof BoListWireSchema>;
export type ReferenceValue = z.output<typeof ReferenceValueSchema>;

// ============================================================================
// Paging Options
// ============================================================================

export const OffsetSchema = z
  .number({ invalid_type_error: 'offset must be a number' })
  .int('offset must be an integer')
  .min(0, 'offset must be non-negative');

/**
 * 0 means "no chunk size", i.e. whatever the server returns by default.
 */
export const LimitSchema = z
  .number({ invalid_type_error: 'limit must be a number' })
  .int('limit must be an integer')
  .min(0, 'limit must be non-negative')
  .max(10000, 'limit cannot exceed 10000');

export const PageSizeSchema = LimitSchema.refine((val) => val > 0, {
  message: 'page size must be at least 1',
});

// ============================================================================
// Attribute Values
// ============================================================================

const IsoDateSchema = z.union([
  z.string().regex(/^\d{4}-\d{2}-\d{2}/, 'date must be an ISO date string (YYYY-MM-DD)'),
  z.date().transform((date) => date.toISOString().slice(0, 10)),
]);

/**
 * Value schemas keyed by normalized attribute type. Reference values are
 * checked by the record itself since they may carry a record instance.
 */
export const AttributeValueSchemas = {
  string: z.string({ invalid_type_error: 'expected a string' }),
  integer: z.number({ invalid_type_error: 'expected a number' }).int('expected an integer'),
  decimal: z.number({ invalid_type_error: 'expected a number' }),
  boolean: z.boolean({ invalid_type_error: 'expected a boolean' }),
  date: IsoDateSchema,
  document: z.unknown(),
  other: z.unknown(),
} as const;

// ============================================================================
// Helpers
// ============================================================================

function describeIssues(zodError: ZodError): string[] {
  return zodError.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path ? path + ': ' : ''}${issue.message}`;
  });
}

/**
 * Validates a server payload. A mismatch means the server speaks a dialect
 * this client does not understand.
 */
export function parseWire<S extends ZodTypeAny>(
  schema: S,
  data: unknown,
  what: string
): Result<z.output<S>, InvalidResponseError> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return err(
      new InvalidResponseError(`Unexpected ${what} payload`, {
        issues: describeIssues(parsed.error),
      })
    );
  }
  return ok(parsed.data);
}

/**
 * Validates caller input and reports it as a ValidationError.
 */
export function parseInput<S extends ZodTypeAny>(
  schema: S,
  data: unknown,
  field: string
): Result<z.output<S>, ValidationError> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const validationErrors = describeIssues(parsed.error);
    return err(
      new ValidationError(
        `Invalid value for ${field}: ${validationErrors.join('; ')}`,
        field,
        validationErrors
      )
    );
  }
  return ok(parsed.data);
}
