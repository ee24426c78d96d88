/**
 * Query Builder
 *
 * Turns list options into the query parameters of `bo_metas/{id}/bos` and
 * runs the paging loop behind `listAll`/`searchAll`.
 */

import type { Result } from '../core/result.js';
import { ok, err } from '../core/result.js';
import type { NuclosError } from '../core/errors.js';
import type { QueryParameters } from '../core/interfaces.js';
import { LimitSchema, OffsetSchema, PageSizeSchema, parseInput } from '../validation/schemas.js';
import type { AttributeMeta, BusinessObjectMeta } from '../types/metadata.js';
import { findAttributeById, resolveAttribute } from './name-resolver.js';

export const DEFAULT_PAGE_SIZE = 100;

export type SortDirection = 'asc' | 'desc';

/**
 * An attribute (by name, id or metadata), optionally with a direction.
 */
export type SortKey =
  | string
  | AttributeMeta
  | { readonly attribute: string | AttributeMeta; readonly direction?: SortDirection };

export interface ListOptions {
  /** Rows to skip. */
  offset?: number;

  /** Maximum rows; 0 or absent leaves the page size to the server. */
  limit?: number;

  sort?: SortKey | readonly SortKey[];

  /** Server-side filter expression, passed through unchanged. */
  where?: string;
}

/**
 * `limit` is the page size here (default 100).
 */
export type ListAllOptions = ListOptions;

function resolveSortAttribute(
  meta: BusinessObjectMeta,
  attribute: string | AttributeMeta
): Result<AttributeMeta, NuclosError> {
  if (typeof attribute !== 'string') {
    return ok(attribute);
  }
  const byName = resolveAttribute(meta, attribute);
  if (byName.ok) {
    return byName;
  }
  const byId = findAttributeById(meta, attribute);
  return byId.ok ? byId : byName;
}

/**
 * Renders sort keys as `attrId direction` pairs joined by commas.
 */
export function buildSortParameter(
  meta: BusinessObjectMeta,
  sort: SortKey | readonly SortKey[]
): Result<string, NuclosError> {
  const keys: readonly SortKey[] = isSortKeyList(sort) ? sort : [sort];
  const parts: string[] = [];

  for (const key of keys) {
    const target = typeof key === 'object' && 'attribute' in key ? key.attribute : key;
    const direction: SortDirection =
      typeof key === 'object' && 'attribute' in key ? key.direction ?? 'asc' : 'asc';
    const attribute = resolveSortAttribute(meta, target);
    if (!attribute.ok) {
      return attribute;
    }
    parts.push(`${attribute.value.boAttrId} ${direction}`);
  }

  return ok(parts.join(','));
}

function isSortKeyList(sort: SortKey | readonly SortKey[]): sort is readonly SortKey[] {
  return Array.isArray(sort);
}

/**
 * Query parameters for one page. `chunksize` is only sent with a limit,
 * `offset` only with an offset or a limit.
 */
export function buildListParameters(
  meta: BusinessObjectMeta,
  options: ListOptions = {},
  search?: string
): Result<QueryParameters, NuclosError> {
  const offset = parseInput(OffsetSchema, options.offset ?? 0, 'offset');
  if (!offset.ok) {
    return offset;
  }
  const limit = parseInput(LimitSchema, options.limit ?? 0, 'limit');
  if (!limit.ok) {
    return limit;
  }

  const parameters: Record<string, string | number> = {};
  if (search) {
    parameters.search = search;
  }
  if (limit.value) {
    parameters.chunksize = limit.value;
  }
  if (offset.value || limit.value) {
    parameters.offset = offset.value;
  }
  if (options.sort !== undefined) {
    const sort = buildSortParameter(meta, options.sort);
    if (!sort.ok) {
      return sort;
    }
    if (sort.value) {
      parameters.sort = sort.value;
    }
  }
  if (options.where) {
    parameters.where = options.where;
  }

  return ok(parameters);
}

/**
 * Fetches pages of `pageSize` rows until one comes back short. When the total
 * is an exact multiple of the page size the last request returns no rows.
 */
export async function collectPages<T>(
  fetchPage: (offset: number, limit: number) => Promise<Result<readonly T[], NuclosError>>,
  pageSize: number = DEFAULT_PAGE_SIZE,
  startOffset = 0
): Promise<Result<T[], NuclosError>> {
  const size = parseInput(PageSizeSchema, pageSize, 'limit');
  if (!size.ok) {
    return size;
  }

  const rows: T[] = [];
  let offset = startOffset;
  for (;;) {
    const page = await fetchPage(offset, size.value);
    if (!page.ok) {
      return err(page.error);
    }
    rows.push(...page.value);
    if (page.value.length < size.value) {
      return ok(rows);
    }
    offset += size.value;
  }
}
