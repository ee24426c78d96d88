/**
 * Name Resolver
 *
 * Finds attributes, dependencies, processes and business object types by a
 * free-form name. Matching is case-insensitive and treats spaces and
 * underscores alike; when that finds nothing, names are compared with every
 * separator removed, so "email", "Email" and "e mail" all find "E-Mail".
 *
 * Ids are never normalized: lookup by id needs the exact id.
 */

import type { Result } from '../core/result.js';
import { ok, err } from '../core/result.js';
import { NotFoundError } from '../core/errors.js';
import type {
  AttributeMeta,
  BusinessObjectMeta,
  BusinessObjectSummary,
  DependencyMeta,
  ProcessMeta,
} from '../types/metadata.js';

/**
 * A name resolved against one business object type. An attribute wins over a
 * dependency of the same name.
 */
export type ResolvedField =
  | { readonly kind: 'attribute'; readonly attribute: AttributeMeta }
  | { readonly kind: 'dependency'; readonly dependency: DependencyMeta };

interface Named {
  readonly name: string;
}

export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/ /g, '_');
}

/**
 * Lower-cased name without spaces, underscores or hyphens.
 */
export function compactName(name: string): string {
  return name.toLowerCase().replace(/[\s_-]+/g, '');
}

function findNormalized<T extends Named>(candidates: readonly T[], name: string): T | undefined {
  const wanted = normalizeName(name);
  return candidates.find((candidate) => normalizeName(candidate.name) === wanted);
}

function findCompact<T extends Named>(candidates: readonly T[], name: string): T | undefined {
  const wanted = compactName(name);
  if (!wanted) {
    return undefined;
  }
  return candidates.find((candidate) => compactName(candidate.name) === wanted);
}

/**
 * First candidate whose name matches, trying the normalized form before the
 * compact one.
 */
export function findByName<T extends Named>(candidates: readonly T[], name: string): T | undefined {
  return findNormalized(candidates, name) ?? findCompact(candidates, name);
}

export function resolveAttribute(
  meta: BusinessObjectMeta,
  name: string
): Result<AttributeMeta, NotFoundError> {
  const attribute = findByName(meta.attributes, name);
  return attribute
    ? ok(attribute)
    : err(new NotFoundError('attribute', name, undefined, { boMetaId: meta.boMetaId }));
}

export function resolveDependency(
  meta: BusinessObjectMeta,
  name: string
): Result<DependencyMeta, NotFoundError> {
  const dependency = findByName(meta.dependencies, name);
  return dependency
    ? ok(dependency)
    : err(new NotFoundError('dependency', name, undefined, { boMetaId: meta.boMetaId }));
}

export function resolveProcess(
  meta: BusinessObjectMeta,
  name: string
): Result<ProcessMeta, NotFoundError> {
  const process = findByName(meta.processes, name);
  return process
    ? ok(process)
    : err(new NotFoundError('process', name, undefined, { boMetaId: meta.boMetaId }));
}

/**
 * Resolves a name to an attribute or a dependency. Each matching pass checks
 * attributes first.
 */
export function resolveField(
  meta: BusinessObjectMeta,
  name: string
): Result<ResolvedField, NotFoundError> {
  const passes = [findNormalized, findCompact];
  for (const find of passes) {
    const attribute = find(meta.attributes, name);
    if (attribute) {
      return ok({ kind: 'attribute', attribute });
    }
    const dependency = find(meta.dependencies, name);
    if (dependency) {
      return ok({ kind: 'dependency', dependency });
    }
  }
  return err(new NotFoundError('field', name, undefined, { boMetaId: meta.boMetaId }));
}

export function findAttributeById(
  meta: BusinessObjectMeta,
  boAttrId: string
): Result<AttributeMeta, NotFoundError> {
  const attribute = meta.attributes.find((candidate) => candidate.boAttrId === boAttrId);
  return attribute
    ? ok(attribute)
    : err(new NotFoundError('attribute', boAttrId, undefined, { boMetaId: meta.boMetaId }));
}

export function findDependencyById(
  meta: BusinessObjectMeta,
  dependencyId: string
): Result<DependencyMeta, NotFoundError> {
  const dependency = meta.dependencies.find((candidate) => candidate.dependencyId === dependencyId);
  return dependency
    ? ok(dependency)
    : err(new NotFoundError('dependency', dependencyId, undefined, { boMetaId: meta.boMetaId }));
}

export function resolveBusinessObject(
  summaries: readonly BusinessObjectSummary[],
  name: string
): Result<BusinessObjectSummary, NotFoundError> {
  const summary = findByName(summaries, name);
  return summary ? ok(summary) : err(new NotFoundError('business_object', name));
}
