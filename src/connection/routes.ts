/**
 * REST routes, relative to `{instance}/rest/`.
 */

const segment = (value: string): string => encodeURIComponent(value);

export const Routes = {
  version: 'version',
  dbVersion: 'dbversion',
  /** POST logs in, DELETE logs out. */
  session: '',
  businessObjects: 'bo_metas',
  businessObjectMeta: (boMetaId: string): string => `bo_metas/${segment(boMetaId)}`,
  records: (boMetaId: string): string => `bo_metas/${segment(boMetaId)}/bos`,
  record: (boMetaId: string, boId: string): string =>
    `bo_metas/${segment(boMetaId)}/bos/${segment(boId)}`,
  dependencyRecords: (boMetaId: string, boId: string, dependencyId: string): string =>
    `bo_metas/${segment(boMetaId)}/bos/${segment(boId)}/subBos/${segment(dependencyId)}`,
  stateChange: (boMetaId: string, boId: string, stateId: string): string =>
    `bo_metas/${segment(boMetaId)}/bos/${segment(boId)}/state/${segment(stateId)}`,
} as const;
