/**
 * surfacewatch - Repository input / update type definitions
 *
 * Upsert types use `Omit` to strip generated columns (id, createdAt) and the
 * natural key, which is passed separately.
 * Update types use `Partial<Pick<...>>` to allow selective field updates.
 */

import type { Discovery, Finding, Host, Job, SavedSearch, Target } from './entities.js';

// ============================================================
// Upsert / create input types
// ============================================================

/** Fields written when a Target is upserted by (zone, name). */
export type TargetFields = Pick<Target, 'type' | 'tag' | 'owner' | 'metadata' | 'lastdate'>;

/** Fields written when a Discovery is upserted by name. */
export type DiscoveryFields = Pick<
  Discovery,
  'type' | 'tag' | 'info' | 'owner' | 'metadata' | 'lastdate'
>;

/** Input for creating a new Host. */
export type CreateHostInput = Omit<Host, 'id' | 'createdAt'>;

/** Input for creating a new Finding. */
export type CreateFindingInput = Omit<Finding, 'id'>;

/** Input for creating a new Job. */
export type CreateJobInput = Omit<Job, 'id' | 'createdAt'>;

/** Input for creating a new SavedSearch. */
export type CreateSavedSearchInput = Omit<SavedSearch, 'id'>;

// ============================================================
// Update input types
// ============================================================

/** Input for updating an existing Discovery. */
export type UpdateDiscoveryInput = Partial<Pick<Discovery, 'tag' | 'info' | 'lastdate'>>;

/** Input for updating an existing Host. */
export type UpdateHostInput = Partial<
  Pick<
    Host,
    | 'nname'
    | 'ipv4'
    | 'info'
    | 'infoGnmap'
    | 'owner'
    | 'metadata'
    | 'lastdate'
    | 'serviceSsh'
    | 'serviceRdp'
    | 'serviceFtp'
    | 'serviceTelnet'
    | 'serviceSmb'
  >
>;

/** Input for refreshing an existing Finding on rediscovery or triage. */
export type UpdateFindingInput = Partial<
  Pick<
    Finding,
    | 'tfp'
    | 'level'
    | 'engine'
    | 'status'
    | 'lastdate'
    | 'bumpdate'
    | 'ptime'
    | 'uri'
    | 'fullUri'
    | 'uriTruncated'
    | 'port'
    | 'nname'
    | 'owner'
    | 'metadata'
    | 'info'
    | 'ticket'
  >
>;

// ============================================================
// Result types
// ============================================================

/** Result of an upsert keyed by natural key. */
export interface UpsertResult<T> {
  record: T;
  inserted: boolean;
}
