/**
 * CVE Services API Type Definitions
 * https://cveawg.mitre.org/api-docs/
 */

import type { CveState, JsonObject, UserRole } from '../types.js';

// ============================================================
// Transport Types
// ============================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT';

export type QueryValue = string | number | boolean | undefined;

/** Query parameters; undefined values are left out of the URL */
export type QueryParams = Record<string, QueryValue>;

/**
 * A page of a paged collection. Items sit under a resource-named key
 * (`cve_ids`, `users`); `nextPage` is null on the last page and absent when
 * the whole collection fit on one.
 */
export type PagedResponse<T> = Record<string, T[] | number | string | null | undefined>;

// ============================================================
// CVE ID Types
// ============================================================

export interface CveIdInfo {
  cve_id: string;
  cve_year: string;
  state: CveState;
  owning_cna: string;
  requested_by: {
    cna: string;
    user: string;
  };
  reserved: string;
  time: {
    created: string;
    modified: string;
  };
}

export interface ReserveResponse {
  cve_ids: CveIdInfo[];
  meta?: {
    remaining_quota?: number;
  };
}

export interface CveCountResponse {
  totalCount: number;
}

export interface ListCvesFilters {
  year?: string;
  state?: string;
  /** Only IDs reserved strictly before this time */
  reservedLt?: Date;
  /** Only IDs reserved strictly after this time */
  reservedGt?: Date;
}

// ============================================================
// Record Types
// ============================================================

/** Response to publish/update/reject calls */
export interface CveRecordResponse {
  message: string;
  created?: JsonObject;
  updated?: JsonObject;
}

export interface SubmitOptions {
  /** Validate the container before submitting (default: true) */
  validate?: boolean;
}

// ============================================================
// Organization / User Types
// ============================================================

export interface QuotaResponse {
  id_quota: number;
  total_reserved: number;
  available: number;
}

export interface OrgInfo {
  UUID: string;
  short_name: string;
  name: string;
  authority?: {
    active_roles: string[];
  };
  policies?: {
    id_quota: number;
  };
  time?: {
    created: string;
    modified: string;
  };
}

export interface UserName {
  first?: string;
  last?: string;
  middle?: string;
  suffix?: string;
}

export interface UserInfo {
  username: string;
  name?: UserName;
  UUID?: string;
  org_UUID?: string;
  active?: boolean;
  authority?: {
    active_roles: UserRole[];
  };
  time?: {
    created: string;
    modified: string;
  };
}

export interface NewUser {
  username: string;
  name?: UserName;
  authority?: {
    active_roles: UserRole[];
  };
}

/**
 * Fields of an existing user to change. The service takes these as query
 * parameters rather than a JSON body.
 */
export interface UserUpdate {
  newUsername?: string;
  active?: boolean;
  firstName?: string;
  lastName?: string;
  middleName?: string;
  suffix?: string;
  addRole?: UserRole;
  removeRole?: UserRole;
  /** Move the user to another organization (secretariat only) */
  newOrg?: string;
}

export interface UserResponse {
  message: string;
  created?: UserInfo;
  updated?: UserInfo;
}

export interface ResetSecretResponse {
  'API-secret': string;
}
