/**
 * cvekit - Type Definitions
 */

// ============================================================
// JSON
// ============================================================

/**
 * A decoded JSON object. Values stay `unknown` until a schema or an
 * explicit check narrows them.
 */
export type JsonObject = Record<string, unknown>;

// ============================================================
// CVE Record Types (CVE JSON 5.x)
// ============================================================

/** Discriminator value carried by full v5 records in `dataType` */
export const CVE_RECORD_DATA_TYPE = 'CVE_RECORD';

/** `providerMetadata` as injected into a container */
export interface ProviderMetadata {
  orgId: string;
  shortName?: string;
  dateUpdated?: string;
}

/** `x_generator` as injected into a container */
export interface GeneratorInfo {
  engine: string;
}

/** Which container a submission operates on */
export type ContainerKind = 'cna' | 'adp';

/**
 * Caller input after the discriminator check: either a full record or a
 * bare container.
 */
export type CveInput =
  | { kind: 'record'; record: JsonObject }
  | { kind: 'container'; container: JsonObject };

// ============================================================
// CVE Services Constants
// ============================================================

/** CVE ID states tracked by the CVE Services authority */
export const CveState = {
  RESERVED: 'RESERVED',
  PUBLISHED: 'PUBLISHED',
  REJECTED: 'REJECTED',
} as const;

export type CveState = (typeof CveState)[keyof typeof CveState];

/** Error codes returned in the `error` field of CVE Services responses */
export const CveServiceErrorCode = {
  RECORD_EXISTS: 'CVE_RECORD_EXISTS',
  RECORD_DOES_NOT_EXIST: 'CVE_RECORD_DNE',
} as const;

export type CveServiceErrorCode = (typeof CveServiceErrorCode)[keyof typeof CveServiceErrorCode];

/** Roles that can be granted to organization users */
export const USER_ROLES = ['ADMIN'] as const;

export type UserRole = (typeof USER_ROLES)[number];
