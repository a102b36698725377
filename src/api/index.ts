/**
 * CVE Services API Module
 */

export {
  CveApi,
  CVE_ENVIRONMENTS,
  DEFAULT_ENVIRONMENT,
  DEFAULT_TIMEOUT_MS,
  isCveEnvironment,
  resolveBaseUrl,
} from './client.js';
export type { CveApiOptions, CveEnvironment } from './client.js';

export { paginate, collectAll } from './paged.js';
export type { PageFetcher } from './paged.js';

export type {
  HttpMethod,
  QueryParams,
  QueryValue,
  PagedResponse,
  CveIdInfo,
  ReserveResponse,
  CveCountResponse,
  ListCvesFilters,
  CveRecordResponse,
  SubmitOptions,
  QuotaResponse,
  OrgInfo,
  UserName,
  UserInfo,
  NewUser,
  UserUpdate,
  UserResponse,
  ResetSecretResponse,
} from './types.js';
