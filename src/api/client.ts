/**
 * CVE Services API Client
 * https://cveawg.mitre.org/api-docs/
 */

import {
  augmentContainer,
  type OrgIdentityResolver,
  type ProcessEnv,
} from '../record/augment.js';
import { extractContainer } from '../record/extract.js';
import { defaultSchemaRegistry, type SchemaId, type SchemaRegistry } from '../record/schemas.js';
import { validateRecord } from '../record/validate.js';
import { CveState, type ContainerKind, type JsonObject } from '../types.js';
import {
  CveApiHttpError,
  CveApiRequestError,
  CveApiResponseError,
  CveConfigurationError,
  CvekitError,
} from '../errors.js';
import { paginate } from './paged.js';
import type {
  CveCountResponse,
  CveIdInfo,
  CveRecordResponse,
  HttpMethod,
  ListCvesFilters,
  NewUser,
  OrgInfo,
  PagedResponse,
  QueryParams,
  QuotaResponse,
  ReserveResponse,
  ResetSecretResponse,
  SubmitOptions,
  UserInfo,
  UserResponse,
  UserUpdate,
} from './types.js';

/** Base URLs of the CVE Services deployments */
export const CVE_ENVIRONMENTS = {
  prod: 'https://cveawg.mitre.org/api/',
  dev: 'https://cveawg-dev.mitre.org/api/',
  test: 'https://cveawg-test.mitre.org/api/',
} as const;

export type CveEnvironment = keyof typeof CVE_ENVIRONMENTS;

export const DEFAULT_ENVIRONMENT: CveEnvironment = 'prod';

/** Applied to every request; there are no retries */
export const DEFAULT_TIMEOUT_MS = 60000;

export interface CveApiOptions {
  username: string;
  org: string;
  apiKey: string;
  /** Deployment to talk to (default: prod); ignored when `url` is set */
  env?: string;
  /** Explicit base URL */
  url?: string;
  /** Request timeout in ms (default: 60000) */
  timeout?: number;
  /** Transport (default: global fetch) */
  fetch?: typeof fetch;
  /** Environment consulted for CVE_GENERATOR (default: process.env) */
  processEnv?: ProcessEnv;
  schemaRegistry?: SchemaRegistry;
}

interface RequestOptions {
  params?: QueryParams;
  json?: unknown;
}

export function isCveEnvironment(value: string): value is CveEnvironment {
  return Object.prototype.hasOwnProperty.call(CVE_ENVIRONMENTS, value);
}

/**
 * Base URL for an explicit override or a named environment
 */
export function resolveBaseUrl(env: string = DEFAULT_ENVIRONMENT, url?: string): string {
  const base = url || (isCveEnvironment(env) ? CVE_ENVIRONMENTS[env] : undefined);
  if (!base) {
    throw new CveConfigurationError(
      `Missing URL for CVE API: unknown environment "${env}" (expected one of ${Object.keys(CVE_ENVIRONMENTS).join(', ')})`
    );
  }
  // Paths are resolved relative to the base, which needs a trailing slash
  return base.endsWith('/') ? base : `${base}/`;
}

function toQueryString(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(key, String(value));
    }
  }
  return search.toString();
}

/** Encode a caller-supplied ID or name as a single path segment */
function segment(value: string): string {
  return encodeURIComponent(value);
}

async function readErrorBody(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class CveApi implements OrgIdentityResolver {
  readonly username: string;
  readonly org: string;
  readonly url: string;
  private readonly apiKey: string;
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch | undefined;
  private readonly processEnv: ProcessEnv | undefined;
  private readonly schemaRegistry: SchemaRegistry | undefined;

  constructor(options: CveApiOptions) {
    this.username = options.username;
    this.org = options.org;
    this.apiKey = options.apiKey;
    this.url = resolveBaseUrl(options.env, options.url);
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch;
    this.processEnv = options.processEnv;
    this.schemaRegistry = options.schemaRegistry;
  }

  // ============================================================
  // Transport
  // ============================================================

  /**
   * Issue one request and decode the JSON response.
   * Non-2xx responses raise CveApiHttpError; network failures and
   * timeouts raise CveApiRequestError.
   */
  private async request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    const target = new URL(path, this.url);
    if (options.params) {
      target.search = toQueryString(options.params);
    }
    const url = target.toString();

    const headers: Record<string, string> = {
      'CVE-API-KEY': this.apiKey,
      'CVE-API-ORG': this.org,
      'CVE-API-USER': this.username,
      'Accept': 'application/json',
    };
    let body: string | undefined;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    const doFetch = this.fetchImpl ?? fetch;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    // The timer stays armed until the body has been read
    try {
      const response = await doFetch(url, { method, headers, body, signal: controller.signal });
      if (!response.ok) {
        const errorBody = await readErrorBody(response);
        throw new CveApiHttpError(method, url, response.status, response.statusText, errorBody);
      }
      return await response.json() as T;
    } catch (error) {
      if (error instanceof CvekitError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new CveApiRequestError(`${method} ${url} timed out after ${this.timeout}ms`, method, url, { cause: error });
      }
      if (error instanceof SyntaxError) {
        throw new CveApiResponseError(`${method} ${url} returned a response that is not JSON`);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new CveApiRequestError(`${method} ${url} failed: ${reason}`, method, url, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private get<T>(path: string, params?: QueryParams): Promise<T> {
    return this.request<T>('GET', path, { params });
  }

  private getPaged<T>(path: string, itemsKey: string, params: QueryParams): AsyncGenerator<T, void, undefined> {
    return paginate<T>(pageParams => this.get<PagedResponse<T>>(path, pageParams), params, itemsKey);
  }

  private post<T>(path: string, options?: RequestOptions): Promise<T> {
    return this.request<T>('POST', path, options);
  }

  private put<T>(path: string, options?: RequestOptions): Promise<T> {
    return this.request<T>('PUT', path, options);
  }

  // ============================================================
  // Record Submission
  // ============================================================

  /**
   * Run the submission pipeline without submitting: extract the container,
   * add provider metadata and generator, then validate unless disabled.
   */
  async prepareContainer(
    kind: ContainerKind,
    cveJson: JsonObject,
    schema: SchemaId,
    options: SubmitOptions = {}
  ): Promise<JsonObject> {
    const extracted = extractContainer(cveJson, kind);
    const container = await augmentContainer(extracted, this, this.processEnv);
    if (options.validate ?? true) {
      validateRecord(container, schema, this.schemaRegistry ?? defaultSchemaRegistry());
    }
    return container;
  }

  private async submitCna(
    method: HttpMethod,
    path: string,
    cveJson: JsonObject,
    schema: SchemaId,
    options?: SubmitOptions
  ): Promise<CveRecordResponse> {
    const cnaContainer = await this.prepareContainer('cna', cveJson, schema, options);
    return this.request<CveRecordResponse>(method, path, { json: { cnaContainer } });
  }

  /** Publish a CVE record from a CNA container or full record */
  publish(cveId: string, cveJson: JsonObject, options?: SubmitOptions): Promise<CveRecordResponse> {
    return this.submitCna('POST', `cve/${segment(cveId)}/cna`, cveJson, 'cnaPublished', options);
  }

  updatePublished(cveId: string, cveJson: JsonObject, options?: SubmitOptions): Promise<CveRecordResponse> {
    return this.submitCna('PUT', `cve/${segment(cveId)}/cna`, cveJson, 'cnaPublished', options);
  }

  /** Add or update this organization's ADP container on a CVE record */
  async publishAdp(cveId: string, cveJson: JsonObject, options?: SubmitOptions): Promise<CveRecordResponse> {
    const adpContainer = await this.prepareContainer('adp', cveJson, 'adp', options);
    return this.put<CveRecordResponse>(`cve/${segment(cveId)}/adp`, { json: { adpContainer } });
  }

  /** Reject a CVE ID with a rejected-CNA container */
  reject(cveId: string, cveJson: JsonObject, options?: SubmitOptions): Promise<CveRecordResponse> {
    return this.submitCna('POST', `cve/${segment(cveId)}/reject`, cveJson, 'cnaRejected', options);
  }

  updateRejected(cveId: string, cveJson: JsonObject, options?: SubmitOptions): Promise<CveRecordResponse> {
    return this.submitCna('PUT', `cve/${segment(cveId)}/reject`, cveJson, 'cnaRejected', options);
  }

  // ============================================================
  // CVE IDs
  // ============================================================

  /**
   * Move a RESERVED CVE ID to REJECTED without a record.
   * Not possible once the ID has been PUBLISHED.
   */
  moveToRejected(cveId: string): Promise<CveIdInfo> {
    return this.put<CveIdInfo>(`cve-id/${segment(cveId)}`, { params: { state: CveState.REJECTED } });
  }

  /**
   * Move a CVE ID rejected without a record back to RESERVED.
   */
  moveToReserved(cveId: string): Promise<CveIdInfo> {
    return this.put<CveIdInfo>(`cve-id/${segment(cveId)}`, { params: { state: CveState.RESERVED } });
  }

  /**
   * Reserve CVE IDs. The response lists the reserved IDs and the remaining
   * quota. `random` only matters when more than one ID is requested.
   */
  reserve(count: number, random: boolean, year: string): Promise<ReserveResponse> {
    const params: QueryParams = {
      cve_year: year,
      amount: count,
      short_name: this.org,
    };
    if (count > 1) {
      params.batch_type = random ? 'nonsequential' : 'sequential';
    }
    return this.post<ReserveResponse>('cve-id', { params });
  }

  showCveId(cveId: string): Promise<CveIdInfo> {
    return this.get<CveIdInfo>(`cve-id/${segment(cveId)}`);
  }

  showCveRecord(cveId: string): Promise<JsonObject> {
    return this.get<JsonObject>(`cve/${segment(cveId)}`);
  }

  listCves(filters: ListCvesFilters = {}): AsyncGenerator<CveIdInfo, void, undefined> {
    const params: QueryParams = {};
    if (filters.year) params.cve_id_year = filters.year;
    if (filters.state) params.state = filters.state.toUpperCase();
    if (filters.reservedLt) params['time_reserved.lt'] = filters.reservedLt.toISOString();
    if (filters.reservedGt) params['time_reserved.gt'] = filters.reservedGt.toISOString();
    return this.getPaged<CveIdInfo>('cve-id', 'cve_ids', params);
  }

  /**
   * Count CVE records, optionally by state (only RESERVED and PUBLISHED
   * can be counted).
   */
  countCves(state?: string): Promise<CveCountResponse> {
    const params: QueryParams = {};
    if (state) params.state = state.toUpperCase();
    return this.get<CveCountResponse>('cve_count', params);
  }

  // ============================================================
  // Organization & Users
  // ============================================================

  quota(): Promise<QuotaResponse> {
    return this.get<QuotaResponse>(`org/${segment(this.org)}/id_quota`);
  }

  showOrg(): Promise<OrgInfo> {
    return this.get<OrgInfo>(`org/${segment(this.org)}`);
  }

  /** UUID of the organization this client acts for */
  async resolveOrgId(): Promise<string> {
    const org = await this.showOrg();
    if (typeof org.UUID !== 'string' || org.UUID === '') {
      throw new CveApiResponseError(`Organization ${this.org} has no UUID in the CVE Services response`);
    }
    return org.UUID;
  }

  showUser(username: string): Promise<UserInfo> {
    return this.get<UserInfo>(`org/${segment(this.org)}/user/${segment(username)}`);
  }

  resetApiKey(username: string): Promise<ResetSecretResponse> {
    return this.put<ResetSecretResponse>(`org/${segment(this.org)}/user/${segment(username)}/reset_secret`);
  }

  createUser(user: NewUser): Promise<UserResponse> {
    return this.post<UserResponse>(`org/${segment(this.org)}/user`, { json: user });
  }

  updateUser(username: string, update: UserUpdate): Promise<UserResponse> {
    const params: QueryParams = {
      'new_username': update.newUsername,
      'active': update.active,
      'name.first': update.firstName,
      'name.last': update.lastName,
      'name.middle': update.middleName,
      'name.suffix': update.suffix,
      'active_roles.add': update.addRole,
      'active_roles.remove': update.removeRole,
      'org_short_name': update.newOrg,
    };
    return this.put<UserResponse>(`org/${segment(this.org)}/user/${segment(username)}`, { params });
  }

  listUsers(): AsyncGenerator<UserInfo, void, undefined> {
    return this.getPaged<UserInfo>(`org/${segment(this.org)}/users`, 'users', {});
  }

  // ============================================================
  // Health
  // ============================================================

  /**
   * Check that CVE Services is reachable. Returns null when healthy and the
   * request error otherwise; never throws.
   */
  async ping(): Promise<CveApiRequestError | null> {
    try {
      await this.get<unknown>('health-check');
    } catch (error) {
      if (error instanceof CveApiRequestError) {
        return error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      const url = new URL('health-check', this.url).toString();
      return new CveApiRequestError(`GET ${url} failed: ${reason}`, 'GET', url, { cause: error });
    }
    return null;
  }
}

export default CveApi;
