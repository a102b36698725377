/**
 * cvekit - CVE Services client
 *
 * @example
 * ```typescript
 * import { CveApi } from 'cvekit';
 *
 * const api = new CveApi({ username: 'user@example.com', org: 'example-cna', apiKey: process.env.CVE_API_KEY ?? '', env: 'test' });
 *
 * const { cve_ids } = await api.reserve(1, false, '2024');
 * await api.publish(cve_ids[0].cve_id, cnaContainer);
 *
 * for await (const id of api.listCves({ state: 'RESERVED' })) {
 *   console.log(id.cve_id);
 * }
 * ```
 */

// API client
export {
  CveApi,
  CVE_ENVIRONMENTS,
  DEFAULT_ENVIRONMENT,
  DEFAULT_TIMEOUT_MS,
  isCveEnvironment,
  resolveBaseUrl,
  paginate,
  collectAll,
} from './api/index.js';
export type {
  CveApiOptions,
  CveEnvironment,
  PageFetcher,
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
} from './api/index.js';

// Record normalization and validation
export {
  isJsonObject,
  isCveRecord,
  classifyInput,
  extractCna,
  extractAdp,
  extractContainer,
  ensureProviderMetadata,
  ensureGenerator,
  resolveGenerator,
  augmentContainer,
  GENERATOR_ENV_VAR,
  OMIT_GENERATOR,
  SchemaRegistry,
  SCHEMA_IDS,
  DEFAULT_SCHEMA,
  DEFAULT_SCHEMA_DIR,
  defaultSchemaRegistry,
  loadSchemaDocument,
  compareVersions,
  isSchemaId,
  validateRecord,
  collectViolations,
} from './record/index.js';
export type { OrgIdentityResolver, ProcessEnv, SchemaId, SchemaRef, CompiledSchema } from './record/index.js';

// Errors
export {
  CvekitError,
  CveRecordValidationError,
  ContainerExtractionError,
  MultipleContainersError,
  MissingContainerError,
  SchemaNotFoundError,
  CveApiRequestError,
  CveApiHttpError,
  CveApiResponseError,
  CveConfigurationError,
} from './errors.js';
export type { SchemaViolation } from './errors.js';

// Configuration
export {
  loadConfig,
  loadConfigFromFile,
  loadConfigFromPackageJson,
  configFromEnv,
  mergeConfig,
  validateConfig,
  toClientOptions,
  CONFIG_FILES,
  CONFIG_ENV_VARS,
} from './config/index.js';
export type { CvekitConfig } from './config/index.js';

// Types
export { CVE_RECORD_DATA_TYPE, CveState, CveServiceErrorCode, USER_ROLES } from './types.js';
export type {
  JsonObject,
  ProviderMetadata,
  GeneratorInfo,
  ContainerKind,
  CveInput,
  UserRole,
} from './types.js';

export { VERSION } from './version.js';
