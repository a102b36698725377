/**
 * CVE record normalization and validation
 */

export { isJsonObject, isCveRecord, classifyInput, extractCna, extractAdp, extractContainer } from './extract.js';

export {
  ensureProviderMetadata,
  ensureGenerator,
  resolveGenerator,
  augmentContainer,
  GENERATOR_ENV_VAR,
  OMIT_GENERATOR,
} from './augment.js';
export type { OrgIdentityResolver, ProcessEnv } from './augment.js';

export {
  SchemaRegistry,
  SCHEMA_IDS,
  DEFAULT_SCHEMA,
  DEFAULT_SCHEMA_DIR,
  defaultSchemaRegistry,
  loadSchemaDocument,
  compareVersions,
  isSchemaId,
} from './schemas.js';
export type { SchemaId, SchemaRef, CompiledSchema } from './schemas.js';

export { validateRecord, collectViolations } from './validate.js';
