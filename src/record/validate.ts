/**
 * CVE container validation against the CVE JSON schemas
 */

import type { ErrorObject } from 'ajv';
import { CveRecordValidationError, type SchemaViolation } from '../errors.js';
import { DEFAULT_SCHEMA, defaultSchemaRegistry, type SchemaRef, type SchemaRegistry } from './schemas.js';
import type { JsonObject } from '../types.js';

function toViolation(error: ErrorObject): SchemaViolation {
  const text = error.message ?? `failed ${error.keyword} check`;
  return {
    message: error.instancePath ? `${error.instancePath} ${text}` : text,
    path: error.instancePath,
    keyword: error.keyword,
    schemaPath: error.schemaPath,
  };
}

function byMessage(a: SchemaViolation, b: SchemaViolation): number {
  if (a.message < b.message) return -1;
  if (a.message > b.message) return 1;
  return 0;
}

/**
 * Every violation of the schema, sorted by message. Empty when valid.
 */
export function collectViolations(
  container: JsonObject,
  schema: SchemaRef = DEFAULT_SCHEMA,
  registry: SchemaRegistry = defaultSchemaRegistry()
): SchemaViolation[] {
  const { validate } = registry.get(schema);
  if (validate(container)) {
    return [];
  }
  return (validate.errors ?? []).map(toViolation).sort(byMessage);
}

/**
 * Validate a container, throwing CveRecordValidationError listing all
 * violations when it does not conform.
 *
 * @example
 * ```typescript
 * validateRecord(container, 'cnaRejected');
 * validateRecord(container, { file: './my-schema.json' });
 * ```
 */
export function validateRecord(
  container: JsonObject,
  schema: SchemaRef = DEFAULT_SCHEMA,
  registry: SchemaRegistry = defaultSchemaRegistry()
): void {
  const violations = collectViolations(container, schema, registry);
  if (violations.length > 0) {
    throw new CveRecordValidationError(registry.get(schema).source, violations);
  }
}
