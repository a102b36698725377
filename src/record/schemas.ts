/**
 * CVE JSON Schema registry
 *
 * Schema documents live in the package's `schemas/` directory, one file per
 * schema and version (e.g. `CVE_JSON_cnaPublishedContainer_5.1.1.json`).
 * A logical schema id resolves to the highest version present. Documents
 * and compiled validators are cached per registry.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { globSync } from 'glob';
import { Ajv, type ValidateFunction } from 'ajv';
import { SchemaNotFoundError } from '../errors.js';
import { isJsonObject } from './extract.js';
import type { JsonObject } from '../types.js';

export const SCHEMA_IDS = ['cnaPublished', 'cnaRejected', 'adp', 'bundled'] as const;

export type SchemaId = (typeof SCHEMA_IDS)[number];

/** Schema used when a caller validates without naming one */
export const DEFAULT_SCHEMA: SchemaId = 'cnaPublished';

/** File name prefix of each schema; the version and `.json` follow */
const SCHEMA_FILE_PREFIXES: Record<SchemaId, string> = {
  cnaPublished: 'CVE_JSON_cnaPublishedContainer_',
  cnaRejected: 'CVE_JSON_cnaRejectedContainer_',
  adp: 'CVE_JSON_adpContainer_',
  bundled: 'CVE_JSON_bundled_',
};

export const DEFAULT_SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

/** A schema to validate against: a known id, or an explicit file */
export type SchemaRef = SchemaId | { file: string };

export interface CompiledSchema {
  /** Path of the schema document */
  source: string;
  validate: ValidateFunction;
}

export function isSchemaId(value: string): value is SchemaId {
  return SCHEMA_IDS.some(id => id === value);
}

/**
 * Compare dotted numeric versions ("5.1.10" > "5.1.9")
 */
export function compareVersions(a: string, b: string): number {
  const pa = a.split('.').map(part => parseInt(part, 10) || 0);
  const pb = b.split('.').map(part => parseInt(part, 10) || 0);
  const length = Math.max(pa.length, pb.length);
  for (let i = 0; i < length; i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export class SchemaRegistry {
  private readonly schemaDir: string;
  private readonly paths = new Map<SchemaId, string>();
  private readonly compiled = new Map<string, CompiledSchema>();

  constructor(schemaDir: string = DEFAULT_SCHEMA_DIR) {
    this.schemaDir = schemaDir;
  }

  /**
   * Path of the latest version of a schema
   */
  resolvePath(id: SchemaId): string {
    const cached = this.paths.get(id);
    if (cached) return cached;

    const prefix = SCHEMA_FILE_PREFIXES[id];
    const candidates = globSync(`${prefix}*.json`, { cwd: this.schemaDir, nodir: true });
    if (candidates.length === 0) {
      throw new SchemaNotFoundError(`No ${id} schema (${prefix}*.json) found in ${this.schemaDir}`);
    }

    const versionOf = (file: string) => file.slice(prefix.length, -'.json'.length);
    const [latest] = [...candidates].sort((a, b) => compareVersions(versionOf(b), versionOf(a)));
    const resolved = path.join(this.schemaDir, latest);
    this.paths.set(id, resolved);
    return resolved;
  }

  /**
   * Version string of the resolved schema file (e.g. "5.1.1")
   */
  version(id: SchemaId): string {
    const file = path.basename(this.resolvePath(id));
    return file.slice(SCHEMA_FILE_PREFIXES[id].length, -'.json'.length);
  }

  get(ref: SchemaRef): CompiledSchema {
    const source = typeof ref === 'string' ? this.resolvePath(ref) : path.resolve(ref.file);

    const cached = this.compiled.get(source);
    if (cached) return cached;

    const entry: CompiledSchema = { source, validate: compileSchema(loadSchemaDocument(source)) };
    this.compiled.set(source, entry);
    return entry;
  }
}

export function loadSchemaDocument(file: string): JsonObject {
  if (!fs.existsSync(file)) {
    throw new SchemaNotFoundError(`Schema file not found: ${file}`);
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (!isJsonObject(parsed)) {
    throw new SchemaNotFoundError(`Schema file is not a JSON object: ${file}`);
  }
  return parsed;
}

/**
 * Compile a draft-07 document. Each document gets its own Ajv instance so
 * schemas sharing an `$id` never collide. Formats are not asserted and
 * nothing is coerced, defaulted or removed, so validation leaves the
 * input as it was.
 */
function compileSchema(schema: JsonObject): ValidateFunction {
  const ajv = new Ajv({
    allErrors: true,
    strict: false,
    validateFormats: false,
    useDefaults: false,
    coerceTypes: false,
    removeAdditional: false,
  });
  return ajv.compile(schema);
}

let defaultRegistry: SchemaRegistry | null = null;

/** Registry over the bundled `schemas/` directory */
export function defaultSchemaRegistry(): SchemaRegistry {
  defaultRegistry ??= new SchemaRegistry();
  return defaultRegistry;
}
