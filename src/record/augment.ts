/**
 * Metadata augmentation
 *
 * Fills in the two fields CVE Services needs on every submitted container
 * when the caller left them out:
 * - providerMetadata.orgId, resolved from the caller's organization
 * - x_generator.engine, identifying the tool that produced the record
 *
 * Caller-supplied values are never overwritten. The input object is never
 * mutated; injected keys are appended after the existing ones.
 */

import type { GeneratorInfo, JsonObject, ProviderMetadata } from '../types.js';
import { DEFAULT_GENERATOR } from '../version.js';

/** Environment variable overriding the injected generator value */
export const GENERATOR_ENV_VAR = 'CVE_GENERATOR';

/** Setting CVE_GENERATOR to this value disables generator injection */
export const OMIT_GENERATOR = '-';

/**
 * Resolves the UUID of the organization submitting a container.
 * `CveApi` implements this with a lookup against CVE Services.
 */
export interface OrgIdentityResolver {
  resolveOrgId(): Promise<string>;
}

export type ProcessEnv = Record<string, string | undefined>;

export async function ensureProviderMetadata(
  container: JsonObject,
  resolver: OrgIdentityResolver
): Promise<JsonObject> {
  if ('providerMetadata' in container) {
    return container;
  }

  const providerMetadata: ProviderMetadata = { orgId: await resolver.resolveOrgId() };
  return { ...container, providerMetadata };
}

/**
 * Generator value to inject, or null when injection is disabled
 */
export function resolveGenerator(env: ProcessEnv = process.env): string | null {
  const override = env[GENERATOR_ENV_VAR];
  if (override === OMIT_GENERATOR) {
    return null;
  }
  return override ?? DEFAULT_GENERATOR;
}

export function ensureGenerator(container: JsonObject, env: ProcessEnv = process.env): JsonObject {
  if ('x_generator' in container) {
    return container;
  }

  const engine = resolveGenerator(env);
  if (engine === null) {
    return container;
  }
  const generator: GeneratorInfo = { engine };
  return { ...container, x_generator: generator };
}

/**
 * Provider metadata first, then generator
 */
export async function augmentContainer(
  container: JsonObject,
  resolver: OrgIdentityResolver,
  env: ProcessEnv = process.env
): Promise<JsonObject> {
  const withProvider = await ensureProviderMetadata(container, resolver);
  return ensureGenerator(withProvider, env);
}
