/**
 * Container extraction
 *
 * Callers may hand in either a full CVE JSON 5.x record or the bare CNA/ADP
 * container that CVE Services expects. A record is recognized only by its
 * `dataType` discriminator; anything else is treated as a container already.
 */

import { CVE_RECORD_DATA_TYPE } from '../types.js';
import type { ContainerKind, CveInput, JsonObject } from '../types.js';
import { MissingContainerError, MultipleContainersError } from '../errors.js';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when the object is a full record (`dataType: "CVE_RECORD"`)
 */
export function isCveRecord(obj: JsonObject): boolean {
  return obj.dataType === CVE_RECORD_DATA_TYPE;
}

export function classifyInput(obj: JsonObject): CveInput {
  return isCveRecord(obj)
    ? { kind: 'record', record: obj }
    : { kind: 'container', container: obj };
}

function recordContainers(record: JsonObject): JsonObject {
  const containers = record.containers;
  if (!isJsonObject(containers)) {
    throw new MissingContainerError('containers');
  }
  return containers;
}

/**
 * Return the CNA container of a full record, or the input unchanged if it
 * is already a container.
 */
export function extractCna(obj: JsonObject): JsonObject {
  const input = classifyInput(obj);
  if (input.kind === 'container') {
    return input.container;
  }

  const cna = recordContainers(input.record).cna;
  if (!isJsonObject(cna)) {
    throw new MissingContainerError('CNA');
  }
  return cna;
}

/**
 * Return the single ADP container of a full record, or the input unchanged
 * if it is already a container.
 *
 * A record with several ADP containers is ambiguous and is rejected rather
 * than guessed at; a record with none has nothing to extract.
 */
export function extractAdp(obj: JsonObject): JsonObject {
  const input = classifyInput(obj);
  if (input.kind === 'container') {
    return input.container;
  }

  const adp = recordContainers(input.record).adp;
  if (!Array.isArray(adp) || adp.length === 0) {
    throw new MissingContainerError('ADP');
  }
  if (adp.length > 1) {
    throw new MultipleContainersError(adp.length);
  }

  const [container] = adp;
  if (!isJsonObject(container)) {
    throw new MissingContainerError('ADP');
  }
  return container;
}

export function extractContainer(obj: JsonObject, kind: ContainerKind): JsonObject {
  return kind === 'cna' ? extractCna(obj) : extractAdp(obj);
}
