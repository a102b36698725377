/**
 * Container Extraction Tests
 */

import { describe, it, expect } from 'vitest';
import {
  isCveRecord,
  classifyInput,
  extractCna,
  extractAdp,
  extractContainer,
} from '../record/extract.js';
import { MissingContainerError, MultipleContainersError } from '../errors.js';
import { loadFixture, ORG_UUID } from './helpers/fixtures.js';

const adpOne = { providerMetadata: { orgId: '8254265b-2729-46b6-b9e3-3dfca2d5bfca' }, title: 'first' };
const adpTwo = { providerMetadata: { orgId: '0b2f5b2e-1d4c-4f3a-9a8b-7c6d5e4f3a2b' }, title: 'second' };

function recordWith(adp?: unknown[]) {
  return {
    dataType: 'CVE_RECORD',
    dataVersion: '5.1',
    containers: adp === undefined ? { cna: { title: 'cna' } } : { cna: { title: 'cna' }, adp },
  };
}

describe('isCveRecord', () => {
  it('should recognize full records by dataType', () => {
    expect(isCveRecord({ dataType: 'CVE_RECORD' })).toBe(true);
  });

  it('should treat anything else as a container', () => {
    expect(isCveRecord({ descriptions: [] })).toBe(false);
    expect(isCveRecord({ dataType: 'cve_record' })).toBe(false);
    expect(isCveRecord({ containers: { cna: {} } })).toBe(false);
  });
});

describe('classifyInput', () => {
  it('should tag records and containers', () => {
    const record = recordWith();
    const container = { title: 'x' };

    expect(classifyInput(record)).toEqual({ kind: 'record', record });
    expect(classifyInput(container)).toEqual({ kind: 'container', container });
  });
});

describe('extractCna', () => {
  it('should return the CNA container of a full record', () => {
    const record = loadFixture('full-record.json');
    const cna = extractCna(record);

    expect(cna.providerMetadata).toEqual({ orgId: ORG_UUID });
    expect(cna).toHaveProperty('affected');
    expect(cna).not.toHaveProperty('dataType');
  });

  it('should return a bare container unchanged', () => {
    const container = loadFixture('cna-container.json');
    expect(extractCna(container)).toBe(container);
  });

  it('should be idempotent', () => {
    const record = loadFixture('full-record.json');
    const once = extractCna(record);
    expect(extractCna(once)).toBe(once);
  });

  it('should fail when a record has no CNA container', () => {
    expect(() => extractCna({ dataType: 'CVE_RECORD', containers: {} })).toThrow(MissingContainerError);
    expect(() => extractCna({ dataType: 'CVE_RECORD' })).toThrow('CVE record has no containers container');
  });

  it('should not mutate the input', () => {
    const record = loadFixture('full-record.json');
    const before = structuredClone(record);
    extractCna(record);
    expect(record).toEqual(before);
  });
});

describe('extractAdp', () => {
  it('should return the only ADP container unchanged', () => {
    const record = recordWith([adpOne]);
    expect(extractAdp(record)).toBe(adpOne);
  });

  it('should reject records with multiple ADP containers', () => {
    const record = recordWith([adpOne, adpTwo]);

    expect(() => extractAdp(record)).toThrow(MultipleContainersError);
    expect(() => extractAdp(record)).toThrow(
      'Cannot extract ADP container if multiple are present in CVE record (found 2)'
    );
  });

  it('should fail when a record has an empty ADP list', () => {
    expect(() => extractAdp(recordWith([]))).toThrow(MissingContainerError);
  });

  it('should fail when a record has no ADP list', () => {
    expect(() => extractAdp(recordWith())).toThrow('CVE record has no ADP container');
  });

  it('should return a bare container unchanged', () => {
    expect(extractAdp(adpOne)).toBe(adpOne);
  });
});

describe('extractContainer', () => {
  it('should dispatch on container kind', () => {
    const record = recordWith([adpOne]);

    expect(extractContainer(record, 'cna')).toEqual({ title: 'cna' });
    expect(extractContainer(record, 'adp')).toBe(adpOne);
  });
});
