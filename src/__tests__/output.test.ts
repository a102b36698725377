import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import {
  formatCveIdRow,
  formatJson,
  formatOrg,
  formatReserved,
  formatUser,
  formatUserRow,
  formatViolations,
} from '../output/index.js';
import type { CveIdInfo } from '../api/types.js';

describe('text output', () => {
  let previousLevel: typeof chalk.level;

  beforeAll(() => {
    previousLevel = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = previousLevel;
  });

  const info: CveIdInfo = {
    cve_id: 'CVE-2024-0001',
    cve_year: '2024',
    state: 'RESERVED',
    owning_cna: 'example-cna',
    requested_by: { cna: 'example-cna', user: 'user@example.com' },
    reserved: '2024-03-01T10:00:00.000Z',
    time: { created: '2024-03-01T10:00:00.000Z', modified: '2024-03-02T10:00:00.000Z' },
  };

  it('should render a CVE ID as a tab-separated row', () => {
    expect(formatCveIdRow(info)).toBe(
      'CVE-2024-0001\tRESERVED\t2024-03-01T10:00:00.000Z\tuser@example.com (example-cna)'
    );
  });

  it('should omit remaining quota when the service leaves it out', () => {
    expect(formatReserved({ cve_ids: [info] })).toBe('CVE-2024-0001');
  });

  it('should skip empty rows in organization details', () => {
    expect(formatOrg({ UUID: 'org-uuid', short_name: 'example-cna', name: 'Example CNA' })).toBe(
      'Example CNA (example-cna)\n└─ UUID:\torg-uuid'
    );
  });

  it('should render users with their full name', () => {
    const user = {
      username: 'dev@example.com',
      name: { first: 'Dev', last: 'Eloper' },
      active: false,
      authority: { active_roles: ['ADMIN' as const] },
    };

    expect(formatUser(user)).toBe('Dev Eloper (dev@example.com)\n├─ Active:\tNo\n└─ Roles:\tADMIN');
    expect(formatUserRow(user)).toBe('dev@example.com\tDev Eloper\tinactive');
  });

  it('should list violations one per line', () => {
    const violations = [
      { message: '/title must be string', path: '/title', keyword: 'type', schemaPath: '#/definitions/title/type' },
      { message: "must have required property 'affected'", path: '', keyword: 'required', schemaPath: '#/required' },
    ];

    expect(formatViolations(violations)).toBe(
      "  - /title must be string\n  - must have required property 'affected'"
    );
  });

  it('should print compact JSON on request', () => {
    expect(formatJson({ a: [1, 2] }, false)).toBe('{"a":[1,2]}');
    expect(formatJson({ a: 1 })).toBe('{\n  "a": 1\n}');
  });
});
