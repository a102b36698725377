/**
 * Human-readable output for CLI commands
 */

import chalk from 'chalk';
import type { CveIdInfo, CveRecordResponse, OrgInfo, QuotaResponse, ReserveResponse, UserInfo } from '../api/types.js';
import type { SchemaViolation } from '../errors.js';

const STATE_COLORS: Record<string, (text: string) => string> = {
  RESERVED: chalk.yellow,
  PUBLISHED: chalk.green,
  REJECTED: chalk.red,
};

function colorState(state: string): string {
  const color = STATE_COLORS[state] ?? chalk.white;
  return color(state);
}

/**
 * Render label/value pairs as a tree under a heading; empty values are skipped
 */
function tree(heading: string, rows: Array<[string, string | undefined]>): string {
  const present = rows.filter((row): row is [string, string] => row[1] !== undefined && row[1] !== '');
  const lines = [chalk.bold(heading)];
  present.forEach(([label, value], index) => {
    const branch = index === present.length - 1 ? '└─' : '├─';
    lines.push(`${branch} ${label}:\t${value}`);
  });
  return lines.join('\n');
}

export function formatCveId(info: CveIdInfo): string {
  return tree(info.cve_id, [
    ['State', colorState(info.state)],
    ['Owning CNA', info.owning_cna],
    ['Reserved by', info.requested_by ? `${info.requested_by.user} (${info.requested_by.cna})` : undefined],
    ['Reserved on', info.reserved],
    ['Updated on', info.time?.modified],
  ]);
}

export function formatCveIdRow(info: CveIdInfo): string {
  const reservedBy = info.requested_by ? `${info.requested_by.user} (${info.requested_by.cna})` : '';
  return [info.cve_id, colorState(info.state), info.reserved, reservedBy].join('\t');
}

export function formatReserved(response: ReserveResponse): string {
  const lines = response.cve_ids.map(id => id.cve_id);
  const remaining = response.meta?.remaining_quota;
  if (remaining !== undefined) {
    lines.push(chalk.gray(`Remaining quota: ${remaining}`));
  }
  return lines.join('\n');
}

export function formatQuota(org: string, quota: QuotaResponse): string {
  return tree(`${org} CVE ID quota`, [
    ['Limit', String(quota.id_quota)],
    ['Reserved', String(quota.total_reserved)],
    ['Available', String(quota.available)],
  ]);
}

export function formatOrg(org: OrgInfo): string {
  return tree(org.name ? `${org.name} (${org.short_name})` : org.short_name, [
    ['UUID', org.UUID],
    ['Roles', org.authority?.active_roles.join(', ')],
    ['ID quota', org.policies ? String(org.policies.id_quota) : undefined],
    ['Created', org.time?.created],
    ['Modified', org.time?.modified],
  ]);
}

export function formatUserName(user: UserInfo): string {
  const parts = [user.name?.first, user.name?.middle, user.name?.last, user.name?.suffix];
  return parts.filter((part): part is string => Boolean(part)).join(' ');
}

export function formatUser(user: UserInfo): string {
  const name = formatUserName(user);
  return tree(name ? `${name} (${user.username})` : user.username, [
    ['Active', user.active === undefined ? undefined : (user.active ? 'Yes' : chalk.red('No'))],
    ['Roles', user.authority?.active_roles.length ? user.authority.active_roles.join(', ') : undefined],
    ['UUID', user.UUID],
    ['Created', user.time?.created],
    ['Modified', user.time?.modified],
  ]);
}

export function formatUserRow(user: UserInfo): string {
  const status = user.active === false ? chalk.red('inactive') : 'active';
  return [user.username, formatUserName(user), status].join('\t');
}

export function formatViolations(violations: readonly SchemaViolation[]): string {
  return violations.map(v => chalk.red(`  - ${v.message}`)).join('\n');
}

export function formatJson(value: unknown, pretty = true): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

export function formatSubmission(response: CveRecordResponse): string {
  return chalk.green(response.message);
}
