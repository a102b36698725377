/**
 * Output formatters
 */

export {
  formatCveId,
  formatCveIdRow,
  formatReserved,
  formatQuota,
  formatOrg,
  formatUser,
  formatUserName,
  formatUserRow,
  formatViolations,
  formatSubmission,
  formatJson,
} from './text.js';
