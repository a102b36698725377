/**
 * cvekit command-line program
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { readFile } from 'node:fs/promises';
import { CveApi, type CveApiOptions } from '../api/client.js';
import type { UserUpdate } from '../api/types.js';
import {
  configFromEnv,
  loadConfig,
  mergeConfig,
  toClientOptions,
  type CvekitConfig,
} from '../config/index.js';
import { CveConfigurationError, CveRecordValidationError } from '../errors.js';
import { extractAdp, extractCna, isJsonObject } from '../record/extract.js';
import type { ProcessEnv } from '../record/augment.js';
import { SCHEMA_IDS, type SchemaId, type SchemaRef } from '../record/schemas.js';
import { validateRecord } from '../record/validate.js';
import {
  formatCveId,
  formatCveIdRow,
  formatJson,
  formatOrg,
  formatQuota,
  formatReserved,
  formatSubmission,
  formatUser,
  formatUserRow,
  formatViolations,
} from '../output/index.js';
import { USER_ROLES, CveState, type JsonObject, type UserRole } from '../types.js';
import { VERSION } from '../version.js';

export interface ProgramOptions {
  /** Client factory (default: new CveApi) */
  createClient?: (options: CveApiOptions) => CveApi;
  env?: ProcessEnv;
  cwd?: string;
}

interface GlobalOptions {
  username?: string;
  org?: string;
  apiKey?: string;
  env?: string;
  url?: string;
  config?: string;
  raw?: boolean;
  verbose?: boolean;
}

interface SubmitCommandOptions {
  jsonFile?: string;
  update?: boolean;
  validate: boolean;
}

interface ListCommandOptions {
  year?: string;
  state?: string;
  reservedLt?: string;
  reservedGt?: string;
}

interface UserUpdateCommandOptions {
  newUsername?: string;
  active?: boolean;
  firstName?: string;
  lastName?: string;
  middleName?: string;
  suffix?: string;
  addRole?: UserRole;
  removeRole?: UserRole;
  newOrg?: string;
}

async function readJsonFile(file: string): Promise<JsonObject> {
  const content = await readFile(file, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CveConfigurationError(`${file} is not valid JSON: ${reason}`);
  }
  if (!isJsonObject(parsed)) {
    throw new CveConfigurationError(`${file} must contain a JSON object`);
  }
  return parsed;
}

function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new CveConfigurationError(`Invalid date: ${value}`);
  }
  return date;
}

function reportError(error: unknown): void {
  if (error instanceof CveRecordValidationError) {
    console.error(chalk.red(`Error: Schema validation against ${error.schema} failed:`));
    console.error(formatViolations(error.violations));
  } else {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Error: ${message}`));
  }
  process.exitCode = 1;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const createClient = options.createClient ?? ((clientOptions: CveApiOptions) => new CveApi(clientOptions));
  const processEnv = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const program = new Command();

  program
    .name('cvekit')
    .description('Reserve CVE IDs and publish CVE records through the CVE Services API')
    .version(VERSION)
    .option('-u, --username <username>', 'Your username (env: CVE_USER)')
    .option('-o, --org <shortname>', 'Your CNA organization short name (env: CVE_ORG)')
    .option('-a, --api-key <key>', 'Your API key (env: CVE_API_KEY)')
    .option('-e, --env <env>', 'CVE Services deployment: prod, dev, test (env: CVE_ENVIRONMENT)')
    .option('--url <url>', 'CVE Services base URL, overrides --env (env: CVE_API_URL)')
    .option('-c, --config <file>', 'Configuration file (default: .cvekitrc in the working directory)')
    .option('--raw', 'Print raw JSON responses')
    .option('-v, --verbose', 'Print diagnostics to stderr');

  function globals(command: Command): GlobalOptions {
    return command.optsWithGlobals<GlobalOptions>();
  }

  function log(command: Command, message: string): void {
    if (globals(command).verbose) {
      console.error(chalk.gray(message));
    }
  }

  function resolveConfig(command: Command): CvekitConfig {
    const opts = globals(command);
    return mergeConfig(
      loadConfig(cwd, opts.config),
      configFromEnv(processEnv),
      { username: opts.username, org: opts.org, apiKey: opts.apiKey, env: opts.env, url: opts.url }
    );
  }

  function clientFor(command: Command, requireCredentials = true): CveApi {
    const config = resolveConfig(command);
    const clientOptions: CveApiOptions = requireCredentials
      ? toClientOptions(config)
      : {
          username: config.username ?? '',
          org: config.org ?? '',
          apiKey: config.apiKey ?? '',
          env: config.env,
          url: config.url,
          timeout: config.timeout,
        };
    const client = createClient({ ...clientOptions, processEnv });
    log(command, `CVE Services: ${client.url} (user ${client.username || '-'}, org ${client.org || '-'})`);
    return client;
  }

  function print(command: Command, value: unknown, human: () => string): void {
    console.log(globals(command).raw ? formatJson(value) : human());
  }

  // === reserve command ===
  program
    .command('reserve')
    .description('Reserve one or more CVE IDs')
    .argument('[count]', 'Number of CVE IDs to reserve', '1')
    .option('-r, --random', 'Reserve multiple IDs non-sequentially')
    .option('-y, --year <year>', 'Year to reserve IDs for (default: current year)')
    .action(async (count: string, opts: { random?: boolean; year?: string }, command: Command) => {
      try {
        const amount = Number(count);
        if (!Number.isInteger(amount) || amount < 1) {
          throw new CveConfigurationError(`Invalid count: ${count}`);
        }
        const year = opts.year ?? String(new Date().getFullYear());
        const client = clientFor(command);
        log(command, `Reserving ${amount} CVE ID(s) for ${year}`);
        const response = await client.reserve(amount, Boolean(opts.random), year);
        print(command, response, () => formatReserved(response));
      } catch (error) {
        reportError(error);
      }
    });

  // === publish command ===
  program
    .command('publish')
    .description('Publish a CVE record from a CNA container or full CVE JSON 5 record')
    .argument('<cve_id>', 'CVE ID to publish')
    .requiredOption('-f, --json-file <file>', 'JSON file with the CNA container or full record')
    .option('--update', 'Update an already published record')
    .option('--no-validate', 'Skip schema validation before submitting')
    .action(async (cveId: string, opts: SubmitCommandOptions, command: Command) => {
      try {
        const cveJson = await readJsonFile(opts.jsonFile ?? '');
        const client = clientFor(command);
        const submit = { validate: opts.validate };
        const response = opts.update
          ? await client.updatePublished(cveId, cveJson, submit)
          : await client.publish(cveId, cveJson, submit);
        print(command, response, () => formatSubmission(response));
      } catch (error) {
        reportError(error);
      }
    });

  // === publish-adp command ===
  program
    .command('publish-adp')
    .description("Add or update your organization's ADP container on a CVE record")
    .argument('<cve_id>', 'CVE ID to add the ADP container to')
    .requiredOption('-f, --json-file <file>', 'JSON file with the ADP container or full record')
    .option('--no-validate', 'Skip schema validation before submitting')
    .action(async (cveId: string, opts: SubmitCommandOptions, command: Command) => {
      try {
        const cveJson = await readJsonFile(opts.jsonFile ?? '');
        const client = clientFor(command);
        const response = await client.publishAdp(cveId, cveJson, { validate: opts.validate });
        print(command, response, () => formatSubmission(response));
      } catch (error) {
        reportError(error);
      }
    });

  // === reject command ===
  program
    .command('reject')
    .description('Reject a CVE ID, with a rejected CNA container or without a record')
    .argument('<cve_id>', 'CVE ID to reject')
    .option('-f, --json-file <file>', 'JSON file with the rejected CNA container')
    .option('--update', 'Update an already rejected record')
    .option('--no-validate', 'Skip schema validation before submitting')
    .action(async (cveId: string, opts: SubmitCommandOptions, command: Command) => {
      try {
        if (!opts.jsonFile) {
          if (opts.update) {
            throw new CveConfigurationError('--update requires --json-file');
          }
          const client = clientFor(command);
          const response = await client.moveToRejected(cveId);
          print(command, response, () => formatCveId(response));
          return;
        }

        const cveJson = await readJsonFile(opts.jsonFile);
        const client = clientFor(command);
        const submit = { validate: opts.validate };
        const response = opts.update
          ? await client.updateRejected(cveId, cveJson, submit)
          : await client.reject(cveId, cveJson, submit);
        print(command, response, () => formatSubmission(response));
      } catch (error) {
        reportError(error);
      }
    });

  // === undo-reject command ===
  program
    .command('undo-reject')
    .description('Move a CVE ID rejected without a record back to RESERVED')
    .argument('<cve_id>', 'CVE ID to restore')
    .action(async (cveId: string, _opts: object, command: Command) => {
      try {
        const response = await clientFor(command).moveToReserved(cveId);
        print(command, response, () => formatCveId(response));
      } catch (error) {
        reportError(error);
      }
    });

  // === show command ===
  program
    .command('show')
    .description('Show a CVE ID, and optionally its record')
    .argument('<cve_id>', 'CVE ID to show')
    .option('--show-record', 'Also print the CVE record of a published or rejected ID')
    .action(async (cveId: string, opts: { showRecord?: boolean }, command: Command) => {
      try {
        const client = clientFor(command);
        const info = await client.showCveId(cveId);
        print(command, info, () => formatCveId(info));
        if (opts.showRecord && info.state !== CveState.RESERVED) {
          const record = await client.showCveRecord(cveId);
          console.log(formatJson(record));
        }
      } catch (error) {
        reportError(error);
      }
    });

  // === list command ===
  program
    .command('list')
    .description('List CVE IDs owned by your organization')
    .option('--year <year>', 'Only IDs for this year')
    .addOption(new Option('--state <state>', 'Only IDs in this state').choices(Object.values(CveState)))
    .option('--reserved-lt <datetime>', 'Only IDs reserved before this time (ISO-8601)')
    .option('--reserved-gt <datetime>', 'Only IDs reserved after this time (ISO-8601)')
    .action(async (opts: ListCommandOptions, command: Command) => {
      try {
        const filters = {
          year: opts.year,
          state: opts.state,
          reservedLt: opts.reservedLt ? parseDate(opts.reservedLt) : undefined,
          reservedGt: opts.reservedGt ? parseDate(opts.reservedGt) : undefined,
        };
        const raw = globals(command).raw;
        for await (const info of clientFor(command).listCves(filters)) {
          console.log(raw ? formatJson(info, false) : formatCveIdRow(info));
        }
      } catch (error) {
        reportError(error);
      }
    });

  // === count command ===
  program
    .command('count')
    .description('Count CVE records, optionally by state')
    .addOption(new Option('--state <state>', 'Only records in this state').choices([CveState.RESERVED, CveState.PUBLISHED]))
    .action(async (opts: { state?: string }, command: Command) => {
      try {
        const response = await clientFor(command).countCves(opts.state);
        print(command, response, () => String(response.totalCount));
      } catch (error) {
        reportError(error);
      }
    });

  // === quota command ===
  program
    .command('quota')
    .description("Show your organization's CVE ID quota")
    .action(async (_opts: object, command: Command) => {
      try {
        const client = clientFor(command);
        const quota = await client.quota();
        print(command, quota, () => formatQuota(client.org, quota));
      } catch (error) {
        reportError(error);
      }
    });

  // === org command ===
  program
    .command('org')
    .description('Show your organization')
    .action(async (_opts: object, command: Command) => {
      try {
        const org = await clientFor(command).showOrg();
        print(command, org, () => formatOrg(org));
      } catch (error) {
        reportError(error);
      }
    });

  // === users command ===
  program
    .command('users')
    .description('List the users of your organization')
    .action(async (_opts: object, command: Command) => {
      try {
        const raw = globals(command).raw;
        for await (const user of clientFor(command).listUsers()) {
          console.log(raw ? formatJson(user, false) : formatUserRow(user));
        }
      } catch (error) {
        reportError(error);
      }
    });

  // === user commands ===
  const user = program
    .command('user')
    .description('Manage users of your organization');

  user
    .command('show')
    .description('Show a user')
    .argument('<username>', 'Username to show')
    .action(async (username: string, _opts: object, command: Command) => {
      try {
        const info = await clientFor(command).showUser(username);
        print(command, info, () => formatUser(info));
      } catch (error) {
        reportError(error);
      }
    });

  user
    .command('create')
    .description('Create a user')
    .argument('<username>', 'Username (an email address)')
    .option('--first-name <name>', 'First name')
    .option('--last-name <name>', 'Last name')
    .addOption(new Option('--role <role>', 'Grant a role').choices([...USER_ROLES]))
    .action(async (username: string, opts: { firstName?: string; lastName?: string; role?: UserRole }, command: Command) => {
      try {
        const response = await clientFor(command).createUser({
          username,
          name: { first: opts.firstName, last: opts.lastName },
          authority: { active_roles: opts.role ? [opts.role] : [] },
        });
        print(command, response, () => response.created ? formatUser(response.created) : response.message);
      } catch (error) {
        reportError(error);
      }
    });

  user
    .command('update')
    .description('Update a user')
    .argument('<username>', 'Username to update')
    .option('--new-username <username>', 'New username')
    .option('--active', 'Mark the user active')
    .option('--no-active', 'Mark the user inactive')
    .option('--first-name <name>', 'First name')
    .option('--last-name <name>', 'Last name')
    .option('--middle-name <name>', 'Middle name')
    .option('--suffix <suffix>', 'Name suffix')
    .addOption(new Option('--add-role <role>', 'Grant a role').choices([...USER_ROLES]))
    .addOption(new Option('--remove-role <role>', 'Revoke a role').choices([...USER_ROLES]))
    .option('--new-org <shortname>', 'Move the user to another organization')
    .action(async (username: string, opts: UserUpdateCommandOptions, command: Command) => {
      try {
        const update: UserUpdate = { ...opts };
        const response = await clientFor(command).updateUser(username, update);
        print(command, response, () => response.updated ? formatUser(response.updated) : response.message);
      } catch (error) {
        reportError(error);
      }
    });

  user
    .command('reset-key')
    .description("Reset a user's API key")
    .argument('<username>', 'Username whose key to reset')
    .action(async (username: string, _opts: object, command: Command) => {
      try {
        const response = await clientFor(command).resetApiKey(username);
        print(command, response, () => `New API key for ${username}:\n${response['API-secret']}`);
      } catch (error) {
        reportError(error);
      }
    });

  // === ping command ===
  program
    .command('ping')
    .description('Check that CVE Services is up')
    .action(async (_opts: object, command: Command) => {
      try {
        const client = clientFor(command, false);
        const error = await client.ping();
        if (error) {
          console.log(chalk.red(`CVE API status: ERROR (${client.url})`));
          console.log(chalk.gray(error.message));
          process.exitCode = 1;
        } else {
          console.log(chalk.green(`CVE API status: OK (${client.url})`));
        }
      } catch (error) {
        reportError(error);
      }
    });

  // === validate command ===
  program
    .command('validate')
    .description('Validate a CVE container or record against a CVE JSON schema (offline)')
    .argument('<file>', 'JSON file to validate')
    .addOption(new Option('--schema <id>', 'Schema to validate against').choices([...SCHEMA_IDS]).default('cnaPublished'))
    .option('--schema-file <file>', 'Validate against this schema file instead')
    .action(async (file: string, opts: { schema: SchemaId; schemaFile?: string }, command: Command) => {
      try {
        const cveJson = await readJsonFile(file);
        const container = selectForSchema(cveJson, opts.schema);
        const schema: SchemaRef = opts.schemaFile ? { file: opts.schemaFile } : opts.schema;
        log(command, `Validating ${file} against ${opts.schemaFile ?? opts.schema}`);
        validateRecord(container, schema);
        console.log(chalk.green(`${file} is valid`));
      } catch (error) {
        reportError(error);
      }
    });

  return program;
}

/**
 * Part of the input a schema applies to: full records are validated
 * whole against the bundled schema, otherwise the matching container
 */
function selectForSchema(cveJson: JsonObject, schema: SchemaId): JsonObject {
  switch (schema) {
    case 'bundled':
      return cveJson;
    case 'adp':
      return extractAdp(cveJson);
    case 'cnaPublished':
    case 'cnaRejected':
      return extractCna(cveJson);
  }
}
