/**
 * cvekit version - read once from package.json
 */

import { createRequire } from 'node:module';
const require = createRequire(import.meta.url);

interface PackageJson {
  name: string;
  version: string;
}

const pkg = require('../package.json') as PackageJson;

export const PACKAGE_NAME = pkg.name;
export const VERSION = pkg.version;

/** Value written to `x_generator.engine` when no override is configured */
export const DEFAULT_GENERATOR = `${PACKAGE_NAME} ${VERSION}`;
