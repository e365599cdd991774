#!/usr/bin/env node

/**
 * Scan backend sources for route declarations and write
 * docs/architecture/API_DETAILS_FROM_CODE.md.
 *
 * Usage:
 *   npx tsx generator/scripts/generate-api-details-from-code.ts
 *
 * Optional:
 *   --scan backend/app,backend/modules
 *   --controllers backend/app/Controllers
 *   --check
 */

import '../src/env.js';

import { parseCliArgs } from '../src/commands/cliArgs.js';
import { generateCodeDetails } from '../src/commands/generateApiDetails.js';
import { loadDocsConfig } from '../src/config/docsConfig.js';
import { describeError } from '../src/utils/errors.js';
import { createLogger } from '../src/utils/logger.js';

const logger = createLogger('RouteScanner');

function printHelp(): void {
  console.log(`
Generate API details from source code
-------------------------------------

  npx tsx generator/scripts/generate-api-details-from-code.ts [options]

Options:
  --scan <dirs>         Comma-separated directories to scan for routes
  --controllers <dirs>  Comma-separated controller directories for the coverage report
  --out <path>          Markdown output file
  --root <dir>          Directory relative paths resolve against
  --time-zone <zone>    IANA zone for the Generated line
  --check               Exit 1 when the output is stale instead of writing it
`);
}

function main(): void {
  const cli = parseCliArgs(process.argv.slice(2), 'codeOutputPath');
  if (cli.help) {
    printHelp();
    return;
  }

  const config = loadDocsConfig(process.env, cli.overrides);
  const result = generateCodeDetails(config, { check: cli.check, logger });

  if (result.status === 'stale') {
    logger.error(`${result.outputPath} is out of date; rerun without --check to regenerate`);
    process.exitCode = 1;
    return;
  }
  if (result.controllersWithoutRoutes.length > 0) {
    logger.warn(`${result.controllersWithoutRoutes.length} controllers have no detected routes`);
  }
  if (result.status === 'written') {
    console.log(`Wrote ${result.outputPath}`);
  }
}

try {
  main();
} catch (error) {
  logger.error(`Generation failed: ${describeError(error)}`);
  process.exit(1);
}
