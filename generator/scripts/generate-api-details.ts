#!/usr/bin/env node

/**
 * Render the API document (OpenAPI JSON or YAML) into docs/architecture/API_DETAILS.md.
 *
 * Usage:
 *   npx tsx generator/scripts/generate-api-details.ts
 *
 * Verify the committed file is current (CI):
 *   npx tsx generator/scripts/generate-api-details.ts --check
 */

import '../src/env.js';

import { parseCliArgs } from '../src/commands/cliArgs.js';
import { generateSpecDetails } from '../src/commands/generateApiDetails.js';
import { loadDocsConfig } from '../src/config/docsConfig.js';
import { describeError } from '../src/utils/errors.js';
import { createLogger } from '../src/utils/logger.js';

const logger = createLogger('SpecRenderer');

function printHelp(): void {
  console.log(`
Generate API details from the API document
------------------------------------------

  npx tsx generator/scripts/generate-api-details.ts [options]

Options:
  --spec <path>        API document (.json, .yaml or .yml)
  --out <path>         Markdown output file
  --root <dir>         Directory relative paths resolve against
  --time-zone <zone>   IANA zone for the Generated line
  --check              Exit 1 when the output is stale instead of writing it
`);
}

function main(): void {
  const cli = parseCliArgs(process.argv.slice(2), 'outputPath');
  if (cli.help) {
    printHelp();
    return;
  }

  const config = loadDocsConfig(process.env, cli.overrides);
  const result = generateSpecDetails(config, { check: cli.check, logger });

  if (result.status === 'stale') {
    logger.error(`${result.outputPath} is out of date; rerun without --check to regenerate`);
    process.exitCode = 1;
    return;
  }
  if (result.status === 'written') {
    console.log(`API details written to ${result.outputPath}`);
  }
}

try {
  main();
} catch (error) {
  logger.error(`Generation failed: ${describeError(error)}`);
  process.exit(1);
}
