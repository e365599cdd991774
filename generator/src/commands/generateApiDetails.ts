import type { DocsConfig } from '../config/docsConfig.js';
import { isSameReport } from '../markdown/preamble.js';
import { buildCoverageReport } from '../scanner/coverage.js';
import { collectRoutes } from '../scanner/collectRoutes.js';
import { renderRoutesMarkdown, summarizeRoutes } from '../scanner/renderRoutes.js';
import { loadSpecDocument } from '../spec/loadSpec.js';
import { collectOperations } from '../spec/operations.js';
import { renderSpecMarkdown } from '../spec/renderSpec.js';
import { readExistingReport, writeReport } from '../utils/files.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type ReportStatus = 'written' | 'up-to-date' | 'stale';

export interface CommandOptions {
  now?: Date;
  /** Compare against the existing output instead of writing it */
  check?: boolean;
  logger?: Logger;
}

export interface SpecDetailsResult {
  outputPath: string;
  operationCount: number;
  status: ReportStatus;
  content: string;
}

export interface CodeDetailsResult {
  outputPath: string;
  routeCount: number;
  annotationCount: number;
  registrationCount: number;
  controllersWithoutRoutes: string[];
  status: ReportStatus;
  content: string;
}

function finalizeReport(outputPath: string, content: string, check: boolean): ReportStatus {
  if (check) {
    const existing = readExistingReport(outputPath);
    return existing !== null && isSameReport(existing, content) ? 'up-to-date' : 'stale';
  }
  writeReport(outputPath, content);
  return 'written';
}

export function generateSpecDetails(config: DocsConfig, options: CommandOptions = {}): SpecDetailsResult {
  const logger = options.logger ?? createLogger('SpecRenderer');
  const document = loadSpecDocument(config.specPath);
  const operations = collectOperations(document);
  const content = renderSpecMarkdown(operations, {
    generatedAt: options.now ?? new Date(),
    timeZone: config.timeZone
  });

  const status = finalizeReport(config.outputPath, content, options.check ?? false);
  logger.info(`Rendered ${operations.length} operations from ${config.specPath} (${status})`);

  return { outputPath: config.outputPath, operationCount: operations.length, status, content };
}

export function generateCodeDetails(config: DocsConfig, options: CommandOptions = {}): CodeDetailsResult {
  const logger = options.logger ?? createLogger('RouteScanner');
  const scan = collectRoutes(config, logger);
  const coverage = buildCoverageReport(config.controllerDirs, config.sourceExtension, scan.filesWithRoutes);
  const content = renderRoutesMarkdown(scan.routes, coverage, {
    generatedAt: options.now ?? new Date(),
    timeZone: config.timeZone,
    rootDir: config.rootDir,
    routesFileName: config.routesFileName
  });

  const status = finalizeReport(config.codeOutputPath, content, options.check ?? false);
  const summary = summarizeRoutes(scan.routes);
  logger.info(
    `Found ${summary.total} routes in ${scan.scannedFiles.length} files, ` +
      `${coverage.controllersWithoutRoutes.length} controllers without routes (${status})`
  );

  return {
    outputPath: config.codeOutputPath,
    routeCount: summary.total,
    annotationCount: summary.annotation,
    registrationCount: summary.registration,
    controllersWithoutRoutes: coverage.controllersWithoutRoutes,
    status,
    content
  };
}
