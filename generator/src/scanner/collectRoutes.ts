import { basename } from 'node:path';
import type { RouteRecord } from '@apidocs/shared';
import type { DocsConfig } from '../config/docsConfig.js';
import { InputError } from '../utils/errors.js';
import { isDirectory, listSourceFiles, readSourceFile } from '../utils/files.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { scanAnnotatedSource } from './annotationScanner.js';
import { scanRegistrationSource } from './registrationScanner.js';

export type RouteScanConfig = Pick<DocsConfig, 'scanRoots' | 'excludedFiles' | 'sourceExtension' | 'routesFileName'>;

export interface RouteScanResult {
  /** Sorted by (path, method); ties keep scan order */
  routes: RouteRecord[];
  filesWithRoutes: Set<string>;
  scannedFiles: string[];
  lossyFiles: string[];
}

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortRoutes(routes: RouteRecord[]): RouteRecord[] {
  return [...routes].sort((a, b) => byCodeUnit(a.path, b.path) || byCodeUnit(a.method, b.method));
}

export function listScanFiles(config: RouteScanConfig, logger: Logger): string[] {
  const roots = config.scanRoots.filter((root) => {
    if (isDirectory(root)) return true;
    logger.warn(`Skipping missing scan root ${root}`);
    return false;
  });
  if (roots.length === 0) {
    throw new InputError('None of the configured scan roots exist', { scanRoots: config.scanRoots });
  }

  const excluded = new Set(config.excludedFiles);
  const files = new Set<string>();
  for (const root of roots) {
    for (const file of listSourceFiles(root, config.sourceExtension)) {
      if (!excluded.has(file)) {
        files.add(file);
      }
    }
  }
  return [...files];
}

/**
 * Runs both extractors over every scanned file: annotation records for all files first,
 * then registration records for the routes files, merged and sorted.
 */
export function collectRoutes(
  config: RouteScanConfig,
  logger: Logger = createLogger('RouteScanner')
): RouteScanResult {
  const scannedFiles = listScanFiles(config, logger);
  const lossyFiles: string[] = [];
  const texts = new Map<string, string>();

  for (const file of scannedFiles) {
    const { text, lossy } = readSourceFile(file);
    if (lossy) {
      lossyFiles.push(file);
      logger.warn(`Replaced undecodable bytes while reading ${file}`);
    }
    texts.set(file, text);
  }

  const routes: RouteRecord[] = [];
  for (const [file, text] of texts) {
    routes.push(...scanAnnotatedSource(text, file));
  }
  for (const [file, text] of texts) {
    if (basename(file) === config.routesFileName) {
      routes.push(...scanRegistrationSource(text, file));
    }
  }

  return {
    routes: sortRoutes(routes),
    filesWithRoutes: new Set(routes.map((route) => route.source)),
    scannedFiles,
    lossyFiles
  };
}
