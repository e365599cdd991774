import type { CoverageReport } from '@apidocs/shared';
import { isDirectory, listSourceFiles } from '../utils/files.js';

/**
 * Controllers without routes are the controller files that never appear as the source of a
 * detected route. Exact path comparison only; missing controller directories are skipped.
 */
export function buildCoverageReport(
  controllerDirs: string[],
  sourceExtension: string,
  filesWithRoutes: ReadonlySet<string>
): CoverageReport {
  const controllerFiles = new Set<string>();
  for (const dir of controllerDirs) {
    if (!isDirectory(dir)) continue;
    for (const file of listSourceFiles(dir, sourceExtension)) {
      controllerFiles.add(file);
    }
  }

  const sorted = [...controllerFiles].sort();
  return {
    filesWithRoutes,
    controllerFiles: sorted,
    controllersWithoutRoutes: sorted.filter((file) => !filesWithRoutes.has(file))
  };
}
