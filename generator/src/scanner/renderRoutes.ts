import type { CoverageReport, RouteRecord } from '@apidocs/shared';
import { renderDocumentHeader, renderPreamble, type ReportOptions } from '../markdown/preamble.js';
import { toDisplayPath } from '../utils/files.js';

export const CODE_REPORT_TITLE = 'API Details (Parsed from Code)';

export interface RouteReportOptions extends ReportOptions {
  rootDir: string;
  routesFileName: string;
}

export interface RouteSummary {
  total: number;
  annotation: number;
  registration: number;
}

export function summarizeRoutes(routes: RouteRecord[]): RouteSummary {
  return {
    total: routes.length,
    annotation: routes.filter((route) => route.origin === 'annotation').length,
    registration: routes.filter((route) => route.origin === 'registration').length
  };
}

function handlerLabel(route: RouteRecord): string | null {
  if (route.handler) return `${route.controller}::${route.handler}`;
  return route.controller || null;
}

export function renderRouteEntry(route: RouteRecord, rootDir: string): string[] {
  const lines = [`- **${route.method}** — ${route.description || 'No description'}`];
  const handler = handlerLabel(route);
  if (handler) {
    lines.push(`  - Handler: ${handler}`);
  }
  if (route.middleware.length > 0) {
    lines.push(`  - Middleware: ${route.middleware.join(', ')}`);
  }
  lines.push(`  - Source: ${toDisplayPath(rootDir, route.source)}`, '');
  return lines;
}

export function renderCoverageSummary(
  routes: RouteRecord[],
  coverage: CoverageReport,
  options: RouteReportOptions
): string[] {
  const summary = summarizeRoutes(routes);
  const lines = [
    '## Coverage Summary',
    `- Total routes: ${summary.total}`,
    `- Attribute routes: ${summary.annotation}`,
    `- ${options.routesFileName} routes: ${summary.registration}`,
    `- Controllers without routes: ${coverage.controllersWithoutRoutes.length}`,
    ''
  ];

  if (coverage.controllersWithoutRoutes.length > 0) {
    lines.push('## Potentially Missing Routes (Controllers without Route attributes)');
    lines.push(...coverage.controllersWithoutRoutes.map((file) => `- ${toDisplayPath(options.rootDir, file)}`));
    lines.push('');
  }
  return lines;
}

/** Expects `routes` sorted by (path, method) so each path heading appears once. */
export function renderRoutesMarkdown(
  routes: RouteRecord[],
  coverage: CoverageReport,
  options: RouteReportOptions
): string {
  const lines = [
    ...renderDocumentHeader(CODE_REPORT_TITLE, options),
    ...renderPreamble(),
    ...renderCoverageSummary(routes, coverage, options)
  ];

  let currentPath: string | null = null;
  for (const route of routes) {
    if (route.path !== currentPath) {
      currentPath = route.path;
      lines.push(`## ${currentPath}`);
    }
    lines.push(...renderRouteEntry(route, options.rootDir));
  }

  return lines.join('\n');
}
