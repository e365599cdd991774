import { isAbsolute, resolve } from 'node:path';
import { IANAZone } from 'luxon';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

export interface DocsConfig {
  /** Directory every relative option resolves against; report paths render relative to it */
  rootDir: string;
  specPath: string;
  outputPath: string;
  codeOutputPath: string;
  scanRoots: string[];
  controllerDirs: string[];
  excludedFiles: string[];
  sourceExtension: string;
  routesFileName: string;
  /** IANA zone for the `Generated:` line; null uses the host zone */
  timeZone: string | null;
}

export type DocsConfigOverrides = Partial<DocsConfig>;

export const DEFAULT_DOCS_CONFIG: Omit<DocsConfig, 'rootDir'> = {
  specPath: 'docs/architecture/openapi.json',
  outputPath: 'docs/architecture/API_DETAILS.md',
  codeOutputPath: 'docs/architecture/API_DETAILS_FROM_CODE.md',
  scanRoots: ['backend/app', 'backend/modules'],
  controllerDirs: ['backend/app/Controllers'],
  excludedFiles: ['backend/app/Console/Commands/MakeModuleCommand.php'],
  sourceExtension: '.php',
  routesFileName: 'routes.php',
  timeZone: null
};

const pathSchema = z.string().trim().min(1);

const docsConfigSchema = z.object({
  rootDir: pathSchema,
  specPath: pathSchema,
  outputPath: pathSchema,
  codeOutputPath: pathSchema,
  scanRoots: z.array(pathSchema).min(1, 'at least one scan root is required'),
  controllerDirs: z.array(pathSchema),
  excludedFiles: z.array(pathSchema),
  sourceExtension: z.string().regex(/^\.[A-Za-z0-9]+$/, 'must be a file extension such as .php'),
  routesFileName: z
    .string()
    .min(1)
    .refine((value) => !/[\\/]/.test(value), 'must be a bare file name'),
  timeZone: z
    .string()
    .refine((zone) => IANAZone.isValidZone(zone), 'unknown IANA time zone')
    .nullable()
});

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function envList(env: NodeJS.ProcessEnv, key: string): string[] | undefined {
  const value = envValue(env, key);
  if (!value) return undefined;
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function resolveFrom(rootDir: string, target: string): string {
  return isAbsolute(target) ? resolve(target) : resolve(rootDir, target);
}

/**
 * Builds the configuration from defaults, then `API_DOCS_*` environment variables, then
 * explicit overrides (CLI flags or test fixtures).
 */
export function loadDocsConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: DocsConfigOverrides = {}
): DocsConfig {
  const raw = {
    rootDir: overrides.rootDir ?? envValue(env, 'API_DOCS_ROOT') ?? process.cwd(),
    specPath: overrides.specPath ?? envValue(env, 'API_DOCS_SPEC_PATH') ?? DEFAULT_DOCS_CONFIG.specPath,
    outputPath: overrides.outputPath ?? envValue(env, 'API_DOCS_OUTPUT_PATH') ?? DEFAULT_DOCS_CONFIG.outputPath,
    codeOutputPath:
      overrides.codeOutputPath ?? envValue(env, 'API_DOCS_CODE_OUTPUT_PATH') ?? DEFAULT_DOCS_CONFIG.codeOutputPath,
    scanRoots: overrides.scanRoots ?? envList(env, 'API_DOCS_SCAN_ROOTS') ?? DEFAULT_DOCS_CONFIG.scanRoots,
    controllerDirs:
      overrides.controllerDirs ?? envList(env, 'API_DOCS_CONTROLLER_DIRS') ?? DEFAULT_DOCS_CONFIG.controllerDirs,
    excludedFiles:
      overrides.excludedFiles ?? envList(env, 'API_DOCS_EXCLUDED_FILES') ?? DEFAULT_DOCS_CONFIG.excludedFiles,
    sourceExtension:
      overrides.sourceExtension ?? envValue(env, 'API_DOCS_SOURCE_EXTENSION') ?? DEFAULT_DOCS_CONFIG.sourceExtension,
    routesFileName:
      overrides.routesFileName ?? envValue(env, 'API_DOCS_ROUTES_FILE') ?? DEFAULT_DOCS_CONFIG.routesFileName,
    timeZone: overrides.timeZone !== undefined ? overrides.timeZone : envValue(env, 'API_DOCS_TIME_ZONE') ?? null
  };

  const parsed = docsConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const config = parsed.data;
  const rootDir = resolve(config.rootDir);
  return {
    ...config,
    rootDir,
    specPath: resolveFrom(rootDir, config.specPath),
    outputPath: resolveFrom(rootDir, config.outputPath),
    codeOutputPath: resolveFrom(rootDir, config.codeOutputPath),
    scanRoots: config.scanRoots.map((dir) => resolveFrom(rootDir, dir)),
    controllerDirs: config.controllerDirs.map((dir) => resolveFrom(rootDir, dir)),
    excludedFiles: config.excludedFiles.map((file) => resolveFrom(rootDir, file))
  };
}
