/**
 * Shared TypeScript types for the API details generators
 * Used by both the spec renderer and the source route scanner
 */

// ========== HTTP ==========

export const HTTP_VERBS = ['get', 'post', 'put', 'patch', 'delete'] as const;

export type HttpVerb = (typeof HTTP_VERBS)[number];

export type HttpMethod = Uppercase<HttpVerb>;

export const METHOD_BY_VERB: Record<HttpVerb, HttpMethod> = {
  get: 'GET',
  post: 'POST',
  put: 'PUT',
  patch: 'PATCH',
  delete: 'DELETE'
};

export const DEFAULT_ROUTE_METHOD: HttpMethod = 'GET';

export function isHttpVerb(value: string): value is HttpVerb {
  return HTTP_VERBS.some((verb) => verb === value);
}

// ========== MARKDOWN PREAMBLE ==========

export const REQUIRED_HEADERS = [
  'X-Correlation-Id (ULID, required)',
  'X-Transaction-Id (ULID, required)',
  'X-Request-Id (ULID, required)',
  'Accept: application/json',
  'Authorization: Bearer <token> (required for protected endpoints)'
] as const;

export const RESPONSE_ENVELOPE_FIELDS = [
  'success: boolean',
  'message: string',
  'data: object|array|null',
  'meta: object (timestamp, api_version, locale, pagination if applicable)',
  'trace: object (correlation_id, transaction_id, request_id)'
] as const;

// ========== SPEC OPERATIONS ==========

export interface ContentEntry {
  contentType: string;
  /** `$ref` when present, else the inline type, else `schema` */
  schemaLabel: string;
}

export interface OperationParameter {
  location: string | null;
  name: string | null;
  type: string;
  required: boolean;
}

export interface OperationResponse {
  status: string;
  description: string;
  content: ContentEntry[];
}

export interface ApiOperation {
  path: string;
  method: HttpMethod;
  summary: string | null;
  description: string | null;
  tags: string[];
  authRequired: boolean;
  parameters: OperationParameter[];
  requestBody: ContentEntry[] | null;
  responses: OperationResponse[];
}

// ========== SCANNED ROUTES ==========

export const ROUTE_ORIGINS = ['annotation', 'registration'] as const;

export type RouteOrigin = (typeof ROUTE_ORIGINS)[number];

export const REGISTRATION_ROUTE_DESCRIPTION = 'Router route';

export interface RouteRecord {
  method: string;
  /** Group prefix concatenated with the declared fragment */
  path: string;
  description: string;
  /** Owning class for annotations, raw handler reference for registrations */
  controller: string;
  handler: string;
  /** Absolute path of the file the declaration was found in */
  source: string;
  middleware: string[];
  origin: RouteOrigin;
}

export interface CoverageReport {
  filesWithRoutes: ReadonlySet<string>;
  controllerFiles: string[];
  controllersWithoutRoutes: string[];
}
