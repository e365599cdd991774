/**
 * Heuristic extraction patterns. Declarations are recovered with regular expressions over raw
 * text, not parsed: nested brackets, parentheses inside arguments and declarations split over
 * several lines are missed or misread, and such records are reported as found.
 */

export const ROUTE_GROUP_PATTERN = /#\[RouteGroup\(([^)]*)\)\]/;
export const ROUTE_PATTERN = /#\[Route\(([^)]*)\)\]/;
export const CLASS_PATTERN = /class\s+([A-Za-z0-9_]+)/;
export const FUNCTION_PATTERN = /function\s+([a-zA-Z0-9_]+)\s*\(/;

const STRING_LITERAL_PATTERN = /'([^']*)'/g;
const METHOD_ARGUMENT_PATTERN = /method\s*:\s*'([^']+)'/;
const DESCRIPTION_ARGUMENT_PATTERN = /description\s*:\s*'([^']+)'/;
const MIDDLEWARE_ARGUMENT_PATTERN = /middleware\s*:\s*\[([^\]]*)\]/;

export const REGISTRATION_GROUP_PATTERN = /Router::group\('([^']+)'\s*,\s*\[([^\]]*)\]/i;
export const REGISTRATION_ROUTE_PATTERN = /Router::(get|post|put|patch|delete)\('([^']+)'\s*,\s*\[([^\]]+)\]/gi;

/** Lines after a route annotation searched for the handler function. */
export const HANDLER_LOOKAHEAD_LINES = 5;

export interface RouteArguments {
  path: string | null;
  method: string | null;
  description: string | null;
  middleware: string[];
}

export function stringLiterals(text: string): string[] {
  return Array.from(text.matchAll(STRING_LITERAL_PATTERN), (match) => match[1] ?? '');
}

/** Splits `'a', 'b'` into `['a', 'b']`; blank entries are dropped. */
export function parseMiddlewareList(listText: string): string[] {
  return listText
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => entry.replace(/^'+|'+$/g, ''));
}

export function parseRouteArguments(argText: string): RouteArguments {
  const [path] = stringLiterals(argText);
  const method = METHOD_ARGUMENT_PATTERN.exec(argText)?.[1];
  const description = DESCRIPTION_ARGUMENT_PATTERN.exec(argText)?.[1];
  const middleware = MIDDLEWARE_ARGUMENT_PATTERN.exec(argText)?.[1];

  return {
    path: path ?? null,
    method: method ? method.toUpperCase() : null,
    description: description ?? null,
    middleware: middleware === undefined ? [] : parseMiddlewareList(middleware)
  };
}
