import { REGISTRATION_ROUTE_DESCRIPTION, type RouteRecord } from '@apidocs/shared';
import { REGISTRATION_GROUP_PATTERN, REGISTRATION_ROUTE_PATTERN, parseMiddlewareList } from './patterns.js';

export interface RegistrationGroup {
  prefix: string;
  middleware: string[];
}

export function findRegistrationGroup(text: string): RegistrationGroup | null {
  const match = REGISTRATION_GROUP_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  return {
    prefix: match[1] ?? '',
    middleware: parseMiddlewareList(match[2] ?? '')
  };
}

/**
 * Extracts `Router::verb('path', [handler])` calls from a routes file. The first
 * `Router::group` call anywhere in the file applies to every route in it, whether or not it
 * precedes them.
 */
export function scanRegistrationSource(text: string, source: string): RouteRecord[] {
  const group = findRegistrationGroup(text);
  const prefix = group?.prefix ?? '';
  const middleware = group?.middleware ?? [];

  return Array.from(text.matchAll(REGISTRATION_ROUTE_PATTERN), (match): RouteRecord => ({
    method: (match[1] ?? '').toUpperCase(),
    path: prefix + (match[2] ?? ''),
    description: REGISTRATION_ROUTE_DESCRIPTION,
    controller: (match[3] ?? '').trim(),
    handler: '',
    source,
    middleware: [...middleware],
    origin: 'registration'
  }));
}
