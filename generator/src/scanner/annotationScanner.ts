import { DEFAULT_ROUTE_METHOD, type RouteRecord } from '@apidocs/shared';
import {
  CLASS_PATTERN,
  FUNCTION_PATTERN,
  HANDLER_LOOKAHEAD_LINES,
  ROUTE_GROUP_PATTERN,
  ROUTE_PATTERN,
  parseRouteArguments,
  stringLiterals
} from './patterns.js';

export type CommentState = 'normal' | 'block';

export interface AnnotationScanState {
  commentState: CommentState;
  /** Last group prefix seen in the file; never popped */
  groupPrefix: string;
  /** Last class declaration seen in the file */
  owner: string | null;
}

export interface CommentStep {
  state: CommentState;
  skip: boolean;
}

export function initialScanState(): AnnotationScanState {
  return { commentState: 'normal', groupPrefix: '', owner: null };
}

/**
 * A line holding a close token always returns to normal and is itself skipped, so a block
 * comment opened and closed on one physical line never leaves the scanner inside a block.
 * Nested block comments are not tracked.
 */
export function advanceCommentState(state: CommentState, line: string): CommentStep {
  const stripped = line.trimStart();
  if (stripped.includes('*/')) {
    return { state: 'normal', skip: true };
  }
  if (stripped.includes('/*')) {
    return { state: 'block', skip: true };
  }
  if (state === 'block') {
    return { state, skip: true };
  }
  return { state, skip: stripped.startsWith('//') || stripped.startsWith('*') };
}

export function findHandlerName(lines: string[], routeLineIndex: number): string | null {
  const end = Math.min(routeLineIndex + 1 + HANDLER_LOOKAHEAD_LINES, lines.length);
  for (let i = routeLineIndex + 1; i < end; i += 1) {
    const match = FUNCTION_PATTERN.exec(lines[i] ?? '');
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}

/** Extracts `#[Route(...)]` declarations from one file's text. */
export function scanAnnotatedSource(text: string, source: string): RouteRecord[] {
  const lines = text.split(/\r?\n/);
  const state = initialScanState();
  const routes: RouteRecord[] = [];

  lines.forEach((line, index) => {
    const step = advanceCommentState(state.commentState, line);
    state.commentState = step.state;
    if (step.skip) {
      return;
    }

    const groupMatch = ROUTE_GROUP_PATTERN.exec(line);
    if (groupMatch) {
      const [prefix] = stringLiterals(groupMatch[1] ?? '');
      if (prefix !== undefined) {
        state.groupPrefix = prefix;
      }
    }

    const classMatch = CLASS_PATTERN.exec(line);
    if (classMatch?.[1]) {
      state.owner = classMatch[1];
    }

    const routeMatch = ROUTE_PATTERN.exec(line);
    if (!routeMatch) {
      return;
    }

    const args = parseRouteArguments(routeMatch[1] ?? '');
    routes.push({
      method: args.method ?? DEFAULT_ROUTE_METHOD,
      path: state.groupPrefix + (args.path ?? ''),
      description: args.description ?? '',
      controller: state.owner ?? '',
      handler: findHandlerName(lines, index) ?? '',
      source,
      middleware: args.middleware,
      origin: 'annotation'
    });
  });

  return routes;
}
