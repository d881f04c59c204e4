import express, { IRoute, NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { MethodNotAllowedError } from '../common/Errors';
import { createAuthGate } from './AuthGate';
import { KeyHandlers } from './KeyHandlers';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface RouteDefinition {
  readonly method: HttpMethod;
  /** Path template; at most one `{name}` segment. */
  readonly template: string;
  readonly requiresAuth: boolean;
  readonly handlers: readonly RequestHandler[];
}

const VARIABLE_SEGMENT = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/;

/**
 * Translate a path template into the express paths that serve it.
 *
 * `/keys/{key}` serves both `/keys/:key` and `/keys/`; the second one lets
 * handlers answer an empty key with a 400 rather than fall through to 404.
 */
export function toExpressPaths(template: string): string[] {
  if (!template.startsWith('/')) {
    throw new Error(`Route template must start with '/': ${template}`);
  }

  const segments = template.split('/').slice(1);
  const variables = segments.filter((segment) => segment.includes('{') || segment.includes('}'));

  if (variables.length > 1) {
    throw new Error(`Route template may contain at most one variable segment: ${template}`);
  }
  if (variables.length === 0) {
    return [template];
  }

  const variable = variables[0] ?? '';
  const match = VARIABLE_SEGMENT.exec(variable);
  if (!match?.[1]) {
    throw new Error(`Malformed variable segment '${variable}' in ${template}`);
  }
  const name = match[1];

  const path = '/' + segments.map((segment) => (segment === variable ? `:${name}` : segment)).join('/');
  if (segments[segments.length - 1] !== variable) {
    return [path];
  }

  const emptyPath = '/' + segments.slice(0, -1).concat('').join('/');
  return [path, emptyPath];
}

export function defineRoutes(handlers: KeyHandlers, bodyLimit: string): readonly RouteDefinition[] {
  // Bodies are read as text whatever their Content-Type, then parsed as JSON by the handler.
  const readBody = express.text({ type: () => true, limit: bodyLimit });

  return Object.freeze([
    { method: 'GET', template: '/health', requiresAuth: false, handlers: [handlers.handleHealth] },
    { method: 'GET', template: '/keys', requiresAuth: true, handlers: [handlers.handleList] },
    { method: 'GET', template: '/keys/{key}', requiresAuth: true, handlers: [handlers.handleGet] },
    { method: 'POST', template: '/keys/{key}', requiresAuth: true, handlers: [readBody, handlers.handleSet] },
    { method: 'DELETE', template: '/keys/{key}', requiresAuth: true, handlers: [handlers.handleDelete] },
  ] satisfies RouteDefinition[]);
}

function bindMethod(route: IRoute, method: HttpMethod, handlers: RequestHandler[]): void {
  switch (method) {
    case 'GET':
      route.get(...handlers);
      return;
    case 'POST':
      route.post(...handlers);
      return;
    case 'DELETE':
      route.delete(...handlers);
      return;
  }
}

/**
 * Build the dispatch router. Routes are fixed here; nothing registers
 * routes after this returns. A path served under a different method than
 * requested answers 405 with an Allow header.
 */
export function createRouter(routes: readonly RouteDefinition[], authToken: string): Router {
  const router = express.Router({ strict: true, caseSensitive: true });
  const gate = createAuthGate(authToken);
  const allowedByPath = new Map<string, HttpMethod[]>();

  for (const definition of routes) {
    for (const path of toExpressPaths(definition.template)) {
      const allowed = allowedByPath.get(path) ?? [];
      if (allowed.includes(definition.method)) {
        throw new Error(`Duplicate route: ${definition.method} ${definition.template}`);
      }
      allowed.push(definition.method);
      allowedByPath.set(path, allowed);

      const chain = definition.requiresAuth ? [gate, ...definition.handlers] : [...definition.handlers];
      bindMethod(router.route(path), definition.method, chain);
    }
  }

  for (const [path, allowed] of allowedByPath) {
    router.all(path, (_req: Request, res: Response, next: NextFunction) => {
      res.setHeader('Allow', allowed.join(', '));
      next(new MethodNotAllowedError(allowed));
    });
  }

  return router;
}
