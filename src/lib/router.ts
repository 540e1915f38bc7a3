import type { Action, JsonObject } from '../schemas';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type Operation =
  | { type: 'createItem'; objectName: string; query?: string; body: JsonObject }
  | { type: 'updateItem'; objectName: string; id: string; query?: string; body: JsonObject }
  | { type: 'readItem'; objectName: string; id: string; query?: string }
  | { type: 'readItems'; objectName: string; query?: string }
  | { type: 'deleteItem'; objectName: string; id: string }
  | { type: 'runQuery'; queryName: string; params?: JsonObject }
  | { type: 'performActions'; actions: Action[] }
  | { type: 'signUp'; userFields: JsonObject }
  | { type: 'signIn'; username: string; password: string };

export interface Route {
  method: HttpMethod;
  path: string;
  body?: unknown;
}

export interface RouteContext {
  apiVersion: string;
  appName?: string;
}

/**
 * Map an operation onto the Backand REST API.
 *
 * `query` is appended verbatim; pass the output of `encodeQuery` or leave it
 * undefined.
 */
export function resolveRoute(operation: Operation, context: RouteContext): Route {
  const prefix = `/${context.apiVersion}`;

  switch (operation.type) {
    case 'createItem':
      return {
        method: 'POST',
        path: `${prefix}/objects/${operation.objectName}${operation.query ?? ''}`,
        body: operation.body,
      };
    case 'readItem':
      return {
        method: 'GET',
        path: `${prefix}/objects/${operation.objectName}/${operation.id}${operation.query ?? ''}`,
      };
    case 'readItems':
      return {
        method: 'GET',
        path: `${prefix}/objects/${operation.objectName}${operation.query ?? ''}`,
      };
    case 'updateItem':
      return {
        method: 'PUT',
        path: `${prefix}/objects/${operation.objectName}/${operation.id}${operation.query ?? ''}`,
        body: operation.body,
      };
    case 'deleteItem':
      return {
        method: 'DELETE',
        path: `${prefix}/objects/${operation.objectName}/${operation.id}`,
      };
    case 'runQuery':
      // Parameters travel as a JSON body even though this is a GET
      return {
        method: 'GET',
        path: `${prefix}/query/data/${operation.queryName}`,
        body: operation.params,
      };
    case 'performActions':
      return {
        method: 'POST',
        path: `${prefix}/bulk`,
        body: operation.actions.map(({ method, url, data }) =>
          data === undefined ? { method, url } : { method, url, data }
        ),
      };
    case 'signUp':
      return {
        method: 'POST',
        path: `${prefix}/user/signup`,
        body: operation.userFields,
      };
    case 'signIn':
      return {
        method: 'POST',
        path: '/token',
        body: {
          username: operation.username,
          password: operation.password,
          grant_type: 'password',
          appName: context.appName ?? '',
        },
      };
  }
}
