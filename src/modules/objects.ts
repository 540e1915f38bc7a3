/**
 * Objects module for the Backand SDK
 * CRUD on app objects plus bulk actions
 */

import { settle, type HttpClient } from '../lib/http-client';
import { encodeQuery, type RequestOption } from '../lib/query-encoder';
import type { Action, JsonObject } from '../schemas';
import type { BackandResponse } from '../types';

function queryFrom(options?: RequestOption[]): string | undefined {
  return options === undefined ? undefined : encodeQuery(options);
}

/**
 * Object operations
 *
 * @example
 * ```typescript
 * const { data, error } = await client.objects.getItems('items', [
 *   { type: 'pageSize', value: 20 },
 *   { type: 'filter', value: [filter('done', 'equals', false)] },
 *   { type: 'sort', value: [sorter('createdAt', 'desc')] },
 * ]);
 * ```
 */
export class Objects {
  constructor(private http: HttpClient) {}

  /**
   * Get a single item
   * @param name - The object name
   * @param id - The item id
   */
  async getItem<T = unknown>(
    name: string,
    id: string,
    options?: RequestOption[]
  ): Promise<BackandResponse<T>> {
    const query = queryFrom(options);
    return settle(this.http.request<T>({ type: 'readItem', objectName: name, id, query }));
  }

  /**
   * Get a list of items with filter, sort and paging options
   */
  async getItems<T = unknown>(name: string, options?: RequestOption[]): Promise<BackandResponse<T>> {
    const query = queryFrom(options);
    return settle(this.http.request<T>({ type: 'readItems', objectName: name, query }));
  }

  async createItem<T = unknown>(
    name: string,
    item: JsonObject,
    options?: RequestOption[]
  ): Promise<BackandResponse<T>> {
    const query = queryFrom(options);
    return settle(this.http.request<T>({ type: 'createItem', objectName: name, query, body: item }));
  }

  async updateItem<T = unknown>(
    name: string,
    id: string,
    item: JsonObject,
    options?: RequestOption[]
  ): Promise<BackandResponse<T>> {
    const query = queryFrom(options);
    return settle(
      this.http.request<T>({ type: 'updateItem', objectName: name, id, query, body: item })
    );
  }

  async deleteItem<T = unknown>(name: string, id: string): Promise<BackandResponse<T>> {
    return settle(this.http.request<T>({ type: 'deleteItem', objectName: name, id }));
  }

  /**
   * Execute several create/update/delete actions in one request
   *
   * @example
   * ```typescript
   * await client.objects.performActions([
   *   action('POST', '/1/objects/items', { name: 'first' }),
   *   action('DELETE', '/1/objects/items/7'),
   * ]);
   * ```
   */
  async performActions<T = unknown>(actions: Action[]): Promise<BackandResponse<T>> {
    return settle(this.http.request<T>({ type: 'performActions', actions }));
  }
}
