import { settle, type HttpClient } from '../lib/http-client';
import type { JsonObject } from '../schemas';
import type { BackandResponse } from '../types';

/**
 * Predefined queries, as configured in the Backand dashboard
 *
 * @example
 * ```typescript
 * const { data, error } = await client.query.run('itemsByOwner', { ownerId: 7 });
 * ```
 */
export class Query {
  constructor(private http: HttpClient) {}

  /**
   * Run a named query
   * @param name - The query name
   * @param params - Query parameters
   */
  async run<T = unknown>(name: string, params?: JsonObject): Promise<BackandResponse<T>> {
    return settle(this.http.request<T>({ type: 'runQuery', queryName: name, params }));
  }
}
