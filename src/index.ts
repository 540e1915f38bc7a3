/**
 * backand-sdk - TypeScript SDK for the Backand REST API
 *
 * @packageDocumentation
 */

// Main client
export { BackandClient } from './client';

// Types
export type {
  AuthMode,
  BackandConfig,
  BackandErrorCode,
  BackandResponse,
  FetchLike,
  TokenStorage,
  ApiError,
} from './types';

export { BackandError } from './types';

// Option, filter and action model
export {
  FILTER_OPERATORS,
  SORT_ORDERS,
  EXCLUDE_OPTIONS,
  BULK_METHODS,
  FilterSchema,
  SorterSchema,
  ActionSchema,
} from './schemas';
export type {
  Action,
  BulkMethod,
  ExcludeOption,
  Filter,
  FilterOperator,
  JsonObject,
  SignInResponse,
  SignUpResponse,
  Sorter,
  SortOrder,
} from './schemas';

export { encodeQuery, encodeQueryComponent, filter, sorter, action } from './lib/query-encoder';
export type { RequestOption } from './lib/query-encoder';

// Routing, for advanced usage
export { resolveRoute } from './lib/router';
export type { HttpMethod, Operation, Route, RouteContext } from './lib/router';

// Modules
export { Auth } from './modules/auth';
export type { SignUpOptions } from './modules/auth';
export { Objects } from './modules/objects';
export { Query } from './modules/query';

// Utilities for advanced usage
export { HttpClient, settle, DEFAULT_API_URL, DEFAULT_API_VERSION } from './lib/http-client';
export type { RequestDescriptor } from './lib/http-client';
export { TokenManager, USER_TOKEN_KEY } from './lib/token-manager';
export { MemoryTokenStorage, FileTokenStorage } from './lib/token-storage';

// Factory function for creating clients
import { BackandClient } from './client';
import type { BackandConfig } from './types';

export function createClient(config: BackandConfig): BackandClient {
  return new BackandClient(config);
}

// Default export for convenience
export default BackandClient;
