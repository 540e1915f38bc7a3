/**
 * Backand SDK Types - SDK-level configuration, storage and error types
 * Request option and route types live next to the code that encodes them
 */

export type AuthMode = 'anonymous' | 'signUp' | 'user';

/**
 * The part of `fetch` the SDK calls
 */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface BackandConfig {
  /**
   * The app name registered in the Backand dashboard
   * Sent as the `AppName` header on every request
   */
  appName?: string;

  /**
   * Anonymous access token
   * Used while the session is in `anonymous` mode
   */
  anonymousToken?: string;

  /**
   * User registration token
   * Used while a sign up request is pending
   */
  signUpToken?: string;

  /**
   * The base URL of the Backand REST API
   * @default "https://api.backand.com"
   */
  apiUrl?: string;

  /**
   * API version path segment
   * @default "1"
   */
  apiVersion?: string;

  /**
   * Initial authentication mode
   * @default "anonymous"
   */
  authMode?: AuthMode;

  /**
   * Custom fetch implementation (useful for tests or older runtimes)
   */
  fetch?: FetchLike;

  /**
   * Secret store for the signed-in user's token
   */
  storage?: TokenStorage;

  /**
   * Custom headers to include with every request
   */
  headers?: Record<string, string>;

  /**
   * Log requests and auth mode transitions to the console
   * @default false
   */
  debug?: boolean;
}

export interface TokenStorage {
  getItem(key: string): string | null | Promise<string | null>;
  setItem(key: string, value: string): void | Promise<void>;
  removeItem(key: string): void | Promise<void>;
}

/**
 * Uniform result of every request-issuing operation.
 * `data` is null on failure and for empty (204) responses.
 */
export type BackandResponse<T> =
  | { data: T | null; error: null }
  | { data: null; error: BackandError };

export type BackandErrorCode = 'TRANSPORT_ERROR' | 'HTTP_ERROR' | 'DECODING_ERROR' | 'STORAGE_ERROR';

export interface ApiError {
  error: BackandErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export class BackandError extends Error {
  public statusCode: number;
  public error: BackandErrorCode;
  public details?: unknown;

  constructor(
    message: string,
    statusCode: number,
    error: BackandErrorCode,
    details?: unknown,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'BackandError';
    this.statusCode = statusCode;
    this.error = error;
    this.details = details;
  }

  static fromApiError(apiError: ApiError): BackandError {
    return new BackandError(
      apiError.message,
      apiError.statusCode,
      apiError.error,
      apiError.details
    );
  }
}
