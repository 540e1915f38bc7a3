import type { AuthMode, BackandConfig } from './types';
import { HttpClient } from './lib/http-client';
import { TokenManager } from './lib/token-manager';
import { Auth } from './modules/auth';
import { Objects } from './modules/objects';
import { Query } from './modules/query';

/**
 * Main Backand SDK Client
 *
 * Each client owns one session: its auth mode, tokens and secret store are
 * shared by every module hanging off it.
 *
 * @example
 * ```typescript
 * import { BackandClient, filter } from 'backand-sdk';
 *
 * const client = new BackandClient({
 *   appName: 'my-app',
 *   anonymousToken: 'test-anonymous-token',
 *   signUpToken: 'test-signup-token',
 * });
 *
 * // Authentication
 * await client.auth.signIn('user@example.com', 'test-password');
 *
 * // Object operations
 * const { data, error } = await client.objects.getItems('items', [
 *   { type: 'filter', value: [filter('done', 'equals', false)] },
 *   { type: 'pageSize', value: 10 },
 * ]);
 *
 * // Predefined queries
 * const { data: rows } = await client.query.run('openItems', { ownerId: 7 });
 * ```
 */
export class BackandClient {
  private http: HttpClient;
  private tokenManager: TokenManager;

  public readonly auth: Auth;
  public readonly objects: Objects;
  public readonly query: Query;

  constructor(config: BackandConfig = {}) {
    this.tokenManager = new TokenManager({
      storage: config.storage,
      anonymousToken: config.anonymousToken,
      signUpToken: config.signUpToken,
      authMode: config.authMode,
      debug: config.debug,
    });
    this.http = new HttpClient(config, this.tokenManager);

    this.auth = new Auth(this.http, this.tokenManager);
    this.objects = new Objects(this.http);
    this.query = new Query(this.http);
  }

  /**
   * Set the Backand app name, sent as the `AppName` header
   */
  setAppName(name: string): void {
    this.http.setAppName(name);
  }

  setAnonymousToken(token: string): void {
    this.tokenManager.setAnonymousToken(token);
  }

  setSignUpToken(token: string): void {
    this.tokenManager.setSignUpToken(token);
  }

  /**
   * Set the base API URL
   * @default "https://api.backand.com"
   */
  setApiUrl(url: string): void {
    this.http.setApiUrl(url);
  }

  getApiUrl(): string {
    return this.http.getApiUrl();
  }

  /**
   * Override the authentication mode used for the next requests
   */
  setAuthMode(mode: AuthMode): void {
    this.tokenManager.setMode(mode);
  }

  getAuthMode(): AuthMode {
    return this.tokenManager.mode;
  }

  /**
   * Get the underlying HTTP client for custom requests
   *
   * @example
   * ```typescript
   * const http = client.getHttpClient();
   * const { data } = await settle(http.request({ type: 'readItems', objectName: 'items' }));
   * ```
   */
  getHttpClient(): HttpClient {
    return this.http;
  }
}
