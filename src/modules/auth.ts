/**
 * Auth module for the Backand SDK
 * Moves the session between anonymous, sign-up and user modes
 */

import { settle, type HttpClient } from '../lib/http-client';
import type { TokenManager } from '../lib/token-manager';
import {
  SignInResponseSchema,
  SignUpResponseSchema,
  type JsonObject,
} from '../schemas';
import { BackandError, type BackandResponse } from '../types';

export interface SignUpOptions {
  /**
   * Sign the user in with the token returned by the sign up call
   * @default true
   */
  signinAfterSignup?: boolean;
}

export class Auth {
  constructor(
    private http: HttpClient,
    private tokenManager: TokenManager
  ) {}

  /**
   * Register a user for the app
   *
   * The request is sent with the sign-up token. When the response carries a
   * token and `signinAfterSignup` is on, the session moves to user mode;
   * otherwise it stays in sign-up mode.
   *
   * @example
   * ```typescript
   * const { data, error } = await client.auth.signUp({
   *   firstName: 'Test',
   *   lastName: 'User',
   *   email: 'user@example.com',
   *   password: 'test-password',
   *   confirmPassword: 'test-password',
   * });
   * ```
   */
  async signUp<T = unknown>(
    user: JsonObject,
    options: SignUpOptions = {}
  ): Promise<BackandResponse<T>> {
    const { signinAfterSignup = true } = options;
    this.tokenManager.setMode('signUp');

    return settle(
      (async () => {
        const data = await this.http.request<T>({ type: 'signUp', userFields: user });
        if (signinAfterSignup) {
          const parsed = SignUpResponseSchema.safeParse(data);
          if (parsed.success) {
            await this.tokenManager.saveUserSession(parsed.data.token);
          }
        }
        return data;
      })()
    );
  }

  /**
   * Sign in with username and password
   *
   * On success the access token is stored in the secret store and the
   * session moves to user mode. A store that fails to save the token turns
   * the result into a `STORAGE_ERROR` and leaves the mode unchanged.
   */
  async signIn<T = unknown>(username: string, password: string): Promise<BackandResponse<T>> {
    return settle(
      (async () => {
        const data = await this.http.request<T>({ type: 'signIn', username, password });
        const parsed = SignInResponseSchema.safeParse(data);
        if (parsed.success) {
          await this.tokenManager.saveUserSession(parsed.data.access_token);
        }
        return data;
      })()
    );
  }

  /**
   * Sign the current user out
   * Returns to anonymous mode even when the stored token cannot be removed
   */
  async signOut(): Promise<{ error: BackandError | null }> {
    try {
      await this.tokenManager.clearSession();
      return { error: null };
    } catch (error) {
      if (error instanceof BackandError) {
        return { error };
      }
      throw error;
    }
  }

  /**
   * True when a user token is stored, whatever the current mode
   */
  async userSignedIn(): Promise<boolean> {
    return this.tokenManager.hasUserToken();
  }

  /**
   * Get the stored user token, if any
   */
  async getUserToken(): Promise<string | null> {
    return this.tokenManager.getUserToken();
  }
}
