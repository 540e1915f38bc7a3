/**
 * Token Manager for the Backand SDK
 *
 * Holds the session's authentication mode and credentials:
 * - anonymous and sign-up tokens are configured once and kept in memory
 * - the user token is read from and written to the secret store on every
 *   access, so it survives process restarts
 */

import { BackandError, type AuthMode, type TokenStorage } from '../types';
import { createDefaultStorage } from './token-storage';

// Secret store key for the signed-in user's token
export const USER_TOKEN_KEY = 'backand-user-token';

export interface TokenManagerOptions {
  storage?: TokenStorage;
  anonymousToken?: string;
  signUpToken?: string;
  authMode?: AuthMode;
  debug?: boolean;
}

export class TokenManager {
  private storage: TokenStorage;
  private anonymousToken: string | null;
  private signUpToken: string | null;
  private _mode: AuthMode;
  private debug: boolean;

  constructor(options: TokenManagerOptions = {}) {
    this.storage = options.storage ?? createDefaultStorage();
    this.anonymousToken = options.anonymousToken ?? null;
    this.signUpToken = options.signUpToken ?? null;
    this._mode = options.authMode ?? 'anonymous';
    this.debug = options.debug ?? false;
  }

  /**
   * Get current mode
   */
  get mode(): AuthMode {
    return this._mode;
  }

  setMode(mode: AuthMode): void {
    if (this.debug && mode !== this._mode) {
      console.debug(`[Backand:Auth] Mode ${this._mode} -> ${mode}`);
    }
    this._mode = mode;
  }

  setAnonymousToken(token: string): void {
    this.anonymousToken = token;
  }

  setSignUpToken(token: string): void {
    this.signUpToken = token;
  }

  /**
   * @throws BackandError with code `STORAGE_ERROR` when the secret store fails
   */
  async getUserToken(): Promise<string | null> {
    return (await this.withStorage('read', () => this.storage.getItem(USER_TOKEN_KEY))) ?? null;
  }

  async setUserToken(token: string): Promise<void> {
    await this.withStorage('write', () => this.storage.setItem(USER_TOKEN_KEY, token));
  }

  async clearUserToken(): Promise<void> {
    await this.withStorage('remove', () => this.storage.removeItem(USER_TOKEN_KEY));
  }

  /**
   * Store the user token and switch to `user` mode
   */
  async saveUserSession(token: string): Promise<void> {
    await this.setUserToken(token);
    this.setMode('user');
  }

  /**
   * Remove the user token and fall back to `anonymous` mode
   */
  async clearSession(): Promise<void> {
    try {
      await this.clearUserToken();
    } finally {
      this.setMode('anonymous');
    }
  }

  /**
   * True when a user token is in the secret store, whatever the current mode
   */
  async hasUserToken(): Promise<boolean> {
    return (await this.getUserToken()) !== null;
  }

  /**
   * Credential header for the current mode.
   * Unconfigured anonymous and sign-up tokens produce no header.
   */
  async getAuthHeaders(): Promise<Record<string, string>> {
    switch (this._mode) {
      case 'anonymous':
        return this.anonymousToken === null ? {} : { AnonymousToken: this.anonymousToken };
      case 'user':
        return { Authorization: `Bearer ${(await this.getUserToken()) ?? ''}` };
      case 'signUp':
        return this.signUpToken === null ? {} : { SignUpToken: this.signUpToken };
    }
  }

  private async withStorage<T>(action: string, run: () => T | Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new BackandError(
        `Failed to ${action} the user token: ${error instanceof Error ? error.message : String(error)}`,
        0,
        'STORAGE_ERROR',
        undefined,
        { cause: error }
      );
    }
  }
}
