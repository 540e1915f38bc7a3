import { BackandError, type BackandConfig, type BackandResponse, type FetchLike } from '../types';
import { encodeQueryComponent } from './query-encoder';
import { resolveRoute, type HttpMethod, type Operation, type Route, type RouteContext } from './router';
import type { TokenManager } from './token-manager';

export const DEFAULT_API_URL = 'https://api.backand.com';
export const DEFAULT_API_VERSION = '1';

const CREDENTIAL_HEADERS = new Set(['anonymoustoken', 'signuptoken', 'authorization']);

/**
 * Fully assembled request, handed to the transport exactly once
 */
export interface RequestDescriptor {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: unknown;
}

export class HttpClient {
  public readonly fetch: FetchLike;
  private apiUrl: string;
  private apiVersion: string;
  private appName: string | null;
  private defaultHeaders: Record<string, string>;
  private debug: boolean;

  constructor(
    config: BackandConfig,
    private tokenManager: TokenManager
  ) {
    this.apiUrl = config.apiUrl || DEFAULT_API_URL;
    this.apiVersion = config.apiVersion || DEFAULT_API_VERSION;
    this.appName = config.appName ?? null;
    this.debug = config.debug ?? false;
    this.defaultHeaders = {};
    // Exactly one credential header is sent, chosen by the auth mode
    for (const [name, value] of Object.entries(config.headers ?? {})) {
      if (!CREDENTIAL_HEADERS.has(name.toLowerCase())) {
        this.defaultHeaders[name] = value;
      }
    }

    const fetchImpl: FetchLike | undefined = config.fetch ?? globalThis.fetch?.bind(globalThis);
    if (!fetchImpl) {
      throw new Error(
        'Fetch is not available. Please provide a fetch implementation in the config.'
      );
    }
    this.fetch = fetchImpl;
  }

  getApiUrl(): string {
    return this.apiUrl;
  }

  setApiUrl(url: string): void {
    this.apiUrl = url;
  }

  setAppName(name: string): void {
    this.appName = name;
  }

  routeContext(): RouteContext {
    return this.appName === null
      ? { apiVersion: this.apiVersion }
      : { apiVersion: this.apiVersion, appName: this.appName };
  }

  /**
   * Attach the session's headers to a resolved route.
   * The credential header follows the auth mode at the time of the call.
   */
  async buildRequest(route: Route): Promise<RequestDescriptor> {
    const headers: Record<string, string> = {
      ...this.defaultHeaders,
      ...(await this.tokenManager.getAuthHeaders()),
    };
    if (this.appName !== null) {
      headers['AppName'] = this.appName;
    }

    const descriptor: RequestDescriptor = {
      method: route.method,
      url: `${this.apiUrl.replace(/\/+$/, '')}${route.path}`,
      headers,
    };
    if (route.body !== undefined) {
      descriptor.body = route.body;
    }
    return descriptor;
  }

  /**
   * Send a request and decode its JSON response.
   *
   * @throws BackandError for transport failures, non-2xx statuses and
   * undecodable bodies. Bodies that cannot be serialized throw as-is.
   */
  async send<T>(descriptor: RequestDescriptor): Promise<T | null> {
    let url = descriptor.url;
    const headers = { ...descriptor.headers };
    let body: string | undefined;

    if (descriptor.body !== undefined) {
      const json = JSON.stringify(descriptor.body);
      if (descriptor.method === 'GET') {
        // fetch refuses a GET body; send it as the `parameters` query component
        url += `${url.includes('?') ? '&' : '?'}parameters=${encodeQueryComponent(json)}`;
      } else {
        headers['Content-Type'] = 'application/json';
        body = json;
      }
    }

    if (this.debug) {
      console.debug(`[Backand:Http] ${descriptor.method} ${url}`);
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetch(url, {
        method: descriptor.method,
        headers,
        body,
      });
      text = await response.text();
    } catch (error) {
      throw new BackandError(
        error instanceof Error ? error.message : 'Network request failed',
        0,
        'TRANSPORT_ERROR',
        undefined,
        { cause: error }
      );
    }

    if (this.debug) {
      console.debug(`[Backand:Http] ${descriptor.method} ${url} -> ${response.status}`);
    }

    if (!response.ok) {
      const details = parseJson(text);
      throw BackandError.fromApiError({
        error: 'HTTP_ERROR',
        message: extractErrorMessage(details) ?? `Request failed: ${response.statusText || response.status}`,
        statusCode: response.status,
        details: details === undefined ? text || undefined : details,
      });
    }

    // Handle No Content / Reset Content
    if (response.status === 204 || response.status === 205) {
      return null;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new BackandError(
        text.length === 0 ? 'Response body is empty' : 'Response body is not valid JSON',
        response.status,
        'DECODING_ERROR',
        text || undefined,
        { cause: error }
      );
    }
  }

  /**
   * Resolve, assemble and send one operation
   */
  async request<T>(operation: Operation): Promise<T | null> {
    const descriptor = await this.buildRequest(resolveRoute(operation, this.routeContext()));
    return this.send<T>(descriptor);
  }
}

/**
 * Turn a pending request into a `{ data, error }` result.
 * Only BackandError (transport, status, decoding and secret store failures)
 * becomes a Failure; anything else is a caller bug and rethrows.
 */
export async function settle<T>(pending: Promise<T | null>): Promise<BackandResponse<T>> {
  try {
    return { data: await pending, error: null };
  } catch (error) {
    if (error instanceof BackandError) {
      return { data: null, error };
    }
    throw error;
  }
}

function parseJson(text: string): unknown {
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// Backand answers with { Message }, OAuth-style { error, error_description } or { message }
function extractErrorMessage(payload: unknown): string | undefined {
  if (!payload || typeof payload !== 'object' || Array.isArray(payload)) return undefined;
  for (const key of ['error_description', 'Message', 'message', 'error']) {
    const value: unknown = Reflect.get(payload, key);
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}
