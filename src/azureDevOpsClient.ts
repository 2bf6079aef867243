import * as azdev from 'azure-devops-node-api';
import type { AzureDevOpsConfig } from './config.js';
import { AuthError, ServerError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryValue>;

/** Where a resource path is rooted: under the project, or directly under the organization. */
export type ApiScope = 'project' | 'organization';

export type ResponseHeaders = NodeJS.Dict<string | string[]>;

export interface HttpResponse {
  message: {
    statusCode?: number;
    headers: ResponseHeaders;
  };
  readBody(): Promise<string>;
}

/**
 * The slice of typed-rest-client's HttpClient the fetcher uses. The client of an
 * azure-devops-node-api connection satisfies it; tests pass an in-process fake.
 */
export interface HttpTransport {
  get(requestUrl: string, additionalHeaders?: Record<string, string>): Promise<HttpResponse>;
  post(requestUrl: string, data: string, additionalHeaders?: Record<string, string>): Promise<HttpResponse>;
}

export interface ApiResponse {
  url: string;
  status: number;
  headers: ResponseHeaders;
  /** Decoded JSON, or null when the body was empty or not JSON. */
  body: unknown;
}

export interface AzureDevOpsClientOptions {
  transport?: HttpTransport;
  logger?: Logger;
}

export function createAuthHeader(pat: string): string {
  return `Basic ${Buffer.from(`:${pat}`).toString('base64')}`;
}

export function createTransport(config: AzureDevOpsConfig): HttpTransport {
  const authHandler = azdev.getBasicHandler('', config.pat);
  const connection = new azdev.WebApi(config.orgUrl, authHandler, {
    socketTimeout: config.requestTimeoutMs,
  });
  return connection.rest.client;
}

export function readHeader(headers: ResponseHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;
    const first = Array.isArray(value) ? value[0] : value;
    return first ? first : undefined;
  }
  return undefined;
}

/**
 * Issues single authenticated requests against the REST surface of one
 * organization/project. Never retries: fallback belongs to the pagination client.
 */
export class AzureDevOpsClient {
  private config: AzureDevOpsConfig;
  private transport: HttpTransport;
  private logger: Logger;
  private authHeader: string;

  constructor(config: AzureDevOpsConfig, options: AzureDevOpsClientOptions = {}) {
    if (!config.pat) {
      throw new AuthError('A personal access token is required');
    }
    this.config = config;
    this.transport = options.transport ?? createTransport(config);
    this.logger = options.logger ?? silentLogger;
    this.authHeader = createAuthHeader(config.pat);
  }

  get project(): string {
    return this.config.project;
  }

  buildUrl(path: string, params: QueryParams = {}, scope: ApiScope = 'project'): string {
    const root = scope === 'project'
      ? `${this.config.orgUrl}/${encodeURIComponent(this.config.project)}`
      : this.config.orgUrl;
    const suffix = path.startsWith('/') ? path : `/${path}`;

    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        query.append(key, String(value));
      }
    }
    const queryString = query.toString();
    return `${root}${suffix}${queryString ? `?${queryString}` : ''}`;
  }

  async get(path: string, params: QueryParams = {}, scope: ApiScope = 'project'): Promise<ApiResponse> {
    const url = this.buildUrl(path, params, scope);
    this.logger.info(`GET ${url}`);
    return this.send(url, () =>
      this.transport.get(url, { Authorization: this.authHeader, Accept: 'application/json' })
    );
  }

  async post(
    path: string,
    body: unknown,
    params: QueryParams = {},
    scope: ApiScope = 'project'
  ): Promise<ApiResponse> {
    const url = this.buildUrl(path, params, scope);
    this.logger.info(`POST ${url}`);
    return this.send(url, () =>
      this.transport.post(url, JSON.stringify(body), {
        Authorization: this.authHeader,
        Accept: 'application/json',
        'Content-Type': 'application/json',
      })
    );
  }

  private async send(url: string, request: () => Promise<HttpResponse>): Promise<ApiResponse> {
    let response: HttpResponse;
    let text: string;
    try {
      response = await request();
      text = await response.readBody();
    } catch (error) {
      // socket timeouts surface here as well
      const reason = error instanceof Error ? error.message : String(error);
      throw new ServerError(`Request failed for ${url}: ${reason}`, { url, cause: error });
    }

    const status = response.message.statusCode ?? 0;
    if (status === 401 || status === 403) {
      throw new AuthError(`HTTP ${status} for ${url}`, { url, status, body: text });
    }
    if (status >= 400) {
      throw new ServerError(`HTTP ${status} for ${url}`, { url, status, body: text });
    }

    return {
      url,
      status,
      headers: response.message.headers,
      body: this.decode(url, text),
    };
  }

  private decode(url: string, text: string): unknown {
    if (!text.trim()) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch {
      this.logger.warn(`Response from ${url} is not JSON; treating it as empty`);
      return null;
    }
  }
}
