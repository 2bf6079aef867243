import type { ApiScope, AzureDevOpsClient, QueryParams } from './azureDevOpsClient.js';
import { readHeader } from './azureDevOpsClient.js';
import { AdoRequestError, AuthError, VersionFallbackExhaustedError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export const CONTINUATION_HEADER = 'x-ms-continuationtoken';
export const CONTINUATION_PARAM = 'continuationToken';

export interface PaginateOptions {
  /** Candidate API versions, most preferred first. */
  versions: readonly string[];
  params?: QueryParams;
  valueKey?: string;
  scope?: ApiScope;
}

/**
 * Pulls the records of one page. A missing key means zero records rather than an
 * error, since response shapes drift between API revisions.
 */
export function extractRecords(body: unknown, valueKey: string): unknown[] {
  if (Array.isArray(body)) {
    return body;
  }
  if (typeof body !== 'object' || body === null) {
    return [];
  }
  const chunk: unknown = Reflect.get(body, valueKey);
  if (chunk === undefined || chunk === null) {
    return [];
  }
  return Array.isArray(chunk) ? chunk : [chunk];
}

/**
 * Fully materializes a continuation-token paginated collection, falling back
 * through API versions. Pages fetched under different versions are never mixed:
 * a failure anywhere in a version's page loop discards everything that version
 * produced.
 */
export class VersionedPaginationClient {
  private client: AzureDevOpsClient;
  private logger: Logger;

  constructor(client: AzureDevOpsClient, logger: Logger = silentLogger) {
    this.client = client;
    this.logger = logger;
  }

  async fetchAll(path: string, options: PaginateOptions): Promise<unknown[]> {
    let lastError: AdoRequestError | undefined;

    for (const version of options.versions) {
      try {
        return await this.fetchVersion(path, version, options);
      } catch (error) {
        if (error instanceof AuthError || !(error instanceof AdoRequestError)) {
          throw error;
        }
        lastError = error;
        this.logger.warn(`api-version ${version} failed for ${path}`, {
          status: error.status,
          message: error.message,
        });
      }
    }

    throw new VersionFallbackExhaustedError(path, options.versions, lastError);
  }

  private async fetchVersion(path: string, version: string, options: PaginateOptions): Promise<unknown[]> {
    const valueKey = options.valueKey ?? 'value';
    const records: unknown[] = [];
    let token: string | undefined;

    do {
      const params: QueryParams = { ...options.params, 'api-version': version };
      if (token) {
        params[CONTINUATION_PARAM] = token;
      }
      const response = await this.client.get(path, params, options.scope);
      records.push(...extractRecords(response.body, valueKey));
      token = readHeader(response.headers, CONTINUATION_HEADER);
    } while (token);

    this.logger.debug(`Fetched ${records.length} record(s) from ${path}`, { version });
    return records;
  }
}
