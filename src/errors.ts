export interface RequestErrorDetails {
  url?: string;
  status?: number;
  body?: string;
  cause?: unknown;
}

/**
 * Base class for failures of a single Azure DevOps request.
 */
export class AdoRequestError extends Error {
  readonly url?: string;
  readonly status?: number;
  readonly body: string;

  constructor(message: string, details: RequestErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'AdoRequestError';
    this.url = details.url;
    this.status = details.status;
    this.body = details.body ?? '';
  }
}

/** Credential missing, or rejected with 401/403. */
export class AuthError extends AdoRequestError {
  constructor(message: string, details: RequestErrorDetails = {}) {
    super(message, details);
    this.name = 'AuthError';
  }
}

export class ServerError extends AdoRequestError {
  constructor(message: string, details: RequestErrorDetails = {}) {
    super(message, details);
    this.name = 'ServerError';
  }
}

/**
 * Every candidate API version failed for a paginated resource.
 * Carries the status and body of the last version tried.
 */
export class VersionFallbackExhaustedError extends ServerError {
  readonly versions: readonly string[];
  readonly lastError?: AdoRequestError;

  constructor(path: string, versions: readonly string[], lastError?: AdoRequestError) {
    super(
      `All API versions failed for ${path} (${versions.join(', ') || 'none given'})` +
        (lastError ? `: ${lastError.message}` : ''),
      {
        url: lastError?.url,
        status: lastError?.status,
        body: lastError?.body,
        cause: lastError,
      }
    );
    this.name = 'VersionFallbackExhaustedError';
    this.versions = versions;
    this.lastError = lastError;
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class CycleError extends Error {
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(`Suite hierarchy contains a cycle: ${cycle.join(' -> ')}`);
    this.name = 'CycleError';
    this.cycle = cycle;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const MAX_BODY_LENGTH = 500;

/**
 * Operator-facing diagnostic: error name and message, then status, URL and a
 * truncated response body when the error came from a request.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const lines = [`${error.name}: ${error.message}`];
  if (error instanceof AdoRequestError) {
    if (error.status !== undefined) lines.push(`Status: ${error.status}`);
    if (error.url) lines.push(`URL: ${error.url}`);
    if (error.body) {
      const body = error.body.length > MAX_BODY_LENGTH
        ? `${error.body.substring(0, MAX_BODY_LENGTH)}...`
        : error.body;
      lines.push(`Body: ${body}`);
    }
  }
  return lines.join('\n');
}
