import type { HttpResponse, HttpTransport, ResponseHeaders } from '../../azureDevOpsClient.js';
import type { ReportingConfig } from '../../config.js';
import { createLogger, type Logger } from '../../logger.js';

export interface FakeRequest {
  method: 'GET' | 'POST';
  url: string;
  path: string;
  query: URLSearchParams;
  headers: Record<string, string>;
  data?: string;
}

export interface FakeReply {
  status?: number;
  /** Strings are sent as-is, anything else as JSON. */
  body?: unknown;
  headers?: ResponseHeaders;
}

type Responder = FakeReply | ((request: FakeRequest) => FakeReply);

interface Route {
  path: string;
  query: Record<string, string>;
  respond: Responder;
}

/**
 * In-process stand-in for the REST client. Routes match on the end of the URL
 * path plus any listed query parameters; the first matching route answers and
 * anything unrouted gets a 404.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: FakeRequest[] = [];
  private routes: Route[] = [];

  on(path: string, respond: Responder, query: Record<string, string> = {}): this {
    this.routes.push({ path, query, respond });
    return this;
  }

  async get(requestUrl: string, additionalHeaders: Record<string, string> = {}): Promise<HttpResponse> {
    return this.handle(this.record('GET', requestUrl, additionalHeaders));
  }

  async post(
    requestUrl: string,
    data: string,
    additionalHeaders: Record<string, string> = {}
  ): Promise<HttpResponse> {
    return this.handle(this.record('POST', requestUrl, additionalHeaders, data));
  }

  requestsTo(path: string): FakeRequest[] {
    return this.requests.filter((request) => request.path.endsWith(path));
  }

  private record(
    method: FakeRequest['method'],
    url: string,
    headers: Record<string, string>,
    data?: string
  ): FakeRequest {
    const parsed = new URL(url);
    const request: FakeRequest = {
      method,
      url,
      path: decodeURIComponent(parsed.pathname),
      query: parsed.searchParams,
      headers,
      data,
    };
    this.requests.push(request);
    return request;
  }

  private handle(request: FakeRequest): HttpResponse {
    const route = this.routes.find(
      (candidate) =>
        request.path.endsWith(candidate.path) &&
        Object.entries(candidate.query).every(([key, value]) => request.query.get(key) === value)
    );
    const reply: FakeReply = route
      ? typeof route.respond === 'function'
        ? route.respond(request)
        : route.respond
      : { status: 404, body: `No route for ${request.path}` };

    const text = reply.body === undefined
      ? ''
      : typeof reply.body === 'string'
        ? reply.body
        : JSON.stringify(reply.body);

    return {
      message: {
        statusCode: reply.status ?? 200,
        headers: reply.headers ?? {},
      },
      readBody: async () => text,
    };
  }
}

export const testConfig: ReportingConfig = {
  orgUrl: 'https://dev.azure.com/test-org',
  project: 'test-project',
  pat: 'test-pat',
  requestTimeoutMs: 1000,
  outputDir: 'exports',
  backfillRunLimit: 50,
  logLevel: 'error',
};

export function recordingLogger(component?: string): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return {
    logger: createLogger(component, 'debug', (line) => {
      lines.push(line);
    }),
    lines,
  };
}

export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}
