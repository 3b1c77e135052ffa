/**
 * Mock HTTP transport for testing.
 *
 * Tests enqueue responses in order and inspect the recorded requests
 * afterwards (Arrange-Act-Assert).
 */

export interface MockResponse {
  status: number;
  body: string;
  headers?: Record<string, string>;
}

export interface MockStreamOptions {
  status?: number;
  headers?: Record<string, string>;
  /** Fail the body with this error after the chunks are delivered */
  failWith?: Error;
  /** Leave the body open after the chunks are delivered */
  keepOpen?: boolean;
}

export interface RecordedRequest {
  url: string;
  options: RequestInit;
}

type Responder = (request: RecordedRequest) => Promise<Response>;

function headersOf(options: RequestInit): Headers {
  return new Headers(options.headers);
}

/**
 * Mock HTTP client implementation for testing.
 *
 * @example
 * ```typescript
 * const mockClient = new MockHttpClient();
 * mockClient.enqueueJsonResponse(200, { candidates: [] });
 *
 * const session = GemSession.builder()
 *   .apiKey('test-key')
 *   .fetch(createMockFetch(mockClient))
 *   .build();
 * ```
 */
export class MockHttpClient {
  private responders: Responder[] = [];
  private requests: RecordedRequest[] = [];

  /**
   * Enqueue a raw response to be returned by the next request.
   */
  enqueueResponse(response: MockResponse): void {
    this.responders.push(async () => new Response(response.body, {
      status: response.status,
      headers: response.headers,
    }));
  }

  /**
   * Enqueue a JSON response with the given status code and body.
   */
  enqueueJsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): void {
    this.enqueueResponse({
      status,
      body: JSON.stringify(body),
      headers: { 'content-type': 'application/json', ...headers },
    });
  }

  /**
   * Enqueue an API error body `{ error: { code, message, status } }`.
   */
  enqueueErrorResponse(
    status: number,
    message: string,
    rpcStatus = 'UNKNOWN',
    headers: Record<string, string> = {}
  ): void {
    this.enqueueJsonResponse(status, { error: { code: status, message, status: rpcStatus } }, headers);
  }

  /**
   * Enqueue a streaming response delivering each string as one body chunk.
   */
  enqueueStreamingResponse(chunks: string[], options: MockStreamOptions = {}): void {
    this.responders.push(async () => {
      const encoder = new TextEncoder();
      const stream = new ReadableStream<Uint8Array>({
        start(controller) {
          for (const chunk of chunks) {
            controller.enqueue(encoder.encode(chunk));
          }
          if (options.failWith) {
            controller.error(options.failWith);
          } else if (!options.keepOpen) {
            controller.close();
          }
        },
      });

      return new Response(stream, {
        status: options.status ?? 200,
        headers: { 'content-type': 'application/json', ...options.headers },
      });
    });
  }

  /**
   * Enqueue a request that never answers; it rejects once its signal aborts.
   */
  enqueueHang(): void {
    this.responders.push(
      ({ options }) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = options.signal;
          if (!signal) {
            reject(new Error('Hanging request needs an abort signal'));
            return;
          }
          signal.addEventListener('abort', () => {
            reject(new DOMException('This operation was aborted', 'AbortError'));
          });
        })
    );
  }

  /**
   * Enqueue a transport failure.
   */
  enqueueNetworkError(message = 'fetch failed'): void {
    this.responders.push(async () => {
      throw new TypeError(message);
    });
  }

  getRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  getLastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  /** Parsed JSON body of a recorded request. */
  getJsonBody(index: number): unknown {
    const body = this.requests[index]?.options.body;
    if (typeof body !== 'string') {
      throw new Error(`Request ${index} has no string body`);
    }
    return JSON.parse(body);
  }

  /** A header of a recorded request, case-insensitive. */
  getHeader(index: number, name: string): string | null {
    const request = this.requests[index];
    if (!request) {
      throw new Error(`No request at index ${index}`);
    }
    return headersOf(request.options).get(name);
  }

  /**
   * Verify that exactly the expected number of requests were made.
   *
   * @throws {Error} If the actual count doesn't match expected
   */
  verifyRequestCount(expected: number): void {
    if (this.requests.length !== expected) {
      throw new Error(`Expected ${expected} requests, got ${this.requests.length}`);
    }
  }

  /**
   * Verify that a request was made with the expected method and URL pattern.
   *
   * @throws {Error} If the request doesn't match expectations
   */
  verifyRequest(index: number, method: string, urlContains: string): void {
    const request = this.requests[index];
    if (!request) {
      throw new Error(`No request at index ${index}`);
    }

    const actualMethod = request.options.method || 'GET';
    if (actualMethod !== method) {
      throw new Error(`Expected method ${method}, got ${actualMethod}`);
    }
    if (!request.url.includes(urlContains)) {
      throw new Error(`Expected URL to contain '${urlContains}', got '${request.url}'`);
    }
  }

  /** Number of enqueued responses not yet consumed. */
  get pending(): number {
    return this.responders.length;
  }

  clearRequests(): void {
    this.requests = [];
  }

  /**
   * Make a fetch request (mock implementation).
   */
  async request(url: string, options: RequestInit = {}): Promise<Response> {
    const recorded = { url, options };
    this.requests.push(recorded);

    const responder = this.responders.shift();
    if (!responder) {
      throw new Error(`No response configured in MockHttpClient for ${options.method ?? 'GET'} ${url}`);
    }
    return responder(recorded);
  }
}

/**
 * Create a mock fetch function backed by a MockHttpClient.
 */
export function createMockFetch(
  mockClient: MockHttpClient
): (url: string | URL | Request, init?: RequestInit) => Promise<Response> {
  return async (url: string | URL | Request, init?: RequestInit) => {
    const urlString = typeof url === 'string' ? url : url instanceof URL ? url.toString() : url.url;
    return mockClient.request(urlString, init);
  };
}
