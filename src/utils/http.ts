/**
 * HTTP utilities with connection pooling
 */

import { request, Agent, type Dispatcher } from 'undici';
import { HttpError } from '../core/errors.js';

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

/**
 * Create a persistent HTTP agent with connection pooling
 */
export function createHttpAgent(): Agent {
  return new Agent({
    connections: 10,
    keepAliveTimeout: 10000,
    keepAliveMaxTimeout: 60000,
  });
}

/**
 * HTTP client with a fixed timeout and user agent. No retries.
 */
export class HttpClient {
  private dispatcher: Dispatcher;
  private ownsDispatcher: boolean;
  private timeout: number;
  private userAgent: string;

  /**
   * @param dispatcher Optional undici dispatcher; a pooled Agent is created when omitted
   */
  constructor(timeout: number, userAgent: string, dispatcher?: Dispatcher) {
    this.timeout = timeout;
    this.userAgent = userAgent;
    this.ownsDispatcher = dispatcher === undefined;
    this.dispatcher = dispatcher ?? createHttpAgent();
  }

  /**
   * Make an HTTP GET request. Any status code is returned; only transport failures throw.
   */
  async get(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    try {
      const response = await request(url, {
        method: 'GET',
        headers: { 'user-agent': this.userAgent, accept: 'application/json', ...headers },
        headersTimeout: this.timeout,
        bodyTimeout: this.timeout,
        dispatcher: this.dispatcher,
        throwOnError: false,
      });

      const body = await response.body.text();

      return {
        statusCode: response.statusCode,
        headers: response.headers,
        body,
      };
    } catch (error) {
      throw new HttpError(url, error);
    }
  }

  /**
   * Close the agent and cleanup connections. Injected dispatchers are left to their owner.
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
