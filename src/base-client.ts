/**
 * Base client implementation with the shared request/response transport
 */

import { VERSION } from './version.js';
import { ResponseAccumulator } from './accumulator.js';
import { ConsoleLogger, type Logger } from './logger.js';
import {
  AllocationError,
  ConfigurationError,
  TransportError,
  VectorDBError,
} from './exceptions.js';

/**
 * Configuration options for the base client
 */
export interface BaseClientConfig {
  /** Server URL without the /api/v1 suffix (default: VECTORDB_BASE_URL, then http://localhost:8000). Used verbatim */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: VECTORDB_TIMEOUT_MS, then none) */
  timeout?: number;
  /** Largest response body accepted per request, in bytes (default: unbounded) */
  maxResponseBytes?: number;
  /** Log debug lines for every request (default: VECTORDB_DEBUG=1) */
  debug?: boolean;
  /** Operator-facing log output (default: console) */
  logger?: Logger;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  /** Fall back to VECTORDB_* environment variables for unset options (default: true) */
  useEnv?: boolean;
}

/**
 * Request options for HTTP requests
 */
interface RequestOptions {
  /** Raw request body, sent as-is */
  body?: string;
  headers?: Record<string, string>;
  /** Receives the response body; without one the body is read and discarded */
  sink?: ResponseAccumulator;
}

/**
 * Outcome of one request at the transport level. `ok` says the exchange
 * completed; the HTTP status is reported but not judged.
 */
export type TransportResult =
  | { ok: true; status: number }
  | { ok: false; error: VectorDBError };

function parseTimeout(value: number | string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }

  const timeout = Number(value);
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new ConfigurationError(`Invalid timeout: ${String(value)}. Expected a positive number of milliseconds.`);
  }
  return timeout;
}

/**
 * Base client with the shared transport.
 *
 * Provides:
 * - One fetch per request, no retries and no connection state between calls
 * - Response bodies streamed into a {@link ResponseAccumulator}
 * - Transport failures logged and returned as a {@link TransportResult}, never thrown
 */
export class BaseClient {
  /** @internal Base URL for API requests */
  public readonly baseUrl: string;
  /** @internal Request timeout in milliseconds, undefined for none */
  public readonly timeout: number | undefined;
  /** @internal Per-request body limit in bytes */
  public readonly maxResponseBytes: number | undefined;
  /** @internal Operator-facing log output */
  public readonly logger: Logger;

  private readonly fetchImpl: typeof fetch | undefined;

  constructor(config: BaseClientConfig = {}) {
    const env: NodeJS.ProcessEnv = config.useEnv === false ? {} : process.env;

    // No trailing-slash normalization: paths are appended to the URL as given
    this.baseUrl = config.baseUrl ?? env.VECTORDB_BASE_URL ?? 'http://localhost:8000';

    this.timeout = parseTimeout(config.timeout ?? env.VECTORDB_TIMEOUT_MS);

    if (
      config.maxResponseBytes !== undefined &&
      (!Number.isInteger(config.maxResponseBytes) || config.maxResponseBytes < 0)
    ) {
      throw new ConfigurationError(
        `Invalid maxResponseBytes: ${config.maxResponseBytes}. Expected a non-negative integer.`
      );
    }
    this.maxResponseBytes = config.maxResponseBytes;

    const debug = config.debug ?? env.VECTORDB_DEBUG === '1';
    this.logger = config.logger || new ConsoleLogger(debug);
    this.fetchImpl = config.fetch;
  }

  /**
   * Create an empty accumulator honouring this client's body limit
   */
  createAccumulator(): ResponseAccumulator {
    return new ResponseAccumulator({ maxBytes: this.maxResponseBytes });
  }

  /**
   * Get headers for requests
   */
  protected getHeaders(extra: Record<string, string> = {}): Record<string, string> {
    return {
      'User-Agent': `vectordb-collections-typescript/${VERSION}`,
      ...extra,
    };
  }

  /**
   * Make one HTTP request and read its body to the end.
   *
   * Resolves `{ ok: false }` for anything that stops the exchange: a malformed
   * URL, a network error, a timeout, or a sink that refuses a chunk.
   */
  async request(method: string, path: string, options: RequestOptions = {}): Promise<TransportResult> {
    // Plain concatenation, as the collection name is part of the path
    const urlString = this.baseUrl + path;
    this.logger.debug(`${method} ${urlString}`);

    let url: URL;
    try {
      url = new URL(urlString);
    } catch (error) {
      const failure = new TransportError(`malformed URL: ${urlString}`, { cause: error });
      this.logger.error(`${method} ${urlString} failed: ${failure.message}`);
      return { ok: false, error: failure };
    }

    const controller = new AbortController();
    const timeoutId =
      this.timeout !== undefined ? setTimeout(() => controller.abort(), this.timeout) : undefined;

    try {
      // Global fetch is looked up per request so it can be replaced after construction
      const fetchImpl = this.fetchImpl ?? globalThis.fetch;
      const response = await fetchImpl(url.toString(), {
        method,
        headers: this.getHeaders(options.headers),
        body: options.body,
        // A 3xx answer is the response: following it would be a second request
        redirect: 'manual',
        signal: controller.signal,
      });

      await this.readBody(response, options.sink);

      return { ok: true, status: response.status };
    } catch (error) {
      const failure = this.toTransportError(error, controller.signal.aborted);
      this.logger.error(`${method} ${urlString} failed: ${failure.message}`);
      return { ok: false, error: failure };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Stream the response body into the sink chunk by chunk
   */
  private async readBody(response: Response, sink: ResponseAccumulator | undefined): Promise<void> {
    if (!response.body) {
      return;
    }

    const reader = response.body.getReader();

    try {
      while (true) {
        const result = await reader.read();
        if (result.done) {
          break;
        }

        const chunk: Uint8Array = result.value;
        if (sink && sink.append(chunk) !== chunk.length) {
          // Abort the transfer: the rest of the body is not wanted
          await reader.cancel();
          throw sink.error ?? new AllocationError('response sink refused a chunk', sink.length + chunk.length);
        }
      }
    } finally {
      reader.releaseLock();
    }
  }

  private toTransportError(error: unknown, timedOut: boolean): VectorDBError {
    if (error instanceof VectorDBError) {
      return error;
    }
    if (timedOut) {
      return new TransportError(`request timed out after ${this.timeout}ms`, { cause: error });
    }
    const message = error instanceof Error ? describeError(error) : String(error);
    return new TransportError(message, { cause: error });
  }
}

/**
 * Node's fetch reports "fetch failed" and puts the socket error in `cause`
 */
function describeError(error: Error): string {
  if (error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error.message;
}
