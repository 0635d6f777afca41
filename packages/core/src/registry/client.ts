/**
 * Registry HTTP Client
 *
 * Retrying, time-boxed HTTP access for tag listings and artifact downloads.
 * Every attempt gets its own AbortController so a stalled body read is
 * bounded as well as the initial connection.
 *
 * @module core/registry/client
 */

import { fetchWithPool } from "@depsync/shared";
import type { z } from "zod";

import type { HttpConfig } from "../config/index.js";
import {
  AbortError,
  DepsyncError,
  describeError,
  ErrorCode,
  FetchError,
  isNetworkError,
  withRetry,
  wrapNetworkError,
} from "../errors/index.js";
import type { Logger } from "../logger/index.js";

/**
 * Minimal fetch signature the client depends on.
 * Tests inject a stub; production uses the shared connection pool.
 */
export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<Response>;

export interface RegistryHttpClientOptions {
  /** User-Agent sent with every request */
  userAgent: string;
  http: HttpConfig;
  fetch?: FetchLike;
  logger?: Logger;
  /** Cancels pending attempts and backoff sleeps */
  signal?: AbortSignal;
}

export interface RequestOptions {
  headers?: Record<string, string>;
}

const defaultFetch: FetchLike = (url, init) => fetchWithPool(url, init);

export class RegistryHttpClient {
  private readonly userAgent: string;
  private readonly http: HttpConfig;
  private readonly fetchImpl: FetchLike;
  private readonly logger?: Logger;
  private readonly signal?: AbortSignal;

  constructor(options: RegistryHttpClientOptions) {
    this.userAgent = options.userAgent;
    this.http = options.http;
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.logger = options.logger;
    this.signal = options.signal;
  }

  /**
   * GET a JSON document and validate it against `schema`.
   *
   * @throws FetchError with INVALID_RESPONSE if the body is not the expected shape
   */
  async getJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    return this.withPolicy(url, this.http.requestTimeoutMs, options, async (response) => {
      // Stream failures propagate to attempt() and are retried as transport errors.
      const text = await response.text();
      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch (error) {
        throw new FetchError(`Response from ${url} is not valid JSON`, url, {
          code: ErrorCode.INVALID_RESPONSE,
          cause: error,
        });
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
        throw new FetchError(
          `Unexpected response shape from ${url}${where}: ${issue?.message ?? "invalid"}`,
          url,
          { code: ErrorCode.INVALID_RESPONSE, cause: parsed.error }
        );
      }
      return parsed.data;
    });
  }

  /**
   * GET a (possibly large) artifact and hand its body stream to `consume`.
   * `consume` runs once per attempt and must not keep state between calls.
   */
  async download<T>(
    url: string,
    consume: (body: ReadableStream<Uint8Array>) => Promise<T>,
    options: RequestOptions = {}
  ): Promise<T> {
    return this.withPolicy(url, this.http.downloadTimeoutMs, options, async (response) => {
      if (!response.body) {
        throw new FetchError(`Empty response body: ${url}`, url, { status: response.status });
      }
      return consume(response.body);
    });
  }

  private async withPolicy<T>(
    url: string,
    timeoutMs: number,
    options: RequestOptions,
    handle: (response: Response) => Promise<T>
  ): Promise<T> {
    return withRetry(() => this.attempt(url, timeoutMs, options, handle), {
      maxRetries: this.http.maxAttempts - 1,
      baseDelay: this.http.baseDelayMs,
      maxDelay: this.http.maxDelayMs,
      signal: this.signal,
      onRetry: (error, attempt, delay) => {
        this.logger?.warn(
          `Retrying ${url} in ${delay}ms (attempt ${attempt + 1}/${this.http.maxAttempts}): ${describeError(error)}`
        );
      },
    });
  }

  private async attempt<T>(
    url: string,
    timeoutMs: number,
    options: RequestOptions,
    handle: (response: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const onOuterAbort = (): void => controller.abort();
    this.signal?.addEventListener("abort", onOuterAbort, { once: true });

    try {
      this.logger?.debug(`GET ${url}`);
      const response = await this.fetchImpl(url, {
        headers: { "User-Agent": this.userAgent, ...options.headers },
        signal: controller.signal,
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new FetchError(`HTTP ${response.status}: ${url}`, url, { status: response.status });
      }

      return await handle(response);
    } catch (error) {
      if (this.signal?.aborted) {
        throw new AbortError();
      }
      throw toFetchError(error, url, controller.signal.aborted, timeoutMs);
    } finally {
      clearTimeout(timer);
      this.signal?.removeEventListener("abort", onOuterAbort);
    }
  }
}

function toFetchError(error: unknown, url: string, aborted: boolean, timeoutMs: number): unknown {
  if (error instanceof DepsyncError) {
    return error;
  }
  if (aborted) {
    return new FetchError(`Request timed out after ${timeoutMs}ms: ${url}`, url, {
      code: ErrorCode.REQUEST_TIMEOUT,
      cause: error,
    });
  }
  if (error instanceof Error && isNetworkError(error)) {
    return wrapNetworkError(error, url);
  }
  return new FetchError(`Request failed: ${url}: ${describeError(error)}`, url, { cause: error });
}
