/**
 * Transport - one HTTP call per sub-request, with retry
 *
 * - 429: exponential backoff registered on the shared RateLimiter, up to
 *   `maxRateLimitRetries` retries, then RateLimitError. The limiter lets
 *   one request through after the backoff before the rest resume.
 * - thrown fetch errors, timeouts and 5xx: shorter backoff, up to
 *   `maxNetworkRetries` retries, then NetworkError
 * - 401/403: AuthenticationError, never retried
 * - acknowledgement with reason 999: "no data" outcome, never retried
 * - any other acknowledgement or 4xx: APIResponseError, never retried
 */

import {
  APIResponseError,
  AuthenticationError,
  CancelledError,
  NetworkError,
  RateLimitError,
} from "../errors.js";
import { apiLogger } from "../logger.js";
import { isArchive } from "./decoder.js";
import {
  backoffDelay,
  systemClock,
  type Clock,
  type RateLimiter,
  type RateLimitSlot,
} from "./rate-limiter.js";
import { looksLikeXml, readAcknowledgement } from "./xml.js";

import type { SubRequest, TransportOutcome } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface RetryPolicy {
  /** Retries after HTTP 429 before giving up */
  maxRateLimitRetries: number;
  rateLimitBaseDelayMs: number;
  /** Retries after network failures, timeouts and 5xx */
  maxNetworkRetries: number;
  networkBaseDelayMs: number;
  maxBackoffMs: number;
  /** Per-call timeout, covering the response body */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRateLimitRetries: 3,
  rateLimitBaseDelayMs: 1000,
  maxNetworkRetries: 2,
  networkBaseDelayMs: 250,
  maxBackoffMs: 30_000,
  timeoutMs: 30_000,
};

export type FetchFn = (
  input: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<Response>;

export interface Transport {
  execute(request: SubRequest, signal?: AbortSignal): Promise<TransportOutcome>;
}

export interface HttpTransportOptions {
  apiKey: string;
  baseUrl: string;
  rateLimiter: RateLimiter;
  retry?: Partial<RetryPolicy>;
  clock?: Clock;
  fetch?: FetchFn;
  userAgent?: string;
}

interface HttpResponse {
  status: number;
  statusText: string;
  bytes: Uint8Array;
  contentType: string | null;
  contentDisposition: string | null;
}

const USER_AGENT = "entsoe-series/0.1.0";
const textDecoder = new TextDecoder("utf-8");

class AttemptTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${String(timeoutMs)}ms`);
    this.name = "AttemptTimeoutError";
  }
}

// ============================================================================
// HTTP Transport
// ============================================================================

export class HttpTransport implements Transport {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly rateLimiter: RateLimiter;
  private readonly retry: RetryPolicy;
  private readonly clock: Clock;
  private readonly fetchFn: FetchFn;
  private readonly userAgent: string;

  constructor(options: HttpTransportOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.rateLimiter = options.rateLimiter;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.clock = options.clock ?? systemClock;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.userAgent = options.userAgent ?? USER_AGENT;
  }

  /**
   * Build the request URL. The token travels as a query parameter.
   */
  buildUrl(request: SubRequest): string {
    const params = new URLSearchParams({
      securityToken: this.apiKey,
      ...request.params,
    });
    return `${this.baseUrl}?${params.toString()}`;
  }

  async execute(
    request: SubRequest,
    signal?: AbortSignal
  ): Promise<TransportOutcome> {
    const url = this.buildUrl(request);
    const logContext = {
      subRequest: request.index,
      dimension: request.dimension.key,
      params: request.params,
    };

    let attempts = 0;
    let rateLimitRetries = 0;
    let networkRetries = 0;

    const retryAfterNetworkFailure = async (
      message: string,
      cause?: unknown,
      statusCode?: number
    ): Promise<void> => {
      if (networkRetries >= this.retry.maxNetworkRetries) {
        apiLogger.error({ ...logContext, attempts, message }, "Request failed");
        throw new NetworkError(
          `${message} (gave up after ${String(attempts)} attempts)`,
          { attempts, cause, statusCode }
        );
      }

      const waitMs = backoffDelay(
        this.retry.networkBaseDelayMs,
        networkRetries,
        this.retry.maxBackoffMs
      );
      networkRetries++;
      apiLogger.warn(
        { ...logContext, attempts, waitMs, message },
        "Request failed, retrying"
      );
      await this.pause(waitMs, signal);
    };

    for (;;) {
      if (signal?.aborted === true) {
        throw new CancelledError();
      }
      const slot = await this.acquireSlot(signal);
      attempts++;

      apiLogger.debug({ ...logContext, attempt: attempts }, "Sending request to ENTSO-E API");

      let response: HttpResponse;
      try {
        response = await this.send(url, signal);
      } catch (error) {
        slot.release();
        if (signal?.aborted) {
          throw new CancelledError();
        }
        await retryAfterNetworkFailure(
          error instanceof Error ? error.message : String(error),
          error
        );
        continue;
      }

      const { status } = response;

      if (status === 429) {
        if (rateLimitRetries >= this.retry.maxRateLimitRetries) {
          slot.release();
          apiLogger.error({ ...logContext, attempts }, "Rate limit retries exhausted");
          throw new RateLimitError(attempts);
        }
        this.rateLimiter.backOff(
          backoffDelay(
            this.retry.rateLimitBaseDelayMs,
            rateLimitRetries,
            this.retry.maxBackoffMs
          )
        );
        // After backOff, so held waiters see the new deadline
        slot.release();
        rateLimitRetries++;
        continue;
      }

      slot.release();

      if (status === 401 || status === 403) {
        apiLogger.error({ ...logContext, status }, "Credential rejected");
        throw new AuthenticationError(
          "Unauthorized. Check your ENTSOE_API_KEY.",
          status
        );
      }

      if (status >= 500) {
        await retryAfterNetworkFailure(
          `API returned HTTP ${String(status)} ${response.statusText}`.trim(),
          undefined,
          status
        );
        continue;
      }

      const outcome = this.interpret(response);
      apiLogger.debug(
        { ...logContext, status, kind: outcome.kind, bytes: response.bytes.length },
        "Received response from ENTSO-E API"
      );
      return outcome;
    }
  }

  private interpret(response: HttpResponse): TransportOutcome {
    const { status, bytes } = response;
    const text = isArchive(bytes) ? null : textDecoder.decode(bytes);

    if (text !== null && looksLikeXml(text)) {
      const ack = readAcknowledgement(text);
      if (ack?.noData === true) {
        return { kind: "no-data", reason: ack.text };
      }
      if (ack !== null) {
        throw new APIResponseError(`API rejected the request: ${ack.text}`, {
          snippet: text,
          statusCode: status,
        });
      }
    }

    if (status < 200 || status >= 300) {
      throw new APIResponseError(`API returned HTTP ${String(status)}`, {
        snippet: text ?? "",
        statusCode: status,
      });
    }

    return {
      kind: "payload",
      payload: {
        bytes,
        contentType: response.contentType,
        contentDisposition: response.contentDisposition,
      },
    };
  }

  private async send(url: string, signal?: AbortSignal): Promise<HttpResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new AttemptTimeoutError(this.retry.timeoutMs));
    }, this.retry.timeoutMs);
    const onAbort = (): void => {
      controller.abort(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchFn(url, {
        headers: { "User-Agent": this.userAgent },
        signal: controller.signal,
      });
      const body = await response.arrayBuffer();

      return {
        status: response.status,
        statusText: response.statusText,
        bytes: new Uint8Array(body),
        contentType: response.headers.get("content-type"),
        contentDisposition: response.headers.get("content-disposition"),
      };
    } catch (error) {
      // A timeout surfaces as the abort reason or as a generic AbortError
      if (controller.signal.reason instanceof AttemptTimeoutError) {
        throw controller.signal.reason;
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private async acquireSlot(signal?: AbortSignal): Promise<RateLimitSlot> {
    try {
      return await this.rateLimiter.acquire(signal);
    } catch (error) {
      if (signal?.aborted === true) {
        throw new CancelledError();
      }
      throw error;
    }
  }

  private async pause(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.clock.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted === true) {
        throw new CancelledError();
      }
      throw error;
    }
  }
}
