/**
 * EntsoeClient - public entry point
 *
 * fetch() plans the query, runs its sub-requests on a bounded pool and
 * merges the outcomes. Validation happens before any network call. Nothing
 * is cached between calls.
 */

import { loadConfig, type EntsoeConfig } from "../config.js";
import { APIResponseError, ConfigurationError } from "../errors.js";
import { apiLogger } from "../logger.js";
import { getDefaultRegistry, type CodeRegistry } from "../registry/codes.js";
import { assembleSeries } from "./assembler.js";
import { decodePayload } from "./decoder.js";
import { parseDocument } from "./parser.js";
import { planQuery, type QueryPlan } from "./planner.js";
import { runPool } from "./pool.js";
import { RateLimiter, type Clock } from "./rate-limiter.js";
import { HttpTransport, type FetchFn, type Transport } from "./transport.js";
import { parseXml, readAcknowledgement } from "./xml.js";

import type {
  BorderPair,
  DimensionValue,
  DocumentFamilyName,
  InstantInput,
  OneOrMany,
  ParsedPoint,
  QueryInput,
  ResultTable,
  SubRequest,
  SubRequestOutcome,
  SubRequestResult,
} from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface EntsoeClientOptions {
  /** Security token; falls back to ENTSOE_API_KEY */
  apiKey?: string;
  /** Overrides on top of the environment configuration */
  config?: Partial<EntsoeConfig>;
  /** Share one limiter between clients to share a throttling budget */
  rateLimiter?: RateLimiter;
  registry?: CodeRegistry;
  fetch?: FetchFn;
  clock?: Clock;
  /** Replaces the HTTP transport entirely */
  transport?: Transport;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface PsrFetchOptions extends FetchOptions {
  psrType?: OneOrMany<string>;
}

// ============================================================================
// Client
// ============================================================================

export class EntsoeClient {
  readonly config: Readonly<EntsoeConfig>;
  readonly registry: CodeRegistry;
  readonly rateLimiter: RateLimiter;
  private readonly transport: Transport;

  readonly prices: PricesApi;
  readonly load: LoadApi;
  readonly generation: GenerationApi;
  readonly transmission: TransmissionApi;
  readonly balancing: BalancingApi;

  constructor(options: EntsoeClientOptions = {}) {
    const config = { ...loadConfig(), ...options.config };
    const apiKey = (options.apiKey ?? config.apiKey ?? "").trim();
    if (apiKey === "") {
      throw new ConfigurationError(
        "API key required. Set ENTSOE_API_KEY or pass apiKey."
      );
    }
    this.config = Object.freeze({ ...config, apiKey });

    this.registry = options.registry ?? getDefaultRegistry();
    this.rateLimiter =
      options.rateLimiter ??
      new RateLimiter({
        minIntervalMs: config.minRequestIntervalMs,
        clock: options.clock,
      });

    this.transport =
      options.transport ??
      new HttpTransport({
        apiKey,
        baseUrl: config.baseUrl,
        rateLimiter: this.rateLimiter,
        clock: options.clock,
        fetch: options.fetch,
        retry: {
          maxRateLimitRetries: config.maxRateLimitRetries,
          rateLimitBaseDelayMs: config.rateLimitBaseDelayMs,
          maxNetworkRetries: config.maxNetworkRetries,
          networkBaseDelayMs: config.networkBaseDelayMs,
          maxBackoffMs: config.maxBackoffMs,
          timeoutMs: config.timeoutMs,
        },
      });

    this.prices = new PricesApi(this);
    this.load = new LoadApi(this);
    this.generation = new GenerationApi(this);
    this.transmission = new TransmissionApi(this);
    this.balancing = new BalancingApi(this);
  }

  /**
   * Plan a query without running it
   */
  plan(input: QueryInput): QueryPlan {
    return planQuery(input, this.registry);
  }

  /**
   * Fetch one document family for one or more dimension values
   */
  async fetch(
    family: DocumentFamilyName,
    start: InstantInput,
    end: InstantInput,
    dimensions: OneOrMany<DimensionValue>,
    psrTypes?: OneOrMany<string>,
    options: FetchOptions = {}
  ): Promise<ResultTable> {
    return this.query({ family, start, end, dimensions, psrTypes }, options);
  }

  async query(input: QueryInput, options: FetchOptions = {}): Promise<ResultTable> {
    const plan = this.plan(input);
    const startedAt = performance.now();

    apiLogger.info(
      {
        family: plan.family.name,
        start: plan.query.start.toISOString(),
        end: plan.query.end.toISOString(),
        dimensions: plan.dimensions.map((d) => d.key),
        subRequests: plan.subRequests.length,
      },
      "Fetching series"
    );

    const outcomes = await runPool(
      plan.subRequests,
      this.config.concurrency,
      (request, signal) => this.runSubRequest(plan, request, signal),
      options.signal
    );

    const table = assembleSeries(plan, outcomes, this.registry);

    apiLogger.info(
      {
        family: plan.family.name,
        rows: table.rows.length,
        missing: table.missing.map((m) => m.key),
        duration: `${String(Math.round(performance.now() - startedAt))}ms`,
      },
      "Fetched series"
    );

    return table;
  }

  private async runSubRequest(
    plan: QueryPlan,
    request: SubRequest,
    signal: AbortSignal
  ): Promise<SubRequestOutcome> {
    const outcome = await this.transport.execute(request, signal);
    if (outcome.kind === "no-data") {
      return { request, result: outcome };
    }

    const documents = decodePayload(outcome.payload);
    const result = collectPoints(documents, (xml) => parseDocument(xml, plan.family));
    return { request, result };
  }
}

/**
 * Parse every document of one payload. Archives may mix acknowledgements
 * with market documents; a sub-request has no data only when none of its
 * documents has any.
 */
function collectPoints(
  documents: readonly string[],
  parse: (xml: string) => ParsedPoint[]
): SubRequestResult {
  const points: ParsedPoint[] = [];
  const reasons: string[] = [];

  for (const xml of documents) {
    const doc = parseXml(xml);
    const ack = doc !== null ? readAcknowledgement(doc) : null;
    if (ack?.noData === true) {
      reasons.push(ack.text);
      continue;
    }
    if (ack !== null) {
      throw new APIResponseError(`API rejected the request: ${ack.text}`, {
        snippet: xml,
      });
    }
    points.push(...parse(xml));
  }

  if (points.length === 0) {
    return { kind: "no-data", reason: reasons.join(" ") || "No points returned." };
  }
  return { kind: "data", points };
}

// ============================================================================
// Namespaced API
// ============================================================================

type Countries = OneOrMany<string>;

export class PricesApi {
  constructor(private readonly client: EntsoeClient) {}

  /** Day-ahead prices per bidding zone */
  dayAhead(
    start: InstantInput,
    end: InstantInput,
    countries: Countries,
    options?: FetchOptions
  ): Promise<ResultTable> {
    return this.client.fetch(
      "day-ahead-prices",
      start,
      end,
      countries,
      undefined,
      options
    );
  }
}

export class LoadApi {
  constructor(private readonly client: EntsoeClient) {}

  actual(
    start: InstantInput,
    end: InstantInput,
    countries: Countries,
    options?: FetchOptions
  ): Promise<ResultTable> {
    return this.client.fetch("actual-load", start, end, countries, undefined, options);
  }

  forecast(
    start: InstantInput,
    end: InstantInput,
    countries: Countries,
    options?: FetchOptions
  ): Promise<ResultTable> {
    return this.client.fetch("load-forecast", start, end, countries, undefined, options);
  }
}

export class GenerationApi {
  constructor(private readonly client: EntsoeClient) {}

  /** Actual output per production type; filter with `psrType` */
  actual(
    start: InstantInput,
    end: InstantInput,
    countries: Countries,
    options: PsrFetchOptions = {}
  ): Promise<ResultTable> {
    return this.byPsr("actual-generation", start, end, countries, options);
  }

  forecast(
    start: InstantInput,
    end: InstantInput,
    countries: Countries,
    options: PsrFetchOptions = {}
  ): Promise<ResultTable> {
    return this.byPsr("generation-forecast", start, end, countries, options);
  }

  installedCapacity(
    start: InstantInput,
    end: InstantInput,
    countries: Countries,
    options: PsrFetchOptions = {}
  ): Promise<ResultTable> {
    return this.byPsr("installed-capacity", start, end, countries, options);
  }

  /** Output per production unit; rows carry unitEic and unitName */
  perPlant(
    start: InstantInput,
    end: InstantInput,
    countries: Countries,
    options: PsrFetchOptions = {}
  ): Promise<ResultTable> {
    return this.byPsr("generation-per-plant", start, end, countries, options);
  }

  private byPsr(
    family: DocumentFamilyName,
    start: InstantInput,
    end: InstantInput,
    countries: Countries,
    options: PsrFetchOptions
  ): Promise<ResultTable> {
    return this.client.fetch(family, start, end, countries, options.psrType, {
      signal: options.signal,
    });
  }
}

/**
 * Every (from, to) combination except an area paired with itself
 */
export function borderPairs(from: Countries, to: Countries): BorderPair[] {
  const fromList = typeof from === "string" ? [from] : [...from];
  const toList = typeof to === "string" ? [to] : [...to];

  return fromList.flatMap((f) =>
    toList
      .filter((t) => t.trim().toLowerCase() !== f.trim().toLowerCase())
      .map((t) => ({ from: f, to: t }))
  );
}

export class TransmissionApi {
  constructor(private readonly client: EntsoeClient) {}

  crossborderFlows(
    start: InstantInput,
    end: InstantInput,
    from: Countries,
    to: Countries,
    options?: FetchOptions
  ): Promise<ResultTable> {
    return this.byBorder("crossborder-flows", start, end, from, to, options);
  }

  scheduledExchanges(
    start: InstantInput,
    end: InstantInput,
    from: Countries,
    to: Countries,
    options?: FetchOptions
  ): Promise<ResultTable> {
    return this.byBorder("scheduled-exchanges", start, end, from, to, options);
  }

  netTransferCapacity(
    start: InstantInput,
    end: InstantInput,
    from: Countries,
    to: Countries,
    options?: FetchOptions
  ): Promise<ResultTable> {
    return this.byBorder("net-transfer-capacity", start, end, from, to, options);
  }

  private byBorder(
    family: DocumentFamilyName,
    start: InstantInput,
    end: InstantInput,
    from: Countries,
    to: Countries,
    options?: FetchOptions
  ): Promise<ResultTable> {
    return this.client.fetch(
      family,
      start,
      end,
      borderPairs(from, to),
      undefined,
      options
    );
  }
}

export class BalancingApi {
  constructor(private readonly client: EntsoeClient) {}

  imbalancePrices(
    start: InstantInput,
    end: InstantInput,
    countries: Countries,
    options?: FetchOptions
  ): Promise<ResultTable> {
    return this.client.fetch("imbalance-prices", start, end, countries, undefined, options);
  }

  imbalanceVolumes(
    start: InstantInput,
    end: InstantInput,
    countries: Countries,
    options?: FetchOptions
  ): Promise<ResultTable> {
    return this.client.fetch("imbalance-volumes", start, end, countries, undefined, options);
  }
}
