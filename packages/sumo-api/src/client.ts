import { setTimeout as delay } from "node:timers/promises";
import type { z } from "zod";
import { errorMessage, getLogger, type Logger } from "@qprof/cli-core";
import { CookieJar } from "./cookies";
import {
  assertEndpoint,
  DEFAULT_ENDPOINT,
  DISCOVERY_PATH,
  endpointFromDiscoveryUrl,
  resolveEndpoint,
} from "./endpoint";
import { SumoApiError } from "./errors";
import {
  backoffDelay,
  DEFAULT_RETRY,
  isRetryableMethod,
  isRetryableStatus,
  parseRetryAfter,
  type HttpMethod,
  type RetryOptions,
} from "./retry";
import {
  MessagesPageSchema,
  RecordsPageSchema,
  SearchJobSchema,
  SearchJobStatusSchema,
  type MessagesPage,
  type RecordsPage,
  type SearchJob,
  type SearchJobStatus,
} from "./schemas";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface SumoCredentials {
  accessId: string;
  accessKey: string;
}

export interface SearchTimeRange {
  from: number;
  to: number;
  timeZone: string;
  byReceiptTime: boolean;
}

export interface SumoApiClientOptions extends SumoCredentials {
  /** Deployment code (`us2`, `eu`) or full API URL; discovered when omitted. */
  endpoint?: string;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  retry?: Partial<RetryOptions>;
}

interface RequestOptions {
  params?: QueryParams;
  body?: unknown;
}

const SEARCH_JOBS = "/v1/search/jobs";

export class SumoApiClient {
  private endpointUrl: string;
  private readonly cookies = new CookieJar();
  private readonly authorization: string;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly retry: RetryOptions;

  constructor(options: SumoApiClientOptions & { endpoint: string }) {
    this.endpointUrl = assertEndpoint(options.endpoint);
    this.authorization =
      "Basic " + Buffer.from(`${options.accessId}:${options.accessKey}`).toString("base64");
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.logger = options.logger ?? getLogger("sumo-api");
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
  }

  /** Build a client, discovering the deployment endpoint when none is given. */
  static async create(options: SumoApiClientOptions): Promise<SumoApiClient> {
    const resolved = resolveEndpoint(options.endpoint);
    const client = new SumoApiClient({ ...options, endpoint: resolved ?? DEFAULT_ENDPOINT });
    if (resolved === undefined) {
      await client.discoverEndpoint();
    }
    return client;
  }

  get endpoint(): string {
    return this.endpointUrl;
  }

  /**
   * The default endpoint redirects API calls to the account's deployment;
   * the final URL of a collectors listing reveals it. Any status is
   * accepted except a retryable one that outlasts the retries.
   */
  async discoverEndpoint(): Promise<string> {
    const { response, text } = await this.send("GET", DEFAULT_ENDPOINT + DISCOVERY_PATH, DISCOVERY_PATH);
    if (isRetryableStatus(response.status)) {
      throw SumoApiError.fromResponse("GET", DISCOVERY_PATH, response.status, text);
    }
    this.endpointUrl = endpointFromDiscoveryUrl(response.url);
    this.logger.debug("Discovered API endpoint", { endpoint: this.endpointUrl, status: response.status });
    return this.endpointUrl;
  }

  get(path: string, params?: QueryParams): Promise<unknown> {
    return this.request("GET", path, { params });
  }

  post(path: string, body: unknown, params?: QueryParams): Promise<unknown> {
    return this.request("POST", path, { body, params });
  }

  put(path: string, body: unknown, params?: QueryParams): Promise<unknown> {
    return this.request("PUT", path, { body, params });
  }

  delete(path: string, params?: QueryParams): Promise<unknown> {
    return this.request("DELETE", path, { params });
  }

  async createSearchJob(query: string, range: SearchTimeRange): Promise<SearchJob> {
    const body = await this.post(SEARCH_JOBS, {
      query,
      from: String(range.from),
      to: String(range.to),
      timeZone: range.timeZone,
      byReceiptTime: range.byReceiptTime,
    });
    return this.parse(SearchJobSchema, body, "POST", SEARCH_JOBS);
  }

  async getSearchJobStatus(jobId: string): Promise<SearchJobStatus> {
    const path = `${SEARCH_JOBS}/${encodeURIComponent(jobId)}`;
    return this.parse(SearchJobStatusSchema, await this.get(path), "GET", path);
  }

  async getSearchJobRecords(jobId: string, limit: number, offset = 0): Promise<RecordsPage> {
    const path = `${SEARCH_JOBS}/${encodeURIComponent(jobId)}/records`;
    return this.parse(RecordsPageSchema, await this.get(path, { limit, offset }), "GET", path);
  }

  async getSearchJobMessages(jobId: string, limit: number, offset = 0): Promise<MessagesPage> {
    const path = `${SEARCH_JOBS}/${encodeURIComponent(jobId)}/messages`;
    return this.parse(MessagesPageSchema, await this.get(path, { limit, offset }), "GET", path);
  }

  async deleteSearchJob(jobId: string): Promise<void> {
    await this.delete(`${SEARCH_JOBS}/${encodeURIComponent(jobId)}`);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      authorization: this.authorization,
      "content-type": "application/json",
      accept: "application/json",
    };
    const cookie = this.cookies.header();
    if (cookie) {
      headers.cookie = cookie;
    }
    return headers;
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(this.endpointUrl + path);
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private async request(method: HttpMethod, path: string, options: RequestOptions): Promise<unknown> {
    const body = options.body === undefined ? undefined : JSON.stringify(options.body);
    const { response, text } = await this.send(method, this.buildUrl(path, options.params), path, body);
    if (!response.ok) {
      throw SumoApiError.fromResponse(method, path, response.status, text);
    }
    return this.decode(text, method, path);
  }

  /**
   * One HTTP exchange with retries for idempotent methods. Resolves with the
   * last response, whatever its status; rejects when the network fails on
   * the final attempt.
   */
  private async send(
    method: HttpMethod,
    url: string,
    path: string,
    body?: string,
  ): Promise<{ response: Response; text: string }> {
    const maxAttempts = isRetryableMethod(method) ? Math.max(1, this.retry.attempts) : 1;

    for (let attempt = 1; ; attempt++) {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers: this.headers(),
          body,
          redirect: "follow",
        });
      } catch (error) {
        if (attempt < maxAttempts) {
          const wait = backoffDelay(attempt, this.retry);
          this.logger.warn("Request failed, retrying", { method, path, attempt, wait, error: errorMessage(error) });
          await this.sleep(wait);
          continue;
        }
        throw new SumoApiError(`${method} ${path} failed: ${errorMessage(error)}`, { method, path });
      }

      this.cookies.store(response.headers);
      const text = await response.text();

      if (!response.ok && attempt < maxAttempts && isRetryableStatus(response.status)) {
        const wait =
          parseRetryAfter(response.headers.get("retry-after"), this.retry) ??
          backoffDelay(attempt, this.retry);
        this.logger.warn("Retryable response", { method, path, status: response.status, attempt, wait });
        await this.sleep(wait);
        continue;
      }

      this.logger.debug("API call", { method, path, status: response.status, attempt });
      return { response, text };
    }
  }

  private decode(text: string, method: HttpMethod, path: string): unknown {
    if (text.trim() === "") {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new SumoApiError(`${method} ${path} returned malformed JSON: ${errorMessage(error)}`, {
        method,
        path,
        body: text,
      });
    }
  }

  private parse<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body: unknown,
    method: HttpMethod,
    path: string,
  ): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new SumoApiError(`${method} ${path} returned an unexpected payload: ${issues}`, {
        method,
        path,
      });
    }
    return parsed.data;
  }
}
