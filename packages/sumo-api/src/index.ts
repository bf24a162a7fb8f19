export {
  SumoApiClient,
  type FetchLike,
  type QueryParams,
  type SearchTimeRange,
  type SumoApiClientOptions,
  type SumoCredentials,
} from "./client";
export {
  DEFAULT_ENDPOINT,
  DISCOVERY_PATH,
  assertEndpoint,
  endpointFromDiscoveryUrl,
  resolveEndpoint,
} from "./endpoint";
export { SumoApiError, type SumoApiErrorDetails } from "./errors";
export { CookieJar } from "./cookies";
export {
  DEFAULT_RETRY,
  backoffDelay,
  isRetryableMethod,
  isRetryableStatus,
  parseRetryAfter,
  type HttpMethod,
  type RetryOptions,
} from "./retry";
export {
  FieldSchema,
  MessagesPageSchema,
  RecordsPageSchema,
  SearchJobSchema,
  SearchJobStatusSchema,
  type Cell,
  type Field,
  type MessagesPage,
  type RecordsPage,
  type ResultRow,
  type SearchJob,
  type SearchJobStatus,
} from "./schemas";
