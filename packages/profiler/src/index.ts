export {
  DEFAULT_RANGE,
  TIME_UNITS,
  calculateRange,
  parseSpan,
  type TimeRange,
} from "./time-range";
export { parseTarget, parseTargetList, resolveTargets, type Target } from "./targets";
export {
  DEFAULT_LONG_QUERY_LIMIT,
  DEFAULT_QUERY,
  QUERY_EXTENSION,
  collectQueries,
  inlineQuery,
  loadQueryText,
  tailorQuery,
  type QuerySource,
  type TailorOptions,
} from "./queries";
export { createJitter, type JitterOptions, type Pause } from "./jitter";
export { runPool, type PoolResult } from "./pool";
export {
  DEFAULT_PAGE_LIMIT,
  executeSearch,
  type ExecuteSearchOptions,
  type SearchClient,
  type SearchResult,
  type SearchTimings,
} from "./executor";
export {
  NO_RECORDS,
  OUTPUT_FORMATS,
  OUTPUT_PREFIX,
  assembleOutput,
  buildBody,
  buildHeader,
  outputFileName,
  separatorFor,
  type OutputFormat,
} from "./output";
export { DEFAULT_OUTPUT_DIR, PROFILE_LOG_NAME, Workspace } from "./workspace";
export {
  QueryProfileSchema,
  appendProfile,
  readProfiles,
  summarizeProfiles,
  type ProfileSummaryRow,
  type QueryProfile,
} from "./profile-log";
export { SSM_PREFIX, resolveCredentials, type ResolveCredentialsOptions } from "./credentials";
export {
  ProfilerRunner,
  type ProfilerRunnerOptions,
  type RunEvent,
  type RunSummary,
  type TargetFailure,
} from "./runner";
