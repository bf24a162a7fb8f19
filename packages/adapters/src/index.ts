export { envString, envNumber } from "./env/env";
export {
  ensureDir,
  writeText,
  appendText,
  readText,
  touch,
  removeFile,
  listFiles,
  pathKind,
  type PathKind,
} from "./io/fs-artifacts";
export { createJsonlSink, type JsonlSink } from "./telemetry/file-sink";
export {
  fetchSsmParameter,
  type SsmParameterFetcher,
  type SsmParameterRequest,
} from "./secrets/ssm";
