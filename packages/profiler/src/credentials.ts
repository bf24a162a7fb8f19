import { fetchSsmParameter, type SsmParameterFetcher } from "@qprof/cli-adapters";
import { CliError, CLI_ERROR_CODES } from "@qprof/cli-core";
import type { SumoCredentials } from "@qprof/sumo-api";

export const SSM_PREFIX = "aws:ssm:";

export interface ResolveCredentialsOptions {
  /** `<id>:<secret>` or `aws:ssm:<region>:<parameter>`. */
  apiKey?: string;
  env: NodeJS.ProcessEnv;
  fetchParameter?: SsmParameterFetcher;
}

function splitPair(value: string, source: string): SumoCredentials {
  const colon = value.indexOf(":");
  const accessId = colon > 0 ? value.slice(0, colon) : "";
  const accessKey = colon > 0 ? value.slice(colon + 1) : "";
  if (!accessId || !accessKey) {
    throw new CliError(
      CLI_ERROR_CODES.E_INVALID_FLAGS,
      `${source} must look like <accessId>:<accessKey>`,
    );
  }
  return { accessId, accessKey };
}

/**
 * Resolve Sumo Logic credentials from the --apikey value, falling back to
 * SUMO_UID / SUMO_KEY. Resolved values are exported back to `env`.
 */
export async function resolveCredentials(options: ResolveCredentialsOptions): Promise<SumoCredentials> {
  const { apiKey, env } = options;

  if (apiKey) {
    let credentials: SumoCredentials;
    if (apiKey.startsWith(SSM_PREFIX)) {
      const rest = apiKey.slice(SSM_PREFIX.length);
      const colon = rest.indexOf(":");
      const region = colon > 0 ? rest.slice(0, colon) : "";
      const name = colon > 0 ? rest.slice(colon + 1) : "";
      if (!region || !name) {
        throw new CliError(
          CLI_ERROR_CODES.E_INVALID_FLAGS,
          `SSM key reference must look like ${SSM_PREFIX}<region>:<parameter>`,
        );
      }
      const fetchParameter = options.fetchParameter ?? fetchSsmParameter;
      credentials = splitPair(await fetchParameter({ region, name }), `SSM parameter ${name}`);
    } else {
      credentials = splitPair(apiKey, "--apikey");
    }
    env.SUMO_UID = credentials.accessId;
    env.SUMO_KEY = credentials.accessKey;
    return credentials;
  }

  const accessId = env.SUMO_UID;
  const accessKey = env.SUMO_KEY;
  if (!accessId) {
    throw missingVariable("SUMO_UID");
  }
  if (!accessKey) {
    throw missingVariable("SUMO_KEY");
  }
  return { accessId, accessKey };
}

function missingVariable(name: string): CliError {
  return new CliError(
    CLI_ERROR_CODES.E_ENV_MISSING_VAR,
    `Environment variable ${name} is not set. Pass --apikey or export SUMO_UID and SUMO_KEY`,
    { variable: name },
  );
}
