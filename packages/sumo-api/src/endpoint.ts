import { CliError, CLI_ERROR_CODES } from "@qprof/cli-core";

export const DEFAULT_ENDPOINT = "https://api.sumologic.com/api";
export const DISCOVERY_PATH = "/v1/collectors";

/**
 * Turn a deployment code or URL into an API base URL.
 * `undefined` means the caller has to discover it.
 */
export function resolveEndpoint(input: string | undefined): string | undefined {
  const value = input?.trim();
  if (!value) {
    return undefined;
  }
  const endpoint = value.includes("://") ? value : deploymentEndpoint(value);
  return assertEndpoint(endpoint);
}

function deploymentEndpoint(code: string): string {
  const normalized = code.toLowerCase();
  return normalized === "us1" ? DEFAULT_ENDPOINT : `https://api.${normalized}.sumologic.com/api`;
}

export function assertEndpoint(endpoint: string): string {
  if (endpoint.endsWith("/")) {
    throw new CliError(
      CLI_ERROR_CODES.E_CONFIG,
      `Endpoint should not end with a slash: ${endpoint}`,
      { endpoint },
    );
  }
  return endpoint;
}

/** The default endpoint redirects to the account's own deployment. */
export function endpointFromDiscoveryUrl(finalUrl: string): string {
  if (!finalUrl) {
    return DEFAULT_ENDPOINT;
  }
  return assertEndpoint(finalUrl.replace(DISCOVERY_PATH, ""));
}
