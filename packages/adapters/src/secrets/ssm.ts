import { GetParametersCommand, SSMClient } from "@aws-sdk/client-ssm";
import { CliError, CLI_ERROR_CODES, errorMessage } from "@qprof/cli-core";

export interface SsmParameterRequest {
  region: string;
  name: string;
}

export type SsmParameterFetcher = (request: SsmParameterRequest) => Promise<string>;

/**
 * Read a SecureString parameter, decrypted. AWS credentials come from the
 * default provider chain (env, shared config, instance role).
 */
export const fetchSsmParameter: SsmParameterFetcher = async ({ region, name }) => {
  const client = new SSMClient({ region });
  try {
    const response = await client.send(
      new GetParametersCommand({ Names: [name], WithDecryption: true }),
    );
    const value = response.Parameters?.[0]?.Value;
    if (value === undefined) {
      throw new CliError(
        CLI_ERROR_CODES.E_SECRET_RESOLVE,
        `SSM parameter ${name} not found in ${region}`,
        { region, name, invalid: response.InvalidParameters ?? [] },
      );
    }
    return value;
  } catch (error) {
    if (error instanceof CliError) {
      throw error;
    }
    throw new CliError(
      CLI_ERROR_CODES.E_SECRET_RESOLVE,
      `Failed to read SSM parameter ${name}: ${errorMessage(error)}`,
      { region, name },
    );
  } finally {
    client.destroy();
  }
};
