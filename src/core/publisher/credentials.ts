/**
 * Credential provider: environment first, then a project `.env` file.
 */
import * as path from 'node:path';
import { ConfigurationError, ErrorCodes } from '../../utils/errors.js';
import { loadDotenvFile, type DotenvValues } from '../../utils/dotenv.js';
import type { AwsCredentials } from './types.js';

export type EnvSource = Record<string, string | undefined>;

const REQUIRED_KEYS = ['AWS_ACCESS_KEY_ID', 'AWS_SECRET_ACCESS_KEY'] as const;

/**
 * Pick credentials out of already-loaded values. `env` wins over `fileValues`.
 */
export function resolveCredentials(env: EnvSource, fileValues: DotenvValues = {}): AwsCredentials {
  const lookup = (key: string): string | undefined => {
    const value = env[key] ?? fileValues[key];
    return value && value.trim() ? value.trim() : undefined;
  };

  const accessKeyId = lookup('AWS_ACCESS_KEY_ID');
  const secretAccessKey = lookup('AWS_SECRET_ACCESS_KEY');
  if (!accessKeyId || !secretAccessKey) {
    const missing = REQUIRED_KEYS.filter((key) => !lookup(key));
    throw new ConfigurationError(
      ErrorCodes.MISSING_CREDENTIALS,
      `AWS credentials not found. Set ${missing.join(' and ')} in the environment or .env file`,
      { missing }
    );
  }

  const region = lookup('AWS_DEFAULT_REGION') ?? lookup('AWS_REGION');
  if (!region) {
    throw new ConfigurationError(
      ErrorCodes.MISSING_REGION,
      'AWS region not found. Set AWS_DEFAULT_REGION or AWS_REGION'
    );
  }

  return {
    accessKeyId,
    secretAccessKey,
    sessionToken: lookup('AWS_SESSION_TOKEN'),
    region,
  };
}

/**
 * Load credentials for a project: `env` (normally process.env) then `<projectRoot>/.env`.
 */
export async function loadCredentials(projectRoot: string, env: EnvSource): Promise<AwsCredentials> {
  const fileValues = await loadDotenvFile(path.join(projectRoot, '.env'));
  return resolveCredentials(env, fileValues);
}
