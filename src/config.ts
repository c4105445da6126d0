/**
 * Shared configuration for the AWS helpers
 */

import type { AwsCredentialIdentity } from '@smithy/types';

export const DEFAULT_REGION = 'us-east-1';

/**
 * Minimal logger surface. `console` satisfies it.
 */
export interface HelperLogger {
  info(message: string): void;
  warn(message: string): void;
}

export interface HelperConfig {
  /** Region used when an operation doesn't name one */
  defaultRegion?: string;
  /** AWS credentials; the SDK default chain is used when omitted */
  credentials?: AwsCredentialIdentity;
  /** Log each API call made on the caller's behalf */
  verbose?: boolean;
  /** Destination for verbose output. Defaults to the console */
  logger?: HelperLogger;
}

export interface ResolvedHelperConfig {
  defaultRegion: string;
  credentials?: AwsCredentialIdentity;
  verbose: boolean;
  logger: HelperLogger;
}

const consoleLogger: HelperLogger = {
  info: (message) => console.log(`[aws] ${message}`),
  warn: (message) => console.warn(`[aws] ${message}`),
};

export function resolveHelperConfig(
  config: HelperConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedHelperConfig {
  return {
    defaultRegion: config.defaultRegion ?? env.AWS_DEFAULT_REGION ?? env.AWS_REGION ?? DEFAULT_REGION,
    credentials: config.credentials,
    verbose: config.verbose ?? false,
    logger: config.logger ?? consoleLogger,
  };
}
