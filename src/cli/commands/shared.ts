/**
 * Wiring shared by the CLI commands: config, credentials and pipeline parts.
 */
import { InvalidArgumentError } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { LayerBuilder } from '../../core/builder/builder.js';
import { PipInstaller } from '../../core/builder/installer.js';
import type { PackageInstaller } from '../../core/builder/types.js';
import { loadCredentials, type EnvSource } from '../../core/publisher/credentials.js';
import { LambdaLayerPublisher, type LambdaApi } from '../../core/publisher/lambda-publisher.js';
import { LayerError, StageError, type Stage } from '../../utils/errors.js';
import type { FailurePayload } from '../formatters/types.js';

/**
 * Process-level inputs of a command run.
 */
export interface CommandEnvironment {
  cwd: string;
  env: EnvSource;
  /** Replaces the pip installer */
  installer?: PackageInstaller;
  /** Replaces the AWS SDK Lambda client */
  lambdaClient?: LambdaApi;
}

export function processEnvironment(): CommandEnvironment {
  return { cwd: process.cwd(), env: process.env };
}

/**
 * Reduce any thrown value to the stable failure payload.
 */
export function toFailurePayload(error: unknown, stage: Stage): FailurePayload {
  if (error instanceof StageError) {
    return error.toPayload();
  }
  if (error instanceof LayerError) {
    return { stage, kind: error.kind, message: error.message };
  }
  return { stage, kind: 'internal', message: error instanceof Error ? error.message : String(error) };
}

export async function loadCommandConfig(environment: CommandEnvironment, configPath?: string): Promise<Config> {
  return loadConfig(environment.cwd, configPath);
}

export function createBuilder(config: Config, environment: CommandEnvironment): LayerBuilder {
  const installer = environment.installer ?? new PipInstaller({
    command: config.install.command,
    indexUrl: config.install.index_url,
  });

  return new LayerBuilder({
    installer,
    cleanup: {
      bytecode: config.cleanup.bytecode,
      tests: config.cleanup.tests,
      metadata: config.cleanup.metadata,
      scripts: config.cleanup.scripts,
      extraPatterns: config.cleanup.extra_patterns,
    },
    limits: {
      maxZippedBytes: config.limits.max_zipped_bytes,
      maxUnzippedBytes: config.limits.max_unzipped_bytes,
    },
  });
}

/**
 * Resolve credentials and build the publisher. Throws ConfigurationError
 * when credentials or region are missing.
 */
export async function createPublisher(config: Config, environment: CommandEnvironment): Promise<LambdaLayerPublisher> {
  const credentials = await loadCredentials(environment.cwd, environment.env);
  return new LambdaLayerPublisher({
    credentials,
    client: environment.lambdaClient,
    retry: {
      maxAttempts: config.publish.max_attempts,
      baseDelayMs: config.publish.base_delay_ms,
      maxDelayMs: config.publish.max_delay_ms,
    },
  });
}

/**
 * commander option parser: `--timeout` seconds to milliseconds.
 */
export function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Expected a positive number of seconds.');
  }
  return Math.round(seconds * 1000);
}
