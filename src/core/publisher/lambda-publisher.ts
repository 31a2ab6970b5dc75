/**
 * AWS Lambda implementation of the layer publisher.
 */
import { readFile } from 'node:fs/promises';
import {
  Lambda,
  LambdaServiceException,
  type GetLayerVersionByArnCommandInput,
  type GetLayerVersionByArnCommandOutput,
  type PublishLayerVersionCommandInput,
  type PublishLayerVersionCommandOutput,
} from '@aws-sdk/client-lambda';
import {
  InvalidSpecError,
  PackagingError,
  RemoteApiError,
  ErrorCodes,
} from '../../utils/errors.js';
import { formatBytes } from '../../utils/format.js';
import { logger } from '../../utils/logger.js';
import type { OperationOptions } from '../builder/types.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryHooks } from './retry.js';
import type {
  AwsCredentials,
  LayerInfo,
  LayerPublisher,
  PublishRequest,
  PublishResult,
  RetryPolicy,
} from './types.js';

/** Largest archive PublishLayerVersion accepts inline */
export const MAX_INLINE_UPLOAD_BYTES = 50 * 1024 * 1024;

const LAYER_VERSION_ARN = /^arn:aws[a-z-]*:lambda:[a-z0-9-]+:\d{12}:layer:[A-Za-z0-9_-]+:\d+$/;

const RETRYABLE_CODES = new Set([
  'TooManyRequestsException',
  'ThrottlingException',
  'Throttling',
  'RequestLimitExceeded',
  'ServiceException',
  'ServiceUnavailable',
  'InternalFailure',
]);

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'TimeoutError',
  'NetworkingError',
]);

const FRIENDLY_MESSAGES: Record<string, string> = {
  InvalidParameterValueException: 'Invalid layer parameters',
  TooManyRequestsException: 'Rate limit exceeded',
  ResourceConflictException: 'Layer conflict',
  CodeStorageExceededException: 'Lambda code storage quota exceeded',
  AccessDeniedException: 'Access denied',
};

/**
 * The subset of the AWS SDK Lambda client the publisher calls.
 */
export interface LambdaApi {
  publishLayerVersion(
    args: PublishLayerVersionCommandInput,
    options?: { abortSignal?: AbortSignal }
  ): Promise<PublishLayerVersionCommandOutput>;
  getLayerVersionByArn(
    args: GetLayerVersionByArnCommandInput,
    options?: { abortSignal?: AbortSignal }
  ): Promise<GetLayerVersionByArnCommandOutput>;
}

export interface LambdaLayerPublisherOptions {
  credentials: AwsCredentials;
  retry?: RetryPolicy;
  /** Replaces the SDK client, e.g. with a fake in tests */
  client?: LambdaApi;
  sleep?: RetryHooks['sleep'];
}

/**
 * Translate an SDK or network failure into a RemoteApiError.
 */
export function toRemoteApiError(error: unknown): RemoteApiError {
  if (error instanceof RemoteApiError) {
    return error;
  }

  if (error instanceof LambdaServiceException) {
    const retryable = RETRYABLE_CODES.has(error.name) || error.$fault === 'server' || error.$retryable !== undefined;
    const friendly = FRIENDLY_MESSAGES[error.name];
    return new RemoteApiError(
      error.name,
      friendly ? `${friendly}: ${error.message}` : `AWS error (${error.name}): ${error.message}`,
      retryable,
      'remote-api',
      { httpStatus: error.$metadata.httpStatusCode, requestId: error.$metadata.requestId }
    );
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : error.name;
    return new RemoteApiError(code, error.message, TRANSIENT_NETWORK_CODES.has(code));
  }

  return new RemoteApiError('Unknown', String(error), false);
}

/**
 * Publishes layer versions through the Lambda API.
 * Credentials are passed in explicitly; nothing is read from the environment here.
 * SDK-level retries are disabled so `retry` is the only retry policy.
 */
export class LambdaLayerPublisher implements LayerPublisher {
  readonly region: string;
  private readonly client: LambdaApi;
  private readonly retry: RetryPolicy;
  private readonly sleep: RetryHooks['sleep'];

  constructor(options: LambdaLayerPublisherOptions) {
    const { credentials } = options;
    this.region = credentials.region;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
    this.client = options.client ?? new Lambda({
      region: credentials.region,
      credentials: {
        accessKeyId: credentials.accessKeyId,
        secretAccessKey: credentials.secretAccessKey,
        sessionToken: credentials.sessionToken,
      },
      maxAttempts: 1,
    });
  }

  async publish(request: PublishRequest, options: OperationOptions = {}): Promise<PublishResult> {
    const zipFile = typeof request.archive === 'string'
      ? await readFile(request.archive)
      : request.archive;

    if (zipFile.byteLength > MAX_INLINE_UPLOAD_BYTES) {
      throw new PackagingError(
        ErrorCodes.SIZE_LIMIT,
        `Archive is ${formatBytes(zipFile.byteLength)}, over the ${formatBytes(MAX_INLINE_UPLOAD_BYTES)} direct upload limit`,
        'size-limit',
        { actual: zipFile.byteLength, limit: MAX_INLINE_UPLOAD_BYTES }
      );
    }

    logger.detail('Layer name', request.layerName);
    logger.detail('Region', this.region);
    logger.detail('Content size', formatBytes(zipFile.byteLength));

    const output = await this.call((abortSignal) => this.client.publishLayerVersion({
      LayerName: request.layerName,
      Description: request.description,
      Content: { ZipFile: zipFile },
      CompatibleRuntimes: [request.runtime],
      CompatibleArchitectures: [request.architecture],
    }, { abortSignal }), options);

    if (!output.LayerVersionArn || output.Version === undefined) {
      throw new RemoteApiError('InvalidResponse', 'PublishLayerVersion response is missing the layer version ARN', false);
    }

    return {
      layerArn: output.LayerVersionArn,
      layerName: request.layerName,
      version: output.Version,
      createdAt: output.CreatedDate ?? new Date().toISOString(),
      region: this.region,
    };
  }

  async getLayerInfo(layerVersionArn: string, options: OperationOptions = {}): Promise<LayerInfo> {
    if (!LAYER_VERSION_ARN.test(layerVersionArn)) {
      throw new InvalidSpecError(
        ErrorCodes.INVALID_ARN,
        `Not a layer version ARN: ${layerVersionArn}`,
        { arn: layerVersionArn }
      );
    }

    const output = await this.call(
      (abortSignal) => this.client.getLayerVersionByArn({ Arn: layerVersionArn }, { abortSignal }),
      options
    );

    return {
      arn: output.LayerVersionArn ?? layerVersionArn,
      version: output.Version ?? Number(layerVersionArn.split(':')[7]),
      description: output.Description ?? '',
      createdAt: output.CreatedDate ?? '',
      compatibleRuntimes: output.CompatibleRuntimes ?? [],
      compatibleArchitectures: output.CompatibleArchitectures ?? [],
      codeSize: output.Content?.CodeSize ?? 0,
    };
  }

  /**
   * Run `send` with retries. One deadline covers every attempt and every
   * backoff wait; once it passes the call fails with kind `timeout`.
   */
  private async call<T>(send: (signal: AbortSignal) => Promise<T>, options: OperationOptions): Promise<T> {
    const deadline = options.timeoutMs !== undefined ? AbortSignal.timeout(options.timeoutMs) : undefined;
    const signals = [options.signal, deadline].filter((s): s is AbortSignal => s !== undefined);
    const signal = signals.length > 0 ? AbortSignal.any(signals) : new AbortController().signal;

    try {
      return await withRetry(
        async () => {
          if (signal.aborted) {
            throw this.abortError(options);
          }
          try {
            return await send(signal);
          } catch (error) {
            throw signal.aborted ? this.abortError(options) : toRemoteApiError(error);
          }
        },
        this.retry,
        { signal, sleep: this.sleep }
      );
    } catch (error) {
      throw signal.aborted ? this.abortError(options) : error;
    }
  }

  private abortError(options: OperationOptions): RemoteApiError {
    if (options.signal?.aborted) {
      return new RemoteApiError('Cancelled', 'Request was cancelled', false, 'cancelled');
    }
    return new RemoteApiError(
      'RequestTimeout',
      `Request timed out after ${options.timeoutMs} ms`,
      false,
      'timeout',
      { timeoutMs: options.timeoutMs }
    );
  }
}
