/**
 * Cloud publisher contract.
 */
import type { Architecture, PythonRuntime } from '../runtimes.js';
import type { OperationOptions } from '../builder/types.js';

export interface PublishRequest {
  /** Path to the zip, or its bytes */
  archive: string | Uint8Array;
  layerName: string;
  runtime: PythonRuntime;
  description: string;
  architecture: Architecture;
}

export interface PublishResult {
  readonly layerArn: string;
  readonly layerName: string;
  readonly version: number;
  readonly createdAt: string;
  readonly region: string;
}

export interface LayerInfo {
  arn: string;
  version: number;
  description: string;
  createdAt: string;
  compatibleRuntimes: string[];
  compatibleArchitectures: string[];
  codeSize: number;
}

/**
 * Uploads a layer archive and registers a new layer version.
 * Throws RemoteApiError; retries of retryable errors happen inside.
 */
export interface LayerPublisher {
  readonly region: string;
  publish(request: PublishRequest, options?: OperationOptions): Promise<PublishResult>;
  getLayerInfo(layerVersionArn: string, options?: OperationOptions): Promise<LayerInfo>;
}

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  region: string;
}

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}
