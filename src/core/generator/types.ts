/**
 * Orchestrator type definitions.
 */
import type { Architecture, PythonRuntime } from '../runtimes.js';
import type { PublishResult } from '../publisher/types.js';

export type ProgressPhase = 'parsing' | 'building' | 'uploading' | 'done';

export interface ProgressEvent {
  phase: ProgressPhase;
  /** ISO timestamp */
  at: string;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Receives progress events in pipeline order.
 */
export type ProgressSink = (event: ProgressEvent) => void;

export interface GenerateOptions {
  architecture?: Architecture;
  signal?: AbortSignal;
  /** Deadline for package installation */
  installTimeoutMs?: number;
  /** Deadline for each publish attempt */
  publishTimeoutMs?: number;
}

export interface GenerationResult extends PublishResult {
  description: string;
  runtime: PythonRuntime;
  architecture: Architecture;
  /** Requirements as passed to the installer */
  packages: string[];
  archiveBytes: number;
}
