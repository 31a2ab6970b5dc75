/**
 * Formatter type definitions.
 */
import type { GenerationResult } from '../../core/generator/types.js';
import type { LayerInfo } from '../../core/publisher/types.js';
import type { ErrorKind, Stage } from '../../utils/errors.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
}

/**
 * The stable `{stage, kind, message}` failure shape.
 */
export interface FailurePayload {
  stage: Stage;
  kind: ErrorKind;
  message: string;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatGeneration(result: GenerationResult): string;
  formatFailure(failure: FailurePayload): string;
  formatLayerInfo(info: LayerInfo): string;
}
